/**
 * Tile tree and the geometry of its 5x5 subdivision.
 */

export * from "./gridAddress";
export * from "./tileGeometry";
export * from "./TileTree";
