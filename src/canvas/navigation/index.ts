/**
 * Navigation Module
 *
 * Maps tile-local coordinates to the screen and keeps the camera normalized
 * while the user pans, zooms and rotates through the tile tree.
 */

export * from "./types";
export * from "./projection";
export * from "./transitions";
export * from "./neighborhood";
export * from "./engines";
