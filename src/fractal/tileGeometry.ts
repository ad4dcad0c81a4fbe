/**
 * Tile geometry - stateless math over a fixed tile extent.
 *
 * Every tile, at every depth, is `tileExtent` world units wide in its own
 * local coordinates, centred on its origin. One world unit of a child equals
 * 1/SUBDIVISION world units of its parent.
 */

import { GRID_SIZE, CENTER_ADDRESS, clampAddress, type GridAddress } from './gridAddress';
import type { Vec2 } from '@/common/vector/utils';

export const SUBDIVISION = GRID_SIZE;

export interface TileExtent {
    readonly width: number;
    readonly height: number;
}

export interface TileGeometry {
    readonly subdivision: number;
    readonly tileExtent: TileExtent;
}

export function createTileGeometry(tileExtent: TileExtent): TileGeometry {
    if (
        !Number.isFinite(tileExtent.width) || !Number.isFinite(tileExtent.height) ||
        tileExtent.width <= 0 || tileExtent.height <= 0
    ) {
        throw new RangeError(`tile extent must be positive and finite, got ${tileExtent.width}x${tileExtent.height}`);
    }
    return Object.freeze({
        subdivision: SUBDIVISION,
        tileExtent: Object.freeze({ width: tileExtent.width, height: tileExtent.height }),
    });
}

/** Self-similarity: a child is as wide in its own units as its parent is in its own. */
export function childExtent(geometry: TileGeometry): TileExtent {
    return geometry.tileExtent;
}

/** Centre of a child slot, in parent-local coordinates. */
export function childCenterInParent(geometry: TileGeometry, address: GridAddress): Vec2 {
    const { width, height } = geometry.tileExtent;
    return {
        x: (address.col - CENTER_ADDRESS.col) * width / geometry.subdivision,
        y: (address.row - CENTER_ADDRESS.row) * height / geometry.subdivision,
    };
}

/** Slot containing a parent-local point. Points beyond the parent's edge clamp to the border slot. */
export function addressContaining(geometry: TileGeometry, pointInParent: Vec2): GridAddress {
    const { width, height } = geometry.tileExtent;
    const slotWidth = width / geometry.subdivision;
    const slotHeight = height / geometry.subdivision;
    return clampAddress({
        col: Math.floor((pointInParent.x + width / 2) / slotWidth),
        row: Math.floor((pointInParent.y + height / 2) / slotHeight),
    });
}

export function isWithinBounds(geometry: TileGeometry, point: Vec2): boolean {
    const halfWidth = geometry.tileExtent.width / 2;
    const halfHeight = geometry.tileExtent.height / 2;
    return (
        point.x >= -halfWidth && point.x <= halfWidth &&
        point.y >= -halfHeight && point.y <= halfHeight
    );
}

export function parentToChild(geometry: TileGeometry, address: GridAddress, pointInParent: Vec2): Vec2 {
    const center = childCenterInParent(geometry, address);
    return {
        x: (pointInParent.x - center.x) * geometry.subdivision,
        y: (pointInParent.y - center.y) * geometry.subdivision,
    };
}

export function childToParent(geometry: TileGeometry, address: GridAddress, pointInChild: Vec2): Vec2 {
    const center = childCenterInParent(geometry, address);
    return {
        x: center.x + pointInChild.x / geometry.subdivision,
        y: center.y + pointInChild.y / geometry.subdivision,
    };
}
