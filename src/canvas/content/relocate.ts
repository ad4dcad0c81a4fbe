/**
 * Re-express content positions in other tiles' local coordinates.
 *
 * Uses the same childCenterInParent / subdivision math as the camera
 * transitions, so content and camera never disagree about where a point is.
 */

import type { Vec2 } from '@/common/vector/utils';
import { assertContract } from '@/common/errors';
import {
    addressContaining,
    childToParent,
    isWithinBounds,
    parentToChild,
    type TileGeometry,
} from '@/fractal/tileGeometry';
import type { TileId, TileTree } from '@/fractal/TileTree';

/** A point together with the tile whose local coordinates it is expressed in. */
export interface TilePoint {
    readonly tile: TileId;
    readonly point: Vec2;
}

/** Same point, one level up. Grows a parent when `tile` is the top tile. */
export function pointToParent<TContent>(
    tree: TileTree<TContent>,
    geometry: TileGeometry,
    tile: TileId,
    point: Vec2
): TilePoint {
    const parent = tree.ensureParent(tile);
    const { address } = tree.get(tile);
    assertContract(address !== null, `tile ${tile} has a parent but no address`);
    return { tile: parent, point: childToParent(geometry, address, point) };
}

/** Same point, one level down, in the child slot containing it. */
export function pointToChild<TContent>(
    tree: TileTree<TContent>,
    geometry: TileGeometry,
    tile: TileId,
    point: Vec2
): TilePoint {
    const address = addressContaining(geometry, point);
    return { tile: tree.child(tile, address), point: parentToChild(geometry, address, point) };
}

/** Furthest `relocatePoint` walks, in tiles along either axis. */
export const MAX_RELOCATION_TILES = 1000;

/**
 * Move a point that left its tile (e.g. a dragged card) into the same-depth
 * tile that now contains it. Every tile crossed on the way is created.
 *
 * @throws RangeError when the point is more than MAX_RELOCATION_TILES away
 */
export function relocatePoint<TContent>(
    tree: TileTree<TContent>,
    geometry: TileGeometry,
    tile: TileId,
    point: Vec2
): TilePoint {
    if (isWithinBounds(geometry, point)) {
        return { tile, point };
    }

    const { width, height } = geometry.tileExtent;
    const reach = Math.max(Math.abs(point.x) / width, Math.abs(point.y) / height);
    if (!(reach <= MAX_RELOCATION_TILES)) {
        throw new RangeError(`point (${point.x}, ${point.y}) is more than ${MAX_RELOCATION_TILES} tiles from tile ${tile}`);
    }

    let { x, y } = point;
    let current = tile;

    while (x > width / 2) {
        current = tree.neighbor(current, 'right');
        x -= width;
    }
    while (x < -width / 2) {
        current = tree.neighbor(current, 'left');
        x += width;
    }
    while (y > height / 2) {
        current = tree.neighbor(current, 'down');
        y -= height;
    }
    while (y < -height / 2) {
        current = tree.neighbor(current, 'up');
        y += height;
    }

    return { tile: current, point: { x, y } };
}

/**
 * Express a point of `from` in the coordinates of `to`, through their nearest
 * common ancestor. Creates no tiles.
 */
export function pointBetweenTiles<TContent>(
    tree: TileTree<TContent>,
    geometry: TileGeometry,
    from: TileId,
    to: TileId,
    point: Vec2
): Vec2 {
    const targetChain = new Set([to, ...tree.ancestors(to)]);

    // Up from `from` to the first tile on the target's chain
    let current = from;
    let lifted = point;
    while (!targetChain.has(current)) {
        const { parent, address } = tree.get(current);
        assertContract(parent !== null && address !== null, `tiles ${from} and ${to} share no ancestor`);
        lifted = childToParent(geometry, address, lifted);
        current = parent;
    }

    // Down from the common ancestor to `to`
    const descent: TileId[] = [];
    for (let tile = to; tile !== current; ) {
        descent.push(tile);
        const { parent } = tree.get(tile);
        assertContract(parent !== null, `tile ${current} is not an ancestor of ${to}`);
        tile = parent;
    }

    let result = lifted;
    for (const tile of descent.reverse()) {
        const { address } = tree.get(tile);
        assertContract(address !== null, `tile ${tile} has no address`);
        result = parentToChild(geometry, address, result);
    }
    return result;
}
