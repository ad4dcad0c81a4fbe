/**
 * Tile transitions that keep the camera normalized.
 *
 * Each transition re-expresses the anchor in a different tile and re-solves
 * the pan offset so the anchor's world point keeps rendering at the same
 * screen point. Loops run to a fixed point inside one engine call.
 */

import type { Vec2 } from '@/common/vector/utils';
import { assertContract } from '@/common/errors';
import type { TileId, TileTree } from '@/fractal/TileTree';
import {
    addressContaining,
    childToParent,
    parentToChild,
    type TileGeometry,
} from '@/fractal/tileGeometry';
import { formatAddress } from '@/fractal/gridAddress';
import { navTrace } from '@/utils/navTrace';
import { solvePanOffset } from './projection';
import type { ScreenPoint, TransitionCounts, ViewportInfo } from './types';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface TransitionContext<TContent> {
    readonly tree: TileTree<TContent>;
    readonly geometry: TileGeometry;
    readonly viewport: ViewportInfo;
}

/** Camera being resolved by the engine. Never exposed outside a call. */
export interface WorkingCamera {
    activeTile: TileId;
    panOffset: Vec2;
    zoomScale: number;
    rotationAngle: number;
}

export interface WorkingAnchor {
    readonly screenPoint: ScreenPoint;
    worldPoint: Vec2;
}

function resolvePan<TContent>(ctx: TransitionContext<TContent>, camera: WorkingCamera, anchor: WorkingAnchor): void {
    camera.panOffset = solvePanOffset(
        anchor.worldPoint,
        anchor.screenPoint,
        camera.zoomScale,
        camera.rotationAngle,
        ctx.viewport
    );
}

// ═══════════════════════════════════════════════════════════════════════════
// ZOOM TRANSITIONS
// ═══════════════════════════════════════════════════════════════════════════

/** Make the child under the anchor active and divide the zoom by the subdivision. */
export function drillDown<TContent>(ctx: TransitionContext<TContent>, camera: WorkingCamera, anchor: WorkingAnchor): void {
    const { tree, geometry } = ctx;
    const address = addressContaining(geometry, anchor.worldPoint);
    const child = tree.child(camera.activeTile, address);

    navTrace('Navigation', 'drillDown', { from: camera.activeTile, to: child, address: formatAddress(address) });

    anchor.worldPoint = parentToChild(geometry, address, anchor.worldPoint);
    camera.activeTile = child;
    camera.zoomScale /= geometry.subdivision;
    resolvePan(ctx, camera, anchor);
}

/** Make the parent active (growing one if needed) and multiply the zoom by the subdivision. */
export function popUp<TContent>(ctx: TransitionContext<TContent>, camera: WorkingCamera, anchor: WorkingAnchor): void {
    const { tree, geometry } = ctx;
    const parent = tree.ensureParent(camera.activeTile);
    const address = tree.get(camera.activeTile).address;
    assertContract(address !== null, `tile ${camera.activeTile} has a parent but no address`);

    navTrace('Navigation', 'popUp', { from: camera.activeTile, to: parent, address: formatAddress(address) });

    anchor.worldPoint = childToParent(geometry, address, anchor.worldPoint);
    camera.activeTile = parent;
    camera.zoomScale *= geometry.subdivision;
    resolvePan(ctx, camera, anchor);
}

// ═══════════════════════════════════════════════════════════════════════════
// LATERAL WRAP
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Swap to same-depth neighbours until the anchor lies inside the active tile.
 * The pan offset is re-solved once, after all swaps.
 *
 * @returns Number of tile swaps
 */
export function wrapLaterally<TContent>(ctx: TransitionContext<TContent>, camera: WorkingCamera, anchor: WorkingAnchor): number {
    const { tree } = ctx;
    const { width, height } = ctx.geometry.tileExtent;
    const halfWidth = width / 2;
    const halfHeight = height / 2;
    let { x, y } = anchor.worldPoint;
    let tile = camera.activeTile;
    let swaps = 0;

    while (x > halfWidth) {
        tile = tree.neighbor(tile, 'right');
        x -= width;
        swaps++;
    }
    while (x < -halfWidth) {
        tile = tree.neighbor(tile, 'left');
        x += width;
        swaps++;
    }
    while (y > halfHeight) {
        tile = tree.neighbor(tile, 'down');
        y -= height;
        swaps++;
    }
    while (y < -halfHeight) {
        tile = tree.neighbor(tile, 'up');
        y += height;
        swaps++;
    }

    if (swaps > 0) {
        navTrace('Navigation', 'wrap', { from: camera.activeTile, to: tile, swaps });
        camera.activeTile = tile;
        anchor.worldPoint = { x, y };
        resolvePan(ctx, camera, anchor);
    }
    return swaps;
}

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * wrap → drill* → pop* → wrap
 *
 * Leaves `zoomScale` in [1, subdivision) and the anchor within the active tile.
 */
export function normalizeCamera<TContent>(
    ctx: TransitionContext<TContent>,
    camera: WorkingCamera,
    anchor: WorkingAnchor
): TransitionCounts {
    let wraps = wrapLaterally(ctx, camera, anchor);

    let drills = 0;
    while (camera.zoomScale >= ctx.geometry.subdivision) {
        drillDown(ctx, camera, anchor);
        drills++;
    }

    let pops = 0;
    while (camera.zoomScale < 1) {
        popUp(ctx, camera, anchor);
        pops++;
    }

    wraps += wrapLaterally(ctx, camera, anchor);
    return { drills, pops, wraps };
}
