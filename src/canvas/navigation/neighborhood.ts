/**
 * Collect the existing tiles a renderer or hit-tester needs around the active tile.
 *
 * Nothing is created here: tiles nobody has visited are simply absent. Each
 * result carries a placement mapping its local coordinates into the active
 * tile's coordinates:
 *
 *   p_active = offset + scale · p_tile
 */

import { vectorDifference, vectorScalarMultiply, vectorSum, type Vec2 } from '@/common/vector/utils';
import type { GridDirection } from '@/fractal/gridAddress';
import { childCenterInParent, type TileGeometry } from '@/fractal/tileGeometry';
import type { TileId, TileTopology } from '@/fractal/TileTree';
import { cameraToViewTransform, multiplyTransforms, type ViewTransform } from './projection';
import type { CameraTransform, ViewportInfo } from './types';

export interface TilePlacement {
    readonly tile: TileId;
    /** Levels below (positive) or above (negative) the active tile. */
    readonly depthDelta: number;
    readonly offset: Vec2;
    readonly scale: number;
}

export interface NeighborhoodOptions {
    /** Same-depth ring radius, in tiles. Default: 1 (3x3) */
    radius?: number;
    /** Levels of existing children to include under each ring tile. Default: 1 */
    depthBelow?: number;
    /** Levels of ancestors to include. Default: 1 */
    depthAbove?: number;
}

const DEFAULT_OPTIONS: Required<NeighborhoodOptions> = {
    radius: 1,
    depthBelow: 1,
    depthAbove: 1,
};

/**
 * @returns Ancestors (outermost first), then the same-depth ring, then descendants
 */
export function collectNeighborhood(
    topology: TileTopology,
    activeTile: TileId,
    geometry: TileGeometry,
    options: NeighborhoodOptions = {}
): TilePlacement[] {
    const { radius, depthBelow, depthAbove } = { ...DEFAULT_OPTIONS, ...options };

    const ancestors = collectAncestors(topology, activeTile, geometry, depthAbove);
    const ring = collectRing(topology, activeTile, geometry, radius);

    const descendants: TilePlacement[] = [];
    for (const placement of ring) {
        collectDescendants(topology, geometry, placement, depthBelow, descendants);
    }

    return [...ancestors.reverse(), ...ring, ...descendants];
}

/** Tile-local → screen transform for a placement under the given camera. */
export function placementTransform(
    placement: TilePlacement,
    camera: CameraTransform,
    viewport: ViewportInfo
): ViewTransform {
    const { offset, scale } = placement;
    return multiplyTransforms(cameraToViewTransform(camera, viewport), {
        a: scale, b: 0, c: 0, d: scale, tx: offset.x, ty: offset.y,
    });
}

// ═══════════════════════════════════════════════════════════════════════════
// PRIVATE
// ═══════════════════════════════════════════════════════════════════════════

function walk(topology: TileTopology, start: TileId, direction: GridDirection, steps: number): TileId | null {
    let current: TileId | null = start;
    for (let i = 0; i < steps && current !== null; i++) {
        current = topology.neighborIfExists(current, direction);
    }
    return current;
}

function collectRing(topology: TileTopology, activeTile: TileId, geometry: TileGeometry, radius: number): TilePlacement[] {
    const { width, height } = geometry.tileExtent;
    const result: TilePlacement[] = [];

    for (let dy = -radius; dy <= radius; dy++) {
        for (let dx = -radius; dx <= radius; dx++) {
            const horizontal: GridDirection = dx < 0 ? 'left' : 'right';
            const vertical: GridDirection = dy < 0 ? 'up' : 'down';

            // Either path may be missing a tile the other one has
            const viaRow = walk(topology, activeTile, horizontal, Math.abs(dx));
            let tile = viaRow === null ? null : walk(topology, viaRow, vertical, Math.abs(dy));
            if (tile === null) {
                const viaColumn = walk(topology, activeTile, vertical, Math.abs(dy));
                tile = viaColumn === null ? null : walk(topology, viaColumn, horizontal, Math.abs(dx));
            }

            if (tile !== null) {
                result.push({ tile, depthDelta: 0, offset: { x: dx * width, y: dy * height }, scale: 1 });
            }
        }
    }
    return result;
}

function collectDescendants(
    topology: TileTopology,
    geometry: TileGeometry,
    parent: TilePlacement,
    levels: number,
    out: TilePlacement[]
): void {
    if (levels <= 0) return;

    for (const { address, tile } of topology.childrenOf(parent.tile)) {
        const placement: TilePlacement = {
            tile,
            depthDelta: parent.depthDelta + 1,
            offset: vectorSum(parent.offset, vectorScalarMultiply(childCenterInParent(geometry, address), parent.scale)),
            scale: parent.scale / geometry.subdivision,
        };
        out.push(placement);
        collectDescendants(topology, geometry, placement, levels - 1, out);
    }
}

/** Nearest first. */
function collectAncestors(topology: TileTopology, activeTile: TileId, geometry: TileGeometry, levels: number): TilePlacement[] {
    const result: TilePlacement[] = [];
    let current: TilePlacement = { tile: activeTile, depthDelta: 0, offset: { x: 0, y: 0 }, scale: 1 };

    for (let i = 0; i < levels; i++) {
        const { parent, address } = topology.get(current.tile);
        if (parent === null || address === null) break;

        const scale = current.scale * geometry.subdivision;
        current = {
            tile: parent,
            depthDelta: current.depthDelta - 1,
            offset: vectorDifference(current.offset, vectorScalarMultiply(childCenterInParent(geometry, address), scale)),
            scale,
        };
        result.push(current);
    }
    return result;
}
