import { describe, it, expect } from 'vitest';
import { gridAddress } from '@/fractal/gridAddress';
import { createTileGeometry } from '@/fractal/tileGeometry';
import { createTileTree } from '@/fractal/TileTree';
import { collectNeighborhood, placementTransform } from '@/canvas/navigation/neighborhood';
import { applyTransform, worldToScreen } from '@/canvas/navigation/projection';
import type { CameraTransform } from '@/canvas/navigation/types';

const geometry = createTileGeometry({ width: 1000, height: 1000 });

function buildTree() {
    const tree = createTileTree();
    const right = tree.neighbor(tree.origin, 'right');
    const corner = tree.child(tree.origin, gridAddress(0, 0));
    return { tree, right, corner, top: tree.root() };
}

describe('collectNeighborhood', () => {
    it('returns ancestors, then the ring, then descendants, with placements in active-tile units', () => {
        const { tree, right, corner, top } = buildTree();

        expect(collectNeighborhood(tree, tree.origin, geometry)).toEqual([
            { tile: top, depthDelta: -1, offset: { x: 0, y: 0 }, scale: 5 },
            { tile: tree.origin, depthDelta: 0, offset: { x: 0, y: 0 }, scale: 1 },
            { tile: right, depthDelta: 0, offset: { x: 1000, y: 0 }, scale: 1 },
            { tile: corner, depthDelta: 1, offset: { x: -400, y: -400 }, scale: 0.2 },
        ]);
    });

    it('creates no tiles', () => {
        const { tree } = buildTree();
        const size = tree.size;

        collectNeighborhood(tree, tree.origin, geometry, { radius: 3, depthBelow: 4, depthAbove: 4 });

        expect(tree.size).toBe(size);
    });

    it('places the parent around an off-centre tile', () => {
        const { tree, right, top } = buildTree();

        const ancestors = collectNeighborhood(tree, right, geometry, { radius: 0, depthBelow: 0 });

        expect(ancestors).toEqual([
            { tile: top, depthDelta: -1, offset: { x: -1000, y: 0 }, scale: 5 },
            { tile: right, depthDelta: 0, offset: { x: 0, y: 0 }, scale: 1 },
        ]);
    });

    it('maps tile-local points to the screen through the camera', () => {
        const { tree, corner } = buildTree();
        const viewport = { width: 800, height: 600 };
        const camera: CameraTransform = { panOffset: { x: 20, y: -10 }, zoomScale: 2, rotationAngle: 0.3 };

        const placement = collectNeighborhood(tree, tree.origin, geometry).find((p) => p.tile === corner);
        expect(placement).toBeDefined();
        if (!placement) return;

        const local = { x: 100, y: -50 };
        const screen = applyTransform(placementTransform(placement, camera, viewport), local);
        const expected = worldToScreen({ x: -400 + 0.2 * 100, y: -400 + 0.2 * -50 }, camera, viewport);

        expect(screen.x).toBeCloseTo(expected.x, 9);
        expect(screen.y).toBeCloseTo(expected.y, 9);
    });
});
