import { describe, it, expect } from 'vitest';
import { gridAddress } from '@/fractal/gridAddress';
import { createTileGeometry } from '@/fractal/tileGeometry';
import { createTileTree } from '@/fractal/TileTree';
import {
    MAX_RELOCATION_TILES,
    pointBetweenTiles,
    pointToChild,
    pointToParent,
    relocatePoint,
} from '@/canvas/content/relocate';

const geometry = createTileGeometry({ width: 1000, height: 1000 });

describe('relocate', () => {
    it('leaves points inside their tile alone', () => {
        const tree = createTileTree();

        expect(relocatePoint(tree, geometry, tree.origin, { x: 500, y: -500 })).toEqual({
            tile: tree.origin,
            point: { x: 500, y: -500 },
        });
        expect(tree.size).toBe(1);
    });

    it('moves a point that left its tile into the neighbour containing it', () => {
        const tree = createTileTree();

        const moved = relocatePoint(tree, geometry, tree.origin, { x: 1200, y: -100 });

        expect(moved).toEqual({ tile: tree.neighborIfExists(tree.origin, 'right'), point: { x: 200, y: -100 } });
    });

    it('refuses to walk further than the relocation limit', () => {
        const tree = createTileTree();

        expect(() => relocatePoint(tree, geometry, tree.origin, { x: 1e12, y: 0 })).toThrow(RangeError);
        expect(() => relocatePoint(tree, geometry, tree.origin, { x: 0, y: Number.NaN })).toThrow(RangeError);
        expect(tree.size).toBe(1);
        expect(MAX_RELOCATION_TILES).toBe(1000);
    });

    it('moves a point into the child slot containing it', () => {
        const tree = createTileTree();

        const inChild = pointToChild(tree, geometry, tree.origin, { x: 450, y: -450 });

        expect(inChild).toEqual({ tile: tree.childIfExists(tree.origin, gridAddress(4, 0)), point: { x: 250, y: -250 } });
    });

    it('moves a point up into a grown parent', () => {
        const tree = createTileTree();

        const inParent = pointToParent(tree, geometry, tree.origin, { x: 100, y: 50 });

        expect(inParent).toEqual({ tile: tree.root(), point: { x: 20, y: 10 } });
    });

    it('converts between any two tiles through their common ancestor without creating tiles', () => {
        const tree = createTileTree();
        const left = tree.child(tree.origin, gridAddress(1, 2));
        const right = tree.child(tree.origin, gridAddress(3, 2));
        const size = tree.size;

        expect(pointBetweenTiles(tree, geometry, left, right, { x: 0, y: 0 })).toEqual({ x: -2000, y: 0 });
        expect(pointBetweenTiles(tree, geometry, tree.origin, right, { x: 200, y: 0 })).toEqual({ x: 0, y: 0 });
        expect(pointBetweenTiles(tree, geometry, right, tree.origin, { x: 0, y: 0 })).toEqual({ x: 200, y: 0 });
        expect(pointBetweenTiles(tree, geometry, right, right, { x: 7, y: 8 })).toEqual({ x: 7, y: 8 });
        expect(tree.size).toBe(size);
    });
});
