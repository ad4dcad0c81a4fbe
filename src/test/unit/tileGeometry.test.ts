import { describe, it, expect } from 'vitest';
import { gridAddress } from '@/fractal/gridAddress';
import {
    addressContaining,
    childCenterInParent,
    childExtent,
    childToParent,
    createTileGeometry,
    isWithinBounds,
    parentToChild,
    SUBDIVISION,
} from '@/fractal/tileGeometry';

const geometry = createTileGeometry({ width: 1000, height: 500 });

describe('tileGeometry', () => {
    it('rejects empty or non-finite extents', () => {
        expect(() => createTileGeometry({ width: 0, height: 10 })).toThrow(RangeError);
        expect(() => createTileGeometry({ width: 10, height: Infinity })).toThrow(RangeError);
        expect(() => createTileGeometry({ width: Number.NaN, height: 10 })).toThrow(RangeError);
    });

    it('is frozen and self-similar', () => {
        expect(Object.isFrozen(geometry)).toBe(true);
        expect(geometry.subdivision).toBe(SUBDIVISION);
        expect(childExtent(geometry)).toEqual({ width: 1000, height: 500 });
    });

    it('places child centres on a 5x5 lattice around the origin', () => {
        expect(childCenterInParent(geometry, gridAddress(0, 0))).toEqual({ x: -400, y: -200 });
        expect(childCenterInParent(geometry, gridAddress(4, 3))).toEqual({ x: 400, y: 100 });
    });

    it('finds the slot containing a point and clamps beyond the edge', () => {
        expect(addressContaining(geometry, { x: 0, y: 0 })).toEqual({ col: 2, row: 2 });
        expect(addressContaining(geometry, { x: -500, y: -250 })).toEqual({ col: 0, row: 0 });
        expect(addressContaining(geometry, { x: 500, y: 250 })).toEqual({ col: 4, row: 4 });
        expect(addressContaining(geometry, { x: 2000, y: 0 })).toEqual({ col: 4, row: 2 });
    });

    it('treats the tile edge as inside', () => {
        expect(isWithinBounds(geometry, { x: 500, y: -250 })).toBe(true);
        expect(isWithinBounds(geometry, { x: 500.001, y: 0 })).toBe(false);
        expect(isWithinBounds(geometry, { x: 0, y: -250.5 })).toBe(false);
    });

    it('converts between parent and child coordinates', () => {
        const address = gridAddress(3, 2);
        const inChild = parentToChild(geometry, address, { x: 250, y: 10 });

        expect(inChild).toEqual({ x: 250, y: 50 });
        expect(childToParent(geometry, address, inChild)).toEqual({ x: 250, y: 10 });
    });
});
