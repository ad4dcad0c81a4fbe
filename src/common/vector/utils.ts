/**
 * 2D point helpers shared by the tile geometry, projection and relocation code.
 *
 * Points are plain readonly `{ x, y }` records; every helper returns a new value.
 */

export interface Vec2 {
    readonly x: number;
    readonly y: number;
}

export function vectorDifference(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function vectorSum(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function vectorScalarMultiply(vector: Vec2, scalar: number): Vec2 {
    return { x: vector.x * scalar, y: vector.y * scalar };
}

export function magnitude(vector: Vec2): number {
    return Math.sqrt(vector.x * vector.x + vector.y * vector.y);
}

/** Standard rotation matrix. With y pointing down this turns clockwise on screen. */
export function rotateVector(vector: Vec2, radians: number): Vec2 {
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    return {
        x: vector.x * cos - vector.y * sin,
        y: vector.x * sin + vector.y * cos,
    };
}

export function isFiniteVector(vector: Vec2): boolean {
    return Number.isFinite(vector.x) && Number.isFinite(vector.y);
}
