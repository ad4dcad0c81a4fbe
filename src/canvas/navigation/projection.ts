/**
 * Camera projection between active-tile coordinates and screen pixels.
 *
 *   screen = C + R(θ) · (zoom · world + pan)
 *   world  = (R(−θ) · (screen − C) − pan) / zoom
 *
 * C is the viewport centre. `panOffset` lives in rotated screen space, so a
 * screen drag `d` moves it by R(−θ)·d.
 */

import {
    rotateVector,
    vectorDifference,
    vectorScalarMultiply,
    vectorSum,
    type Vec2,
} from '@/common/vector/utils';
import type { CameraTransform, ScreenPoint, ViewportInfo } from './types';

// ═══════════════════════════════════════════════════════════════════════════
// VIEW TRANSFORM
// ═══════════════════════════════════════════════════════════════════════════

/**
 * 2D affine transform, tile-local → screen:
 * ```
 * | a  c  tx |
 * | b  d  ty |
 * | 0  0  1  |
 * ```
 *   screenX = a * x + c * y + tx
 *   screenY = b * x + d * y + ty
 */
export interface ViewTransform {
    readonly a: number;
    readonly b: number;
    readonly c: number;
    readonly d: number;
    readonly tx: number;
    readonly ty: number;
}

export const IDENTITY_TRANSFORM: ViewTransform = {
    a: 1, b: 0, c: 0, d: 1, tx: 0, ty: 0,
};

/**
 * Multiply two transforms: result = A × B
 * Applies B first, then A.
 */
export function multiplyTransforms(a: ViewTransform, b: ViewTransform): ViewTransform {
    return {
        a: a.a * b.a + a.c * b.b,
        b: a.b * b.a + a.d * b.b,
        c: a.a * b.c + a.c * b.d,
        d: a.b * b.c + a.d * b.d,
        tx: a.a * b.tx + a.c * b.ty + a.tx,
        ty: a.b * b.tx + a.d * b.ty + a.ty,
    };
}

export function applyTransform(t: ViewTransform, p: Vec2): Vec2 {
    return {
        x: t.a * p.x + t.c * p.y + t.tx,
        y: t.b * p.x + t.d * p.y + t.ty,
    };
}

/** Matrix form of the camera, for renderers that push a single transform. */
export function cameraToViewTransform(camera: CameraTransform, viewport: ViewportInfo): ViewTransform {
    const cos = Math.cos(camera.rotationAngle);
    const sin = Math.sin(camera.rotationAngle);
    const z = camera.zoomScale;
    const center = viewportCenter(viewport);
    const pan = rotateVector(camera.panOffset, camera.rotationAngle);
    return {
        a: z * cos,
        b: z * sin,
        c: -z * sin,
        d: z * cos,
        tx: center.x + pan.x,
        ty: center.y + pan.y,
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// CLOSED-FORM PROJECTION
// ═══════════════════════════════════════════════════════════════════════════

export function viewportCenter(viewport: ViewportInfo): ScreenPoint {
    return { x: viewport.width / 2, y: viewport.height / 2 };
}

export function worldToScreen(world: Vec2, camera: CameraTransform, viewport: ViewportInfo): ScreenPoint {
    const local = vectorSum(vectorScalarMultiply(world, camera.zoomScale), camera.panOffset);
    return vectorSum(viewportCenter(viewport), rotateVector(local, camera.rotationAngle));
}

export function screenToWorld(screen: ScreenPoint, camera: CameraTransform, viewport: ViewportInfo): Vec2 {
    const unrotated = rotateVector(vectorDifference(screen, viewportCenter(viewport)), -camera.rotationAngle);
    return vectorScalarMultiply(vectorDifference(unrotated, camera.panOffset), 1 / camera.zoomScale);
}

/**
 * Pan offset that renders `anchorWorld` exactly at `desiredScreen`.
 */
export function solvePanOffset(
    anchorWorld: Vec2,
    desiredScreen: ScreenPoint,
    zoomScale: number,
    rotationAngle: number,
    viewport: ViewportInfo
): Vec2 {
    const unrotated = rotateVector(vectorDifference(desiredScreen, viewportCenter(viewport)), -rotationAngle);
    return vectorDifference(unrotated, vectorScalarMultiply(anchorWorld, zoomScale));
}

/** Pan offset change produced by dragging the screen by `screenDelta`. */
export function panOffsetDelta(screenDelta: Vec2, rotationAngle: number): Vec2 {
    return rotateVector(screenDelta, -rotationAngle);
}

/** Active-tile point currently rendered at the viewport centre. */
export function cameraCenterWorld(camera: CameraTransform, viewport: ViewportInfo): Vec2 {
    return screenToWorld(viewportCenter(viewport), camera, viewport);
}
