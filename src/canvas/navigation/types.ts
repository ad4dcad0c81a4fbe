/**
 * Navigation Engine Types
 *
 * The tile tree decides WHERE content lives (which tile, which local point).
 * The navigation engine decides HOW we VIEW it: which tile is active and the
 * pan / zoom / rotation that map its local coordinates onto the screen.
 */

import type { Vec2 } from '@/common/vector/utils';
import type { GridAddress, GridDirection } from '@/fractal/gridAddress';
import type { TileGeometry } from '@/fractal/tileGeometry';
import type { TileId, TileTopology } from '@/fractal/TileTree';

// ═══════════════════════════════════════════════════════════════════════════
// VIEWPORT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Screen dimensions in pixels. The camera projects around the viewport centre.
 */
export interface ViewportInfo {
    readonly width: number;
    readonly height: number;
}

/** A point in device pixels, origin at the top-left of the viewport. */
export type ScreenPoint = Vec2;

// ═══════════════════════════════════════════════════════════════════════════
// CAMERA
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The part of the camera that defines the projection, independent of which tile is active.
 *
 *   screen = centre + R(rotationAngle) · (zoomScale · world + panOffset)
 */
export interface CameraTransform {
    /** Translation in rotated screen space (pixels). */
    readonly panOffset: Vec2;
    /** Normalized into [1, SUBDIVISION) after every engine call. */
    readonly zoomScale: number;
    /** Radians, clockwise on screen. */
    readonly rotationAngle: number;
}

/**
 * Current view state. `activeTile` is the tile whose local space on-screen content is expressed in.
 */
export interface CameraState extends CameraTransform {
    readonly activeTile: TileId;
}

/** Frozen copy of the camera handed out to renderers and hit-testers. */
export type CameraSnapshot = Readonly<CameraState>;

// ═══════════════════════════════════════════════════════════════════════════
// ANCHOR
// ═══════════════════════════════════════════════════════════════════════════

/**
 * "This world point renders at this screen point." Every transition preserves it.
 * `worldPoint` is in the active tile's local coordinates.
 */
export interface Anchor {
    readonly screenPoint: ScreenPoint;
    readonly worldPoint: Vec2;
}

/** Which gesture currently owns the shared anchor. */
export type AnchorOwner = 'pinch' | 'rotation' | 'pan';

// ═══════════════════════════════════════════════════════════════════════════
// GESTURES
// ═══════════════════════════════════════════════════════════════════════════

export interface PanDelta {
    readonly kind: 'pan';
    /** Screen-space translation in pixels. */
    readonly screenDelta: Vec2;
    /** Where the dragged point is now. Omitted for momentum: the viewport centre is used. */
    readonly anchorScreenPoint?: ScreenPoint;
}

export interface ZoomDelta {
    readonly kind: 'zoom';
    /** Multiplier applied to zoomScale (>1 = zoom in). */
    readonly scaleDelta: number;
    readonly anchorScreenPoint: ScreenPoint;
}

export interface RotateDelta {
    readonly kind: 'rotate';
    /** Radians added to rotationAngle. */
    readonly rotationDelta: number;
    readonly anchorScreenPoint: ScreenPoint;
}

export type GestureDelta = PanDelta | ZoomDelta | RotateDelta;

export interface TransitionCounts {
    readonly drills: number;
    readonly pops: number;
    readonly wraps: number;
}

export interface GestureResult extends TransitionCounts {
    /** False when the delta was rejected (non-finite input); the camera is unchanged. */
    readonly accepted: boolean;
    /** The anchor the update resolved around, in the final active tile. */
    readonly anchor: Anchor | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// NAVIGATION ENGINE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Content-agnostic view of the navigation engine, used by the input layer,
 * the camera store and the command layer.
 */
export interface IFractalNavigationEngine {
    readonly topology: TileTopology;
    readonly geometry: TileGeometry;
    readonly viewport: ViewportInfo;
    /** Incremented every time the engine publishes a change. */
    readonly revision: number;

    currentCamera(): CameraSnapshot;
    currentAnchor(): Anchor | null;
    applyGestureDelta(delta: GestureDelta): GestureResult;

    /** Lock the shared anchor for `owner`. False when another gesture holds it. */
    beginGesture(owner: AnchorOwner, screenPoint: ScreenPoint): boolean;
    /** Re-sample the locked anchor under a new screen point without moving content. */
    relockAnchor(owner: AnchorOwner, screenPoint: ScreenPoint): boolean;
    /** Release the anchor, optionally handing it to another gesture. */
    endGesture(owner: AnchorOwner, handoff?: { owner: AnchorOwner; screenPoint: ScreenPoint }): void;
    anchorOwner(): AnchorOwner | null;

    /**
     * Set velocity for momentum scrolling.
     * @param vx - Horizontal velocity in screen pixels per second
     * @param vy - Vertical velocity in screen pixels per second
     */
    setVelocity(vx: number, vy: number): void;
    stopMomentum(): void;
    hasMomentum(): boolean;
    /** Advance momentum by `deltaTime` milliseconds. Null when nothing moved. */
    step(deltaTime: number): GestureResult | null;

    neighborOf(tile: TileId, direction: GridDirection): TileId;
    childOf(tile: TileId, address: GridAddress): TileId;
    worldToScreen(point: Vec2, camera?: CameraTransform): ScreenPoint;
    screenToWorld(point: ScreenPoint, camera?: CameraTransform): Vec2;
    setViewport(viewport: ViewportInfo): void;

    destroy(): void;
}
