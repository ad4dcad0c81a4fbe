/**
 * InteractionController - Interprets UI events as navigation gestures.
 *
 * Responsibilities:
 * - One finger / mouse drag: anchor-locked pan
 * - Two or more fingers: pinch + rotate around the finger centroid
 * - Finger count changes: hand the anchor over or re-sample it, so content does not jump
 * - Wheel: zoom around the cursor
 * - Momentum: sets velocity on the engine after a fast release
 */

import type { AnchorOwner, IFractalNavigationEngine, ScreenPoint } from "../navigation/types";
import type { UIEvent } from "./types";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Dependencies for the InteractionController.
 * The engine is fetched on every event so hosts can swap it.
 */
export interface InteractionControllerDeps {
    getNavigationEngine: () => IFractalNavigationEngine;
    /** Monotonic clock in milliseconds. Default: performance.now() */
    now?: () => number;
}

export interface InteractionControllerConfig {
    /** Minimum release speed that starts momentum (pixels/sec). Default: 50 */
    momentumStartSpeed?: number;

    /** Number of recent positions to keep for velocity calculation. Default: 5 */
    velocitySampleCount?: number;

    /** Release later than this after the last movement means the finger had stopped (ms). Default: 100 */
    releaseWindowMs?: number;

    /** Zoom factor per wheel delta unit. Default: 1.1 */
    wheelZoomBase?: number;
}

const DEFAULT_CONFIG: Required<InteractionControllerConfig> = {
    momentumStartSpeed: 50,
    velocitySampleCount: 5,
    releaseWindowMs: 100,
    wheelZoomBase: 1.1,
};

interface VelocitySample {
    position: ScreenPoint;
    time: number;
}

interface FingerGeometry {
    center: ScreenPoint;
    /** Distance between the first two fingers. */
    span: number;
    /** Angle of the line between the first two fingers. */
    angle: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// INTERACTION CONTROLLER
// ═══════════════════════════════════════════════════════════════════════════

export class InteractionController {
    private deps: InteractionControllerDeps | null;
    private config: Required<InteractionControllerConfig>;
    private now: () => number;
    private destroyed = false;

    // ─── Gesture state ───
    private owner: AnchorOwner | null = null;
    private lastDragScreenPos: ScreenPoint | null = null;
    private velocitySamples: VelocitySample[] = [];

    // ─── Touch finger tracking ───
    private activeFingers = new Map<number, { current: ScreenPoint }>();
    private fingerBaseline: FingerGeometry | null = null;

    constructor(deps: InteractionControllerDeps, config: InteractionControllerConfig = {}) {
        this.deps = deps;
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.now = deps.now ?? (() => performance.now());
    }

    /**
     * Process a normalized UI event.
     */
    handleEvent(event: UIEvent): void {
        if (this.destroyed || !this.deps) return;
        const nav = this.deps.getNavigationEngine();

        switch (event.type) {
            // ─── Mouse/Pointer events ───
            case "drag-start":
                this.startPan(nav, event.screen);
                break;
            case "drag-move":
                this.updatePan(nav, event.screen);
                break;
            case "drag-end":
                this.endPan(nav, true);
                break;
            case "zoom":
                this.handleZoom(nav, event.screen, event.delta);
                break;

            // ─── Touch: Individual finger tracking ───
            case "finger-down":
                this.handleFingerDown(nav, event.fingerId, event.screen);
                break;
            case "finger-move":
                this.handleFingerMove(nav, event.fingerId, event.screen);
                break;
            case "finger-up":
                this.handleFingerRelease(nav, event.fingerId, event.screen, true);
                break;
            case "finger-cancel":
                this.handleFingerRelease(nav, event.fingerId, event.screen, false);
                break;
        }
    }

    /** Number of fingers currently down. */
    get fingerCount(): number {
        return this.activeFingers.size;
    }

    /**
     * Clean up all state.
     */
    destroy(): void {
        if (this.destroyed) return;

        if (this.deps) {
            const nav = this.deps.getNavigationEngine();
            nav.stopMomentum();
            if (this.owner) {
                nav.endGesture(this.owner);
            }
        }

        this.owner = null;
        this.lastDragScreenPos = null;
        this.velocitySamples = [];
        this.activeFingers.clear();
        this.fingerBaseline = null;
        this.deps = null;
        this.destroyed = true;
    }

    // ═══════════════════════════════════════════════════════════════════════
    // PAN
    // ═══════════════════════════════════════════════════════════════════════

    private startPan(nav: IFractalNavigationEngine, screen: ScreenPoint): void {
        // Stop any existing momentum
        nav.stopMomentum();

        if (nav.beginGesture("pan", screen)) {
            this.owner = "pan";
        }
        this.lastDragScreenPos = screen;
        this.velocitySamples = [{ position: screen, time: this.now() }];
    }

    private updatePan(nav: IFractalNavigationEngine, screen: ScreenPoint): void {
        if (!this.lastDragScreenPos) return;

        nav.applyGestureDelta({
            kind: "pan",
            screenDelta: { x: screen.x - this.lastDragScreenPos.x, y: screen.y - this.lastDragScreenPos.y },
            anchorScreenPoint: screen,
        });

        this.lastDragScreenPos = screen;
        this.addVelocitySample(screen);
    }

    private endPan(nav: IFractalNavigationEngine, withMomentum: boolean): void {
        if (!this.lastDragScreenPos) return;

        if (this.owner) {
            nav.endGesture(this.owner);
            this.owner = null;
        }

        if (withMomentum) {
            // Calculate release velocity and apply momentum
            const velocity = this.calculateVelocity();
            if (velocity) {
                nav.setVelocity(velocity.vx, velocity.vy);
            }
        }

        this.lastDragScreenPos = null;
        this.velocitySamples = [];
    }

    // ─── Velocity tracking ───

    private addVelocitySample(position: ScreenPoint): void {
        this.velocitySamples.push({ position, time: this.now() });

        // Keep only recent samples
        while (this.velocitySamples.length > this.config.velocitySampleCount) {
            this.velocitySamples.shift();
        }
    }

    private calculateVelocity(): { vx: number; vy: number } | null {
        if (this.velocitySamples.length < 2) return null;

        // Use only the last 2 samples for instantaneous velocity at release
        const prev = this.velocitySamples[this.velocitySamples.length - 2];
        const last = this.velocitySamples[this.velocitySamples.length - 1];
        const dt = (last.time - prev.time) / 1000; // Convert to seconds

        // Finger stopped before lifting - no momentum
        if (this.now() - last.time > this.config.releaseWindowMs) {
            return null;
        }

        if (dt < 0.001) return null;

        const vx = (last.position.x - prev.position.x) / dt;
        const vy = (last.position.y - prev.position.y) / dt;

        const speed = Math.sqrt(vx * vx + vy * vy);
        if (speed < this.config.momentumStartSpeed) return null;

        return { vx, vy };
    }

    // ═══════════════════════════════════════════════════════════════════════
    // ZOOM HANDLER
    // ═══════════════════════════════════════════════════════════════════════

    private handleZoom(nav: IFractalNavigationEngine, screen: ScreenPoint, delta: number): void {
        // delta > 0 = zoom in, delta < 0 = zoom out
        nav.stopMomentum();
        nav.applyGestureDelta({
            kind: "zoom",
            scaleDelta: Math.pow(this.config.wheelZoomBase, delta),
            anchorScreenPoint: screen,
        });
    }

    // ═══════════════════════════════════════════════════════════════════════
    // FINGER TRACKING HANDLERS
    // ═══════════════════════════════════════════════════════════════════════

    private handleFingerDown(nav: IFractalNavigationEngine, fingerId: number, screen: ScreenPoint): void {
        this.activeFingers.set(fingerId, { current: screen });

        if (this.activeFingers.size === 1) {
            this.startPan(nav, screen);
            return;
        }

        // 2+ fingers: pinch owns the anchor at the centroid
        nav.stopMomentum();
        const geometry = this.computeFingerGeometry();
        if (this.owner === "pan") {
            nav.endGesture("pan", { owner: "pinch", screenPoint: geometry.center });
            this.owner = "pinch";
        } else if (this.owner === "pinch") {
            nav.relockAnchor("pinch", geometry.center);
        } else if (nav.beginGesture("pinch", geometry.center)) {
            this.owner = "pinch";
        }

        this.fingerBaseline = geometry;
        this.lastDragScreenPos = null;
        this.velocitySamples = [];
    }

    private handleFingerMove(nav: IFractalNavigationEngine, fingerId: number, screen: ScreenPoint): void {
        const finger = this.activeFingers.get(fingerId);
        if (!finger) return;

        finger.current = screen;

        if (this.activeFingers.size === 1) {
            this.updatePan(nav, screen);
        } else {
            this.applyFingerTransform(nav);
        }
    }

    private handleFingerRelease(
        nav: IFractalNavigationEngine,
        fingerId: number,
        screen: ScreenPoint,
        withMomentum: boolean
    ): void {
        const finger = this.activeFingers.get(fingerId);
        if (!finger) return;

        finger.current = screen;
        const wasMultiFinger = this.activeFingers.size >= 2;
        this.activeFingers.delete(fingerId);

        if (this.activeFingers.size === 0) {
            if (wasMultiFinger) {
                this.endPinch(nav);
            } else {
                this.endPan(nav, withMomentum);
            }
            return;
        }

        if (this.activeFingers.size === 1) {
            // Back to single-finger panning from the remaining finger
            const remaining = [...this.activeFingers.values()][0];
            if (this.owner) {
                nav.endGesture(this.owner, { owner: "pan", screenPoint: remaining.current });
                this.owner = "pan";
            }
            this.fingerBaseline = null;
            this.lastDragScreenPos = remaining.current;
            this.velocitySamples = [{ position: remaining.current, time: this.now() }];
            return;
        }

        // Still multi-finger: the centroid moved, re-sample without moving content
        const geometry = this.computeFingerGeometry();
        if (this.owner === "pinch") {
            nav.relockAnchor("pinch", geometry.center);
        }
        this.fingerBaseline = geometry;
    }

    private endPinch(nav: IFractalNavigationEngine): void {
        if (this.owner) {
            nav.endGesture(this.owner);
            this.owner = null;
        }
        this.fingerBaseline = null;
        this.lastDragScreenPos = null;
        this.velocitySamples = [];
    }

    private computeFingerGeometry(): FingerGeometry {
        const positions = [...this.activeFingers.values()].map((finger) => finger.current);

        const center = {
            x: positions.reduce((sum, p) => sum + p.x, 0) / positions.length,
            y: positions.reduce((sum, p) => sum + p.y, 0) / positions.length,
        };

        // Scale and rotation come from the first two fingers
        if (positions.length >= 2) {
            const dx = positions[1].x - positions[0].x;
            const dy = positions[1].y - positions[0].y;
            return { center, span: Math.sqrt(dx * dx + dy * dy), angle: Math.atan2(dy, dx) };
        }

        return { center, span: 0, angle: 0 };
    }

    private applyFingerTransform(nav: IFractalNavigationEngine): void {
        const baseline = this.fingerBaseline;
        if (!baseline || this.activeFingers.size < 2) return;

        const current = this.computeFingerGeometry();

        // Degenerate (fingers on top of each other): keep the centroid pan only
        const scaleDelta = baseline.span > 0 && current.span > 0 ? current.span / baseline.span : 1;
        const rotationDelta = normalizeAngle(current.angle - baseline.angle);

        // With the anchor locked, both calls pin the same content point to the moving centroid
        nav.applyGestureDelta({ kind: "zoom", scaleDelta, anchorScreenPoint: current.center });
        if (rotationDelta !== 0) {
            nav.applyGestureDelta({ kind: "rotate", rotationDelta, anchorScreenPoint: current.center });
        }

        this.fingerBaseline = current;
    }
}

/** Wrap into (-π, π] so crossing the atan2 seam does not spin the canvas. */
function normalizeAngle(radians: number): number {
    let result = radians;
    while (result > Math.PI) result -= 2 * Math.PI;
    while (result <= -Math.PI) result += 2 * Math.PI;
    return result;
}
