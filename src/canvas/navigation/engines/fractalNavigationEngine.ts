/**
 * FractalNavigationEngine - Pan/zoom/rotate navigation over the tile tree.
 *
 * Supports:
 * - Anchor-stable gesture deltas (the world point under the finger stays put)
 * - Drill-down / pop-up / lateral wrap so coordinates stay tile-local and small
 * - Shared anchor ownership between concurrent gesture recognizers
 * - Momentum scrolling with friction decay, anchored on the camera centre
 */

import {
    isFiniteVector,
    magnitude,
    vectorDifference,
    vectorSum,
    type Vec2,
} from '@/common/vector/utils';
import { assertContract, InvariantViolationError } from '@/common/errors';
import type { GridAddress, GridDirection } from '@/fractal/gridAddress';
import {
    createTileGeometry,
    isWithinBounds,
    type TileExtent,
    type TileGeometry,
} from '@/fractal/tileGeometry';
import type { TileId, TileTopology, TileTree } from '@/fractal/TileTree';
import { navTrace } from '@/utils/navTrace';
import { canvasStore, NO_TRANSITIONS, type CanvasStore } from '../../../stores/canvasStore';
import {
    panOffsetDelta,
    screenToWorld,
    solvePanOffset,
    viewportCenter,
    worldToScreen,
} from '../projection';
import { normalizeCamera, type TransitionContext, type WorkingAnchor, type WorkingCamera } from '../transitions';
import type {
    Anchor,
    AnchorOwner,
    CameraSnapshot,
    CameraState,
    CameraTransform,
    GestureDelta,
    GestureResult,
    IFractalNavigationEngine,
    ScreenPoint,
    TransitionCounts,
    ViewportInfo,
} from '../types';

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export interface FractalNavigationEngineConfig {
    /** Friction coefficient for momentum decay (per second). Default: 2.45 (0.96 per 60 Hz frame) */
    friction?: number;

    /** Minimum velocity before momentum stops (pixels/sec). Default: 30 */
    minVelocity?: number;

    /** Throw InvariantViolationError when a call leaves the camera unnormalized. Default: on outside production */
    assertInvariants?: boolean;

    /** Furthest a single call may move the anchor, in tiles; longer moves are rejected. Default: 1000 */
    maxWrapTiles?: number;

    /** Tile extent for a new document. Default: the initial viewport size */
    tileExtent?: TileExtent | null;

    /** Initial camera; zoom outside [1, 5) is normalized on construction. */
    initialZoom?: number;
    initialRotation?: number;
    initialPanOffset?: Vec2;
    /** Default: the tree's origin tile */
    initialTile?: TileId | null;
}

const DEFAULT_CONFIG: Required<FractalNavigationEngineConfig> = {
    friction: 2.45,
    minVelocity: 30,
    assertInvariants: process.env.NODE_ENV !== 'production',
    maxWrapTiles: 1000,
    tileExtent: null,
    initialZoom: 1,
    initialRotation: 0,
    initialPanOffset: { x: 0, y: 0 },
    initialTile: null,
};

interface AnchorLock {
    owner: AnchorOwner;
    anchor: WorkingAnchor;
}

const REJECTED: GestureResult = { accepted: false, drills: 0, pops: 0, wraps: 0, anchor: null };

// ═══════════════════════════════════════════════════════════════════════════
// FRACTAL NAVIGATION ENGINE
// ═══════════════════════════════════════════════════════════════════════════

export class FractalNavigationEngine<TContent> implements IFractalNavigationEngine {
    private config: Required<FractalNavigationEngineConfig>;
    private readonly store: CanvasStore;

    private _tree: TileTree<TContent>;
    private _geometry: TileGeometry;
    private _viewport: ViewportInfo;

    // Current camera (mutable between calls, snapshotted on read)
    private camera: WorkingCamera;

    private lock: AnchorLock | null = null;
    private lastAnchor: Anchor | null = null;
    private _revision = 0;
    private publishedTileCount = 0;

    // Momentum state
    private velocityX = 0;
    private velocityY = 0;

    constructor(
        tree: TileTree<TContent>,
        viewport: ViewportInfo,
        config: FractalNavigationEngineConfig = {},
        store: CanvasStore = canvasStore
    ) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.store = store;
        this._tree = tree;
        this._viewport = { width: viewport.width, height: viewport.height };
        this._geometry = createTileGeometry(this.config.tileExtent ?? this._viewport);

        const initialTile = this.config.initialTile ?? tree.origin;
        this.camera = {
            activeTile: tree.get(initialTile).id,
            panOffset: this.config.initialPanOffset,
            zoomScale: this.config.initialZoom,
            rotationAngle: this.config.initialRotation,
        };

        const problem = cameraProblem(this.camera) ?? this.reachProblem(this.centerAnchor(this.camera));
        if (problem !== null) {
            throw new RangeError(`invalid initial camera: ${problem}`);
        }

        this.store.getState().attachEngine(this);
        this.commit(this.camera, this.centerAnchor(this.camera), null);
    }

    // ═══════════════════════════════════════════════════════════════════════
    // ACCESSORS
    // ═══════════════════════════════════════════════════════════════════════

    get tree(): TileTree<TContent> {
        return this._tree;
    }

    get topology(): TileTopology {
        return this._tree;
    }

    get geometry(): TileGeometry {
        return this._geometry;
    }

    get viewport(): ViewportInfo {
        return this._viewport;
    }

    get revision(): number {
        return this._revision;
    }

    currentCamera(): CameraSnapshot {
        return Object.freeze({ ...this.camera });
    }

    currentAnchor(): Anchor | null {
        return this.lastAnchor;
    }

    anchorOwner(): AnchorOwner | null {
        return this.lock?.owner ?? null;
    }

    // ═══════════════════════════════════════════════════════════════════════
    // GESTURES
    // ═══════════════════════════════════════════════════════════════════════

    applyGestureDelta(delta: GestureDelta): GestureResult {
        if (!isUsableDelta(delta)) {
            console.warn('[FractalNavigation] Ignoring non-finite gesture delta', delta);
            return REJECTED;
        }

        const camera: WorkingCamera = { ...this.camera };
        const lockUsed = this.lock !== null && (delta.kind !== 'pan' || delta.anchorScreenPoint !== undefined);
        const anchor = this.applyDelta(delta, camera);

        if (cameraProblem(camera) !== null || !isFiniteVector(anchor.worldPoint)) {
            console.warn('[FractalNavigation] Gesture delta produced a degenerate camera, ignoring', delta);
            return REJECTED;
        }
        const reach = this.reachProblem(anchor);
        if (reach !== null) {
            console.warn(`[FractalNavigation] Ignoring gesture delta: ${reach}`, delta);
            return REJECTED;
        }

        const counts = this.commit(camera, anchor, delta.kind, lockUsed);
        return { accepted: true, ...counts, anchor: this.lastAnchor };
    }

    beginGesture(owner: AnchorOwner, screenPoint: ScreenPoint): boolean {
        if (!isFiniteVector(screenPoint)) {
            console.warn('[FractalNavigation] Ignoring non-finite gesture anchor', screenPoint);
            return false;
        }
        if (this.lock && this.lock.owner !== owner) {
            return false;
        }

        this.stopMomentum();
        this.lock = { owner, anchor: this.sampleAnchor(screenPoint) };
        navTrace('Input', 'beginGesture', { owner, tile: this.camera.activeTile });
        return true;
    }

    relockAnchor(owner: AnchorOwner, screenPoint: ScreenPoint): boolean {
        if (!this.lock || this.lock.owner !== owner || !isFiniteVector(screenPoint)) {
            return false;
        }
        this.lock = { owner, anchor: this.sampleAnchor(screenPoint) };
        return true;
    }

    endGesture(owner: AnchorOwner, handoff?: { owner: AnchorOwner; screenPoint: ScreenPoint }): void {
        if (!this.lock || this.lock.owner !== owner) {
            return;
        }

        if (handoff && isFiniteVector(handoff.screenPoint)) {
            this.lock = { owner: handoff.owner, anchor: this.sampleAnchor(handoff.screenPoint) };
            navTrace('Input', 'handoffGesture', { from: owner, to: handoff.owner });
        } else {
            this.lock = null;
            navTrace('Input', 'endGesture', { owner });
        }
    }

    // ═══════════════════════════════════════════════════════════════════════
    // MOMENTUM
    // ═══════════════════════════════════════════════════════════════════════

    setVelocity(vx: number, vy: number): void {
        if (!Number.isFinite(vx) || !Number.isFinite(vy)) {
            console.warn('[FractalNavigation] Ignoring non-finite velocity', { vx, vy });
            return;
        }
        this.velocityX = vx;
        this.velocityY = vy;
    }

    stopMomentum(): void {
        this.velocityX = 0;
        this.velocityY = 0;
    }

    hasMomentum(): boolean {
        return this.velocityX !== 0 || this.velocityY !== 0;
    }

    step(deltaTime: number): GestureResult | null {
        if (!this.hasMomentum() || !(deltaTime > 0)) {
            return null;
        }
        const dt = deltaTime / 1000; // Convert to seconds

        const result = this.applyGestureDelta({
            kind: 'pan',
            screenDelta: { x: this.velocityX * dt, y: this.velocityY * dt },
        });

        if (!result.accepted) {
            this.stopMomentum();
            return result;
        }

        // Apply friction (exponential decay)
        const decay = Math.exp(-this.config.friction * dt);
        this.velocityX *= decay;
        this.velocityY *= decay;

        // Stop if below threshold
        if (magnitude({ x: this.velocityX, y: this.velocityY }) < this.config.minVelocity) {
            this.stopMomentum();
        }

        return result;
    }

    // ═══════════════════════════════════════════════════════════════════════
    // TREE ACCESS FOR COLLABORATORS
    // ═══════════════════════════════════════════════════════════════════════

    neighborOf(tile: TileId, direction: GridDirection): TileId {
        const neighbor = this._tree.neighbor(tile, direction);
        this.publishIfTreeGrew();
        return neighbor;
    }

    childOf(tile: TileId, address: GridAddress): TileId {
        const child = this._tree.child(tile, address);
        this.publishIfTreeGrew();
        return child;
    }

    // ═══════════════════════════════════════════════════════════════════════
    // PROJECTION
    // ═══════════════════════════════════════════════════════════════════════

    worldToScreen(point: Vec2, camera: CameraTransform = this.camera): ScreenPoint {
        return worldToScreen(point, camera, this._viewport);
    }

    screenToWorld(point: ScreenPoint, camera: CameraTransform = this.camera): Vec2 {
        return screenToWorld(point, camera, this._viewport);
    }

    /**
     * Resize the viewport. The pan offset is centre-relative, so the world point
     * at the viewport centre stays at the centre.
     */
    setViewport(viewport: ViewportInfo): void {
        if (!(viewport.width > 0) || !(viewport.height > 0)) {
            console.warn('[FractalNavigation] Ignoring invalid viewport', viewport);
            return;
        }
        this._viewport = { width: viewport.width, height: viewport.height };
        this.commit({ ...this.camera }, this.centerAnchor(this.camera), null);
    }

    // ═══════════════════════════════════════════════════════════════════════
    // DOCUMENT
    // ═══════════════════════════════════════════════════════════════════════

    /**
     * Swap in another document (e.g. after an import). Gesture and momentum state is dropped.
     */
    replaceDocument(tree: TileTree<TContent>, geometry: TileGeometry, camera?: CameraState): void {
        const next: WorkingCamera = camera
            ? { ...camera }
            : { activeTile: tree.origin, panOffset: { x: 0, y: 0 }, zoomScale: 1, rotationAngle: 0 };
        assertContract(tree.has(next.activeTile), `camera tile ${next.activeTile} is not in the document`);
        const problem = cameraProblem(next);
        assertContract(problem === null, `invalid camera: ${problem}`);

        const reach = this.reachProblem(this.centerAnchor(next), geometry);
        assertContract(reach === null, `invalid camera: ${reach}`);

        this._tree = tree;
        this._geometry = geometry;
        this.lock = null;
        this.stopMomentum();

        console.log(`[FractalNavigation] Loaded document with ${tree.size} tiles`);
        this.commit(next, this.centerAnchor(next), null);
    }

    /**
     * Notify listeners of camera changes.
     * @returns Unsubscribe function
     */
    subscribe(listener: (camera: CameraSnapshot) => void): () => void {
        return this.store.subscribe((state, prev) => {
            if (state.camera && state.camera !== prev.camera) {
                listener(state.camera);
            }
        });
    }

    destroy(): void {
        this.stopMomentum();
        this.lock = null;
        this.store.getState().detach(this);
    }

    // ═══════════════════════════════════════════════════════════════════════
    // PRIVATE METHODS
    // ═══════════════════════════════════════════════════════════════════════

    private context(): TransitionContext<TContent> {
        return { tree: this._tree, geometry: this._geometry, viewport: this._viewport };
    }

    /**
     * Mutate `camera` by `delta` and return the anchor it must keep screen-fixed.
     * A locked gesture anchor supplies the world point; otherwise the point
     * under the anchor's screen position before the delta does.
     */
    private applyDelta(delta: GestureDelta, camera: WorkingCamera): WorkingAnchor {
        const { viewport } = this;
        const locked = this.lock?.anchor.worldPoint;

        if (delta.kind === 'pan') {
            const before: CameraTransform = { ...camera };
            camera.panOffset = vectorSum(camera.panOffset, panOffsetDelta(delta.screenDelta, camera.rotationAngle));
            if (!delta.anchorScreenPoint) {
                // Momentum: nothing under a finger, the camera centre is the anchor
                return this.centerAnchor(camera);
            }
            const screenPoint = delta.anchorScreenPoint;
            const worldPoint = locked ?? screenToWorld(vectorDifference(screenPoint, delta.screenDelta), before, viewport);
            camera.panOffset = solvePanOffset(worldPoint, screenPoint, camera.zoomScale, camera.rotationAngle, viewport);
            return { screenPoint, worldPoint };
        }

        const screenPoint = delta.anchorScreenPoint;
        const worldPoint = locked ?? screenToWorld(screenPoint, camera, viewport);
        if (delta.kind === 'zoom') {
            camera.zoomScale *= delta.scaleDelta;
        } else {
            camera.rotationAngle += delta.rotationDelta;
        }
        camera.panOffset = solvePanOffset(worldPoint, screenPoint, camera.zoomScale, camera.rotationAngle, viewport);
        return { screenPoint, worldPoint };
    }

    /** Why wrapping to `anchor` would cross too many tiles, or null. */
    private reachProblem(anchor: WorkingAnchor, geometry: TileGeometry = this._geometry): string | null {
        const { width, height } = geometry.tileExtent;
        const tiles = Math.max(Math.abs(anchor.worldPoint.x) / width, Math.abs(anchor.worldPoint.y) / height);
        if (tiles > this.config.maxWrapTiles) {
            return `anchor is ${Math.round(tiles)} tiles away, more than ${this.config.maxWrapTiles}`;
        }
        return null;
    }

    private sampleAnchor(screenPoint: ScreenPoint): WorkingAnchor {
        return { screenPoint, worldPoint: screenToWorld(screenPoint, this.camera, this._viewport) };
    }

    private centerAnchor(camera: CameraTransform): WorkingAnchor {
        const screenPoint = viewportCenter(this._viewport);
        return { screenPoint, worldPoint: screenToWorld(screenPoint, camera, this._viewport) };
    }

    /**
     * Normalize `camera` around `anchor`, make it current and publish it.
     */
    private commit(
        camera: WorkingCamera,
        anchor: WorkingAnchor,
        kind: GestureDelta['kind'] | null,
        lockUsed = false
    ): TransitionCounts {
        const counts = normalizeCamera(this.context(), camera, anchor);

        this.camera = camera;
        if (this.lock) {
            // The active tile may have changed: keep the locked world point in its coordinates
            this.lock = {
                owner: this.lock.owner,
                anchor: lockUsed
                    ? { screenPoint: anchor.screenPoint, worldPoint: anchor.worldPoint }
                    : this.sampleAnchor(this.lock.anchor.screenPoint),
            };
        }
        this.lastAnchor = Object.freeze({ screenPoint: anchor.screenPoint, worldPoint: anchor.worldPoint });

        if (counts.drills + counts.pops + counts.wraps > 0) {
            navTrace('Navigation', 'normalized', { kind, tile: camera.activeTile, zoom: camera.zoomScale, ...counts });
        }

        if (this.config.assertInvariants) {
            this.assertInvariants(anchor);
        }

        this.publish(counts);
        return counts;
    }

    private assertInvariants(anchor: WorkingAnchor): void {
        const { zoomScale } = this.camera;
        if (!(zoomScale >= 1 && zoomScale < this._geometry.subdivision)) {
            throw new InvariantViolationError('zoom-range', `zoomScale ${zoomScale} outside [1, ${this._geometry.subdivision})`);
        }
        if (!isWithinBounds(this._geometry, anchor.worldPoint)) {
            throw new InvariantViolationError(
                'anchor-bounds',
                `anchor (${anchor.worldPoint.x}, ${anchor.worldPoint.y}) outside tile ${this.camera.activeTile}`
            );
        }
    }

    private publish(lastTransition: TransitionCounts): void {
        this._revision += 1;
        this.publishedTileCount = this._tree.size;
        this.store.getState().publish({
            camera: this.currentCamera(),
            anchor: this.lastAnchor,
            tileCount: this._tree.size,
            revision: this._revision,
            lastTransition,
        });
    }

    private publishIfTreeGrew(): void {
        if (this.publishedTileCount !== this._tree.size) {
            this.publish(NO_TRANSITIONS);
        }
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// INPUT VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

function isUsableDelta(delta: GestureDelta): boolean {
    switch (delta.kind) {
        case 'pan':
            return isFiniteVector(delta.screenDelta) &&
                (delta.anchorScreenPoint === undefined || isFiniteVector(delta.anchorScreenPoint));
        case 'zoom':
            return Number.isFinite(delta.scaleDelta) && delta.scaleDelta > 0 && isFiniteVector(delta.anchorScreenPoint);
        case 'rotate':
            return Number.isFinite(delta.rotationDelta) && isFiniteVector(delta.anchorScreenPoint);
    }
}

/** Why `camera` cannot be normalized, or null. A zoom of 0 or below would pop up forever. */
function cameraProblem(camera: CameraTransform): string | null {
    if (!Number.isFinite(camera.zoomScale) || camera.zoomScale <= 0) {
        return `zoom scale must be positive and finite, got ${camera.zoomScale}`;
    }
    if (!isFiniteVector(camera.panOffset)) {
        return `pan offset must be finite, got (${camera.panOffset.x}, ${camera.panOffset.y})`;
    }
    if (!Number.isFinite(camera.rotationAngle)) {
        return `rotation must be finite, got ${camera.rotationAngle}`;
    }
    return null;
}
