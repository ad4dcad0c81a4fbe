/**
 * CanvasSession - Owns one open canvas document.
 * Wires navigation, input handling and persistence together and exposes the
 * document to the command layer through the canvas store.
 */

import { createTileTree, type ContentFactory, type TileTree } from '@/fractal/TileTree';
import type { TileGeometry } from '@/fractal/tileGeometry';
import { canvasStore, type CanvasDocumentHandle, type CanvasStore } from '../stores/canvasStore';
import { InteractionController, type InteractionControllerConfig } from './input/InteractionController';
import type { UIEvent } from './input/types';
import {
    FractalNavigationEngine,
    type FractalNavigationEngineConfig,
} from './navigation/engines/fractalNavigationEngine';
import type { CameraState, GestureResult, ViewportInfo } from './navigation/types';
import { CanvasAutosave, type CanvasAutosaveConfig } from './persistence/CanvasAutosave';
import {
    exportDocument,
    importDocument,
    parseDocument,
    stringifyDocument,
    type ContentCodec,
} from './persistence/serialization';
import type { CanvasStorage } from './persistence/storage';

export interface CanvasSessionOptions<TContent> {
    viewport: ViewportInfo;
    codec: ContentCodec<TContent>;
    /** Payload for tiles created by navigation. */
    createContent: ContentFactory<TContent>;
    /** Where the document is loaded from and autosaved to. Default: none */
    storage?: CanvasStorage | null;
    engine?: FractalNavigationEngineConfig;
    interaction?: InteractionControllerConfig;
    autosave?: CanvasAutosaveConfig;
    /** Store the session attaches to; commands reach it through a CommandRegistry built on the same store. Default: the shared canvasStore */
    store?: CanvasStore;
    /** Monotonic clock in milliseconds, shared with the interaction controller. */
    now?: () => number;
}

interface InitialDocument<TContent> {
    tree: TileTree<TContent>;
    geometry: TileGeometry | null;
    camera: CameraState | null;
}

export class CanvasSession<TContent> implements CanvasDocumentHandle {
    private readonly codec: ContentCodec<TContent>;
    private readonly createContent: ContentFactory<TContent>;
    private readonly store: CanvasStore;
    private readonly engine: FractalNavigationEngine<TContent>;
    private readonly interactionController: InteractionController;
    private readonly autosave: CanvasAutosave | null;
    private destroyed = false;

    /**
     * Open the document stored in `options.storage`, or start an empty one when
     * there is no storage or nothing stored yet.
     *
     * @throws DocumentFormatError when the stored document cannot be loaded
     */
    static async open<TContent>(options: CanvasSessionOptions<TContent>): Promise<CanvasSession<TContent>> {
        const text = options.storage ? await options.storage.load() : null;
        if (text === null) {
            console.log('[CanvasSession] No stored document, starting empty');
            return new CanvasSession(options);
        }

        const loaded = importDocument(parseDocument(text), options.codec, options.createContent);
        console.log(`[CanvasSession] Loaded document from ${loaded.timestamp} (${loaded.tree.size} tiles)`);
        return new CanvasSession(options, loaded);
    }

    constructor(options: CanvasSessionOptions<TContent>, initial?: InitialDocument<TContent>) {
        this.codec = options.codec;
        this.createContent = options.createContent;
        this.store = options.store ?? canvasStore;

        const tree = initial?.tree ?? createTileTree(options.createContent);
        const camera = initial?.camera ?? null;
        const engineConfig: FractalNavigationEngineConfig = { ...options.engine };
        if (initial?.geometry) {
            engineConfig.tileExtent = initial.geometry.tileExtent;
        }
        if (camera) {
            engineConfig.initialTile = camera.activeTile;
            engineConfig.initialPanOffset = camera.panOffset;
            engineConfig.initialZoom = camera.zoomScale;
            engineConfig.initialRotation = camera.rotationAngle;
        }

        this.engine = new FractalNavigationEngine(tree, options.viewport, engineConfig, this.store);
        this.interactionController = new InteractionController(
            { getNavigationEngine: () => this.engine, now: options.now },
            options.interaction
        );
        this.store.getState().attachDocument(this);

        this.autosave = options.storage ? new CanvasAutosave(options.storage, options.autosave) : null;
        this.autosave?.start({
            getRevision: () => this.engine.revision,
            isSettled: () => !this.engine.hasMomentum() && this.engine.anchorOwner() === null,
            serialize: () => this.exportJson(),
        });
    }

    get navigation(): FractalNavigationEngine<TContent> {
        return this.engine;
    }

    get tree(): TileTree<TContent> {
        return this.engine.tree;
    }

    handleEvent(event: UIEvent): void {
        if (this.destroyed) return;
        this.interactionController.handleEvent(event);
    }

    /** Advance momentum by one frame. */
    tick(deltaTime: number): GestureResult | null {
        if (this.destroyed) return null;
        return this.engine.step(deltaTime);
    }

    setViewport(viewport: ViewportInfo): void {
        this.engine.setViewport(viewport);
    }

    exportJson(): string {
        const document = exportDocument(this.engine.tree, this.engine.geometry, this.codec, {
            camera: this.engine.currentCamera(),
        });
        return stringifyDocument(document);
    }

    /**
     * Replace the open document. The current one is kept when `text` does not load.
     *
     * @throws DocumentFormatError
     */
    importJson(text: string): void {
        const loaded = importDocument(parseDocument(text), this.codec, this.createContent);
        this.engine.replaceDocument(loaded.tree, loaded.geometry, loaded.camera ?? undefined);
    }

    /**
     * Write the document now.
     * @returns Whether it was written; false without storage
     */
    async save(): Promise<boolean> {
        if (!this.autosave) return false;
        return this.autosave.saveNow();
    }

    hasUnsavedChanges(): boolean {
        return this.autosave?.hasUnsavedChanges() ?? false;
    }

    /**
     * Stop input and autosave, write pending changes and detach from the store.
     */
    async destroy(): Promise<void> {
        if (this.destroyed) return;
        this.destroyed = true;

        this.interactionController.destroy();
        if (this.autosave) {
            await this.autosave.flush();
            if (this.autosave.hasUnsavedChanges()) {
                await this.autosave.saveNow();
            }
            this.autosave.stop();
        }
        this.engine.destroy();
        console.log('[CanvasSession] Closed');
    }
}
