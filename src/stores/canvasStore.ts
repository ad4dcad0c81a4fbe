import { createStore, type StoreApi } from 'zustand/vanilla';
import type {
    Anchor,
    CameraSnapshot,
    IFractalNavigationEngine,
    TransitionCounts,
} from '../canvas/navigation/types';

/** Export/import entry points of the attached document, used by the command layer. */
export interface CanvasDocumentHandle {
    exportJson(): string;
    importJson(text: string): void;
}

/** What the engine publishes after every call that changed something. */
export interface CanvasPublication {
    camera: CameraSnapshot;
    anchor: Anchor | null;
    tileCount: number;
    revision: number;
    lastTransition: TransitionCounts;
}

export interface CanvasStoreState {
    // ── Attached collaborators ───────────────────────────────────────
    engine: IFractalNavigationEngine | null;
    document: CanvasDocumentHandle | null;

    // ── Published camera state (read by renderers) ───────────────────
    camera: CameraSnapshot | null;
    anchor: Anchor | null;
    tileCount: number;
    revision: number;
    lastTransition: TransitionCounts;

    // ── Actions ──────────────────────────────────────────────────────
    attachEngine: (engine: IFractalNavigationEngine) => void;
    attachDocument: (document: CanvasDocumentHandle) => void;
    /** Clears the engine (and its document) only if `engine` is still the attached one. */
    detach: (engine: IFractalNavigationEngine) => void;
    publish: (update: CanvasPublication) => void;
}

export type CanvasStore = StoreApi<CanvasStoreState>;

export const NO_TRANSITIONS: TransitionCounts = { drills: 0, pops: 0, wraps: 0 };

export function createCanvasStore(): CanvasStore {
    return createStore<CanvasStoreState>()((set, get) => ({
        engine: null,
        document: null,
        camera: null,
        anchor: null,
        tileCount: 0,
        revision: 0,
        lastTransition: NO_TRANSITIONS,

        attachEngine: (engine) => set({ engine }),
        attachDocument: (document) => set({ document }),

        detach: (engine) => {
            if (get().engine !== engine) return;
            set({
                engine: null,
                document: null,
                camera: null,
                anchor: null,
                tileCount: 0,
                revision: 0,
                lastTransition: NO_TRANSITIONS,
            });
        },

        publish: (update) => set({ ...update }),
    }));
}

/** Shared store used when no store is injected. */
export const canvasStore = createCanvasStore();
