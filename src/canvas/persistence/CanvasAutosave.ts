/**
 * ===================================================================
 * Canvas Autosave
 * ===================================================================
 *
 * Persists the canvas document through a CanvasStorage.
 *
 * Polls the engine's revision and saves once the document has changed
 * and the camera has come to rest (no gesture movement between two
 * polls, no momentum). Saves are debounced; a failed save is retried
 * on the next settled poll.
 *
 * ===================================================================
 */

import { navTrace } from '@/utils/navTrace';
import type { CanvasStorage } from './storage';

/**
 * Configuration for the autosave.
 */
export interface CanvasAutosaveConfig {
    /** How often to check for changes (ms). Default: 1000 (1 second) */
    pollInterval?: number;

    /** Debounce duration for saving to storage (ms). Default: 2000 (2 seconds) */
    saveDebounce?: number;
}

const DEFAULT_CONFIG: Required<CanvasAutosaveConfig> = {
    pollInterval: 1000,
    saveDebounce: 2000,
};

/**
 * What the autosave watches. Provided by the host (CanvasSession) to avoid tight coupling.
 */
export interface AutosaveSource {
    /** Changes whenever the document or camera changes. */
    getRevision(): number;
    /** False while the camera is still moving on its own (momentum). */
    isSettled(): boolean;
    serialize(): string;
}

export class CanvasAutosave {
    private config: Required<CanvasAutosaveConfig>;
    private readonly storage: CanvasStorage;
    private pollIntervalId: ReturnType<typeof setInterval> | null = null;
    private saveTimeoutId: ReturnType<typeof setTimeout> | null = null;
    private pendingSave: Promise<boolean> | null = null;

    private source: AutosaveSource | null = null;
    private lastPolledRevision: number | null = null;
    private lastSavedRevision: number | null = null;
    private isCurrentlySettled = true;
    private paused = false;

    constructor(storage: CanvasStorage, config: CanvasAutosaveConfig = {}) {
        this.storage = storage;
        this.config = { ...DEFAULT_CONFIG, ...config };
    }

    /**
     * Start monitoring. The current revision counts as already saved.
     */
    start(source: AutosaveSource): void {
        if (this.pollIntervalId !== null) {
            console.warn("[CanvasAutosave] Already started, ignoring start()");
            return;
        }

        this.source = source;
        this.lastPolledRevision = source.getRevision();
        this.lastSavedRevision = this.lastPolledRevision;
        this.isCurrentlySettled = true;

        this.pollIntervalId = setInterval(() => this.checkRevision(), this.config.pollInterval);

        console.log("[CanvasAutosave] Started monitoring");
    }

    /**
     * Stop monitoring and clean up. A save already in flight still completes.
     */
    stop(): void {
        if (this.pollIntervalId !== null) {
            clearInterval(this.pollIntervalId);
            this.pollIntervalId = null;
        }
        this.cancelScheduledSave();

        this.source = null;
        this.lastPolledRevision = null;
        this.isCurrentlySettled = true;

        console.log("[CanvasAutosave] Stopped monitoring");
    }

    /**
     * Save the current document now. Failures are logged, not thrown.
     *
     * @returns Whether the document was written
     */
    async saveNow(): Promise<boolean> {
        if (!this.source) {
            console.warn("[CanvasAutosave] Cannot save, not started");
            return false;
        }

        const revision = this.source.getRevision();
        const text = this.source.serialize();
        try {
            await this.storage.save(text);
            this.lastSavedRevision = revision;
            console.log(`[CanvasAutosave] Saved revision ${revision} (${text.length} bytes)`);
            return true;
        } catch (error) {
            console.error("[CanvasAutosave] Failed to save:", error);
            return false;
        }
    }

    /** Wait for a save started by the debounce timer, if any. */
    async flush(): Promise<void> {
        if (this.pendingSave) {
            await this.pendingSave;
        }
    }

    /**
     * Pause or resume saving. Pausing cancels a scheduled save.
     */
    setPaused(paused: boolean): void {
        this.paused = paused;
        if (paused) {
            this.cancelScheduledSave();
        }
    }

    hasUnsavedChanges(): boolean {
        return this.source !== null && this.source.getRevision() !== this.lastSavedRevision;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRIVATE METHODS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Poll the revision and detect when the canvas comes to rest.
     * Called by interval timer.
     */
    private checkRevision(): void {
        if (!this.source || this.paused) return;

        const revision = this.source.getRevision();
        const settled = revision === this.lastPolledRevision && this.source.isSettled();

        if (!settled) {
            // Still moving: push the save back
            this.cancelScheduledSave();
        } else if (!this.isCurrentlySettled && revision !== this.lastSavedRevision) {
            console.log("[CanvasAutosave] Canvas settled, scheduling save...");
            this.scheduleSave();
        }

        this.isCurrentlySettled = settled;
        this.lastPolledRevision = revision;
    }

    /**
     * Schedule a debounced save to storage.
     */
    private scheduleSave(): void {
        this.cancelScheduledSave();
        navTrace('Persistence', 'scheduleSave', { delay: this.config.saveDebounce });

        this.saveTimeoutId = setTimeout(() => {
            this.saveTimeoutId = null;
            this.pendingSave = this.saveNow().then((saved) => {
                if (!saved) {
                    // Next settled poll schedules another attempt
                    this.isCurrentlySettled = false;
                }
                return saved;
            });
        }, this.config.saveDebounce);
    }

    private cancelScheduledSave(): void {
        if (this.saveTimeoutId !== null) {
            clearTimeout(this.saveTimeoutId);
            this.saveTimeoutId = null;
        }
    }
}
