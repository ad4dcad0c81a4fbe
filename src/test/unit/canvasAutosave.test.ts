import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CanvasAutosave, type AutosaveSource } from '@/canvas/persistence/CanvasAutosave';
import { MemoryCanvasStorage, type CanvasStorage } from '@/canvas/persistence/storage';

interface FakeSource extends AutosaveSource {
    revision: number;
    settled: boolean;
}

function createSource(): FakeSource {
    const source: FakeSource = {
        revision: 1,
        settled: true,
        getRevision: () => source.revision,
        isSettled: () => source.settled,
        serialize: () => `document@${source.revision}`,
    };
    return source;
}

describe('CanvasAutosave', () => {
    let storage: MemoryCanvasStorage;
    let autosave: CanvasAutosave;
    let source: FakeSource;

    beforeEach(() => {
        vi.useFakeTimers();
        vi.spyOn(console, 'log').mockImplementation(() => {});
        storage = new MemoryCanvasStorage();
        autosave = new CanvasAutosave(storage, { pollInterval: 100, saveDebounce: 200 });
        source = createSource();
    });

    afterEach(() => {
        autosave.stop();
        vi.useRealTimers();
    });

    it('treats the revision at start as saved', async () => {
        autosave.start(source);

        await vi.advanceTimersByTimeAsync(1000);

        expect(storage.saveCount).toBe(0);
        expect(autosave.hasUnsavedChanges()).toBe(false);
    });

    it('saves once the canvas has settled for the debounce period', async () => {
        autosave.start(source);
        source.revision = 2;

        await vi.advanceTimersByTimeAsync(350);
        expect(storage.saveCount).toBe(0);

        await vi.advanceTimersByTimeAsync(100);
        await autosave.flush();

        expect(storage.saveCount).toBe(1);
        expect(await storage.load()).toBe('document@2');
        expect(autosave.hasUnsavedChanges()).toBe(false);
    });

    it('pushes the save back while the canvas keeps changing', async () => {
        autosave.start(source);
        source.revision = 2;

        await vi.advanceTimersByTimeAsync(250);
        source.revision = 3;

        await vi.advanceTimersByTimeAsync(300);
        expect(storage.saveCount).toBe(0);

        await vi.advanceTimersByTimeAsync(100);
        await autosave.flush();

        expect(storage.saveCount).toBe(1);
        expect(await storage.load()).toBe('document@3');
    });

    it('waits while momentum is still moving the camera', async () => {
        autosave.start(source);
        source.revision = 2;
        source.settled = false;

        await vi.advanceTimersByTimeAsync(1000);
        expect(storage.saveCount).toBe(0);
        expect(autosave.hasUnsavedChanges()).toBe(true);

        source.settled = true;
        await vi.advanceTimersByTimeAsync(400);
        await autosave.flush();

        expect(storage.saveCount).toBe(1);
    });

    it('does not save while paused', async () => {
        autosave.start(source);
        autosave.setPaused(true);
        source.revision = 2;

        await vi.advanceTimersByTimeAsync(1000);

        expect(storage.saveCount).toBe(0);
    });

    it('reports a failed write instead of throwing', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const failing: CanvasStorage = {
            load: async () => null,
            save: async () => {
                throw new Error('disk full');
            },
        };
        const failingAutosave = new CanvasAutosave(failing);
        failingAutosave.start(source);

        await expect(failingAutosave.saveNow()).resolves.toBe(false);
        expect(error).toHaveBeenCalledTimes(1);

        failingAutosave.stop();
    });

    it('tries again after a debounced save fails', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        let attempts = 0;
        const flaky: CanvasStorage = {
            load: () => storage.load(),
            save: async (text) => {
                attempts++;
                if (attempts === 1) {
                    throw new Error('disk full');
                }
                await storage.save(text);
            },
        };
        autosave = new CanvasAutosave(flaky, { pollInterval: 100, saveDebounce: 200 });
        autosave.start(source);
        source.revision = 2;

        await vi.advanceTimersByTimeAsync(450);
        await autosave.flush();
        expect(attempts).toBe(1);
        expect(storage.saveCount).toBe(0);
        expect(autosave.hasUnsavedChanges()).toBe(true);

        await vi.advanceTimersByTimeAsync(550);
        await autosave.flush();

        expect(attempts).toBe(2);
        expect(storage.saveCount).toBe(1);
        expect(await storage.load()).toBe('document@2');
        expect(autosave.hasUnsavedChanges()).toBe(false);
        expect(error).toHaveBeenCalledTimes(1);
    });

    it('refuses to save before it is started', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});

        await expect(autosave.saveNow()).resolves.toBe(false);
        expect(storage.saveCount).toBe(0);
    });

    it('ignores a second start', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        autosave.start(source);
        autosave.start(createSource());

        expect(warn).toHaveBeenCalledWith('[CanvasAutosave] Already started, ignoring start()');
    });
});
