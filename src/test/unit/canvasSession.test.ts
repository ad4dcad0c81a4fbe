import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DocumentFormatError } from '@/common/errors';
import { CanvasSession } from '@/canvas/CanvasSession';
import { createJsonContentCodec, NULL_CONTENT_CODEC } from '@/canvas/persistence/serialization';
import { MemoryCanvasStorage } from '@/canvas/persistence/storage';
import { createCanvasStore } from '@/stores/canvasStore';

const viewport = { width: 1000, height: 1000 };

describe('CanvasSession', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    it('starts an empty document sized to the viewport when nothing is stored', async () => {
        const store = createCanvasStore();
        const session = await CanvasSession.open({
            viewport,
            codec: NULL_CONTENT_CODEC,
            createContent: () => null,
            storage: new MemoryCanvasStorage(),
            store,
        });

        expect(session.tree.size).toBe(1);
        expect(session.navigation.geometry.tileExtent).toEqual({ width: 1000, height: 1000 });
        expect(store.getState().document).toBe(session);
        expect(store.getState().engine).toBe(session.navigation);

        await session.destroy();
        expect(store.getState().engine).toBeNull();
    });

    it('reopens a saved document with its tiles, extent and camera', async () => {
        const storage = new MemoryCanvasStorage();
        const first = new CanvasSession({
            viewport,
            codec: NULL_CONTENT_CODEC,
            createContent: () => null,
            storage,
            store: createCanvasStore(),
        });
        first.handleEvent({ type: 'zoom', screen: { x: 900, y: 500 }, delta: 3 });
        const saved = first.navigation.currentCamera();
        await first.destroy();

        expect(storage.saveCount).toBe(1);

        const second = await CanvasSession.open({
            viewport: { width: 400, height: 300 },
            codec: NULL_CONTENT_CODEC,
            createContent: () => null,
            storage,
            store: createCanvasStore(),
        });

        expect(second.navigation.geometry.tileExtent).toEqual({ width: 1000, height: 1000 });
        expect(second.navigation.currentCamera()).toEqual(saved);
        await second.destroy();
    });

    it('saves only when something changed', async () => {
        const storage = new MemoryCanvasStorage();
        const session = new CanvasSession({
            viewport,
            codec: NULL_CONTENT_CODEC,
            createContent: () => null,
            storage,
            store: createCanvasStore(),
        });

        expect(session.hasUnsavedChanges()).toBe(false);
        await session.destroy();

        expect(storage.saveCount).toBe(0);
    });

    it('refuses a stored document it cannot read', async () => {
        await expect(CanvasSession.open({
            viewport,
            codec: NULL_CONTENT_CODEC,
            createContent: () => null,
            storage: new MemoryCanvasStorage('{"version":1}'),
            store: createCanvasStore(),
        })).rejects.toThrow(DocumentFormatError);
    });

    it('keeps the current document when an import fails', () => {
        const codec = createJsonContentCodec((value): value is string => typeof value === 'string');
        const session = new CanvasSession({
            viewport,
            codec,
            createContent: ({ id }) => `tile-${id}`,
            store: createCanvasStore(),
        });
        const tree = session.tree;

        expect(() => session.importJson('not json')).toThrow(DocumentFormatError);
        expect(session.tree).toBe(tree);
    });

    it('round-trips through exportJson and importJson', () => {
        const codec = createJsonContentCodec((value): value is string => typeof value === 'string');
        const session = new CanvasSession({
            viewport,
            codec,
            createContent: ({ id }) => `tile-${id}`,
            store: createCanvasStore(),
        });
        session.handleEvent({ type: 'zoom', screen: { x: 500, y: 500 }, delta: 20 });
        const camera = session.navigation.currentCamera();
        const text = session.exportJson();

        session.handleEvent({ type: 'zoom', screen: { x: 500, y: 500 }, delta: -40 });
        session.importJson(text);

        expect(session.navigation.currentCamera()).toEqual(camera);
        expect(session.tree.get(camera.activeTile).content).toBe(`tile-${camera.activeTile}`);
    });

    it('advances momentum on tick and stops after destroy', async () => {
        const session = new CanvasSession({
            viewport,
            codec: NULL_CONTENT_CODEC,
            createContent: () => null,
            store: createCanvasStore(),
        });
        session.navigation.setVelocity(500, 0);

        expect(session.tick(16)?.accepted).toBe(true);

        await session.destroy();
        expect(session.tick(16)).toBeNull();
    });
});
