import { describe, it, expect } from 'vitest';
import { createTileTree } from '@/fractal/TileTree';
import { FractalNavigationEngine } from '@/canvas/navigation/engines/fractalNavigationEngine';
import { createCanvasStore, NO_TRANSITIONS } from '@/stores/canvasStore';

describe('canvasStore', () => {
    it('starts empty', () => {
        const state = createCanvasStore().getState();

        expect(state.engine).toBeNull();
        expect(state.camera).toBeNull();
        expect(state.tileCount).toBe(0);
        expect(state.lastTransition).toEqual(NO_TRANSITIONS);
    });

    it('only detaches the engine that is still attached', () => {
        const store = createCanvasStore();
        const first = new FractalNavigationEngine(createTileTree(), { width: 100, height: 100 }, {}, store);
        const second = new FractalNavigationEngine(createTileTree(), { width: 100, height: 100 }, {}, store);

        first.destroy();
        expect(store.getState().engine).toBe(second);
        expect(store.getState().camera).toEqual(second.currentCamera());

        second.destroy();
        expect(store.getState().engine).toBeNull();
        expect(store.getState().revision).toBe(0);
    });
});
