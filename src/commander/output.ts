/**
 * Command output - the terminal's scrollback, kept in a zustand store.
 *
 * Lines printed while a command runs are tagged with its name so a caller
 * can pick out what one invocation printed.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';

export type OutputLineType = 'info' | 'error' | 'success';

export interface OutputLine {
    id: number;
    text: string;
    type: OutputLineType;
    /** Command that was running when the line was printed. */
    source: string | null;
    timestamp: number;
}

export interface OutputState {
    lines: OutputLine[];
    nextId: number;
    maxLines: number;
    activeCommand: string | null;

    print: (text: string, type?: OutputLineType) => void;
    setActiveCommand: (name: string | null) => void;
    /** Lines with an id of at least `id` still in the scrollback. */
    linesSince: (id: number) => OutputLine[];
    clear: () => void;
}

export type OutputStore = StoreApi<OutputState>;

export function createOutputStore(maxLines = 200): OutputStore {
    return createStore<OutputState>((set, get) => ({
        lines: [],
        nextId: 1,
        maxLines,
        activeCommand: null,

        print: (text, type = 'info') => {
            const { lines, nextId, activeCommand } = get();
            // Multi-line text (an exported document) stays one entry
            const line: OutputLine = { id: nextId, text, type, source: activeCommand, timestamp: Date.now() };
            set({ lines: [...lines, line].slice(-get().maxLines), nextId: nextId + 1 });
        },

        setActiveCommand: (name) => set({ activeCommand: name }),

        linesSince: (id) => get().lines.filter((line) => line.id >= id),

        clear: () => set({ lines: [] }),
    }));
}

export const outputStore = createOutputStore();

/** What command handlers print through. */
export const output = {
    print: (text: string) => outputStore.getState().print(text, 'info'),
    error: (text: string) => outputStore.getState().print(text, 'error'),
    success: (text: string) => outputStore.getState().print(text, 'success'),
    clear: () => outputStore.getState().clear(),
};
