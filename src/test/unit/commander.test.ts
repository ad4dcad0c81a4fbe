import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommandRegistry, commandRegistry, parseArgs, tokenize } from '@/commander/CommandRegistry';
import { registerBuiltinCommands } from '@/commander/commands';
import { panCommand } from '@/commander/commands/pan';
import { tileCommand } from '@/commander/commands/tile';
import { zoomCommand } from '@/commander/commands/zoom';
import { outputStore, type OutputLine } from '@/commander/output';
import { CanvasSession } from '@/canvas/CanvasSession';
import { NULL_CONTENT_CODEC } from '@/canvas/persistence/serialization';
import { createCanvasStore, type CanvasStore } from '@/stores/canvasStore';

function lines(): string[] {
    return outputStore.getState().lines.map((line) => line.text);
}

function lastLine(): OutputLine | undefined {
    const all = outputStore.getState().lines;
    return all[all.length - 1];
}

function openSession(store?: CanvasStore): CanvasSession<null> {
    return new CanvasSession({
        store,
        viewport: { width: 1000, height: 1000 },
        codec: NULL_CONTENT_CODEC,
        createContent: () => null,
    });
}

describe('command parsing', () => {
    it('splits on spaces and keeps quoted text together', () => {
        expect(tokenize('pan "a b" c')).toEqual(['pan', 'a b', 'c']);
        expect(tokenize("export 'my file.json'")).toEqual(['export', 'my file.json']);
        expect(tokenize('zoom ')).toEqual(['zoom', '']);
    });

    it('reads negative numbers as positionals', () => {
        expect(parseArgs(['-5', '10'], panCommand)).toEqual({ positionals: ['-5', '10'], options: {} });
    });

    it('reads typed options and boolean flags', () => {
        expect(parseArgs(['2', '--x', '100', '--y=50'], zoomCommand)).toEqual({
            positionals: ['2'],
            options: { x: 100, y: 50 },
        });
        expect(parseArgs(['-n'], tileCommand)).toEqual({ positionals: [], options: { neighbors: true } });
    });

    it('rejects malformed options and missing arguments', () => {
        expect(() => parseArgs(['2', '--z', '1'], zoomCommand)).toThrow('unknown option: --z');
        expect(() => parseArgs(['2', '--x'], zoomCommand)).toThrow('--x needs a value');
        expect(() => parseArgs(['2', '--x', 'left'], zoomCommand)).toThrow("--x must be a number, got 'left'");
        expect(() => parseArgs(['--neighbors=yes'], tileCommand)).toThrow('--neighbors takes no value');
        expect(() => parseArgs(['5'], panCommand)).toThrow('missing <dy>');
    });
});

describe('canvas commands', () => {
    let session: CanvasSession<null> | null = null;

    beforeAll(() => {
        registerBuiltinCommands();
    });

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        outputStore.getState().clear();
    });

    afterEach(async () => {
        await session?.destroy();
        session = null;
    });

    it('says so when no canvas is open', async () => {
        expect(await commandRegistry.execute('status')).toEqual({ success: true, output: ['No canvas engine active'] });

        await commandRegistry.execute('export');
        expect(lastLine()?.text).toBe('No canvas document active');
    });

    it('runs commands against the store their registry was built with', async () => {
        const store = createCanvasStore();
        const registry = new CommandRegistry(store);
        registerBuiltinCommands(registry);
        session = openSession(store);

        expect(await registry.execute('pan 10 20')).toEqual({ success: true, output: ['tile 0, zoom 1'] });
        expect(session.navigation.currentCamera().panOffset).toEqual({ x: 10, y: 20 });

        expect(await commandRegistry.execute('status')).toEqual({ success: true, output: ['No canvas engine active'] });
        expect((await registry.execute('status')).output[0]).toBe('Tile: 0 (depth 0)');
        expect((await registry.execute('help')).output).toHaveLength(9);
    });

    it('pans the camera by a screen delta', async () => {
        session = openSession();

        expect(await commandRegistry.execute('pan 100 -50')).toEqual({ success: true, output: ['tile 0, zoom 1'] });

        expect(session.navigation.currentCamera().panOffset).toEqual({ x: 100, y: -50 });
        expect(lastLine()).toMatchObject({ text: 'tile 0, zoom 1', type: 'success', source: 'pan' });
    });

    it('zooms around the centre and reports transitions', async () => {
        session = openSession();

        await commandRegistry.execute('zoom 6');

        expect(lastLine()).toMatchObject({ text: 'tile 1, zoom 1.2 (1 drill)', type: 'success' });
    });

    it('zooms around an explicit screen point', async () => {
        session = openSession();

        await commandRegistry.execute('zoom 2 --x 900 --y 500');

        expect(session.navigation.currentCamera().panOffset).toEqual({ x: -400, y: 0 });
        expect(lastLine()?.text).toBe('tile 0, zoom 2');
    });

    it('rotates by degrees', async () => {
        session = openSession();

        await commandRegistry.execute('rotate 90');

        expect(session.navigation.currentCamera().rotationAngle).toBeCloseTo(Math.PI / 2);
        expect(lastLine()?.text).toBe('tile 0, zoom 1');
    });

    it('reports bad arguments and unknown commands as errors', async () => {
        session = openSession();

        expect(await commandRegistry.execute('zoom abc')).toMatchObject({ success: false, error: "<factor> must be a number, got 'abc'" });
        expect(await commandRegistry.execute('zoom -2')).toMatchObject({ success: false, error: '<factor> must be positive' });
        expect(await commandRegistry.execute('pan 10')).toMatchObject({ success: false, error: 'missing <dy>' });
        expect(await commandRegistry.execute('frobnicate')).toEqual({
            success: false,
            error: 'unknown command: frobnicate',
            output: ['unknown command: frobnicate'],
        });
        expect(lastLine()).toMatchObject({ text: 'unknown command: frobnicate', type: 'error', source: null });
    });

    it('shows the camera state', async () => {
        session = openSession();

        await commandRegistry.execute('status');

        expect(lines()).toEqual([
            'Tile: 0 (depth 0)',
            'Zoom: 1',
            'Rotation: 0°',
            'Pan: 0, 0',
            'Tiles: 1, Revision: 1',
            'Last transition: 0 drill, 0 pop, 0 wrap',
        ]);
    });

    it('describes the active tile and its neighbours', async () => {
        session = openSession();
        session.navigation.neighborOf(session.tree.origin, 'right');

        await commandRegistry.execute('tile -n');

        expect(lines()).toEqual([
            'Tile 0 at depth 0',
            'Path: (2,2)',
            'Children: 0',
            '  left: -',
            '  right: 2',
            '  up: -',
            '  down: -',
        ]);
    });

    it('prints the document when exporting without a file', async () => {
        session = openSession();

        await commandRegistry.execute('export');

        const printed: unknown = JSON.parse(lastLine()?.text ?? '');
        expect(printed).toMatchObject({ version: 2, view: { activeTile: 0, zoomScale: 1 } });
    });

    it('exports to a file and imports it back', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'canvas-'));
        const file = join(dir, 'doc.json');
        try {
            session = openSession();

            await commandRegistry.execute(`export ${file}`);
            expect(lastLine()?.text).toMatch(/^Exported \d+ bytes to /);

            await commandRegistry.execute('zoom 2');
            expect(session.navigation.currentCamera().zoomScale).toBe(2);

            expect(await commandRegistry.execute(`import ${file}`)).toMatchObject({ success: true });
            expect(session.navigation.currentCamera().zoomScale).toBe(1);
            expect(lastLine()?.text).toBe(`Imported 1 tiles from ${file}`);

            expect(await commandRegistry.execute(`import ${join(dir, 'missing.json')}`)).toMatchObject({
                success: false,
                error: `no such file: ${join(dir, 'missing.json')}`,
            });
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });

    it('prints help for a single command', async () => {
        await commandRegistry.execute('help zoom');

        expect(lines()).toEqual([
            'zoom - Multiply the zoom by <factor> around a screen point',
            '  aliases: z',
            '  arguments:',
            '    <factor> - Zoom multiplier (>1 zooms in)',
            '  options:',
            '    --x <number> - Anchor x in screen pixels (default: viewport centre)',
            '    --y <number> - Anchor y in screen pixels (default: viewport centre)',
        ]);
    });

    it('describes boolean flags with their short form', async () => {
        const result = await commandRegistry.execute('? tile');

        expect(result.output.slice(-2)).toEqual([
            '  options:',
            '    --neighbors, -n - Also list existing same-depth neighbours',
        ]);
    });
});

describe('completion', () => {
    beforeAll(() => {
        registerBuiltinCommands();
    });

    it('completes command names', () => {
        expect(commandRegistry.complete('zo', 2)).toEqual([
            { value: 'zoom', description: zoomCommand.description, type: 'command' },
        ]);
    });

    it('completes options of a known command', () => {
        expect(commandRegistry.complete('zoom 2 --', 9).map((s) => s.value)).toEqual(['--x', '--y']);
        expect(commandRegistry.complete('tile -', 6).map((s) => s.value)).toEqual(['--neighbors', '-n']);
    });

    it('completes aliases once a prefix is typed', () => {
        expect(commandRegistry.complete('loa', 3)).toEqual([
            { value: 'load', description: 'alias of import', type: 'command' },
        ]);
    });

    it('completes command names as the argument of help', () => {
        expect(commandRegistry.complete('help st', 7)).toEqual([
            { value: 'status', description: 'Command to describe', type: 'value' },
        ]);
    });
});
