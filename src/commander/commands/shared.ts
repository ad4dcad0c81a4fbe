/**
 * Helpers shared by the canvas commands.
 */

import type { OptionDefinition, ParsedArgs } from '../types';
import { output } from '../output';
import type { CanvasStore } from '../../stores/canvasStore';
import type { GestureResult, IFractalNavigationEngine, ScreenPoint } from '../../canvas/navigation/types';

/** The engine attached to `store`; prints a notice and returns null when there is none. */
export function activeEngine(store: CanvasStore): IFractalNavigationEngine | null {
    const { engine } = store.getState();
    if (!engine) {
        output.print('No canvas engine active');
    }
    return engine;
}

export function parseNumber(value: string | undefined, name: string): number {
    if (value === undefined) {
        throw new Error(`missing <${name}>`);
    }
    const number = Number(value);
    if (value.trim() === '' || !Number.isFinite(number)) {
        throw new Error(`<${name}> must be a number, got '${value}'`);
    }
    return number;
}

export function numberOption(args: ParsedArgs, name: string): number | undefined {
    const value = args.options[name];
    if (value === undefined) return undefined;
    if (typeof value !== 'number') {
        throw new Error(`--${name} must be a number`);
    }
    return value;
}

/** --x / --y options naming the screen anchor of a zoom or rotation. */
export const ANCHOR_OPTIONS: OptionDefinition[] = [
    { name: 'x', description: 'Anchor x in screen pixels (default: viewport centre)', type: 'number' },
    { name: 'y', description: 'Anchor y in screen pixels (default: viewport centre)', type: 'number' },
];

export function anchorFromArgs(args: ParsedArgs, engine: IFractalNavigationEngine): ScreenPoint {
    return {
        x: numberOption(args, 'x') ?? engine.viewport.width / 2,
        y: numberOption(args, 'y') ?? engine.viewport.height / 2,
    };
}

export function formatNumber(value: number): string {
    return Number(value.toFixed(3)).toString();
}

/** Prints the outcome of a gesture; throws when the engine rejected it. */
export function reportGesture(result: GestureResult, engine: IFractalNavigationEngine): void {
    if (!result.accepted) {
        throw new Error('gesture rejected');
    }

    const { activeTile, zoomScale } = engine.currentCamera();
    const transitions: string[] = [];
    if (result.drills > 0) transitions.push(`${result.drills} drill`);
    if (result.pops > 0) transitions.push(`${result.pops} pop`);
    if (result.wraps > 0) transitions.push(`${result.wraps} wrap`);

    const suffix = transitions.length > 0 ? ` (${transitions.join(', ')})` : '';
    output.success(`tile ${activeTile}, zoom ${formatNumber(zoomScale)}${suffix}`);
}
