/**
 * Zoom command - scales the view around a screen point.
 */

import type { CommandDefinition } from '../types';
import { ANCHOR_OPTIONS, activeEngine, anchorFromArgs, parseNumber, reportGesture } from './shared';

export const zoomCommand: CommandDefinition = {
    name: 'zoom',
    description: 'Multiply the zoom by <factor> around a screen point',
    aliases: ['z'],
    positionals: [
        { name: 'factor', description: 'Zoom multiplier (>1 zooms in)', required: true },
    ],
    options: ANCHOR_OPTIONS,
    handler: (args, { store }) => {
        const factor = parseNumber(args.positionals[0], 'factor');
        if (!(factor > 0)) {
            throw new Error('<factor> must be positive');
        }

        const engine = activeEngine(store);
        if (!engine) return;

        const result = engine.applyGestureDelta({
            kind: 'zoom',
            scaleDelta: factor,
            anchorScreenPoint: anchorFromArgs(args, engine),
        });
        reportGesture(result, engine);
    },
};
