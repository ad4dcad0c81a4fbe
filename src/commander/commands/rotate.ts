/**
 * Rotate command - turns the view around a screen point.
 */

import type { CommandDefinition } from '../types';
import { ANCHOR_OPTIONS, activeEngine, anchorFromArgs, parseNumber, reportGesture } from './shared';

export const rotateCommand: CommandDefinition = {
    name: 'rotate',
    description: 'Rotate the view by <degrees> (clockwise) around a screen point',
    aliases: ['r'],
    positionals: [
        { name: 'degrees', description: 'Rotation in degrees', required: true },
    ],
    options: ANCHOR_OPTIONS,
    handler: (args, { store }) => {
        const degrees = parseNumber(args.positionals[0], 'degrees');

        const engine = activeEngine(store);
        if (!engine) return;

        const result = engine.applyGestureDelta({
            kind: 'rotate',
            rotationDelta: (degrees * Math.PI) / 180,
            anchorScreenPoint: anchorFromArgs(args, engine),
        });
        reportGesture(result, engine);
    },
};
