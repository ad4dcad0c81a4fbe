/**
 * Pan command - moves the camera by a screen-space delta.
 */

import type { CommandDefinition } from '../types';
import { activeEngine, parseNumber, reportGesture } from './shared';

export const panCommand: CommandDefinition = {
    name: 'pan',
    description: 'Drag the canvas by <dx> <dy> screen pixels',
    aliases: ['p'],
    positionals: [
        { name: 'dx', description: 'Horizontal drag in pixels', required: true },
        { name: 'dy', description: 'Vertical drag in pixels', required: true },
    ],
    handler: (args, { store }) => {
        const dx = parseNumber(args.positionals[0], 'dx');
        const dy = parseNumber(args.positionals[1], 'dy');

        const engine = activeEngine(store);
        if (!engine) return;

        reportGesture(engine.applyGestureDelta({ kind: 'pan', screenDelta: { x: dx, y: dy } }), engine);
    },
};
