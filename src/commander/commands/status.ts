/**
 * Status command - shows the camera and document state.
 */

import type { CommandDefinition } from '../types';
import { output } from '../output';
import { activeEngine, formatNumber } from './shared';

export const statusCommand: CommandDefinition = {
    name: 'status',
    description: 'Show camera and document state',
    aliases: ['st'],
    handler: (_args, { store }) => {
        const engine = activeEngine(store);
        if (!engine) return;

        const { activeTile, panOffset, zoomScale, rotationAngle } = engine.currentCamera();
        const { tileCount, lastTransition } = store.getState();
        const depth = engine.topology.get(activeTile).depth;

        output.print(`Tile: ${activeTile} (depth ${depth})`);
        output.print(`Zoom: ${formatNumber(zoomScale)}`);
        output.print(`Rotation: ${formatNumber((rotationAngle * 180) / Math.PI)}°`);
        output.print(`Pan: ${formatNumber(panOffset.x)}, ${formatNumber(panOffset.y)}`);
        output.print(`Tiles: ${tileCount}, Revision: ${engine.revision}`);
        output.print(`Last transition: ${lastTransition.drills} drill, ${lastTransition.pops} pop, ${lastTransition.wraps} wrap`);

        if (engine.hasMomentum()) {
            output.print('Momentum: active');
        }
    },
};
