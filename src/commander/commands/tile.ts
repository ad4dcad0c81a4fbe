/**
 * Tile command - describes the active tile and its surroundings.
 */

import type { CommandDefinition } from '../types';
import { output } from '../output';
import { formatAddress, GRID_DIRECTIONS } from '../../fractal/gridAddress';
import { activeEngine } from './shared';

export const tileCommand: CommandDefinition = {
    name: 'tile',
    description: 'Show the active tile, its path from the top tile and its neighbours',
    aliases: ['t'],
    options: [
        { name: 'neighbors', alias: 'n', description: 'Also list existing same-depth neighbours', type: 'boolean' },
    ],
    handler: (args, { store }) => {
        const engine = activeEngine(store);
        if (!engine) return;

        const { topology } = engine;
        const { activeTile } = engine.currentCamera();
        const tile = topology.get(activeTile);
        const path = topology.pathFromRoot(activeTile);

        output.print(`Tile ${tile.id} at depth ${tile.depth}`);
        output.print(`Path: ${path.length > 0 ? path.map(formatAddress).join(' > ') : '(top tile)'}`);
        output.print(`Children: ${topology.childrenOf(activeTile).length}`);

        if (args.options.neighbors === true) {
            for (const direction of GRID_DIRECTIONS) {
                const neighbor = topology.neighborIfExists(activeTile, direction);
                output.print(`  ${direction}: ${neighbor === null ? '-' : neighbor}`);
            }
        }
    },
};
