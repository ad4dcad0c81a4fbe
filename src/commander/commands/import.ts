/**
 * Import command - replaces the document with one read from disk.
 */

import type { CommandDefinition } from '../types';
import { output } from '../output';
import { FileCanvasStorage } from '../../canvas/persistence/storage';

export const importCommand: CommandDefinition = {
    name: 'import',
    description: 'Replace the document with the one stored in <file>',
    aliases: ['load'],
    positionals: [
        { name: 'file', description: 'Source path', required: true },
    ],
    handler: async (args, { store }) => {
        const [file] = args.positionals;

        const { document } = store.getState();
        if (!document) {
            output.print('No canvas document active');
            return;
        }

        const text = await new FileCanvasStorage(file).load();
        if (text === null) {
            throw new Error(`no such file: ${file}`);
        }

        document.importJson(text);
        const { tileCount } = store.getState();
        output.success(`Imported ${tileCount} tiles from ${file}`);
    },
};
