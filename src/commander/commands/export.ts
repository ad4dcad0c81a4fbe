/**
 * Export command - writes the document as JSON.
 */

import type { CommandDefinition } from '../types';
import { output } from '../output';
import { FileCanvasStorage } from '../../canvas/persistence/storage';

export const exportCommand: CommandDefinition = {
    name: 'export',
    description: 'Write the document to <file>, or print it when no file is given',
    aliases: ['save'],
    positionals: [
        { name: 'file', description: 'Destination path', required: false },
    ],
    handler: async (args, { store }) => {
        const { document } = store.getState();
        if (!document) {
            output.print('No canvas document active');
            return;
        }

        const text = document.exportJson();
        const file: string | undefined = args.positionals[0];
        if (!file) {
            output.print(text);
            return;
        }

        await new FileCanvasStorage(file).save(text);
        output.success(`Exported ${text.length} bytes to ${file}`);
    },
};
