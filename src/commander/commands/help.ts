/**
 * Help command - lists commands or describes one.
 */

import type { CommandDefinition, OptionDefinition } from '../types';
import { commandRegistry } from '../CommandRegistry';
import { output } from '../output';

function describeOption(option: OptionDefinition): string {
    const alias = option.alias ? `, -${option.alias}` : '';
    const value = option.type === 'boolean' ? '' : ` <${option.type}>`;
    const fallback = option.default !== undefined ? ` (default: ${String(option.default)})` : '';
    return `    --${option.name}${alias}${value} - ${option.description}${fallback}`;
}

export function describeCommand(command: CommandDefinition): string[] {
    const lines = [`${command.name} - ${command.description}`];
    if (command.aliases?.length) {
        lines.push(`  aliases: ${command.aliases.join(', ')}`);
    }
    if (command.positionals?.length) {
        lines.push('  arguments:');
        for (const positional of command.positionals) {
            lines.push(`    <${positional.name}>${positional.required ? '' : ' (optional)'} - ${positional.description}`);
        }
    }
    if (command.options?.length) {
        lines.push('  options:');
        lines.push(...command.options.map(describeOption));
    }
    return lines;
}

export const helpCommand: CommandDefinition = {
    name: 'help',
    description: 'List commands, or describe <command>',
    aliases: ['?'],
    positionals: [
        {
            name: 'command',
            description: 'Command to describe',
            complete: (partial) =>
                commandRegistry
                    .getAll()
                    .map((command) => command.name)
                    .filter((name) => name.startsWith(partial)),
        },
    ],
    handler: (args, { registry }) => {
        const [name] = args.positionals;
        if (name === undefined) {
            output.print('available commands:');
            for (const command of registry.getAll()) {
                output.print(`  ${command.name} - ${command.description}`);
            }
            return;
        }

        const command = registry.get(name);
        if (!command) {
            throw new Error(`unknown command: ${name}`);
        }
        describeCommand(command).forEach((line) => output.print(line));
    },
};
