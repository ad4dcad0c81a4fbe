/**
 * CommandRegistry - Command lookup, argument parsing, completion and execution
 * for the canvas terminal.
 */

import type {
    CommandContext,
    CommandDefinition,
    CommandResult,
    CompletionContext,
    CompletionSuggestion,
    OptionDefinition,
    ParsedArgs,
} from './types';
import { output, outputStore } from './output';
import { navTrace } from '../utils/navTrace';
import { canvasStore, type CanvasStore } from '../stores/canvasStore';

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

/** A quoted run (closing quote optional while typing) or a run of non-space text. */
const TOKEN_PATTERN = /"([^"]*)"?|'([^']*)'?|[^\s"']+/g;

/**
 * Split a command line into tokens. Trailing whitespace yields a final empty
 * token, which is what completion completes.
 */
export function tokenize(input: string): string[] {
    const tokens = Array.from(input.matchAll(TOKEN_PATTERN), (match) => match[1] ?? match[2] ?? match[0]);
    if (/\s$/.test(input)) {
        tokens.push('');
    }
    return tokens;
}

/**
 * Parse the tokens after the command name.
 *
 * Options take `--name value`, `--name=value` or `-alias value`; negative
 * numbers are positionals.
 *
 * @throws Error on unknown options, missing or non-numeric option values and missing required positionals
 */
export function parseArgs(tokens: string[], command: CommandDefinition): ParsedArgs {
    const args: ParsedArgs = { positionals: [], options: {} };

    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        if (!isOptionToken(token)) {
            args.positionals.push(token);
            continue;
        }

        const [flag, inlineValue] = splitInlineValue(token);
        const option = findOption(command, flag);
        if (!option) {
            throw new Error(`unknown option: ${flag}`);
        }

        if (option.type === 'boolean') {
            if (inlineValue !== undefined) {
                throw new Error(`${flag} takes no value`);
            }
            args.options[option.name] = true;
            continue;
        }

        const raw = inlineValue ?? (i + 1 < tokens.length ? tokens[++i] : undefined);
        if (raw === undefined) {
            throw new Error(`${flag} needs a value`);
        }
        args.options[option.name] = option.type === 'number' ? parseOptionNumber(raw, flag) : raw;
    }

    for (const option of command.options ?? []) {
        if (args.options[option.name] === undefined && option.default !== undefined) {
            args.options[option.name] = option.default;
        }
    }

    const missing = command.positionals?.find((positional, index) => positional.required && index >= args.positionals.length);
    if (missing) {
        throw new Error(`missing <${missing.name}>`);
    }

    return args;
}

function isNumeric(token: string): boolean {
    return token.trim() !== '' && Number.isFinite(Number(token));
}

function isOptionToken(token: string): boolean {
    return token.length > 1 && token.startsWith('-') && !isNumeric(token);
}

function splitInlineValue(token: string): [string, string | undefined] {
    const equals = token.indexOf('=');
    if (!token.startsWith('--') || equals < 0) {
        return [token, undefined];
    }
    return [token.slice(0, equals), token.slice(equals + 1)];
}

function findOption(command: CommandDefinition, flag: string): OptionDefinition | undefined {
    const options = command.options ?? [];
    if (flag.startsWith('--')) {
        return options.find((option) => option.name === flag.slice(2));
    }
    return options.find((option) => option.alias === flag.slice(1));
}

function parseOptionNumber(raw: string, flag: string): number {
    if (!isNumeric(raw)) {
        throw new Error(`${flag} must be a number, got '${raw}'`);
    }
    return Number(raw);
}

// ═══════════════════════════════════════════════════════════════════════════
// COMPLETION
// ═══════════════════════════════════════════════════════════════════════════

function optionSuggestions(command: CommandDefinition): CompletionSuggestion[] {
    return (command.options ?? []).flatMap((option): CompletionSuggestion[] => {
        const long: CompletionSuggestion = { value: `--${option.name}`, description: option.description, type: 'option' };
        return option.alias
            ? [long, { value: `-${option.alias}`, description: option.description, type: 'option' }]
            : [long];
    });
}

/** Positionals among `tokens`, skipping options and the values they consume. */
function countPositionals(command: CommandDefinition, tokens: string[]): number {
    let count = 0;
    for (let i = 0; i < tokens.length; i++) {
        if (!isOptionToken(tokens[i])) {
            count++;
            continue;
        }
        const [flag, inlineValue] = splitInlineValue(tokens[i]);
        const option = findOption(command, flag);
        if (option && option.type !== 'boolean' && inlineValue === undefined) i++;
    }
    return count;
}

function completeArguments(command: CommandDefinition, context: CompletionContext): CompletionSuggestion[] {
    const { tokens, partial } = context;

    // Value of the option just before the cursor
    const previous = tokens.length >= 2 ? tokens[tokens.length - 2] : undefined;
    if (previous !== undefined && isOptionToken(previous) && !previous.includes('=')) {
        const pending = findOption(command, previous);
        if (pending && pending.type !== 'boolean') {
            const values = pending.complete?.(partial, context) ?? [];
            return values.map((value): CompletionSuggestion => ({ value, description: pending.description, type: 'value' }));
        }
    }

    if (partial.startsWith('-') && !isNumeric(partial)) {
        return optionSuggestions(command).filter((suggestion) => suggestion.value.startsWith(partial));
    }

    const positional = command.positionals?.[countPositionals(command, tokens.slice(0, -1))];
    if (positional?.complete) {
        return positional
            .complete(partial, context)
            .map((value): CompletionSuggestion => ({ value, description: positional.description, type: 'value' }));
    }

    return partial === '' ? optionSuggestions(command) : [];
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

export class CommandRegistry {
    private commands = new Map<string, CommandDefinition>();
    private aliasMap = new Map<string, string>();
    private readonly context: CommandContext;

    /** Commands run against `store`'s engine and document. */
    constructor(store: CanvasStore = canvasStore) {
        this.context = { store, registry: this };
    }

    /** Registering a name again replaces the earlier command. */
    register(command: CommandDefinition): void {
        this.unregister(command.name);
        this.commands.set(command.name, command);
        for (const alias of command.aliases ?? []) {
            this.aliasMap.set(alias, command.name);
        }
    }

    unregister(name: string): void {
        const command = this.commands.get(name);
        if (!command) return;
        for (const alias of command.aliases ?? []) {
            this.aliasMap.delete(alias);
        }
        this.commands.delete(name);
    }

    /** By name or alias. */
    get(name: string): CommandDefinition | undefined {
        const canonical = this.aliasMap.get(name) ?? name;
        return this.commands.get(canonical);
    }

    getAll(): CommandDefinition[] {
        return [...this.commands.values()];
    }

    /** Suggestions for the token under the cursor. */
    complete(input: string, cursorPosition: number): CompletionSuggestion[] {
        const tokens = tokenize(input.slice(0, cursorPosition));
        if (tokens.length <= 1) {
            return this.completeCommandName(tokens.length === 0 ? '' : tokens[0]);
        }

        const command = this.get(tokens[0]);
        if (!command) return [];

        const argTokens = tokens.slice(1);
        return completeArguments(command, { tokens: argTokens, partial: argTokens[argTokens.length - 1] });
    }

    private completeCommandName(partial: string): CompletionSuggestion[] {
        const prefix = partial.toLowerCase();
        const suggestions: CompletionSuggestion[] = [];

        for (const command of this.commands.values()) {
            if (command.name.startsWith(prefix)) {
                suggestions.push({ value: command.name, description: command.description, type: 'command' });
            }
            if (prefix === '') continue;
            for (const alias of command.aliases ?? []) {
                if (alias.startsWith(prefix)) {
                    suggestions.push({ value: alias, description: `alias of ${command.name}`, type: 'command' });
                }
            }
        }

        return suggestions;
    }

    /**
     * Run one command line. Errors, including those thrown by the handler, are
     * printed and returned rather than thrown.
     */
    async execute(input: string): Promise<CommandResult> {
        const tokens = tokenize(input.trim());
        if (tokens.length === 0) {
            return { success: true, output: [] };
        }

        const firstLineId = outputStore.getState().nextId;
        const printed = () => outputStore.getState().linesSince(firstLineId).map((line) => line.text);

        const [name, ...rest] = tokens;
        const command = this.get(name);
        if (!command) {
            const error = `unknown command: ${name}`;
            output.error(error);
            return { success: false, error, output: printed() };
        }

        outputStore.getState().setActiveCommand(command.name);
        try {
            const args = parseArgs(rest, command);
            navTrace('Command', 'execute', { command: command.name, args });
            await command.handler(args, this.context);
            return { success: true, output: printed() };
        } catch (err) {
            const error = err instanceof Error ? err.message : String(err);
            output.error(error);
            return { success: false, error, output: printed() };
        } finally {
            outputStore.getState().setActiveCommand(null);
        }
    }
}

/** Registry the built-in commands register into by default, bound to the shared canvas store. */
export const commandRegistry = new CommandRegistry();
