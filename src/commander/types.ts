/**
 * Command terminal types.
 */

import type { CanvasStore } from '../stores/canvasStore';
import type { CommandRegistry } from './CommandRegistry';

export type OptionValue = string | number | boolean;

/** Arguments after parsing against a command's definition. */
export interface ParsedArgs {
    positionals: string[];
    /** By long option name, defaults applied. */
    options: Partial<Record<string, OptionValue>>;
}

export interface OptionDefinition {
    name: string;
    /** Single-letter short form, used as `-n`. */
    alias?: string;
    description: string;
    type: 'string' | 'boolean' | 'number';
    default?: OptionValue;
    complete?: Completer;
}

export interface PositionalDefinition {
    name: string;
    description: string;
    required?: boolean;
    complete?: Completer;
}

export type Completer = (partial: string, context: CompletionContext) => string[];

export interface CompletionContext {
    /** Tokens up to the cursor, the partial one last. */
    tokens: string[];
    partial: string;
}

/** What a handler runs against; supplied by the registry executing it. */
export interface CommandContext {
    store: CanvasStore;
    registry: CommandRegistry;
}

export interface CommandDefinition {
    name: string;
    description: string;
    aliases?: string[];
    positionals?: PositionalDefinition[];
    options?: OptionDefinition[];
    /** Throwing reports the message as the command's error. */
    handler: (args: ParsedArgs, context: CommandContext) => void | Promise<void>;
}

export interface CompletionSuggestion {
    value: string;
    description?: string;
    type: 'command' | 'option' | 'value';
}

export interface CommandResult {
    success: boolean;
    error?: string;
    /** Text of every line the command printed, in order. */
    output: string[];
}
