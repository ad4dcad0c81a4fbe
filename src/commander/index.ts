/**
 * Commander module - Command terminal for driving a canvas engine.
 */

export * from './types';
export { CommandRegistry, commandRegistry, tokenize, parseArgs } from './CommandRegistry';
export { registerBuiltinCommands } from './commands';
export { describeCommand } from './commands/help';
export { createOutputStore, output, outputStore } from './output';
export type { OutputLine, OutputLineType, OutputState, OutputStore } from './output';
