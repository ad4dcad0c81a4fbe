/**
 * Command definitions.
 * Import and register all commands here.
 */

import { commandRegistry, type CommandRegistry } from '../CommandRegistry';
import { helpCommand } from './help';
import { statusCommand } from './status';
import { panCommand } from './pan';
import { zoomCommand } from './zoom';
import { rotateCommand } from './rotate';
import { tileCommand } from './tile';
import { exportCommand } from './export';
import { importCommand } from './import';

/** Register all built-in commands */
export function registerBuiltinCommands(registry: CommandRegistry = commandRegistry): void {
    registry.register(helpCommand);
    registry.register(statusCommand);
    registry.register(panCommand);
    registry.register(zoomCommand);
    registry.register(rotateCommand);
    registry.register(tileCommand);
    registry.register(exportCommand);
    registry.register(importCommand);
}
