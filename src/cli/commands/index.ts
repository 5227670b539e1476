/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerSearchCommand } from './search.js';
import { registerEmailCommands } from './email.js';
import { registerCleanupCommand } from './cleanup.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerSearchCommand(program);
  registerEmailCommands(program);
  registerCleanupCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'search --zip <code>', description: 'Search around a ZIP code' },
    { name: 'search --zip-batch', description: 'Search every ZIP code enabled in config.json' },
    { name: 'search --lat <n> --lng <n>', description: 'Search around coordinates' },
    { name: 'email status', description: 'Show whether results can be mailed' },
    { name: 'email auth', description: 'Authorize Gmail sending' },
    { name: 'cleanup', description: 'Remove generated result files' },
  ];
}
