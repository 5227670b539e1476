#!/usr/bin/env node
/**
 * Donation Finder CLI
 *
 * Main entry point for the donation-finder tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   donation-finder --help
 *   donation-finder search --zip 98101 --include-reviews
 *   donation-finder search --lat 47.6101 --lng -122.3344 --format csv
 *   donation-finder email auth
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, readGlobalOptions } from './base-command.js';
import { registerCommands, getCommandHelp } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

function formatCommandHelp(): string {
  const entries = getCommandHelp();
  const width = Math.max(...entries.map((entry) => entry.name.length));
  return [
    '',
    'Examples:',
    ...entries.map((entry) => `  donation-finder ${entry.name.padEnd(width)}  ${entry.description}`),
  ].join('\n');
}

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('donation-finder')
    .description('Find nearby donation opportunities with the Google Places API')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Compact result listing, no progress output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config.json (default: ./config.json)');

  program.addHelpText('after', formatCommandHelp());

  // Build the base command once; subcommands find it on the program
  program.hook('preAction', (thisCommand) => {
    const opts = readGlobalOptions(thisCommand.opts());
    const baseCommand = new BaseCommand(opts);

    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program);

  // Commander parse errors (unknown option, missing argument) are usage errors
  program.exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  process.once('SIGINT', () => {
    console.error('\nSearch cancelled by user.');
    process.exit(EXIT_CODES.CANCELLED);
  });

  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Commands report their own errors; this catches anything that escaped
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
