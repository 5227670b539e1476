/**
 * Cleanup Command
 *
 * Removes generated result files and interrupted-write leftovers. Setup
 * files (config.json, credentials.json, token.json, .env) are kept.
 *
 * @module cli/commands/cleanup
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { cleanupOutputs, type CleanupResult } from '../../storage/cleanup.js';
import { validateBaseName } from '../../storage/paths.js';
import { BaseCommand, UsageError, getBaseCommand, EXIT_CODES } from '../base-command.js';
import { DEFAULT_OUTPUT } from './search.js';

export interface CleanupCommandOptions {
  output?: string;
  outputDir?: string;
}

/**
 * Handle the cleanup command.
 */
export async function handleCleanup(options: CleanupCommandOptions, base: BaseCommand): Promise<CleanupResult> {
  const output = options.output ?? DEFAULT_OUTPUT;
  try {
    validateBaseName(output);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  base.info('🧹 Cleaning up generated files...');
  const result = await cleanupOutputs(options.outputDir ?? '.', output, base);

  if (result.removed.length === 0) {
    base.info('   Nothing to remove');
  }
  base.success(`Cleanup completed (${result.removed.length} removed)`);

  base.info('\n📄 Preserved important files:');
  for (const { file, exists } of result.preserved) {
    base.info(exists ? `   ${chalk.green('✅')} ${file}` : `   ${chalk.red('❌')} ${file} (not found)`);
  }

  return result;
}

/**
 * Register the cleanup command.
 */
export function registerCleanupCommand(program: Command): void {
  program
    .command('cleanup')
    .description('Remove generated result files and temporary files')
    .option('-o, --output <name>', 'Output file base name to clean up', DEFAULT_OUTPUT)
    .option('--output-dir <path>', 'Directory holding the output files', '.')
    .action(async (options: CleanupCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      try {
        const result = await handleCleanup(options, base);
        if (result.failed.length > 0) {
          base.exitWith(EXIT_CODES.ERROR);
        }
      } catch (error) {
        base.exitWith(base.reportError(error));
      }
    });
}
