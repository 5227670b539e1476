/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, config path)
 * - Consistent error reporting and exit codes
 * - Output utilities (log, warn, error)
 *
 * BaseCommand satisfies the library Logger interface, so commands pass it
 * straight to the search, enrichment and notification layers.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { ZodError } from 'zod';
import { config } from '../config/index.js';
import type { Logger } from '../logger.js';
import { PlacesApiError } from '../places/client.js';
import { AuthSetupError } from '../notify/gmail-auth.js';
import { GmailApiError } from '../notify/email-sender.js';
import { ConfigError } from '../storage/config.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Compact listing, no progress output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Path to config.json */
  config?: string;
}

/**
 * Invalid flags or flag combinations.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** API or network error */
  API_ERROR: 4,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a thrown value to the exit code the CLI reports.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UsageError || error instanceof ZodError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof PlacesApiError || error instanceof GmailApiError) {
    return EXIT_CODES.API_ERROR;
  }
  return EXIT_CODES.ERROR;
}

/**
 * Read the global options out of commander's option values.
 */
export function readGlobalOptions(values: Record<string, unknown>): GlobalOptions {
  return {
    verbose: values['verbose'] === true,
    quiet: values['quiet'] === true,
    color: values['color'] !== false,
    config: typeof values['config'] === 'string' ? values['config'] : undefined,
  };
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * .action(async (options: SearchCommandOptions, cmd: Command) => {
 *   const base = getBaseCommand(cmd);
 *   try {
 *     await handleSearch(options, base);
 *   } catch (error) {
 *     base.exitWith(base.reportError(error));
 *   }
 * });
 * ```
 */
export class BaseCommand implements Logger {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved config.json path */
  readonly configPath: string;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.configPath = options.config ?? config.paths.runConfig;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Print an error and exit.
   *
   * @param message - Error message
   * @param code - Exit code (default: ERROR)
   */
  error(message: string, code: ExitCode = EXIT_CODES.ERROR): never {
    console.error(chalk.red(`Error: ${message}`));
    process.exit(code);
  }

  /**
   * Print a failure, with setup steps for credential problems and the stack
   * in verbose mode.
   *
   * @returns The exit code for the failure
   */
  reportError(error: unknown): ExitCode {
    if (error instanceof ZodError) {
      const details = error.issues.map((issue) => issue.message).join('; ');
      console.error(chalk.red(`Error: ${details}`));
    } else if (error instanceof Error) {
      console.error(chalk.red(`Error: ${error.message}`));
    } else {
      console.error(chalk.red(`Error: ${String(error)}`));
    }

    if (error instanceof AuthSetupError) {
      this.printSteps('To set up Gmail:', error.instructions);
    }

    if (error instanceof ConfigError) {
      console.error(chalk.dim(`Fix or remove ${error.filePath} and try again.`));
    }

    if (this.options.verbose && error instanceof Error && error.stack) {
      console.error(chalk.dim(error.stack));
    }

    return exitCodeFor(error);
  }

  /**
   * Print numbered setup steps.
   */
  printSteps(title: string, steps: readonly string[]): void {
    console.error(title);
    steps.forEach((step, i) => console.error(`  ${i + 1}. ${step}`));
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Anything commander-like: option values plus a parent chain.
 */
export interface OptionSource {
  opts(): Record<string, unknown>;
  parent?: OptionSource | null;
}

/**
 * Get the base command stored on the program by the preAction hook.
 * Walks up from a subcommand to the root program.
 *
 * @returns The stored BaseCommand, or a default one (for testing)
 */
export function getBaseCommand(cmd: OptionSource): BaseCommand {
  for (let current: OptionSource | null | undefined = cmd; current; current = current.parent) {
    const base = current.opts()['_baseCommand'];
    if (base instanceof BaseCommand) {
      return base;
    }
  }
  return new BaseCommand({});
}
