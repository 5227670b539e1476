/**
 * Progress Formatters
 *
 * Spinner shown while searches, detail lookups and email delivery run.
 * The spinner is inert when stdout is not a TTY or in quiet mode.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Animate (default: stdout is a TTY); otherwise only the final line is written */
  enabled?: boolean;
  /** Write nothing at all */
  silent?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = createSpinner('Fetching place details...', { silent: base.isQuiet() }).start();
 * const result = await enrichPlaces(places, {
 *   onProgress: (i, total, place) => spinner.progress(i + 1, total, place.name),
 * }, deps);
 * spinner.succeed(`Enhanced ${result.enriched} places`);
 * ```
 */
export class ProgressSpinner {
  private readonly spinner: Ora;
  private readonly baseText: string;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.baseText = text;
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.enabled ?? process.stdout.isTTY === true,
      isSilent: options.silent ?? false,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Show a counter after the spinner's original text, e.g.
   * "Fetching place details... [3/10] Harbor Food Bank".
   */
  progress(current: number, total: number, label?: string): this {
    return this.update(formatProgress(this.baseText, current, total, label));
  }

  /**
   * Stop with success state; the elapsed time is appended.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.baseText) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * ```typescript
 * formatDuration(500); // '500ms'
 * formatDuration(5500); // '5.5s'
 * formatDuration(90000); // '1m 30s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * "text [current/total] label"
 */
export function formatProgress(text: string, current: number, total: number, label?: string): string {
  return `${text} [${current}/${total}]${label ? ` ${label}` : ''}`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
