/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  formatProgress,
  type SpinnerOptions,
} from './progress.js';

// Result listings
export {
  formatResults,
  formatCompactLine,
  formatPlaceBlock,
  type ResultListOptions,
} from './results.js';

// Run summary formatters
export { formatRunSummary, formatUsageLine, type RunSummary } from './run-summary.js';
