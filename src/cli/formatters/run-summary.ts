/**
 * Run Summary Formatters
 *
 * Summary printed at the end of a search: what was searched, what was
 * found and written, and how many billable Places API calls it took.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import { estimatePlacesCost, formatCost, type PlacesUsage } from '../../config/index.js';
import type { SearchInfo } from '../../schemas/search.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Types
// ============================================================================

export interface RunSummary {
  searchInfo: SearchInfo;
  /** Places in the final result list */
  resultCount: number;
  /** Places that received details (undefined when enrichment was off) */
  enriched?: number;
  /** Files written */
  files: string[];
  /** Billable Places API calls */
  usage: PlacesUsage;
  /** All rate-limited calls, including website scrapes */
  totalCalls: number;
  durationMs: number;
  /** Gmail message id when the report was mailed */
  emailMessageId?: string;
}

// ============================================================================
// Formatters
// ============================================================================

/**
 * Format the end-of-run summary.
 *
 * @example
 * ```
 * === Search Complete ===
 * Search:   ZIP Code Search
 * Location: ZIP 98101
 * Keywords: food bank, charity
 * Duration: 12.4s
 *
 * Results:
 *   Places found:   18
 *   Enriched:       15
 *
 * Files:
 *   donation_opportunities_98101.json
 *   donation_opportunities_98101.csv
 *
 * API usage: 2 searches, 15 details, 27 outbound calls (est. $0.32)
 * ```
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Search Complete ==='));
  lines.push(`Search:   ${summary.searchInfo.type}`);
  lines.push(`Location: ${chalk.cyan(summary.searchInfo.location)}`);
  lines.push(`Keywords: ${summary.searchInfo.keywords}`);
  lines.push(`Duration: ${formatDuration(summary.durationMs)}`);
  lines.push('');

  lines.push('Results:');
  lines.push(`  Places found:   ${summary.resultCount}`);
  if (summary.enriched !== undefined) {
    lines.push(`  Enriched:       ${summary.enriched}`);
  }
  lines.push('');

  if (summary.files.length > 0) {
    lines.push('Files:');
    for (const file of summary.files) {
      lines.push(`  ${file}`);
    }
    lines.push('');
  }

  if (summary.emailMessageId) {
    lines.push(`Email:    sent (message id ${summary.emailMessageId})`);
    lines.push('');
  }

  lines.push(formatUsageLine(summary.usage, summary.totalCalls));

  return lines.join('\n');
}

/**
 * One-line API usage with the estimated Places cost.
 */
export function formatUsageLine(usage: PlacesUsage, totalCalls: number): string {
  const cost = formatCost(estimatePlacesCost(usage));
  return (
    `API usage: ${usage.textSearch} ${plural(usage.textSearch, 'search', 'searches')}, ` +
    `${usage.placeDetails} details, ` +
    `${totalCalls} outbound ${plural(totalCalls, 'call', 'calls')} ${chalk.dim(`(est. ${cost})`)}`
  );
}

function plural(count: number, one: string, many: string): string {
  return count === 1 ? one : many;
}
