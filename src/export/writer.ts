/**
 * Results Export
 *
 * Writes search results to JSON and/or CSV files in the output directory.
 * Uses atomic write pattern for data integrity.
 *
 * @module export/writer
 */

import { Parser } from 'json2csv';
import type { OutputFormat } from '../schemas/common.js';
import type { PlaceRecord, Review } from '../schemas/place.js';
import { atomicWriteJson, atomicWriteText } from '../storage/atomic.js';
import { getOutputPath } from '../storage/paths.js';
import { silentLogger, type Logger } from '../logger.js';

// ============================================================================
// Constants
// ============================================================================

/** Separator for string lists (types, opening hours) in CSV cells */
const LIST_SEPARATOR = '; ';

/** Separator between reviews in a CSV cell */
const REVIEW_SEPARATOR = ' | ';

// ============================================================================
// Types
// ============================================================================

export type CsvValue = string | number | boolean | null | undefined;

/** One CSV row: list fields flattened to strings */
export type FlatRecord = Record<string, CsvValue>;

// ============================================================================
// CSV Flattening
// ============================================================================

/**
 * Format a review for a CSV cell.
 *
 * @example
 * ```typescript
 * formatReview({ authorName: 'Sam', rating: 5, text: 'Welcoming.', ... }); // 'Sam (5): Welcoming.'
 * ```
 */
export function formatReview(review: Review): string {
  return `${review.authorName} (${review.rating}): ${review.text}`;
}

/**
 * Flatten a record for CSV output.
 */
export function flattenRecord(record: PlaceRecord): FlatRecord {
  const { types, openingHours, reviews, ...scalars } = record;
  const flat: FlatRecord = { ...scalars, types: types.join(LIST_SEPARATOR) };

  if (openingHours !== undefined) {
    flat.openingHours = openingHours.join(LIST_SEPARATOR);
  }
  if (reviews !== undefined) {
    flat.reviews = reviews.map(formatReview).join(REVIEW_SEPARATOR);
  }

  return flat;
}

/**
 * Sorted union of the keys of all rows.
 */
export function csvColumns(rows: FlatRecord[]): string[] {
  const keys = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      keys.add(key);
    }
  }
  return [...keys].sort();
}

/**
 * Render records as CSV text (header row first).
 */
export function toCsv(records: PlaceRecord[]): string {
  const rows = records.map(flattenRecord);
  const parser = new Parser<FlatRecord>({ fields: csvColumns(rows), eol: '\n' });
  return parser.parse(rows);
}

// ============================================================================
// Export
// ============================================================================

/**
 * Save results in the requested format(s).
 *
 * Files are named `<baseName>.json` / `<baseName>.csv` inside `outputDir`.
 * An empty result list writes nothing.
 *
 * @returns Paths of the files written
 *
 * @example
 * ```typescript
 * const files = await saveResults(places, 'donation_opportunities_98101', 'both', '.');
 * // ['donation_opportunities_98101.json', 'donation_opportunities_98101.csv']
 * ```
 */
export async function saveResults(
  places: PlaceRecord[],
  baseName: string,
  format: OutputFormat,
  outputDir: string,
  logger: Logger = silentLogger
): Promise<string[]> {
  if (places.length === 0) {
    logger.warn('No results to save');
    return [];
  }

  const written: string[] = [];

  if (format === 'json' || format === 'both') {
    const jsonPath = getOutputPath(outputDir, baseName, 'json');
    await atomicWriteJson(jsonPath, places);
    logger.info(`Saved ${places.length} results to ${jsonPath}`);
    written.push(jsonPath);
  }

  if (format === 'csv' || format === 'both') {
    const csvPath = getOutputPath(outputDir, baseName, 'csv');
    await atomicWriteText(csvPath, toCsv(places));
    logger.info(`Saved ${places.length} results to ${csvPath}`);
    written.push(csvPath);
  }

  return written;
}
