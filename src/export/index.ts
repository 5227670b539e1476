/**
 * Export Module
 *
 * Writes search results to JSON and CSV files.
 *
 * @module export
 */

export {
  saveResults,
  toCsv,
  flattenRecord,
  formatReview,
  csvColumns,
  type FlatRecord,
  type CsvValue,
} from './writer.js';
