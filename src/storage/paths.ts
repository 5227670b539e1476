/**
 * Path Resolution Utilities
 *
 * Provides consistent names for the files a run writes.
 *
 * Output Directory Layout:
 * ```
 * <output-dir>/
 * ├── donation_opportunities_98101.json     # Single ZIP search
 * ├── donation_opportunities_98101.csv
 * ├── donation_opportunities_batch.json     # Combined batch results
 * ├── donation_opportunities_98004.json     # Per-ZIP batch results
 * └── donation_opportunities_coordinates.csv
 * ```
 *
 * Setup files (`config.json`, `credentials.json`, `token.json`, `.env`) live
 * beside them and are never treated as output.
 *
 * @module storage/paths
 */

import * as path from 'node:path';

/** Extensions the writer produces */
export type OutputExtension = 'json' | 'csv';

/**
 * Files the user creates during setup; `cleanup` never removes them.
 */
export const SETUP_FILES = ['config.json', 'credentials.json', 'token.json', '.env'] as const;

/**
 * Validates a file base name to prevent path traversal.
 *
 * Rejects names containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @throws {Error} If the name is empty or contains path traversal characters
 */
export function validateBaseName(baseName: string): void {
  if (!baseName.trim()) {
    throw new Error('Output name cannot be empty');
  }
  if (baseName.includes('..') || baseName.includes('/') || baseName.includes('\\')) {
    throw new Error('Output name contains invalid characters (path traversal not allowed)');
  }
}

/**
 * Gets the path of an output file.
 *
 * @example
 * ```typescript
 * getOutputPath('/tmp/out', 'donation_opportunities_98101', 'csv');
 * // '/tmp/out/donation_opportunities_98101.csv'
 * ```
 */
export function getOutputPath(outputDir: string, baseName: string, extension: OutputExtension): string {
  validateBaseName(baseName);
  return path.join(outputDir, `${baseName}.${extension}`);
}

/**
 * Base name for a single ZIP search (also used for each ZIP of a batch).
 */
export function getZipBaseName(output: string, zipCode: string): string {
  return `${output}_${zipCode}`;
}

/**
 * Base name for the combined results of a batch search.
 */
export function getBatchBaseName(output: string): string {
  return `${output}_batch`;
}

/**
 * Base name for a coordinate search.
 */
export function getCoordinatesBaseName(output: string): string {
  return `${output}_coordinates`;
}

/**
 * Whether a file name was produced by the writer for the given output name.
 */
export function isGeneratedOutput(fileName: string, output: string): boolean {
  return fileName.startsWith(`${output}_`) && /\.(json|csv)$/.test(fileName);
}

/**
 * Whether a file name is a leftover from an interrupted atomic write.
 */
export function isTempFile(fileName: string): boolean {
  return /\.tmp(\.\d+)?$/.test(fileName);
}

/**
 * Whether a file name is one of the setup files.
 */
export function isSetupFile(fileName: string): boolean {
  return SETUP_FILES.some((name) => name === fileName);
}
