/**
 * ZIP Code Coordinate Table
 *
 * Read-only mapping from US ZIP codes to the coordinates a search is centred
 * on. ZIP codes missing from the table are searched by text instead (see
 * search/zip-search).
 *
 * @module geo/zip-lookup
 */

import * as path from 'node:path';
import { z } from 'zod';
import { fileExists, readJsonWith } from '../storage/atomic.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One row of the coordinate table.
 */
export const ZipEntrySchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
  city: z.string().default(''),
  state: z.string().default(''),
});

export type ZipEntry = z.infer<typeof ZipEntrySchema>;

export const ZipTableSchema = z.record(z.string().regex(/^\d{5}$/), ZipEntrySchema);

export type ZipTable = z.infer<typeof ZipTableSchema>;

// ============================================================================
// Constants
// ============================================================================

/** Table shipped with the package (data/ at the package root) */
export const DEFAULT_ZIP_TABLE_PATH = path.resolve(__dirname, '..', '..', 'data', 'zip_coordinates.json');

// ============================================================================
// ZipLookup
// ============================================================================

/**
 * In-memory ZIP → coordinate lookup.
 *
 * @example
 * ```typescript
 * const lookup = await ZipLookup.load();
 * lookup.resolve('98101'); // { lat: 47.6101, lng: -122.3344, city: 'Seattle', state: 'WA' }
 * ```
 */
export class ZipLookup {
  constructor(private readonly table: ZipTable) {}

  /**
   * Load the table from a JSON file.
   *
   * A missing file yields an empty table, so every ZIP uses the text-search
   * fallback.
   *
   * @throws Error if the file exists but is not a valid table
   */
  static async load(filePath: string = DEFAULT_ZIP_TABLE_PATH): Promise<ZipLookup> {
    if (!(await fileExists(filePath))) {
      return new ZipLookup({});
    }
    return new ZipLookup(await readJsonWith(filePath, ZipTableSchema));
  }

  /**
   * Look up a ZIP code. ZIP+4 codes are looked up by their first five digits.
   *
   * @returns The table entry, or undefined when the ZIP is not in the table
   */
  resolve(zipCode: string): ZipEntry | undefined {
    const key = normalizeZip(zipCode);
    return Object.prototype.hasOwnProperty.call(this.table, key) ? this.table[key] : undefined;
  }

  get size(): number {
    return Object.keys(this.table).length;
  }
}

/**
 * Strip whitespace and a ZIP+4 suffix.
 */
export function normalizeZip(zipCode: string): string {
  return zipCode.trim().split('-')[0] ?? '';
}
