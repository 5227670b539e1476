/**
 * ZIP Code Search
 *
 * Resolves a ZIP code through the coordinate table and runs the aggregator
 * around it. ZIP codes missing from the table fall back to plain text
 * queries that mention the ZIP code.
 *
 * @module search/zip-search
 */

import type { PlaceRecord } from '../schemas/place.js';
import { ZipCodeSchema } from '../schemas/common.js';
import { normalizeZip, type ZipLookup } from '../geo/zip-lookup.js';
import { silentLogger, type Logger } from '../logger.js';
import { aggregateSearch, type AggregateResult, type SearchDeps } from './aggregator.js';
import { deduplicatePlaces } from './dedupe.js';

/** Query variants tried per keyword when a ZIP code has no coordinates */
const FALLBACK_TEMPLATES = ['{kw} in {zip}', '{kw} near {zip}', '{kw} {zip}'] as const;

/** Upper bound on fallback queries per ZIP code */
export const MAX_FALLBACK_QUERIES = 6;

export interface ZipSearchOptions {
  keywords: string[];
  radius: number;
  maxResults: number;
}

export interface ZipSearchResult extends AggregateResult {
  zipCode: string;
  /** True when the ZIP was found in the coordinate table */
  resolved: boolean;
}

export interface BatchSearchResult {
  /** Results per ZIP code, in input order */
  byZip: Map<string, PlaceRecord[]>;
  /** All results, deduplicated across ZIP codes */
  combined: PlaceRecord[];
  /** Cap applied to each ZIP code */
  perZipLimit: number;
}

/**
 * Build the fallback query list for a ZIP code.
 *
 * @example
 * ```typescript
 * buildFallbackQueries(['food bank'], '99999');
 * // ['food bank in 99999', 'food bank near 99999', 'food bank 99999']
 * ```
 */
export function buildFallbackQueries(keywords: string[], zipCode: string): string[] {
  const queries = keywords.flatMap((kw) =>
    FALLBACK_TEMPLATES.map((template) => template.replace('{kw}', kw).replace('{zip}', zipCode))
  );
  return queries.slice(0, MAX_FALLBACK_QUERIES);
}

/**
 * Per-ZIP result cap for a batch search.
 */
export function perZipLimit(maxResults: number, zipCount: number): number {
  if (zipCount <= 0) {
    return Math.max(1, maxResults);
  }
  return Math.max(1, Math.floor(maxResults / zipCount));
}

/**
 * Searches by ZIP code, singly or in batches.
 *
 * @example
 * ```typescript
 * const searcher = new ZipSearcher(await ZipLookup.load(), { client, limiter, logger });
 * const { places } = await searcher.searchByZip('98101', {
 *   keywords: ['food bank'],
 *   radius: 5000,
 *   maxResults: 20,
 * });
 * ```
 */
export class ZipSearcher {
  private readonly logger: Logger;

  constructor(
    private readonly lookup: ZipLookup,
    private readonly deps: SearchDeps
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Search around one ZIP code.
   *
   * @throws ZodError if the ZIP code is malformed
   */
  async searchByZip(zipCode: string, options: ZipSearchOptions): Promise<ZipSearchResult> {
    const zip = ZipCodeSchema.parse(zipCode);
    const entry = this.lookup.resolve(zip);

    if (entry) {
      const place = [entry.city, entry.state].filter(Boolean).join(', ');
      this.logger.info(
        `Using coordinates for ${normalizeZip(zip)}${place ? ` (${place})` : ''}: ${entry.lat}, ${entry.lng}`
      );

      const result = await aggregateSearch(
        {
          origin: { lat: entry.lat, lng: entry.lng },
          keywords: options.keywords,
          radius: options.radius,
          maxResults: options.maxResults,
          minRating: 0,
          sortByDistance: true,
        },
        this.deps
      );
      return { ...result, zipCode: zip, resolved: true };
    }

    this.logger.warn(`No coordinates found for ${zip}, using text search fallback`);
    const result = await aggregateSearch(
      {
        keywords: buildFallbackQueries(options.keywords, zip),
        radius: options.radius,
        maxResults: options.maxResults,
        minRating: 0,
        sortByDistance: false,
      },
      this.deps
    );
    return { ...result, zipCode: zip, resolved: false };
  }

  /**
   * Search several ZIP codes one after another.
   *
   * Each ZIP gets `max(1, floor(maxResults / zipCount))` results; the
   * combined list drops places found from more than one ZIP code and is cut
   * to `maxResults`, since the per-ZIP floor of 1 can overshoot it.
   */
  async searchByZipBatch(zipCodes: string[], options: ZipSearchOptions): Promise<BatchSearchResult> {
    const limit = perZipLimit(options.maxResults, zipCodes.length);
    const byZip = new Map<string, PlaceRecord[]>();

    for (const zipCode of zipCodes) {
      this.logger.info(`Processing ZIP code: ${zipCode}`);
      const result = await this.searchByZip(zipCode, { ...options, maxResults: limit });
      byZip.set(result.zipCode, result.places);

      if (result.places.length > 0) {
        this.logger.info(`Found ${result.places.length} donation opportunities in ${result.zipCode}`);
      } else {
        this.logger.info(`No donation opportunities found in ${result.zipCode}`);
      }
    }

    const combined = deduplicatePlaces([...byZip.values()].flat()).slice(0, Math.max(0, options.maxResults));
    return { byZip, combined, perZipLimit: limit };
  }
}
