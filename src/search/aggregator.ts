/**
 * Result Aggregator
 *
 * Runs one text search per keyword around an origin, merges the results,
 * deduplicates, computes distances, sorts nearest first and truncates.
 *
 * @module search/aggregator
 */

import type { Coordinates } from '../schemas/common.js';
import type { PlaceRecord } from '../schemas/place.js';
import type { PlacesClient, Place } from '../places/client.js';
import { describeError } from '../places/client.js';
import { mapPlacesToRecords, placeCoordinates } from '../places/mapper.js';
import { haversineDistance } from '../geo/distance.js';
import { silentLogger, type Logger } from '../logger.js';
import type { RateLimiter } from './rate-limiter.js';
import { deduplicatePlaces } from './dedupe.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for a keyword search.
 */
export interface AggregateOptions {
  /** Search centre; when absent, no location bias, radius filter or distance */
  origin?: Coordinates;
  /** Query texts, one API call each */
  keywords: string[];
  /** Radius in meters; results farther than this from the origin are dropped */
  radius: number;
  /** Cap on the returned list */
  maxResults: number;
  /** Minimum rating (unrated places count as 0) */
  minRating?: number;
  /** Sort nearest first (default: true) */
  sortByDistance?: boolean;
}

/**
 * Collaborators shared across a run.
 */
export interface SearchDeps {
  client: PlacesClient;
  limiter: RateLimiter;
  logger?: Logger;
}

/**
 * Outcome of one keyword query.
 */
export interface KeywordOutcome {
  keyword: string;
  /** Places kept after the radius and rating filters */
  found: number;
  error?: string;
}

export interface AggregateResult {
  places: PlaceRecord[];
  /** Places returned across all keywords, before deduplication */
  totalFound: number;
  keywords: KeywordOutcome[];
}

// ============================================================================
// Filtering and Sorting
// ============================================================================

/**
 * Keep places inside the radius (when an origin is known) and at or above the
 * minimum rating. Places without a location are dropped when filtering by
 * radius.
 */
export function filterCandidates(
  places: Place[],
  origin: Coordinates | undefined,
  radius: number,
  minRating: number
): Place[] {
  return places.filter((place) => {
    if (origin) {
      const coordinates = placeCoordinates(place);
      if (!coordinates || haversineDistance(origin, coordinates) > radius) {
        return false;
      }
    }
    return (place.rating ?? 0) >= minRating;
  });
}

/**
 * Sort nearest first. Records without a distance go last; ties keep their
 * input order.
 */
export function sortByDistance(records: PlaceRecord[]): PlaceRecord[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => {
      const da = a.record.distanceMeters ?? Number.POSITIVE_INFINITY;
      const db = b.record.distanceMeters ?? Number.POSITIVE_INFINITY;
      if (da !== db) {
        return da < db ? -1 : 1;
      }
      return a.index - b.index;
    })
    .map(({ record }) => record);
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Search every keyword and aggregate the results.
 *
 * A failing keyword is logged and skipped; the run continues with the next
 * one.
 *
 * @example
 * ```typescript
 * const result = await aggregateSearch(
 *   { origin: { lat: 47.6101, lng: -122.3344 }, keywords: ['food bank'], radius: 5000, maxResults: 20 },
 *   { client, limiter, logger }
 * );
 * ```
 */
export async function aggregateSearch(
  options: AggregateOptions,
  deps: SearchDeps
): Promise<AggregateResult> {
  const logger = deps.logger ?? silentLogger;
  const minRating = options.minRating ?? 0;
  const candidates: Place[] = [];
  const outcomes: KeywordOutcome[] = [];

  for (const keyword of options.keywords) {
    logger.info(`Searching for '${keyword}'...`);
    await deps.limiter.acquire('search');

    try {
      const results = await deps.client.searchText(keyword, {
        location: options.origin,
        radius: options.radius,
      });
      const kept = filterCandidates(results, options.origin, options.radius, minRating);
      candidates.push(...kept);
      outcomes.push({ keyword, found: kept.length });
      logger.debug(`Found ${kept.length} places for keyword '${keyword}'`);
    } catch (error) {
      const message = describeError(error);
      logger.warn(`Search failed for keyword '${keyword}': ${message}`);
      outcomes.push({ keyword, found: 0, error: message });
    }
  }

  logger.debug(`Total places found: ${candidates.length}`);

  const records = mapPlacesToRecords(candidates, options.origin);
  const unique = deduplicatePlaces(records);
  logger.debug(`Unique places after deduplication: ${unique.length}`);

  const active = unique.filter((record) => !record.permanentlyClosed);
  logger.debug(`Active places (not permanently closed): ${active.length}`);

  const ordered = options.sortByDistance === false ? active : sortByDistance(active);

  return {
    places: ordered.slice(0, Math.max(0, options.maxResults)),
    totalFound: candidates.length,
    keywords: outcomes,
  };
}
