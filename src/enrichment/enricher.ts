/**
 * Detail Enricher
 *
 * Adds Place Details (reviews, hours, phone, website) and a scraped contact
 * email to search results. Calls are sequential and rate limited; a failure
 * on one place leaves that place unenriched and moves on.
 *
 * @module enrichment/enricher
 */

import type { PlaceRecord } from '../schemas/place.js';
import { DEFAULT_MAX_REVIEWS, MIN_RATING_FOR_DETAILS } from '../config/index.js';
import { describeError } from '../places/client.js';
import { mapDetails, type DetailFields } from '../places/mapper.js';
import type { SearchDeps } from '../search/aggregator.js';
import { silentLogger } from '../logger.js';
import { extractEmailFromWebsite } from './email-extractor.js';

// ============================================================================
// Types
// ============================================================================

export interface EnrichOptions {
  /** Reviews kept per place (default: 3) */
  maxReviews?: number;
  /** Enrich places rated below 3.0 as well */
  includeAll?: boolean;
  /** Look for a contact email on each website (default: true) */
  scrapeEmails?: boolean;
  /** Called before each place is processed */
  onProgress?: (index: number, total: number, place: PlaceRecord) => void;
}

export interface EnrichResult {
  places: PlaceRecord[];
  /** Places that received details */
  enriched: number;
  /** Places skipped for rating or missing id */
  skipped: number;
  /** Places whose details call failed */
  failed: number;
}

// ============================================================================
// Enrichment
// ============================================================================

/**
 * Mark a place as not enriched.
 */
function unenriched(place: PlaceRecord): PlaceRecord {
  return { ...place, reviews: [], detailsFetched: false };
}

/**
 * Whether a place qualifies for a details call.
 */
export function shouldEnrich(place: PlaceRecord, includeAll: boolean): boolean {
  if (!place.placeId) {
    return false;
  }
  return includeAll || (place.rating ?? 0) >= MIN_RATING_FOR_DETAILS;
}

/**
 * Enrich places with details, reviews and contact email.
 *
 * Input order is preserved and every input place appears in the output.
 *
 * @example
 * ```typescript
 * const { places } = await enrichPlaces(results, { maxReviews: 3 }, { client, limiter, logger });
 * ```
 */
export async function enrichPlaces(
  places: PlaceRecord[],
  options: EnrichOptions,
  deps: SearchDeps
): Promise<EnrichResult> {
  const logger = deps.logger ?? silentLogger;
  const maxReviews = options.maxReviews ?? DEFAULT_MAX_REVIEWS;
  const includeAll = options.includeAll ?? false;
  const scrapeEmails = options.scrapeEmails ?? true;

  const output: PlaceRecord[] = [];
  let enriched = 0;
  let skipped = 0;
  let failed = 0;

  for (const [index, place] of places.entries()) {
    options.onProgress?.(index, places.length, place);
    logger.debug(`Processing ${index + 1}/${places.length}: ${place.name}`);

    if (!shouldEnrich(place, includeAll)) {
      logger.debug(
        place.placeId
          ? `Skipping reviews for low-rated place (rating: ${place.rating ?? 0})`
          : `No place id found for ${place.name}`
      );
      output.push(unenriched(place));
      skipped++;
      continue;
    }

    await deps.limiter.acquire('details');

    let fields: DetailFields;
    try {
      fields = mapDetails(await deps.client.getPlaceDetails(place.placeId), maxReviews);
    } catch (error) {
      logger.warn(`Error fetching details for ${place.name}: ${describeError(error)}`);
      output.push(unenriched(place));
      failed++;
      continue;
    }

    let email = '';
    if (scrapeEmails && fields.website) {
      await deps.limiter.acquire('scrape');
      logger.debug(`Extracting email from website: ${fields.website}`);
      email = await extractEmailFromWebsite(fields.website, { logger });
      logger.debug(email ? `Found email: ${email}` : 'No email found');
    }

    output.push({
      ...place,
      ...fields,
      userRatingsTotal: fields.userRatingsTotal ?? place.userRatingsTotal,
      email,
      detailsFetched: true,
    });
    enriched++;
    logger.debug(`Added ${fields.reviews.length} reviews`);
  }

  logger.info(`Enhanced ${output.length} places with detailed information`);

  return { places: output, enriched, skipped, failed };
}
