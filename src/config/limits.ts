/**
 * Rate Limit and Timeout Configuration
 *
 * Fixed pacing for outbound calls. There is no backoff: each call kind simply
 * waits out its minimum interval since the previous call of the same kind.
 *
 * @module config/limits
 */

/**
 * Minimum interval between consecutive calls of each kind (milliseconds)
 */
export const RATE_LIMITS = {
  search: 1200,
  details: 800,
  scrape: 600,
} as const;

export type CallKind = keyof typeof RATE_LIMITS;

/**
 * Request timeouts (milliseconds)
 */
export const TIMEOUTS = {
  places: 10000,
  scrape: 5000,
  gmail: 15000,
} as const;

/** Results requested per text-search call (Places API maximum) */
export const MAX_RESULTS_PER_QUERY = 20;

/** Places below this rating are not enriched unless reviews are requested for all */
export const MIN_RATING_FOR_DETAILS = 3.0;

/** Reviews kept per place by default */
export const DEFAULT_MAX_REVIEWS = 3;

/** Calls between "total outbound calls" progress messages */
export const CALL_COUNT_LOG_INTERVAL = 10;
