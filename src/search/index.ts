/**
 * Search
 *
 * Architecture:
 * - rate-limiter.ts: Fixed minimum interval per outbound call kind
 * - dedupe.ts: Identity by provider id or normalized name + address
 * - aggregator.ts: Keyword fan-out, filtering, dedupe, distance sort, cap
 * - zip-search.ts: ZIP code resolution, text fallback and batches
 *
 * @module search
 */

export { RateLimiter, sleep, type RateLimiterOptions } from './rate-limiter.js';

export { normalizeText, nameAddressKey, deduplicatePlaces } from './dedupe.js';

export {
  aggregateSearch,
  filterCandidates,
  sortByDistance,
  type AggregateOptions,
  type AggregateResult,
  type KeywordOutcome,
  type SearchDeps,
} from './aggregator.js';

export {
  ZipSearcher,
  buildFallbackQueries,
  perZipLimit,
  MAX_FALLBACK_QUERIES,
  type ZipSearchOptions,
  type ZipSearchResult,
  type BatchSearchResult,
} from './zip-search.js';
