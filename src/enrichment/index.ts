/**
 * Enrichment
 *
 * @module enrichment
 */

export {
  enrichPlaces,
  shouldEnrich,
  type EnrichOptions,
  type EnrichResult,
} from './enricher.js';

export {
  extractEmailFromHtml,
  extractEmailFromWebsite,
  isUsableEmail,
  BROWSER_USER_AGENT,
  EXCLUDED_EMAIL_PATTERNS,
  type ExtractOptions,
} from './email-extractor.js';
