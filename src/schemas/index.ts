/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the schema definitions used by the search
 * pipeline, the writers and the CLI.
 */

// ============================================================================
// Common Types
// ============================================================================

export {
  CoordinatesSchema,
  ZipCodeSchema,
  OutputFormatSchema,
  type Coordinates,
  type ZipCode,
  type OutputFormat,
} from './common.js';

// ============================================================================
// Places
// ============================================================================

export {
  ReviewSchema,
  PlaceRecordSchema,
  type Review,
  type PlaceRecord,
} from './place.js';

// ============================================================================
// Search Requests
// ============================================================================

export {
  MAX_RADIUS_METERS,
  SearchOriginSchema,
  SearchRequestSchema,
  type SearchOrigin,
  type SearchRequest,
  type SearchInfo,
} from './search.js';

// ============================================================================
// Run Configuration
// ============================================================================

export {
  DEFAULT_KEYWORDS,
  DEFAULT_RADIUS_METERS,
  DEFAULT_MAX_RESULTS,
  DEFAULT_SUBJECT_TEMPLATE,
  ZipCodesConfigSchema,
  EmailSettingsSchema,
  SearchDefaultsSchema,
  RunConfigSchema,
  createDefaultRunConfig,
  type ZipCodesConfig,
  type EmailSettings,
  type SearchDefaults,
  type RunConfig,
} from './run-config.js';
