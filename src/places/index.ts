/**
 * Google Places Integration
 *
 * Architecture:
 * - client.ts: Low-level API client for the Places API (New)
 * - mapper.ts: Converts API responses to PlaceRecord objects
 *
 * @module places
 */

// ============================================================================
// API Client
// ============================================================================

export {
  PlacesClient,
  PlacesApiError,
  describeError,
  SEARCH_FIELD_MASK,
  DETAILS_FIELD_MASK,
  type Place,
  type PlaceDetails,
  type RawReview,
  type SearchOptions,
  type PlacesClientOptions,
} from './client.js';

// ============================================================================
// Place to PlaceRecord Mapper
// ============================================================================

export {
  mapPlaceToRecord,
  mapPlacesToRecords,
  mapReview,
  mapDetails,
  placeCoordinates,
  PERMANENTLY_CLOSED_STATUS,
  type DetailFields,
} from './mapper.js';
