/**
 * Google Places API Client
 *
 * Low-level client for the Google Places API (New): Text Search and Place
 * Details. Handles authentication, field masks, response validation,
 * error classification, timeouts and call counting for the usage summary.
 *
 * @module places/client
 */

import { z } from 'zod';
import { requireApiKey, TIMEOUTS, MAX_RESULTS_PER_QUERY, type PlacesUsage } from '../config/index.js';
import type { Coordinates } from '../schemas/common.js';
import { MAX_RADIUS_METERS } from '../schemas/search.js';

// ============================================================================
// Response Schemas
// ============================================================================

const LocalizedTextSchema = z.object({
  text: z.string().default(''),
  languageCode: z.string().optional(),
});

const RawReviewSchema = z.object({
  authorAttribution: z
    .object({
      displayName: z.string().optional(),
      photoUri: z.string().optional(),
    })
    .optional(),
  rating: z.number().optional(),
  text: LocalizedTextSchema.optional(),
  relativePublishTimeDescription: z.string().optional(),
  publishTime: z.string().optional(),
});

/**
 * Place as returned by Text Search (fields limited by SEARCH_FIELD_MASK)
 */
export const PlaceSchema = z.object({
  id: z.string().optional(),
  displayName: LocalizedTextSchema.optional(),
  formattedAddress: z.string().optional(),
  location: z
    .object({
      latitude: z.number(),
      longitude: z.number(),
    })
    .optional(),
  rating: z.number().optional(),
  userRatingCount: z.number().int().optional(),
  businessStatus: z.string().optional(),
  types: z.array(z.string()).optional(),
  primaryType: z.string().optional(),
  priceLevel: z.string().optional(),
});

export type Place = z.infer<typeof PlaceSchema>;

/**
 * Place as returned by Place Details (fields limited by DETAILS_FIELD_MASK)
 */
export const PlaceDetailsSchema = PlaceSchema.extend({
  internationalPhoneNumber: z.string().optional(),
  websiteUri: z.string().optional(),
  regularOpeningHours: z
    .object({
      weekdayDescriptions: z.array(z.string()).optional(),
    })
    .optional(),
  reviews: z.array(RawReviewSchema).optional(),
  photos: z.array(z.unknown()).optional(),
  editorialSummary: LocalizedTextSchema.optional(),
});

export type PlaceDetails = z.infer<typeof PlaceDetailsSchema>;
export type RawReview = z.infer<typeof RawReviewSchema>;

const TextSearchResponseSchema = z.object({
  places: z.array(PlaceSchema).default([]),
});

const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

// ============================================================================
// Types
// ============================================================================

/**
 * Options for text search requests
 */
export interface SearchOptions {
  /** Centre of the location bias circle */
  location?: Coordinates;
  /** Bias radius in meters (clamped to 50000) */
  radius?: number;
  /** Results per call (1-20, default 20) */
  maxResultCount?: number;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

/**
 * Client construction options
 */
export interface PlacesClientOptions {
  /** API key; defaults to GOOGLE_PLACES_API_KEY / GOOGLE_MAPS_API_KEY */
  apiKey?: string;
  /** Override the API host (tests) */
  baseUrl?: string;
}

/**
 * Google Places API error with additional context
 */
export class PlacesApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly status: string,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'PlacesApiError';
  }
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * Fields requested from Text Search.
 * Field masks keep requests in the cheapest SKU that covers them.
 */
export const SEARCH_FIELD_MASK = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.location',
  'places.rating',
  'places.businessStatus',
  'places.types',
  'places.primaryType',
  'places.priceLevel',
  'places.userRatingCount',
].join(',');

/**
 * Fields requested from Place Details
 */
export const DETAILS_FIELD_MASK = [
  'id',
  'displayName',
  'formattedAddress',
  'rating',
  'userRatingCount',
  'reviews',
  'photos',
  'regularOpeningHours',
  'internationalPhoneNumber',
  'websiteUri',
  'businessStatus',
  'editorialSummary',
].join(',');

/**
 * PlacesClient provides access to the Google Places API (New).
 *
 * @example
 * ```typescript
 * const client = new PlacesClient();
 *
 * const places = await client.searchText('food bank', {
 *   location: { lat: 47.6101, lng: -122.3344 },
 *   radius: 5000,
 * });
 *
 * const details = await client.getPlaceDetails(places[0].id);
 * console.log(`Calls made: ${client.getCallCount()}`);
 * ```
 */
export class PlacesClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private searchCalls = 0;
  private detailsCalls = 0;

  /**
   * Create a new Places client.
   *
   * @throws Error if no API key is given and none is configured
   */
  constructor(options: PlacesClientOptions = {}) {
    this.apiKey = options.apiKey ?? requireApiKey('googlePlaces');
    this.baseUrl = options.baseUrl ?? 'https://places.googleapis.com/v1';
  }

  /**
   * Search for places matching a text query, biased towards a circle.
   *
   * @param query - Search text (e.g., "food bank near me")
   * @throws PlacesApiError on API errors
   */
  async searchText(query: string, options: SearchOptions = {}): Promise<Place[]> {
    const timeout = options.timeoutMs ?? TIMEOUTS.places;

    const body: Record<string, unknown> = {
      textQuery: query,
      maxResultCount: Math.min(MAX_RESULTS_PER_QUERY, Math.max(1, options.maxResultCount ?? MAX_RESULTS_PER_QUERY)),
    };

    if (options.location) {
      body.locationBias = {
        circle: {
          center: { latitude: options.location.lat, longitude: options.location.lng },
          radius: Math.min(options.radius ?? MAX_RADIUS_METERS, MAX_RADIUS_METERS),
        },
      };
    }

    const response = await this.fetchWithTimeout(
      `${this.baseUrl}/places:searchText`,
      {
        method: 'POST',
        headers: this.headers(SEARCH_FIELD_MASK),
        body: JSON.stringify(body),
      },
      timeout
    );

    if (!response.ok) {
      await this.handleHttpError(response);
    }

    this.searchCalls++;
    const data = TextSearchResponseSchema.safeParse(await response.json());
    if (!data.success) {
      throw new PlacesApiError('Unexpected Text Search response shape', 502, 'INVALID_RESPONSE', false);
    }

    return data.data.places;
  }

  /**
   * Get detailed information about a place, including reviews and contact
   * fields.
   *
   * @throws PlacesApiError on API errors
   */
  async getPlaceDetails(placeId: string, timeoutMs: number = TIMEOUTS.places): Promise<PlaceDetails> {
    const response = await this.fetchWithTimeout(
      `${this.baseUrl}/places/${encodeURIComponent(placeId)}`,
      { method: 'GET', headers: this.headers(DETAILS_FIELD_MASK) },
      timeoutMs
    );

    if (!response.ok) {
      await this.handleHttpError(response);
    }

    this.detailsCalls++;
    const data = PlaceDetailsSchema.safeParse(await response.json());
    if (!data.success) {
      throw new PlacesApiError('Unexpected Place Details response shape', 502, 'INVALID_RESPONSE', false);
    }

    return data.data;
  }

  /**
   * Total number of successful API calls made by this client.
   */
  getCallCount(): number {
    return this.searchCalls + this.detailsCalls;
  }

  /**
   * Calls broken down by endpoint, for cost estimation.
   */
  getUsage(): PlacesUsage {
    return { textSearch: this.searchCalls, placeDetails: this.detailsCalls };
  }

  /**
   * Reset the API call counters.
   */
  resetCallCount(): void {
    this.searchCalls = 0;
    this.detailsCalls = 0;
  }

  private headers(fieldMask: string): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'X-Goog-Api-Key': this.apiKey,
      'X-Goog-FieldMask': fieldMask,
    };
  }

  /**
   * Execute fetch with timeout using AbortController.
   *
   * @throws PlacesApiError on timeout
   */
  private async fetchWithTimeout(url: string, options: RequestInit, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, { ...options, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new PlacesApiError(
          `Request timed out after ${timeoutMs}ms`,
          408,
          'TIMEOUT',
          true // Timeouts are retryable
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Handle HTTP-level errors.
   *
   * The API reports failures as `{ error: { code, message, status } }`.
   *
   * @throws PlacesApiError with appropriate message and retryable flag
   */
  private async handleHttpError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');

    let detail = text;
    let status = 'HTTP_ERROR';
    try {
      const parsed = ErrorResponseSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        detail = parsed.data.error.message ?? text;
        status = parsed.data.error.status ?? status;
      }
    } catch {
      // Body is not JSON; keep the raw text
    }

    const isRetryable = response.status === 429 || response.status >= 500;

    let message: string;
    if (response.status === 429) {
      message = `Quota exceeded: ${detail}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${detail}`;
    } else if (response.status === 401 || response.status === 403) {
      message = `Authentication failed: Invalid or unauthorized API key (${detail})`;
    } else if (response.status === 404) {
      message = `Place not found: ${detail}`;
    } else {
      message = `API error (${response.status}): ${detail}`;
    }

    throw new PlacesApiError(message, response.status, status, isRetryable);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Describe any thrown value for log output
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
