/**
 * Google Places Tests
 *
 * Unit tests covering:
 * - PlacesClient: request shape, response parsing, error handling, call tracking
 * - Mapper: Place to PlaceRecord conversion, reviews, details
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import {
  PlacesClient,
  PlacesApiError,
  describeError,
  SEARCH_FIELD_MASK,
  type Place,
  type PlaceDetails,
} from './client.js';
import { mapPlaceToRecord, mapPlacesToRecords, mapReview, mapDetails } from './mapper.js';

// ============================================================================
// Test Fixtures
// ============================================================================

/**
 * Mock fetch for API tests
 */
const mockFetch = jest.fn<typeof fetch>();

/**
 * Store original fetch for restoration
 */
const originalFetch = global.fetch;

/**
 * Sample place from the Text Search endpoint
 */
const rawFoodBank = {
  id: 'place-food-bank',
  displayName: { text: 'Harbor Food Bank', languageCode: 'en' },
  formattedAddress: '100 Pine St, Seattle, WA 98101, USA',
  location: { latitude: 47.611, longitude: -122.335 },
  rating: 4.6,
  userRatingCount: 120,
  businessStatus: 'OPERATIONAL',
  types: ['food_bank', 'point_of_interest', 'establishment'],
  primaryType: 'food_bank',
};

const rawShelter = {
  id: 'place-shelter',
  displayName: { text: 'Eastside Shelter' },
  formattedAddress: '200 Main St, Bellevue, WA 98004, USA',
  location: { latitude: 47.6148, longitude: -122.2045 },
  businessStatus: 'OPERATIONAL',
  types: ['point_of_interest'],
};

const rawDetails = {
  id: 'place-food-bank',
  displayName: { text: 'Harbor Food Bank' },
  formattedAddress: '100 Pine St, Seattle, WA 98101, USA',
  rating: 4.6,
  userRatingCount: 125,
  internationalPhoneNumber: '+1 206-555-0100',
  websiteUri: 'https://harbor.example.org',
  businessStatus: 'OPERATIONAL',
  regularOpeningHours: {
    weekdayDescriptions: ['Monday: 9:00 AM – 5:00 PM', 'Tuesday: 9:00 AM – 5:00 PM'],
  },
  photos: [{ name: 'p1' }, { name: 'p2' }],
  reviews: [
    {
      authorAttribution: { displayName: 'Sam', photoUri: 'https://example.org/sam.png' },
      rating: 5,
      text: { text: 'Welcoming volunteers.' },
      relativePublishTimeDescription: 'a month ago',
      publishTime: '2026-09-01T10:00:00Z',
    },
    {
      rating: 4,
      text: { text: 'Well organised.' },
      relativePublishTimeDescription: '2 months ago',
    },
  ],
};

/**
 * Create a JSON Response for fetch
 */
function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

// ============================================================================
// PlacesClient Tests
// ============================================================================

describe('PlacesClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    global.fetch = mockFetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  describe('constructor', () => {
    it('creates client when an API key is given', () => {
      expect(() => new PlacesClient({ apiKey: 'test-api-key' })).not.toThrow();
    });
  });

  describe('searchText - successful requests', () => {
    it('returns parsed places on success', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ places: [rawFoodBank, rawShelter] }));

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      const results = await client.searchText('food bank');

      expect(results).toHaveLength(2);
      expect(results[0].id).toBe('place-food-bank');
      expect(results[0].displayName?.text).toBe('Harbor Food Bank');
      expect(results[0].rating).toBe(4.6);
    });

    it('posts the query with the API key and field mask headers', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ places: [] }));

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      await client.searchText('charity near me');

      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://places.googleapis.com/v1/places:searchText');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        'X-Goog-Api-Key': 'test-api-key',
        'X-Goog-FieldMask': SEARCH_FIELD_MASK,
      });
      expect(JSON.parse(String(init?.body))).toEqual({
        textQuery: 'charity near me',
        maxResultCount: 20,
      });
    });

    it('includes the location bias circle when provided', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ places: [] }));

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      await client.searchText('shelter', {
        location: { lat: 47.6101, lng: -122.3344 },
        radius: 5000,
      });

      const [, init] = mockFetch.mock.calls[0];
      expect(JSON.parse(String(init?.body)).locationBias).toEqual({
        circle: {
          center: { latitude: 47.6101, longitude: -122.3344 },
          radius: 5000,
        },
      });
    });

    it('clamps the radius to the API maximum', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ places: [] }));

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      await client.searchText('shelter', { location: { lat: 0, lng: 0 }, radius: 80000 });

      const [, init] = mockFetch.mock.calls[0];
      expect(JSON.parse(String(init?.body)).locationBias.circle.radius).toBe(50000);
    });

    it('treats a body without places as zero results', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      const results = await client.searchText('nonexistent place xyz123');

      expect(results).toEqual([]);
    });
  });

  describe('searchText - error handling', () => {
    it('throws retryable error on HTTP 429', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ error: { code: 429, message: 'Quota exceeded', status: 'RESOURCE_EXHAUSTED' } }, 429)
      );

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      const error = await client.searchText('test').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PlacesApiError);
      if (error instanceof PlacesApiError) {
        expect(error.statusCode).toBe(429);
        expect(error.status).toBe('RESOURCE_EXHAUSTED');
        expect(error.isRetryable).toBe(true);
        expect(error.message).toBe('Quota exceeded: Quota exceeded');
      }
    });

    it('throws non-retryable error on HTTP 403', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ error: { code: 403, message: 'API key not valid', status: 'PERMISSION_DENIED' } }, 403)
      );

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      const error = await client.searchText('test').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PlacesApiError);
      if (error instanceof PlacesApiError) {
        expect(error.isRetryable).toBe(false);
        expect(error.message).toBe(
          'Authentication failed: Invalid or unauthorized API key (API key not valid)'
        );
      }
    });

    it('keeps a non-JSON error body as the message detail', async () => {
      mockFetch.mockResolvedValueOnce(new Response('upstream unavailable', { status: 503 }));

      const client = new PlacesClient({ apiKey: 'test-api-key' });

      await expect(client.searchText('test')).rejects.toThrow('Server error (503): upstream unavailable');
    });

    it('throws retryable error on timeout', async () => {
      mockFetch.mockImplementation((_url, options) => {
        return new Promise((_resolve, reject) => {
          const signal = options?.signal;
          if (signal) {
            signal.addEventListener('abort', () => {
              const abortError = new Error('The operation was aborted');
              abortError.name = 'AbortError';
              reject(abortError);
            });
          }
        });
      });

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      const error = await client.searchText('test', { timeoutMs: 50 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PlacesApiError);
      if (error instanceof PlacesApiError) {
        expect(error.status).toBe('TIMEOUT');
        expect(error.isRetryable).toBe(true);
      }
    }, 5000);

    it('does not count failed calls', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: 'bad' } }, 400));

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      await expect(client.searchText('test')).rejects.toBeInstanceOf(PlacesApiError);

      expect(client.getCallCount()).toBe(0);
    });
  });

  describe('getPlaceDetails', () => {
    it('returns parsed place details on success', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(rawDetails));

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      const details = await client.getPlaceDetails('place-food-bank');

      expect(details.websiteUri).toBe('https://harbor.example.org');
      expect(details.reviews).toHaveLength(2);

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://places.googleapis.com/v1/places/place-food-bank');
      expect(init?.method).toBe('GET');
    });

    it('throws on 404', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ error: { code: 404, message: 'Place not found', status: 'NOT_FOUND' } }, 404)
      );

      const client = new PlacesClient({ apiKey: 'test-api-key' });

      await expect(client.getPlaceDetails('invalid-id')).rejects.toThrow('Place not found: Place not found');
    });
  });

  describe('call counting', () => {
    it('tracks calls per endpoint', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ places: [] }));
      mockFetch.mockResolvedValueOnce(jsonResponse({ places: [] }));
      mockFetch.mockResolvedValueOnce(jsonResponse(rawDetails));

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      await client.searchText('query 1');
      await client.searchText('query 2');
      await client.getPlaceDetails('place-food-bank');

      expect(client.getCallCount()).toBe(3);
      expect(client.getUsage()).toEqual({ textSearch: 2, placeDetails: 1 });
    });

    it('resets call count', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ places: [] }));

      const client = new PlacesClient({ apiKey: 'test-api-key' });
      await client.searchText('test');
      client.resetCallCount();

      expect(client.getCallCount()).toBe(0);
    });
  });
});

describe('describeError', () => {
  it('uses the message of Error instances', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('stringifies other values', () => {
    expect(describeError(42)).toBe('42');
  });
});

// ============================================================================
// Mapper Tests
// ============================================================================

describe('mapPlaceToRecord', () => {
  it('maps fields and computes distance from the origin', () => {
    const place: Place = {
      id: 'p1',
      displayName: { text: 'Equator Pantry' },
      formattedAddress: '1 Line Rd',
      location: { latitude: 0, longitude: 0.01 },
      rating: 4.2,
      userRatingCount: 10,
      businessStatus: 'OPERATIONAL',
      types: ['food_bank'],
    };

    const record = mapPlaceToRecord(place, { lat: 0, lng: 0 });

    expect(record).toEqual({
      placeId: 'p1',
      name: 'Equator Pantry',
      address: '1 Line Rd',
      latitude: 0,
      longitude: 0.01,
      rating: 4.2,
      userRatingsTotal: 10,
      types: ['food_bank'],
      category: 'food_bank',
      priceLevel: null,
      businessStatus: 'OPERATIONAL',
      permanentlyClosed: false,
      distanceMeters: 1111.95,
      distanceKm: 1.11,
    });
  });

  it('prefers the primary type as category', () => {
    const record = mapPlaceToRecord({ ...rawFoodBank, types: ['point_of_interest'] });
    expect(record.category).toBe('food_bank');
  });

  it('leaves distance null without an origin', () => {
    const record = mapPlaceToRecord(rawShelter);
    expect(record.distanceMeters).toBeNull();
    expect(record.distanceKm).toBeNull();
  });

  it('uses placeholders for missing name and address', () => {
    const record = mapPlaceToRecord({}, { lat: 0, lng: 0 });

    expect(record.name).toBe('Unknown');
    expect(record.address).toBe('No address available');
    expect(record.placeId).toBe('');
    expect(record.distanceMeters).toBeNull();
    expect(record.businessStatus).toBe('UNKNOWN');
  });

  it('flags permanently closed places', () => {
    const record = mapPlaceToRecord({ ...rawShelter, businessStatus: 'CLOSED_PERMANENTLY' });
    expect(record.permanentlyClosed).toBe(true);
  });

  it('maps lists preserving order', () => {
    const records = mapPlacesToRecords([rawFoodBank, rawShelter]);
    expect(records.map((r) => r.name)).toEqual(['Harbor Food Bank', 'Eastside Shelter']);
  });
});

describe('mapReview', () => {
  it('maps author attribution and text', () => {
    expect(mapReview(rawDetails.reviews[0])).toEqual({
      authorName: 'Sam',
      authorPhoto: 'https://example.org/sam.png',
      rating: 5,
      text: 'Welcoming volunteers.',
      timeDescription: 'a month ago',
      publishTime: '2026-09-01T10:00:00Z',
    });
  });

  it('defaults missing fields', () => {
    expect(mapReview({})).toEqual({
      authorName: 'Anonymous',
      authorPhoto: '',
      rating: 0,
      text: '',
      timeDescription: '',
      publishTime: '',
    });
  });
});

describe('mapDetails', () => {
  const details: PlaceDetails = rawDetails;

  it('extracts contact fields, hours and photo count', () => {
    const fields = mapDetails(details, 3);

    expect(fields.phone).toBe('+1 206-555-0100');
    expect(fields.website).toBe('https://harbor.example.org');
    expect(fields.openingHours).toHaveLength(2);
    expect(fields.photosAvailable).toBe(2);
    expect(fields.userRatingsTotal).toBe(125);
    expect(fields.reviewCount).toBe(2);
  });

  it('keeps at most maxReviews reviews', () => {
    const fields = mapDetails(details, 1);

    expect(fields.reviews).toHaveLength(1);
    expect(fields.reviews[0].authorName).toBe('Sam');
    expect(fields.reviewCount).toBe(1);
  });

  it('defaults empty details', () => {
    expect(mapDetails({}, 3)).toEqual({
      reviews: [],
      reviewCount: 0,
      openingHours: [],
      phone: '',
      website: '',
      businessStatus: 'UNKNOWN',
      photosAvailable: 0,
      userRatingsTotal: null,
    });
  });
});
