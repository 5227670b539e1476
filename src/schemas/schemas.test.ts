/**
 * Unit Tests for Zod Schemas
 *
 * Tests each schema with valid and invalid data to ensure proper validation.
 */

import { describe, it, expect } from '@jest/globals';

import {
  CoordinatesSchema,
  ZipCodeSchema,
  OutputFormatSchema,
  ReviewSchema,
  PlaceRecordSchema,
  SearchRequestSchema,
  RunConfigSchema,
  EmailSettingsSchema,
  createDefaultRunConfig,
  DEFAULT_KEYWORDS,
  DEFAULT_SUBJECT_TEMPLATE,
  type PlaceRecord,
} from './index.js';

// ============================================================================
// Common Types
// ============================================================================

describe('CoordinatesSchema', () => {
  it('accepts valid coordinates', () => {
    expect(CoordinatesSchema.safeParse({ lat: 47.6101, lng: -122.3344 }).success).toBe(true);
  });

  it('rejects latitude out of range', () => {
    expect(CoordinatesSchema.safeParse({ lat: 91, lng: 0 }).success).toBe(false);
  });

  it('rejects longitude out of range', () => {
    expect(CoordinatesSchema.safeParse({ lat: 0, lng: -181 }).success).toBe(false);
  });
});

describe('ZipCodeSchema', () => {
  it('accepts five digit ZIP codes', () => {
    expect(ZipCodeSchema.parse('98101')).toBe('98101');
  });

  it('accepts ZIP+4 and trims whitespace', () => {
    expect(ZipCodeSchema.parse(' 98101-1234 ')).toBe('98101-1234');
  });

  it('rejects malformed ZIP codes', () => {
    expect(ZipCodeSchema.safeParse('9810').success).toBe(false);
    expect(ZipCodeSchema.safeParse('abcde').success).toBe(false);
  });
});

describe('OutputFormatSchema', () => {
  it('accepts json, csv and both', () => {
    expect(OutputFormatSchema.options).toEqual(['json', 'csv', 'both']);
  });

  it('rejects other formats', () => {
    expect(OutputFormatSchema.safeParse('xml').success).toBe(false);
  });
});

// ============================================================================
// Places
// ============================================================================

describe('ReviewSchema', () => {
  it('defaults the author to Anonymous', () => {
    const review = ReviewSchema.parse({
      rating: 5,
      text: 'Friendly volunteers',
      timeDescription: 'a week ago',
      publishTime: '',
    });

    expect(review.authorName).toBe('Anonymous');
    expect(review.authorPhoto).toBe('');
  });

  it('rejects ratings above 5', () => {
    const result = ReviewSchema.safeParse({
      authorName: 'A',
      rating: 6,
      text: '',
      timeDescription: '',
      publishTime: '',
    });
    expect(result.success).toBe(false);
  });
});

describe('PlaceRecordSchema', () => {
  const record: PlaceRecord = {
    placeId: 'place-1',
    name: 'Harbor Food Bank',
    address: '100 Pine St, Seattle, WA 98101, USA',
    latitude: 47.61,
    longitude: -122.33,
    rating: 4.6,
    userRatingsTotal: 120,
    types: ['food_bank', 'point_of_interest'],
    category: 'food_bank',
    priceLevel: null,
    businessStatus: 'OPERATIONAL',
    permanentlyClosed: false,
    distanceMeters: 250.5,
    distanceKm: 0.25,
  };

  it('accepts a search-only record', () => {
    expect(PlaceRecordSchema.safeParse(record).success).toBe(true);
  });

  it('accepts an enriched record', () => {
    const enriched = {
      ...record,
      phone: '+1 206-555-0100',
      website: 'https://harbor.example.org',
      email: 'info@harbor.example.org',
      openingHours: ['Monday: 9:00 AM – 5:00 PM'],
      reviews: [],
      reviewCount: 0,
      photosAvailable: 3,
      detailsFetched: true,
    };
    expect(PlaceRecordSchema.safeParse(enriched).success).toBe(true);
  });

  it('accepts a record without distance', () => {
    expect(
      PlaceRecordSchema.safeParse({ ...record, distanceMeters: null, distanceKm: null }).success
    ).toBe(true);
  });
});

// ============================================================================
// Search Requests
// ============================================================================

describe('SearchRequestSchema', () => {
  it('accepts a coordinate request and trims keywords', () => {
    const request = SearchRequestSchema.parse({
      origin: { kind: 'coordinates', coordinates: { lat: 47.6, lng: -122.3 } },
      keywords: [' charity '],
      radius: 5000,
      maxResults: 20,
    });
    expect(request.keywords).toEqual(['charity']);
  });

  it('accepts a batch of ZIP codes and rejects an empty batch', () => {
    const base = { keywords: ['shelter'], radius: 1000, maxResults: 5 };

    expect(SearchRequestSchema.safeParse({ ...base, origin: { kind: 'batch', zipCodes: ['98101'] } }).success).toBe(
      true
    );
    expect(SearchRequestSchema.safeParse({ ...base, origin: { kind: 'batch', zipCodes: [] } }).success).toBe(false);
  });

  it('accepts a ZIP request', () => {
    const result = SearchRequestSchema.safeParse({
      origin: { kind: 'zip', zipCode: '98101' },
      keywords: ['shelter'],
      radius: 1000,
      maxResults: 5,
    });
    expect(result.success).toBe(true);
  });

  it('rejects an empty keyword list', () => {
    const result = SearchRequestSchema.safeParse({
      origin: { kind: 'zip', zipCode: '98101' },
      keywords: [],
      radius: 1000,
      maxResults: 5,
    });
    expect(result.success).toBe(false);
  });

  it('rejects a radius above the provider limit', () => {
    const result = SearchRequestSchema.safeParse({
      origin: { kind: 'zip', zipCode: '98101' },
      keywords: ['shelter'],
      radius: 50001,
      maxResults: 5,
    });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Radius must be an integer from 1 to 50000 meters');
  });
});

// ============================================================================
// Run Configuration
// ============================================================================

describe('RunConfigSchema', () => {
  it('fills every section with defaults', () => {
    const config = createDefaultRunConfig();

    expect(config.zipCodes.enabled).toEqual([]);
    expect(config.email.enabled).toBe(true);
    expect(config.email.senderName).toBe('Donation Finder');
    expect(config.email.subjectTemplate).toBe(DEFAULT_SUBJECT_TEMPLATE);
    expect(config.search.keywords).toEqual([...DEFAULT_KEYWORDS]);
    expect(config.search.radius).toBe(5000);
    expect(config.search.maxResults).toBe(20);
  });

  it('keeps provided values', () => {
    const config = RunConfigSchema.parse({
      zipCodes: { enabled: ['98101', '10001'] },
      email: { recipient: 'volunteer@example.org' },
    });

    expect(config.zipCodes.enabled).toEqual(['98101', '10001']);
    expect(config.email.recipient).toBe('volunteer@example.org');
  });

  it('rejects invalid ZIP codes in the batch list', () => {
    const result = RunConfigSchema.safeParse({ zipCodes: { enabled: ['123'] } });
    expect(result.success).toBe(false);
  });
});

describe('EmailSettingsSchema', () => {
  it('rejects a malformed recipient', () => {
    expect(EmailSettingsSchema.safeParse({ recipient: 'not-an-email' }).success).toBe(false);
  });
});
