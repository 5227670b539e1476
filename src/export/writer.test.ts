/**
 * Results Export Tests
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { mapPlaceToRecord } from '../places/mapper.js';
import type { PlaceRecord, Review } from '../schemas/place.js';
import type { Logger } from '../logger.js';
import { saveResults, toCsv, flattenRecord, formatReview, csvColumns } from './writer.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const plain = mapPlaceToRecord({
  id: 'p1',
  displayName: { text: 'Harbor "Food" Bank' },
  formattedAddress: '100 Pine St',
  rating: 4.5,
  userRatingCount: 12,
  businessStatus: 'OPERATIONAL',
  types: ['food_bank', 'establishment'],
});

const welcoming: Review = {
  authorName: 'Sam',
  authorPhoto: '',
  rating: 5,
  text: 'Welcoming.',
  timeDescription: '',
  publishTime: '',
};

const enriched: PlaceRecord = {
  ...mapPlaceToRecord({ id: 'p2', displayName: { text: 'Eastside Shelter' }, formattedAddress: '200 Main St' }),
  email: 'info@eastside.example.org',
  openingHours: ['Monday: 9 AM', 'Tuesday: 9 AM'],
  reviews: [
    welcoming,
    { authorName: 'Lee', authorPhoto: '', rating: 4, text: 'Helpful staff.', timeDescription: '', publishTime: '' },
  ],
};

// ============================================================================
// Flattening
// ============================================================================

describe('formatReview', () => {
  it('renders author, rating and text', () => {
    expect(formatReview(welcoming)).toBe('Sam (5): Welcoming.');
  });
});

describe('flattenRecord', () => {
  it('joins string lists with semicolons', () => {
    expect(flattenRecord(plain).types).toBe('food_bank; establishment');
    expect(flattenRecord(enriched).openingHours).toBe('Monday: 9 AM; Tuesday: 9 AM');
  });

  it('joins reviews with pipes', () => {
    expect(flattenRecord(enriched).reviews).toBe('Sam (5): Welcoming. | Lee (4): Helpful staff.');
  });

  it('omits optional lists that are absent', () => {
    const flat = flattenRecord(plain);

    expect('reviews' in flat).toBe(false);
    expect('openingHours' in flat).toBe(false);
  });
});

describe('csvColumns', () => {
  it('returns the sorted union of keys', () => {
    expect(csvColumns([{ b: 1, a: 2 }, { c: 3, a: 4 }])).toEqual(['a', 'b', 'c']);
  });
});

describe('toCsv', () => {
  it('writes a sorted header and quoted values', () => {
    const [header, row] = toCsv([plain]).split('\n');

    expect(header).toBe(
      '"address","businessStatus","category","distanceKm","distanceMeters","latitude","longitude",' +
        '"name","permanentlyClosed","placeId","priceLevel","rating","types","userRatingsTotal"'
    );
    expect(row).toBe(
      '"100 Pine St","OPERATIONAL","food_bank",,,,,"Harbor ""Food"" Bank",false,"p1",,4.5,"food_bank; establishment",12'
    );
  });

  it('includes columns that only some records have', () => {
    const lines = toCsv([plain, enriched]).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[0]).toContain('"email"');
    expect(lines[0]).toContain('"reviews"');
  });
});

// ============================================================================
// saveResults
// ============================================================================

describe('saveResults', () => {
  let tempDir: string;
  let logger: { [K in keyof Logger]: jest.Mock<Logger[K]> };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'writer-test-'));
    logger = {
      debug: jest.fn<Logger['debug']>(),
      info: jest.fn<Logger['info']>(),
      warn: jest.fn<Logger['warn']>(),
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('writes JSON and CSV for format both', async () => {
    const files = await saveResults([plain, enriched], 'results_98101', 'both', tempDir, logger);

    expect(files).toEqual([path.join(tempDir, 'results_98101.json'), path.join(tempDir, 'results_98101.csv')]);
    const json = JSON.parse(await fs.readFile(files[0], 'utf-8'));
    expect(json).toEqual([plain, enriched]);
    expect(await fs.readFile(files[1], 'utf-8')).toBe(toCsv([plain, enriched]));
  });

  it('pretty prints JSON with two spaces', async () => {
    const [file] = await saveResults([plain], 'results', 'json', tempDir, logger);

    expect(await fs.readFile(file, 'utf-8')).toBe(JSON.stringify([plain], null, 2));
  });

  it('writes only the requested format', async () => {
    const files = await saveResults([plain], 'results', 'csv', tempDir, logger);

    expect(files).toEqual([path.join(tempDir, 'results.csv')]);
    expect(await fs.readdir(tempDir)).toEqual(['results.csv']);
  });

  it('creates the output directory', async () => {
    const outputDir = path.join(tempDir, 'nested', 'out');

    await saveResults([plain], 'results', 'json', outputDir, logger);

    expect(await fs.readdir(outputDir)).toEqual(['results.json']);
  });

  it('logs each file written', async () => {
    await saveResults([plain], 'results', 'json', tempDir, logger);

    expect(logger.info).toHaveBeenCalledWith(`Saved 1 results to ${path.join(tempDir, 'results.json')}`);
  });

  it('writes nothing for an empty list', async () => {
    const files = await saveResults([], 'results', 'both', tempDir, logger);

    expect(files).toEqual([]);
    expect(await fs.readdir(tempDir)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('No results to save');
  });
});
