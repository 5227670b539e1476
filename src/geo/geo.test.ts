/**
 * Geo Tests
 *
 * Unit tests covering:
 * - haversineDistance / round2
 * - ZipLookup: loading, exact coordinates, ZIP+4 handling, missing files
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { haversineDistance, round2, EARTH_RADIUS_METERS } from './distance.js';
import { ZipLookup, normalizeZip, DEFAULT_ZIP_TABLE_PATH } from './zip-lookup.js';

// ============================================================================
// Distance
// ============================================================================

describe('haversineDistance', () => {
  it('returns 0 for the same point', () => {
    expect(haversineDistance({ lat: 47.6, lng: -122.3 }, { lat: 47.6, lng: -122.3 })).toBe(0);
  });

  it('matches one degree of longitude on the equator', () => {
    const expected = (EARTH_RADIUS_METERS * Math.PI) / 180; // ~111194.93
    expect(haversineDistance({ lat: 0, lng: 0 }, { lat: 0, lng: 1 })).toBeCloseTo(expected, 3);
  });

  it('is symmetric', () => {
    const a = { lat: 47.6101, lng: -122.3344 };
    const b = { lat: 47.6148, lng: -122.2045 };
    expect(haversineDistance(a, b)).toBeCloseTo(haversineDistance(b, a), 6);
  });
});

describe('round2', () => {
  it('rounds to two decimals', () => {
    expect(round2(1234.5678)).toBe(1234.57);
    expect(round2(0.004)).toBe(0);
  });
});

// ============================================================================
// ZipLookup
// ============================================================================

describe('normalizeZip', () => {
  it('drops the ZIP+4 suffix and whitespace', () => {
    expect(normalizeZip(' 98101-1234 ')).toBe('98101');
    expect(normalizeZip('10001')).toBe('10001');
  });
});

describe('ZipLookup', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'zip-lookup-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('returns the table coordinates exactly for a known ZIP', async () => {
    const filePath = path.join(tempDir, 'zips.json');
    await fs.writeFile(
      filePath,
      JSON.stringify({ '12345': { lat: 42.8142, lng: -73.9396, city: 'Schenectady', state: 'NY' } })
    );

    const lookup = await ZipLookup.load(filePath);

    expect(lookup.resolve('12345')).toEqual({ lat: 42.8142, lng: -73.9396, city: 'Schenectady', state: 'NY' });
  });

  it('resolves ZIP+4 codes by their first five digits', () => {
    const lookup = new ZipLookup({ '98101': { lat: 47.6101, lng: -122.3344, city: 'Seattle', state: 'WA' } });
    expect(lookup.resolve('98101-2000')).toMatchObject({ lat: 47.6101, lng: -122.3344 });
  });

  it('returns undefined for unknown ZIP codes', () => {
    const lookup = new ZipLookup({});
    expect(lookup.resolve('99999')).toBeUndefined();
  });

  it('does not resolve inherited object keys', () => {
    const lookup = new ZipLookup({});
    expect(lookup.resolve('constructor')).toBeUndefined();
  });

  it('defaults city and state to empty strings', async () => {
    const filePath = path.join(tempDir, 'zips.json');
    await fs.writeFile(filePath, JSON.stringify({ '11111': { lat: 1, lng: 2 } }));

    const lookup = await ZipLookup.load(filePath);

    expect(lookup.resolve('11111')).toEqual({ lat: 1, lng: 2, city: '', state: '' });
  });

  it('returns an empty table when the file is missing', async () => {
    const lookup = await ZipLookup.load(path.join(tempDir, 'missing.json'));
    expect(lookup.size).toBe(0);
  });

  it('throws on invalid JSON', async () => {
    const filePath = path.join(tempDir, 'zips.json');
    await fs.writeFile(filePath, '{ not json');

    await expect(ZipLookup.load(filePath)).rejects.toThrow(`Invalid JSON in file: ${filePath}`);
  });

  it('throws on entries with out-of-range coordinates', async () => {
    const filePath = path.join(tempDir, 'zips.json');
    await fs.writeFile(filePath, JSON.stringify({ '11111': { lat: 100, lng: 2 } }));

    await expect(ZipLookup.load(filePath)).rejects.toThrow(
      `Invalid contents in ${filePath}: 11111.lat: Number must be less than or equal to 90`
    );
  });

  it('loads the bundled table', async () => {
    const lookup = await ZipLookup.load(DEFAULT_ZIP_TABLE_PATH);

    expect(lookup.size).toBeGreaterThan(0);
    expect(lookup.resolve('98101')).toMatchObject({ lat: 47.6101, lng: -122.3344 });
  });
});
