/**
 * Deduplication of search results across keyword queries.
 *
 * Two records are the same place when they share a provider id, or when
 * their normalized name + address match. The first occurrence wins.
 *
 * @module search/dedupe
 */

import type { PlaceRecord } from '../schemas/place.js';

/**
 * Normalize text for identity comparison.
 *
 * Applies the following transformations in order:
 * 1. Lowercase all characters
 * 2. Remove punctuation (keep only letters, digits and whitespace)
 * 3. Collapse multiple whitespace to single space
 * 4. Trim leading/trailing whitespace
 *
 * @example
 * ```typescript
 * normalizeText('St. Mary\'s  Food-Bank!'); // 'st marys foodbank'
 * ```
 */
export function normalizeText(value: string): string {
  if (!value) {
    return '';
  }

  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '') // Remove punctuation
    .replace(/\s+/g, ' ') // Collapse whitespace
    .trim();
}

/**
 * Name + address identity key.
 */
export function nameAddressKey(record: Pick<PlaceRecord, 'name' | 'address'>): string {
  return `${normalizeText(record.name)}|${normalizeText(record.address)}`;
}

/**
 * Remove duplicate places, keeping the first occurrence.
 *
 * @returns New array; input order is preserved among survivors
 */
export function deduplicatePlaces(records: PlaceRecord[]): PlaceRecord[] {
  const seenIds = new Set<string>();
  const seenKeys = new Set<string>();
  const unique: PlaceRecord[] = [];

  for (const record of records) {
    const key = nameAddressKey(record);
    if ((record.placeId && seenIds.has(record.placeId)) || seenKeys.has(key)) {
      continue;
    }

    if (record.placeId) {
      seenIds.add(record.placeId);
    }
    seenKeys.add(key);
    unique.push(record);
  }

  return unique;
}
