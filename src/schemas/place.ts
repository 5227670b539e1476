/**
 * Place Schemas - Search results as written to the output files
 */

import { z } from 'zod';

// ============================================
// Review Schema
// ============================================

/**
 * A single user review attached to a place.
 */
export const ReviewSchema = z.object({
  authorName: z.string().default('Anonymous'),
  authorPhoto: z.string().default(''),
  /** Star rating (0 when the provider omits it) */
  rating: z.number().min(0).max(5),
  text: z.string(),
  /** Relative description such as "2 weeks ago" */
  timeDescription: z.string(),
  /** ISO8601 publish time, empty when unknown */
  publishTime: z.string(),
});

export type Review = z.infer<typeof ReviewSchema>;

// ============================================
// Place Record Schema
// ============================================

/**
 * One organization found by the search.
 *
 * Identity is the provider id; the name + address pair is the fallback
 * identity used for deduplication.
 */
export const PlaceRecordSchema = z.object({
  placeId: z.string(),
  name: z.string(),
  address: z.string(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  rating: z.number().nullable(),
  userRatingsTotal: z.number().int().nullable(),
  types: z.array(z.string()),
  /** Primary category tag reported by the provider */
  category: z.string().nullable(),
  priceLevel: z.string().nullable(),
  businessStatus: z.string(),
  permanentlyClosed: z.boolean(),
  /** Null when the search had no origin (text-search fallback) */
  distanceMeters: z.number().nullable(),
  distanceKm: z.number().nullable(),

  // Filled in by the enricher
  phone: z.string().optional(),
  website: z.string().optional(),
  email: z.string().optional(),
  openingHours: z.array(z.string()).optional(),
  reviews: z.array(ReviewSchema).optional(),
  reviewCount: z.number().int().optional(),
  photosAvailable: z.number().int().optional(),
  detailsFetched: z.boolean().optional(),
});

export type PlaceRecord = z.infer<typeof PlaceRecordSchema>;
