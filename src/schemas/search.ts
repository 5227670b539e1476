/**
 * Search Request Schemas
 */

import { z } from 'zod';
import { CoordinatesSchema, ZipCodeSchema } from './common.js';

/** Largest radius the Places API accepts for a location bias circle */
export const MAX_RADIUS_METERS = 50000;

/**
 * Where a search is centred: explicit coordinates, a ZIP code resolved
 * through the coordinate table, or every ZIP code of a batch.
 */
export const SearchOriginSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('coordinates'),
    coordinates: CoordinatesSchema,
  }),
  z.object({
    kind: z.literal('zip'),
    zipCode: ZipCodeSchema,
  }),
  z.object({
    kind: z.literal('batch'),
    zipCodes: z.array(ZipCodeSchema).min(1, 'At least one ZIP code is required'),
  }),
]);

export type SearchOrigin = z.infer<typeof SearchOriginSchema>;

/**
 * A keyword search around an origin.
 */
export const SearchRequestSchema = z.object({
  origin: SearchOriginSchema,
  keywords: z.array(z.string().trim().min(1)).min(1, 'At least one keyword is required'),
  /** Radius in meters */
  radius: z
    .number()
    .int(`Radius must be an integer from 1 to ${MAX_RADIUS_METERS} meters`)
    .min(1, `Radius must be an integer from 1 to ${MAX_RADIUS_METERS} meters`)
    .max(MAX_RADIUS_METERS, `Radius must be an integer from 1 to ${MAX_RADIUS_METERS} meters`),
  maxResults: z
    .number()
    .int('Max results must be an integer >= 1')
    .min(1, 'Max results must be an integer >= 1'),
});

export type SearchRequest = z.infer<typeof SearchRequestSchema>;

/**
 * Human-readable description of a search, used in reports.
 */
export interface SearchInfo {
  /** e.g. "ZIP Code Search" */
  type: string;
  /** e.g. "ZIP 98101" */
  location: string;
  /** Comma-separated keyword list */
  keywords: string;
}
