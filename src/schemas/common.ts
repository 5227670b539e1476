/**
 * Common Zod Schemas - Shared types used across the search pipeline
 */

import { z } from 'zod';

// ============================================
// Coordinates Schema
// ============================================

/**
 * Geographic coordinates (latitude/longitude) in decimal degrees.
 */
export const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export type Coordinates = z.infer<typeof CoordinatesSchema>;

// ============================================
// ZIP Code Schema
// ============================================

/**
 * US ZIP code, either 5 digits or ZIP+4 (`98101-1234`).
 */
export const ZipCodeSchema = z
  .string()
  .trim()
  .regex(/^\d{5}(-\d{4})?$/, 'ZIP code must be 5 digits (optionally followed by -NNNN)');

export type ZipCode = z.infer<typeof ZipCodeSchema>;

// ============================================
// Output Format Schema
// ============================================

/**
 * File formats the writer can produce.
 */
export const OutputFormatSchema = z.enum(['json', 'csv', 'both']);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
