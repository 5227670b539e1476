/**
 * Run Configuration Schema
 *
 * Shape of the `config.json` file read at startup. Every section is optional;
 * a missing file means defaults.
 */

import { z } from 'zod';
import { ZipCodeSchema } from './common.js';
import { MAX_RADIUS_METERS } from './search.js';

// ============================================================================
// Defaults
// ============================================================================

/** Keywords searched when the user gives none */
export const DEFAULT_KEYWORDS = ['food bank', 'charity', 'shelter', 'blood bank'] as const;

export const DEFAULT_RADIUS_METERS = 5000;

export const DEFAULT_MAX_RESULTS = 20;

export const DEFAULT_SUBJECT_TEMPLATE = 'Donation Opportunities Found - {searchType}';

// ============================================================================
// Section Schemas
// ============================================================================

/**
 * ZIP codes searched by `search --zip-batch`.
 */
export const ZipCodesConfigSchema = z.object({
  enabled: z.array(ZipCodeSchema).default([]),
});

export type ZipCodesConfig = z.infer<typeof ZipCodesConfigSchema>;

/**
 * Email delivery settings.
 */
export const EmailSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  recipient: z.string().email().optional(),
  senderName: z.string().min(1).default('Donation Finder'),
  senderEmail: z.string().email().optional(),
  /** Supports {searchType}, {location} and {count} placeholders */
  subjectTemplate: z.string().min(1).default(DEFAULT_SUBJECT_TEMPLATE),
});

export type EmailSettings = z.infer<typeof EmailSettingsSchema>;

/**
 * Search defaults that CLI flags override.
 */
export const SearchDefaultsSchema = z.object({
  keywords: z.array(z.string().trim().min(1)).min(1).default([...DEFAULT_KEYWORDS]),
  radius: z.number().int().positive().max(MAX_RADIUS_METERS).default(DEFAULT_RADIUS_METERS),
  maxResults: z.number().int().positive().default(DEFAULT_MAX_RESULTS),
});

export type SearchDefaults = z.infer<typeof SearchDefaultsSchema>;

// ============================================================================
// RunConfig Schema
// ============================================================================

export const RunConfigSchema = z.object({
  zipCodes: ZipCodesConfigSchema.default({}),
  email: EmailSettingsSchema.default({}),
  search: SearchDefaultsSchema.default({}),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Configuration used when no config.json exists.
 */
export function createDefaultRunConfig(): RunConfig {
  return RunConfigSchema.parse({});
}
