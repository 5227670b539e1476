/**
 * Configuration Module
 *
 * Loads and validates environment variables for the donation finder.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { resolve } from 'node:path';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Either name is accepted for the Places key
  GOOGLE_PLACES_API_KEY: z.string().optional(),
  GOOGLE_MAPS_API_KEY: z.string().optional(),

  // File locations (relative to the working directory)
  DONATION_FINDER_CONFIG: z.string().default('config.json'),
  GMAIL_CREDENTIALS_PATH: z.string().default('credentials.json'),
  GMAIL_TOKEN_PATH: z.string().default('token.json'),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Build the configuration object from an environment source.
 *
 * @throws ZodError when a variable has an invalid value
 */
export function loadEnvConfig(source: NodeJS.ProcessEnv, cwd: string = process.cwd()) {
  const env: Env = envSchema.parse(source);

  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    // API Keys (empty strings count as missing)
    apiKeys: {
      googlePlaces: env.GOOGLE_PLACES_API_KEY || env.GOOGLE_MAPS_API_KEY || undefined,
    },

    // Local files
    paths: {
      runConfig: resolve(cwd, env.DONATION_FINDER_CONFIG),
      gmailCredentials: resolve(cwd, env.GMAIL_CREDENTIALS_PATH),
      gmailToken: resolve(cwd, env.GMAIL_TOKEN_PATH),
    },
  } as const;
}

export type Config = ReturnType<typeof loadEnvConfig>;
export type ApiKeyName = keyof Config['apiKeys'];

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * Application configuration singleton
 */
export const config: Config = loadEnvConfig(process.env);

// Warn about a missing API key (but don't fail: email/cleanup commands work without it)
if (!config.apiKeys.googlePlaces && !config.isTest) {
  console.warn('Warning: Missing API key: GOOGLE_PLACES_API_KEY (or GOOGLE_MAPS_API_KEY)');
  console.warn('  Searches will be unavailable. See .env.example for setup.');
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(api: ApiKeyName, from: Config = config): string {
  const key = from.apiKeys[api];
  if (!key) {
    throw new Error(
      'Missing required API key: GOOGLE_PLACES_API_KEY (or GOOGLE_MAPS_API_KEY). ' +
        'Please set it in your environment or .env file.'
    );
  }
  return key;
}

// Re-export cost and rate limit configuration
export * from './costs.js';
export * from './limits.js';
