/**
 * Search Command
 *
 * Finds donation opportunities around a ZIP code, every ZIP code enabled in
 * config.json, or a coordinate pair; optionally fetches details and reviews,
 * writes JSON/CSV files and mails the report.
 *
 * @module cli/commands/search
 */

import { Command } from 'commander';
import type { ZodIssue } from 'zod';
import { OutputFormatSchema, type OutputFormat } from '../../schemas/common.js';
import type { PlaceRecord } from '../../schemas/place.js';
import { SearchRequestSchema, type SearchInfo, type SearchOrigin } from '../../schemas/search.js';
import type { EmailSettings, RunConfig } from '../../schemas/run-config.js';
import { config, DEFAULT_MAX_REVIEWS } from '../../config/index.js';
import { PlacesClient } from '../../places/client.js';
import { ZipLookup } from '../../geo/zip-lookup.js';
import { RateLimiter } from '../../search/rate-limiter.js';
import { aggregateSearch, type SearchDeps } from '../../search/aggregator.js';
import { ZipSearcher } from '../../search/zip-search.js';
import { enrichPlaces } from '../../enrichment/enricher.js';
import { saveResults } from '../../export/writer.js';
import {
  getBatchBaseName,
  getCoordinatesBaseName,
  getZipBaseName,
  validateBaseName,
} from '../../storage/paths.js';
import { loadRunConfig } from '../../storage/config.js';
import { EmailSender } from '../../notify/email-sender.js';
import { GmailAuth } from '../../notify/gmail-auth.js';
import { BaseCommand, UsageError, getBaseCommand, EXIT_CODES, type ExitCode } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';
import { formatResults } from '../formatters/results.js';
import { formatRunSummary } from '../formatters/run-summary.js';

// ============================================================================
// Types
// ============================================================================

/** Default output base name */
export const DEFAULT_OUTPUT = 'donation_opportunities';

/**
 * Raw options as commander delivers them.
 */
export interface SearchCommandOptions {
  zip?: string;
  zipBatch?: boolean;
  lat?: string;
  lng?: string;
  keywords?: string;
  radius?: string;
  maxResults?: string;
  includeReviews?: boolean;
  maxReviews?: string;
  reviewsForAll?: boolean;
  output?: string;
  outputDir?: string;
  format?: string;
  email?: boolean;
}

export type SearchMode = SearchOrigin;

/**
 * Validated search request.
 */
export interface SearchPlan {
  mode: SearchMode;
  keywords: string[];
  radius: number;
  maxResults: number;
  includeReviews: boolean;
  maxReviews: number;
  reviewsForAll: boolean;
  output: string;
  outputDir: string;
  format: OutputFormat;
  email: boolean;
}

/**
 * Collaborators for a search run, replaceable in tests.
 */
export interface SearchServices {
  client: PlacesClient;
  limiter: RateLimiter;
  lookup: ZipLookup;
  createEmailSender: (settings: EmailSettings) => EmailSender;
}

export interface SearchOutcome {
  places: PlaceRecord[];
  searchInfo: SearchInfo;
  /** Every file written, combined results first */
  files: string[];
  /** Places enriched with details (undefined when not requested) */
  enriched?: number;
  emailMessageId?: string;
  /** Exit code; non-zero when mailing the report failed */
  exitCode: ExitCode;
}

// ============================================================================
// Option Parsing
// ============================================================================

function parseNumber(value: string, flag: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new UsageError(`Invalid value for ${flag}: '${value}'`);
  }
  return parsed;
}

function parseInteger(value: string, flag: string, min: number): number {
  const parsed = parseNumber(value, flag);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new UsageError(`${flag} must be an integer >= ${min} (got '${value}')`);
  }
  return parsed;
}

/**
 * Split a comma-separated keyword list.
 */
export function parseKeywords(value: string): string[] {
  return value
    .split(',')
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0);
}

function parseMode(options: SearchCommandOptions, runConfig: RunConfig): SearchMode {
  const usesCoordinates = options.lat !== undefined || options.lng !== undefined;
  const selected = [options.zip !== undefined, options.zipBatch === true, usesCoordinates].filter(Boolean).length;

  if (selected === 0) {
    throw new UsageError('Choose a location: --zip <code>, --zip-batch, or --lat <n> --lng <n>');
  }
  if (selected > 1) {
    throw new UsageError('Use only one of --zip, --zip-batch, or --lat/--lng');
  }

  if (options.zip !== undefined) {
    return { kind: 'zip', zipCode: options.zip };
  }

  if (options.zipBatch) {
    const zipCodes = runConfig.zipCodes.enabled;
    if (zipCodes.length === 0) {
      throw new UsageError('No ZIP codes enabled in configuration (zipCodes.enabled)');
    }
    return { kind: 'batch', zipCodes };
  }

  if (options.lng === undefined) {
    throw new UsageError('--lng is required when using --lat');
  }
  if (options.lat === undefined) {
    throw new UsageError('--lat is required when using --lng');
  }

  return {
    kind: 'coordinates',
    coordinates: { lat: parseNumber(options.lat, '--lat'), lng: parseNumber(options.lng, '--lng') },
  };
}

/**
 * Turn the first search request issue into a message naming the flag.
 */
function requestError(issue: ZodIssue | undefined, options: SearchCommandOptions): UsageError {
  const [field, originField, ...rest] = issue?.path ?? [];
  const message = issue?.message ?? 'Invalid search request';

  if (field === 'origin' && originField === 'zipCode') {
    return new UsageError(`Invalid ZIP code '${options.zip}': ${message}`);
  }
  if (field === 'origin' && originField === 'coordinates') {
    return new UsageError(`Invalid coordinates: ${rest.join('.')} ${message}`);
  }
  if (field === 'radius') {
    return new UsageError(`Invalid --radius '${options.radius}': ${message}`);
  }
  if (field === 'maxResults') {
    return new UsageError(`Invalid --max-results '${options.maxResults}': ${message}`);
  }
  return new UsageError(message);
}

/**
 * Validate command options, falling back to the search defaults from
 * config.json.
 *
 * @throws UsageError on missing, conflicting or malformed flags
 */
export function parseSearchOptions(options: SearchCommandOptions, runConfig: RunConfig): SearchPlan {
  const request = SearchRequestSchema.safeParse({
    origin: parseMode(options, runConfig),
    keywords: options.keywords !== undefined ? parseKeywords(options.keywords) : runConfig.search.keywords,
    radius: options.radius !== undefined ? parseNumber(options.radius, '--radius') : runConfig.search.radius,
    maxResults:
      options.maxResults !== undefined ? parseNumber(options.maxResults, '--max-results') : runConfig.search.maxResults,
  });
  if (!request.success) {
    throw requestError(request.error.issues[0], options);
  }

  const format = OutputFormatSchema.safeParse(options.format ?? 'both');
  if (!format.success) {
    throw new UsageError(`Invalid format '${options.format}' (expected json, csv or both)`);
  }

  const output = options.output ?? DEFAULT_OUTPUT;
  try {
    validateBaseName(output);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  return {
    mode: request.data.origin,
    keywords: request.data.keywords,
    radius: request.data.radius,
    maxResults: request.data.maxResults,
    includeReviews: options.includeReviews === true,
    maxReviews:
      options.maxReviews !== undefined ? parseInteger(options.maxReviews, '--max-reviews', 0) : DEFAULT_MAX_REVIEWS,
    reviewsForAll: options.reviewsForAll === true,
    output,
    outputDir: options.outputDir ?? '.',
    format: format.data,
    email: options.email === true,
  };
}

/**
 * Report labels for a search.
 */
export function describeSearch(plan: SearchPlan): SearchInfo {
  const keywords = plan.keywords.join(', ');
  switch (plan.mode.kind) {
    case 'zip':
      return { type: 'ZIP Code Search', location: `ZIP ${plan.mode.zipCode}`, keywords };
    case 'batch':
      return {
        type: 'Batch ZIP Code Search',
        location: `${plan.mode.zipCodes.length} ZIP codes: ${plan.mode.zipCodes.join(', ')}`,
        keywords,
      };
    case 'coordinates':
      return {
        type: 'Coordinates Search',
        location: `Lat: ${plan.mode.coordinates.lat}, Lng: ${plan.mode.coordinates.lng}`,
        keywords,
      };
  }
}

// ============================================================================
// Search Run
// ============================================================================

interface Collected {
  places: PlaceRecord[];
  baseName: string;
  /** Per-ZIP lists of a batch, written unenriched */
  perZip?: Map<string, PlaceRecord[]>;
}

async function collect(plan: SearchPlan, services: SearchServices, base: BaseCommand): Promise<Collected> {
  const deps: SearchDeps = { client: services.client, limiter: services.limiter, logger: base };
  const zipOptions = { keywords: plan.keywords, radius: plan.radius, maxResults: plan.maxResults };
  const mode = plan.mode;

  switch (mode.kind) {
    case 'zip': {
      base.info(`🔍 Searching for donation opportunities in ZIP code: ${mode.zipCode}`);
      base.info(`🔑 Keywords: ${plan.keywords.join(', ')}`);
      base.info(`📏 Radius: ${plan.radius}m`);
      base.blank();

      const result = await new ZipSearcher(services.lookup, deps).searchByZip(mode.zipCode, zipOptions);
      return { places: result.places, baseName: getZipBaseName(plan.output, result.zipCode) };
    }

    case 'batch': {
      base.info(`🔍 Batch searching ${mode.zipCodes.length} ZIP codes: ${mode.zipCodes.join(', ')}`);
      base.info(`🔑 Keywords: ${plan.keywords.join(', ')}`);
      base.blank();

      const result = await new ZipSearcher(services.lookup, deps).searchByZipBatch(mode.zipCodes, zipOptions);
      return { places: result.combined, baseName: getBatchBaseName(plan.output), perZip: result.byZip };
    }

    case 'coordinates': {
      const { lat, lng } = mode.coordinates;
      base.info(`🔍 Searching for donation opportunities at coordinates: ${lat}, ${lng}`);
      base.info(`🔑 Keywords: ${plan.keywords.join(', ')}`);
      base.info(`📏 Radius: ${plan.radius}m`);
      base.blank();

      const result = await aggregateSearch(
        {
          origin: mode.coordinates,
          keywords: plan.keywords.map((keyword) => `${keyword} near me`),
          radius: plan.radius,
          maxResults: plan.maxResults,
          minRating: 0,
          sortByDistance: true,
        },
        deps
      );
      return { places: result.places, baseName: getCoordinatesBaseName(plan.output) };
    }
  }
}

/**
 * Run a validated search end to end.
 *
 * Email problems are reported but do not discard the saved files; they set
 * a non-zero exit code.
 */
export async function runSearch(
  plan: SearchPlan,
  runConfig: RunConfig,
  services: SearchServices,
  base: BaseCommand
): Promise<SearchOutcome> {
  const startedAt = Date.now();
  const searchInfo = describeSearch(plan);
  const collected = await collect(plan, services, base);
  let places = collected.places;

  if (places.length === 0) {
    formatResults(places).forEach((line) => console.log(line));
    return { places, searchInfo, files: [], exitCode: EXIT_CODES.SUCCESS };
  }

  let enriched: number | undefined;
  if (plan.includeReviews) {
    base.info(`\n🔍 Fetching detailed reviews for ${places.length} places...`);
    const spinner = createSpinner('Fetching place details...', {
      enabled: process.stdout.isTTY === true && !base.isVerbose(),
      silent: base.isQuiet(),
    }).start();

    try {
      const result = await enrichPlaces(
        places,
        {
          maxReviews: plan.maxReviews,
          includeAll: plan.reviewsForAll,
          onProgress: (index, total, place) => spinner.progress(index + 1, total, place.name),
        },
        { client: services.client, limiter: services.limiter, logger: base }
      );
      spinner.succeed(`Fetched details for ${result.enriched} of ${places.length} places`);
      places = result.places;
      enriched = result.enriched;
    } catch (error) {
      spinner.fail('Fetching place details failed');
      throw error;
    }
  }

  if (collected.perZip) {
    base.info('\n🎯 Combined results from all ZIP codes:');
  }
  formatResults(places, { compact: base.isQuiet(), showReviews: plan.includeReviews }).forEach((line) =>
    console.log(line)
  );

  const combinedFiles = await saveResults(places, collected.baseName, plan.format, plan.outputDir, base);
  const files = [...combinedFiles];

  if (collected.perZip) {
    for (const [zipCode, zipPlaces] of collected.perZip) {
      if (zipPlaces.length > 0) {
        const baseName = getZipBaseName(plan.output, zipCode);
        files.push(...(await saveResults(zipPlaces, baseName, plan.format, plan.outputDir, base)));
      }
    }
  }

  let emailMessageId: string | undefined;
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;

  if (plan.email) {
    const sender = services.createEmailSender(runConfig.email);
    if (!(await sender.isConfigured())) {
      base.warn('📧 Email not configured - skipping email delivery');
    } else {
      try {
        // Per-ZIP files of a batch are not attached
        const sent = await sender.sendResults(places, searchInfo, combinedFiles);
        emailMessageId = sent.messageId;
        base.success(`📧 Email sent to ${runConfig.email.recipient}`);
      } catch (error) {
        base.warn('📧 Email sending failed');
        exitCode = base.reportError(error);
      }
    }
  }

  base.blank();
  base.info(
    formatRunSummary({
      searchInfo,
      resultCount: places.length,
      enriched,
      files,
      usage: services.client.getUsage(),
      totalCalls: services.limiter.getTotalCalls(),
      durationMs: Date.now() - startedAt,
      emailMessageId,
    })
  );

  return { places, searchInfo, files, enriched, emailMessageId, exitCode };
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Build the production collaborators.
 *
 * @throws Error if no Places API key is configured
 */
export async function createSearchServices(base: BaseCommand): Promise<SearchServices> {
  const auth = new GmailAuth({
    credentialsPath: config.paths.gmailCredentials,
    tokenPath: config.paths.gmailToken,
    logger: base,
  });

  return {
    client: new PlacesClient(),
    limiter: new RateLimiter({ logger: base }),
    lookup: await ZipLookup.load(),
    createEmailSender: (settings) => new EmailSender({ settings, auth, logger: base }),
  };
}

/**
 * Handle the search command.
 */
export async function handleSearch(
  options: SearchCommandOptions,
  base: BaseCommand,
  services?: SearchServices
): Promise<SearchOutcome> {
  const runConfig = await loadRunConfig(base.configPath, base);
  const plan = parseSearchOptions(options, runConfig);
  base.debug(`Search plan: ${JSON.stringify(plan)}`);

  return runSearch(plan, runConfig, services ?? (await createSearchServices(base)), base);
}

/**
 * Register the search command.
 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Find donation opportunities near a ZIP code or coordinates')
    .option('--zip <code>', 'Search by ZIP code')
    .option('--zip-batch', 'Search every ZIP code enabled in config.json')
    .option('--lat <latitude>', 'Latitude for coordinate search (requires --lng)')
    .option('--lng <longitude>', 'Longitude for coordinate search (requires --lat)')
    .option('-k, --keywords <list>', 'Comma-separated keywords (default: food bank,charity,shelter,blood bank)')
    .option('-r, --radius <meters>', 'Search radius in meters (default: 5000)')
    .option('-n, --max-results <count>', 'Maximum results to return (default: 20)')
    .option('--include-reviews', 'Fetch details, reviews and contact email for each place')
    .option('--max-reviews <count>', 'Reviews per place with --include-reviews', String(DEFAULT_MAX_REVIEWS))
    .option('--reviews-for-all', 'Fetch reviews for all places, not just those rated 3.0 or higher')
    .option('-o, --output <name>', 'Output file base name', DEFAULT_OUTPUT)
    .option('--output-dir <path>', 'Directory for output files', '.')
    .option('-f, --format <type>', 'Output format: json, csv, both', 'both')
    .option('--email', 'Send results to the configured email recipient')
    .action(async (options: SearchCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        const outcome = await handleSearch(options, base);
        if (outcome.exitCode !== EXIT_CODES.SUCCESS) {
          base.exitWith(outcome.exitCode);
        }
      } catch (error) {
        base.exitWith(base.reportError(error));
      }
    });
}
