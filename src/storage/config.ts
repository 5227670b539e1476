/**
 * Run Config Storage
 *
 * Loads `config.json` (batch ZIP codes, email settings, search defaults).
 *
 * @module storage/config
 */

import * as fs from 'node:fs/promises';
import { RunConfigSchema, createDefaultRunConfig, type RunConfig } from '../schemas/run-config.js';
import { silentLogger, type Logger } from '../logger.js';
import { isNotFound } from './atomic.js';

/**
 * Raised when config.json is readable JSON but does not match the schema.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Load the run configuration.
 *
 * - Missing file: defaults.
 * - Unparseable JSON: a warning, then defaults.
 * - Valid JSON with invalid values: ConfigError.
 *
 * @throws ConfigError if the file fails schema validation
 */
export async function loadRunConfig(filePath: string, logger: Logger = silentLogger): Promise<RunConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      logger.debug(`No config file at ${filePath}, using defaults`);
      return createDefaultRunConfig();
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    logger.warn(`Invalid JSON in ${filePath}, using default configuration`);
    return createDefaultRunConfig();
  }

  const parsed = RunConfigSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${filePath}: ${details}`, filePath);
  }

  return parsed.data;
}
