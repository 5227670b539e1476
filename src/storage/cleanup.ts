/**
 * Output Cleanup
 *
 * Removes result files and interrupted-write leftovers from an output
 * directory. Setup files are never touched.
 *
 * @module storage/cleanup
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { silentLogger, type Logger } from '../logger.js';
import { fileExists, isNotFound } from './atomic.js';
import { SETUP_FILES, isGeneratedOutput, isSetupFile, isTempFile } from './paths.js';

export interface CleanupResult {
  removed: string[];
  /** Files that matched but could not be removed */
  failed: Array<{ file: string; error: string }>;
  /** Setup files and whether each exists */
  preserved: Array<{ file: string; exists: boolean }>;
}

/**
 * Delete `<output>_*.json|csv` and `*.tmp` files from a directory.
 *
 * A missing directory is treated as empty. A file that cannot be removed is
 * reported in `failed` and the rest are still processed.
 */
export async function cleanupOutputs(
  outputDir: string,
  output: string,
  logger: Logger = silentLogger
): Promise<CleanupResult> {
  let entries: string[];
  try {
    entries = await fs.readdir(outputDir);
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
    logger.debug(`Output directory ${outputDir} does not exist`);
    entries = [];
  }

  const result: CleanupResult = { removed: [], failed: [], preserved: [] };

  for (const name of entries.sort()) {
    if (isSetupFile(name) || !(isGeneratedOutput(name, output) || isTempFile(name))) {
      continue;
    }

    const filePath = path.join(outputDir, name);
    try {
      await fs.unlink(filePath);
      result.removed.push(filePath);
      logger.info(`   Removed: ${filePath}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.failed.push({ file: filePath, error: message });
      logger.warn(`Error removing ${filePath}: ${message}`);
    }
  }

  for (const file of SETUP_FILES) {
    result.preserved.push({ file, exists: await fileExists(path.join(outputDir, file)) });
  }

  return result;
}
