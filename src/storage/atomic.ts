/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { z } from 'zod';

/**
 * Write text to a file atomically.
 *
 * Writes to `<file>.tmp.<timestamp>` first, then renames over the target, so
 * readers never see a partially written file. Parent directories are
 * created as needed.
 *
 * @throws Error with the target path if the write fails
 */
export async function atomicWriteText(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isNotFound(cleanupError)) {
        throw cleanupError;
      }
    });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, { cause: error });
  }
}

/**
 * Write data as pretty-printed JSON (2-space indentation), atomically.
 *
 * @example
 * await atomicWriteJson('/path/to/token.json', { accessToken: '...' });
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWriteText(filePath, JSON.stringify(data, null, 2));
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Path to the JSON file
 * @returns Parsed JSON data, unvalidated
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new Error(`File not found: ${filePath}`);
    }
    throw error;
  }

  try {
    return JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in file: ${filePath}`);
  }
}

/**
 * Read a JSON file and validate it against a schema.
 *
 * @throws Error if the file is missing, not JSON, or fails validation
 */
export async function readJsonWith<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S>> {
  const data = await readJson(filePath);
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new Error(`Invalid contents in ${filePath}: ${where}${issue?.message ?? 'validation failed'}`);
  }
  return parsed.data;
}

/**
 * Check if a file exists (not a directory)
 *
 * @param filePath - Path to check
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Whether a filesystem error means the path does not exist.
 */
export function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}
