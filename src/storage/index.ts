/**
 * Storage Layer
 *
 * File-based persistence for output files, the run config and the OAuth
 * token cache. All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  SETUP_FILES,
  validateBaseName,
  getOutputPath,
  getZipBaseName,
  getBatchBaseName,
  getCoordinatesBaseName,
  isGeneratedOutput,
  isTempFile,
  isSetupFile,
  type OutputExtension,
} from './paths.js';

// Atomic operations
export {
  atomicWriteText,
  atomicWriteJson,
  readJson,
  readJsonWith,
  fileExists,
  isNotFound,
} from './atomic.js';

// Config operations
export { ConfigError, loadRunConfig } from './config.js';

// Maintenance
export { cleanupOutputs, type CleanupResult } from './cleanup.js';
