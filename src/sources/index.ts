/**
 * navindex - Sources Module
 *
 * Producers of the ordered `(path, bytes, size)` indexer input.
 *
 * @module sources
 */

export {
  scanDirectory,
  readIgnoreFiles,
  DEFAULT_SCAN_OPTIONS,
  IGNORE_FILES,
  type ScanOptions,
} from './filesystem-scanner.js';

export { createMemorySources } from './memory-sources.js';
