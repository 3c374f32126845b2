/**
 * navindex
 *
 * Structural navigation index for source trees: per-file declarations,
 * a resolved import graph, entry points and navigation paths, built
 * without executing or compiling the indexed code.
 *
 * @packageDocumentation
 * @module navindex
 *
 * @example Quick Start
 * ```ts
 * import { indexDirectory, encodeMarkdown } from 'navindex';
 *
 * const { index } = await indexDirectory('/path/to/project');
 * console.log(encodeMarkdown(index));
 * ```
 *
 * @example In-memory sources
 * ```ts
 * import { createMemorySources, indexSources } from 'navindex';
 *
 * const { index } = await indexSources(
 *   createMemorySources({
 *     'main.py': 'import lib\n',
 *     'lib.py': 'def helper():\n    pass\n',
 *   })
 * );
 * ```
 */

// ============================================================================
// INDEXING
// ============================================================================

export {
  indexSources,
  indexDirectory,
  indexProject,
  buildRecord,
  type IndexOptions,
  type IndexDirectoryOptions,
  type IndexRunContext,
} from './indexer.js';

export * from './types/index.js';

// ============================================================================
// MODULES
// ============================================================================

export * from './parser/index.js';
export * from './resolver/index.js';
export * from './graph/index.js';
export * from './cache/index.js';
export * from './core/index.js';
export * from './sources/index.js';
export * from './output/index.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  loadConfig,
  readConfigSource,
  mergeConfig,
  parseUserConfig,
  validateConfig,
  validateUserConfig,
  generateDefaultConfig,
  normalizeExtensions,
  DEFAULT_CONFIG,
  CONFIG_FILES,
  OUTPUT_FORMATS,
  type NavIndexConfig,
  type UserConfig,
  type OutputFormat,
  type ConfigSource,
} from './config.js';

// ============================================================================
// UTILITIES
// ============================================================================

export * from './utils/index.js';
