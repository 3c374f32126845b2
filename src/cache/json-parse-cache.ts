/**
 * navindex - Persistent Parse Cache
 * @module cache/json-parse-cache
 *
 * Storage layout:
 * ```
 * {project-root}/.navindex/
 *   parse-cache.json.gz   # gzip JSON, entries oldest first
 * ```
 *
 * Unreadable or malformed data is treated as a miss; a failed write leaves
 * the previous file in place. Neither fails the indexing run.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { gunzip, gzip } from 'node:zlib';
import { promisify } from 'node:util';

import { isLanguageTag } from '../parser/languages.js';
import { PARSER_VERSION } from '../parser/structural-parser.js';
import type { ClassKind } from '../types/index.js';
import { CacheError, describeError } from '../utils/errors.js';
import { logger as defaultLogger, type LogSink } from '../utils/logger.js';
import { BaseParseCache, type CachedParse, type ParseCacheOptions } from './parse-cache.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_CACHE_DIR = '.navindex';
export const CACHE_FILE_GZ = 'parse-cache.json.gz';

/** Bumped when the file layout changes */
export const CACHE_SCHEMA_VERSION = 1;

const CLASS_KINDS: readonly ClassKind[] = [
  'class',
  'interface',
  'struct',
  'enum',
  'trait',
  'type',
  'module',
  'protocol',
  'object',
];

export interface JsonParseCacheOptions extends ParseCacheOptions {
  /** Absolute cache directory */
  directory: string;
  logger?: LogSink;
}

interface CacheFile {
  schemaVersion: number;
  parserVersion: number;
  entries: Array<[string, CachedParse]>;
}

export function cacheFilePath(directory: string): string {
  return join(directory, CACHE_FILE_GZ);
}

// =============================================================================
// JSON Parse Cache
// =============================================================================

/**
 * Usage:
 * ```typescript
 * const cache = await JsonParseCache.open({ directory: '/repo/.navindex' });
 * const { parse } = await cache.getOrParse(fingerprint, 'python', () => parse(text, 'python'));
 * await cache.flush();
 * ```
 */
export class JsonParseCache extends BaseParseCache {
  private readonly directory: string;
  private readonly file: string;
  private readonly log: LogSink;

  private constructor(options: JsonParseCacheOptions) {
    super(options);
    this.directory = options.directory;
    this.file = cacheFilePath(options.directory);
    this.log = (options.logger ?? defaultLogger).child({ component: 'parse-cache' });
  }

  /**
   * Open the cache, loading whatever valid entries the file holds
   */
  static async open(options: JsonParseCacheOptions): Promise<JsonParseCache> {
    const cache = new JsonParseCache(options);
    await cache.load();
    return cache;
  }

  /**
   * Write entries to disk when anything changed since the last flush
   */
  async flush(): Promise<void> {
    if (!this.dirty) return;

    const tempFile = `${this.file}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      const payload: CacheFile = {
        schemaVersion: CACHE_SCHEMA_VERSION,
        parserVersion: PARSER_VERSION,
        entries: [...this.entries],
      };
      const data = await gzipAsync(JSON.stringify(payload));

      // Atomic write: write to temp, then rename
      await writeFile(tempFile, data);
      await rename(tempFile, this.file);
      this.dirty = false;

      this.log.debug('Parse cache saved', {
        entries: this.entries.size,
        size: `${(data.length / 1024).toFixed(1)}KB`,
      });
    } catch (error) {
      await rm(tempFile, { force: true }).catch((cleanupError: unknown) => {
        this.log.debug('Temp file cleanup failed', { error: describeError(cleanupError) });
      });
      const failure = new CacheError('CACHE_WRITE_FAILED', `Failed to save parse cache: ${describeError(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
      this.log.warn(failure.message, { file: this.file });
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async load(): Promise<void> {
    if (!existsSync(this.file)) {
      this.log.debug('No parse cache found', { file: this.file });
      return;
    }

    let decoded: unknown;
    try {
      const data = await readFile(this.file);
      decoded = JSON.parse((await gunzipAsync(data)).toString('utf-8'));
    } catch (error) {
      this.discard(new CacheError('CACHE_CORRUPTED', `Parse cache unreadable: ${describeError(error)}`));
      return;
    }

    if (!isRecord(decoded) || !Array.isArray(decoded.entries)) {
      this.discard(new CacheError('CACHE_CORRUPTED', 'Parse cache has an unexpected layout'));
      return;
    }

    if (decoded.schemaVersion !== CACHE_SCHEMA_VERSION || decoded.parserVersion !== PARSER_VERSION) {
      this.log.info('Parse cache is from another version, starting fresh', {
        schemaVersion: decoded.schemaVersion,
        parserVersion: decoded.parserVersion,
      });
      this.dirty = true;
      return;
    }

    let dropped = 0;
    for (const item of decoded.entries) {
      if (Array.isArray(item) && item.length === 2 && typeof item[0] === 'string' && isCachedParse(item[1])) {
        this.entries.set(item[0], item[1]);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      this.log.warn('Dropped malformed parse cache entries', { dropped });
      this.dirty = true;
    }
    this.log.debug('Parse cache loaded', { entries: this.entries.size });
  }

  private discard(error: CacheError): void {
    this.log.warn(`${error.message}, starting fresh`, { file: this.file });
    this.entries.clear();
    this.dirty = true;
  }
}

/**
 * Remove the cache directory. Safe to call when it does not exist.
 */
export async function clearCacheDirectory(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

// =============================================================================
// Entry Validation
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isLine(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

function isClassKind(value: unknown): value is ClassKind {
  return typeof value === 'string' && CLASS_KINDS.some((kind) => kind === value);
}

function isCachedParse(value: unknown): value is CachedParse {
  if (!isRecord(value)) return false;
  if (typeof value.language !== 'string' || !isLanguageTag(value.language)) return false;
  if (typeof value.lineCount !== 'number' || value.lineCount < 0) return false;
  if (!isStringArray(value.imports)) return false;
  if (!Array.isArray(value.functions) || !Array.isArray(value.classes)) return false;

  const functionsValid = value.functions.every(
    (fn: unknown) =>
      isRecord(fn) &&
      typeof fn.name === 'string' &&
      isLine(fn.line) &&
      isStringArray(fn.params) &&
      (fn.owner === undefined || typeof fn.owner === 'string')
  );
  const classesValid = value.classes.every(
    (cls: unknown) =>
      isRecord(cls) &&
      typeof cls.name === 'string' &&
      isLine(cls.line) &&
      isClassKind(cls.kind) &&
      isStringArray(cls.bases) &&
      typeof cls.methodCount === 'number'
  );
  return functionsValid && classesValid;
}
