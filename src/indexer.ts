/**
 * navindex - Indexer
 *
 * Runs the indexing phases in order: parse every file on a bounded pool,
 * wait for all of them, then resolve imports, build the graph, infer entry
 * points, synthesize navigation paths and assemble the frozen index.
 *
 * @module indexer
 */

import * as os from 'os';
import * as path from 'path';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import pLimit from 'p-limit';

import { JsonParseCache } from './cache/json-parse-cache.js';
import { MemoryParseCache, type ParseCache } from './cache/parse-cache.js';
import type { NavIndexConfig } from './config.js';
import { assembleIndex } from './core/assembler.js';
import { inferEntryPoints, type EntryPointOptions } from './graph/entry-points.js';
import { FileGraph } from './graph/file-graph.js';
import { synthesizeNavigationPaths, type NavigationOptions } from './graph/navigation.js';
import { classify } from './parser/languages.js';
import { countLines } from './parser/source-text.js';
import { hasDialect, isBinaryContent, parse } from './parser/structural-parser.js';
import { ImportResolver } from './resolver/import-resolver.js';
import { ResolutionContext, type ResolutionContextOptions } from './resolver/resolution-context.js';
import { scanDirectory, type ScanOptions } from './sources/filesystem-scanner.js';
import type {
  FileRecord,
  IndexRunResult,
  IndexWarning,
  LanguageTag,
  SourceInput,
} from './types/index.js';
import { describeError } from './utils/errors.js';
import { fingerprint } from './utils/hash.js';
import { logger as defaultLogger, type LogSink } from './utils/logger.js';
import { normalizePath } from './utils/paths.js';

// ============================================================================
// TYPES
// ============================================================================

export interface IndexOptions {
  /** Display name of the indexed root (default: 'root') */
  root?: string;
  /** Parse cache shared across runs (default: a fresh in-memory cache) */
  cache?: ParseCache;
  /** Parse pool size (default: available cores) */
  maxWorkers?: number;
  /** Stops scheduling parses; the index is built from finished files */
  signal?: AbortSignal;
  logger?: LogSink;
  resolution?: ResolutionContextOptions;
  entryPoints?: Omit<EntryPointOptions, 'isPackageRoot'>;
  navigation?: NavigationOptions;
}

export interface IndexDirectoryOptions extends IndexOptions {
  scan?: Omit<ScanOptions, 'logger'>;
}

/**
 * State shared by the phases of one run
 */
export interface IndexRunContext {
  cache: ParseCache;
  log: LogSink;
  signal?: AbortSignal;
  /** Degraded files and ignored duplicate paths */
  warnings: IndexWarning[];
  /** Files served from the cache in this run */
  cachedFiles: number;
}

const decoder = new TextDecoder('utf-8');

// ============================================================================
// INDEXING
// ============================================================================

/**
 * Index an ordered list of files.
 *
 * @example
 * ```typescript
 * const { index, report } = await indexSources(sources, { root: 'my-app' });
 * console.log(index.entryPoints, report.durationMs);
 * ```
 */
export async function indexSources(
  sources: readonly SourceInput[],
  options: IndexOptions = {}
): Promise<IndexRunResult> {
  const startedAt = new Date();
  const started = performance.now();
  const phases: Record<string, number> = {};
  const time = <T>(phase: string, run: () => T): T => {
    const begin = performance.now();
    const result = run();
    phases[phase] = Math.round(performance.now() - begin);
    return result;
  };

  const context: IndexRunContext = {
    cache: options.cache ?? new MemoryParseCache(),
    log: (options.logger ?? defaultLogger).child({ component: 'indexer' }),
    signal: options.signal,
    warnings: [],
    cachedFiles: 0,
  };

  const unique = dedupeSources(sources, context);
  const workers = Math.max(1, options.maxWorkers ?? os.availableParallelism());
  context.log.info('Indexing started', { files: unique.length, workers });

  // Parse phase: bounded pool, then a barrier before anything global
  const parseStart = performance.now();
  const limit = pLimit(workers);
  const settled = await Promise.all(
    unique.map((source) =>
      limit(async () => {
        // Let timers and signal handlers run between parses
        await yieldToEventLoop();
        return context.signal?.aborted ? null : buildRecord(source, context);
      })
    )
  );
  const records = settled.filter((record): record is FileRecord => record !== null);
  phases.parse = Math.round(performance.now() - parseStart);

  const cancelled = records.length < unique.length;
  if (cancelled) {
    context.log.warn('Indexing cancelled, building index from completed files', {
      completed: records.length,
      total: unique.length,
    });
  }

  const resolutionContext = new ResolutionContext(records, options.resolution);
  const edges = time('resolve', () => new ImportResolver(resolutionContext).resolveAll(records));
  const graph = time('graph', () => FileGraph.build(records, edges));
  const entryPoints = time('entryPoints', () =>
    inferEntryPoints(graph, {
      ...options.entryPoints,
      isPackageRoot: (dir) => resolutionContext.isPackageRoot(dir),
    })
  );
  const paths = time('navigation', () => synthesizeNavigationPaths(graph, entryPoints, options.navigation));
  const cycles = time('cycles', () => graph.findCycles());

  const index = time('assemble', () =>
    assembleIndex({
      root: options.root ?? 'root',
      files: records,
      edges,
      entryPoints,
      paths,
      cycles,
      warnings: context.warnings,
      cancelled,
    })
  );

  try {
    await context.cache.flush();
  } catch (error) {
    context.log.warn('Parse cache flush failed', { error: describeError(error) });
  }

  const durationMs = Math.round(performance.now() - started);
  context.log.info('Indexing complete', {
    files: index.files.length,
    edges: index.edges.length,
    entryPoints: index.entryPoints.length,
    cached: context.cachedFiles,
    duration: `${durationMs}ms`,
  });

  return {
    index,
    report: {
      startedAt: startedAt.toISOString(),
      durationMs,
      phases,
      cachedFiles: context.cachedFiles,
      cache: context.cache.stats(),
    },
  };
}

/**
 * Scan a directory and index it.
 */
export async function indexDirectory(root: string, options: IndexDirectoryOptions = {}): Promise<IndexRunResult> {
  const rootPath = path.resolve(root);
  const sources = await scanDirectory(rootPath, { ...options.scan, logger: options.logger });
  return indexSources(sources, { ...options, root: options.root ?? path.basename(rootPath) });
}

/**
 * Index a project directory with a loaded configuration, using the
 * persistent parse cache when it is enabled.
 */
export async function indexProject(
  projectRoot: string,
  config: NavIndexConfig,
  options: { signal?: AbortSignal; logger?: LogSink } = {}
): Promise<IndexRunResult> {
  const rootPath = path.resolve(projectRoot);
  const cacheDirectory = path.resolve(rootPath, config.cache.directory);
  const cache = config.cache.enabled
    ? await JsonParseCache.open({
        directory: cacheDirectory,
        maxEntries: config.cache.maxEntries,
        logger: options.logger,
      })
    : new MemoryParseCache({ maxEntries: config.cache.maxEntries });

  return indexDirectory(rootPath, {
    cache,
    signal: options.signal,
    logger: options.logger,
    maxWorkers: config.concurrency.maxWorkers ?? undefined,
    scan: {
      ignore: [...config.ignore, ...cacheIgnorePattern(rootPath, cacheDirectory)],
      maxFiles: config.scan.maxFiles,
      maxFileSize: config.scan.maxFileSize,
      followSymlinks: config.scan.followSymlinks,
      filterExtensions: config.scan.filterExtensions,
      useIgnoreFiles: config.scan.useIgnoreFiles,
    },
    resolution: {
      roots: config.resolution.roots,
      manifestMarkers: config.resolution.manifestMarkers,
    },
    entryPoints: config.entryPoints,
    navigation: config.navigation,
  });
}

// ============================================================================
// PER-FILE RECORDS
// ============================================================================

/**
 * Parse one file into its record. Parser failures degrade the record to
 * empty structure and add a warning; they never fail the run.
 */
export async function buildRecord(source: SourceInput, context: IndexRunContext): Promise<FileRecord> {
  const filePath = normalizePath(source.path);
  const language = classify(filePath);
  const digest = fingerprint(source.content);
  const text = decoder.decode(source.content);

  const base = {
    path: filePath,
    language,
    size: source.size,
    fingerprint: digest,
  };

  if (language === 'unknown' || !hasDialect(language)) {
    return {
      ...base,
      lineCount: isBinaryContent(text) ? 0 : countLines(stripBom(text)),
      imports: [],
      functions: [],
      classes: [],
      parseStatus: 'skipped',
    };
  }

  try {
    const { parse: parsed, cached } = await context.cache.getOrParse(digest, language, () =>
      parse(text, language)
    );
    if (cached) context.cachedFiles++;

    return {
      ...base,
      lineCount: parsed.lineCount,
      imports: [...parsed.imports],
      functions: parsed.functions.map((fn) => ({ ...fn, file: filePath, params: [...fn.params] })),
      classes: parsed.classes.map((cls) => ({ ...cls, file: filePath, bases: [...cls.bases] })),
      parseStatus: 'parsed',
    };
  } catch (error) {
    const lineCount = isBinaryContent(text) ? 0 : countLines(stripBom(text));
    return failedRecord({ ...base, lineCount }, language, error, context);
  }
}

function failedRecord(
  base: Pick<FileRecord, 'path' | 'language' | 'size' | 'fingerprint' | 'lineCount'>,
  language: LanguageTag,
  error: unknown,
  context: IndexRunContext
): FileRecord {
  const message = describeError(error);
  context.warnings.push({ path: base.path, message });
  context.log.warn('File degraded to an empty record', { path: base.path, language, error: message });
  return {
    ...base,
    imports: [],
    functions: [],
    classes: [],
    parseStatus: 'failed',
  };
}

function dedupeSources(sources: readonly SourceInput[], context: IndexRunContext): SourceInput[] {
  const seen = new Set<string>();
  const unique: SourceInput[] = [];
  for (const source of sources) {
    const normalized = normalizePath(source.path);
    if (seen.has(normalized)) {
      context.log.warn('Duplicate input path ignored', { path: normalized });
      context.warnings.push({ path: normalized, message: 'Duplicate input path ignored' });
      continue;
    }
    seen.add(normalized);
    unique.push(source);
  }
  return unique;
}

/**
 * Keeps a cache directory inside the project out of the scan
 */
function cacheIgnorePattern(rootPath: string, cacheDirectory: string): string[] {
  const relative = path.relative(rootPath, cacheDirectory);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) return [];
  return [`/${normalizePath(relative)}/`];
}

function stripBom(text: string): string {
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
}
