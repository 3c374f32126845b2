/**
 * navindex - Filesystem Scanner
 * @module sources/filesystem-scanner
 *
 * Produces the ordered `(path, bytes, size)` input list for a local
 * directory, honoring default exclusions, ignore files and size limits.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';

import type { SourceInput } from '../types/index.js';
import { FileSystemError, describeError } from '../utils/errors.js';
import { logger as defaultLogger, type LogSink } from '../utils/logger.js';
import { DEFAULT_IGNORE_PATTERNS, createIgnoreFilter, getExtension, normalizePath } from '../utils/paths.js';

// ============================================================================
// Types
// ============================================================================

export interface ScanOptions {
  /** Patterns to ignore, gitignore syntax, in addition to the defaults */
  ignore?: string[];
  /** Stop after this many files (default: 1000) */
  maxFiles?: number;
  /** Skip files larger than this many bytes (default: 100KB) */
  maxFileSize?: number;
  followSymlinks?: boolean;
  /** Only keep these extensions, each with its leading dot (empty = all) */
  filterExtensions?: string[];
  /** Read .gitignore and .navindexignore at the root (default: true) */
  useIgnoreFiles?: boolean;
  logger?: LogSink;
}

export const DEFAULT_SCAN_OPTIONS = {
  maxFiles: 1000,
  maxFileSize: 100 * 1024,
  followSymlinks: false,
  useIgnoreFiles: true,
};

/** Root-level files whose lines are added to the ignore patterns */
export const IGNORE_FILES = ['.gitignore', '.navindexignore'];

// ============================================================================
// Scanner
// ============================================================================

/**
 * List, filter and read the files under `root`, sorted by path.
 *
 * @example
 * ```typescript
 * const sources = await scanDirectory('/path/to/project', {
 *   ignore: ['fixtures/'],
 *   filterExtensions: ['.py'],
 * });
 * ```
 *
 * @throws FileSystemError when `root` is missing or not a directory
 */
export async function scanDirectory(root: string, options: ScanOptions = {}): Promise<SourceInput[]> {
  const rootPath = path.resolve(root);
  const log = (options.logger ?? defaultLogger).child({ component: 'scanner' });
  const maxFiles = options.maxFiles ?? DEFAULT_SCAN_OPTIONS.maxFiles;
  const maxFileSize = options.maxFileSize ?? DEFAULT_SCAN_OPTIONS.maxFileSize;
  const followSymlinks = options.followSymlinks ?? DEFAULT_SCAN_OPTIONS.followSymlinks;
  const extensions = new Set(options.filterExtensions ?? []);

  assertDirectory(rootPath);

  const patterns = [...DEFAULT_IGNORE_PATTERNS, ...(options.ignore ?? [])];
  if (options.useIgnoreFiles ?? DEFAULT_SCAN_OPTIONS.useIgnoreFiles) {
    patterns.push(...readIgnoreFiles(rootPath));
  }
  const ig = createIgnoreFilter(patterns);

  const found = await glob('**/*', {
    cwd: rootPath,
    nodir: true,
    dot: true,
    follow: followSymlinks,
    ignore: ['**/node_modules/**', '**/.git/**'],
  });

  const candidates = found
    .map((file) => normalizePath(file))
    .filter((file) => !ig.ignores(file))
    .filter((file) => extensions.size === 0 || extensions.has(getExtension(file)))
    .sort();

  const sources: SourceInput[] = [];
  let tooLarge = 0;

  for (const relativePath of candidates) {
    if (sources.length >= maxFiles) {
      log.warn('File limit reached, remaining files skipped', {
        maxFiles,
        skipped: candidates.length - candidates.indexOf(relativePath),
      });
      break;
    }

    const absolutePath = path.join(rootPath, relativePath);
    try {
      const stats = followSymlinks ? fs.statSync(absolutePath) : fs.lstatSync(absolutePath);
      if (!stats.isFile()) continue;
      if (stats.size > maxFileSize) {
        tooLarge++;
        log.debug('Skipping large file', { path: relativePath, size: stats.size });
        continue;
      }

      const content = await fs.promises.readFile(absolutePath);
      sources.push({ path: relativePath, content: new Uint8Array(content), size: content.byteLength });
    } catch (error) {
      log.warn('Skipping unreadable file', { path: relativePath, error: describeError(error) });
    }
  }

  log.debug('Scan complete', { root: rootPath, files: sources.length, tooLarge });
  return sources;
}

// ============================================================================
// Helpers
// ============================================================================

function assertDirectory(rootPath: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(rootPath);
  } catch (error) {
    throw new FileSystemError('FILE_NOT_FOUND', `Directory not found: ${rootPath}`, {
      path: rootPath,
      cause: error instanceof Error ? error : undefined,
    });
  }
  if (!stats.isDirectory()) {
    throw new FileSystemError('FILE_NOT_FOUND', `Not a directory: ${rootPath}`, { path: rootPath });
  }
}

/**
 * Patterns from the root's ignore files, comments and blank lines dropped
 */
export function readIgnoreFiles(rootPath: string): string[] {
  const patterns: string[] = [];
  for (const name of IGNORE_FILES) {
    const file = path.join(rootPath, name);
    if (!fs.existsSync(file)) continue;
    const content = fs.readFileSync(file, 'utf-8');
    patterns.push(
      ...content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line !== '' && !line.startsWith('#'))
    );
  }
  return patterns;
}
