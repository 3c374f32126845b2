/**
 * navindex - Path Utilities
 * @module utils/paths
 *
 * Repo-relative paths are always forward-slash separated, never start with
 * `./` and never contain `..` segments.
 */

import { sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';

// =============================================================================
// Path Normalization
// =============================================================================

/**
 * Normalize path separators to forward slashes and strip a leading `./`.
 */
export function normalizePath(path: string): string {
  const unix = path.split(sep).join('/').replace(/\\/g, '/');
  return unix.startsWith('./') ? unix.slice(2) : unix;
}

/**
 * Directory part of a repo-relative path, `''` for top-level files.
 */
export function dirnameOf(path: string): string {
  const index = path.lastIndexOf('/');
  return index === -1 ? '' : path.slice(0, index);
}

export function basenameOf(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/**
 * File name without its last extension: `src/main.test.ts` -> `main.test`.
 */
export function stemOf(path: string): string {
  const base = basenameOf(path);
  const dot = base.lastIndexOf('.');
  return dot <= 0 ? base : base.slice(0, dot);
}

/**
 * Lowercased extension with its dot, `''` when there is none.
 */
export function getExtension(filePath: string): string {
  const base = basenameOf(filePath).toLowerCase();
  const dot = base.lastIndexOf('.');
  return dot <= 0 ? '' : base.slice(dot);
}

export function topLevelSegment(path: string): string {
  const index = path.indexOf('/');
  return index === -1 ? '' : path.slice(0, index);
}

/**
 * Join repo-relative segments and collapse `.`/`..`.
 *
 * Returns `null` when the result would climb above the root, so callers
 * can never produce a path outside the scanned tree.
 */
export function joinRelative(base: string, ...parts: string[]): string | null {
  const stack: string[] = [];
  for (const part of [base, ...parts]) {
    for (const segment of part.split('/')) {
      if (segment === '' || segment === '.') continue;
      if (segment === '..') {
        if (stack.length === 0) return null;
        stack.pop();
        continue;
      }
      stack.push(segment);
    }
  }
  return stack.join('/');
}

// =============================================================================
// Ignore Handling
// =============================================================================

export function createIgnoreFilter(patterns: string[]): Ignore {
  return ignore().add(patterns);
}

export function isIgnored(path: string, patterns: string[]): boolean {
  if (patterns.length === 0) return false;
  return createIgnoreFilter(patterns).ignores(normalizePath(path));
}

/**
 * Default exclusions for source trees
 */
export const DEFAULT_IGNORE_PATTERNS = [
  // Dependencies and environments
  'node_modules/',
  'vendor/',
  'venv/',
  'env/',
  '.env',
  '.venv/',

  // Caches
  '__pycache__/',
  '.pytest_cache/',
  '.mypy_cache/',
  '.ruff_cache/',
  '.tox/',
  '.nox/',
  '.coverage',
  '.ipynb_checkpoints/',

  // Build outputs
  'dist/',
  'build/',
  'target/',
  'debug/',
  '*.egg-info/',
  '*.egg',

  // Compiled objects and binaries
  '*.pyc',
  '*.pyo',
  '*.pyd',
  '*.so',
  '*.dll',
  '*.exe',
  '*.bin',
  '*.obj',
  '*.o',
  '*.a',
  '*.lib',
  '*.dylib',
  '*.pdb',
  '*.idb',
  '*.ncb',
  '*.sdf',
  '*.suo',

  // Bundled assets
  '*.min.js',
  '*.min.css',
  '*.map',

  // Lock files
  'package-lock.json',
  'yarn.lock',

  // Editors, VCS and OS
  '.vscode/',
  '.idea/',
  '*.swp',
  '*.swo',
  '.git/',
  '.DS_Store',

  // Our own cache
  '.navindex/',
];
