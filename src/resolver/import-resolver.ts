/**
 * navindex - Import Resolver
 *
 * Maps raw import tokens to files of the scanned tree. Relative tokens
 * resolve against the importer's directory and are `exact`; package-style
 * tokens resolve against root-like directories, then by path suffix, and
 * are `heuristic`. Everything else is `unresolved`.
 *
 * @module resolver/import-resolver
 */

import type {
  FileLanguage,
  FileRecord,
  ImportEdge,
  LanguageTag,
  ResolutionConfidence,
} from '../types/index.js';
import { basenameOf, dirnameOf, joinRelative, stemOf, topLevelSegment } from '../utils/paths.js';
import type { ResolutionContext } from './resolution-context.js';

// =============================================================================
// Types
// =============================================================================

export interface Resolution {
  target?: string;
  confidence: ResolutionConfidence;
}

interface ResolutionRules {
  /** Extensions appended to an extension-less candidate, in priority order */
  extensions: string[];
  /** File names that stand for their directory */
  indexFiles?: string[];
  /** How many trailing segments may name an item rather than a module */
  trailingItems?: number;
  /** Whether package-style tokens may match by path suffix anywhere */
  suffixMatch: boolean;
}

/**
 * How a package-style token is looked up
 *
 * - `file`: segments name a module file
 * - `directory`: segments name a package directory
 */
type LookupMode = 'file' | 'directory';

interface PackageLookup {
  segments: string[];
  modes: LookupMode[];
}

const UNRESOLVED: Resolution = { confidence: 'unresolved' };

// =============================================================================
// Per-language Rules
// =============================================================================

const ECMASCRIPT_INDEX = ['index.ts', 'index.tsx', 'index.d.ts', 'index.js', 'index.jsx', 'index.mjs', 'index.cjs'];

const RESOLUTION_RULES: Partial<Record<LanguageTag, ResolutionRules>> = {
  typescript: {
    extensions: ['.ts', '.tsx', '.d.ts', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'],
    indexFiles: ECMASCRIPT_INDEX,
    suffixMatch: false,
  },
  javascript: {
    extensions: ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx'],
    indexFiles: ECMASCRIPT_INDEX,
    suffixMatch: false,
  },
  python: { extensions: ['.py', '.pyi'], indexFiles: ['__init__.py', '__init__.pyi'], trailingItems: 1, suffixMatch: true },
  go: { extensions: ['.go'], suffixMatch: true },
  rust: { extensions: ['.rs'], indexFiles: ['mod.rs', 'lib.rs', 'main.rs'], trailingItems: 2, suffixMatch: true },
  java: { extensions: ['.java'], trailingItems: 1, suffixMatch: true },
  kotlin: { extensions: ['.kt', '.kts', '.java'], trailingItems: 1, suffixMatch: true },
  csharp: { extensions: ['.cs'], trailingItems: 1, suffixMatch: true },
  c: { extensions: ['.h', '.c'], suffixMatch: true },
  cpp: { extensions: ['.h', '.hpp', '.hh', '.hxx', '.cpp', '.cc', '.cxx'], suffixMatch: true },
  ruby: { extensions: ['.rb'], suffixMatch: true },
  php: { extensions: ['.php'], suffixMatch: true },
  swift: { extensions: ['.swift'], suffixMatch: false },
  lua: { extensions: ['.lua'], indexFiles: ['init.lua'], suffixMatch: true },
  shell: { extensions: ['.sh', '.bash'], suffixMatch: false },
  make: { extensions: ['.mk'], suffixMatch: false },
};

/** ESM sources import compiled names: `./x.js` refers to `./x.ts` */
const COMPILED_EXTENSION_SWAPS: Array<[string, string[]]> = [
  ['.js', ['.ts', '.tsx']],
  ['.jsx', ['.tsx']],
  ['.mjs', ['.mts']],
  ['.cjs', ['.cts']],
];

const PATH_ALIASES = ['@/', '~/'];

const TEST_FILE = /(?:_test\.go|\.(?:test|spec)\.[a-z]+|Tests?\.[a-z]+)$/;

// =============================================================================
// Import Resolver
// =============================================================================

interface SuffixKey {
  key: string;
  file: string;
}

export class ImportResolver {
  private readonly suffixKeys = new Map<LanguageTag, SuffixKey[]>();

  constructor(private readonly context: ResolutionContext) {}

  /**
   * Resolve one import token written in `fromFile`.
   */
  resolve(token: string, fromFile: string, language: FileLanguage): Resolution {
    if (language === 'unknown') return UNRESOLVED;
    const rules = RESOLUTION_RULES[language];
    const trimmed = token.trim();
    if (!rules || trimmed === '') return UNRESOLVED;

    const relative = this.relativeCandidates(trimmed, fromFile, language, rules);
    if (relative === null) return UNRESOLVED;
    if (relative !== undefined) {
      const target = this.firstExisting(relative, fromFile);
      if (target !== undefined) return { target, confidence: 'exact' };
      if (!fallsBackToPackage(trimmed, language)) return UNRESOLVED;
    }

    const lookup = packageLookup(trimmed, language);
    if (!lookup) return UNRESOLVED;
    const target = this.resolvePackage(lookup, fromFile, language, rules);
    return target === undefined ? UNRESOLVED : { target, confidence: 'heuristic' };
  }

  /**
   * One edge per import token of every record, in record then token order.
   */
  resolveAll(records: readonly FileRecord[]): ImportEdge[] {
    const edges: ImportEdge[] = [];
    for (const record of records) {
      for (const token of record.imports) {
        const { target, confidence } = this.resolve(token, record.path, record.language);
        edges.push(
          target === undefined
            ? { source: record.path, token, confidence: 'unresolved' }
            : { source: record.path, token, target, confidence }
        );
      }
    }
    return edges;
  }

  // ===========================================================================
  // Relative Tokens
  // ===========================================================================

  /**
   * Candidate files for a relative token.
   *
   * `undefined` when the token is not relative, `null` when it climbs out
   * of the scanned tree.
   */
  private relativeCandidates(
    token: string,
    fromFile: string,
    language: LanguageTag,
    rules: ResolutionRules
  ): string[] | null | undefined {
    const dir = dirnameOf(fromFile);

    switch (language) {
      case 'python':
        return token.startsWith('.') ? pythonRelative(token, dir, rules) : undefined;

      case 'rust':
        return this.rustRelative(token, fromFile, rules);

      case 'c':
      case 'cpp': {
        if (token.startsWith('<')) return undefined;
        const base = joinRelative(dir, token);
        return base === null ? null : expand(base, rules);
      }

      case 'shell':
      case 'make': {
        if (token.startsWith('/') || token.includes('$')) return null;
        const base = joinRelative(dir, token);
        return base === null ? null : expand(base, rules);
      }

      default: {
        if (!isDotRelative(token)) return undefined;
        const base = joinRelative(dir, token);
        return base === null ? null : expand(base, rules);
      }
    }
  }

  private rustRelative(token: string, fromFile: string, rules: ResolutionRules): string[] | null | undefined {
    const segments = token.split('::').filter((segment) => segment !== '');
    const head = segments[0];
    if (head !== 'self' && head !== 'super' && head !== 'crate') return undefined;

    let base: string;
    let index = 1;
    if (head === 'crate') {
      base = this.crateRoot(fromFile);
    } else {
      base = rustModuleDir(fromFile);
      if (head === 'super') {
        if (base === '') return null;
        base = dirnameOf(base);
      }
      while (segments[index] === 'super') {
        if (base === '') return null;
        base = dirnameOf(base);
        index++;
      }
    }

    const rest = segments.slice(index);
    const lowest = rest.length === 0 ? 0 : Math.max(0, rest.length - (rules.trailingItems ?? 0));
    const candidates: string[] = [];
    for (let keep = rest.length; keep >= lowest; keep--) {
      const path = joinRelative(base, ...rest.slice(0, keep));
      if (path === null) return null;
      candidates.push(...expand(path, rules));
    }
    return candidates;
  }

  /**
   * Source directory of the crate containing `file`.
   */
  private crateRoot(file: string): string {
    const manifestDir = this.context.nearestWithMarker(file, 'Cargo.toml');
    if (manifestDir !== undefined) {
      const src = manifestDir === '' ? 'src' : `${manifestDir}/src`;
      if (this.context.isDirectory(src)) return src;
    }
    const segments = dirnameOf(file).split('/');
    const srcIndex = segments.lastIndexOf('src');
    return srcIndex === -1 ? dirnameOf(file) : segments.slice(0, srcIndex + 1).join('/');
  }

  // ===========================================================================
  // Package-style Tokens
  // ===========================================================================

  private resolvePackage(
    lookup: PackageLookup,
    fromFile: string,
    language: LanguageTag,
    rules: ResolutionRules
  ): string | undefined {
    const { segments, modes } = lookup;
    const trailing = modes.includes('file') ? (rules.trailingItems ?? 0) : 0;
    const lowest = Math.max(1, segments.length - trailing);

    // One hit per root; roots compete under the same tie-break as suffix matches
    const rooted: string[] = [];
    for (const root of this.context.roots) {
      const found = this.resolveUnderRoot(root, segments, modes, lowest, fromFile, rules);
      if (found !== undefined && !rooted.includes(found)) rooted.push(found);
    }
    if (rooted.length > 0) return pickBest(rooted, fromFile);

    if (!rules.suffixMatch) return undefined;

    for (let keep = segments.length; keep >= lowest; keep--) {
      const kept = segments.slice(0, keep);
      const minimum = Math.min(2, kept.length);
      for (let start = 0; kept.length - start >= minimum; start++) {
        const suffix = kept.slice(start).join('/');
        for (const mode of modes) {
          const matches =
            mode === 'file'
              ? this.filesBySuffix(suffix, language, rules, fromFile)
              : this.directoriesBySuffix(suffix, rules, fromFile);
          if (matches.length > 0) return pickBest(matches, fromFile);
        }
      }
      if (!modes.includes('file')) break;
    }
    return undefined;
  }

  private resolveUnderRoot(
    root: string,
    segments: string[],
    modes: LookupMode[],
    lowest: number,
    fromFile: string,
    rules: ResolutionRules
  ): string | undefined {
    for (const mode of modes) {
      if (mode === 'file') {
        for (let keep = segments.length; keep >= lowest; keep--) {
          const path = joinRelative(root, ...segments.slice(0, keep));
          if (path === null) continue;
          const found = this.firstExisting(expand(path, rules), fromFile);
          if (found !== undefined) return found;
        }
      } else {
        const dir = joinRelative(root, ...segments);
        const found = dir === null ? undefined : this.representative(dir, rules, fromFile);
        if (found !== undefined) return found;
      }
    }
    return undefined;
  }

  private filesBySuffix(
    suffix: string,
    language: LanguageTag,
    rules: ResolutionRules,
    fromFile: string
  ): string[] {
    const matches = new Set<string>();
    for (const { key, file } of this.keysFor(language, rules)) {
      if (file !== fromFile && (key === suffix || key.endsWith(`/${suffix}`))) matches.add(file);
    }
    return [...matches];
  }

  private directoriesBySuffix(suffix: string, rules: ResolutionRules, fromFile: string): string[] {
    const matches: string[] = [];
    for (const dir of this.context.allDirectories()) {
      if (dir !== suffix && !dir.endsWith(`/${suffix}`)) continue;
      const found = this.representative(dir, rules, fromFile);
      if (found !== undefined) matches.push(found);
    }
    return matches;
  }

  /**
   * Lookup keys for every file of the tree under one language's rules: the
   * path itself, the path without a known extension, and the directory of
   * an index file.
   */
  private keysFor(language: LanguageTag, rules: ResolutionRules): SuffixKey[] {
    const cached = this.suffixKeys.get(language);
    if (cached) return cached;

    const keys: SuffixKey[] = [];
    for (const file of this.context.allFiles()) {
      keys.push({ key: file, file });
      for (const extension of rules.extensions) {
        if (file.endsWith(extension)) keys.push({ key: file.slice(0, -extension.length), file });
      }
      if (rules.indexFiles?.includes(basenameOf(file))) {
        const dir = dirnameOf(file);
        if (dir !== '') keys.push({ key: dir, file });
      }
    }
    this.suffixKeys.set(language, keys);
    return keys;
  }

  /**
   * File standing for a package directory: one named after the directory,
   * otherwise the lexically first non-test source file.
   */
  private representative(dir: string, rules: ResolutionRules, fromFile: string): string | undefined {
    if (!this.context.isDirectory(dir)) return undefined;
    const sources = this.context
      .filesIn(dir)
      .filter((file) => file !== fromFile && rules.extensions.some((extension) => file.endsWith(extension)));
    if (sources.length === 0) return undefined;

    const name = basenameOf(dir);
    const named = sources.find((file) => stemOf(file) === name);
    if (named) return named;
    return sources.find((file) => !TEST_FILE.test(basenameOf(file))) ?? sources[0];
  }

  private firstExisting(candidates: string[], fromFile: string): string | undefined {
    return candidates.find((candidate) => candidate !== fromFile && this.context.has(candidate));
  }
}

// =============================================================================
// Token Helpers
// =============================================================================

function isDotRelative(token: string): boolean {
  return token === '.' || token === '..' || token.startsWith('./') || token.startsWith('../');
}

/**
 * Quote includes that miss beside the importer are searched like angle
 * includes.
 */
function fallsBackToPackage(token: string, language: LanguageTag): boolean {
  return (language === 'c' || language === 'cpp') && !isDotRelative(token);
}

/**
 * `..pkg.mod` from `a/b/x.py`: n leading dots climb n - 1 directories.
 */
function pythonRelative(token: string, dir: string, rules: ResolutionRules): string[] | null {
  const match = /^(\.+)(.*)$/.exec(token);
  if (!match) return null;
  const [, dots, remainder] = match;

  let base = dir;
  for (let i = 1; i < dots.length; i++) {
    if (base === '') return null;
    base = dirnameOf(base);
  }

  const rest = remainder.split('.').filter((segment) => segment !== '');
  const lowest = Math.max(0, rest.length - (rules.trailingItems ?? 0));
  const candidates: string[] = [];
  for (let keep = rest.length; keep >= lowest; keep--) {
    const path = joinRelative(base, ...rest.slice(0, keep));
    if (path === null) return null;
    candidates.push(...expand(path, rules));
  }
  return candidates;
}

/**
 * Directory whose children are the submodules of a Rust file's module.
 */
function rustModuleDir(file: string): string {
  const dir = dirnameOf(file);
  const name = basenameOf(file);
  if (name === 'mod.rs' || name === 'lib.rs' || name === 'main.rs') return dir;
  return dir === '' ? stemOf(file) : `${dir}/${stemOf(file)}`;
}

/**
 * Split a package-style token into path segments, or `undefined` for
 * tokens that never name a file of the tree.
 */
function packageLookup(token: string, language: LanguageTag): PackageLookup | undefined {
  const file: LookupMode[] = ['file'];

  switch (language) {
    case 'typescript':
    case 'javascript': {
      const alias = PATH_ALIASES.find((prefix) => token.startsWith(prefix));
      if (alias) return lookup(token.slice(alias.length).split('/'), file);
      if (token.startsWith('node:') || token.startsWith('@') || token.startsWith('/')) return undefined;
      if (!token.includes('/')) return undefined;
      return lookup(token.split('/'), file);
    }

    case 'python':
    case 'lua':
      return lookup(token.split('.'), file);

    case 'java':
    case 'kotlin': {
      const segments = token.split('.');
      if (segments[segments.length - 1] === '*') return lookup(segments.slice(0, -1), ['directory']);
      return lookup(segments, file);
    }

    case 'csharp':
      return lookup(token.split('.'), ['directory', 'file']);

    case 'go':
      if (!token.includes('/')) return undefined;
      return lookup(token.split('/'), ['directory']);

    case 'swift':
      return lookup([token], ['directory']);

    case 'rust':
      return lookup(token.split('::'), file);

    case 'php':
      if (token.includes('/') || token.endsWith('.php')) return lookup(token.split('/'), file);
      return lookup(token.split('\\'), file);

    case 'c':
    case 'cpp':
      return lookup(token.replace(/^<|>$/g, '').split('/'), file);

    case 'ruby':
      return lookup(token.split('/'), file);

    default:
      return undefined;
  }
}

function lookup(segments: string[], modes: LookupMode[]): PackageLookup | undefined {
  const kept = segments.filter((segment) => segment !== '' && segment !== '.');
  if (kept.length === 0 || kept.includes('..')) return undefined;
  return { segments: kept, modes };
}

/**
 * Files a module path may refer to, in priority order.
 */
function expand(base: string, rules: ResolutionRules): string[] {
  const candidates: string[] = [];
  if (base !== '') {
    candidates.push(base);
    for (const [compiled, sources] of COMPILED_EXTENSION_SWAPS) {
      if (rules.indexFiles === ECMASCRIPT_INDEX && base.endsWith(compiled)) {
        const stem = base.slice(0, -compiled.length);
        candidates.push(...sources.map((extension) => stem + extension));
      }
    }
    candidates.push(...rules.extensions.map((extension) => base + extension));
  }
  for (const index of rules.indexFiles ?? []) {
    candidates.push(base === '' ? index : `${base}/${index}`);
  }
  return candidates;
}

/**
 * Same top-level directory as the importer, then shortest path, then
 * lexical order.
 */
function pickBest(candidates: string[], fromFile: string): string {
  const home = topLevelSegment(fromFile);
  const rank = (path: string): number => (topLevelSegment(path) === home ? 0 : 1);
  return [...candidates].sort(
    (a, b) => rank(a) - rank(b) || a.length - b.length || (a < b ? -1 : a > b ? 1 : 0)
  )[0];
}
