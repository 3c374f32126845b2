/**
 * navindex - Resolution Context
 *
 * Read-only view of the complete scanned file set, built once per run
 * after every file has been parsed. Import resolution never touches the
 * filesystem: a target exists only if it is in this set.
 *
 * @module resolver/resolution-context
 */

import type { FileLanguage } from '../types/index.js';
import { basenameOf, dirnameOf, joinRelative } from '../utils/paths.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Files whose presence marks a directory as a package or project root.
 * A leading `*` matches by suffix.
 */
export const DEFAULT_MANIFEST_MARKERS = [
  'package.json',
  'pyproject.toml',
  'setup.py',
  'setup.cfg',
  'Cargo.toml',
  'go.mod',
  'pom.xml',
  'build.gradle',
  'build.gradle.kts',
  'composer.json',
  'Gemfile',
  'Package.swift',
  'CMakeLists.txt',
  '*.csproj',
];

/** Conventional source directories below a root */
const SOURCE_SUBDIRS = ['src', 'lib', 'include', 'Sources'];

/** Directories below a root that conventionally hold entry points */
const ENTRY_SUBDIRS = ['src', 'lib', 'bin', 'app', 'cmd'];

export interface ResolutionContextOptions {
  /** Extra root directories, repo-relative, tried first */
  roots?: string[];
  manifestMarkers?: string[];
}

export interface ContextFile {
  path: string;
  language: FileLanguage;
}

// =============================================================================
// Resolution Context
// =============================================================================

export class ResolutionContext {
  private readonly languages = new Map<string, FileLanguage>();
  private readonly filesByDir = new Map<string, string[]>();
  private readonly directories = new Set<string>(['']);
  private readonly sortedFiles: string[];

  /** Directories containing a manifest marker, shallowest first */
  readonly manifestDirs: string[];
  /** Directories package-style imports are tried under, in priority order */
  readonly roots: string[];
  private readonly packageRoots: Set<string>;

  constructor(files: ContextFile[], options: ResolutionContextOptions = {}) {
    for (const file of files) {
      this.languages.set(file.path, file.language);
      const dir = dirnameOf(file.path);
      const siblings = this.filesByDir.get(dir);
      if (siblings) siblings.push(file.path);
      else this.filesByDir.set(dir, [file.path]);

      let ancestor = dir;
      while (ancestor !== '' && !this.directories.has(ancestor)) {
        this.directories.add(ancestor);
        ancestor = dirnameOf(ancestor);
      }
    }
    for (const siblings of this.filesByDir.values()) siblings.sort();
    this.sortedFiles = [...this.languages.keys()].sort();

    const markers = options.manifestMarkers ?? DEFAULT_MANIFEST_MARKERS;
    const manifestDirs = new Set<string>();
    for (const path of this.sortedFiles) {
      if (isMarker(basenameOf(path), markers)) manifestDirs.add(dirnameOf(path));
    }
    this.manifestDirs = [...manifestDirs].sort(byDepthThenName);

    const bases = unique(['', ...this.manifestDirs]);
    const configured = (options.roots ?? [])
      .map((root) => joinRelative(root))
      .filter((root): root is string => root !== null && this.isDirectory(root));

    this.roots = unique([
      ...configured,
      ...bases.flatMap((base) => [base, ...this.subdirsOf(base, SOURCE_SUBDIRS)]),
    ]);
    this.packageRoots = new Set(bases.flatMap((base) => [base, ...this.subdirsOf(base, ENTRY_SUBDIRS)]));
  }

  private subdirsOf(base: string, names: string[]): string[] {
    return names
      .map((name) => (base === '' ? name : `${base}/${name}`))
      .filter((dir) => this.isDirectory(dir));
  }

  has(path: string): boolean {
    return this.languages.has(path);
  }

  languageOf(path: string): FileLanguage | undefined {
    return this.languages.get(path);
  }

  isDirectory(dir: string): boolean {
    return this.directories.has(dir);
  }

  /**
   * Files directly inside `dir`, sorted
   */
  filesIn(dir: string): readonly string[] {
    return this.filesByDir.get(dir) ?? [];
  }

  allFiles(): readonly string[] {
    return this.sortedFiles;
  }

  allDirectories(): string[] {
    return [...this.directories].sort();
  }

  /**
   * Whether `dir` is the scan root, a manifest directory, or one of their
   * conventional entry-point directories.
   */
  isPackageRoot(dir: string): boolean {
    return this.packageRoots.has(dir);
  }

  /**
   * Nearest ancestor directory of `file` holding the given marker file.
   */
  nearestWithMarker(file: string, marker: string): string | undefined {
    let dir = dirnameOf(file);
    for (;;) {
      const candidate = dir === '' ? marker : `${dir}/${marker}`;
      if (this.has(candidate)) return dir;
      if (dir === '') return undefined;
      dir = dirnameOf(dir);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isMarker(basename: string, markers: string[]): boolean {
  return markers.some((marker) =>
    marker.startsWith('*') ? basename.endsWith(marker.slice(1)) : basename === marker
  );
}

function byDepthThenName(a: string, b: string): number {
  const depth = (dir: string): number => (dir === '' ? 0 : dir.split('/').length);
  return depth(a) - depth(b) || (a < b ? -1 : a > b ? 1 : 0);
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
