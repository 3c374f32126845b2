/**
 * navindex - Configuration
 *
 * Loads and validates configuration from the first source found:
 * - .navindexrc.json
 * - .navindexrc
 * - navindex.config.js / .mjs / .cjs
 * - package.json "navindex" field
 *
 * @module config
 */

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';

import { DEFAULT_CACHE_DIR } from './cache/json-parse-cache.js';
import { DEFAULT_MAX_CACHE_ENTRIES } from './cache/parse-cache.js';
import { DEFAULT_ENTRY_POINT_NAMES } from './graph/entry-points.js';
import { DEFAULT_NAVIGATION_OPTIONS } from './graph/navigation.js';
import { DEFAULT_MANIFEST_MARKERS } from './resolver/resolution-context.js';
import { ConfigError, describeError } from './utils/errors.js';
import { isLogLevel, logger, type LogLevel } from './utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export type OutputFormat = 'markdown' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['markdown', 'json', 'compact'];

/**
 * navindex configuration schema
 */
export interface NavIndexConfig {
  /** Patterns to ignore (in addition to the defaults and .gitignore) */
  ignore: string[];

  scan: {
    /** Stop after this many files */
    maxFiles: number;
    /** Skip files larger than this (bytes) */
    maxFileSize: number;
    followSymlinks: boolean;
    /** Only index these extensions (empty = all) */
    filterExtensions: string[];
    /** Honor .gitignore and .navindexignore files */
    useIgnoreFiles: boolean;
  };

  cache: {
    enabled: boolean;
    /** Cache directory, relative to the project root */
    directory: string;
    maxEntries: number;
  };

  concurrency: {
    /** Parse pool size, null for the number of available cores */
    maxWorkers: number | null;
  };

  resolution: {
    /** Extra import roots, relative to the project root */
    roots: string[];
    manifestMarkers: string[];
  };

  entryPoints: {
    names: string[];
    minOutDegree: number;
  };

  navigation: {
    hopLimit: number;
    maxEntryPaths: number;
    clusterMemberCap: number;
  };

  output: {
    format: OutputFormat;
    snippets: boolean;
    /** Lines shown around each declaration in snippets */
    snippetContext: number;
    /** Token budget of the compact encoding */
    maxTokens: number;
  };

  logging: {
    level: LogLevel;
  };
}

/**
 * What a configuration source may contain: any subset of fields.
 */
export interface UserConfig {
  ignore?: string[];
  scan?: Partial<NavIndexConfig['scan']>;
  cache?: Partial<NavIndexConfig['cache']>;
  concurrency?: Partial<NavIndexConfig['concurrency']>;
  resolution?: Partial<NavIndexConfig['resolution']>;
  entryPoints?: Partial<NavIndexConfig['entryPoints']>;
  navigation?: Partial<NavIndexConfig['navigation']>;
  output?: Partial<NavIndexConfig['output']>;
  logging?: Partial<NavIndexConfig['logging']>;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: NavIndexConfig = {
  ignore: [],
  scan: {
    maxFiles: 1000,
    maxFileSize: 100 * 1024, // 100KB
    followSymlinks: false,
    filterExtensions: [],
    useIgnoreFiles: true,
  },
  cache: {
    enabled: true,
    directory: DEFAULT_CACHE_DIR,
    maxEntries: DEFAULT_MAX_CACHE_ENTRIES,
  },
  concurrency: {
    maxWorkers: null,
  },
  resolution: {
    roots: [],
    manifestMarkers: DEFAULT_MANIFEST_MARKERS,
  },
  entryPoints: {
    names: DEFAULT_ENTRY_POINT_NAMES,
    minOutDegree: 1,
  },
  navigation: { ...DEFAULT_NAVIGATION_OPTIONS },
  output: {
    format: 'markdown',
    snippets: false,
    snippetContext: 2,
    maxTokens: 6000,
  },
  logging: {
    level: 'warn',
  },
};

// ============================================================================
// CONFIG LOADER
// ============================================================================

/**
 * Configuration file names to search for (in order of priority)
 */
export const CONFIG_FILES = [
  '.navindexrc.json',
  '.navindexrc',
  'navindex.config.js',
  'navindex.config.mjs',
  'navindex.config.cjs',
];

export interface ConfigSource {
  /** File the configuration came from, null when none was found */
  path: string | null;
  /** Raw contents, not yet checked */
  raw: unknown;
}

/**
 * Find and read the project's configuration source.
 */
export async function readConfigSource(projectRoot: string): Promise<ConfigSource> {
  const resolvedRoot = path.resolve(projectRoot);

  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(resolvedRoot, configFile);
    if (fs.existsSync(configPath)) {
      return { path: configPath, raw: await loadConfigFile(configPath) };
    }
  }

  const packageJsonPath = path.join(resolvedRoot, 'package.json');
  if (fs.existsSync(packageJsonPath)) {
    try {
      const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
      if (isRecord(packageJson) && packageJson.navindex !== undefined) {
        return { path: packageJsonPath, raw: packageJson.navindex };
      }
    } catch (error) {
      logger.debug('Ignoring unreadable package.json', { error: describeError(error) });
    }
  }

  return { path: null, raw: {} };
}

/**
 * Load configuration from project root
 *
 * @param projectRoot - Project root directory
 * @returns Merged configuration with defaults
 * @throws ConfigError when a field has the wrong type or an invalid value
 */
export async function loadConfig(projectRoot: string): Promise<NavIndexConfig> {
  const source = await readConfigSource(projectRoot);
  const { config, errors } = parseUserConfig(source.raw);
  const merged = mergeConfig(config);
  const problems = [...errors, ...validateConfig(merged).errors];

  if (problems.length > 0) {
    throw new ConfigError(
      `Invalid configuration${source.path ? ` in ${path.basename(source.path)}` : ''}: ${problems.join('; ')}`,
      problems
    );
  }
  return merged;
}

/**
 * Load a specific config file
 */
async function loadConfigFile(configPath: string): Promise<unknown> {
  const ext = path.extname(configPath);

  try {
    if (ext === '.json' || configPath.endsWith('.navindexrc')) {
      const content = fs.readFileSync(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      return parsed;
    }

    if (ext === '.js' || ext === '.mjs' || ext === '.cjs') {
      // JavaScript config - use dynamic import
      const module: unknown = await import(pathToFileURL(configPath).href);
      return isRecord(module) && module.default !== undefined ? module.default : module;
    }
  } catch (error) {
    throw new ConfigError(`Failed to load ${path.basename(configPath)}: ${describeError(error)}`, [
      describeError(error),
    ]);
  }

  throw new ConfigError(`Unsupported config file format: ${ext}`, [`unsupported format ${ext}`]);
}

/**
 * Merge user config with defaults
 */
export function mergeConfig(userConfig: UserConfig): NavIndexConfig {
  const d = DEFAULT_CONFIG;
  return {
    ignore: [...d.ignore, ...(userConfig.ignore ?? [])],
    scan: {
      maxFiles: userConfig.scan?.maxFiles ?? d.scan.maxFiles,
      maxFileSize: userConfig.scan?.maxFileSize ?? d.scan.maxFileSize,
      followSymlinks: userConfig.scan?.followSymlinks ?? d.scan.followSymlinks,
      filterExtensions: normalizeExtensions(userConfig.scan?.filterExtensions ?? d.scan.filterExtensions),
      useIgnoreFiles: userConfig.scan?.useIgnoreFiles ?? d.scan.useIgnoreFiles,
    },
    cache: {
      enabled: userConfig.cache?.enabled ?? d.cache.enabled,
      directory: userConfig.cache?.directory ?? d.cache.directory,
      maxEntries: userConfig.cache?.maxEntries ?? d.cache.maxEntries,
    },
    concurrency: {
      maxWorkers: userConfig.concurrency?.maxWorkers ?? d.concurrency.maxWorkers,
    },
    resolution: {
      roots: userConfig.resolution?.roots ?? d.resolution.roots,
      manifestMarkers: userConfig.resolution?.manifestMarkers ?? d.resolution.manifestMarkers,
    },
    entryPoints: {
      names: userConfig.entryPoints?.names ?? d.entryPoints.names,
      minOutDegree: userConfig.entryPoints?.minOutDegree ?? d.entryPoints.minOutDegree,
    },
    navigation: {
      hopLimit: userConfig.navigation?.hopLimit ?? d.navigation.hopLimit,
      maxEntryPaths: userConfig.navigation?.maxEntryPaths ?? d.navigation.maxEntryPaths,
      clusterMemberCap: userConfig.navigation?.clusterMemberCap ?? d.navigation.clusterMemberCap,
    },
    output: {
      format: userConfig.output?.format ?? d.output.format,
      snippets: userConfig.output?.snippets ?? d.output.snippets,
      snippetContext: userConfig.output?.snippetContext ?? d.output.snippetContext,
      maxTokens: userConfig.output?.maxTokens ?? d.output.maxTokens,
    },
    logging: {
      level: userConfig.logging?.level ?? d.logging.level,
    },
  };
}

/**
 * Extensions with a leading dot, lowercased
 *
 * @example
 * normalizeExtensions(['py', '.TS']) // ['.py', '.ts']
 */
export function normalizeExtensions(extensions: readonly string[]): string[] {
  const normalized = extensions
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext !== '' && ext !== '.')
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
  return [...new Set(normalized)];
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Typed view of a raw configuration value. Fields of the wrong type are
 * left out and reported.
 */
export function parseUserConfig(raw: unknown): { config: UserConfig; errors: string[] } {
  const errors: string[] = [];
  if (!isRecord(raw)) {
    return { config: {}, errors: ['configuration must be an object'] };
  }

  const root = new FieldReader(raw, '', errors);
  const scan = root.section('scan');
  const cache = root.section('cache');
  const concurrency = root.section('concurrency');
  const resolution = root.section('resolution');
  const entryPoints = root.section('entryPoints');
  const navigation = root.section('navigation');
  const output = root.section('output');
  const logging = root.section('logging');

  const maxWorkers = concurrency.value('maxWorkers');
  let workers: number | null | undefined;
  if (maxWorkers === null || typeof maxWorkers === 'number') workers = maxWorkers;
  else if (maxWorkers !== undefined) errors.push('concurrency.maxWorkers must be a number or null');

  const config: UserConfig = {
    ignore: root.strings('ignore'),
    scan: {
      maxFiles: scan.number('maxFiles'),
      maxFileSize: scan.number('maxFileSize'),
      followSymlinks: scan.boolean('followSymlinks'),
      filterExtensions: scan.strings('filterExtensions'),
      useIgnoreFiles: scan.boolean('useIgnoreFiles'),
    },
    cache: {
      enabled: cache.boolean('enabled'),
      directory: cache.string('directory'),
      maxEntries: cache.number('maxEntries'),
    },
    concurrency: { maxWorkers: workers },
    resolution: {
      roots: resolution.strings('roots'),
      manifestMarkers: resolution.strings('manifestMarkers'),
    },
    entryPoints: {
      names: entryPoints.strings('names'),
      minOutDegree: entryPoints.number('minOutDegree'),
    },
    navigation: {
      hopLimit: navigation.number('hopLimit'),
      maxEntryPaths: navigation.number('maxEntryPaths'),
      clusterMemberCap: navigation.number('clusterMemberCap'),
    },
    output: {
      format: output.oneOf('format', OUTPUT_FORMATS),
      snippets: output.boolean('snippets'),
      snippetContext: output.number('snippetContext'),
      maxTokens: output.number('maxTokens'),
    },
    logging: {
      level: logging.guarded(
        'level',
        (value): value is LogLevel => typeof value === 'string' && isLogLevel(value),
        'a log level (debug, info, warn, error, silent)'
      ),
    },
  };

  return { config, errors };
}

class FieldReader {
  constructor(
    private readonly raw: Record<string, unknown>,
    private readonly prefix: string,
    private readonly errors: string[]
  ) {}

  value(key: string): unknown {
    return this.raw[key];
  }

  section(key: string): FieldReader {
    const value = this.raw[key];
    const prefix = `${this.prefix}${key}.`;
    if (value === undefined) return new FieldReader({}, prefix, this.errors);
    if (!isRecord(value)) {
      this.errors.push(`${this.prefix}${key} must be an object`);
      return new FieldReader({}, prefix, this.errors);
    }
    return new FieldReader(value, prefix, this.errors);
  }

  string(key: string): string | undefined {
    return this.guarded(key, (value): value is string => typeof value === 'string', 'a string');
  }

  number(key: string): number | undefined {
    return this.guarded(
      key,
      (value): value is number => typeof value === 'number' && Number.isFinite(value),
      'a number'
    );
  }

  boolean(key: string): boolean | undefined {
    return this.guarded(key, (value): value is boolean => typeof value === 'boolean', 'a boolean');
  }

  strings(key: string): string[] | undefined {
    return this.guarded(
      key,
      (value): value is string[] => Array.isArray(value) && value.every((item) => typeof item === 'string'),
      'an array of strings'
    );
  }

  oneOf<T extends string>(key: string, values: readonly T[]): T | undefined {
    return this.guarded(
      key,
      (value): value is T => typeof value === 'string' && values.some((allowed) => allowed === value),
      `one of ${values.join(', ')}`
    );
  }

  guarded<T>(key: string, guard: (value: unknown) => value is T, expected: string): T | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    if (guard(value)) return value;
    this.errors.push(`${this.prefix}${key} must be ${expected}`);
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate configuration
 */
export function validateConfig(config: NavIndexConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const atLeast = (value: number, minimum: number, field: string): void => {
    if (!Number.isInteger(value) || value < minimum) {
      errors.push(`${field} must be an integer of at least ${minimum}`);
    }
  };

  atLeast(config.scan.maxFiles, 1, 'scan.maxFiles');
  atLeast(config.scan.maxFileSize, 1, 'scan.maxFileSize');
  atLeast(config.cache.maxEntries, 1, 'cache.maxEntries');
  if (config.cache.directory.trim() === '') {
    errors.push('cache.directory must not be empty');
  }
  if (config.concurrency.maxWorkers !== null) {
    atLeast(config.concurrency.maxWorkers, 1, 'concurrency.maxWorkers');
  }
  if (config.entryPoints.names.some((name) => name.trim() === '')) {
    errors.push('entryPoints.names must not contain empty names');
  }
  atLeast(config.entryPoints.minOutDegree, 0, 'entryPoints.minOutDegree');
  atLeast(config.navigation.hopLimit, 1, 'navigation.hopLimit');
  atLeast(config.navigation.maxEntryPaths, 0, 'navigation.maxEntryPaths');
  atLeast(config.navigation.clusterMemberCap, 1, 'navigation.clusterMemberCap');
  atLeast(config.output.snippetContext, 0, 'output.snippetContext');
  atLeast(config.output.maxTokens, 100, 'output.maxTokens');

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check a raw configuration value: field types first, then values.
 */
export function validateUserConfig(raw: unknown): { valid: boolean; errors: string[] } {
  const { config, errors } = parseUserConfig(raw);
  const all = [...errors, ...validateConfig(mergeConfig(config)).errors];
  return { valid: all.length === 0, errors: all };
}

// ============================================================================
// STARTER FILE
// ============================================================================

/**
 * Generate a default config file
 */
export function generateDefaultConfig(format: 'json' | 'js' = 'json'): string {
  const starter = {
    ignore: ['**/fixtures/**', '**/*.generated.*'],
    scan: {
      maxFiles: DEFAULT_CONFIG.scan.maxFiles,
      maxFileSize: DEFAULT_CONFIG.scan.maxFileSize,
    },
    cache: {
      enabled: true,
      directory: DEFAULT_CONFIG.cache.directory,
    },
    entryPoints: {
      names: DEFAULT_CONFIG.entryPoints.names,
    },
    output: {
      format: DEFAULT_CONFIG.output.format,
      snippets: false,
    },
  };

  if (format === 'json') {
    return JSON.stringify(starter, null, 2);
  }

  return `/**
 * navindex configuration
 * @type {import('navindex').UserConfig}
 */
export default {
  // Additional patterns to ignore (adds to .gitignore)
  ignore: ${JSON.stringify(starter.ignore)},

  // Scan limits
  scan: {
    maxFiles: ${starter.scan.maxFiles},
    maxFileSize: ${starter.scan.maxFileSize},
  },

  // Parse cache, safe to delete
  cache: {
    enabled: true,
    directory: '${starter.cache.directory}',
  },

  // File stems treated as entry points
  entryPoints: {
    names: ${JSON.stringify(starter.entryPoints.names)},
  },

  output: {
    format: '${starter.output.format}',
    snippets: false,
  },
};
`;
}
