/**
 * navindex - CLI
 *
 * Command-line interface: index a directory and print or write the
 * encoded index, manage the configuration file and the parse cache.
 * Results go to stdout, logs to stderr.
 *
 * @module cli
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';

import { cacheFilePath, clearCacheDirectory, JsonParseCache } from './cache/json-parse-cache.js';
import {
  generateDefaultConfig,
  loadConfig,
  normalizeExtensions,
  OUTPUT_FORMATS,
  readConfigSource,
  validateUserConfig,
  type NavIndexConfig,
  type OutputFormat,
} from './config.js';
import { indexProject } from './indexer.js';
import { createFileContentLookup, encodeIndex } from './output/index.js';
import { parseInteger } from './utils/cli-options.js';
import { wrapError } from './utils/errors.js';
import { isLogLevel, logger } from './utils/logger.js';
import { pluralize } from './utils/strings.js';

const VERSION = '0.1.0';

const program = new Command();

program
  .name('navindex')
  .description('Structural navigation index for source trees')
  .version(VERSION);

/**
 * Run a command action, reporting failures as a short message and a
 * nonzero exit code.
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      const wrapped = wrapError(error);
      logger.debug('Command failed', { code: wrapped.code, stack: wrapped.stack ?? '' });
      console.error(wrapped.toCliOutput(process.stderr.isTTY ?? false));
      process.exitCode = 1;
    }
  };
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

// ============================================================================
// INDEX COMMAND
// ============================================================================

interface IndexCommandOptions {
  format?: string;
  output?: string;
  cache: boolean;
  snippets?: boolean;
  maxFiles?: number;
  maxFileSize?: number;
  maxTokens?: number;
  exclude?: string[];
  extension?: string[];
  verbose?: boolean;
}

/**
 * Apply command-line overrides on top of the loaded configuration
 */
function applyIndexOptions(config: NavIndexConfig, options: IndexCommandOptions): NavIndexConfig {
  let format = config.output.format;
  if (options.format !== undefined) {
    if (!isOutputFormat(options.format)) {
      throw new Error(`Unknown format '${options.format}', expected one of: ${OUTPUT_FORMATS.join(', ')}`);
    }
    format = options.format;
  }

  return {
    ...config,
    ignore: [...config.ignore, ...(options.exclude ?? [])],
    scan: {
      ...config.scan,
      maxFiles: options.maxFiles ?? config.scan.maxFiles,
      maxFileSize: options.maxFileSize ?? config.scan.maxFileSize,
      filterExtensions:
        options.extension && options.extension.length > 0
          ? normalizeExtensions(options.extension)
          : config.scan.filterExtensions,
    },
    cache: { ...config.cache, enabled: config.cache.enabled && options.cache },
    output: {
      ...config.output,
      format,
      snippets: options.snippets ?? config.output.snippets,
      maxTokens: options.maxTokens ?? config.output.maxTokens,
    },
  };
}

program
  .command('index [path]')
  .description('Index a directory and print the navigation index')
  .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`)
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .option('--no-cache', 'Do not read or write the parse cache')
  .option('-s, --snippets', 'Include source snippets for declarations')
  .option('--max-files <number>', 'Maximum number of files to index', parseInteger)
  .option('--max-file-size <bytes>', 'Skip files larger than this', parseInteger)
  .option('--max-tokens <number>', 'Token budget for the compact format', parseInteger)
  .option('-e, --exclude <patterns...>', 'Additional ignore patterns')
  .option('-x, --extension <extensions...>', 'Only index files with these extensions')
  .option('-v, --verbose', 'Log progress to stderr')
  .action(
    run(async (target: string | undefined, options: IndexCommandOptions) => {
      const projectRoot = path.resolve(target ?? process.cwd());
      const config = applyIndexOptions(await loadConfig(projectRoot), options);
      logger.configure({ level: options.verbose ? 'info' : config.logging.level });

      const controller = new AbortController();
      const onInterrupt = (): void => {
        logger.warn('Interrupted, finishing with the files parsed so far');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const { index, report } = await indexProject(projectRoot, config, { signal: controller.signal });
        const encoded = encodeIndex(index, config.output.format, {
          snippets: config.output.snippets,
          snippetContext: config.output.snippetContext,
          contents: config.output.snippets ? createFileContentLookup(projectRoot) : undefined,
          maxTokens: config.output.maxTokens,
        });

        if (options.output) {
          const outputPath = path.resolve(options.output);
          fs.mkdirSync(path.dirname(outputPath), { recursive: true });
          fs.writeFileSync(outputPath, encoded.endsWith('\n') ? encoded : `${encoded}\n`);
          console.error(
            `Indexed ${pluralize(index.diagnostics.totalFiles, 'file')} in ${report.durationMs}ms ` +
              `(${report.cachedFiles} from cache), wrote ${path.relative(process.cwd(), outputPath) || outputPath}`
          );
        } else {
          process.stdout.write(encoded.endsWith('\n') ? encoded : `${encoded}\n`);
        }

        if (index.diagnostics.cancelled) process.exitCode = 130;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    })
  );

// ============================================================================
// CONFIG COMMAND
// ============================================================================

interface ConfigCommandOptions {
  path: string;
  init?: boolean | string;
  show?: boolean;
  validate?: boolean;
}

program
  .command('config')
  .description('Create, show or validate the configuration')
  .option('-p, --path <path>', 'Project path', process.cwd())
  .option('--init [format]', 'Create a starter config file (json or js)')
  .option('--show', 'Print the effective configuration')
  .option('--validate', 'Check the configuration file')
  .action(
    run(async (options: ConfigCommandOptions) => {
      const projectRoot = path.resolve(options.path);

      if (options.init !== undefined) {
        const format = options.init === 'js' ? 'js' : 'json';
        const fileName = format === 'js' ? 'navindex.config.js' : '.navindexrc.json';
        const configPath = path.join(projectRoot, fileName);
        if (fs.existsSync(configPath)) {
          throw new Error(`${fileName} already exists`);
        }
        fs.writeFileSync(configPath, generateDefaultConfig(format) + '\n');
        console.log(`Created ${fileName}`);
        return;
      }

      if (options.validate) {
        const source = await readConfigSource(projectRoot);
        const { valid, errors } = validateUserConfig(source.raw);
        const where = source.path ? path.basename(source.path) : 'defaults (no config file found)';
        if (valid) {
          console.log(`${where}: valid`);
          return;
        }
        console.log(`${where}: ${pluralize(errors.length, 'problem')}`);
        for (const error of errors) console.log(`  - ${error}`);
        process.exitCode = 1;
        return;
      }

      const config = await loadConfig(projectRoot);
      console.log(JSON.stringify(config, null, 2));
    })
  );

// ============================================================================
// CACHE COMMAND
// ============================================================================

interface CacheCommandOptions {
  path: string;
  clear?: boolean;
  stats?: boolean;
}

program
  .command('cache')
  .description('Inspect or clear the parse cache')
  .option('-p, --path <path>', 'Project path', process.cwd())
  .option('--clear', 'Delete the cache directory')
  .option('--stats', 'Show cache entries and size')
  .action(
    run(async (options: CacheCommandOptions) => {
      const projectRoot = path.resolve(options.path);
      const config = await loadConfig(projectRoot);
      const directory = path.resolve(projectRoot, config.cache.directory);

      if (options.clear) {
        await clearCacheDirectory(directory);
        console.log(`Cleared ${path.relative(projectRoot, directory) || directory}`);
        return;
      }

      if (!options.stats) {
        console.log('Nothing to do. Pass --stats or --clear.');
        return;
      }

      const file = cacheFilePath(directory);
      if (!fs.existsSync(file)) {
        console.log('No parse cache found. Run `navindex index` first.');
        return;
      }
      const cache = await JsonParseCache.open({ directory, maxEntries: config.cache.maxEntries });
      const { entries } = cache.stats();
      const size = fs.statSync(file).size;
      console.log(`Location: ${file}`);
      console.log(`Entries:  ${entries}`);
      console.log(`Size:     ${(size / 1024).toFixed(1)} KB`);
    })
  );

const envLevel = process.env.NAVINDEX_LOG_LEVEL;
if (envLevel && isLogLevel(envLevel)) {
  logger.configure({ level: envLevel });
}

program.parseAsync().catch((error: unknown) => {
  console.error(wrapError(error).toCliOutput());
  process.exitCode = 1;
});
