/**
 * Tests for the parse caches
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { gzipSync } from 'node:zlib';

import {
  MemoryParseCache,
  JsonParseCache,
  cacheFilePath,
  clearCacheDirectory,
  CACHE_SCHEMA_VERSION,
} from '../src/cache/index';
import type { CachedParse } from '../src/cache/index';
import { PARSER_VERSION } from '../src/parser/structural-parser';
import type { ParsedStructure } from '../src/types/index';
import { Logger, type LogEntry } from '../src/utils/logger';

const structure: ParsedStructure = {
  imports: ['os'],
  functions: [{ name: 'run', line: 1, params: ['x'] }],
  classes: [{ name: 'Job', line: 3, kind: 'class', bases: [], methodCount: 0 }],
  lineCount: 4,
};

const cachedParse: CachedParse = { ...structure, language: 'python' };

describe('MemoryParseCache', () => {
  it('should parse once per fingerprint', async () => {
    const cache = new MemoryParseCache();
    let calls = 0;
    const produce = (): ParsedStructure => {
      calls++;
      return structure;
    };

    const first = await cache.getOrParse('fp-1', 'python', produce);
    const second = await cache.getOrParse('fp-1', 'python', produce);

    expect(calls).toBe(1);
    expect(first.cached).toBe(false);
    expect(second.cached).toBe(true);
    expect(second.parse).toEqual(cachedParse);
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1, hitRate: 0.5 });
  });

  it('should share one parse between concurrent lookups', async () => {
    const cache = new MemoryParseCache();
    let calls = 0;
    const produce = async (): Promise<ParsedStructure> => {
      calls++;
      await new Promise((resolve) => setTimeout(resolve, 5));
      return structure;
    };

    const [a, b] = await Promise.all([
      cache.getOrParse('fp-1', 'python', produce),
      cache.getOrParse('fp-1', 'python', produce),
    ]);

    expect(calls).toBe(1);
    expect(a.parse).toEqual(b.parse);
  });

  it('should miss when the content was parsed as another language', async () => {
    const cache = new MemoryParseCache();
    cache.put('fp-1', cachedParse);

    expect(cache.get('fp-1', 'ruby')).toBeUndefined();
    expect(cache.get('fp-1', 'python')).toEqual(cachedParse);

    const lookup = await cache.getOrParse('fp-1', 'ruby', () => structure);
    expect(lookup.cached).toBe(false);
    expect(lookup.parse.language).toBe('ruby');
    expect(cache.stats().entries).toBe(1);
  });

  it('should store nothing when parsing fails', async () => {
    const cache = new MemoryParseCache();

    await expect(
      cache.getOrParse('fp-1', 'python', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(cache.stats().entries).toBe(0);

    const retry = await cache.getOrParse('fp-1', 'python', () => structure);
    expect(retry.cached).toBe(false);
  });

  it('should evict the least recently used entry', () => {
    const cache = new MemoryParseCache({ maxEntries: 2 });
    cache.put('a', cachedParse);
    cache.put('b', cachedParse);
    cache.get('a', 'python');
    cache.put('c', cachedParse);

    expect(cache.get('b', 'python')).toBeUndefined();
    expect(cache.get('a', 'python')).toBeDefined();
    expect(cache.get('c', 'python')).toBeDefined();
    expect(cache.stats().entries).toBe(2);
  });
});

describe('JsonParseCache', () => {
  let dir: string;
  let entries: LogEntry[];
  let log: Logger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'navindex-cache-'));
    entries = [];
    log = new Logger({ level: 'info', output: (entry) => entries.push(entry) });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeCacheFile(payload: unknown): Promise<void> {
    await mkdir(dir, { recursive: true });
    await writeFile(cacheFilePath(dir), gzipSync(JSON.stringify(payload)));
  }

  it('should start empty when no file exists', async () => {
    const cache = await JsonParseCache.open({ directory: dir, logger: log });
    expect(cache.stats().entries).toBe(0);
  });

  it('should not write a file when nothing changed', async () => {
    const cache = await JsonParseCache.open({ directory: dir, logger: log });
    await cache.flush();
    expect(existsSync(cacheFilePath(dir))).toBe(false);
  });

  it('should persist entries across opens', async () => {
    const first = await JsonParseCache.open({ directory: dir, logger: log });
    await first.getOrParse('fp-1', 'python', () => structure);
    await first.flush();

    expect(existsSync(cacheFilePath(dir))).toBe(true);
    expect(existsSync(`${cacheFilePath(dir)}.tmp`)).toBe(false);

    const second = await JsonParseCache.open({ directory: dir, logger: log });
    expect(second.get('fp-1', 'python')).toEqual(cachedParse);
  });

  it('should start fresh when the file is corrupted', async () => {
    await mkdir(dir, { recursive: true });
    await writeFile(cacheFilePath(dir), 'not gzip at all');

    const cache = await JsonParseCache.open({ directory: dir, logger: log });

    expect(cache.stats().entries).toBe(0);
    const warnings = entries.filter((entry) => entry.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toMatch(/^Parse cache unreadable: .*, starting fresh$/);
  });

  it('should start fresh when the file has an unexpected layout', async () => {
    await writeCacheFile(['not', 'an', 'object']);

    const cache = await JsonParseCache.open({ directory: dir, logger: log });

    expect(cache.stats().entries).toBe(0);
    expect(entries.map((entry) => entry.message)).toEqual([
      'Parse cache has an unexpected layout, starting fresh',
    ]);
  });

  it('should discard entries written by another parser version', async () => {
    await writeCacheFile({
      schemaVersion: CACHE_SCHEMA_VERSION,
      parserVersion: PARSER_VERSION - 1,
      entries: [['fp-1', cachedParse]],
    });

    const cache = await JsonParseCache.open({ directory: dir, logger: log });

    expect(cache.get('fp-1', 'python')).toBeUndefined();
    expect(entries.map((entry) => entry.message)).toEqual(['Parse cache is from another version, starting fresh']);
  });

  it('should drop malformed entries and keep the rest', async () => {
    await writeCacheFile({
      schemaVersion: CACHE_SCHEMA_VERSION,
      parserVersion: PARSER_VERSION,
      entries: [
        ['fp-1', cachedParse],
        ['fp-2', { ...cachedParse, language: 'klingon' }],
        ['fp-3', { ...cachedParse, functions: [{ name: 'x', line: 0, params: [] }] }],
        'garbage',
      ],
    });

    const cache = await JsonParseCache.open({ directory: dir, logger: log });

    expect(cache.stats().entries).toBe(1);
    expect(cache.get('fp-1', 'python')).toEqual(cachedParse);
    const warning = entries.find((entry) => entry.level === 'warn');
    expect(warning?.message).toBe('Dropped malformed parse cache entries');
    expect(warning?.context).toEqual({ component: 'parse-cache', dropped: 3 });
  });

  it('should remove the directory on clear', async () => {
    const cache = await JsonParseCache.open({ directory: dir, logger: log });
    await cache.getOrParse('fp-1', 'python', () => structure);
    await cache.flush();

    await clearCacheDirectory(dir);
    expect(existsSync(dir)).toBe(false);

    // Clearing a missing directory is fine
    await expect(clearCacheDirectory(dir)).resolves.toBeUndefined();
  });
});
