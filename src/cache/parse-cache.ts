/**
 * navindex - Parse Cache
 * @module cache/parse-cache
 *
 * Parse results keyed by content fingerprint. A file whose bytes did not
 * change since the last run skips the parser entirely; resolution is never
 * cached because it depends on the whole file set.
 *
 * Implementations:
 * - MemoryParseCache: process-local, used for embedded and `--no-cache` runs
 * - JsonParseCache: gzip JSON file under the cache directory
 */

import type { CacheStats, LanguageTag, ParsedStructure } from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * One cached parse outcome
 */
export interface CachedParse extends ParsedStructure {
  /** Language the content was parsed as */
  language: LanguageTag;
}

export interface CacheLookup {
  parse: CachedParse;
  /** Whether the result came from the cache */
  cached: boolean;
}

export interface ParseCache {
  /**
   * Cached parse for `fingerprint`, a miss when it was parsed as another
   * language.
   */
  get(fingerprint: string, language: LanguageTag): CachedParse | undefined;

  put(fingerprint: string, parse: CachedParse): void;

  /**
   * Cached parse, or the result of `produce` stored under `fingerprint`.
   * Concurrent calls for the same fingerprint share one `produce` call.
   * A rejected `produce` stores nothing.
   */
  getOrParse(
    fingerprint: string,
    language: LanguageTag,
    produce: () => ParsedStructure | Promise<ParsedStructure>
  ): Promise<CacheLookup>;

  /** Persist pending entries; a no-op for process-local caches */
  flush(): Promise<void>;

  stats(): CacheStats;
}

export interface ParseCacheOptions {
  /** Entries kept before least-recently-used eviction (default: 10000) */
  maxEntries?: number;
}

export const DEFAULT_MAX_CACHE_ENTRIES = 10_000;

// =============================================================================
// Shared Implementation
// =============================================================================

/**
 * LRU map with hit/miss accounting and single-flight population.
 * Subclasses decide how entries reach disk.
 */
export abstract class BaseParseCache implements ParseCache {
  protected entries = new Map<string, CachedParse>();
  protected readonly maxEntries: number;
  protected dirty = false;
  private readonly inflight = new Map<string, Promise<CacheLookup>>();
  private hits = 0;
  private misses = 0;

  constructor(options: ParseCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_CACHE_ENTRIES);
  }

  get(fingerprint: string, language: LanguageTag): CachedParse | undefined {
    const entry = this.entries.get(fingerprint);
    if (entry === undefined || entry.language !== language) {
      this.misses++;
      return undefined;
    }
    // Refresh recency
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    this.hits++;
    return entry;
  }

  put(fingerprint: string, parse: CachedParse): void {
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, parse);
    this.dirty = true;
    this.evictIfNeeded();
  }

  getOrParse(
    fingerprint: string,
    language: LanguageTag,
    produce: () => ParsedStructure | Promise<ParsedStructure>
  ): Promise<CacheLookup> {
    const key = `${language}:${fingerprint}`;
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const cached = this.get(fingerprint, language);
    if (cached) return Promise.resolve({ parse: cached, cached: true });

    // Registered before `produce` can settle, removed once it has
    const task = this.populate(fingerprint, language, produce).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, task);
    return task;
  }

  private async populate(
    fingerprint: string,
    language: LanguageTag,
    produce: () => ParsedStructure | Promise<ParsedStructure>
  ): Promise<CacheLookup> {
    const structure = await produce();
    const parse: CachedParse = { ...structure, language };
    this.put(fingerprint, parse);
    return { parse, cached: false };
  }

  abstract flush(): Promise<void>;

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  clear(): void {
    this.entries.clear();
    this.dirty = true;
  }

  private evictIfNeeded(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}

// =============================================================================
// Memory Cache
// =============================================================================

export class MemoryParseCache extends BaseParseCache {
  async flush(): Promise<void> {
    this.dirty = false;
  }
}
