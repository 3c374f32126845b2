/**
 * navindex - Cache Module
 *
 * @module cache
 */

export {
  BaseParseCache,
  MemoryParseCache,
  DEFAULT_MAX_CACHE_ENTRIES,
  type CachedParse,
  type CacheLookup,
  type ParseCache,
  type ParseCacheOptions,
} from './parse-cache.js';

export {
  JsonParseCache,
  clearCacheDirectory,
  cacheFilePath,
  DEFAULT_CACHE_DIR,
  CACHE_FILE_GZ,
  CACHE_SCHEMA_VERSION,
  type JsonParseCacheOptions,
} from './json-parse-cache.js';
