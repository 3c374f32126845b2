/**
 * navindex - Utilities Module
 * @module utils
 *
 * Re-exports all utility functions and types.
 */

// Error handling
export {
  NavIndexError,
  ParseError,
  CacheError,
  IndexError,
  ConfigError,
  FileSystemError,
  ErrorCodes,
  isNavIndexError,
  wrapError,
  describeError,
  type ErrorCode,
} from './errors.js';

// Logging
export {
  Logger,
  logger,
  createLogger,
  isLogLevel,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerOptions,
  type LogSink,
} from './logger.js';

// Path utilities
export {
  normalizePath,
  dirnameOf,
  basenameOf,
  stemOf,
  getExtension,
  topLevelSegment,
  joinRelative,
  createIgnoreFilter,
  isIgnored,
  DEFAULT_IGNORE_PATTERNS,
} from './paths.js';

// String utilities
export { truncate, pluralize, estimateTokens, extractSnippet, type Snippet } from './strings.js';

// Hashing
export { fingerprint } from './hash.js';
