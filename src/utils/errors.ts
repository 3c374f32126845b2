/**
 * navindex - Error Handling
 * @module utils/errors
 *
 * NavIndexError hierarchy. Per-file failures are contained by the indexer
 * and reported as diagnostics; only assembly and configuration failures
 * surface to the caller.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCodes = {
  // Parsing
  PARSE_FAILED: 'PARSE_FAILED',
  BINARY_CONTENT: 'BINARY_CONTENT',

  // Cache
  CACHE_CORRUPTED: 'CACHE_CORRUPTED',
  CACHE_WRITE_FAILED: 'CACHE_WRITE_FAILED',

  // Assembly
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',

  // Configuration
  CONFIG_INVALID: 'CONFIG_INVALID',

  // Files
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  PERMISSION_DENIED: 'PERMISSION_DENIED',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const errorSolutions: Record<ErrorCode, string> = {
  PARSE_FAILED:
    'The file is kept in the index without structure. Check it for unusual encodings.',
  BINARY_CONTENT:
    'Binary files carry no structure. Exclude them with an ignore pattern.',
  CACHE_CORRUPTED:
    'Run `navindex cache --clear`. The cache is rebuilt on the next run.',
  CACHE_WRITE_FAILED:
    'Check that the cache directory is writable, or run with --no-cache.',
  INVARIANT_VIOLATION:
    'The index could not be assembled consistently. Please report this issue.',
  CONFIG_INVALID: 'Run `navindex config --validate` and fix the listed fields.',
  FILE_NOT_FOUND: 'Verify the path exists and is accessible.',
  PERMISSION_DENIED: 'Check file permissions or exclude the path.',
  INTERNAL_ERROR: 'An unexpected error occurred. Please report this issue.',
};

interface ErrorOptions {
  userMessage?: string;
  technical?: unknown;
  cause?: Error;
}

// =============================================================================
// Base Error
// =============================================================================

export class NavIndexError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;
  /** Message with a suggested fix */
  readonly userMessage: string;
  /** Technical details for debugging */
  readonly technical?: unknown;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message);
    this.name = 'NavIndexError';
    this.code = code;
    this.userMessage =
      options?.userMessage ?? `${message}\n\nFix: ${errorSolutions[code]}`;
    this.technical = options?.technical;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  toCliOutput(symbol = true): string {
    const prefix = symbol ? '✗' : '[ERR]';
    return `${prefix} ${this.userMessage}`;
  }

  toJSON(): {
    code: string;
    message: string;
    userMessage: string;
    technical?: unknown;
  } {
    return {
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      ...(this.technical !== undefined ? { technical: this.technical } : {}),
    };
  }
}

// =============================================================================
// Specialized Error Classes
// =============================================================================

/**
 * A single file could not be structurally parsed.
 */
export class ParseError extends NavIndexError {
  readonly filePath?: string;

  constructor(
    code: Extract<ErrorCode, 'PARSE_FAILED' | 'BINARY_CONTENT'>,
    message: string,
    options?: ErrorOptions & { filePath?: string }
  ) {
    super(code, message, options);
    this.name = 'ParseError';
    this.filePath = options?.filePath;
  }
}

export class CacheError extends NavIndexError {
  constructor(
    code: Extract<ErrorCode, 'CACHE_CORRUPTED' | 'CACHE_WRITE_FAILED'>,
    message: string,
    options?: ErrorOptions
  ) {
    super(code, message, options);
    this.name = 'CacheError';
  }
}

/**
 * The assembled index breaks one of its structural invariants.
 */
export class IndexError extends NavIndexError {
  readonly violations: string[];

  constructor(message: string, violations: string[], options?: ErrorOptions) {
    super('INVARIANT_VIOLATION', message, {
      ...options,
      technical: options?.technical ?? { violations },
    });
    this.name = 'IndexError';
    this.violations = violations;
  }
}

export class ConfigError extends NavIndexError {
  readonly errors: string[];

  constructor(message: string, errors: string[], options?: ErrorOptions) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export class FileSystemError extends NavIndexError {
  readonly path?: string;

  constructor(
    code: Extract<ErrorCode, 'FILE_NOT_FOUND' | 'PERMISSION_DENIED'>,
    message: string,
    options?: ErrorOptions & { path?: string }
  ) {
    super(code, message, options);
    this.name = 'FileSystemError';
    this.path = options?.path;
  }
}

// =============================================================================
// Error Helpers
// =============================================================================

export function isNavIndexError(error: unknown): error is NavIndexError {
  return error instanceof NavIndexError;
}

/**
 * Wrap an unknown thrown value as a NavIndexError
 */
export function wrapError(error: unknown, context?: string): NavIndexError {
  if (isNavIndexError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new NavIndexError(
    'INTERNAL_ERROR',
    context ? `${context}: ${message}` : message,
    {
      cause: error instanceof Error ? error : undefined,
      technical: error,
    }
  );
}

/**
 * Short human-readable description of any thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
