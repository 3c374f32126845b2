/**
 * navindex - Centralized Logging
 * @module utils/logger
 *
 * Single logging interface for consistent output. Every entry goes to
 * stderr: stdout is reserved for the encoded index.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface LoggerOptions {
  /** Minimum level to output */
  level?: LogLevel;
  /** Output format: 'pretty' for terminals, 'json' for piped runs */
  format?: 'pretty' | 'json';
  /** Enable colored output */
  colors?: boolean;
  /** Custom output function (for testing) */
  output?: (entry: LogEntry) => void;
}

/**
 * Minimal surface shared by the root logger and its children.
 */
export interface LogSink {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): LogSink;
}

// =============================================================================
// Log Level Priorities
// =============================================================================

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelPriority, value);
}

// =============================================================================
// ANSI Colors
// =============================================================================

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

// =============================================================================
// Logger Class
// =============================================================================

export class Logger implements LogSink {
  private level: LogLevel;
  private format: 'pretty' | 'json';
  private useColors: boolean;
  private customOutput?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? this.getDefaultLevel();
    this.format = options.format ?? this.getDefaultFormat();
    this.useColors = options.colors ?? process.stderr.isTTY ?? false;
    this.customOutput = options.output;
  }

  private getDefaultLevel(): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
      return envLevel;
    }
    return 'warn';
  }

  private getDefaultFormat(): 'pretty' | 'json' {
    if (process.env.LOG_FORMAT === 'json') {
      return 'json';
    }
    return process.stderr.isTTY ? 'pretty' : 'json';
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  private formatContext(context: LogContext): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(context)) {
      const formatted =
        typeof value === 'string' ? value : JSON.stringify(value);
      parts.push(`${key}=${formatted}`);
    }
    return parts.join(' ');
  }

  private colorize(text: string, color: keyof typeof colors): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private getLevelIndicator(level: Exclude<LogLevel, 'silent'>): string {
    const indicators: Record<
      Exclude<LogLevel, 'silent'>,
      { symbol: string; color: keyof typeof colors }
    > = {
      debug: { symbol: '●', color: 'gray' },
      info: { symbol: '●', color: 'blue' },
      warn: { symbol: '▲', color: 'yellow' },
      error: { symbol: '✗', color: 'red' },
    };
    const { symbol, color } = indicators[level];
    return this.colorize(symbol, color);
  }

  private output(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: LogContext
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    if (this.customOutput) {
      this.customOutput(entry);
      return;
    }

    if (this.format === 'json') {
      process.stderr.write(JSON.stringify(entry) + '\n');
      return;
    }

    const indicator = this.getLevelIndicator(level);
    const timestamp = this.colorize(new Date().toLocaleTimeString(), 'dim');
    const contextStr =
      entry.context ? ` ${this.colorize(this.formatContext(entry.context), 'gray')}` : '';

    process.stderr.write(`${indicator} ${timestamp} ${message}${contextStr}\n`);
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  debug(message: string, context?: LogContext): void {
    this.output('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.output('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.output('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.output('error', message, context);
  }

  /**
   * Create a child logger that merges `baseContext` into every entry.
   */
  child(baseContext: LogContext): LogSink {
    return {
      debug: (msg, ctx) => this.debug(msg, { ...baseContext, ...ctx }),
      info: (msg, ctx) => this.info(msg, { ...baseContext, ...ctx }),
      warn: (msg, ctx) => this.warn(msg, { ...baseContext, ...ctx }),
      error: (msg, ctx) => this.error(msg, { ...baseContext, ...ctx }),
      child: (ctx) => this.child({ ...baseContext, ...ctx }),
    };
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.format) this.format = options.format;
    if (options.colors !== undefined) this.useColors = options.colors;
    if (options.output) this.customOutput = options.output;
  }
}

// =============================================================================
// Singleton Export
// =============================================================================

/**
 * Global logger instance
 *
 * Usage:
 * ```typescript
 * import { logger } from './utils/logger.js';
 *
 * logger.info('Indexing started', { files: 127 });
 * logger.warn('File degraded', { path, reason: 'binary' });
 * ```
 */
export const logger = new Logger();

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}
