/**
 * Analysis Logger
 *
 * Structured logging for analysis runs with severity levels.
 * Writes to stderr so that `--json` output on stdout stays machine-readable.
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

function formatContext(context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) return '';
  return ' ' + chalk.gray(JSON.stringify(context));
}

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  constructor(private level: LogLevel = LogLevel.INFO) {}

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      console.error(chalk.gray(`[DEBUG] ${message}`) + formatContext(context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      console.error(chalk.blue('[INFO]') + ` ${message}` + formatContext(context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      console.error(chalk.yellow(`[WARN] ${message}`) + formatContext(context));
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorInfo = error ? { message: error.message, stack: error.stack } : undefined;
      console.error(chalk.red(`[ERROR] ${message}`) + formatContext({ ...context, ...(errorInfo ? { error: errorInfo } : {}) }));
    }
  }

  /**
   * Set log level dynamically
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * No-op logger for testing or when logging is disabled
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export interface CreateLoggerOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

/**
 * Create a logger based on flags and environment
 *
 * Defaults to WARN so skipped files are visible without cluttering output.
 * DEBUG=1 or --verbose enables everything; --quiet keeps only errors.
 */
export function createLogger(options: CreateLoggerOptions = {}): ConsoleLogger {
  const debugMode = process.env.DEBUG === '1' || process.env.DEBUG === 'true';
  if (options.quiet) return new ConsoleLogger(LogLevel.ERROR);
  if (options.verbose || debugMode) return new ConsoleLogger(LogLevel.DEBUG);
  return new ConsoleLogger(LogLevel.WARN);
}
