/**
 * Analysis Logger
 *
 * Leveled logging for analysis runs. Diagnostics go to stderr so that
 * reports written to stdout stay machine-readable.
 */

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
  return context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
}

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = LogLevel.INFO,
    private readonly scope: string = 'smellscope'
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      console.error(`[DEBUG] [${this.scope}] ${message}${formatContext(context)}`);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      console.error(`[INFO] [${this.scope}] ${message}${formatContext(context)}`);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      console.error(`[WARN] [${this.scope}] ${message}${formatContext(context)}`);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const detail = error ? { ...context, error: error.message } : context;
      console.error(`[ERROR] [${this.scope}] ${message}${formatContext(detail)}`);
    }
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

/**
 * Create a logger based on environment
 *
 * By default, only shows WARN and ERROR messages to avoid cluttering CLI output.
 * Set DEBUG=1 (or pass `verbose`) to enable all log levels including INFO and DEBUG.
 */
export function createLogger(options: { verbose?: boolean } = {}): ConsoleLogger {
  const debugMode = options.verbose === true || process.env.DEBUG === '1' || process.env.DEBUG === 'true';
  return new ConsoleLogger(debugMode ? LogLevel.DEBUG : LogLevel.WARN);
}
