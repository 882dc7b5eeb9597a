/**
 * Analysis Error Classes
 *
 * Structured error hierarchy for analysis operations.
 * All errors extend from AnalysisError base class and include context information.
 */

/**
 * Base error class for all analysis errors
 */
export abstract class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when source text is not syntactically valid.
 * Line and column are 1-based.
 */
export class ParseError extends AnalysisError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line: number,
    public readonly column: number,
    context?: Record<string, unknown>
  ) {
    super(`${filePath}:${line}:${column} - ${message}`, 'PARSE_ERROR', { ...context, filePath, line, column });
  }
}

/**
 * Error thrown when detector options or a configuration file are invalid
 */
export class ConfigError extends AnalysisError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    context?: Record<string, unknown>
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG_ERROR', { ...context, issues });
  }
}
