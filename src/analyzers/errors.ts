/**
 * Analysis Error Classes
 *
 * Structured error hierarchy for dependency analysis.
 * All errors extend from AnalysisError and carry a machine-readable code plus context.
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
 * Invalid settings (threshold out of range, malformed config file).
 * Fatal: raised before any file is read.
 */
export class ConfigurationError extends AnalysisError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
  }
}

/**
 * A source file whose syntax the extractor cannot handle
 */
export class FileParseError extends AnalysisError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'FILE_PARSE_ERROR', { ...context, filePath, line });
  }
}

/**
 * A source file that could not be read from disk
 */
export class FileReadError extends AnalysisError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'FILE_READ_ERROR', { ...context, filePath });
  }
}

/**
 * No internal modules were discovered under the project root
 */
export class EmptyProjectError extends AnalysisError {
  constructor(
    public readonly projectRoot: string,
    context?: Record<string, unknown>
  ) {
    super(`No source modules found under ${projectRoot}`, 'EMPTY_PROJECT', { ...context, projectRoot });
  }
}

/**
 * A language grammar or parser runtime failed to initialise
 */
export class GrammarLoadError extends AnalysisError {
  constructor(
    message: string,
    public readonly language: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'GRAMMAR_LOAD_ERROR', { ...context, language });
  }
}
