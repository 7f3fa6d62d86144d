/**
 * Pipeline Error Taxonomy
 *
 * Run-level errors (SchemaError, FormatError, ConfigError) abort the whole run.
 * Record-level errors (TransientError, FatalError, ParseError) are absorbed by
 * ResponseClassifier and degrade a single record to the "Other" fallback.
 */

export type PipelineErrorCode =
  | 'SCHEMA_ERROR'
  | 'FORMAT_ERROR'
  | 'CONFIG_ERROR'
  | 'TRANSIENT_ERROR'
  | 'FATAL_ERROR'
  | 'PARSE_ERROR';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/**
 * Named input column is absent from the header row
 */
export class SchemaError extends PipelineError {
  readonly code = 'SCHEMA_ERROR';
}

/**
 * Unsupported or unreadable file format
 */
export class FormatError extends PipelineError {
  readonly code = 'FORMAT_ERROR';
}

/**
 * Missing credential or invalid run setting
 */
export class ConfigError extends PipelineError {
  readonly code = 'CONFIG_ERROR';
}

/**
 * Model output could not be read as the expected JSON object
 */
export class ParseError extends PipelineError {
  readonly code = 'PARSE_ERROR';
}

/**
 * Service failure carrying the HTTP status when one was returned
 */
abstract class ServiceError extends PipelineError {
  readonly status?: number;

  constructor(message: string, status?: number, details?: Record<string, unknown>) {
    super(message, details);
    this.status = status;
  }
}

/**
 * Rate limiting, overload, 5xx, timeouts and dropped connections
 */
export class TransientError extends ServiceError {
  readonly code = 'TRANSIENT_ERROR';
}

/**
 * Any other service failure (bad request, authentication, not found...)
 */
export class FatalError extends ServiceError {
  readonly code = 'FATAL_ERROR';
}

/**
 * Errors that mean the run cannot produce meaningful output
 */
export function isRunAbortingError(error: unknown): error is SchemaError | FormatError | ConfigError {
  return (
    error instanceof SchemaError ||
    error instanceof FormatError ||
    error instanceof ConfigError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
