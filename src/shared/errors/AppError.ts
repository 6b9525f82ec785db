/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON
   */
  toJSON(): ErrorResponse {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      details: this.details
    };
  }
}

/**
 * Error response interface
 */
export interface ErrorResponse {
  name: string;
  message: string;
  code: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR', true, field ? { field } : undefined);
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', true, details);
  }
}

/**
 * Network or transport failure reaching a URL
 */
export class FetchError extends AppError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message, 'FETCH_ERROR', true, status === undefined ? { url } : { url, status });
  }
}

/**
 * Malformed playlist bytes
 */
export class ParseError extends AppError {
  constructor(message: string, public readonly url?: string) {
    super(message, 'PARSE_ERROR', true, url ? { url } : undefined);
  }
}

/**
 * Master playlist without a usable variant, unresolvable URI,
 * redirect chain too deep
 */
export class ResolutionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESOLUTION_ERROR', true, details);
  }
}

/**
 * Filesystem create/write/sync/rename failure
 */
export class IOError extends AppError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, 'IO_ERROR', true, {
      path,
      ...(cause instanceof Error && { cause: cause.message })
    });
  }
}

/**
 * Download record missing or malformed. Never fatal: callers treat it
 * as a cache miss.
 */
export class CacheError extends AppError {
  constructor(message: string, public readonly directory: string) {
    super(message, 'CACHE_ERROR', true, { directory });
  }
}

/**
 * Muxer or player exited with a non-zero status
 */
export class ExternalProcessError extends AppError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(
      `${command} failed (exit code ${exitCode}): ${stderr.trim()}`,
      'EXTERNAL_PROCESS_ERROR',
      true,
      { command, exitCode }
    );
  }
}

/**
 * Internal error
 */
export class InternalError extends AppError {
  constructor(message: string = 'Internal error', details?: Record<string, unknown>) {
    super(message, 'INTERNAL_ERROR', false, details);
  }
}
