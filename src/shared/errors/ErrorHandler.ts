import { AppError, ErrorResponse, InternalError, IOError } from './AppError';
import { ILogger } from '../logging/Logger';

/**
 * Top-level error handler: normalizes anything thrown into an AppError
 * and reports it through the injected logger.
 */
export class ErrorHandler {
  constructor(private readonly logger: ILogger) {}

  /**
   * Handle error
   */
  handle(error: unknown): ErrorResponse {
    const appError = this.normalizeError(error);
    this.logError(appError);
    return appError.toJSON();
  }

  /**
   * Normalize error to AppError
   */
  normalizeError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (!(error instanceof Error)) {
      return new InternalError(String(error));
    }

    const code = systemErrorCode(error);
    if (code === 'ENOENT' || code === 'EACCES' || code === 'EPERM' || code === 'ENOSPC') {
      const path = 'path' in error && typeof error.path === 'string' ? error.path : '';
      return new IOError(error.message, path, error);
    }

    return new InternalError(error.message, {
      originalError: error.name,
      stack: error.stack
    });
  }

  private logError(error: AppError): void {
    if (error.isOperational) {
      this.logger.error(`[${error.code}] ${error.message}`, undefined, error.details);
    } else {
      this.logger.fatal('Unexpected error', error, error.details);
    }
  }
}

function systemErrorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}
