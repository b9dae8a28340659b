/**
 * Base application error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestError extends AppError {
  constructor(message = 'Bad request', code = 'BAD_REQUEST') {
    super(message, 400, code);
  }
}

/**
 * 422 Unprocessable Entity
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 422, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * Failure of a single upscaling engine (inference exception, non-zero exit,
 * timeout, missing output). Recovered by the fallback chain, never returned
 * to a client.
 */
export class EngineError extends AppError {
  public readonly engine: string;
  public readonly originalError?: Error;

  constructor(engine: string, message: string, originalError?: Error) {
    super(`${engine}: ${message}`, 502, 'ENGINE_ERROR');
    this.engine = engine;
    this.originalError = originalError;
  }
}

/**
 * 500 - no engine, interpolation included, could produce an image
 */
export class ProcessingFailedError extends AppError {
  public readonly originalError?: Error;

  constructor(cause: string, originalError?: Error) {
    super(`Image processing failed: ${cause}`, 500, 'PROCESSING_FAILED', false);
    this.originalError = originalError;
  }
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
