import type { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import {
  AppError,
  EngineError,
  ProcessingFailedError,
  ValidationError,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { ZodError } from 'zod';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

function requestContext(request: FastifyRequest): Record<string, unknown> {
  return { requestId: request.id, method: request.method, url: request.url };
}

function send(reply: FastifyReply, response: ErrorResponse): void {
  reply.status(response.statusCode).send(response);
}

/**
 * Log an application error at the level its kind deserves. Processing
 * failures carry the interpolation error that ended the chain.
 */
function logAppError(error: AppError, request: FastifyRequest): void {
  const logger = getLogger();
  const context = requestContext(request);

  if (error instanceof ProcessingFailedError) {
    logger.error(
      { ...context, err: error, originalError: error.originalError },
      'Upscale failed on every engine'
    );
  } else if (error instanceof EngineError) {
    logger.error(
      { ...context, err: error, engine: error.engine },
      'Engine error escaped the fallback chain'
    );
  } else if (!error.isOperational) {
    logger.error({ ...context, err: error }, 'Non-operational error occurred');
  } else {
    logger.warn({ ...context, code: error.code, reason: error.message }, 'Request rejected');
  }
}

/**
 * Global error handler for Fastify
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  if (error instanceof ZodError) {
    const validationError = new ValidationError('Validation failed', error.format());
    getLogger().warn({ ...requestContext(request), issues: error.issues.length }, 'Request rejected');
    send(reply, {
      error: validationError.code,
      message: validationError.message,
      statusCode: validationError.statusCode,
      details: validationError.details,
    });
    return;
  }

  if (error instanceof AppError) {
    logAppError(error, request);
    send(reply, {
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
      ...(error instanceof ValidationError && error.details ? { details: error.details } : {}),
    });
    return;
  }

  // Route schema validation
  if (error.validation) {
    send(reply, {
      error: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      statusCode: 400,
      details: error.validation,
    });
    return;
  }

  // Malformed bodies and upload limits raised by Fastify or its plugins
  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    getLogger().warn(
      { ...requestContext(request), code: error.code, reason: error.message },
      'Client error'
    );
    send(reply, {
      error: error.code ?? 'BAD_REQUEST',
      message: error.message,
      statusCode: error.statusCode,
    });
    return;
  }

  getLogger().error({ ...requestContext(request), err: error }, 'Unhandled error occurred');
  send(reply, {
    error: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  });
}
