/**
 * Centralized Error Middleware - Production Safe
 * Prevents leaking store errors and stack traces to clients
 */

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger/structured-logger.js';

/**
 * Application Error - Structured error with metadata
 * Use this for all known error cases
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
  stack?: string;
}

function resolveTraceId(req: Request, res: Response): string {
  if (req.traceId) {
    return req.traceId;
  }
  const header = res.getHeader('x-trace-id');
  return typeof header === 'string' ? header : 'unknown';
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app (after all routes)
 *
 * Production mode:
 * - No stack traces
 * - No raw store messages (unless exposeMessage=true)
 *
 * Development mode:
 * - Includes stack traces and details
 */
export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  const isProd = process.env.NODE_ENV === 'production';
  const isAppError = err instanceof AppError;
  const traceId = resolveTraceId(req, res);
  const statusCode = isAppError ? err.statusCode : 500;
  const code = isAppError ? err.code : 'INTERNAL_ERROR';

  let clientMessage: string;
  if (isAppError && err.exposeMessage) {
    clientMessage = err.message;
  } else if (isAppError) {
    clientMessage = getGenericMessage(err.statusCode);
  } else if (isProd) {
    clientMessage = 'Internal server error';
  } else {
    clientMessage = err.message || 'Internal server error';
  }

  const logContext = {
    error: {
      name: err.name,
      message: err.message,
      stack: err.stack,
      code,
      statusCode
    },
    traceId,
    method: req.method,
    path: req.path
  };

  // Request-scoped logger carries traceId already
  const log = req.log ?? logger;
  if (statusCode >= 500) {
    log.error(logContext, 'Request error');
  } else {
    log.warn(logContext, 'Request error');
  }

  const response: ErrorResponse = {
    error: clientMessage,
    code,
    traceId
  };

  if (isAppError && err.details !== undefined && (err.exposeMessage || !isProd)) {
    response.details = err.details;
  }
  if (!isProd && err.stack) {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
}

/**
 * Unmatched routes get the standard error body instead of Express' HTML page
 */
export function notFoundMiddleware(req: Request, _res: Response, next: NextFunction): void {
  next(new AppError(`Route ${req.method} ${req.path} not found`, 404, 'ROUTE_NOT_FOUND', undefined, true));
}

/**
 * Get generic error message based on status code
 */
function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 404:
      return 'Not found';
    case 409:
      return 'Conflict';
    case 422:
      return 'Validation failed';
    case 500:
      return 'Internal server error';
    case 503:
      return 'Service unavailable, please try again';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

/**
 * Helper: Create validation error
 */
export function createValidationError(message: string, details?: unknown): AppError {
  return new AppError(message, 400, 'VALIDATION_ERROR', details, true);
}
