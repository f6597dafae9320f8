import type { Request, Response, NextFunction } from 'express';
import { config } from '../config/config';
import { logger } from '../utils/logger';
import type { ErrorResponse } from '../types/app.types';

/**
 * Custom error class with status code
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500, isOperational: boolean = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational; // Operational errors vs programming errors

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Common error types
 */
export class BadRequestError extends AppError {
  constructor(message: string = 'Bad Request') {
    super(message, 400);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not Found') {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Conflict') {
    super(message, 409);
  }
}

export class TooManyRequestsError extends AppError {
  constructor(message: string = 'Too Many Requests') {
    super(message, 429);
  }
}

export class InternalServerError extends AppError {
  constructor(message: string = 'Internal Server Error') {
    super(message, 500);
  }
}

/**
 * Body parser errors (malformed JSON, oversized payload) carry an HTTP status
 */
function hasHttpStatus(err: Error): err is Error & { status: number } {
  return 'status' in err && typeof err.status === 'number';
}

/**
 * Normalize anything thrown into an AppError.
 * Unknown errors become a generic 500 so internals are not leaked.
 */
export function toAppError(err: Error): AppError {
  if (err instanceof AppError) {
    return err;
  }

  if (hasHttpStatus(err) && err.status >= 400 && err.status < 500) {
    const error = new AppError(err.message, err.status);
    error.name = err.status === 400 ? 'BadRequestError' : 'ClientError';
    return error;
  }

  return new InternalServerError();
}

export const INTERNAL_ERROR_MESSAGE = 'The request failed due to internal server error.';

/**
 * Error response formatter.
 * Server-side errors go out with a generic body; their detail stays in the log.
 */
function formatErrorResponse(error: AppError, includeStack: boolean = false): ErrorResponse {
  const isServerError = error.statusCode >= 500;
  const response: ErrorResponse = {
    error: isServerError ? 'InternalServerError' : error.name,
    message: isServerError ? INTERNAL_ERROR_MESSAGE : error.message,
    statusCode: error.statusCode,
  };

  if (includeStack && error.stack) {
    response.stack = error.stack;
  }

  return response;
}

/**
 * Global error handling middleware
 * Must be registered after all routes
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);

  // Log the original error, not the sanitized one
  logger.log(appError.statusCode >= 500 ? 'error' : 'warn', 'Error handling request:', {
    method: req.method,
    url: req.url,
    statusCode: appError.statusCode,
    name: err.name,
    message: err.message,
    stack: appError.statusCode >= 500 ? err.stack : undefined,
  });

  const includeStack = config.nodeEnv === 'development';

  res.status(appError.statusCode).json(formatErrorResponse(appError, includeStack));
}

/**
 * Async error wrapper
 * Wraps async route handlers to catch errors
 *
 * Usage:
 *   router.get('/path', asyncHandler(async (req, res) => {
 *     // async code
 *   }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}

/**
 * 404 Not Found handler
 * Catches all unmatched routes
 */
export function notFoundHandler(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  next(new NotFoundError(`Route not found: ${req.method} ${req.url}`));
}
