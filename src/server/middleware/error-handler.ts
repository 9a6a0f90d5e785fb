/**
 * Error Handling Middleware
 *
 * Centralized error handling for the cache monitoring API.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { randomBytes } from 'crypto';
import type { ApiError } from '../types.js';
import { API_ERRORS } from '../types.js';
import { CacheConfigurationError, CacheKeyError } from '../../errors/index.js';
import { logger } from '../../utils/logger.js';

/**
 * API error carrying an HTTP status
 */
export class ApiServerError extends Error {
  code: string;
  status: number;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    status: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiServerError';
    this.code = code;
    this.status = status;
    this.details = details;
  }

  static badRequest(message: string, details?: Record<string, unknown>): ApiServerError {
    return new ApiServerError(message, 'VALIDATION_ERROR', 400, details);
  }

  static notFound(resource: string = 'Resource'): ApiServerError {
    return new ApiServerError(`${resource} not found`, 'NOT_FOUND', 404);
  }

  static internal(message: string = 'Internal server error'): ApiServerError {
    return new ApiServerError(message, 'INTERNAL_ERROR', 500);
  }

  toJSON(): ApiError {
    return {
      code: this.code,
      message: this.message,
      status: this.status,
      details: this.details,
    };
  }
}

/**
 * Generate request ID
 */
export function generateRequestId(): string {
  return randomBytes(8).toString('hex');
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Request ID middleware
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = headerValue(req.headers['x-request-id']) || generateRequestId();
  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);
  next();
}

/**
 * Not found handler (404)
 */
export function notFoundHandler(req: Request, res: Response): void {
  const error: ApiError = {
    ...API_ERRORS.NOT_FOUND,
    message: `Endpoint not found: ${req.method} ${req.path}`,
    requestId: headerValue(req.headers['x-request-id']),
  };

  res.status(404).json(error);
}

/**
 * Global error handler
 */
export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const requestId = headerValue(req.headers['x-request-id']);

  if (err instanceof ApiServerError) {
    logger.warn(`[${requestId}] ${err.message}`, { code: err.code, status: err.status });
    res.status(err.status).json({ ...err.toJSON(), requestId } satisfies ApiError);
    return;
  }

  // Contract violations from the cache are caller mistakes
  if (err instanceof CacheKeyError || err instanceof CacheConfigurationError) {
    logger.warn(`[${requestId}] ${err.message}`, { code: err.code });
    res.status(400).json({
      code: 'VALIDATION_ERROR',
      message: err.message,
      status: 400,
      requestId,
    } satisfies ApiError);
    return;
  }

  logger.error(`[${requestId}] API Error`, err, { requestId });

  const response: ApiError = {
    code: 'INTERNAL_ERROR',
    message: process.env.NODE_ENV === 'production'
      ? 'An unexpected error occurred'
      : err.message,
    status: 500,
    requestId,
    details: process.env.NODE_ENV === 'production'
      ? undefined
      : { stack: err.stack },
  };

  res.status(500).json(response);
};

/**
 * Async handler wrapper (catches async errors)
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
