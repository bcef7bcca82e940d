/**
 * Centralized Error Handling Middleware
 *
 * Every API error leaves as `{ success: false, message, code }`. Pipeline
 * errors are translated to HTTP statuses here; unexpected errors become a
 * generic 500 in production so internal detail never reaches clients.
 */

import type { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { InvalidStatusTransitionError } from '../../shared/fileStatus';
import { PipelineError, type PipelineErrorCode } from '../lib/errors';
import { createLogger, logError } from '../lib/logger';

const log = createLogger({ module: 'error-handler' });

/**
 * Extended Error interface for API errors
 */
export interface ApiError extends Error {
  /** HTTP status code */
  statusCode?: number;
  /** Error code for client-side handling */
  code?: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Whether the error is operational (expected) vs programming error */
  isOperational?: boolean;
}

/**
 * Create an API error with proper typing
 */
export function createApiError(
  message: string,
  statusCode: number = 500,
  code: string = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  error.isOperational = true;
  return error;
}

/**
 * Common error factory functions
 */
export const errors = {
  badRequest: (message: string, details?: Record<string, unknown>) =>
    createApiError(message, 400, 'BAD_REQUEST', details),

  notFound: (resource: string = 'Resource') =>
    createApiError(`${resource} not found`, 404, 'NOT_FOUND'),

  conflict: (message: string, details?: Record<string, unknown>) =>
    createApiError(message, 409, 'CONFLICT', details),
};

const PIPELINE_STATUS: Record<PipelineErrorCode, number> = {
  PIPELINE_ERROR: 500,
  DECODE_ERROR: 422,
  PERSISTENCE_ERROR: 500,
  FILE_CLAIM_ERROR: 409,
  SUGGESTION_FAILED: 502,
  CONFIGURATION_ERROR: 422,
  NOT_FOUND: 404,
  CONFLICT: 409,
};

function isApiError(error: unknown): error is ApiError {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

/**
 * Translates anything thrown by a handler into an ApiError.
 */
export function toApiError(error: unknown): ApiError {
  if (isApiError(error)) {
    return error;
  }
  if (error instanceof ZodError) {
    return errors.badRequest('Validation failed', {
      errors: error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  if (error instanceof MulterError) {
    return errors.badRequest(error.message, { field: error.field });
  }
  if (error instanceof InvalidStatusTransitionError) {
    return createApiError(error.message, 409, error.code, { from: error.from, to: error.to });
  }
  if (error instanceof PipelineError) {
    const statusCode = PIPELINE_STATUS[error.code];
    return createApiError(error.message, statusCode, error.code, statusCode < 500 ? error.details : undefined);
  }

  const unexpected: ApiError = error instanceof Error ? error : new Error(String(error));
  unexpected.statusCode = 500;
  unexpected.code = 'INTERNAL_ERROR';
  unexpected.isOperational = false;
  return unexpected;
}

/**
 * Standard API response format
 */
interface ErrorResponse {
  success: false;
  message: string;
  code: string;
  details?: Record<string, unknown>;
  stack?: string;
  requestId?: string;
}

/**
 * Centralized error handling middleware
 *
 * Must be registered AFTER all route handlers.
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const err = toApiError(error);
  const requestId = req.id;
  const statusCode = err.statusCode ?? 500;

  if (statusCode >= 500) {
    logError(log, err, 'Request error', { requestId, path: req.path, method: req.method, statusCode });
  } else {
    log.warn({ requestId, path: req.path, method: req.method, statusCode, code: err.code }, err.message);
  }

  const isProduction = process.env.NODE_ENV === 'production';

  const response: ErrorResponse = {
    success: false,
    message: isProduction && statusCode === 500
      ? 'An unexpected error occurred'
      : err.message,
    code: err.code || 'INTERNAL_ERROR',
    requestId,
  };

  if (!isProduction || err.isOperational) {
    response.details = err.details;
  }

  if (process.env.NODE_ENV === 'development') {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
}

/**
 * Not found handler for undefined routes
 * Register after all route definitions but before the error handler.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    message: 'Route not found',
    code: 'NOT_FOUND',
    path: req.path,
    method: req.method,
  });
}

/**
 * Async handler wrapper to catch errors from async route handlers
 *
 * @example
 * router.get('/:id', asyncHandler(async (req, res) => {
 *   const file = await storage.files.getFile(req.params.id);
 *   sendSuccess(res, file);
 * }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
