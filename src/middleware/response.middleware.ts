/**
 * Response Middleware
 *
 * Standardized API response formatting and error handling.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logError } from '../services/logger.service.js';
import { EntityNotFoundError, PersistenceError } from '../services/approval-store.service.js';
import { GroupingError } from '../services/grouper/index.js';

// =============================================================================
// Types
// =============================================================================

export interface ApiSuccessResponse<T = unknown> {
  success: true;
  data: T;
  meta?: Record<string, unknown>;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type ApiResponse<T = unknown> = ApiSuccessResponse<T> | ApiErrorResponse;

// =============================================================================
// Response Helpers
// =============================================================================

export function sendSuccess<T>(res: Response, data: T, meta?: ApiSuccessResponse<T>['meta'], status = 200): void {
  const response: ApiSuccessResponse<T> = {
    success: true,
    data,
  };
  if (meta) {
    response.meta = meta;
  }
  res.status(status).json(response);
}

export function sendError(
  res: Response,
  code: string,
  message: string,
  status = 500,
  details?: unknown
): void {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
  };
  if (details !== undefined) {
    response.error.details = details;
  }
  res.status(status).json(response);
}

export function sendBadRequest(res: Response, message: string, details?: unknown): void {
  sendError(res, 'BAD_REQUEST', message, 400, details);
}

export function sendNotFound(res: Response, message: string): void {
  sendError(res, 'NOT_FOUND', message, 404);
}

// =============================================================================
// Error Handling Middleware
// =============================================================================

/**
 * Async handler wrapper - catches errors and passes to error middleware
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Global error handler. Domain errors map to their own status codes.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof EntityNotFoundError) {
    sendNotFound(res, err.message);
    return;
  }
  if (err instanceof GroupingError) {
    sendBadRequest(res, err.message);
    return;
  }

  logError(`${req.method} ${req.path}`, err, {
    method: req.method,
    path: req.path,
  });

  if (err instanceof PersistenceError) {
    sendError(res, 'PERSISTENCE_ERROR', err.message, 500);
    return;
  }

  // Don't expose internals in production
  const isDevelopment = process.env.NODE_ENV !== 'production';
  const message = isDevelopment ? err.message : 'An unexpected error occurred';

  sendError(res, 'INTERNAL_ERROR', message, 500);
}

// =============================================================================
// Not Found Handler
// =============================================================================

export function notFoundHandler(req: Request, res: Response): void {
  sendNotFound(res, `Route not found: ${req.method} ${req.originalUrl}`);
}
