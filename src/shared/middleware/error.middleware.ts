/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Last stop for anything a route throws.
 *
 * Expected failures never get here: they are returned as Result values and
 * sent by the route. What arrives here is a fault, so it is logged in full
 * and the client gets the standard error body.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Messages of unexpected errors are hidden in production
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { AppError, ErrorResponse } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { config } from '../../config/environment';

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logger.error('Request error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method
  });

  if (error instanceof AppError) {
    res.status(error.statusCode).json(error.toJSON());
    return;
  }

  const body: ErrorResponse = {
    success: false,
    error: config.isProduction
      ? 'An unexpected error occurred. Please try again later.'
      : error.message,
    code: ErrorCode.INTERNAL_ERROR
  };
  res.status(HTTP_STATUS.INTERNAL_ERROR).json(body);
}

/**
 * Async route wrapper to catch async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  const body: ErrorResponse = {
    success: false,
    error: `Cannot ${req.method} ${req.path}`,
    code: ErrorCode.NOT_FOUND
  };
  res.status(HTTP_STATUS.NOT_FOUND).json(body);
}
