/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { AppError, ErrorCode } from '../types/error.types';
import { errorResponse } from '../types/api.types';
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
  if (error instanceof AppError) {
    // 4xx are expected outcomes (unknown city, bad input); only upstream/5xx is noisy
    const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log('Request error', {
      code: error.code,
      error: error.message,
      path: req.path,
      method: req.method,
      admin: req.admin?.username || 'anonymous'
    });

    res.status(error.statusCode).json(errorResponse(error.code, error.message, error.details));
    return;
  }

  // Malformed JSON body (thrown by express.json before any route runs)
  if (error instanceof SyntaxError && 'body' in error) {
    res.status(400).json(errorResponse(ErrorCode.BAD_REQUEST, 'Malformed JSON body'));
    return;
  }

  logger.error('Unhandled request error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
    ip: req.ip
  });

  // SECURITY: Never expose internal error details to client in production
  res.status(500).json(errorResponse(
    ErrorCode.INTERNAL_ERROR,
    config.isProduction
      ? 'An unexpected error occurred. Please try again later.'
      : error.message
  ));
}

/**
 * Async route wrapper to catch async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(errorResponse(ErrorCode.NOT_FOUND, `Cannot ${req.method} ${req.path}`));
}
