/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * - AppErrors render through their own toJSON()
 * - Unknown errors are hidden behind a generic 500 in production
 * - Store outages (UnavailableError) render as 503 so callers can retry
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { AppError } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { config } from '../../config/environment';

/**
 * Body-parser failures carry a status and a type
 */
function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return error instanceof Error && 'status' in error && 'type' in error && typeof error.status === 'number';
}

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
  // Known operational error
  if (error instanceof AppError) {
    const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[HTTP] ${error.code}: ${error.message}`, {
      path: req.path,
      method: req.method,
      statusCode: error.statusCode
    });
    res.status(error.statusCode).json(error.toJSON());
    return;
  }

  // Malformed JSON body
  if (isBodyParserError(error) && error.status === HTTP_STATUS.BAD_REQUEST) {
    res.status(HTTP_STATUS.BAD_REQUEST).json({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Malformed request body',
        timestamp: new Date().toISOString()
      }
    });
    return;
  }

  // Log the full error server-side
  logger.error('[HTTP] Unhandled error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method
  });

  // Unknown error - never expose internals in production
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.isProduction
        ? 'An unexpected error occurred. Please try again later.'
        : error.message,
      timestamp: new Date().toISOString()
    }
  });
}

/**
 * Async route wrapper to catch async errors
 * Use this to wrap async route handlers
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json({
    success: false,
    error: {
      code: ErrorCode.NOT_FOUND,
      message: `Cannot ${req.method} ${req.path}`,
      timestamp: new Date().toISOString()
    }
  });
}
