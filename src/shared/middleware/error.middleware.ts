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

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../services/logger.service';
import { AppError } from '../../core/errors/AppError';
import { ErrorCode, getErrorCategory, HTTP_STATUS } from '../../core/constants';
import { config } from '../../config/environment';
import { getRequestId } from './security.middleware';

/**
 * body-parser marks malformed JSON with type 'entity.parse.failed'
 */
function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
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
  if (error instanceof AppError) {
    const logData = {
      code: error.code,
      category: getErrorCategory(error.code),
      error: error.message,
      path: req.path,
      method: req.method,
      requestId: getRequestId(req)
    };
    if (error.statusCode >= HTTP_STATUS.INTERNAL_ERROR || !error.isOperational) {
      logger.error('Request error', { ...logData, stack: error.stack });
    } else {
      logger.warn('Request rejected', logData);
    }

    res.status(error.statusCode).json({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        ...(error.details && { details: error.details })
      }
    });
    return;
  }

  if (isBodyParseError(error)) {
    logger.warn('Malformed JSON body', { path: req.path, requestId: getRequestId(req) });
    res.status(HTTP_STATUS.BAD_REQUEST).json({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Request body is not valid JSON'
      }
    });
    return;
  }

  logger.error('Unhandled request error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
    requestId: getRequestId(req)
  });

  // SECURITY: Never expose internal error details to client
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.isProduction
        ? 'An unexpected error occurred. Please try again later.'
        : error.message
    }
  });
}

/**
 * Async route wrapper: forwards rejections to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
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
      message: `Cannot ${req.method} ${req.path}`
    }
  });
}
