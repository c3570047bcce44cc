/**
 * =============================================================================
 * SECURITY MIDDLEWARE
 * =============================================================================
 *
 * - Helmet security headers (JSON API: no inline content is ever served)
 * - Request ID tracking (X-Request-ID in and out)
 * - Suspicious URL blocking
 *
 * Address text in bodies is passed through untouched: apostrophes, '#', '/'
 * and accents are legitimate in delivery addresses.
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../services/logger.service';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';

const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Generate and attach request ID for tracking
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const incoming = req.get(REQUEST_ID_HEADER)?.trim();
  const requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();

  req.headers[REQUEST_ID_HEADER] = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

/**
 * Request ID set by requestIdMiddleware
 */
export function getRequestId(req: Request): string | undefined {
  return req.get(REQUEST_ID_HEADER);
}

/**
 * Security headers using Helmet
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'cross-origin' },
  frameguard: { action: 'deny' },
  hidePoweredBy: true,
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
});

/**
 * Block suspicious requests
 *
 * Only the URL is checked, never the body: addresses legitimately contain
 * characters these patterns would flag.
 */
export function blockSuspiciousRequests(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const suspiciousPatterns = [
    /\.\.\//,           // Path traversal
    /<script/i,         // XSS attempt
    /\$\{.*\}/,         // Template injection
  ];

  let requestString = req.originalUrl;
  try {
    requestString = decodeURIComponent(req.originalUrl);
  } catch {
    // Malformed percent-encoding: check the raw URL
  }

  for (const pattern of suspiciousPatterns) {
    if (pattern.test(requestString)) {
      logger.warn('Blocked suspicious request', {
        ip: req.ip,
        url: req.originalUrl,
        pattern: pattern.toString(),
      });

      res.status(HTTP_STATUS.BAD_REQUEST).json({
        success: false,
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Invalid request',
        },
      });
      return;
    }
  }

  next();
}
