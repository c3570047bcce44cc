/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Per-IP request limits using express-rate-limit's built-in memory store.
 *
 * - rateLimiter: every /api route
 * - geocodingRateLimiter: address lookups, which spend provider quota
 *   (Nominatim's public instance allows ~1 request/second overall)
 *
 * Both can be switched off with ENABLE_RATE_LIMITING=false.
 * =============================================================================
 */

import rateLimit from 'express-rate-limit';
import { config } from '../../config/environment';
import { ErrorCode } from '../../core/constants';

/**
 * Default rate limiter for API routes
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMIT_EXCEEDED,
      message: 'Too many requests. Please try again later.'
    }
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.security.enableRateLimiting
});

/**
 * Geocoding rate limiter
 * Protects Nominatim fair-use and Google quota from abuse
 */
export const geocodingRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: config.rateLimit.geocodingMaxRequests,
  keyGenerator: (req) => `geocoding:${req.ip ?? 'unknown'}`,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMIT_EXCEEDED,
      message: 'Too many geocoding requests. Please slow down.'
    }
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.security.enableRateLimiting
});
