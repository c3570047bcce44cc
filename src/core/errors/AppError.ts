/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In the optimizer
 * throw new InvalidInputError('Latitude out of range', { stopIndex: 3, field: 'latitude', value: 91 });
 *
 * // In a geocoder
 * throw new AddressNotFoundError('Av. Universidad 100');
 * ```
 *
 * BENEFITS:
 * - Consistent error responses across all endpoints
 * - Proper HTTP status codes automatically
 * - Error codes for client-side handling
 *
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Bad Request - Invalid input
 */
export class BadRequestError extends AppError {
  constructor(
    message: string = 'Bad request',
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, details);
  }
}

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, { errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Invalid request data', errors);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = ErrorCode.NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, code, true, details);
  }
}

/**
 * 429 Too Many Requests - Rate limited
 */
export class RateLimitError extends AppError {
  public readonly retryAfter: number;

  constructor(
    message: string = 'Too many requests',
    retryAfter: number = 60,
    code: ErrorCode | string = ErrorCode.RATE_LIMIT_EXCEEDED,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.TOO_MANY_REQUESTS, code, true, { retryAfter, ...details });
    this.retryAfter = retryAfter;
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

/**
 * Where an invalid coordinate was found
 */
export interface InvalidInputDetails extends Record<string, unknown> {
  /** Stop index in the caller's original order, or 'origin' */
  stopIndex: number | 'origin';
  field?: 'latitude' | 'longitude';
  value?: unknown;
}

/**
 * Route optimizer input errors (out-of-range or malformed coordinate).
 * Raised before any computation starts.
 */
export class InvalidInputError extends BadRequestError {
  public readonly stopIndex: number | 'origin';

  constructor(message: string, details: InvalidInputDetails) {
    super(message, ErrorCode.ROUTE_INVALID_INPUT, details);
    this.stopIndex = details.stopIndex;
  }
}

/**
 * The client went away before its route was planned; remaining stops are not geocoded
 */
export class RequestCancelledError extends AppError {
  constructor(resolved: number, total: number) {
    super(
      `Request cancelled after resolving ${resolved} of ${total} locations`,
      HTTP_STATUS.CLIENT_CLOSED_REQUEST,
      ErrorCode.ROUTE_REQUEST_CANCELLED,
      true,
      { resolved, total }
    );
  }
}

/**
 * Geocoding errors
 */
export class AddressNotFoundError extends NotFoundError {
  constructor(address: string, query?: string) {
    super(
      `Address not found: ${address}`,
      ErrorCode.GEOCODE_ADDRESS_NOT_FOUND,
      query !== undefined && query !== address ? { address, query } : { address }
    );
  }
}

export class GeocoderRateLimitedError extends RateLimitError {
  constructor(address: string, providers: string[]) {
    super(
      'Geocoding providers are rate limiting requests, try again shortly',
      60,
      ErrorCode.GEOCODE_RATE_LIMITED,
      { address, providers }
    );
  }
}
