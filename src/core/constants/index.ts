/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Easy to find and modify values
 * - Type safety with enums
 *
 * =============================================================================
 */

// =============================================================================
// OPTIMIZER DEFAULTS
// =============================================================================

/**
 * Defaults used when a caller does not pass an explicit optimizer policy.
 * The running service reads its policy from config/environment.ts.
 */
export const OPTIMIZER_DEFAULTS = {
  /** Map links accept origin + destination + 8 waypoints */
  MAX_WAYPOINTS_PER_SEGMENT: 10,
  /** 2-opt candidate evaluations allowed per n^2 */
  TWO_OPT_ATTEMPT_FACTOR: 1000,
} as const;

/**
 * Valid coordinate ranges (degrees)
 */
export const COORDINATE_BOUNDS = {
  LATITUDE: { MIN: -90, MAX: 90 },
  LONGITUDE: { MIN: -180, MAX: 180 },
} as const;

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  CLIENT_CLOSED_REQUEST: 499,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES (Hierarchical Structure)
// =============================================================================
/**
 * Application-specific error codes
 *
 * - 2xxx: Validation errors
 * - 3xxx: Route optimization
 * - 4xxx: Geocoding
 * - 9xxx: System/Infrastructure errors
 */
export enum ErrorCode {
  // =============================================================================
  // VALIDATION ERRORS (2xxx)
  // =============================================================================
  VALIDATION_ERROR = 'VAL_2001',

  // =============================================================================
  // ROUTE OPTIMIZATION (3xxx)
  // =============================================================================
  ROUTE_INVALID_INPUT = 'ROUTE_3001',
  ROUTE_REQUEST_CANCELLED = 'ROUTE_3002',

  // =============================================================================
  // GEOCODING (4xxx)
  // =============================================================================
  GEOCODE_ADDRESS_NOT_FOUND = 'GEO_4001',
  GEOCODE_RATE_LIMITED = 'GEO_4002',

  // =============================================================================
  // SYSTEM & INFRASTRUCTURE (9xxx)
  // =============================================================================
  INTERNAL_ERROR = 'SYS_9001',
  RATE_LIMIT_EXCEEDED = 'SYS_9003',
  NOT_FOUND = 'SYS_9404'
}

/**
 * Error category for grouping (used in log filters)
 */
export enum ErrorCategory {
  VALIDATION = 'validation',
  ROUTING = 'routing',
  GEOCODING = 'geocoding',
  SYSTEM = 'system'
}

/**
 * Map error code prefixes to categories
 */
export const ERROR_CATEGORY_MAP: Record<string, ErrorCategory> = {
  'VAL_': ErrorCategory.VALIDATION,
  'ROUTE_': ErrorCategory.ROUTING,
  'GEO_': ErrorCategory.GEOCODING,
  'SYS_': ErrorCategory.SYSTEM
};

/**
 * Get error category from error code
 */
export function getErrorCategory(errorCode: ErrorCode | string): ErrorCategory {
  const prefix = errorCode.split('_')[0] + '_';
  return ERROR_CATEGORY_MAP[prefix] || ErrorCategory.SYSTEM;
}
