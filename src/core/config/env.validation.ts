/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates environment variables at startup.
 * Fails fast if configuration is invalid - better than runtime errors.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * validateAndLogEnvironment(); // Exits in production if invalid
 * ```
 *
 * =============================================================================
 */

import { geocodingBudgetMs } from '../../config/environment';
import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;

/**
 * All environment variables with their requirements
 */
const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '3000',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Server port number'
  },
  {
    name: 'HOST',
    required: false,
    default: '0.0.0.0',
    description: 'Server host address'
  },
  {
    name: 'REQUEST_TIMEOUT_MS',
    required: false,
    default: '120000',
    validator: isPositiveInt,
    description: 'Socket timeout for one request'
  },

  // ==========================================================================
  // GEOCODING
  // ==========================================================================
  {
    name: 'GEOCODER_PREF',
    required: false,
    default: 'any',
    validator: (v) => ['osm', 'google', 'any'].includes(v.toLowerCase()),
    description: 'Which geocoder is tried first (osm, google, any)'
  },
  {
    name: 'CITY_HINT',
    required: false,
    description: 'City appended to addresses that do not mention it'
  },
  {
    name: 'NOMINATIM_URL',
    required: false,
    default: 'https://nominatim.openstreetmap.org',
    validator: (v) => /^https?:\/\//.test(v),
    description: 'Nominatim base URL'
  },
  {
    name: 'NOMINATIM_MIN_INTERVAL_MS',
    required: false,
    default: '1000',
    validator: (v) => /^\d+$/.test(v),
    description: 'Minimum spacing between Nominatim requests'
  },
  {
    name: 'GOOGLE_MAPS_API_KEY',
    required: false,
    description: 'Google Geocoding API key (enables the Google fallback)'
  },

  // ==========================================================================
  // OPTIMIZER POLICY
  // ==========================================================================
  {
    name: 'MAX_WAYPOINTS_PER_SEGMENT',
    required: false,
    default: '10',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) >= 2,
    description: 'Maximum entries per map link segment (min 2)'
  },
  {
    name: 'TWO_OPT_ATTEMPT_FACTOR',
    required: false,
    default: '1000',
    validator: isPositiveInt,
    description: '2-opt attempt bound multiplier (bound = factor * stops^2)'
  },
  {
    name: 'MAX_STOPS_PER_REQUEST',
    required: false,
    default: '100',
    validator: isPositiveInt,
    description: 'Maximum stops accepted by one optimize request'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'debug'].includes(v),
    description: 'Logging level'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    // Check if required
    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    // Production-specific checks
    if (isProduction) {
      if (envVar.name === 'GOOGLE_MAPS_API_KEY' && !value) {
        result.warnings.push('GOOGLE_MAPS_API_KEY is not set - addresses Nominatim misses will fail');
      }

      if (envVar.name === 'NOMINATIM_URL' && (!value || value.includes('openstreetmap.org'))) {
        result.warnings.push('Public Nominatim is limited to 1 request/second - consider a self-hosted instance');
      }
    }

    // Apply default if not set
    const finalValue = value || envVar.default;
    if (finalValue) {
      // Validate if validator exists
      if (envVar.validator && !envVar.validator(finalValue)) {
        result.valid = false;
        result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
        continue;
      }

      result.loaded[envVar.name] = finalValue;
    }
  }

  // A full request has to finish geocoding before the socket times out
  const { MAX_STOPS_PER_REQUEST, NOMINATIM_MIN_INTERVAL_MS, REQUEST_TIMEOUT_MS } = result.loaded;
  if (MAX_STOPS_PER_REQUEST && NOMINATIM_MIN_INTERVAL_MS && REQUEST_TIMEOUT_MS) {
    const budgetMs = geocodingBudgetMs(parseInt(MAX_STOPS_PER_REQUEST, 10), parseInt(NOMINATIM_MIN_INTERVAL_MS, 10));
    if (parseInt(REQUEST_TIMEOUT_MS, 10) <= budgetMs) {
      result.valid = false;
      result.errors.push(
        `REQUEST_TIMEOUT_MS (${REQUEST_TIMEOUT_MS}) must exceed ${budgetMs} ms - ` +
        `${MAX_STOPS_PER_REQUEST} stops at one Nominatim lookup per ${NOMINATIM_MIN_INTERVAL_MS} ms plus margin`
      );
    }
  }

  // Provider-specific validation
  if (env.GEOCODER_PREF?.toLowerCase() === 'google' && !env.GOOGLE_MAPS_API_KEY) {
    result.warnings.push('GEOCODER_PREF=google but GOOGLE_MAPS_API_KEY is not set - only Nominatim will be used');
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): void {
  const result = validateEnvironment();
  const isProduction = process.env.NODE_ENV === 'production';

  result.errors.forEach(error => {
    logger.error(`Environment validation error: ${error}`);
  });

  result.warnings.forEach(warning => {
    logger.warn(`Environment validation warning: ${warning}`);
  });

  if (result.valid) {
    logger.info('✅ Environment validation passed', {
      mode: result.loaded.NODE_ENV,
      port: result.loaded.PORT,
      geocoderPreference: result.loaded.GEOCODER_PREF,
      maxWaypointsPerSegment: result.loaded.MAX_WAYPOINTS_PER_SEGMENT
    });
  }

  // Exit in production if validation failed
  if (!result.valid && isProduction) {
    logger.error('Environment validation failed in production. Exiting.');
    process.exit(1);
  }
}
