/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECTIONS:
 * - Server (port, host, CORS)
 * - Geocoding (provider order, city hint, Nominatim/Google settings)
 * - Optimizer policy (segment size, 2-opt attempt bound, stop limit)
 * - Rate limiting & logging
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() / getNumber() / getBoolean() with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

/**
 * Geocoder preference: which provider is asked first.
 * 'any' keeps the default order (OSM first, Google as fallback).
 */
export type GeocoderPreference = 'osm' | 'google' | 'any';

function parseGeocoderPreference(value: string): GeocoderPreference {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'osm' || normalized === 'google') return normalized;
  return 'any';
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),
  // Socket timeout; must outlast geocoding a full stop list (checked at startup)
  requestTimeoutMs: getNumber('REQUEST_TIMEOUT_MS', 120000),

  // Geocoding
  geocoding: {
    preference: parseGeocoderPreference(getOptional('GEOCODER_PREF', 'any')),
    cityHint: getOptional('CITY_HINT', ''),
    cacheTtlSeconds: getNumber('GEOCODING_CACHE_TTL_SECONDS', 24 * 60 * 60),
    nominatim: {
      url: getOptional('NOMINATIM_URL', 'https://nominatim.openstreetmap.org'),
      userAgent: getOptional('NOMINATIM_USER_AGENT', 'delivery-route-optimizer/1.0'),
      timeoutMs: getNumber('NOMINATIM_TIMEOUT_MS', 10000),
      // Public Nominatim allows 1 request per second
      minIntervalMs: getNumber('NOMINATIM_MIN_INTERVAL_MS', 1000),
    },
    google: {
      region: getOptional('GOOGLE_GEOCODING_REGION', ''),
      timeoutMs: getNumber('GOOGLE_GEOCODING_TIMEOUT_MS', 10000),
    },
  },

  // Google Maps
  googleMaps: {
    apiKey: getOptional('GOOGLE_MAPS_API_KEY', ''),
    enabled: getOptional('GOOGLE_MAPS_API_KEY', '').length > 0,
  },

  // Route optimizer policy
  optimizer: {
    maxWaypointsPerSegment: getNumber('MAX_WAYPOINTS_PER_SEGMENT', 10),
    // 2-opt evaluates at most attemptFactor * n^2 candidate reversals
    twoOptAttemptFactor: getNumber('TWO_OPT_ATTEMPT_FACTOR', 1000),
    maxStopsPerRequest: getNumber('MAX_STOPS_PER_REQUEST', 100),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 100),
    geocodingMaxRequests: getNumber('GEOCODING_RATE_LIMIT_MAX_REQUESTS', 60),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),

  // CORS - Parsed into array for production
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  // Security Features
  security: {
    enableHeaders: getBoolean('ENABLE_SECURITY_HEADERS', true),
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/** Headroom for provider latency on top of the Nominatim pacing */
export const GEOCODING_TIMEOUT_MARGIN_MS = 10000;

/**
 * Worst-case time to geocode an address origin plus a full stop list,
 * one lookup per minIntervalMs
 */
export function geocodingBudgetMs(maxStops: number, minIntervalMs: number): number {
  return maxStops * minIntervalMs + GEOCODING_TIMEOUT_MARGIN_MS;
}

/**
 * Validate configuration at startup
 * Fails fast if the optimizer policy is unusable
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.optimizer.maxWaypointsPerSegment < 2) {
    errors.push('MAX_WAYPOINTS_PER_SEGMENT must be at least 2 (a segment needs a start and an end)');
  }
  if (config.optimizer.twoOptAttemptFactor < 1) {
    errors.push('TWO_OPT_ATTEMPT_FACTOR must be a positive integer');
  }
  if (config.optimizer.maxStopsPerRequest < 1) {
    errors.push('MAX_STOPS_PER_REQUEST must be a positive integer');
  }

  const budgetMs = geocodingBudgetMs(config.optimizer.maxStopsPerRequest, config.geocoding.nominatim.minIntervalMs);
  if (config.requestTimeoutMs <= budgetMs) {
    errors.push(
      `REQUEST_TIMEOUT_MS (${config.requestTimeoutMs}) must exceed ${budgetMs} ms, ` +
      'the time to geocode MAX_STOPS_PER_REQUEST addresses at NOMINATIM_MIN_INTERVAL_MS'
    );
  }

  if (config.isProduction) {
    // CORS must not be wildcard in production
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (!config.googleMaps.enabled) {
      warnings.push('GOOGLE_MAPS_API_KEY is not set - geocoding relies on Nominatim only');
    }
  }

  // Log warnings
  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  // Throw on errors
  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();

// =============================================================================
// CONFIGURATION SUMMARY (for backend developers)
// =============================================================================
/**
 * QUICK REFERENCE:
 *
 * 1. Geocoding:
 *    GEOCODER_PREF=osm|google|any   (default any = OSM first)
 *    CITY_HINT=Querétaro             (appended when missing from an address)
 *    GOOGLE_MAPS_API_KEY=...         (enables the Google fallback)
 *
 * 2. Optimizer policy:
 *    MAX_WAYPOINTS_PER_SEGMENT=10    (map link waypoint ceiling)
 *    TWO_OPT_ATTEMPT_FACTOR=1000     (bound = factor * stops^2)
 *    MAX_STOPS_PER_REQUEST=100       (REQUEST_TIMEOUT_MS must cover
 *                                     stops * NOMINATIM_MIN_INTERVAL_MS + 10 s)
 *
 * 3. CORS (REQUIRED for security):
 *    CORS_ORIGIN=https://dispatch.example.com
 */
