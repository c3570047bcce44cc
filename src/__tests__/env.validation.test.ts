/**
 * =============================================================================
 * ENVIRONMENT VALIDATION TESTS
 * =============================================================================
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn()
  }
}));

import { config, geocodingBudgetMs } from '../config/environment';
import { validateEnvironment } from '../core/config/env.validation';

describe('validateEnvironment', () => {
  it('fills defaults for an empty environment', () => {
    const result = validateEnvironment({});

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.loaded).toEqual({
      NODE_ENV: 'development',
      PORT: '3000',
      HOST: '0.0.0.0',
      REQUEST_TIMEOUT_MS: '120000',
      GEOCODER_PREF: 'any',
      NOMINATIM_URL: 'https://nominatim.openstreetmap.org',
      NOMINATIM_MIN_INTERVAL_MS: '1000',
      MAX_WAYPOINTS_PER_SEGMENT: '10',
      TWO_OPT_ATTEMPT_FACTOR: '1000',
      MAX_STOPS_PER_REQUEST: '100',
      LOG_LEVEL: 'info'
    });
  });

  it('rejects a segment limit below 2', () => {
    const result = validateEnvironment({ MAX_WAYPOINTS_PER_SEGMENT: '1' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Invalid value for MAX_WAYPOINTS_PER_SEGMENT: "1" - Maximum entries per map link segment (min 2)'
    ]);
  });

  it('rejects an unknown geocoder preference', () => {
    const result = validateEnvironment({ GEOCODER_PREF: 'bing' });

    expect(result.valid).toBe(false);
    expect(result.errors[0]).toContain('GEOCODER_PREF');
  });

  it('warns when Google is preferred without a key', () => {
    const result = validateEnvironment({ GEOCODER_PREF: 'Google' });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'GEOCODER_PREF=google but GOOGLE_MAPS_API_KEY is not set - only Nominatim will be used'
    ]);
  });

  it('warns about public Nominatim and a missing key in production', () => {
    const result = validateEnvironment({ NODE_ENV: 'production' });

    expect(result.warnings).toEqual([
      'Public Nominatim is limited to 1 request/second - consider a self-hosted instance',
      'GOOGLE_MAPS_API_KEY is not set - addresses Nominatim misses will fail'
    ]);
  });

  it('stays quiet in production with a self-hosted Nominatim and a key', () => {
    const result = validateEnvironment({
      NODE_ENV: 'production',
      NOMINATIM_URL: 'https://geo.internal.test',
      GOOGLE_MAPS_API_KEY: 'test-key'
    });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([]);
  });

  it('rejects a socket timeout shorter than geocoding a full stop list', () => {
    const result = validateEnvironment({ REQUEST_TIMEOUT_MS: '60000' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'REQUEST_TIMEOUT_MS (60000) must exceed 110000 ms - 100 stops at one Nominatim lookup per 1000 ms plus margin'
    ]);
  });

  it('rejects a timeout equal to the geocoding budget', () => {
    const result = validateEnvironment({ MAX_STOPS_PER_REQUEST: '20', REQUEST_TIMEOUT_MS: '30000' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'REQUEST_TIMEOUT_MS (30000) must exceed 30000 ms - 20 stops at one Nominatim lookup per 1000 ms plus margin'
    ]);
  });

  it('accepts a short timeout when Nominatim is not throttled', () => {
    const result = validateEnvironment({ NOMINATIM_MIN_INTERVAL_MS: '0', REQUEST_TIMEOUT_MS: '60000' });

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });
});

describe('geocodingBudgetMs', () => {
  it('adds the margin to one interval per stop', () => {
    expect(geocodingBudgetMs(100, 1000)).toBe(110000);
    expect(geocodingBudgetMs(5, 0)).toBe(10000);
  });

  it('fits inside the default socket timeout', () => {
    const budget = geocodingBudgetMs(
      config.optimizer.maxStopsPerRequest,
      config.geocoding.nominatim.minIntervalMs
    );

    expect(config.requestTimeoutMs).toBe(120000);
    expect(budget).toBe(110000);
    expect(config.requestTimeoutMs).toBeGreaterThan(budget);
  });
});
