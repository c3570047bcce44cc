/**
 * =============================================================================
 * GOOGLE PROVIDER - Google Geocoding API
 * =============================================================================
 *
 * Enabled only when GOOGLE_MAPS_API_KEY is set. GOOGLE_GEOCODING_REGION
 * (ccTLD, e.g. "mx") biases ambiguous street names toward one country.
 *
 * STATUS HANDLING:
 * - OK               → first result
 * - ZERO_RESULTS     → not found
 * - OVER_QUERY_LIMIT → rate limited
 * - anything else    → thrown (counts against the circuit breaker)
 * =============================================================================
 */

import { z } from 'zod';
import { config } from '../../../config/environment';
import { logger } from '../../../shared/services/logger.service';
import { defaultHttpGet } from '../geocoding.types';
import type { GeocodingProvider, HttpGet, HttpResponseLike, ProviderOutcome } from '../geocoding.types';

export interface GoogleProviderOptions {
  apiKey: string;
  region: string;
  timeoutMs: number;
  httpGet?: HttpGet;
}

const GEOCODING_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

const googleGeocodingResponseSchema = z.object({
  status: z.string(),
  results: z
    .array(
      z.object({
        formatted_address: z.string().optional(),
        geometry: z.object({
          location: z.object({ lat: z.number(), lng: z.number() })
        })
      })
    )
    .default([]),
  error_message: z.string().optional()
});

export class GoogleProvider implements GeocodingProvider {
  readonly name = 'google' as const;
  private readonly options: GoogleProviderOptions;
  private readonly httpGet: HttpGet;

  constructor(options: Partial<GoogleProviderOptions> = {}) {
    this.options = {
      apiKey: config.googleMaps.apiKey,
      region: config.geocoding.google.region,
      timeoutMs: config.geocoding.google.timeoutMs,
      ...options
    };
    this.httpGet = options.httpGet ?? defaultHttpGet;
  }

  /**
   * Check if service is available (API key configured)
   */
  isAvailable(): boolean {
    return this.options.apiKey.length > 0;
  }

  async geocode(query: string): Promise<ProviderOutcome> {
    const params = new URLSearchParams({ address: query, key: this.options.apiKey });
    if (this.options.region) {
      params.set('region', this.options.region);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.httpGet(`${GEOCODING_URL}?${params.toString()}`, {
        signal: controller.signal
      });
      return await this.toOutcome(response);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async toOutcome(response: HttpResponseLike): Promise<ProviderOutcome> {
    if (response.status === 429) {
      return { status: 'rate_limited' };
    }
    if (!response.ok) {
      throw new Error(`Google Geocoding responded with HTTP ${response.status}`);
    }

    const data = googleGeocodingResponseSchema.parse(await response.json());

    switch (data.status) {
      case 'OK': {
        const first = data.results[0];
        if (!first) return { status: 'not_found' };
        return {
          status: 'found',
          point: { latitude: first.geometry.location.lat, longitude: first.geometry.location.lng },
          displayName: first.formatted_address
        };
      }
      case 'ZERO_RESULTS':
        return { status: 'not_found' };
      case 'OVER_QUERY_LIMIT':
        logger.warn('Google Geocoding quota exceeded');
        return { status: 'rate_limited' };
      default:
        throw new Error(
          `Google Geocoding error: ${data.status}${data.error_message ? ` - ${data.error_message}` : ''}`
        );
    }
  }
}
