/**
 * =============================================================================
 * NOMINATIM PROVIDER - OpenStreetMap geocoding
 * =============================================================================
 *
 * No API key. Usage policy of the public instance:
 * - identify the application with a User-Agent
 * - at most 1 request per second (enforced here with minIntervalMs)
 *
 * A self-hosted instance can be used via NOMINATIM_URL.
 * =============================================================================
 */

import { z } from 'zod';
import { config } from '../../../config/environment';
import { logger } from '../../../shared/services/logger.service';
import { defaultHttpGet } from '../geocoding.types';
import type { GeocodingProvider, HttpGet, HttpResponseLike, ProviderOutcome } from '../geocoding.types';

export interface NominatimProviderOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  minIntervalMs: number;
  httpGet?: HttpGet;
}

const nominatimResultSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional()
  })
);

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class NominatimProvider implements GeocodingProvider {
  readonly name = 'osm' as const;
  private readonly options: NominatimProviderOptions;
  private readonly httpGet: HttpGet;
  private nextSlotAt = 0;

  constructor(options: Partial<NominatimProviderOptions> = {}) {
    this.options = {
      baseUrl: config.geocoding.nominatim.url,
      userAgent: config.geocoding.nominatim.userAgent,
      timeoutMs: config.geocoding.nominatim.timeoutMs,
      minIntervalMs: config.geocoding.nominatim.minIntervalMs,
      ...options
    };
    this.httpGet = options.httpGet ?? defaultHttpGet;
  }

  isAvailable(): boolean {
    return this.options.baseUrl.length > 0;
  }

  async geocode(query: string): Promise<ProviderOutcome> {
    await this.waitForSlot();

    const params = new URLSearchParams({ q: query, format: 'jsonv2', limit: '1' });
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/search?${params.toString()}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.httpGet(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'application/json'
        }
      });

      if (response.status === 429) {
        logger.warn('Nominatim rate limited the request', { query });
        return { status: 'rate_limited' };
      }

      if (!response.ok) {
        throw new Error(`Nominatim responded with HTTP ${response.status}`);
      }

      const results = nominatimResultSchema.parse(await response.json());
      const first = results[0];
      if (!first) {
        return { status: 'not_found' };
      }

      return {
        status: 'found',
        point: { latitude: first.lat, longitude: first.lon },
        displayName: first.display_name
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Reserve the next request slot synchronously, then wait for it, so
   * concurrent lookups stay minIntervalMs apart
   */
  private async waitForSlot(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.options.minIntervalMs;

    if (slot > now) {
      await delay(slot - now);
    }
  }
}
