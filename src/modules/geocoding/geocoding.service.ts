/**
 * =============================================================================
 * GEOCODING SERVICE - Address line → coordinates
 * =============================================================================
 *
 * RESOLUTION ORDER:
 *   1. "lat, lng" input        → used as-is, no network
 *   2. city hint               → "<address>, <city>" unless already mentioned
 *   3. lookup cache (24 h)     → earlier provider answer for the same query
 *   4. providers in preference → GEOCODER_PREF=google: Google, OSM
 *                                otherwise:           OSM, Google
 *
 * A provider that throws, has an open circuit, or finds nothing is logged
 * and the next one is tried.
 *
 * FAILURES:
 *   - every provider tried was rate limited → GeocoderRateLimitedError (429)
 *   - otherwise nothing resolved            → AddressNotFoundError (404)
 * =============================================================================
 */

import { z } from 'zod';
import { config, GeocoderPreference } from '../../config/environment';
import { AddressNotFoundError, BadRequestError, GeocoderRateLimitedError } from '../../core/errors/AppError';
import { CircuitBreaker, circuitBreakerRegistry, CircuitState } from '../../shared/resilience/circuit-breaker';
import { cacheService as defaultCacheService, CacheService } from '../../shared/services/cache.service';
import { logger } from '../../shared/services/logger.service';
import { isValidGeoPoint } from '../../shared/utils/geospatial.utils';
import { applyCityHint, parseCoordinateString } from './coordinate-parser';
import { GoogleProvider } from './providers/google.provider';
import { NominatimProvider } from './providers/nominatim.provider';
import type {
  GeocodingProvider,
  GeocodingProviderName,
  ProviderOutcome,
  ResolvedAddress
} from './geocoding.types';

export interface GeocodingServiceOptions {
  providers?: GeocodingProvider[];
  preference?: GeocoderPreference;
  /** Default city hint when a request does not supply one */
  cityHint?: string;
  cache?: CacheService;
  cacheTtlSeconds?: number;
  /** Circuit breaker name prefix; one breaker per provider */
  circuitPrefix?: string;
}

export interface GeocodingStatus {
  preference: GeocoderPreference;
  cityHint: string | null;
  providers: Array<{
    name: GeocodingProviderName;
    enabled: boolean;
    circuit: CircuitState;
  }>;
}

const cachedLookupSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  source: z.enum(['osm', 'google']),
  displayName: z.string().optional()
});

type CachedLookup = z.infer<typeof cachedLookupSchema>;

export class GeocodingService {
  private readonly providers: GeocodingProvider[];
  private readonly preference: GeocoderPreference;
  private readonly cityHint: string;
  private readonly cache: CacheService;
  private readonly cacheTtlSeconds: number;
  private readonly breakers = new Map<GeocodingProviderName, CircuitBreaker>();

  constructor(options: GeocodingServiceOptions = {}) {
    this.providers = options.providers ?? [new NominatimProvider(), new GoogleProvider()];
    this.preference = options.preference ?? config.geocoding.preference;
    this.cityHint = options.cityHint ?? config.geocoding.cityHint;
    this.cache = options.cache ?? defaultCacheService;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? config.geocoding.cacheTtlSeconds;

    const prefix = options.circuitPrefix ?? 'geocoder';
    for (const provider of this.providers) {
      this.breakers.set(
        provider.name,
        circuitBreakerRegistry.getOrCreate({
          name: `${prefix}:${provider.name}`,
          failureThreshold: 5,
          resetTimeout: 30000,
          // Providers abort their own requests
          requestTimeout: 0
        })
      );
    }
  }

  /**
   * Providers in the order they are asked
   */
  providerOrder(): GeocodingProvider[] {
    const preferred: GeocodingProviderName = this.preference === 'google' ? 'google' : 'osm';
    return [
      ...this.providers.filter(p => p.name === preferred),
      ...this.providers.filter(p => p.name !== preferred)
    ];
  }

  /**
   * Resolve one address line (or "lat, lng" string) to coordinates
   *
   * @throws AddressNotFoundError | GeocoderRateLimitedError
   */
  async resolve(address: string, cityHint?: string): Promise<ResolvedAddress> {
    const trimmed = address.trim();
    if (trimmed.length === 0) {
      throw new BadRequestError('Address is empty');
    }

    const coordinates = parseCoordinateString(trimmed);
    if (coordinates) {
      return { point: coordinates, source: 'coordinates', query: trimmed, cached: false };
    }

    const query = applyCityHint(trimmed, cityHint ?? this.cityHint);
    const cacheKey = `geocode:${query.toLowerCase()}`;

    const cached = await this.readCache(cacheKey);
    if (cached) {
      return {
        point: { latitude: cached.latitude, longitude: cached.longitude },
        source: cached.source,
        query,
        cached: true,
        ...(cached.displayName !== undefined && { displayName: cached.displayName })
      };
    }

    const tried: GeocodingProviderName[] = [];
    const rateLimited: GeocodingProviderName[] = [];

    for (const provider of this.providerOrder()) {
      if (!provider.isAvailable()) continue;
      tried.push(provider.name);

      const outcome = await this.ask(provider, query);
      if (!outcome) continue;

      if (outcome.status === 'rate_limited') {
        rateLimited.push(provider.name);
        continue;
      }
      if (outcome.status === 'not_found') {
        logger.debug('Geocoding provider found nothing', { provider: provider.name, query });
        continue;
      }
      if (!isValidGeoPoint(outcome.point)) {
        logger.warn('Geocoding provider returned out-of-range coordinates', {
          provider: provider.name,
          query,
          point: outcome.point
        });
        continue;
      }

      const lookup: CachedLookup = {
        latitude: outcome.point.latitude,
        longitude: outcome.point.longitude,
        source: provider.name,
        ...(outcome.displayName !== undefined && { displayName: outcome.displayName })
      };
      await this.cache.set(cacheKey, lookup, this.cacheTtlSeconds);

      logger.debug('Address resolved', { provider: provider.name, query });
      return {
        point: outcome.point,
        source: provider.name,
        query,
        cached: false,
        ...(outcome.displayName !== undefined && { displayName: outcome.displayName })
      };
    }

    if (tried.length > 0 && rateLimited.length === tried.length) {
      throw new GeocoderRateLimitedError(trimmed, rateLimited);
    }
    throw new AddressNotFoundError(trimmed, query);
  }

  getStatus(): GeocodingStatus {
    return {
      preference: this.preference,
      cityHint: this.cityHint || null,
      providers: this.providerOrder().map(provider => ({
        name: provider.name,
        enabled: provider.isAvailable(),
        circuit: this.breakerFor(provider.name).getState()
      }))
    };
  }

  /**
   * One provider call through its circuit breaker; null when it threw
   */
  private async ask(provider: GeocodingProvider, query: string): Promise<ProviderOutcome | null> {
    try {
      return await this.breakerFor(provider.name).execute(() => provider.geocode(query));
    } catch (error) {
      logger.warn('Geocoding provider failed', {
        provider: provider.name,
        query,
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }

  private breakerFor(name: GeocodingProviderName): CircuitBreaker {
    const breaker = this.breakers.get(name);
    if (!breaker) {
      throw new Error(`No circuit breaker registered for geocoding provider '${name}'`);
    }
    return breaker;
  }

  private async readCache(key: string): Promise<CachedLookup | null> {
    const parsed = cachedLookupSchema.safeParse(await this.cache.get(key));
    if (!parsed.success || !isValidGeoPoint(parsed.data)) {
      return null;
    }
    return parsed.data;
  }
}

export const geocodingService = new GeocodingService();
