/**
 * =============================================================================
 * GEOCODING MODULE - TYPES
 * =============================================================================
 */

import type { GeoPoint } from '../../shared/utils/geospatial.utils';

export type GeocodingProviderName = 'osm' | 'google';

/**
 * The slice of fetch() the providers use; global fetch satisfies it
 */
export interface HttpResponseLike {
  readonly status: number;
  readonly ok: boolean;
  json(): Promise<unknown>;
}

export type HttpGet = (
  url: string,
  init: { signal: AbortSignal; headers?: Record<string, string> }
) => Promise<HttpResponseLike>;

export const defaultHttpGet: HttpGet = (url, init) => fetch(url, init);

/**
 * What a single provider answered for one query.
 * Network errors, timeouts and unexpected payloads are thrown instead.
 */
export type ProviderOutcome =
  | { status: 'found'; point: GeoPoint; displayName?: string }
  | { status: 'not_found' }
  | { status: 'rate_limited' };

export interface GeocodingProvider {
  readonly name: GeocodingProviderName;
  /** False when the provider is not configured (e.g. no API key) */
  isAvailable(): boolean;
  geocode(query: string): Promise<ProviderOutcome>;
}

/**
 * Who produced the coordinates; 'coordinates' means the input itself was
 * a "lat, lng" pair and no provider was asked
 */
export type ResolutionSource = GeocodingProviderName | 'coordinates';

export interface ResolvedAddress {
  point: GeoPoint;
  source: ResolutionSource;
  /** Text actually sent to providers (city hint applied) */
  query: string;
  /** Served from the lookup cache */
  cached: boolean;
  displayName?: string;
}
