/**
 * =============================================================================
 * ROUTING SERVICE - Route planning for a delivery run
 * =============================================================================
 *
 * FLOW:
 * ─────────────────────────────────────────────────────────────────────────────
 *   1. Resolve origin and every stop to coordinates, one at a time
 *      (coordinates pass through; address lines go to the geocoder)
 *   2. optimize()  - nearest-neighbor seed + 2-opt, split into segments
 *   3. One Google Maps directions link per segment
 *
 * Geocoding is sequential (Nominatim allows one request per second). The
 * first address that fails aborts the request with the geocoder's error
 * (404 / 429). When the caller's signal aborts (client disconnected), no
 * further address is sent to a provider.
 *
 * The optimizer itself is pure; nothing is kept between requests.
 * =============================================================================
 */

import { RequestCancelledError } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import type { GeoPoint } from '../../shared/utils/geospatial.utils';
import { geocodingService, GeocodingService } from '../geocoding/geocoding.service';
import { optimize } from '../optimizer';
import type { OptimizerPolicy, StopInput } from '../optimizer';
import { buildGoogleMapsDirectionsLink } from './map-link';
import {
  collectStopLocations,
  LocationInput,
  OptimizeRouteInput,
  PlannedSegment,
  PlannedStop,
  PointSource,
  RoutePlan,
} from './routing.schema';

interface ResolvedLocation {
  point: GeoPoint;
  label?: string;
  source: PointSource;
}

const round3 = (value: number): number => Math.round(value * 1000) / 1000;

function throwIfCancelled(signal: AbortSignal | undefined, resolved: number, total: number): void {
  if (signal?.aborted) {
    logger.warn('Route planning cancelled', { resolved, total });
    throw new RequestCancelledError(resolved, total);
  }
}

export class RoutingService {
  constructor(
    private readonly geocoder: GeocodingService = geocodingService,
    private readonly policy: Partial<OptimizerPolicy> = {}
  ) {}

  // ===========================================================================
  // PUBLIC: Plan Route
  // ===========================================================================

  /**
   * @throws InvalidInputError        coordinate out of range (details.stopIndex)
   * @throws AddressNotFoundError     an address line could not be resolved
   * @throws GeocoderRateLimitedError every provider is rate limiting
   * @throws RequestCancelledError    signal aborted before every location was resolved
   */
  async planRoute(input: OptimizeRouteInput, signal?: AbortSignal): Promise<RoutePlan> {
    const locations = collectStopLocations(input);
    const total = locations.length + 1;

    throwIfCancelled(signal, 0, total);
    const origin = await this.resolveLocation(input.origin, input.cityHint);

    const stops: ResolvedLocation[] = [];
    for (const location of locations) {
      throwIfCancelled(signal, stops.length + 1, total);
      stops.push(await this.resolveLocation(location, input.cityHint));
    }

    const stopInputs: StopInput[] = stops.map(stop =>
      stop.label !== undefined ? { point: stop.point, label: stop.label } : { point: stop.point }
    );
    const result = optimize(origin.point, stopInputs, this.policy);

    // stopIndex → 1-based visiting position
    const positions = new Map<number, number>();
    result.orderedStops.forEach((stop, i) => positions.set(stop.index, i + 1));

    const plannedStops: PlannedStop[] = result.orderedStops.map((stop, i) => ({
      position: i + 1,
      stopIndex: stop.index,
      latitude: stop.point.latitude,
      longitude: stop.point.longitude,
      ...(stop.label !== undefined && { label: stop.label }),
      source: stops[stop.index].source,
    }));

    const segments: PlannedSegment[] = result.segments.map(segment => ({
      number: segment.index + 1,
      entries: segment.entries.map(entry => ({
        role: entry.role,
        stopIndex: entry.stopIndex,
        position: entry.stopIndex === null ? null : positions.get(entry.stopIndex) ?? null,
        latitude: entry.point.latitude,
        longitude: entry.point.longitude,
        ...(entry.role === 'origin'
          ? origin.label !== undefined && { label: origin.label }
          : entry.label !== undefined && { label: entry.label }),
      })),
      link: buildGoogleMapsDirectionsLink(segment.entries),
    }));

    logger.info('Route planned', {
      stops: plannedStops.length,
      segments: segments.length,
      totalDistanceKm: round3(result.totalDistanceKm),
      termination: result.termination,
    });

    return {
      origin: {
        latitude: origin.point.latitude,
        longitude: origin.point.longitude,
        ...(origin.label !== undefined && { label: origin.label }),
        source: origin.source,
      },
      stops: plannedStops,
      segments,
      totalDistanceKm: round3(result.totalDistanceKm),
      initialDistanceKm: round3(result.initialDistanceKm),
      termination: result.termination,
      attempts: result.attempts,
      improvements: result.improvements,
    };
  }

  // ===========================================================================
  // PRIVATE: Location resolution
  // ===========================================================================

  private async resolveLocation(location: LocationInput, cityHint?: string): Promise<ResolvedLocation> {
    if ('address' in location) {
      const resolved = await this.geocoder.resolve(location.address, cityHint);
      return {
        point: resolved.point,
        label: location.label ?? location.address,
        source: resolved.source,
      };
    }

    const point = { latitude: location.latitude, longitude: location.longitude };
    return location.label !== undefined
      ? { point, label: location.label, source: 'input' }
      : { point, source: 'input' };
  }
}

// Export singleton instance
export const routingService = new RoutingService();
