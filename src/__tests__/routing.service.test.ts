/**
 * =============================================================================
 * ROUTING SERVICE TESTS
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

import { InvalidInputError, RequestCancelledError } from '../core/errors/AppError';
import { GeocodingService } from '../modules/geocoding/geocoding.service';
import { RoutingService } from '../modules/routing/routing.service';
import { CacheService, InMemoryCache } from '../shared/services/cache.service';
import { FakeProvider, found } from './helpers/fake-provider';

const geocoder = new GeocodingService({
  providers: [
    new FakeProvider('osm', {
      'Av. Juárez 10, Celaya': found(0, 0.02),
      'Calle Hidalgo 3, Celaya': found(0, 0.05)
    })
  ],
  preference: 'osm',
  cityHint: '',
  cache: new CacheService(new InMemoryCache()),
  circuitPrefix: 'routing-service-test'
});

describe('RoutingService.planRoute', () => {
  it('numbers positions across overlapping segments', async () => {
    const service = new RoutingService(geocoder, { maxWaypointsPerSegment: 3 });

    const plan = await service.planRoute({
      origin: { latitude: 0, longitude: 0, label: 'Depot' },
      stops: [
        { latitude: 0, longitude: 0.03, label: 'c' },
        { latitude: 0, longitude: 0.01, label: 'a' },
        { latitude: 0, longitude: 0.04, label: 'd' },
        { latitude: 0, longitude: 0.02, label: 'b' }
      ]
    });

    expect(plan.stops.map(s => [s.position, s.stopIndex, s.label])).toEqual([
      [1, 1, 'a'],
      [2, 3, 'b'],
      [3, 0, 'c'],
      [4, 2, 'd']
    ]);
    expect(plan.segments.map(s => s.number)).toEqual([1, 2]);
    expect(plan.segments[0].entries.map(e => e.position)).toEqual([null, 1, 2]);
    expect(plan.segments[1].entries.map(e => e.position)).toEqual([2, 3, 4]);
    expect(plan.segments[1].entries.map(e => e.label)).toEqual(['b', 'c', 'd']);
    expect(plan.segments[1].link).toBe(
      'https://www.google.com/maps/dir/?api=1&origin=0%2C0.02&destination=0%2C0.04&waypoints=0%2C0.03&travelmode=driving'
    );
    expect(plan.totalDistanceKm).toBe(4.448);
    expect(plan.termination).toBe('converged');
  });

  it('geocodes addresses with the request city hint and labels them by address', async () => {
    const service = new RoutingService(geocoder);

    const plan = await service.planRoute({
      origin: { latitude: 0, longitude: 0 },
      stops: [{ address: 'Calle Hidalgo 3', label: 'Farmacia' }],
      text: 'Av. Juárez 10\n0.0, 0.01',
      cityHint: 'Celaya'
    });

    expect(plan.stops).toEqual([
      { position: 1, stopIndex: 2, latitude: 0, longitude: 0.01, label: '0.0, 0.01', source: 'coordinates' },
      { position: 2, stopIndex: 1, latitude: 0, longitude: 0.02, label: 'Av. Juárez 10', source: 'osm' },
      { position: 3, stopIndex: 0, latitude: 0, longitude: 0.05, label: 'Farmacia', source: 'osm' }
    ]);
  });

  it('rejects an invalid origin', async () => {
    const service = new RoutingService(geocoder);

    await expect(
      service.planRoute({ origin: { latitude: 0, longitude: 190 }, stops: [] })
    ).rejects.toMatchObject({ stopIndex: 'origin' });
    await expect(
      service.planRoute({ origin: { latitude: 0, longitude: 190 }, stops: [] })
    ).rejects.toBeInstanceOf(InvalidInputError);
  });

  describe('cancellation', () => {
    const buildService = (provider: FakeProvider): RoutingService =>
      new RoutingService(new GeocodingService({
        providers: [provider],
        preference: 'osm',
        cityHint: '',
        cache: new CacheService(new InMemoryCache()),
        circuitPrefix: 'routing-service-cancel-test'
      }));

    it('sends no further lookups once the signal aborts', async () => {
      const controller = new AbortController();
      const provider = new FakeProvider('osm', {}, found(0, 0.01));
      provider.onQuery = () => controller.abort();

      const planning = buildService(provider).planRoute(
        {
          origin: { latitude: 0, longitude: 0 },
          stops: [{ address: 'Uno' }, { address: 'Dos' }, { address: 'Tres' }]
        },
        controller.signal
      );

      await expect(planning).rejects.toBeInstanceOf(RequestCancelledError);
      await expect(planning).rejects.toMatchObject({
        statusCode: 499,
        code: 'ROUTE_3002',
        message: 'Request cancelled after resolving 2 of 4 locations',
        details: { resolved: 2, total: 4 }
      });
      expect(provider.queries).toEqual(['Uno']);
    });

    it('does not geocode the origin for an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      const provider = new FakeProvider('osm', {}, found(0, 0.01));

      await expect(
        buildService(provider).planRoute(
          { origin: { address: 'Bodega' }, text: 'Uno' },
          controller.signal
        )
      ).rejects.toMatchObject({ details: { resolved: 0, total: 2 } });
      expect(provider.queries).toEqual([]);
    });
  });
});
