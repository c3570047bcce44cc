/**
 * =============================================================================
 * GEOSPATIAL UTILS TESTS
 * =============================================================================
 */

import {
  findInvalidCoordinate,
  formatLatLng,
  haversineDistanceKm,
  isValidGeoPoint
} from '../shared/utils/geospatial.utils';

describe('haversineDistanceKm', () => {
  it('returns exactly 0 for identical points', () => {
    const point = { latitude: 20.5888, longitude: -100.3899 };
    expect(haversineDistanceKm(point, { ...point })).toBe(0);
  });

  it('is symmetric', () => {
    const a = { latitude: 20.5888, longitude: -100.3899 };
    const b = { latitude: 20.6421, longitude: -100.4412 };
    expect(haversineDistanceKm(a, b)).toBe(haversineDistanceKm(b, a));
  });

  it('measures one degree of longitude on the equator', () => {
    const distance = haversineDistanceKm(
      { latitude: 0, longitude: 0 },
      { latitude: 0, longitude: 1 }
    );
    expect(distance).toBeCloseTo(111.19492664455873, 6);
  });

  it('stays finite for antipodal points', () => {
    const distance = haversineDistanceKm(
      { latitude: 0, longitude: 0 },
      { latitude: 0, longitude: 180 }
    );
    expect(Number.isFinite(distance)).toBe(true);
    expect(distance).toBeCloseTo(6371 * Math.PI, 6);
  });

  it('stays finite pole to pole', () => {
    const distance = haversineDistanceKm(
      { latitude: 90, longitude: 0 },
      { latitude: -90, longitude: 0 }
    );
    expect(distance).toBeCloseTo(6371 * Math.PI, 6);
  });
});

describe('findInvalidCoordinate', () => {
  it('accepts the boundary values', () => {
    expect(findInvalidCoordinate({ latitude: -90, longitude: 180 })).toBeNull();
    expect(findInvalidCoordinate({ latitude: 90, longitude: -180 })).toBeNull();
  });

  it('names an out-of-range latitude', () => {
    expect(findInvalidCoordinate({ latitude: 90.5, longitude: 0 })).toEqual({
      field: 'latitude',
      value: 90.5
    });
  });

  it('names an out-of-range longitude', () => {
    expect(findInvalidCoordinate({ latitude: 0, longitude: -181 })).toEqual({
      field: 'longitude',
      value: -181
    });
  });

  it('rejects NaN, Infinity and non-numbers', () => {
    expect(findInvalidCoordinate({ latitude: Number.NaN, longitude: 0 })?.field).toBe('latitude');
    expect(findInvalidCoordinate({ latitude: 0, longitude: Infinity })?.field).toBe('longitude');
    expect(findInvalidCoordinate({ latitude: '20.5', longitude: 0 })?.field).toBe('latitude');
  });

  it('backs isValidGeoPoint', () => {
    expect(isValidGeoPoint({ latitude: 20.5, longitude: -100.4 })).toBe(true);
    expect(isValidGeoPoint({ latitude: 200, longitude: -100.4 })).toBe(false);
  });
});

describe('formatLatLng', () => {
  it('joins latitude and longitude with a comma', () => {
    expect(formatLatLng({ latitude: 20.5888, longitude: -100.3899 })).toBe('20.5888,-100.3899');
  });
});
