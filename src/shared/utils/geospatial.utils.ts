/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance Calculations
 * =============================================================================
 *
 * Pure functions, O(1), no I/O.
 * Single source of truth for straight-line distances (optimizer, route totals).
 *
 * =============================================================================
 */

import { COORDINATE_BOUNDS } from '../../core/constants';

/**
 * A geographic coordinate in decimal degrees
 */
export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Earth's radius constants
 */
export const EARTH_RADIUS = {
  KM: 6371,
};

/**
 * Great-circle distance between two points using the Haversine formula
 *
 * WHY HAVERSINE:
 * - Spherical-earth approximation, no external API calls
 * - Well conditioned for the short hops between delivery stops
 *
 * Returns exactly 0 for identical points. The haversine term is clamped to
 * [0, 1] so rounding at antipodal points cannot push sqrt(1 - a) to NaN.
 *
 * @returns Distance in kilometers
 */
export function haversineDistanceKm(from: GeoPoint, to: GeoPoint): number {
  if (from.latitude === to.latitude && from.longitude === to.longitude) {
    return 0;
  }

  const dLat = toRadians(to.latitude - from.latitude);
  const dLng = toRadians(to.longitude - from.longitude);

  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const raw =
    sinHalfLat * sinHalfLat +
    Math.cos(toRadians(from.latitude)) *
      Math.cos(toRadians(to.latitude)) *
      sinHalfLng * sinHalfLng;
  const a = Math.min(1, Math.max(0, raw));

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS.KM * c;
}

/**
 * Convert degrees to radians
 */
function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Which coordinate of a point is unusable, if any
 */
export function findInvalidCoordinate(
  point: { latitude: unknown; longitude: unknown }
): { field: 'latitude' | 'longitude'; value: unknown } | null {
  const { LATITUDE, LONGITUDE } = COORDINATE_BOUNDS;

  if (!isFiniteInRange(point.latitude, LATITUDE.MIN, LATITUDE.MAX)) {
    return { field: 'latitude', value: point.latitude };
  }
  if (!isFiniteInRange(point.longitude, LONGITUDE.MIN, LONGITUDE.MAX)) {
    return { field: 'longitude', value: point.longitude };
  }
  return null;
}

export function isValidGeoPoint(point: { latitude: unknown; longitude: unknown }): point is GeoPoint {
  return findInvalidCoordinate(point) === null;
}

function isFiniteInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= min && value <= max;
}

/**
 * Format a point as "lat,lng" (map links, log lines)
 */
export function formatLatLng(point: GeoPoint): string {
  return `${point.latitude},${point.longitude}`;
}
