/**
 * Google Maps directions deep link for one route segment.
 *
 * First entry → origin, last entry → destination, anything between → the
 * `waypoints` list in visiting order. A single-entry segment (origin only)
 * links origin to itself.
 */

import { formatLatLng } from '../../shared/utils/geospatial.utils';
import type { GeoPoint } from '../../shared/utils/geospatial.utils';

const DIRECTIONS_BASE_URL = 'https://www.google.com/maps/dir/';

export function buildGoogleMapsDirectionsLink(
  entries: ReadonlyArray<{ readonly point: GeoPoint }>
): string {
  const first = entries[0];
  const last = entries[entries.length - 1];
  if (!first || !last) {
    throw new Error('Cannot build a directions link for an empty segment');
  }

  const params = new URLSearchParams({
    api: '1',
    origin: formatLatLng(first.point),
    destination: formatLatLng(last.point),
  });

  if (entries.length > 2) {
    params.set('waypoints', entries.slice(1, -1).map(entry => formatLatLng(entry.point)).join('|'));
  }

  params.set('travelmode', 'driving');

  return `${DIRECTIONS_BASE_URL}?${params.toString()}`;
}
