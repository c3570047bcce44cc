/**
 * "lat, lng" detection for address lines.
 *
 * Accepts a comma and/or whitespace between the two numbers; both need a
 * decimal part. Out-of-range pairs are not coordinates and fall through to
 * the geocoders.
 */

import { isValidGeoPoint } from '../../shared/utils/geospatial.utils';
import type { GeoPoint } from '../../shared/utils/geospatial.utils';

const COORDINATE_PATTERN = /^\s*(-?\d{1,2}\.\d+)[,\s]+(-?\d{1,3}\.\d+)\s*$/;

export function parseCoordinateString(input: string): GeoPoint | null {
  const match = COORDINATE_PATTERN.exec(input);
  if (!match) return null;

  const point = { latitude: Number(match[1]), longitude: Number(match[2]) };
  return isValidGeoPoint(point) ? point : null;
}

/**
 * Query sent to providers: "<address>, <cityHint>" unless the address
 * already mentions the city (case-insensitive)
 */
export function applyCityHint(address: string, cityHint?: string): string {
  const hint = cityHint?.trim();
  if (!hint) return address;
  if (address.toLowerCase().includes(hint.toLowerCase())) return address;
  return `${address}, ${hint}`;
}

/**
 * One address per non-blank line
 */
export function splitAddressLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
