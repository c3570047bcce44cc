/**
 * =============================================================================
 * GEOCODING MODULE
 * =============================================================================
 *
 * Turns delivery address lines into coordinates before route optimization.
 * Providers: OpenStreetMap Nominatim (keyless) and Google Geocoding (API key).
 * =============================================================================
 */

export * from './geocoding.types';
export * from './geocoding.schema';
export { parseCoordinateString, applyCityHint, splitAddressLines } from './coordinate-parser';
export { GeocodingService, geocodingService } from './geocoding.service';
export type { GeocodingServiceOptions, GeocodingStatus } from './geocoding.service';
export { NominatimProvider } from './providers/nominatim.provider';
export { GoogleProvider } from './providers/google.provider';
export { createGeocodingRouter } from './geocoding.routes';
