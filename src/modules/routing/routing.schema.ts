/**
 * =============================================================================
 * ROUTING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Request and response shapes of POST /api/v1/routes/optimize.
 *
 * KEY CONCEPTS:
 * - Location: either coordinates or an address line to geocode
 * - text: the chat-style input, one address per line (blank lines ignored)
 * - PlannedStop.position: 1-based visiting position
 *
 * EXAMPLE REQUEST:
 * {
 *   "origin": { "latitude": 20.5888, "longitude": -100.3899, "label": "Depot" },
 *   "text": "Av. Universidad 100\n20.6100, -100.4100",
 *   "cityHint": "Querétaro"
 * }
 *
 * Coordinates are only type-checked here: a non-numeric latitude fails the
 * location union (VAL_2001 at "stops.<i>"). Range checks happen in the
 * optimizer so a numeric out-of-range value names the stop index (ROUTE_3001).
 * =============================================================================
 */

import { z } from 'zod';
import { config } from '../../config/environment';
import { addressSchema, cityHintSchema } from '../../shared/utils/validation.utils';
import { splitAddressLines } from '../geocoding/coordinate-parser';
import type { ResolutionSource } from '../geocoding/geocoding.types';
import type { RefinementTermination, SegmentEntry } from '../optimizer/optimizer.types';

// =============================================================================
// LOCATION (Input)
// =============================================================================

const labelSchema = z.string().trim().min(1).max(200).optional();

export const coordinateLocationSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  label: labelSchema,
}).strict();

export const addressLocationSchema = z.object({
  address: addressSchema,
  label: labelSchema,
}).strict();

export const locationSchema = z.union([coordinateLocationSchema, addressLocationSchema]);

export type LocationInput = z.infer<typeof locationSchema>;

// =============================================================================
// OPTIMIZE REQUEST
// =============================================================================

export const optimizeRouteSchema = z.object({
  origin: locationSchema,
  stops: z.array(locationSchema).optional(),
  text: z.string().max(20000).optional(),
  cityHint: cityHintSchema,
}).strict().superRefine((body, ctx) => {
  if (body.stops === undefined && body.text === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['stops'],
      message: 'Provide stops, text, or both',
    });
    return;
  }

  const count = countStops(body.stops, body.text);
  if (count > config.optimizer.maxStopsPerRequest) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['stops'],
      message: `At most ${config.optimizer.maxStopsPerRequest} stops per request (got ${count})`,
    });
  }
});

export type OptimizeRouteInput = z.infer<typeof optimizeRouteSchema>;

function countStops(stops: readonly LocationInput[] | undefined, text: string | undefined): number {
  return (stops?.length ?? 0) + (text !== undefined ? splitAddressLines(text).length : 0);
}

/**
 * Stops in input order: `stops` first, then one address per line of `text`
 */
export function collectStopLocations(input: Pick<OptimizeRouteInput, 'stops' | 'text'>): LocationInput[] {
  const fromText = input.text !== undefined
    ? splitAddressLines(input.text).map(address => ({ address }))
    : [];
  return [...(input.stops ?? []), ...fromText];
}

const hasAddress = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && 'address' in value;

/**
 * Whether a raw body will reach a geocoding provider (address locations or
 * `text`). Checked before validation to pick the rate limiter.
 */
export function requiresGeocoding(body: unknown): boolean {
  if (typeof body !== 'object' || body === null) {
    return false;
  }
  if ('text' in body && body.text !== undefined) {
    return true;
  }
  if ('origin' in body && hasAddress(body.origin)) {
    return true;
  }
  return 'stops' in body && Array.isArray(body.stops) && body.stops.some(hasAddress);
}

// =============================================================================
// ROUTE PLAN (Output)
// =============================================================================

/** Where a point came from: given as coordinates, or resolved by geocoding */
export type PointSource = 'input' | ResolutionSource;

export interface PlannedOrigin {
  latitude: number;
  longitude: number;
  label?: string;
  source: PointSource;
}

export interface PlannedStop {
  /** 1-based visiting position */
  position: number;
  /** Index in the request's stop list (stops, then text lines) */
  stopIndex: number;
  latitude: number;
  longitude: number;
  label?: string;
  source: PointSource;
}

export interface PlannedSegmentEntry {
  role: SegmentEntry['role'];
  stopIndex: number | null;
  /** Visiting position; null for the origin */
  position: number | null;
  latitude: number;
  longitude: number;
  label?: string;
}

export interface PlannedSegment {
  /** 1-based, as shown to drivers ("Leg 1", "Leg 2", …) */
  number: number;
  entries: PlannedSegmentEntry[];
  /** Google Maps directions link for this leg */
  link: string;
}

export interface RoutePlan {
  origin: PlannedOrigin;
  stops: PlannedStop[];
  segments: PlannedSegment[];
  totalDistanceKm: number;
  initialDistanceKm: number;
  termination: RefinementTermination;
  attempts: number;
  improvements: number;
}
