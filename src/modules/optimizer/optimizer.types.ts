/**
 * =============================================================================
 * OPTIMIZER MODULE - TYPES
 * =============================================================================
 *
 * KEY CONCEPTS:
 * - Stop: a resolved delivery destination; identity is its input index
 * - DistanceMatrix: node 0 = origin, node k + 1 = stop k
 * - Route: visiting order of stop indices, origin excluded (always first)
 * - Segment: bounded slice of [origin, ...route] for one map link
 *
 * EXAMPLE (3 stops, maxWaypointsPerSegment = 2):
 *   origin → s2 → s0 → s1
 *   route    = [2, 0, 1]
 *   segments = [[origin, s2], [s2, s0], [s0, s1]]
 * =============================================================================
 */

import type { GeoPoint } from '../../shared/utils/geospatial.utils';

export type Point = GeoPoint;

export interface Stop {
  /** Position in the caller's input; identity of the stop */
  readonly index: number;
  readonly point: Point;
  /** Raw address text or any display label */
  readonly label?: string;
}

/** Input accepted by optimize(); index is assigned from array position */
export interface StopInput {
  readonly point: Point;
  readonly label?: string;
}

/** Symmetric (n+1)×(n+1) table of kilometres */
export type DistanceMatrix = ReadonlyArray<ReadonlyArray<number>>;

/** Stop indices in visiting order */
export type Route = readonly number[];

/**
 * Why the 2-opt pass stopped
 * - converged: a full scan found no improving reversal (local optimum)
 * - bounded: the attempt bound was reached first
 */
export type RefinementTermination = 'converged' | 'bounded';

export interface RefinementResult {
  route: Route;
  termination: RefinementTermination;
  /** Candidate reversals evaluated */
  attempts: number;
  /** Reversals applied */
  improvements: number;
  initialLengthKm: number;
  finalLengthKm: number;
}

export interface SegmentEntry {
  readonly role: 'origin' | 'stop';
  /** null for the origin */
  readonly stopIndex: number | null;
  readonly point: Point;
  readonly label?: string;
}

export interface Segment {
  /** 0-based position among the route's segments */
  readonly index: number;
  readonly entries: readonly SegmentEntry[];
}

export interface OptimizerPolicy {
  /** Upper bound on entries per segment (origin / overlap stop included) */
  maxWaypointsPerSegment: number;
  /** 2-opt bound = attemptFactor * n^2 candidate evaluations */
  twoOptAttemptFactor: number;
}

export interface OptimizationResult {
  origin: Point;
  /** Stops in visiting order */
  orderedStops: Stop[];
  segments: Segment[];
  /** Open-path length origin → last stop after refinement */
  totalDistanceKm: number;
  /** Length of the nearest-neighbor seed */
  initialDistanceKm: number;
  termination: RefinementTermination;
  attempts: number;
  improvements: number;
}
