/**
 * =============================================================================
 * OPTIMIZER SERVICE - Route-ordering engine
 * =============================================================================
 *
 * PIPELINE (pure, synchronous, one fresh matrix per call):
 *   1. buildDistanceMatrix         - validate coordinates, O(n^2) haversine table
 *   2. constructNearestNeighborRoute - greedy seed from the origin
 *   3. refineTwoOpt                - first-improvement 2-opt, bounded
 *   4. segmentRoute                - map-link sized chunks with one-entry overlap
 *
 * No network I/O and no state shared between calls; geocoding happens before
 * this service is reached (see routing.service.ts).
 * =============================================================================
 */

import { config } from '../../config/environment';
import { logger } from '../../shared/services/logger.service';
import { buildDistanceMatrix } from './distance-matrix';
import { constructNearestNeighborRoute } from './nearest-neighbor';
import { segmentRoute } from './segmenter';
import { refineTwoOpt } from './two-opt';
import type {
  OptimizationResult,
  OptimizerPolicy,
  Point,
  Stop,
  StopInput
} from './optimizer.types';

/**
 * Policy the running service uses, from environment configuration
 */
export function defaultOptimizerPolicy(): OptimizerPolicy {
  return {
    maxWaypointsPerSegment: config.optimizer.maxWaypointsPerSegment,
    twoOptAttemptFactor: config.optimizer.twoOptAttemptFactor
  };
}

/**
 * Order stops from a fixed origin and split the order into segments.
 *
 * An empty stop list is not an error: the result is one segment holding only
 * the origin.
 *
 * @throws InvalidInputError when the origin or any stop has an unusable
 *         coordinate (details.stopIndex names it)
 */
export function optimize(
  origin: Point,
  stopInputs: readonly StopInput[],
  policy: Partial<OptimizerPolicy> = {}
): OptimizationResult {
  const { maxWaypointsPerSegment, twoOptAttemptFactor } = {
    ...defaultOptimizerPolicy(),
    ...policy
  };

  const stops: Stop[] = stopInputs.map((input, index) =>
    input.label !== undefined
      ? { index, point: input.point, label: input.label }
      : { index, point: input.point }
  );

  const matrix = buildDistanceMatrix(origin, stops);
  const seed = constructNearestNeighborRoute(matrix, stops.length);
  const refinement = refineTwoOpt(matrix, seed, { attemptFactor: twoOptAttemptFactor });

  const orderedStops = refinement.route.map(stopIndex => stops[stopIndex]);
  const segments = segmentRoute(origin, orderedStops, maxWaypointsPerSegment);

  logger.debug('Route optimized', {
    stops: stops.length,
    segments: segments.length,
    termination: refinement.termination,
    attempts: refinement.attempts,
    improvements: refinement.improvements,
    initialKm: Number(refinement.initialLengthKm.toFixed(3)),
    finalKm: Number(refinement.finalLengthKm.toFixed(3))
  });

  if (refinement.termination === 'bounded') {
    logger.warn('2-opt stopped at its attempt bound', {
      stops: stops.length,
      attempts: refinement.attempts
    });
  }

  return {
    origin,
    orderedStops,
    segments,
    totalDistanceKm: refinement.finalLengthKm,
    initialDistanceKm: refinement.initialLengthKm,
    termination: refinement.termination,
    attempts: refinement.attempts,
    improvements: refinement.improvements
  };
}
