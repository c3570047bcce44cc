/**
 * Distance matrix over {origin} ∪ stops.
 *
 * Node 0 is the origin, node k + 1 is stop k. Every coordinate is validated
 * before anything is computed; each unordered pair is measured once and
 * mirrored, so the table is exactly symmetric with a zero diagonal.
 */

import { InvalidInputError } from '../../core/errors/AppError';
import { findInvalidCoordinate, haversineDistanceKm } from '../../shared/utils/geospatial.utils';
import type { DistanceMatrix, Point, Route, Stop } from './optimizer.types';

/**
 * Throws InvalidInputError naming the first unusable coordinate
 */
export function assertValidCoordinates(origin: Point, stops: readonly Stop[]): void {
  const originProblem = findInvalidCoordinate(origin);
  if (originProblem) {
    throw new InvalidInputError(
      `Origin has an invalid ${originProblem.field}: ${String(originProblem.value)}`,
      { stopIndex: 'origin', ...originProblem }
    );
  }

  for (const stop of stops) {
    const problem = findInvalidCoordinate(stop.point);
    if (problem) {
      throw new InvalidInputError(
        `Stop ${stop.index} has an invalid ${problem.field}: ${String(problem.value)}`,
        { stopIndex: stop.index, ...problem }
      );
    }
  }
}

export function buildDistanceMatrix(origin: Point, stops: readonly Stop[]): DistanceMatrix {
  assertValidCoordinates(origin, stops);

  const nodes: Point[] = [origin, ...stops.map(stop => stop.point)];
  const size = nodes.length;
  const matrix: number[][] = Array.from({ length: size }, () => new Array<number>(size).fill(0));

  for (let i = 0; i < size; i++) {
    for (let j = i + 1; j < size; j++) {
      const distance = haversineDistanceKm(nodes[i], nodes[j]);
      matrix[i][j] = distance;
      matrix[j][i] = distance;
    }
  }

  return matrix;
}

/**
 * Open-path length: origin → route[0] → … → route[n-1], no return leg
 */
export function routeLengthKm(matrix: DistanceMatrix, route: Route): number {
  let total = 0;
  let previousNode = 0;
  for (const stopIndex of route) {
    const node = stopIndex + 1;
    total += matrix[previousNode][node];
    previousNode = node;
  }
  return total;
}
