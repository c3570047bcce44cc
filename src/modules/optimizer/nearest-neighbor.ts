/**
 * Greedy seed route for the 2-opt pass.
 *
 * From the origin, repeatedly move to the closest unvisited stop. Candidates
 * are scanned in ascending index and only a strictly shorter distance replaces
 * the current best, so ties go to the lowest index. O(n²).
 */

import type { DistanceMatrix, Route } from './optimizer.types';

export function constructNearestNeighborRoute(matrix: DistanceMatrix, stopCount: number): Route {
  const visited = new Array<boolean>(stopCount).fill(false);
  const order: number[] = [];

  let currentNode = 0; // origin

  for (let step = 0; step < stopCount; step++) {
    let bestStop = -1;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (let stop = 0; stop < stopCount; stop++) {
      if (visited[stop]) continue;
      const distance = matrix[currentNode][stop + 1];
      if (distance < bestDistance) {
        bestDistance = distance;
        bestStop = stop;
      }
    }

    visited[bestStop] = true;
    order.push(bestStop);
    currentNode = bestStop + 1;
  }

  return order;
}
