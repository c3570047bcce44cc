/**
 * =============================================================================
 * 2-OPT REFINER
 * =============================================================================
 *
 * Local search over an OPEN path: origin → r[0] → … → r[n-1], no return edge.
 * The origin is the fixed predecessor of position 0 and is never moved.
 *
 * MOVE:
 *   Reverse r[i..j] for 0 <= i < j <= n-1.
 *   Removed edges: (prev(i), r[i]) and (r[j], r[j+1])
 *   Added edges:   (prev(i), r[j]) and (r[i], r[j+1])
 *   When j is the last position there is no r[j+1]; only two edges change.
 *
 * POLICY:
 *   - Pairs scanned ascending i, then ascending j
 *   - First improvement: a strictly negative delta is applied at once and the
 *     scan restarts from (0, 1)
 *   - A full scan with no improvement → converged (local optimum)
 *   - maxAttempts caps evaluated candidates → bounded (best order so far)
 * =============================================================================
 */

import { OPTIMIZER_DEFAULTS } from '../../core/constants';
import { routeLengthKm } from './distance-matrix';
import type { DistanceMatrix, RefinementResult, Route } from './optimizer.types';

export interface TwoOptOptions {
  /** Absolute cap on evaluated candidates; overrides attemptFactor */
  maxAttempts?: number;
  /** Cap = attemptFactor * n^2 when maxAttempts is not given */
  attemptFactor?: number;
}

export function resolveMaxAttempts(stopCount: number, options: TwoOptOptions = {}): number {
  if (options.maxAttempts !== undefined) {
    return Math.max(0, Math.floor(options.maxAttempts));
  }
  const factor = options.attemptFactor ?? OPTIMIZER_DEFAULTS.TWO_OPT_ATTEMPT_FACTOR;
  return Math.max(1, Math.floor(factor * stopCount * stopCount));
}

/**
 * Length change of reversing route[i..j]. Negative means shorter.
 */
export function twoOptDelta(matrix: DistanceMatrix, route: Route, i: number, j: number): number {
  const prevNode = i === 0 ? 0 : route[i - 1] + 1;
  const firstNode = route[i] + 1;
  const lastNode = route[j] + 1;

  let delta = matrix[prevNode][lastNode] - matrix[prevNode][firstNode];

  if (j < route.length - 1) {
    const nextNode = route[j + 1] + 1;
    delta += matrix[firstNode][nextNode] - matrix[lastNode][nextNode];
  }

  return delta;
}

function reverseInPlace(order: number[], i: number, j: number): void {
  let left = i;
  let right = j;
  while (left < right) {
    const tmp = order[left];
    order[left] = order[right];
    order[right] = tmp;
    left++;
    right--;
  }
}

export function refineTwoOpt(
  matrix: DistanceMatrix,
  initialRoute: Route,
  options: TwoOptOptions = {}
): RefinementResult {
  const order = [...initialRoute];
  const n = order.length;
  const initialLengthKm = routeLengthKm(matrix, order);

  if (n <= 1) {
    return {
      route: order,
      termination: 'converged',
      attempts: 0,
      improvements: 0,
      initialLengthKm,
      finalLengthKm: initialLengthKm
    };
  }

  const maxAttempts = resolveMaxAttempts(n, options);
  let attempts = 0;
  let improvements = 0;

  const scan = (): 'improved' | 'converged' | 'bounded' => {
    for (let i = 0; i < n - 1; i++) {
      for (let j = i + 1; j < n; j++) {
        if (attempts >= maxAttempts) return 'bounded';
        attempts++;

        if (twoOptDelta(matrix, order, i, j) < 0) {
          reverseInPlace(order, i, j);
          improvements++;
          return 'improved';
        }
      }
    }
    return 'converged';
  };

  let outcome = scan();
  while (outcome === 'improved') {
    outcome = scan();
  }

  return {
    route: order,
    termination: outcome,
    attempts,
    improvements,
    initialLengthKm,
    finalLengthKm: routeLengthKm(matrix, order)
  };
}
