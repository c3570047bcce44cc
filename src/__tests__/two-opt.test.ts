/**
 * =============================================================================
 * 2-OPT REFINER TESTS
 * =============================================================================
 *
 * Hand-built matrices on a line (|x_a - x_b|) keep every expected value exact.
 */

import { buildDistanceMatrix, routeLengthKm } from '../modules/optimizer/distance-matrix';
import { constructNearestNeighborRoute } from '../modules/optimizer/nearest-neighbor';
import type { Stop } from '../modules/optimizer/optimizer.types';
import {
  refineTwoOpt,
  resolveMaxAttempts,
  twoOptDelta
} from '../modules/optimizer/two-opt';
import { lineMatrix, scatteredStops } from './helpers/matrix';

describe('resolveMaxAttempts', () => {
  it('defaults to factor * n^2', () => {
    expect(resolveMaxAttempts(4)).toBe(16000);
    expect(resolveMaxAttempts(4, { attemptFactor: 2 })).toBe(32);
  });

  it('never drops below one attempt from a factor', () => {
    expect(resolveMaxAttempts(4, { attemptFactor: 0.0001 })).toBe(1);
  });

  it('takes an explicit cap as-is', () => {
    expect(resolveMaxAttempts(4, { maxAttempts: 3, attemptFactor: 1000 })).toBe(3);
    expect(resolveMaxAttempts(4, { maxAttempts: 0 })).toBe(0);
  });
});

describe('twoOptDelta', () => {
  // origin 0; stops at 3, 1, 4, 2
  const matrix = lineMatrix([3, 1, 4, 2]);

  it('uses the origin as predecessor of position 0', () => {
    // 0→3→1→4→2 becomes 0→1→3→4→2
    expect(twoOptDelta(matrix, [0, 1, 2, 3], 0, 1)).toBe(-4);
  });

  it('drops the successor edge when j is the last position', () => {
    // 0→1→3→4→2: reversing [3,4,2] gives 0→1→2→4→3
    expect(twoOptDelta(matrix, [1, 0, 2, 3], 1, 3)).toBe(-1);
  });

  it('matches the change in route length', () => {
    const route = [2, 0, 3, 1];
    const reversed = [2, 1, 3, 0];
    expect(twoOptDelta(matrix, route, 1, 3)).toBe(
      routeLengthKm(matrix, reversed) - routeLengthKm(matrix, route)
    );
  });
});

describe('refineTwoOpt', () => {
  it('leaves an already optimal route untouched', () => {
    // origin 0; stops at 1, 2, 3 visited in order
    const result = refineTwoOpt(lineMatrix([1, 2, 3]), [0, 1, 2]);

    expect(result.route).toEqual([0, 1, 2]);
    expect(result.termination).toBe('converged');
    expect(result.improvements).toBe(0);
    expect(result.attempts).toBe(3);
    expect(result.finalLengthKm).toBe(3);
  });

  it('untangles collinear stops into monotonic order', () => {
    // stops at 3, 1, 4, 2 visited in index order: 0→3→1→4→2
    const result = refineTwoOpt(lineMatrix([3, 1, 4, 2]), [0, 1, 2, 3]);

    expect(result.route).toEqual([1, 3, 0, 2]);
    expect(result.termination).toBe('converged');
    expect(result.improvements).toBe(3);
    expect(result.attempts).toBe(18);
    expect(result.initialLengthKm).toBe(10);
    expect(result.finalLengthKm).toBe(4);
  });

  it('stops at the attempt bound with the best order so far', () => {
    const result = refineTwoOpt(lineMatrix([3, 1, 4, 2]), [0, 1, 2, 3], { maxAttempts: 3 });

    expect(result.termination).toBe('bounded');
    expect(result.attempts).toBe(3);
    expect(result.improvements).toBe(1);
    expect(result.route).toEqual([1, 0, 2, 3]);
    expect(result.finalLengthKm).toBe(6);
  });

  it('reports bounded without evaluating anything when the cap is 0', () => {
    const result = refineTwoOpt(lineMatrix([3, 1]), [0, 1], { maxAttempts: 0 });

    expect(result.termination).toBe('bounded');
    expect(result.attempts).toBe(0);
    expect(result.route).toEqual([0, 1]);
  });

  const noStops: number[] = [];

  it.each([[noStops], [[0]]])('converges immediately on %j', (route) => {
    const matrix = lineMatrix(route.map(() => 5));
    const result = refineTwoOpt(matrix, route);

    expect(result.route).toEqual(route);
    expect(result.termination).toBe('converged');
    expect(result.attempts).toBe(0);
  });

  it('does not mutate the input route', () => {
    const input = [0, 1, 2, 3];
    refineTwoOpt(lineMatrix([3, 1, 4, 2]), input);
    expect(input).toEqual([0, 1, 2, 3]);
  });

  describe('on scattered stops', () => {
    const depot = { latitude: 20.5888, longitude: -100.3899 };
    const stops: Stop[] = scatteredStops(30, 42).map((input, index) => ({ index, point: input.point }));
    const matrix = buildDistanceMatrix(depot, stops);
    const seed = constructNearestNeighborRoute(matrix, stops.length);
    const result = refineTwoOpt(matrix, seed);

    it('returns a permutation of the stops', () => {
      expect([...result.route].sort((a, b) => a - b)).toEqual(stops.map(s => s.index));
    });

    it('never makes the route longer', () => {
      expect(result.finalLengthKm).toBeLessThanOrEqual(result.initialLengthKm);
      expect(result.finalLengthKm).toBeCloseTo(routeLengthKm(matrix, result.route), 9);
    });

    it('ends at a 2-opt local optimum when converged', () => {
      expect(result.termination).toBe('converged');
      for (let i = 0; i < result.route.length - 1; i++) {
        for (let j = i + 1; j < result.route.length; j++) {
          expect(twoOptDelta(matrix, result.route, i, j)).toBeGreaterThanOrEqual(0);
        }
      }
    });
  });
});
