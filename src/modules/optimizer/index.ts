export * from './optimizer.types';
export { buildDistanceMatrix, routeLengthKm, assertValidCoordinates } from './distance-matrix';
export { constructNearestNeighborRoute } from './nearest-neighbor';
export { refineTwoOpt, twoOptDelta, resolveMaxAttempts } from './two-opt';
export type { TwoOptOptions } from './two-opt';
export { segmentRoute, flattenSegments } from './segmenter';
export { optimize, defaultOptimizerPolicy } from './optimizer.service';
