/**
 * Split [origin, ...orderedStops] into map-link sized segments.
 *
 * Each segment after the first starts with the previous segment's last entry,
 * so every segment is a continuous leg and dropping those overlaps from the
 * concatenation gives back the route exactly.
 */

import { BadRequestError } from '../../core/errors/AppError';
import { ErrorCode } from '../../core/constants';
import type { Point, Segment, SegmentEntry, Stop } from './optimizer.types';

export function segmentRoute(
  origin: Point,
  orderedStops: readonly Stop[],
  maxWaypoints: number
): Segment[] {
  if (!Number.isInteger(maxWaypoints) || maxWaypoints < 2) {
    throw new BadRequestError(
      `maxWaypointsPerSegment must be an integer >= 2, got ${maxWaypoints}`,
      ErrorCode.ROUTE_INVALID_INPUT,
      { maxWaypointsPerSegment: maxWaypoints }
    );
  }

  const entries: SegmentEntry[] = [
    { role: 'origin', stopIndex: null, point: origin },
    ...orderedStops.map(toEntry)
  ];

  if (entries.length <= maxWaypoints) {
    return [{ index: 0, entries }];
  }

  const segments: Segment[] = [];
  let start = 0;

  while (true) {
    const end = Math.min(start + maxWaypoints, entries.length);
    segments.push({ index: segments.length, entries: entries.slice(start, end) });
    if (end >= entries.length) break;
    start = end - 1; // overlap
  }

  return segments;
}

function toEntry(stop: Stop): SegmentEntry {
  return stop.label !== undefined
    ? { role: 'stop', stopIndex: stop.index, point: stop.point, label: stop.label }
    : { role: 'stop', stopIndex: stop.index, point: stop.point };
}

/**
 * Stop indices in visiting order, overlaps removed
 */
export function flattenSegments(segments: readonly Segment[]): number[] {
  const order: number[] = [];
  segments.forEach((segment, segmentIndex) => {
    const entries = segmentIndex === 0 ? segment.entries : segment.entries.slice(1);
    for (const entry of entries) {
      if (entry.stopIndex !== null) order.push(entry.stopIndex);
    }
  });
  return order;
}
