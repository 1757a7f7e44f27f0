/**
 * Segment geometry for the cyclic axis
 *
 * Each event becomes a five-point polyline:
 *   [period start, earlier time, midpoint, later time, period end]
 * The Y coordinates decide what is drawn. A normal event draws points 2-4 as
 * one line. A wrapping event (normalized start after normalized end) draws
 * points 1-2 and 4-5 as two stubs that run out to the axis edges, with the
 * midpoint absent so the pen lifts across the gap.
 */

import { Temporal } from '@js-temporal/polyfill';
import type { Coordinate, CycleWindow, RenderSegment } from '../core/types';

export interface SegmentInput {
  starts: readonly Temporal.PlainDateTime[];
  ends: readonly Temporal.PlainDateTime[];
  durationsMs: readonly number[];
  yData: readonly number[];
  window: CycleWindow;
}

export interface RunPoint {
  x: Temporal.PlainDateTime;
  y: number;
}

const ABSENT: Coordinate<number> = { kind: 'absent' };

function present(value: number): Coordinate<number> {
  return { kind: 'present', value };
}

/**
 * Build the polyline for one normalized event
 */
export function buildSegment(
  start: Temporal.PlainDateTime,
  end: Temporal.PlainDateTime,
  durationMs: number,
  yValue: number,
  window: CycleWindow,
): RenderSegment {
  const wraps = Temporal.PlainDateTime.compare(start, end) > 0;
  const earlier = wraps ? end : start;
  const later = wraps ? start : end;
  // Microseconds keep half of an odd millisecond count exact
  const midpoint = earlier.add({ microseconds: durationMs * 500 });
  const y = present(yValue);

  return {
    x: [window.start, earlier, midpoint, later, window.end],
    y: wraps ? [y, y, ABSENT, y, y] : [ABSENT, y, y, y, ABSENT],
    wraps,
  };
}

export function generateSegments(input: SegmentInput): RenderSegment[] {
  return input.starts.map((start, index) => {
    const end = input.ends[index];
    const duration = input.durationsMs[index];
    const yValue = input.yData[index];
    if (end === undefined || duration === undefined || yValue === undefined) {
      throw new Error(`Segment input arrays disagree in length at event ${index + 1}`);
    }
    return buildSegment(start, end, duration, yValue, input.window);
  });
}

/**
 * Split a segment into the runs a renderer draws without lifting the pen.
 * Isolated present points (a run of one) are dropped.
 */
export function splitIntoRuns(segment: RenderSegment): RunPoint[][] {
  const runs: RunPoint[][] = [];
  let current: RunPoint[] = [];

  segment.y.forEach((coordinate, index) => {
    const x = segment.x[index];
    if (coordinate.kind === 'present' && x) {
      current.push({ x, y: coordinate.value });
      return;
    }
    if (current.length > 1) runs.push(current);
    current = [];
  });
  if (current.length > 1) runs.push(current);

  return runs;
}
