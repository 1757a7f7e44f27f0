/**
 * Core type definitions for the event stack chart
 */

import type { Temporal } from '@js-temporal/polyfill';

/**
 * Flexible time input formats
 */
export type TimeInput =
  | string // ISO 8601 date-time, date, `Z`/offset suffix or `[Zone/Name]` annotation
  | Temporal.PlainDateTime // wall-clock time without a zone
  | Temporal.ZonedDateTime; // wall-clock time pinned to a zone

/**
 * Duration input accepted by the duration-based constructor
 */
export type DurationInput = string | Temporal.Duration | Temporal.DurationLike;

/**
 * Cyclic period events are projected onto
 */
export type TimePeriod = 'day' | 'year';

/**
 * Whether a derived quantity is computed by the engine or supplied by the caller
 */
export type DerivedMode = 'auto' | 'manual';

export type ColorMethod = 'colormapped' | 'solid';

/**
 * RGB triple, each channel in [0, 1]
 */
export type Rgb = readonly [number, number, number];

export type Palette = readonly Rgb[];

/**
 * Parsed event time. `epochMs` is the absolute instant (plain values read as UTC),
 * `wallClock` the local fields shown on the axis.
 */
export interface EventTime {
  wallClock: Temporal.PlainDateTime;
  epochMs: number;
  zoned: boolean;
}

/**
 * One interval as supplied by the caller
 */
export interface StackEvent {
  start: TimeInput;
  end: TimeInput;
  name?: string;
}

/**
 * Parallel input arrays. Empty override arrays mean "derive it".
 */
export interface EventSet {
  startTimes: readonly EventTime[];
  endTimes: readonly EventTime[];
  eventNames: readonly string[];
  yData: readonly number[];
  colorData: readonly number[];
}

/**
 * The representative day or year all events are drawn on
 */
export interface CycleWindow {
  start: Temporal.PlainDateTime;
  end: Temporal.PlainDateTime;
}

/**
 * A coordinate that is either drawn or lifts the pen
 */
export type Coordinate<T> = { kind: 'present'; value: T } | { kind: 'absent' };

/**
 * Exactly five points per segment
 */
export type FivePoints<T> = readonly [T, T, T, T, T];

/**
 * Polyline geometry for one event:
 * [period start, earlier time, midpoint, later time, period end]
 */
export interface RenderSegment {
  x: FivePoints<Temporal.PlainDateTime>;
  y: FivePoints<Coordinate<number>>;
  wraps: boolean;
}

/**
 * Color domain handed to the colorbar
 */
export interface ColorScale {
  readonly min: number;
  readonly max: number;
}

export interface ColorAssignment {
  readonly colors: readonly Rgb[];
  /** 1-based palette index per event; null in solid mode */
  readonly indices: readonly number[] | null;
  /** null in solid mode, where the colorbar is hidden */
  readonly scale: ColorScale | null;
}

/**
 * Tolerances used when checking that the longest event fits in the period
 */
export interface PeriodTolerances {
  dayMaxHours: number; // one hour of slack for a daylight-saving shift
  yearMaxDays: number; // leap years
}

/**
 * Everything the engine derives from one input snapshot.
 * Shared with surfaces and listeners, so it is immutable all the way down.
 */
export interface DerivedState {
  readonly timePeriod: TimePeriod;
  readonly window: Readonly<CycleWindow> | null;
  readonly eventNames: readonly string[];
  readonly durationsMs: readonly number[];
  readonly yData: readonly number[];
  readonly colorData: readonly number[];
  readonly startsNormalized: readonly Temporal.PlainDateTime[];
  readonly endsNormalized: readonly Temporal.PlainDateTime[];
  readonly segments: readonly Readonly<RenderSegment>[];
  readonly colors: ColorAssignment;
  readonly tickLabelFormat: string;
}

/**
 * Saved view state; only manual fields are present
 */
export interface ChartState {
  xLimits?: [string, string];
  yLimits?: [number, number];
  yData?: number[];
  colorData?: number[];
  timePeriod?: TimePeriod;
}

export type AdvisoryCode =
  | 'size-mismatch'
  | 'negative-duration'
  | 'color-data-size-mismatch'
  | 'name-size-mismatch'
  | 'y-data-size-mismatch'
  | 'period-too-narrow'
  | 'invalid-limits'
  | 'time-zone-ignored';

/**
 * User-visible, non-fatal notice
 */
export interface Advisory {
  code: AdvisoryCode;
  message: string;
}

/**
 * Event callbacks
 */
export type AdvisoryCallback = (advisory: Advisory) => void;
export type RecomputeCallback = (state: Readonly<DerivedState>) => void;
