/**
 * EventStackEngine
 * Holds the input snapshot, per-field auto/manual modes and the derived render
 * data, and recomputes only when an input changed.
 */

import type {
  Advisory,
  AdvisoryCallback,
  ColorMethod,
  DerivedMode,
  DerivedState,
  DurationInput,
  EventTime,
  Palette,
  PeriodTolerances,
  RecomputeCallback,
  StackEvent,
  TimeInput,
  TimePeriod,
} from './types';
import { ChartInputError } from './errors';
import { runPipeline } from './pipeline';
import {
  addDuration,
  durationMs,
  parseTime,
  parseTimePeriod,
} from '../utils/timeNormalization';
import {
  assertFiniteValues,
  assertValidPalette,
  type ValidationError,
} from '../utils/validation';
import { DEFAULT_PERIOD_TOLERANCES } from '../layout/periodSelection';
import { createPalette } from '../renderer/palettes';

export interface EngineOptions {
  timePeriod?: TimePeriod | null;
  eventNames?: readonly string[];
  yData?: readonly number[];
  colorData?: readonly number[];
  palette?: Palette;
  colorMethod?: ColorMethod;
  tolerances?: Partial<PeriodTolerances>;
}

export const DEFAULT_ENGINE_OPTIONS: Readonly<{ colorMethod: ColorMethod; tolerances: PeriodTolerances }> = {
  colorMethod: 'colormapped',
  tolerances: DEFAULT_PERIOD_TOLERANCES,
};

export type RecomputeResult =
  | { status: 'recomputed' | 'unchanged' }
  | { status: 'failed'; issues: ValidationError[] };

export interface DerivedModes {
  yData: DerivedMode;
  colorData: DerivedMode;
  timePeriod: DerivedMode;
}

interface EngineEventMap {
  advisory: AdvisoryCallback;
  recompute: RecomputeCallback;
}

type ListenerSets = { [K in keyof EngineEventMap]: Set<EngineEventMap[K]> };

const COLOR_METHODS: readonly ColorMethod[] = ['colormapped', 'solid'];

function parseTimes(times: readonly TimeInput[]): EventTime[] {
  return times.map((time) => parseTime(time));
}

function assertSameLength(count: number, other: number): void {
  if (count !== other) {
    throw new ChartInputError('size-mismatch', 'Both data inputs must be vectors of the same length.');
  }
}

function assertNonNegative(starts: readonly EventTime[], ends: readonly EventTime[]): void {
  starts.forEach((start, index) => {
    const end = ends[index];
    if (end && durationMs(start, end) < 0) {
      throw new ChartInputError('negative-duration', 'Events cannot have negative durations.');
    }
  });
}

export class EventStackEngine {
  private startTimes: EventTime[] = [];
  private endTimes: EventTime[] = [];
  private eventNames: string[] = [];

  private yDataManual: number[] = [];
  private yDataMode: DerivedMode = 'auto';
  private colorDataManual: number[] = [];
  private colorDataMode: DerivedMode = 'auto';
  private manualPeriod: TimePeriod | null = null;

  private palette: Palette;
  private colorMethod: ColorMethod = DEFAULT_ENGINE_OPTIONS.colorMethod;
  private tolerances: PeriodTolerances = { ...DEFAULT_ENGINE_OPTIONS.tolerances };

  private dirty = false;
  private derived: DerivedState | null = null;
  private timeZoneWarned = false;
  private listeners: ListenerSets = { advisory: new Set(), recompute: new Set() };

  constructor(options: EngineOptions = {}) {
    this.palette = createPalette();
    if (options.palette) this.setPalette(options.palette);
    if (options.colorMethod) this.setColorMethod(options.colorMethod);
    if (options.tolerances) this.setTolerances(options.tolerances);
    if (options.timePeriod) this.setTimePeriod(options.timePeriod);
    if (options.eventNames) this.setEventNames(options.eventNames);
    if (options.yData) this.setYData(options.yData);
    if (options.colorData) this.setColorData(options.colorData);
  }

  /**
   * Create an engine from start and end times
   */
  static fromEndTimes(
    starts: readonly TimeInput[],
    ends: readonly TimeInput[],
    options: EngineOptions = {},
  ): EventStackEngine {
    assertSameLength(starts.length, ends.length);
    const startTimes = parseTimes(starts);
    const endTimes = parseTimes(ends);
    assertNonNegative(startTimes, endTimes);

    const engine = new EventStackEngine(options);
    engine.assignEvents(startTimes, endTimes);
    return engine;
  }

  /**
   * Create an engine from start times and durations (end = start + duration)
   */
  static fromDurations(
    starts: readonly TimeInput[],
    durations: readonly DurationInput[],
    options: EngineOptions = {},
  ): EventStackEngine {
    assertSameLength(starts.length, durations.length);
    const startTimes = parseTimes(starts);
    const endTimes = starts.map((start, index) => {
      const duration = durations[index];
      if (duration === undefined) {
        throw new ChartInputError('size-mismatch', 'Both data inputs must be vectors of the same length.');
      }
      return addDuration(start, duration);
    });
    assertNonNegative(startTimes, endTimes);

    const engine = new EventStackEngine(options);
    engine.assignEvents(startTimes, endTimes);
    return engine;
  }

  /**
   * Create an engine from event records; names are taken when any event has one
   */
  static fromEvents(events: readonly StackEvent[], options: EngineOptions = {}): EventStackEngine {
    const names = events.some((event) => event.name !== undefined)
      ? events.map((event) => event.name ?? '')
      : undefined;
    return EventStackEngine.fromEndTimes(
      events.map((event) => event.start),
      events.map((event) => event.end),
      names ? { ...options, eventNames: names } : options,
    );
  }

  /**
   * Input setters. Each parses before touching state and marks the engine dirty.
   */
  setStartTimes(times: readonly TimeInput[]): void {
    this.startTimes = parseTimes(times);
    this.dirty = true;
  }

  setEndTimes(times: readonly TimeInput[]): void {
    this.endTimes = parseTimes(times);
    this.dirty = true;
  }

  setEvents(starts: readonly TimeInput[], ends: readonly TimeInput[]): void {
    this.assignEvents(parseTimes(starts), parseTimes(ends));
  }

  setEventNames(names: readonly string[]): void {
    this.eventNames = [...names];
    this.dirty = true;
  }

  /**
   * Override Y values; an empty array returns them to auto (event durations)
   */
  setYData(values: readonly number[]): void {
    assertFiniteValues(values, 'YData');
    this.yDataManual = [...values];
    this.yDataMode = values.length > 0 ? 'manual' : 'auto';
    this.dirty = true;
  }

  /**
   * Override color values; an empty array returns them to auto (a copy of Y values)
   */
  setColorData(values: readonly number[]): void {
    assertFiniteValues(values, 'ColorData');
    this.colorDataManual = [...values];
    this.colorDataMode = values.length > 0 ? 'manual' : 'auto';
    this.dirty = true;
  }

  /**
   * Fix the period, or pass null to select it from the data again
   */
  setTimePeriod(period: TimePeriod | string | null): void {
    this.manualPeriod = period === null ? null : parseTimePeriod(period);
    this.dirty = true;
  }

  /**
   * Replace the palette; this also switches the color method to colormapped
   */
  setPalette(palette: Palette): void {
    assertValidPalette(palette);
    this.palette = palette.map((color) => [color[0], color[1], color[2]] as const);
    this.colorMethod = 'colormapped';
    this.dirty = true;
  }

  setColorMethod(method: ColorMethod): void {
    if (!COLOR_METHODS.includes(method)) {
      throw new ChartInputError('invalid-argument', `Unknown color method "${method}".`);
    }
    this.colorMethod = method;
    this.dirty = true;
  }

  setTolerances(tolerances: Partial<PeriodTolerances>): void {
    const next = { ...this.tolerances, ...tolerances };
    if (!(next.dayMaxHours > 0) || !(next.yearMaxDays > 0)) {
      throw new ChartInputError('invalid-argument', 'Period tolerances must be positive.');
    }
    this.tolerances = next;
    this.dirty = true;
  }

  /**
   * Raw input accessors
   */
  getStartTimes(): readonly EventTime[] {
    return this.startTimes;
  }

  getEndTimes(): readonly EventTime[] {
    return this.endTimes;
  }

  getEventNames(): readonly string[] {
    return this.eventNames;
  }

  getPalette(): Palette {
    return this.palette;
  }

  getColorMethod(): ColorMethod {
    return this.colorMethod;
  }

  getModes(): DerivedModes {
    return {
      yData: this.yDataMode,
      colorData: this.colorDataMode,
      timePeriod: this.manualPeriod ? 'manual' : 'auto',
    };
  }

  isDirty(): boolean {
    return this.dirty;
  }

  /**
   * Y value per event. Auto values trigger a recompute when inputs changed.
   */
  getYData(): readonly number[] {
    if (this.yDataMode === 'manual') return this.yDataManual;
    if (this.dirty) this.recompute();
    return this.derived?.yData ?? [];
  }

  getColorData(): readonly number[] {
    if (this.colorDataMode === 'manual') return this.colorDataManual;
    if (this.dirty) this.recompute();
    return this.derived?.colorData ?? [];
  }

  getTimePeriod(): TimePeriod | null {
    if (this.manualPeriod) return this.manualPeriod;
    if (this.dirty) this.recompute();
    return this.derived?.timePeriod ?? null;
  }

  /**
   * Render-ready data, recomputed first if inputs changed.
   * After a failed recompute this is the last valid state (or null).
   */
  getRenderData(): Readonly<DerivedState> | null {
    if (this.dirty) this.recompute();
    return this.derived;
  }

  /**
   * Run the pipeline when dirty. On failure the previous derived state stays
   * and the engine remains dirty.
   */
  recompute(): RecomputeResult {
    if (!this.dirty) {
      return { status: 'unchanged' };
    }

    const result = runPipeline({
      events: {
        startTimes: this.startTimes,
        endTimes: this.endTimes,
        eventNames: this.eventNames,
        yData: this.yDataMode === 'manual' ? this.yDataManual : [],
        colorData: this.colorDataMode === 'manual' ? this.colorDataManual : [],
      },
      manualPeriod: this.manualPeriod,
      palette: this.palette,
      colorMethod: this.colorMethod,
      tolerances: this.tolerances,
    });

    if (!result.ok) {
      for (const issue of result.issues) {
        this.emitAdvisory({ code: issue.code, message: issue.message });
      }
      return { status: 'failed', issues: result.issues };
    }

    if (result.zoneDropped && !this.timeZoneWarned) {
      this.timeZoneWarned = true;
      this.emitAdvisory({ code: 'time-zone-ignored', message: 'TimeZone is being ignored.' });
    }

    this.derived = result.state;
    this.dirty = false;

    if (__DEBUG__) {
      console.debug(
        `[event-stack] recomputed ${result.state.segments.length} segments over a ${result.state.timePeriod}`,
      );
    }
    this.listeners.recompute.forEach((callback) => callback(result.state));

    return { status: 'recomputed' };
  }

  /**
   * Event handling
   */
  on<K extends keyof EngineEventMap>(event: K, callback: EngineEventMap[K]): void {
    this.listeners[event].add(callback);
  }

  off<K extends keyof EngineEventMap>(event: K, callback: EngineEventMap[K]): void {
    this.listeners[event].delete(callback);
  }

  private assignEvents(startTimes: EventTime[], endTimes: EventTime[]): void {
    this.startTimes = startTimes;
    this.endTimes = endTimes;
    this.dirty = true;
  }

  private emitAdvisory(advisory: Advisory): void {
    if (this.listeners.advisory.size === 0) {
      console.warn(`[event-stack] ${advisory.message}`);
      return;
    }
    this.listeners.advisory.forEach((callback) => callback(advisory));
  }
}
