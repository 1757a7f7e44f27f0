/**
 * Main EventStackChart class
 * Connects an EventStackEngine to a host drawing surface
 */

import type { Temporal } from '@js-temporal/polyfill';
import type { ChartState, DerivedState, TimeInput } from '../core/types';
import { EventStackEngine } from '../core/EventStackEngine';
import { displayFormat, parseTime, parseTimePeriod } from '../utils/timeNormalization';
import {
  assertFiniteValues,
  assertLineWidth,
  assertMarker,
  validateLimits,
  type Marker,
} from '../utils/validation';
import { generateTicks, resolveTimeAxisConfig, type TimeAxisConfig } from './timeAxis';
import type { ChartLabels, ChartSurface, PolylineSpec } from './types';

export interface ChartOptions {
  title?: string;
  xLabel?: string;
  yLabel?: string;
  colorbarLabel?: string;
  marker?: string;
  lineWidth?: number;
  xLimits?: [TimeInput, TimeInput] | null;
  yLimits?: [number, number] | null;
  axis?: Partial<TimeAxisConfig>;
}

export const DEFAULT_CHART_OPTIONS = {
  title: '',
  xLabel: '',
  yLabel: '',
  colorbarLabel: '',
  marker: 'none',
  lineWidth: 1.5,
} as const;

export class EventStackChart {
  readonly engine: EventStackEngine;

  private labels: ChartLabels = {
    title: DEFAULT_CHART_OPTIONS.title,
    xLabel: DEFAULT_CHART_OPTIONS.xLabel,
    yLabel: DEFAULT_CHART_OPTIONS.yLabel,
  };
  private colorbarLabel: string = DEFAULT_CHART_OPTIONS.colorbarLabel;
  private marker: Marker = DEFAULT_CHART_OPTIONS.marker;
  private lineWidth: number = DEFAULT_CHART_OPTIONS.lineWidth;
  private xLimits: [Temporal.PlainDateTime, Temporal.PlainDateTime] | null = null;
  private yLimits: [number, number] | null = null;
  private axisConfig: TimeAxisConfig = resolveTimeAxisConfig();

  private drawnState: Readonly<DerivedState> | null = null;
  private styleChanged = false;

  constructor(
    private surface: ChartSurface,
    engine: EventStackEngine = new EventStackEngine(),
    options: ChartOptions = {},
  ) {
    this.engine = engine;
    this.setLabels(options);
    if (options.colorbarLabel !== undefined) this.colorbarLabel = options.colorbarLabel;
    if (options.marker !== undefined) this.setMarker(options.marker);
    if (options.lineWidth !== undefined) this.setLineWidth(options.lineWidth);
    if (options.xLimits !== undefined) this.setXLimits(options.xLimits);
    if (options.yLimits !== undefined) this.setYLimits(options.yLimits);
    if (options.axis) this.axisConfig = resolveTimeAxisConfig(options.axis);
  }

  /**
   * Title and axis labels; omitted fields keep their value
   */
  setLabels(labels: Partial<ChartLabels>): void {
    this.labels = {
      title: labels.title ?? this.labels.title,
      xLabel: labels.xLabel ?? this.labels.xLabel,
      yLabel: labels.yLabel ?? this.labels.yLabel,
    };
  }

  getLabels(): Readonly<ChartLabels> {
    return { ...this.labels };
  }

  setColorbarLabel(label: string): void {
    this.colorbarLabel = label;
  }

  setMarker(marker: string): void {
    assertMarker(marker);
    this.marker = marker;
    this.styleChanged = true;
  }

  getMarker(): Marker {
    return this.marker;
  }

  setLineWidth(width: number): void {
    assertLineWidth(width);
    this.lineWidth = width;
    this.styleChanged = true;
  }

  getLineWidth(): number {
    return this.lineWidth;
  }

  /**
   * Manual X limits on the normalized axis, or null to follow the cycle window
   */
  setXLimits(limits: [TimeInput, TimeInput] | null): void {
    if (limits === null) {
      this.xLimits = null;
      return;
    }
    const lower = parseTime(parseTime(limits[0]).wallClock);
    const upper = parseTime(parseTime(limits[1]).wallClock);
    validateLimits(lower.epochMs, upper.epochMs, 'x');
    this.xLimits = [lower.wallClock, upper.wallClock];
  }

  /**
   * Manual limits, else the cycle window of the current render data
   */
  getXLimits(): [Temporal.PlainDateTime, Temporal.PlainDateTime] | null {
    if (this.xLimits) return this.xLimits;
    const window = this.engine.getRenderData()?.window;
    return window ? [window.start, window.end] : null;
  }

  setYLimits(limits: [number, number] | null): void {
    if (limits === null) {
      this.yLimits = null;
      return;
    }
    validateLimits(limits[0], limits[1], 'y');
    this.yLimits = [limits[0], limits[1]];
  }

  getYLimits(): [number, number] | null {
    return this.yLimits;
  }

  /**
   * Push the current render data to the surface.
   * When the engine cannot recompute, the previously drawn lines stay.
   */
  update(): void {
    const state = this.engine.getRenderData();

    if (state && (state !== this.drawnState || this.styleChanged)) {
      this.surface.drawPolylines(this.buildPolylines(state));
      this.drawnState = state;
      this.styleChanged = false;
    }

    if (state) {
      this.surface.setAxis({
        tickLabelFormat: state.tickLabelFormat,
        displayFormat: displayFormat(state.timePeriod),
        ticks: state.window ? generateTicks(state.window, state.timePeriod, this.axisConfig) : [],
        xLimits: this.getXLimits(),
        yLimits: this.yLimits,
      });
      this.surface.setColorbar(
        state.colors.scale ? { range: state.colors.scale, label: this.colorbarLabel } : null,
      );
    }

    this.surface.setLabels({ ...this.labels });
  }

  /**
   * Saved view state: manual fields only
   */
  getChartState(): ChartState {
    const chartState: ChartState = {};
    const modes = this.engine.getModes();

    if (this.xLimits) {
      chartState.xLimits = [this.xLimits[0].toString(), this.xLimits[1].toString()];
    }
    if (this.yLimits) {
      chartState.yLimits = [this.yLimits[0], this.yLimits[1]];
    }
    if (modes.yData === 'manual') {
      chartState.yData = [...this.engine.getYData()];
    }
    if (modes.colorData === 'manual') {
      chartState.colorData = [...this.engine.getColorData()];
    }
    const period = this.engine.getTimePeriod();
    if (modes.timePeriod === 'manual' && period) {
      chartState.timePeriod = period;
    }

    return chartState;
  }

  /**
   * Restore a saved view state through the regular setters
   */
  loadChartState(chartState: ChartState): void {
    // Validate everything first so a bad state changes nothing
    if (chartState.yLimits) validateLimits(chartState.yLimits[0], chartState.yLimits[1], 'y');
    if (chartState.yData) assertFiniteValues(chartState.yData, 'YData');
    if (chartState.colorData) assertFiniteValues(chartState.colorData, 'ColorData');
    if (chartState.timePeriod) parseTimePeriod(chartState.timePeriod);

    if (chartState.xLimits) this.setXLimits(chartState.xLimits);
    if (chartState.yLimits) this.setYLimits(chartState.yLimits);
    if (chartState.yData) this.engine.setYData(chartState.yData);
    if (chartState.colorData) this.engine.setColorData(chartState.colorData);
    if (chartState.timePeriod) this.engine.setTimePeriod(chartState.timePeriod);
  }

  private buildPolylines(state: Readonly<DerivedState>): PolylineSpec[] {
    const hasNames = state.eventNames.some((name) => name !== '');

    return state.segments.map((segment, index) => {
      const color = state.colors.colors[index];
      if (!color) {
        throw new Error(`No color computed for event ${index + 1}`);
      }
      const line: PolylineSpec = {
        x: segment.x,
        y: segment.y,
        color,
        marker: this.marker,
        lineWidth: this.lineWidth,
      };
      const name = state.eventNames[index];
      if (hasNames && name !== undefined) {
        line.label = name;
      }
      return line;
    });
  }
}
