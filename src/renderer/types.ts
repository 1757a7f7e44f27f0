/**
 * Drawing surface contract
 * The chart pushes geometry, axis and colorbar settings into a host surface
 */

import type { Temporal } from '@js-temporal/polyfill';
import type { ColorScale, Coordinate, FivePoints, Rgb } from '../core/types';
import type { Marker } from '../utils/validation';
import type { AxisTick } from './timeAxis';

export interface PolylineSpec {
  x: FivePoints<Temporal.PlainDateTime>;
  y: FivePoints<Coordinate<number>>; // absent points lift the pen
  color: Rgb;
  marker: Marker;
  lineWidth: number;
  label?: string; // event name for data tips
}

export interface AxisSpec {
  tickLabelFormat: string;
  displayFormat: string;
  ticks: AxisTick[];
  xLimits: [Temporal.PlainDateTime, Temporal.PlainDateTime] | null;
  yLimits: [number, number] | null; // null = fit to data
}

export interface ColorbarSpec {
  range: ColorScale;
  label: string;
}

export interface ChartLabels {
  title: string;
  xLabel: string;
  yLabel: string;
}

export interface ChartSurface {
  drawPolylines(lines: PolylineSpec[]): void;
  setAxis(axis: AxisSpec): void;
  /** null hides the colorbar */
  setColorbar(colorbar: ColorbarSpec | null): void;
  setLabels(labels: ChartLabels): void;
}
