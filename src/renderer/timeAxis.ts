/**
 * Time axis conventions: tick label format and tick positions over a cycle window
 */

import type { Temporal } from '@js-temporal/polyfill';
import type { CycleWindow, TimePeriod } from '../core/types';
import { ChartInputError } from '../core/errors';
import { toAxisOffset } from '../utils/timeNormalization';

export interface TimeAxisConfig {
  dayTickHours: number;
  yearTickMonths: number;
}

export interface AxisTick {
  value: Temporal.PlainDateTime;
  offset: number; // hours (day) or days (year) since the window start
  label: string;
}

const DEFAULT_CONFIG: TimeAxisConfig = {
  dayTickHours: 3,
  yearTickMonths: 1,
};

const MONTH_ABBREVIATIONS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

/**
 * Tick label format string handed to the surface
 */
export function tickLabelFormat(period: TimePeriod): string {
  return period === 'day' ? 'HH:mm' : 'MMM';
}

/**
 * Render a tick label in the period's tick format
 */
export function formatTickLabel(value: Temporal.PlainDateTime, period: TimePeriod): string {
  if (period === 'day') {
    return `${String(value.hour).padStart(2, '0')}:${String(value.minute).padStart(2, '0')}`;
  }
  return MONTH_ABBREVIATIONS[value.month - 1] ?? String(value.month);
}

/**
 * Merge a partial config over the defaults. Spacings are whole hours or months.
 */
export function resolveTimeAxisConfig(config: Partial<TimeAxisConfig> = {}): TimeAxisConfig {
  const resolved: TimeAxisConfig = { ...DEFAULT_CONFIG, ...config };
  assertTickSpacing('dayTickHours', resolved.dayTickHours);
  assertTickSpacing('yearTickMonths', resolved.yearTickMonths);
  return resolved;
}

function assertTickSpacing(key: keyof TimeAxisConfig, spacing: number): void {
  if (!Number.isInteger(spacing) || spacing <= 0) {
    throw new ChartInputError(
      'invalid-argument',
      `Tick spacing ${key} must be a positive whole number (got ${spacing}).`,
    );
  }
}

/**
 * Ticks from window start to window end inclusive
 */
export function generateTicks(
  window: CycleWindow,
  period: TimePeriod,
  config: Partial<TimeAxisConfig> = {},
): AxisTick[] {
  const { dayTickHours, yearTickMonths } = resolveTimeAxisConfig(config);
  const ticks: AxisTick[] = [];

  if (period === 'day') {
    for (let hours = 0; hours <= 24; hours += dayTickHours) {
      const value = window.start.add({ hours });
      ticks.push({ value, offset: toAxisOffset(value, window, period), label: formatTickLabel(value, period) });
    }
    return ticks;
  }

  for (let months = 0; months <= 12; months += yearTickMonths) {
    const value = window.start.add({ months });
    ticks.push({ value, offset: toAxisOffset(value, window, period), label: formatTickLabel(value, period) });
  }
  return ticks;
}
