/**
 * Period selection for the cyclic axis
 * Picks "day" or "year" from event durations and checks the longest event fits
 */

import type { PeriodTolerances, TimePeriod } from '../core/types';
import type { ValidationError } from '../utils/validation';
import { MS_PER_DAY, MS_PER_HOUR } from '../utils/timeNormalization';

export const DEFAULT_PERIOD_TOLERANCES: PeriodTolerances = {
  dayMaxHours: 25,
  yearMaxDays: 366,
};

/**
 * Manual period wins; otherwise "day" while every event lasts at most 24 hours
 */
export function selectTimePeriod(
  durationsMs: readonly number[],
  manualPeriod: TimePeriod | null,
): TimePeriod {
  if (manualPeriod) return manualPeriod;
  const longest = durationsMs.length > 0 ? Math.max(...durationsMs) : 0;
  return longest <= MS_PER_DAY ? 'day' : 'year';
}

/**
 * Report a period that cannot hold the longest event, or null when it fits
 */
export function checkPeriodCapacity(
  period: TimePeriod,
  durationsMs: readonly number[],
  tolerances: PeriodTolerances = DEFAULT_PERIOD_TOLERANCES,
): ValidationError | null {
  if (period === 'day') {
    const limit = tolerances.dayMaxHours * MS_PER_HOUR;
    const index = durationsMs.findIndex((duration) => duration > limit);
    if (index === -1) return null;
    return {
      type: 'error',
      code: 'period-too-narrow',
      period,
      itemIndex: index,
      message:
        'EndTimes must be less than one full day after StartTimes when TimePeriod is "day". ' +
        'Consider setting TimePeriod to "year" instead.',
    };
  }

  const limit = tolerances.yearMaxDays * MS_PER_DAY;
  const index = durationsMs.findIndex((duration) => duration > limit);
  if (index === -1) return null;
  return {
    type: 'error',
    code: 'period-too-narrow',
    period,
    itemIndex: index,
    message: 'EndTimes must be less than one full year after StartTimes.',
  };
}
