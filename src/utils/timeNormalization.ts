/**
 * Time normalization utilities
 * Parses time inputs and projects them onto one representative day or year
 */

import { Temporal } from '@js-temporal/polyfill';
import type {
  CycleWindow,
  DurationInput,
  EventTime,
  TimeInput,
  TimePeriod,
} from '../core/types';
import { ChartInputError } from '../core/errors';

export const MS_PER_HOUR = 3_600_000;
export const MS_PER_DAY = 86_400_000;

// Offset after a time part: Z, +HH:MM, +HHMM or +HH
const OFFSET_SUFFIX = /[T ][\d:.,]+(?:Z|([+-])(\d{2}):?(\d{2})?)$/i;

/**
 * Convert any time input to a Temporal value, keeping its zone when it has one
 */
function toTemporal(input: TimeInput): Temporal.PlainDateTime | Temporal.ZonedDateTime {
  if (input instanceof Temporal.PlainDateTime || input instanceof Temporal.ZonedDateTime) {
    return input;
  }

  try {
    // Bracketed IANA annotation, e.g. 2024-03-10T01:30-05:00[America/New_York]
    if (input.includes('[')) {
      return Temporal.ZonedDateTime.from(input);
    }

    // Z or numeric offset: pin to that fixed offset so the wall clock is preserved
    const offset = OFFSET_SUFFIX.exec(input);
    if (offset) {
      const [, sign, hours, minutes] = offset;
      const timeZone = sign && hours ? `${sign}${hours}:${minutes ?? '00'}` : 'UTC';
      return Temporal.Instant.from(input).toZonedDateTimeISO(timeZone);
    }

    // No zone: plain local date-time (date-only strings land on midnight)
    return Temporal.PlainDateTime.from(input);
  } catch (err) {
    throw new ChartInputError(
      'invalid-argument',
      `Invalid time "${input}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function fromTemporal(value: Temporal.PlainDateTime | Temporal.ZonedDateTime): EventTime {
  if (value instanceof Temporal.ZonedDateTime) {
    return {
      wallClock: value.toPlainDateTime(),
      epochMs: value.epochMilliseconds,
      zoned: true,
    };
  }
  return {
    wallClock: value,
    epochMs: value.toZonedDateTime('UTC').epochMilliseconds,
    zoned: false,
  };
}

/**
 * Parse a time input. Plain values are read as UTC for duration arithmetic.
 */
export function parseTime(input: TimeInput): EventTime {
  return fromTemporal(toTemporal(input));
}

/**
 * Compute `start + duration`, in the start's own zone when it has one
 */
export function addDuration(start: TimeInput, duration: DurationInput): EventTime {
  const base = toTemporal(start);
  let delta: Temporal.Duration;
  try {
    delta = Temporal.Duration.from(duration);
  } catch (err) {
    throw new ChartInputError(
      'invalid-argument',
      `Invalid duration ${JSON.stringify(duration)}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return fromTemporal(base.add(delta));
}

/**
 * Absolute duration between two times in milliseconds
 */
export function durationMs(start: EventTime, end: EventTime): number {
  return end.epochMs - start.epochMs;
}

/**
 * Convert a duration to the numeric unit of the period's axis:
 * hours for day, days for year
 */
export function durationToAxisUnits(ms: number, period: TimePeriod): number {
  return period === 'day' ? ms / MS_PER_HOUR : ms / MS_PER_DAY;
}

/**
 * Project a time onto the representative cycle.
 * The zone is dropped (wall clock kept) and the year replaced; for the day
 * period the date is also pinned to 1 January so only the time of day remains.
 * 29 February in a non-leap reference year is constrained to 28 February.
 */
export function normalizeToCycle(
  time: EventTime,
  referenceYear: number,
  period: TimePeriod,
): Temporal.PlainDateTime {
  if (period === 'day') {
    return time.wallClock.with({ year: referenceYear, month: 1, day: 1 });
  }
  return time.wallClock.with({ year: referenceYear });
}

/**
 * Build the representative cycle from the earliest start time
 */
export function buildCycleWindow(
  starts: readonly EventTime[],
  period: TimePeriod,
): CycleWindow | null {
  let earliest: EventTime | undefined;
  for (const time of starts) {
    if (!earliest || time.epochMs < earliest.epochMs) {
      earliest = time;
    }
  }
  if (!earliest) return null;

  const midnight = normalizeToCycle(earliest, earliest.wallClock.year, period).with({
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0,
    microsecond: 0,
    nanosecond: 0,
  });

  if (period === 'day') {
    return { start: midnight, end: midnight.add({ days: 1 }) };
  }
  const start = midnight.with({ month: 1, day: 1 });
  return { start, end: start.add({ years: 1 }) };
}

/**
 * Position of a normalized time on the numeric axis:
 * hours (day) or days (year) since the window start
 */
export function toAxisOffset(
  value: Temporal.PlainDateTime,
  window: CycleWindow,
  period: TimePeriod,
): number {
  const ms =
    value.toZonedDateTime('UTC').epochMilliseconds -
    window.start.toZonedDateTime('UTC').epochMilliseconds;
  return durationToAxisUnits(ms, period);
}

/**
 * Display convention for normalized values (data tips)
 */
export function displayFormat(period: TimePeriod): string {
  return period === 'day' ? 'h:mm a' : 'dd MM, yyyy';
}

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * Format a normalized time with the period's display convention
 */
export function formatTime(value: Temporal.PlainDateTime, period: TimePeriod): string {
  if (period === 'day') {
    const hour12 = value.hour % 12 === 0 ? 12 : value.hour % 12;
    const suffix = value.hour < 12 ? 'AM' : 'PM';
    return `${hour12}:${pad(value.minute)} ${suffix}`;
  }
  return `${pad(value.day)} ${pad(value.month)}, ${pad(value.year, 4)}`;
}

/**
 * Parse a period name, case-insensitively
 */
export function parseTimePeriod(input: string): TimePeriod {
  const period = input.trim().toLowerCase();
  if (period === 'day' || period === 'year') {
    return period;
  }
  throw new ChartInputError('invalid-argument', `Unknown time period "${input}". Expected "day" or "year".`);
}
