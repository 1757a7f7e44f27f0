/**
 * Tests for time parsing and cyclic normalization
 */

import { describe, it, expect } from 'vitest';
import { Temporal } from '@js-temporal/polyfill';
import {
  addDuration,
  buildCycleWindow,
  durationMs,
  formatTime,
  normalizeToCycle,
  parseTime,
  parseTimePeriod,
  toAxisOffset,
  MS_PER_HOUR,
} from '../src/utils/timeNormalization';
import { ChartInputError } from '../src/core/errors';

describe('parseTime', () => {
  it('should read plain ISO date-times as UTC instants', () => {
    const time = parseTime('2024-01-10T09:00');
    expect(time.wallClock.toString()).toBe('2024-01-10T09:00:00');
    expect(time.epochMs).toBe(Date.UTC(2024, 0, 10, 9, 0));
    expect(time.zoned).toBe(false);
  });

  it('should put date-only strings at midnight', () => {
    expect(parseTime('2024-01-10').wallClock.toString()).toBe('2024-01-10T00:00:00');
  });

  it('should keep the wall clock of UTC and offset strings', () => {
    const utc = parseTime('2024-01-10T09:00:00Z');
    expect(utc.zoned).toBe(true);
    expect(utc.wallClock.hour).toBe(9);
    expect(utc.epochMs).toBe(Date.UTC(2024, 0, 10, 9, 0));

    const offset = parseTime('2024-01-10T09:00:00+02:00');
    expect(offset.zoned).toBe(true);
    expect(offset.wallClock.hour).toBe(9);
    expect(offset.epochMs).toBe(Date.UTC(2024, 0, 10, 7, 0));
  });

  it('should read compact and hour-only offsets as zoned', () => {
    const compact = parseTime('2024-01-01T10:00+0530');
    expect(compact.zoned).toBe(true);
    expect(compact.wallClock.toString()).toBe('2024-01-01T10:00:00');
    expect(compact.epochMs).toBe(Date.UTC(2024, 0, 1, 4, 30));
    expect(compact.epochMs).toBe(parseTime('2024-01-01T10:00+05:30').epochMs);

    const hourOnly = parseTime('2024-01-01T10:00+05');
    expect(hourOnly.zoned).toBe(true);
    expect(hourOnly.wallClock.toString()).toBe('2024-01-01T10:00:00');
    expect(hourOnly.epochMs).toBe(Date.UTC(2024, 0, 1, 5, 0));

    const negative = parseTime('2024-01-01T10:00-0330');
    expect(negative.epochMs).toBe(Date.UTC(2024, 0, 1, 13, 30));
  });

  it('should measure durations across compact offsets by instant', () => {
    const start = parseTime('2024-01-01T10:00+0100');
    const end = parseTime('2024-01-01T09:30+0000');
    expect(durationMs(start, end)).toBe(30 * 60 * 1000);
  });

  it('should not mistake a date-only string for an offset', () => {
    const time = parseTime('2024-01-10');
    expect(time.zoned).toBe(false);
    expect(time.epochMs).toBe(Date.UTC(2024, 0, 10));
  });

  it('should accept bracketed zone annotations', () => {
    const time = parseTime('2024-03-10T01:30-05:00[America/New_York]');
    expect(time.zoned).toBe(true);
    expect(time.wallClock.toString()).toBe('2024-03-10T01:30:00');
    expect(time.epochMs).toBe(Date.UTC(2024, 2, 10, 6, 30));
  });

  it('should pass Temporal values through', () => {
    const plain = Temporal.PlainDateTime.from('2024-06-01T12:00');
    expect(parseTime(plain).wallClock).toBe(plain);
  });

  it('should reject unparseable strings', () => {
    expect(() => parseTime('not-a-date')).toThrow(ChartInputError);
    try {
      parseTime('not-a-date');
    } catch (err) {
      expect(err instanceof ChartInputError && err.code).toBe('invalid-argument');
    }
  });
});

describe('addDuration', () => {
  it('should add ISO durations', () => {
    expect(addDuration('2024-01-10T23:30', 'PT1H').wallClock.toString()).toBe('2024-01-11T00:30:00');
  });

  it('should add duration-like objects', () => {
    expect(addDuration('2024-01-10T08:00', { minutes: 90 }).wallClock.toString()).toBe(
      '2024-01-10T09:30:00',
    );
  });

  it('should reject malformed durations', () => {
    expect(() => addDuration('2024-01-10T08:00', 'ninety minutes')).toThrow(ChartInputError);
  });
});

describe('durationMs', () => {
  it('should measure absolute time between two instants', () => {
    const start = parseTime('2024-01-10T09:00:00+02:00');
    const end = parseTime('2024-01-10T09:00:00Z');
    expect(durationMs(start, end)).toBe(2 * MS_PER_HOUR);
  });
});

describe('normalizeToCycle', () => {
  const time = parseTime('2023-06-15T13:45:30');

  it('should keep only the time of day for the day period', () => {
    expect(normalizeToCycle(time, 2024, 'day').toString()).toBe('2024-01-01T13:45:30');
  });

  it('should keep month and day for the year period', () => {
    expect(normalizeToCycle(time, 2024, 'year').toString()).toBe('2024-06-15T13:45:30');
  });

  it('should constrain 29 February into a non-leap reference year', () => {
    const leapDay = parseTime('2024-02-29T12:00');
    expect(normalizeToCycle(leapDay, 2023, 'year').toString()).toBe('2023-02-28T12:00:00');
  });

  it('should drop the zone and keep the wall clock', () => {
    const zoned = parseTime('2024-07-01T08:15:00+09:00');
    expect(normalizeToCycle(zoned, 2024, 'day').toString()).toBe('2024-01-01T08:15:00');
  });
});

describe('buildCycleWindow', () => {
  it('should build one day from the earliest start', () => {
    const window = buildCycleWindow(
      [parseTime('2024-05-02T10:00'), parseTime('2024-05-01T23:30')],
      'day',
    );
    expect(window?.start.toString()).toBe('2024-01-01T00:00:00');
    expect(window?.end.toString()).toBe('2024-01-02T00:00:00');
  });

  it('should build one calendar year from the earliest start', () => {
    const window = buildCycleWindow(
      [parseTime('2024-02-01'), parseTime('2023-11-20T08:00')],
      'year',
    );
    expect(window?.start.toString()).toBe('2023-01-01T00:00:00');
    expect(window?.end.toString()).toBe('2024-01-01T00:00:00');
  });

  it('should pick the earliest start by absolute instant', () => {
    // 2024-01-01T01:00+05:00 is 2023-12-31T20:00Z, earlier than 22:00Z
    const window = buildCycleWindow(
      [parseTime('2023-12-31T22:00'), parseTime('2024-01-01T01:00+05:00')],
      'year',
    );
    expect(window?.start.toString()).toBe('2024-01-01T00:00:00');
  });

  it('should return null without events', () => {
    expect(buildCycleWindow([], 'day')).toBeNull();
  });
});

describe('toAxisOffset', () => {
  it('should measure hours for the day period', () => {
    const window = buildCycleWindow([parseTime('2024-05-01T09:00')], 'day');
    if (!window) throw new Error('expected a window');
    expect(toAxisOffset(Temporal.PlainDateTime.from('2024-01-01T13:30'), window, 'day')).toBe(13.5);
  });

  it('should measure days for the year period', () => {
    const window = buildCycleWindow([parseTime('2024-05-01')], 'year');
    if (!window) throw new Error('expected a window');
    expect(toAxisOffset(Temporal.PlainDateTime.from('2024-03-01'), window, 'year')).toBe(60);
  });
});

describe('formatTime', () => {
  it('should format times of day on a 12-hour clock', () => {
    expect(formatTime(Temporal.PlainDateTime.from('2024-01-01T00:05'), 'day')).toBe('12:05 AM');
    expect(formatTime(Temporal.PlainDateTime.from('2024-01-01T13:30'), 'day')).toBe('1:30 PM');
  });

  it('should format dates within the year', () => {
    expect(formatTime(Temporal.PlainDateTime.from('2024-03-07T10:00'), 'year')).toBe('07 03, 2024');
  });
});

describe('parseTimePeriod', () => {
  it('should accept period names in any case', () => {
    expect(parseTimePeriod('Day')).toBe('day');
    expect(parseTimePeriod('YEAR')).toBe('year');
  });

  it('should reject other names', () => {
    expect(() => parseTimePeriod('week')).toThrow('Unknown time period "week"');
  });
});
