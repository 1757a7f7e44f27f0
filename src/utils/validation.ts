/**
 * Validation utilities for event stack data
 */

import type { AdvisoryCode, EventSet, Palette, TimePeriod } from '../core/types';
import { ChartInputError } from '../core/errors';
import { durationMs } from './timeNormalization';

export type ValidationCode = Exclude<AdvisoryCode, 'time-zone-ignored'>;

export interface ValidationError {
  type: 'error' | 'warning';
  code: ValidationCode;
  message: string;
  itemIndex?: number;
  period?: TimePeriod;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
}

/**
 * Marker symbols a surface is expected to draw
 */
export const MARKERS = [
  'o', '*', '+', 'p', 'h', '^', 'v', '>', '<', 'x', 's', 'd', '.', '|', '_', 'none',
] as const;

export type Marker = (typeof MARKERS)[number];

function result(errors: ValidationError[]): ValidationResult {
  return { valid: errors.length === 0, errors, warnings: [] };
}

/**
 * Validate the parallel arrays of an event set.
 * A start/end length mismatch stops validation; the other checks all run.
 */
export function validateEventSet(set: EventSet): ValidationResult {
  const errors: ValidationError[] = [];
  const count = set.startTimes.length;

  if (set.endTimes.length !== count) {
    errors.push({
      type: 'error',
      code: 'size-mismatch',
      message: `EndTimes must have the same number of elements as StartTimes (${set.endTimes.length} vs ${count}).`,
    });
    return result(errors);
  }

  set.startTimes.forEach((start, index) => {
    const end = set.endTimes[index];
    if (end && durationMs(start, end) < 0) {
      errors.push({
        type: 'error',
        code: 'negative-duration',
        message: `Event ${index + 1} ends before it starts. EndTimes must be greater than or equal to StartTimes.`,
        itemIndex: index,
      });
    }
  });

  if (set.colorData.length > 0 && set.colorData.length !== count) {
    errors.push({
      type: 'error',
      code: 'color-data-size-mismatch',
      message: `ColorData must have the same number of elements as StartTimes (${set.colorData.length} vs ${count}).`,
    });
  }

  if (set.eventNames.length > 0 && set.eventNames.length !== count) {
    errors.push({
      type: 'error',
      code: 'name-size-mismatch',
      message: `EventNames must have the same number of elements as StartTimes (${set.eventNames.length} vs ${count}).`,
    });
  }

  if (set.yData.length > 0 && set.yData.length !== count) {
    errors.push({
      type: 'error',
      code: 'y-data-size-mismatch',
      message: `YData must have the same number of elements as StartTimes (${set.yData.length} vs ${count}).`,
    });
  }

  return result(errors);
}

/**
 * Check that an axis limit pair is strictly increasing
 */
export function validateLimits(lower: number, upper: number, axis: 'x' | 'y'): void {
  if (!Number.isFinite(lower) || !Number.isFinite(upper) || upper <= lower) {
    throw new ChartInputError(
      'invalid-limits',
      `Specify ${axis.toUpperCase()} limits as two increasing values (got ${lower}, ${upper}).`,
    );
  }
}

/**
 * Reject non-finite numeric overrides at call time
 */
export function assertFiniteValues(values: readonly number[], name: string): void {
  const index = values.findIndex((value) => !Number.isFinite(value));
  if (index !== -1) {
    throw new ChartInputError(
      'invalid-argument',
      `${name} must contain finite numbers; element ${index + 1} is ${values[index]}.`,
    );
  }
}

/**
 * Palettes must be non-empty with every channel in [0, 1]
 */
export function assertValidPalette(palette: Palette): void {
  if (palette.length === 0) {
    throw new ChartInputError('invalid-argument', 'Palette must contain at least one color.');
  }
  palette.forEach((color, index) => {
    if (color.length !== 3 || color.some((channel) => !(channel >= 0 && channel <= 1))) {
      throw new ChartInputError(
        'invalid-argument',
        `Palette color ${index + 1} must be an RGB triple with channels in [0, 1].`,
      );
    }
  });
}

export function assertMarker(marker: string): asserts marker is Marker {
  if (!(MARKERS as readonly string[]).includes(marker)) {
    throw new ChartInputError(
      'invalid-argument',
      `Unknown marker "${marker}". Expected one of: ${MARKERS.join(' ')}.`,
    );
  }
}

export function assertLineWidth(width: number): void {
  if (!Number.isFinite(width) || width <= 0) {
    throw new ChartInputError('invalid-argument', `LineWidth must be a positive number (got ${width}).`);
  }
}

function describeIssue(issue: ValidationError): string {
  const where = issue.itemIndex !== undefined ? `, event ${issue.itemIndex + 1}` : '';
  return `[${issue.code}${where}] ${issue.message}`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Human-readable report, one line per issue tagged with its code and event
 */
export function formatValidationResult(result: ValidationResult): string {
  if (result.valid && result.warnings.length === 0) {
    return '✓ Event data is valid';
  }

  const header = result.valid
    ? `✓ Event data is valid with ${plural(result.warnings.length, 'warning')}:`
    : `✗ Event data has ${plural(result.errors.length, 'error')}:`;

  return [
    header,
    ...result.errors.map((error) => `  • ${describeIssue(error)}`),
    ...result.warnings.map((warning) => `  ⚠ ${describeIssue(warning)}`),
  ].join('\n');
}
