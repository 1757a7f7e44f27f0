/**
 * Errors thrown when a caller hands over malformed input.
 * Recoverable data problems are reported as advisories instead.
 */

export type ChartInputErrorCode =
  | 'invalid-argument'
  | 'size-mismatch'
  | 'negative-duration'
  | 'invalid-limits';

export class ChartInputError extends Error {
  readonly code: ChartInputErrorCode;

  constructor(code: ChartInputErrorCode, message: string) {
    super(message);
    this.name = 'ChartInputError';
    this.code = code;
  }
}
