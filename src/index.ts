/**
 * Event Stack Chart - cyclic time-of-day / time-of-year interval charts
 * Main entry point
 */

export { EventStackEngine, DEFAULT_ENGINE_OPTIONS } from './core/EventStackEngine';
export type { EngineOptions, RecomputeResult, DerivedModes } from './core/EventStackEngine';
export { EventStackChart, DEFAULT_CHART_OPTIONS } from './renderer/EventStackChart';
export type { ChartOptions } from './renderer/EventStackChart';
export { ChartInputError } from './core/errors';
export type { ChartInputErrorCode } from './core/errors';
export { runPipeline } from './core/pipeline';
export type { PipelineInput, PipelineResult } from './core/pipeline';

export type {
  TimeInput,
  DurationInput,
  TimePeriod,
  DerivedMode,
  ColorMethod,
  Rgb,
  Palette,
  EventTime,
  StackEvent,
  EventSet,
  CycleWindow,
  Coordinate,
  FivePoints,
  RenderSegment,
  ColorScale,
  ColorAssignment,
  PeriodTolerances,
  DerivedState,
  ChartState,
  Advisory,
  AdvisoryCode,
  AdvisoryCallback,
  RecomputeCallback,
} from './core/types';

export {
  parseTime,
  addDuration,
  normalizeToCycle,
  buildCycleWindow,
  toAxisOffset,
  formatTime,
  displayFormat,
  parseTimePeriod,
} from './utils/timeNormalization';
export {
  validateEventSet,
  validateLimits,
  formatValidationResult,
  MARKERS,
} from './utils/validation';
export type { ValidationResult, ValidationError, ValidationCode, Marker } from './utils/validation';
export { selectTimePeriod, checkPeriodCapacity, DEFAULT_PERIOD_TOLERANCES } from './layout/periodSelection';
export { generateSegments, buildSegment, splitIntoRuns } from './layout/segmentGeometry';
export type { SegmentInput, RunPoint } from './layout/segmentGeometry';
export { mapColors, colorDomain, paletteIndex } from './renderer/colorMapping';
export { createPalette, cssToRgb, PALETTE_NAMES, DEFAULT_PALETTE_SIZE } from './renderer/palettes';
export type { PaletteName } from './renderer/palettes';
export { generateTicks, resolveTimeAxisConfig, tickLabelFormat, formatTickLabel } from './renderer/timeAxis';
export type { AxisTick, TimeAxisConfig } from './renderer/timeAxis';
export type {
  ChartSurface,
  PolylineSpec,
  AxisSpec,
  ColorbarSpec,
  ChartLabels,
} from './renderer/types';

// Default export
export { EventStackChart as default } from './renderer/EventStackChart';
