/**
 * Pure recompute pipeline
 * validation -> period selection -> cycle window -> Y/color values -> normalization
 * -> segment geometry -> color mapping
 */

import type {
  ColorMethod,
  DerivedState,
  EventSet,
  Palette,
  PeriodTolerances,
  TimePeriod,
} from './types';
import { validateEventSet, type ValidationError } from '../utils/validation';
import {
  buildCycleWindow,
  durationMs,
  durationToAxisUnits,
  normalizeToCycle,
} from '../utils/timeNormalization';
import { checkPeriodCapacity, selectTimePeriod } from '../layout/periodSelection';
import { generateSegments } from '../layout/segmentGeometry';
import { mapColors } from '../renderer/colorMapping';
import { tickLabelFormat } from '../renderer/timeAxis';

/**
 * Snapshot of everything a recompute depends on.
 * Empty `yData`/`colorData` in the event set mean "derive it".
 */
export interface PipelineInput {
  events: EventSet;
  manualPeriod: TimePeriod | null;
  palette: Palette;
  colorMethod: ColorMethod;
  tolerances: PeriodTolerances;
}

export type PipelineResult =
  | { ok: true; state: DerivedState; zoneDropped: boolean }
  | { ok: false; issues: ValidationError[] };

export function runPipeline(input: PipelineInput): PipelineResult {
  const { events } = input;

  const validation = validateEventSet(events);
  if (!validation.valid) {
    return { ok: false, issues: validation.errors };
  }

  const durationsMs = events.startTimes.map((start, index) => {
    const end = events.endTimes[index];
    return end ? durationMs(start, end) : 0;
  });

  const timePeriod = selectTimePeriod(durationsMs, input.manualPeriod);
  const capacityIssue = checkPeriodCapacity(timePeriod, durationsMs, input.tolerances);
  if (capacityIssue) {
    return { ok: false, issues: [capacityIssue] };
  }

  const window = buildCycleWindow(events.startTimes, timePeriod);

  const yData =
    events.yData.length > 0
      ? [...events.yData]
      : durationsMs.map((duration) => durationToAxisUnits(duration, timePeriod));
  const colorData = events.colorData.length > 0 ? [...events.colorData] : [...yData];

  const referenceYear = window?.start.year ?? 0;
  const startsNormalized = window
    ? events.startTimes.map((time) => normalizeToCycle(time, referenceYear, timePeriod))
    : [];
  const endsNormalized = window
    ? events.endTimes.map((time) => normalizeToCycle(time, referenceYear, timePeriod))
    : [];

  const segments = window
    ? generateSegments({
        starts: startsNormalized,
        ends: endsNormalized,
        durationsMs,
        yData,
        window,
      })
    : [];

  const zoneDropped =
    events.startTimes.some((time) => time.zoned) || events.endTimes.some((time) => time.zoned);

  return {
    ok: true,
    zoneDropped,
    state: {
      timePeriod,
      window,
      eventNames: [...events.eventNames],
      durationsMs,
      yData,
      colorData,
      startsNormalized,
      endsNormalized,
      segments,
      colors: mapColors(colorData, input.palette, input.colorMethod),
      tickLabelFormat: tickLabelFormat(timePeriod),
    },
  };
}
