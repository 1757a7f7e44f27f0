#!/usr/bin/env npx tsx

/**
 * Inspect an event JSON file: validate it, pick the period and print where
 * each event lands on the cyclic axis
 *
 * Usage: npx tsx scripts/inspect-events.ts <path-to-json>
 *
 * File shape:
 *   {
 *     "events": [{ "start": "2024-05-01T23:30", "end": "2024-05-02T00:30", "name": "Backup" }],
 *     "timePeriod": "day"          // optional
 *   }
 * Events may give "duration" (ISO 8601, e.g. "PT45M") instead of "end".
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { EventStackEngine } from "../src/core/EventStackEngine";
import { ChartInputError } from "../src/core/errors";
import type { EngineOptions } from "../src/core/EventStackEngine";
import type { Advisory } from "../src/core/types";
import {
  formatTime,
  parseTime,
  parseTimePeriod,
} from "../src/utils/timeNormalization";
import {
  formatValidationResult,
  validateEventSet,
} from "../src/utils/validation";

interface FileEvent {
  start: string;
  end?: string;
  duration?: string;
  name?: string;
}

interface EventFile {
  events: FileEvent[];
  timePeriod?: string;
}

function isFileEvent(value: unknown): value is FileEvent {
  if (typeof value !== "object" || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.start === "string" &&
    (record.end === undefined || typeof record.end === "string") &&
    (record.duration === undefined || typeof record.duration === "string") &&
    (record.name === undefined || typeof record.name === "string")
  );
}

function isEventFile(value: unknown): value is EventFile {
  if (typeof value !== "object" || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    Array.isArray(record.events) &&
    record.events.every(isFileEvent) &&
    (record.timePeriod === undefined || typeof record.timePeriod === "string")
  );
}

function createEngine(file: EventFile): EventStackEngine {
  const options: EngineOptions = {
    timePeriod: file.timePeriod ? parseTimePeriod(file.timePeriod) : null,
    eventNames: file.events.some((event) => event.name !== undefined)
      ? file.events.map((event) => event.name ?? "")
      : [],
  };
  const starts = file.events.map((event) => event.start);

  if (file.events.every((event) => event.duration !== undefined)) {
    return EventStackEngine.fromDurations(
      starts,
      file.events.map((event) => event.duration ?? "PT0S"),
      options,
    );
  }

  const ends = file.events.map((event, index) => {
    if (event.end === undefined) {
      throw new ChartInputError(
        "invalid-argument",
        `Event ${index + 1} needs an "end" (or every event needs a "duration").`,
      );
    }
    return event.end;
  });

  // Report every structural problem at once before the engine rejects the first
  const validation = validateEventSet({
    startTimes: starts.map((start) => parseTime(start)),
    endTimes: ends.map((end) => parseTime(end)),
    eventNames: options.eventNames ?? [],
    yData: [],
    colorData: [],
  });
  if (!validation.valid) {
    console.log(formatValidationResult(validation));
    process.exit(1);
  }

  return EventStackEngine.fromEndTimes(starts, ends, options);
}

const args = process.argv.slice(2);
const target = args[0];

if (target === undefined) {
  console.error("Usage: npx tsx scripts/inspect-events.ts <path-to-json>");
  process.exit(1);
}

const filePath = resolve(process.cwd(), target);

try {
  const fileContent = readFileSync(filePath, "utf-8");
  const data: unknown = JSON.parse(fileContent);
  if (!isEventFile(data)) {
    throw new ChartInputError(
      "invalid-argument",
      'Expected an object with an "events" array of { start, end | duration, name? }.',
    );
  }

  const engine = createEngine(data);
  const advisories: Advisory[] = [];
  engine.on("advisory", (advisory) => advisories.push(advisory));

  const result = engine.recompute();
  if (result.status === "failed") {
    console.log(
      formatValidationResult({ valid: false, errors: result.issues, warnings: [] }),
    );
    process.exit(1);
  }

  const state = engine.getRenderData();
  if (!state) {
    console.log("No events.");
    process.exit(0);
  }

  console.log(formatValidationResult({ valid: true, errors: [], warnings: [] }));
  for (const advisory of advisories) {
    console.log(`  ⚠ ${advisory.message}`);
  }
  console.log(`Period: ${state.timePeriod} (ticks ${state.tickLabelFormat})`);
  if (state.window) {
    console.log(`Window: ${state.window.start.toString()} → ${state.window.end.toString()}`);
  }

  state.segments.forEach((segment, index) => {
    const start = state.startsNormalized[index];
    const end = state.endsNormalized[index];
    if (!start || !end) return;
    const name = state.eventNames[index] || `Event ${index + 1}`;
    const y = state.yData[index] ?? 0;
    const wrap = segment.wraps ? " (wraps)" : "";
    console.log(
      `  ${name}: ${formatTime(start, state.timePeriod)} → ${formatTime(end, state.timePeriod)}, y=${y.toFixed(2)}${wrap}`,
    );
  });
} catch (err: unknown) {
  if (err instanceof Error && "code" in err && err.code === "ENOENT") {
    console.error(`Error: File not found: ${filePath}`);
  } else if (err instanceof SyntaxError) {
    console.error(`Error: Invalid JSON in ${filePath}`);
    console.error(`  ${err.message}`);
  } else if (err instanceof Error) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error(`Error: ${String(err)}`);
  }
  process.exit(1);
}
