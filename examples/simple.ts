/**
 * Simple example: overnight events on a time-of-day axis, drawn to the console
 */

import { EventStackChart, EventStackEngine, splitIntoRuns, toAxisOffset } from '../src/index';
import type { ChartSurface } from '../src/index';

const engine = EventStackEngine.fromEndTimes(
  ['2024-05-01T23:30', '2024-05-02T22:45', '2024-05-04T09:00'],
  ['2024-05-02T07:10', '2024-05-03T06:30', '2024-05-04T10:15'],
  { eventNames: ['Mon night', 'Tue night', 'Standup'] },
);

// A surface that prints each drawn run as hour offsets
const consoleSurface: ChartSurface = {
  drawPolylines(lines) {
    const window = engine.getRenderData()?.window;
    if (!window) return;
    for (const line of lines) {
      const runs = splitIntoRuns({ x: line.x, y: line.y, wraps: false }).map((run) =>
        run.map((point) => toAxisOffset(point.x, window, 'day').toFixed(2)).join(' → '),
      );
      console.log(`${line.label ?? 'event'}: ${runs.join(' | ')}`);
    }
  },
  setAxis(axis) {
    console.log(`ticks (${axis.tickLabelFormat}): ${axis.ticks.map((tick) => tick.label).join(' ')}`);
  },
  setColorbar(colorbar) {
    if (colorbar) console.log(`colorbar ${colorbar.range.min}..${colorbar.range.max} ${colorbar.label}`);
  },
  setLabels(labels) {
    console.log(labels.title);
  },
};

const chart = new EventStackChart(consoleSurface, engine, {
  title: 'Sleep and meetings',
  colorbarLabel: 'Duration (h)',
});
chart.update();
