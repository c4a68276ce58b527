import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { RequestSample } from './types.js';

export const SOLID_BLOCK = '█';
export const SHADED_BLOCK = '░';

export interface TimelineRow {
  /** Whole seconds since the test started. */
  second: number;
  passed: number;
  failed: number;
  /** One entry per cell; true when at least half of the cell's requests passed. */
  cells: boolean[];
}

export interface Timeline {
  /** Maximum number of requests a single cell stands for. */
  cellWeight: number;
  rows: TimelineRow[];
}

export interface TimelineOptions {
  columns?: number;
  /** Clock reading that second 0 starts at. Defaults to the earliest sample. */
  testStart?: number;
}

/** Rounds to the nearest integer, taking the even neighbour on a tie. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  if (value - floor !== 0.5) {
    return Math.round(value);
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

export function buildTimeline(samples: readonly RequestSample[], options: TimelineOptions = {}): Timeline {
  const columns = options.columns ?? 10;
  if (!Number.isInteger(columns) || columns < 1) {
    throw new RangeError(`columns must be a positive integer, got ${columns}`);
  }
  if (samples.length === 0) {
    return { cellWeight: 1, rows: [] };
  }

  const testStart = options.testStart
    ?? samples.reduce((min, s) => Math.min(min, s.startTime), Infinity);

  const buckets = new Map<number, RequestSample[]>();
  for (const sample of samples) {
    const second = Math.floor((sample.startTime - testStart) / 1000);
    const bucket = buckets.get(second);
    if (bucket) {
      bucket.push(sample);
    } else {
      buckets.set(second, [sample]);
    }
  }

  let busiest = 0;
  for (const bucket of buckets.values()) {
    busiest = Math.max(busiest, bucket.length);
  }
  const cellWeight = Math.max(1, roundHalfEven(busiest / columns));

  const rows = [...buckets.entries()]
    .sort(([a], [b]) => a - b)
    .map(([second, bucket]): TimelineRow => {
      const ordered = [...bucket].sort((a, b) => a.startTime - b.startTime);
      const cells: boolean[] = [];
      for (let i = 0; i < ordered.length; i += cellWeight) {
        const chunk = ordered.slice(i, i + cellWeight);
        const passedInChunk = chunk.filter(s => s.success).length;
        cells.push(passedInChunk / chunk.length >= 0.5);
      }
      const passed = ordered.filter(s => s.success).length;
      return { second, passed, failed: ordered.length - passed, cells };
    });

  return { cellWeight, rows };
}

export function renderRow(row: TimelineRow, paint: ChalkInstance = chalk): string {
  const glyphs = row.cells
    .map(solid => (solid ? paint.green(SOLID_BLOCK) : paint.red(SHADED_BLOCK)))
    .join('');
  return `t+${String(row.second).padEnd(2)} ${String(row.passed).padStart(4)} ok ` +
    `${String(row.failed).padStart(4)} fail ${glyphs}`;
}

export function renderTimeline(timeline: Timeline, options: { color?: boolean } = {}): string {
  const paint = options.color === false ? new Chalk({ level: 0 }) : chalk;
  const lines = [
    'This chart is a visualization of the requests made, each row represents a second,',
    `and each cell represents up to ${timeline.cellWeight} requests.`,
    `A solid cell (${SOLID_BLOCK}) means at least half of its requests passed.`,
  ];

  if (timeline.rows.length === 0) {
    lines.push('no requests');
  }
  for (const row of timeline.rows) {
    lines.push(renderRow(row, paint));
  }
  return lines.join('\n');
}
