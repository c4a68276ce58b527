import type { ReleaseReport, RequestIssuer } from '../../src/service/types.js';

/** Reads the monotonic clock, in milliseconds. */
export type Clock = () => number;

export interface RequestSample {
  /** Monotonic clock reading when the request was issued. */
  readonly startTime: number;
  /** Milliseconds the request took. */
  readonly duration: number;
  readonly success: boolean;
}

export interface LoadOptions {
  path: string;
  /** Monotonic clock reading after which no new request is issued. */
  deadline: number;
  clock?: Clock;
}

export type LoadStrategy = (issuer: RequestIssuer, options: LoadOptions) => Promise<RequestSample[]>;

export type LoadMode = 'sequential' | 'concurrent';

export interface LoadSummary {
  count: number;
  failedCount: number;
  meanLatency: number;
  stdevLatency: number;
}

export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface ScenarioConfig {
  mode: LoadMode;
  /** Name of the service delay preset, e.g. `10ms`. */
  delay: string;
  /** Test duration in seconds. */
  duration: number;
  concurrency: number;
  path: string;
  columns: number;
}

export interface ScenarioResult {
  scenario: string;
  /** Milliseconds from the first request start to the last request end. */
  duration: number;
  /** Clock reading when load generation began. */
  testStart: number;
  samples: RequestSample[];
  summary: LoadSummary;
  service?: ReleaseReport;
}
