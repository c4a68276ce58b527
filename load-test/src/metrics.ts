import { InsufficientSamplesError } from '../../src/errors.js';
import type { LatencyStats, LoadSummary, RequestSample } from './types.js';

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Unbiased (n - 1) sample standard deviation. */
export function sampleStdev(values: number[]): number {
  if (values.length < 2) {
    throw new InsufficientSamplesError(values.length);
  }
  const avg = mean(values);
  const squares = values.reduce((acc, v) => acc + (v - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function summarize(samples: readonly RequestSample[]): LoadSummary {
  const latencies = samples.map(s => s.duration);
  if (latencies.length < 2) {
    throw new InsufficientSamplesError(latencies.length);
  }

  return {
    count: samples.length,
    failedCount: samples.filter(s => !s.success).length,
    meanLatency: mean(latencies),
    stdevLatency: sampleStdev(latencies),
  };
}

/** Time from the first request start to the end of the last started request. */
export function elapsedSpan(samples: readonly RequestSample[]): number {
  if (samples.length === 0) {
    return 0;
  }
  const first = samples[0];
  const last = samples[samples.length - 1];
  return last.startTime + last.duration - first.startTime;
}

export function calculateLatencyStats(latencies: number[]): LatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
  }

  const sorted = [...latencies].sort((a, b) => a - b);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: mean(sorted),
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

function percentile(sorted: number[], p: number): number {
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}
