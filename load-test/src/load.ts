import type { RequestIssuer } from '../../src/service/types.js';
import { attempt, monotonicClock } from './sampling.js';
import type { LoadOptions, LoadStrategy, RequestSample } from './types.js';

/**
 * Issues requests one after another until the deadline passes. The deadline
 * is only checked between requests, so the last request may finish up to one
 * request timeout after it; that request is still recorded.
 */
export const runSequential: LoadStrategy = async (issuer, options) => {
  const clock = options.clock ?? monotonicClock;
  const samples: RequestSample[] = [];

  while (clock() <= options.deadline) {
    samples.push(await attempt(issuer, options.path, clock));
  }
  return samples;
};

export function mergeByStartTime(perWorker: RequestSample[][]): RequestSample[] {
  // Array.prototype.sort is stable, so equal start times keep worker order.
  return perWorker.flat().sort((a, b) => a.startTime - b.startTime);
}

export interface ConcurrentRun {
  samples: RequestSample[];
  perWorker: RequestSample[][];
}

export async function runConcurrentDetailed(
  issuer: RequestIssuer,
  options: LoadOptions,
  workers: number,
): Promise<ConcurrentRun> {
  if (!Number.isInteger(workers) || workers < 1) {
    throw new RangeError(`workers must be a positive integer, got ${workers}`);
  }

  const perWorker = await Promise.all(
    Array.from({ length: workers }, () => runSequential(issuer, options)),
  );
  return { samples: mergeByStartTime(perWorker), perWorker };
}

/**
 * Runs `workers` sequential loops side by side against the same deadline and
 * merges their samples into one timeline ordered by start time.
 */
export function createConcurrentStrategy(workers: number): LoadStrategy {
  return async (issuer, options) => (await runConcurrentDetailed(issuer, options, workers)).samples;
}
