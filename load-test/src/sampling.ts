import type { RequestIssuer } from '../../src/service/types.js';
import type { Clock, RequestSample } from './types.js';

export const monotonicClock: Clock = () => performance.now();

export function createSample(startTime: number, duration: number, success: boolean): RequestSample {
  return Object.freeze({ startTime, duration, success });
}

/**
 * Issues one request and turns its outcome into a sample. A timeout or a
 * non-2xx status is a failed sample timed by the wall clock; a success is
 * timed by the response's own elapsed time.
 */
export async function attempt(issuer: RequestIssuer, path: string, clock: Clock = monotonicClock): Promise<RequestSample> {
  const startTime = clock();
  const response = await issuer.issue(path);
  const took = clock() - startTime;

  if (response === null || !response.ok) {
    return createSample(startTime, took, false);
  }
  return createSample(startTime, response.elapsed, true);
}
