import { vi } from 'vitest';
import type { Logger } from '../../src/service/logger.js';
import type { ServiceConfiguration } from '../../src/service/types.js';
import { createSample } from '../../load-test/src/sampling.js';
import type { RequestSample } from '../../load-test/src/types.js';

export function recordingLogger() {
  return {
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
  } satisfies Logger;
}

export function testServiceConfiguration(overrides: Partial<ServiceConfiguration> = {}): ServiceConfiguration {
  return {
    command: '/usr/bin/item-service',
    args: ['main.ts', '--bind', '{bind}'],
    cwd: '/tmp',
    env: { WEB_CONCURRENCY: 2, ID_LIMIT: 10, MAX_DELAY: 0 },
    expectedWorkers: 2,
    readinessMarker: 'Application startup complete.',
    host: '127.0.0.1',
    startupTimeout: 1000,
    shutdownTimeout: 1000,
    requestTimeout: 1000,
    ...overrides,
  };
}

/** Builds samples from `[startTime, duration, success]` triples. */
export function samples(...entries: Array<[number, number, boolean]>): RequestSample[] {
  return entries.map(([startTime, duration, success]) => createSample(startTime, duration, success));
}
