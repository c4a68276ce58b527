import { ConfigError } from '../../src/errors.js';
import { loadConfig as loadHarnessConfig, readNumber, type HarnessConfig } from '../../src/config.js';

/** Artificial service latency ceilings, in seconds, by preset name. */
export const DELAY_PRESETS: Readonly<Record<string, number>> = {
  '0ms': 0,
  '10ms': 0.01,
  '100ms': 0.1,
};

export interface LoadTestConfig extends HarnessConfig {
  /** Seconds. */
  duration: number;
  path: string;
  concurrency: number;
  columns: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadTestConfig {
  const harness = loadHarnessConfig(env);

  return {
    ...harness,
    duration: readNumber(env, 'TEST_DURATION', 60, { min: 0 }),
    path: env.ENDPOINT_PATH || 'people/0',
    concurrency: readNumber(env, 'TEST_CONCURRENCY', harness.workers + 1, { min: 1, integer: true }),
    columns: readNumber(env, 'CHART_COLUMNS', 10, { min: 1, integer: true }),
  };
}

export function resolveDelay(preset: string): number {
  const delay = DELAY_PRESETS[preset];
  if (delay === undefined) {
    throw new ConfigError(
      'delay',
      `unknown preset "${preset}", expected one of ${Object.keys(DELAY_PRESETS).join(', ')}`,
    );
  }
  return delay;
}
