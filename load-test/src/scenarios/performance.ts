import { createRequestIssuer } from '../../../src/service/issuer.js';
import { consoleLogger, type Logger } from '../../../src/service/logger.js';
import type { ServiceProcessManager } from '../../../src/service/manager.js';
import type { ServiceConfiguration } from '../../../src/service/types.js';
import { createConcurrentStrategy, runSequential } from '../load.js';
import { elapsedSpan, summarize } from '../metrics.js';
import { monotonicClock } from '../sampling.js';
import type { Clock, LoadStrategy, ScenarioConfig, ScenarioResult } from '../types.js';

export interface PerformanceRunOptions {
  manager: ServiceProcessManager;
  service: ServiceConfiguration;
  scenario: ScenarioConfig;
  logger?: Logger;
  clock?: Clock;
}

export function strategyFor(scenario: ScenarioConfig): LoadStrategy {
  return scenario.mode === 'concurrent'
    ? createConcurrentStrategy(scenario.concurrency)
    : runSequential;
}

/**
 * Starts the service, drives load at it until the scenario's duration has
 * passed, stops it again and summarizes what was measured.
 */
export async function runPerformanceScenario(options: PerformanceRunOptions): Promise<ScenarioResult> {
  const { manager, scenario } = options;
  const logger = options.logger ?? consoleLogger;
  const clock = options.clock ?? monotonicClock;
  const strategy = strategyFor(scenario);

  const handle = await manager.acquire(options.service);
  try {
    logger.info(
      `The test will now continuously send GET requests to '${scenario.path}' ` +
        `for ${scenario.duration} seconds...`,
    );
    const testStart = clock();
    const samples = await strategy(createRequestIssuer(handle), {
      path: scenario.path,
      deadline: testStart + scenario.duration * 1000,
      clock,
    });
    const service = await manager.release(handle);

    return {
      scenario: `${scenario.mode}-${scenario.delay}`,
      duration: elapsedSpan(samples),
      testStart,
      samples,
      summary: summarize(samples),
      service,
    };
  } finally {
    await manager.release(handle);
  }
}
