#!/usr/bin/env node

import { Command } from 'commander';
import { serviceConfiguration } from '../../src/config.js';
import { ServiceProcessManager, consoleLogger, silentLogger } from '../../src/service/index.js';
import { DELAY_PRESETS, loadConfig, resolveDelay } from './config.js';
import { runPerformanceScenario } from './scenarios/index.js';
import { printResults, type ReporterOptions } from './reporter.js';
import type { LoadMode, ScenarioConfig } from './types.js';

interface RunOptions {
  delay: string;
  mode: string;
  duration?: string;
  concurrency?: string;
  path?: string;
  columns?: string;
  output: string;
}

function parseMode(mode: string): LoadMode {
  if (mode === 'sequential' || mode === 'concurrent') {
    return mode;
  }
  throw new Error(`Unknown mode "${mode}", expected sequential or concurrent`);
}

function parseFormat(format: string): ReporterOptions['format'] {
  if (format === 'pretty' || format === 'json') {
    return format;
  }
  throw new Error(`Unknown output format "${format}", expected pretty or json`);
}

const program = new Command();

program
  .name('service-load')
  .description('Launch the service under test and measure it under sustained load')
  .version('1.0.0');

program
  .command('run')
  .description('Send GET requests to one endpoint for a fixed duration')
  .option('--delay <preset>', `Service delay preset: ${Object.keys(DELAY_PRESETS).join(', ')}`, '0ms')
  .option('-m, --mode <mode>', 'Load mode: sequential or concurrent', 'sequential')
  .option('-d, --duration <seconds>', 'Test duration in seconds (default: TEST_DURATION or 60)')
  .option('-c, --concurrency <number>', 'Concurrent workers (default: server workers + 1)')
  .option('-p, --path <path>', 'Endpoint path (default: people/0)')
  .option('--columns <number>', 'Cells per timeline row (default: 10)')
  .option('-o, --output <format>', 'Output format: pretty, json', 'pretty')
  .action(async (options: RunOptions) => {
    let exitCode = 0;
    try {
      const env: NodeJS.ProcessEnv = { ...process.env };
      if (options.duration) env.TEST_DURATION = options.duration;
      if (options.concurrency) env.TEST_CONCURRENCY = options.concurrency;
      if (options.path) env.ENDPOINT_PATH = options.path;
      if (options.columns) env.CHART_COLUMNS = options.columns;
      const cfg = loadConfig(env);
      const format = parseFormat(options.output);

      const scenario: ScenarioConfig = {
        mode: parseMode(options.mode),
        delay: options.delay,
        duration: cfg.duration,
        concurrency: cfg.concurrency,
        path: cfg.path,
        columns: cfg.columns,
      };
      const logger = format === 'json' ? silentLogger : consoleLogger;

      logger.info(
        `Running ${scenario.mode} load for ${scenario.duration}s against a service with ${options.delay} max delay` +
          (scenario.mode === 'concurrent' ? ` using ${scenario.concurrency} workers` : ''),
      );

      const result = await runPerformanceScenario({
        manager: new ServiceProcessManager({ logger }),
        service: serviceConfiguration(cfg, resolveDelay(options.delay)),
        scenario,
        logger,
      });
      printResults(result, { format, columns: scenario.columns });

      if (result.summary.failedCount > 0) {
        console.error(`${result.summary.failedCount}/${result.summary.count} requests failed`);
        exitCode = 1;
      }
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      exitCode = 2;
    }
    process.exit(exitCode);
  });

program.parse();
