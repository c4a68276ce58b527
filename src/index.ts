#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, serviceConfiguration } from './config.js';
import { allChecks, concurrentChecks, sequentialChecks, getChecksByName } from './checks/index.js';
import { runChecks } from './runner.js';
import { Reporter } from './reporter.js';
import { ServiceProcessManager, consoleLogger, createRequestIssuer, silentLogger } from './service/index.js';
import type { Check } from './types.js';

interface CheckOptions {
  only?: string;
  mode: string;
  verbose?: boolean;
  json?: boolean;
}

const program = new Command();

program
  .name('service-check')
  .description('Launch the service under test and verify its item endpoints')
  .version('1.0.0');

program
  .command('check')
  .description('Run functional checks against a freshly started service')
  .option('--only <checks>', 'Run specific checks (comma-separated)')
  .option('--mode <mode>', 'Request mode: sequential, concurrent or both', 'both')
  .option('--verbose', 'Show the mismatching request for failed checks')
  .option('--json', 'Output results as JSON')
  .action(async (options: CheckOptions) => {
    let exitCode = 0;
    try {
      const cfg = loadConfig();

      let checksToRun: Check[] = allChecks;
      if (options.mode === 'sequential') {
        checksToRun = sequentialChecks;
      } else if (options.mode === 'concurrent') {
        checksToRun = concurrentChecks;
      } else if (options.mode !== 'both') {
        console.error(`Unknown mode: ${options.mode}`);
        process.exit(2);
      }

      if (options.only) {
        const checkNames = options.only.split(',').map(s => s.trim());
        checksToRun = getChecksByName(checkNames, checksToRun);

        if (checksToRun.length === 0) {
          console.error(`No checks found matching: ${options.only}`);
          console.error('Available checks:', allChecks.map(c => c.name).join(', '));
          process.exit(2);
        }
      }

      const manager = new ServiceProcessManager({ logger: options.json ? silentLogger : consoleLogger });
      const reporter = new Reporter({
        verbose: options.verbose,
        json: options.json,
      });

      const handle = await manager.acquire(serviceConfiguration(cfg));
      try {
        reporter.start(options.mode);

        const result = await runChecks({
          checks: checksToRun,
          context: { issuer: createRequestIssuer(handle), itemLimit: cfg.itemLimit },
          timeout: cfg.requestTimeout * (cfg.itemLimit + 3) + 1000,
          onCheckStart: (check) => reporter.onCheckStart(check.name),
          onCheckComplete: (_, checkResult) => reporter.onCheckComplete(checkResult),
        });

        const service = await manager.release(handle);
        reporter.finish(result, service);
        exitCode = result.failed > 0 ? 1 : 0;
      } finally {
        await manager.release(handle);
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
      } else {
        console.error('An unknown error occurred');
      }
      exitCode = 2;
    }
    process.exit(exitCode);
  });

program.parse();
