#!/usr/bin/env node

import cluster from 'node:cluster';
import { Command } from 'commander';
import { announceReady, buildApp } from './app.js';
import { loadServiceConfig, parseBind, type BindAddress, type ServiceEnvConfig } from './config.js';

async function startWorker(config: ServiceEnvConfig, bind: BindAddress): Promise<void> {
  const app = buildApp({
    itemLimit: config.ID_LIMIT,
    maxDelay: config.MAX_DELAY,
    logger: { level: config.LOG_LEVEL, stream: process.stderr },
    accessLog: process.stdout,
  });

  await app.listen({ host: bind.host, port: bind.port });
  announceReady(app);

  let closing = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (closing) return;
    closing = true;
    app.log.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  // The primary went away; nothing will ever signal us.
  process.on('disconnect', () => shutdown('SIGTERM'));
}

function startPrimary(config: ServiceEnvConfig, bind: BindAddress): void {
  let alive = config.WEB_CONCURRENCY;
  let stopping = false;

  const stopWorkers = (): void => {
    for (const worker of Object.values(cluster.workers ?? {})) {
      worker?.process.kill('SIGTERM');
    }
  };

  cluster.on('exit', (worker, code, signal) => {
    alive--;
    if (!stopping) {
      console.error(`Worker ${worker.process.pid} exited unexpectedly (${signal ?? code}), stopping service`);
      stopping = true;
      process.exitCode = 1;
      stopWorkers();
    }
    if (alive === 0) {
      process.exit();
    }
  });

  const onSignal = (): void => {
    if (stopping) return;
    stopping = true;
    stopWorkers();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  console.error(`Listening at http://${bind.host}:${bind.port} with ${config.WEB_CONCURRENCY} workers`);
  for (let i = 0; i < config.WEB_CONCURRENCY; i++) {
    cluster.fork();
  }
}

const program = new Command();

program
  .name('item-service')
  .description('Item lookup service used as the load-test target')
  .option('-b, --bind <address>', 'Address to listen on, host:port', '127.0.0.1:8000')
  .action(async (options: { bind: string }) => {
    try {
      const config = loadServiceConfig();
      const bind = parseBind(options.bind);
      if (cluster.isPrimary) {
        startPrimary(config, bind);
      } else {
        await startWorker(config, bind);
      }
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(2);
    }
  });

await program.parseAsync();
