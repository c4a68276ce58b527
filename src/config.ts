import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';
import { MAX_WORKERS, READY_MESSAGE } from '../service/src/config.js';
import { ConfigError } from './errors.js';
import type { ServiceConfiguration, ServiceEnv } from './service/types.js';

config();

export const ROOT_DIR = fileURLToPath(new URL('..', import.meta.url));

export const DEFAULT_SERVICE_ARGS = ['--import', 'tsx', 'service/src/main.ts', '--bind', '{bind}'];
export const DEFAULT_READINESS_MARKER = READY_MESSAGE;

export interface HarnessConfig {
  serviceCommand: string;
  serviceArgs: string[];
  serviceCwd: string;
  host: string;
  workers: number;
  itemLimit: number;
  readinessMarker: string;
  requestTimeout: number;
  startupTimeout: number;
  shutdownTimeout: number;
}

export function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  options: { min?: number; max?: number; integer?: boolean } = {},
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(name, `expected a number, got "${raw}"`);
  }
  if (options.integer && !Number.isInteger(value)) {
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  }
  if (options.min !== undefined && value < options.min) {
    throw new ConfigError(name, `must be at least ${options.min}, got ${value}`);
  }
  if (options.max !== undefined && value > options.max) {
    throw new ConfigError(name, `must be at most ${options.max}, got ${value}`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const args = env.SERVICE_ARGS?.trim();

  return {
    serviceCommand: env.SERVICE_COMMAND || process.execPath,
    serviceArgs: args ? args.split(/\s+/) : [...DEFAULT_SERVICE_ARGS],
    serviceCwd: env.SERVICE_CWD || ROOT_DIR,
    host: env.SERVICE_HOST || '127.0.0.1',
    workers: readNumber(env, 'SERVER_WORKERS', 2, { min: 1, max: MAX_WORKERS, integer: true }),
    itemLimit: readNumber(env, 'ID_LIMIT', 10, { min: 0, integer: true }),
    readinessMarker: env.READINESS_MARKER || DEFAULT_READINESS_MARKER,
    requestTimeout: readNumber(env, 'REQUEST_TIMEOUT_MS', 1000, { min: 1 }),
    startupTimeout: readNumber(env, 'STARTUP_TIMEOUT_MS', 10000, { min: 1 }),
    shutdownTimeout: readNumber(env, 'SHUTDOWN_TIMEOUT_MS', 10000, { min: 1 }),
  };
}

/**
 * Builds the launch settings for one service instance. `maxDelay` is the
 * service's artificial latency ceiling in seconds.
 */
export function serviceConfiguration(cfg: HarnessConfig, maxDelay = 0): ServiceConfiguration {
  const env: ServiceEnv = {
    WEB_CONCURRENCY: cfg.workers,
    ID_LIMIT: cfg.itemLimit,
    MAX_DELAY: maxDelay,
  };

  return {
    command: cfg.serviceCommand,
    args: cfg.serviceArgs,
    cwd: cfg.serviceCwd,
    env,
    expectedWorkers: cfg.workers,
    readinessMarker: cfg.readinessMarker,
    host: cfg.host,
    startupTimeout: cfg.startupTimeout,
    shutdownTimeout: cfg.shutdownTimeout,
    requestTimeout: cfg.requestTimeout,
  };
}
