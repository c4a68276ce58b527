/**
 * Unit Tests: environment-driven configuration for the harness, the load
 * test and the sample service.
 */
import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { DEFAULT_SERVICE_ARGS, loadConfig, serviceConfiguration } from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';
import { loadConfig as loadLoadTestConfig, resolveDelay } from '../../load-test/src/config.js';
import { loadServiceConfig, parseBind } from '../../service/src/config.js';

describe('harness loadConfig', () => {
  it('falls back to defaults', () => {
    const cfg = loadConfig({});

    expect(cfg.serviceCommand).toBe(process.execPath);
    expect(cfg.serviceArgs).toEqual(DEFAULT_SERVICE_ARGS);
    expect(cfg.host).toBe('127.0.0.1');
    expect(cfg.workers).toBe(2);
    expect(cfg.itemLimit).toBe(10);
    expect(cfg.readinessMarker).toBe('Application startup complete.');
    expect(cfg.requestTimeout).toBe(1000);
    expect(cfg.startupTimeout).toBe(10000);
    expect(cfg.shutdownTimeout).toBe(10000);
  });

  it('splits SERVICE_ARGS on whitespace', () => {
    const cfg = loadConfig({ SERVICE_COMMAND: '/usr/bin/env', SERVICE_ARGS: ' item-service  --bind {bind} ' });

    expect(cfg.serviceCommand).toBe('/usr/bin/env');
    expect(cfg.serviceArgs).toEqual(['item-service', '--bind', '{bind}']);
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadConfig({ SERVER_WORKERS: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ SERVER_WORKERS: 'abc' })).toThrow('SERVER_WORKERS: expected a number, got "abc"');
  });

  it('rejects values below the minimum', () => {
    expect(() => loadConfig({ SERVER_WORKERS: '0' })).toThrow('SERVER_WORKERS: must be at least 1, got 0');
  });

  it('rejects more workers than the service accepts', () => {
    expect(loadConfig({ SERVER_WORKERS: '64' }).workers).toBe(64);
    expect(() => loadConfig({ SERVER_WORKERS: '65' })).toThrow('SERVER_WORKERS: must be at most 64, got 65');
  });

  it('rejects fractional worker counts', () => {
    expect(() => loadConfig({ SERVER_WORKERS: '1.5' })).toThrow('SERVER_WORKERS: expected an integer, got "1.5"');
  });
});

describe('serviceConfiguration', () => {
  it('hands the worker count, item limit and delay to the service', () => {
    const service = serviceConfiguration(loadConfig({ SERVER_WORKERS: '3', ID_LIMIT: '5' }), 0.01);

    expect(service.env).toEqual({ WEB_CONCURRENCY: 3, ID_LIMIT: 5, MAX_DELAY: 0.01 });
    expect(service.expectedWorkers).toBe(3);
  });
});

describe('load test config', () => {
  it('defaults concurrency to one more than the server workers', () => {
    expect(loadLoadTestConfig({}).concurrency).toBe(3);
    expect(loadLoadTestConfig({ SERVER_WORKERS: '4' }).concurrency).toBe(5);
  });

  it('reads duration, path and columns', () => {
    const cfg = loadLoadTestConfig({ TEST_DURATION: '5', ENDPOINT_PATH: 'planets/2', CHART_COLUMNS: '20' });

    expect(cfg.duration).toBe(5);
    expect(cfg.path).toBe('planets/2');
    expect(cfg.columns).toBe(20);
  });

  it('resolves delay presets to seconds', () => {
    expect(resolveDelay('0ms')).toBe(0);
    expect(resolveDelay('10ms')).toBe(0.01);
    expect(resolveDelay('100ms')).toBe(0.1);
    expect(() => resolveDelay('5ms')).toThrow('delay: unknown preset "5ms", expected one of 0ms, 10ms, 100ms');
  });
});

describe('service config', () => {
  it('falls back to defaults', () => {
    expect(loadServiceConfig({})).toEqual({
      ID_LIMIT: 100,
      MAX_DELAY: 0,
      WEB_CONCURRENCY: 1,
      LOG_LEVEL: 'info',
    });
  });

  it('clamps negative limits and delays to zero', () => {
    const cfg = loadServiceConfig({ ID_LIMIT: '-5', MAX_DELAY: '-1', WEB_CONCURRENCY: '2' });

    expect(cfg.ID_LIMIT).toBe(0);
    expect(cfg.MAX_DELAY).toBe(0);
    expect(cfg.WEB_CONCURRENCY).toBe(2);
  });

  it('rejects a worker count of zero', () => {
    expect(() => loadServiceConfig({ WEB_CONCURRENCY: '0' })).toThrow(ZodError);
  });

  it('rejects a worker count above the harness ceiling', () => {
    expect(loadServiceConfig({ WEB_CONCURRENCY: '64' }).WEB_CONCURRENCY).toBe(64);
    expect(() => loadServiceConfig({ WEB_CONCURRENCY: '65' })).toThrow(ZodError);
  });

  it('parses host:port bind addresses', () => {
    expect(parseBind('127.0.0.1:8123')).toEqual({ host: '127.0.0.1', port: 8123 });
    expect(() => parseBind('localhost')).toThrow('Invalid bind address "localhost", expected host:port');
    expect(() => parseBind('localhost:http')).toThrow('Invalid port in bind address "localhost:http"');
  });
});
