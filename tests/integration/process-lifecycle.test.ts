/**
 * Integration Tests: the manager against real child processes. The children
 * are short node scripts that print the readiness marker and open no sockets.
 */
import { describe, it, expect } from 'vitest';
import { ServiceProcessManager } from '../../src/service/manager.js';
import { recordingLogger, testServiceConfiguration } from '../helpers/fixtures.js';

const MARKER = 'Application startup complete.';

const exitsOnInterrupt = [
  'process.on("SIGINT", () => process.exit(0));',
  `console.error(${JSON.stringify(MARKER)});`,
  'setInterval(() => {}, 1000);',
].join('\n');

const ignoresInterrupt = [
  'process.on("SIGINT", () => {});',
  `console.error(${JSON.stringify(MARKER)});`,
  'setInterval(() => {}, 1000);',
].join('\n');

// The helper inherits the pipes and ignores SIGINT too, so the streams only
// close once the whole process group is gone.
const forksHelper = [
  'process.on("SIGINT", () => {});',
  'const { spawn } = require("node:child_process");',
  'spawn(process.execPath, ["-e", "process.on(\'SIGINT\', () => {}); setInterval(() => {}, 1000);"], { stdio: "inherit" });',
  `console.error(${JSON.stringify(MARKER)});`,
  'setInterval(() => {}, 1000);',
].join('\n');

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function scriptConfiguration(script: string) {
  return testServiceConfiguration({
    command: process.execPath,
    args: ['-e', script],
    cwd: process.cwd(),
    env: {},
    expectedWorkers: 1,
    startupTimeout: 10_000,
    shutdownTimeout: 500,
  });
}

function createManager() {
  const logger = recordingLogger();
  const manager = new ServiceProcessManager({ logger, allocatePort: async () => 0 });
  return { manager, logger };
}

describe('ServiceProcessManager with real processes', () => {
  it('stops a process that exits on SIGINT', async () => {
    const { manager } = createManager();
    const handle = await manager.acquire(scriptConfiguration(exitsOnInterrupt));
    const pid = handle.process.pid;
    if (pid === undefined) throw new Error('service has no pid');

    expect(isAlive(pid)).toBe(true);
    const report = await manager.release(handle);

    expect(report.forced).toBe(false);
    expect(report.code).toBe(0);
    expect(report.errorLog).toEqual([MARKER]);
    expect(isAlive(pid)).toBe(false);
  });

  it('kills a process that ignores SIGINT', async () => {
    const { manager, logger } = createManager();
    const handle = await manager.acquire(scriptConfiguration(ignoresInterrupt));
    const pid = handle.process.pid;
    if (pid === undefined) throw new Error('service has no pid');

    const report = await manager.release(handle);

    expect(report.forced).toBe(true);
    expect(report.code).toBeNull();
    expect(report.signal).toBe('SIGKILL');
    expect(logger.warn).toHaveBeenCalledWith('Service did not stop within 0.5 seconds of SIGINT, killing it');
    expect(isAlive(pid)).toBe(false);
  });

  it('kills processes the service forked along with it', async () => {
    const { manager, logger } = createManager();
    const handle = await manager.acquire(scriptConfiguration(forksHelper));
    const pid = handle.process.pid;
    if (pid === undefined) throw new Error('service has no pid');

    const report = await manager.release(handle);

    expect(report.forced).toBe(true);
    expect(logger.warn).not.toHaveBeenCalledWith('Service streams did not close after SIGKILL');
    expect(isAlive(pid)).toBe(false);
  });
});
