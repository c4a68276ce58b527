import { spawn } from 'node:child_process';
import { once } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { ServiceStartupError, StartupTimeoutError } from '../errors.js';
import { consoleLogger, type Logger } from './logger.js';
import { OrderedSet } from './ordered-set.js';
import { getAvailablePort } from './port.js';
import type {
  ProcessExit,
  ReadinessState,
  ReleaseReport,
  ServiceConfiguration,
  ServiceEnv,
  ServiceHandle,
  ServiceProcess,
  Spawner,
} from './types.js';

export interface ServiceManagerOptions {
  spawner?: Spawner;
  logger?: Logger;
  allocatePort?: (host: string) => Promise<number>;
  /**
   * Start the service in its own process group and signal the whole group,
   * so helpers it forks are stopped with it. Defaults to on for the built-in
   * spawner and off for an injected one.
   */
  processGroup?: boolean;
}

const defaultSpawner: Spawner = (command, args, options) => spawn(command, args, options);

function hasExited(child: ServiceProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

function signalService(child: ServiceProcess, signal: NodeJS.Signals, processGroup: boolean): void {
  if (processGroup && child.pid !== undefined) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      // The group leader may be gone while the child object is not reaped yet.
      if (!isMissingProcess(error)) {
        throw error;
      }
    }
  }
  child.kill(signal);
}

function stringifyEnv(env: ServiceEnv): Record<string, string> {
  return Object.fromEntries(Object.entries(env).map(([key, value]) => [key, String(value)]));
}

function collectLines(stream: Readable | null, sink: string[], onLine?: (line: string) => void): Promise<void> {
  if (!stream) {
    return Promise.resolve();
  }
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  lines.on('line', (line: string) => {
    sink.push(line);
    onLine?.(line);
  });
  return once(lines, 'close').then(() => undefined);
}

async function settleWithin<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

interface StartupWatcher {
  readySignal(): void;
  launchFailed(error: Error): void;
}

class ManagedService implements ServiceHandle {
  readonly process: ServiceProcess;
  readonly host: string;
  readonly port: number;
  readonly baseUrl: string;
  readonly env: ServiceEnv;
  readonly requestTimeout: number;
  readonly shutdownTimeout: number;
  readonly processGroup: boolean;
  readonly diagnostics: string[] = [];
  readonly output: string[] = [];
  readonly closed: Promise<ProcessExit>;
  readonly exitHook: () => void;
  state: ReadinessState = 'idle';
  workersReady = 0;
  watcher?: StartupWatcher;
  releasing?: Promise<ReleaseReport>;

  constructor(
    child: ServiceProcess,
    host: string,
    port: number,
    configuration: ServiceConfiguration,
    processGroup: boolean,
  ) {
    this.process = child;
    this.host = host;
    this.port = port;
    this.baseUrl = `http://${host}:${port}`;
    this.env = configuration.env;
    this.requestTimeout = configuration.requestTimeout;
    this.shutdownTimeout = configuration.shutdownTimeout;
    this.processGroup = processGroup;

    const marker = configuration.readinessMarker;
    const exited = new Promise<ProcessExit>((resolve) => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
      child.on('error', (error: Error) => {
        this.diagnostics.push(`[harness] ${error.message}`);
        this.watcher?.launchFailed(error);
        if (child.pid === undefined) {
          resolve({ code: null, signal: null });
        }
      });
    });
    const stdoutDrained = collectLines(child.stdout, this.output);
    const stderrDrained = collectLines(child.stderr, this.diagnostics, (line) => {
      if (line.includes(marker)) {
        this.workersReady++;
        this.watcher?.readySignal();
      }
    });
    this.closed = Promise.all([exited, stdoutDrained, stderrDrained]).then(([exit]) => exit);

    this.exitHook = () => {
      if (!hasExited(child)) {
        this.signal('SIGKILL');
      }
    };
  }

  signal(signal: NodeJS.Signals): void {
    signalService(this.process, signal, this.processGroup);
  }
}

/**
 * Launches a service under test as a subprocess and owns it until release.
 *
 * Readiness is detected by counting lines on the service's stderr that
 * contain the configured marker, one per worker. Shutdown sends SIGINT and
 * escalates to SIGKILL when the process does not exit in time.
 */
export class ServiceProcessManager {
  private readonly spawner: Spawner;
  private readonly logger: Logger;
  private readonly allocatePort: (host: string) => Promise<number>;
  private readonly processGroup: boolean;
  private readonly services = new WeakMap<ServiceHandle, ManagedService>();

  constructor(options: ServiceManagerOptions = {}) {
    this.spawner = options.spawner ?? defaultSpawner;
    this.logger = options.logger ?? consoleLogger;
    this.allocatePort = options.allocatePort ?? getAvailablePort;
    this.processGroup = options.processGroup ?? options.spawner === undefined;
  }

  async acquire(configuration: ServiceConfiguration): Promise<ServiceHandle> {
    const port = await this.allocatePort(configuration.host);
    const bind = `${configuration.host}:${port}`;
    const args = configuration.args.map((arg) =>
      arg.replaceAll('{bind}', bind).replaceAll('{port}', String(port)),
    );

    this.logger.info(`Starting service on ${bind} with settings: ${JSON.stringify(configuration.env)}`);

    const child = this.spawner(configuration.command, args, {
      cwd: configuration.cwd,
      env: { ...process.env, ...stringifyEnv(configuration.env) },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: this.processGroup,
    });
    const service = new ManagedService(child, configuration.host, port, configuration, this.processGroup);
    this.services.set(service, service);
    // Reaps the child if the harness itself exits without releasing it.
    process.on('exit', service.exitHook);

    service.state = 'starting';
    try {
      await this.waitUntilReady(service, configuration);
    } catch (error) {
      service.state = 'failed';
      process.off('exit', service.exitHook);
      if (!hasExited(child)) {
        service.signal('SIGKILL');
      }
      await settleWithin(service.closed, configuration.shutdownTimeout);
      this.logger.warn(`Diagnostic output of the failed service:\n${service.diagnostics.join('\n')}`);
      throw error;
    }

    service.state = 'ready';
    this.logger.info('Service started successfully!');
    return service;
  }

  /** Stops the service. Calling it again returns the first report. */
  release(handle: ServiceHandle): Promise<ReleaseReport> {
    const service = this.services.get(handle);
    if (!service) {
      return Promise.reject(new Error('Service handle was not acquired by this manager'));
    }
    if (!service.releasing) {
      service.releasing = this.stop(service);
    }
    return service.releasing;
  }

  async withService<T>(configuration: ServiceConfiguration, fn: (handle: ServiceHandle) => Promise<T>): Promise<T> {
    const handle = await this.acquire(configuration);
    try {
      return await fn(handle);
    } finally {
      await this.release(handle);
    }
  }

  private waitUntilReady(service: ManagedService, configuration: ServiceConfiguration): Promise<void> {
    const { startupTimeout, expectedWorkers } = configuration;

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        service.watcher = undefined;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };
      const timer = setTimeout(() => {
        settle(new StartupTimeoutError(startupTimeout, service.workersReady, expectedWorkers));
      }, startupTimeout);

      service.watcher = {
        readySignal: () => {
          if (service.workersReady >= expectedWorkers) settle();
        },
        launchFailed: (error) => settle(new ServiceStartupError(`Service could not be launched: ${error.message}`)),
      };
      void service.closed.then((exit) => {
        settle(
          new ServiceStartupError(
            `Service exited before becoming ready (code ${exit.code}, signal ${exit.signal})`,
          ),
        );
      });

      if (service.workersReady >= expectedWorkers) settle();
    });
  }

  private async stop(service: ManagedService): Promise<ReleaseReport> {
    process.off('exit', service.exitHook);
    this.logger.info('Stopping service...');

    const child = service.process;
    let forced = false;
    if (!hasExited(child)) {
      service.signal('SIGINT');
    }
    let exit = await settleWithin(service.closed, service.shutdownTimeout);

    if (!exit) {
      this.logger.warn(
        `Service did not stop within ${service.shutdownTimeout / 1000} seconds of SIGINT, killing it`,
      );
      forced = true;
      service.signal('SIGKILL');
      exit = await settleWithin(service.closed, service.shutdownTimeout);
    }
    if (!exit) {
      this.logger.warn('Service streams did not close after SIGKILL');
      exit = { code: child.exitCode, signal: child.signalCode };
    }

    this.logger.info('Stopped service!');
    const accessLog = OrderedSet.from(service.output).values();
    this.logger.info(`Error log from the service instance:\n${service.diagnostics.join('\n')}`);
    this.logger.info(`Unique entries from access log of the service instance:\n${accessLog.join('\n')}`);

    return {
      code: exit.code,
      signal: exit.signal,
      forced,
      errorLog: [...service.diagnostics],
      accessLog,
    };
  }
}
