/**
 * In-process stand-in for a spawned service. Tests script its output and
 * decide which signals it obeys.
 */
import { EventEmitter } from 'node:events';
import type { SpawnOptions } from 'node:child_process';
import { PassThrough } from 'node:stream';
import type { ServiceProcess, Spawner } from '../../src/service/types.js';

export interface FakeProcessOptions {
  /** Signals the process receives but does not act on. */
  ignore?: NodeJS.Signals[];
}

export class FakeProcess extends EventEmitter implements ServiceProcess {
  pid: number | undefined = 4242;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  private readonly ignore: NodeJS.Signals[];

  constructor(options: FakeProcessOptions = {}) {
    super();
    this.ignore = options.ignore ?? [];
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    if (typeof signal === 'string' && this.ignore.includes(signal)) {
      return true;
    }
    setImmediate(() => {
      if (signal === 'SIGINT' || signal === 'SIGTERM') {
        this.exit(0, null);
      } else {
        this.exit(null, 'SIGKILL');
      }
    });
    return true;
  }

  /** Writes diagnostic output exactly as given. */
  logError(text: string): void {
    this.stderr.write(text);
  }

  logAccess(text: string): void {
    this.stdout.write(text);
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exitCode !== null || this.signalCode !== null) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.closeStreams();
    this.emit('exit', code, signal);
  }

  /** Behaves like a command that could not be launched at all. */
  failToLaunch(error: Error): void {
    this.pid = undefined;
    this.emit('error', error);
    this.closeStreams();
  }

  private closeStreams(): void {
    if (!this.stdout.writableEnded) this.stdout.end();
    if (!this.stderr.writableEnded) this.stderr.end();
  }
}

export interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
}

/**
 * Returns a spawner that hands out `child` and runs `script` against it on
 * the next turn of the event loop, once the manager is listening.
 */
export function fakeSpawner(child: FakeProcess, script: (child: FakeProcess) => void = () => {}) {
  const calls: SpawnCall[] = [];
  const spawner: Spawner = (command, args, options) => {
    calls.push({ command, args, options });
    setImmediate(() => script(child));
    return child;
  };
  return { spawner, calls };
}
