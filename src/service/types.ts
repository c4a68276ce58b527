import type { EventEmitter } from 'node:events';
import type { SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';

/** The subset of `ChildProcess` the manager relies on. */
export interface ServiceProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type Spawner = (command: string, args: readonly string[], options: SpawnOptions) => ServiceProcess;

export type ServiceEnv = Record<string, string | number>;

export interface ServiceConfiguration {
  command: string;
  /** `{bind}` is replaced by `host:port`, `{port}` by the port. */
  args: string[];
  cwd: string;
  /** Overrides merged onto the harness's own environment. */
  env: ServiceEnv;
  expectedWorkers: number;
  readinessMarker: string;
  host: string;
  startupTimeout: number;
  shutdownTimeout: number;
  requestTimeout: number;
}

export type ReadinessState = 'idle' | 'starting' | 'ready' | 'failed';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ServiceHandle {
  readonly port: number;
  readonly host: string;
  readonly baseUrl: string;
  readonly env: ServiceEnv;
  readonly requestTimeout: number;
  readonly process: ServiceProcess;
  /** Diagnostic (stderr) lines captured so far. */
  readonly diagnostics: string[];
  /** Access log (stdout) lines captured so far. */
  readonly output: string[];
  readonly state: ReadinessState;
  /** Settles once the process has exited and both streams are drained. */
  readonly closed: Promise<ProcessExit>;
}

export interface ReleaseReport extends ProcessExit {
  forced: boolean;
  errorLog: string[];
  accessLog: string[];
}

export interface IssueOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

export interface IssuedResponse {
  url: string;
  status: number;
  ok: boolean;
  /** Milliseconds until the response headers arrived. */
  elapsed: number;
  body: unknown;
}

export interface RequestIssuer {
  /** Resolves to null when the request timed out or never reached the service. */
  issue(path: string, options?: IssueOptions): Promise<IssuedResponse | null>;
}
