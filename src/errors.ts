export class ConfigError extends Error {
  variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

/** The service could not be brought to a ready state. Fatal for the run. */
export class ServiceStartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServiceStartupError';
  }
}

export class StartupTimeoutError extends ServiceStartupError {
  timeout: number;
  workersReady: number;

  constructor(timeout: number, workersReady: number, expectedWorkers: number) {
    super(
      `Service did not fully start within ${timeout / 1000} seconds ` +
        `(${workersReady}/${expectedWorkers} workers ready)`,
    );
    this.name = 'StartupTimeoutError';
    this.timeout = timeout;
    this.workersReady = workersReady;
  }
}

export class InsufficientSamplesError extends Error {
  count: number;

  constructor(count: number) {
    super(`At least 2 samples are needed for latency statistics, got ${count}`);
    this.name = 'InsufficientSamplesError';
    this.count = count;
  }
}
