export { ServiceProcessManager } from './manager.js';
export type { ServiceManagerOptions } from './manager.js';
export { HttpRequestIssuer, createRequestIssuer } from './issuer.js';
export { OrderedSet } from './ordered-set.js';
export { getAvailablePort } from './port.js';
export { consoleLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export type {
  IssueOptions,
  IssuedResponse,
  ProcessExit,
  ReadinessState,
  ReleaseReport,
  RequestIssuer,
  ServiceConfiguration,
  ServiceEnv,
  ServiceHandle,
  ServiceProcess,
  Spawner,
} from './types.js';
