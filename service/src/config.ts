import { z } from 'zod';

export const READY_MESSAGE = 'Application startup complete.';
export const MAX_WORKERS = 64;

const ServiceEnvSchema = z.object({
  // Items above this id are reported as not found.
  ID_LIMIT: z.string().transform(Number).pipe(z.number().int()).transform(v => Math.max(0, v)).default('100'),
  // Seconds; each request sleeps a random fraction of it.
  MAX_DELAY: z.string().transform(Number).pipe(z.number().finite()).transform(v => Math.max(0, v)).default('0'),
  WEB_CONCURRENCY: z.string().transform(Number).pipe(z.number().int().min(1).max(MAX_WORKERS)).default('1'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type ServiceEnvConfig = z.infer<typeof ServiceEnvSchema>;

export interface BindAddress {
  host: string;
  port: number;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceEnvConfig {
  return ServiceEnvSchema.parse(env);
}

export function parseBind(value: string): BindAddress {
  const separator = value.lastIndexOf(':');
  if (separator <= 0) {
    throw new Error(`Invalid bind address "${value}", expected host:port`);
  }
  const host = value.slice(0, separator);
  const port = Number(value.slice(separator + 1));
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port in bind address "${value}"`);
  }
  return { host, port };
}
