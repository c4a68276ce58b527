import type { RequestIssuer } from './service/types.js';

export interface CheckResult {
  name: string;
  success: boolean;
  duration: number;
  message: string;
  details?: string;
  suggestion?: string;
}

export interface CheckContext {
  issuer: RequestIssuer;
  itemLimit: number;
}

export type CheckFunction = (ctx: CheckContext) => Promise<CheckResult>;

export interface Check {
  name: string;
  description: string;
  run: CheckFunction;
}
