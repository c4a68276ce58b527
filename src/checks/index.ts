import type { Check } from '../types.js';
import { ENDPOINTS, endpointCheck } from './endpoints.js';

export { ENDPOINTS, endpointCheck, buildExpectations, findMismatch } from './endpoints.js';
export type { CheckMode, Expectation } from './endpoints.js';

export const sequentialChecks: Check[] = ENDPOINTS.map(endpoint => endpointCheck(endpoint, 'sequential'));

export const concurrentChecks: Check[] = ENDPOINTS.map(endpoint => endpointCheck(endpoint, 'concurrent'));

export const allChecks: Check[] = [...sequentialChecks, ...concurrentChecks];

export function getChecksByName(names: string[], checks: Check[] = allChecks): Check[] {
  const lowerNames = names.map(n => n.toLowerCase());
  return checks.filter(check =>
    lowerNames.includes(check.name.toLowerCase()) ||
    lowerNames.some(n => check.name.toLowerCase().includes(n))
  );
}
