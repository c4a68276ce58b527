import { isDeepStrictEqual } from 'node:util';
import type { Check, CheckContext, CheckResult } from '../types.js';
import type { IssuedResponse } from '../service/types.js';

export type CheckMode = 'sequential' | 'concurrent';

export const ENDPOINTS = ['people', 'planets', 'starships'] as const;

export interface Expectation {
  path: string;
  status: number;
  body?: unknown;
}

/**
 * Every id from 0 up to the item limit resolves to `{ item_id }`, the next id
 * is not found, and the collection path without an id is not found either.
 */
export function buildExpectations(endpoint: string, itemLimit: number): Expectation[] {
  const expectations: Expectation[] = [{ path: endpoint, status: 404 }];
  for (let i = 0; i <= itemLimit; i++) {
    expectations.push({ path: `${endpoint}/${i}`, status: 200, body: { item_id: i } });
  }
  const missing = itemLimit + 1;
  expectations.push({
    path: `${endpoint}/${missing}`,
    status: 404,
    body: { detail: `Item ${missing} was not found.` },
  });
  return expectations;
}

export function findMismatch(expectation: Expectation, response: IssuedResponse | null): string | null {
  if (!response) {
    return `No response for ${expectation.path} within the request timeout`;
  }
  if (response.status !== expectation.status) {
    return `Unexpected status code ${response.status} for ${response.url} (expected ${expectation.status})`;
  }
  if (expectation.body !== undefined && !isDeepStrictEqual(response.body, expectation.body)) {
    return `Unexpected response JSON ${JSON.stringify(response.body)} for ${response.url} ` +
      `(expected ${JSON.stringify(expectation.body)})`;
  }
  return null;
}

async function issueAll(
  ctx: CheckContext,
  expectations: Expectation[],
  mode: CheckMode,
): Promise<string | null> {
  if (mode === 'concurrent') {
    const responses = await Promise.all(expectations.map(e => ctx.issuer.issue(e.path)));
    for (let i = 0; i < expectations.length; i++) {
      const mismatch = findMismatch(expectations[i], responses[i]);
      if (mismatch) return mismatch;
    }
    return null;
  }

  for (const expectation of expectations) {
    const mismatch = findMismatch(expectation, await ctx.issuer.issue(expectation.path));
    if (mismatch) return mismatch;
  }
  return null;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function endpointCheck(endpoint: string, mode: CheckMode = 'sequential'): Check {
  const name = mode === 'concurrent'
    ? `${capitalize(endpoint)} endpoint (concurrent)`
    : `${capitalize(endpoint)} endpoint`;

  return {
    name,
    description: `Verify /${endpoint}/{id} honours the item limit (${mode} requests)`,
    async run(ctx: CheckContext): Promise<CheckResult> {
      const start = performance.now();
      const expectations = buildExpectations(endpoint, ctx.itemLimit);
      const mismatch = await issueAll(ctx, expectations, mode);
      const duration = performance.now() - start;

      if (mismatch) {
        return {
          name,
          success: false,
          duration,
          message: 'Response did not match',
          details: mismatch,
          suggestion: `Confirm the service was started with ID_LIMIT=${ctx.itemLimit}`,
        };
      }

      return {
        name,
        success: true,
        duration,
        message: `${expectations.length} responses matched`,
      };
    },
  };
}
