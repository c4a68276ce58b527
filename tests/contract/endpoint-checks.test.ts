/**
 * Contract Tests: functional checks against the real routes, in process.
 */
import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../service/src/app.js';
import {
  allChecks,
  buildExpectations,
  concurrentChecks,
  endpointCheck,
  findMismatch,
  getChecksByName,
  sequentialChecks,
} from '../../src/checks/index.js';
import { runChecks } from '../../src/runner.js';
import { INJECT_BASE_URL, InjectIssuer } from '../helpers/inject-issuer.js';

describe('buildExpectations', () => {
  it('covers the bare path, every id up to the limit and the first missing id', () => {
    expect(buildExpectations('people', 1)).toEqual([
      { path: 'people', status: 404 },
      { path: 'people/0', status: 200, body: { item_id: 0 } },
      { path: 'people/1', status: 200, body: { item_id: 1 } },
      { path: 'people/2', status: 404, body: { detail: 'Item 2 was not found.' } },
    ]);
  });
});

describe('findMismatch', () => {
  const expectation = { path: 'people/1', status: 200, body: { item_id: 1 } };

  it('reports a missing response', () => {
    expect(findMismatch(expectation, null)).toBe('No response for people/1 within the request timeout');
  });

  it('reports an unexpected status', () => {
    const response = { url: 'http://service.test/people/1', status: 500, ok: false, elapsed: 1, body: '' };

    expect(findMismatch(expectation, response)).toBe(
      'Unexpected status code 500 for http://service.test/people/1 (expected 200)',
    );
  });

  it('reports an unexpected body', () => {
    const response = { url: 'http://service.test/people/1', status: 200, ok: true, elapsed: 1, body: { item_id: 2 } };

    expect(findMismatch(expectation, response)).toBe(
      'Unexpected response JSON {"item_id":2} for http://service.test/people/1 (expected {"item_id":1})',
    );
  });

  it('ignores the body when none is expected', () => {
    const response = { url: 'http://service.test/people', status: 404, ok: false, elapsed: 1, body: { detail: 'x' } };

    expect(findMismatch({ path: 'people', status: 404 }, response)).toBeNull();
  });
});

describe('getChecksByName', () => {
  it('matches by substring, ignoring case', () => {
    expect(getChecksByName(['PLANETS']).map(c => c.name)).toEqual([
      'Planets endpoint',
      'Planets endpoint (concurrent)',
    ]);
  });

  it('matches a full name exactly', () => {
    expect(getChecksByName(['people endpoint (concurrent)']).map(c => c.name)).toEqual([
      'People endpoint (concurrent)',
    ]);
  });
});

describe('endpoint checks', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('passes every check against a service with the expected limit', async () => {
    app = buildApp({ itemLimit: 3, maxDelay: 0 });

    const result = await runChecks({
      checks: allChecks,
      context: { issuer: new InjectIssuer(app), itemLimit: 3 },
      timeout: 5000,
    });

    expect(result.failed).toBe(0);
    expect(result.passed).toBe(sequentialChecks.length + concurrentChecks.length);
    expect(result.results.every(r => r.message === '6 responses matched')).toBe(true);
  });

  it('fails sequentially at the first id the service does not know', async () => {
    app = buildApp({ itemLimit: 2, maxDelay: 0 });

    const result = await endpointCheck('people').run({ issuer: new InjectIssuer(app), itemLimit: 3 });

    expect(result.success).toBe(false);
    expect(result.message).toBe('Response did not match');
    expect(result.details).toBe(`Unexpected status code 404 for ${INJECT_BASE_URL}/people/3 (expected 200)`);
    expect(result.suggestion).toBe('Confirm the service was started with ID_LIMIT=3');
  });

  it('reports the same mismatch when requests are concurrent', async () => {
    app = buildApp({ itemLimit: 4, maxDelay: 0 });

    const result = await endpointCheck('starships', 'concurrent').run({ issuer: new InjectIssuer(app), itemLimit: 3 });

    expect(result.name).toBe('Starships endpoint (concurrent)');
    expect(result.success).toBe(false);
    expect(result.details).toBe(`Unexpected status code 200 for ${INJECT_BASE_URL}/starships/4 (expected 404)`);
  });
});
