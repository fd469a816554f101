/**
 * Tests for the retrying HTTP client
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { HttpClient, isTransientError, parseRetryAfter, sleep } from '../../src/utils/http.js';
import { CancelledError, HttpStatusError, TransientNetworkError } from '../../src/utils/errors.js';
import { createFakeFetch, createRecordingSleep } from '../test-helpers.js';

const URL_A = 'https://example.test/a';

function client(
  routes: Parameters<typeof createFakeFetch>[0],
  overrides: { retries?: number; signal?: AbortSignal } = {}
) {
  const fake = createFakeFetch(routes);
  const recorder = createRecordingSleep();
  const http = new HttpClient({
    retries: overrides.retries ?? 3,
    timeoutMs: 1_000,
    backoffMs: 0,
    signal: overrides.signal,
    fetch: fake.fetch,
    sleep: recorder.sleep
  });
  return { http, calls: fake.calls, delays: recorder.delays };
}

describe('HttpClient', () => {
  it('returns the body of a successful response', async () => {
    const { http, calls } = client({ [URL_A]: { body: 'hello' } });
    assert.equal(await http.getText(URL_A), 'hello');
    assert.equal(calls.length, 1);
    assert.equal(calls[0].headers.get('user-agent'), 'lockvendor');
  });

  it('parses JSON and exposes headers', async () => {
    const { http } = client({ [URL_A]: { body: { tree: [] }, headers: { 'x-next-page': '2' } } });
    const { body, headers } = await http.getJson(URL_A);
    assert.deepEqual(body, { tree: [] });
    assert.equal(headers.get('x-next-page'), '2');
  });

  it('retries transient statuses', async () => {
    const { http, calls, delays } = client({ [URL_A]: [{ status: 503 }, { status: 502 }, { body: 'ok' }] });
    assert.equal(await http.getText(URL_A), 'ok');
    assert.equal(calls.length, 3);
    assert.deepEqual(delays, [0, 0]);
  });

  it('retries network failures', async () => {
    const fake = createFakeFetch({});
    let attempts = 0;
    const http = new HttpClient({
      retries: 2,
      timeoutMs: 1_000,
      backoffMs: 0,
      sleep: async () => {},
      fetch: async (url, init) => {
        attempts++;
        if (attempts === 1) {
          throw new TypeError('fetch failed');
        }
        return fake.fetch(url, init);
      }
    });
    await assert.rejects(http.getText(URL_A), HttpStatusError);
    assert.equal(attempts, 2);
  });

  it('honours Retry-After', async () => {
    const { http, delays } = client({ [URL_A]: [{ status: 429, headers: { 'retry-after': '2' } }, { body: 'ok' }] });
    await http.getText(URL_A);
    assert.deepEqual(delays, [2000]);
  });

  it('caps a long Retry-After', async () => {
    const { http, delays } = client({ [URL_A]: [{ status: 503, headers: { 'retry-after': '86400' } }, { body: 'ok' }] });
    assert.equal(await http.getText(URL_A), 'ok');
    assert.deepEqual(delays, [60_000]);
  });

  it('treats an exhausted rate limit as transient', async () => {
    const { http, calls } = client({
      [URL_A]: [{ status: 403, headers: { 'x-ratelimit-remaining': '0' } }, { body: 'ok' }]
    });
    assert.equal(await http.getText(URL_A), 'ok');
    assert.equal(calls.length, 2);
  });

  it('does not retry definitive failures', async () => {
    const { http, calls } = client({});
    await assert.rejects(
      http.getText(URL_A),
      (error: unknown) => error instanceof HttpStatusError && error.status === 404
    );
    assert.equal(calls.length, 1);
  });

  it('gives up after the configured retries', async () => {
    const { http, calls } = client({ [URL_A]: { status: 503 } }, { retries: 2 });
    await assert.rejects(http.getText(URL_A), (error: unknown) => {
      assert.ok(error instanceof TransientNetworkError);
      assert.equal(error.message, `gave up after 3 attempts: ${URL_A} responded 503`);
      assert.equal(error.status, 503);
      return true;
    });
    assert.equal(calls.length, 3);
  });

  it('rethrows unexpected errors untouched', async () => {
    const { http, calls } = client({ [URL_A]: new RangeError('boom') });
    await assert.rejects(http.getText(URL_A), { name: 'RangeError', message: 'boom' });
    assert.equal(calls.length, 1);
  });

  it('hashes downloaded bytes', async () => {
    const { http } = client({ [URL_A]: { body: 'hello' } });
    assert.equal(
      await http.getSha256(URL_A),
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
  });

  // ============================================================================
  // Cancellation
  // ============================================================================

  it('refuses to start once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const { http, calls } = client({ [URL_A]: { body: 'ok' } }, { signal: controller.signal });
    await assert.rejects(http.getText(URL_A), CancelledError);
    assert.equal(calls.length, 0);
  });

  it('stops retrying when cancelled during backoff', async () => {
    const controller = new AbortController();
    let attempts = 0;
    const http = new HttpClient({
      retries: 5,
      timeoutMs: 1_000,
      backoffMs: 60_000,
      signal: controller.signal,
      fetch: async () => {
        attempts++;
        setImmediate(() => controller.abort());
        return new Response('', { status: 503 });
      }
    });
    await assert.rejects(http.getText(URL_A), CancelledError);
    assert.equal(attempts, 1);
  });
});

describe('http helpers', () => {
  it('parses Retry-After seconds and dates', () => {
    const now = Date.parse('2026-01-01T00:00:00Z');
    assert.equal(parseRetryAfter('3', now), 3000);
    assert.equal(parseRetryAfter('Thu, 01 Jan 2026 00:00:10 GMT', now), 10_000);
    assert.equal(parseRetryAfter('Wed, 31 Dec 2025 23:59:00 GMT', now), undefined);
    assert.equal(parseRetryAfter('soon', now), undefined);
    assert.equal(parseRetryAfter(null, now), undefined);
  });

  it('classifies transient errors through the cause chain', () => {
    const reset = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
    assert.ok(isTransientError(new TypeError('fetch failed', { cause: reset })));
    assert.ok(isTransientError(new Error('outer', { cause: reset })));
    assert.ok(isTransientError(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })));
    assert.equal(isTransientError(new Error('nope')), false);
    assert.equal(isTransientError('string'), false);
  });

  it('sleep rejects when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(sleep(10, controller.signal), CancelledError);
  });

  it('sleep resolves after the delay', async () => {
    await sleep(1);
  });
});
