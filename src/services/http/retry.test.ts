import { backoffDelay, requestWithRetry, retryAfterMs } from './retry';
import { HttpRequest } from './HttpClient';
import { FakeHttpClient, instantRetry, reply } from '../../testing/fakeHttp';
import { FetchError } from '../../utils/errors';

const req: HttpRequest = { method: 'GET', url: 'https://api.test/v1/items' };

describe('requestWithRetry', () => {
  test('replays the same request after a 429 with exponential backoff', async () => {
    const http = new FakeHttpClient().enqueue(reply(429), reply(429), reply(200, { ok: true }));
    const retry = instantRetry({ maxAttempts: 5 });

    const resp = await requestWithRetry(http, req, retry);

    expect(resp.status).toBe(200);
    expect(retry.sleeps).toEqual([100, 200]);
    expect(http.urls()).toEqual([req.url, req.url, req.url]);
  });

  test('prefers the Retry-After hint over the computed delay', async () => {
    const http = new FakeHttpClient().enqueue(reply(429, {}, { 'retry-after': '2' }), reply(200));
    const retry = instantRetry();

    await requestWithRetry(http, req, retry);

    expect(retry.sleeps).toEqual([2000]);
  });

  test('gives up with FetchError once the attempt budget is spent', async () => {
    const http = new FakeHttpClient().enqueue(reply(429), reply(429), reply(429), reply(200));
    const retry = instantRetry({ maxAttempts: 3 });

    const error = await requestWithRetry(http, req, retry, { service: 'spotify', phase: 'fetch' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 429, service: 'spotify', phase: 'fetch' });
    expect(http.requests).toHaveLength(3);
  });

  test('retries thrown transport errors a fixed number of times', async () => {
    const http = new FakeHttpClient().enqueue(new Error('ECONNRESET'), new Error('ECONNRESET'), reply(200));
    const retry = instantRetry();

    const resp = await requestWithRetry(http, req, retry);

    expect(resp.status).toBe(200);
    expect(retry.sleeps).toEqual([100, 200]);
  });

  test('fails after transport retries are exhausted', async () => {
    const http = new FakeHttpClient().enqueue(new Error('ETIMEDOUT'), new Error('ETIMEDOUT'), new Error('ETIMEDOUT'));

    await expect(requestWithRetry(http, req, instantRetry())).rejects.toThrow(
      'Request failed after 3 attempt(s): ETIMEDOUT (GET https://api.test/v1/items)'
    );
    expect(http.requests).toHaveLength(3);
  });

  test('treats 5xx like a transport failure', async () => {
    const http = new FakeHttpClient().enqueue(reply(503), reply(200));
    const retry = instantRetry();

    const resp = await requestWithRetry(http, req, retry);

    expect(resp.status).toBe(200);
    expect(retry.sleeps).toEqual([100]);
  });

  test('returns other client errors without retrying', async () => {
    const http = new FakeHttpClient().enqueue(reply(404, { error: 'missing' }));
    const retry = instantRetry();

    const resp = await requestWithRetry(http, req, retry);

    expect(resp.status).toBe(404);
    expect(retry.sleeps).toEqual([]);
  });

  test('stops when the next wait would exceed the elapsed-time bound', async () => {
    const http = new FakeHttpClient().enqueue(reply(429), reply(429), reply(200));
    const retry = instantRetry({ maxAttempts: 10, maxElapsedMs: 150 });

    await expect(requestWithRetry(http, req, retry)).rejects.toThrow('Gave up after 100ms: rate limited');
    expect(retry.sleeps).toEqual([100]);
    expect(http.requests).toHaveLength(2);
  });
});

describe('retryAfterMs', () => {
  test('reads seconds', () => {
    expect(retryAfterMs({ 'retry-after': '3' }, 0)).toBe(3000);
  });

  test('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(retryAfterMs({ 'retry-after': 'Wed, 21 Oct 2026 07:28:30 GMT' }, now)).toBe(30000);
  });

  test('falls back to X-RateLimit-Reset epoch seconds', () => {
    expect(retryAfterMs({ 'x-ratelimit-reset': '1005' }, 1_000_000)).toBe(5000);
  });

  test('returns undefined without a usable hint', () => {
    expect(retryAfterMs({}, 0)).toBeUndefined();
    expect(retryAfterMs({ 'x-ratelimit-reset': '900' }, 1_000_000)).toBeUndefined();
  });
});

describe('backoffDelay', () => {
  const opts = { baseDelayMs: 1000, maxDelayMs: 60000 };

  test('doubles per attempt with jitter applied', () => {
    expect(backoffDelay(1, opts, () => 0.5)).toBe(1000);
    expect(backoffDelay(2, opts, () => 0)).toBe(1500);
    expect(backoffDelay(3, opts, () => 0.5)).toBe(4000);
  });

  test('never exceeds the cap', () => {
    expect(backoffDelay(10, opts, () => 0.99)).toBe(60000);
  });
});
