import { z } from 'zod';
import { PaginatedFetcher } from './PaginatedFetcher';
import { FakeHttpClient, instantRetry, reply } from '../../testing/fakeHttp';
import { FetchError } from '../../utils/errors';

const pageSchema = z.object({ items: z.array(z.unknown()), next: z.string().nullable() });

const items = (body: unknown): unknown[] | null => {
  const parsed = pageSchema.safeParse(body);
  return parsed.success ? parsed.data.items : null;
};
const next = (body: unknown): string | null => {
  const parsed = pageSchema.safeParse(body);
  return parsed.success ? parsed.data.next : null;
};

async function collect(iterable: AsyncIterable<unknown>): Promise<unknown[]> {
  const out: unknown[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

const START = 'https://api.test/v1/list';

function fetcherFor(http: FakeHttpClient, maxItems?: number) {
  let headerCalls = 0;
  const fetcher = new PaginatedFetcher({
    service: 'tidal',
    http,
    retry: instantRetry(),
    headers: async () => {
      headerCalls += 1;
      return { Authorization: `Bearer token-${headerCalls}` };
    },
    apiBase: 'https://api.test/v1',
    ...(maxItems !== undefined ? { maxItems } : {}),
  });
  return { fetcher, headerCalls: () => headerCalls };
}

describe('PaginatedFetcher', () => {
  test('walks every page in order and replays a rate-limited page', async () => {
    const http = new FakeHttpClient().enqueue(
      reply(429),
      reply(200, { items: ['a', 'b'], next: 'https://api.test/v1/list?page=2' }),
      reply(200, { items: ['c'], next: '/list?page=3' }),
      reply(200, { items: ['d', 'e'], next: null })
    );
    const { fetcher } = fetcherFor(http);

    const all = await collect(fetcher.fetchAll(START, items, next, { limit: '2' }));

    expect(all).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(http.urls()).toEqual([
      START,
      START,
      'https://api.test/v1/list?page=2',
      'https://api.test/v1/list?page=3',
    ]);
    expect(http.requests[1]?.params).toEqual({ limit: '2' });
    expect(http.requests[2]?.params).toBeUndefined();
  });

  test('is restartable: a second iteration fetches again from the start', async () => {
    const http = new FakeHttpClient((req) =>
      req.url === START
        ? reply(200, { items: [1, 2], next: '/list?page=2' })
        : reply(200, { items: [3], next: null })
    );
    const { fetcher } = fetcherFor(http);
    const iterable = fetcher.fetchAll(START, items, next);

    expect(await collect(iterable)).toEqual([1, 2, 3]);
    expect(await collect(iterable)).toEqual([1, 2, 3]);
    expect(http.requests).toHaveLength(4);
  });

  test('resolves auth headers for every page', async () => {
    const http = new FakeHttpClient().enqueue(
      reply(200, { items: [1], next: '/list?page=2' }),
      reply(200, { items: [2], next: null })
    );
    const { fetcher, headerCalls } = fetcherFor(http);

    await collect(fetcher.fetchAll(START, items, next));

    expect(headerCalls()).toBe(2);
    expect(http.requests[1]?.headers).toEqual({ Authorization: 'Bearer token-2' });
  });

  test('throws on a next link that was already visited', async () => {
    const http = new FakeHttpClient().enqueue(
      reply(200, { items: [1], next: '/list?page=2' }),
      reply(200, { items: [2], next: START })
    );
    const { fetcher } = fetcherFor(http);

    await expect(collect(fetcher.fetchAll(START, items, next))).rejects.toThrow(`Pagination loop: next link repeats ${START}`);
  });

  test('throws FetchError on a malformed page', async () => {
    const http = new FakeHttpClient().enqueue(reply(200, { data: 'nope' }));
    const { fetcher } = fetcherFor(http);

    const error = await collect(fetcher.fetchAll(START, items, next)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ message: `Malformed page 1: no item list (${START})` });
  });

  test('throws FetchError carrying the status of a failed page', async () => {
    const http = new FakeHttpClient().enqueue(reply(200, { items: [1], next: '/list?page=2' }), reply(404));
    const { fetcher } = fetcherFor(http);
    const seen: unknown[] = [];

    const error = await (async () => {
      for await (const item of fetcher.fetchAll(START, items, next)) seen.push(item);
    })().catch((e: unknown) => e);

    expect(seen).toEqual([1]);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 404, service: 'tidal' });
  });

  test('stops at maxItems without fetching further pages', async () => {
    const http = new FakeHttpClient().enqueue(
      reply(200, { items: [1, 2], next: '/list?page=2' }),
      reply(200, { items: [3, 4], next: '/list?page=3' })
    );
    const { fetcher } = fetcherFor(http, 3);

    expect(await collect(fetcher.fetchAll(START, items, next))).toEqual([1, 2, 3]);
    expect(http.requests).toHaveLength(2);
  });

  test('does nothing until iterated', () => {
    const http = new FakeHttpClient();
    const { fetcher } = fetcherFor(http);

    fetcher.fetchAll(START, items, next);

    expect(http.requests).toHaveLength(0);
  });
});
