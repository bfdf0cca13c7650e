import { HttpClient, isSuccess } from './HttpClient';
import { RetryOptions, requestWithRetry } from './retry';
import { ServiceName } from '../../types/music';
import { FetchError } from '../../utils/errors';
import { logDebug, logWarning } from '../../utils/logger';

export type ExtractItems = (body: unknown) => unknown[] | null;
export type ExtractNext = (body: unknown) => string | null | undefined;

export interface PaginatedFetcherOptions {
  service: ServiceName;
  http: HttpClient;
  retry: RetryOptions;
  // Resolved before every page so a long walk picks up refreshed tokens
  headers: () => Promise<Record<string, string>>;
  // Base for relative next links such as "/playlists/1/relationships/items?page[cursor]=x"
  apiBase?: string;
  maxItems?: number;
}

export class PaginatedFetcher {
  private readonly opts: PaginatedFetcherOptions;

  constructor(opts: PaginatedFetcherOptions) {
    this.opts = opts;
  }

  /**
   * Lazily walks a paginated endpoint. Each iteration of the returned value
   * starts again from `startUrl`.
   */
  fetchAll(
    startUrl: string,
    extractItems: ExtractItems,
    extractNext: ExtractNext,
    params?: Record<string, string | ReadonlyArray<string>>
  ): AsyncIterable<unknown> {
    return {
      [Symbol.asyncIterator]: () => this.walk(startUrl, extractItems, extractNext, params),
    };
  }

  private async *walk(
    startUrl: string,
    extractItems: ExtractItems,
    extractNext: ExtractNext,
    params?: Record<string, string | ReadonlyArray<string>>
  ): AsyncGenerator<unknown> {
    const { service, http, retry } = this.opts;
    const maxItems = this.opts.maxItems ?? 50000;
    const visited = new Set<string>();
    let url: string | undefined = startUrl;
    let page = 0;
    let yielded = 0;

    while (url) {
      if (visited.has(url)) {
        throw new FetchError(`Pagination loop: next link repeats ${url}`, { service, phase: 'fetch' });
      }
      visited.add(url);
      page += 1;

      const resp = await requestWithRetry(
        http,
        {
          method: 'GET',
          url,
          headers: await this.opts.headers(),
          // Next links already carry their query string
          ...(page === 1 && params ? { params } : {}),
        },
        retry,
        { service, phase: 'fetch' }
      );
      if (!isSuccess(resp.status)) {
        throw new FetchError(`Page ${page} failed with status ${resp.status} (${url})`, {
          service,
          phase: 'fetch',
          status: resp.status,
        });
      }

      const items = extractItems(resp.data);
      if (!items) {
        throw new FetchError(`Malformed page ${page}: no item list (${url})`, { service, phase: 'fetch' });
      }
      logDebug('page_fetched', { service, page, items: items.length });

      for (const item of items) {
        if (yielded >= maxItems) {
          logWarning('pagination_item_limit_reached', { service, maxItems, page });
          return;
        }
        yield item;
        yielded += 1;
      }

      url = this.resolveNext(extractNext(resp.data));
    }
  }

  private resolveNext(next: string | null | undefined): string | undefined {
    if (!next) return undefined;
    if (/^https?:\/\//i.test(next)) return next;
    if (!this.opts.apiBase) {
      throw new FetchError(`Relative next link without an API base: ${next}`, {
        service: this.opts.service,
        phase: 'fetch',
      });
    }
    return `${this.opts.apiBase.replace(/\/$/, '')}${next.startsWith('/') ? '' : '/'}${next}`;
  }
}
