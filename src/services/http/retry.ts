import { HttpClient, HttpRequest, HttpResponse } from './HttpClient';
import { RetryConfig, ServiceName } from '../../types/music';
import { ErrorPhase, FetchError, errorMessage } from '../../utils/errors';
import { logWarning } from '../../utils/logger';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

export interface RetryOptions extends RetryConfig {
  sleep?: Sleep;
  now?: () => number;
  // Returns a value in [0, 1); 0.5 means no jitter
  random?: () => number;
}

export const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  maxElapsedMs: 300000,
  transportRetries: 2,
};

/**
 * Wait hinted by the provider on a 429, in ms. `Retry-After` may be seconds or
 * an HTTP date; `X-RateLimit-Reset` is an epoch second.
 */
export function retryAfterMs(headers: Record<string, string | undefined>, now: number): number | undefined {
  const retryAfter = headers['retry-after'];
  if (retryAfter !== undefined && retryAfter.trim() !== '') {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) return Math.max(0, date - now);
    logWarning('retry_after_unparseable', { retryAfter });
  }

  const reset = headers['x-ratelimit-reset'];
  if (reset !== undefined) {
    const epochSeconds = Number(reset);
    if (Number.isFinite(epochSeconds)) {
      const wait = epochSeconds * 1000 - now;
      if (wait > 0) return wait;
    } else {
      logWarning('ratelimit_reset_unparseable', { reset });
    }
  }
  return undefined;
}

export function backoffDelay(attempt: number, opts: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>, random: () => number): number {
  const exponential = opts.baseDelayMs * 2 ** (attempt - 1);
  const capped = Math.min(exponential, opts.maxDelayMs);
  const jitter = 0.75 + random() * 0.5;
  return Math.min(opts.maxDelayMs, Math.round(capped * jitter));
}

/**
 * Sends a request, replaying the same request on 429 (exponential backoff)
 * and on transport failures or 5xx (fixed small retry budget). Any other
 * status, success or not, is returned to the caller.
 */
export async function requestWithRetry(
  http: HttpClient,
  req: HttpRequest,
  opts: RetryOptions,
  context: { service?: ServiceName; phase?: ErrorPhase } = {}
): Promise<HttpResponse> {
  const sleep = opts.sleep ?? defaultSleep;
  const now = opts.now ?? Date.now;
  const random = opts.random ?? Math.random;
  const started = now();

  let rateLimitRetries = 0;
  let transportRetries = 0;
  const fail = (message: string, extra: { status?: number; cause?: unknown } = {}): FetchError =>
    new FetchError(`${message} (${req.method} ${req.url})`, { ...context, ...extra });

  const waitOrGiveUp = async (delay: number, reason: string, lastStatus?: number): Promise<void> => {
    const elapsed = now() - started;
    if (elapsed + delay > opts.maxElapsedMs) {
      throw fail(`Gave up after ${elapsed}ms: ${reason}`, lastStatus !== undefined ? { status: lastStatus } : {});
    }
    await sleep(delay);
  };

  for (;;) {
    let resp: HttpResponse;
    try {
      resp = await http.request(req);
    } catch (error) {
      if (transportRetries >= opts.transportRetries) {
        throw fail(`Request failed after ${transportRetries + 1} attempt(s): ${errorMessage(error)}`, { cause: error });
      }
      transportRetries += 1;
      const delay = backoffDelay(transportRetries, opts, random);
      logWarning('http_transport_retry', { url: req.url, attempt: transportRetries, delay, error: errorMessage(error) });
      await waitOrGiveUp(delay, errorMessage(error));
      continue;
    }

    if (resp.status === 429) {
      if (rateLimitRetries + 1 >= opts.maxAttempts) {
        throw fail(`Rate limit exceeded after ${rateLimitRetries + 1} attempt(s)`, { status: 429 });
      }
      rateLimitRetries += 1;
      const hinted = retryAfterMs(resp.headers, now());
      const delay = hinted ?? backoffDelay(rateLimitRetries, opts, random);
      logWarning('http_rate_limited', { url: req.url, attempt: rateLimitRetries, delay, hinted: hinted !== undefined });
      await waitOrGiveUp(delay, 'rate limited', 429);
      continue;
    }

    if (resp.status >= 500) {
      if (transportRetries >= opts.transportRetries) {
        throw fail(`Server error ${resp.status} after ${transportRetries + 1} attempt(s)`, { status: resp.status });
      }
      transportRetries += 1;
      const delay = backoffDelay(transportRetries, opts, random);
      logWarning('http_server_error_retry', { url: req.url, status: resp.status, attempt: transportRetries, delay });
      await waitOrGiveUp(delay, `status ${resp.status}`, resp.status);
      continue;
    }

    return resp;
  }
}
