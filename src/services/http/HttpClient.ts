import axios, { AxiosInstance } from 'axios';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | ReadonlyArray<string>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  params?: Record<string, QueryValue | undefined>;
  // JSON body; mutually exclusive with `form`
  json?: unknown;
  form?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  data: unknown;
  headers: Record<string, string | undefined>;
}

/**
 * The only way the core talks to the network. Non-2xx statuses come back as
 * responses; only transport failures (DNS, reset, timeout) reject.
 */
export interface HttpClient {
  request(req: HttpRequest): Promise<HttpResponse>;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class AxiosHttpClient implements HttpClient {
  private readonly http: AxiosInstance;

  constructor(opts?: { timeoutMs?: number }) {
    this.http = axios.create({
      timeout: opts?.timeoutMs ?? 15000,
      // Repeated keys for arrays: include=artists&include=albums
      paramsSerializer: { indexes: null },
      validateStatus: () => true,
    });
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    const headers: Record<string, string> = { ...req.headers };
    let data: unknown;
    if (req.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      data = new URLSearchParams(req.form).toString();
    } else if (req.json !== undefined) {
      headers['Content-Type'] = headers['Content-Type'] ?? 'application/json';
      data = req.json;
    }

    const resp = await this.http.request({
      method: req.method,
      url: req.url,
      headers,
      ...(req.params ? { params: req.params } : {}),
      data,
    });

    const outHeaders: Record<string, string | undefined> = {};
    for (const [key, value] of Object.entries(resp.headers)) {
      if (value === undefined || value === null) continue;
      outHeaders[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
    }

    return { status: resp.status, data: resp.data, headers: outHeaders };
  }
}
