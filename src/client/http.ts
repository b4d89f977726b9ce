import { NetworkError, RequestCancelledError, RequestTimeoutError } from './errors';

export type HttpMethod = 'GET' | 'POST';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface OutboundRequest {
  method: HttpMethod;
  url: string;
  headers: Headers;
  body?: Buffer;
}

export interface HttpResult {
  status: number;
  statusText: string;
  /** URL of the response after redirects were followed */
  url: string;
  headers: Headers;
  body: Buffer;
}

export interface ExecuteOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs one request to completion, body included, under a per-request timer.
 * Failures come back as NetworkError, RequestTimeoutError or
 * RequestCancelledError.
 */
export async function execute(fetchImpl: FetchLike, req: OutboundRequest, opts: ExecuteOptions): Promise<HttpResult> {
  const { timeoutMs, signal } = opts;

  if (signal?.aborted) {
    throw new RequestCancelledError(req.url, { cause: signal.reason });
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId =
    timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs)
      : null;
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const res = await fetchImpl(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body ? new Uint8Array(req.body) : undefined,
      redirect: 'follow',
      signal: controller.signal,
    });
    const body = Buffer.from(await res.arrayBuffer());
    return {
      status: res.status,
      statusText: res.statusText,
      url: res.url || req.url,
      headers: res.headers,
      body,
    };
  } catch (err) {
    if (timedOut) throw new RequestTimeoutError(req.url, timeoutMs, { cause: err });
    if (signal?.aborted) throw new RequestCancelledError(req.url, { cause: err });
    const message = err instanceof Error ? err.message : String(err);
    throw new NetworkError(req.url, `request to ${req.url} failed: ${message}`, { cause: err });
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}

export function statusLine(res: HttpResult): string {
  return res.statusText ? `${res.status} ${res.statusText}` : String(res.status);
}
