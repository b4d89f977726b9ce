import { type Logger, field } from '../common/logger';
import { CONSENT_COOKIE, SESSION_COOKIE, browserHeaders } from './constants';
import { RequestConstructionError } from './errors';
import { type FetchLike, type HttpMethod, type HttpResult, type OutboundRequest, execute } from './http';
import type { SessionManager } from './session';

export interface TransportOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch: FetchLike;
  logger: Logger;
}

/**
 * Builds browser-looking requests carrying the session cookie, and sends them.
 * Content-Type is left to the caller.
 */
export class Transport {
  constructor(
    private session: SessionManager,
    private opts: TransportOptions
  ) {}

  async buildRequest(method: HttpMethod, url: string, body?: Buffer, signal?: AbortSignal): Promise<OutboundRequest> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (err) {
      throw new RequestConstructionError(`invalid request URL: ${url}`, { cause: err });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new RequestConstructionError(`unsupported URL scheme: ${parsed.protocol}`);
    }
    if (method === 'GET' && body !== undefined) {
      throw new RequestConstructionError('GET request cannot carry a body');
    }

    const headers = new Headers(browserHeaders(this.opts.baseUrl));

    const token = await this.session.ensureSession(signal);
    headers.set('Cookie', `${CONSENT_COOKIE}; ${SESSION_COOKIE}=${token}`);

    return { method, url: parsed.toString(), headers, body };
  }

  async send(req: OutboundRequest, signal?: AbortSignal): Promise<HttpResult> {
    const { logger, timeoutMs } = this.opts;
    logger.debug('sending request', field('method', req.method), field('url', req.url));
    const res = await execute(this.opts.fetch, req, { timeoutMs, signal });
    logger.debug('received response', field('status', res.status), field('url', res.url));
    return res;
  }
}
