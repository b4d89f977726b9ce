import { type Logger, field } from '../common/logger';
import { CONSENT_COOKIE, SESSION_COOKIE, browserHeaders, endpoints } from './constants';
import { SessionError, transportFailure } from './errors';
import { type FetchLike, type HttpResult, execute, statusLine } from './http';

export interface SessionManagerOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch: FetchLike;
  logger: Logger;
  sessionId?: string;
}

/**
 * Finds a cookie value in a list of Set-Cookie header values. Attributes after
 * the first `;` are ignored.
 */
export function findCookie(setCookies: string[], name: string): string | undefined {
  for (const header of setCookies) {
    const pair = header.split(';', 1)[0];
    const eq = pair.indexOf('=');
    if (eq === -1) continue;
    if (pair.slice(0, eq).trim() === name) return pair.slice(eq + 1).trim();
  }
  return undefined;
}

/**
 * Holds the PHPSESSID the service issues. The token is fetched once, on the
 * first request that needs it, and reused for the lifetime of the manager.
 *
 * Not safe for concurrent use: two calls racing on an empty manager will both
 * hit the bootstrap endpoint.
 */
export class SessionManager {
  private token: string | undefined;

  constructor(private opts: SessionManagerOptions) {
    this.token = opts.sessionId || undefined;
  }

  get current(): string | undefined {
    return this.token;
  }

  async ensureSession(signal?: AbortSignal): Promise<string> {
    if (this.token) return this.token;

    const { baseUrl, timeoutMs, logger } = this.opts;
    logger.info('generating new PHPSESSID');

    const headers = new Headers(browserHeaders(baseUrl));
    headers.set('Cookie', CONSENT_COOKIE);
    const url = endpoints.cookieWarning(baseUrl);

    let res: HttpResult;
    try {
      res = await execute(this.opts.fetch, { method: 'GET', url, headers }, { timeoutMs, signal });
    } catch (err) {
      throw new SessionError('failed to perform request for PHPSESSID', transportFailure(err));
    }

    if (res.status !== 200) {
      throw new SessionError(`server returned non-OK status for PHPSESSID request: ${statusLine(res)}`, {
        reason: 'status',
        status: res.status,
      });
    }

    const token = findCookie(res.headers.getSetCookie(), SESSION_COOKIE);
    if (!token) {
      throw new SessionError(`${SESSION_COOKIE} cookie not found in response`, { reason: 'missing-cookie' });
    }

    this.token = token;
    logger.debug('session established', field('cookie', SESSION_COOKIE));
    return token;
  }
}
