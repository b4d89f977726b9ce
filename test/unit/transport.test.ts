import { describe, it, expect } from 'vitest';
import { SessionManager } from '../../src/client/session';
import { Transport } from '../../src/client/transport';
import { RequestConstructionError, SessionError } from '../../src/client/errors';
import { NoopLogger } from '../../src/common/logger';
import type { FetchLike } from '../../src/client/http';
import { BASE, createFakeFetch, photoFuniaRoutes } from '../helpers/fakeService';

function transport(fetch: FetchLike, sessionId?: string) {
  const opts = { baseUrl: BASE, timeoutMs: 1000, fetch, logger: new NoopLogger() };
  return new Transport(new SessionManager({ ...opts, sessionId }), opts);
}

describe('Transport.buildRequest', () => {
  it('attaches browser headers and the session cookie', async () => {
    const { fetch } = createFakeFetch(photoFuniaRoutes());
    const req = await transport(fetch, 'tok').buildRequest('GET', 'https://photofunia.com/results/r1');

    expect(req.method).toBe('GET');
    expect(req.url).toBe('https://photofunia.com/results/r1');
    expect(req.headers.get('accept')).toBe(
      'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7'
    );
    expect(req.headers.get('accept-language')).toBe('en-US,en;q=0.9');
    expect(req.headers.get('cache-control')).toBe('max-age=0');
    expect(req.headers.get('connection')).toBe('keep-alive');
    expect(req.headers.get('origin')).toBe('https://photofunia.com');
    expect(req.headers.get('user-agent')).toBe(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/138.0.0.0 Safari/537.36'
    );
    expect(req.headers.get('cookie')).toBe('accept_cookie=true; PHPSESSID=tok');
  });

  it('leaves Content-Type unset', async () => {
    const { fetch } = createFakeFetch(photoFuniaRoutes());
    const req = await transport(fetch, 'tok').buildRequest('POST', `${BASE}/images?server=1`, Buffer.from('x'));
    expect(req.headers.has('content-type')).toBe(false);
    expect(req.body?.toString()).toBe('x');
  });

  it('acquires a session on first use', async () => {
    const { fetch, requests } = createFakeFetch(photoFuniaRoutes());
    const t = transport(fetch);

    const first = await t.buildRequest('GET', `${BASE}/results/a`);
    const second = await t.buildRequest('GET', `${BASE}/results/b`);

    expect(requests.map((r) => r.url)).toEqual(['https://photofunia.com/cookie-warning']);
    expect(first.headers.get('cookie')).toBe('accept_cookie=true; PHPSESSID=test-session-id');
    expect(second.headers.get('cookie')).toBe('accept_cookie=true; PHPSESSID=test-session-id');
  });

  it('propagates session failures unwrapped', async () => {
    const { fetch } = createFakeFetch(photoFuniaRoutes({ session: () => ({}) }));
    await expect(transport(fetch).buildRequest('GET', `${BASE}/results/a`)).rejects.toBeInstanceOf(SessionError);
  });

  it('rejects malformed URLs before touching the network', async () => {
    const { fetch } = createFakeFetch(photoFuniaRoutes());
    const err = await transport(fetch).buildRequest('GET', 'not a url').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RequestConstructionError);
    expect(err).toMatchObject({ step: 'request' });
    expect(fetch).not.toHaveBeenCalled();
  });

  it('rejects non-http schemes', async () => {
    const { fetch } = createFakeFetch(photoFuniaRoutes());
    await expect(transport(fetch, 'tok').buildRequest('GET', 'ftp://example.com/a.jpg')).rejects.toBeInstanceOf(
      RequestConstructionError
    );
  });

  it('rejects a GET with a body', async () => {
    const { fetch } = createFakeFetch(photoFuniaRoutes());
    await expect(
      transport(fetch, 'tok').buildRequest('GET', `${BASE}/results/a`, Buffer.from('x'))
    ).rejects.toBeInstanceOf(RequestConstructionError);
  });
});

describe('Transport.send', () => {
  it('returns status, final URL and full body', async () => {
    const { fetch, requests } = createFakeFetch(() => ({ body: 'hello', url: `${BASE}/results/final` }));
    const t = transport(fetch, 'tok');
    const req = await t.buildRequest('POST', `${BASE}/categories/faces/fat_maker?server=1`, Buffer.from('form'));

    const res = await t.send(req);

    expect(res.status).toBe(200);
    expect(res.url).toBe('https://photofunia.com/results/final');
    expect(res.body.toString()).toBe('hello');
    expect(requests[0].body).toBe('form');
    expect(requests[0].headers.get('cookie')).toBe('accept_cookie=true; PHPSESSID=tok');
  });
});
