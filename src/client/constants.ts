// Wire-level constants of the PhotoFunia web frontend. The service checks these
// against what a desktop Chrome would send, so they are kept literal.

export const DEFAULT_BASE_URL = 'https://photofunia.com';

export const DEFAULT_TIMEOUT_MS = 30_000;

export const SESSION_COOKIE = 'PHPSESSID';

export const CONSENT_COOKIE = 'accept_cookie=true';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/138.0.0.0 Safari/537.36';

export const UPLOAD_BOUNDARY = '----WebKitFormBoundaryx4CBHpJEw9pPEXE4';

export const EFFECT_BOUNDARY = '----WebKitFormBoundaryL3VFyS6LkNI3s7UM';

export const UPLOAD_FIELD = 'image';
export const UPLOAD_FILENAME = 'image.png';

export const ACCEPT_HTML =
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7';

export const ACCEPT_JSON = 'application/json, text/javascript, */*; q=0.01';

export const ACCEPT_IMAGE = 'image/avif,image/webp,image/apng,image/svg+xml,image/*,*/*;q=0.8';

export function browserHeaders(baseUrl: string): Record<string, string> {
  return {
    Accept: ACCEPT_HTML,
    'Accept-Language': 'en-US,en;q=0.9',
    'Cache-Control': 'max-age=0',
    Connection: 'keep-alive',
    Origin: baseUrl,
    'User-Agent': USER_AGENT,
  };
}

export const endpoints = {
  cookieWarning: (base: string) => `${base}/cookie-warning`,
  upload: (base: string) => `${base}/images?server=1`,
  effect: (base: string, effectPath: string) => `${base}/categories/${effectPath}?server=1`,
  effectPage: (base: string, effectPath: string) => `${base}/categories/${effectPath}`,
};
