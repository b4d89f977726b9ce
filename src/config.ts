import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './client/constants';

const EnvSchema = z.object({
  PHOTOFUNIA_BASE_URL: z.url().optional(),
  PHOTOFUNIA_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  PHOTOFUNIA_SESSION_ID: z.string().min(1).optional(),
});

export interface EnvConfig {
  baseUrl?: string;
  timeout?: number;
  sessionId?: string;
}

/**
 * Reads client settings from the environment. Unset or empty variables are
 * left out so that explicit options and defaults apply.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const raw = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('PHOTOFUNIA_') && value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid PhotoFunia configuration: ${issues}`);
  }

  const config: EnvConfig = {};
  if (parsed.data.PHOTOFUNIA_BASE_URL) config.baseUrl = parsed.data.PHOTOFUNIA_BASE_URL;
  if (parsed.data.PHOTOFUNIA_TIMEOUT_MS) config.timeout = parsed.data.PHOTOFUNIA_TIMEOUT_MS;
  if (parsed.data.PHOTOFUNIA_SESSION_ID) config.sessionId = parsed.data.PHOTOFUNIA_SESSION_ID;
  return config;
}

/** Strips a trailing slash so endpoint paths can be appended directly. */
export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

export const defaults = {
  baseUrl: DEFAULT_BASE_URL,
  timeout: DEFAULT_TIMEOUT_MS,
} as const;
