/**
 * Gateway configuration
 *
 * Reads environment variables, validates them with Zod, and returns a frozen
 * GatewayConfig. Startup fails with every invalid variable listed.
 */

import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const urlString = z
  .string()
  .url()
  .transform((value) => value.replace(/\/+$/, ''));

const envSchema = z.object({
  JELLYFIN_URL: urlString,
  JELLYFIN_PUBLIC_URL: urlString.optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATA_PATH: z.string().min(1).default('./data'),
  SESSION_SECRET: z.string().min(16).optional(),
  QUICK_CONNECT_TTL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LIBRARY_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(200),
  LIBRARY_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(2 * 60 * 1000),
  SUBTITLE_LANGUAGE: z.string().min(1).optional(),
  WATCHTIME_TRACKING: booleanString.default('false'),
  PROGRESS_INTERVAL_MS: z.coerce.number().int().min(1000).default(30_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  NODE_ENV: z.string().default('production'),
});

export interface GatewayConfig {
  jellyfin: {
    /** Base URL the gateway uses to reach Jellyfin */
    internalUrl: string;
    /** Base URL clients use for media and images; equals internalUrl when unset */
    publicUrl: string;
    timeoutMs: number;
    pageSize: number;
  };
  server: {
    port: number;
    host: string;
  };
  dataPath: string;
  /** Explicit secret; when absent one is generated and persisted in the store */
  sessionSecret: string | undefined;
  quickConnectTtlMs: number;
  libraryCacheTtlMs: number;
  subtitleLanguage: string | undefined;
  watchtimeTracking: boolean;
  progressIntervalMs: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  isDevelopment: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): GatewayConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const parsed = result.data;
  return Object.freeze({
    jellyfin: Object.freeze({
      internalUrl: parsed.JELLYFIN_URL,
      publicUrl: parsed.JELLYFIN_PUBLIC_URL ?? parsed.JELLYFIN_URL,
      timeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
      pageSize: parsed.LIBRARY_PAGE_SIZE,
    }),
    server: Object.freeze({
      port: parsed.PORT,
      host: parsed.HOST,
    }),
    dataPath: parsed.DATA_PATH,
    sessionSecret: parsed.SESSION_SECRET,
    quickConnectTtlMs: parsed.QUICK_CONNECT_TTL_MS,
    libraryCacheTtlMs: parsed.LIBRARY_CACHE_TTL_MS,
    subtitleLanguage: parsed.SUBTITLE_LANGUAGE,
    watchtimeTracking: parsed.WATCHTIME_TRACKING,
    progressIntervalMs: parsed.PROGRESS_INTERVAL_MS,
    logLevel: parsed.LOG_LEVEL,
    isDevelopment: parsed.NODE_ENV === 'development',
  });
}
