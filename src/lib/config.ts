import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_CH_BASE } from './companiesHouseClient.js';

const intFromEnv = (fallback: number, min = 0) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v === undefined || v === '' ? String(fallback) : v))
    .pipe(z.coerce.number().int().min(min));

const envSchema = z.object({
  COMPANIES_HOUSE_API_KEY: z.string().trim().optional().default(''),
  CH_API_BASE: z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : DEFAULT_CH_BASE))
    .pipe(z.string().url()),
  CH_HTTP_TIMEOUT_MS: intFromEnv(15000, 1),
  CH_RATE_LIMIT_WINDOW_MS: intFromEnv(60000, 1),
  CH_RATE_LIMIT_MAX_PER_WINDOW: intFromEnv(500, 1),
  CH_RATE_LIMIT_MIN_INTERVAL_MS: z.string().trim().optional(),
  OWNERSHIP_MAX_DEPTH: intFromEnv(4),
  OWNERSHIP_MAX_DEPTH_LIMIT: intFromEnv(10),
  RESOLVE_TIMEOUT_MS: intFromEnv(120000, 1),
  PORT: intFromEnv(3000, 1),
});

export type RateLimitConfig = {
  windowMs: number;
  maxPerWindow: number;
  minIntervalMs: number;
};

export type AppConfig = {
  companiesHouse: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    rateLimit: RateLimitConfig;
  };
  ownership: {
    defaultMaxDepth: number;
    maxDepthLimit: number;
    resolveTimeoutMs: number;
  };
  port: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  // Spread requests evenly across the window unless told otherwise
  const derivedInterval = Math.ceil(e.CH_RATE_LIMIT_WINDOW_MS / Math.max(1, e.CH_RATE_LIMIT_MAX_PER_WINDOW));
  const explicitInterval = e.CH_RATE_LIMIT_MIN_INTERVAL_MS ? Number(e.CH_RATE_LIMIT_MIN_INTERVAL_MS) : NaN;
  if (e.CH_RATE_LIMIT_MIN_INTERVAL_MS && (!Number.isInteger(explicitInterval) || explicitInterval < 0)) {
    throw new ConfigError([`CH_RATE_LIMIT_MIN_INTERVAL_MS: expected a non-negative integer`]);
  }
  if (e.OWNERSHIP_MAX_DEPTH > e.OWNERSHIP_MAX_DEPTH_LIMIT) {
    throw new ConfigError([
      `OWNERSHIP_MAX_DEPTH: ${e.OWNERSHIP_MAX_DEPTH} exceeds OWNERSHIP_MAX_DEPTH_LIMIT (${e.OWNERSHIP_MAX_DEPTH_LIMIT})`,
    ]);
  }

  return {
    companiesHouse: {
      apiKey: e.COMPANIES_HOUSE_API_KEY,
      baseUrl: e.CH_API_BASE.replace(/\/$/, ''),
      timeoutMs: e.CH_HTTP_TIMEOUT_MS,
      rateLimit: {
        windowMs: e.CH_RATE_LIMIT_WINDOW_MS,
        maxPerWindow: e.CH_RATE_LIMIT_MAX_PER_WINDOW,
        minIntervalMs: Number.isInteger(explicitInterval) ? explicitInterval : derivedInterval,
      },
    },
    ownership: {
      defaultMaxDepth: e.OWNERSHIP_MAX_DEPTH,
      maxDepthLimit: e.OWNERSHIP_MAX_DEPTH_LIMIT,
      resolveTimeoutMs: e.RESOLVE_TIMEOUT_MS,
    },
    port: e.PORT,
  };
}
