/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a value is malformed.
 * Provides typed access to all config values.
 */
import { z } from 'zod';

const flag = z.enum(['true', 'false', '1', '0']).default('false').transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),

  // ── Dataset ──
  DATA_FILE: z.string().min(1).default('data/articles.csv'),
  DATA_ENCODING: z.enum(['utf8', 'latin1']).default('latin1'),
  DATASET_PROFILE: z.enum(['global-news', 'hazard-city', 'hazard-county']).default('hazard-city'),

  // ── Views ──
  TOP_CATEGORIES_N: z.coerce.number().int().min(1).max(100).default(5),
  TOP_LOCATIONS_N: z.coerce.number().int().min(1).max(100).default(10),
  CROSSTAB_N: z.coerce.number().int().min(1).max(100).default(10),
  MAP_POINTS_MAX: z.coerce.number().int().min(0).default(2000),

  // ── Sessions ──
  SESSION_MAX: z.coerce.number().int().min(1).default(200),

  // ── Redis ──
  REDIS_URL: z.string().default('redis://localhost:6379'),
  REDIS_KEY_PREFIX: z.string().default('newsdash:'),

  // ── Rate Limiting ──
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(300),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),

  // ── Cache TTL (seconds) ──
  CACHE_DASHBOARD_TTL: z.coerce.number().int().min(10).default(3600),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // ── Error Tracking ──
  SENTRY_DSN: z.string().url().optional(),

  // ── Feature flags ──
  ENABLE_REDIS_CACHE: flag,   // false = in-memory cache
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
