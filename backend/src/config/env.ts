/**
 * Environment Configuration
 *
 * Parsed once from process.env (dotenv is loaded by the entrypoint).
 * loadEnv() takes an explicit source so tests can build their own config.
 */

import { z } from 'zod';

const boolFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  // Persistence (empty MONGO_URL = in-memory store)
  MONGO_URL: z.string().default(''),
  DB_NAME: z.string().default('rainfall'),

  // Language model
  GEMINI_API_KEY: z.string().default(''),
  LLM_MODEL: z.string().default('gemini-2.0-flash'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // Data provider
  NASA_POWER_BASE_URL: z.string().url().default('https://power.larc.nasa.gov'),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DEFAULT_LATITUDE: z.coerce.number().min(-90).max(90).default(6.585),
  DEFAULT_LONGITUDE: z.coerce.number().min(-180).max(180).default(3.983),
  DAILY_LOOKBACK_DAYS: z.coerce.number().int().min(30).default(60),
  MONTHLY_LOOKBACK_YEARS: z.coerce.number().int().min(1).default(3),
  DEFAULT_DAILY_HORIZON: z.coerce.number().int().positive().default(7),
  DEFAULT_MONTHLY_HORIZON: z.coerce.number().int().positive().default(3),

  // Model artifacts
  MODEL_DIR: z.string().default('backend/models'),

  // Chart publishing
  PUBLISH_BASE_URL: z.string().url().default('http://localhost:8001'),
  PUBLISH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PUBLISH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  PUBLISH_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
  PUBLISH_INTERACTIVE: boolFlag.default('true'),
  WEEK_ANCHOR: z.enum(['current', 'next']).default('current'),

  // Scheduler
  SCHEDULER_ENABLED: boolFlag.default('true'),
  SCHEDULER_TZ: z.string().default('UTC'),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();
