import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().url().optional(),
  RECORDS_TABLE_PREFIX: z.string().regex(/^[a-z_]*$/).default('rr_'),

  // Portal
  PORTAL_URL: z.string().url().default('https://phxpublicsafety.phoenix.gov/'),
  PORTAL_STATUS_URL: z.string().url().optional(),
  PORTAL_TITLE_KEYWORDS: z.string().default('phoenix,public safety,records'),
  PORTAL_TIMEZONE: z.string().default('America/Phoenix'),
  BROWSER_HEADLESS: booleanFlag.default('true'),
  EVIDENCE_DIR: z.string().min(1).default('./evidence'),

  // Proxies (comma-separated URLs)
  PROXY_URLS: z.string().default(''),
  PROXY_STRATEGY: z.enum(['round_robin', 'random', 'sticky']).default('round_robin'),

  // Lifecycle
  SUBMISSIONS_PER_HOUR: z.coerce.number().int().positive().default(10),
  MAX_SUBMISSION_ATTEMPTS: z.coerce.number().int().positive().default(3),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  RETRY_BASE_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(15 * 60_000),
  RETRY_MAX_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(4 * 60 * 60_000),
  RECONCILE_AFTER_MS: z.coerce.number().int().nonnegative().default(60 * 60_000),
  RECONCILE_INTERVAL_MS: z.coerce.number().int().nonnegative().default(6 * 60 * 60_000),
  SUBMITTING_STALE_AFTER_MS: z.coerce.number().int().positive().default(30 * 60_000),
  SUBMISSION_BATCH_SIZE: z.coerce.number().int().positive().default(10),

  // API
  RECORDS_API_PORT: z.coerce.number().int().positive().default(3200),
  RECORDS_SERVICE_KEY: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Parse an explicit environment map without touching the cached process env. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}
