import { z } from 'zod';

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1')
]);

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
  z.string().optional()
);

const commaSeparatedList = z.preprocess(
  (value) => {
    if (Array.isArray(value)) {
      return value;
    }

    if (typeof value !== 'string') {
      return [];
    }

    return value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  },
  z.array(z.string().min(1))
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.preprocess(
    (value) => (typeof value === 'string' && value.length === 0 ? undefined : value),
    z.string().url().optional()
  ),
  REDIS_URL: z.preprocess(
    (value) => (typeof value === 'string' && value.length === 0 ? undefined : value),
    z.string().url().optional()
  ),
  LOCK_STORE: z.enum(['redis', 'memory']).default('memory'),
  LOCK_TTL_MS: z.coerce.number().int().positive().default(300_000),
  OPERATOR_API_KEYS: commaSeparatedList.default([]),
  PLATFORM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PLATFORM_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  PLATFORM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(250),
  PLATFORM_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(4_000),
  HEALTH_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  HEALTH_STALE_ACTIVITY_DAYS: z.coerce.number().int().positive().default(30),
  HEALTH_CERT_EXPIRY_WARNING_DAYS: z.coerce.number().int().positive().default(14),
  HEALTH_BACKUP_STALE_DAYS: z.coerce.number().int().positive().default(7),
  HEALTH_SLOW_RESPONSE_MS: z.coerce.number().int().positive().default(3_000),
  GITHUB_ORG: optionalString,
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),
  VERCEL_API_URL: z.string().url().default('https://api.vercel.com'),
  BUILDER_CONTENT_API_URL: z.string().url().default('https://cdn.builder.io/api/v3/content'),
  BUILDER_WRITE_API_URL: z.string().url().default('https://builder.io/api/v1/write'),
  BUILDER_SHARED_SPACE_ID: optionalString,
  BUILDER_MODELS: commaSeparatedList.default(['page', 'section', 'symbol']),
  BACKUP_BUCKET: optionalString,
  BACKUP_ROOT_PREFIX: z.string().min(1).default('projects/'),
  OTEL_ENABLED: booleanFlag.default(false),
  OTEL_SERVICE_NAME: z.string().min(1).default('site-registry'),
  OTEL_METRIC_EXPORT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000)
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(overrides: Partial<Record<keyof Env, unknown>> = {}): Env {
  return envSchema.parse({
    ...process.env,
    ...overrides
  });
}
