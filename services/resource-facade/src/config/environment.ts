import dotenv from 'dotenv';
import { z } from 'zod';

const intFromEnv = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const optionalUrl = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const booleanFromEnv = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true'));

export const environmentSchema = z.object({
  PORT: intFromEnv(5001, 1),
  URL_PREFIX: z.string().startsWith('/').default('/facade/api/v1'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  DATABASE_URL: optionalUrl,
  REDIS_URL: optionalUrl,
  DOWNSTREAM_URL: z.string().url().default('http://localhost:5008'),
  CATALOG_PATH: z.string().min(1).default('catalog/catalog.json'),

  PG_POOL_SIZE: intFromEnv(10, 1),
  POOL_ACQUIRE_TIMEOUT_MS: intFromEnv(2000, 1),
  QUERY_TIMEOUT_MS: intFromEnv(5000, 1),
  HTTP_TIMEOUT_MS: intFromEnv(30000, 1),

  QUEUE_NAME: z.string().min(1).default('offload'),
  QUEUE_MAX_RETRIES: intFromEnv(3),
  QUEUE_LEASE_MS: intFromEnv(30000, 1),
  QUEUE_RETRY_BASE_MS: intFromEnv(1000),
  QUEUE_RETRY_MAX_MS: intFromEnv(60000),
  QUEUE_POLL_INTERVAL_MS: intFromEnv(500, 1),
  QUEUE_COMPLETED_RETENTION_MS: intFromEnv(24 * 60 * 60 * 1000),
  WORKER_CONCURRENCY: intFromEnv(4, 1),
  RUN_WORKERS_IN_PROCESS: booleanFromEnv(true),

  RATE_LIMIT_WINDOW_MS: intFromEnv(60000, 1),
  RATE_LIMIT_MAX: intFromEnv(600, 1),
  SHUTDOWN_TIMEOUT_MS: intFromEnv(30000, 1),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * Parse configuration from a source object (process.env by default).
 * Throws with every offending variable listed when validation fails.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const result = environmentSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }
  return result.data;
}

let loaded: Environment | null = null;

/** Load .env once and return the parsed configuration. */
export function loadEnvironment(): Environment {
  if (!loaded) {
    dotenv.config();
    loaded = parseEnvironment();
  }
  return loaded;
}
