import pg from 'pg';
import { createClient } from 'redis';
import type { AxiosInstance } from 'axios';
import { createHttpClient } from '../clients/http-client.js';
import type { ClientRegistry, ResourceKind } from './client-registry.js';
import type { RedisClient } from '../queue/redis-broker.js';
import type { Environment } from '../config/environment.js';
import type { Logger } from '../utils/logger.js';

export interface FacadeResources {
  http: ResourceKind<AxiosInstance>;
  postgres: ResourceKind<pg.Client> | null;
  redis: ResourceKind<RedisClient> | null;
}

/** Strip credentials before an endpoint is logged or described. */
export function redactEndpoint(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) parsed.password = '***';
    return parsed.toString();
  } catch {
    return '[invalid url]';
  }
}

/**
 * Register every long-lived client the service talks through. Postgres and
 * Redis are only registered when their URL is configured.
 */
export function registerResources(registry: ClientRegistry, env: Environment, logger: Logger): FacadeResources {
  const http = registry.register<AxiosInstance>({
    kind: 'http',
    endpoint: env.DOWNSTREAM_URL,
    threadSafe: true,
    config: { timeoutMs: env.HTTP_TIMEOUT_MS },
    create: () => createHttpClient({ baseURL: env.DOWNSTREAM_URL, timeoutMs: env.HTTP_TIMEOUT_MS, logger }),
  });

  const databaseUrl = env.DATABASE_URL;
  // The server cancels a statement and the client gives up on a reply after the query timeout
  const pgTimeouts = { statement_timeout: env.QUERY_TIMEOUT_MS, query_timeout: env.QUERY_TIMEOUT_MS };
  const postgres = databaseUrl
    ? registry.register<pg.Client>({
        kind: 'postgres',
        endpoint: redactEndpoint(databaseUrl),
        // A pg.Client runs one query at a time
        threadSafe: false,
        pool: { maxSize: env.PG_POOL_SIZE, acquireTimeoutMs: env.POOL_ACQUIRE_TIMEOUT_MS },
        config: pgTimeouts,
        create: async () => {
          const client = new pg.Client({ connectionString: databaseUrl, ...pgTimeouts });
          client.on('error', (error) => logger.error({ err: error }, 'Postgres connection error'));
          await client.connect();
          return client;
        },
        destroy: async (client) => {
          await client.end();
        },
      })
    : null;

  const redisUrl = env.REDIS_URL;
  const redis = redisUrl
    ? registry.register<RedisClient>({
        kind: 'redis',
        endpoint: redactEndpoint(redisUrl),
        threadSafe: true,
        create: async () => {
          const client = createClient({ url: redisUrl });
          client.on('error', (error: unknown) => logger.error({ err: error }, 'Redis connection error'));
          await client.connect();
          return client;
        },
        destroy: async (client) => {
          await client.quit();
        },
      })
    : null;

  return { http, postgres, redis };
}
