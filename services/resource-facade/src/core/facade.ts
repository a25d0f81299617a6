import type { AxiosInstance } from 'axios';
import { ClientRegistry, type ResourceKind } from '../registry/client-registry.js';
import { registerResources, type FacadeResources } from '../registry/resources.js';
import { SchemaRegistry } from '../data/schema.js';
import { InMemoryDataStore } from '../data/in-memory-store.js';
import { PostgresDataStore } from '../data/postgres-store.js';
import { loadCatalog, type Catalog } from '../data/catalog.js';
import { BatchQueryPlanner } from '../query/batch-planner.js';
import { ProjectionExecutor } from '../query/projection-executor.js';
import { InMemoryBroker } from '../queue/in-memory-broker.js';
import { RedisBroker } from '../queue/redis-broker.js';
import { WorkQueue } from '../queue/work-queue.js';
import { WorkerPool } from '../queue/worker-pool.js';
import { JobRegistry } from '../jobs/index.js';
import { reportAggregateJob } from '../jobs/report-aggregate.js';
import { webhookDeliverJob } from '../jobs/webhook-deliver.js';
import { MetricsCollector, Telemetry } from '../monitoring/telemetry.js';
import { ErrorHandler } from '../monitoring/error-handler.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { Environment } from '../config/environment.js';
import type { IDataStore } from '../data/data-store.js';
import type { IMessageBroker } from '../queue/broker.js';

export interface FacadeOverrides {
  catalog?: Catalog;
  store?: IDataStore;
  broker?: IMessageBroker;
  registry?: ClientRegistry;
  logger?: Logger;
}

export interface Facade {
  env: Environment;
  logger: Logger;
  registry: ClientRegistry;
  http: ResourceKind<AxiosInstance>;
  schemas: SchemaRegistry;
  store: IDataStore;
  broker: IMessageBroker;
  queue: WorkQueue;
  planner: BatchQueryPlanner;
  executor: ProjectionExecutor;
  jobs: JobRegistry;
  workerPool: WorkerPool;
  telemetry: Telemetry;
  metrics: MetricsCollector;
  errorHandler: ErrorHandler;
  close(): Promise<void>;
}

/**
 * Build every long-lived component once per process. Postgres and Redis are
 * used when their URLs are configured; otherwise the in-process store and
 * broker stand in.
 */
export async function createFacade(env: Environment, overrides: FacadeOverrides = {}): Promise<Facade> {
  const logger = overrides.logger ?? createLogger({ name: 'resource-facade', logLevel: env.LOG_LEVEL });
  const registry = overrides.registry ?? new ClientRegistry(logger.child({ component: 'client-registry' }));
  const resources = registerResources(registry, env, logger.child({ component: 'resources' }));

  const catalog = overrides.catalog ?? (await loadCatalog(env.CATALOG_PATH));
  const schemas = new SchemaRegistry(catalog.entities);

  const telemetry = new Telemetry((error, event) => logger.error({ err: error, event }, 'Telemetry listener failed'));
  const metrics = new MetricsCollector(telemetry);
  const errorHandler = new ErrorHandler({
    logger: logger.child({ component: 'error-handler' }),
    exposeDetails: env.NODE_ENV === 'development',
  });

  const store = overrides.store ?? createStore(env, schemas, catalog, registry, resources.postgres, logger);
  const broker = overrides.broker ?? createBroker(env, registry, resources.redis, logger);

  const queue = new WorkQueue({
    broker,
    name: env.QUEUE_NAME,
    defaultMaxRetries: env.QUEUE_MAX_RETRIES,
    defaultLeaseTimeoutMs: env.QUEUE_LEASE_MS,
    pollIntervalMs: env.QUEUE_POLL_INTERVAL_MS,
    completedRetentionMs: env.QUEUE_COMPLETED_RETENTION_MS,
    telemetry,
    logger: logger.child({ component: 'work-queue' }),
  });

  const planner = new BatchQueryPlanner({ store, schemas, telemetry, logger: logger.child({ component: 'batch-planner' }) });
  const executor = new ProjectionExecutor({
    store,
    schemas,
    telemetry,
    logger: logger.child({ component: 'projection-executor' }),
  });

  const jobs = new JobRegistry(logger.child({ component: 'jobs' }))
    .register(reportAggregateJob(executor))
    .register(webhookDeliverJob(registry, resources.http));

  const workerPool = new WorkerPool({
    queue,
    handler: jobs.handler(),
    concurrency: env.WORKER_CONCURRENCY,
    retry: { baseDelayMs: env.QUEUE_RETRY_BASE_MS, maxDelayMs: env.QUEUE_RETRY_MAX_MS },
    telemetry,
    logger: logger.child({ component: 'worker-pool' }),
  });

  logger.info(
    { store: store.name, broker: broker.name, entities: schemas.list().map((schema) => schema.name), jobs: jobs.types() },
    'Facade components created'
  );

  return {
    env,
    logger,
    registry,
    http: resources.http,
    schemas,
    store,
    broker,
    queue,
    planner,
    executor,
    jobs,
    workerPool,
    telemetry,
    metrics,
    errorHandler,
    async close() {
      await workerPool.stop();
      await queue.close();
      await store.close();
      await registry.shutdown();
      metrics.dispose();
    },
  };
}

function createStore(
  env: Environment,
  schemas: SchemaRegistry,
  catalog: Catalog,
  registry: ClientRegistry,
  postgres: FacadeResources['postgres'],
  logger: Logger
): IDataStore {
  if (postgres) {
    return new PostgresDataStore({ registry, clientKind: postgres, schemas, queryTimeoutMs: env.QUERY_TIMEOUT_MS });
  }
  logger.warn('DATABASE_URL not set, using the in-process data store');
  const store = new InMemoryDataStore(schemas);
  for (const [entity, rows] of Object.entries(catalog.seed)) {
    store.seed(entity, rows);
  }
  return store;
}

function createBroker(
  env: Environment,
  registry: ClientRegistry,
  redis: FacadeResources['redis'],
  logger: Logger
): IMessageBroker {
  if (redis) {
    return new RedisBroker({ registry, clientKind: redis, queueName: env.QUEUE_NAME });
  }
  logger.warn('REDIS_URL not set, using the in-process broker; work items do not survive a restart');
  return new InMemoryBroker();
}
