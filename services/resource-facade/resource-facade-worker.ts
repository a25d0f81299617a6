import { loadEnvironment } from './src/config/environment.js';
import { createFacade } from './src/core/facade.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { createLogger } from './src/utils/logger.js';

/**
 * Worker-only process: consumes the offload queue without serving HTTP.
 */
async function startWorker(): Promise<void> {
  const env = loadEnvironment();
  const logger = createLogger({ name: 'resource-facade-worker', logLevel: env.LOG_LEVEL });

  const facade = await createFacade(env, { logger });
  if (facade.broker.name === 'memory') {
    logger.warn('No REDIS_URL configured; this worker only sees work enqueued in its own process');
  }

  const shutdown = new GracefulShutdown({
    timeout: env.SHUTDOWN_TIMEOUT_MS,
    logger: logger.child({ component: 'graceful-shutdown' }),
  });
  shutdown.addCleanupTask('facade', () => facade.close());
  shutdown.installSignalHandlers();

  facade.workerPool.start();
  logger.info(
    { queue: env.QUEUE_NAME, concurrency: env.WORKER_CONCURRENCY, jobs: facade.jobs.types() },
    'Worker started'
  );
}

startWorker().catch((error: unknown) => {
  createLogger({ name: 'resource-facade-worker' }).fatal({ err: error }, 'Failed to start worker');
  process.exit(1);
});
