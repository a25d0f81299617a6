import { loadEnvironment } from './src/config/environment.js';
import { createFacade } from './src/core/facade.js';
import { createApp } from './src/api/app.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { createLogger } from './src/utils/logger.js';

/**
 * HTTP service. Runs the worker pool in the same process unless
 * RUN_WORKERS_IN_PROCESS=false, in which case resource-facade-worker does.
 */
async function startService(): Promise<void> {
  const env = loadEnvironment();
  const logger = createLogger({ name: 'resource-facade', logLevel: env.LOG_LEVEL });
  logger.info({ env: env.NODE_ENV, port: env.PORT, prefix: env.URL_PREFIX }, 'Starting resource facade service');

  const facade = await createFacade(env, { logger });
  const shutdown = new GracefulShutdown({
    timeout: env.SHUTDOWN_TIMEOUT_MS,
    logger: logger.child({ component: 'graceful-shutdown' }),
  });
  shutdown.installSignalHandlers();

  const { app, healthMonitor, rateLimiter } = createApp(facade, { shutdown });

  if (env.RUN_WORKERS_IN_PROCESS) {
    facade.workerPool.start();
  }

  shutdown.addCleanupTask('rate-limiter', async () => rateLimiter.close());
  shutdown.addCleanupTask('facade', () => facade.close());
  shutdown.addCleanupTask('error-records', async () => {
    const cleared = facade.errorHandler.clearOldErrors();
    logger.info({ cleared }, 'Cleared old error records');
  });

  const server = app.listen(env.PORT, () => {
    logger.info({ url: `http://localhost:${env.PORT}${env.URL_PREFIX}` }, 'Resource facade listening');
    healthMonitor
      .getHealthMetrics()
      .then((health) => logger.info({ status: health.status, issues: health.issues }, 'Initial health status'))
      .catch((error: unknown) => logger.warn({ err: error }, 'Initial health check failed'));
  });
  shutdown.attachServer(server);
}

startService().catch((error: unknown) => {
  createLogger({ name: 'resource-facade' }).fatal({ err: error }, 'Failed to start service');
  process.exit(1);
});
