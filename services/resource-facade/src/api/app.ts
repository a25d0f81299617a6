import express, { type Express, type Request, type Response } from 'express';
import { setupRoutes } from './routes/index.js';
import { HealthMonitor } from '../monitoring/health-monitor.js';
import { RateLimiter } from '../middleware/rate-limiter.js';
import type { GracefulShutdown } from '../monitoring/graceful-shutdown.js';
import type { Facade } from '../core/facade.js';

export interface AppOptions {
  rateLimiter?: RateLimiter;
  shutdown?: GracefulShutdown;
  healthMonitor?: HealthMonitor;
}

export interface FacadeApp {
  app: Express;
  healthMonitor: HealthMonitor;
  rateLimiter: RateLimiter;
}

export function createApp(facade: Facade, options: AppOptions = {}): FacadeApp {
  const { env } = facade;
  const shutdown = options.shutdown;
  const healthMonitor =
    options.healthMonitor ??
    new HealthMonitor({
      registry: facade.registry,
      queue: facade.queue,
      metrics: facade.metrics,
      errorHandler: facade.errorHandler,
      isShuttingDown: shutdown ? () => shutdown.isShuttingDownInProgress() : undefined,
    });
  const rateLimiter =
    options.rateLimiter ?? new RateLimiter({ windowMs: env.RATE_LIMIT_WINDOW_MS, maxRequests: env.RATE_LIMIT_MAX });

  const app = express();
  app.disable('x-powered-by');

  if (shutdown) {
    app.use(shutdown.middleware());
  }
  app.use(express.json({ limit: '1mb' }));
  app.use(env.URL_PREFIX, rateLimiter.middleware());
  app.use(env.URL_PREFIX, setupRoutes(facade, healthMonitor));

  app.use((req: Request, res: Response): void => {
    res.status(404).json({
      success: false,
      error: 'NOT_FOUND',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  // Must stay last
  app.use(facade.errorHandler.middleware());

  return { app, healthMonitor, rateLimiter };
}
