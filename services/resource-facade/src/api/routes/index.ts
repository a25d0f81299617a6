import { Router, type Request, type Response } from 'express';
import { createEntityRoutes } from './entities.js';
import { createWorkRoutes } from './work.js';
import { createRegistryRoutes } from './registry.js';
import { createMetricsRoutes } from './metrics.js';
import { createHealthRoutes } from './health.js';
import type { Facade } from '../../core/facade.js';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';

/**
 * Mount every router under one prefix, with a service index at its root.
 */
export function setupRoutes(facade: Facade, healthMonitor: HealthMonitor): Router {
  const router = Router();

  router.use('/health', createHealthRoutes(healthMonitor));
  router.use('/entities', createEntityRoutes(facade));
  router.use('/work', createWorkRoutes(facade));
  router.use('/registry', createRegistryRoutes(facade.registry));
  router.use('/metrics', createMetricsRoutes(facade.metrics, facade.errorHandler));

  router.get('/', (req: Request, res: Response): void => {
    res.json({
      success: true,
      data: {
        service: 'resource-facade',
        store: facade.store.name,
        broker: facade.broker.name,
        endpoints: {
          health: '/health',
          entities: '/entities',
          fetch: 'POST /entities/:entity/fetch',
          project: 'POST /entities/:entity/project',
          aggregate: 'POST /entities/:entity/aggregate',
          work: '/work',
          registry: '/registry',
          metrics: '/metrics',
        },
        jobs: facade.jobs.types(),
      },
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
