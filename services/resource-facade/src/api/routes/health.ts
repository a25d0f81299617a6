import { Router, type Request, type Response, type NextFunction } from 'express';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';

/**
 * Create health check routes
 * @param healthMonitor - Health monitor instance
 * @returns Express router with health endpoints
 */
export function createHealthRoutes(healthMonitor: HealthMonitor): Router {
  const router = Router();

  /**
   * Detailed health report. Unhealthy answers 503.
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const metrics = await healthMonitor.getHealthMetrics();
      res.status(metrics.status === 'unhealthy' ? 503 : 200).json({
        success: metrics.status !== 'unhealthy',
        data: metrics,
        timestamp: metrics.timestamp,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/ready', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const ready = await healthMonitor.isReady();
      res.status(ready ? 200 : 503).json({ success: ready, data: { ready }, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/live', (req: Request, res: Response): void => {
    res.json({ success: true, data: { alive: true }, timestamp: new Date().toISOString() });
  });

  return router;
}
