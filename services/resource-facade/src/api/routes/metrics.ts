import { Router, type Request, type Response } from 'express';
import type { MetricsCollector } from '../../monitoring/telemetry.js';
import type { ErrorHandler } from '../../monitoring/error-handler.js';

export function createMetricsRoutes(metrics: MetricsCollector, errorHandler: ErrorHandler): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    res.json({
      success: true,
      data: {
        ...metrics.snapshot(),
        errorRate: metrics.errorRate(),
        errors: errorHandler.getErrorStats(),
      },
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
