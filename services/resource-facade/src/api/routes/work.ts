import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import { InvalidQuery, NotFound } from '../../errors/index.js';
import { parseBody, routeParam } from '../request-context.js';
import type { Facade } from '../../core/facade.js';

const enqueueBodySchema = z.object({
  id: z.string().min(1).max(200).optional(),
  type: z.string().min(1),
  data: z.unknown(),
  maxRetries: z.number().int().min(0).optional(),
  leaseTimeoutMs: z.number().int().positive().optional(),
});

const limitSchema = z.coerce.number().int().min(1).max(1000).default(50);

/**
 * Create background work routes
 * @param facade - Facade components
 * @returns Express router for enqueueing and inspecting work items
 */
export function createWorkRoutes(facade: Facade): Router {
  const router = Router();

  /**
   * Enqueue a job. Answers as soon as the item is stored.
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseBody(enqueueBodySchema, req.body);
      if (!facade.jobs.has(body.type)) {
        throw new InvalidQuery(`Unknown job type ${body.type}`, { known: facade.jobs.types() });
      }
      const id = await facade.queue.enqueue({
        id: body.id,
        payload: { type: body.type, data: body.data },
        maxRetries: body.maxRetries,
        leaseTimeoutMs: body.leaseTimeoutMs,
      });
      res.status(202).json({ success: true, data: { id }, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Queue depth per state and worker pool status
   */
  router.get('/stats', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const depth = await facade.queue.depth();
      res.json({
        success: true,
        data: { queue: facade.env.QUEUE_NAME, depth, workers: facade.workerPool.getStatus() },
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/dead-letter', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const limit = limitSchema.safeParse(req.query['limit']);
      if (!limit.success) {
        throw new InvalidQuery('limit must be an integer between 1 and 1000');
      }
      const items = await facade.queue.listDeadLettered(limit.data);
      res.json({ success: true, data: { items, count: items.length }, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  router.post('/dead-letter/:id/requeue', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = await facade.queue.requeue(routeParam(req, 'id'));
      res.json({ success: true, data: item, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const id = routeParam(req, 'id');
      const item = await facade.queue.get(id);
      if (!item) {
        throw new NotFound(`Work item ${id} not found`, { id });
      }
      res.json({ success: true, data: item, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
