import { Router, type Request, type Response, type NextFunction } from 'express';
import { aggregateBodySchema, entityQueryBodySchema } from '../../query/query-schemas.js';
import { parseBody, requestSignal, routeParam } from '../request-context.js';
import type { Facade } from '../../core/facade.js';

/**
 * Create entity query routes
 * @param facade - Facade components
 * @returns Express router with fetch, project and aggregate endpoints
 */
export function createEntityRoutes(facade: Facade): Router {
  const router = Router();
  const timeoutMs = facade.env.QUERY_TIMEOUT_MS;

  /**
   * List known entities and their fields
   */
  router.get('/', (req: Request, res: Response): void => {
    res.json({
      success: true,
      data: {
        entities: facade.schemas.list().map((schema) => ({
          name: schema.name,
          primaryKey: schema.primaryKey,
          fields: schema.fields,
          relations: schema.relations ?? [],
        })),
      },
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Entity graph in a fixed number of round trips
   */
  router.post('/:entity/fetch', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseBody(entityQueryBodySchema, req.body);
      const graph = await facade.planner.fetch(
        { entity: routeParam(req, 'entity'), ...body },
        { signal: requestSignal(req, res), timeoutMs }
      );
      res.json({ success: true, data: graph, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Only the requested fields, filtered by the store
   */
  router.post('/:entity/project', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseBody(entityQueryBodySchema, req.body);
      const projected = await facade.executor.project(
        { entity: routeParam(req, 'entity'), ...body },
        { signal: requestSignal(req, res), timeoutMs }
      );
      res.json({ success: true, data: projected, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Aggregate computed by the store
   */
  router.post('/:entity/aggregate', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseBody(aggregateBodySchema, req.body);
      const entity = routeParam(req, 'entity');
      const value = await facade.executor.aggregate({ entity, where: body.where }, body.op, {
        signal: requestSignal(req, res),
        timeoutMs,
      });
      res.json({ success: true, data: { entity, op: body.op, value }, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
