import { Router, type Request, type Response } from 'express';
import type { ClientRegistry } from '../../registry/client-registry.js';

/**
 * Registered resource kinds with pool occupancy
 */
export function createRegistryRoutes(registry: ClientRegistry): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    res.json({ success: true, data: { resources: registry.describe() }, timestamp: new Date().toISOString() });
  });

  return router;
}
