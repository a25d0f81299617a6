import type { Request, Response } from 'express';
import type { z } from 'zod';
import { InvalidQuery } from '../errors/index.js';

/**
 * Signal that fires when the client goes away before the response is sent.
 */
export function requestSignal(req: Request, res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new Error(`Client closed ${req.method} ${req.originalUrl}`));
    }
  });
  return controller.signal;
}

export function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new InvalidQuery('Invalid request body', {
      issues: result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return result.data;
}

export function routeParam(req: Request, name: string): string {
  const value = req.params[name];
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidQuery(`Missing path parameter ${name}`);
  }
  return value;
}
