import { z } from 'zod';
import type { AggregateOp, IncludeQuery, Predicate } from '../types/index.js';

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const comparisonSchema = z.object({
  kind: z.literal('compare'),
  field: z.string().min(1),
  fn: z.enum(['lower', 'upper', 'length', 'year', 'month', 'daysSince']).optional(),
  op: z.enum(['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in', 'like', 'isNull']),
  value: z.union([scalarSchema, z.array(scalarSchema)]).optional(),
});

export const predicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.union([
    comparisonSchema,
    z.object({ kind: z.literal('and'), clauses: z.array(predicateSchema) }),
    z.object({ kind: z.literal('or'), clauses: z.array(predicateSchema) }),
    z.object({ kind: z.literal('not'), clause: predicateSchema }),
  ])
);

const orderBySchema = z.object({
  field: z.string().min(1),
  direction: z.enum(['asc', 'desc']).optional(),
});

export const includeSchema: z.ZodType<IncludeQuery> = z.lazy(() =>
  z.object({
    relation: z.string().min(1),
    fields: z.array(z.string().min(1)),
    where: predicateSchema.optional(),
    orderBy: z.array(orderBySchema).optional(),
    include: z.array(includeSchema).optional(),
  })
);

/** Body of fetch and project requests; the entity comes from the path. */
export const entityQueryBodySchema = z.object({
  fields: z.array(z.string().min(1)),
  where: predicateSchema.optional(),
  orderBy: z.array(orderBySchema).optional(),
  limit: z.number().int().min(0).optional(),
  offset: z.number().int().min(0).optional(),
  include: z.array(includeSchema).optional(),
});

export const aggregateOpSchema: z.ZodType<AggregateOp> = z.object({
  fn: z.enum(['count', 'sum', 'avg', 'min', 'max']),
  field: z.string().min(1).optional(),
});

export const aggregateBodySchema = z.object({
  where: predicateSchema.optional(),
  op: aggregateOpSchema,
});
