import { z } from 'zod';
import { aggregateOpSchema, predicateSchema } from '../query/query-schemas.js';
import type { JobDefinition } from './index.js';
import type { ProjectionExecutor } from '../query/projection-executor.js';
import type { AggregateOp, Predicate } from '../types/index.js';

export interface ReportAggregateData {
  entity: string;
  where?: Predicate;
  op: AggregateOp;
}

const reportAggregateSchema: z.ZodType<ReportAggregateData> = z.object({
  entity: z.string().min(1),
  where: predicateSchema.optional(),
  op: aggregateOpSchema,
});

/**
 * Computes an aggregate off the request path. The store does the work; the
 * job only records the result.
 */
export function reportAggregateJob(executor: ProjectionExecutor): JobDefinition<ReportAggregateData> {
  return {
    type: 'report.aggregate',
    schema: reportAggregateSchema,
    async run(data, { signal, logger }) {
      const value = await executor.aggregate({ entity: data.entity, where: data.where }, data.op, { signal });
      logger.info({ entity: data.entity, fn: data.op.fn, field: data.op.field, value }, 'Aggregate report computed');
    },
  };
}
