import { z } from 'zod';
import { InvalidQuery } from '../errors/index.js';
import type { WorkHandler } from '../queue/worker-pool.js';
import type { Logger } from '../utils/logger.js';
import type { WorkItem } from '../types/index.js';

export const jobPayloadSchema = z.object({
  type: z.string().min(1),
  data: z.unknown(),
});

export interface JobContext {
  item: WorkItem;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * A named background job. `data` is validated with the job's schema before
 * `run` sees it.
 */
export interface JobDefinition<TData> {
  type: string;
  schema: z.ZodType<TData>;
  run(data: TData, context: JobContext): Promise<void>;
}

type RegisteredJob = (data: unknown, context: JobContext) => Promise<void>;

export class JobRegistry {
  private readonly jobs: Map<string, RegisteredJob> = new Map();

  constructor(private readonly logger: Logger) {}

  register<TData>(job: JobDefinition<TData>): this {
    if (this.jobs.has(job.type)) {
      throw new Error(`Job type ${job.type} is already registered`);
    }
    this.jobs.set(job.type, async (data, context) => {
      const parsed = job.schema.safeParse(data);
      if (!parsed.success) {
        throw new InvalidQuery(`Invalid data for job ${job.type}`, { issues: parsed.error.issues });
      }
      await job.run(parsed.data, context);
    });
    return this;
  }

  has(type: string): boolean {
    return this.jobs.has(type);
  }

  types(): string[] {
    return Array.from(this.jobs.keys());
  }

  /** Work handler for the worker pool. Unknown or malformed jobs fail permanently. */
  handler(): WorkHandler {
    return async (item, signal) => {
      const payload = jobPayloadSchema.safeParse(item.payload);
      if (!payload.success) {
        throw new InvalidQuery('Work item payload is not a job', { workItemId: item.id });
      }
      const job = this.jobs.get(payload.data.type);
      if (!job) {
        throw new InvalidQuery(`No job registered for type ${payload.data.type}`, { workItemId: item.id });
      }
      await job(payload.data.data, {
        item,
        signal,
        logger: this.logger.child({ workItemId: item.id, jobType: payload.data.type }),
      });
    };
  }
}
