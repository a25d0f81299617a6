import { DeadLettered, LeaseExpired, errorMessage, isFacadeError } from '../errors/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { LeasedWorkItem, WorkQueue } from './work-queue.js';
import type { Telemetry } from '../monitoring/telemetry.js';
import type { WorkItem } from '../types/index.js';

/**
 * Processes one work item. The signal fires when the item's lease would
 * run out; rejecting hands the item back to the queue.
 */
export type WorkHandler = (item: WorkItem, signal: AbortSignal) => Promise<void>;

export interface RetryPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface WorkerPoolOptions {
  queue: WorkQueue;
  handler: WorkHandler;
  concurrency: number;
  retry: RetryPolicy;
  telemetry?: Telemetry;
  logger?: Logger;
}

/** Delay before the next attempt: min(max, base * 2^(attempt - 1)). */
export function retryDelay(attempt: number, policy: RetryPolicy): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
}

/** Errors that will fail the same way on every attempt. */
export function isPermanentFailure(error: unknown): boolean {
  return isFacadeError(error) && !error.retryable;
}

/**
 * Runs `concurrency` consumers over the queue, separate from any request
 * path. stop() lets in-flight items finish.
 */
export class WorkerPool {
  private readonly logger: Logger;
  private controller: AbortController | null = null;
  private workers: Promise<void>[] = [];
  private readonly inFlight: Set<string> = new Set();
  private processed: number = 0;

  constructor(private readonly options: WorkerPoolOptions) {
    if (options.concurrency < 1) {
      throw new Error('Worker pool needs concurrency >= 1');
    }
    this.logger = options.logger ?? createLogger({ name: 'worker-pool', bindings: { queue: options.queue.name } });
  }

  get running(): boolean {
    return this.controller !== null;
  }

  getStatus(): { running: boolean; concurrency: number; inFlight: number; processed: number } {
    return {
      running: this.running,
      concurrency: this.options.concurrency,
      inFlight: this.inFlight.size,
      processed: this.processed,
    };
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.workers = Array.from({ length: this.options.concurrency }, (_, index) => this.runWorker(index, controller.signal));
    this.logger.info({ concurrency: this.options.concurrency }, 'Worker pool started');
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    controller.abort();
    await Promise.all(this.workers);
    this.workers = [];
    this.controller = null;
    this.logger.info({ processed: this.processed }, 'Worker pool stopped');
  }

  private async runWorker(index: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        for await (const leased of this.options.queue.consume({ signal })) {
          await this.process(leased);
        }
      } catch (error) {
        // Broker unreachable or similar; consume() is restartable
        this.logger.error({ err: error, worker: index }, 'Worker loop failed, restarting');
        await pause(this.options.retry.baseDelayMs, signal);
      }
    }
  }

  private async process(leased: LeasedWorkItem): Promise<void> {
    const { item } = leased;
    const started = performance.now();
    const jobType = describeJob(item.payload);
    this.inFlight.add(item.id);

    try {
      await this.options.handler(item, AbortSignal.timeout(item.leaseTimeoutMs));
      await leased.ack();
      this.record(item, 'acked', leased.attempt, started, jobType);
      this.logger.debug({ workItemId: item.id, jobType, attempt: leased.attempt }, 'Work item completed');
    } catch (error) {
      if (error instanceof LeaseExpired) {
        this.onLeaseExpired(error, item, leased.attempt, jobType);
        return;
      }
      await this.fail(leased, error, started, jobType);
    } finally {
      this.inFlight.delete(item.id);
      this.processed++;
    }
  }

  private async fail(leased: LeasedWorkItem, error: unknown, started: number, jobType: string | undefined): Promise<void> {
    const { item } = leased;
    const permanent = isPermanentFailure(error);
    const delay = retryDelay(leased.attempt, this.options.retry);

    try {
      const settled = await leased.abandon(error, { retryDelayMs: delay, permanent });
      if (settled.state === 'DeadLettered') {
        const deadLettered = new DeadLettered(item.id, settled.retryCount);
        this.logger.error(
          { workItemId: item.id, jobType, attempts: settled.retryCount, permanent, lastError: errorMessage(error) },
          deadLettered.message
        );
        this.record(item, 'deadLettered', leased.attempt, started, jobType);
        return;
      }
      this.logger.warn(
        { workItemId: item.id, jobType, attempt: leased.attempt, retryInMs: delay, err: error },
        'Work item failed, will retry'
      );
      this.record(item, 'abandoned', leased.attempt, started, jobType);
    } catch (abandonError) {
      if (abandonError instanceof LeaseExpired) {
        this.onLeaseExpired(abandonError, item, leased.attempt, jobType);
        return;
      }
      throw abandonError;
    }
  }

  // The queue counts the expiry when it reclaims the item
  private onLeaseExpired(error: LeaseExpired, item: WorkItem, attempt: number, jobType: string | undefined): void {
    this.logger.warn({ workItemId: item.id, jobType, attempt }, error.message);
  }

  private record(
    item: WorkItem,
    outcome: 'acked' | 'abandoned' | 'deadLettered',
    attempt: number,
    started: number,
    jobType: string | undefined
  ): void {
    this.options.telemetry?.emit('workItem', {
      id: item.id,
      jobType,
      outcome,
      attempt,
      durationMs: performance.now() - started,
    });
  }
}

function describeJob(payload: unknown): string | undefined {
  if (typeof payload === 'object' && payload !== null && 'type' in payload && typeof payload.type === 'string') {
    return payload.type;
  }
  return undefined;
}

async function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return;
  await new Promise<void>((resolve) => {
    const timer = setTimeout(done, Math.max(ms, 1));
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}
