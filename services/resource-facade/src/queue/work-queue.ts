import { setTimeout as sleep } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { InvalidQuery, LeaseExpired, errorMessage } from '../errors/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { IMessageBroker, Lease } from './broker.js';
import type { Telemetry } from '../monitoring/telemetry.js';
import type { NewWorkItem, QueueDepth, WorkItem } from '../types/index.js';

export interface WorkQueueOptions {
  broker: IMessageBroker;
  name: string;
  defaultMaxRetries: number;
  defaultLeaseTimeoutMs: number;
  pollIntervalMs: number;
  /** How long completed items are kept for enqueue idempotence */
  completedRetentionMs: number;
  telemetry?: Telemetry;
  logger?: Logger;
}

export interface ConsumeOptions {
  signal?: AbortSignal;
}

/**
 * A work item leased to one consumer. Settle it exactly once with ack or
 * abandon; both fail with LeaseExpired when the lease has been lost.
 */
export class LeasedWorkItem {
  private settled: boolean = false;

  constructor(
    private readonly broker: IMessageBroker,
    private readonly lease: Lease
  ) {}

  get item(): WorkItem {
    return this.lease.item;
  }

  /** 1-based number of the attempt this lease represents */
  get attempt(): number {
    return this.lease.item.retryCount + 1;
  }

  async ack(): Promise<WorkItem> {
    this.markSettled();
    return this.broker.ack(this.lease.item.id, this.lease.token);
  }

  async abandon(error: unknown, options: { retryDelayMs?: number; permanent?: boolean } = {}): Promise<WorkItem> {
    this.markSettled();
    return this.broker.abandon(this.lease.item.id, this.lease.token, {
      error: errorMessage(error),
      retryDelayMs: options.retryDelayMs ?? 0,
      permanent: options.permanent ?? false,
    });
  }

  private markSettled(): void {
    if (this.settled) {
      throw new Error(`Work item ${this.lease.item.id} was already settled`);
    }
    this.settled = true;
  }
}

/**
 * Background offload queue. Producers enqueue and return; consumers lease
 * items through consume() and settle them.
 */
export class WorkQueue {
  readonly name: string;
  private readonly broker: IMessageBroker;
  private readonly telemetry?: Telemetry;
  private readonly logger: Logger;

  constructor(private readonly options: WorkQueueOptions) {
    this.name = options.name;
    this.broker = options.broker;
    this.telemetry = options.telemetry;
    this.logger = options.logger ?? createLogger({ name: 'work-queue', bindings: { queue: options.name } });
  }

  /**
   * Store the item durably and return its id. Replaying an id that is
   * already stored returns it without creating a second entry.
   */
  async enqueue(request: NewWorkItem): Promise<string> {
    const started = performance.now();
    const maxRetries = request.maxRetries ?? this.options.defaultMaxRetries;
    const leaseTimeoutMs = request.leaseTimeoutMs ?? this.options.defaultLeaseTimeoutMs;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new InvalidQuery('maxRetries must be a non-negative integer', { maxRetries });
    }
    if (!Number.isInteger(leaseTimeoutMs) || leaseTimeoutMs <= 0) {
      throw new InvalidQuery('leaseTimeoutMs must be a positive integer', { leaseTimeoutMs });
    }

    const result = await this.broker.enqueue({
      id: request.id ?? uuidv4(),
      payload: request.payload,
      maxRetries,
      leaseTimeoutMs,
    });
    if (!result.created) {
      this.logger.info({ workItemId: result.id }, 'Duplicate enqueue ignored');
    }
    this.telemetry?.emit('request', {
      operation: 'enqueue',
      durationMs: performance.now() - started,
      roundTrips: 1,
      outcome: 'ok',
    });
    return result.id;
  }

  /**
   * Lease items one at a time until the signal aborts. Each call starts a
   * fresh iteration, so a consumer that crashed can simply call it again.
   */
  async *consume(options: ConsumeOptions = {}): AsyncGenerator<LeasedWorkItem, void, undefined> {
    const { signal } = options;
    while (!signal?.aborted) {
      await this.reclaimExpired();

      const lease = await this.broker.lease();
      if (lease) {
        yield new LeasedWorkItem(this.broker, lease);
        continue;
      }

      await this.idle();
      try {
        await sleep(this.options.pollIntervalMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) return;
        throw error;
      }
    }
  }

  async get(id: string): Promise<WorkItem | null> {
    return this.broker.get(id);
  }

  async listDeadLettered(limit: number = 50): Promise<WorkItem[]> {
    return this.broker.listDeadLettered(limit);
  }

  async requeue(id: string): Promise<WorkItem> {
    const item = await this.broker.requeue(id);
    this.logger.info({ workItemId: id }, 'Dead-lettered work item requeued');
    return item;
  }

  async depth(): Promise<QueueDepth> {
    return this.broker.depth();
  }

  async close(): Promise<void> {
    await this.broker.close();
  }

  private async reclaimExpired(): Promise<void> {
    const reclaimed = await this.broker.reclaimExpired();
    for (const item of reclaimed) {
      const expired = new LeaseExpired(item.id);
      this.logger.warn({ workItemId: item.id, attempts: item.retryCount, state: item.state }, expired.message);
      this.telemetry?.emit('workItem', {
        id: item.id,
        outcome: 'leaseExpired',
        attempt: item.retryCount,
        durationMs: item.leaseTimeoutMs,
      });
    }
  }

  // Housekeeping runs only while there is nothing to lease
  private async idle(): Promise<void> {
    const purged = await this.broker.purgeCompleted(this.options.completedRetentionMs);
    if (purged > 0) {
      this.logger.debug({ purged }, 'Completed work items purged');
    }
    if (this.telemetry) {
      this.telemetry.emit('queueDepth', { queue: this.name, depth: await this.broker.depth() });
    }
  }
}

