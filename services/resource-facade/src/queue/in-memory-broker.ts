import { v4 as uuidv4 } from 'uuid';
import { InvalidQuery, LeaseExpired, NotFound } from '../errors/index.js';
import { emptyDepth, type AbandonOptions, type BrokerEnqueue, type EnqueueResult, type IMessageBroker, type Lease } from './broker.js';
import type { QueueDepth, WorkItem } from '../types/index.js';

interface StoredItem {
  item: WorkItem;
  /** Enqueue order, breaks ties between items available at the same time */
  sequence: number;
  token?: string;
}

/**
 * In-memory broker (dev/local use and tests). State lives only as long as
 * the process; the clock is injectable so lease expiry can be driven.
 */
export class InMemoryBroker implements IMessageBroker {
  readonly name = 'memory';
  private readonly items: Map<string, StoredItem> = new Map();
  private sequence: number = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async enqueue(request: BrokerEnqueue): Promise<EnqueueResult> {
    if (this.items.has(request.id)) {
      return { id: request.id, created: false };
    }
    const timestamp = this.isoNow();
    this.items.set(request.id, {
      sequence: this.sequence++,
      item: {
        id: request.id,
        payload: structuredClone(request.payload),
        state: 'Pending',
        enqueuedAt: timestamp,
        retryCount: 0,
        maxRetries: request.maxRetries,
        leaseTimeoutMs: request.leaseTimeoutMs,
        availableAt: timestamp,
      },
    });
    return { id: request.id, created: true };
  }

  async lease(): Promise<Lease | null> {
    const now = this.now();
    let next: StoredItem | undefined;
    for (const stored of this.items.values()) {
      const { state, availableAt } = stored.item;
      if ((state !== 'Pending' && state !== 'Abandoned') || Date.parse(availableAt) > now) continue;
      if (!next || compareAvailability(stored, next) < 0) next = stored;
    }
    if (!next) return null;

    const token = uuidv4();
    next.token = token;
    next.item = {
      ...next.item,
      state: 'Leased',
      leasedUntil: new Date(now + next.item.leaseTimeoutMs).toISOString(),
    };
    return { item: snapshot(next.item), token };
  }

  async ack(id: string, token: string): Promise<WorkItem> {
    const stored = this.requireLease(id, token);
    stored.token = undefined;
    stored.item = {
      ...withoutLease(stored.item),
      state: 'Completed',
      completedAt: this.isoNow(),
    };
    return snapshot(stored.item);
  }

  async abandon(id: string, token: string, options: AbandonOptions): Promise<WorkItem> {
    const stored = this.requireLease(id, token);
    stored.token = undefined;
    this.fail(stored, options.error, options.permanent, this.now() + options.retryDelayMs, 'Abandoned');
    return snapshot(stored.item);
  }

  async reclaimExpired(): Promise<WorkItem[]> {
    const now = this.now();
    const reclaimed: WorkItem[] = [];
    for (const stored of this.items.values()) {
      if (stored.item.state !== 'Leased' || !isExpired(stored.item, now)) continue;
      stored.token = undefined;
      this.fail(stored, 'lease expired', false, now, 'Pending');
      reclaimed.push(snapshot(stored.item));
    }
    return reclaimed;
  }

  async purgeCompleted(olderThanMs: number): Promise<number> {
    const cutoff = this.now() - olderThanMs;
    let purged = 0;
    for (const [id, stored] of this.items) {
      const { state, completedAt } = stored.item;
      if (state === 'Completed' && completedAt && Date.parse(completedAt) <= cutoff) {
        this.items.delete(id);
        purged++;
      }
    }
    return purged;
  }

  async get(id: string): Promise<WorkItem | null> {
    const stored = this.items.get(id);
    return stored ? snapshot(stored.item) : null;
  }

  async listDeadLettered(limit: number): Promise<WorkItem[]> {
    return Array.from(this.items.values())
      .filter((stored) => stored.item.state === 'DeadLettered')
      .sort((a, b) => (a.item.deadLetteredAt ?? '').localeCompare(b.item.deadLetteredAt ?? ''))
      .slice(0, limit)
      .map((stored) => snapshot(stored.item));
  }

  async requeue(id: string): Promise<WorkItem> {
    const stored = this.items.get(id);
    if (!stored) {
      throw new NotFound(`Work item ${id} not found`, { id });
    }
    if (stored.item.state !== 'DeadLettered') {
      throw new InvalidQuery(`Work item ${id} is ${stored.item.state}, only dead-lettered items can be requeued`, {
        id,
        state: stored.item.state,
      });
    }
    const { deadLetteredAt: _deadLetteredAt, ...rest } = stored.item;
    stored.item = { ...rest, state: 'Pending', retryCount: 0, availableAt: this.isoNow() };
    return snapshot(stored.item);
  }

  async depth(): Promise<QueueDepth> {
    const depth = emptyDepth();
    for (const stored of this.items.values()) {
      depth[stored.item.state]++;
    }
    return depth;
  }

  async close(): Promise<void> {
    this.items.clear();
  }

  private requireLease(id: string, token: string): StoredItem {
    const stored = this.items.get(id);
    if (!stored || stored.item.state !== 'Leased' || stored.token !== token || isExpired(stored.item, this.now())) {
      throw new LeaseExpired(id);
    }
    return stored;
  }

  /** Count a failed attempt; dead-letter once the retry budget is spent. */
  private fail(
    stored: StoredItem,
    error: string,
    permanent: boolean,
    availableAt: number,
    retryState: 'Pending' | 'Abandoned'
  ): void {
    const retryCount = stored.item.retryCount + 1;
    const base = { ...withoutLease(stored.item), retryCount, lastError: error };
    if (permanent || retryCount > stored.item.maxRetries) {
      stored.item = { ...base, state: 'DeadLettered', deadLetteredAt: this.isoNow() };
      return;
    }
    stored.item = { ...base, state: retryState, availableAt: new Date(availableAt).toISOString() };
  }

  private isoNow(): string {
    return new Date(this.now()).toISOString();
  }
}

function isExpired(item: WorkItem, now: number): boolean {
  return item.leasedUntil !== undefined && Date.parse(item.leasedUntil) <= now;
}

function withoutLease(item: WorkItem): WorkItem {
  const { leasedUntil: _leasedUntil, ...rest } = item;
  return rest;
}

function compareAvailability(a: StoredItem, b: StoredItem): number {
  const byTime = Date.parse(a.item.availableAt) - Date.parse(b.item.availableAt);
  return byTime !== 0 ? byTime : a.sequence - b.sequence;
}

function snapshot(item: WorkItem): WorkItem {
  return structuredClone(item);
}
