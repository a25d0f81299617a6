import { v4 as uuidv4 } from 'uuid';
import { ResourceExhausted } from '../errors/index.js';
import { cancellationFor, throwIfAborted } from '../utils/abort.js';
import type { Logger } from '../utils/logger.js';
import type { AcquireOptions, ResourceDefinition, ResourceHandle } from '../types/index.js';

interface PoolMember<T> {
  id: string;
  resource: T;
  createdAt: Date;
}

interface Waiter<T> {
  resolve: (member: PoolMember<T>) => void;
  reject: (error: unknown) => void;
  cleanup: () => void;
}

export interface PoolMetrics {
  size: number;
  idle: number;
  inUse: number;
  waiting: number;
  maxSize: number;
  timeouts: number;
}

/**
 * Bounded checkout/checkin pool for resources that must not be shared
 * between concurrent callers. Waiting is bounded by the acquire timeout.
 */
export class ResourcePool<T> {
  private readonly idle: PoolMember<T>[] = [];
  private readonly inUse: Set<PoolMember<T>> = new Set();
  private readonly waiters: Waiter<T>[] = [];
  private pendingCreations: number = 0;
  private timeouts: number = 0;
  private closed: boolean = false;
  private readonly maxSize: number;
  private readonly acquireTimeoutMs: number;

  constructor(
    private readonly definition: ResourceDefinition<T>,
    private readonly logger: Logger
  ) {
    if (!definition.pool) {
      throw new Error(`Resource kind ${definition.kind} is not concurrency-safe and needs pool limits`);
    }
    if (definition.pool.maxSize < 1) {
      throw new Error(`Pool for ${definition.kind} needs maxSize >= 1`);
    }
    this.maxSize = definition.pool.maxSize;
    this.acquireTimeoutMs = definition.pool.acquireTimeoutMs;
  }

  async checkout(options: AcquireOptions = {}): Promise<ResourceHandle<T>> {
    if (this.closed) {
      throw new Error(`Pool for ${this.definition.kind} is shut down`);
    }
    throwIfAborted(options.signal, `checkout of ${this.definition.kind}`);

    const member = await this.obtain(options);
    return this.toHandle(member);
  }

  getMetrics(): PoolMetrics {
    return {
      size: this.idle.length + this.inUse.size,
      idle: this.idle.length,
      inUse: this.inUse.size,
      waiting: this.waiters.length,
      maxSize: this.maxSize,
      timeouts: this.timeouts,
    };
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.cleanup();
      waiter.reject(new Error(`Pool for ${this.definition.kind} is shutting down`));
    }

    const members = [...this.idle.splice(0), ...this.inUse];
    this.inUse.clear();
    for (const member of members) {
      await this.destroy(member);
    }
  }

  private async obtain(options: AcquireOptions): Promise<PoolMember<T>> {
    const idle = this.idle.pop();
    if (idle) {
      this.inUse.add(idle);
      return idle;
    }

    if (this.idle.length + this.inUse.size + this.pendingCreations < this.maxSize) {
      return this.createMember();
    }

    return this.waitForMember(options);
  }

  /** Creates a member that is already counted as in use. */
  private async createMember(): Promise<PoolMember<T>> {
    this.pendingCreations++;
    let resource: T;
    try {
      resource = await this.definition.create();
    } catch (error) {
      this.pendingCreations--;
      // The reserved slot is free again and a queued caller may take it
      this.fillFreeSlot();
      throw error;
    }
    this.pendingCreations--;

    const member: PoolMember<T> = { id: uuidv4(), resource, createdAt: new Date() };
    if (this.closed) {
      await this.destroy(member);
      throw new Error(`Pool for ${this.definition.kind} was shut down during checkout`);
    }
    this.inUse.add(member);
    this.logger.debug({ kind: this.definition.kind, memberId: member.id }, 'Pool member created');
    return member;
  }

  /** Starts a creation for the longest-waiting caller when a slot has no member. */
  private fillFreeSlot(): void {
    if (this.closed || this.idle.length + this.inUse.size + this.pendingCreations >= this.maxSize) return;
    const waiter = this.waiters.shift();
    if (!waiter) return;
    waiter.cleanup();
    void this.createMember().then(waiter.resolve, waiter.reject);
  }

  private waitForMember(options: AcquireOptions): Promise<PoolMember<T>> {
    const timeoutMs = options.timeoutMs ?? this.acquireTimeoutMs;
    const { signal } = options;

    return new Promise<PoolMember<T>>((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      const timer = setTimeout(() => {
        this.removeWaiter(waiter);
        this.timeouts++;
        this.logger.warn({ kind: this.definition.kind, timeoutMs }, 'Pool checkout timed out');
        reject(new ResourceExhausted(this.definition.kind, timeoutMs));
      }, timeoutMs);

      const onAbort = (): void => {
        this.removeWaiter(waiter);
        clearTimeout(timer);
        if (signal) reject(cancellationFor(signal, `checkout of ${this.definition.kind}`));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiters.push(waiter);
    });
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) this.waiters.splice(index, 1);
  }

  private checkin(member: PoolMember<T>): void {
    if (!this.inUse.delete(member)) return; // already released

    if (this.closed) {
      void this.destroy(member);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      this.inUse.add(member);
      waiter.resolve(member);
      return;
    }
    this.idle.push(member);
  }

  private discard(member: PoolMember<T>): void {
    if (!this.inUse.delete(member)) return;
    this.logger.warn({ kind: this.definition.kind, memberId: member.id }, 'Pool member discarded after an abandoned call');
    void this.destroy(member);
    this.fillFreeSlot();
  }

  private toHandle(member: PoolMember<T>): ResourceHandle<T> {
    return {
      id: member.id,
      kind: this.definition.kind,
      endpoint: this.definition.endpoint,
      config: this.definition.config ?? {},
      createdAt: member.createdAt,
      threadSafe: false,
      resource: member.resource,
      release: () => this.checkin(member),
      discard: () => this.discard(member),
    };
  }

  private async destroy(member: PoolMember<T>): Promise<void> {
    try {
      await this.definition.destroy?.(member.resource);
    } catch (error) {
      this.logger.error({ err: error, kind: this.definition.kind, memberId: member.id }, 'Failed to destroy pool member');
    }
  }
}
