import { v4 as uuidv4 } from 'uuid';
import { ResourcePool } from './resource-pool.js';
import { raceAbort, resolveSignal, throwIfAborted } from '../utils/abort.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { AcquireOptions, ResourceDefinition, ResourceDescription, ResourceHandle } from '../types/index.js';

interface RegisteredKind {
  readonly name: string;
  describe(): ResourceDescription;
  shutdown(): Promise<void>;
}

/**
 * A registered resource kind. Holds the single shared handle for thread-safe
 * kinds, or the bounded pool for kinds that are not.
 */
export class ResourceKind<T> implements RegisteredKind {
  private handle: ResourceHandle<T> | null = null;
  // Initialization guard: the one construction every concurrent first caller awaits
  private creation: Promise<ResourceHandle<T>> | null = null;
  private readonly pool: ResourcePool<T> | null;
  private constructions: number = 0;
  private closed: boolean = false;

  constructor(
    readonly definition: ResourceDefinition<T>,
    private readonly logger: Logger
  ) {
    this.pool = definition.threadSafe ? null : new ResourcePool(definition, logger);
  }

  get name(): string {
    return this.definition.kind;
  }

  /** Number of times the shared resource has been constructed. */
  get constructionCount(): number {
    return this.constructions;
  }

  async acquire(options: AcquireOptions = {}): Promise<ResourceHandle<T>> {
    if (this.pool) {
      return this.pool.checkout(options);
    }
    if (this.handle) {
      return this.handle;
    }

    if (!this.creation) {
      throwIfAborted(options.signal, `acquire of ${this.name}`);
      // The guard lives as long as the construction, not the first caller
      this.creation = this.construct().finally(() => {
        this.creation = null;
      });
    }
    return raceAbort(this.creation, options.signal, `acquire of ${this.name}`);
  }

  describe(): ResourceDescription {
    const base = {
      kind: this.definition.kind,
      endpoint: this.definition.endpoint,
      threadSafe: this.definition.threadSafe,
      config: this.definition.config ?? {},
    };
    if (this.pool) {
      const metrics = this.pool.getMetrics();
      return { ...base, initialized: metrics.size > 0, pool: metrics };
    }
    return {
      ...base,
      initialized: this.handle !== null,
      createdAt: this.handle?.createdAt.toISOString(),
    };
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    if (this.pool) {
      await this.pool.shutdown();
      return;
    }
    if (this.creation) {
      // construct() destroys what it finishes building once the kind is closed
      await Promise.allSettled([this.creation]);
    }
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await this.definition.destroy?.(handle.resource);
    }
  }

  private async construct(): Promise<ResourceHandle<T>> {
    this.constructions++;
    const resource = await this.definition.create();
    if (this.closed) {
      await this.definition.destroy?.(resource);
      throw new Error(`Resource kind ${this.name} was shut down during construction`);
    }
    const handle: ResourceHandle<T> = {
      id: uuidv4(),
      kind: this.definition.kind,
      endpoint: this.definition.endpoint,
      config: this.definition.config ?? {},
      createdAt: new Date(),
      threadSafe: true,
      resource,
      release: () => undefined,
      discard: () => undefined,
    };
    this.handle = handle;
    this.logger.info({ kind: handle.kind, endpoint: handle.endpoint, handleId: handle.id }, 'Shared resource created');
    return handle;
  }
}

/**
 * Owns every long-lived client of the process. Callers acquire handles
 * instead of constructing clients per request.
 */
export class ClientRegistry {
  private readonly kinds: Map<string, RegisteredKind> = new Map();
  private readonly logger: Logger;
  private isShutDown: boolean = false;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger({ name: 'client-registry' });
  }

  register<T>(definition: ResourceDefinition<T>): ResourceKind<T> {
    if (this.kinds.has(definition.kind)) {
      throw new Error(`Resource kind ${definition.kind} is already registered`);
    }
    const kind = new ResourceKind(definition, this.logger);
    this.kinds.set(definition.kind, kind);
    return kind;
  }

  async acquire<T>(kind: ResourceKind<T>, options: AcquireOptions = {}): Promise<ResourceHandle<T>> {
    this.assertOwned(kind);
    if (this.isShutDown) {
      throw new Error('Client registry is shut down');
    }
    return kind.acquire(options);
  }

  /**
   * Acquire, run and always release. The callback receives the signal that
   * combines the caller's signal with the timeout. A pooled member whose call
   * is still running when the signal fires is discarded, so a call that never
   * settles cannot hold its slot.
   */
  async withResource<T, R>(
    kind: ResourceKind<T>,
    fn: (resource: T, signal: AbortSignal | undefined) => Promise<R>,
    options: AcquireOptions = {}
  ): Promise<R> {
    const signal = resolveSignal(options.signal, options.timeoutMs);
    const handle = await this.acquire(kind, { signal });
    const task = fn(handle.resource, signal);
    let settled = false;
    const settle = (): void => {
      settled = true;
      handle.release();
    };
    void task.then(settle, settle);

    try {
      return await raceAbort(task, signal, `call on ${kind.name}`);
    } catch (error) {
      if (!settled && signal?.aborted) {
        handle.discard();
      }
      throw error;
    }
  }

  has(kindName: string): boolean {
    return this.kinds.has(kindName);
  }

  describe(): ResourceDescription[] {
    return Array.from(this.kinds.values(), (kind) => kind.describe());
  }

  async shutdown(): Promise<void> {
    this.isShutDown = true;
    for (const [name, kind] of this.kinds) {
      try {
        await kind.shutdown();
        this.logger.info({ kind: name }, 'Resource shut down');
      } catch (error) {
        this.logger.error({ err: error, kind: name }, 'Error shutting down resource');
      }
    }
  }

  private assertOwned<T>(kind: ResourceKind<T>): void {
    if (this.kinds.get(kind.name) !== kind) {
      throw new Error(`Resource kind ${kind.name} is not registered with this registry`);
    }
  }
}
