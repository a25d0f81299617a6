import { EventEmitter } from 'node:events';
import type { QueueDepth } from '../types/index.js';

export interface RequestEvent {
  operation: 'fetch' | 'project' | 'aggregate' | 'enqueue';
  entity?: string;
  durationMs: number;
  roundTrips: number;
  outcome: 'ok' | 'error';
  errorCode?: string;
}

export interface RoundTripEvent {
  store: string;
  kind: 'select' | 'composite' | 'aggregate';
  entity: string;
  durationMs: number;
  rows: number;
}

export interface QueueDepthEvent {
  queue: string;
  depth: QueueDepth;
}

export interface WorkItemEvent {
  id: string;
  jobType?: string;
  outcome: 'acked' | 'abandoned' | 'deadLettered' | 'leaseExpired';
  attempt: number;
  durationMs: number;
}

export interface TelemetryEvents {
  request: RequestEvent;
  roundTrip: RoundTripEvent;
  queueDepth: QueueDepthEvent;
  workItem: WorkItemEvent;
}

export type TelemetryEventName = keyof TelemetryEvents;

/**
 * Typed event bus for performance signals. Emitting never throws into the
 * caller; listener failures are reported through `onListenerError`.
 */
export class Telemetry {
  private readonly emitter = new EventEmitter();

  constructor(private readonly onListenerError: (error: unknown, event: TelemetryEventName) => void = () => undefined) {
    this.emitter.setMaxListeners(50);
  }

  on<K extends TelemetryEventName>(event: K, listener: (payload: TelemetryEvents[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<K extends TelemetryEventName>(event: K, payload: TelemetryEvents[K]): void {
    try {
      this.emitter.emit(event, payload);
    } catch (error) {
      this.onListenerError(error, event);
    }
  }

  /** Time an async call and emit a roundTrip event for it. */
  async measureRoundTrip<T>(
    base: Omit<RoundTripEvent, 'durationMs' | 'rows'>,
    call: () => Promise<T>,
    countRows: (result: T) => number
  ): Promise<T> {
    const started = performance.now();
    const result = await call();
    this.emit('roundTrip', { ...base, durationMs: performance.now() - started, rows: countRows(result) });
    return result;
  }
}

interface OperationStats {
  count: number;
  errors: number;
  totalDurationMs: number;
  maxDurationMs: number;
  totalRoundTrips: number;
  maxRoundTrips: number;
}

export interface MetricsSnapshot {
  since: string;
  requests: Record<string, OperationStats & { averageDurationMs: number; averageRoundTrips: number }>;
  roundTrips: Record<string, number>;
  workItems: Record<WorkItemEvent['outcome'], number>;
  queueDepth: Record<string, QueueDepth>;
}

/**
 * Aggregates telemetry events in process; exposed at /metrics.
 */
export class MetricsCollector {
  private readonly requests: Map<string, OperationStats> = new Map();
  private readonly roundTrips: Map<string, number> = new Map();
  private readonly workItems: Record<WorkItemEvent['outcome'], number> = {
    acked: 0,
    abandoned: 0,
    deadLettered: 0,
    leaseExpired: 0,
  };
  private readonly queueDepth: Map<string, QueueDepth> = new Map();
  private readonly unsubscribers: Array<() => void> = [];
  private readonly since = new Date();

  constructor(telemetry: Telemetry) {
    this.unsubscribers.push(
      telemetry.on('request', (event) => this.recordRequest(event)),
      telemetry.on('roundTrip', (event) => {
        const key = `${event.store}.${event.kind}`;
        this.roundTrips.set(key, (this.roundTrips.get(key) ?? 0) + 1);
      }),
      telemetry.on('workItem', (event) => {
        this.workItems[event.outcome]++;
      }),
      telemetry.on('queueDepth', (event) => {
        this.queueDepth.set(event.queue, event.depth);
      })
    );
  }

  snapshot(): MetricsSnapshot {
    const requests: MetricsSnapshot['requests'] = {};
    for (const [operation, stats] of this.requests) {
      requests[operation] = {
        ...stats,
        averageDurationMs: stats.count > 0 ? stats.totalDurationMs / stats.count : 0,
        averageRoundTrips: stats.count > 0 ? stats.totalRoundTrips / stats.count : 0,
      };
    }
    return {
      since: this.since.toISOString(),
      requests,
      roundTrips: Object.fromEntries(this.roundTrips),
      workItems: { ...this.workItems },
      queueDepth: Object.fromEntries(this.queueDepth),
    };
  }

  /** Error rate over all recorded requests */
  errorRate(): number {
    let total = 0;
    let errors = 0;
    for (const stats of this.requests.values()) {
      total += stats.count;
      errors += stats.errors;
    }
    return total > 0 ? errors / total : 0;
  }

  dispose(): void {
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers.length = 0;
  }

  private recordRequest(event: RequestEvent): void {
    const key = event.entity ? `${event.operation}:${event.entity}` : event.operation;
    const stats = this.requests.get(key) ?? {
      count: 0,
      errors: 0,
      totalDurationMs: 0,
      maxDurationMs: 0,
      totalRoundTrips: 0,
      maxRoundTrips: 0,
    };
    stats.count++;
    if (event.outcome === 'error') stats.errors++;
    stats.totalDurationMs += event.durationMs;
    stats.maxDurationMs = Math.max(stats.maxDurationMs, event.durationMs);
    stats.totalRoundTrips += event.roundTrips;
    stats.maxRoundTrips = Math.max(stats.maxRoundTrips, event.roundTrips);
    this.requests.set(key, stats);
  }
}
