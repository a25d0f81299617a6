import type { QueueDepth, WorkItem, WorkItemState } from '../types/index.js';

export interface BrokerEnqueue {
  id: string;
  payload: unknown;
  maxRetries: number;
  leaseTimeoutMs: number;
}

export interface EnqueueResult {
  id: string;
  /** False when an item with this id was already stored */
  created: boolean;
}

export interface Lease {
  item: WorkItem;
  /** Identifies this lease; ack and abandon with an older token are refused */
  token: string;
}

export interface AbandonOptions {
  error: string;
  retryDelayMs: number;
  /** Dead-letter immediately regardless of the retry budget */
  permanent: boolean;
}

/**
 * Message broker contract - durable storage and atomic state transitions
 * for work items. Ack and abandon throw LeaseExpired for a stale lease.
 */
export interface IMessageBroker {
  readonly name: string;
  enqueue(item: BrokerEnqueue): Promise<EnqueueResult>;
  lease(): Promise<Lease | null>;
  ack(id: string, token: string): Promise<WorkItem>;
  abandon(id: string, token: string, options: AbandonOptions): Promise<WorkItem>;
  /** Return expired leases to Pending (or dead-letter them); returns the affected items */
  reclaimExpired(): Promise<WorkItem[]>;
  /** Drop completed items older than the cutoff; returns how many were dropped */
  purgeCompleted(olderThanMs: number): Promise<number>;

  get(id: string): Promise<WorkItem | null>;
  listDeadLettered(limit: number): Promise<WorkItem[]>;
  requeue(id: string): Promise<WorkItem>;
  depth(): Promise<QueueDepth>;
  close(): Promise<void>;
}

export const WORK_ITEM_STATES: readonly WorkItemState[] = ['Pending', 'Leased', 'Completed', 'Abandoned', 'DeadLettered'];

export function emptyDepth(): QueueDepth {
  return { Pending: 0, Leased: 0, Completed: 0, Abandoned: 0, DeadLettered: 0 };
}

export function isWorkItemState(value: unknown): value is WorkItemState {
  return WORK_ITEM_STATES.some((state) => state === value);
}
