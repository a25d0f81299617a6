// Core Types

// Registry Types
export interface ResourceHandle<T> {
  id: string;
  kind: string;
  endpoint: string;
  config: Readonly<Record<string, unknown>>;
  createdAt: Date;
  threadSafe: boolean;
  resource: T;
  /** Returns a pooled handle to its pool. Shared handles ignore it. */
  release(): void;
  /** Destroys a pooled member whose call was abandoned and frees its slot. Shared handles ignore it. */
  discard(): void;
}

export interface PoolLimits {
  maxSize: number;
  acquireTimeoutMs: number;
}

export interface ResourceDefinition<T> {
  kind: string;
  endpoint: string;
  threadSafe: boolean;
  config?: Record<string, unknown>;
  /** Required when threadSafe is false */
  pool?: PoolLimits;
  create(): Promise<T> | T;
  destroy?(resource: T): Promise<void> | void;
}

export interface AcquireOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ResourceDescription {
  kind: string;
  endpoint: string;
  threadSafe: boolean;
  config: Readonly<Record<string, unknown>>;
  initialized: boolean;
  createdAt?: string;
  pool?: {
    size: number;
    idle: number;
    inUse: number;
    waiting: number;
    maxSize: number;
    timeouts: number;
  };
}

// Schema Types
export type FieldType = 'string' | 'number' | 'boolean' | 'date';

export interface RelationSchema {
  name: string;
  target: string;
  /**
   * hasMany: the target row carries foreignKey pointing at this entity's primary key.
   * belongsTo: this entity carries foreignKey pointing at the target's primary key.
   */
  kind: 'hasMany' | 'belongsTo';
  foreignKey: string;
}

export interface EntitySchema {
  name: string;
  table: string;
  primaryKey: string;
  fields: Record<string, FieldType>;
  relations?: RelationSchema[];
}

// Query Types
export type ComparisonOperator = 'eq' | 'neq' | 'gt' | 'gte' | 'lt' | 'lte' | 'in' | 'like' | 'isNull';
export type ScalarFunction = 'lower' | 'upper' | 'length' | 'year' | 'month' | 'daysSince';
export type AggregateFunction = 'count' | 'sum' | 'avg' | 'min' | 'max';
export type Scalar = string | number | boolean | null;

export interface ComparisonPredicate {
  kind: 'compare';
  field: string;
  fn?: ScalarFunction;
  op: ComparisonOperator;
  value?: Scalar | Scalar[];
}

export interface AndPredicate {
  kind: 'and';
  clauses: Predicate[];
}

export interface OrPredicate {
  kind: 'or';
  clauses: Predicate[];
}

export interface NotPredicate {
  kind: 'not';
  clause: Predicate;
}

export type Predicate = ComparisonPredicate | AndPredicate | OrPredicate | NotPredicate;

export interface OrderBy {
  field: string;
  direction?: 'asc' | 'desc';
}

export interface IncludeQuery {
  relation: string;
  fields: string[];
  where?: Predicate;
  orderBy?: OrderBy[];
  include?: IncludeQuery[];
}

export interface EntityQuery {
  entity: string;
  fields: string[];
  where?: Predicate;
  orderBy?: OrderBy[];
  limit?: number;
  offset?: number;
  include?: IncludeQuery[];
}

export type AggregateQuery = Pick<EntityQuery, 'entity' | 'where'>;

export interface AggregateOp {
  fn: AggregateFunction;
  field?: string;
}

export type Row = Record<string, unknown>;

export interface EntityGraph {
  entity: string;
  rows: Row[];
  roundTrips: number;
}

export interface ProjectedRows {
  entity: string;
  fields: string[];
  rows: Row[];
}

export interface QueryOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

// Work Queue Types
export type WorkItemState = 'Pending' | 'Leased' | 'Completed' | 'Abandoned' | 'DeadLettered';

export interface WorkItem<TPayload = unknown> {
  id: string;
  payload: TPayload;
  state: WorkItemState;
  enqueuedAt: string;
  retryCount: number;
  maxRetries: number;
  leaseTimeoutMs: number;
  availableAt: string;
  leasedUntil?: string;
  lastError?: string;
  completedAt?: string;
  deadLetteredAt?: string;
}

export interface NewWorkItem<TPayload = unknown> {
  id?: string;
  payload: TPayload;
  maxRetries?: number;
  leaseTimeoutMs?: number;
}

export type QueueDepth = Record<WorkItemState, number>;
