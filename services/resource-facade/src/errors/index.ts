export type FacadeErrorCode =
  | 'RESOURCE_EXHAUSTED'
  | 'UNSUPPORTED_PUSHDOWN'
  | 'INVALID_QUERY'
  | 'NOT_FOUND'
  | 'OPERATION_CANCELLED'
  | 'LEASE_EXPIRED'
  | 'DEAD_LETTERED'
  | 'DELIVERY_REJECTED';

export abstract class FacadeError extends Error {
  abstract readonly code: FacadeErrorCode;
  abstract readonly statusCode: number;
  /** Whether the queue layer may retry work that failed with this error */
  abstract readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/**
 * Pool or connection limit reached. Surfaced to the caller, never retried
 * outside the queue layer.
 */
export class ResourceExhausted extends FacadeError {
  readonly code = 'RESOURCE_EXHAUSTED';
  readonly statusCode = 503;
  readonly retryable = true;

  constructor(readonly kind: string, readonly waitedMs: number) {
    super(`No ${kind} handle became available within ${waitedMs}ms`, { kind, waitedMs });
  }
}

/**
 * The store cannot evaluate a predicate, function or aggregate natively.
 * The caller has to restructure the query.
 */
export class UnsupportedPushdown extends FacadeError {
  readonly code = 'UNSUPPORTED_PUSHDOWN';
  readonly statusCode = 422;
  readonly retryable = false;

  constructor(readonly store: string, readonly construct: string) {
    super(`Store "${store}" cannot evaluate ${construct}; restructure the query into a pushdown-compatible form`, {
      store,
      construct,
    });
  }
}

export class InvalidQuery extends FacadeError {
  readonly code = 'INVALID_QUERY';
  readonly statusCode = 400;
  readonly retryable = false;
}

export class NotFound extends FacadeError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
  readonly retryable = false;
}

export class OperationCancelled extends FacadeError {
  readonly code = 'OPERATION_CANCELLED';
  readonly retryable = true;
  readonly statusCode: number;

  constructor(readonly reason: 'aborted' | 'timeout', operation: string) {
    super(reason === 'timeout' ? `${operation} timed out` : `${operation} was cancelled`, { reason });
    this.statusCode = reason === 'timeout' ? 504 : 499;
  }
}

/** Internal: an ack or abandon arrived after the lease was lost. */
export class LeaseExpired extends FacadeError {
  readonly code = 'LEASE_EXPIRED';
  readonly statusCode = 409;
  readonly retryable = false;

  constructor(readonly workItemId: string) {
    super(`Lease on work item ${workItemId} expired before it was settled`, { workItemId });
  }
}

/** Terminal; reported through the dead-letter inspection interface. */
export class DeadLettered extends FacadeError {
  readonly code = 'DEAD_LETTERED';
  readonly statusCode = 409;
  readonly retryable = false;

  constructor(readonly workItemId: string, readonly attempts: number) {
    super(`Work item ${workItemId} was dead-lettered after ${attempts} attempts`, { workItemId, attempts });
  }
}

/** A downstream service refused a delivery; repeating it will not help. */
export class DeliveryRejected extends FacadeError {
  readonly code = 'DELIVERY_REJECTED';
  readonly statusCode = 502;
  readonly retryable = false;

  constructor(readonly target: string, readonly status: number) {
    super(`Delivery to ${target} was rejected with status ${status}`, { target, status });
  }
}

export function isFacadeError(error: unknown): error is FacadeError {
  return error instanceof FacadeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
