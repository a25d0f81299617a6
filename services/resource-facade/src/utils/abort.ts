import { OperationCancelled } from '../errors/index.js';

/**
 * Combine a caller signal and a timeout into one signal.
 * Returns undefined when neither is given.
 */
export function resolveSignal(signal?: AbortSignal, timeoutMs?: number): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  if (timeoutMs !== undefined && timeoutMs > 0) signals.push(AbortSignal.timeout(timeoutMs));
  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}

export function cancellationFor(signal: AbortSignal, operation: string): OperationCancelled {
  const reason: unknown = signal.reason;
  const timedOut = reason instanceof Error && reason.name === 'TimeoutError';
  return new OperationCancelled(timedOut ? 'timeout' : 'aborted', operation);
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) throw cancellationFor(signal, operation);
}

/**
 * Settle with the task, or reject with OperationCancelled as soon as the signal fires.
 * The task itself keeps running; callers decide what happens to the resource it holds.
 */
export function raceAbort<T>(task: Promise<T>, signal: AbortSignal | undefined, operation: string): Promise<T> {
  if (!signal) return task;
  throwIfAborted(signal, operation);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancellationFor(signal, operation));
    signal.addEventListener('abort', onAbort, { once: true });
    void task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
