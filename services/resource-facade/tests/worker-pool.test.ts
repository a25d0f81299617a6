import { setTimeout as sleep } from 'node:timers/promises';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WorkerPool, isPermanentFailure, retryDelay, type WorkHandler } from '../src/queue/worker-pool.js';
import { WorkQueue } from '../src/queue/work-queue.js';
import { InMemoryBroker } from '../src/queue/in-memory-broker.js';
import { Telemetry, type WorkItemEvent } from '../src/monitoring/telemetry.js';
import { DeliveryRejected, InvalidQuery, ResourceExhausted } from '../src/errors/index.js';
import { silentLogger } from './helpers.js';
import type { WorkItem } from '../src/types/index.js';

async function waitFor(check: () => Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await sleep(5);
  }
}

describe('retry policy', () => {
  it('should back off exponentially up to the cap', () => {
    const policy = { baseDelayMs: 100, maxDelayMs: 1000 };
    expect([1, 2, 3, 4, 5].map((attempt) => retryDelay(attempt, policy))).toEqual([100, 200, 400, 800, 1000]);
  });

  it('should treat non-retryable facade errors as permanent', () => {
    expect(isPermanentFailure(new InvalidQuery('bad payload'))).toBe(true);
    expect(isPermanentFailure(new DeliveryRejected('http://hooks.test/a', 410))).toBe(true);
    expect(isPermanentFailure(new ResourceExhausted('postgres', 2000))).toBe(false);
    expect(isPermanentFailure(new Error('socket hang up'))).toBe(false);
  });
});

describe('WorkerPool', () => {
  let queue: WorkQueue;
  let telemetry: Telemetry;
  let events: WorkItemEvent[];
  let pool: WorkerPool | undefined;

  beforeEach(() => {
    telemetry = new Telemetry();
    events = [];
    telemetry.on('workItem', (event) => events.push(event));
    queue = new WorkQueue({
      broker: new InMemoryBroker(),
      name: 'test',
      defaultMaxRetries: 3,
      defaultLeaseTimeoutMs: 1000,
      pollIntervalMs: 5,
      completedRetentionMs: 60_000,
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    await pool?.stop();
    pool = undefined;
  });

  function startPool(handler: WorkHandler, concurrency = 1): WorkerPool {
    pool = new WorkerPool({
      queue,
      handler,
      concurrency,
      retry: { baseDelayMs: 1, maxDelayMs: 10 },
      telemetry,
      logger: silentLogger,
    });
    pool.start();
    return pool;
  }

  async function stateOf(id: string): Promise<WorkItem['state'] | undefined> {
    return (await queue.get(id))?.state;
  }

  it('should process and acknowledge enqueued work', async () => {
    const seen: unknown[] = [];
    startPool(async (item) => {
      seen.push(item.payload);
    });

    const id = await queue.enqueue({ payload: { type: 'report.aggregate' } });
    await waitFor(async () => (await stateOf(id)) === 'Completed');

    expect(seen).toEqual([{ type: 'report.aggregate' }]);
    expect(events.map((event) => [event.outcome, event.attempt, event.jobType])).toEqual([
      ['acked', 1, 'report.aggregate'],
    ]);
  });

  it('should retry a failing handler until it succeeds', async () => {
    let calls = 0;
    startPool(async () => {
      calls++;
      if (calls < 3) throw new Error(`attempt ${calls} failed`);
    });

    const id = await queue.enqueue({ payload: {} });
    await waitFor(async () => (await stateOf(id)) === 'Completed');

    expect(calls).toBe(3);
    expect((await queue.get(id))?.retryCount).toBe(2);
    expect(events.map((event) => event.outcome)).toEqual(['abandoned', 'abandoned', 'acked']);
  });

  it('should dead-letter a permanent failure without retrying', async () => {
    let calls = 0;
    startPool(async () => {
      calls++;
      throw new InvalidQuery('No job registered for type missing');
    });

    const id = await queue.enqueue({ payload: { type: 'missing' } });
    await waitFor(async () => (await stateOf(id)) === 'DeadLettered');

    expect(calls).toBe(1);
    expect(await queue.get(id)).toMatchObject({ retryCount: 1, lastError: 'No job registered for type missing' });
    expect(events.map((event) => event.outcome)).toEqual(['deadLettered']);
  });

  it('should dead-letter after the retry budget is spent', async () => {
    startPool(async () => {
      throw new Error('downstream unavailable');
    });

    const id = await queue.enqueue({ payload: {}, maxRetries: 1 });
    await waitFor(async () => (await stateOf(id)) === 'DeadLettered');

    expect((await queue.get(id))?.retryCount).toBe(2);
    expect(events.map((event) => event.outcome)).toEqual(['abandoned', 'deadLettered']);
  });

  it('should count a handler that outlives its lease as a failed attempt', async () => {
    startPool(async () => {
      await sleep(60);
    });

    const id = await queue.enqueue({ payload: {}, maxRetries: 0, leaseTimeoutMs: 20 });
    await waitFor(async () => (await stateOf(id)) === 'DeadLettered');

    expect(await queue.get(id)).toMatchObject({ retryCount: 1, lastError: 'lease expired' });
    expect(events.map((event) => event.outcome)).toEqual(['leaseExpired']);
  });

  it('should signal the handler when the lease runs out', async () => {
    let aborted = false;
    startPool(async (_item, signal) => {
      await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
      aborted = signal.aborted;
      throw new Error('gave up');
    });

    const id = await queue.enqueue({ payload: {}, maxRetries: 0, leaseTimeoutMs: 20 });
    await waitFor(async () => (await stateOf(id)) === 'DeadLettered');

    expect(aborted).toBe(true);
  });

  it('should let in-flight work finish on stop', async () => {
    const running = startPool(async () => {
      await sleep(50);
    });
    const id = await queue.enqueue({ payload: {} });
    await waitFor(async () => running.getStatus().inFlight === 1);

    await running.stop();

    expect(await stateOf(id)).toBe('Completed');
    expect(running.getStatus()).toEqual({ running: false, concurrency: 1, inFlight: 0, processed: 1 });
  });

  it('should process items concurrently', async () => {
    let active = 0;
    let peak = 0;
    startPool(async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(30);
      active--;
    }, 3);

    const ids = await Promise.all([1, 2, 3].map((n) => queue.enqueue({ id: `item-${n}`, payload: {} })));
    await waitFor(async () => {
      const states = await Promise.all(ids.map((id) => stateOf(id)));
      return states.every((state) => state === 'Completed');
    });

    expect(peak).toBe(3);
  });
});
