import { describe, it, expect, beforeEach } from 'vitest';
import { WorkQueue, type LeasedWorkItem } from '../src/queue/work-queue.js';
import { InMemoryBroker } from '../src/queue/in-memory-broker.js';
import { InvalidQuery, LeaseExpired, NotFound } from '../src/errors/index.js';
import { silentLogger } from './helpers.js';

const START = Date.parse('2025-06-01T12:00:00.000Z');

/** Lease one item, or undefined when nothing becomes available within 50ms. */
async function takeOne(queue: WorkQueue): Promise<LeasedWorkItem | undefined> {
  const controller = new AbortController();
  const iterator = queue.consume({ signal: controller.signal });
  const timer = setTimeout(() => controller.abort(), 50);
  try {
    const result = await iterator.next();
    return result.done ? undefined : result.value;
  } finally {
    clearTimeout(timer);
    await iterator.return(undefined);
  }
}

async function takeRequired(queue: WorkQueue): Promise<LeasedWorkItem> {
  const leased = await takeOne(queue);
  if (!leased) throw new Error('expected a work item to be available');
  return leased;
}

describe('WorkQueue', () => {
  let clock: number;
  let broker: InMemoryBroker;
  let queue: WorkQueue;

  beforeEach(() => {
    clock = START;
    broker = new InMemoryBroker(() => clock);
    queue = new WorkQueue({
      broker,
      name: 'test',
      defaultMaxRetries: 2,
      defaultLeaseTimeoutMs: 1000,
      pollIntervalMs: 5,
      completedRetentionMs: 60_000,
      logger: silentLogger,
    });
  });

  // --------------------------------------------------------------------------
  // Enqueue
  // --------------------------------------------------------------------------
  describe('enqueue', () => {
    it('should store the item as pending and return its id', async () => {
      const id = await queue.enqueue({ payload: { type: 'report.aggregate', data: { entity: 'orders' } } });

      const item = await queue.get(id);
      expect(item).toEqual({
        id,
        payload: { type: 'report.aggregate', data: { entity: 'orders' } },
        state: 'Pending',
        enqueuedAt: '2025-06-01T12:00:00.000Z',
        retryCount: 0,
        maxRetries: 2,
        leaseTimeoutMs: 1000,
        availableAt: '2025-06-01T12:00:00.000Z',
      });
    });

    it('should ignore a replayed id', async () => {
      const first = await queue.enqueue({ id: 'report-1', payload: { attempt: 'first' } });
      const second = await queue.enqueue({ id: 'report-1', payload: { attempt: 'second' } });

      expect([first, second]).toEqual(['report-1', 'report-1']);
      expect((await queue.depth()).Pending).toBe(1);
      expect((await queue.get('report-1'))?.payload).toEqual({ attempt: 'first' });
    });

    it('should reject invalid retry settings', async () => {
      await expect(queue.enqueue({ payload: {}, maxRetries: -1 })).rejects.toBeInstanceOf(InvalidQuery);
      await expect(queue.enqueue({ payload: {}, leaseTimeoutMs: 0 })).rejects.toBeInstanceOf(InvalidQuery);
    });

    it('should lease items in enqueue order', async () => {
      await queue.enqueue({ id: 'a', payload: 1 });
      await queue.enqueue({ id: 'b', payload: 2 });
      await queue.enqueue({ id: 'c', payload: 3 });

      const leased = await takeRequired(queue);

      expect(leased.item.id).toBe('a');
      expect(leased.attempt).toBe(1);
    });
  });

  // --------------------------------------------------------------------------
  // Leases
  // --------------------------------------------------------------------------
  describe('leases', () => {
    it('should redeliver a crashed consumer\'s item exactly once', async () => {
      const id = await queue.enqueue({ payload: { type: 'webhook.deliver' } });
      const crashed = await takeRequired(queue);
      expect(await takeOne(queue)).toBeUndefined();

      clock += 1000;
      const redelivered = await takeRequired(queue);
      expect(redelivered.item.id).toBe(id);
      expect(redelivered.attempt).toBe(2);

      await redelivered.ack();
      clock += 5000;

      expect(await takeOne(queue)).toBeUndefined();
      expect((await queue.get(id))?.state).toBe('Completed');
      await expect(crashed.ack()).rejects.toBeInstanceOf(LeaseExpired);
    });

    it('should dead-letter after maxRetries + 1 failed attempts and never lease it again', async () => {
      const id = await queue.enqueue({ payload: { type: 'report.aggregate' } });

      for (let attempt = 1; attempt <= 3; attempt++) {
        const leased = await takeRequired(queue);
        expect(leased.attempt).toBe(attempt);
        await leased.abandon(new Error('downstream unavailable'));
      }

      expect(await takeOne(queue)).toBeUndefined();
      const [dead] = await queue.listDeadLettered();
      expect(dead).toMatchObject({ id, state: 'DeadLettered', retryCount: 3, lastError: 'downstream unavailable' });
      expect(await queue.depth()).toEqual({ Pending: 0, Leased: 0, Completed: 0, Abandoned: 0, DeadLettered: 1 });
    });

    it('should dead-letter a permanent failure on the first attempt', async () => {
      const id = await queue.enqueue({ payload: {} });
      const leased = await takeRequired(queue);

      const settled = await leased.abandon(new InvalidQuery('No job registered for type missing'), { permanent: true });

      expect(settled).toMatchObject({ id, state: 'DeadLettered', retryCount: 1 });
    });

    it('should hold an abandoned item back for the retry delay', async () => {
      await queue.enqueue({ id: 'delayed', payload: {} });
      const leased = await takeRequired(queue);
      await leased.abandon(new Error('timeout'), { retryDelayMs: 5000 });

      expect(await takeOne(queue)).toBeUndefined();
      clock += 5000;
      expect((await takeRequired(queue)).item.id).toBe('delayed');
    });

    it('should count an expired lease as a failed attempt', async () => {
      const id = await queue.enqueue({ payload: {}, maxRetries: 0 });
      await takeRequired(queue);

      clock += 1000;
      expect(await takeOne(queue)).toBeUndefined();

      expect(await queue.get(id)).toMatchObject({ state: 'DeadLettered', retryCount: 1, lastError: 'lease expired' });
    });

    it('should refuse to settle an item twice', async () => {
      await queue.enqueue({ id: 'once', payload: {} });
      const leased = await takeRequired(queue);
      await leased.ack();

      await expect(leased.ack()).rejects.toThrow('Work item once was already settled');
    });
  });

  // --------------------------------------------------------------------------
  // Dead-letter inspection and housekeeping
  // --------------------------------------------------------------------------
  describe('dead letters', () => {
    it('should requeue a dead-lettered item with a fresh retry budget', async () => {
      const id = await queue.enqueue({ payload: {}, maxRetries: 0 });
      await (await takeRequired(queue)).abandon(new Error('boom'));

      const requeued = await queue.requeue(id);

      expect(requeued).toMatchObject({ id, state: 'Pending', retryCount: 0 });
      expect(requeued.deadLetteredAt).toBeUndefined();
      expect((await takeRequired(queue)).item.id).toBe(id);
    });

    it('should only requeue dead-lettered items', async () => {
      const id = await queue.enqueue({ payload: {} });

      await expect(queue.requeue(id)).rejects.toBeInstanceOf(InvalidQuery);
      await expect(queue.requeue('missing')).rejects.toBeInstanceOf(NotFound);
    });

    it('should purge completed items once the retention has passed', async () => {
      const id = await queue.enqueue({ payload: {} });
      await (await takeRequired(queue)).ack();

      clock += 60_000;
      await takeOne(queue);

      expect(await queue.get(id)).toBeNull();
    });
  });
});
