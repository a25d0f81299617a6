import { v4 as uuidv4 } from 'uuid';
import type { createClient } from 'redis';
import { InvalidQuery, LeaseExpired, NotFound } from '../errors/index.js';
import { WORK_ITEM_STATES, emptyDepth, isWorkItemState, type AbandonOptions, type BrokerEnqueue, type EnqueueResult, type IMessageBroker, type Lease } from './broker.js';
import type { ClientRegistry, ResourceKind } from '../registry/client-registry.js';
import type { QueueDepth, WorkItem } from '../types/index.js';

export type RedisClient = ReturnType<typeof createClient>;

export interface RedisBrokerOptions {
  registry: ClientRegistry;
  clientKind: ResourceKind<RedisClient>;
  queueName: string;
  now?: () => number;
}

// Every transition moves one count in the per-state counter hash
const MOVE = `
local function move(counts, from, to)
  if from then redis.call('HINCRBY', counts, from, -1) end
  if to then redis.call('HINCRBY', counts, to, 1) end
end
`;

// KEYS: item, ready, counts. ARGV: id, payload, now, maxRetries, leaseTimeoutMs
const ENQUEUE = `${MOVE}
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('HSET', KEYS[1], 'id', ARGV[1], 'payload', ARGV[2], 'state', 'Pending', 'enqueuedAt', ARGV[3],
  'availableAt', ARGV[3], 'retryCount', '0', 'maxRetries', ARGV[4], 'leaseTimeoutMs', ARGV[5])
redis.call('ZADD', KEYS[2], ARGV[3], ARGV[1])
move(KEYS[3], false, 'Pending')
return 1
`;

// KEYS: ready, leased, counts. ARGV: now, token, item key prefix
const LEASE = `${MOVE}
local ids = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[1], 'LIMIT', 0, 1)
if #ids == 0 then return false end
local id = ids[1]
local key = ARGV[3] .. id
local state = redis.call('HGET', key, 'state')
local leasedUntil = tonumber(ARGV[1]) + tonumber(redis.call('HGET', key, 'leaseTimeoutMs'))
redis.call('ZREM', KEYS[1], id)
redis.call('HSET', key, 'state', 'Leased', 'leasedUntil', leasedUntil, 'leaseToken', ARGV[2])
redis.call('ZADD', KEYS[2], leasedUntil, id)
move(KEYS[3], state, 'Leased')
return id
`;

const STALE_CHECK = `
if redis.call('HGET', KEYS[1], 'state') ~= 'Leased'
  or redis.call('HGET', KEYS[1], 'leaseToken') ~= ARGV[2]
  or tonumber(redis.call('HGET', KEYS[1], 'leasedUntil')) <= tonumber(ARGV[3]) then
  return 0
end
`;

// KEYS: item, leased, completed, counts. ARGV: id, token, now
const ACK = `${MOVE}${STALE_CHECK}
redis.call('ZREM', KEYS[2], ARGV[1])
redis.call('HDEL', KEYS[1], 'leaseToken', 'leasedUntil')
redis.call('HSET', KEYS[1], 'state', 'Completed', 'completedAt', ARGV[3])
redis.call('ZADD', KEYS[3], ARGV[3], ARGV[1])
move(KEYS[4], 'Leased', 'Completed')
return 1
`;

// Shared by abandon and lease reclaim
const FAIL = `
local function fail(key, id, now, err, permanent, availableAt, retryState, ready, dead, counts)
  local retries = tonumber(redis.call('HGET', key, 'retryCount')) + 1
  local maxRetries = tonumber(redis.call('HGET', key, 'maxRetries'))
  redis.call('HDEL', key, 'leaseToken', 'leasedUntil')
  redis.call('HSET', key, 'retryCount', retries, 'lastError', err)
  if permanent or retries > maxRetries then
    redis.call('HSET', key, 'state', 'DeadLettered', 'deadLetteredAt', now)
    redis.call('ZADD', dead, now, id)
    move(counts, 'Leased', 'DeadLettered')
    return
  end
  redis.call('HSET', key, 'state', retryState, 'availableAt', availableAt)
  redis.call('ZADD', ready, availableAt, id)
  move(counts, 'Leased', retryState)
end
`;

// KEYS: item, leased, ready, dead, counts. ARGV: id, token, now, error, retryDelayMs, permanent
const ABANDON = `${MOVE}${FAIL}${STALE_CHECK}
redis.call('ZREM', KEYS[2], ARGV[1])
fail(KEYS[1], ARGV[1], ARGV[3], ARGV[4], ARGV[6] == '1', tonumber(ARGV[3]) + tonumber(ARGV[5]), 'Abandoned',
  KEYS[3], KEYS[4], KEYS[5])
return 1
`;

// KEYS: leased, ready, dead, counts. ARGV: now, item key prefix
const RECLAIM = `${MOVE}${FAIL}
local ids = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
for _, id in ipairs(ids) do
  redis.call('ZREM', KEYS[1], id)
  fail(ARGV[2] .. id, id, ARGV[1], 'lease expired', false, ARGV[1], 'Pending', KEYS[2], KEYS[3], KEYS[4])
end
return ids
`;

// KEYS: item, dead, ready, counts. ARGV: id, now
const REQUEUE = `${MOVE}
local state = redis.call('HGET', KEYS[1], 'state')
if not state then return -1 end
if state ~= 'DeadLettered' then return 0 end
redis.call('HDEL', KEYS[1], 'deadLetteredAt')
redis.call('HSET', KEYS[1], 'state', 'Pending', 'retryCount', '0', 'availableAt', ARGV[2])
redis.call('ZREM', KEYS[2], ARGV[1])
redis.call('ZADD', KEYS[3], ARGV[2], ARGV[1])
move(KEYS[4], 'DeadLettered', 'Pending')
return 1
`;

// KEYS: completed, counts. ARGV: cutoff, item key prefix
const PURGE = `
local ids = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
for _, id in ipairs(ids) do
  redis.call('DEL', ARGV[2] .. id)
end
redis.call('ZREMRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
if #ids > 0 then redis.call('HINCRBY', KEYS[2], 'Completed', -#ids) end
return #ids
`;

/**
 * Redis-backed broker (production use). Items are hashes; ready, leased,
 * completed and dead-lettered items are indexed by time in sorted sets.
 */
export class RedisBroker implements IMessageBroker {
  readonly name = 'redis';
  private readonly now: () => number;
  private readonly keys: {
    itemPrefix: string;
    ready: string;
    leased: string;
    completed: string;
    dead: string;
    counts: string;
  };

  constructor(private readonly options: RedisBrokerOptions) {
    this.now = options.now ?? Date.now;
    const prefix = `queue:${options.queueName}`;
    this.keys = {
      itemPrefix: `${prefix}:item:`,
      ready: `${prefix}:ready`,
      leased: `${prefix}:leased`,
      completed: `${prefix}:completed`,
      dead: `${prefix}:dead`,
      counts: `${prefix}:counts`,
    };
  }

  async enqueue(request: BrokerEnqueue): Promise<EnqueueResult> {
    const reply = await this.eval(ENQUEUE, [this.itemKey(request.id), this.keys.ready, this.keys.counts], [
      request.id,
      JSON.stringify(request.payload ?? null),
      String(this.now()),
      String(request.maxRetries),
      String(request.leaseTimeoutMs),
    ]);
    return { id: request.id, created: reply === 1 };
  }

  async lease(): Promise<Lease | null> {
    const token = uuidv4();
    const reply = await this.eval(LEASE, [this.keys.ready, this.keys.leased, this.keys.counts], [
      String(this.now()),
      token,
      this.keys.itemPrefix,
    ]);
    if (typeof reply !== 'string') return null;
    const item = await this.get(reply);
    return item ? { item, token } : null;
  }

  async ack(id: string, token: string): Promise<WorkItem> {
    const reply = await this.eval(
      ACK,
      [this.itemKey(id), this.keys.leased, this.keys.completed, this.keys.counts],
      [id, token, String(this.now())]
    );
    if (reply !== 1) throw new LeaseExpired(id);
    return this.require(id);
  }

  async abandon(id: string, token: string, options: AbandonOptions): Promise<WorkItem> {
    const reply = await this.eval(
      ABANDON,
      [this.itemKey(id), this.keys.leased, this.keys.ready, this.keys.dead, this.keys.counts],
      [id, token, String(this.now()), options.error, String(options.retryDelayMs), options.permanent ? '1' : '0']
    );
    if (reply !== 1) throw new LeaseExpired(id);
    return this.require(id);
  }

  async reclaimExpired(): Promise<WorkItem[]> {
    const reply = await this.eval(RECLAIM, [this.keys.leased, this.keys.ready, this.keys.dead, this.keys.counts], [
      String(this.now()),
      this.keys.itemPrefix,
    ]);
    const ids = Array.isArray(reply) ? reply.filter((id): id is string => typeof id === 'string') : [];
    return this.getMany(ids);
  }

  async purgeCompleted(olderThanMs: number): Promise<number> {
    const reply = await this.eval(PURGE, [this.keys.completed, this.keys.counts], [
      String(this.now() - olderThanMs),
      this.keys.itemPrefix,
    ]);
    return typeof reply === 'number' ? reply : 0;
  }

  async get(id: string): Promise<WorkItem | null> {
    const fields = await this.withClient((client) => client.hGetAll(this.itemKey(id)));
    return parseItem(fields);
  }

  async listDeadLettered(limit: number): Promise<WorkItem[]> {
    if (limit <= 0) return [];
    const ids = await this.withClient((client) => client.zRange(this.keys.dead, 0, limit - 1));
    return this.getMany(ids.filter((id): id is string => typeof id === 'string'));
  }

  async requeue(id: string): Promise<WorkItem> {
    const reply = await this.eval(
      REQUEUE,
      [this.itemKey(id), this.keys.dead, this.keys.ready, this.keys.counts],
      [id, String(this.now())]
    );
    if (reply === -1) {
      throw new NotFound(`Work item ${id} not found`, { id });
    }
    const item = await this.require(id);
    if (reply !== 1) {
      throw new InvalidQuery(`Work item ${id} is ${item.state}, only dead-lettered items can be requeued`, {
        id,
        state: item.state,
      });
    }
    return item;
  }

  async depth(): Promise<QueueDepth> {
    const counts = await this.withClient((client) => client.hGetAll(this.keys.counts));
    const depth = emptyDepth();
    for (const state of WORK_ITEM_STATES) {
      depth[state] = Math.max(0, Number(field(counts, state) ?? 0));
    }
    return depth;
  }

  async close(): Promise<void> {
    // The connection belongs to the client registry
  }

  private itemKey(id: string): string {
    return `${this.keys.itemPrefix}${id}`;
  }

  private async require(id: string): Promise<WorkItem> {
    const item = await this.get(id);
    if (!item) {
      throw new NotFound(`Work item ${id} not found`, { id });
    }
    return item;
  }

  private async getMany(ids: string[]): Promise<WorkItem[]> {
    const items = await Promise.all(ids.map((id) => this.get(id)));
    return items.filter((item): item is WorkItem => item !== null);
  }

  private async eval(script: string, keys: string[], args: string[]): Promise<unknown> {
    return this.withClient((client) => client.eval(script, { keys, arguments: args }));
  }

  private async withClient<R>(fn: (client: RedisClient) => Promise<R>): Promise<R> {
    return this.options.registry.withResource(this.options.clientKind, (client) => fn(client));
  }
}

function toIso(value: string | undefined): string | undefined {
  if (value === undefined || value === '') return undefined;
  return new Date(Number(value)).toISOString();
}

function parsePayload(raw: string | undefined): unknown {
  if (raw === undefined) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

function field(fields: Record<string, unknown>, name: string): string | undefined {
  const value = fields[name];
  return typeof value === 'string' ? value : undefined;
}

/** Hash fields hold epoch milliseconds; WorkItem carries ISO timestamps. */
function parseItem(fields: Record<string, unknown>): WorkItem | null {
  const id = field(fields, 'id');
  const state = field(fields, 'state');
  if (!id || !isWorkItemState(state)) return null;
  return {
    id,
    payload: parsePayload(field(fields, 'payload')),
    state,
    enqueuedAt: toIso(field(fields, 'enqueuedAt')) ?? new Date(0).toISOString(),
    retryCount: Number(field(fields, 'retryCount') ?? 0),
    maxRetries: Number(field(fields, 'maxRetries') ?? 0),
    leaseTimeoutMs: Number(field(fields, 'leaseTimeoutMs') ?? 0),
    availableAt: toIso(field(fields, 'availableAt')) ?? new Date(0).toISOString(),
    leasedUntil: toIso(field(fields, 'leasedUntil')),
    lastError: field(fields, 'lastError'),
    completedAt: toIso(field(fields, 'completedAt')),
    deadLetteredAt: toIso(field(fields, 'deadLetteredAt')),
  };
}
