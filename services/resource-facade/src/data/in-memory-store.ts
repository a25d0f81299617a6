import { setTimeout as delay } from 'node:timers/promises';
import { UnsupportedPushdown } from '../errors/index.js';
import { cancellationFor, resolveSignal, throwIfAborted } from '../utils/abort.js';
import {
  ALL_AGGREGATES,
  ALL_FUNCTIONS,
  ALL_OPERATORS,
  type AggregateRequest,
  type CompositeInclude,
  type CompositeRequest,
  type IDataStore,
  type SelectRequest,
  type StoreCapabilities,
} from './data-store.js';
import { assertAggregatePushdown, assertPredicatePushdown, evaluatePredicate, toComparable } from './predicate.js';
import type { SchemaRegistry } from './schema.js';
import type { OrderBy, QueryOptions, Row, Scalar } from '../types/index.js';

export interface RoundTripRecord {
  kind: 'select' | 'composite' | 'aggregate';
  entity: string;
  rowCount: number;
  /** Field names that crossed the store boundary, per entity */
  transmitted: Record<string, string[]>;
}

export interface InMemoryDataStoreOptions {
  name?: string;
  capabilities?: Partial<StoreCapabilities>;
  /** Simulated latency per round trip */
  latencyMs?: number;
  now?: () => number;
}

/**
 * In-process data store (dev/local use and tests). Behaves like a remote
 * store: every call is one recorded round trip and only the requested fields
 * leave it.
 */
export class InMemoryDataStore implements IDataStore {
  readonly name: string;
  readonly capabilities: StoreCapabilities;
  private readonly tables: Map<string, Row[]> = new Map();
  private readonly roundTrips: RoundTripRecord[] = [];
  private readonly latencyMs: number;
  private readonly now: () => number;

  constructor(
    private readonly schemas: SchemaRegistry,
    options: InMemoryDataStoreOptions = {}
  ) {
    this.name = options.name ?? 'memory';
    this.capabilities = {
      composition: options.capabilities?.composition ?? true,
      operators: options.capabilities?.operators ?? ALL_OPERATORS,
      functions: options.capabilities?.functions ?? ALL_FUNCTIONS,
      aggregates: options.capabilities?.aggregates ?? ALL_AGGREGATES,
    };
    this.latencyMs = options.latencyMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  /** Load rows for an entity; date fields are stored as Date values. */
  seed(entity: string, rows: Row[]): void {
    const schema = this.schemas.get(entity);
    const stored = rows.map((row) => {
      const copy: Row = { ...row };
      for (const [field, type] of Object.entries(schema.fields)) {
        const value = copy[field];
        if (type === 'date' && (typeof value === 'string' || typeof value === 'number')) {
          copy[field] = new Date(value);
        }
      }
      return copy;
    });
    this.tables.set(entity, [...(this.tables.get(entity) ?? []), ...stored]);
  }

  getRoundTrips(): RoundTripRecord[] {
    return [...this.roundTrips];
  }

  async select(request: SelectRequest, options: QueryOptions = {}): Promise<Row[]> {
    assertPredicatePushdown(this.name, this.capabilities, request.where);
    await this.travel(options, `select on ${request.entity}`);

    const rows = this.scan(request.entity, request);
    const result = rows.map((row) => this.pick(row, request.fields));
    this.record('select', request.entity, result.length, { [request.entity]: request.fields });
    return result;
  }

  async selectComposite(request: CompositeRequest, options: QueryOptions = {}): Promise<Row[]> {
    if (!this.capabilities.composition) {
      throw new UnsupportedPushdown(this.name, 'multi-entity composition');
    }
    assertPredicatePushdown(this.name, this.capabilities, request.where);
    this.assertIncludesPushdown(request.include);
    await this.travel(options, `composite select on ${request.entity}`);

    const transmitted: Record<string, string[]> = {};
    const rows = this.scan(request.entity, request);
    const result = rows.map((row) => this.compose(row, request.entity, request.fields, request.include, transmitted));
    this.record('composite', request.entity, result.length, transmitted);
    return result;
  }

  async aggregate(request: AggregateRequest, options: QueryOptions = {}): Promise<Scalar> {
    assertPredicatePushdown(this.name, this.capabilities, request.where);
    assertAggregatePushdown(this.name, this.capabilities, request.op);
    await this.travel(options, `aggregate on ${request.entity}`);

    const rows = this.scan(request.entity, { where: request.where });
    const { fn, field } = request.op;
    this.record('aggregate', request.entity, 1, {});

    if (fn === 'count') {
      return field ? rows.filter((row) => toComparable(row[field]) !== null).length : rows.length;
    }
    if (!field) return null;

    const values = rows.map((row) => row[field]).filter((value) => value !== null && value !== undefined);
    if (values.length === 0) return null;

    if (fn === 'min' || fn === 'max') {
      const sorted = [...values].sort((a, b) => compareRaw(a, b));
      const chosen = fn === 'min' ? sorted[0] : sorted[sorted.length - 1];
      return chosen instanceof Date ? chosen.toISOString() : toComparable(chosen);
    }

    const numbers = values.map(Number);
    const sum = numbers.reduce((total, value) => total + value, 0);
    return fn === 'sum' ? sum : sum / numbers.length;
  }

  async close(): Promise<void> {
    this.tables.clear();
  }

  private async travel(options: QueryOptions, operation: string): Promise<void> {
    const signal = resolveSignal(options.signal, options.timeoutMs);
    throwIfAborted(signal, operation);
    if (this.latencyMs <= 0) return;
    try {
      await delay(this.latencyMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) throw cancellationFor(signal, operation);
      throw error;
    }
  }

  private scan(entity: string, request: Pick<SelectRequest, 'where' | 'orderBy' | 'limit' | 'offset'>): Row[] {
    const now = this.now();
    let rows = (this.tables.get(entity) ?? []).filter((row) => evaluatePredicate(request.where, row, now));
    if (request.orderBy && request.orderBy.length > 0) {
      rows = sortRows(rows, request.orderBy);
    }
    const offset = request.offset ?? 0;
    const end = request.limit === undefined ? undefined : offset + request.limit;
    return rows.slice(offset, end);
  }

  private compose(
    row: Row,
    entity: string,
    fields: string[],
    includes: CompositeInclude[],
    transmitted: Record<string, string[]>
  ): Row {
    mergeFields(transmitted, entity, fields);
    const out = this.pick(row, fields);

    for (const include of includes) {
      const parentValue = toComparable(row[include.parentKey]);
      const related =
        parentValue === null
          ? []
          : this.scan(include.entity, { where: include.where, orderBy: include.orderBy }).filter(
              (candidate) => toComparable(candidate[include.childKey]) === parentValue
            );
      const nested = related.map((child) => this.compose(child, include.entity, include.fields, include.include, transmitted));
      out[include.as] = include.kind === 'hasMany' ? nested : nested[0] ?? null;
    }
    return out;
  }

  private assertIncludesPushdown(includes: CompositeInclude[]): void {
    for (const include of includes) {
      assertPredicatePushdown(this.name, this.capabilities, include.where);
      this.assertIncludesPushdown(include.include);
    }
  }

  private pick(row: Row, fields: string[]): Row {
    const out: Row = {};
    for (const field of fields) {
      const value = row[field];
      out[field] = value instanceof Date ? new Date(value.getTime()) : value ?? null;
    }
    return out;
  }

  private record(kind: RoundTripRecord['kind'], entity: string, rowCount: number, transmitted: Record<string, string[]>): void {
    this.roundTrips.push({ kind, entity, rowCount, transmitted });
  }
}

function mergeFields(target: Record<string, string[]>, entity: string, fields: string[]): void {
  const existing = new Set(target[entity] ?? []);
  for (const field of fields) existing.add(field);
  target[entity] = Array.from(existing);
}

function compareRaw(a: unknown, b: unknown): number {
  const left = toComparable(a);
  const right = toComparable(b);
  if (left === right) return 0;
  if (left === null) return 1;
  if (right === null) return -1;
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  return String(left) < String(right) ? -1 : 1;
}

function sortRows(rows: Row[], orderBy: OrderBy[]): Row[] {
  return [...rows].sort((a, b) => {
    for (const order of orderBy) {
      const result = compareRaw(a[order.field], b[order.field]);
      if (result !== 0) return order.direction === 'desc' ? -result : result;
    }
    return 0;
  });
}
