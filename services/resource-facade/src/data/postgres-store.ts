import type pg from 'pg';
import { sql, type SQL } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/node-postgres';
import { UnsupportedPushdown } from '../errors/index.js';
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
import { assertAggregatePushdown, assertPredicatePushdown } from './predicate.js';
import type { SchemaRegistry } from './schema.js';
import type { ClientRegistry, ResourceKind } from '../registry/client-registry.js';
import type { ComparisonPredicate, OrderBy, Predicate, QueryOptions, Row, Scalar, ScalarFunction } from '../types/index.js';

export interface PostgresDataStoreOptions {
  registry: ClientRegistry;
  /** Pooled pg.Client kind registered with the registry */
  clientKind: ResourceKind<pg.Client>;
  schemas: SchemaRegistry;
  queryTimeoutMs?: number;
}

const COMPARISON_SQL = {
  eq: '=',
  neq: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
  like: 'LIKE',
} as const;

/**
 * Compiles facade requests into single Postgres statements. Includes are
 * composed with correlated json_agg sub-selects.
 */
export class PostgresQueryBuilder {
  constructor(private readonly schemas: SchemaRegistry) {}

  select(request: SelectRequest, includes: CompositeInclude[] = []): SQL {
    return this.buildSelect(request, includes, 0);
  }

  aggregate(request: AggregateRequest): SQL {
    const schema = this.schemas.get(request.entity);
    const alias = aliasAt(0);
    const { fn, field } = request.op;
    const target = field ? column(alias, field) : sql.raw('*');
    const expression = sql`${sql.raw(fn.toUpperCase())}(${target})`;
    const where = request.where ? sql` WHERE ${this.compilePredicate(request.where, alias)}` : sql``;
    return sql`SELECT ${expression} AS ${sql.identifier('value')} FROM ${sql.identifier(schema.table)} AS ${alias}${where}`;
  }

  private buildSelect(request: SelectRequest, includes: CompositeInclude[], depth: number): SQL {
    const schema = this.schemas.get(request.entity);
    const alias = aliasAt(depth);
    const columns: SQL[] = request.fields.map((field) => sql`${column(alias, field)} AS ${sql.identifier(field)}`);
    for (const include of includes) {
      columns.push(sql`${this.buildInclude(include, alias, depth + 1)} AS ${sql.identifier(include.as)}`);
    }

    const chunks: SQL[] = [sql`SELECT ${sql.join(columns, sql`, `)} FROM ${sql.identifier(schema.table)} AS ${alias}`];
    if (request.where) chunks.push(sql`WHERE ${this.compilePredicate(request.where, alias)}`);
    if (request.orderBy && request.orderBy.length > 0) chunks.push(sql`ORDER BY ${orderClause(request.orderBy, alias)}`);
    if (request.limit !== undefined) chunks.push(sql`LIMIT ${request.limit}`);
    if (request.offset !== undefined) chunks.push(sql`OFFSET ${request.offset}`);
    return sql.join(chunks, sql` `);
  }

  private buildInclude(include: CompositeInclude, parentAlias: SQL, depth: number): SQL {
    const schema = this.schemas.get(include.entity);
    const alias = aliasAt(depth);

    const pairs: SQL[] = include.fields.map((field) => sql`${field}::text, ${column(alias, field)}`);
    for (const nested of include.include) {
      pairs.push(sql`${nested.as}::text, ${this.buildInclude(nested, alias, depth + 1)}`);
    }
    const object = sql`json_build_object(${sql.join(pairs, sql`, `)})`;

    const conditions: SQL[] = [sql`${column(alias, include.childKey)} = ${column(parentAlias, include.parentKey)}`];
    if (include.where) conditions.push(this.compilePredicate(include.where, alias));
    const where = sql.join(conditions, sql` AND `);
    const from = sql`FROM ${sql.identifier(schema.table)} AS ${alias} WHERE ${where}`;

    if (include.kind === 'belongsTo') {
      return sql`(SELECT ${object} ${from} LIMIT 1)`;
    }
    const order = include.orderBy && include.orderBy.length > 0 ? sql` ORDER BY ${orderClause(include.orderBy, alias)}` : sql``;
    return sql`(SELECT COALESCE(json_agg(${object}${order}), '[]'::json) ${from})`;
  }

  private compilePredicate(predicate: Predicate, alias: SQL): SQL {
    switch (predicate.kind) {
      case 'compare':
        return compileComparison(predicate, alias);
      case 'and':
        return sql`(${sql.join(
          predicate.clauses.map((clause) => this.compilePredicate(clause, alias)),
          sql` AND `
        )})`;
      case 'or':
        return sql`(${sql.join(
          predicate.clauses.map((clause) => this.compilePredicate(clause, alias)),
          sql` OR `
        )})`;
      case 'not':
        return sql`NOT (${this.compilePredicate(predicate.clause, alias)})`;
    }
  }
}

/**
 * Postgres-backed store. Every request is a single statement run on a
 * pooled connection from the client registry.
 */
export class PostgresDataStore implements IDataStore {
  readonly name = 'postgres';
  readonly capabilities: StoreCapabilities = {
    composition: true,
    operators: ALL_OPERATORS,
    functions: ALL_FUNCTIONS,
    aggregates: ALL_AGGREGATES,
  };
  private readonly builder: PostgresQueryBuilder;

  constructor(private readonly options: PostgresDataStoreOptions) {
    this.builder = new PostgresQueryBuilder(options.schemas);
  }

  async select(request: SelectRequest, options: QueryOptions = {}): Promise<Row[]> {
    assertPredicatePushdown(this.name, this.capabilities, request.where);
    return this.execute(this.builder.select(request), options);
  }

  async selectComposite(request: CompositeRequest, options: QueryOptions = {}): Promise<Row[]> {
    assertPredicatePushdown(this.name, this.capabilities, request.where);
    this.assertIncludes(request.include);
    return this.execute(this.builder.select(request, request.include), options);
  }

  async aggregate(request: AggregateRequest, options: QueryOptions = {}): Promise<Scalar> {
    assertPredicatePushdown(this.name, this.capabilities, request.where);
    assertAggregatePushdown(this.name, this.capabilities, request.op);

    const schema = this.options.schemas.get(request.entity);
    const { fn, field } = request.op;
    const rows = await this.execute(this.builder.aggregate(request), options);
    const value = rows[0]?.['value'];
    return normalizeAggregate(value, fn === 'count' || (field !== undefined && schema.fields[field] === 'number'));
  }

  async close(): Promise<void> {
    // Connections belong to the client registry
  }

  private async execute(query: SQL, options: QueryOptions): Promise<Row[]> {
    const { registry, clientKind, queryTimeoutMs } = this.options;
    return registry.withResource(
      clientKind,
      async (client) => {
        const result = await drizzle(client).execute<Row>(query);
        return result.rows;
      },
      { signal: options.signal, timeoutMs: options.timeoutMs ?? queryTimeoutMs }
    );
  }

  private assertIncludes(includes: CompositeInclude[]): void {
    for (const include of includes) {
      if (include.where) assertPredicatePushdown(this.name, this.capabilities, include.where);
      this.assertIncludes(include.include);
    }
  }
}

function aliasAt(depth: number): SQL {
  return sql.identifier(`t${depth}`);
}

function column(alias: SQL, field: string): SQL {
  return sql`${alias}.${sql.identifier(field)}`;
}

function orderClause(orderBy: OrderBy[], alias: SQL): SQL {
  return sql.join(
    orderBy.map((order) => sql`${column(alias, order.field)} ${sql.raw(order.direction === 'desc' ? 'DESC' : 'ASC')}`),
    sql`, `
  );
}

function applyFunction(fn: ScalarFunction, subject: SQL): SQL {
  switch (fn) {
    case 'lower':
      return sql`lower(${subject})`;
    case 'upper':
      return sql`upper(${subject})`;
    case 'length':
      return sql`char_length(${subject})`;
    case 'year':
      return sql`EXTRACT(YEAR FROM ${subject})::int`;
    case 'month':
      return sql`EXTRACT(MONTH FROM ${subject})::int`;
    case 'daysSince':
      return sql`(CURRENT_DATE - ${subject}::date)`;
  }
}

function compileComparison(predicate: ComparisonPredicate, alias: SQL): SQL {
  const base = column(alias, predicate.field);
  const subject = predicate.fn ? applyFunction(predicate.fn, base) : base;

  switch (predicate.op) {
    case 'isNull':
      return predicate.value === false ? sql`${subject} IS NOT NULL` : sql`${subject} IS NULL`;
    case 'in': {
      const values = Array.isArray(predicate.value) ? predicate.value : [];
      // One array parameter; a bare array would be spread into a row constructor
      return sql`${subject} = ANY(${sql.param(values)})`;
    }
    default: {
      if (Array.isArray(predicate.value)) {
        throw new UnsupportedPushdown('postgres', `list operand for ${predicate.op}`);
      }
      return sql`${subject} ${sql.raw(COMPARISON_SQL[predicate.op])} ${predicate.value ?? null}`;
    }
  }
}

// pg returns bigint and numeric as strings and timestamps as Date
function normalizeAggregate(value: unknown, numeric: boolean): Scalar {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (numeric && typeof value === 'string') return Number(value);
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}
