import { UnsupportedPushdown, isFacadeError } from '../errors/index.js';
import { allOf, assertPredicatePushdown, toComparable } from '../data/predicate.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { CompositeInclude, IDataStore, SelectRequest } from '../data/data-store.js';
import type { SchemaRegistry } from '../data/schema.js';
import type { Telemetry } from '../monitoring/telemetry.js';
import type {
  EntityGraph,
  EntityQuery,
  EntitySchema,
  IncludeQuery,
  OrderBy,
  Predicate,
  QueryOptions,
  Row,
  Scalar,
} from '../types/index.js';

interface PlannedInclude {
  as: string;
  kind: 'hasMany' | 'belongsTo';
  entity: string;
  /** Field on the parent row that links to the child */
  parentKey: string;
  /** Field on the child row that holds the parent's key */
  childKey: string;
  /** Fields the caller asked for */
  fields: string[];
  /** Requested fields plus the keys needed for stitching */
  fetchFields: string[];
  where?: Predicate;
  orderBy?: OrderBy[];
  children: PlannedInclude[];
}

export interface BatchQueryPlannerOptions {
  store: IDataStore;
  schemas: SchemaRegistry;
  telemetry?: Telemetry;
  logger?: Logger;
}

/**
 * Loads an entity together with its related entities in a number of round
 * trips fixed by the shape of the query, never by the number of rows.
 */
export class BatchQueryPlanner {
  private readonly store: IDataStore;
  private readonly schemas: SchemaRegistry;
  private readonly telemetry?: Telemetry;
  private readonly logger: Logger;

  constructor(options: BatchQueryPlannerOptions) {
    this.store = options.store;
    this.schemas = options.schemas;
    this.telemetry = options.telemetry;
    this.logger = options.logger ?? createLogger({ name: 'batch-planner' });
  }

  async fetch(query: EntityQuery, options: QueryOptions = {}): Promise<EntityGraph> {
    const started = performance.now();
    let roundTrips = 0;
    const countTrip = (): void => {
      roundTrips++;
    };

    try {
      const schema = this.schemas.validateQuery(query);
      const includes = this.plan(schema, query.include ?? []);
      const rootFields = withKeys(query.fields, includes.map((include) => include.parentKey));

      this.assertPushdown(query.where, includes);

      let rows: Row[];
      if (this.store.capabilities.composition) {
        rows = await this.fetchComposite(query, rootFields, includes, options, countTrip);
      } else {
        if (includes.length > 0 && !this.store.capabilities.operators.has('in')) {
          throw new UnsupportedPushdown(this.store.name, 'operator in (needed to batch related entities by key)');
        }
        rows = await this.fetchPerType(query, rootFields, includes, options, countTrip);
      }

      const graph: EntityGraph = {
        entity: query.entity,
        rows: rows.map((row) => project(row, query.fields, includes)),
        roundTrips,
      };
      this.telemetry?.emit('request', {
        operation: 'fetch',
        entity: query.entity,
        durationMs: performance.now() - started,
        roundTrips,
        outcome: 'ok',
      });
      this.logger.debug({ entity: query.entity, rows: graph.rows.length, roundTrips }, 'Entity graph fetched');
      return graph;
    } catch (error) {
      this.telemetry?.emit('request', {
        operation: 'fetch',
        entity: query.entity,
        durationMs: performance.now() - started,
        roundTrips,
        outcome: 'error',
        errorCode: isFacadeError(error) ? error.code : undefined,
      });
      throw error;
    }
  }

  private plan(parent: EntitySchema, includes: IncludeQuery[]): PlannedInclude[] {
    return includes.map((include) => {
      const relation = this.schemas.relation(parent, include.relation);
      const target = this.schemas.get(relation.target);
      const hasMany = relation.kind === 'hasMany';
      const children = this.plan(target, include.include ?? []);
      const childKey = hasMany ? relation.foreignKey : target.primaryKey;
      return {
        as: include.relation,
        kind: relation.kind,
        entity: target.name,
        parentKey: hasMany ? parent.primaryKey : relation.foreignKey,
        childKey,
        fields: include.fields,
        fetchFields: withKeys(include.fields, [childKey, ...children.map((child) => child.parentKey)]),
        where: include.where,
        orderBy: include.orderBy,
        children,
      };
    });
  }

  // Checked up front so a refused construct costs no round trip
  private assertPushdown(where: Predicate | undefined, includes: PlannedInclude[]): void {
    assertPredicatePushdown(this.store.name, this.store.capabilities, where);
    for (const include of includes) {
      this.assertPushdown(include.where, include.children);
    }
  }

  private async fetchComposite(
    query: EntityQuery,
    rootFields: string[],
    includes: PlannedInclude[],
    options: QueryOptions,
    countTrip: () => void
  ): Promise<Row[]> {
    const toComposite = (include: PlannedInclude): CompositeInclude => ({
      as: include.as,
      entity: include.entity,
      kind: include.kind,
      parentKey: include.parentKey,
      childKey: include.childKey,
      fields: include.fetchFields,
      where: include.where,
      orderBy: include.orderBy,
      include: include.children.map(toComposite),
    });

    return this.roundTrip('composite', query.entity, countTrip, () =>
      this.store.selectComposite(
        {
          entity: query.entity,
          fields: rootFields,
          where: query.where,
          orderBy: query.orderBy,
          limit: query.limit,
          offset: query.offset,
          include: includes.map(toComposite),
        },
        options
      )
    );
  }

  private async fetchPerType(
    query: EntityQuery,
    rootFields: string[],
    includes: PlannedInclude[],
    options: QueryOptions,
    countTrip: () => void
  ): Promise<Row[]> {
    const request: SelectRequest = {
      entity: query.entity,
      fields: rootFields,
      where: query.where,
      orderBy: query.orderBy,
      limit: query.limit,
      offset: query.offset,
    };
    const rows = await this.roundTrip('select', query.entity, countTrip, () => this.store.select(request, options));
    await this.attachIncludes(rows, includes, options, countTrip);
    return rows;
  }

  /** One select per related entity type, keyed on every parent at once. */
  private async attachIncludes(
    parents: Row[],
    includes: PlannedInclude[],
    options: QueryOptions,
    countTrip: () => void
  ): Promise<void> {
    for (const include of includes) {
      const keys = distinctKeys(parents, include.parentKey);
      let children: Row[] = [];
      if (keys.length > 0) {
        const request: SelectRequest = {
          entity: include.entity,
          fields: include.fetchFields,
          where: allOf({ kind: 'compare', field: include.childKey, op: 'in', value: keys }, include.where),
          orderBy: include.orderBy,
        };
        children = await this.roundTrip('select', include.entity, countTrip, () => this.store.select(request, options));
        await this.attachIncludes(children, include.children, options, countTrip);
      }

      const byKey = groupBy(children, include.childKey);
      for (const parent of parents) {
        const related = byKey.get(toComparable(parent[include.parentKey])) ?? [];
        parent[include.as] = include.kind === 'hasMany' ? related : related[0] ?? null;
      }
    }
  }

  private async roundTrip(
    kind: 'select' | 'composite',
    entity: string,
    countTrip: () => void,
    call: () => Promise<Row[]>
  ): Promise<Row[]> {
    countTrip();
    if (!this.telemetry) return call();
    return this.telemetry.measureRoundTrip({ store: this.store.name, kind, entity }, call, (rows) => rows.length);
  }
}

function withKeys(fields: string[], keys: string[]): string[] {
  return Array.from(new Set([...fields, ...keys]));
}

function distinctKeys(rows: Row[], field: string): Scalar[] {
  const keys = new Set<string | number | boolean>();
  for (const row of rows) {
    const key = toComparable(row[field]);
    if (key !== null) keys.add(key);
  }
  return Array.from(keys);
}

function groupBy(rows: Row[], field: string): Map<Scalar, Row[]> {
  const groups = new Map<Scalar, Row[]>();
  for (const row of rows) {
    const key = toComparable(row[field]);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

/** Drop stitching keys the caller did not ask for. */
function project(row: Row, fields: string[], includes: PlannedInclude[]): Row {
  const out: Row = {};
  for (const field of fields) {
    out[field] = row[field] ?? null;
  }
  for (const include of includes) {
    const value = row[include.as];
    if (Array.isArray(value)) {
      out[include.as] = value.filter(isRow).map((child) => project(child, include.fields, include.children));
    } else if (isRow(value)) {
      out[include.as] = project(value, include.fields, include.children);
    } else {
      out[include.as] = include.kind === 'hasMany' ? [] : null;
    }
  }
  return out;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
