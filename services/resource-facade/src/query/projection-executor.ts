import { InvalidQuery, isFacadeError } from '../errors/index.js';
import { assertAggregatePushdown, assertPredicatePushdown } from '../data/predicate.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { IDataStore } from '../data/data-store.js';
import type { SchemaRegistry } from '../data/schema.js';
import type { RequestEvent, Telemetry } from '../monitoring/telemetry.js';
import type {
  AggregateOp,
  AggregateQuery,
  EntityQuery,
  ProjectedRows,
  QueryOptions,
  Scalar,
} from '../types/index.js';

export interface ProjectionExecutorOptions {
  store: IDataStore;
  schemas: SchemaRegistry;
  telemetry?: Telemetry;
  logger?: Logger;
}

/**
 * Pushes projection, filtering and aggregation down to the store. A
 * construct the store cannot evaluate is refused before any round trip;
 * nothing is ever computed over fetched rows in process.
 */
export class ProjectionExecutor {
  private readonly store: IDataStore;
  private readonly schemas: SchemaRegistry;
  private readonly telemetry?: Telemetry;
  private readonly logger: Logger;

  constructor(options: ProjectionExecutorOptions) {
    this.store = options.store;
    this.schemas = options.schemas;
    this.telemetry = options.telemetry;
    this.logger = options.logger ?? createLogger({ name: 'projection-executor' });
  }

  async project(query: EntityQuery, options: QueryOptions = {}): Promise<ProjectedRows> {
    return this.track('project', query.entity, async () => {
      if (query.include && query.include.length > 0) {
        throw new InvalidQuery('project does not load related entities; use fetch', { entity: query.entity });
      }
      this.schemas.validateQuery(query);
      assertPredicatePushdown(this.store.name, this.store.capabilities, query.where);

      const rows = await this.measure('select', query.entity, () =>
        this.store.select(
          {
            entity: query.entity,
            fields: query.fields,
            where: query.where,
            orderBy: query.orderBy,
            limit: query.limit,
            offset: query.offset,
          },
          options
        ),
        (result) => result.length
      );
      return { entity: query.entity, fields: [...query.fields], rows };
    });
  }

  async aggregate(query: AggregateQuery, op: AggregateOp, options: QueryOptions = {}): Promise<Scalar> {
    return this.track('aggregate', query.entity, async () => {
      const schema = this.schemas.get(query.entity);
      if (query.where) this.schemas.validatePredicate(schema, query.where);

      if (op.field !== undefined) {
        const type = this.schemas.fieldType(schema, op.field);
        if ((op.fn === 'sum' || op.fn === 'avg') && type !== 'number') {
          throw new InvalidQuery(`${op.fn} needs a numeric field; ${op.field} is ${type}`, { field: op.field });
        }
      } else if (op.fn !== 'count') {
        throw new InvalidQuery(`${op.fn} needs a field`, { fn: op.fn });
      }

      assertPredicatePushdown(this.store.name, this.store.capabilities, query.where);
      assertAggregatePushdown(this.store.name, this.store.capabilities, op);

      const value = await this.measure(
        'aggregate',
        query.entity,
        () => this.store.aggregate({ entity: query.entity, where: query.where, op }, options),
        () => 1
      );
      this.logger.debug({ entity: query.entity, fn: op.fn, field: op.field, value }, 'Aggregate computed by store');
      return value;
    });
  }

  private async measure<T>(
    kind: 'select' | 'aggregate',
    entity: string,
    call: () => Promise<T>,
    countRows: (result: T) => number
  ): Promise<T> {
    if (!this.telemetry) return call();
    return this.telemetry.measureRoundTrip({ store: this.store.name, kind, entity }, call, countRows);
  }

  private async track<T>(operation: RequestEvent['operation'], entity: string, task: () => Promise<T>): Promise<T> {
    const started = performance.now();
    try {
      const result = await task();
      this.telemetry?.emit('request', {
        operation,
        entity,
        durationMs: performance.now() - started,
        roundTrips: 1,
        outcome: 'ok',
      });
      return result;
    } catch (error) {
      this.telemetry?.emit('request', {
        operation,
        entity,
        durationMs: performance.now() - started,
        roundTrips: 0,
        outcome: 'error',
        errorCode: isFacadeError(error) ? error.code : undefined,
      });
      throw error;
    }
  }
}
