import type {
  AggregateFunction,
  AggregateOp,
  ComparisonOperator,
  OrderBy,
  Predicate,
  QueryOptions,
  Row,
  Scalar,
  ScalarFunction,
} from '../types/index.js';

/**
 * What a store can evaluate natively. Anything outside these sets is
 * refused with UnsupportedPushdown instead of being evaluated in process.
 */
export interface StoreCapabilities {
  /** One round trip can return a parent entity together with its related entities */
  composition: boolean;
  operators: ReadonlySet<ComparisonOperator>;
  functions: ReadonlySet<ScalarFunction>;
  aggregates: ReadonlySet<AggregateFunction>;
}

export interface SelectRequest {
  entity: string;
  fields: string[];
  where?: Predicate;
  orderBy?: OrderBy[];
  limit?: number;
  offset?: number;
}

export interface CompositeInclude {
  /** Key under which related rows are attached to each parent */
  as: string;
  entity: string;
  kind: 'hasMany' | 'belongsTo';
  /** Field on the parent (hasMany: its primary key; belongsTo: the foreign key) */
  parentKey: string;
  /** Field on the related entity (hasMany: the foreign key; belongsTo: its primary key) */
  childKey: string;
  fields: string[];
  where?: Predicate;
  orderBy?: OrderBy[];
  include: CompositeInclude[];
}

export interface CompositeRequest extends SelectRequest {
  include: CompositeInclude[];
}

export interface AggregateRequest {
  entity: string;
  where?: Predicate;
  op: AggregateOp;
}

/**
 * The narrow interface the facade needs from a data store. Every method call
 * is one round trip.
 */
export interface IDataStore {
  readonly name: string;
  readonly capabilities: StoreCapabilities;
  select(request: SelectRequest, options?: QueryOptions): Promise<Row[]>;
  selectComposite(request: CompositeRequest, options?: QueryOptions): Promise<Row[]>;
  aggregate(request: AggregateRequest, options?: QueryOptions): Promise<Scalar>;
  close(): Promise<void>;
}

export const ALL_OPERATORS: ReadonlySet<ComparisonOperator> = new Set<ComparisonOperator>([
  'eq',
  'neq',
  'gt',
  'gte',
  'lt',
  'lte',
  'in',
  'like',
  'isNull',
]);

export const ALL_FUNCTIONS: ReadonlySet<ScalarFunction> = new Set<ScalarFunction>([
  'lower',
  'upper',
  'length',
  'year',
  'month',
  'daysSince',
]);

export const ALL_AGGREGATES: ReadonlySet<AggregateFunction> = new Set<AggregateFunction>([
  'count',
  'sum',
  'avg',
  'min',
  'max',
]);
