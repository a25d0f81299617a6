import { InvalidQuery, NotFound } from '../errors/index.js';
import type {
  EntityQuery,
  EntitySchema,
  FieldType,
  IncludeQuery,
  OrderBy,
  Predicate,
  RelationSchema,
} from '../types/index.js';

/**
 * Known entity schemas. Queries are validated here before any store sees them.
 */
export class SchemaRegistry {
  private readonly entities: Map<string, EntitySchema> = new Map();

  constructor(schemas: EntitySchema[] = []) {
    for (const schema of schemas) {
      this.register(schema);
    }
  }

  register(schema: EntitySchema): void {
    if (!Object.hasOwn(schema.fields, schema.primaryKey)) {
      throw new Error(`Entity ${schema.name}: primary key ${schema.primaryKey} is not a field`);
    }
    this.entities.set(schema.name, schema);
  }

  get(entity: string): EntitySchema {
    const schema = this.entities.get(entity);
    if (!schema) {
      throw new NotFound(`Unknown entity "${entity}"`, { entity });
    }
    return schema;
  }

  has(entity: string): boolean {
    return this.entities.has(entity);
  }

  list(): EntitySchema[] {
    return Array.from(this.entities.values());
  }

  relation(schema: EntitySchema, name: string): RelationSchema {
    const relation = schema.relations?.find((candidate) => candidate.name === name);
    if (!relation) {
      throw new InvalidQuery(`Entity ${schema.name} has no relation "${name}"`, { entity: schema.name, relation: name });
    }
    return relation;
  }

  fieldType(schema: EntitySchema, field: string): FieldType {
    const type = Object.hasOwn(schema.fields, field) ? schema.fields[field] : undefined;
    if (!type) {
      throw new InvalidQuery(`Entity ${schema.name} has no field "${field}"`, { entity: schema.name, field });
    }
    return type;
  }

  /**
   * Enforce the projection invariant: an explicit, non-empty field list that is
   * a subset of the schema, including every field referenced by filters and ordering.
   */
  validateQuery(query: EntityQuery): EntitySchema {
    const schema = this.get(query.entity);
    this.validateProjection(schema, query.fields, query.entity);
    if (query.where) this.validatePredicate(schema, query.where);
    this.validateOrder(schema, query.orderBy);
    if (query.limit !== undefined && (!Number.isInteger(query.limit) || query.limit < 0)) {
      throw new InvalidQuery('limit must be a non-negative integer', { limit: query.limit });
    }
    if (query.offset !== undefined && (!Number.isInteger(query.offset) || query.offset < 0)) {
      throw new InvalidQuery('offset must be a non-negative integer', { offset: query.offset });
    }
    for (const include of query.include ?? []) {
      this.validateInclude(schema, include, new Set([schema.name]));
    }
    return schema;
  }

  validatePredicate(schema: EntitySchema, predicate: Predicate): void {
    switch (predicate.kind) {
      case 'compare': {
        this.fieldType(schema, predicate.field);
        if (predicate.op === 'in' && !Array.isArray(predicate.value)) {
          throw new InvalidQuery(`"in" on ${predicate.field} needs an array value`, { field: predicate.field });
        }
        if (predicate.op !== 'in' && predicate.op !== 'isNull' && Array.isArray(predicate.value)) {
          throw new InvalidQuery(`"${predicate.op}" on ${predicate.field} needs a single value`, { field: predicate.field });
        }
        return;
      }
      case 'and':
      case 'or':
        if (predicate.clauses.length === 0) {
          throw new InvalidQuery(`"${predicate.kind}" needs at least one clause`);
        }
        predicate.clauses.forEach((clause) => this.validatePredicate(schema, clause));
        return;
      case 'not':
        this.validatePredicate(schema, predicate.clause);
        return;
    }
  }

  private validateInclude(parent: EntitySchema, include: IncludeQuery, path: Set<string>): void {
    const relation = this.relation(parent, include.relation);
    const target = this.get(relation.target);
    if (relation.kind === 'hasMany') {
      this.fieldType(target, relation.foreignKey);
    } else {
      this.fieldType(parent, relation.foreignKey);
    }
    this.validateProjection(target, include.fields, `${parent.name}.${include.relation}`);
    if (include.where) this.validatePredicate(target, include.where);
    this.validateOrder(target, include.orderBy);

    if (path.has(target.name) && (include.include?.length ?? 0) > 0) {
      throw new InvalidQuery(`Include path revisits ${target.name}`, { relation: include.relation });
    }
    const nextPath = new Set(path).add(target.name);
    for (const nested of include.include ?? []) {
      this.validateInclude(target, nested, nextPath);
    }
  }

  private validateProjection(schema: EntitySchema, fields: string[] | undefined, context: string): void {
    if (!fields || fields.length === 0) {
      throw new InvalidQuery(`${context}: an explicit field list is required`, { entity: schema.name });
    }
    const unknown = fields.filter((field) => !Object.hasOwn(schema.fields, field));
    if (unknown.length > 0) {
      throw new InvalidQuery(`${context}: unknown fields ${unknown.join(', ')}`, { entity: schema.name, fields: unknown });
    }
  }

  private validateOrder(schema: EntitySchema, orderBy: OrderBy[] | undefined): void {
    for (const order of orderBy ?? []) {
      this.fieldType(schema, order.field);
    }
  }
}
