import { describe, it, expect } from 'vitest';
import { ProjectionExecutor } from '../src/query/projection-executor.js';
import { InMemoryDataStore } from '../src/data/in-memory-store.js';
import { SchemaRegistry } from '../src/data/schema.js';
import { InvalidQuery, UnsupportedPushdown } from '../src/errors/index.js';
import { shopRegistry, shopStore, silentLogger } from './helpers.js';
import type { AggregateFunction, ComparisonOperator, EntitySchema, FieldType, Row } from '../src/types/index.js';

function executorFor(store: InMemoryDataStore, schemas: SchemaRegistry = shopRegistry()): ProjectionExecutor {
  return new ProjectionExecutor({ store, schemas, logger: silentLogger });
}

function wideSchema(): EntitySchema {
  const fields: Record<string, FieldType> = { id: 'number', name: 'string' };
  for (let i = 1; i <= 18; i++) {
    fields[`attribute${i}`] = 'string';
  }
  return { name: 'accounts', table: 'accounts', primaryKey: 'id', fields };
}

describe('ProjectionExecutor', () => {
  // --------------------------------------------------------------------------
  // Projection
  // --------------------------------------------------------------------------
  describe('project', () => {
    it('should transmit only the requested fields of a wide entity', async () => {
      const schemas = new SchemaRegistry([wideSchema()]);
      const store = new InMemoryDataStore(schemas);
      const rows: Row[] = [1, 2, 3].map((id) => {
        const row: Row = { id, name: `Account ${id}` };
        for (let i = 1; i <= 18; i++) row[`attribute${i}`] = `value-${id}-${i}`;
        return row;
      });
      store.seed('accounts', rows);

      const result = await executorFor(store, schemas).project({ entity: 'accounts', fields: ['id', 'name'] });

      expect(result.rows).toEqual([
        { id: 1, name: 'Account 1' },
        { id: 2, name: 'Account 2' },
        { id: 3, name: 'Account 3' },
      ]);
      expect(store.getRoundTrips()).toEqual([
        { kind: 'select', entity: 'accounts', rowCount: 3, transmitted: { accounts: ['id', 'name'] } },
      ]);
    });

    it('should push filtering, ordering and paging into the store', async () => {
      const store = shopStore(12);
      const result = await executorFor(store).project({
        entity: 'customers',
        fields: ['id'],
        where: { kind: 'compare', field: 'name', fn: 'lower', op: 'like', value: 'customer 1%' },
        orderBy: [{ field: 'id', direction: 'desc' }],
        limit: 2,
      });

      expect(result).toEqual({ entity: 'customers', fields: ['id'], rows: [{ id: 12 }, { id: 11 }] });
      expect(store.getRoundTrips()[0]?.rowCount).toBe(2);
    });

    it('should refuse an operator the store cannot evaluate before any round trip', async () => {
      const operators = new Set<ComparisonOperator>(['eq', 'in']);
      const store = shopStore(3, { capabilities: { operators } });

      await expect(
        executorFor(store).project({
          entity: 'customers',
          fields: ['id'],
          where: { kind: 'compare', field: 'email', op: 'like', value: '%@example.test' },
        })
      ).rejects.toThrow('Store "memory" cannot evaluate operator like on email');
      expect(store.getRoundTrips()).toHaveLength(0);
    });

    it('should refuse includes and unknown fields', async () => {
      const executor = executorFor(shopStore(1));

      await expect(
        executor.project({ entity: 'customers', fields: ['id'], include: [{ relation: 'orders', fields: ['id'] }] })
      ).rejects.toBeInstanceOf(InvalidQuery);
      await expect(executor.project({ entity: 'customers', fields: ['id', 'password'] })).rejects.toThrow(
        'customers: unknown fields password'
      );
    });
  });

  // --------------------------------------------------------------------------
  // Aggregation
  // --------------------------------------------------------------------------
  describe('aggregate', () => {
    it('should compute aggregates in the store', async () => {
      const store = shopStore(3);
      const executor = executorFor(store);

      expect(await executor.aggregate({ entity: 'orders' }, { fn: 'count' })).toBe(6);
      expect(await executor.aggregate({ entity: 'orders' }, { fn: 'sum', field: 'total' })).toBe(120);
      expect(await executor.aggregate({ entity: 'orders' }, { fn: 'avg', field: 'total' })).toBe(20);
      expect(await executor.aggregate({ entity: 'orders' }, { fn: 'min', field: 'total' })).toBe(10);
      expect(await executor.aggregate({ entity: 'orders' }, { fn: 'max', field: 'placedAt' })).toBe(
        '2024-03-15T00:00:00.000Z'
      );
      expect(store.getRoundTrips().map((trip) => trip.kind)).toEqual([
        'aggregate',
        'aggregate',
        'aggregate',
        'aggregate',
        'aggregate',
      ]);
    });

    it('should apply the filter before aggregating', async () => {
      const executor = executorFor(shopStore(3));
      const paid = { kind: 'compare' as const, field: 'status', op: 'eq' as const, value: 'paid' };

      expect(await executor.aggregate({ entity: 'orders', where: paid }, { fn: 'count' })).toBe(3);
      expect(await executor.aggregate({ entity: 'orders', where: paid }, { fn: 'sum', field: 'total' })).toBe(60);
    });

    it('should return zero counts and null values over an empty set', async () => {
      const executor = executorFor(shopStore(3));
      const none = { kind: 'compare' as const, field: 'id', op: 'eq' as const, value: 999 };

      expect(await executor.aggregate({ entity: 'orders', where: none }, { fn: 'count' })).toBe(0);
      expect(await executor.aggregate({ entity: 'orders', where: none }, { fn: 'sum', field: 'total' })).toBeNull();
    });

    it('should refuse an aggregate the store cannot compute', async () => {
      const store = shopStore(3, { capabilities: { aggregates: new Set<AggregateFunction>(['count']) } });

      await expect(executorFor(store).aggregate({ entity: 'orders' }, { fn: 'avg', field: 'total' })).rejects.toBeInstanceOf(
        UnsupportedPushdown
      );
      expect(store.getRoundTrips()).toHaveLength(0);
    });

    it('should reject aggregates that do not fit the field', async () => {
      const executor = executorFor(shopStore(1));

      await expect(executor.aggregate({ entity: 'orders' }, { fn: 'sum', field: 'status' })).rejects.toThrow(
        'sum needs a numeric field; status is string'
      );
      await expect(executor.aggregate({ entity: 'orders' }, { fn: 'max' })).rejects.toThrow('max needs a field');
    });
  });
});
