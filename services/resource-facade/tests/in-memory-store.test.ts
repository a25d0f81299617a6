import { describe, it, expect } from 'vitest';
import { InMemoryDataStore } from '../src/data/in-memory-store.js';
import { evaluatePredicate } from '../src/data/predicate.js';
import { UnsupportedPushdown } from '../src/errors/index.js';
import { shopRegistry } from './helpers.js';
import type { Predicate, Row } from '../src/types/index.js';

const NOW = Date.parse('2025-01-31T00:00:00.000Z');

function customers(): InMemoryDataStore {
  const store = new InMemoryDataStore(shopRegistry(), { now: () => NOW });
  store.seed('customers', [
    { id: 1, name: 'Ada', email: 'ada@example.test', region: 'north', createdAt: '2025-01-01T00:00:00.000Z' },
    { id: 2, name: 'grace', email: 'grace@example.test', region: null, createdAt: '2024-06-15T00:00:00.000Z' },
    { id: 3, name: 'Linus', email: 'linus@example.test', region: 'south', createdAt: null },
  ]);
  return store;
}

async function idsWhere(where: Predicate): Promise<unknown[]> {
  const rows = await customers().select({ entity: 'customers', fields: ['id'], where, orderBy: [{ field: 'id' }] });
  return rows.map((row) => row['id']);
}

describe('InMemoryDataStore', () => {
  it.each<[string, Predicate, number[]]>([
    ['eq', { kind: 'compare', field: 'region', op: 'eq', value: 'north' }, [1]],
    ['neq skips nulls', { kind: 'compare', field: 'region', op: 'neq', value: 'north' }, [3]],
    ['in', { kind: 'compare', field: 'id', op: 'in', value: [1, 3, 9] }, [1, 3]],
    ['like', { kind: 'compare', field: 'email', op: 'like', value: '%a%@example.test' }, [1, 2]],
    ['isNull', { kind: 'compare', field: 'region', op: 'isNull' }, [2]],
    ['isNull false', { kind: 'compare', field: 'region', op: 'isNull', value: false }, [1, 3]],
    ['upper', { kind: 'compare', field: 'name', fn: 'upper', op: 'eq', value: 'GRACE' }, [2]],
    ['length', { kind: 'compare', field: 'name', fn: 'length', op: 'gte', value: 5 }, [2, 3]],
    ['year', { kind: 'compare', field: 'createdAt', fn: 'year', op: 'eq', value: 2024 }, [2]],
    ['daysSince', { kind: 'compare', field: 'createdAt', fn: 'daysSince', op: 'lte', value: 30 }, [1]],
    ['date against ISO string', { kind: 'compare', field: 'createdAt', op: 'gt', value: '2024-12-31T00:00:00.000Z' }, [1]],
    [
      'or with not',
      {
        kind: 'or',
        clauses: [
          { kind: 'compare', field: 'id', op: 'eq', value: 1 },
          { kind: 'not', clause: { kind: 'compare', field: 'region', op: 'isNull' } },
        ],
      },
      [1, 3],
    ],
    ['not over a null column', { kind: 'not', clause: { kind: 'compare', field: 'region', op: 'eq', value: 'north' } }, [3]],
    [
      'not over an and with an unknown clause',
      {
        kind: 'not',
        clause: {
          kind: 'and',
          clauses: [
            { kind: 'compare', field: 'id', op: 'gte', value: 2 },
            { kind: 'compare', field: 'region', op: 'eq', value: 'south' },
          ],
        },
      },
      [1],
    ],
    [
      'or with an unknown clause',
      {
        kind: 'or',
        clauses: [
          { kind: 'compare', field: 'region', op: 'eq', value: 'south' },
          { kind: 'compare', field: 'id', op: 'eq', value: 2 },
        ],
      },
      [2, 3],
    ],
  ])('should evaluate %s', async (_name, where, expected) => {
    expect(await idsWhere(where)).toEqual(expected);
  });

  it('should return null for fields a row does not carry', async () => {
    const rows = await customers().select({ entity: 'customers', fields: ['region', 'createdAt'], where: { kind: 'compare', field: 'id', op: 'eq', value: 3 } });

    expect(rows).toEqual([{ region: 'south', createdAt: null }]);
  });

  it('should sort nulls last and page through results', async () => {
    const rows = await customers().select({
      entity: 'customers',
      fields: ['id'],
      orderBy: [{ field: 'region', direction: 'asc' }],
      limit: 2,
      offset: 1,
    });

    expect(rows).toEqual([{ id: 3 }, { id: 2 }]);
  });

  it('should aggregate dates as ISO strings and count non-null fields', async () => {
    const store = customers();

    expect(await store.aggregate({ entity: 'customers', op: { fn: 'min', field: 'createdAt' } })).toBe('2024-06-15T00:00:00.000Z');
    expect(await store.aggregate({ entity: 'customers', op: { fn: 'count', field: 'region' } })).toBe(2);
    expect(await store.aggregate({ entity: 'customers', op: { fn: 'count' } })).toBe(3);
  });

  it('should refuse composite selects when composition is off', async () => {
    const store = new InMemoryDataStore(shopRegistry(), { capabilities: { composition: false } });

    await expect(store.selectComposite({ entity: 'customers', fields: ['id'], include: [] })).rejects.toBeInstanceOf(
      UnsupportedPushdown
    );
  });

  it('should return copies the caller can modify', async () => {
    const store = customers();
    const [first] = await store.select({ entity: 'customers', fields: ['name'] });
    if (first) first['name'] = 'changed';

    const [again] = await store.select({ entity: 'customers', fields: ['name'] });
    expect(again).toEqual({ name: 'Ada' });
  });
});

describe('evaluatePredicate', () => {
  it('should treat an absent predicate as a match', () => {
    const row: Row = { id: 1 };
    expect(evaluatePredicate(undefined, row, NOW)).toBe(true);
  });
});
