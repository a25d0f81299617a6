import { createLogger } from '../src/utils/logger.js';
import { SchemaRegistry } from '../src/data/schema.js';
import { InMemoryDataStore, type InMemoryDataStoreOptions } from '../src/data/in-memory-store.js';
import type { EntitySchema, Row } from '../src/types/index.js';

export const silentLogger = createLogger({ name: 'test', logLevel: 'silent' });

export const shopSchemas: EntitySchema[] = [
  {
    name: 'customers',
    table: 'customers',
    primaryKey: 'id',
    fields: { id: 'number', name: 'string', email: 'string', region: 'string', createdAt: 'date' },
    relations: [{ name: 'orders', target: 'orders', kind: 'hasMany', foreignKey: 'customerId' }],
  },
  {
    name: 'orders',
    table: 'orders',
    primaryKey: 'id',
    fields: { id: 'number', customerId: 'number', status: 'string', total: 'number', placedAt: 'date' },
    relations: [
      { name: 'customer', target: 'customers', kind: 'belongsTo', foreignKey: 'customerId' },
      { name: 'lines', target: 'orderLines', kind: 'hasMany', foreignKey: 'orderId' },
    ],
  },
  {
    name: 'orderLines',
    table: 'order_lines',
    primaryKey: 'id',
    fields: { id: 'number', orderId: 'number', productId: 'number', quantity: 'number' },
    relations: [{ name: 'product', target: 'products', kind: 'belongsTo', foreignKey: 'productId' }],
  },
  {
    name: 'products',
    table: 'products',
    primaryKey: 'id',
    fields: { id: 'number', sku: 'string', name: 'string', price: 'number' },
  },
];

export function shopRegistry(): SchemaRegistry {
  return new SchemaRegistry(shopSchemas);
}

/**
 * Customers 1..n, each with two orders (ids 2i-1 and 2i, total 10*i, the
 * first paid and the second open). Every order has one line whose id and
 * quantity equal the order id and whose product is (orderId % 3) + 1.
 */
export function seedShop(store: InMemoryDataStore, customerCount: number): void {
  const customers: Row[] = [];
  const orders: Row[] = [];
  const lines: Row[] = [];
  for (let i = 1; i <= customerCount; i++) {
    customers.push({
      id: i,
      name: `Customer ${i}`,
      email: `customer${i}@example.test`,
      region: i % 2 === 0 ? 'south' : 'north',
      createdAt: '2024-01-01T00:00:00.000Z',
    });
    for (const orderId of [2 * i - 1, 2 * i]) {
      orders.push({
        id: orderId,
        customerId: i,
        status: orderId % 2 === 1 ? 'paid' : 'open',
        total: 10 * i,
        placedAt: '2024-03-15T00:00:00.000Z',
      });
      lines.push({ id: orderId, orderId, productId: (orderId % 3) + 1, quantity: orderId });
    }
  }
  store.seed('customers', customers);
  store.seed('orders', orders);
  store.seed('orderLines', lines);
  store.seed('products', [
    { id: 1, sku: 'SKU-1', name: 'Product 1', price: 5 },
    { id: 2, sku: 'SKU-2', name: 'Product 2', price: 7.5 },
    { id: 3, sku: 'SKU-3', name: 'Product 3', price: 12 },
  ]);
}

export function shopStore(customerCount: number, options: InMemoryDataStoreOptions = {}): InMemoryDataStore {
  const store = new InMemoryDataStore(shopRegistry(), options);
  seedShop(store, customerCount);
  return store;
}
