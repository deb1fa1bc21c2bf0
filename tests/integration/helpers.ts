import type { Document } from 'mongodb';
import { defineModel, type ModelSchema } from '../../src/model/schema.js';
import { QueryEngine } from '../../src/store/query-engine.js';
import { InMemoryPool, type InMemoryPoolOptions } from '../helpers/in-memory-pool.js';

export const employees: ModelSchema = defineModel('employees', {
  name: { type: 'string' },
  department: { type: 'string' },
  salary: { type: 'integer' },
});

export const customers: ModelSchema = defineModel('customers', {
  name: { type: 'string' },
  tier: { type: 'string', storageName: 'level' },
});

export const orders: ModelSchema = defineModel('orders', {
  customerId: { type: 'string', storageName: 'customer_id' },
  quantity: { type: 'integer' },
});

export const tickets: ModelSchema = defineModel('tickets', {
  status: { type: 'string' },
});

export function seedCollections(): Record<string, Document[]> {
  const ticketsOf = (status: string, n: number): Document[] =>
    Array.from({ length: n }, (_, i) => ({ _id: `${status}-${i}`, status }));

  return {
    employees: [
      { _id: 'e1', name: 'Alice', department: 'eng', salary: 300 },
      { _id: 'e2', name: 'Bob', department: 'eng', salary: 200 },
      { _id: 'e3', name: 'Carol', department: 'eng', salary: 100 },
      { _id: 'e4', name: 'Dan', department: 'sales', salary: 150 },
      { _id: 'e5', name: 'Erin', department: 'sales', salary: 250 },
    ],
    customers: [
      { _id: 'c1', name: 'Ada', level: 'gold' },
      { _id: 'c2', name: 'Grace', level: 'silver' },
    ],
    orders: [
      { _id: 'o1', customer_id: 'c1', quantity: 1 },
      { _id: 'o2', customer_id: 'c2', quantity: 2 },
      { _id: 'o3', customer_id: 'c9', quantity: 3 },
    ],
    tickets: [...ticketsOf('open', 12), ...ticketsOf('closed', 3), ...ticketsOf('pending', 11)],
  };
}

export function createTestEngine(
  collections: Record<string, Document[]> = seedCollections(),
  options: InMemoryPoolOptions = {},
): { engine: QueryEngine; pool: InMemoryPool } {
  const pool = new InMemoryPool(collections, options);
  return { engine: new QueryEngine({ pool }), pool };
}
