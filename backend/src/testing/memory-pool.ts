import { newDb } from 'pg-mem';
import type { Pool } from 'pg';
import type { SalesRecord } from '../types/sales.js';

/** A `pg`-compatible pool backed by an in-process pg-mem database. */
export function createMemoryPool(): Pool {
  const db = newDb({ noAstCoverageCheck: true });
  const { Pool: MemoryPool } = db.adapters.createPg();
  return new MemoryPool();
}

let nextId = 1;

export function makeRecord(overrides: Partial<SalesRecord> = {}): SalesRecord {
  return {
    id: nextId++,
    salespersonName: 'Anna Rossi',
    salespersonEmail: 'anna@example.com',
    year: 2024,
    quarter: 1,
    product: 'Widget',
    region: 'Nord',
    quantity: 1,
    revenue: 10,
    ...overrides,
  };
}

export const SAMPLE_CSV = [
  'Nome Commerciale,Email Commerciale,Anno,Trimestre,Prodotto,Area Geografica,Quantità,Ricavo (€)',
  'Anna Rossi,anna@example.com,2024,1,Widget,Nord,10,1000.50',
  'Marco Bianchi,marco@example.com,2024,2,Gadget,Sud,4,200',
  'Anna Rossi,anna@example.com,2023,4,Gadget,Centro,7,350.25',
].join('\n');
