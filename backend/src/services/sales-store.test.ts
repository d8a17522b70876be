import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Pool } from 'pg';
import { ConstraintViolationError, StorageUnavailableError } from '../errors.js';
import { createMemoryPool } from '../testing/memory-pool.js';
import type { NewSalesRecord } from '../types/sales.js';
import { SalesStore, withSalesStore } from './sales-store.js';

const anna: NewSalesRecord = {
  salespersonName: 'Anna Rossi',
  salespersonEmail: 'anna@example.com',
  year: 2024,
  quarter: 1,
  product: 'Widget',
  region: 'Nord',
  quantity: 10,
  revenue: 1000.5,
};

describe('SalesStore', () => {
  let pool: Pool;

  beforeEach(() => {
    pool = createMemoryPool();
  });

  it('creates the table idempotently and assigns increasing ids', async () => {
    await withSalesStore(pool, async (store) => {
      await store.initialize();
      await store.initialize();

      const first = await store.insert(anna);
      const second = await store.insert({ ...anna, quarter: 2 });
      expect(second).toBeGreaterThan(first);

      const scan = await store.scanAll();
      expect(scan.status).toBe('ok');
      expect(scan.records).toEqual([
        { id: first, ...anna },
        { id: second, ...anna, quarter: 2 },
      ]);
    });
  });

  it('rejects records with missing or invalid fields', async () => {
    await withSalesStore(pool, async (store) => {
      await store.initialize();

      await expect(store.insert({ ...anna, product: '   ' })).rejects.toBeInstanceOf(ConstraintViolationError);
      await expect(store.insert({ ...anna, revenue: -1 })).rejects.toMatchObject({
        issues: ['revenue: Number must be greater than or equal to 0'],
      });
      await expect(store.insert({ ...anna, quarter: 5 })).rejects.toMatchObject({
        issues: ['quarter: Number must be less than or equal to 4'],
      });
      await expect(store.insert({ ...anna, revenue: Number.POSITIVE_INFINITY })).rejects.toMatchObject({
        issues: ['revenue: Number must be finite'],
      });

      const scan = await store.scanAll();
      expect(scan.records).toEqual([]);
    });
  });

  it('scopes scans to an exact, case-sensitive email', async () => {
    await withSalesStore(pool, async (store) => {
      await store.initialize();
      await store.insert(anna);
      await store.insert({ ...anna, salespersonEmail: 'Anna@Example.com' });
      await store.insert({ ...anna, salespersonName: 'Marco Bianchi', salespersonEmail: 'marco@example.com' });

      const scan = await store.scanByEmail('anna@example.com');
      expect(scan.status).toBe('ok');
      expect(scan.records.map((record) => record.salespersonEmail)).toEqual(['anna@example.com']);

      const unknown = await store.scanByEmail('nobody@example.com');
      expect(unknown).toEqual({ status: 'ok', records: [] });
    });
  });

  it('reports read failures through the scan status', async () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await withSalesStore(pool, async (store) => {
      const scan = await store.scanAll();
      expect(scan.status).toBe('failed');
      expect(scan.records).toEqual([]);
    });
    expect(errorLog).toHaveBeenCalledTimes(1);
    errorLog.mockRestore();
  });

  it('finds existing natural keys', async () => {
    await withSalesStore(pool, async (store) => {
      await store.initialize();
      await store.insert(anna);

      expect(await store.hasNaturalKey({ ...anna, quantity: 99, revenue: 1 })).toBe(true);
      expect(await store.hasNaturalKey({ ...anna, region: 'Sud' })).toBe(false);
    });
  });
});

describe('withSalesStore', () => {
  it('releases the client when the session fails', async () => {
    const pool = createMemoryPool();
    const client = await pool.connect();
    const release = vi.spyOn(client, 'release');

    await expect(
      withSalesStore({ connect: async () => client }, async (store) => {
        expect(store).toBeInstanceOf(SalesStore);
        throw new Error('render failed');
      })
    ).rejects.toThrow('render failed');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('raises StorageUnavailableError when no client can be opened', async () => {
    const refused = new Error('connection refused');
    const session = withSalesStore({ connect: () => Promise.reject(refused) }, async () => 'unreachable');

    await expect(session).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(session).rejects.toMatchObject({ cause: refused });
  });
});
