import type { PoolClient } from 'pg';
import { query, withClient, type ConnectionSource } from '../db.js';
import { ConstraintViolationError, StorageUnavailableError } from '../errors.js';
import { newSalesRecordSchema, type NewSalesRecord, type SalesRecord, type ScanResult } from '../types/sales.js';

type SalesRow = {
  id: string | number;
  nome_commerciale: string;
  email_commerciale: string;
  anno: string | number;
  trimestre: string | number;
  prodotto: string;
  area_geografica: string;
  quantita: string | number;
  ricavo: string | number;
};

const CREATE_TABLE = `create table if not exists vendite (
  id serial primary key,
  nome_commerciale text not null,
  email_commerciale text not null,
  anno integer not null,
  trimestre integer not null,
  prodotto text not null,
  area_geografica text not null,
  quantita integer not null,
  ricavo double precision not null
)`;

const SELECT_COLUMNS = `select id, nome_commerciale, email_commerciale, anno, trimestre, prodotto, area_geografica, quantita, ricavo
   from vendite`;

function toNumber(value: string | number): number {
  return typeof value === 'number' ? value : Number(value.trim());
}

function mapRecord(row: SalesRow): SalesRecord {
  return {
    id: toNumber(row.id),
    salespersonName: row.nome_commerciale,
    salespersonEmail: row.email_commerciale,
    year: toNumber(row.anno),
    quarter: toNumber(row.trimestre),
    product: row.prodotto,
    region: row.area_geografica,
    quantity: toNumber(row.quantita),
    revenue: toNumber(row.ricavo),
  };
}

export function validateRecord(record: NewSalesRecord): NewSalesRecord {
  const parsed = newSalesRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new ConstraintViolationError(
      'sales record is missing required fields',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * The `vendite` table seen through one checked-out client.
 *
 * Scans report read failures through `ScanResult.status` instead of throwing,
 * so a caller that only reads `records` sees an empty list on failure.
 */
export class SalesStore {
  constructor(private readonly client: PoolClient) {}

  async initialize(): Promise<void> {
    try {
      await query(this.client, CREATE_TABLE);
    } catch (error) {
      throw new StorageUnavailableError('cannot create table vendite', { cause: error });
    }
  }

  async insert(record: NewSalesRecord): Promise<number> {
    const valid = validateRecord(record);
    const { rows } = await query<{ id: string | number }>(
      this.client,
      `insert into vendite (nome_commerciale, email_commerciale, anno, trimestre, prodotto, area_geografica, quantita, ricavo)
       values ($1,$2,$3,$4,$5,$6,$7,$8)
       returning id`,
      [
        valid.salespersonName,
        valid.salespersonEmail,
        valid.year,
        valid.quarter,
        valid.product,
        valid.region,
        valid.quantity,
        valid.revenue,
      ]
    );
    return toNumber(rows[0].id);
  }

  async scanAll(): Promise<ScanResult> {
    return this.scan(`${SELECT_COLUMNS} order by id`, []);
  }

  async scanByEmail(email: string): Promise<ScanResult> {
    return this.scan(`${SELECT_COLUMNS} where email_commerciale = $1 order by id`, [email]);
  }

  async hasNaturalKey(record: NewSalesRecord): Promise<boolean> {
    const { rows } = await query<{ id: string | number }>(
      this.client,
      `select id from vendite
       where email_commerciale = $1 and anno = $2 and trimestre = $3 and prodotto = $4 and area_geografica = $5
       limit 1`,
      [record.salespersonEmail, record.year, record.quarter, record.product, record.region]
    );
    return rows.length > 0;
  }

  private async scan(text: string, params: unknown[]): Promise<ScanResult> {
    try {
      const { rows } = await query<SalesRow>(this.client, text, params);
      return { status: 'ok', records: rows.map(mapRecord) };
    } catch (error) {
      console.error('[store] read failed:', error instanceof Error ? error.message : error);
      return { status: 'failed', records: [], error };
    }
  }
}

/** Opens a store session, runs `fn`, and releases the client on every exit path. */
export function withSalesStore<T>(source: ConnectionSource, fn: (store: SalesStore) => Promise<T>): Promise<T> {
  return withClient(source, (client) => fn(new SalesStore(client)));
}
