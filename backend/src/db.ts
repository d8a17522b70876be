import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { AppConfig } from './config.js';
import { StorageUnavailableError } from './errors.js';

/** Anything that hands out pooled clients: a `pg` Pool or an in-process stand-in. */
export type ConnectionSource = Pick<Pool, 'connect'>;

export function createPool(config: AppConfig['database']): Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
  });
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  client: PoolClient,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return client.query<T>(text, params);
}

export async function withClient<T>(source: ConnectionSource, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  let client: PoolClient;
  try {
    client = await source.connect();
  } catch (error) {
    throw new StorageUnavailableError('cannot open database connection', { cause: error });
  }
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}
