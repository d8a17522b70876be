import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      database: {
        host: 'localhost',
        port: 5432,
        user: 'sales',
        password: 'salespass',
        database: 'salesdb',
      },
      apiPort: 8080,
      ingest: {
        csvPath: 'sales_data.csv',
        onStart: true,
        dedupe: false,
      },
      importMaxFileSize: 10 * 1024 * 1024,
      logFormat: 'combined',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      POSTGRES_PORT: '6543',
      SALES_CSV_PATH: '/data/vendite.csv',
      SALES_INGEST_ON_START: 'false',
      SALES_INGEST_DEDUPE: ' YES ',
      LOG_FORMAT: 'tiny',
    });

    expect(config.database.port).toBe(6543);
    expect(config.ingest).toEqual({ csvPath: '/data/vendite.csv', onStart: false, dedupe: true });
    expect(config.logFormat).toBe('tiny');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ SALES_INGEST_ON_START: 'maybe' })).toThrow(ZodError);
    expect(() => loadConfig({ API_PORT: 'eighty' })).toThrow(ZodError);
  });
});
