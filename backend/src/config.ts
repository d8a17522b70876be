import { z } from 'zod';

export const booleanFlag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'on', 'off', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'on' || value === 'yes');

const port = z.coerce.number().int().min(0).max(65535);

const envSchema = z.object({
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: port.default(5432),
  POSTGRES_USER: z.string().min(1).default('sales'),
  POSTGRES_PASSWORD: z.string().default('salespass'),
  POSTGRES_DB: z.string().min(1).default('salesdb'),
  API_PORT: port.default(8080),
  SALES_CSV_PATH: z.string().min(1).default('sales_data.csv'),
  SALES_INGEST_ON_START: booleanFlag.default('true'),
  SALES_INGEST_DEDUPE: booleanFlag.default('false'),
  IMPORT_MAX_FILE_SIZE: z.coerce.number().int().positive().default(1024 * 1024 * 10),
  LOG_FORMAT: z.string().min(1).default('combined'),
});

export type AppConfig = {
  database: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
  };
  apiPort: number;
  ingest: {
    csvPath: string;
    onStart: boolean;
    dedupe: boolean;
  };
  importMaxFileSize: number;
  logFormat: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    database: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
    },
    apiPort: parsed.API_PORT,
    ingest: {
      csvPath: parsed.SALES_CSV_PATH,
      onStart: parsed.SALES_INGEST_ON_START,
      dedupe: parsed.SALES_INGEST_DEDUPE,
    },
    importMaxFileSize: parsed.IMPORT_MAX_FILE_SIZE,
    logFormat: parsed.LOG_FORMAT,
  };
}
