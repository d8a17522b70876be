import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import type { ConnectionSource } from './db.js';
import { createHealthRouter } from './routes/health.js';
import { createSalesRouter } from './routes/sales.js';
import { createImportRouter } from './routes/admin-import.js';
import { errorHandler } from './middleware/error-handler.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');
const openApiDocument = z.record(z.unknown()).parse(YAML.parse(readFileSync(openApiPath, 'utf8')));

export type AppDependencies = {
  db: ConnectionSource;
  config: Pick<AppConfig, 'importMaxFileSize' | 'logFormat'>;
};

export function createApp({ db, config }: AppDependencies): express.Express {
  const app = express();
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(morgan(config.logFormat));

  app.use('/api/v1/health', createHealthRouter(db));

  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use('/api/v1/sales', createSalesRouter(db));
  app.use('/api/v1/admin', createImportRouter(db, { maxFileSize: config.importMaxFileSize }));

  app.use(errorHandler);

  return app;
}
