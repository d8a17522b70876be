import { Router } from 'express';
import multer from 'multer';
import path from 'node:path';
import { z } from 'zod';
import { booleanFlag } from '../config.js';
import type { ConnectionSource } from '../db.js';
import { badRequest } from '../errors.js';
import { ingestCsv } from '../services/sales-loader.js';
import { withSalesStore } from '../services/sales-store.js';
import { asyncHandler } from '../utils/async-handler.js';

export type ImportRouterOptions = {
  maxFileSize: number;
};

const importSchema = z.object({
  dedupe: booleanFlag.default('false'),
});

export function createImportRouter(db: ConnectionSource, options: ImportRouterOptions): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      files: 1,
      fileSize: options.maxFileSize,
    },
  });

  router.post(
    '/import',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const { dedupe } = importSchema.parse(req.body ?? {});
      const file = req.file;
      if (!file) {
        throw badRequest('file is required');
      }
      if (path.extname(file.originalname).toLowerCase() !== '.csv') {
        throw badRequest(`unsupported file type: ${file.originalname}`);
      }

      const report = await withSalesStore(db, async (store) => {
        await store.initialize();
        return ingestCsv(store, file.buffer.toString('utf8'), file.originalname, { dedupe });
      });

      console.log(
        `[ingest] ${report.source}: ${report.inserted} inserted, ${report.duplicates} duplicates, ${report.rejected.length} rejected`
      );
      res.status(201).json(report);
    })
  );

  return router;
}
