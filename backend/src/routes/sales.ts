import { Router } from 'express';
import { z } from 'zod';
import type { ConnectionSource } from '../db.js';
import { notFound } from '../errors.js';
import { withSalesStore } from '../services/sales-store.js';
import { collectFilterOptions, computeTotals, filterRecords, summarize } from '../services/sales-query.js';
import { NO_DATA_MESSAGE, answerQuestion } from '../services/sales-responder.js';
import { ALL, GROUP_KEYS, type ScanResult } from '../types/sales.js';
import { asyncHandler } from '../utils/async-handler.js';

const numericCriterion = (schema: z.ZodNumber) =>
  z
    .union([
      z.literal(ALL),
      schema,
      z
        .string()
        .transform((value) => value.trim())
        .pipe(z.string().min(1))
        .pipe(z.coerce.number().pipe(schema)),
    ])
    .optional();

const textCriterion = z.string().trim().min(1).optional();

const scopeSchema = z.object({
  email: z.string().trim().min(1),
  year: numericCriterion(z.number().int()),
  quarter: numericCriterion(z.number().int().min(1).max(4)),
  product: textCriterion,
  region: textCriterion,
});

const summaryQuerySchema = scopeSchema.extend({
  groupBy: z.enum(GROUP_KEYS).default('year'),
});

const askSchema = scopeSchema.extend({
  question: z.string().trim().min(1),
});

function loadScoped(db: ConnectionSource, email: string): Promise<ScanResult> {
  return withSalesStore(db, (store) => store.scanByEmail(email));
}

export function createSalesRouter(db: ConnectionSource): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { email, ...criteria } = scopeSchema.parse(req.query);
      const scan = await loadScoped(db, email);

      if (scan.status === 'failed') {
        return res.json({
          status: 'unavailable',
          email,
          criteria,
          options: collectFilterOptions([]),
          records: [],
          totals: computeTotals([]),
        });
      }

      if (scan.records.length === 0) {
        throw notFound('email not recognized');
      }

      const records = filterRecords(scan.records, criteria);
      res.json({
        status: 'ok',
        email,
        criteria,
        options: collectFilterOptions(scan.records),
        records,
        totals: computeTotals(records),
      });
    })
  );

  router.get(
    '/summary',
    asyncHandler(async (req, res) => {
      const { email, groupBy, ...criteria } = summaryQuerySchema.parse(req.query);
      const scan = await loadScoped(db, email);

      if (scan.status === 'failed') {
        return res.json({ status: 'unavailable', groupBy, rows: [] });
      }

      if (scan.records.length === 0) {
        throw notFound('email not recognized');
      }

      res.json({
        status: 'ok',
        groupBy,
        rows: summarize(filterRecords(scan.records, criteria), groupBy),
      });
    })
  );

  router.post(
    '/ask',
    asyncHandler(async (req, res) => {
      const { email, question, ...criteria } = askSchema.parse(req.body ?? {});
      const scan = await loadScoped(db, email);

      if (scan.status === 'failed') {
        return res.json({ status: 'unavailable', intent: null, answer: NO_DATA_MESSAGE });
      }

      res.json({
        status: 'ok',
        ...answerQuestion(filterRecords(scan.records, criteria), question),
      });
    })
  );

  return router;
}
