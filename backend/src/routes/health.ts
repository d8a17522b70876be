import { Router } from 'express';
import { query, withClient, type ConnectionSource } from '../db.js';
import { asyncHandler } from '../utils/async-handler.js';

export function createHealthRouter(db: ConnectionSource): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const now = await withClient(db, (client) => query<{ now: string | Date }>(client, 'select now()'));
      res.json({ status: 'ok', time: now.rows[0].now });
    })
  );

  return router;
}
