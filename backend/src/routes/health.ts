import { Router } from 'express';
import { query, withPoolClient, type ClientSource } from '../db.js';
import { asyncHandler } from '../utils/async-handler.js';

export function createHealthRouter(db: ClientSource): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const now = await withPoolClient(db, (client) => query<{ now: Date | string }>(client, 'select now() as now'));
      const time = now.rows[0]?.now;
      res.json({ status: 'ok', time: time instanceof Date ? time.toISOString() : time ?? null });
    })
  );

  return router;
}
