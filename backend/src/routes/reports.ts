import { Router } from 'express';
import { z } from 'zod';
import { withPoolClient, type ClientSource } from '../db.js';
import { topProducts, topSpenders } from '../services/reports.js';
import { asyncHandler } from '../utils/async-handler.js';

export const TOP_SPENDERS_MAX_LIMIT = 100;
export const TOP_PRODUCTS_MAX_LIMIT = 20;

const topSpendersQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(TOP_SPENDERS_MAX_LIMIT).default(10),
});

const topProductsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(TOP_PRODUCTS_MAX_LIMIT).default(1),
});

export function createReportsRouter(db: ClientSource): Router {
  const router = Router();

  router.get(
    '/top-spenders',
    asyncHandler(async (req, res) => {
      const { limit } = topSpendersQuerySchema.parse(req.query);
      const rows = await withPoolClient(db, (client) => topSpenders(client, limit));
      res.json(rows);
    })
  );

  router.get(
    '/top-products',
    asyncHandler(async (req, res) => {
      const { limit } = topProductsQuerySchema.parse(req.query);
      const rows = await withPoolClient(db, (client) => topProducts(client, limit));
      res.json(rows);
    })
  );

  return router;
}
