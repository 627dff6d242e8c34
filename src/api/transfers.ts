/**
 * Transfer status routes.
 *
 * GET /transfers: recent transfers, newest first
 * GET /transfers/:transferId: one transfer with its run summary
 */

import { Router } from 'express';
import { z } from 'zod';
import { apiError, notFoundError, validationError } from '../domain/errors';
import { TransferStore } from '../storage/store';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

export function createTransferRoutes(store: TransferStore): Router {
  const router = Router();

  router.get('/transfers', async (req, res, next) => {
    const query = listQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json(apiError(validationError('Invalid pagination parameters')));
      return;
    }
    try {
      const transfers = await store.list(query.data);
      res.json({ transfers });
    } catch (err) {
      next(err);
    }
  });

  router.get('/transfers/:transferId', async (req, res, next) => {
    try {
      const transfer = await store.getById(req.params.transferId);
      if (!transfer) {
        res.status(404).json(apiError(notFoundError('Transfer', req.params.transferId)));
        return;
      }
      res.json({ transfer });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
