import { Router } from 'express';
import { z } from 'zod';

import { TRIGGER_SOURCES } from '../../repositories/operation-log-repository.js';
import type { DeletionService } from '../../services/deletion-service.js';

const listDeletionsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).optional()
});

const snapshotParamsSchema = z.object({
  snapshotId: z.string().uuid()
});

const permanentDeletionSchema = z.object({
  initiatedBy: z.string().trim().min(1).max(200),
  triggerSource: z.enum(TRIGGER_SOURCES).default('scheduled')
});

export function createDeletionRoutes(deletionService: DeletionService): Router {
  const router = Router();

  router.get('/', async (request, response, next) => {
    try {
      const query = listDeletionsQuerySchema.parse(request.query);
      const deletions = await deletionService.listPendingDeletions(query.limit);

      response.status(200).json({ deletions });
    } catch (error) {
      next(error);
    }
  });

  router.get('/expired', async (request, response, next) => {
    try {
      const query = listDeletionsQuerySchema.parse(request.query);
      const deletions = await deletionService.listExpiredDeletions(undefined, query.limit);

      response.status(200).json({ deletions });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:snapshotId/permanent', async (request, response, next) => {
    try {
      const params = snapshotParamsSchema.parse(request.params);
      const payload = permanentDeletionSchema.parse(request.body);
      const result = await deletionService.markPermanentlyDeleted({
        snapshotId: params.snapshotId,
        initiatedBy: payload.initiatedBy,
        triggerSource: payload.triggerSource
      });

      response.status(200).json({
        snapshot: result.snapshot,
        operationId: result.operation.id
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
