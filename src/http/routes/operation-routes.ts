import { Router } from 'express';
import { z } from 'zod';

import { OPERATION_TYPES } from '../../repositories/operation-log-repository.js';
import type { OperationLogQueryService } from '../../services/operation-log-query-service.js';

const listOperationsQuerySchema = z.object({
  tenantSlug: z.string().min(1).max(63).optional(),
  operationType: z.enum(OPERATION_TYPES).optional(),
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  limit: z.coerce.number().int().positive().max(200).optional(),
  cursor: z.string().min(1).optional()
});

const operationParamsSchema = z.object({
  operationId: z.string().uuid()
});

export function createOperationRoutes(operationLogQueryService: OperationLogQueryService): Router {
  const router = Router();

  router.get('/', async (request, response, next) => {
    try {
      const query = listOperationsQuerySchema.parse(request.query);
      const page = await operationLogQueryService.listOperations({
        tenantSlug: query.tenantSlug,
        operationType: query.operationType,
        from: query.from === undefined ? undefined : new Date(query.from),
        to: query.to === undefined ? undefined : new Date(query.to),
        limit: query.limit,
        cursor: query.cursor
      });

      response.status(200).json(page);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:operationId', async (request, response, next) => {
    try {
      const params = operationParamsSchema.parse(request.params);
      const operation = await operationLogQueryService.getOperation(params.operationId);

      response.status(200).json({ operation });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
