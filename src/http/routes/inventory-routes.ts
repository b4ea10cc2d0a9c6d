import { Router } from 'express';
import { z } from 'zod';

import { PLATFORMS } from '../../domain/platform.js';
import type { InventoryService } from '../../services/inventory-service.js';
import { sendOutcome } from '../outcome-response.js';

const queryFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

const listInventoryQuerySchema = z.object({
  platform: z.enum(PLATFORMS).optional(),
  orphanedOnly: queryFlag.optional(),
  driftOnly: queryFlag.optional(),
  tenantSlug: z.string().min(1).max(63).optional()
});

const syncSchema = z.object({
  initiatedBy: z.string().trim().min(1).max(200).default('api')
});

export function createInventoryRoutes(inventoryService: InventoryService): Router {
  const router = Router();

  router.get('/', async (request, response, next) => {
    try {
      const query = listInventoryQuerySchema.parse(request.query);
      const items = await inventoryService.listInventory(query);

      response.status(200).json({ items });
    } catch (error) {
      next(error);
    }
  });

  router.post('/sync', async (request, response, next) => {
    try {
      const payload = syncSchema.parse(request.body ?? {});
      const result = await inventoryService.sync({ initiatedBy: payload.initiatedBy, triggerSource: 'api' });

      sendOutcome(response, result.outcome, {
        platforms: result.platforms,
        operationId: result.operation.id
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
