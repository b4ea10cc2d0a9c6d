import { Router } from 'express';
import { z } from 'zod';

import {
  TENANT_HEALTH_STATUSES,
  TENANT_STATUSES,
  TENANT_TIERS
} from '../../repositories/tenant-repository.js';
import type { DeletionService } from '../../services/deletion-service.js';
import type { HealthService } from '../../services/health-service.js';
import type { InventoryService } from '../../services/inventory-service.js';
import type { RecoveryService } from '../../services/recovery-service.js';
import type { TenantService } from '../../services/tenant-service.js';
import { sendOutcome } from '../outcome-response.js';

const slugParamsSchema = z.object({
  slug: z.string().min(1).max(63)
});

const optionalHandle = z.string().trim().min(1).max(500).nullable().optional();

const registerTenantSchema = z.object({
  slug: z.string().trim().min(1).max(63),
  name: z.string().trim().min(1).max(200),
  contactEmail: z.string().trim().email().nullable().optional(),
  status: z.enum(['pending', 'active']).optional(),
  tier: z.enum(TENANT_TIERS),
  repository: optionalHandle,
  deploymentProjectId: optionalHandle,
  cms: z.discriminatedUnion('mode', [
    z.object({ mode: z.literal('shared'), spaceId: z.string().trim().min(1) }),
    z.object({ mode: z.literal('dedicated'), spaceId: z.string().trim().min(1) })
  ]).nullable().optional(),
  backupPrefix: optionalHandle,
  stagingUrl: z.string().url().nullable().optional(),
  tags: z.array(z.string().trim().min(1).max(50)).max(50).optional(),
  metadata: z.record(z.unknown()).optional(),
  initiatedBy: z.string().trim().min(1).max(200)
});

const listTenantsQuerySchema = z.object({
  status: z.enum(TENANT_STATUSES).optional(),
  healthStatus: z.enum(TENANT_HEALTH_STATUSES).optional(),
  limit: z.coerce.number().int().positive().max(200).optional(),
  offset: z.coerce.number().int().min(0).optional()
});

const actorSchema = z.object({
  initiatedBy: z.string().trim().min(1).max(200).default('api')
});

const deleteTenantSchema = z.object({
  initiatedBy: z.string().trim().min(1).max(200),
  reason: z.string().max(2000).default(''),
  confirmed: z.boolean().default(false)
});

const recoverTenantSchema = z.object({
  recoveredBy: z.string().trim().min(1).max(200)
});

const healthHistoryQuerySchema = z.object({
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  limit: z.coerce.number().int().positive().max(500).optional()
});

export function createTenantRoutes(
  tenantService: TenantService,
  deletionService: DeletionService,
  recoveryService: RecoveryService,
  healthService: HealthService,
  inventoryService: InventoryService
): Router {
  const router = Router();

  router.post('/', async (request, response, next) => {
    try {
      const payload = registerTenantSchema.parse(request.body);
      const result = await tenantService.register(payload);

      response.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (request, response, next) => {
    try {
      const query = listTenantsQuerySchema.parse(request.query);
      const tenants = await tenantService.listTenants(query);

      response.status(200).json({ tenants });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:slug', async (request, response, next) => {
    try {
      const params = slugParamsSchema.parse(request.params);
      const detail = await tenantService.getTenant(params.slug);

      response.status(200).json(detail);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:slug/activate', async (request, response, next) => {
    try {
      const params = slugParamsSchema.parse(request.params);
      const payload = actorSchema.parse(request.body ?? {});
      const result = await tenantService.activate({ slug: params.slug, initiatedBy: payload.initiatedBy });

      response.status(200).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:slug', async (request, response, next) => {
    try {
      const params = slugParamsSchema.parse(request.params);
      const payload = deleteTenantSchema.parse(request.body ?? {});
      const result = await deletionService.deleteTenant({ slug: params.slug, ...payload });

      sendOutcome(response, result.outcome, {
        tenant: result.tenant,
        snapshotId: result.snapshot.id,
        recoveryDeadline: result.snapshot.recoveryDeadline,
        platforms: result.snapshot.platforms,
        operationId: result.operation.id
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:slug/recover', async (request, response, next) => {
    try {
      const params = slugParamsSchema.parse(request.params);
      const payload = recoverTenantSchema.parse(request.body);
      const result = await recoveryService.recover({ slug: params.slug, recoveredBy: payload.recoveredBy });

      sendOutcome(response, result.outcome, {
        tenant: result.tenant,
        previousTenantId: result.previousTenantId,
        snapshotId: result.snapshot.id,
        platformResults: result.operation.platformResults,
        operationId: result.operation.id
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:slug/health', async (request, response, next) => {
    try {
      const params = slugParamsSchema.parse(request.params);
      const health = await healthService.getCurrentHealth(params.slug);

      response.status(200).json(health);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:slug/health/history', async (request, response, next) => {
    try {
      const params = slugParamsSchema.parse(request.params);
      const query = healthHistoryQuerySchema.parse(request.query);
      const records = await healthService.listHealthHistory(params.slug, {
        from: query.from === undefined ? undefined : new Date(query.from),
        to: query.to === undefined ? undefined : new Date(query.to),
        limit: query.limit
      });

      response.status(200).json({ records });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:slug/health/check', async (request, response, next) => {
    try {
      const params = slugParamsSchema.parse(request.params);
      const payload = actorSchema.parse(request.body ?? {});
      const result = await healthService.check({ slug: params.slug, initiatedBy: payload.initiatedBy });

      response.status(200).json({
        tenantSlug: result.tenant.slug,
        overallStatus: result.record.overallStatus,
        record: result.record,
        operationId: result.operation.id
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:slug/inventory/sync', async (request, response, next) => {
    try {
      const params = slugParamsSchema.parse(request.params);
      const payload = actorSchema.parse(request.body ?? {});
      const result = await inventoryService.syncOne(params.slug, { initiatedBy: payload.initiatedBy });

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
