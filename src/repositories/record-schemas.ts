import { z } from 'zod';

import type { Platform } from '../domain/platform.js';
import {
  TENANT_HEALTH_STATUSES,
  TENANT_STATUSES,
  TENANT_TIERS,
  type SnapshotPlatformState,
  type Tenant
} from './tenant-repository.js';

/** JSONB columns come back as plain JSON; these schemas restore their typed shape. */
export const platformErrorInfoSchema = z.object({
  code: z.string(),
  message: z.string(),
  retryable: z.boolean()
});

export const platformResultSchema = z.object({
  success: z.boolean(),
  detail: z.record(z.unknown()),
  error: platformErrorInfoSchema.nullable(),
  attempts: z.number().int(),
  durationMs: z.number()
});

export const platformResultsSchema = z.object({
  source_control: platformResultSchema.optional(),
  deployment: platformResultSchema.optional(),
  cms: platformResultSchema.optional(),
  backup: platformResultSchema.optional()
});

const snapshotPlatformStateSchema = z.object({
  archived: z.boolean(),
  result: platformResultSchema.nullable()
});

const platformStatesSchema = z.object({
  source_control: snapshotPlatformStateSchema,
  deployment: snapshotPlatformStateSchema,
  cms: snapshotPlatformStateSchema,
  backup: snapshotPlatformStateSchema
});

const nullableDate = z.coerce.date().nullable();

export const tenantDataSchema = z.object({
  id: z.string(),
  slug: z.string(),
  name: z.string(),
  contactEmail: z.string().nullable(),
  status: z.enum(TENANT_STATUSES),
  healthStatus: z.enum(TENANT_HEALTH_STATUSES),
  lastHealthCheckAt: nullableDate,
  tier: z.enum(TENANT_TIERS),
  repository: z.string().nullable(),
  deploymentProjectId: z.string().nullable(),
  cms: z.discriminatedUnion('mode', [
    z.object({ mode: z.literal('shared'), spaceId: z.string() }),
    z.object({ mode: z.literal('dedicated'), spaceId: z.string() })
  ]).nullable(),
  backupPrefix: z.string().nullable(),
  stagingUrl: z.string().nullable(),
  tags: z.array(z.string()),
  metadata: z.record(z.unknown()),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  deletedAt: nullableDate,
  supersededByTenantId: z.string().nullable()
});

export function parseTenantData(value: unknown): Tenant {
  return tenantDataSchema.parse(value);
}

export function parsePlatformStates(value: unknown): Record<Platform, SnapshotPlatformState> {
  return platformStatesSchema.parse(value);
}
