import type { HealthDetail, HealthPlatform } from '../domain/platform.js';
import type { TenantHealthStatus } from './tenant-repository.js';

export interface PlatformHealthEntry extends HealthDetail {
  durationMs: number;
}

export type PlatformHealthStatuses = Partial<Record<HealthPlatform, PlatformHealthEntry>>;

export interface HealthCheckRecord {
  id: string;
  tenantId: string;
  tenantSlug: string;
  platforms: PlatformHealthStatuses;
  overallStatus: TenantHealthStatus;
  checkDurationMs: number;
  checkedAt: Date;
}

export interface CreateHealthCheckInput {
  tenantId: string;
  tenantSlug: string;
  platforms: PlatformHealthStatuses;
  overallStatus: TenantHealthStatus;
  checkDurationMs: number;
  checkedAt: Date;
}

export interface ListHealthChecksInput {
  tenantId: string;
  from?: Date;
  to?: Date;
  limit: number;
}

/** Append-only. The newest record per tenant is its current health. */
export interface HealthCheckRepository {
  createRecord(input: CreateHealthCheckInput): Promise<HealthCheckRecord>;
  findLatestRecord(tenantId: string): Promise<HealthCheckRecord | null>;
  listRecords(input: ListHealthChecksInput): Promise<HealthCheckRecord[]>;
}
