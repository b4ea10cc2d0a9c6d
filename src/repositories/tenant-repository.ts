import type { Platform, PlatformResult, PlatformResults } from '../domain/platform.js';

export const TENANT_STATUSES = ['pending', 'active', 'deleted', 'permanently_deleted'] as const;
export const TENANT_HEALTH_STATUSES = ['healthy', 'degraded', 'down', 'unknown'] as const;
export const TENANT_TIERS = ['entry', 'professional', 'enterprise'] as const;
export const CMS_SPACE_MODES = ['shared', 'dedicated'] as const;

export type TenantStatus = (typeof TENANT_STATUSES)[number];
export type TenantHealthStatus = (typeof TENANT_HEALTH_STATUSES)[number];
export type TenantTier = (typeof TENANT_TIERS)[number];

export type CmsSpace =
  | { mode: 'shared'; spaceId: string }
  | { mode: 'dedicated'; spaceId: string };

export interface Tenant {
  id: string;
  slug: string;
  name: string;
  contactEmail: string | null;
  status: TenantStatus;
  healthStatus: TenantHealthStatus;
  lastHealthCheckAt: Date | null;
  tier: TenantTier;
  repository: string | null;
  deploymentProjectId: string | null;
  cms: CmsSpace | null;
  backupPrefix: string | null;
  stagingUrl: string | null;
  tags: string[];
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
  supersededByTenantId: string | null;
}

export interface SnapshotPlatformState {
  archived: boolean;
  result: PlatformResult | null;
}

export interface DeletionSnapshot {
  id: string;
  originalTenantId: string;
  tenantSlug: string;
  tenantData: Tenant;
  deletedBy: string;
  deletionReason: string;
  deletedAt: Date;
  recoveryDeadline: Date;
  platforms: Record<Platform, SnapshotPlatformState>;
  deleteOperationId: string | null;
  recovered: boolean;
  recoveredAt: Date | null;
  recoveredBy: string | null;
  newTenantId: string | null;
  permanentlyDeleted: boolean;
  permanentlyDeletedAt: Date | null;
}

export interface CreateTenantInput {
  slug: string;
  name: string;
  contactEmail: string | null;
  status: Extract<TenantStatus, 'pending' | 'active'>;
  tier: TenantTier;
  repository: string | null;
  deploymentProjectId: string | null;
  cms: CmsSpace | null;
  backupPrefix: string | null;
  stagingUrl: string | null;
  tags: string[];
  metadata: Record<string, unknown>;
  now: Date;
}

export interface ListTenantsInput {
  status?: TenantStatus;
  healthStatus?: TenantHealthStatus;
  limit: number;
  offset: number;
}

export interface TransitionTenantInput {
  tenantId: string;
  from: TenantStatus;
  to: TenantStatus;
  at: Date;
}

export interface UpdateTenantHealthInput {
  tenantId: string;
  healthStatus: TenantHealthStatus;
  checkedAt: Date;
}

export interface CreateDeletionSnapshotInput {
  tenant: Tenant;
  deletedBy: string;
  deletionReason: string;
  deletedAt: Date;
  recoveryDeadline: Date;
  deleteOperationId: string;
}

export interface RecordSnapshotResultsInput {
  snapshotId: string;
  results: PlatformResults;
}

export interface RecoverTenantInput {
  snapshotId: string;
  newTenantId: string;
  recoveredBy: string;
  recoveredAt: Date;
}

export interface RecoverTenantResult {
  tenant: Tenant;
  snapshot: DeletionSnapshot;
}

export interface MarkPermanentlyDeletedInput {
  snapshotId: string;
  at: Date;
}

export interface ListOpenSnapshotsInput {
  deadlineBefore?: Date;
  limit: number;
}

/**
 * Tenant records and their deletion snapshots are the only shared mutable state of the
 * lifecycle, so both live behind one repository. Conditional writes return `null` when the
 * record is no longer in the state the caller expected.
 */
export interface TenantRepository {
  createTenant(input: CreateTenantInput): Promise<Tenant | null>;
  /** Current record for a slug: neither permanently deleted nor superseded by a recovery. */
  findTenantBySlug(slug: string): Promise<Tenant | null>;
  findTenantById(tenantId: string): Promise<Tenant | null>;
  listTenants(input: ListTenantsInput): Promise<Tenant[]>;
  listCurrentTenants(): Promise<Tenant[]>;
  transitionTenant(input: TransitionTenantInput): Promise<Tenant | null>;
  updateTenantHealth(input: UpdateTenantHealthInput): Promise<Tenant | null>;

  createDeletionSnapshot(input: CreateDeletionSnapshotInput): Promise<DeletionSnapshot>;
  findSnapshotById(snapshotId: string): Promise<DeletionSnapshot | null>;
  findOpenSnapshotByTenantId(tenantId: string): Promise<DeletionSnapshot | null>;
  findOpenSnapshotBySlug(slug: string): Promise<DeletionSnapshot | null>;
  findLatestSnapshotBySlug(slug: string): Promise<DeletionSnapshot | null>;
  listOpenSnapshots(input: ListOpenSnapshotsInput): Promise<DeletionSnapshot[]>;
  recordSnapshotResults(input: RecordSnapshotResultsInput): Promise<DeletionSnapshot | null>;
  /** Creates the replacement tenant, retires the old record and marks the snapshot recovered atomically. */
  recoverTenant(input: RecoverTenantInput): Promise<RecoverTenantResult | null>;
  markPermanentlyDeleted(input: MarkPermanentlyDeletedInput): Promise<DeletionSnapshot | null>;
}
