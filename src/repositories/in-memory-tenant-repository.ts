import { randomUUID } from 'node:crypto';

import { PLATFORMS, type Platform } from '../domain/platform.js';
import type {
  CreateDeletionSnapshotInput,
  CreateTenantInput,
  DeletionSnapshot,
  ListOpenSnapshotsInput,
  ListTenantsInput,
  MarkPermanentlyDeletedInput,
  RecordSnapshotResultsInput,
  RecoverTenantInput,
  RecoverTenantResult,
  SnapshotPlatformState,
  Tenant,
  TenantRepository,
  TransitionTenantInput,
  UpdateTenantHealthInput
} from './tenant-repository.js';

function cloneTenant(tenant: Tenant): Tenant {
  return {
    ...tenant,
    cms: tenant.cms === null ? null : { ...tenant.cms },
    tags: [...tenant.tags],
    metadata: structuredClone(tenant.metadata),
    lastHealthCheckAt: tenant.lastHealthCheckAt === null ? null : new Date(tenant.lastHealthCheckAt),
    createdAt: new Date(tenant.createdAt),
    updatedAt: new Date(tenant.updatedAt),
    deletedAt: tenant.deletedAt === null ? null : new Date(tenant.deletedAt)
  };
}

function cloneSnapshot(snapshot: DeletionSnapshot): DeletionSnapshot {
  return {
    ...structuredClone(snapshot),
    tenantData: cloneTenant(snapshot.tenantData)
  };
}

function isCurrent(tenant: Tenant): boolean {
  return tenant.status !== 'permanently_deleted' && tenant.supersededByTenantId === null;
}

function isOpen(snapshot: DeletionSnapshot): boolean {
  return !snapshot.recovered && !snapshot.permanentlyDeleted;
}

function emptyPlatformStates(): Record<Platform, SnapshotPlatformState> {
  return {
    source_control: { archived: false, result: null },
    deployment: { archived: false, result: null },
    cms: { archived: false, result: null },
    backup: { archived: false, result: null }
  };
}

export class InMemoryTenantRepository implements TenantRepository {
  private readonly tenantsById = new Map<string, Tenant>();

  private readonly snapshotsById = new Map<string, DeletionSnapshot>();

  public async createTenant(input: CreateTenantInput): Promise<Tenant | null> {
    if (this.findCurrent(input.slug) !== undefined) {
      return null;
    }

    const tenant: Tenant = {
      id: randomUUID(),
      slug: input.slug,
      name: input.name,
      contactEmail: input.contactEmail,
      status: input.status,
      healthStatus: 'unknown',
      lastHealthCheckAt: null,
      tier: input.tier,
      repository: input.repository,
      deploymentProjectId: input.deploymentProjectId,
      cms: input.cms,
      backupPrefix: input.backupPrefix,
      stagingUrl: input.stagingUrl,
      tags: input.tags,
      metadata: input.metadata,
      createdAt: input.now,
      updatedAt: input.now,
      deletedAt: null,
      supersededByTenantId: null
    };

    this.tenantsById.set(tenant.id, cloneTenant(tenant));
    return cloneTenant(tenant);
  }

  public async findTenantBySlug(slug: string): Promise<Tenant | null> {
    const tenant = this.findCurrent(slug);
    return tenant === undefined ? null : cloneTenant(tenant);
  }

  public async findTenantById(tenantId: string): Promise<Tenant | null> {
    const tenant = this.tenantsById.get(tenantId);
    return tenant === undefined ? null : cloneTenant(tenant);
  }

  public async listTenants(input: ListTenantsInput): Promise<Tenant[]> {
    return [...this.tenantsById.values()]
      .filter((tenant) => tenant.supersededByTenantId === null)
      .filter((tenant) => input.status === undefined || tenant.status === input.status)
      .filter((tenant) => input.healthStatus === undefined || tenant.healthStatus === input.healthStatus)
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime() || left.slug.localeCompare(right.slug))
      .slice(input.offset, input.offset + input.limit)
      .map(cloneTenant);
  }

  public async listCurrentTenants(): Promise<Tenant[]> {
    return [...this.tenantsById.values()]
      .filter(isCurrent)
      .sort((left, right) => left.slug.localeCompare(right.slug))
      .map(cloneTenant);
  }

  public async transitionTenant(input: TransitionTenantInput): Promise<Tenant | null> {
    const tenant = this.tenantsById.get(input.tenantId);
    if (tenant === undefined || tenant.status !== input.from) {
      return null;
    }

    tenant.status = input.to;
    tenant.updatedAt = input.at;
    if (input.to === 'deleted') {
      tenant.deletedAt = input.at;
    }

    return cloneTenant(tenant);
  }

  public async updateTenantHealth(input: UpdateTenantHealthInput): Promise<Tenant | null> {
    const tenant = this.tenantsById.get(input.tenantId);
    if (tenant === undefined) {
      return null;
    }

    tenant.healthStatus = input.healthStatus;
    tenant.lastHealthCheckAt = input.checkedAt;
    tenant.updatedAt = input.checkedAt;
    return cloneTenant(tenant);
  }

  public async createDeletionSnapshot(input: CreateDeletionSnapshotInput): Promise<DeletionSnapshot> {
    if (this.findOpenForTenant(input.tenant.id) !== undefined) {
      throw new Error('An open deletion snapshot already exists for this tenant.');
    }

    const snapshot: DeletionSnapshot = {
      id: randomUUID(),
      originalTenantId: input.tenant.id,
      tenantSlug: input.tenant.slug,
      tenantData: cloneTenant(input.tenant),
      deletedBy: input.deletedBy,
      deletionReason: input.deletionReason,
      deletedAt: input.deletedAt,
      recoveryDeadline: input.recoveryDeadline,
      platforms: emptyPlatformStates(),
      deleteOperationId: input.deleteOperationId,
      recovered: false,
      recoveredAt: null,
      recoveredBy: null,
      newTenantId: null,
      permanentlyDeleted: false,
      permanentlyDeletedAt: null
    };

    this.snapshotsById.set(snapshot.id, cloneSnapshot(snapshot));
    return cloneSnapshot(snapshot);
  }

  public async findSnapshotById(snapshotId: string): Promise<DeletionSnapshot | null> {
    const snapshot = this.snapshotsById.get(snapshotId);
    return snapshot === undefined ? null : cloneSnapshot(snapshot);
  }

  public async findOpenSnapshotByTenantId(tenantId: string): Promise<DeletionSnapshot | null> {
    const snapshot = this.findOpenForTenant(tenantId);
    return snapshot === undefined ? null : cloneSnapshot(snapshot);
  }

  public async findOpenSnapshotBySlug(slug: string): Promise<DeletionSnapshot | null> {
    const snapshot = this.snapshotsForSlug(slug).find(isOpen);
    return snapshot === undefined ? null : cloneSnapshot(snapshot);
  }

  public async findLatestSnapshotBySlug(slug: string): Promise<DeletionSnapshot | null> {
    const snapshot = this.snapshotsForSlug(slug)[0];
    return snapshot === undefined ? null : cloneSnapshot(snapshot);
  }

  public async listOpenSnapshots(input: ListOpenSnapshotsInput): Promise<DeletionSnapshot[]> {
    const deadlineBefore = input.deadlineBefore;

    return [...this.snapshotsById.values()]
      .filter(isOpen)
      .filter((snapshot) => deadlineBefore === undefined || snapshot.recoveryDeadline.getTime() < deadlineBefore.getTime())
      .sort((left, right) => left.recoveryDeadline.getTime() - right.recoveryDeadline.getTime())
      .slice(0, input.limit)
      .map(cloneSnapshot);
  }

  public async recordSnapshotResults(input: RecordSnapshotResultsInput): Promise<DeletionSnapshot | null> {
    const snapshot = this.snapshotsById.get(input.snapshotId);
    if (snapshot === undefined || !isOpen(snapshot)) {
      return null;
    }

    for (const platform of PLATFORMS) {
      const result = input.results[platform];
      if (result === undefined) {
        continue;
      }

      snapshot.platforms[platform] = {
        archived: snapshot.platforms[platform].archived || result.success,
        result: structuredClone(result)
      };
    }

    return cloneSnapshot(snapshot);
  }

  public async recoverTenant(input: RecoverTenantInput): Promise<RecoverTenantResult | null> {
    const snapshot = this.snapshotsById.get(input.snapshotId);
    if (snapshot === undefined || !isOpen(snapshot)) {
      return null;
    }

    const retired = this.tenantsById.get(snapshot.originalTenantId);
    const source = snapshot.tenantData;
    const tenant: Tenant = {
      ...cloneTenant(source),
      id: input.newTenantId,
      status: 'active',
      healthStatus: 'unknown',
      lastHealthCheckAt: null,
      metadata: {
        ...structuredClone(source.metadata),
        recoveredFromTenantId: snapshot.originalTenantId,
        recoveredFromSnapshotId: snapshot.id
      },
      createdAt: input.recoveredAt,
      updatedAt: input.recoveredAt,
      deletedAt: null,
      supersededByTenantId: null
    };

    if (retired !== undefined) {
      retired.supersededByTenantId = tenant.id;
      retired.updatedAt = input.recoveredAt;
    }

    this.tenantsById.set(tenant.id, cloneTenant(tenant));

    snapshot.recovered = true;
    snapshot.recoveredAt = input.recoveredAt;
    snapshot.recoveredBy = input.recoveredBy;
    snapshot.newTenantId = tenant.id;

    return { tenant: cloneTenant(tenant), snapshot: cloneSnapshot(snapshot) };
  }

  public async markPermanentlyDeleted(input: MarkPermanentlyDeletedInput): Promise<DeletionSnapshot | null> {
    const snapshot = this.snapshotsById.get(input.snapshotId);
    if (snapshot === undefined || !isOpen(snapshot)) {
      return null;
    }

    snapshot.permanentlyDeleted = true;
    snapshot.permanentlyDeletedAt = input.at;

    const tenant = this.tenantsById.get(snapshot.originalTenantId);
    if (tenant !== undefined && tenant.status === 'deleted') {
      tenant.status = 'permanently_deleted';
      tenant.updatedAt = input.at;
    }

    return cloneSnapshot(snapshot);
  }

  private findCurrent(slug: string): Tenant | undefined {
    return [...this.tenantsById.values()].find((tenant) => tenant.slug === slug && isCurrent(tenant));
  }

  private findOpenForTenant(tenantId: string): DeletionSnapshot | undefined {
    return [...this.snapshotsById.values()].find((snapshot) => snapshot.originalTenantId === tenantId && isOpen(snapshot));
  }

  private snapshotsForSlug(slug: string): DeletionSnapshot[] {
    return [...this.snapshotsById.values()]
      .filter((snapshot) => snapshot.tenantSlug === slug)
      .sort((left, right) => right.deletedAt.getTime() - left.deletedAt.getTime());
  }
}
