import { randomUUID } from 'node:crypto';

import type { Pool, PoolClient } from 'pg';

import { getSingleRow, isUniqueViolation, withTransaction } from '../db/transaction.js';
import { PLATFORMS, type Platform } from '../domain/platform.js';
import { parsePlatformStates, parseTenantData } from './record-schemas.js';
import type {
  CmsSpace,
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

interface TenantRow {
  id: string;
  slug: string;
  name: string;
  contact_email: string | null;
  status: Tenant['status'];
  health_status: Tenant['healthStatus'];
  last_health_check_at: Date | null;
  tier: Tenant['tier'];
  repository: string | null;
  deployment_project_id: string | null;
  cms_mode: CmsSpace['mode'] | null;
  cms_space_id: string | null;
  backup_prefix: string | null;
  staging_url: string | null;
  tags: string[];
  metadata: Record<string, unknown>;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
  superseded_by_tenant_id: string | null;
}

interface SnapshotRow {
  id: string;
  original_tenant_id: string;
  tenant_slug: string;
  tenant_data: unknown;
  deleted_by: string;
  deletion_reason: string;
  deleted_at: Date;
  recovery_deadline: Date;
  platform_states: unknown;
  delete_operation_id: string | null;
  recovered: boolean;
  recovered_at: Date | null;
  recovered_by: string | null;
  new_tenant_id: string | null;
  permanently_deleted: boolean;
  permanently_deleted_at: Date | null;
}

const CURRENT_TENANT = `status <> 'permanently_deleted' AND superseded_by_tenant_id IS NULL`;
const OPEN_SNAPSHOT = 'NOT recovered AND NOT permanently_deleted';

function mapCms(row: TenantRow): CmsSpace | null {
  if (row.cms_mode === null || row.cms_space_id === null) {
    return null;
  }

  return { mode: row.cms_mode, spaceId: row.cms_space_id };
}

function mapTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    slug: row.slug,
    name: row.name,
    contactEmail: row.contact_email,
    status: row.status,
    healthStatus: row.health_status,
    lastHealthCheckAt: row.last_health_check_at,
    tier: row.tier,
    repository: row.repository,
    deploymentProjectId: row.deployment_project_id,
    cms: mapCms(row),
    backupPrefix: row.backup_prefix,
    stagingUrl: row.staging_url,
    tags: row.tags,
    metadata: row.metadata,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
    supersededByTenantId: row.superseded_by_tenant_id
  };
}

function mapSnapshot(row: SnapshotRow): DeletionSnapshot {
  return {
    id: row.id,
    originalTenantId: row.original_tenant_id,
    tenantSlug: row.tenant_slug,
    tenantData: parseTenantData(row.tenant_data),
    deletedBy: row.deleted_by,
    deletionReason: row.deletion_reason,
    deletedAt: row.deleted_at,
    recoveryDeadline: row.recovery_deadline,
    platforms: parsePlatformStates(row.platform_states),
    deleteOperationId: row.delete_operation_id,
    recovered: row.recovered,
    recoveredAt: row.recovered_at,
    recoveredBy: row.recovered_by,
    newTenantId: row.new_tenant_id,
    permanentlyDeleted: row.permanently_deleted,
    permanentlyDeletedAt: row.permanently_deleted_at
  };
}

async function insertTenant(client: Pool | PoolClient, tenant: Tenant): Promise<TenantRow | null> {
  const result = await client.query<TenantRow>(
    `
    INSERT INTO tenants (
      id, slug, name, contact_email, status, health_status, last_health_check_at, tier,
      repository, deployment_project_id, cms_mode, cms_space_id, backup_prefix, staging_url,
      tags, metadata, created_at, updated_at, deleted_at, superseded_by_tenant_id
    )
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16::jsonb, $17, $18, $19, $20)
    RETURNING *
    `,
    [
      tenant.id,
      tenant.slug,
      tenant.name,
      tenant.contactEmail,
      tenant.status,
      tenant.healthStatus,
      tenant.lastHealthCheckAt,
      tenant.tier,
      tenant.repository,
      tenant.deploymentProjectId,
      tenant.cms?.mode ?? null,
      tenant.cms?.spaceId ?? null,
      tenant.backupPrefix,
      tenant.stagingUrl,
      tenant.tags,
      JSON.stringify(tenant.metadata),
      tenant.createdAt,
      tenant.updatedAt,
      tenant.deletedAt,
      tenant.supersededByTenantId
    ]
  );

  return getSingleRow(result.rows);
}

function emptyPlatformStates(): Record<Platform, SnapshotPlatformState> {
  return {
    source_control: { archived: false, result: null },
    deployment: { archived: false, result: null },
    cms: { archived: false, result: null },
    backup: { archived: false, result: null }
  };
}

export class PostgresTenantRepository implements TenantRepository {
  public constructor(private readonly pool: Pool) {}

  public async createTenant(input: CreateTenantInput): Promise<Tenant | null> {
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

    try {
      const row = await insertTenant(this.pool, tenant);
      return row === null ? null : mapTenant(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return null;
      }

      throw error;
    }
  }

  public async findTenantBySlug(slug: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `SELECT * FROM tenants WHERE slug = $1 AND ${CURRENT_TENANT} LIMIT 1`,
      [slug]
    );
    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async findTenantById(tenantId: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>('SELECT * FROM tenants WHERE id = $1', [tenantId]);
    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async listTenants(input: ListTenantsInput): Promise<Tenant[]> {
    const result = await this.pool.query<TenantRow>(
      `
      SELECT *
      FROM tenants
      WHERE superseded_by_tenant_id IS NULL
        AND ($1::text IS NULL OR status = $1)
        AND ($2::text IS NULL OR health_status = $2)
      ORDER BY created_at DESC, slug ASC
      LIMIT $3 OFFSET $4
      `,
      [input.status ?? null, input.healthStatus ?? null, input.limit, input.offset]
    );

    return result.rows.map(mapTenant);
  }

  public async listCurrentTenants(): Promise<Tenant[]> {
    const result = await this.pool.query<TenantRow>(
      `SELECT * FROM tenants WHERE ${CURRENT_TENANT} ORDER BY slug ASC`
    );
    return result.rows.map(mapTenant);
  }

  public async transitionTenant(input: TransitionTenantInput): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `
      UPDATE tenants
      SET status = $3,
          updated_at = $4,
          deleted_at = CASE WHEN $3 = 'deleted' THEN $4 ELSE deleted_at END
      WHERE id = $1 AND status = $2
      RETURNING *
      `,
      [input.tenantId, input.from, input.to, input.at]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async updateTenantHealth(input: UpdateTenantHealthInput): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `
      UPDATE tenants
      SET health_status = $2, last_health_check_at = $3, updated_at = $3
      WHERE id = $1
      RETURNING *
      `,
      [input.tenantId, input.healthStatus, input.checkedAt]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async createDeletionSnapshot(input: CreateDeletionSnapshotInput): Promise<DeletionSnapshot> {
    const result = await this.pool.query<SnapshotRow>(
      `
      INSERT INTO deletion_snapshots (
        id, original_tenant_id, tenant_slug, tenant_data, deleted_by, deletion_reason,
        deleted_at, recovery_deadline, platform_states, delete_operation_id
      )
      VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, $8, $9::jsonb, $10)
      RETURNING *
      `,
      [
        randomUUID(),
        input.tenant.id,
        input.tenant.slug,
        JSON.stringify(input.tenant),
        input.deletedBy,
        input.deletionReason,
        input.deletedAt,
        input.recoveryDeadline,
        JSON.stringify(emptyPlatformStates()),
        input.deleteOperationId
      ]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Deletion snapshot insert returned no row.');
    }

    return mapSnapshot(row);
  }

  public async findSnapshotById(snapshotId: string): Promise<DeletionSnapshot | null> {
    const result = await this.pool.query<SnapshotRow>('SELECT * FROM deletion_snapshots WHERE id = $1', [snapshotId]);
    const row = getSingleRow(result.rows);
    return row === null ? null : mapSnapshot(row);
  }

  public async findOpenSnapshotByTenantId(tenantId: string): Promise<DeletionSnapshot | null> {
    const result = await this.pool.query<SnapshotRow>(
      `SELECT * FROM deletion_snapshots WHERE original_tenant_id = $1 AND ${OPEN_SNAPSHOT} LIMIT 1`,
      [tenantId]
    );
    const row = getSingleRow(result.rows);
    return row === null ? null : mapSnapshot(row);
  }

  public async findOpenSnapshotBySlug(slug: string): Promise<DeletionSnapshot | null> {
    const result = await this.pool.query<SnapshotRow>(
      `
      SELECT * FROM deletion_snapshots
      WHERE tenant_slug = $1 AND ${OPEN_SNAPSHOT}
      ORDER BY deleted_at DESC
      LIMIT 1
      `,
      [slug]
    );
    const row = getSingleRow(result.rows);
    return row === null ? null : mapSnapshot(row);
  }

  public async findLatestSnapshotBySlug(slug: string): Promise<DeletionSnapshot | null> {
    const result = await this.pool.query<SnapshotRow>(
      'SELECT * FROM deletion_snapshots WHERE tenant_slug = $1 ORDER BY deleted_at DESC LIMIT 1',
      [slug]
    );
    const row = getSingleRow(result.rows);
    return row === null ? null : mapSnapshot(row);
  }

  public async listOpenSnapshots(input: ListOpenSnapshotsInput): Promise<DeletionSnapshot[]> {
    const result = await this.pool.query<SnapshotRow>(
      `
      SELECT * FROM deletion_snapshots
      WHERE ${OPEN_SNAPSHOT}
        AND ($1::timestamptz IS NULL OR recovery_deadline < $1)
      ORDER BY recovery_deadline ASC
      LIMIT $2
      `,
      [input.deadlineBefore ?? null, input.limit]
    );

    return result.rows.map(mapSnapshot);
  }

  public async recordSnapshotResults(input: RecordSnapshotResultsInput): Promise<DeletionSnapshot | null> {
    return withTransaction(this.pool, async (client) => {
      const current = await client.query<SnapshotRow>(
        `SELECT * FROM deletion_snapshots WHERE id = $1 AND ${OPEN_SNAPSHOT} FOR UPDATE`,
        [input.snapshotId]
      );
      const row = getSingleRow(current.rows);
      if (row === null) {
        return null;
      }

      const platforms = parsePlatformStates(row.platform_states);
      for (const platform of PLATFORMS) {
        const result = input.results[platform];
        if (result === undefined) {
          continue;
        }

        platforms[platform] = {
          archived: platforms[platform].archived || result.success,
          result
        };
      }

      const updated = await client.query<SnapshotRow>(
        'UPDATE deletion_snapshots SET platform_states = $2::jsonb WHERE id = $1 RETURNING *',
        [input.snapshotId, JSON.stringify(platforms)]
      );
      const updatedRow = getSingleRow(updated.rows);
      return updatedRow === null ? null : mapSnapshot(updatedRow);
    });
  }

  public async recoverTenant(input: RecoverTenantInput): Promise<RecoverTenantResult | null> {
    return withTransaction(this.pool, async (client) => {
      const current = await client.query<SnapshotRow>(
        `SELECT * FROM deletion_snapshots WHERE id = $1 AND ${OPEN_SNAPSHOT} FOR UPDATE`,
        [input.snapshotId]
      );
      const snapshotRow = getSingleRow(current.rows);
      if (snapshotRow === null) {
        return null;
      }

      const source = parseTenantData(snapshotRow.tenant_data);

      // Retire first so the partial unique index on slug admits the replacement.
      // The superseded_by foreign key is deferred to commit.
      await client.query(
        'UPDATE tenants SET superseded_by_tenant_id = $2, updated_at = $3 WHERE id = $1',
        [snapshotRow.original_tenant_id, input.newTenantId, input.recoveredAt]
      );

      const tenantRow = await insertTenant(client, {
        ...source,
        id: input.newTenantId,
        status: 'active',
        healthStatus: 'unknown',
        lastHealthCheckAt: null,
        metadata: {
          ...source.metadata,
          recoveredFromTenantId: snapshotRow.original_tenant_id,
          recoveredFromSnapshotId: snapshotRow.id
        },
        createdAt: input.recoveredAt,
        updatedAt: input.recoveredAt,
        deletedAt: null,
        supersededByTenantId: null
      });
      if (tenantRow === null) {
        throw new Error('Recovered tenant insert returned no row.');
      }

      const updated = await client.query<SnapshotRow>(
        `
        UPDATE deletion_snapshots
        SET recovered = TRUE, recovered_at = $2, recovered_by = $3, new_tenant_id = $4
        WHERE id = $1
        RETURNING *
        `,
        [input.snapshotId, input.recoveredAt, input.recoveredBy, input.newTenantId]
      );
      const updatedRow = getSingleRow(updated.rows);
      if (updatedRow === null) {
        throw new Error('Deletion snapshot update returned no row.');
      }

      return { tenant: mapTenant(tenantRow), snapshot: mapSnapshot(updatedRow) };
    });
  }

  public async markPermanentlyDeleted(input: MarkPermanentlyDeletedInput): Promise<DeletionSnapshot | null> {
    return withTransaction(this.pool, async (client) => {
      const updated = await client.query<SnapshotRow>(
        `
        UPDATE deletion_snapshots
        SET permanently_deleted = TRUE, permanently_deleted_at = $2
        WHERE id = $1 AND ${OPEN_SNAPSHOT}
        RETURNING *
        `,
        [input.snapshotId, input.at]
      );
      const row = getSingleRow(updated.rows);
      if (row === null) {
        return null;
      }

      await client.query(
        `
        UPDATE tenants
        SET status = 'permanently_deleted', updated_at = $2
        WHERE id = $1 AND status = 'deleted'
        `,
        [row.original_tenant_id, input.at]
      );

      return mapSnapshot(row);
    });
  }
}
