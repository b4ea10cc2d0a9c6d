import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import { getSingleRow } from '../db/transaction.js';
import type {
  InventoryItem,
  InventoryRepository,
  ListInventoryItemsInput,
  MarkDriftInput,
  UpsertInventoryItemInput
} from './inventory-repository.js';

interface InventoryItemRow {
  id: string;
  platform: InventoryItem['platform'];
  resource_type: string;
  resource_id: string;
  resource_name: string;
  resource_url: string | null;
  tenant_id: string | null;
  tenant_slug: string | null;
  is_orphaned: boolean;
  is_drift: boolean;
  discovered_at: Date;
  last_verified_at: Date;
  metadata: Record<string, unknown>;
  verification_error: string | null;
}

function mapInventoryItemRow(row: InventoryItemRow): InventoryItem {
  return {
    id: row.id,
    platform: row.platform,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    resourceName: row.resource_name,
    resourceUrl: row.resource_url,
    tenantId: row.tenant_id,
    tenantSlug: row.tenant_slug,
    isOrphaned: row.is_orphaned,
    isDrift: row.is_drift,
    discoveredAt: row.discovered_at,
    lastVerifiedAt: row.last_verified_at,
    metadata: row.metadata,
    verificationError: row.verification_error
  };
}

export class PostgresInventoryRepository implements InventoryRepository {
  public constructor(private readonly pool: Pool) {}

  public async upsertItem(input: UpsertInventoryItemInput): Promise<InventoryItem> {
    const result = await this.pool.query<InventoryItemRow>(
      `
      INSERT INTO inventory_items (
        id,
        platform,
        resource_type,
        resource_id,
        resource_name,
        resource_url,
        tenant_id,
        tenant_slug,
        is_orphaned,
        is_drift,
        discovered_at,
        last_verified_at,
        metadata,
        verification_error
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, FALSE, $10, $10, $11::jsonb, NULL)
      ON CONFLICT (platform, resource_type, resource_id) DO UPDATE
      SET resource_name = EXCLUDED.resource_name,
          resource_url = EXCLUDED.resource_url,
          tenant_id = EXCLUDED.tenant_id,
          tenant_slug = EXCLUDED.tenant_slug,
          is_orphaned = EXCLUDED.is_orphaned,
          is_drift = FALSE,
          last_verified_at = EXCLUDED.last_verified_at,
          metadata = EXCLUDED.metadata,
          verification_error = NULL
      RETURNING *
      `,
      [
        randomUUID(),
        input.platform,
        input.resourceType,
        input.resourceId,
        input.resourceName,
        input.resourceUrl,
        input.tenantId,
        input.tenantSlug,
        input.isOrphaned,
        input.verifiedAt,
        JSON.stringify(input.metadata)
      ]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Failed to upsert inventory item.');
    }

    return mapInventoryItemRow(row);
  }

  public async markDrift(input: MarkDriftInput): Promise<InventoryItem[]> {
    const result = await this.pool.query<InventoryItemRow>(
      `
      UPDATE inventory_items
      SET is_drift = TRUE
      WHERE platform = $1
        AND NOT is_drift
        AND NOT (id = ANY($2::uuid[]))
        AND ($3::text IS NULL OR tenant_slug = $3)
      RETURNING *
      `,
      [input.platform, input.seenItemIds, input.tenantSlug ?? null]
    );

    return result.rows.map(mapInventoryItemRow);
  }

  public async listItems(input: ListInventoryItemsInput): Promise<InventoryItem[]> {
    const result = await this.pool.query<InventoryItemRow>(
      `
      SELECT *
      FROM inventory_items
      WHERE ($1::text IS NULL OR platform = $1)
        AND (NOT $2::boolean OR is_orphaned)
        AND (NOT $3::boolean OR is_drift)
        AND ($4::text IS NULL OR tenant_slug = $4)
      ORDER BY platform, resource_type, resource_id
      `,
      [input.platform ?? null, input.orphanedOnly === true, input.driftOnly === true, input.tenantSlug ?? null]
    );

    return result.rows.map(mapInventoryItemRow);
  }
}
