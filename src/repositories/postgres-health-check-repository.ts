import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';
import { z } from 'zod';

import { getSingleRow } from '../db/transaction.js';
import { PLATFORM_HEALTH_STATUSES } from '../domain/platform.js';
import type {
  CreateHealthCheckInput,
  HealthCheckRecord,
  HealthCheckRepository,
  ListHealthChecksInput
} from './health-check-repository.js';

interface HealthCheckRow {
  id: string;
  tenant_id: string;
  tenant_slug: string;
  platform_statuses: unknown;
  overall_status: HealthCheckRecord['overallStatus'];
  check_duration_ms: number;
  checked_at: Date;
}

const platformHealthEntrySchema = z.object({
  status: z.enum(PLATFORM_HEALTH_STATUSES),
  issues: z.array(z.string()),
  detail: z.record(z.unknown()),
  durationMs: z.number()
});

const platformStatusesSchema = z.object({
  source_control: platformHealthEntrySchema.optional(),
  deployment: platformHealthEntrySchema.optional(),
  cms: platformHealthEntrySchema.optional(),
  backup: platformHealthEntrySchema.optional(),
  public_url: platformHealthEntrySchema.optional()
});

function mapHealthCheckRow(row: HealthCheckRow): HealthCheckRecord {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    tenantSlug: row.tenant_slug,
    platforms: platformStatusesSchema.parse(row.platform_statuses),
    overallStatus: row.overall_status,
    checkDurationMs: row.check_duration_ms,
    checkedAt: row.checked_at
  };
}

export class PostgresHealthCheckRepository implements HealthCheckRepository {
  public constructor(private readonly pool: Pool) {}

  public async createRecord(input: CreateHealthCheckInput): Promise<HealthCheckRecord> {
    const result = await this.pool.query<HealthCheckRow>(
      `
      INSERT INTO health_checks (
        id,
        tenant_id,
        tenant_slug,
        platform_statuses,
        overall_status,
        check_duration_ms,
        checked_at
      )
      VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7)
      RETURNING *
      `,
      [
        randomUUID(),
        input.tenantId,
        input.tenantSlug,
        JSON.stringify(input.platforms),
        input.overallStatus,
        Math.round(input.checkDurationMs),
        input.checkedAt
      ]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Failed to create health check record.');
    }

    return mapHealthCheckRow(row);
  }

  public async findLatestRecord(tenantId: string): Promise<HealthCheckRecord | null> {
    const result = await this.pool.query<HealthCheckRow>(
      'SELECT * FROM health_checks WHERE tenant_id = $1 ORDER BY checked_at DESC LIMIT 1',
      [tenantId]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapHealthCheckRow(row);
  }

  public async listRecords(input: ListHealthChecksInput): Promise<HealthCheckRecord[]> {
    const result = await this.pool.query<HealthCheckRow>(
      `
      SELECT *
      FROM health_checks
      WHERE tenant_id = $1
        AND ($2::timestamptz IS NULL OR checked_at >= $2)
        AND ($3::timestamptz IS NULL OR checked_at <= $3)
      ORDER BY checked_at DESC
      LIMIT $4
      `,
      [input.tenantId, input.from ?? null, input.to ?? null, input.limit]
    );

    return result.rows.map(mapHealthCheckRow);
  }
}
