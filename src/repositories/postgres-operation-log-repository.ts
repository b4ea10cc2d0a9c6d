import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import { getSingleRow } from '../db/transaction.js';
import { platformResultsSchema } from './record-schemas.js';
import type {
  CompleteOperationEntryInput,
  CreateOperationEntryInput,
  ListOperationEntriesInput,
  OperationLogEntry,
  OperationLogRepository
} from './operation-log-repository.js';

interface OperationLogRow {
  id: string;
  operation_type: OperationLogEntry['operationType'];
  status: OperationLogEntry['status'];
  tenant_id: string | null;
  tenant_slug: string | null;
  initiated_by: string;
  trigger_source: OperationLogEntry['triggerSource'];
  platform_results: unknown;
  success_count: number;
  failure_count: number;
  error_messages: string[];
  request_payload: Record<string, unknown>;
  response_payload: Record<string, unknown> | null;
  started_at: Date;
  completed_at: Date | null;
  duration_ms: number | null;
  rollback_operation_id: string | null;
}

function mapOperationLogRow(row: OperationLogRow): OperationLogEntry {
  return {
    id: row.id,
    operationType: row.operation_type,
    status: row.status,
    tenantId: row.tenant_id,
    tenantSlug: row.tenant_slug,
    initiatedBy: row.initiated_by,
    triggerSource: row.trigger_source,
    platformResults: platformResultsSchema.parse(row.platform_results),
    successCount: row.success_count,
    failureCount: row.failure_count,
    errorMessages: row.error_messages,
    requestPayload: row.request_payload,
    responsePayload: row.response_payload,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    durationMs: row.duration_ms,
    rollbackOperationId: row.rollback_operation_id
  };
}

export class PostgresOperationLogRepository implements OperationLogRepository {
  public constructor(private readonly pool: Pool) {}

  public async createEntry(input: CreateOperationEntryInput): Promise<OperationLogEntry> {
    const result = await this.pool.query<OperationLogRow>(
      `
      INSERT INTO operation_log (
        id,
        operation_type,
        status,
        tenant_id,
        tenant_slug,
        initiated_by,
        trigger_source,
        request_payload,
        started_at
      )
      VALUES ($1, $2, 'started', $3, $4, $5, $6, $7::jsonb, $8)
      RETURNING *
      `,
      [
        randomUUID(),
        input.operationType,
        input.tenantId,
        input.tenantSlug,
        input.initiatedBy,
        input.triggerSource,
        JSON.stringify(input.requestPayload),
        input.startedAt
      ]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Failed to create operation log entry.');
    }

    return mapOperationLogRow(row);
  }

  public async completeEntry(input: CompleteOperationEntryInput): Promise<OperationLogEntry | null> {
    const result = await this.pool.query<OperationLogRow>(
      `
      UPDATE operation_log
      SET status = $2,
          tenant_id = COALESCE($3, tenant_id),
          platform_results = $4::jsonb,
          success_count = $5,
          failure_count = $6,
          error_messages = $7,
          response_payload = $8::jsonb,
          completed_at = $9
      WHERE id = $1 AND completed_at IS NULL
      RETURNING *
      `,
      [
        input.id,
        input.status,
        input.tenantId,
        JSON.stringify(input.platformResults),
        input.successCount,
        input.failureCount,
        input.errorMessages,
        input.responsePayload === null ? null : JSON.stringify(input.responsePayload),
        input.completedAt
      ]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapOperationLogRow(row);
  }

  public async setRollbackOperation(entryId: string, rollbackOperationId: string): Promise<OperationLogEntry | null> {
    const result = await this.pool.query<OperationLogRow>(
      'UPDATE operation_log SET rollback_operation_id = $2 WHERE id = $1 RETURNING *',
      [entryId, rollbackOperationId]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapOperationLogRow(row);
  }

  public async findEntryById(entryId: string): Promise<OperationLogEntry | null> {
    const result = await this.pool.query<OperationLogRow>('SELECT * FROM operation_log WHERE id = $1', [entryId]);
    const row = getSingleRow(result.rows);
    return row === null ? null : mapOperationLogRow(row);
  }

  public async listEntries(input: ListOperationEntriesInput): Promise<OperationLogEntry[]> {
    const parameters: Array<Date | number | string> = [input.limit];
    const conditions: string[] = [];

    const addCondition = (template: (placeholder: string) => string, value: Date | string): void => {
      parameters.push(value);
      conditions.push(template(`$${parameters.length}`));
    };

    if (input.tenantSlug !== undefined) {
      addCondition((placeholder) => `tenant_slug = ${placeholder}`, input.tenantSlug);
    }

    if (input.operationType !== undefined) {
      addCondition((placeholder) => `operation_type = ${placeholder}`, input.operationType);
    }

    if (input.from !== undefined) {
      addCondition((placeholder) => `started_at >= ${placeholder}`, input.from);
    }

    if (input.to !== undefined) {
      addCondition((placeholder) => `started_at <= ${placeholder}`, input.to);
    }

    if (input.after !== undefined) {
      parameters.push(input.after.startedAt);
      parameters.push(input.after.id);
      conditions.push(`(started_at, id) < ($${parameters.length - 1}::timestamptz, $${parameters.length}::uuid)`);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.pool.query<OperationLogRow>(
      `
      SELECT *
      FROM operation_log
      ${whereClause}
      ORDER BY started_at DESC, id DESC
      LIMIT $1
      `,
      parameters
    );

    return result.rows.map(mapOperationLogRow);
  }
}
