import { Buffer } from 'node:buffer';

import { z } from 'zod';

import { NotFoundError, ValidationError } from '../errors/lifecycle-errors.js';
import type {
  OperationLogCursor,
  OperationLogEntry,
  OperationLogRepository,
  OperationType
} from '../repositories/operation-log-repository.js';

export interface OperationLogQueryServiceConfig {
  listDefaultLimit: number;
  listMaxLimit: number;
}

export interface ListOperationsQuery {
  tenantSlug?: string;
  operationType?: OperationType;
  from?: Date;
  to?: Date;
  limit?: number;
  cursor?: string;
}

export interface OperationLogPage {
  operations: OperationLogEntry[];
  nextCursor: string | null;
}

const cursorSchema = z.object({
  startedAt: z.string().datetime(),
  id: z.string().uuid()
});

function parseCursor(cursor?: string): OperationLogCursor | undefined {
  if (cursor === undefined || cursor.length === 0) {
    return undefined;
  }

  try {
    const decoded = Buffer.from(cursor, 'base64url').toString('utf8');
    const parsed = cursorSchema.safeParse(JSON.parse(decoded));
    if (!parsed.success) {
      return undefined;
    }

    return {
      startedAt: new Date(parsed.data.startedAt),
      id: parsed.data.id
    };
  } catch {
    return undefined;
  }
}

export function encodeCursor(cursor: OperationLogCursor): string {
  return Buffer.from(
    JSON.stringify({
      startedAt: cursor.startedAt.toISOString(),
      id: cursor.id
    })
  ).toString('base64url');
}

export class OperationLogQueryService {
  public constructor(
    private readonly repository: OperationLogRepository,
    private readonly config: OperationLogQueryServiceConfig
  ) {}

  public async listOperations(query: ListOperationsQuery): Promise<OperationLogPage> {
    const limit = this.normalizeLimit(query.limit);
    const after = parseCursor(query.cursor);

    if (query.cursor !== undefined && after === undefined) {
      throw new ValidationError('Cursor is invalid.');
    }

    const operations = await this.repository.listEntries({
      tenantSlug: query.tenantSlug,
      operationType: query.operationType,
      from: query.from,
      to: query.to,
      limit,
      after
    });

    const last = operations.at(-1);

    return {
      operations,
      nextCursor: operations.length < limit || last === undefined
        ? null
        : encodeCursor({ startedAt: last.startedAt, id: last.id })
    };
  }

  public async getOperation(operationId: string): Promise<OperationLogEntry> {
    const entry = await this.repository.findEntryById(operationId);
    if (entry === null) {
      throw new NotFoundError('OPERATION_NOT_FOUND', 'Operation not found.');
    }

    return entry;
  }

  private normalizeLimit(limit?: number): number {
    if (limit === undefined) {
      return this.config.listDefaultLimit;
    }

    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError('Limit must be a positive integer.');
    }

    return Math.min(limit, this.config.listMaxLimit);
  }
}
