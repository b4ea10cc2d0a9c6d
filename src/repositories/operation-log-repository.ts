import type { PlatformResults } from '../domain/platform.js';

export const OPERATION_TYPES = [
  'create',
  'activate',
  'delete',
  'recover',
  'health_check',
  'inventory_sync',
  'permanent_delete',
  'rollback'
] as const;
export const OPERATION_STATUSES = ['started', 'in_progress', 'success', 'failed', 'partial_success', 'rolled_back'] as const;
export const TRIGGER_SOURCES = ['api', 'scheduled', 'manual', 'system'] as const;

export type OperationType = (typeof OPERATION_TYPES)[number];
export type OperationStatus = (typeof OPERATION_STATUSES)[number];
export type CompletedOperationStatus = Extract<OperationStatus, 'success' | 'failed' | 'partial_success'>;
export type TriggerSource = (typeof TRIGGER_SOURCES)[number];

export interface OperationLogEntry {
  id: string;
  operationType: OperationType;
  status: OperationStatus;
  tenantId: string | null;
  tenantSlug: string | null;
  initiatedBy: string;
  triggerSource: TriggerSource;
  platformResults: PlatformResults;
  successCount: number;
  failureCount: number;
  errorMessages: string[];
  requestPayload: Record<string, unknown>;
  responsePayload: Record<string, unknown> | null;
  startedAt: Date;
  completedAt: Date | null;
  durationMs: number | null;
  rollbackOperationId: string | null;
}

export interface OperationLogCursor {
  startedAt: Date;
  id: string;
}

export interface CreateOperationEntryInput {
  operationType: OperationType;
  tenantId: string | null;
  tenantSlug: string | null;
  initiatedBy: string;
  triggerSource: TriggerSource;
  requestPayload: Record<string, unknown>;
  startedAt: Date;
}

export interface CompleteOperationEntryInput {
  id: string;
  status: CompletedOperationStatus;
  tenantId: string | null;
  platformResults: PlatformResults;
  successCount: number;
  failureCount: number;
  errorMessages: string[];
  responsePayload: Record<string, unknown> | null;
  completedAt: Date;
}

export interface ListOperationEntriesInput {
  tenantSlug?: string;
  operationType?: OperationType;
  from?: Date;
  to?: Date;
  limit: number;
  after?: OperationLogCursor;
}

/**
 * Entries are append-only: once completed only the rollback link may change.
 * `completeEntry` returns `null` for an entry that is unknown or already completed.
 */
export interface OperationLogRepository {
  createEntry(input: CreateOperationEntryInput): Promise<OperationLogEntry>;
  completeEntry(input: CompleteOperationEntryInput): Promise<OperationLogEntry | null>;
  setRollbackOperation(entryId: string, rollbackOperationId: string): Promise<OperationLogEntry | null>;
  findEntryById(entryId: string): Promise<OperationLogEntry | null>;
  listEntries(input: ListOperationEntriesInput): Promise<OperationLogEntry[]>;
}
