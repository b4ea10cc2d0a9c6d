import { randomUUID } from 'node:crypto';

import type {
  CompleteOperationEntryInput,
  CreateOperationEntryInput,
  ListOperationEntriesInput,
  OperationLogCursor,
  OperationLogEntry,
  OperationLogRepository
} from './operation-log-repository.js';

function cloneEntry(entry: OperationLogEntry): OperationLogEntry {
  return structuredClone(entry);
}

function isBefore(entry: OperationLogEntry, cursor: OperationLogCursor): boolean {
  if (entry.startedAt.getTime() !== cursor.startedAt.getTime()) {
    return entry.startedAt.getTime() < cursor.startedAt.getTime();
  }

  return entry.id.localeCompare(cursor.id) < 0;
}

export class InMemoryOperationLogRepository implements OperationLogRepository {
  private readonly entries: OperationLogEntry[] = [];

  public createEntry(input: CreateOperationEntryInput): Promise<OperationLogEntry> {
    const entry: OperationLogEntry = {
      id: randomUUID(),
      operationType: input.operationType,
      status: 'started',
      tenantId: input.tenantId,
      tenantSlug: input.tenantSlug,
      initiatedBy: input.initiatedBy,
      triggerSource: input.triggerSource,
      platformResults: {},
      successCount: 0,
      failureCount: 0,
      errorMessages: [],
      requestPayload: structuredClone(input.requestPayload),
      responsePayload: null,
      startedAt: input.startedAt,
      completedAt: null,
      durationMs: null,
      rollbackOperationId: null
    };

    this.entries.push(entry);
    return Promise.resolve(cloneEntry(entry));
  }

  public completeEntry(input: CompleteOperationEntryInput): Promise<OperationLogEntry | null> {
    const entry = this.entries.find((candidate) => candidate.id === input.id);
    if (entry === undefined || entry.completedAt !== null) {
      return Promise.resolve(null);
    }

    if (input.status === 'partial_success' && input.failureCount === 0) {
      return Promise.reject(new Error('partial_success entries must record at least one failure.'));
    }

    entry.status = input.status;
    entry.tenantId = input.tenantId ?? entry.tenantId;
    entry.platformResults = structuredClone(input.platformResults);
    entry.successCount = input.successCount;
    entry.failureCount = input.failureCount;
    entry.errorMessages = [...input.errorMessages];
    entry.responsePayload = input.responsePayload === null ? null : structuredClone(input.responsePayload);
    entry.completedAt = input.completedAt;
    entry.durationMs = Math.max(0, input.completedAt.getTime() - entry.startedAt.getTime());

    return Promise.resolve(cloneEntry(entry));
  }

  public setRollbackOperation(entryId: string, rollbackOperationId: string): Promise<OperationLogEntry | null> {
    const entry = this.entries.find((candidate) => candidate.id === entryId);
    if (entry === undefined) {
      return Promise.resolve(null);
    }

    entry.rollbackOperationId = rollbackOperationId;
    return Promise.resolve(cloneEntry(entry));
  }

  public findEntryById(entryId: string): Promise<OperationLogEntry | null> {
    const entry = this.entries.find((candidate) => candidate.id === entryId);
    return Promise.resolve(entry === undefined ? null : cloneEntry(entry));
  }

  public listEntries(input: ListOperationEntriesInput): Promise<OperationLogEntry[]> {
    const { after, from, to } = input;

    const sorted = this.entries
      .filter((entry) => input.tenantSlug === undefined || entry.tenantSlug === input.tenantSlug)
      .filter((entry) => input.operationType === undefined || entry.operationType === input.operationType)
      .filter((entry) => from === undefined || entry.startedAt.getTime() >= from.getTime())
      .filter((entry) => to === undefined || entry.startedAt.getTime() <= to.getTime())
      .sort((left, right) => {
        if (left.startedAt.getTime() !== right.startedAt.getTime()) {
          return right.startedAt.getTime() - left.startedAt.getTime();
        }

        return right.id.localeCompare(left.id);
      });

    const filtered = after === undefined ? sorted : sorted.filter((entry) => isBefore(entry, after));
    return Promise.resolve(filtered.slice(0, input.limit).map(cloneEntry));
  }
}
