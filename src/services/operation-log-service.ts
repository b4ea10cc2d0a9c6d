import type { Clock } from '../domain/lifecycle.js';
import { countResults, outcomeStatus, type OperationOutcome } from '../domain/outcome.js';
import type { PlatformResults } from '../domain/platform.js';
import type {
  CompletedOperationStatus,
  CreateOperationEntryInput,
  OperationLogEntry,
  OperationLogRepository
} from '../repositories/operation-log-repository.js';
import { recordLifecycleOperation } from '../telemetry/metrics.js';

export type OpenOperationInput = Omit<CreateOperationEntryInput, 'startedAt'>;

export interface CompleteOperationInput {
  tenantId: string | null;
  platformResults: PlatformResults;
  outcome: OperationOutcome;
  responsePayload: Record<string, unknown> | null;
}

function normalizePayload(payload: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(payload).filter(([, value]) => value !== undefined));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error.';
}

/** Writes the one operation log entry each orchestrator invocation owns. */
export class OperationLogService {
  public constructor(
    private readonly repository: OperationLogRepository,
    private readonly now: Clock
  ) {}

  public async open(input: OpenOperationInput): Promise<OperationLogEntry> {
    return this.repository.createEntry({
      ...input,
      requestPayload: normalizePayload(input.requestPayload),
      startedAt: this.now()
    });
  }

  public async complete(entry: OperationLogEntry, input: CompleteOperationInput): Promise<OperationLogEntry> {
    const status = outcomeStatus(input.outcome);
    const { successCount, failureCount } = countResults(input.platformResults);
    const errorMessages = input.outcome.kind === 'success'
      ? []
      : input.outcome.failures.map((failure) => `${failure.platform}: ${failure.error.message}`);

    return this.close(entry, status, {
      tenantId: input.tenantId,
      platformResults: input.platformResults,
      successCount,
      failureCount,
      errorMessages,
      responsePayload: input.responsePayload
    });
  }

  /** Precondition and unexpected failures close the entry as `failed`; the original error is left to the caller. */
  public async failSafely(entry: OperationLogEntry, error: unknown, tenantId: string | null = null): Promise<void> {
    try {
      await this.close(entry, 'failed', {
        tenantId,
        platformResults: {},
        successCount: 0,
        failureCount: 0,
        errorMessages: [errorMessage(error)],
        responsePayload: null
      });
    } catch (closeError) {
      console.error('operation_log_write_failed', {
        operationId: entry.id,
        operationType: entry.operationType,
        error: errorMessage(closeError)
      });
    }
  }

  public async linkRollbackSafely(entryId: string, rollbackOperationId: string): Promise<void> {
    try {
      await this.repository.setRollbackOperation(entryId, rollbackOperationId);
    } catch (error) {
      console.error('operation_log_write_failed', {
        operationId: entryId,
        rollbackOperationId,
        error: errorMessage(error)
      });
    }
  }

  private async close(
    entry: OperationLogEntry,
    status: CompletedOperationStatus,
    fields: {
      tenantId: string | null;
      platformResults: PlatformResults;
      successCount: number;
      failureCount: number;
      errorMessages: string[];
      responsePayload: Record<string, unknown> | null;
    }
  ): Promise<OperationLogEntry> {
    const completed = await this.repository.completeEntry({
      id: entry.id,
      status,
      ...fields,
      completedAt: this.now()
    });

    if (completed === null) {
      throw new Error(`Operation log entry ${entry.id} is already completed.`);
    }

    recordLifecycleOperation({ operation_type: entry.operationType, status });
    console.log('lifecycle_operation_completed', {
      operationId: completed.id,
      operationType: completed.operationType,
      tenantSlug: completed.tenantSlug,
      status,
      successCount: completed.successCount,
      failureCount: completed.failureCount,
      durationMs: completed.durationMs
    });

    return completed;
  }
}
