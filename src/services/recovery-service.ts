import { randomUUID } from 'node:crypto';

import type { PlatformAdapters } from '../adapters/platform-adapter.js';
import { assertTransition, isWithinRecoveryWindow, type Clock } from '../domain/lifecycle.js';
import { requiresFollowUp, summarizeOutcome, type OperationOutcome } from '../domain/outcome.js';
import { PLATFORMS, type Platform, type ResourceRef } from '../domain/platform.js';
import { resolveResourceRefs } from '../domain/resource-refs.js';
import {
  InvalidStateError,
  NotFoundError,
  RecoveryWindowExpiredError,
  ValidationError
} from '../errors/lifecycle-errors.js';
import { withOperationLock, type OperationLock } from '../locks/operation-lock.js';
import type { PlatformCallPolicy } from '../platform/platform-call.js';
import type { OperationLogEntry, TriggerSource } from '../repositories/operation-log-repository.js';
import type { DeletionSnapshot, Tenant, TenantRepository } from '../repositories/tenant-repository.js';
import type { OperationLogService } from './operation-log-service.js';
import { fanOut } from './platform-fanout.js';

export interface RecoveryServiceConfig {
  backupRootPrefix: string;
  lockTtlMs: number;
  platformPolicy: PlatformCallPolicy;
}

export interface RecoverTenantRequest {
  slug: string;
  recoveredBy: string;
  triggerSource?: TriggerSource;
}

export interface RecoveryResult {
  tenant: Tenant;
  previousTenantId: string;
  snapshot: DeletionSnapshot;
  outcome: OperationOutcome;
  operation: OperationLogEntry;
  requiresFollowUp: Platform[];
}

/** Hands each restore the state its archive step recorded, such as the repository's prior visibility. */
function withArchiveState(
  refs: Partial<Record<Platform, ResourceRef>>,
  snapshot: DeletionSnapshot
): Partial<Record<Platform, ResourceRef>> {
  const sourceControl = refs.source_control;
  const wasPrivate = snapshot.platforms.source_control.result?.detail.wasPrivate;

  if (sourceControl === undefined || typeof wasPrivate !== 'boolean') {
    return refs;
  }

  return {
    ...refs,
    source_control: { ...sourceControl, metadata: { ...sourceControl.metadata, wasPrivate } }
  };
}

export class RecoveryService {
  public constructor(
    private readonly tenantRepository: TenantRepository,
    private readonly adapters: PlatformAdapters,
    private readonly lock: OperationLock,
    private readonly operationLog: OperationLogService,
    private readonly config: RecoveryServiceConfig,
    private readonly now: Clock
  ) {}

  /**
   * Restores a soft-deleted site under a new tenant id. Platform failures are reported for
   * manual follow-up and never block re-activation.
   */
  public async recover(input: RecoverTenantRequest): Promise<RecoveryResult> {
    const entry = await this.operationLog.open({
      operationType: 'recover',
      tenantId: null,
      tenantSlug: input.slug,
      initiatedBy: input.recoveredBy,
      triggerSource: input.triggerSource ?? 'api',
      requestPayload: { recoveredBy: input.recoveredBy }
    });
    let tenantId: string | null = null;

    try {
      if (input.recoveredBy.trim().length === 0) {
        throw new ValidationError('recoveredBy is required.');
      }

      return await withOperationLock(this.lock, input.slug, this.config.lockTtlMs, async () => {
        const snapshot = await this.findRecoverableSnapshot(input.slug);
        tenantId = snapshot.originalTenantId;

        if (!isWithinRecoveryWindow(snapshot, this.now())) {
          throw new RecoveryWindowExpiredError(snapshot.recoveryDeadline);
        }

        const retired = await this.tenantRepository.findTenantById(snapshot.originalTenantId);
        if (retired !== null) {
          assertTransition(retired.status, 'recover');
        }

        const refs = withArchiveState(resolveResourceRefs(snapshot.tenantData, this.config.backupRootPrefix), snapshot);
        const results = await fanOut(this.adapters, refs, PLATFORMS, 'reactivate', this.config.platformPolicy);

        const recovered = await this.tenantRepository.recoverTenant({
          snapshotId: snapshot.id,
          newTenantId: randomUUID(),
          recoveredBy: input.recoveredBy,
          recoveredAt: this.now()
        });
        if (recovered === null) {
          throw new InvalidStateError('The deletion snapshot was closed while the recovery was running.', {
            snapshotId: snapshot.id
          });
        }

        const outcome = summarizeOutcome(results);
        const operation = await this.operationLog.complete(entry, {
          tenantId: recovered.tenant.id,
          platformResults: results,
          outcome,
          responsePayload: {
            snapshotId: snapshot.id,
            previousTenantId: snapshot.originalTenantId,
            newTenantId: recovered.tenant.id
          }
        });

        if (snapshot.deleteOperationId !== null) {
          await this.operationLog.linkRollbackSafely(snapshot.deleteOperationId, operation.id);
        }

        console.log('tenant_recovered', {
          tenantSlug: input.slug,
          snapshotId: snapshot.id,
          newTenantId: recovered.tenant.id,
          outcome: outcome.kind
        });

        return {
          tenant: recovered.tenant,
          previousTenantId: snapshot.originalTenantId,
          snapshot: recovered.snapshot,
          outcome,
          operation,
          requiresFollowUp: requiresFollowUp(outcome)
        };
      });
    } catch (error) {
      await this.operationLog.failSafely(entry, error, tenantId);
      throw error;
    }
  }

  private async findRecoverableSnapshot(slug: string): Promise<DeletionSnapshot> {
    const open = await this.tenantRepository.findOpenSnapshotBySlug(slug);
    if (open !== null) {
      return open;
    }

    const latest = await this.tenantRepository.findLatestSnapshotBySlug(slug);
    if (latest?.recovered === true) {
      throw new InvalidStateError(`Site '${slug}' has already been recovered.`, {
        snapshotId: latest.id,
        newTenantId: latest.newTenantId
      });
    }

    if (latest !== null) {
      const current = await this.tenantRepository.findTenantBySlug(slug);
      if (current !== null && current.status !== 'deleted') {
        throw new InvalidStateError(`Cannot recover site '${slug}' while it is in status '${current.status}'.`, {
          status: current.status,
          tenantId: current.id
        });
      }
    }

    if (latest?.permanentlyDeleted === true) {
      throw new RecoveryWindowExpiredError(latest.recoveryDeadline);
    }

    throw new NotFoundError('DELETION_SNAPSHOT_NOT_FOUND', `No recoverable deletion exists for '${slug}'.`);
  }
}
