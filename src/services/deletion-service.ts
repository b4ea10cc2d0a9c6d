import type { PlatformAdapters } from '../adapters/platform-adapter.js';
import {
  assertTransition,
  computeRecoveryDeadline,
  daysUntil,
  isSnapshotOpen,
  isWithinRecoveryWindow,
  type Clock
} from '../domain/lifecycle.js';
import { requiresFollowUp, summarizeOutcome, type OperationOutcome } from '../domain/outcome.js';
import { PLATFORMS, type Platform } from '../domain/platform.js';
import { resolveResourceRefs } from '../domain/resource-refs.js';
import {
  ConfirmationRequiredError,
  InvalidStateError,
  NotFoundError,
  ValidationError
} from '../errors/lifecycle-errors.js';
import { withOperationLock, type OperationLock } from '../locks/operation-lock.js';
import type { PlatformCallPolicy } from '../platform/platform-call.js';
import type { OperationLogEntry, TriggerSource } from '../repositories/operation-log-repository.js';
import type { DeletionSnapshot, Tenant, TenantRepository } from '../repositories/tenant-repository.js';
import type { OperationLogService } from './operation-log-service.js';
import { fanOut } from './platform-fanout.js';

export interface DeletionServiceConfig {
  backupRootPrefix: string;
  lockTtlMs: number;
  platformPolicy: PlatformCallPolicy;
  listLimit: number;
}

export interface DeleteTenantInput {
  slug: string;
  initiatedBy: string;
  reason: string;
  confirmed: boolean;
  triggerSource?: TriggerSource;
}

export interface DeleteTenantResult {
  tenant: Tenant;
  snapshot: DeletionSnapshot;
  outcome: OperationOutcome;
  operation: OperationLogEntry;
  requiresFollowUp: Platform[];
}

export interface PermanentDeletionInput {
  snapshotId: string;
  initiatedBy: string;
  triggerSource?: TriggerSource;
}

export interface PermanentDeletionResult {
  snapshot: DeletionSnapshot;
  operation: OperationLogEntry;
}

export interface DeletionSummary {
  snapshotId: string;
  tenantSlug: string;
  originalTenantId: string;
  deletedBy: string;
  deletionReason: string;
  deletedAt: Date;
  recoveryDeadline: Date;
  daysRemaining: number;
  archivedPlatforms: Platform[];
  pendingPlatforms: Platform[];
}

interface PreparedDeletion {
  snapshot: DeletionSnapshot;
  pending: Platform[];
}

function unarchivedPlatforms(snapshot: DeletionSnapshot): Platform[] {
  return PLATFORMS.filter((platform) => !snapshot.platforms[platform].archived);
}

export function summarizeDeletion(snapshot: DeletionSnapshot, now: Date): DeletionSummary {
  const pendingPlatforms = unarchivedPlatforms(snapshot);

  return {
    snapshotId: snapshot.id,
    tenantSlug: snapshot.tenantSlug,
    originalTenantId: snapshot.originalTenantId,
    deletedBy: snapshot.deletedBy,
    deletionReason: snapshot.deletionReason,
    deletedAt: snapshot.deletedAt,
    recoveryDeadline: snapshot.recoveryDeadline,
    daysRemaining: Math.max(0, daysUntil(snapshot.recoveryDeadline, now)),
    archivedPlatforms: PLATFORMS.filter((platform) => !pendingPlatforms.includes(platform)),
    pendingPlatforms
  };
}

export class DeletionService {
  public constructor(
    private readonly tenantRepository: TenantRepository,
    private readonly adapters: PlatformAdapters,
    private readonly lock: OperationLock,
    private readonly operationLog: OperationLogService,
    private readonly config: DeletionServiceConfig,
    private readonly now: Clock
  ) {}

  /**
   * Soft-deletes a site: the snapshot is written before any platform call, each platform is
   * archived independently, and the tenant ends up `deleted` whatever the platforms report.
   */
  public async deleteTenant(input: DeleteTenantInput): Promise<DeleteTenantResult> {
    const entry = await this.operationLog.open({
      operationType: 'delete',
      tenantId: null,
      tenantSlug: input.slug,
      initiatedBy: input.initiatedBy,
      triggerSource: input.triggerSource ?? 'api',
      requestPayload: { reason: input.reason, confirmed: input.confirmed }
    });
    let tenantId: string | null = null;

    try {
      if (!input.confirmed) {
        throw new ConfirmationRequiredError();
      }

      const reason = input.reason.trim();
      if (reason.length === 0) {
        throw new ValidationError('A deletion reason is required.');
      }

      return await withOperationLock(this.lock, input.slug, this.config.lockTtlMs, async () => {
        const tenant = await this.tenantRepository.findTenantBySlug(input.slug);
        if (tenant === null) {
          throw new NotFoundError('TENANT_NOT_FOUND', `Site '${input.slug}' not found.`);
        }
        tenantId = tenant.id;

        const { snapshot, pending } = await this.prepare(tenant, input.initiatedBy, reason, entry.id);
        const refs = resolveResourceRefs(snapshot.tenantData, this.config.backupRootPrefix);
        const results = await fanOut(this.adapters, refs, pending, 'deactivate', this.config.platformPolicy);

        const recorded = await this.tenantRepository.recordSnapshotResults({ snapshotId: snapshot.id, results });
        if (recorded === null) {
          throw new InvalidStateError('The deletion snapshot was closed while the deletion was running.', {
            snapshotId: snapshot.id
          });
        }

        const deleted = tenant.status === 'deleted'
          ? tenant
          : await this.tenantRepository.transitionTenant({
            tenantId: tenant.id,
            from: 'active',
            to: assertTransition(tenant.status, 'delete'),
            at: snapshot.deletedAt
          });
        if (deleted === null) {
          throw new InvalidStateError(`Site '${input.slug}' changed status during deletion.`);
        }

        const outcome = summarizeOutcome(results);
        const operation = await this.operationLog.complete(entry, {
          tenantId: tenant.id,
          platformResults: results,
          outcome,
          responsePayload: {
            snapshotId: recorded.id,
            recoveryDeadline: recorded.recoveryDeadline.toISOString(),
            platforms: pending
          }
        });

        console.log('tenant_deleted', {
          tenantSlug: input.slug,
          snapshotId: recorded.id,
          outcome: outcome.kind,
          platforms: pending
        });

        return {
          tenant: deleted,
          snapshot: recorded,
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

  public async listPendingDeletions(limit = this.config.listLimit): Promise<DeletionSummary[]> {
    const now = this.now();
    const snapshots = await this.tenantRepository.listOpenSnapshots({ limit });
    return snapshots.map((snapshot) => summarizeDeletion(snapshot, now));
  }

  /** Open snapshots whose recovery window has closed: the work list of the permanent-deletion sweep. */
  public async listExpiredDeletions(now: Date = this.now(), limit = this.config.listLimit): Promise<DeletionSummary[]> {
    const snapshots = await this.tenantRepository.listOpenSnapshots({ deadlineBefore: now, limit });
    return snapshots.map((snapshot) => summarizeDeletion(snapshot, now));
  }

  public async markPermanentlyDeleted(input: PermanentDeletionInput): Promise<PermanentDeletionResult> {
    const found = await this.tenantRepository.findSnapshotById(input.snapshotId);
    const entry = await this.operationLog.open({
      operationType: 'permanent_delete',
      tenantId: found?.originalTenantId ?? null,
      tenantSlug: found?.tenantSlug ?? null,
      initiatedBy: input.initiatedBy,
      triggerSource: input.triggerSource ?? 'scheduled',
      requestPayload: { snapshotId: input.snapshotId }
    });

    try {
      if (found === null) {
        throw new NotFoundError('DELETION_SNAPSHOT_NOT_FOUND', 'Deletion snapshot not found.');
      }

      return await withOperationLock(this.lock, found.tenantSlug, this.config.lockTtlMs, async () => {
        const snapshot = await this.tenantRepository.findSnapshotById(found.id);
        if (snapshot === null || !isSnapshotOpen(snapshot)) {
          throw new InvalidStateError('The deletion snapshot is already closed.', { snapshotId: found.id });
        }

        const at = this.now();
        if (isWithinRecoveryWindow(snapshot, at)) {
          throw new InvalidStateError('The recovery window for this site is still open.', {
            recoveryDeadline: snapshot.recoveryDeadline.toISOString()
          });
        }

        const tenant = await this.tenantRepository.findTenantById(snapshot.originalTenantId);
        if (tenant !== null) {
          assertTransition(tenant.status, 'permanently_delete');
        }

        const marked = await this.tenantRepository.markPermanentlyDeleted({ snapshotId: snapshot.id, at });
        if (marked === null) {
          throw new InvalidStateError('The deletion snapshot is already closed.', { snapshotId: snapshot.id });
        }

        const operation = await this.operationLog.complete(entry, {
          tenantId: snapshot.originalTenantId,
          platformResults: {},
          outcome: { kind: 'success' },
          responsePayload: {
            snapshotId: marked.id,
            permanentlyDeletedAt: at.toISOString()
          }
        });

        console.log('tenant_permanently_deleted', {
          tenantSlug: marked.tenantSlug,
          snapshotId: marked.id
        });

        return { snapshot: marked, operation };
      });
    } catch (error) {
      await this.operationLog.failSafely(entry, error, found?.originalTenantId ?? null);
      throw error;
    }
  }

  /**
   * Reuses an open snapshot when one exists: a `deleted` tenant re-runs only the platforms not
   * yet archived, and an `active` tenant left with an open snapshot resumes it.
   */
  private async prepare(
    tenant: Tenant,
    deletedBy: string,
    reason: string,
    operationId: string
  ): Promise<PreparedDeletion> {
    const open = await this.tenantRepository.findOpenSnapshotByTenantId(tenant.id);

    if (tenant.status === 'deleted' && open !== null) {
      const pending = unarchivedPlatforms(open);
      if (pending.length === 0) {
        throw new InvalidStateError(`Site '${tenant.slug}' is already deleted on every platform.`, {
          status: tenant.status,
          snapshotId: open.id
        });
      }

      return { snapshot: open, pending };
    }

    assertTransition(tenant.status, 'delete');

    if (open !== null) {
      return { snapshot: open, pending: unarchivedPlatforms(open) };
    }

    const deletedAt = this.now();
    const snapshot = await this.tenantRepository.createDeletionSnapshot({
      tenant,
      deletedBy,
      deletionReason: reason,
      deletedAt,
      recoveryDeadline: computeRecoveryDeadline(deletedAt),
      deleteOperationId: operationId
    });

    return { snapshot, pending: [...PLATFORMS] };
  }
}
