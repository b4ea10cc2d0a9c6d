import type { PlatformAdapters } from '../adapters/platform-adapter.js';
import type { Clock } from '../domain/lifecycle.js';
import { requiresFollowUp, summarizeOutcome, type OperationOutcome } from '../domain/outcome.js';
import { PLATFORMS, type Platform, type PlatformResult, type PlatformResults, type ResourceRef } from '../domain/platform.js';
import { resolveResourceRefs } from '../domain/resource-refs.js';
import { NotFoundError } from '../errors/lifecycle-errors.js';
import { runPlatformCall, type PlatformCallPolicy } from '../platform/platform-call.js';
import type {
  InventoryItem,
  InventoryRepository,
  ListInventoryItemsInput
} from '../repositories/inventory-repository.js';
import type { OperationLogEntry, TriggerSource } from '../repositories/operation-log-repository.js';
import type { Tenant, TenantRepository } from '../repositories/tenant-repository.js';
import type { OperationLogService } from './operation-log-service.js';

export interface InventoryServiceConfig {
  backupRootPrefix: string;
  platformPolicy: PlatformCallPolicy;
}

export interface InventorySyncRequest {
  initiatedBy: string;
  triggerSource?: TriggerSource;
}

export interface PlatformSyncSummary {
  observed: number;
  orphaned: number;
  drifted: number;
}

export interface InventorySyncResult {
  outcome: OperationOutcome;
  operation: OperationLogEntry;
  platforms: Partial<Record<Platform, PlatformSyncSummary>>;
  requiresFollowUp: Platform[];
}

function resourceKey(ref: Pick<ResourceRef, 'platform' | 'resourceType' | 'resourceId'>): string {
  return `${ref.platform}\u0000${ref.resourceType}\u0000${ref.resourceId}`;
}

/** Maps platform resources back to the current tenant records that reference them. */
class TenantIndex {
  private readonly byResource = new Map<string, Tenant>();

  private readonly bySlug = new Map<string, Tenant>();

  public constructor(tenants: Tenant[], backupRootPrefix: string) {
    for (const tenant of tenants) {
      this.bySlug.set(tenant.slug, tenant);
      for (const ref of Object.values(resolveResourceRefs(tenant, backupRootPrefix))) {
        if (ref !== undefined) {
          this.byResource.set(resourceKey(ref), tenant);
        }
      }
    }
  }

  public match(resource: ResourceRef): Tenant | null {
    return this.byResource.get(resourceKey(resource)) ?? this.bySlug.get(resource.resourceName) ?? null;
  }
}

interface ReconcileScope {
  tenant: Tenant | null;
}

/**
 * Reconciles adapter listings against the inventory store. Tenant records are only read:
 * discrepancies are flagged on inventory items for an operator to resolve.
 */
export class InventoryService {
  public constructor(
    private readonly tenantRepository: TenantRepository,
    private readonly inventoryRepository: InventoryRepository,
    private readonly adapters: PlatformAdapters,
    private readonly operationLog: OperationLogService,
    private readonly config: InventoryServiceConfig,
    private readonly now: Clock
  ) {}

  public async sync(input: InventorySyncRequest): Promise<InventorySyncResult> {
    const entry = await this.operationLog.open({
      operationType: 'inventory_sync',
      tenantId: null,
      tenantSlug: null,
      initiatedBy: input.initiatedBy,
      triggerSource: input.triggerSource ?? 'scheduled',
      requestPayload: { scope: 'all' }
    });

    try {
      return await this.reconcile(entry, { tenant: null });
    } catch (error) {
      await this.operationLog.failSafely(entry, error);
      throw error;
    }
  }

  public async syncOne(slug: string, input: InventorySyncRequest): Promise<InventorySyncResult> {
    const entry = await this.operationLog.open({
      operationType: 'inventory_sync',
      tenantId: null,
      tenantSlug: slug,
      initiatedBy: input.initiatedBy,
      triggerSource: input.triggerSource ?? 'api',
      requestPayload: { scope: 'tenant' }
    });
    let tenantId: string | null = null;

    try {
      const tenant = await this.tenantRepository.findTenantBySlug(slug);
      if (tenant === null) {
        throw new NotFoundError('TENANT_NOT_FOUND', `Site '${slug}' not found.`);
      }
      tenantId = tenant.id;

      return await this.reconcile(entry, { tenant });
    } catch (error) {
      await this.operationLog.failSafely(entry, error, tenantId);
      throw error;
    }
  }

  public listInventory(query: ListInventoryItemsInput = {}): Promise<InventoryItem[]> {
    return this.inventoryRepository.listItems(query);
  }

  private async reconcile(entry: OperationLogEntry, scope: ReconcileScope): Promise<InventorySyncResult> {
    const tenants = await this.tenantRepository.listCurrentTenants();
    const index = new TenantIndex(tenants, this.config.backupRootPrefix);

    const settled = await Promise.all(PLATFORMS.map((platform) => this.reconcilePlatform(platform, index, scope)));

    const results: PlatformResults = {};
    const platforms: Partial<Record<Platform, PlatformSyncSummary>> = {};
    for (const [platform, result, summary] of settled) {
      results[platform] = result;
      if (summary !== null) {
        platforms[platform] = summary;
      }
    }

    const outcome = summarizeOutcome(results);
    const totals = Object.values(platforms).reduce<{ observed: number; orphaned: number; drifted: number }>(
      (sum, summary) => ({
        observed: sum.observed + (summary?.observed ?? 0),
        orphaned: sum.orphaned + (summary?.orphaned ?? 0),
        drifted: sum.drifted + (summary?.drifted ?? 0)
      }),
      { observed: 0, orphaned: 0, drifted: 0 }
    );

    const operation = await this.operationLog.complete(entry, {
      tenantId: scope.tenant?.id ?? null,
      platformResults: results,
      outcome,
      responsePayload: totals
    });

    console.log('inventory_synced', {
      tenantSlug: scope.tenant?.slug ?? null,
      outcome: outcome.kind,
      ...totals
    });

    return {
      outcome,
      operation,
      platforms,
      requiresFollowUp: requiresFollowUp(outcome)
    };
  }

  /** A platform whose listing fails keeps its stored items untouched. */
  private async reconcilePlatform(
    platform: Platform,
    index: TenantIndex,
    scope: ReconcileScope
  ): Promise<[Platform, PlatformResult, PlatformSyncSummary | null]> {
    const adapter = this.adapters[platform];
    let listed: ResourceRef[] = [];

    const result = await runPlatformCall(platform, 'list', async () => {
      listed = await adapter.list();
      return { success: true, detail: { resourceCount: listed.length } };
    }, this.config.platformPolicy);

    if (!result.success) {
      return [platform, result, null];
    }

    const verifiedAt = this.now();
    const scopeTenantId = scope.tenant?.id;
    const seenItemIds: string[] = [];
    let orphaned = 0;

    for (const resource of listed) {
      const tenant = index.match(resource);
      if (scopeTenantId !== undefined && tenant?.id !== scopeTenantId) {
        continue;
      }

      const item = await this.inventoryRepository.upsertItem({
        platform,
        resourceType: resource.resourceType,
        resourceId: resource.resourceId,
        resourceName: resource.resourceName,
        resourceUrl: resource.resourceUrl,
        tenantId: tenant?.id ?? null,
        tenantSlug: tenant?.slug ?? null,
        isOrphaned: tenant === null,
        metadata: resource.metadata,
        verifiedAt
      });

      seenItemIds.push(item.id);
      if (item.isOrphaned) {
        orphaned += 1;
      }
    }

    const drifted = await this.inventoryRepository.markDrift({
      platform,
      seenItemIds,
      tenantSlug: scope.tenant?.slug
    });

    if (orphaned > 0 || drifted.length > 0) {
      console.warn('inventory_discrepancies_found', {
        platform,
        orphaned,
        drifted: drifted.length
      });
    }

    const summary = { observed: seenItemIds.length, orphaned, drifted: drifted.length };
    return [platform, { ...result, detail: { ...result.detail, ...summary } }, summary];
  }
}
