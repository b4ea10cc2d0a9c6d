import { assertTransition, type Clock } from '../domain/lifecycle.js';
import { InvalidStateError, NotFoundError, ValidationError } from '../errors/lifecycle-errors.js';
import { withOperationLock, type OperationLock } from '../locks/operation-lock.js';
import type { HealthCheckRecord, HealthCheckRepository } from '../repositories/health-check-repository.js';
import type { OperationLogEntry, OperationLogRepository, TriggerSource } from '../repositories/operation-log-repository.js';
import type {
  CmsSpace,
  Tenant,
  TenantHealthStatus,
  TenantRepository,
  TenantStatus,
  TenantTier
} from '../repositories/tenant-repository.js';
import type { OperationLogService } from './operation-log-service.js';

export const TENANT_SLUG_PATTERN = /^[a-z0-9][a-z0-9-]{1,62}$/;

export interface TenantServiceConfig {
  lockTtlMs: number;
  listDefaultLimit: number;
  listMaxLimit: number;
  recentOperationsLimit: number;
}

export interface RegisterTenantInput {
  slug: string;
  name: string;
  contactEmail?: string | null;
  status?: Extract<TenantStatus, 'pending' | 'active'>;
  tier: TenantTier;
  repository?: string | null;
  deploymentProjectId?: string | null;
  cms?: CmsSpace | null;
  backupPrefix?: string | null;
  stagingUrl?: string | null;
  tags?: string[];
  metadata?: Record<string, unknown>;
  initiatedBy: string;
  triggerSource?: TriggerSource;
}

export interface ActivateTenantInput {
  slug: string;
  initiatedBy: string;
  triggerSource?: TriggerSource;
}

export interface ListTenantsQuery {
  status?: TenantStatus;
  healthStatus?: TenantHealthStatus;
  limit?: number;
  offset?: number;
}

export interface TenantDetail {
  tenant: Tenant;
  latestHealth: HealthCheckRecord | null;
  recentOperations: OperationLogEntry[];
}

export interface TenantMutationResult {
  tenant: Tenant;
  operation: OperationLogEntry;
}

function assertRegistrable(input: RegisterTenantInput): void {
  if (!TENANT_SLUG_PATTERN.test(input.slug)) {
    throw new ValidationError('Slug must be 2-63 lowercase letters, digits or hyphens and start with a letter or digit.', {
      slug: input.slug
    });
  }

  if (input.name.trim().length === 0) {
    throw new ValidationError('Site name is required.');
  }

  if (input.tier === 'entry' && input.cms?.mode === 'dedicated') {
    throw new ValidationError('Entry-tier sites must use the shared CMS space.', {
      tier: input.tier,
      cmsMode: input.cms.mode
    });
  }
}

export class TenantService {
  public constructor(
    private readonly tenantRepository: TenantRepository,
    private readonly healthCheckRepository: HealthCheckRepository,
    private readonly operationLogRepository: OperationLogRepository,
    private readonly lock: OperationLock,
    private readonly operationLog: OperationLogService,
    private readonly config: TenantServiceConfig,
    private readonly now: Clock
  ) {}

  public async register(input: RegisterTenantInput): Promise<TenantMutationResult> {
    const entry = await this.operationLog.open({
      operationType: 'create',
      tenantId: null,
      tenantSlug: input.slug,
      initiatedBy: input.initiatedBy,
      triggerSource: input.triggerSource ?? 'api',
      requestPayload: {
        name: input.name,
        tier: input.tier,
        status: input.status ?? 'pending',
        cmsMode: input.cms?.mode ?? null
      }
    });

    try {
      assertRegistrable(input);

      const tenant = await this.tenantRepository.createTenant({
        slug: input.slug,
        name: input.name.trim(),
        contactEmail: input.contactEmail ?? null,
        status: input.status ?? 'pending',
        tier: input.tier,
        repository: input.repository ?? null,
        deploymentProjectId: input.deploymentProjectId ?? null,
        cms: input.cms ?? null,
        backupPrefix: input.backupPrefix ?? null,
        stagingUrl: input.stagingUrl ?? null,
        tags: input.tags ?? [],
        metadata: input.metadata ?? {},
        now: this.now()
      });

      if (tenant === null) {
        throw new InvalidStateError(`A site with slug '${input.slug}' already exists.`, { slug: input.slug });
      }

      const operation = await this.operationLog.complete(entry, {
        tenantId: tenant.id,
        platformResults: {},
        outcome: { kind: 'success' },
        responsePayload: { tenantId: tenant.id, status: tenant.status }
      });

      console.log('tenant_registered', { tenantSlug: tenant.slug, tenantId: tenant.id, tier: tenant.tier });
      return { tenant, operation };
    } catch (error) {
      await this.operationLog.failSafely(entry, error);
      throw error;
    }
  }

  public async activate(input: ActivateTenantInput): Promise<TenantMutationResult> {
    const entry = await this.operationLog.open({
      operationType: 'activate',
      tenantId: null,
      tenantSlug: input.slug,
      initiatedBy: input.initiatedBy,
      triggerSource: input.triggerSource ?? 'api',
      requestPayload: {}
    });
    let tenantId: string | null = null;

    try {
      return await withOperationLock(this.lock, input.slug, this.config.lockTtlMs, async () => {
        const tenant = await this.requireTenant(input.slug);
        tenantId = tenant.id;

        const activated = await this.tenantRepository.transitionTenant({
          tenantId: tenant.id,
          from: tenant.status,
          to: assertTransition(tenant.status, 'activate'),
          at: this.now()
        });
        if (activated === null) {
          throw new InvalidStateError(`Site '${input.slug}' changed status during activation.`);
        }

        const operation = await this.operationLog.complete(entry, {
          tenantId: activated.id,
          platformResults: {},
          outcome: { kind: 'success' },
          responsePayload: { status: activated.status }
        });

        return { tenant: activated, operation };
      });
    } catch (error) {
      await this.operationLog.failSafely(entry, error, tenantId);
      throw error;
    }
  }

  public async getTenant(slug: string): Promise<TenantDetail> {
    const tenant = await this.requireTenant(slug);
    const [latestHealth, recentOperations] = await Promise.all([
      this.healthCheckRepository.findLatestRecord(tenant.id),
      this.operationLogRepository.listEntries({ tenantSlug: tenant.slug, limit: this.config.recentOperationsLimit })
    ]);

    return { tenant, latestHealth, recentOperations };
  }

  public async listTenants(query: ListTenantsQuery = {}): Promise<Tenant[]> {
    const offset = query.offset ?? 0;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError('Offset must be a non-negative integer.');
    }

    return this.tenantRepository.listTenants({
      status: query.status,
      healthStatus: query.healthStatus,
      limit: this.normalizeLimit(query.limit),
      offset
    });
  }

  private async requireTenant(slug: string): Promise<Tenant> {
    const tenant = await this.tenantRepository.findTenantBySlug(slug);
    if (tenant === null) {
      throw new NotFoundError('TENANT_NOT_FOUND', `Site '${slug}' not found.`);
    }

    return tenant;
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
