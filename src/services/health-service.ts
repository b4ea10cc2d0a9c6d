import { performance } from 'node:perf_hooks';

import type { PlatformAdapters, UrlProbe } from '../adapters/platform-adapter.js';
import { reduceHealth } from '../domain/health.js';
import type { Clock } from '../domain/lifecycle.js';
import { summarizeOutcome } from '../domain/outcome.js';
import {
  PLATFORMS,
  type HealthDetail,
  type HealthPlatform,
  type PlatformResult,
  type PlatformResults
} from '../domain/platform.js';
import { resolveResourceRefs } from '../domain/resource-refs.js';
import { InvalidStateError, NotFoundError, PlatformOperationError, ValidationError } from '../errors/lifecycle-errors.js';
import { withTimeout } from '../platform/timeout.js';
import type {
  HealthCheckRecord,
  HealthCheckRepository,
  PlatformHealthEntry,
  PlatformHealthStatuses
} from '../repositories/health-check-repository.js';
import type { OperationLogEntry, TriggerSource } from '../repositories/operation-log-repository.js';
import type { Tenant, TenantHealthStatus, TenantRepository } from '../repositories/tenant-repository.js';
import { recordHealthCheck } from '../telemetry/metrics.js';
import type { OperationLogService } from './operation-log-service.js';

export interface HealthServiceConfig {
  backupRootPrefix: string;
  probeTimeoutMs: number;
  historyDefaultLimit: number;
  historyMaxLimit: number;
}

export interface HealthCheckRequest {
  slug: string;
  initiatedBy: string;
  triggerSource?: TriggerSource;
}

export interface HealthCheckResult {
  tenant: Tenant;
  record: HealthCheckRecord;
  operation: OperationLogEntry;
}

export interface CurrentHealth {
  tenantSlug: string;
  healthStatus: TenantHealthStatus;
  lastHealthCheckAt: Date | null;
  latest: HealthCheckRecord | null;
}

export interface HealthHistoryQuery {
  from?: Date;
  to?: Date;
  limit?: number;
}

const CHECKABLE_STATUSES: ReadonlySet<Tenant['status']> = new Set(['pending', 'active']);

function toLogResult(entry: PlatformHealthEntry): PlatformResult {
  return {
    success: entry.status !== 'down',
    detail: { status: entry.status, issues: entry.issues },
    error: entry.status === 'down'
      ? { code: 'PLATFORM_DOWN', message: entry.issues.join('; ') || 'Platform is down.', retryable: true }
      : null,
    attempts: 1,
    durationMs: entry.durationMs
  };
}

export class HealthService {
  public constructor(
    private readonly tenantRepository: TenantRepository,
    private readonly healthCheckRepository: HealthCheckRepository,
    private readonly adapters: PlatformAdapters,
    private readonly urlProbe: UrlProbe,
    private readonly operationLog: OperationLogService,
    private readonly config: HealthServiceConfig,
    private readonly now: Clock
  ) {}

  public async check(input: HealthCheckRequest): Promise<HealthCheckResult> {
    const entry = await this.operationLog.open({
      operationType: 'health_check',
      tenantId: null,
      tenantSlug: input.slug,
      initiatedBy: input.initiatedBy,
      triggerSource: input.triggerSource ?? 'api',
      requestPayload: {}
    });
    let tenantId: string | null = null;

    try {
      const tenant = await this.requireTenant(input.slug);
      tenantId = tenant.id;

      if (!CHECKABLE_STATUSES.has(tenant.status)) {
        throw new InvalidStateError(`Cannot check health of a site in status '${tenant.status}'.`, {
          status: tenant.status
        });
      }

      const startedAt = performance.now();
      const probed = await this.probeAll(tenant);
      const checkDurationMs = Math.round(performance.now() - startedAt);
      const overallStatus = reduceHealth(probed.map(([, health]) => health.status));

      const platforms: PlatformHealthStatuses = {};
      for (const [platform, health] of probed) {
        platforms[platform] = health;
      }
      const checkedAt = this.now();

      const record = await this.healthCheckRepository.createRecord({
        tenantId: tenant.id,
        tenantSlug: tenant.slug,
        platforms,
        overallStatus,
        checkDurationMs,
        checkedAt
      });

      const updated = await this.tenantRepository.updateTenantHealth({
        tenantId: tenant.id,
        healthStatus: overallStatus,
        checkedAt
      });

      const platformResults: PlatformResults = {};
      for (const platform of PLATFORMS) {
        const health = platforms[platform];
        if (health !== undefined) {
          platformResults[platform] = toLogResult(health);
        }
      }

      const operation = await this.operationLog.complete(entry, {
        tenantId: tenant.id,
        platformResults,
        outcome: summarizeOutcome(platformResults),
        responsePayload: {
          healthCheckId: record.id,
          overallStatus
        }
      });

      recordHealthCheck({ overall_status: overallStatus }, checkDurationMs);
      if (overallStatus !== 'healthy') {
        console.warn('tenant_health_degraded', {
          tenantSlug: tenant.slug,
          overallStatus,
          issues: probed.flatMap(([platform, health]) => health.issues.map((issue) => `${platform}: ${issue}`))
        });
      }

      return { tenant: updated ?? tenant, record, operation };
    } catch (error) {
      await this.operationLog.failSafely(entry, error, tenantId);
      throw error;
    }
  }

  public async getCurrentHealth(slug: string): Promise<CurrentHealth> {
    const tenant = await this.requireTenant(slug);
    const latest = await this.healthCheckRepository.findLatestRecord(tenant.id);

    return {
      tenantSlug: tenant.slug,
      healthStatus: tenant.healthStatus,
      lastHealthCheckAt: tenant.lastHealthCheckAt,
      latest
    };
  }

  public async listHealthHistory(slug: string, query: HealthHistoryQuery = {}): Promise<HealthCheckRecord[]> {
    const tenant = await this.requireTenant(slug);

    if (query.from !== undefined && query.to !== undefined && query.from > query.to) {
      throw new ValidationError('`from` must not be after `to`.');
    }

    return this.healthCheckRepository.listRecords({
      tenantId: tenant.id,
      from: query.from,
      to: query.to,
      limit: this.normalizeLimit(query.limit)
    });
  }

  private async probeAll(tenant: Tenant): Promise<Array<[HealthPlatform, PlatformHealthEntry]>> {
    const refs = resolveResourceRefs(tenant, this.config.backupRootPrefix);
    const probes: Array<Promise<[HealthPlatform, PlatformHealthEntry]>> = [];

    for (const platform of PLATFORMS) {
      const ref = refs[platform];
      if (ref !== undefined) {
        const adapter = this.adapters[platform];
        probes.push(this.runProbe(platform, () => adapter.probe(ref)));
      }
    }

    const stagingUrl = tenant.stagingUrl;
    if (stagingUrl !== null) {
      probes.push(this.runProbe('public_url', () => this.urlProbe.probe(stagingUrl)));
    }

    return Promise.all(probes);
  }

  /** A probe that throws or outlives its timeout reports the platform as down. Never rejects. */
  private async runProbe(
    platform: HealthPlatform,
    probe: () => Promise<HealthDetail>
  ): Promise<[HealthPlatform, PlatformHealthEntry]> {
    const startedAt = performance.now();

    try {
      const health = await withTimeout(
        probe(),
        this.config.probeTimeoutMs,
        () => new PlatformOperationError(
          platform,
          'PROBE_TIMEOUT',
          `Probe did not complete within ${this.config.probeTimeoutMs}ms`,
          true
        )
      );

      return [platform, { ...health, durationMs: Math.round(performance.now() - startedAt) }];
    } catch (error) {
      const message = error instanceof Error ? error.message : 'unknown error';
      console.warn('health_probe_failed', { platform, message });

      return [platform, {
        status: 'down',
        issues: [`Probe failed: ${message}`],
        detail: { code: error instanceof PlatformOperationError ? error.code : 'PROBE_FAILED' },
        durationMs: Math.round(performance.now() - startedAt)
      }];
    }
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
      return this.config.historyDefaultLimit;
    }

    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError('Limit must be a positive integer.');
    }

    return Math.min(limit, this.config.historyMaxLimit);
  }
}
