import express, { type Express } from 'express';
import helmet from 'helmet';
import rateLimit, { ipKeyGenerator } from 'express-rate-limit';
import { Pool } from 'pg';

import { createPlatformAdapters, createUrlProbe } from './adapters/create-platform-adapters.js';
import { EnvCredentialProvider, type CredentialProvider } from './adapters/credential-provider.js';
import type { PlatformAdapters, UrlProbe } from './adapters/platform-adapter.js';
import { getEnv, type Env } from './config/env.js';
import { systemClock, type Clock } from './domain/lifecycle.js';
import { AppError } from './errors/app-error.js';
import { errorHandler } from './errors/error-handler.js';
import { createOperatorAuthMiddleware } from './http/middlewares/operator-auth.js';
import { attachRequestTelemetry } from './http/middlewares/request-telemetry.js';
import { attachTraceId } from './http/middlewares/trace-id.js';
import { createDeletionRoutes } from './http/routes/deletion-routes.js';
import { createInventoryRoutes } from './http/routes/inventory-routes.js';
import { createOperationRoutes } from './http/routes/operation-routes.js';
import { createTenantRoutes } from './http/routes/tenant-routes.js';
import { InMemoryOperationLock } from './locks/in-memory-operation-lock.js';
import type { OperationLock } from './locks/operation-lock.js';
import { createRedisOperationLock } from './locks/redis-operation-lock.js';
import type { PlatformCallPolicy } from './platform/platform-call.js';
import type { HealthCheckRepository } from './repositories/health-check-repository.js';
import { InMemoryHealthCheckRepository } from './repositories/in-memory-health-check-repository.js';
import { InMemoryInventoryRepository } from './repositories/in-memory-inventory-repository.js';
import { InMemoryOperationLogRepository } from './repositories/in-memory-operation-log-repository.js';
import { InMemoryTenantRepository } from './repositories/in-memory-tenant-repository.js';
import type { InventoryRepository } from './repositories/inventory-repository.js';
import type { OperationLogRepository } from './repositories/operation-log-repository.js';
import { PostgresHealthCheckRepository } from './repositories/postgres-health-check-repository.js';
import { PostgresInventoryRepository } from './repositories/postgres-inventory-repository.js';
import { PostgresOperationLogRepository } from './repositories/postgres-operation-log-repository.js';
import { PostgresTenantRepository } from './repositories/postgres-tenant-repository.js';
import type { TenantRepository } from './repositories/tenant-repository.js';
import { DeletionService } from './services/deletion-service.js';
import { HealthService } from './services/health-service.js';
import { InventoryService } from './services/inventory-service.js';
import { OperationLogQueryService } from './services/operation-log-query-service.js';
import { OperationLogService } from './services/operation-log-service.js';
import { RecoveryService } from './services/recovery-service.js';
import { TenantService } from './services/tenant-service.js';

export interface CreateAppOptions {
  envOverrides?: Partial<Record<keyof Env, unknown>>;
  tenantRepository?: TenantRepository;
  operationLogRepository?: OperationLogRepository;
  healthCheckRepository?: HealthCheckRepository;
  inventoryRepository?: InventoryRepository;
  adapters?: PlatformAdapters;
  urlProbe?: UrlProbe;
  credentials?: CredentialProvider;
  operationLock?: OperationLock;
  now?: Clock;
  /** Overrides the backoff sleep, e.g. to keep retries instant in tests. */
  sleep?: (delayMs: number) => Promise<void>;
}

export interface AppServices {
  tenants: TenantService;
  deletions: DeletionService;
  recovery: RecoveryService;
  health: HealthService;
  inventory: InventoryService;
  operations: OperationLogQueryService;
}

export interface AppRuntime {
  app: Express;
  env: Env;
  tenantRepository: TenantRepository;
  operationLogRepository: OperationLogRepository;
  healthCheckRepository: HealthCheckRepository;
  inventoryRepository: InventoryRepository;
  services: AppServices;
  close(): Promise<void>;
}

function createGlobalRateLimiter() {
  return rateLimit({
    windowMs: 60_000,
    limit: 300,
    standardHeaders: 'draft-8',
    legacyHeaders: false,
    keyGenerator: (request) => request.operator?.keyFingerprint ?? ipKeyGenerator(request.ip ?? '')
  });
}

async function createOperationLock(env: Env, now: Clock): Promise<OperationLock> {
  if (env.LOCK_STORE === 'redis') {
    return createRedisOperationLock(env);
  }

  return new InMemoryOperationLock(now);
}

export async function createApp(options: CreateAppOptions = {}): Promise<AppRuntime> {
  const env = getEnv(options.envOverrides);
  const now = options.now ?? systemClock;
  const app = express();

  let pgPool: Pool | null = null;
  const getPool = (): Pool => {
    if (pgPool !== null) {
      return pgPool;
    }

    if (typeof env.DATABASE_URL !== 'string' || env.DATABASE_URL.length === 0) {
      throw new Error('DATABASE_URL is not configured.');
    }

    pgPool = new Pool({ connectionString: env.DATABASE_URL });
    return pgPool;
  };
  const useDatabase = typeof env.DATABASE_URL === 'string' && env.DATABASE_URL.length > 0;

  const tenantRepository = options.tenantRepository
    ?? (useDatabase ? new PostgresTenantRepository(getPool()) : new InMemoryTenantRepository());
  const operationLogRepository = options.operationLogRepository
    ?? (useDatabase ? new PostgresOperationLogRepository(getPool()) : new InMemoryOperationLogRepository());
  const healthCheckRepository = options.healthCheckRepository
    ?? (useDatabase ? new PostgresHealthCheckRepository(getPool()) : new InMemoryHealthCheckRepository());
  const inventoryRepository = options.inventoryRepository
    ?? (useDatabase ? new PostgresInventoryRepository(getPool()) : new InMemoryInventoryRepository());

  const credentials = options.credentials ?? new EnvCredentialProvider();
  const adapters = options.adapters ?? createPlatformAdapters(env, credentials, now);
  const urlProbe = options.urlProbe ?? createUrlProbe(env);
  const operationLock = options.operationLock ?? await createOperationLock(env, now);

  const platformPolicy: PlatformCallPolicy = {
    timeoutMs: env.PLATFORM_TIMEOUT_MS,
    retryAttempts: env.PLATFORM_RETRY_ATTEMPTS,
    retryBaseDelayMs: env.PLATFORM_RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: env.PLATFORM_RETRY_MAX_DELAY_MS,
    sleep: options.sleep
  };

  const operationLog = new OperationLogService(operationLogRepository, now);
  const services: AppServices = {
    tenants: new TenantService(tenantRepository, healthCheckRepository, operationLogRepository, operationLock, operationLog, {
      lockTtlMs: env.LOCK_TTL_MS,
      listDefaultLimit: 50,
      listMaxLimit: 200,
      recentOperationsLimit: 10
    }, now),
    deletions: new DeletionService(tenantRepository, adapters, operationLock, operationLog, {
      backupRootPrefix: env.BACKUP_ROOT_PREFIX,
      lockTtlMs: env.LOCK_TTL_MS,
      platformPolicy,
      listLimit: 100
    }, now),
    recovery: new RecoveryService(tenantRepository, adapters, operationLock, operationLog, {
      backupRootPrefix: env.BACKUP_ROOT_PREFIX,
      lockTtlMs: env.LOCK_TTL_MS,
      platformPolicy
    }, now),
    health: new HealthService(tenantRepository, healthCheckRepository, adapters, urlProbe, operationLog, {
      backupRootPrefix: env.BACKUP_ROOT_PREFIX,
      probeTimeoutMs: env.HEALTH_PROBE_TIMEOUT_MS,
      historyDefaultLimit: 50,
      historyMaxLimit: 500
    }, now),
    inventory: new InventoryService(tenantRepository, inventoryRepository, adapters, operationLog, {
      backupRootPrefix: env.BACKUP_ROOT_PREFIX,
      platformPolicy
    }, now),
    operations: new OperationLogQueryService(operationLogRepository, {
      listDefaultLimit: 50,
      listMaxLimit: 200
    })
  };

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(express.json());
  app.use(attachTraceId);
  if (env.NODE_ENV !== 'test') {
    app.use(attachRequestTelemetry);
  }

  app.get('/health', (_request, response) => {
    response.status(200).json({
      status: 'ok'
    });
  });

  app.use('/v1', createOperatorAuthMiddleware(env.OPERATOR_API_KEYS));
  app.use('/v1', createGlobalRateLimiter());

  app.use('/v1/tenants', createTenantRoutes(
    services.tenants,
    services.deletions,
    services.recovery,
    services.health,
    services.inventory
  ));
  app.use('/v1/inventory', createInventoryRoutes(services.inventory));
  app.use('/v1/operations', createOperationRoutes(services.operations));
  app.use('/v1/deletions', createDeletionRoutes(services.deletions));

  app.use((_request, _response, next) => {
    next(new AppError(404, 'NOT_FOUND', 'Route not found.'));
  });

  app.use(errorHandler);

  return {
    app,
    env,
    tenantRepository,
    operationLogRepository,
    healthCheckRepository,
    inventoryRepository,
    services,
    async close() {
      await operationLock.close();
      if (pgPool !== null) {
        await pgPool.end();
      }
    }
  };
}
