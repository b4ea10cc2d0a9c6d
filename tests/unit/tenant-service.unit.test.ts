import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTestRuntime, type TestRuntime } from '../helpers/create-test-runtime.js';
import { seedActiveTenant } from '../helpers/seed.js';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(() => null, (reason: unknown) => reason);
}

describe('tenant service', () => {
  let context: TestRuntime;

  beforeEach(async () => {
    context = await createTestRuntime();
  });

  afterEach(async () => {
    await context.runtime.close();
  });

  it('registers a pending site and logs the creation', async () => {
    const { tenant, operation } = await context.runtime.services.tenants.register({
      slug: 'northwind',
      name: '  Northwind Traders ',
      tier: 'entry',
      cms: { mode: 'shared', spaceId: 'space-shared' },
      initiatedBy: 'provisioner'
    });

    expect(tenant.status).toBe('pending');
    expect(tenant.name).toBe('Northwind Traders');
    expect(tenant.healthStatus).toBe('unknown');
    expect(tenant.createdAt.toISOString()).toBe('2026-03-01T12:00:00.000Z');
    expect(operation).toMatchObject({
      operationType: 'create',
      status: 'success',
      tenantId: tenant.id,
      tenantSlug: 'northwind',
      initiatedBy: 'provisioner'
    });
  });

  it('rejects malformed slugs and duplicate registrations', async () => {
    await seedActiveTenant(context.runtime);

    const malformed = await captureError(context.runtime.services.tenants.register({
      slug: 'Bad_Slug',
      name: 'Bad',
      tier: 'entry',
      initiatedBy: 'provisioner'
    }));
    expect(malformed).toMatchObject({ code: 'VALIDATION_ERROR', statusCode: 400 });

    context.clock.advanceMs(1_000);
    const duplicate = await captureError(seedActiveTenant(context.runtime));
    expect(duplicate).toMatchObject({ code: 'INVALID_STATE', statusCode: 409 });

    const [entry] = await context.runtime.operationLogRepository.listEntries({ operationType: 'create', limit: 1 });
    expect(entry?.status).toBe('failed');
    expect(entry?.errorMessages).toEqual(["A site with slug 'acme' already exists."]);
  });

  it('rejects a dedicated CMS space on the entry tier', async () => {
    const error = await captureError(context.runtime.services.tenants.register({
      slug: 'tiny',
      name: 'Tiny',
      tier: 'entry',
      cms: { mode: 'dedicated', spaceId: 'space-tiny' },
      initiatedBy: 'provisioner'
    }));

    expect(error).toMatchObject({ code: 'VALIDATION_ERROR', statusCode: 400 });
  });

  it('activates a pending site exactly once', async () => {
    await context.runtime.services.tenants.register({
      slug: 'northwind',
      name: 'Northwind',
      tier: 'professional',
      initiatedBy: 'provisioner'
    });

    const { tenant, operation } = await context.runtime.services.tenants.activate({ slug: 'northwind', initiatedBy: 'provisioner' });
    expect(tenant.status).toBe('active');
    expect(operation.operationType).toBe('activate');

    const again = await captureError(context.runtime.services.tenants.activate({ slug: 'northwind', initiatedBy: 'provisioner' }));
    expect(again).toMatchObject({ code: 'INVALID_STATE', statusCode: 409 });
  });

  it('returns site detail with its recent operations', async () => {
    await seedActiveTenant(context.runtime);
    await context.runtime.services.health.check({ slug: 'acme', initiatedBy: 'monitor' });

    const detail = await context.runtime.services.tenants.getTenant('acme');

    expect(detail.tenant.slug).toBe('acme');
    expect(detail.latestHealth?.overallStatus).toBe('healthy');
    expect(detail.recentOperations.map((entry) => entry.operationType).sort()).toEqual(['create', 'health_check']);
  });

  it('filters and pages the site list', async () => {
    await seedActiveTenant(context.runtime, 'acme');
    context.clock.advanceMs(1_000);
    await seedActiveTenant(context.runtime, 'globex');
    context.clock.advanceMs(1_000);
    await context.runtime.services.tenants.register({
      slug: 'initech',
      name: 'Initech',
      tier: 'entry',
      initiatedBy: 'provisioner'
    });

    const active = await context.runtime.services.tenants.listTenants({ status: 'active' });
    expect(active.map((tenant) => tenant.slug)).toEqual(['globex', 'acme']);

    const page = await context.runtime.services.tenants.listTenants({ limit: 1, offset: 1 });
    expect(page.map((tenant) => tenant.slug)).toEqual(['globex']);

    const invalid = await captureError(context.runtime.services.tenants.listTenants({ limit: 0 }));
    expect(invalid).toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('reports unknown sites as not found', async () => {
    const error = await captureError(context.runtime.services.tenants.getTenant('nobody'));

    expect(error).toMatchObject({ code: 'TENANT_NOT_FOUND', statusCode: 404 });
  });
});
