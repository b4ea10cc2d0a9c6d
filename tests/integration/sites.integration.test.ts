import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTestRuntime, type TestRuntime } from '../helpers/create-test-runtime.js';

interface ErrorResponse {
  code: string;
  message: string;
  traceId: string;
}

interface TenantResponse {
  tenant: {
    id: string;
    slug: string;
    status: string;
  };
  operation: {
    id: string;
    operationType: string;
  };
}

interface DeleteResponse {
  tenant: { id: string; status: string };
  snapshotId: string;
  recoveryDeadline: string;
  operationId: string;
  outcome: string;
  requiresFollowUp: string[];
}

interface RecoverResponse {
  tenant: { id: string; status: string };
  previousTenantId: string;
  snapshotId: string;
  operationId: string;
  outcome: string;
  requiresFollowUp: string[];
}

interface OperationPageResponse {
  operations: Array<{ id: string; operationType: string; status: string; rollbackOperationId: string | null }>;
  nextCursor: string | null;
}

const registration = {
  slug: 'acme',
  name: 'Acme Corp',
  tier: 'professional',
  repository: 'sites/acme',
  deploymentProjectId: 'prj_acme',
  cms: { mode: 'shared', spaceId: 'space-shared' },
  stagingUrl: 'https://acme.example.test',
  initiatedBy: 'provisioner'
};

const confirmedDeletion = {
  initiatedBy: 'operator@example.com',
  reason: 'Client requested removal',
  confirmed: true
};

describe('site lifecycle API', () => {
  let context: TestRuntime;

  beforeEach(async () => {
    context = await createTestRuntime();
  });

  afterEach(async () => {
    await context.runtime.close();
  });

  async function registerActiveSite(): Promise<TenantResponse> {
    const created = await request(context.runtime.app).post('/v1/tenants').send(registration);
    expect(created.status).toBe(201);

    const activated = await request(context.runtime.app).post('/v1/tenants/acme/activate').send({ initiatedBy: 'provisioner' });
    expect(activated.status).toBe(200);

    return activated.body as TenantResponse;
  }

  it('registers and activates a site', async () => {
    const created = await request(context.runtime.app).post('/v1/tenants').send(registration);
    const createdBody = created.body as TenantResponse;

    expect(created.status).toBe(201);
    expect(createdBody.tenant.status).toBe('pending');
    expect(createdBody.operation.operationType).toBe('create');

    const activated = await request(context.runtime.app).post('/v1/tenants/acme/activate').send({});
    expect((activated.body as TenantResponse).tenant.status).toBe('active');

    const detail = await request(context.runtime.app).get('/v1/tenants/acme');
    expect(detail.status).toBe(200);
    expect((detail.body as TenantResponse).tenant.id).toBe(createdBody.tenant.id);
  });

  it('rejects an invalid registration body', async () => {
    const response = await request(context.runtime.app).post('/v1/tenants').send({ slug: 'acme', tier: 'platinum' });

    expect(response.status).toBe(400);
    expect((response.body as ErrorResponse).code).toBe('VALIDATION_ERROR');
  });

  it('soft-deletes a site and returns the recovery deadline', async () => {
    const { tenant } = await registerActiveSite();

    const response = await request(context.runtime.app).delete('/v1/tenants/acme').send(confirmedDeletion);
    const body = response.body as DeleteResponse;

    expect(response.status).toBe(200);
    expect(body.outcome).toBe('success');
    expect(body.requiresFollowUp).toEqual([]);
    expect(body.tenant).toMatchObject({ id: tenant.id, status: 'deleted' });
    expect(body.recoveryDeadline).toBe('2026-03-31T12:00:00.000Z');
  });

  it('answers 207 and names the platforms needing follow-up after a partial deletion', async () => {
    await registerActiveSite();
    context.platforms.cms.script('archive', {
      kind: 'reject',
      error: { code: 'CONTENT_SCOPE_MISMATCH', message: 'scope mismatch', retryable: false }
    });

    const response = await request(context.runtime.app).delete('/v1/tenants/acme').send(confirmedDeletion);
    const body = response.body as DeleteResponse;

    expect(response.status).toBe(207);
    expect(body.outcome).toBe('partial_failure');
    expect(body.requiresFollowUp).toEqual(['cms']);
    expect(body.tenant.status).toBe('deleted');
  });

  it('requires explicit confirmation before deleting', async () => {
    await registerActiveSite();

    const response = await request(context.runtime.app)
      .delete('/v1/tenants/acme')
      .send({ initiatedBy: 'operator@example.com', reason: 'Cleanup' });

    expect(response.status).toBe(400);
    expect((response.body as ErrorResponse).code).toBe('CONFIRMATION_REQUIRED');
    expect(context.platforms.sourceControl.calls).toEqual([]);
  });

  it('recovers a deleted site and links the operations', async () => {
    const { tenant } = await registerActiveSite();
    const deletion = await request(context.runtime.app).delete('/v1/tenants/acme').send(confirmedDeletion);
    const deleteBody = deletion.body as DeleteResponse;

    context.clock.advanceDays(5);
    const response = await request(context.runtime.app)
      .post('/v1/tenants/acme/recover')
      .send({ recoveredBy: 'support@example.com' });
    const body = response.body as RecoverResponse;

    expect(response.status).toBe(200);
    expect(body.outcome).toBe('success');
    expect(body.previousTenantId).toBe(tenant.id);
    expect(body.tenant.id).not.toBe(tenant.id);
    expect(body.tenant.status).toBe('active');

    const operation = await request(context.runtime.app).get(`/v1/operations/${deleteBody.operationId}`);
    expect(operation.status).toBe(200);
    expect((operation.body as { operation: { rollbackOperationId: string | null } }).operation.rollbackOperationId)
      .toBe(body.operationId);
  });

  it('answers 410 once the recovery window has closed', async () => {
    await registerActiveSite();
    await request(context.runtime.app).delete('/v1/tenants/acme').send(confirmedDeletion);

    context.clock.advanceDays(31);
    const response = await request(context.runtime.app)
      .post('/v1/tenants/acme/recover')
      .send({ recoveredBy: 'support@example.com' });

    expect(response.status).toBe(410);
    expect((response.body as ErrorResponse).code).toBe('RECOVERY_WINDOW_EXPIRED');
  });

  it('lists pending and expired deletions and finalizes an expired one', async () => {
    await registerActiveSite();
    const deletion = await request(context.runtime.app).delete('/v1/tenants/acme').send(confirmedDeletion);
    const { snapshotId } = deletion.body as DeleteResponse;

    const pending = await request(context.runtime.app).get('/v1/deletions');
    expect((pending.body as { deletions: Array<{ snapshotId: string; daysRemaining: number }> }).deletions).toEqual([
      expect.objectContaining({ snapshotId, daysRemaining: 30 })
    ]);

    const early = await request(context.runtime.app)
      .post(`/v1/deletions/${snapshotId}/permanent`)
      .send({ initiatedBy: 'sweeper' });
    expect(early.status).toBe(409);

    context.clock.advanceDays(31);
    const expired = await request(context.runtime.app).get('/v1/deletions/expired');
    expect((expired.body as { deletions: Array<{ snapshotId: string }> }).deletions.map((entry) => entry.snapshotId))
      .toEqual([snapshotId]);

    const finalized = await request(context.runtime.app)
      .post(`/v1/deletions/${snapshotId}/permanent`)
      .send({ initiatedBy: 'sweeper' });
    expect(finalized.status).toBe(200);
    expect((finalized.body as { snapshot: { permanentlyDeleted: boolean } }).snapshot.permanentlyDeleted).toBe(true);

    const detail = await request(context.runtime.app).get('/v1/tenants/acme');
    expect(detail.status).toBe(404);
  });

  it('runs a health check and exposes the history', async () => {
    await registerActiveSite();
    context.platforms.deployment.health = { status: 'degraded', issues: ['Project is paused'], detail: {} };

    const check = await request(context.runtime.app).post('/v1/tenants/acme/health/check').send({});
    expect(check.status).toBe(200);
    expect((check.body as { overallStatus: string }).overallStatus).toBe('degraded');

    const current = await request(context.runtime.app).get('/v1/tenants/acme/health');
    expect((current.body as { healthStatus: string }).healthStatus).toBe('degraded');

    const history = await request(context.runtime.app).get('/v1/tenants/acme/health/history?limit=5');
    expect((history.body as { records: unknown[] }).records).toHaveLength(1);
  });

  it('syncs the inventory and filters orphaned resources', async () => {
    await registerActiveSite();
    context.platforms.deployment.listing = [
      { platform: 'deployment', resourceType: 'project', resourceId: 'prj_acme', resourceName: 'acme', resourceUrl: null, metadata: {} },
      { platform: 'deployment', resourceType: 'project', resourceId: 'prj_legacy', resourceName: 'legacy', resourceUrl: null, metadata: {} }
    ];

    const sync = await request(context.runtime.app).post('/v1/inventory/sync').send({});
    expect(sync.status).toBe(200);
    expect((sync.body as { outcome: string }).outcome).toBe('success');

    const orphans = await request(context.runtime.app).get('/v1/inventory?orphanedOnly=true');
    expect((orphans.body as { items: Array<{ resourceId: string }> }).items.map((item) => item.resourceId))
      .toEqual(['prj_legacy']);
  });

  it('pages the operation log', async () => {
    await registerActiveSite();

    const first = await request(context.runtime.app).get('/v1/operations?tenantSlug=acme&limit=1');
    const firstBody = first.body as OperationPageResponse;
    expect(first.status).toBe(200);
    expect(firstBody.operations).toHaveLength(1);
    expect(firstBody.nextCursor).not.toBeNull();

    const invalid = await request(context.runtime.app).get('/v1/operations?cursor=bogus');
    expect(invalid.status).toBe(400);
  });

  it('returns structured 404s', async () => {
    const missingSite = await request(context.runtime.app).get('/v1/tenants/nobody');
    expect(missingSite.status).toBe(404);
    expect((missingSite.body as ErrorResponse).code).toBe('TENANT_NOT_FOUND');

    const missingRoute = await request(context.runtime.app).get('/v1/nothing-here');
    expect(missingRoute.status).toBe(404);
    expect((missingRoute.body as ErrorResponse).code).toBe('NOT_FOUND');
  });

  it('echoes a well-formed trace id', async () => {
    const response = await request(context.runtime.app)
      .get('/v1/tenants/nobody')
      .set('x-trace-id', 'trace-12345678');

    expect((response.body as ErrorResponse).traceId).toBe('trace-12345678');
  });
});

describe('operator authentication', () => {
  let context: TestRuntime;

  beforeEach(async () => {
    context = await createTestRuntime({ envOverrides: { OPERATOR_API_KEYS: ['test-secret'] } });
  });

  afterEach(async () => {
    await context.runtime.close();
  });

  it('requires an API key on the lifecycle API', async () => {
    const response = await request(context.runtime.app).get('/v1/tenants');

    expect(response.status).toBe(401);
    expect((response.body as ErrorResponse).code).toBe('AUTH_REQUIRED');
  });

  it('rejects an unknown API key', async () => {
    const response = await request(context.runtime.app).get('/v1/tenants').set('x-api-key', 'wrong-secret');

    expect(response.status).toBe(401);
    expect((response.body as ErrorResponse).code).toBe('AUTH_INVALID_API_KEY');
  });

  it('accepts a configured API key', async () => {
    const response = await request(context.runtime.app).get('/v1/tenants').set('x-api-key', 'test-secret');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ tenants: [] });
  });

  it('leaves the liveness endpoint open', async () => {
    const response = await request(context.runtime.app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok' });
  });
});
