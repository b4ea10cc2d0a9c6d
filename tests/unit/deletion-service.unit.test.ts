import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { AppError } from '../../src/errors/app-error.js';
import { createTestRuntime, type TestRuntime } from '../helpers/create-test-runtime.js';
import { seedActiveTenant } from '../helpers/seed.js';

const deleteRequest = {
  slug: 'acme',
  initiatedBy: 'operator@example.com',
  reason: 'Contract ended',
  confirmed: true
};

async function expectAppError(promise: Promise<unknown>, code: string, statusCode: number): Promise<void> {
  const error = await promise.then(() => null, (reason: unknown) => reason);
  expect(error).toBeInstanceOf(AppError);
  expect(error).toMatchObject({ code, statusCode });
}

describe('deletion service', () => {
  let context: TestRuntime;

  beforeEach(async () => {
    context = await createTestRuntime();
  });

  afterEach(async () => {
    await context.runtime.close();
  });

  it('archives every platform and records a 30-day recovery deadline', async () => {
    await seedActiveTenant(context.runtime);

    const result = await context.runtime.services.deletions.deleteTenant(deleteRequest);

    expect(result.outcome).toEqual({ kind: 'success' });
    expect(result.requiresFollowUp).toEqual([]);
    expect(result.tenant.status).toBe('deleted');
    expect(result.snapshot.deletedAt.toISOString()).toBe('2026-03-01T12:00:00.000Z');
    expect(result.snapshot.recoveryDeadline.toISOString()).toBe('2026-03-31T12:00:00.000Z');
    expect(result.snapshot.platforms.source_control.archived).toBe(true);
    expect(result.snapshot.platforms.deployment.archived).toBe(true);
    expect(result.snapshot.platforms.cms.archived).toBe(true);
    expect(result.snapshot.platforms.backup.archived).toBe(true);

    expect(context.platforms.sourceControl.callsFor('archive')).toEqual([{ action: 'archive', resourceId: 'sites/acme' }]);
    expect(context.platforms.deployment.callsFor('pause')).toEqual([{ action: 'pause', resourceId: 'prj_acme' }]);
    expect(context.platforms.cms.callsFor('archive')).toEqual([{ action: 'archive', resourceId: 'space-shared:acme' }]);
    expect(context.platforms.backup.callsFor('tag_for_retention')).toEqual([
      { action: 'tag_for_retention', resourceId: 'projects/acme/' }
    ]);

    expect(result.operation.status).toBe('success');
    expect(result.operation.successCount).toBe(4);
    expect(result.operation.failureCount).toBe(0);
    expect(result.snapshot.deleteOperationId).toBe(result.operation.id);
  });

  it('reports a deployment timeout as partial success and still deletes the tenant', async () => {
    await seedActiveTenant(context.runtime);
    context.platforms.deployment.script('pause', { kind: 'hang' });

    const result = await context.runtime.services.deletions.deleteTenant(deleteRequest);

    expect(result.outcome.kind).toBe('partial_failure');
    expect(result.requiresFollowUp).toEqual(['deployment']);
    expect(result.tenant.status).toBe('deleted');
    expect(result.snapshot.platforms.deployment.archived).toBe(false);
    expect(result.snapshot.platforms.deployment.result?.error?.code).toBe('PLATFORM_TIMEOUT');
    expect(result.snapshot.platforms.source_control.archived).toBe(true);

    expect(result.operation.status).toBe('partial_success');
    expect(result.operation.successCount).toBe(3);
    expect(result.operation.failureCount).toBe(1);
    expect(result.operation.errorMessages).toEqual(['deployment: deployment pause did not complete within 200ms.']);
  });

  it('retries retryable platform errors within the attempt budget', async () => {
    await seedActiveTenant(context.runtime);
    context.platforms.deployment.script(
      'pause',
      { kind: 'throw', code: 'PLATFORM_UNAVAILABLE', retryable: true },
      { kind: 'throw', code: 'PLATFORM_UNAVAILABLE', retryable: true }
    );

    const result = await context.runtime.services.deletions.deleteTenant(deleteRequest);

    expect(result.outcome).toEqual({ kind: 'success' });
    expect(context.platforms.deployment.callsFor('pause')).toHaveLength(3);
    expect(result.snapshot.platforms.deployment.result?.attempts).toBe(3);
  });

  it('stops retrying after the configured attempts', async () => {
    await seedActiveTenant(context.runtime);
    context.platforms.deployment.script(
      'pause',
      { kind: 'throw', code: 'PLATFORM_UNAVAILABLE', retryable: true },
      { kind: 'throw', code: 'PLATFORM_UNAVAILABLE', retryable: true },
      { kind: 'throw', code: 'PLATFORM_UNAVAILABLE', retryable: true },
      { kind: 'throw', code: 'PLATFORM_UNAVAILABLE', retryable: true }
    );

    const result = await context.runtime.services.deletions.deleteTenant(deleteRequest);

    expect(context.platforms.deployment.callsFor('pause')).toHaveLength(3);
    expect(result.snapshot.platforms.deployment.result?.error?.code).toBe('PLATFORM_UNAVAILABLE');
    expect(result.requiresFollowUp).toEqual(['deployment']);
  });

  it('does not retry errors the adapter marks as permanent', async () => {
    await seedActiveTenant(context.runtime);
    context.platforms.sourceControl.script('archive', { kind: 'throw', code: 'RESOURCE_NOT_FOUND', retryable: false });

    const result = await context.runtime.services.deletions.deleteTenant(deleteRequest);

    expect(context.platforms.sourceControl.callsFor('archive')).toHaveLength(1);
    expect(result.snapshot.platforms.source_control.result?.attempts).toBe(1);
    expect(result.requiresFollowUp).toEqual(['source_control']);
  });

  it('closes the operation as failed when every platform fails but keeps the tenant deleted', async () => {
    await seedActiveTenant(context.runtime);
    const rejection = { kind: 'reject' as const, error: { code: 'DENIED', message: 'denied', retryable: false } };
    context.platforms.sourceControl.script('archive', rejection);
    context.platforms.deployment.script('pause', rejection);
    context.platforms.cms.script('archive', rejection);
    context.platforms.backup.script('tag_for_retention', rejection);

    const result = await context.runtime.services.deletions.deleteTenant(deleteRequest);

    expect(result.outcome.kind).toBe('failure');
    expect(result.operation.status).toBe('failed');
    expect(result.operation.failureCount).toBe(4);
    expect(result.tenant.status).toBe('deleted');
  });

  it('re-runs only the platforms that were not archived on the same snapshot', async () => {
    await seedActiveTenant(context.runtime);
    context.platforms.deployment.script('pause', {
      kind: 'reject',
      error: { code: 'PROJECT_LOCKED', message: 'project locked', retryable: false }
    });

    const first = await context.runtime.services.deletions.deleteTenant(deleteRequest);
    expect(first.requiresFollowUp).toEqual(['deployment']);

    context.clock.advanceDays(1);
    const second = await context.runtime.services.deletions.deleteTenant(deleteRequest);

    expect(second.snapshot.id).toBe(first.snapshot.id);
    expect(second.snapshot.recoveryDeadline.toISOString()).toBe('2026-03-31T12:00:00.000Z');
    expect(second.outcome).toEqual({ kind: 'success' });
    expect(Object.keys(second.operation.platformResults)).toEqual(['deployment']);
    expect(context.platforms.deployment.callsFor('pause')).toHaveLength(2);
    expect(context.platforms.sourceControl.callsFor('archive')).toHaveLength(1);
    expect(second.snapshot.platforms.deployment.archived).toBe(true);

    await expectAppError(context.runtime.services.deletions.deleteTenant(deleteRequest), 'INVALID_STATE', 409);
  });

  it('rejects unconfirmed deletions before touching any platform and logs the failure', async () => {
    await seedActiveTenant(context.runtime);

    await expectAppError(
      context.runtime.services.deletions.deleteTenant({ ...deleteRequest, confirmed: false }),
      'CONFIRMATION_REQUIRED',
      400
    );

    expect(context.platforms.sourceControl.calls).toEqual([]);
    const [entry] = await context.runtime.operationLogRepository.listEntries({ operationType: 'delete', limit: 5 });
    expect(entry?.status).toBe('failed');
    expect(entry?.errorMessages).toEqual(['Deletion must be explicitly confirmed.']);
    expect(entry?.completedAt).not.toBeNull();
  });

  it('requires a deletion reason', async () => {
    await seedActiveTenant(context.runtime);

    await expectAppError(
      context.runtime.services.deletions.deleteTenant({ ...deleteRequest, reason: '   ' }),
      'VALIDATION_ERROR',
      400
    );
  });

  it('fails for unknown and pending tenants', async () => {
    await expectAppError(context.runtime.services.deletions.deleteTenant(deleteRequest), 'TENANT_NOT_FOUND', 404);

    await context.runtime.services.tenants.register({
      slug: 'acme',
      name: 'Acme',
      tier: 'entry',
      initiatedBy: 'provisioner'
    });

    await expectAppError(context.runtime.services.deletions.deleteTenant(deleteRequest), 'INVALID_STATE', 409);
  });

  it('lets only one concurrent delete for a slug proceed', async () => {
    await seedActiveTenant(context.runtime);

    const settled = await Promise.allSettled([
      context.runtime.services.deletions.deleteTenant(deleteRequest),
      context.runtime.services.deletions.deleteTenant(deleteRequest)
    ]);

    const rejected = settled.filter((result) => result.status === 'rejected');
    expect(settled.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toMatchObject({ reason: { code: 'OPERATION_IN_PROGRESS', statusCode: 409 } });
  });

  it('does not let a delete retry and a recovery of the same slug run at once', async () => {
    await seedActiveTenant(context.runtime);
    context.platforms.backup.script('tag_for_retention', {
      kind: 'reject',
      error: { code: 'ACCESS_DENIED', message: 'access denied', retryable: false }
    });
    await context.runtime.services.deletions.deleteTenant(deleteRequest);

    // Whichever call takes the lock first holds it until its hanging platform call times out.
    context.platforms.backup.script('tag_for_retention', { kind: 'hang' });
    context.platforms.deployment.script('resume', { kind: 'hang' });

    const settled = await Promise.allSettled([
      context.runtime.services.recovery.recover({ slug: 'acme', recoveredBy: 'support@example.com' }),
      context.runtime.services.deletions.deleteTenant(deleteRequest)
    ]);

    const rejected = settled.filter((result) => result.status === 'rejected');
    expect(settled.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toMatchObject({
      reason: { code: 'OPERATION_IN_PROGRESS', statusCode: 409, details: { slug: 'acme' } }
    });
  });

  it('lists pending deletions with days remaining and archival progress', async () => {
    await seedActiveTenant(context.runtime);
    context.platforms.backup.script('tag_for_retention', {
      kind: 'reject',
      error: { code: 'ACCESS_DENIED', message: 'access denied', retryable: false }
    });
    await context.runtime.services.deletions.deleteTenant(deleteRequest);

    context.clock.advanceDays(10);
    const [pending] = await context.runtime.services.deletions.listPendingDeletions();

    expect(pending?.tenantSlug).toBe('acme');
    expect(pending?.daysRemaining).toBe(20);
    expect(pending?.archivedPlatforms).toEqual(['source_control', 'deployment', 'cms']);
    expect(pending?.pendingPlatforms).toEqual(['backup']);
  });

  it('refuses permanent deletion until the recovery window has passed', async () => {
    const tenant = await seedActiveTenant(context.runtime);
    const { snapshot } = await context.runtime.services.deletions.deleteTenant(deleteRequest);

    context.clock.advanceDays(30);
    expect(await context.runtime.services.deletions.listExpiredDeletions()).toEqual([]);
    await expectAppError(
      context.runtime.services.deletions.markPermanentlyDeleted({ snapshotId: snapshot.id, initiatedBy: 'sweeper' }),
      'INVALID_STATE',
      409
    );

    context.clock.advanceMs(1);
    const expired = await context.runtime.services.deletions.listExpiredDeletions();
    expect(expired.map((deletion) => deletion.snapshotId)).toEqual([snapshot.id]);

    const result = await context.runtime.services.deletions.markPermanentlyDeleted({
      snapshotId: snapshot.id,
      initiatedBy: 'sweeper'
    });

    expect(result.snapshot.permanentlyDeleted).toBe(true);
    expect(result.operation.operationType).toBe('permanent_delete');
    expect(result.operation.triggerSource).toBe('scheduled');
    expect((await context.runtime.tenantRepository.findTenantById(tenant.id))?.status).toBe('permanently_deleted');
    expect(await context.runtime.tenantRepository.findTenantBySlug('acme')).toBeNull();

    await expectAppError(
      context.runtime.services.deletions.markPermanentlyDeleted({ snapshotId: snapshot.id, initiatedBy: 'sweeper' }),
      'INVALID_STATE',
      409
    );
  });
});
