import { describe, expect, it } from 'vitest';

import { InMemoryOperationLogRepository } from '../../src/repositories/in-memory-operation-log-repository.js';
import type { OperationType } from '../../src/repositories/operation-log-repository.js';
import { encodeCursor, OperationLogQueryService } from '../../src/services/operation-log-query-service.js';

async function seedEntries(repository: InMemoryOperationLogRepository, types: OperationType[]): Promise<string[]> {
  const ids: string[] = [];

  for (const [index, operationType] of types.entries()) {
    const entry = await repository.createEntry({
      operationType,
      tenantId: null,
      tenantSlug: index % 2 === 0 ? 'acme' : 'globex',
      initiatedBy: 'operator@example.com',
      triggerSource: 'api',
      requestPayload: {},
      startedAt: new Date(Date.UTC(2026, 2, 1, 12, index))
    });
    ids.push(entry.id);
  }

  return ids;
}

describe('operation log query service', () => {
  it('pages newest first with an opaque cursor', async () => {
    const repository = new InMemoryOperationLogRepository();
    const ids = await seedEntries(repository, ['create', 'activate', 'health_check', 'delete', 'recover']);
    const service = new OperationLogQueryService(repository, { listDefaultLimit: 50, listMaxLimit: 200 });

    const first = await service.listOperations({ limit: 2 });
    expect(first.operations.map((entry) => entry.id)).toEqual([ids[4], ids[3]]);
    expect(first.nextCursor).not.toBeNull();

    const second = await service.listOperations({ limit: 2, cursor: first.nextCursor ?? undefined });
    expect(second.operations.map((entry) => entry.id)).toEqual([ids[2], ids[1]]);

    const third = await service.listOperations({ limit: 2, cursor: second.nextCursor ?? undefined });
    expect(third.operations.map((entry) => entry.id)).toEqual([ids[0]]);
    expect(third.nextCursor).toBeNull();
  });

  it('filters by site, operation type and time range', async () => {
    const repository = new InMemoryOperationLogRepository();
    const ids = await seedEntries(repository, ['create', 'activate', 'health_check', 'delete', 'health_check']);
    const service = new OperationLogQueryService(repository, { listDefaultLimit: 50, listMaxLimit: 200 });

    const bySite = await service.listOperations({ tenantSlug: 'globex' });
    expect(bySite.operations.map((entry) => entry.id)).toEqual([ids[3], ids[1]]);

    const byType = await service.listOperations({ operationType: 'health_check' });
    expect(byType.operations.map((entry) => entry.id)).toEqual([ids[4], ids[2]]);

    const byRange = await service.listOperations({
      from: new Date('2026-03-01T12:01:00.000Z'),
      to: new Date('2026-03-01T12:02:00.000Z')
    });
    expect(byRange.operations.map((entry) => entry.id)).toEqual([ids[2], ids[1]]);
  });

  it('rejects malformed cursors and limits', async () => {
    const service = new OperationLogQueryService(new InMemoryOperationLogRepository(), {
      listDefaultLimit: 50,
      listMaxLimit: 200
    });

    await expect(service.listOperations({ cursor: 'not-a-cursor' })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Cursor is invalid.'
    });
    await expect(service.listOperations({ limit: -1 })).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('accepts a cursor it encoded itself', async () => {
    const repository = new InMemoryOperationLogRepository();
    const ids = await seedEntries(repository, ['create', 'activate']);
    const service = new OperationLogQueryService(repository, { listDefaultLimit: 50, listMaxLimit: 200 });

    const cursor = encodeCursor({ startedAt: new Date('2026-03-01T12:01:00.000Z'), id: 'ffffffff-ffff-4fff-bfff-ffffffffffff' });
    const page = await service.listOperations({ cursor });

    expect(page.operations.map((entry) => entry.id)).toEqual([ids[1], ids[0]]);
  });

  it('returns one entry by id or reports it missing', async () => {
    const repository = new InMemoryOperationLogRepository();
    const [id] = await seedEntries(repository, ['create']);
    const service = new OperationLogQueryService(repository, { listDefaultLimit: 50, listMaxLimit: 200 });

    expect((await service.getOperation(id ?? '')).operationType).toBe('create');
    await expect(service.getOperation('00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      code: 'OPERATION_NOT_FOUND',
      statusCode: 404
    });
  });
});
