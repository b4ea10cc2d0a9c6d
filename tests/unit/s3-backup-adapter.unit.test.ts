import { describe, expect, it } from 'vitest';

import { EnvCredentialProvider } from '../../src/adapters/credential-provider.js';
import {
  RETAINED_AT_TAG_KEY,
  RETENTION_TAG_KEY,
  S3BackupAdapter,
  type BackupObject,
  type BackupObjectStore
} from '../../src/adapters/s3-backup-adapter.js';
import type { ResourceRef } from '../../src/domain/platform.js';
import { TestClock } from '../helpers/test-clock.js';

class FakeBackupStore implements BackupObjectStore {
  public readonly tags = new Map<string, Record<string, string>>();

  public failListing: Error | null = null;

  public constructor(
    private readonly objects: BackupObject[],
    private readonly prefixes: string[] = []
  ) {}

  public async listObjects(_bucket: string, prefix: string): Promise<BackupObject[]> {
    if (this.failListing !== null) {
      throw this.failListing;
    }

    return this.objects.filter((object) => object.key.startsWith(prefix));
  }

  public async listPrefixes(): Promise<string[]> {
    return this.prefixes;
  }

  public async getObjectTags(_bucket: string, key: string): Promise<Record<string, string>> {
    return { ...(this.tags.get(key) ?? {}) };
  }

  public async putObjectTags(_bucket: string, key: string, tags: Record<string, string>): Promise<void> {
    this.tags.set(key, { ...tags });
  }
}

const backupRef: ResourceRef = {
  platform: 'backup',
  resourceType: 'backup_prefix',
  resourceId: 'projects/acme/',
  resourceName: 'acme',
  resourceUrl: null,
  metadata: {}
};

function createAdapter(store: BackupObjectStore, bucket: string | null = 'test-backups') {
  return new S3BackupAdapter(new EnvCredentialProvider({}), {
    bucket,
    rootPrefix: 'projects/',
    staleBackupDays: 7,
    now: new TestClock('2026-03-10T00:00:00.000Z').now
  }, () => store);
}

describe('s3 backup adapter', () => {
  it('tags every object under the prefix and skips ones already retained', async () => {
    const store = new FakeBackupStore([
      { key: 'projects/acme/db.sql.gz', lastModified: null },
      { key: 'projects/acme/media.tar', lastModified: null },
      { key: 'projects/globex/db.sql.gz', lastModified: null }
    ]);
    store.tags.set('projects/acme/db.sql.gz', { owner: 'ops' });
    store.tags.set('projects/acme/media.tar', { [RETENTION_TAG_KEY]: 'soft-deleted' });

    const result = await createAdapter(store).tagForRetention(backupRef);

    expect(result.detail).toEqual({
      bucket: 'test-backups',
      prefix: 'projects/acme/',
      objectCount: 2,
      taggedObjects: 1,
      alreadyTagged: 1
    });
    expect(store.tags.get('projects/acme/db.sql.gz')).toEqual({
      owner: 'ops',
      [RETENTION_TAG_KEY]: 'soft-deleted',
      [RETAINED_AT_TAG_KEY]: '2026-03-10T00:00:00.000Z'
    });
    expect(store.tags.has('projects/globex/db.sql.gz')).toBe(false);
  });

  it('removes only the retention tags on restore', async () => {
    const store = new FakeBackupStore([{ key: 'projects/acme/db.sql.gz', lastModified: null }]);
    store.tags.set('projects/acme/db.sql.gz', {
      owner: 'ops',
      [RETENTION_TAG_KEY]: 'soft-deleted',
      [RETAINED_AT_TAG_KEY]: '2026-03-01T00:00:00.000Z'
    });

    const result = await createAdapter(store).clearRetentionTag(backupRef);

    expect(result.detail).toMatchObject({ clearedObjects: 1 });
    expect(store.tags.get('projects/acme/db.sql.gz')).toEqual({ owner: 'ops' });
  });

  it('grades backups by age', async () => {
    const fresh = new FakeBackupStore([
      { key: 'projects/acme/a', lastModified: new Date('2026-03-01T00:00:00.000Z') },
      { key: 'projects/acme/b', lastModified: new Date('2026-03-08T00:00:00.000Z') }
    ]);
    const stale = new FakeBackupStore([
      { key: 'projects/acme/a', lastModified: new Date('2026-02-20T00:00:00.000Z') }
    ]);

    const freshHealth = await createAdapter(fresh).probe(backupRef);
    const staleHealth = await createAdapter(stale).probe(backupRef);
    const emptyHealth = await createAdapter(new FakeBackupStore([])).probe(backupRef);

    expect(freshHealth).toMatchObject({ status: 'healthy', detail: { latestBackupAgeDays: 2 } });
    expect(staleHealth).toMatchObject({ status: 'degraded', issues: ['Latest backup is 18 days old'] });
    expect(emptyHealth).toMatchObject({ status: 'degraded', issues: ['No backups found'] });
  });

  it('reports inaccessible storage as down', async () => {
    const store = new FakeBackupStore([]);
    store.failListing = new Error('Access Denied');

    const health = await createAdapter(store).probe(backupRef);

    expect(health).toMatchObject({ status: 'down', issues: ['Backup storage inaccessible: Access Denied'] });
  });

  it('lists one resource per client prefix', async () => {
    const store = new FakeBackupStore([], ['projects/acme/', 'projects/globex/']);

    const refs = await createAdapter(store).list();

    expect(refs.map((ref) => [ref.resourceId, ref.resourceName])).toEqual([
      ['projects/acme/', 'acme'],
      ['projects/globex/', 'globex']
    ]);
  });

  it('refuses to run without a bucket', async () => {
    await expect(createAdapter(new FakeBackupStore([]), null).tagForRetention(backupRef)).rejects.toMatchObject({
      code: 'PLATFORM_NOT_CONFIGURED',
      retryable: false
    });
  });
});
