import {
  GetObjectTaggingCommand,
  ListObjectsV2Command,
  PutObjectTaggingCommand,
  S3Client,
  type Tag
} from '@aws-sdk/client-s3';

import type { Clock } from '../domain/lifecycle.js';
import type { AdapterResult, HealthDetail, ResourceRef } from '../domain/platform.js';
import type { BackupCredential, CredentialProvider } from './credential-provider.js';
import type { RetentionAdapter } from './platform-adapter.js';
import { notConfigured, toPlatformOperationError } from './platform-errors.js';

export const RETENTION_TAG_KEY = 'site-registry:retention';
export const RETENTION_TAG_VALUE = 'soft-deleted';
export const RETAINED_AT_TAG_KEY = 'site-registry:retained-at';

const DAY_MS = 24 * 60 * 60 * 1_000;

export interface BackupObject {
  key: string;
  lastModified: Date | null;
}

export interface BackupObjectStore {
  listObjects(bucket: string, prefix: string): Promise<BackupObject[]>;
  listPrefixes(bucket: string, prefix: string): Promise<string[]>;
  getObjectTags(bucket: string, key: string): Promise<Record<string, string>>;
  putObjectTags(bucket: string, key: string, tags: Record<string, string>): Promise<void>;
}

export type BackupStoreFactory = (credential: BackupCredential) => BackupObjectStore;

function tagsToRecord(tagSet: Tag[] | undefined): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const tag of tagSet ?? []) {
    if (typeof tag.Key === 'string' && typeof tag.Value === 'string') {
      tags[tag.Key] = tag.Value;
    }
  }
  return tags;
}

export class S3BackupObjectStore implements BackupObjectStore {
  public constructor(private readonly client: S3Client) {}

  public async listObjects(bucket: string, prefix: string): Promise<BackupObject[]> {
    const objects: BackupObject[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken
      }));

      for (const entry of page.Contents ?? []) {
        if (typeof entry.Key === 'string') {
          objects.push({ key: entry.Key, lastModified: entry.LastModified ?? null });
        }
      }

      continuationToken = page.IsTruncated === true ? page.NextContinuationToken : undefined;
    } while (continuationToken !== undefined);

    return objects;
  }

  public async listPrefixes(bucket: string, prefix: string): Promise<string[]> {
    const prefixes: string[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix,
        Delimiter: '/',
        ContinuationToken: continuationToken
      }));

      for (const entry of page.CommonPrefixes ?? []) {
        if (typeof entry.Prefix === 'string') {
          prefixes.push(entry.Prefix);
        }
      }

      continuationToken = page.IsTruncated === true ? page.NextContinuationToken : undefined;
    } while (continuationToken !== undefined);

    return prefixes;
  }

  public async getObjectTags(bucket: string, key: string): Promise<Record<string, string>> {
    const response = await this.client.send(new GetObjectTaggingCommand({ Bucket: bucket, Key: key }));
    return tagsToRecord(response.TagSet);
  }

  public async putObjectTags(bucket: string, key: string, tags: Record<string, string>): Promise<void> {
    await this.client.send(new PutObjectTaggingCommand({
      Bucket: bucket,
      Key: key,
      Tagging: {
        TagSet: Object.entries(tags).map(([Key, Value]) => ({ Key, Value }))
      }
    }));
  }
}

export function createS3BackupObjectStore(credential: BackupCredential): BackupObjectStore {
  const client = new S3Client({
    region: credential.region,
    ...(credential.endpoint !== null ? { endpoint: credential.endpoint, forcePathStyle: true } : {}),
    ...(credential.accessKeyId !== null && credential.secretAccessKey !== null
      ? { credentials: { accessKeyId: credential.accessKeyId, secretAccessKey: credential.secretAccessKey } }
      : {})
  });

  return new S3BackupObjectStore(client);
}

export interface S3BackupAdapterConfig {
  bucket: string | null;
  rootPrefix: string;
  staleBackupDays: number;
  now: Clock;
}

export class S3BackupAdapter implements RetentionAdapter {
  public readonly platform = 'backup' as const;
  public readonly capability = 'retention' as const;

  public constructor(
    private readonly credentials: CredentialProvider,
    private readonly config: S3BackupAdapterConfig,
    private readonly createStore: BackupStoreFactory = createS3BackupObjectStore
  ) {}

  public async tagForRetention(ref: ResourceRef): Promise<AdapterResult> {
    const { store, bucket } = await this.open();
    const retainedAt = this.config.now().toISOString();
    const objects = await this.guard(() => store.listObjects(bucket, ref.resourceId));

    let tagged = 0;
    let alreadyTagged = 0;

    for (const object of objects) {
      const tags = await this.guard(() => store.getObjectTags(bucket, object.key));
      if (tags[RETENTION_TAG_KEY] === RETENTION_TAG_VALUE) {
        alreadyTagged += 1;
        continue;
      }

      await this.guard(() => store.putObjectTags(bucket, object.key, {
        ...tags,
        [RETENTION_TAG_KEY]: RETENTION_TAG_VALUE,
        [RETAINED_AT_TAG_KEY]: retainedAt
      }));
      tagged += 1;
    }

    return {
      success: true,
      detail: { bucket, prefix: ref.resourceId, objectCount: objects.length, taggedObjects: tagged, alreadyTagged }
    };
  }

  public async clearRetentionTag(ref: ResourceRef): Promise<AdapterResult> {
    const { store, bucket } = await this.open();
    const objects = await this.guard(() => store.listObjects(bucket, ref.resourceId));

    let cleared = 0;

    for (const object of objects) {
      const tags = await this.guard(() => store.getObjectTags(bucket, object.key));
      if (!(RETENTION_TAG_KEY in tags) && !(RETAINED_AT_TAG_KEY in tags)) {
        continue;
      }

      const remaining = Object.fromEntries(
        Object.entries(tags).filter(([key]) => key !== RETENTION_TAG_KEY && key !== RETAINED_AT_TAG_KEY)
      );
      await this.guard(() => store.putObjectTags(bucket, object.key, remaining));
      cleared += 1;
    }

    return {
      success: true,
      detail: { bucket, prefix: ref.resourceId, objectCount: objects.length, clearedObjects: cleared }
    };
  }

  public async probe(ref: ResourceRef): Promise<HealthDetail> {
    const { store, bucket } = await this.open();

    let objects: BackupObject[];
    try {
      objects = await store.listObjects(bucket, ref.resourceId);
    } catch (error) {
      return {
        status: 'down',
        issues: [`Backup storage inaccessible: ${error instanceof Error ? error.message : 'unknown error'}`],
        detail: { bucket, prefix: ref.resourceId }
      };
    }

    if (objects.length === 0) {
      return {
        status: 'degraded',
        issues: ['No backups found'],
        detail: { bucket, prefix: ref.resourceId, objectCount: 0 }
      };
    }

    const newest = objects.reduce<Date | null>((latest, object) => {
      if (object.lastModified === null) {
        return latest;
      }
      return latest === null || object.lastModified > latest ? object.lastModified : latest;
    }, null);

    const detail: Record<string, unknown> = {
      bucket,
      prefix: ref.resourceId,
      objectCount: objects.length,
      latestBackupAt: newest?.toISOString() ?? null
    };

    if (newest === null) {
      return { status: 'degraded', issues: ['Backup age is unknown'], detail };
    }

    const ageDays = Math.floor((this.config.now().getTime() - newest.getTime()) / DAY_MS);
    detail.latestBackupAgeDays = ageDays;
    if (ageDays > this.config.staleBackupDays) {
      return { status: 'degraded', issues: [`Latest backup is ${ageDays} days old`], detail };
    }

    return { status: 'healthy', issues: [], detail };
  }

  public async list(): Promise<ResourceRef[]> {
    const { store, bucket } = await this.open();
    const prefixes = await this.guard(() => store.listPrefixes(bucket, this.config.rootPrefix));

    return prefixes.map((prefix) => {
      const segments = prefix.split('/').filter((segment) => segment.length > 0);
      return {
        platform: 'backup',
        resourceType: 'backup_prefix',
        resourceId: prefix,
        resourceName: segments[segments.length - 1] ?? prefix,
        resourceUrl: null,
        metadata: { bucket }
      };
    });
  }

  private async open(): Promise<{ store: BackupObjectStore; bucket: string }> {
    const bucket = this.config.bucket;
    if (bucket === null) {
      throw notConfigured('backup', 'BACKUP_BUCKET is not configured.');
    }

    const credential = await this.credentials.backup();
    return { store: this.createStore(credential), bucket };
  }

  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toPlatformOperationError('backup', error);
    }
  }
}
