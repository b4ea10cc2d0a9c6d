import { z } from 'zod';

import type { Clock } from '../domain/lifecycle.js';
import type { AdapterResult, HealthDetail, ResourceRef } from '../domain/platform.js';
import { cmsResourceId, cmsTargetFromRef, type CmsTarget } from '../domain/resource-refs.js';
import { PlatformOperationError } from '../errors/lifecycle-errors.js';
import type { CredentialProvider } from './credential-provider.js';
import type { ArchivableAdapter } from './platform-adapter.js';
import { notConfigured, platformErrorFromStatus, toPlatformOperationError } from './platform-errors.js';
import type { FetchLike } from './vercel-adapter.js';

const PAGE_SIZE = 100;

const contentEntrySchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  data: z.record(z.unknown()).default({})
}).passthrough();

const contentPageSchema = z.object({
  results: z.array(contentEntrySchema).default([])
});

type ContentEntry = z.infer<typeof contentEntrySchema>;

export interface BuilderAdapterConfig {
  contentApiUrl: string;
  writeApiUrl: string;
  models: string[];
  sharedSpaceId: string | null;
  now: Clock;
}

function isArchived(entry: ContentEntry): boolean {
  return entry.data.__archivedForDeletion === true;
}

function clientSlugOf(entry: ContentEntry): string | null {
  const value = entry.data.clientSlug;
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Every content read is scoped by the target. In a shared space that means filtering on
 * `data.clientSlug`; a dedicated space belongs to one tenant and needs no filter.
 */
function contentQuery(target: CmsTarget, offset: number): URLSearchParams {
  const params = new URLSearchParams({
    apiKey: target.spaceId,
    limit: String(PAGE_SIZE),
    offset: String(offset),
    includeUnpublished: 'true',
    cachebust: 'true'
  });

  switch (target.mode) {
    case 'shared':
      params.set('query.data.clientSlug', target.clientSlug);
      return params;
    case 'dedicated':
      return params;
  }
}

export class BuilderAdapter implements ArchivableAdapter {
  public readonly platform = 'cms' as const;
  public readonly capability = 'archivable' as const;

  public constructor(
    private readonly credentials: CredentialProvider,
    private readonly config: BuilderAdapterConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  public archive(ref: ResourceRef): Promise<AdapterResult> {
    return this.setArchived(ref, true);
  }

  public restore(ref: ResourceRef): Promise<AdapterResult> {
    return this.setArchived(ref, false);
  }

  public async probe(ref: ResourceRef): Promise<HealthDetail> {
    const target = cmsTargetFromRef(ref);
    const counts: Record<string, number> = {};
    let total = 0;

    for (const model of this.config.models) {
      const response = await this.send(this.contentUrl(model, contentQuery(target, 0)), { method: 'GET' });
      if (response.status === 401 || response.status === 403 || response.status === 404) {
        return {
          status: 'down',
          issues: [`CMS space ${target.spaceId} is not reachable (${response.status})`],
          detail: { spaceId: target.spaceId, mode: target.mode, model }
        };
      }

      if (!response.ok) {
        throw platformErrorFromStatus('cms', response.status, `Builder content API returned ${response.status}.`);
      }

      const page = contentPageSchema.parse(await response.json());
      counts[model] = page.results.length;
      total += page.results.length;
    }

    return {
      status: total === 0 ? 'degraded' : 'healthy',
      issues: total === 0 ? ['No content entries found'] : [],
      detail: { spaceId: target.spaceId, mode: target.mode, entries: counts }
    };
  }

  /** Only the shared space can be enumerated; dedicated spaces are not listable through the public API. */
  public async list(): Promise<ResourceRef[]> {
    const spaceId = this.config.sharedSpaceId;
    if (spaceId === null) {
      throw notConfigured('cms', 'BUILDER_SHARED_SPACE_ID is not configured.');
    }

    const entriesBySlug = new Map<string, number>();
    for (const model of this.config.models) {
      // unfiltered read of the whole space
      const entries = await this.fetchEntries(model, { mode: 'dedicated', spaceId });
      for (const entry of entries) {
        const slug = clientSlugOf(entry);
        if (slug !== null) {
          entriesBySlug.set(slug, (entriesBySlug.get(slug) ?? 0) + 1);
        }
      }
    }

    return [...entriesBySlug.entries()].map(([clientSlug, entryCount]) => ({
      platform: 'cms',
      resourceType: 'content_scope',
      resourceId: cmsResourceId({ mode: 'shared', spaceId, clientSlug }),
      resourceName: clientSlug,
      resourceUrl: null,
      metadata: { entryCount }
    }));
  }

  private async setArchived(ref: ResourceRef, archived: boolean): Promise<AdapterResult> {
    const target = cmsTargetFromRef(ref);
    const { privateKey } = await this.credentials.builder(target.spaceId);
    const changedAt = this.config.now().toISOString();

    let updated = 0;
    let unchanged = 0;

    for (const model of this.config.models) {
      const entries = await this.fetchEntries(model, target);
      this.assertScope(target, entries);

      for (const entry of entries) {
        if (isArchived(entry) === archived) {
          unchanged += 1;
          continue;
        }

        await this.patchEntry(privateKey, model, entry.id, archived
          ? { __archivedForDeletion: true, __archivedAt: changedAt }
          : { __archivedForDeletion: false, __archivedAt: null, __restoredAt: changedAt });
        updated += 1;
      }
    }

    return {
      success: true,
      detail: {
        spaceId: target.spaceId,
        mode: target.mode,
        archived,
        updatedEntries: updated,
        unchangedEntries: unchanged
      }
    };
  }

  private assertScope(target: CmsTarget, entries: ContentEntry[]): void {
    switch (target.mode) {
      case 'shared': {
        const foreign = entries.find((entry) => clientSlugOf(entry) !== target.clientSlug);
        if (foreign !== undefined) {
          throw new PlatformOperationError(
            'cms',
            'CONTENT_SCOPE_MISMATCH',
            `Shared space query returned entry ${foreign.id} outside '${target.clientSlug}'.`,
            false
          );
        }
        return;
      }
      case 'dedicated':
        return;
    }
  }

  private async fetchEntries(model: string, target: CmsTarget): Promise<ContentEntry[]> {
    const entries: ContentEntry[] = [];

    for (let offset = 0; ; offset += PAGE_SIZE) {
      const response = await this.send(this.contentUrl(model, contentQuery(target, offset)), { method: 'GET' });
      if (!response.ok) {
        throw platformErrorFromStatus('cms', response.status, `Builder content API returned ${response.status}.`);
      }

      const page = contentPageSchema.parse(await response.json());
      entries.push(...page.results);
      if (page.results.length < PAGE_SIZE) {
        return entries;
      }
    }
  }

  private async patchEntry(privateKey: string, model: string, entryId: string, data: Record<string, unknown>): Promise<void> {
    const url = `${this.config.writeApiUrl}/${encodeURIComponent(model)}/${encodeURIComponent(entryId)}`;
    const response = await this.send(url, {
      method: 'PATCH',
      headers: {
        Authorization: `Bearer ${privateKey}`,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({ data })
    });

    if (!response.ok) {
      throw platformErrorFromStatus('cms', response.status, `Builder write API returned ${response.status} for entry ${entryId}.`);
    }
  }

  private contentUrl(model: string, params: URLSearchParams): string {
    return `${this.config.contentApiUrl}/${encodeURIComponent(model)}?${params.toString()}`;
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      throw toPlatformOperationError('cms', error);
    }
  }
}
