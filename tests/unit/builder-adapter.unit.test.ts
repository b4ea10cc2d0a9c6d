import { describe, expect, it } from 'vitest';

import { BuilderAdapter } from '../../src/adapters/builder-adapter.js';
import { EnvCredentialProvider } from '../../src/adapters/credential-provider.js';
import type { FetchLike } from '../../src/adapters/vercel-adapter.js';
import type { ResourceRef } from '../../src/domain/platform.js';
import { TestClock } from '../helpers/test-clock.js';

interface ContentEntry {
  id: string;
  data: Record<string, unknown>;
}

interface RecordedRequest {
  method: string;
  url: URL;
  authorization: string | null;
  body: unknown;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** Serves one content model from an in-process store, filtering like the content API does. */
function contentApi(entries: ContentEntry[]): { fetchImpl: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input);
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : null;
    requests.push({
      method: init?.method ?? 'GET',
      url,
      authorization: new Headers(init?.headers).get('Authorization'),
      body
    });

    if (url.hostname === 'write.cms.test') {
      const entryId = decodeURIComponent(url.pathname.split('/').at(-1) ?? '');
      const entry = entries.find((candidate) => candidate.id === entryId);
      if (entry === undefined) {
        return json({ error: 'not found' }, 404);
      }

      if (typeof body === 'object' && body !== null && 'data' in body && typeof body.data === 'object' && body.data !== null) {
        entry.data = { ...entry.data, ...body.data };
      }
      return json({ id: entry.id });
    }

    if (url.searchParams.get('apiKey') === 'space-missing') {
      return json({ error: 'unknown space' }, 404);
    }

    const clientSlug = url.searchParams.get('query.data.clientSlug');
    const results = entries.filter((entry) => clientSlug === null || entry.data.clientSlug === clientSlug);
    return json({ results });
  };

  return { fetchImpl, requests };
}

function sharedRef(clientSlug: string, spaceId = 'space-shared'): ResourceRef {
  return {
    platform: 'cms',
    resourceType: 'content_scope',
    resourceId: `${spaceId}:${clientSlug}`,
    resourceName: clientSlug,
    resourceUrl: null,
    metadata: { mode: 'shared' }
  };
}

function createAdapter(fetchImpl: FetchLike, sharedSpaceId: string | null = 'space-shared') {
  return new BuilderAdapter(new EnvCredentialProvider({ BUILDER_PRIVATE_KEY: 'test-secret' }), {
    contentApiUrl: 'https://content.cms.test/api/v3/content',
    writeApiUrl: 'https://write.cms.test/api/v1/write',
    models: ['page'],
    sharedSpaceId,
    now: new TestClock('2026-03-01T12:00:00.000Z').now
  }, fetchImpl);
}

describe('builder adapter', () => {
  it('archives only the entries belonging to the client in a shared space', async () => {
    const entries: ContentEntry[] = [
      { id: 'home-acme', data: { clientSlug: 'acme' } },
      { id: 'about-acme', data: { clientSlug: 'acme', __archivedForDeletion: true } },
      { id: 'home-globex', data: { clientSlug: 'globex' } }
    ];
    const { fetchImpl, requests } = contentApi(entries);

    const result = await createAdapter(fetchImpl).archive(sharedRef('acme'));

    expect(result.detail).toEqual({
      spaceId: 'space-shared',
      mode: 'shared',
      archived: true,
      updatedEntries: 1,
      unchangedEntries: 1
    });
    expect(entries[0]?.data).toEqual({
      clientSlug: 'acme',
      __archivedForDeletion: true,
      __archivedAt: '2026-03-01T12:00:00.000Z'
    });
    expect(entries[2]?.data).toEqual({ clientSlug: 'globex' });

    const patch = requests.find((request) => request.method === 'PATCH');
    expect(patch?.url.pathname).toBe('/api/v1/write/page/home-acme');
    expect(patch?.authorization).toBe('Bearer test-secret');
  });

  it('refuses to touch anything when the scoped read leaks another client', async () => {
    const entries: ContentEntry[] = [{ id: 'home-globex', data: { clientSlug: 'globex' } }];
    const leaky: FetchLike = async () => json({ results: entries });

    await expect(createAdapter(leaky).archive(sharedRef('acme'))).rejects.toMatchObject({
      code: 'CONTENT_SCOPE_MISMATCH',
      retryable: false
    });
  });

  it('restores archived entries', async () => {
    const entries: ContentEntry[] = [{ id: 'home-acme', data: { clientSlug: 'acme', __archivedForDeletion: true } }];
    const { fetchImpl } = contentApi(entries);

    const result = await createAdapter(fetchImpl).restore(sharedRef('acme'));

    expect(result.detail).toMatchObject({ archived: false, updatedEntries: 1 });
    expect(entries[0]?.data).toEqual({
      clientSlug: 'acme',
      __archivedForDeletion: false,
      __archivedAt: null,
      __restoredAt: '2026-03-01T12:00:00.000Z'
    });
  });

  it('reports an unreachable space as down and an empty one as degraded', async () => {
    const { fetchImpl } = contentApi([]);
    const adapter = createAdapter(fetchImpl);

    await expect(adapter.probe(sharedRef('acme', 'space-missing'))).resolves.toMatchObject({
      status: 'down',
      issues: ['CMS space space-missing is not reachable (404)']
    });
    await expect(adapter.probe(sharedRef('acme'))).resolves.toMatchObject({
      status: 'degraded',
      issues: ['No content entries found']
    });
  });

  it('lists one content scope per client slug in the shared space', async () => {
    const { fetchImpl, requests } = contentApi([
      { id: 'home-acme', data: { clientSlug: 'acme' } },
      { id: 'about-acme', data: { clientSlug: 'acme' } },
      { id: 'home-globex', data: { clientSlug: 'globex' } },
      { id: 'unowned', data: {} }
    ]);

    const refs = await createAdapter(fetchImpl).list();

    expect(refs.map((ref) => [ref.resourceId, ref.resourceName, ref.metadata])).toEqual([
      ['space-shared:acme', 'acme', { entryCount: 2 }],
      ['space-shared:globex', 'globex', { entryCount: 1 }]
    ]);
    expect(requests[0]?.url.searchParams.get('query.data.clientSlug')).toBeNull();
  });

  it('needs a shared space to list', async () => {
    const { fetchImpl } = contentApi([]);

    await expect(createAdapter(fetchImpl, null).list()).rejects.toMatchObject({ code: 'PLATFORM_NOT_CONFIGURED' });
  });
});
