import { performance } from 'node:perf_hooks';

import type { HealthDetail } from '../domain/platform.js';
import type { UrlProbe } from './platform-adapter.js';
import type { FetchLike } from './vercel-adapter.js';

export class FetchUrlProbe implements UrlProbe {
  public constructor(
    private readonly slowResponseMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  public async probe(url: string): Promise<HealthDetail> {
    const startedAt = performance.now();

    try {
      const response = await this.fetchImpl(url, { method: 'GET', redirect: 'follow' });
      const responseTimeMs = Math.round(performance.now() - startedAt);
      const detail = { url, statusCode: response.status, responseTimeMs };

      if (response.status >= 400) {
        return { status: 'down', issues: [`Site returned HTTP ${response.status}`], detail };
      }

      if (responseTimeMs > this.slowResponseMs) {
        return { status: 'degraded', issues: [`Slow response: ${responseTimeMs}ms`], detail };
      }

      return { status: 'healthy', issues: [], detail };
    } catch (error) {
      return {
        status: 'down',
        issues: [`Site unreachable: ${error instanceof Error ? error.message : 'unknown error'}`],
        detail: { url, responseTimeMs: Math.round(performance.now() - startedAt) }
      };
    }
  }
}
