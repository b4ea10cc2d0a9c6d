import type { Platform, PlatformResult, PlatformResults, ResourceRef } from '../domain/platform.js';
import {
  deactivate,
  deactivationAction,
  reactivate,
  reactivationAction,
  type PlatformAdapters
} from '../adapters/platform-adapter.js';
import { runPlatformCall, type PlatformCallPolicy } from '../platform/platform-call.js';

export type FanOutDirection = 'deactivate' | 'reactivate';

function skipped(): PlatformResult {
  return {
    success: true,
    detail: { skipped: true, reason: 'no_resource_handle' },
    error: null,
    attempts: 0,
    durationMs: 0
  };
}

/**
 * Runs the lifecycle step on every listed platform concurrently. A platform the tenant was
 * never provisioned on is recorded as a skipped success.
 */
export async function fanOut(
  adapters: PlatformAdapters,
  refs: Partial<Record<Platform, ResourceRef>>,
  platforms: readonly Platform[],
  direction: FanOutDirection,
  policy: PlatformCallPolicy
): Promise<PlatformResults> {
  const settled = await Promise.all(platforms.map(async (platform): Promise<[Platform, PlatformResult]> => {
    const ref = refs[platform];
    if (ref === undefined) {
      return [platform, skipped()];
    }

    const adapter = adapters[platform];
    const result = direction === 'deactivate'
      ? await runPlatformCall(platform, deactivationAction(adapter), () => deactivate(adapter, ref), policy)
      : await runPlatformCall(platform, reactivationAction(adapter), () => reactivate(adapter, ref), policy);

    return [platform, result];
  }));

  const results: PlatformResults = {};
  for (const [platform, result] of settled) {
    results[platform] = result;
  }

  return results;
}
