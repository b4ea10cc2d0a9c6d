import { performance } from 'node:perf_hooks';

import type { AdapterResult, HealthPlatform, PlatformErrorInfo, PlatformResult } from '../domain/platform.js';
import { PlatformOperationError } from '../errors/lifecycle-errors.js';
import { recordPlatformCall } from '../telemetry/metrics.js';
import { withRetry } from './retry.js';
import { withTimeout } from './timeout.js';

export interface PlatformCallPolicy {
  timeoutMs: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  sleep?: (delayMs: number) => Promise<void>;
  random?: () => number;
}

export function toPlatformErrorInfo(error: unknown): PlatformErrorInfo {
  if (error instanceof PlatformOperationError) {
    return {
      code: error.code,
      message: error.message,
      retryable: error.retryable
    };
  }

  return {
    code: 'PLATFORM_CALL_FAILED',
    message: error instanceof Error ? error.message : 'Platform call failed.',
    retryable: false
  };
}

function isRetryablePlatformError(error: unknown): boolean {
  return error instanceof PlatformOperationError && error.retryable;
}

/**
 * Runs one adapter call under the per-platform timeout, retrying errors the adapter marks
 * retryable. The timeout covers every attempt. Never rejects: failures come back as a failed
 * `PlatformResult` so sibling platforms are unaffected.
 */
export async function runPlatformCall(
  platform: HealthPlatform,
  action: string,
  call: () => Promise<AdapterResult>,
  policy: PlatformCallPolicy
): Promise<PlatformResult> {
  const startedAt = performance.now();
  let attempts = 0;
  let timedOut = false;

  const elapsed = (): number => Math.round(performance.now() - startedAt);

  try {
    const result = await withTimeout(
      withRetry(async () => {
        if (timedOut) {
          throw new PlatformOperationError(platform, 'PLATFORM_TIMEOUT', 'Platform call abandoned after timeout.', false);
        }

        attempts += 1;
        return call();
      }, {
        maxAttempts: policy.retryAttempts,
        baseDelayMs: policy.retryBaseDelayMs,
        maxDelayMs: policy.retryMaxDelayMs,
        isRetryable: (error) => !timedOut && isRetryablePlatformError(error),
        label: `${platform}.${action}`,
        sleep: policy.sleep,
        random: policy.random
      }),
      policy.timeoutMs,
      () => new PlatformOperationError(
        platform,
        'PLATFORM_TIMEOUT',
        `${platform} ${action} did not complete within ${policy.timeoutMs}ms.`,
        true,
        { timeoutMs: policy.timeoutMs }
      )
    );

    const durationMs = elapsed();
    recordPlatformCall({ platform, action, success: String(result.success) }, durationMs);

    if (!result.success) {
      const error = result.error ?? {
        code: 'PLATFORM_OPERATION_FAILED',
        message: `${platform} ${action} failed.`,
        retryable: false
      };

      console.warn('platform_call_failed', { platform, action, code: error.code, attempts });
      return { success: false, detail: result.detail, error, attempts, durationMs };
    }

    return { success: true, detail: result.detail, error: null, attempts, durationMs };
  } catch (error) {
    timedOut = true;
    const durationMs = elapsed();
    const info = toPlatformErrorInfo(error);

    recordPlatformCall({ platform, action, success: 'false' }, durationMs);
    console.warn('platform_call_failed', { platform, action, code: info.code, attempts, message: info.message });

    return { success: false, detail: {}, error: info, attempts, durationMs };
  }
}
