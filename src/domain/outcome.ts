import { PLATFORMS, type Platform, type PlatformErrorInfo, type PlatformResults } from './platform.js';

export interface PlatformFailure {
  platform: Platform;
  error: PlatformErrorInfo;
}

/**
 * Cross-platform operations are never atomic. Callers get one of these instead of a boolean,
 * so a partial failure cannot be mistaken for a success.
 */
export type OperationOutcome =
  | { kind: 'success' }
  | { kind: 'partial_failure'; failures: PlatformFailure[] }
  | { kind: 'failure'; failures: PlatformFailure[] };

export type OutcomeStatus = 'success' | 'partial_success' | 'failed';

const UNKNOWN_ERROR: PlatformErrorInfo = {
  code: 'PLATFORM_OPERATION_FAILED',
  message: 'Platform operation failed.',
  retryable: false
};

export function collectFailures(results: PlatformResults): PlatformFailure[] {
  const failures: PlatformFailure[] = [];

  for (const platform of PLATFORMS) {
    const result = results[platform];
    if (result === undefined || result.success) {
      continue;
    }

    failures.push({ platform, error: result.error ?? UNKNOWN_ERROR });
  }

  return failures;
}

export function summarizeOutcome(results: PlatformResults): OperationOutcome {
  const attempted = PLATFORMS.filter((platform) => results[platform] !== undefined).length;
  const failures = collectFailures(results);

  if (failures.length === 0) {
    return { kind: 'success' };
  }

  if (failures.length === attempted) {
    return { kind: 'failure', failures };
  }

  return { kind: 'partial_failure', failures };
}

export function outcomeStatus(outcome: OperationOutcome): OutcomeStatus {
  switch (outcome.kind) {
    case 'success':
      return 'success';
    case 'partial_failure':
      return 'partial_success';
    case 'failure':
      return 'failed';
  }
}

export function requiresFollowUp(outcome: OperationOutcome): Platform[] {
  return outcome.kind === 'success' ? [] : outcome.failures.map((failure) => failure.platform);
}

export function countResults(results: PlatformResults): { successCount: number; failureCount: number } {
  let successCount = 0;
  let failureCount = 0;

  for (const platform of PLATFORMS) {
    const result = results[platform];
    if (result === undefined) {
      continue;
    }

    if (result.success) {
      successCount += 1;
    } else {
      failureCount += 1;
    }
  }

  return { successCount, failureCount };
}
