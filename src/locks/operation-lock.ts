import { OperationInProgressError } from '../errors/lifecycle-errors.js';

export interface LockLease {
  release(): Promise<void>;
}

/** Per-slug in-flight guard for lifecycle operations. `acquire` resolves `null` when the key is held. */
export interface OperationLock {
  acquire(key: string, ttlMs: number): Promise<LockLease | null>;
  close(): Promise<void>;
}

export function lifecycleLockKey(slug: string): string {
  return `site-registry:lifecycle:${slug}`;
}

export async function withOperationLock<T>(
  lock: OperationLock,
  slug: string,
  ttlMs: number,
  operation: () => Promise<T>
): Promise<T> {
  const lease = await lock.acquire(lifecycleLockKey(slug), ttlMs);
  if (lease === null) {
    throw new OperationInProgressError(slug);
  }

  try {
    return await operation();
  } finally {
    try {
      await lease.release();
    } catch (error) {
      console.error('operation_lock_release_failed', {
        slug,
        error: error instanceof Error ? error.message : 'unknown'
      });
    }
  }
}
