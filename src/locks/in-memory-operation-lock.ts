import { randomUUID } from 'node:crypto';

import type { Clock } from '../domain/lifecycle.js';
import { systemClock } from '../domain/lifecycle.js';
import type { LockLease, OperationLock } from './operation-lock.js';

interface HeldLock {
  token: string;
  expiresAt: number;
}

export class InMemoryOperationLock implements OperationLock {
  private readonly held = new Map<string, HeldLock>();

  public constructor(private readonly now: Clock = systemClock) {}

  public async acquire(key: string, ttlMs: number): Promise<LockLease | null> {
    const currentTime = this.now().getTime();
    const existing = this.held.get(key);
    if (existing !== undefined && existing.expiresAt > currentTime) {
      return null;
    }

    const token = randomUUID();
    this.held.set(key, { token, expiresAt: currentTime + ttlMs });

    return {
      release: async () => {
        if (this.held.get(key)?.token === token) {
          this.held.delete(key);
        }
      }
    };
  }

  public async close(): Promise<void> {
    this.held.clear();
  }
}
