import { randomUUID } from 'node:crypto';

import { createClient, type RedisClientType } from 'redis';

import type { Env } from '../config/env.js';
import { AppError } from '../errors/app-error.js';
import type { LockLease, OperationLock } from './operation-lock.js';

const RELEASE_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0
`;

export class RedisOperationLock implements OperationLock {
  public constructor(private readonly client: RedisClientType) {}

  public async acquire(key: string, ttlMs: number): Promise<LockLease | null> {
    const token = randomUUID();
    const result = await this.client.set(key, token, { NX: true, PX: ttlMs });
    if (result !== 'OK') {
      return null;
    }

    return {
      release: async () => {
        await this.client.eval(RELEASE_SCRIPT, { keys: [key], arguments: [token] });
      }
    };
  }

  public async close(): Promise<void> {
    await this.client.quit();
  }
}

export async function createRedisOperationLock(env: Env): Promise<RedisOperationLock> {
  if (typeof env.REDIS_URL !== 'string' || env.REDIS_URL.length === 0) {
    throw new AppError(500, 'CONFIG_INVALID', 'REDIS_URL is required when LOCK_STORE=redis.');
  }

  const client: RedisClientType = createClient({
    url: env.REDIS_URL
  });

  await client.connect();
  return new RedisOperationLock(client);
}
