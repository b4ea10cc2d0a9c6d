import { createApp, type AppRuntime } from '../../src/app.js';
import type { Env } from '../../src/config/env.js';
import { createFakePlatforms, type FakePlatforms } from './fake-platform-adapters.js';
import { TestClock } from './test-clock.js';

interface CreateTestRuntimeOptions {
  envOverrides?: Partial<Record<keyof Env, unknown>>;
  start?: string;
}

export interface TestRuntime {
  runtime: AppRuntime;
  platforms: FakePlatforms;
  clock: TestClock;
}

export async function createTestRuntime(options: CreateTestRuntimeOptions = {}): Promise<TestRuntime> {
  const platforms = createFakePlatforms();
  const clock = new TestClock(options.start ?? '2026-03-01T12:00:00.000Z');

  const runtime = await createApp({
    envOverrides: {
      NODE_ENV: 'test',
      DATABASE_URL: undefined,
      REDIS_URL: undefined,
      LOCK_STORE: 'memory',
      OPERATOR_API_KEYS: [],
      PLATFORM_TIMEOUT_MS: 200,
      HEALTH_PROBE_TIMEOUT_MS: 200,
      ...options.envOverrides
    },
    adapters: platforms.adapters,
    urlProbe: platforms.urlProbe,
    now: clock.now,
    sleep: async () => undefined
  });

  return { runtime, platforms, clock };
}
