import 'dotenv/config';

import { Pool } from 'pg';

import { getEnv } from '../config/env.js';
import { runMigrations } from './migrations.js';

async function run(): Promise<void> {
  const env = getEnv();
  const databaseUrl = env.DATABASE_URL;

  if (typeof databaseUrl !== 'string' || databaseUrl.length === 0) {
    throw new Error('DATABASE_URL must be configured to run migrations.');
  }

  const pool = new Pool({ connectionString: databaseUrl });

  try {
    const applied = await runMigrations(pool);
    console.log('migration_run_complete', { applied: applied.length });
  } finally {
    await pool.end();
  }
}

void run().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
