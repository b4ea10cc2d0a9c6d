import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Pool } from 'pg';

import { withTransaction } from './transaction.js';

export interface MigrationFile {
  filename: string;
  sql: string;
  checksum: string;
}

interface AppliedMigrationRow {
  filename: string;
  checksum: string;
}

const MIGRATION_LOCK_ID = 727_001;

export const defaultMigrationsDirectory = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../migrations');

export function hashMigration(sql: string): string {
  return createHash('sha256').update(sql).digest('hex');
}

export async function readMigrationFiles(migrationsDirectory: string): Promise<MigrationFile[]> {
  const files = await readdir(migrationsDirectory);

  const sqlFiles = files
    .filter((file) => file.endsWith('.sql'))
    .sort((left, right) => left.localeCompare(right));

  const migrations: MigrationFile[] = [];

  for (const filename of sqlFiles) {
    const sql = await readFile(path.join(migrationsDirectory, filename), 'utf8');
    migrations.push({ filename, sql, checksum: hashMigration(sql) });
  }

  return migrations;
}

/** Migrations still to apply, in order. Applied files whose contents changed are rejected. */
export function planMigrations(migrations: MigrationFile[], applied: Map<string, string>): MigrationFile[] {
  const pending: MigrationFile[] = [];

  for (const migration of migrations) {
    const appliedChecksum = applied.get(migration.filename);

    if (appliedChecksum === undefined) {
      pending.push(migration);
      continue;
    }

    if (appliedChecksum !== migration.checksum) {
      throw new Error(
        `Checksum mismatch for migration ${migration.filename}. ` +
        'The migration has changed after being applied.'
      );
    }
  }

  return pending;
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function loadAppliedMigrations(pool: Pool): Promise<Map<string, string>> {
  const result = await pool.query<AppliedMigrationRow>('SELECT filename, checksum FROM schema_migrations');
  return new Map(result.rows.map((row) => [row.filename, row.checksum]));
}

async function applyMigration(pool: Pool, migration: MigrationFile): Promise<void> {
  await withTransaction(pool, async (client) => {
    await client.query(migration.sql);
    await client.query(
      `
      INSERT INTO schema_migrations (filename, checksum)
      VALUES ($1, $2)
      `,
      [migration.filename, migration.checksum]
    );
  });
}

/** Applies pending migrations under a session advisory lock so concurrent deploys run them once. */
export async function runMigrations(pool: Pool, migrationsDirectory = defaultMigrationsDirectory): Promise<string[]> {
  const migrations = await readMigrationFiles(migrationsDirectory);

  const lockClient = await pool.connect();
  try {
    await lockClient.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_ID]);

    await ensureMigrationsTable(pool);
    const pending = planMigrations(migrations, await loadAppliedMigrations(pool));

    for (const migration of pending) {
      console.log('migration_applying', { filename: migration.filename });
      await applyMigration(pool, migration);
      console.log('migration_applied', { filename: migration.filename });
    }

    return pending.map((migration) => migration.filename);
  } finally {
    await lockClient.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_ID]);
    lockClient.release();
  }
}
