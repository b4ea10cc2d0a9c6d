import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  defaultMigrationsDirectory,
  hashMigration,
  planMigrations,
  readMigrationFiles,
  type MigrationFile
} from '../../src/db/migrations.js';
import { computeRecoveryDeadline, RECOVERY_WINDOW_DAYS } from '../../src/domain/lifecycle.js';

function migration(filename: string, sql: string): MigrationFile {
  return { filename, sql, checksum: hashMigration(sql) };
}

describe('migration planning', () => {
  const first = migration('001_site_registry.sql', 'CREATE TABLE tenants (id UUID PRIMARY KEY);');
  const second = migration('002_inventory_index.sql', 'CREATE INDEX inventory_platform_idx ON inventory_items (platform);');

  it('returns files not yet applied, in order', () => {
    const pending = planMigrations([first, second], new Map([[first.filename, first.checksum]]));

    expect(pending.map((file) => file.filename)).toEqual(['002_inventory_index.sql']);
  });

  it('rejects an applied migration whose contents changed', () => {
    expect(() => planMigrations([first], new Map([[first.filename, hashMigration('-- edited')]]))).toThrow(
      'Checksum mismatch for migration 001_site_registry.sql. The migration has changed after being applied.'
    );
  });

  it('reads the bundled schema from the migrations directory', async () => {
    const files = await readMigrationFiles(defaultMigrationsDirectory);

    expect(files.map((file) => file.filename)).toEqual(['001_site_registry.sql']);
    expect(path.basename(defaultMigrationsDirectory)).toBe('migrations');
    expect(files[0]?.sql).toContain('CREATE TABLE');
  });

  it('checks the recovery deadline as a fixed number of hours, independent of the session time zone', async () => {
    const [schema] = await readMigrationFiles(defaultMigrationsDirectory);

    expect(schema?.sql).toContain(
      `CHECK (recovery_deadline = deleted_at + INTERVAL '${RECOVERY_WINDOW_DAYS * 24} hours')`
    );
    expect(schema?.sql).not.toContain("INTERVAL '30 days'");
    expect(computeRecoveryDeadline(new Date('2026-10-20T12:00:00.000Z')).toISOString()).toBe('2026-11-19T12:00:00.000Z');
  });
});
