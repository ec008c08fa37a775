import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createHash } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';

export interface MigrationDefinition { version: string; file: string; }
export interface AppliedMigration { version: string; checksum: string; appliedAt: number; }

const MIGRATIONS: MigrationDefinition[] = [
  { version: '001_initial_schema', file: '001_initial_schema.sql' },
];

export const SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

export const MIGRATIONS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'migrations');

const hashSql = (sql: string): string => createHash('sha256').update(sql).digest('hex');

const ensureMigrationsTable = (db: Database.Database): void => {
  db.exec(
    'CREATE TABLE IF NOT EXISTS schema_migrations (version TEXT PRIMARY KEY, checksum TEXT NOT NULL, applied_at INTEGER NOT NULL);'
  );
};

export function readAppliedMigrations(db: Database.Database): AppliedMigration[] {
  ensureMigrationsTable(db);
  const rows = db
    .prepare('SELECT version, checksum, applied_at FROM schema_migrations ORDER BY version')
    .all() as Array<{ version: string; checksum: string; applied_at: number }>;
  return rows.map((row) => ({ version: row.version, checksum: row.checksum, appliedAt: row.applied_at }));
}

/**
 * Apply pending migrations in order. Each migration and its bookkeeping row
 * commit together; re-running is a no-op.
 */
export async function applyMigrations(
  db: Database.Database,
  migrationsDir: string = MIGRATIONS_DIR,
): Promise<AppliedMigration[]> {
  const done = new Set(readAppliedMigrations(db).map((migration) => migration.version));
  const pending = MIGRATIONS.filter((migration) => !done.has(migration.version));
  const applied: AppliedMigration[] = [];
  const record = db.prepare('INSERT INTO schema_migrations (version, checksum, applied_at) VALUES (?, ?, ?)');

  for (const migration of pending) {
    const sql = await fs.readFile(path.join(migrationsDir, migration.file), 'utf8');
    const entry: AppliedMigration = { version: migration.version, checksum: hashSql(sql), appliedAt: Date.now() };
    db.transaction(() => {
      db.exec(sql);
      record.run(entry.version, entry.checksum, entry.appliedAt);
    })();
    applied.push(entry);
  }
  return applied;
}
