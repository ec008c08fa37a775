import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import lockfile from 'proper-lockfile';
import { StorageError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { applyMigrations } from './migrations.js';

export const IN_MEMORY_DB = ':memory:';

const MIGRATION_LOCK_STALE_MS = 30_000;

/**
 * Serialize migrations across processes sharing one database file.
 */
async function withMigrationLock<T>(dbPath: string, fn: () => Promise<T>): Promise<T> {
  if (dbPath === IN_MEMORY_DB) return fn();
  const release = await lockfile.lock(dbPath, {
    lockfilePath: `${dbPath}.lock`,
    stale: MIGRATION_LOCK_STALE_MS,
    retries: { retries: 20, minTimeout: 50, maxTimeout: 1000 },
    onCompromised: (error) => {
      logWarning('[answer-router] migration lock compromised', { path: dbPath, error: error.message });
    },
  });
  try {
    return await fn();
  } finally {
    await release();
  }
}

/**
 * Open (and migrate) the cache database. Any failure is reported as a
 * StorageError so callers can fall back to running without a cache.
 */
export async function openCacheDatabase(dbPath: string): Promise<Database.Database> {
  let db: Database.Database;
  try {
    if (dbPath !== IN_MEMORY_DB) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    db = new Database(dbPath);
    if (dbPath !== IN_MEMORY_DB) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('synchronous = NORMAL');
    db.pragma('busy_timeout = 5000');
  } catch (error) {
    throw new StorageError('open', false, `${dbPath}: ${getErrorMessage(error)}`, toError(error));
  }

  try {
    await withMigrationLock(dbPath, () => applyMigrations(db));
  } catch (error) {
    db.close();
    throw new StorageError('migrate', false, getErrorMessage(error), toError(error));
  }
  return db;
}
