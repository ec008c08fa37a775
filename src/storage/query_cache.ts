/**
 * @fileoverview Query response cache
 *
 * Persists normalized-query → response pairs keyed by
 * `(query_hash, agent_type)`, so the same question answered by different
 * assistant architectures never collides.
 *
 * - `lookup` is a single `UPDATE … RETURNING`: the hit counter and
 *   `last_used_at` move in the same statement that reads the row.
 * - `store` is an upsert that merges into an existing row (hit_count + 1,
 *   earliest `created_at` kept) instead of failing or duplicating when two
 *   turns miss on the same query at once.
 * - Rows older than the TTL are invisible to `lookup` and are replaced as
 *   fresh entries by `store`; `sweepExpired` deletes them.
 *
 * @packageDocumentation
 */

import type Database from 'better-sqlite3';
import { StorageError, type StorageOperation } from '../core/errors.js';
import { isActionType, type ActionType } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CacheEntry {
  queryHash: string;
  queryNormalized: string;
  response: string;
  /** null for rows written before actions were tracked */
  routingAction: ActionType | null;
  agentType: string;
  createdAt: Date;
  lastUsedAt: Date;
  hitCount: number;
}

export interface CacheWrite {
  hashKey: string;
  normalized: string;
  response: string;
  action: ActionType | null;
  agentType: string;
}

export interface AgentCacheStats {
  entries: number;
  hits: number;
}

export interface CacheStats {
  totalEntries: number;
  /** Entries still inside the TTL */
  validEntries: number;
  totalHits: number;
  avgHitsPerEntry: number;
  oldestEntry: Date | null;
  mostRecentUse: Date | null;
  /** 0 = no TTL */
  ttlMs: number;
  perAgent: Record<string, AgentCacheStats>;
  /** Lookups served by this process since it started */
  session: {
    lookups: number;
    hits: number;
    misses: number;
    /** Percentage, 0-100 */
    hitRate: number;
  };
}

export interface QueryCacheOptions {
  /** Time-to-live in milliseconds. 0 = entries never expire (default: 30 days) */
  ttlMs?: number;
  /** Clock override for tests */
  now?: () => number;
}

/**
 * Storage contract consumed by the pipeline. Every method rejects with
 * StorageError when the backing store is unavailable.
 */
export interface QueryCacheStore {
  lookup(hashKey: string, agentType: string): Promise<CacheEntry | undefined>;
  store(write: CacheWrite): Promise<CacheEntry>;
  /** Omit agentType to clear every architecture's entries */
  clear(agentType?: string): Promise<number>;
  stats(agentType?: string): Promise<CacheStats>;
  sweepExpired(agentType?: string): Promise<number>;
  close(): void;
}

export const DEFAULT_CACHE_TTL_MS = 30 * 24 * 60 * 60 * 1000;

// ============================================================================
// SQLITE IMPLEMENTATION
// ============================================================================

interface QueryCacheRow {
  query_hash: string;
  query_normalized: string;
  response: string;
  routing_action: string | null;
  agent_type: string;
  created_at: number;
  last_used_at: number;
  hit_count: number;
}

interface SummaryRow {
  total_entries: number;
  valid_entries: number;
  total_hits: number;
  oldest_entry: number | null;
  most_recent_use: number | null;
}

interface AgentRow {
  agent_type: string;
  entries: number;
  hits: number;
}

const RETURNING_COLUMNS =
  'query_hash, query_normalized, response, routing_action, agent_type, created_at, last_used_at, hit_count';

function rowToEntry(row: QueryCacheRow): CacheEntry {
  return {
    queryHash: row.query_hash,
    queryNormalized: row.query_normalized,
    response: row.response,
    routingAction: isActionType(row.routing_action) ? row.routing_action : null,
    agentType: row.agent_type,
    createdAt: new Date(row.created_at),
    lastUsedAt: new Date(row.last_used_at),
    hitCount: row.hit_count,
  };
}

function isBusyError(error: unknown): boolean {
  if (error && typeof error === 'object' && 'code' in error) {
    return error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED';
  }
  return false;
}

/**
 * SQLite-backed query cache (better-sqlite3). Statements run synchronously
 * and atomically, so concurrent turns in one process cannot interleave
 * inside a lookup or an upsert; WAL mode extends that across processes.
 */
export class SqliteQueryCache implements QueryCacheStore {
  private readonly db: Database.Database;
  private readonly ttlMs: number;
  private readonly now: () => number;

  private lookups = 0;
  private hits = 0;

  private readonly stmtLookup: Database.Statement;
  private readonly stmtUpsert: Database.Statement;
  private readonly stmtClearAll: Database.Statement;
  private readonly stmtClearAgent: Database.Statement;
  private readonly stmtSweep: Database.Statement;
  private readonly stmtSummary: Database.Statement;
  private readonly stmtPerAgent: Database.Statement;

  /**
   * @param db - A database that has had `applyMigrations` run against it
   */
  constructor(db: Database.Database, options: QueryCacheOptions = {}) {
    this.db = db;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;

    this.stmtLookup = this.db.prepare(`
      UPDATE query_cache
      SET last_used_at = @now,
          hit_count = hit_count + 1
      WHERE query_hash = @hash
        AND agent_type = @agent
        AND created_at > @cutoff
      RETURNING ${RETURNING_COLUMNS}
    `);

    this.stmtUpsert = this.db.prepare(`
      INSERT INTO query_cache (
        query_hash, query_normalized, response, routing_action, agent_type,
        created_at, last_used_at, hit_count
      )
      VALUES (@hash, @normalized, @response, @action, @agent, @now, @now, 1)
      ON CONFLICT (query_hash, agent_type) DO UPDATE SET
        query_normalized = excluded.query_normalized,
        response = excluded.response,
        routing_action = excluded.routing_action,
        last_used_at = excluded.last_used_at,
        hit_count = CASE
          WHEN query_cache.created_at > @cutoff THEN query_cache.hit_count + 1
          ELSE 1
        END,
        created_at = CASE
          WHEN query_cache.created_at > @cutoff THEN MIN(query_cache.created_at, excluded.created_at)
          ELSE excluded.created_at
        END
      RETURNING ${RETURNING_COLUMNS}
    `);

    this.stmtClearAll = this.db.prepare('DELETE FROM query_cache');
    this.stmtClearAgent = this.db.prepare('DELETE FROM query_cache WHERE agent_type = ?');

    this.stmtSweep = this.db.prepare(`
      DELETE FROM query_cache
      WHERE created_at <= @cutoff
        AND (@agent IS NULL OR agent_type = @agent)
    `);

    this.stmtSummary = this.db.prepare(`
      SELECT
        COUNT(*) AS total_entries,
        COALESCE(SUM(CASE WHEN created_at > @cutoff THEN 1 ELSE 0 END), 0) AS valid_entries,
        COALESCE(SUM(hit_count), 0) AS total_hits,
        MIN(created_at) AS oldest_entry,
        MAX(last_used_at) AS most_recent_use
      FROM query_cache
      WHERE (@agent IS NULL OR agent_type = @agent)
    `);

    this.stmtPerAgent = this.db.prepare(`
      SELECT agent_type, COUNT(*) AS entries, COALESCE(SUM(hit_count), 0) AS hits
      FROM query_cache
      WHERE (@agent IS NULL OR agent_type = @agent)
      GROUP BY agent_type
      ORDER BY agent_type
    `);
  }

  async lookup(hashKey: string, agentType: string): Promise<CacheEntry | undefined> {
    const now = this.now();
    const row = this.run('lookup', () =>
      this.stmtLookup.get({ now, hash: hashKey, agent: agentType, cutoff: this.cutoff(now) }) as
        | QueryCacheRow
        | undefined
    );
    this.lookups++;
    if (!row) return undefined;
    this.hits++;
    return rowToEntry(row);
  }

  async store(write: CacheWrite): Promise<CacheEntry> {
    const now = this.now();
    const row = this.run('store', () =>
      this.stmtUpsert.get({
        hash: write.hashKey,
        normalized: write.normalized,
        response: write.response,
        action: write.action,
        agent: write.agentType,
        now,
        cutoff: this.cutoff(now),
      }) as QueryCacheRow | undefined
    );
    if (!row) {
      throw new StorageError('store', false, 'upsert returned no row');
    }
    return rowToEntry(row);
  }

  async clear(agentType?: string): Promise<number> {
    const result = this.run('clear', () =>
      agentType === undefined ? this.stmtClearAll.run() : this.stmtClearAgent.run(agentType)
    );
    return result.changes;
  }

  async sweepExpired(agentType?: string): Promise<number> {
    if (this.ttlMs === 0) return 0;
    const result = this.run('sweep', () =>
      this.stmtSweep.run({ cutoff: this.cutoff(this.now()), agent: agentType ?? null })
    );
    return result.changes;
  }

  async stats(agentType?: string): Promise<CacheStats> {
    const params = { cutoff: this.cutoff(this.now()), agent: agentType ?? null };
    const summary = this.run('stats', () => this.stmtSummary.get(params) as SummaryRow);
    const agents = this.run('stats', () => this.stmtPerAgent.all(params) as AgentRow[]);

    const perAgent: Record<string, AgentCacheStats> = {};
    for (const row of agents) {
      perAgent[row.agent_type] = { entries: row.entries, hits: row.hits };
    }

    return {
      totalEntries: summary.total_entries,
      validEntries: summary.valid_entries,
      totalHits: summary.total_hits,
      avgHitsPerEntry: summary.total_entries > 0 ? summary.total_hits / summary.total_entries : 0,
      oldestEntry: summary.oldest_entry === null ? null : new Date(summary.oldest_entry),
      mostRecentUse: summary.most_recent_use === null ? null : new Date(summary.most_recent_use),
      ttlMs: this.ttlMs,
      perAgent,
      session: this.sessionStats(),
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getTtlMs(): number {
    return this.ttlMs;
  }

  private sessionStats(): CacheStats['session'] {
    const misses = this.lookups - this.hits;
    const hitRate = this.lookups > 0 ? (this.hits / this.lookups) * 100 : 0;
    return { lookups: this.lookups, hits: this.hits, misses, hitRate: Math.round(hitRate * 100) / 100 };
  }

  /** Rows with created_at at or below the cutoff are expired. */
  private cutoff(now: number): number {
    return this.ttlMs > 0 ? now - this.ttlMs : Number.MIN_SAFE_INTEGER;
  }

  private run<T>(operation: StorageOperation, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageError(operation, isBusyError(error), getErrorMessage(error), toError(error));
    }
  }
}

// ============================================================================
// IN-MEMORY CACHE (for testing)
// ============================================================================

/**
 * Map-backed implementation with the same merge and TTL semantics as
 * SqliteQueryCache.
 */
export class InMemoryQueryCache implements QueryCacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private lookups = 0;
  private hits = 0;

  constructor(options: QueryCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async lookup(hashKey: string, agentType: string): Promise<CacheEntry | undefined> {
    this.lookups++;
    const now = this.now();
    const entry = this.entries.get(this.key(hashKey, agentType));
    if (!entry || !this.isLive(entry, now)) return undefined;
    entry.hitCount += 1;
    entry.lastUsedAt = new Date(now);
    this.hits++;
    return { ...entry };
  }

  async store(write: CacheWrite): Promise<CacheEntry> {
    const now = this.now();
    const key = this.key(write.hashKey, write.agentType);
    const existing = this.entries.get(key);
    const live = existing !== undefined && this.isLive(existing, now);
    const entry: CacheEntry = {
      queryHash: write.hashKey,
      queryNormalized: write.normalized,
      response: write.response,
      routingAction: write.action,
      agentType: write.agentType,
      createdAt: live ? existing.createdAt : new Date(now),
      lastUsedAt: new Date(now),
      hitCount: live ? existing.hitCount + 1 : 1,
    };
    this.entries.set(key, entry);
    return { ...entry };
  }

  async clear(agentType?: string): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (agentType === undefined || entry.agentType === agentType) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async sweepExpired(agentType?: string): Promise<number> {
    if (this.ttlMs === 0) return 0;
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if ((agentType === undefined || entry.agentType === agentType) && !this.isLive(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async stats(agentType?: string): Promise<CacheStats> {
    const now = this.now();
    const selected = [...this.entries.values()].filter(
      (entry) => agentType === undefined || entry.agentType === agentType
    );
    const perAgent: Record<string, AgentCacheStats> = {};
    let validEntries = 0;
    let totalHits = 0;
    let oldest: number | null = null;
    let recent: number | null = null;

    for (const entry of selected) {
      const bucket = perAgent[entry.agentType] ?? { entries: 0, hits: 0 };
      bucket.entries += 1;
      bucket.hits += entry.hitCount;
      perAgent[entry.agentType] = bucket;
      totalHits += entry.hitCount;
      if (this.isLive(entry, now)) validEntries++;
      const created = entry.createdAt.getTime();
      const used = entry.lastUsedAt.getTime();
      oldest = oldest === null ? created : Math.min(oldest, created);
      recent = recent === null ? used : Math.max(recent, used);
    }

    const misses = this.lookups - this.hits;
    const hitRate = this.lookups > 0 ? (this.hits / this.lookups) * 100 : 0;
    return {
      totalEntries: selected.length,
      validEntries,
      totalHits,
      avgHitsPerEntry: selected.length > 0 ? totalHits / selected.length : 0,
      oldestEntry: oldest === null ? null : new Date(oldest),
      mostRecentUse: recent === null ? null : new Date(recent),
      ttlMs: this.ttlMs,
      perAgent,
      session: { lookups: this.lookups, hits: this.hits, misses, hitRate: Math.round(hitRate * 100) / 100 },
    };
  }

  close(): void {
    this.entries.clear();
  }

  private key(hashKey: string, agentType: string): string {
    return `${agentType}\u0000${hashKey}`;
  }

  private isLive(entry: CacheEntry, now: number): boolean {
    return this.ttlMs === 0 || now - entry.createdAt.getTime() < this.ttlMs;
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * @example
 * ```typescript
 * const db = await openCacheDatabase('.answer-router/cache.db');
 * const cache = createQueryCache(db, { ttlMs: 7 * 24 * 60 * 60 * 1000 });
 * ```
 */
export function createQueryCache(db: Database.Database, options: QueryCacheOptions = {}): SqliteQueryCache {
  return new SqliteQueryCache(db, options);
}

export function createInMemoryQueryCache(options: QueryCacheOptions = {}): InMemoryQueryCache {
  return new InMemoryQueryCache(options);
}
