/**
 * @fileoverview Tests for the query response cache
 *
 * Both implementations run the same behavioral suite; SQLite-only cases cover
 * row uniqueness and failure wrapping.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import {
  SqliteQueryCache,
  InMemoryQueryCache,
  createInMemoryQueryCache,
  DEFAULT_CACHE_TTL_MS,
  type QueryCacheStore,
  type CacheWrite,
  type QueryCacheOptions,
} from '../query_cache.js';
import { applyMigrations } from '../migrations.js';
import { normalizeQuery } from '../../query/normalizer.js';
import { StorageError } from '../../core/errors.js';

// ============================================================================
// FIXTURES
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2026, 0, 1);

const vacation = normalizeQuery('What is our vacation policy?');
const rust = normalizeQuery('What is Rust?');

function write(overrides: Partial<CacheWrite> = {}): CacheWrite {
  return {
    hashKey: vacation.hashKey,
    normalized: vacation.normalized,
    response: 'Employees accrue 20 days of paid vacation per year.',
    action: 'knowledge_base',
    agentType: 'classic',
    ...overrides,
  };
}

interface Harness {
  cache: QueryCacheStore;
  advance(ms: number): void;
  rowCount(): number | undefined;
}

type HarnessFactory = (options?: QueryCacheOptions) => Promise<Harness>;

const sqliteHarness: HarnessFactory = async (options = {}) => {
  const db = new Database(':memory:');
  await applyMigrations(db);
  let now = START;
  const cache = new SqliteQueryCache(db, { ...options, now: () => now });
  return {
    cache,
    advance: (ms) => {
      now += ms;
    },
    rowCount: () => {
      if (!db.open) return undefined;
      const row = db.prepare('SELECT COUNT(*) AS n FROM query_cache').get() as { n: number };
      return row.n;
    },
  };
};

const memoryHarness: HarnessFactory = async (options = {}) => {
  let now = START;
  const cache = new InMemoryQueryCache({ ...options, now: () => now });
  return {
    cache,
    advance: (ms) => {
      now += ms;
    },
    rowCount: () => undefined,
  };
};

// ============================================================================
// SHARED BEHAVIOR
// ============================================================================

describe.each([
  ['SqliteQueryCache', sqliteHarness],
  ['InMemoryQueryCache', memoryHarness],
] as const)('%s', (_name, makeHarness) => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await makeHarness();
  });

  afterEach(() => {
    harness.cache.close();
  });

  describe('lookup', () => {
    it('misses on an empty cache', async () => {
      expect(await harness.cache.lookup(vacation.hashKey, 'classic')).toBeUndefined();
    });

    it('returns the stored response and increments hit_count', async () => {
      await harness.cache.store(write());
      harness.advance(1000);

      const entry = await harness.cache.lookup(vacation.hashKey, 'classic');

      expect(entry?.response).toBe('Employees accrue 20 days of paid vacation per year.');
      expect(entry?.routingAction).toBe('knowledge_base');
      expect(entry?.hitCount).toBe(2);
      expect(entry?.createdAt.getTime()).toBe(START);
      expect(entry?.lastUsedAt.getTime()).toBe(START + 1000);
    });

    it('counts every hit', async () => {
      await harness.cache.store(write());
      await harness.cache.lookup(vacation.hashKey, 'classic');
      await harness.cache.lookup(vacation.hashKey, 'classic');
      const third = await harness.cache.lookup(vacation.hashKey, 'classic');

      expect(third?.hitCount).toBe(4);
    });

    it('keeps agent types isolated', async () => {
      await harness.cache.store(write({ agentType: 'classic' }));

      expect(await harness.cache.lookup(vacation.hashKey, 'langchain')).toBeUndefined();
      expect((await harness.cache.lookup(vacation.hashKey, 'classic'))?.agentType).toBe('classic');
    });

    it('misses once the entry is older than the TTL', async () => {
      await harness.cache.store(write());
      harness.advance(DEFAULT_CACHE_TTL_MS);

      expect(await harness.cache.lookup(vacation.hashKey, 'classic')).toBeUndefined();
    });
  });

  describe('store', () => {
    it('creates an entry with hit_count 1', async () => {
      const entry = await harness.cache.store(write());

      expect(entry.hitCount).toBe(1);
      expect(entry.queryHash).toBe(vacation.hashKey);
      expect(entry.queryNormalized).toBe('what is our vacation policy?');
      expect(entry.createdAt.getTime()).toBe(START);
    });

    it('merges a second store for the same key instead of duplicating', async () => {
      await harness.cache.store(write({ response: 'first' }));
      harness.advance(5000);
      const merged = await harness.cache.store(write({ response: 'second', action: 'intrinsic' }));

      expect(merged.hitCount).toBe(2);
      expect(merged.response).toBe('second');
      expect(merged.routingAction).toBe('intrinsic');
      expect(merged.createdAt.getTime()).toBe(START);
      expect(merged.lastUsedAt.getTime()).toBe(START + 5000);

      const stats = await harness.cache.stats();
      expect(stats.totalEntries).toBe(1);
      expect(stats.totalHits).toBe(2);
    });

    it('sums hits across lookups and merging stores', async () => {
      await harness.cache.store(write());
      await harness.cache.lookup(vacation.hashKey, 'classic');
      const merged = await harness.cache.store(write());

      expect(merged.hitCount).toBe(3);
    });

    it('replaces an expired row with a fresh entry', async () => {
      await harness.cache.store(write({ response: 'stale' }));
      harness.advance(DEFAULT_CACHE_TTL_MS + DAY_MS);

      const fresh = await harness.cache.store(write({ response: 'fresh' }));

      expect(fresh.hitCount).toBe(1);
      expect(fresh.createdAt.getTime()).toBe(START + DEFAULT_CACHE_TTL_MS + DAY_MS);
      expect((await harness.cache.lookup(vacation.hashKey, 'classic'))?.response).toBe('fresh');
    });

    it('accepts a null routing action', async () => {
      const entry = await harness.cache.store(write({ action: null }));

      expect(entry.routingAction).toBeNull();
    });
  });

  describe('clear', () => {
    beforeEach(async () => {
      await harness.cache.store(write({ agentType: 'classic' }));
      await harness.cache.store(write({ agentType: 'langchain' }));
      await harness.cache.store(
        write({ hashKey: rust.hashKey, normalized: rust.normalized, agentType: 'classic' })
      );
    });

    it('clears only the named agent type', async () => {
      expect(await harness.cache.clear('classic')).toBe(2);

      expect(await harness.cache.lookup(vacation.hashKey, 'classic')).toBeUndefined();
      expect(await harness.cache.lookup(vacation.hashKey, 'langchain')).toBeDefined();
    });

    it('clears everything without an agent type', async () => {
      expect(await harness.cache.clear()).toBe(3);
      expect((await harness.cache.stats()).totalEntries).toBe(0);
    });

    it('is idempotent', async () => {
      await harness.cache.clear('classic');

      expect(await harness.cache.clear('classic')).toBe(0);
    });
  });

  describe('stats', () => {
    it('reports zeros for an empty cache', async () => {
      const stats = await harness.cache.stats();

      expect(stats.totalEntries).toBe(0);
      expect(stats.validEntries).toBe(0);
      expect(stats.totalHits).toBe(0);
      expect(stats.avgHitsPerEntry).toBe(0);
      expect(stats.oldestEntry).toBeNull();
      expect(stats.mostRecentUse).toBeNull();
      expect(stats.perAgent).toEqual({});
      expect(stats.ttlMs).toBe(DEFAULT_CACHE_TTL_MS);
    });

    it('breaks totals down per agent type', async () => {
      await harness.cache.store(write({ agentType: 'classic' }));
      await harness.cache.lookup(vacation.hashKey, 'classic');
      harness.advance(1000);
      await harness.cache.store(write({ agentType: 'langchain' }));

      const stats = await harness.cache.stats();

      expect(stats.totalEntries).toBe(2);
      expect(stats.totalHits).toBe(3);
      expect(stats.avgHitsPerEntry).toBe(1.5);
      expect(stats.perAgent).toEqual({
        classic: { entries: 1, hits: 2 },
        langchain: { entries: 1, hits: 1 },
      });
      expect(stats.oldestEntry?.getTime()).toBe(START);
      expect(stats.mostRecentUse?.getTime()).toBe(START + 1000);
    });

    it('filters by agent type', async () => {
      await harness.cache.store(write({ agentType: 'classic' }));
      await harness.cache.store(write({ agentType: 'langchain' }));

      const stats = await harness.cache.stats('langchain');

      expect(stats.totalEntries).toBe(1);
      expect(Object.keys(stats.perAgent)).toEqual(['langchain']);
    });

    it('separates valid from expired entries', async () => {
      await harness.cache.store(write());
      harness.advance(DEFAULT_CACHE_TTL_MS);
      await harness.cache.store(write({ hashKey: rust.hashKey, normalized: rust.normalized }));

      const stats = await harness.cache.stats();

      expect(stats.totalEntries).toBe(2);
      expect(stats.validEntries).toBe(1);
    });

    it('tracks session hit rate', async () => {
      await harness.cache.store(write());
      await harness.cache.lookup(vacation.hashKey, 'classic');
      await harness.cache.lookup(rust.hashKey, 'classic');
      await harness.cache.lookup(rust.hashKey, 'classic');

      const { session } = await harness.cache.stats();

      expect(session).toEqual({ lookups: 3, hits: 1, misses: 2, hitRate: 33.33 });
    });
  });

  describe('sweepExpired', () => {
    it('deletes only expired rows', async () => {
      await harness.cache.store(write());
      harness.advance(DEFAULT_CACHE_TTL_MS);
      await harness.cache.store(write({ hashKey: rust.hashKey, normalized: rust.normalized }));

      expect(await harness.cache.sweepExpired()).toBe(1);
      expect((await harness.cache.stats()).totalEntries).toBe(1);
    });
  });
});

// ============================================================================
// TTL DISABLED
// ============================================================================

describe('ttlMs = 0', () => {
  it('never expires entries', async () => {
    const harness = await sqliteHarness({ ttlMs: 0 });
    await harness.cache.store(write());
    harness.advance(10 * 365 * DAY_MS);

    expect((await harness.cache.lookup(vacation.hashKey, 'classic'))?.hitCount).toBe(2);
    expect(await harness.cache.sweepExpired()).toBe(0);
    harness.cache.close();
  });
});

// ============================================================================
// SQLITE SPECIFICS
// ============================================================================

describe('SqliteQueryCache storage', () => {
  it('keeps one row per (query_hash, agent_type) under repeated concurrent stores', async () => {
    const harness = await sqliteHarness();

    await Promise.all([
      harness.cache.store(write()),
      harness.cache.store(write()),
      harness.cache.store(write()),
      harness.cache.store(write({ agentType: 'langchain' })),
    ]);

    expect(harness.rowCount()).toBe(2);
    expect((await harness.cache.stats('classic')).totalHits).toBe(3);
    harness.cache.close();
  });

  it('wraps failures in StorageError', async () => {
    const db = new Database(':memory:');
    await applyMigrations(db);
    const cache = new SqliteQueryCache(db);
    db.exec('DROP TABLE query_cache');

    const failure = cache.lookup(vacation.hashKey, 'classic');

    await expect(failure).rejects.toBeInstanceOf(StorageError);
    await expect(failure).rejects.toMatchObject({ operation: 'lookup', code: 'CACHE_UNAVAILABLE' });
    cache.close();
  });

  it('rejects hash keys that are not 64 characters', async () => {
    const harness = await sqliteHarness();

    await expect(harness.cache.store(write({ hashKey: 'short' }))).rejects.toMatchObject({
      operation: 'store',
    });
    harness.cache.close();
  });
});

describe('createInMemoryQueryCache', () => {
  it('uses the default TTL', async () => {
    const cache = createInMemoryQueryCache();

    expect((await cache.stats()).ttlMs).toBe(DEFAULT_CACHE_TTL_MS);
  });
});
