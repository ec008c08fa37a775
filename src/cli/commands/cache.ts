import type { CacheStats, QueryCacheStore } from '../../storage/query_cache.js';
import { formatTable, formatTimestamp, printKeyValue } from '../progress.js';

export type CacheAction = 'stats' | 'clear' | 'sweep';

export interface CacheCommandOptions {
  cache: QueryCacheStore;
  action: CacheAction;
  /** Agent type to act on; for `clear` it is required unless `all` is set */
  agentType?: string;
  all: boolean;
  json: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function formatTtl(ttlMs: number): string {
  if (ttlMs === 0) return 'never expires';
  const days = ttlMs / DAY_MS;
  return Number.isInteger(days) ? `${days} day(s)` : `${ttlMs}ms`;
}

export function formatPerAgent(stats: CacheStats): string[] {
  const rows = Object.entries(stats.perAgent)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([agentType, bucket]) => [agentType, String(bucket.entries), String(bucket.hits)]);
  return formatTable(['agent type', 'entries', 'hits'], rows);
}

function printStats(stats: CacheStats, agentType: string | undefined): void {
  console.log(agentType ? `Cache statistics for agent type "${agentType}":` : 'Cache statistics:');
  printKeyValue([
    { key: 'Entries', value: stats.totalEntries },
    { key: 'Valid entries', value: stats.validEntries },
    { key: 'Total hits', value: stats.totalHits },
    { key: 'Avg hits per entry', value: stats.avgHitsPerEntry.toFixed(2) },
    { key: 'Oldest entry', value: formatTimestamp(stats.oldestEntry) },
    { key: 'Most recent use', value: formatTimestamp(stats.mostRecentUse) },
    { key: 'TTL', value: formatTtl(stats.ttlMs) },
  ]);
  if (Object.keys(stats.perAgent).length > 0) {
    console.log('');
    for (const line of formatPerAgent(stats)) console.log(line);
  }
}

export async function cacheCommand(options: CacheCommandOptions): Promise<void> {
  const { cache, agentType, json } = options;

  switch (options.action) {
    case 'stats': {
      const stats = await cache.stats(agentType);
      if (json) {
        console.log(JSON.stringify(stats, null, 2));
      } else {
        printStats(stats, agentType);
      }
      return;
    }
    case 'clear': {
      const target = options.all ? undefined : agentType;
      const cleared = await cache.clear(target);
      const label = target === undefined ? 'all agent types' : `agent type "${target}"`;
      if (json) {
        console.log(JSON.stringify({ cleared, agentType: target ?? 'all' }));
      } else {
        console.log(`Cleared ${cleared} cached answer(s) for ${label}.`);
      }
      return;
    }
    case 'sweep': {
      const removed = await cache.sweepExpired(agentType);
      if (json) {
        console.log(JSON.stringify({ removed }));
      } else {
        console.log(`Removed ${removed} expired cached answer(s).`);
      }
      return;
    }
  }
}
