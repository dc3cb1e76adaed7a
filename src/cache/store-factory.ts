import os from 'node:os';
import path from 'node:path';

import type { CacheConfig, PageStore } from './types.js';

import { describeError } from '../errors.js';
import { warn } from '../utils.js';

import { MemoryPageStore } from './memory-store.js';
import { RedisPageStore } from './redis-store.js';
import { SQLitePageStore } from './sqlite-store.js';

const DEFAULT_MAX_ENTRIES = 5000;

const resolveDefaultSqlitePath = (): string => {
  const home = os.homedir();
  const baseDir = home.length > 0 ? path.join(home, '.pagekit') : path.join(process.cwd(), '.pagekit');
  return path.join(baseDir, 'pages.db');
};

export const normalizeCacheConfig = (config?: CacheConfig): Required<Pick<CacheConfig, 'backend' | 'maxEntries'>> & CacheConfig => {
  const backend = config?.backend ?? 'memory';
  const maxEntriesRaw = config?.maxEntries;
  const maxEntries = typeof maxEntriesRaw === 'number' && Number.isFinite(maxEntriesRaw) && maxEntriesRaw > 0
    ? Math.trunc(maxEntriesRaw)
    : DEFAULT_MAX_ENTRIES;
  const sqlite = { path: config?.sqlite?.path ?? resolveDefaultSqlitePath() };
  const redis = config?.redis ?? {};
  return { backend, maxEntries, sqlite, redis };
};

/**
 * Build the configured store. A SQLite backend that cannot open falls back to memory
 * with a warning; Redis connects lazily and reports failures through the warning sink.
 */
export const createPageStore = (config?: CacheConfig): PageStore => {
  const normalized = normalizeCacheConfig(config);
  if (normalized.backend === 'redis') {
    return new RedisPageStore(normalized.redis ?? {});
  }
  if (normalized.backend === 'sqlite') {
    try {
      return new SQLitePageStore({ path: normalized.sqlite?.path ?? resolveDefaultSqlitePath(), maxEntries: normalized.maxEntries });
    } catch (e) {
      warn(`page cache: sqlite backend unavailable (${describeError(e)}), using memory`);
    }
  }
  return new MemoryPageStore({ maxEntries: normalized.maxEntries });
};
