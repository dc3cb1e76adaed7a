import { PaginatedResponse } from './pagination.js';

export type CacheInvalidator = (key: string, value: unknown) => boolean;

export interface ToolCacheEntry {
  value: unknown;
  createdAt: number;
}

export interface ToolCacheLookup {
  // Entries older than this are stale; undefined keeps them forever
  ttlMs?: number;
  invalidator?: CacheInvalidator;
}

export interface ToolCacheStats {
  entries: number;
  hits: number;
  misses: number;
}

// Result containers are copied in and out so callers cannot reshape a cached entry.
const detach = (value: unknown): unknown => {
  if (Array.isArray(value)) return [...value];
  if (value instanceof PaginatedResponse) return new PaginatedResponse([...value.results], value.nextCursor);
  return value;
};

/**
 * Fingerprint-keyed results of tool calls, shared by every tool of one toolkit. An entry is
 * served while it is younger than the TTL and the invalidator (when given) accepts it.
 */
export class ToolCache {
  private readonly entries = new Map<string, ToolCacheEntry>();
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(opts: { now?: () => number } = {}) {
    this.now = opts.now ?? Date.now;
  }

  lookup(key: string, opts: ToolCacheLookup = {}): { value: unknown } | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined || !this.isFresh(key, entry, opts)) {
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    return { value: detach(entry.value) };
  }

  store(key: string, value: unknown): void {
    this.entries.set(key, { value: detach(value), createdAt: this.now() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): ToolCacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }

  private isFresh(key: string, entry: ToolCacheEntry, opts: ToolCacheLookup): boolean {
    if (opts.ttlMs !== undefined && this.now() - entry.createdAt > opts.ttlMs) return false;
    if (opts.invalidator !== undefined && !opts.invalidator(key, entry.value)) return false;
    return true;
  }
}
