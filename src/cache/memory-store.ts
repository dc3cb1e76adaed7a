import type { CacheRecord, SyncPageStore } from './types.js';
import type { PageAddress } from '../address.js';

interface MemoryStoreOptions {
  maxEntries?: number;
}

/** Process-local store. Map insertion order doubles as age order for overflow eviction. */
export class MemoryPageStore implements SyncPageStore {
  readonly mode = 'sync' as const;
  private readonly records = new Map<string, CacheRecord>();
  private readonly maxEntries: number;

  constructor(opts: MemoryStoreOptions = {}) {
    const max = opts.maxEntries;
    this.maxEntries = typeof max === 'number' && Number.isFinite(max) && max > 0 ? Math.trunc(max) : Number.POSITIVE_INFINITY;
  }

  get size(): number {
    return this.records.size;
  }

  read(address: PageAddress): CacheRecord | undefined {
    return this.records.get(address.key);
  }

  write(record: CacheRecord): void {
    this.records.delete(record.key);
    this.records.set(record.key, record);
    while (this.records.size > this.maxEntries) {
      const oldest = this.records.keys().next();
      if (oldest.done === true) break;
      this.records.delete(oldest.value);
    }
  }

  delete(address: PageAddress): boolean {
    return this.records.delete(address.key);
  }

  deletePrefix(prefix: string): number {
    const keys = [...this.records.values()].filter((record) => record.prefix === prefix).map((record) => record.key);
    keys.forEach((key) => this.records.delete(key));
    return keys.length;
  }

  latestVersion(prefix: string): number | undefined {
    return [...this.records.values()].reduce<number | undefined>((latest, record) => {
      if (record.prefix !== prefix) return latest;
      return latest === undefined || record.version > latest ? record.version : latest;
    }, undefined);
  }

  children(parent: string): CacheRecord[] {
    return [...this.records.values()].filter((record) => record.parent === parent);
  }

  clear(): void {
    this.records.clear();
  }
}
