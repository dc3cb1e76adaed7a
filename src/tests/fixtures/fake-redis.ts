import type { RedisHashClient } from '../../cache/redis-store.js';

/** In-process stand-in for the Redis hash commands used by RedisPageStore. */
export class FakeRedisHashClient implements RedisHashClient {
  readonly hashes = new Map<string, Map<string, string>>();
  quitCalls = 0;

  hGet(key: string, field: string): Promise<string | undefined> {
    return Promise.resolve(this.hashes.get(key)?.get(field));
  }

  hSet(key: string, field: string, value: string): Promise<number> {
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    const added = hash.has(field) ? 0 : 1;
    hash.set(field, value);
    this.hashes.set(key, hash);
    return Promise.resolve(added);
  }

  hDel(key: string, field: string): Promise<number> {
    const hash = this.hashes.get(key);
    if (hash === undefined || !hash.delete(field)) return Promise.resolve(0);
    if (hash.size === 0) this.hashes.delete(key);
    return Promise.resolve(1);
  }

  hKeys(key: string): Promise<string[]> {
    return Promise.resolve([...(this.hashes.get(key)?.keys() ?? [])]);
  }

  hGetAll(key: string): Promise<Record<string, string>> {
    return Promise.resolve(Object.fromEntries(this.hashes.get(key) ?? new Map<string, string>()));
  }

  hLen(key: string): Promise<number> {
    return Promise.resolve(this.hashes.get(key)?.size ?? 0);
  }

  del(key: string): Promise<number> {
    return Promise.resolve(this.hashes.delete(key) ? 1 : 0);
  }

  async *scanKeys(pattern: string): AsyncIterable<string> {
    const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : pattern;
    const keys = [...this.hashes.keys()].filter((key) => key.startsWith(prefix));
    for (const key of keys) {
      await Promise.resolve();
      yield key;
    }
  }

  quit(): Promise<string> {
    this.quitCalls += 1;
    return Promise.resolve('OK');
  }
}
