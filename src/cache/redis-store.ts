import { createClient } from 'redis';

import type { AsyncPageStore, CacheRecord } from './types.js';

import { PageAddress } from '../address.js';
import { describeError } from '../errors.js';
import { isPlainObject, warn } from '../utils.js';

interface RedisConfig {
  url?: string;
  username?: string;
  password?: string;
  database?: number;
  keyPrefix?: string;
}

/** The hash commands the store needs; satisfied by a node-redis client or an in-process fake. */
export interface RedisHashClient {
  hGet: (key: string, field: string) => Promise<string | null | undefined>;
  hSet: (key: string, field: string, value: string) => Promise<number>;
  hDel: (key: string, field: string) => Promise<number>;
  hKeys: (key: string) => Promise<string[]>;
  hGetAll: (key: string) => Promise<Record<string, string>>;
  hLen: (key: string) => Promise<number>;
  del: (key: string) => Promise<number>;
  scanKeys: (pattern: string) => AsyncIterable<string>;
  quit?: () => Promise<unknown>;
}

interface RedisPayload {
  payload: string;
  type: string;
  parent?: string;
  createdAt: number;
}

export const DEFAULT_REDIS_KEY_PREFIX = 'pagekit:pages:';

export function connectRedisHashClient(config: RedisConfig): RedisHashClient {
  const url = typeof config.url === 'string' && config.url.length > 0 ? config.url : undefined;
  const client = createClient({
    url,
    username: config.username,
    password: config.password,
    database: config.database,
  });
  client.on('error', (error: unknown) => {
    warn(`cache redis error: ${describeError(error)}`);
  });
  void client.connect().catch((error: unknown) => {
    warn(`cache redis connect failed: ${describeError(error)}`);
  });
  return {
    hGet: (key, field) => client.hGet(key, field),
    hSet: (key, field, value) => client.hSet(key, field, value),
    hDel: (key, field) => client.hDel(key, field),
    hKeys: (key) => client.hKeys(key),
    hGetAll: (key) => client.hGetAll(key),
    hLen: (key) => client.hLen(key),
    del: (key) => client.del(key),
    scanKeys: (pattern) => client.scanIterator({ MATCH: pattern }),
    quit: () => client.quit(),
  };
}

const parsePayload = (raw: string): RedisPayload | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isPlainObject(parsed)) return undefined;
  const candidate = parsed;
  if (typeof candidate.payload !== 'string' || typeof candidate.type !== 'string' || typeof candidate.createdAt !== 'number') {
    return undefined;
  }
  return {
    payload: candidate.payload,
    type: candidate.type,
    parent: typeof candidate.parent === 'string' ? candidate.parent : undefined,
    createdAt: candidate.createdAt,
  };
};

/**
 * One Redis hash per page prefix (`root/type:id`), one field per version. Latest-version
 * and prefix invalidation then cost a single hash command.
 */
export class RedisPageStore implements AsyncPageStore {
  readonly mode = 'async' as const;
  private readonly client: RedisHashClient;
  private readonly keyPrefix: string;

  constructor(config: RedisConfig, client?: RedisHashClient) {
    this.client = client ?? connectRedisHashClient(config);
    this.keyPrefix = typeof config.keyPrefix === 'string' ? config.keyPrefix : DEFAULT_REDIS_KEY_PREFIX;
  }

  private buildKey(prefix: string): string {
    return `${this.keyPrefix}${prefix}`;
  }

  async read(address: PageAddress): Promise<CacheRecord | undefined> {
    const raw = await this.client.hGet(this.buildKey(address.prefix), String(address.version));
    if (raw === null || raw === undefined) return undefined;
    const parsed = parsePayload(raw);
    if (parsed === undefined) return undefined;
    return {
      key: address.key,
      prefix: address.prefix,
      type: parsed.type,
      version: address.version,
      parent: parsed.parent,
      payload: parsed.payload,
      createdAt: parsed.createdAt,
    };
  }

  async write(record: CacheRecord): Promise<void> {
    const payload: RedisPayload = {
      payload: record.payload,
      type: record.type,
      parent: record.parent,
      createdAt: record.createdAt,
    };
    await this.client.hSet(this.buildKey(record.prefix), String(record.version), JSON.stringify(payload));
  }

  async delete(address: PageAddress): Promise<boolean> {
    const removed = await this.client.hDel(this.buildKey(address.prefix), String(address.version));
    return removed > 0;
  }

  async deletePrefix(prefix: string): Promise<number> {
    const key = this.buildKey(prefix);
    const count = await this.client.hLen(key);
    if (count === 0) return 0;
    await this.client.del(key);
    return count;
  }

  async latestVersion(prefix: string): Promise<number | undefined> {
    const fields = await this.client.hKeys(this.buildKey(prefix));
    return fields.reduce<number | undefined>((latest, field) => {
      const version = Number.parseInt(field, 10);
      if (!Number.isSafeInteger(version)) return latest;
      return latest === undefined || version > latest ? version : latest;
    }, undefined);
  }

  // No parent index in Redis: scans every page hash under the key prefix.
  async children(parent: string): Promise<CacheRecord[]> {
    const keys = await this.scanOwnKeys();
    const hashes = await Promise.all(keys.map(async (key) => ({ key, fields: await this.client.hGetAll(key) })));
    return hashes.flatMap(({ key, fields }) => {
      const prefix = key.slice(this.keyPrefix.length);
      return Object.entries(fields).flatMap(([field, raw]) => {
        const parsed = parsePayload(raw);
        const version = Number.parseInt(field, 10);
        if (parsed === undefined || parsed.parent !== parent || !Number.isSafeInteger(version)) return [];
        const address = PageAddress.tryParse(prefix)?.withVersion(version);
        if (address === undefined) return [];
        return [{
          key: address.key,
          prefix: address.prefix,
          type: parsed.type,
          version,
          parent: parsed.parent,
          payload: parsed.payload,
          createdAt: parsed.createdAt,
        }];
      });
    });
  }

  async clear(): Promise<void> {
    const keys = await this.scanOwnKeys();
    await Promise.all(keys.map((key) => this.client.del(key)));
  }

  private async scanOwnKeys(): Promise<string[]> {
    const keys: string[] = [];
    for await (const key of this.client.scanKeys(`${this.keyPrefix}*`)) {
      keys.push(key);
    }
    return keys;
  }

  async close(): Promise<void> {
    await this.client.quit?.();
  }
}
