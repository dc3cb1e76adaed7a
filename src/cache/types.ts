import type { PageAddress } from '../address.js';

export interface CacheRecord {
  // Canonical address string
  key: string;
  // Version-less part of the address (root/type:id)
  prefix: string;
  type: string;
  version: number;
  // Canonical address of the parent page, when the page was stored with provenance
  parent?: string;
  payload: string;
  createdAt: number;
}

/** Store whose operations complete before returning (memory, SQLite). */
export interface SyncPageStore {
  readonly mode: 'sync';
  read: (address: PageAddress) => CacheRecord | undefined;
  write: (record: CacheRecord) => void;
  delete: (address: PageAddress) => boolean;
  deletePrefix: (prefix: string) => number;
  latestVersion: (prefix: string) => number | undefined;
  // Records stored with `parent` equal to the given canonical address
  children: (parent: string) => CacheRecord[];
  clear: () => void;
  close?: () => void;
}

/** Store whose operations suspend (network-backed, e.g. Redis). */
export interface AsyncPageStore {
  readonly mode: 'async';
  read: (address: PageAddress) => Promise<CacheRecord | undefined>;
  write: (record: CacheRecord) => Promise<void>;
  delete: (address: PageAddress) => Promise<boolean>;
  deletePrefix: (prefix: string) => Promise<number>;
  latestVersion: (prefix: string) => Promise<number | undefined>;
  children: (parent: string) => Promise<CacheRecord[]>;
  clear: () => Promise<void>;
  close?: () => Promise<void>;
}

export type PageStore = SyncPageStore | AsyncPageStore;

export type CacheBackend = 'memory' | 'sqlite' | 'redis';

export interface CacheConfig {
  backend?: CacheBackend;
  sqlite?: {
    path?: string;
  };
  redis?: {
    url?: string;
    username?: string;
    password?: string;
    database?: number;
    keyPrefix?: string;
  };
  maxEntries?: number;
}
