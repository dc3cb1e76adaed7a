import fs from 'node:fs';
import { createRequire } from 'node:module';
import path from 'node:path';

import type { CacheRecord, SyncPageStore } from './types.js';
import type { PageAddress } from '../address.js';
import type { Database as SqliteDatabase, Statement as SqliteStatement } from 'better-sqlite3';

type SqliteFactory = new (filename: string) => SqliteDatabase;

interface SqliteStoreOptions {
  path: string;
  maxEntries: number;
}

interface Row {
  key: string;
  prefix: string;
  type: string;
  version: number;
  parent: string | null;
  payload: string;
  created_at: number;
}

interface CountRow {
  count: number;
}

interface VersionRow {
  version: number | null;
}

let cachedFactory: SqliteFactory | undefined;

const loadSqliteFactory = (): SqliteFactory => {
  if (cachedFactory !== undefined) return cachedFactory;
  const require = createRequire(import.meta.url);
  const factory = require('better-sqlite3') as SqliteFactory;
  cachedFactory = factory;
  return factory;
};

const IN_MEMORY = ':memory:';

const toRecord = (row: Row): CacheRecord => ({
  key: row.key,
  prefix: row.prefix,
  type: row.type,
  version: row.version,
  parent: row.parent ?? undefined,
  payload: row.payload,
  createdAt: row.created_at,
});

export class SQLitePageStore implements SyncPageStore {
  readonly mode = 'sync' as const;
  private readonly db: SqliteDatabase;
  private readonly maxEntries: number;
  private readonly getStmt: SqliteStatement<[string], Row>;
  private readonly childrenStmt: SqliteStatement<[string], Row>;
  private readonly upsertStmt: SqliteStatement<[Record<string, unknown>]>;
  private readonly deleteStmt: SqliteStatement<[string]>;
  private readonly deletePrefixStmt: SqliteStatement<[string]>;
  private readonly latestVersionStmt: SqliteStatement<[string], VersionRow>;
  private readonly countStmt: SqliteStatement<[], CountRow>;
  private readonly deleteOverflowStmt: SqliteStatement<[number]>;
  private readonly clearStmt: SqliteStatement<[]>;

  constructor(opts: SqliteStoreOptions) {
    const filePath = opts.path;
    this.maxEntries = Math.max(1, Math.trunc(opts.maxEntries));
    if (filePath !== IN_MEMORY) {
      const dir = path.dirname(filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
    const sqlite = loadSqliteFactory();
    this.db = new sqlite(filePath);
    if (filePath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pages (
        key TEXT PRIMARY KEY,
        prefix TEXT NOT NULL,
        type TEXT NOT NULL,
        version INTEGER NOT NULL,
        parent TEXT,
        payload TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_pages_prefix ON pages(prefix, version);
      CREATE INDEX IF NOT EXISTS idx_pages_created ON pages(created_at);
      CREATE INDEX IF NOT EXISTS idx_pages_parent ON pages(parent);
    `);

    this.getStmt = this.db.prepare<[string], Row>(`
      SELECT key, prefix, type, version, parent, payload, created_at
      FROM pages
      WHERE key = ?
      LIMIT 1
    `);
    this.upsertStmt = this.db.prepare<[Record<string, unknown>]>(`
      INSERT OR REPLACE INTO pages
      (key, prefix, type, version, parent, payload, created_at)
      VALUES (@key, @prefix, @type, @version, @parent, @payload, @created_at)
    `);
    this.childrenStmt = this.db.prepare<[string], Row>(`
      SELECT key, prefix, type, version, parent, payload, created_at
      FROM pages
      WHERE parent = ?
    `);
    this.deleteStmt = this.db.prepare<[string]>('DELETE FROM pages WHERE key = ?');
    this.deletePrefixStmt = this.db.prepare<[string]>('DELETE FROM pages WHERE prefix = ?');
    this.latestVersionStmt = this.db.prepare<[string], VersionRow>('SELECT MAX(version) as version FROM pages WHERE prefix = ?');
    this.countStmt = this.db.prepare<[], CountRow>('SELECT COUNT(*) as count FROM pages');
    this.deleteOverflowStmt = this.db.prepare<[number]>(`
      DELETE FROM pages
      WHERE rowid IN (
        SELECT rowid
        FROM pages
        ORDER BY created_at ASC, rowid ASC
        LIMIT ?
      )
    `);
    this.clearStmt = this.db.prepare<[]>('DELETE FROM pages');
  }

  read(address: PageAddress): CacheRecord | undefined {
    const row = this.getStmt.get(address.key);
    return row === undefined ? undefined : toRecord(row);
  }

  children(parent: string): CacheRecord[] {
    return this.childrenStmt.all(parent).map((row) => toRecord(row));
  }

  write(record: CacheRecord): void {
    const row = {
      key: record.key,
      prefix: record.prefix,
      type: record.type,
      version: record.version,
      parent: record.parent ?? null,
      payload: record.payload,
      created_at: record.createdAt,
    };
    this.db.transaction(() => {
      this.upsertStmt.run(row);
      const counted = this.countStmt.get();
      const count = typeof counted?.count === 'number' ? counted.count : 0;
      const overflow = Math.max(0, count - this.maxEntries);
      if (overflow > 0) {
        this.deleteOverflowStmt.run(overflow);
      }
    })();
  }

  delete(address: PageAddress): boolean {
    return this.deleteStmt.run(address.key).changes > 0;
  }

  deletePrefix(prefix: string): number {
    return this.deletePrefixStmt.run(prefix).changes;
  }

  latestVersion(prefix: string): number | undefined {
    const row = this.latestVersionStmt.get(prefix);
    return typeof row?.version === 'number' ? row.version : undefined;
  }

  clear(): void {
    this.clearStmt.run();
  }

  close(): void {
    this.db.close();
  }
}
