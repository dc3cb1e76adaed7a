import type { CacheRecord, PageStore, SyncPageStore } from './cache/types.js';
import type { Page } from './page.js';
import type { Producer } from './producers.js';
import type { LogCallback, LogEntry } from './types.js';

import { PageAddress, type PageAddressInput } from './address.js';
import { MemoryPageStore } from './cache/memory-store.js';
import { DEFAULT_DISPATCH_CONCURRENCY, DispatchQueue } from './dispatch-queue.js';
import {
  AddressMismatchError,
  BlockingDispatchError,
  DuplicateRegistrationError,
  PageKitError,
  ProvenanceError,
  UnknownTypeError,
  describeError,
} from './errors.js';
import { decodePagePayload, encodePagePayload } from './page.js';
import { makeLogEntry } from './types.js';
import { isPromiseLike } from './utils.js';
import { ValidatorRegistry } from './validators.js';

interface RouteEntry {
  type: string;
  aliases: Set<string>;
  producer: Producer;
  cache: boolean;
}

export interface RouteOptions {
  cache?: boolean;
  aliases?: readonly string[];
}

export interface RouteInfo {
  type: string;
  aliases: string[];
  cache: boolean;
  kind: Producer['kind'];
}

export interface GetOptions {
  // Return a cached page even when its validator rejects it
  allowStale?: boolean;
}

export interface PageRouterOptions {
  root: string;
  store?: PageStore;
  validators?: ValidatorRegistry;
  log?: LogCallback;
  dispatchConcurrency?: number;
  now?: () => number;
}

/**
 * Turns addresses into pages: resolves the type (following aliases) to its producer, serves
 * fresh cached pages, and otherwise runs the producer and caches what it returns.
 */
export class PageRouter {
  readonly root: string;
  readonly store: PageStore;
  readonly validators: ValidatorRegistry;
  private readonly entries = new Map<string, RouteEntry>();
  private readonly aliases = new Map<string, string>();
  private readonly dispatch: DispatchQueue;
  private readonly log?: LogCallback;
  private readonly now: () => number;

  constructor(opts: PageRouterOptions) {
    this.root = opts.root;
    this.store = opts.store ?? new MemoryPageStore();
    this.log = opts.log;
    this.validators = opts.validators ?? new ValidatorRegistry({ log: opts.log });
    this.dispatch = new DispatchQueue(opts.dispatchConcurrency ?? DEFAULT_DISPATCH_CONCURRENCY);
    this.now = opts.now ?? Date.now;
  }

  // ---------------------------------------------------------------------------
  // registration

  /**
   * Route a type tag (or `[tag, ...aliases]`) to its producer. A tag or alias that is
   * already taken is rejected.
   */
  route<P extends Page>(names: string | readonly string[], producer: Producer<P>, opts: RouteOptions = {}): void {
    const [type, ...inlineAliases] = typeof names === 'string' ? [names] : names;
    if (type === undefined || type.length === 0) {
      throw new PageKitError('malformed_address', 'Route requires a non-empty type tag');
    }
    if (this.entries.has(type) || this.aliases.has(type)) {
      throw new DuplicateRegistrationError(`Handler already registered for type: ${type}`, type);
    }
    const aliases = [...new Set([...inlineAliases, ...(opts.aliases ?? [])])].filter((alias) => alias !== type);
    aliases.forEach((alias) => {
      if (this.entries.has(alias) || this.aliases.has(alias)) {
        throw new DuplicateRegistrationError(`Alias already in use: ${alias}`, alias);
      }
    });
    this.entries.set(type, { type, aliases: new Set(aliases), producer, cache: opts.cache ?? true });
    aliases.forEach((alias) => this.aliases.set(alias, type));
    this.emit(makeLogEntry('TRC', 'router', `routed ${producer.kind} producer`, {
      type,
      details: aliases.length > 0 ? { aliases: aliases.join(',') } : undefined,
    }));
  }

  resolveType(name: string): string | undefined {
    if (this.entries.has(name)) return name;
    return this.aliases.get(name);
  }

  hasRoute(name: string): boolean {
    return this.resolveType(name) !== undefined;
  }

  isCacheEnabled(name: string): boolean {
    const type = this.resolveType(name);
    return type === undefined ? true : (this.entries.get(type)?.cache ?? true);
  }

  routes(): RouteInfo[] {
    return [...this.entries.values()].map((entry) => ({
      type: entry.type,
      aliases: [...entry.aliases],
      cache: entry.cache,
      kind: entry.producer.kind,
    }));
  }

  // ---------------------------------------------------------------------------
  // lookups

  /**
   * Blocking lookup. Cached pages are served without touching the producer; a miss on a
   * suspending producer, or any lookup against an async store, raises
   * {@link BlockingDispatchError} because Node.js cannot wait on a promise synchronously.
   */
  get(input: PageAddressInput, opts: GetOptions = {}): Page {
    const address = PageAddress.parse(input);
    const entry = this.requireEntry(address);
    if (entry.cache) {
      const store = this.requireSyncStore(`get(${address.format()})`);
      const cached = this.readCachedSync(store, address, entry, opts);
      if (cached !== undefined) return cached;
      const page = this.produceSync(entry, address);
      this.writeSync(store, page, entry);
      return page;
    }
    return this.produceSync(entry, address);
  }

  async getAsync(input: PageAddressInput, opts: GetOptions = {}): Promise<Page> {
    const address = PageAddress.parse(input);
    const entry = this.requireEntry(address);
    if (entry.cache) {
      const cached = await this.readCachedAsync(address, entry, opts);
      if (cached !== undefined) return cached;
    }
    const page = await this.produceAsync(entry, address);
    if (entry.cache) {
      await this.writeAsync(page, entry);
    }
    return page;
  }

  /** Blocking bulk lookup in input order; the first failure aborts the batch. */
  getMany(inputs: readonly PageAddressInput[], opts: GetOptions = {}): Page[] {
    const addresses = inputs.map((input) => PageAddress.parse(input));
    return addresses.map((address) => this.get(address, opts));
  }

  /**
   * Concurrent bulk lookup. Results keep input order whatever the completion order; any
   * failure rejects the batch with that error. Siblings already running are not cancelled
   * and their cache writes stay.
   */
  async getManyAsync(inputs: readonly PageAddressInput[], opts: GetOptions = {}): Promise<Page[]> {
    const addresses = inputs.map((input) => PageAddress.parse(input));
    return await Promise.all(addresses.map((address) => this.getAsync(address, opts)));
  }

  // ---------------------------------------------------------------------------
  // addresses, invalidation, provenance

  /**
   * Address under this router's root. Without a version, the next one after the latest
   * cached version of that page (1 when nothing is cached or caching is off for the type).
   */
  createAddress(type: string, id: string, version?: number): PageAddress {
    if (version !== undefined) return new PageAddress(this.root, type, id, version);
    const prefix = new PageAddress(this.root, type, id).prefix;
    if (!this.isCacheEnabled(type)) return new PageAddress(this.root, type, id, 1);
    const store = this.requireSyncStore(`createAddress(${prefix})`);
    return new PageAddress(this.root, type, id, this.nextVersion(() => store.latestVersion(prefix), prefix));
  }

  async createAddressAsync(type: string, id: string, version?: number): Promise<PageAddress> {
    if (version !== undefined) return new PageAddress(this.root, type, id, version);
    const prefix = new PageAddress(this.root, type, id).prefix;
    if (!this.isCacheEnabled(type)) return new PageAddress(this.root, type, id, 1);
    let latest: number | undefined;
    try {
      latest = await this.store.latestVersion(prefix);
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'cache', `latest version lookup failed: ${describeError(e)}; using version 1`, { address: prefix }));
      return new PageAddress(this.root, type, id, 1);
    }
    return new PageAddress(this.root, type, id, latest === undefined ? 1 : latest + 1);
  }

  invalidate(input: PageAddressInput): boolean {
    const address = PageAddress.parse(input);
    const removed = this.requireSyncStore(`invalidate(${address.format()})`).delete(address);
    this.emit(makeLogEntry('VRB', 'cache', removed ? 'invalidated page' : 'nothing cached to invalidate', { address: address.format() }));
    return removed;
  }

  async invalidateAsync(input: PageAddressInput): Promise<boolean> {
    const address = PageAddress.parse(input);
    const removed = await this.store.delete(address);
    this.emit(makeLogEntry('VRB', 'cache', removed ? 'invalidated page' : 'nothing cached to invalidate', { address: address.format() }));
    return removed;
  }

  /** Drop every cached version of `root/type:id`. */
  invalidatePrefix(prefix: string): number {
    const count = this.requireSyncStore(`invalidatePrefix(${prefix})`).deletePrefix(prefix);
    this.emit(makeLogEntry('VRB', 'cache', `invalidated ${String(count)} cached versions`, { address: prefix }));
    return count;
  }

  async invalidatePrefixAsync(prefix: string): Promise<number> {
    const count = await this.store.deletePrefix(prefix);
    this.emit(makeLogEntry('VRB', 'cache', `invalidated ${String(count)} cached versions`, { address: prefix }));
    return count;
  }

  /**
   * Store a page built outside a producer (e.g. a chunk derived from a document). A page
   * with a parent must point at a cached, versioned page of another type, must not be
   * cached yet, and must not close a cycle.
   */
  storePage(page: Page): void {
    const store = this.requireSyncStore(`storePage(${page.address.format()})`);
    if (page.parentAddress !== undefined) {
      const parentAddress = page.parentAddress;
      this.checkProvenance(page, parentAddress, (address) => this.decodeRecord(store.read(address)));
    }
    store.write(this.toRecord(page, this.typeOf(page)));
  }

  async storePageAsync(page: Page): Promise<void> {
    if (page.parentAddress !== undefined) {
      const parentAddress = page.parentAddress;
      const known = new Map<string, Page | undefined>();
      // Walk the ancestry once up front so the synchronous check can read from memory.
      let cursor: PageAddress | undefined = parentAddress;
      while (cursor !== undefined && !known.has(cursor.key)) {
        const found: Page | undefined = this.decodeRecord(await this.store.read(cursor));
        known.set(cursor.key, found);
        cursor = found?.parentAddress;
      }
      known.set(page.address.key, this.decodeRecord(await this.store.read(page.address)));
      this.checkProvenance(page, parentAddress, (address) => known.get(address.key));
    }
    await this.store.write(this.toRecord(page, this.typeOf(page)));
  }

  /** Provenance chain from the root ancestor down to the page itself. */
  lineage(input: PageAddressInput): Page[] {
    const store = this.requireSyncStore('lineage');
    return this.collectLineage(PageAddress.parse(input), (address) => this.decodeRecord(store.read(address)));
  }

  async lineageAsync(input: PageAddressInput): Promise<Page[]> {
    return await this.collectLineageAsync(PageAddress.parse(input));
  }

  /** Cached pages whose parent is `input`, ordered by address. */
  children(input: PageAddressInput): Page[] {
    const store = this.requireSyncStore('children');
    return this.decodeChildren(store.children(PageAddress.parse(input).key));
  }

  async childrenAsync(input: PageAddressInput): Promise<Page[]> {
    return this.decodeChildren(await this.store.children(PageAddress.parse(input).key));
  }

  /**
   * Latest cached version of the page at `prefix` (`root/type:id`), or undefined when none is
   * cached or it (or one of its ancestors) is no longer fresh.
   */
  latestPage(prefix: string): Page | undefined {
    const store = this.requireSyncStore(`latestPage(${prefix})`);
    const version = store.latestVersion(prefix);
    if (version === undefined) return undefined;
    const page = this.decodeRecord(store.read(PageAddress.parse(prefix).withVersion(version)));
    if (page === undefined || !this.isFreshSync(store, page, this.typeOf(page))) return undefined;
    return page;
  }

  async latestPageAsync(prefix: string): Promise<Page | undefined> {
    const version = await this.store.latestVersion(prefix);
    if (version === undefined) return undefined;
    const page = this.decodeRecord(await this.store.read(PageAddress.parse(prefix).withVersion(version)));
    if (page === undefined || !(await this.isFreshAsync(page, this.typeOf(page)))) return undefined;
    return page;
  }

  // ---------------------------------------------------------------------------
  // internals

  private requireEntry(address: PageAddress): RouteEntry {
    const type = this.resolveType(address.type);
    const entry = type === undefined ? undefined : this.entries.get(type);
    if (entry === undefined) throw new UnknownTypeError(address.type);
    return entry;
  }

  private requireSyncStore(operation: string): SyncPageStore {
    if (this.store.mode === 'async') {
      throw new BlockingDispatchError(`${operation}: the page store is asynchronous; use the Async variant`);
    }
    return this.store;
  }

  private produceSync(entry: RouteEntry, address: PageAddress): Page {
    const producer = entry.producer;
    if (producer.kind === 'suspending') {
      throw new BlockingDispatchError(`get(${address.format()}): producer for '${entry.type}' is suspending; use getAsync`);
    }
    const page: Page = producer.produce(address);
    // Declared sync but returned a promise anyway.
    if (isPromiseLike(page)) {
      page.then(undefined, (e: unknown) => {
        this.emit(makeLogEntry('WRN', 'router', `discarded producer rejection: ${describeError(e)}`, { address: address.format(), type: entry.type }));
      });
      throw new BlockingDispatchError(`get(${address.format()}): producer for '${entry.type}' returned a promise; register it with suspendingProducer and use getAsync`);
    }
    return this.checkProduced(page, address, entry);
  }

  private async produceAsync(entry: RouteEntry, address: PageAddress): Promise<Page> {
    const producer = entry.producer;
    const page = producer.kind === 'suspending'
      ? await producer.produce(address)
      : await this.dispatch.run(() => producer.produce(address));
    return this.checkProduced(page, address, entry);
  }

  private checkProduced(page: Page, address: PageAddress, entry: RouteEntry): Page {
    if (!page.address.equals(address)) {
      throw new AddressMismatchError(address.format(), String(page.address));
    }
    this.emit(makeLogEntry('TRC', 'router', 'served from producer', { address: address.format(), type: entry.type }));
    return page;
  }

  private readCachedSync(store: SyncPageStore, address: PageAddress, entry: RouteEntry, opts: GetOptions): Page | undefined {
    let record: CacheRecord | undefined;
    try {
      record = store.read(address);
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'cache', `cache read failed, falling back to producer: ${describeError(e)}`, { address: address.format(), type: entry.type }));
      return undefined;
    }
    const page = this.decodeRecord(record);
    if (page === undefined) return undefined;
    if (opts.allowStale !== true && !this.isFreshSync(store, page, entry.type)) return undefined;
    this.emit(makeLogEntry('TRC', 'router', 'served from cache', { address: address.format(), type: entry.type }));
    return page;
  }

  private async readCachedAsync(address: PageAddress, entry: RouteEntry, opts: GetOptions): Promise<Page | undefined> {
    let record: CacheRecord | undefined;
    try {
      record = await this.store.read(address);
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'cache', `cache read failed, falling back to producer: ${describeError(e)}`, { address: address.format(), type: entry.type }));
      return undefined;
    }
    const page = this.decodeRecord(record);
    if (page === undefined) return undefined;
    if (opts.allowStale !== true && !(await this.isFreshAsync(page, entry.type))) return undefined;
    this.emit(makeLogEntry('TRC', 'router', 'served from cache', { address: address.format(), type: entry.type }));
    return page;
  }

  private writeSync(store: SyncPageStore, page: Page, entry: RouteEntry): void {
    try {
      store.write(this.toRecord(page, entry.type));
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'cache', `cache write failed: ${describeError(e)}`, { address: page.address.format(), type: entry.type }));
    }
  }

  private async writeAsync(page: Page, entry: RouteEntry): Promise<void> {
    try {
      await this.store.write(this.toRecord(page, entry.type));
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'cache', `cache write failed: ${describeError(e)}`, { address: page.address.format(), type: entry.type }));
    }
  }

  private toRecord(page: Page, type: string): CacheRecord {
    return {
      key: page.address.key,
      prefix: page.address.prefix,
      type,
      version: page.address.version,
      parent: page.parentAddress?.format(),
      payload: encodePagePayload(page),
      createdAt: this.now(),
    };
  }

  private decodeRecord(record: CacheRecord | undefined): Page | undefined {
    if (record === undefined) return undefined;
    const page = decodePagePayload(record.payload);
    if (page === undefined) {
      this.emit(makeLogEntry('WRN', 'cache', 'cached payload could not be decoded; treating as a miss', { address: record.key }));
    }
    return page;
  }

  private nextVersion(readLatest: () => number | undefined, prefix: string): number {
    try {
      const latest = readLatest();
      return latest === undefined ? 1 : latest + 1;
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'cache', `latest version lookup failed: ${describeError(e)}; using version 1`, { address: prefix }));
      return 1;
    }
  }

  private checkProvenance(page: Page, parentAddress: PageAddress, lookup: (address: PageAddress) => Page | undefined): void {
    const parent = lookup(parentAddress);
    if (parent === undefined) {
      throw new ProvenanceError(`Parent page ${parentAddress.format()} does not exist in cache`);
    }
    if (lookup(page.address) !== undefined) {
      throw new ProvenanceError(`Child page ${page.address.format()} already exists in cache`);
    }
    if (parentAddress.type === page.address.type) {
      throw new ProvenanceError(`Parent and child cannot be the same page type: ${parentAddress.type}`);
    }
    if (!parentAddress.isVersioned) {
      throw new ProvenanceError(`Parent address must carry a fixed version, got: ${parentAddress.format()}`);
    }
    const seen = new Set<string>();
    let ancestor: PageAddress | undefined = parentAddress;
    while (ancestor !== undefined) {
      if (ancestor.equals(page.address) || seen.has(ancestor.key)) {
        throw new ProvenanceError(`Adding relationship ${page.address.format()} -> ${parentAddress.format()} would create a cycle`);
      }
      seen.add(ancestor.key);
      ancestor = lookup(ancestor)?.parentAddress;
    }
  }

  // A cached page is fresh when it and every cached ancestor pass their validators.
  private isFreshSync(store: SyncPageStore, page: Page, type: string): boolean {
    if (!this.validators.isValid(page, type)) return false;
    if (page.parentAddress === undefined) return true;
    const parentAddress = page.parentAddress;
    let ancestors: Page[];
    try {
      ancestors = this.collectLineage(parentAddress, (address) => this.decodeRecord(store.read(address)));
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'cache', `provenance chain unreadable, treating as stale: ${describeError(e)}`, { address: page.address.format() }));
      return false;
    }
    return this.ancestorsFresh(page, ancestors, ancestors.map((ancestor) => this.validators.isValid(ancestor, this.typeOf(ancestor))));
  }

  private async isFreshAsync(page: Page, type: string): Promise<boolean> {
    if (!(await this.validators.isValidAsync(page, type))) return false;
    if (page.parentAddress === undefined) return true;
    let ancestors: Page[];
    try {
      ancestors = await this.collectLineageAsync(page.parentAddress);
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'cache', `provenance chain unreadable, treating as stale: ${describeError(e)}`, { address: page.address.format() }));
      return false;
    }
    const verdicts = await Promise.all(ancestors.map((ancestor) => this.validators.isValidAsync(ancestor, this.typeOf(ancestor))));
    return this.ancestorsFresh(page, ancestors, verdicts);
  }

  private ancestorsFresh(page: Page, ancestors: readonly Page[], verdicts: readonly boolean[]): boolean {
    const stale = ancestors.find((_, index) => verdicts[index] !== true);
    if (stale === undefined) return true;
    this.emit(makeLogEntry('VRB', 'cache', `ancestor ${stale.address.format()} failed validation`, { address: page.address.format() }));
    return false;
  }

  private typeOf(page: Page): string {
    return this.resolveType(page.address.type) ?? page.address.type;
  }

  private decodeChildren(records: readonly CacheRecord[]): Page[] {
    return records
      .map((record) => this.decodeRecord(record))
      .filter((page): page is Page => page !== undefined)
      .sort((a, b) => PageAddress.compare(a.address, b.address));
  }

  private collectLineage(start: PageAddress, lookup: (address: PageAddress) => Page | undefined): Page[] {
    const chain: Page[] = [];
    const seen = new Set<string>();
    let cursor: PageAddress | undefined = start;
    while (cursor !== undefined && !seen.has(cursor.key)) {
      seen.add(cursor.key);
      const page = lookup(cursor);
      if (page === undefined) break;
      chain.unshift(page);
      cursor = page.parentAddress;
    }
    return chain;
  }

  private async collectLineageAsync(start: PageAddress): Promise<Page[]> {
    const chain: Page[] = [];
    const seen = new Set<string>();
    let cursor: PageAddress | undefined = start;
    while (cursor !== undefined && !seen.has(cursor.key)) {
      seen.add(cursor.key);
      const page: Page | undefined = this.decodeRecord(await this.store.read(cursor));
      if (page === undefined) break;
      chain.unshift(page);
      cursor = page.parentAddress;
    }
    return chain;
  }

  private emit(entry: LogEntry): void {
    try {
      this.log?.(entry);
    } catch {
      // a failing log sink must not fail a lookup
    }
  }
}
