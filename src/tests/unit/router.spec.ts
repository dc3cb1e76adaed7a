import { describe, expect, it } from 'vitest';

import type { CacheRecord, SyncPageStore } from '../../cache/types.js';
import type { Page } from '../../page.js';
import type { LogEntry } from '../../types.js';

import { PageAddress } from '../../address.js';
import { MemoryPageStore } from '../../cache/memory-store.js';
import { RedisPageStore } from '../../cache/redis-store.js';
import {
  AddressMismatchError,
  BlockingDispatchError,
  DuplicateRegistrationError,
  ProvenanceError,
  UnknownTypeError,
} from '../../errors.js';
import { serializePage } from '../../page.js';
import { suspendingProducer, syncProducer } from '../../producers.js';
import { PageRouter } from '../../router.js';
import { suspendingValidator, syncValidator } from '../../validators.js';

import { FakeRedisHashClient } from '../fixtures/fake-redis.js';

interface DocPage extends Page {
  title: string;
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => { setTimeout(resolve, ms); });

const docProducer = (calls: string[] = []) => syncProducer<DocPage>((address) => {
  calls.push(address.format());
  return { address, title: `Document ${address.id}` };
});

describe('PageRouter lookups', () => {
  it('produces a page and serves the second request from cache', () => {
    const calls: string[] = [];
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer(calls));

    const first = router.get('root/doc:42');
    expect(first).toMatchObject({ title: 'Document 42' });
    expect(first.address.format()).toBe('root/doc:42');

    const second = router.get('root/doc:42');
    expect(second).toMatchObject({ title: 'Document 42' });
    expect(calls).toEqual(['root/doc:42']);
  });

  it('accepts address values as well as strings', async () => {
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer());
    const page = await router.getAsync(new PageAddress('root', 'doc', '7', 2));
    expect(page).toMatchObject({ title: 'Document 7' });
  });

  it('fails for unknown types', async () => {
    const router = new PageRouter({ root: 'root' });
    expect(() => router.get('root/email:1')).toThrow(UnknownTypeError);
    await expect(router.getAsync('root/email:1')).rejects.toBeInstanceOf(UnknownTypeError);
  });

  it('propagates producer errors unchanged and caches nothing', async () => {
    const failure = new Error('provider down');
    const router = new PageRouter({ root: 'root' });
    router.route('doc', syncProducer(() => { throw failure; }));
    expect(() => router.get('root/doc:1')).toThrow(failure);
    await expect(router.getAsync('root/doc:1')).rejects.toBe(failure);
    expect(router.store.mode === 'sync' ? router.store.read(PageAddress.parse('root/doc:1')) : 'async').toBeUndefined();
  });

  it('rejects a page whose address differs from the requested one', () => {
    const router = new PageRouter({ root: 'root' });
    router.route('doc', syncProducer<DocPage>((address) => ({ address: address.withVersion(9), title: 'x' })));
    expect(() => router.get('root/doc:1')).toThrow(AddressMismatchError);
  });

  it('re-produces when the validator rejects the cached page unless stale reads are allowed', () => {
    const calls: string[] = [];
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer(calls));
    router.validators.register('doc', syncValidator(() => false));

    router.get('root/doc:1');
    router.get('root/doc:1');
    expect(calls).toHaveLength(2);

    router.get('root/doc:1', { allowStale: true });
    expect(calls).toHaveLength(2);
  });

  it('skips the store entirely for routes with caching off', () => {
    const calls: string[] = [];
    const store = new MemoryPageStore();
    const router = new PageRouter({ root: 'root', store });
    router.route('doc', docProducer(calls), { cache: false });
    router.get('root/doc:1');
    router.get('root/doc:1');
    expect(calls).toHaveLength(2);
    expect(store.size).toBe(0);
  });
});

describe('PageRouter registration', () => {
  it('resolves aliases to the routed type', () => {
    const calls: string[] = [];
    const router = new PageRouter({ root: 'root' });
    router.route(['doc', 'document'], docProducer(calls), { aliases: ['file'] });
    expect(router.resolveType('document')).toBe('doc');
    expect(router.resolveType('file')).toBe('doc');
    expect(router.get('root/document:3')).toMatchObject({ title: 'Document 3' });
    expect(router.routes()).toEqual([{ type: 'doc', aliases: ['document', 'file'], cache: true, kind: 'sync' }]);
  });

  it('rejects a second producer for a type or a taken alias', () => {
    const router = new PageRouter({ root: 'root' });
    router.route(['doc', 'document'], docProducer());
    expect(() => { router.route('doc', docProducer()); }).toThrow(DuplicateRegistrationError);
    expect(() => { router.route('document', docProducer()); }).toThrow(DuplicateRegistrationError);
    expect(() => { router.route('chunk', docProducer(), { aliases: ['document'] }); }).toThrow(DuplicateRegistrationError);
    expect(router.hasRoute('chunk')).toBe(false);
  });
});

describe('PageRouter blocking and suspending paths', () => {
  it('refuses to drive a suspending producer from get', async () => {
    const router = new PageRouter({ root: 'root' });
    router.route('doc', suspendingProducer<DocPage>(async (address) => {
      await delay(1);
      return { address, title: 'late' };
    }));
    expect(() => router.get('root/doc:1')).toThrow(BlockingDispatchError);
    const page = await router.getAsync('root/doc:1');
    expect(page).toMatchObject({ title: 'late' });
    // Once cached, the blocking path can serve it.
    expect(router.get('root/doc:1')).toMatchObject({ title: 'late' });
  });

  it('treats a sync producer that returns a promise as a blocking dispatch error', () => {
    const router = new PageRouter({ root: 'root' });
    const sneaky = (address: PageAddress): DocPage => Object.assign(Promise.resolve(), { address, title: 'x' });
    router.route('doc', syncProducer(sneaky));
    expect(() => router.get('root/doc:1')).toThrow(BlockingDispatchError);
  });

  it('serves async stores only through the async path', async () => {
    const router = new PageRouter({ root: 'root', store: new RedisPageStore({}, new FakeRedisHashClient()) });
    router.route('doc', docProducer());
    expect(() => router.get('root/doc:1')).toThrow(BlockingDispatchError);
    await expect(router.getAsync('root/doc:1')).resolves.toMatchObject({ title: 'Document 1' });
    await expect(router.createAddressAsync('doc', '1')).resolves.toEqual(new PageAddress('root', 'doc', '1', 1));
  });

  it('runs suspending validators on the async path and treats them as stale on the blocking one', async () => {
    const calls: string[] = [];
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer(calls));
    router.validators.register('doc', suspendingValidator(() => Promise.resolve(true)));
    await router.getAsync('root/doc:1');
    await router.getAsync('root/doc:1');
    expect(calls).toHaveLength(1);
    router.get('root/doc:1');
    expect(calls).toHaveLength(2);
  });
});

describe('PageRouter bulk lookups', () => {
  it('keeps input order whatever the completion order', async () => {
    const finished: string[] = [];
    const router = new PageRouter({ root: 'root' });
    router.route('doc', suspendingProducer<DocPage>(async (address) => {
      await delay(address.id === 'B' ? 30 : 1);
      finished.push(address.id);
      return { address, title: address.id };
    }));
    const pages = await router.getManyAsync(['root/doc:A', 'root/doc:B', 'root/doc:C']);
    expect(pages.map((page) => serializePage(page).title)).toEqual(['A', 'B', 'C']);
    expect(finished.indexOf('B')).toBe(2);
  });

  it('mixes sync and suspending producers in one batch', async () => {
    const router = new PageRouter({ root: 'root', dispatchConcurrency: 1 });
    router.route('doc', docProducer());
    router.route('email', suspendingProducer<DocPage>(async (address) => {
      await delay(1);
      return { address, title: `Email ${address.id}` };
    }));
    const pages = await router.getManyAsync(['root/doc:1', 'root/email:2', 'root/doc:3']);
    expect(pages.map((page) => serializePage(page).title)).toEqual(['Document 1', 'Email 2', 'Document 3']);
  });

  it('fails the whole batch when one item fails', async () => {
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer());
    router.route('bad', syncProducer(() => { throw new Error('bad item'); }));
    await expect(router.getManyAsync(['root/doc:1', 'root/bad:2'])).rejects.toThrow('bad item');
    expect(() => router.getMany(['root/doc:1', 'root/bad:2'])).toThrow('bad item');
  });

  it('returns blocking bulk results in order', () => {
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer());
    const pages = router.getMany(['root/doc:3', new PageAddress('root', 'doc', '1')]);
    expect(pages.map((page) => page.address.format())).toEqual(['root/doc:3', 'root/doc:1']);
  });
});

describe('PageRouter store failures', () => {
  const failingStore = (): SyncPageStore => ({
    mode: 'sync',
    read: () => { throw new Error('read failed'); },
    write: (_record: CacheRecord) => { throw new Error('write failed'); },
    delete: () => false,
    deletePrefix: () => 0,
    latestVersion: () => { throw new Error('lookup failed'); },
    children: () => [],
    clear: () => undefined,
  });

  it('logs read and write failures and still returns the produced page', () => {
    const entries: LogEntry[] = [];
    const router = new PageRouter({ root: 'root', store: failingStore(), log: (entry) => { entries.push(entry); } });
    router.route('doc', docProducer());
    expect(router.get('root/doc:1')).toMatchObject({ title: 'Document 1' });
    const warnings = entries.filter((entry) => entry.severity === 'WRN').map((entry) => entry.message);
    expect(warnings).toEqual([
      'cache read failed, falling back to producer: read failed',
      'cache write failed: write failed',
    ]);
  });

  it('falls back to version 1 when the latest version cannot be read', () => {
    const router = new PageRouter({ root: 'root', store: failingStore() });
    router.route('doc', docProducer());
    expect(router.createAddress('doc', 'x').format()).toBe('root/doc:x@1');
  });
});

describe('PageRouter addresses, invalidation and provenance', () => {
  it('hands out the next version after the latest cached one', () => {
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer());
    router.route('scratch', docProducer(), { cache: false });
    expect(router.createAddress('doc', 'a').format()).toBe('root/doc:a@1');
    router.get('root/doc:a@1');
    router.get('root/doc:a@4');
    expect(router.createAddress('doc', 'a').format()).toBe('root/doc:a@5');
    expect(router.createAddress('doc', 'a', 2).format()).toBe('root/doc:a@2');
    expect(router.createAddress('scratch', 'a').format()).toBe('root/scratch:a@1');
  });

  it('invalidates single addresses and whole prefixes', () => {
    const calls: string[] = [];
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer(calls));
    router.getMany(['root/doc:a@1', 'root/doc:a@2', 'root/doc:b@1']);
    expect(router.invalidate('root/doc:a@1')).toBe(true);
    expect(router.invalidate('root/doc:a@1')).toBe(false);
    expect(router.invalidatePrefix('root/doc:a')).toBe(1);
    router.get('root/doc:b@1');
    router.get('root/doc:a@2');
    expect(calls).toEqual(['root/doc:a@1', 'root/doc:a@2', 'root/doc:b@1', 'root/doc:a@2']);
  });

  it('stores derived pages under a versioned parent and walks the lineage', () => {
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer());
    const doc = router.get('root/doc:a@1');
    const chunk = { address: new PageAddress('root', 'chunk', 'a-0', 1), parentAddress: doc.address, text: 'hello' };
    router.storePage(chunk);
    expect(router.lineage(chunk.address).map((page) => page.address.format())).toEqual(['root/doc:a@1', 'root/chunk:a-0@1']);
  });

  it('rejects broken provenance', () => {
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer());
    const parent = router.get('root/doc:a@1').address;
    const child = (id: string, parentAddress: PageAddress) => ({ address: new PageAddress('root', 'chunk', id, 1), parentAddress });

    expect(() => { router.storePage(child('x', new PageAddress('root', 'doc', 'missing', 1))); }).toThrow(ProvenanceError);
    expect(() => { router.storePage({ address: new PageAddress('root', 'doc', 'b', 1), parentAddress: parent }); }).toThrow('same page type');

    router.get('root/doc:u');
    expect(() => { router.storePage(child('y', new PageAddress('root', 'doc', 'u'))); }).toThrow('fixed version');

    router.storePage(child('z', parent));
    expect(() => { router.storePage(child('z', parent)); }).toThrow('already exists');
  });

  it('applies the same provenance rules on the async path', async () => {
    const router = new PageRouter({ root: 'root', store: new RedisPageStore({}, new FakeRedisHashClient()) });
    router.route('doc', docProducer());
    const parent = (await router.getAsync('root/doc:a@1')).address;
    const chunk = { address: new PageAddress('root', 'chunk', 'c', 1), parentAddress: parent };
    await router.storePageAsync(chunk);
    await expect(router.storePageAsync(chunk)).rejects.toBeInstanceOf(ProvenanceError);
    const lineage = await router.lineageAsync(chunk.address);
    expect(lineage.map((page) => page.address.format())).toEqual(['root/doc:a@1', 'root/chunk:c@1']);
    await expect(router.invalidatePrefixAsync('root/chunk:c')).resolves.toBe(1);
    await expect(router.invalidateAsync('root/doc:a@1')).resolves.toBe(true);
  });

  it('lists the children of a page and finds its latest fresh version', () => {
    const router = new PageRouter({ root: 'root' });
    router.route('doc', docProducer());
    const doc = router.get('root/doc:d@1');
    const second = { address: new PageAddress('root', 'chunk', 'c2', 1), parentAddress: doc.address };
    const first = { address: new PageAddress('root', 'chunk', 'c1', 1), parentAddress: doc.address };
    router.storePage(second);
    router.storePage(first);
    expect(router.children(doc.address).map((page) => page.address.format())).toEqual(['root/chunk:c1@1', 'root/chunk:c2@1']);
    expect(router.children('root/chunk:c1@1')).toEqual([]);

    router.get('root/doc:d@3');
    expect(router.latestPage('root/doc:d')?.address.format()).toBe('root/doc:d@3');
    expect(router.latestPage('root/doc:none')).toBeUndefined();
    router.validators.register('doc', syncValidator(() => false));
    expect(router.latestPage('root/doc:d')).toBeUndefined();
  });

  it('lists children and the latest version through an async store', async () => {
    const router = new PageRouter({ root: 'root', store: new RedisPageStore({}, new FakeRedisHashClient()) });
    router.route('doc', docProducer());
    const doc = await router.getAsync('root/doc:d@2');
    const chunk = { address: new PageAddress('root', 'chunk', 'c', 1), parentAddress: doc.address };
    await router.storePageAsync(chunk);
    const children = await router.childrenAsync('root/doc:d@2');
    expect(children.map((page) => page.address.format())).toEqual(['root/chunk:c@1']);
    expect(children[0]?.parentAddress?.equals(doc.address)).toBe(true);
    await expect(router.latestPageAsync('root/doc:d')).resolves.toMatchObject({ title: 'Document d' });
    await expect(router.latestPageAsync('root/chunk:missing')).resolves.toBeUndefined();
  });
});

describe('PageRouter cached page fidelity', () => {
  interface EventPage extends Page {
    start: Date;
  }

  it('serves dates from cache as Date values', () => {
    let calls = 0;
    const router = new PageRouter({ root: 'r' });
    router.route('event', syncProducer<EventPage>((address) => {
      calls += 1;
      return { address, start: new Date(0) };
    }));
    const first = router.get('r/event:1');
    const second = router.get('r/event:1');
    expect(calls).toBe(1);
    expect(first).toMatchObject({ start: new Date(0) });
    const start = 'start' in second ? second.start : undefined;
    expect(start).toBeInstanceOf(Date);
    expect(start).toEqual(new Date(0));
  });

  interface ChunkPage extends Page {
    text: string;
  }

  const chunkProducer = (calls: string[]) => syncProducer<ChunkPage>((address) => {
    calls.push(address.format());
    return { address, text: 'fresh' };
  });

  it('re-produces a cached page whose ancestor fails its validator', () => {
    const calls: string[] = [];
    const entries: LogEntry[] = [];
    const router = new PageRouter({ root: 'r', log: (entry) => { entries.push(entry); } });
    router.route('doc', docProducer());
    router.route('chunk', chunkProducer(calls));
    const doc = router.get('r/doc:d@1');
    const chunk: ChunkPage = { address: new PageAddress('r', 'chunk', 'c', 1), parentAddress: doc.address, text: 'derived' };
    router.storePage(chunk);
    expect(router.get('r/chunk:c@1')).toMatchObject({ text: 'derived' });

    router.validators.register('doc', syncValidator(() => false));
    expect(router.get('r/chunk:c@1', { allowStale: true })).toMatchObject({ text: 'derived' });
    expect(router.get('r/chunk:c@1')).toMatchObject({ text: 'fresh' });
    expect(calls).toEqual(['r/chunk:c@1']);
    expect(entries.filter((entry) => entry.severity === 'VRB').map((entry) => entry.message)).toEqual(['ancestor r/doc:d@1 failed validation']);
  });

  it('checks every ancestor on the async path', async () => {
    const calls: string[] = [];
    const router = new PageRouter({ root: 'r', store: new RedisPageStore({}, new FakeRedisHashClient()) });
    router.route('doc', docProducer());
    router.route('chunk', docProducer());
    router.route('line', chunkProducer(calls));
    const doc = await router.getAsync('r/doc:d@1');
    const chunk = await router.getAsync('r/chunk:c@1');
    const stored = { address: chunk.address, parentAddress: doc.address, title: 'derived' };
    await router.invalidateAsync(chunk.address);
    await router.storePageAsync(stored);
    const line: ChunkPage = { address: new PageAddress('r', 'line', 'l', 1), parentAddress: chunk.address, text: 'derived' };
    await router.storePageAsync(line);
    await expect(router.getAsync('r/line:l@1')).resolves.toMatchObject({ text: 'derived' });

    router.validators.register('doc', suspendingValidator(() => Promise.resolve(false)));
    await expect(router.getAsync('r/line:l@1')).resolves.toMatchObject({ text: 'fresh' });
    expect(calls).toEqual(['r/line:l@1']);
  });
});
