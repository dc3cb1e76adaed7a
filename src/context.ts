import type { PageAddress, PageAddressInput } from './address.js';
import type { PageStore } from './cache/types.js';
import type { Page } from './page.js';
import type { Producer } from './producers.js';
import type { GetOptions, RouteOptions } from './router.js';
import type { Toolkit, ToolkitOptions } from './tools/toolkit.js';
import type { ToolDefaults } from './tools/types.js';
import type { LogCallback } from './types.js';

import { MemoryPageStore } from './cache/memory-store.js';
import { ContextError, DuplicateRegistrationError } from './errors.js';
import { PageRouter } from './router.js';
import { ValidatorRegistry } from './validators.js';

export interface PageContextOptions {
  root: string;
  store?: PageStore;
  log?: LogCallback;
  dispatchConcurrency?: number;
  // Applied to tools of toolkits built with toolkitOptions()
  toolDefaults?: Partial<ToolDefaults>;
}

/**
 * Everything one application needs to resolve pages: its root, store, validators, router
 * and the toolkits agents call into. Pass it explicitly, or install it once as the global
 * context for code that cannot take it as a parameter.
 */
export class PageContext {
  readonly root: string;
  readonly store: PageStore;
  readonly validators: ValidatorRegistry;
  readonly router: PageRouter;
  readonly log?: LogCallback;
  readonly toolDefaults?: Partial<ToolDefaults>;
  private readonly toolkits = new Map<string, Toolkit>();

  constructor(opts: PageContextOptions) {
    this.root = opts.root;
    this.store = opts.store ?? new MemoryPageStore();
    this.log = opts.log;
    this.toolDefaults = opts.toolDefaults;
    this.validators = new ValidatorRegistry({ log: opts.log });
    this.router = new PageRouter({
      root: opts.root,
      store: this.store,
      validators: this.validators,
      log: opts.log,
      dispatchConcurrency: opts.dispatchConcurrency,
    });
  }

  route<P extends Page>(names: string | readonly string[], producer: Producer<P>, opts?: RouteOptions): void {
    this.router.route(names, producer, opts);
  }

  createAddress(type: string, id: string, version?: number): PageAddress {
    return this.router.createAddress(type, id, version);
  }

  get(address: PageAddressInput, opts?: GetOptions): Page {
    return this.router.get(address, opts);
  }

  async getAsync(address: PageAddressInput, opts?: GetOptions): Promise<Page> {
    return await this.router.getAsync(address, opts);
  }

  getMany(addresses: readonly PageAddressInput[], opts?: GetOptions): Page[] {
    return this.router.getMany(addresses, opts);
  }

  async getManyAsync(addresses: readonly PageAddressInput[], opts?: GetOptions): Promise<Page[]> {
    return await this.router.getManyAsync(addresses, opts);
  }

  /** Options that give a toolkit this context's logger and tool defaults. */
  toolkitOptions(name?: string): ToolkitOptions {
    return { name, log: this.log, defaults: this.toolDefaults };
  }

  registerToolkit(toolkit: Toolkit): void {
    if (this.toolkits.has(toolkit.name)) {
      throw new DuplicateRegistrationError(`Toolkit already registered: ${toolkit.name}`, toolkit.name);
    }
    this.toolkits.set(toolkit.name, toolkit);
  }

  getToolkit(name: string): Toolkit {
    const toolkit = this.toolkits.get(name);
    if (toolkit === undefined) throw new ContextError(`No toolkit registered under: ${name}`);
    return toolkit;
  }

  hasToolkit(name: string): boolean {
    return this.toolkits.has(name);
  }

  get toolkitNames(): string[] {
    return [...this.toolkits.keys()];
  }

  async close(): Promise<void> {
    await this.store.close?.();
  }
}

let globalContext: PageContext | undefined;

export function setGlobalContext(context: PageContext): void {
  if (globalContext !== undefined) {
    throw new ContextError('Global context is already set; clear it before installing another');
  }
  globalContext = context;
}

export function getGlobalContext(): PageContext {
  if (globalContext === undefined) {
    throw new ContextError('Global context not set; call setGlobalContext() first');
  }
  return globalContext;
}

export function hasGlobalContext(): boolean {
  return globalContext !== undefined;
}

export function clearGlobalContext(): void {
  globalContext = undefined;
}
