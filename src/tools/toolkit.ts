import type { LogCallback, LogEntry } from '../types.js';
import type { InvokeOptions } from './tool.js';
import type { ToolDefaults, ToolFunction, ToolInput, ToolOptions, ToolResponse, ToolSchema } from './types.js';
import type { z } from 'zod';

import { UnknownToolError } from '../errors.js';
import { makeLogEntry } from '../types.js';

import { Tool } from './tool.js';
import { ToolCache } from './tool-cache.js';

export interface ToolkitOptions {
  name?: string;
  log?: LogCallback;
  defaults?: Partial<ToolDefaults>;
  now?: () => number;
}

export type ToolkitClass<T extends Toolkit> = abstract new (...args: never[]) => T;

type PendingTool = (instance: Toolkit) => void;

// Declarative registrations, per class; materialized by each instance's constructor.
const pendingTools = new WeakMap<object, PendingTool[]>();

/**
 * Named collection of tools sharing one result cache.
 *
 * Tools are added with {@link Toolkit.registerTool}, or declared on a subclass with
 * `MyToolkit.tool(options)(fn)`: every instance of `MyToolkit` (or of its subclasses)
 * registers those functions with `this` bound to itself.
 */
export class Toolkit {
  readonly name: string;
  readonly cache: ToolCache;
  private readonly registry = new Map<string, Tool>();
  private readonly log?: LogCallback;
  private readonly defaults?: Partial<ToolDefaults>;

  constructor(opts: ToolkitOptions = {}) {
    this.name = opts.name ?? this.constructor.name;
    this.log = opts.log;
    this.defaults = opts.defaults;
    this.cache = new ToolCache({ now: opts.now });
    this.registerPendingTools();
  }

  /**
   * Queue `fn` for registration on every future instance of this class. Returns `fn`
   * unchanged, so it can still be called directly.
   */
  static tool<T extends Toolkit, S extends ToolSchema>(this: ToolkitClass<T>, options: ToolOptions<S>) {
    const owner = this;
    return <F extends (this: T, args: z.output<S>) => unknown>(fn: F): F => {
      const bucket = pendingTools.get(owner) ?? [];
      bucket.push((instance) => {
        if (!(instance instanceof owner)) return;
        const bound = (args: z.output<S>): unknown => fn.call(instance, args);
        instance.registerTool(bound, { ...options, name: options.name ?? fn.name });
      });
      pendingTools.set(owner, bucket);
      return fn;
    };
  }

  /** Add a tool; a tool already registered under the same name is replaced. */
  registerTool<S extends ToolSchema>(fn: (args: z.output<S>) => unknown, options: ToolOptions<S>): Tool;
  registerTool(fn: ToolFunction, options: ToolOptions): Tool;
  registerTool(fn: ToolFunction, options: ToolOptions): Tool {
    const tool = new Tool(fn, options, { cache: this.cache, log: this.log, defaults: this.defaults });
    if (this.registry.has(tool.name)) {
      this.emit(makeLogEntry('VRB', 'toolkit', `replacing tool '${tool.name}'`, { tool: tool.name }));
    }
    this.registry.set(tool.name, tool);
    this.emit(makeLogEntry('TRC', 'toolkit', `registered tool '${tool.name}'`, {
      tool: tool.name,
      details: { returns: tool.returns, cache: String(tool.cacheEnabled), paginate: String(tool.paginate) },
    }));
    return tool;
  }

  getTool(name: string): Tool {
    const tool = this.registry.get(name);
    if (tool === undefined) throw new UnknownToolError(name);
    return tool;
  }

  hasTool(name: string): boolean {
    return this.registry.has(name);
  }

  unregisterTool(name: string): boolean {
    return this.registry.delete(name);
  }

  get tools(): Tool[] {
    return [...this.registry.values()];
  }

  get toolNames(): string[] {
    return [...this.registry.keys()];
  }

  /** Direct call by name: validated and cached, never paginated. */
  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    return await this.getTool(name).call(args);
  }

  async invokeTool(name: string, raw: ToolInput, opts?: InvokeOptions): Promise<ToolResponse> {
    const tool = this.getTool(name);
    this.emit(makeLogEntry('VRB', 'toolkit', `invoking tool '${name}'`, { tool: name }));
    return await tool.invoke(raw, opts);
  }

  /** Tool summaries, one line each, for prompt building. */
  describe(): string {
    return this.tools.map((tool) => tool.describe()).join('\n');
  }

  clearCache(): void {
    this.cache.clear();
  }

  private registerPendingTools(): void {
    const chain: object[] = [];
    let ctor: unknown = this.constructor;
    while (typeof ctor === 'function' && ctor !== Toolkit && ctor !== Object) {
      chain.unshift(ctor);
      ctor = Object.getPrototypeOf(ctor);
    }
    // Ancestors first, so a subclass declaration under the same name wins.
    chain.forEach((owner) => {
      pendingTools.get(owner)?.forEach((register) => { register(this); });
    });
  }

  private emit(entry: LogEntry): void {
    try {
      this.log?.(entry);
    } catch {
      // a failing log sink must not fail registration
    }
  }
}
