import { z } from 'zod';

import type { LogCallback, LogEntry } from '../types.js';
import type { ToolCache } from './tool-cache.js';
import type {
  ToolCallback,
  ToolDefaults,
  ToolFunction,
  ToolInput,
  ToolNotFoundResponse,
  ToolOptions,
  ToolResponse,
  ToolReturnKind,
  ToolSchema,
} from './types.js';

import { parseTtlMs } from '../cache/ttl.js';
import { InvalidToolError, NoResultsError, ToolExecutionError, describeError, isPageKitError } from '../errors.js';
import { serializePage } from '../page.js';
import { estimateTokens } from '../tokens.js';
import { makeLogEntry } from '../types.js';

import { fingerprintCall } from './fingerprint.js';
import { PaginatedResponse, isPaginatedResponse, paginateList } from './pagination.js';
import {
  DEFAULT_TOOL_MAX_ITEMS,
  DEFAULT_TOOL_MAX_TOKENS,
  NO_DOCUMENTS_FOUND,
  TOOL_RETURN_KINDS,
} from './types.js';

const CURSOR_FIELD = 'cursor';
const NO_RESULTS_PATTERN = /no (matching )?(results|documents) found/i;

export interface ToolDeps {
  cache: ToolCache;
  log?: LogCallback;
  defaults?: Partial<ToolDefaults>;
}

export interface InvokeOptions {
  callbacks?: readonly ToolCallback[];
}

const zodTypeLabel = (schema: z.ZodTypeAny): string => {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return zodTypeLabel(schema.unwrap());
  if (schema instanceof z.ZodDefault) return zodTypeLabel(schema.removeDefault());
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodDate) return 'date';
  if (schema instanceof z.ZodArray) return `${zodTypeLabel(schema.element)}[]`;
  if (schema instanceof z.ZodEnum) return schema.options.join('|');
  if (schema instanceof z.ZodObject) return 'object';
  return 'unknown';
};

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

const notFound = (message: string): ToolNotFoundResponse => ({
  response_code: NO_DOCUMENTS_FOUND,
  references: [],
  error_message: message,
});

const isNoResultsError = (error: unknown): boolean =>
  error instanceof NoResultsError || (error instanceof Error && NO_RESULTS_PATTERN.test(error.message));

/**
 * A retrieval function wrapped with argument validation, fingerprint-keyed caching,
 * cursor pagination and uniform serialization.
 *
 * `call` is the direct path (cached, never paginated). `invoke` is the agent path: it takes a
 * bare string or an argument map, paginates, serializes, and reports empty results as
 * `error_no_documents_found`.
 */
export class Tool {
  readonly name: string;
  readonly description: string;
  readonly returns: ToolReturnKind;
  readonly input: ToolSchema;
  readonly cacheEnabled: boolean;
  readonly ttlMs?: number;
  readonly paginate: boolean;
  readonly maxItems: number;
  readonly maxTokens: number;
  private readonly fn: ToolFunction;
  private readonly options: ToolOptions;
  private readonly cache: ToolCache;
  private readonly log?: LogCallback;

  constructor(fn: ToolFunction, options: ToolOptions, deps: ToolDeps) {
    const name = options.name ?? fn.name;
    if (name.length === 0) {
      throw new InvalidToolError('<anonymous>', 'needs a name: pass options.name or use a named function');
    }
    this.name = name;
    this.fn = fn;
    this.options = options;
    this.cache = deps.cache;
    this.log = deps.log;
    this.validateShape(options);
    this.returns = options.returns;
    this.input = options.input;
    this.description = options.description ?? `Tool for ${name}`;
    this.cacheEnabled = options.cache ?? false;
    this.paginate = options.paginate ?? false;
    this.maxItems = options.maxItems ?? deps.defaults?.maxItems ?? DEFAULT_TOOL_MAX_ITEMS;
    this.maxTokens = options.maxTokens ?? deps.defaults?.maxTokens ?? DEFAULT_TOOL_MAX_TOKENS;
    if (!Number.isInteger(this.maxItems) || this.maxItems < 1) {
      throw new InvalidToolError(name, `maxItems must be a positive integer, got ${String(this.maxItems)}`);
    }
    if (!Number.isInteger(this.maxTokens) || this.maxTokens < 1) {
      throw new InvalidToolError(name, `maxTokens must be a positive integer, got ${String(this.maxTokens)}`);
    }
    try {
      this.ttlMs = parseTtlMs(options.ttl ?? deps.defaults?.ttl, `tool ${name} ttl`);
    } catch (e) {
      throw new InvalidToolError(name, describeError(e));
    }
  }

  /** Names of the input fields, in schema order; list-paginated tools add `cursor`. */
  get parameters(): string[] {
    const fields = Object.keys(this.input.shape);
    return this.paginate && !fields.includes(CURSOR_FIELD) ? [...fields, CURSOR_FIELD] : fields;
  }

  /** True when `invoke` answers with cursor pages. */
  get paginated(): boolean {
    return this.paginate || this.returns === 'paginated';
  }

  /** One-line summary: `- name(field: type, ...): description (pagination note)`. */
  describe(): string {
    const shape = this.input.shape;
    const params = this.parameters.map((field) => {
      const schema = shape[field];
      if (schema === undefined) return `${field}: string`;
      return `${field}${schema.isOptional() ? '?' : ''}: ${zodTypeLabel(schema)}`;
    });
    const note = this.paginate ? ` (Paginated with ${String(this.maxItems)} items per page, max ${String(this.maxTokens)} tokens)` : '';
    return `- ${this.name}(${params.join(', ')}): ${this.description}${note}`;
  }

  /** Direct call: validated, cached, never paginated. Returns the function's own result. */
  async call(args: Record<string, unknown>): Promise<unknown> {
    return await this.run(this.parseArgs(args));
  }

  async invoke(raw: ToolInput, opts: InvokeOptions = {}): Promise<ToolResponse> {
    try {
      const input = this.prepareInput(raw);
      const page = await this.resolvePage(input);
      const items = page instanceof PaginatedResponse ? page.results : page;
      if (items.length === 0) {
        return notFound(new NoResultsError().message);
      }
      opts.callbacks?.forEach((callback) => { callback(this.name, items); });
      const results = items.map((item) => serializePage(item));
      return page instanceof PaginatedResponse ? { results, next_cursor: page.nextCursor } : { results };
    } catch (e) {
      if (isNoResultsError(e)) {
        this.emit(makeLogEntry('VRB', 'tool', `no results: ${describeError(e)}`, { tool: this.name }));
        return notFound(describeError(e));
      }
      if (isPageKitError(e) && e.kind === 'invalid_parameters') throw e;
      this.emit(makeLogEntry('WRN', 'tool', `tool execution failed: ${describeError(e)}`, { tool: this.name }));
      throw new ToolExecutionError('execution_error', `tool execution failed: ${describeError(e)}`, {
        cause: e,
        details: { tool: this.name },
      });
    }
  }

  // A bare string fills the first input field.
  private prepareInput(raw: ToolInput): Record<string, unknown> {
    if (typeof raw !== 'string') return raw;
    const [first] = Object.keys(this.input.shape);
    if (first === undefined) {
      throw new ToolExecutionError('invalid_parameters', `Tool "${this.name}" takes no string input`);
    }
    return { [first]: raw };
  }

  private async resolvePage(input: Record<string, unknown>): Promise<readonly unknown[] | PaginatedResponse> {
    if (this.returns === 'paginated') {
      const value = await this.run(this.parseArgs(input));
      if (!isPaginatedResponse(value)) {
        throw new ToolExecutionError('execution_error', `Tool "${this.name}" must return a PaginatedResponse`);
      }
      return value;
    }
    if (!this.paginate) {
      return this.requireArray(await this.run(this.parseArgs(input)));
    }
    const { [CURSOR_FIELD]: cursor, ...rest } = input;
    if (cursor !== undefined && cursor !== null && typeof cursor !== 'string') {
      throw new ToolExecutionError('invalid_parameters', `Invalid cursor: ${describeError(cursor)}`);
    }
    const items = this.requireArray(await this.run(this.parseArgs(rest)));
    return paginateList(items, cursor, {
      maxItems: this.maxItems,
      maxTokens: this.maxTokens,
      measure: (item) => estimateTokens(serializePage(item)),
    });
  }

  private requireArray(value: unknown): readonly unknown[] {
    if (!Array.isArray(value)) {
      throw new ToolExecutionError('execution_error', `Tool "${this.name}" must return an array of pages`);
    }
    return value;
  }

  private parseArgs(args: Record<string, unknown>): Record<string, unknown> {
    const parsed = this.input.safeParse(args);
    if (!parsed.success) {
      throw new ToolExecutionError('invalid_parameters', `Invalid parameters for tool "${this.name}": ${formatIssues(parsed.error)}`, {
        details: { tool: this.name },
      });
    }
    return parsed.data;
  }

  private async run(args: Record<string, unknown>): Promise<unknown> {
    if (!this.cacheEnabled) return await this.fn(args);
    const key = fingerprintCall(this.fn, args);
    const hit = this.cache.lookup(key, { ttlMs: this.ttlMs, invalidator: this.options.invalidator });
    if (hit !== undefined) {
      this.emit(makeLogEntry('TRC', 'tool', 'cache hit', { tool: this.name, details: { key } }));
      return hit.value;
    }
    const value = await this.fn(args);
    this.cache.store(key, value);
    this.emit(makeLogEntry('TRC', 'tool', 'cache miss; stored result', { tool: this.name, details: { key } }));
    return value;
  }

  private validateShape(options: ToolOptions): void {
    if (!TOOL_RETURN_KINDS.includes(options.returns)) {
      throw new InvalidToolError(this.name, `must declare returns as one of ${TOOL_RETURN_KINDS.join(', ')}`);
    }
    const fields = Object.keys(options.input.shape);
    if (fields.length === 0) {
      throw new InvalidToolError(this.name, 'must declare at least one input field');
    }
    if (options.returns === 'paginated' && options.paginate === true) {
      throw new InvalidToolError(this.name, 'already returns a PaginatedResponse and cannot be paginated again');
    }
    if (options.returns === 'paginated' && !fields.includes(CURSOR_FIELD)) {
      throw new InvalidToolError(this.name, `returns a PaginatedResponse and must accept a '${CURSOR_FIELD}' input`);
    }
  }

  private emit(entry: LogEntry): void {
    try {
      this.log?.(entry);
    } catch {
      // a failing log sink must not fail a tool call
    }
  }
}

/** Typed entry point: the function sees the schema's parsed output. */
export function createTool<S extends ToolSchema>(fn: (args: z.output<S>) => unknown, options: ToolOptions<S>, deps: ToolDeps): Tool;
export function createTool(fn: ToolFunction, options: ToolOptions, deps: ToolDeps): Tool;
export function createTool(fn: ToolFunction, options: ToolOptions, deps: ToolDeps): Tool {
  return new Tool(fn, options, deps);
}
