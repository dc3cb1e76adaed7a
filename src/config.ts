import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import type { PageStore } from './cache/types.js';
import type { LogCallback } from './types.js';

import { parseDurationMs } from './cache/ttl.js';
import { createPageStore } from './cache/store-factory.js';
import { PageContext } from './context.js';
import { DEFAULT_DISPATCH_CONCURRENCY } from './dispatch-queue.js';
import { createStructuredLogger } from './logging/structured-logger.js';
import { DEFAULT_TOOL_MAX_ITEMS, DEFAULT_TOOL_MAX_TOKENS } from './tools/types.js';
import { makeLogEntry } from './types.js';
import { setWarningSink } from './utils.js';

const CONFIG_FILE_NAME = '.pagekit.json';

const DurationSchema = z.union([z.number().nonnegative(), z.string()]).superRefine((value, ctx) => {
  if (typeof value === 'string' && ['none', 'never'].includes(value.trim().toLowerCase())) return;
  if (parseDurationMs(value) === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected milliseconds or a duration like 500ms/5m/2h/1d' });
  }
});

const CacheSchema = z.object({
  backend: z.enum(['memory', 'sqlite', 'redis']).default('memory'),
  sqlite: z.object({
    path: z.string().min(1).optional(),
  }).optional(),
  redis: z.object({
    url: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    database: z.number().int().nonnegative().optional(),
    keyPrefix: z.string().optional(),
  }).optional(),
  maxEntries: z.number().int().positive().default(5000),
});

const DispatchSchema = z.object({
  concurrency: z.number().int().positive().default(DEFAULT_DISPATCH_CONCURRENCY),
});

const ToolsSchema = z.object({
  maxItems: z.number().int().positive().default(DEFAULT_TOOL_MAX_ITEMS),
  maxTokens: z.number().int().positive().default(DEFAULT_TOOL_MAX_TOKENS),
  ttl: DurationSchema.optional(),
});

const LoggingSchema = z.object({
  formats: z.array(z.enum(['logfmt', 'json', 'none'])).default(['logfmt']),
  labels: z.record(z.string(), z.string()).default({}),
  minSeverity: z.enum(['ERR', 'WRN', 'VRB', 'TRC']).default('VRB'),
  color: z.boolean().default(false),
});

export const PageKitConfigSchema = z.object({
  root: z.string().refine((value) => !value.includes('/'), { message: "root cannot contain '/'" }),
  cache: CacheSchema.default({}),
  dispatch: DispatchSchema.default({}),
  tools: ToolsSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type PageKitConfig = z.output<typeof PageKitConfigSchema>;
export type PageKitConfigInput = z.input<typeof PageKitConfigSchema>;

function expandEnv(str: string, env: NodeJS.ProcessEnv): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (env[name] ?? ''));
}

function expandDeep(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') return expandEnv(obj, env);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env);
      return acc;
    }, {});
  }
  return obj;
}

function resolveConfigPath(configPath?: string): string {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new Error(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const local = path.join(process.cwd(), CONFIG_FILE_NAME);
  if (fs.existsSync(local)) return local;
  const home = path.join(os.homedir(), CONFIG_FILE_NAME);
  if (fs.existsSync(home)) return home;
  throw new Error(`Configuration file not found. Create ${CONFIG_FILE_NAME} or pass a path`);
}

/** Validate an already-loaded configuration object, filling defaults. */
export function parseConfiguration(value: unknown, source = 'configuration'): PageKitConfig {
  const parsed = PageKitConfigSchema.safeParse(value);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed in ${source}:\n${msgs}`);
  }
  return parsed.data;
}

/**
 * Read a JSON configuration file (explicit path, else `./.pagekit.json`, else
 * `~/.pagekit.json`), expand `${VAR}` references from the environment and validate it.
 */
export function loadConfiguration(configPath?: string, env: NodeJS.ProcessEnv = process.env): PageKitConfig {
  const resolved = resolveConfigPath(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new Error(`Failed to read configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseConfiguration(expandDeep(json, env), resolved);
}

export interface CreateContextOptions {
  // Overrides the configured store (tests pass a memory store or a fake-backed Redis store)
  store?: PageStore;
  // Overrides the logger built from `config.logging`
  log?: LogCallback;
}

/** Build a context from configuration: store, logger, router and validators. */
export function createContext(config: PageKitConfig, opts: CreateContextOptions = {}): PageContext {
  const log = opts.log ?? createStructuredLogger({
    formats: config.logging.formats,
    labels: config.logging.labels,
    minSeverity: config.logging.minSeverity,
    color: config.logging.color,
  }).callback;
  if (opts.log === undefined) {
    setWarningSink((message) => {
      log(makeLogEntry('WRN', 'context', message));
    });
  }
  const store = opts.store ?? createPageStore(config.cache);
  return new PageContext({
    root: config.root,
    store,
    log,
    dispatchConcurrency: config.dispatch.concurrency,
    toolDefaults: config.tools,
  });
}
