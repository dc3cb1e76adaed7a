import type { DurationInput } from '../cache/ttl.js';
import type { PageAttributes } from '../page.js';
import type { CacheInvalidator } from './tool-cache.js';
import type { ZodObject, ZodRawShape } from 'zod';

export type ToolSchema = ZodObject<ZodRawShape>;

// 'pages': the function returns an array of items.
// 'paginated': the function takes a cursor and returns a PaginatedResponse.
export type ToolReturnKind = 'pages' | 'paginated';

export const TOOL_RETURN_KINDS: readonly ToolReturnKind[] = ['pages', 'paginated'];

export type ToolFunction = (args: Record<string, unknown>) => unknown;

export interface ToolOptions<S extends ToolSchema = ToolSchema> {
  name?: string;
  description?: string;
  input: S;
  returns: ToolReturnKind;
  cache?: boolean;
  ttl?: DurationInput;
  invalidator?: CacheInvalidator;
  // Slice array results into cursor pages on invoke
  paginate?: boolean;
  maxItems?: number;
  maxTokens?: number;
}

export interface ToolDefaults {
  maxItems: number;
  maxTokens: number;
  ttl?: DurationInput;
}

export const DEFAULT_TOOL_MAX_ITEMS = 20;
export const DEFAULT_TOOL_MAX_TOKENS = 2048;

export const NO_DOCUMENTS_FOUND = 'error_no_documents_found';

export interface ToolResultsResponse {
  results: PageAttributes[];
  next_cursor?: string | null;
}

export interface ToolNotFoundResponse {
  response_code: typeof NO_DOCUMENTS_FOUND;
  references: [];
  error_message: string;
}

export type ToolResponse = ToolResultsResponse | ToolNotFoundResponse;

export type ToolInput = string | Record<string, unknown>;

// Sees the raw items of every successful invoke before serialization.
export type ToolCallback = (toolName: string, items: readonly unknown[]) => void;

export const isNotFoundResponse = (response: ToolResponse): response is ToolNotFoundResponse =>
  'response_code' in response;
