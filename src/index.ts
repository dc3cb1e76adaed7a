// Main library exports for programmatic use
export { DEFAULT_VERSION, PageAddress } from './address.js';
export type { PageAddressFields, PageAddressInput } from './address.js';
export { decodePagePayload, encodePagePayload, isPage, serializePage } from './page.js';
export type { Page, PageAttributes } from './page.js';

export { PageRouter } from './router.js';
export type { GetOptions, PageRouterOptions, RouteInfo, RouteOptions } from './router.js';
export { suspendingProducer, syncProducer } from './producers.js';
export type { Producer } from './producers.js';
export { DEFAULT_DISPATCH_CONCURRENCY, DispatchQueue } from './dispatch-queue.js';
export type { DispatchStatus } from './dispatch-queue.js';
export { ValidatorRegistry, suspendingValidator, syncValidator } from './validators.js';
export type { Validator, ValidatorRegistryOptions } from './validators.js';

export { MemoryPageStore } from './cache/memory-store.js';
export { SQLitePageStore } from './cache/sqlite-store.js';
export { DEFAULT_REDIS_KEY_PREFIX, RedisPageStore, connectRedisHashClient } from './cache/redis-store.js';
export type { RedisHashClient } from './cache/redis-store.js';
export { createPageStore, normalizeCacheConfig } from './cache/store-factory.js';
export { parseDurationMs, parseTtlMs } from './cache/ttl.js';
export type { AsyncPageStore, CacheBackend, CacheConfig, CacheRecord, PageStore, SyncPageStore } from './cache/types.js';

export { Tool, createTool } from './tools/tool.js';
export type { InvokeOptions, ToolDeps } from './tools/tool.js';
export { Toolkit } from './tools/toolkit.js';
export type { ToolkitClass, ToolkitOptions } from './tools/toolkit.js';
export { PaginatedResponse, isPaginatedResponse, paginateList, parseOffsetCursor } from './tools/pagination.js';
export { ToolCache } from './tools/tool-cache.js';
export type { CacheInvalidator, ToolCacheStats } from './tools/tool-cache.js';
export { fingerprintCall, stableStringify } from './tools/fingerprint.js';
export { NO_DOCUMENTS_FOUND, isNotFoundResponse } from './tools/types.js';
export type {
  ToolCallback,
  ToolDefaults,
  ToolInput,
  ToolNotFoundResponse,
  ToolOptions,
  ToolResponse,
  ToolResultsResponse,
  ToolReturnKind,
  ToolSchema,
} from './tools/types.js';
export { approximateTokenizer, estimateTokens } from './tokens.js';
export type { Tokenizer } from './tokens.js';

export {
  PageContext,
  clearGlobalContext,
  getGlobalContext,
  hasGlobalContext,
  setGlobalContext,
} from './context.js';
export type { PageContextOptions } from './context.js';
export { PageKitConfigSchema, createContext, loadConfiguration, parseConfiguration } from './config.js';
export type { CreateContextOptions, PageKitConfig, PageKitConfigInput } from './config.js';

export { StructuredLogger, createStructuredLogger } from './logging/structured-logger.js';
export type { LogFormat, StructuredLoggerOptions } from './logging/structured-logger.js';
export type { LogCallback, LogComponent, LogEntry, LogSeverity } from './types.js';
export { setWarningSink } from './utils.js';

export {
  AddressMismatchError,
  BlockingDispatchError,
  ContextError,
  DuplicateRegistrationError,
  InvalidToolError,
  KIND_MEANINGS,
  MalformedAddressError,
  NoResultsError,
  PageKitError,
  ProvenanceError,
  ToolExecutionError,
  UnknownToolError,
  UnknownTypeError,
  isPageKitError,
  isRecoverableKind,
} from './errors.js';
export type { PageKitErrorKind } from './errors.js';
