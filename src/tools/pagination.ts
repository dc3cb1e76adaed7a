import { ToolExecutionError } from '../errors.js';

/**
 * One page of results plus the cursor of the next page (`null` on the last page).
 * Tools with native pagination return this; list pagination builds it.
 */
export class PaginatedResponse<T = unknown> {
  readonly results: readonly T[];
  readonly nextCursor: string | null;

  constructor(results: readonly T[], nextCursor: string | null = null) {
    this.results = results;
    this.nextCursor = nextCursor;
  }

  get length(): number {
    return this.results.length;
  }

  get hasNextPage(): boolean {
    return this.nextCursor !== null;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.results[Symbol.iterator]();
  }
}

export const isPaginatedResponse = (value: unknown): value is PaginatedResponse =>
  value instanceof PaginatedResponse;

export interface PageBudget {
  maxItems: number;
  maxTokens: number;
  // Token cost of one item
  measure: (item: unknown) => number;
}

/** Offset encoded by a list cursor; no cursor means the start. */
export const parseOffsetCursor = (cursor: string | null | undefined): number => {
  if (cursor === undefined || cursor === null) return 0;
  if (!/^\d+$/.test(cursor.trim())) {
    throw new ToolExecutionError('invalid_parameters', `Invalid cursor: ${cursor}`, { details: { cursor } });
  }
  const offset = Number.parseInt(cursor.trim(), 10);
  if (!Number.isSafeInteger(offset)) {
    throw new ToolExecutionError('invalid_parameters', `Invalid cursor: ${cursor}`, { details: { cursor } });
  }
  return offset;
};

/**
 * Slice one page out of a full result list. Items are taken from the cursor offset while
 * fewer than `maxItems` are taken and the running token estimate stays within `maxTokens`;
 * the first item of a page is always taken so an oversized item cannot stall the cursor.
 */
export const paginateList = <T>(items: readonly T[], cursor: string | null | undefined, budget: PageBudget): PaginatedResponse<T> => {
  const start = parseOffsetCursor(cursor);
  const page: T[] = [];
  let tokens = 0;
  let index = start;
  while (index < items.length && page.length < budget.maxItems) {
    const item = items[index];
    const cost = budget.measure(item);
    if (page.length > 0 && tokens + cost > budget.maxTokens) break;
    page.push(item);
    tokens += cost;
    index += 1;
  }
  const nextCursor = index < items.length ? String(index) : null;
  return new PaginatedResponse(page, nextCursor);
};
