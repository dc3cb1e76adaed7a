import type { Page } from './page.js';
import type { LogCallback, LogEntry } from './types.js';

import { describeError } from './errors.js';
import { makeLogEntry } from './types.js';
import { isPromiseLike } from './utils.js';

export type SyncPredicate<P extends Page = Page> = (page: P) => boolean;
export type SuspendingPredicate<P extends Page = Page> = (page: P) => Promise<boolean>;

/**
 * Freshness check for one page type, tagged by how it runs. `check` is declared as a
 * method so a validator for a page subtype can sit in the registry's `Validator<Page>` map.
 */
export type Validator<P extends Page = Page> =
  | { readonly kind: 'sync'; check(page: P): boolean }
  | { readonly kind: 'suspending'; check(page: P): Promise<boolean> };

export const syncValidator = <P extends Page>(check: SyncPredicate<P>): Validator<P> => ({ kind: 'sync', check });

export const suspendingValidator = <P extends Page>(check: SuspendingPredicate<P>): Validator<P> => ({ kind: 'suspending', check });

export interface ValidatorRegistryOptions {
  log?: LogCallback;
}

/**
 * Per-type freshness predicates. A type without a predicate is always valid; a predicate
 * that throws, rejects, or cannot run on the calling path makes the page invalid.
 */
export class ValidatorRegistry {
  private readonly validators = new Map<string, Validator>();
  private readonly log?: LogCallback;

  constructor(opts: ValidatorRegistryOptions = {}) {
    this.log = opts.log;
  }

  get size(): number {
    return this.validators.size;
  }

  /** Registering again for the same type replaces the previous predicate. */
  register<P extends Page>(type: string, validator: Validator<P>): void {
    if (this.validators.has(type)) {
      this.emit(makeLogEntry('WRN', 'validator', `replacing validator for page type: ${type}`, { type }));
    }
    // Predicates only ever see pages routed under their own type.
    this.validators.set(type, validator);
    this.emit(makeLogEntry('TRC', 'validator', `registered ${validator.kind} validator for page type: ${type}`, { type }));
  }

  unregister(type: string): boolean {
    return this.validators.delete(type);
  }

  hasValidator(type: string): boolean {
    return this.validators.has(type);
  }

  /**
   * Blocking check. Never waits: a suspending predicate cannot be driven from here, so the
   * page counts as stale.
   */
  isValid(page: Page, type: string = page.address.type): boolean {
    const validator = this.validators.get(type);
    if (validator === undefined) return true;
    const address = page.address.format();
    if (validator.kind === 'suspending') {
      this.emit(makeLogEntry('WRN', 'validator', 'suspending validator reached from a blocking lookup; treating page as stale (use getAsync)', { address, type }));
      return false;
    }
    let result: unknown;
    try {
      result = validator.check(page);
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'validator', `validator error: ${describeError(e)}`, { address, type }));
      return false;
    }
    if (isPromiseLike(result)) {
      // Declared sync but returned a promise: observe it so a rejection stays handled.
      result.then(undefined, (e: unknown) => {
        this.emit(makeLogEntry('WRN', 'validator', `validator error: ${describeError(e)}`, { address, type }));
      });
      this.emit(makeLogEntry('WRN', 'validator', 'sync validator returned a promise; treating page as stale', { address, type }));
      return false;
    }
    const valid = result === true;
    if (!valid) {
      this.emit(makeLogEntry('TRC', 'validator', 'page failed validation', { address, type }));
    }
    return valid;
  }

  async isValidAsync(page: Page, type: string = page.address.type): Promise<boolean> {
    const validator = this.validators.get(type);
    if (validator === undefined) return true;
    const address = page.address.format();
    try {
      const valid = (await validator.check(page)) === true;
      if (!valid) {
        this.emit(makeLogEntry('TRC', 'validator', 'page failed validation', { address, type }));
      }
      return valid;
    } catch (e) {
      this.emit(makeLogEntry('WRN', 'validator', `validator error: ${describeError(e)}`, { address, type }));
      return false;
    }
  }

  clear(): void {
    this.validators.clear();
    this.emit(makeLogEntry('TRC', 'validator', 'cleared all page validators'));
  }

  private emit(entry: LogEntry): void {
    try {
      this.log?.(entry);
    } catch {
      // logging never changes a validity outcome
    }
  }
}
