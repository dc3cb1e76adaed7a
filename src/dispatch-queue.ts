interface Waiter {
  start: () => void;
  startTs: number;
}

export interface DispatchStatus {
  capacity: number;
  inUse: number;
  waiting: number;
}

interface DispatchListeners {
  onDepthChange?: (info: DispatchStatus) => void;
  onWaitComplete?: (waitMs: number) => void;
}

export const DEFAULT_DISPATCH_CONCURRENCY = 8;

/**
 * Bounded lane for blocking producers reached from the suspending path. Each job starts on
 * its own macrotask (`setImmediate`), so between two blocking jobs the event loop gets a turn
 * and suspending siblings in the same batch keep moving.
 */
export class DispatchQueue {
  private readonly capacity: number;
  private inUse = 0;
  private readonly waiters: Waiter[] = [];
  private listeners: DispatchListeners = {};

  constructor(capacity: number = DEFAULT_DISPATCH_CONCURRENCY) {
    this.capacity = Math.max(1, Math.trunc(Number.isFinite(capacity) ? capacity : DEFAULT_DISPATCH_CONCURRENCY));
  }

  setListeners(listeners: DispatchListeners): void {
    this.listeners = listeners;
  }

  getStatus(): DispatchStatus {
    return { capacity: this.capacity, inUse: this.inUse, waiting: this.waiters.length };
  }

  async run<T>(job: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await new Promise<T>((resolve, reject) => {
        setImmediate(() => {
          try {
            Promise.resolve(job()).then(resolve, reject);
          } catch (e) {
            reject(e);
          }
        });
      });
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (this.inUse < this.capacity) {
      this.inUse += 1;
      this.emitDepth();
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push({ start: resolve, startTs: Date.now() });
      this.emitDepth();
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next === undefined) {
      if (this.inUse > 0) this.inUse -= 1;
      this.emitDepth();
      return;
    }
    // The slot passes straight to the next waiter; inUse is unchanged.
    try {
      next.start();
    } finally {
      this.listeners.onWaitComplete?.(Date.now() - next.startTs);
    }
    this.emitDepth();
  }

  private emitDepth(): void {
    this.listeners.onDepthChange?.(this.getStatus());
  }
}
