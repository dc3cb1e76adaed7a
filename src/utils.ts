export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export const isPromiseLike = (value: unknown): value is PromiseLike<unknown> => (
  value !== null
  && (typeof value === 'object' || typeof value === 'function')
  && 'then' in value
  && typeof value.then === 'function'
);

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Library-level warnings go through an injectable sink; silent until one is installed.
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* a failing sink must not break the caller */
  }
}
