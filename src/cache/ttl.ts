export type DurationInput = number | string | null | undefined;

const UNIT_TO_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h|d|w)$/i;

/**
 * Milliseconds for `1500`, `'1500'`, `'1.5s'`, `'5m'`, `'2h'`, `'1d'` or `'1w'`.
 * Returns undefined for anything else, including negatives.
 */
export const parseDurationMs = (value: DurationInput): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) return undefined;
    return Math.trunc(value);
  }
  const lowered = value.trim().toLowerCase();
  if (lowered.length === 0) return undefined;
  if (/^\d+(\.\d+)?$/.test(lowered)) {
    return Math.trunc(Number.parseFloat(lowered));
  }
  const match = DURATION_PATTERN.exec(lowered);
  if (match === null) return undefined;
  const amount = Number.parseFloat(match[1]);
  const ms = amount * UNIT_TO_MS[match[2]];
  if (!Number.isFinite(ms) || ms < 0) return undefined;
  return Math.trunc(ms);
};

export const parseDurationMsStrict = (value: DurationInput, context: string): number => {
  const parsed = parseDurationMs(value);
  if (parsed === undefined) {
    throw new Error(`${context} duration must be a millisecond number, or a duration like 500ms/5m/2h/1d`);
  }
  return parsed;
};

/**
 * Tool cache TTL: `null`, `undefined`, `'none'` and `'never'` mean entries never expire
 * (returns undefined); everything else must parse as a duration.
 */
export const parseTtlMs = (value: DurationInput, context: string): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string' && ['none', 'never'].includes(value.trim().toLowerCase())) return undefined;
  return parseDurationMsStrict(value, context);
};
