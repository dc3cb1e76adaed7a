import crypto from 'node:crypto';

import { isPlainObject } from '../utils.js';

export const sha256Hex = (input: string): string =>
  crypto.createHash('sha256').update(input).digest('hex');

const sortObject = (value: Record<string, unknown>): Record<string, unknown> => (
  Object.keys(value)
    .sort((a, b) => a.localeCompare(b))
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = value[key];
      return acc;
    }, {})
);

// Addresses and dates reach the replacer already rendered through their toJSON.
export const stableStringify = (value: unknown): string => {
  try {
    const replacer = (_key: string, val: unknown): unknown => (isPlainObject(val) ? sortObject(val) : val);
    return JSON.stringify(value, replacer) ?? 'null';
  } catch {
    try {
      return JSON.stringify(String(value));
    } catch {
      return '"[unserializable]"';
    }
  }
};

// Functions have no stable printable identity, so each one seen gets a process-local number.
const functionIds = new WeakMap<object, number>();
let nextFunctionId = 1;

export const functionIdentity = (fn: object): string => {
  let id = functionIds.get(fn);
  if (id === undefined) {
    id = nextFunctionId;
    nextFunctionId += 1;
    functionIds.set(fn, id);
  }
  const name = typeof fn === 'function' && fn.name.length > 0 ? fn.name : 'anonymous';
  return `${name}#${String(id)}`;
};

/**
 * Cache key of one call: sha256 over the stable JSON of `[function identity, args]`.
 * Argument order inside objects does not matter.
 */
export const fingerprintCall = (fn: object, args: unknown): string =>
  sha256Hex(stableStringify([functionIdentity(fn), args]));
