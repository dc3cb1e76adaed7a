import { PageAddress } from './address.js';
import { isPlainObject } from './utils.js';

export interface Page {
  readonly address: PageAddress;
  readonly parentAddress?: PageAddress;
}

export type PageAttributes = Record<string, unknown>;

const ADDRESS_TAG = '$address';
const DATE_TAG = '$date';

const encodeValue = (value: unknown): unknown => {
  if (value instanceof PageAddress) return { [ADDRESS_TAG]: value.format() };
  if (value instanceof Date) return { [DATE_TAG]: value.toISOString() };
  if (Array.isArray(value)) return value.map((item) => encodeValue(item));
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, nested]) => [key, encodeValue(nested)]));
  }
  return value;
};

const decodeValue = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map((item) => decodeValue(item));
  if (isPlainObject(value)) {
    const keys = Object.keys(value);
    if (keys.length === 1) {
      const address = value[ADDRESS_TAG];
      if (typeof address === 'string') return PageAddress.parse(address);
      const date = value[DATE_TAG];
      if (typeof date === 'string') return new Date(date);
    }
    return Object.fromEntries(Object.entries(value).map(([key, nested]) => [key, decodeValue(nested)]));
  }
  return value;
};

/**
 * Encode a page for a {@link PageStore}. Addresses and dates at any depth are written as
 * `{"$address": "<canonical>"}` and `{"$date": "<iso>"}` so {@link decodePagePayload} can revive them.
 */
export function encodePagePayload(page: Page): string {
  return JSON.stringify(encodeValue(page));
}

export function decodePagePayload(payload: string): Page | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return undefined;
  }
  const decoded = decodeValue(raw);
  if (!isPage(decoded)) return undefined;
  return decoded;
}

export function isPage(value: unknown): value is Page {
  if (!isPlainObject(value)) return false;
  if (!PageAddress.isAddress(value.address)) return false;
  return value.parentAddress === undefined || PageAddress.isAddress(value.parentAddress);
}

const plainValue = (value: unknown): unknown => {
  if (value instanceof PageAddress) return value.format();
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((item) => plainValue(item));
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, nested]) => nested !== undefined)
        .map(([key, nested]) => [key, plainValue(nested)])
    );
  }
  return value;
};

/** Plain attribute map of a page (or any result item); addresses become canonical strings. */
export function serializePage(item: unknown): PageAttributes {
  const plain = plainValue(item);
  return isPlainObject(plain) ? plain : { value: plain };
}
