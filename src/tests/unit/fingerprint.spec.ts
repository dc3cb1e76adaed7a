import { describe, expect, it } from 'vitest';

import { PageAddress } from '../../address.js';
import { approximateTokenizer, estimateTokens } from '../../tokens.js';
import { fingerprintCall, functionIdentity, sha256Hex, stableStringify } from '../../tools/fingerprint.js';

describe('stableStringify', () => {
  it('sorts object keys at every depth and keeps array order', () => {
    expect(stableStringify({ b: 1, a: { d: [2, 1], c: null } })).toBe('{"a":{"c":null,"d":[2,1]},"b":1}');
  });

  it('renders addresses and dates through toJSON', () => {
    expect(stableStringify({ at: new Date(Date.UTC(2024, 0, 2)), page: new PageAddress('r', 'doc', '1', 3) }))
      .toBe('{"at":"2024-01-02T00:00:00.000Z","page":"r/doc:1@3"}');
  });

  it('renders undefined as null', () => {
    expect(stableStringify(undefined)).toBe('null');
  });
});

describe('fingerprintCall', () => {
  function search(): void {}
  function other(): void {}

  it('ignores key order but not values or the function', () => {
    const key = fingerprintCall(search, { query: 'q', limit: 1 });
    expect(fingerprintCall(search, { limit: 1, query: 'q' })).toBe(key);
    expect(fingerprintCall(search, { query: 'q', limit: 2 })).not.toBe(key);
    expect(fingerprintCall(other, { query: 'q', limit: 1 })).not.toBe(key);
    expect(key).toMatch(/^[0-9a-f]{64}$/);
  });

  it('numbers each function once', () => {
    const identity = functionIdentity(search);
    expect(identity).toMatch(/^search#\d+$/);
    expect(functionIdentity(search)).toBe(identity);
    expect(functionIdentity(() => undefined)).toMatch(/^anonymous#\d+$/);
  });

  it('hashes with sha256', () => {
    expect(sha256Hex('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});

describe('estimateTokens', () => {
  it('counts about four characters per token', () => {
    expect(approximateTokenizer.countText('')).toBe(0);
    expect(approximateTokenizer.countText('abc')).toBe(1);
    expect(estimateTokens('abcdefghi')).toBe(3);
    expect(estimateTokens({ a: 1 })).toBe(2);
  });

  it('takes a custom tokenizer', () => {
    expect(estimateTokens('one two three', { countText: (text) => text.split(' ').length })).toBe(3);
  });
});
