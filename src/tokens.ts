export interface Tokenizer {
  countText: (text: string) => number;
}

export const APPROXIMATE_CHARS_PER_TOKEN = 4;

export const approximateTokenizer: Tokenizer = {
  countText: (text: string): number => {
    if (text.length === 0) return 0;
    // Rough heuristic: 4 characters ≈ 1 token, clamp to at least 1.
    return Math.max(1, Math.ceil(text.length / APPROXIMATE_CHARS_PER_TOKEN));
  },
};

/** Token estimate of a value's JSON rendering. */
export const estimateTokens = (value: unknown, tokenizer: Tokenizer = approximateTokenizer): number => {
  if (typeof value === 'string') return tokenizer.countText(value);
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch {
    text = String(value);
  }
  return tokenizer.countText(text ?? '');
};
