import type { LcsMethod, TokenSequence } from '../types';

export const LCS_METHODS: readonly LcsMethod[] = ['min', 'avg', 'max'];

export function isLcsMethod(value: string): value is LcsMethod {
  return (LCS_METHODS as readonly string[]).includes(value);
}

export function parseLcsMethod(value: string): LcsMethod {
  if (!isLcsMethod(value)) {
    throw new Error(`Unknown LCS method '${value}' (expected min|avg|max)`);
  }
  return value;
}

export function assertLcsLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`LCS limit must be a positive integer, got ${limit}`);
  }
}

/** First `limit` tokens, or the whole sequence when no limit is set. */
export function limitSequence(tokens: TokenSequence, limit?: number): TokenSequence {
  if (limit === undefined || tokens.length <= limit) return tokens;
  return tokens.slice(0, limit);
}

/**
 * Length of the longest common subsequence.
 * Keeps two rows sized by the shorter sequence, so memory is O(min(m, n)).
 */
export function lcsLength(a: TokenSequence, b: TokenSequence): number {
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  const width = inner.length;
  if (outer.length === 0 || width === 0) return 0;

  let prev = new Uint32Array(width + 1);
  let curr = new Uint32Array(width + 1);
  for (let i = 1; i <= outer.length; i += 1) {
    const token = outer[i - 1];
    curr[0] = 0;
    for (let j = 1; j <= width; j += 1) {
      if (token === inner[j - 1]) {
        curr[j] = prev[j - 1] + 1;
      } else {
        curr[j] = prev[j] >= curr[j - 1] ? prev[j] : curr[j - 1];
      }
    }
    [prev, curr] = [curr, prev];
  }
  return prev[width];
}

export function lcsSimilarity(a: TokenSequence, b: TokenSequence, method: LcsMethod = 'min'): number {
  // mode is validated even for empty inputs
  const checked = parseLcsMethod(method);
  if (a.length === 0 || b.length === 0) return 0;

  const length = lcsLength(a, b);
  if (checked === 'min') return length / Math.min(a.length, b.length);
  if (checked === 'avg') return (2 * length) / (a.length + b.length);
  return length / Math.max(a.length, b.length);
}
