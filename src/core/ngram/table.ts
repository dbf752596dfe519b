import type { NGramRange, NGramTable, TokenSequence } from '../types';

export const NGRAM_DELIMITER = ' ';

export const DEFAULT_NGRAM_RANGE: NGramRange = { min: 1, max: 6 };

export function assertNGramSize(n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`n-gram size must be a positive integer, got ${n}`);
  }
}

export function assertNGramRange(range: NGramRange): void {
  assertNGramSize(range.min);
  assertNGramSize(range.max);
  if (range.max < range.min) {
    throw new Error(`n-gram range is empty: min ${range.min} > max ${range.max}`);
  }
}

export function rangeValues(range: NGramRange): number[] {
  assertNGramRange(range);
  const values: number[] = [];
  for (let n = range.min; n <= range.max; n += 1) values.push(n);
  return values;
}

/**
 * Count every contiguous window of `n` tokens (stride 1).
 * Keys keep first-seen order, which is what ties sort by when tables are written out.
 */
export function buildNGramTable(tokens: TokenSequence, n: number): NGramTable {
  assertNGramSize(n);
  const table: NGramTable = new Map();
  for (let i = 0; i + n <= tokens.length; i += 1) {
    const key = tokens.slice(i, i + n).join(NGRAM_DELIMITER);
    table.set(key, (table.get(key) ?? 0) + 1);
  }
  return table;
}

export function buildNGramTables(tokens: TokenSequence, range: NGramRange = DEFAULT_NGRAM_RANGE): Map<number, NGramTable> {
  const tables = new Map<number, NGramTable>();
  for (const n of rangeValues(range)) {
    tables.set(n, buildNGramTable(tokens, n));
  }
  return tables;
}

export function tableTotal(table: NGramTable): number {
  let total = 0;
  for (const count of table.values()) total += count;
  return total;
}

export function keySet(table: NGramTable): Set<string> {
  return new Set(table.keys());
}
