import type { NGramTable } from '../types';
import { tableTotal } from '../ngram/table';

export const KL_EPSILON = 1e-10;

function unionKeys(a: NGramTable, b: NGramTable): Set<string> {
  const keys = new Set<string>(a.keys());
  for (const key of b.keys()) keys.add(key);
  return keys;
}

function sumOfSquares(table: NGramTable): number {
  let sum = 0;
  for (const count of table.values()) sum += count * count;
  return sum;
}

/** Cosine of the two count vectors over the union of keys. */
export function cosineSimilarity(a: NGramTable, b: NGramTable): number {
  if (a.size === 0 || b.size === 0) return 0;
  const squaresA = sumOfSquares(a);
  const squaresB = sumOfSquares(b);
  if (squaresA === 0 || squaresB === 0) return 0;

  // keys missing from either side contribute 0 to the dot product
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [key, count] of small) dot += count * (large.get(key) ?? 0);
  // one sqrt over the product: identical integer tables give exactly 1
  return dot / Math.sqrt(squaresA * squaresB);
}

export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let intersection = 0;
  for (const key of a) if (b.has(key)) intersection += 1;
  return intersection / (a.size + b.size - intersection);
}

export function overlapCoefficient(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const key of a) if (b.has(key)) intersection += 1;
  return intersection / Math.min(a.size, b.size);
}

/**
 * 1 - L1(a, b) / (sum(a) + sum(b)).
 * Not clamped: callers get the raw value even if it leaves [0, 1].
 */
export function manhattanSimilarity(a: NGramTable, b: NGramTable): number {
  if (a.size === 0 || b.size === 0) return 0;
  const total = tableTotal(a) + tableTotal(b);
  if (total <= 0) return 0;
  let distance = 0;
  for (const key of unionKeys(a, b)) {
    distance += Math.abs((a.get(key) ?? 0) - (b.get(key) ?? 0));
  }
  return 1 - distance / total;
}

export function toDistribution(table: NGramTable): Map<string, number> {
  const total = tableTotal(table);
  const distribution = new Map<string, number>();
  if (total <= 0) return distribution;
  for (const [key, count] of table) distribution.set(key, count / total);
  return distribution;
}

/** KL(P || Q) over the union of keys, with KL_EPSILON added to every probability. */
export function klDivergence(p: ReadonlyMap<string, number>, q: ReadonlyMap<string, number>): number {
  const keys = new Set<string>(p.keys());
  for (const key of q.keys()) keys.add(key);
  let divergence = 0;
  for (const key of keys) {
    const pk = (p.get(key) ?? 0) + KL_EPSILON;
    const qk = (q.get(key) ?? 0) + KL_EPSILON;
    divergence += pk * Math.log(pk / qk);
  }
  return divergence;
}

/** 1 / (1 + KL(P||Q) + KL(Q||P)); 0 when either side has no mass. */
export function klSimilarity(a: NGramTable, b: NGramTable): number {
  const p = toDistribution(a);
  const q = toDistribution(b);
  if (p.size === 0 || q.size === 0) return 0;
  const divergence = klDivergence(p, q) + klDivergence(q, p);
  return 1 / (1 + divergence);
}
