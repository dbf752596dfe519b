import { DEFAULT_NGRAM_RANGE, assertNGramRange, rangeValues } from '../ngram/table';
import type { LcsMethod, MetricKind, MetricName, NGramRange } from '../types';
import { assertLcsLimit, lcsSimilarity, limitSequence, parseLcsMethod } from './lcs';
import type { Representation } from './representation';
import {
  cosineSimilarity,
  jaccardSimilarity,
  klSimilarity,
  manhattanSimilarity,
  overlapCoefficient,
} from './vectorize';

export const METRIC_NAMES: readonly MetricName[] = ['cosine', 'jaccard', 'overlap', 'manhattan', 'kl', 'lcs'];

export interface PairwiseMetric {
  readonly name: MetricName;
  readonly kind: MetricKind;
  score(a: Representation, b: Representation): number;
}

export interface MetricOptions {
  range?: NGramRange;
  lcsMethod?: LcsMethod;
  /** LCS only; n-gram metrics always see the whole sequence. */
  lcsLimit?: number;
}

export function isMetricName(value: string): value is MetricName {
  return (METRIC_NAMES as readonly string[]).includes(value);
}

export function parseMetricName(value: string): MetricName {
  const lowered = value.toLowerCase();
  if (!isMetricName(lowered)) {
    throw new Error(`Unknown metric '${value}' (expected ${METRIC_NAMES.join('|')})`);
  }
  return lowered;
}

/** Arithmetic mean of a per-n score over every n in the range. */
export function averageOverRange(range: NGramRange, scoreAt: (n: number) => number): number {
  const ns = rangeValues(range);
  let sum = 0;
  for (const n of ns) sum += scoreAt(n);
  return sum / ns.length;
}

function ngramMetric(
  name: MetricName,
  kind: MetricKind,
  range: NGramRange,
  perN: (a: Representation, b: Representation, n: number) => number,
): PairwiseMetric {
  return {
    name,
    kind,
    score: (a, b) => averageOverRange(range, (n) => perN(a, b, n)),
  };
}

export function createMetric(name: MetricName, options: MetricOptions = {}): PairwiseMetric {
  const range = options.range ?? DEFAULT_NGRAM_RANGE;
  assertNGramRange(range);

  switch (name) {
    case 'cosine':
      return ngramMetric(name, 'weighted', range, (a, b, n) => cosineSimilarity(a.table(n), b.table(n)));
    case 'jaccard':
      return ngramMetric(name, 'set', range, (a, b, n) => jaccardSimilarity(a.keys(n), b.keys(n)));
    case 'overlap':
      return ngramMetric(name, 'set', range, (a, b, n) => overlapCoefficient(a.keys(n), b.keys(n)));
    case 'manhattan':
      return ngramMetric(name, 'weighted', range, (a, b, n) => manhattanSimilarity(a.table(n), b.table(n)));
    case 'kl':
      return ngramMetric(name, 'weighted', range, (a, b, n) => klSimilarity(a.table(n), b.table(n)));
    case 'lcs': {
      const method = parseLcsMethod(options.lcsMethod ?? 'min');
      const limit = options.lcsLimit;
      if (limit !== undefined) assertLcsLimit(limit);
      return {
        name,
        kind: 'sequence',
        score: (a, b) => lcsSimilarity(limitSequence(a.tokens(), limit), limitSequence(b.tokens(), limit), method),
      };
    }
    default:
      throw new Error(`Unknown metric '${String(name)}'`);
  }
}
