import { performance } from 'perf_hooks';
import { logger } from '../logger';
import type { CorpusRepresentations } from '../corpus/corpus';
import type { PairwiseMetric } from '../similarity/metrics';
import type { CorpusItem, PairObserver, SimilarityMatrix } from '../types';

export interface MatrixBuildOptions {
  onPair?: PairObserver;
}

export function pairCount(size: number): number {
  return (size * (size - 1)) / 2;
}

/**
 * Fill an N×N matrix with 1.0 on the diagonal and `scorePair(i, j)` for i < j,
 * mirrored into (j, i). Each unordered pair is scored once, row-major.
 *
 * A pair whose scoring throws is logged and recorded as 0.0.
 */
export function buildSimilarityMatrix(
  metric: string,
  labels: readonly string[],
  scorePair: (row: number, col: number) => number,
  options: MatrixBuildOptions = {},
): SimilarityMatrix {
  const size = labels.length;
  const values: number[][] = Array.from({ length: size }, () => new Array<number>(size).fill(0));
  const total = pairCount(size);
  let index = 0;

  for (let i = 0; i < size; i += 1) {
    for (let j = 0; j < size; j += 1) {
      if (i === j) {
        values[i][j] = 1.0;
        continue;
      }
      if (i > j) continue;

      const started = performance.now();
      let score: number;
      try {
        score = scorePair(i, j);
      } catch (err) {
        logger.warn('matrix', 'pair scoring failed; using 0.0', {
          metric,
          row: labels[i],
          col: labels[j],
          error: err instanceof Error ? err.message : String(err),
        });
        score = 0;
      }
      values[i][j] = score;
      values[j][i] = score;
      index += 1;

      const elapsedMs = performance.now() - started;
      logger.debug('matrix', `${metric} pair ${index}/${total}`, {
        row: labels[i],
        col: labels[j],
        score,
        elapsedMs,
      });
      options.onPair?.({
        index,
        total,
        row: i,
        col: j,
        rowLabel: labels[i],
        colLabel: labels[j],
        score,
        elapsedMs,
      });
    }
  }

  return { metric, labels: [...labels], values };
}

/** Score every pair of corpus items with one metric. */
export function buildCorpusMatrix(
  items: readonly CorpusItem[],
  metric: PairwiseMetric,
  representations: CorpusRepresentations,
  options: MatrixBuildOptions = {},
): SimilarityMatrix {
  return buildSimilarityMatrix(
    metric.name,
    items.map((item) => item.label),
    (i, j) => metric.score(representations.get(items[i]), representations.get(items[j])),
    options,
  );
}
