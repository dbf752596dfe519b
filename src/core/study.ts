import path from 'path';
import { CorpusRepresentations, assertCorpusRoot, toCorpusItems } from './corpus/corpus';
import { logger } from './logger';
import { averageMatrices, matrixCorrelation } from './matrix/aggregate';
import { buildCorpusMatrix } from './matrix/build';
import { matrixFileName, readMatrixCsv, writeMatrixCsv } from './matrix/io';
import { createMetric } from './similarity/metrics';
import type { LcsSettings, MetricName, PairObserver, SimilarityMatrix, StudyConfig } from './types';

export interface StudyMatrixOptions {
  corpusRoot?: string;
  metrics?: readonly MetricName[];
  onPair?: PairObserver;
}

/**
 * One matrix per configured metric over the configured targets. Representations
 * are shared across metrics, so each file is read and tokenized once.
 */
export function buildStudyMatrices(config: StudyConfig, options: StudyMatrixOptions = {}): SimilarityMatrix[] {
  const corpusRoot = options.corpusRoot ?? config.corpus_root;
  assertCorpusRoot(corpusRoot);

  const range = { min: config.ngram.min_n, max: config.ngram.max_n };
  const metrics = (options.metrics ?? config.metrics).map((name) =>
    createMetric(name, { range, lcsMethod: config.lcs.method, lcsLimit: config.lcs.limit }),
  );
  const items = toCorpusItems(config.targets);
  const representations = new CorpusRepresentations(corpusRoot, {
    source: config.ngram.source,
    range,
    filePattern: config.ngram.file_pattern,
  });

  return metrics.map((metric) => {
    logger.info('study', `building ${metric.name} matrix`, { corpusRoot, items: items.length });
    return buildCorpusMatrix(items, metric, representations, { onPair: options.onPair });
  });
}

export function writeStudyMatrices(outputDir: string, matrices: readonly SimilarityMatrix[], lcs: LcsSettings, suffix = ''): string[] {
  return matrices.map((matrix) => {
    const filePath = path.join(outputDir, matrixFileName(matrix.metric, lcs, suffix));
    writeMatrixCsv(filePath, matrix);
    return filePath;
  });
}

/** Average the same metric's matrix across several trial output directories. */
export function averageTrialMatrices(trialDirs: readonly string[], metric: MetricName, lcs: LcsSettings): SimilarityMatrix {
  const matrices = trialDirs.map((dir) => readMatrixCsv(path.join(dir, matrixFileName(metric, lcs)), metric));
  return averageMatrices(matrices);
}

export interface MatrixComparison {
  metric: MetricName;
  correlation: number | null;
}

/** Correlate each metric's matrix in `beforeDir` with the one in `afterDir` (file name may carry a suffix, e.g. `_avg`). */
export function compareMatrixDirs(
  beforeDir: string,
  afterDir: string,
  metrics: readonly MetricName[],
  lcs: LcsSettings,
  afterSuffix = '',
): MatrixComparison[] {
  return metrics.map((metric) => {
    const before = readMatrixCsv(path.join(beforeDir, matrixFileName(metric, lcs)), metric);
    const after = readMatrixCsv(path.join(afterDir, matrixFileName(metric, lcs, afterSuffix)), metric);
    return { metric, correlation: matrixCorrelation(before, after) };
  });
}
