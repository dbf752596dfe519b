import type { SimilarityMatrix } from '../types';

/** Two matrices are comparable only over the same labels in the same order. */
export function assertSameShape(a: SimilarityMatrix, b: SimilarityMatrix): void {
  if (a.labels.length !== b.labels.length) {
    throw new Error(
      `Matrix size mismatch: ${a.metric} is ${a.labels.length}x${a.labels.length}, ${b.metric} is ${b.labels.length}x${b.labels.length}`,
    );
  }
  a.labels.forEach((label, i) => {
    if (b.labels[i] !== label) {
      throw new Error(`Matrix label mismatch at position ${i}: '${label}' vs '${b.labels[i]}'`);
    }
  });
}

/** Element-wise mean, e.g. over the trials of a random trimming run. */
export function averageMatrices(matrices: readonly SimilarityMatrix[]): SimilarityMatrix {
  if (!matrices.length) {
    throw new Error('No matrices to average');
  }
  const [first] = matrices;
  for (const other of matrices.slice(1)) assertSameShape(first, other);

  const size = first.labels.length;
  const values = Array.from({ length: size }, (_, i) =>
    Array.from({ length: size }, (_, j) => {
      let sum = 0;
      for (const matrix of matrices) sum += matrix.values[i][j];
      return sum / matrices.length;
    }),
  );
  return { metric: first.metric, labels: [...first.labels], values };
}

/** Off-diagonal upper triangle, row-major. */
export function upperTriangle(matrix: SimilarityMatrix): number[] {
  const out: number[] = [];
  const size = matrix.labels.length;
  for (let i = 0; i < size; i += 1) {
    for (let j = i + 1; j < size; j += 1) out.push(matrix.values[i][j]);
  }
  return out;
}

/** Pearson r, or null when there are fewer than two points or one side has no variance. */
export function pearson(xs: readonly number[], ys: readonly number[]): number | null {
  if (xs.length !== ys.length) {
    throw new Error(`Vector length mismatch: ${xs.length} vs ${ys.length}`);
  }
  const pairs: Array<[number, number]> = [];
  xs.forEach((x, i) => {
    const y = ys[i];
    if (!Number.isNaN(x) && !Number.isNaN(y)) pairs.push([x, y]);
  });
  if (pairs.length < 2) return null;

  const meanX = pairs.reduce((sum, [x]) => sum + x, 0) / pairs.length;
  const meanY = pairs.reduce((sum, [, y]) => sum + y, 0) / pairs.length;
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (const [x, y] of pairs) {
    covariance += (x - meanX) * (y - meanY);
    varianceX += (x - meanX) ** 2;
    varianceY += (y - meanY) ** 2;
  }
  if (varianceX === 0 || varianceY === 0) return null;
  return covariance / Math.sqrt(varianceX * varianceY);
}

/** Correlation of two same-shape matrices over their off-diagonal upper triangles. */
export function matrixCorrelation(before: SimilarityMatrix, after: SimilarityMatrix): number | null {
  assertSameShape(before, after);
  return pearson(upperTriangle(before), upperTriangle(after));
}
