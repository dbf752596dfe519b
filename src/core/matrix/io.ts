import fs from 'fs';
import path from 'path';
import { SimilarityMatrixSchema } from '../schema';
import type { LcsSettings, SimilarityMatrix } from '../types';

/**
 * `<metric>_similarity_matrix.csv`, or `lcs_instruction_similarity_matrix_<method>[_limit<N>].csv` for LCS.
 */
export function matrixFileName(metric: string, lcs: LcsSettings = { method: 'min' }, suffix = ''): string {
  if (metric === 'lcs') {
    const limit = lcs.limit === undefined ? '' : `_limit${lcs.limit}`;
    return `lcs_instruction_similarity_matrix_${lcs.method}${limit}${suffix}.csv`;
  }
  return `${metric}_similarity_matrix${suffix}.csv`;
}

export function formatMatrixCsv(matrix: SimilarityMatrix): string {
  const lines = [['', ...matrix.labels].join(',')];
  matrix.labels.forEach((label, i) => {
    lines.push([label, ...matrix.values[i].map((value) => String(value))].join(','));
  });
  return lines.join('\n') + '\n';
}

export function parseMatrixCsv(content: string, metric: string): SimilarityMatrix {
  const rows = content
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map((line) => line.split(','));
  if (!rows.length) {
    throw new Error(`Empty matrix CSV for ${metric}`);
  }

  const labels = rows[0].slice(1);
  const body = rows.slice(1);
  if (body.length !== labels.length) {
    throw new Error(`Matrix CSV for ${metric} is not square: ${labels.length} columns, ${body.length} rows`);
  }

  const values = body.map((cells, i) => {
    if (cells[0] !== labels[i]) {
      throw new Error(`Matrix CSV for ${metric}: row ${i + 1} is '${cells[0]}', expected '${labels[i]}'`);
    }
    const numbers = cells.slice(1).map(Number);
    if (numbers.length !== labels.length || numbers.some((value) => Number.isNaN(value))) {
      throw new Error(`Matrix CSV for ${metric}: row '${labels[i]}' has malformed values`);
    }
    return numbers;
  });

  return { metric, labels, values };
}

export function readMatrixCsv(filePath: string, metric: string): SimilarityMatrix {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Matrix CSV not found: ${filePath}`);
  }
  return parseMatrixCsv(fs.readFileSync(filePath, 'utf8'), metric);
}

export function writeMatrixCsv(filePath: string, matrix: SimilarityMatrix): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, formatMatrixCsv(matrix), 'utf8');
}

export function readMatrixJson(filePath: string): SimilarityMatrix {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return SimilarityMatrixSchema.parse(raw);
}

export function writeMatrixJson(filePath: string, matrix: SimilarityMatrix): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(matrix, null, 2), 'utf8');
}
