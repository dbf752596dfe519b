import fs from 'fs';
import { watPath } from '../corpus/corpus';
import { logger } from '../logger';
import { splitLines } from '../tokenize/instructions';

export interface FileSize {
  lines: number;
  bytes: number;
}

/**
 * Before/after size of one corpus file. With several trimmed variants (random
 * trials) the after values are means over the variants that hold the file.
 */
export interface CompressionRecord {
  algo: string;
  lang: string;
  lines_before: number;
  lines_after: number;
  bytes_before: number;
  bytes_after: number;
  reduction_rate_lines: number;
  reduction_rate_bytes: number;
  trials_count: number;
}

export interface CompressionSummary {
  files: number;
  mean_lines_after: number;
  reduction_rate_lines: number;
  reduction_rate_bytes: number;
  by_algorithm: Array<{ algo: string; files: number; reduction_rate_lines: number; reduction_rate_bytes: number }>;
}

export interface CompressionOptions {
  corpusRoot: string;
  variantDirs: readonly string[];
  algorithms: readonly string[];
  languages: readonly string[];
}

const COMPRESSION_COLUMNS: readonly (keyof CompressionRecord)[] = [
  'algo',
  'lang',
  'lines_before',
  'lines_after',
  'bytes_before',
  'bytes_after',
  'reduction_rate_lines',
  'reduction_rate_bytes',
  'trials_count',
];

/** Line and byte count of a file; null when it does not exist. */
export function measureFile(filePath: string): FileSize | null {
  if (!fs.existsSync(filePath)) return null;
  const text = fs.readFileSync(filePath, 'utf8');
  return { lines: splitLines(text).length, bytes: fs.statSync(filePath).size };
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function reduction(before: number, after: number): number {
  return before > 0 ? 1 - after / before : 0;
}

/**
 * Compare every untrimmed corpus file with its trimmed copies. Files that are
 * missing or empty before trimming, or absent from every variant, are skipped.
 */
export function measureCompression(options: CompressionOptions): CompressionRecord[] {
  if (!options.variantDirs.length) {
    throw new Error('No trimmed variant directories to measure');
  }
  const records: CompressionRecord[] = [];

  for (const algorithm of options.algorithms) {
    for (const language of options.languages) {
      const target = { algorithm, language };
      const before = measureFile(watPath(options.corpusRoot, target));
      if (!before || before.lines === 0) continue;

      const after = options.variantDirs
        .map((dir) => measureFile(watPath(dir, target)))
        .filter((size): size is FileSize => size !== null && size.lines > 0);
      if (!after.length) {
        logger.warn('compression', 'no trimmed copy found', { algorithm, language });
        continue;
      }

      const linesAfter = mean(after.map((size) => size.lines));
      const bytesAfter = mean(after.map((size) => size.bytes));
      records.push({
        algo: algorithm,
        lang: language,
        lines_before: before.lines,
        lines_after: linesAfter,
        bytes_before: before.bytes,
        bytes_after: bytesAfter,
        reduction_rate_lines: reduction(before.lines, linesAfter),
        reduction_rate_bytes: reduction(before.bytes, bytesAfter),
        trials_count: after.length,
      });
    }
  }
  return records;
}

export function summarizeCompression(records: readonly CompressionRecord[]): CompressionSummary {
  if (!records.length) {
    throw new Error('No compression records to summarize');
  }
  const algorithms = [...new Set(records.map((record) => record.algo))].sort();
  return {
    files: records.length,
    mean_lines_after: mean(records.map((record) => record.lines_after)),
    reduction_rate_lines: mean(records.map((record) => record.reduction_rate_lines)),
    reduction_rate_bytes: mean(records.map((record) => record.reduction_rate_bytes)),
    by_algorithm: algorithms.map((algo) => {
      const group = records.filter((record) => record.algo === algo);
      return {
        algo,
        files: group.length,
        reduction_rate_lines: mean(group.map((record) => record.reduction_rate_lines)),
        reduction_rate_bytes: mean(group.map((record) => record.reduction_rate_bytes)),
      };
    }),
  };
}

export function formatCompressionCsv(records: readonly CompressionRecord[]): string {
  const lines = [COMPRESSION_COLUMNS.join(',')];
  for (const record of records) {
    lines.push(COMPRESSION_COLUMNS.map((column) => String(record[column])).join(','));
  }
  return lines.join('\n') + '\n';
}
