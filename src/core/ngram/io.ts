import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import { tokenizeInstructions } from '../tokenize/instructions';
import type { NGramRange, NGramTable } from '../types';
import { DEFAULT_NGRAM_RANGE, buildNGramTable, rangeValues } from './table';

const COUNT_RE = /^[-+]?\d+$/;

/** Serialize as `<key>\t<count>` lines, most frequent first. */
export function formatNGramTable(table: NGramTable): string {
  // Array#sort is stable, so equal counts stay in first-seen order.
  const entries = Array.from(table.entries()).sort((a, b) => b[1] - a[1]);
  return entries.map(([key, count]) => `${key}\t${count}\n`).join('');
}

export function parseNGramTable(content: string): NGramTable {
  const table: NGramTable = new Map();
  for (const rawLine of content.split(/\r?\n/)) {
    const parts = rawLine.trim().split('\t');
    if (parts.length !== 2) continue;
    const [key, countText] = parts;
    if (!key || !COUNT_RE.test(countText)) continue;
    const count = Number.parseInt(countText, 10);
    if (count < 1) continue;
    table.set(key, (table.get(key) ?? 0) + count);
  }
  return table;
}

/** Read a precomputed table. A missing file is an empty table. */
export function loadNGramTable(filePath: string): NGramTable {
  if (!fs.existsSync(filePath)) {
    logger.warn('ngram', 'n-gram file not found', { path: filePath });
    return new Map();
  }
  return parseNGramTable(fs.readFileSync(filePath, 'utf8'));
}

export const DEFAULT_NGRAM_FILE_PATTERN = '{algorithm}_bg_{n}gram.txt';

export function ngramFileName(pattern: string, algorithm: string, n: number): string {
  return pattern.split('{algorithm}').join(algorithm).split('{n}').join(String(n));
}

/**
 * Tokenize a .wat file and write one table per n into `grams/` beside it.
 * The file stem fills `{algorithm}` in the name pattern. Returns the written paths.
 */
export function extractNGramFiles(
  watPath: string,
  range: NGramRange = DEFAULT_NGRAM_RANGE,
  pattern: string = DEFAULT_NGRAM_FILE_PATTERN,
): string[] {
  if (!fs.existsSync(watPath)) {
    throw new Error(`WAT file not found: ${watPath}`);
  }
  const tokens = tokenizeInstructions(fs.readFileSync(watPath, 'utf8'));
  const outDir = path.join(path.dirname(watPath), 'grams');
  fs.mkdirSync(outDir, { recursive: true });

  const stem = path.basename(watPath, path.extname(watPath));
  const written: string[] = [];
  for (const n of rangeValues(range)) {
    const outPath = path.join(outDir, ngramFileName(pattern, stem, n));
    fs.writeFileSync(outPath, formatNGramTable(buildNGramTable(tokens, n)), 'utf8');
    logger.debug('ngram', 'wrote n-gram table', { path: outPath, n });
    written.push(outPath);
  }
  return written;
}
