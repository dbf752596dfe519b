import fs from 'fs';
import path from 'path';
import { assertCorpusRoot, watPath } from '../corpus/corpus';
import { logger } from '../logger';
import { DEFAULT_NGRAM_FILE_PATTERN, extractNGramFiles } from '../ngram/io';
import { DEFAULT_NGRAM_RANGE } from '../ngram/table';
import { TrimLogRecordSchema } from '../schema';
import { splitLines, tokenizeInstructions } from '../tokenize/instructions';
import type { NGramRange, TrimLogRecord, TrimStrategy, TrimUnit } from '../types';
import { deriveTrialSeeds, drawMasterSeed, mulberry32 } from './random';
import type { Rng } from './random';
import { assertTrimTarget, trimSequence } from './strategies';

export const TRIM_LOG_FILENAME = 'trim_log.csv';

const TRIM_LOG_COLUMNS: readonly (keyof TrimLogRecord)[] = [
  'trial',
  'algo',
  'lang',
  'relpath_after_lang',
  'total_lines',
  'kept_lines',
  'start_index',
  'strategy',
  'target',
  'trial_seed',
];

export interface TrimCorpusOptions {
  corpusRoot: string;
  outputRoot: string;
  algorithms: readonly string[];
  languages: readonly string[];
  strategy: TrimStrategy;
  target: number;
  unit?: TrimUnit;
  /** Random strategy only. */
  trials?: number;
  /** Random strategy only; drawn and reported when absent. */
  seed?: number;
  extractNGrams?: boolean;
  range?: NGramRange;
  filePattern?: string;
}

export interface TrimVariant {
  name: string;
  dir: string;
  trial: number;
  trialSeed: number | null;
  records: TrimLogRecord[];
}

export interface TrimCorpusResult {
  strategy: TrimStrategy;
  target: number;
  masterSeed: number | null;
  variants: TrimVariant[];
}

/** Trim one WAT text by line or by instruction; returns the text to write and the window. */
export function trimWatText(
  text: string,
  strategy: TrimStrategy,
  target: number,
  unit: TrimUnit,
  rng?: Rng,
): { text: string; total: number; kept: number; start: number } {
  if (unit === 'instructions') {
    const trimmed = trimSequence(tokenizeInstructions(text), strategy, target, rng);
    return {
      text: trimmed.items.length ? trimmed.items.join('\n') + '\n' : '',
      total: trimmed.totalLength,
      kept: trimmed.keptLength,
      start: trimmed.start,
    };
  }
  const trimmed = trimSequence(splitLines(text), strategy, target, rng);
  return { text: trimmed.items.join(''), total: trimmed.totalLength, kept: trimmed.keptLength, start: trimmed.start };
}

function csvCell(value: string | number | null): string {
  return value === null ? '' : String(value);
}

export function formatTrimLog(records: readonly TrimLogRecord[]): string {
  const lines = [TRIM_LOG_COLUMNS.join(',')];
  for (const record of records) {
    lines.push(TRIM_LOG_COLUMNS.map((column) => csvCell(record[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

export function parseTrimLog(content: string): TrimLogRecord[] {
  const [header, ...rows] = content.split(/\r?\n/).filter((line) => line.length > 0);
  if (!header || header !== TRIM_LOG_COLUMNS.join(',')) {
    throw new Error('Unexpected trim log header');
  }
  return rows.map((row) => {
    const cells = row.split(',');
    const raw: Record<string, unknown> = {};
    TRIM_LOG_COLUMNS.forEach((column, i) => {
      const cell = cells[i] ?? '';
      const numeric = column !== 'algo' && column !== 'lang' && column !== 'relpath_after_lang' && column !== 'strategy';
      raw[column] = numeric ? (cell === '' ? null : Number(cell)) : cell;
    });
    return TrimLogRecordSchema.parse(raw);
  });
}

/**
 * Write trimmed copies of every corpus .wat file under
 * `<outputRoot>/<variant>/<algorithm>/<language>/<algorithm>.wat`, plus one
 * `trim_log.csv` per variant. Random runs produce one variant per trial
 * (named 1..trials); head/middle/tail produce a single variant named after the strategy.
 */
export function trimCorpus(options: TrimCorpusOptions): TrimCorpusResult {
  assertCorpusRoot(options.corpusRoot);
  assertTrimTarget(options.target);
  const unit = options.unit ?? 'lines';
  const range = options.range ?? DEFAULT_NGRAM_RANGE;
  const filePattern = options.filePattern ?? DEFAULT_NGRAM_FILE_PATTERN;

  const plans: Array<{ name: string; trial: number; trialSeed: number | null }> = [];
  let masterSeed: number | null = null;
  if (options.strategy === 'random') {
    const trials = options.trials ?? 1;
    if (!Number.isInteger(trials) || trials < 1) {
      throw new Error(`Trial count must be a positive integer, got ${trials}`);
    }
    masterSeed = options.seed ?? drawMasterSeed();
    deriveTrialSeeds(masterSeed, trials).forEach((trialSeed, i) => {
      plans.push({ name: String(i + 1), trial: i + 1, trialSeed });
    });
  } else {
    plans.push({ name: options.strategy, trial: 1, trialSeed: null });
  }

  const variants: TrimVariant[] = [];
  for (const plan of plans) {
    const dir = path.join(options.outputRoot, plan.name);
    // one generator per trial, consumed across files in algorithm-then-language order
    const rng = plan.trialSeed === null ? undefined : mulberry32(plan.trialSeed);
    const records: TrimLogRecord[] = [];

    for (const algorithm of options.algorithms) {
      for (const language of options.languages) {
        const src = watPath(options.corpusRoot, { algorithm, language });
        if (!fs.existsSync(src)) {
          logger.warn('trim', 'skipping missing WAT file', { path: src });
          continue;
        }
        const trimmed = trimWatText(fs.readFileSync(src, 'utf8'), options.strategy, options.target, unit, rng);
        const relpath = path.basename(src);
        const dst = path.join(dir, algorithm, language, relpath);
        fs.mkdirSync(path.dirname(dst), { recursive: true });
        fs.writeFileSync(dst, trimmed.text, 'utf8');
        if (options.extractNGrams) extractNGramFiles(dst, range, filePattern);

        logger.info('trim', `${algorithm}/${language}: ${trimmed.total} -> ${trimmed.kept}`, {
          variant: plan.name,
          start: trimmed.start,
        });
        records.push({
          trial: plan.trial,
          algo: algorithm,
          lang: language,
          relpath_after_lang: relpath,
          total_lines: trimmed.total,
          kept_lines: trimmed.kept,
          start_index: trimmed.start,
          strategy: options.strategy,
          target: options.target,
          trial_seed: plan.trialSeed,
        });
      }
    }

    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, TRIM_LOG_FILENAME), formatTrimLog(records), 'utf8');
    variants.push({ name: plan.name, dir, trial: plan.trial, trialSeed: plan.trialSeed, records });
  }

  return { strategy: options.strategy, target: options.target, masterSeed, variants };
}
