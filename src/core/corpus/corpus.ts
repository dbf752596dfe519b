import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import { DEFAULT_NGRAM_FILE_PATTERN, loadNGramTable, ngramFileName } from '../ngram/io';
import { DEFAULT_NGRAM_RANGE } from '../ngram/table';
import { LoadedRepresentation, TokenRepresentation } from '../similarity/representation';
import type { Representation } from '../similarity/representation';
import { tokenizeInstructions } from '../tokenize/instructions';
import type { CorpusItem, CorpusTarget, NGramRange, NGramSource } from '../types';

export function corpusLabel(target: CorpusTarget): string {
  return `${target.algorithm}_${target.language}`;
}

export function toCorpusItems(targets: readonly CorpusTarget[]): CorpusItem[] {
  const seen = new Set<string>();
  return targets.map((target) => {
    const label = corpusLabel(target);
    if (seen.has(label)) {
      throw new Error(`Duplicate corpus label '${label}'`);
    }
    seen.add(label);
    return { algorithm: target.algorithm, language: target.language, label };
  });
}

export function watPath(root: string, item: CorpusTarget): string {
  return path.join(root, item.algorithm, item.language, `${item.algorithm}.wat`);
}

export function ngramPath(root: string, item: CorpusTarget, n: number, pattern: string = DEFAULT_NGRAM_FILE_PATTERN): string {
  return path.join(root, item.algorithm, item.language, 'grams', ngramFileName(pattern, item.algorithm, n));
}

export function assertCorpusRoot(root: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(root);
  } catch (err) {
    throw new Error(`Corpus root is not readable: ${root} (${err instanceof Error ? err.message : String(err)})`);
  }
  if (!stats.isDirectory()) {
    throw new Error(`Corpus root is not a directory: ${root}`);
  }
}

/** Read a .wat file; a missing file reads as empty text. */
export function readWatText(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    logger.warn('corpus', 'WAT file not found', { path: filePath });
    return '';
  }
  return fs.readFileSync(filePath, 'utf8');
}

export interface CorpusOptions {
  source?: NGramSource;
  range?: NGramRange;
  filePattern?: string;
}

/**
 * Per-item representations over a corpus root, built once and reused by every
 * metric and pair that touches the same item.
 */
export class CorpusRepresentations {
  private readonly cache = new Map<string, Representation>();
  readonly source: NGramSource;
  readonly range: NGramRange;
  readonly filePattern: string;

  constructor(
    readonly root: string,
    options: CorpusOptions = {},
  ) {
    this.source = options.source ?? 'wat';
    this.range = options.range ?? DEFAULT_NGRAM_RANGE;
    this.filePattern = options.filePattern ?? DEFAULT_NGRAM_FILE_PATTERN;
  }

  get(item: CorpusItem): Representation {
    const cached = this.cache.get(item.label);
    if (cached) return cached;

    const loadTokens = () => tokenizeInstructions(readWatText(watPath(this.root, item)));
    const representation: Representation =
      this.source === 'grams'
        ? new LoadedRepresentation(loadTokens, (n) => loadNGramTable(ngramPath(this.root, item, n, this.filePattern)))
        : new TokenRepresentation(loadTokens());
    this.cache.set(item.label, representation);
    return representation;
  }
}
