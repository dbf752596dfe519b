export type TokenSequence = readonly string[];

/** Occurrence count per n-gram key (tokens joined by a single space). */
export type NGramTable = Map<string, number>;

export type NGramSource = 'wat' | 'grams';

export type MetricName = 'cosine' | 'jaccard' | 'overlap' | 'manhattan' | 'kl' | 'lcs';

export type MetricKind = 'weighted' | 'set' | 'sequence';

export type LcsMethod = 'min' | 'avg' | 'max';

export interface LcsSettings {
  method: LcsMethod;
  /** Compare only the first `limit` instructions of each sequence. */
  limit?: number;
}

export type TrimStrategy = 'head' | 'middle' | 'tail' | 'random';

export type TrimUnit = 'lines' | 'instructions';

export interface CorpusTarget {
  algorithm: string;
  language: string;
}

export interface CorpusItem extends CorpusTarget {
  label: string;
}

export interface NGramRange {
  min: number;
  max: number;
}

export interface SimilarityMatrix {
  metric: string;
  labels: string[];
  values: number[][];
}

export interface PairScoredEvent {
  index: number;
  total: number;
  row: number;
  col: number;
  rowLabel: string;
  colLabel: string;
  score: number;
  elapsedMs: number;
}

export type PairObserver = (event: PairScoredEvent) => void;

export interface TrimResult<T> {
  strategy: TrimStrategy;
  target: number;
  items: T[];
  start: number;
  totalLength: number;
  keptLength: number;
}

export interface TrimLogRecord {
  trial: number;
  algo: string;
  lang: string;
  relpath_after_lang: string;
  total_lines: number;
  kept_lines: number;
  start_index: number;
  strategy: TrimStrategy;
  target: number;
  trial_seed: number | null;
}

export interface StudyConfig {
  version: number;
  corpus_root: string;
  algorithms: string[];
  languages: string[];
  targets: CorpusTarget[];
  ngram: {
    min_n: number;
    max_n: number;
    source: NGramSource;
    file_pattern: string;
  };
  metrics: MetricName[];
  lcs: LcsSettings;
  matrix: {
    output_dir: string;
  };
  trim: {
    strategy: TrimStrategy;
    target: number;
    unit: TrimUnit;
    trials: number;
    seed?: number;
    output_root: string;
    extract_ngrams: boolean;
  };
}
