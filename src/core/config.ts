import fs from 'fs';
import path from 'path';
import yaml from 'yaml';
import { CorpusTarget, StudyConfig } from './types';
import { safeParseStudyConfig } from './schema';

// Fixed comparison set of the reference study, in matrix order.
export const REFERENCE_TARGETS: readonly CorpusTarget[] = [
  { algorithm: 'bubsort', language: 'go' },
  { algorithm: 'collatz', language: 'go' },
  { algorithm: 'collatz', language: 'js' },
  { algorithm: 'bubsort', language: 'js' },
  { algorithm: 'helloworld', language: 'go' },
  { algorithm: 'fizzbuzz', language: 'go' },
  { algorithm: 'wordcount', language: 'go' },
  { algorithm: 'collatz', language: 'rust' },
  { algorithm: 'bubsort', language: 'rust' },
  { algorithm: 'wordcount', language: 'c' },
  { algorithm: 'fizzbuzz', language: 'c' },
  { algorithm: 'collatz', language: 'c' },
  { algorithm: 'bubsort', language: 'c' },
  { algorithm: 'bubsort', language: 'ts' },
  { algorithm: 'helloworld', language: 'ts' },
];

export function defaultConfig(root: string): StudyConfig {
  return {
    version: 1,
    corpus_root: path.join(root, 'output', 'not_trimmed'),
    algorithms: ['bubsort', 'collatz', 'fizzbuzz', 'helloworld', 'wordcount'],
    languages: ['c', 'go', 'js', 'rust', 'ts'],
    targets: REFERENCE_TARGETS.map((target) => ({ ...target })),
    ngram: {
      min_n: 1,
      max_n: 6,
      source: 'wat',
      file_pattern: '{algorithm}_bg_{n}gram.txt',
    },
    metrics: ['cosine', 'jaccard', 'overlap', 'manhattan', 'kl', 'lcs'],
    lcs: {
      method: 'min'
    },
    matrix: {
      output_dir: path.join(root, 'output', 'similarity_matrices')
    },
    trim: {
      strategy: 'random',
      target: 500,
      unit: 'lines',
      trials: 10,
      output_root: path.join(root, 'output', 'trimmed'),
      extract_ngrams: true
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parsed[key];
  return isRecord(value) ? value : {};
}

function resolvePath(root: string, value: unknown, fallback: string): unknown {
  return typeof value === 'string' ? path.resolve(root, value) : fallback;
}

/**
 * Load a study config, merging the file over the defaults. Relative paths resolve
 * against `root`. A missing file yields the defaults; an invalid one throws.
 */
export function loadConfig(configPath: string | undefined, root: string): StudyConfig {
  if (!configPath || !fs.existsSync(configPath)) {
    return defaultConfig(root);
  }

  const raw = fs.readFileSync(configPath, 'utf8');
  const loaded: unknown = yaml.parse(raw);
  const parsed = isRecord(loaded) ? loaded : {};
  const defaults = defaultConfig(root);

  const matrix = section(parsed, 'matrix');
  const trim = section(parsed, 'trim');

  const merged = {
    ...defaults,
    ...parsed,
    corpus_root: resolvePath(root, parsed.corpus_root, defaults.corpus_root),
    ngram: {
      ...defaults.ngram,
      ...section(parsed, 'ngram'),
    },
    lcs: {
      ...defaults.lcs,
      ...section(parsed, 'lcs'),
    },
    matrix: {
      ...defaults.matrix,
      ...matrix,
      output_dir: resolvePath(root, matrix.output_dir, defaults.matrix.output_dir),
    },
    trim: {
      ...defaults.trim,
      ...trim,
      output_root: resolvePath(root, trim.output_root, defaults.trim.output_root),
    },
  };

  const validation = safeParseStudyConfig(merged);
  if (!validation.success) {
    throw new Error(`Invalid config at ${configPath}:\n  ${validation.errors.join('\n  ')}`);
  }
  return validation.data;
}

export function saveConfig(configPath: string, config: StudyConfig): void {
  const serialized = yaml.stringify(config);
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, serialized, 'utf8');
}
