import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { REFERENCE_TARGETS, defaultConfig, loadConfig, saveConfig } from '../src/core/config';
import { safeParseStudyConfig } from '../src/core/schema';

describe('study config', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'watsim-config-'));
    configPath = path.join(tmpDir, '.watsim', 'config.yaml');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('defaults to the reference study layout', () => {
    const config = defaultConfig(tmpDir);
    expect(config.corpus_root).toBe(path.join(tmpDir, 'output', 'not_trimmed'));
    expect(config.targets).toHaveLength(15);
    expect(config.targets[0]).toEqual({ algorithm: 'bubsort', language: 'go' });
    expect(config.targets[14]).toEqual({ algorithm: 'helloworld', language: 'ts' });
    expect(config.ngram).toEqual({ min_n: 1, max_n: 6, source: 'wat', file_pattern: '{algorithm}_bg_{n}gram.txt' });
    expect(config.metrics).toEqual(['cosine', 'jaccard', 'overlap', 'manhattan', 'kl', 'lcs']);
    expect(config.lcs.method).toBe('min');
    expect(config.trim.strategy).toBe('random');
    expect(config.trim.target).toBe(500);
    expect(config.trim.trials).toBe(10);
    expect(safeParseStudyConfig(config).success).toBe(true);
  });

  it('has no duplicate reference targets', () => {
    const labels = REFERENCE_TARGETS.map((t) => `${t.algorithm}_${t.language}`);
    expect(new Set(labels).size).toBe(labels.length);
  });

  it('returns the defaults when no file exists', () => {
    expect(loadConfig(configPath, tmpDir)).toEqual(defaultConfig(tmpDir));
    expect(loadConfig(undefined, tmpDir)).toEqual(defaultConfig(tmpDir));
  });

  it('merges a partial file over the defaults and resolves paths against the root', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(
      configPath,
      [
        'corpus_root: data/wat',
        'ngram:',
        '  max_n: 3',
        'lcs:',
        '  method: avg',
        'trim:',
        '  strategy: middle',
        '  output_root: out/trimmed',
        '',
      ].join('\n'),
    );

    const config = loadConfig(configPath, tmpDir);
    expect(config.corpus_root).toBe(path.join(tmpDir, 'data', 'wat'));
    expect(config.ngram.min_n).toBe(1);
    expect(config.ngram.max_n).toBe(3);
    expect(config.lcs.method).toBe('avg');
    expect(config.trim.strategy).toBe('middle');
    expect(config.trim.target).toBe(500);
    expect(config.trim.output_root).toBe(path.join(tmpDir, 'out', 'trimmed'));
    expect(config.matrix.output_dir).toBe(path.join(tmpDir, 'output', 'similarity_matrices'));
  });

  it('rejects an unknown lcs method', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, 'lcs:\n  method: median\n');
    expect(() => loadConfig(configPath, tmpDir)).toThrow(/Invalid config at .*lcs\.method/s);
  });

  it('reads an optional lcs instruction limit', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, 'lcs:\n  limit: 500\n');
    expect(loadConfig(configPath, tmpDir).lcs).toEqual({ method: 'min', limit: 500 });
    expect(defaultConfig(tmpDir).lcs.limit).toBeUndefined();

    fs.writeFileSync(configPath, 'lcs:\n  limit: 0\n');
    expect(() => loadConfig(configPath, tmpDir)).toThrow(/lcs\.limit/);
  });

  it('rejects an empty n range', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, 'ngram:\n  min_n: 4\n  max_n: 2\n');
    expect(() => loadConfig(configPath, tmpDir)).toThrow('ngram.max_n: max_n (2) must be >= min_n (4)');
  });

  it('rejects duplicate targets', () => {
    const config = defaultConfig(tmpDir);
    const result = safeParseStudyConfig({ ...config, targets: [...config.targets, { algorithm: 'bubsort', language: 'go' }] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toEqual(["targets.15: duplicate target 'bubsort_go'"]);
    }
  });

  it('saves YAML that loads back unchanged', () => {
    const config = defaultConfig(tmpDir);
    config.trim.seed = 42;
    config.metrics = ['jaccard', 'lcs'];
    saveConfig(configPath, config);
    expect(loadConfig(configPath, tmpDir)).toEqual(config);
  });
});
