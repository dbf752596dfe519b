import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { deriveTrialSeeds, mulberry32, randomInt } from '../src/core/trim/random';
import { parseTrimStrategy, trimHead, trimMiddle, trimRandom, trimSequence, trimTail } from '../src/core/trim/strategies';
import { TRIM_LOG_FILENAME, formatTrimLog, parseTrimLog, trimCorpus, trimWatText } from '../src/core/trim/run';
import { splitLines } from '../src/core/tokenize/instructions';
import type { TrimLogRecord } from '../src/core/types';

const lines = Array.from({ length: 1000 }, (_, i) => i + 1);

describe('trim strategies', () => {
  it('head keeps the first target items', () => {
    const trimmed = trimHead(lines, 300);
    expect(trimmed.items[0]).toBe(1);
    expect(trimmed.items[299]).toBe(300);
    expect(trimmed.keptLength).toBe(300);
    expect(trimmed.start).toBe(0);
  });

  it('tail keeps the last target items', () => {
    const trimmed = trimTail(lines, 300);
    expect(trimmed.start).toBe(700);
    expect(trimmed.items[0]).toBe(701);
    expect(trimmed.items[299]).toBe(1000);
  });

  it('middle centres the window at floor((total - target) / 2)', () => {
    const trimmed = trimMiddle(lines, 300);
    expect(trimmed.start).toBe(350);
    expect(trimmed.items[0]).toBe(351);
    expect(trimmed.items[299]).toBe(650);
    expect(trimMiddle([1, 2, 3, 4, 5], 2).items).toEqual([2, 3]);
  });

  it('keeps everything when the target covers the whole input', () => {
    for (const strategy of ['head', 'middle', 'tail', 'random'] as const) {
      const trimmed = trimSequence(lines, strategy, 1000, mulberry32(7));
      expect(trimmed.start).toBe(0);
      expect(trimmed.items).toEqual(lines);
    }
    expect(trimTail([1, 2], 5).items).toEqual([1, 2]);
  });

  it('random picks a contiguous window that fits', () => {
    const rng = mulberry32(1234);
    for (let k = 0; k < 50; k += 1) {
      const trimmed = trimRandom(lines, 300, rng);
      expect(trimmed.start).toBeGreaterThanOrEqual(0);
      expect(trimmed.start).toBeLessThanOrEqual(700);
      expect(trimmed.items).toEqual(lines.slice(trimmed.start, trimmed.start + 300));
    }
  });

  it('random with the same seed picks the same window', () => {
    expect(trimRandom(lines, 10, mulberry32(99)).start).toBe(trimRandom(lines, 10, mulberry32(99)).start);
  });

  it('rejects a non-positive or fractional target', () => {
    expect(() => trimHead(lines, 0)).toThrow('Trim target must be a positive integer, got 0');
    expect(() => trimMiddle(lines, -3)).toThrow(/positive integer/);
    expect(() => trimTail(lines, 2.5)).toThrow(/positive integer/);
  });

  it('needs a generator for random trimming', () => {
    expect(() => trimSequence(lines, 'random', 10)).toThrow('Random trimming needs a seeded generator');
  });

  it('parses strategy names case-insensitively', () => {
    expect(parseTrimStrategy('Middle')).toBe('middle');
    expect(() => parseTrimStrategy('sample')).toThrow("Unknown trim strategy 'sample' (expected head|middle|tail|random)");
  });
});

describe('seeded randomness', () => {
  it('mulberry32 is reproducible and stays in [0, 1)', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    for (let k = 0; k < 100; k += 1) {
      const value = a();
      expect(value).toBe(b());
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('randomInt is inclusive on both ends', () => {
    expect(randomInt(() => 0, 3, 9)).toBe(3);
    expect(randomInt(() => 0.999999, 3, 9)).toBe(9);
  });

  it('derives the same trial seeds from the same master seed', () => {
    const seeds = deriveTrialSeeds(2024, 10);
    expect(seeds).toHaveLength(10);
    expect(deriveTrialSeeds(2024, 10)).toEqual(seeds);
    expect(new Set(seeds).size).toBeGreaterThan(1);
    expect(deriveTrialSeeds(2025, 10)).not.toEqual(seeds);
  });
});

describe('trimWatText', () => {
  const text = 'a\nb\nc\nd\ne\n';

  it('trims by line and keeps line terminators', () => {
    expect(trimWatText(text, 'head', 2, 'lines')).toEqual({ text: 'a\nb\n', total: 5, kept: 2, start: 0 });
    expect(trimWatText(text, 'middle', 3, 'lines')).toEqual({ text: 'b\nc\nd\n', total: 5, kept: 3, start: 1 });
    expect(trimWatText(text, 'tail', 1, 'lines')).toEqual({ text: 'e\n', total: 5, kept: 1, start: 4 });
  });

  it('trims by instruction and writes one mnemonic per line', () => {
    const wat = '(func (local.get 0) (local.get 1) (i32.add) (drop) (return))';
    expect(trimWatText(wat, 'tail', 2, 'instructions')).toEqual({ text: 'drop\nreturn\n', total: 5, kept: 2, start: 3 });
    expect(trimWatText('(module)', 'head', 2, 'instructions')).toEqual({ text: '', total: 0, kept: 0, start: 0 });
  });
});

describe('trim log', () => {
  it('writes and reads the ten-column log', () => {
    const records: TrimLogRecord[] = [
      {
        trial: 1,
        algo: 'bubsort',
        lang: 'c',
        relpath_after_lang: 'bubsort.wat',
        total_lines: 1200,
        kept_lines: 500,
        start_index: 37,
        strategy: 'random',
        target: 500,
        trial_seed: 123456,
      },
      {
        trial: 1,
        algo: 'collatz',
        lang: 'go',
        relpath_after_lang: 'collatz.wat',
        total_lines: 80,
        kept_lines: 80,
        start_index: 0,
        strategy: 'head',
        target: 500,
        trial_seed: null,
      },
    ];
    const csv = formatTrimLog(records);
    expect(csv.split('\n')[0]).toBe(
      'trial,algo,lang,relpath_after_lang,total_lines,kept_lines,start_index,strategy,target,trial_seed',
    );
    expect(csv.split('\n')[2]).toBe('1,collatz,go,collatz.wat,80,80,0,head,500,');
    expect(parseTrimLog(csv)).toEqual(records);
  });

  it('rejects a log with the wrong header', () => {
    expect(() => parseTrimLog('trial,algo\n1,x\n')).toThrow('Unexpected trim log header');
  });
});

describe('trimCorpus', () => {
  let tmpDir: string;
  let corpusRoot: string;

  const numbered = (count: number, prefix: string): string =>
    Array.from({ length: count }, (_, i) => `  ${prefix} ;; ${i}\n`).join('');

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'watsim-trim-'));
    corpusRoot = path.join(tmpDir, 'not_trimmed');
    const files: Array<[string, string, string]> = [
      ['bubsort', 'c', numbered(40, 'i32.add')],
      ['bubsort', 'go', numbered(12, 'local.get')],
      ['fizzbuzz', 'c', numbered(25, 'call')],
    ];
    for (const [algorithm, language, text] of files) {
      fs.mkdirSync(path.join(corpusRoot, algorithm, language), { recursive: true });
      fs.writeFileSync(path.join(corpusRoot, algorithm, language, `${algorithm}.wat`), text);
    }
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('writes a head-trimmed copy of every present file and logs it', () => {
    const outputRoot = path.join(tmpDir, 'trimmed');
    const result = trimCorpus({
      corpusRoot,
      outputRoot,
      algorithms: ['bubsort', 'fizzbuzz'],
      languages: ['c', 'go'],
      strategy: 'head',
      target: 20,
    });

    expect(result.masterSeed).toBeNull();
    expect(result.variants.map((v) => v.name)).toEqual(['head']);
    const [variant] = result.variants;
    expect(variant.records.map((r) => [r.algo, r.lang, r.total_lines, r.kept_lines, r.start_index])).toEqual([
      ['bubsort', 'c', 40, 20, 0],
      ['bubsort', 'go', 12, 12, 0],
      ['fizzbuzz', 'c', 25, 20, 0],
    ]);
    expect(fs.readFileSync(path.join(outputRoot, 'head', 'bubsort', 'c', 'bubsort.wat'), 'utf8')).toBe(
      numbered(20, 'i32.add'),
    );
    expect(fs.existsSync(path.join(outputRoot, 'head', 'fizzbuzz', 'go'))).toBe(false);
    const log = parseTrimLog(fs.readFileSync(path.join(outputRoot, 'head', TRIM_LOG_FILENAME), 'utf8'));
    expect(log).toEqual(variant.records);
    expect(process.stderr.write).toHaveBeenCalledWith(expect.stringContaining('skipping missing WAT file'));
  });

  it('reproduces random trials from the master seed', () => {
    const run = (outputRoot: string) =>
      trimCorpus({
        corpusRoot,
        outputRoot,
        algorithms: ['bubsort', 'fizzbuzz'],
        languages: ['c', 'go'],
        strategy: 'random',
        target: 10,
        trials: 3,
        seed: 77,
      });
    const first = run(path.join(tmpDir, 'r1'));
    const second = run(path.join(tmpDir, 'r2'));

    expect(first.masterSeed).toBe(77);
    expect(first.variants.map((v) => v.name)).toEqual(['1', '2', '3']);
    expect(first.variants.map((v) => v.trialSeed)).toEqual(deriveTrialSeeds(77, 3));
    expect(second.variants.map((v) => v.records)).toEqual(first.variants.map((v) => v.records));
    for (const variant of first.variants) {
      for (const record of variant.records) {
        expect(record.kept_lines).toBe(10);
        expect(record.start_index).toBeLessThanOrEqual(record.total_lines - 10);
        expect(record.trial).toBe(variant.trial);
      }
      const copy = fs.readFileSync(path.join(variant.dir, 'bubsort', 'c', 'bubsort.wat'), 'utf8');
      const start = variant.records[0].start_index;
      expect(copy).toBe(splitLines(numbered(40, 'i32.add')).slice(start, start + 10).join(''));
    }
  });

  it('draws and reports a master seed when none is given', () => {
    const result = trimCorpus({
      corpusRoot,
      outputRoot: path.join(tmpDir, 'r'),
      algorithms: ['bubsort'],
      languages: ['c'],
      strategy: 'random',
      target: 5,
      trials: 2,
    });
    expect(typeof result.masterSeed).toBe('number');
    expect(result.variants).toHaveLength(2);
  });

  it('extracts n-gram files for each trimmed copy when asked', () => {
    const outputRoot = path.join(tmpDir, 'trimmed');
    trimCorpus({
      corpusRoot,
      outputRoot,
      algorithms: ['bubsort'],
      languages: ['c'],
      strategy: 'tail',
      target: 3,
      extractNGrams: true,
      range: { min: 1, max: 2 },
    });
    const grams = path.join(outputRoot, 'tail', 'bubsort', 'c', 'grams');
    expect(fs.readdirSync(grams).sort()).toEqual(['bubsort_bg_1gram.txt', 'bubsort_bg_2gram.txt']);
    expect(fs.readFileSync(path.join(grams, 'bubsort_bg_1gram.txt'), 'utf8')).toBe('i32.add\t3\n');
  });

  it('rejects a corpus root that does not exist', () => {
    expect(() =>
      trimCorpus({
        corpusRoot: path.join(tmpDir, 'nowhere'),
        outputRoot: path.join(tmpDir, 'out'),
        algorithms: ['bubsort'],
        languages: ['c'],
        strategy: 'head',
        target: 3,
      }),
    ).toThrow(/Corpus root/);
  });
});
