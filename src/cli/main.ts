#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { defaultConfig, loadConfig, saveConfig } from '../core/config';
import { logger, parseLogLevel, setLogLevel } from '../core/logger';
import { writeMatrixCsv, matrixFileName } from '../core/matrix/io';
import { extractNGramFiles } from '../core/ngram/io';
import { parseLcsMethod } from '../core/similarity/lcs';
import { METRIC_NAMES, parseMetricName } from '../core/similarity/metrics';
import { averageTrialMatrices, buildStudyMatrices, compareMatrixDirs, writeStudyMatrices } from '../core/study';
import { tokenizeInstructions } from '../core/tokenize/instructions';
import { formatCompressionCsv, measureCompression, summarizeCompression } from '../core/trim/compression';
import { parseTrimStrategy } from '../core/trim/strategies';
import { trimCorpus } from '../core/trim/run';
import type { MetricName, SimilarityMatrix, StudyConfig, TrimUnit } from '../core/types';

const program = new Command();

function readPackageVersion(): string {
  const packageJsonPath = path.resolve(__dirname, '..', '..', 'package.json');
  if (!fs.existsSync(packageJsonPath)) return '0.0.0';
  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

program
  .name('watsim')
  .description('Structural similarity of WebAssembly text modules, and how trimming changes it.')
  .version(readPackageVersion())
  .option('--log-level <level>', 'debug|info|warn|error|silent')
  .hook('preAction', (command) => {
    const level = command.opts<{ logLevel?: string }>().logLevel;
    if (level) setLogLevel(parseLogLevel(level));
  });

function resolveConfigPath(cwd: string): string {
  return path.join(cwd, '.watsim', 'config.yaml');
}

function loadStudyConfig(configOption: string | undefined): StudyConfig {
  const configPath = configOption || resolveConfigPath(process.cwd());
  return loadConfig(fs.existsSync(configPath) ? configPath : undefined, process.cwd());
}

function parseFormat(format?: string): 'text' | 'json' {
  if (format && format.toLowerCase() === 'json') return 'json';
  return 'text';
}

function parseInteger(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

function parseUnit(value: string): TrimUnit {
  if (value === 'lines' || value === 'instructions') return value;
  throw new Error(`Unknown trim unit '${value}' (expected lines|instructions)`);
}

function parseMetricList(values: string[] | undefined, fallback: readonly MetricName[]): MetricName[] {
  if (!values || !values.length) return [...fallback];
  return values.flatMap((value) => value.split(',')).filter(Boolean).map(parseMetricName);
}

// Commander actions run synchronously; failures end the process with a red message.
function guarded<A extends unknown[]>(action: (...args: A) => void): (...args: A) => void {
  return (...args: A) => {
    try {
      action(...args);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(chalk.red(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    }
  };
}

function printMatrix(matrix: SimilarityMatrix): void {
  const width = Math.max(...matrix.labels.map((label) => label.length), 6);
  // eslint-disable-next-line no-console
  console.log(chalk.bold(matrix.metric.toUpperCase()));
  // eslint-disable-next-line no-console
  console.log(' '.repeat(width) + ' ' + matrix.labels.map((_, j) => String(j + 1).padStart(6)).join(' '));
  matrix.labels.forEach((label, i) => {
    const cells = matrix.values[i].map((value, j) => {
      const text = value.toFixed(4).padStart(6);
      return i === j ? chalk.gray(text) : text;
    });
    // eslint-disable-next-line no-console
    console.log(`${label.padEnd(width)} ${cells.join(' ')}`);
  });
}

program
  .command('init')
  .description('Write .watsim/config.yaml with the reference study defaults')
  .action(
    guarded(() => {
      const configPath = resolveConfigPath(process.cwd());
      saveConfig(configPath, defaultConfig('.'));
      // eslint-disable-next-line no-console
      console.log(chalk.green(`Wrote config to ${configPath}`));
    }),
  );

program
  .command('tokenize')
  .description('Print the instruction tokens of a .wat file')
  .argument('<wat>')
  .option('--format <format>', 'Output format: text|json', 'text')
  .action(
    guarded((watFile: string, options: { format?: string }) => {
      if (!fs.existsSync(watFile)) {
        throw new Error(`WAT file not found: ${watFile}`);
      }
      const tokens = tokenizeInstructions(fs.readFileSync(watFile, 'utf8'));
      if (parseFormat(options.format) === 'json') {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ count: tokens.length, tokens }, null, 2));
        return;
      }
      // eslint-disable-next-line no-console
      console.log(tokens.join('\n'));
    }),
  );

program
  .command('ngrams')
  .description('Write grams/<name>_<n>gram.txt tables beside a .wat file')
  .argument('<wat>')
  .option('--config <path>', 'Path to config.yaml')
  .option('--min <n>', 'Smallest n')
  .option('--max <n>', 'Largest n')
  .action(
    guarded((watFile: string, options: { config?: string; min?: string; max?: string }) => {
      const config = loadStudyConfig(options.config);
      const range = {
        min: options.min ? parseInteger(options.min, '--min') : config.ngram.min_n,
        max: options.max ? parseInteger(options.max, '--max') : config.ngram.max_n,
      };
      const written = extractNGramFiles(watFile, range, config.ngram.file_pattern);
      for (const file of written) {
        // eslint-disable-next-line no-console
        console.log(chalk.green(`Saved ${file}`));
      }
    }),
  );

program
  .command('matrix')
  .description('Build the all-pairs similarity matrix for each metric')
  .option('--config <path>', 'Path to config.yaml')
  .option('--corpus-root <dir>', 'Corpus root (<algorithm>/<language>/<algorithm>.wat)')
  .option('--metric <names...>', `Metrics: ${METRIC_NAMES.join(',')}`)
  .option('--lcs-method <method>', 'LCS normalization: min|avg|max')
  .option('--limit <n>', 'LCS: compare only the first n instructions of each file')
  .option('--out <dir>', 'Directory for the matrix CSV files')
  .option('--format <format>', 'Output format: text|json', 'text')
  .action(
    guarded(
      (options: {
        config?: string;
        corpusRoot?: string;
        metric?: string[];
        lcsMethod?: string;
        limit?: string;
        out?: string;
        format?: string;
      }) => {
        const base = loadStudyConfig(options.config);
        const config: StudyConfig = {
          ...base,
          lcs: {
            method: options.lcsMethod ? parseLcsMethod(options.lcsMethod) : base.lcs.method,
            limit: options.limit ? parseInteger(options.limit, '--limit') : base.lcs.limit,
          },
        };
        const metrics = parseMetricList(options.metric, config.metrics);
        const format = parseFormat(options.format);

        const matrices = buildStudyMatrices(config, {
          corpusRoot: options.corpusRoot ? path.resolve(options.corpusRoot) : undefined,
          metrics,
          onPair: (event) => {
            logger.info('cli', `pair ${event.index}/${event.total}`, {
              row: event.rowLabel,
              col: event.colLabel,
              score: event.score,
            });
          },
        });

        const outDir = options.out ? path.resolve(options.out) : config.matrix.output_dir;
        const files = writeStudyMatrices(outDir, matrices, config.lcs);

        if (format === 'json') {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify({ files, matrices }, null, 2));
          return;
        }
        matrices.forEach((matrix, i) => {
          printMatrix(matrix);
          // eslint-disable-next-line no-console
          console.log(chalk.green(`Wrote ${files[i]}\n`));
        });
      },
    ),
  );

program
  .command('trim')
  .description('Write trimmed variants of every corpus .wat file, with an audit log')
  .option('--config <path>', 'Path to config.yaml')
  .option('--strategy <name>', 'head|middle|tail|random')
  .option('--lines <n>', 'Target length (lines, or instructions with --unit instructions)')
  .option('--unit <unit>', 'lines|instructions')
  .option('--trials <n>', 'Random trials')
  .option('--seed <n>', 'Master seed for random trials')
  .option('--corpus-root <dir>', 'Corpus root to read')
  .option('--out <dir>', 'Output root')
  .option('--no-ngrams', 'Skip writing n-gram tables for trimmed files')
  .action(
    guarded(
      (options: {
        config?: string;
        strategy?: string;
        lines?: string;
        unit?: string;
        trials?: string;
        seed?: string;
        corpusRoot?: string;
        out?: string;
        ngrams: boolean;
      }) => {
        const config = loadStudyConfig(options.config);
        const strategy = options.strategy ? parseTrimStrategy(options.strategy) : config.trim.strategy;
        const result = trimCorpus({
          corpusRoot: options.corpusRoot ? path.resolve(options.corpusRoot) : config.corpus_root,
          outputRoot: options.out ? path.resolve(options.out) : config.trim.output_root,
          algorithms: config.algorithms,
          languages: config.languages,
          strategy,
          target: options.lines ? parseInteger(options.lines, '--lines') : config.trim.target,
          unit: options.unit ? parseUnit(options.unit) : config.trim.unit,
          trials: options.trials ? parseInteger(options.trials, '--trials') : config.trim.trials,
          seed: options.seed ? parseInteger(options.seed, '--seed') : config.trim.seed,
          extractNGrams: options.ngrams && config.trim.extract_ngrams,
          range: { min: config.ngram.min_n, max: config.ngram.max_n },
          filePattern: config.ngram.file_pattern,
        });

        for (const variant of result.variants) {
          // eslint-disable-next-line no-console
          console.log(chalk.bold(`[${variant.name}]`) + (variant.trialSeed === null ? '' : ` seed=${variant.trialSeed}`));
          for (const record of variant.records) {
            // eslint-disable-next-line no-console
            console.log(`  ${record.algo}/${record.lang}: ${record.total_lines} -> ${record.kept_lines} (start ${record.start_index})`);
          }
        }
        if (result.masterSeed !== null) {
          // eslint-disable-next-line no-console
          console.log(chalk.cyan(`Master seed: ${result.masterSeed}`));
        }
      },
    ),
  );

program
  .command('average')
  .description('Average each metric matrix across trial directories')
  .argument('<trial_dirs...>')
  .option('--config <path>', 'Path to config.yaml')
  .option('--out <dir>', 'Output directory', 'average_matrices')
  .action(
    guarded((trialDirs: string[], options: { config?: string; out: string }) => {
      const config = loadStudyConfig(options.config);
      for (const metric of config.metrics) {
        const averaged = averageTrialMatrices(trialDirs, metric, config.lcs);
        const outPath = path.join(path.resolve(options.out), matrixFileName(metric, config.lcs, '_avg'));
        writeMatrixCsv(outPath, averaged);
        // eslint-disable-next-line no-console
        console.log(chalk.green(`Wrote ${outPath} (${trialDirs.length} trials)`));
      }
    }),
  );

program
  .command('compare')
  .description('Pearson correlation of matrices before and after trimming (upper triangles)')
  .argument('<before_dir>')
  .argument('<after_dir>')
  .option('--config <path>', 'Path to config.yaml')
  .option('--suffix <suffix>', 'File name suffix of the after matrices', '_avg')
  .option('--format <format>', 'Output format: text|json', 'text')
  .action(
    guarded((beforeDir: string, afterDir: string, options: { config?: string; suffix: string; format?: string }) => {
      const config = loadStudyConfig(options.config);
      const results = compareMatrixDirs(beforeDir, afterDir, config.metrics, config.lcs, options.suffix);
      if (parseFormat(options.format) === 'json') {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(results, null, 2));
        return;
      }
      for (const { metric, correlation } of results) {
        const text = correlation === null ? chalk.gray('n/a') : correlation.toFixed(4);
        // eslint-disable-next-line no-console
        console.log(`${metric.padEnd(10)} r = ${text}`);
      }
    }),
  );

program
  .command('compression')
  .description('Line and byte reduction of trimmed variants against the untrimmed corpus')
  .argument('<variant_dirs...>')
  .option('--config <path>', 'Path to config.yaml')
  .option('--corpus-root <dir>', 'Untrimmed corpus root')
  .option('--out <file>', 'Also write the per-file records as CSV')
  .option('--format <format>', 'Output format: text|json', 'text')
  .action(
    guarded((variantDirs: string[], options: { config?: string; corpusRoot?: string; out?: string; format?: string }) => {
      const config = loadStudyConfig(options.config);
      const records = measureCompression({
        corpusRoot: options.corpusRoot ? path.resolve(options.corpusRoot) : config.corpus_root,
        variantDirs: variantDirs.map((dir) => path.resolve(dir)),
        algorithms: config.algorithms,
        languages: config.languages,
      });
      const summary = summarizeCompression(records);
      if (options.out) {
        const outPath = path.resolve(options.out);
        fs.mkdirSync(path.dirname(outPath), { recursive: true });
        fs.writeFileSync(outPath, formatCompressionCsv(records), 'utf8');
      }

      if (parseFormat(options.format) === 'json') {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ records, summary }, null, 2));
        return;
      }
      const percent = (rate: number) => `${(rate * 100).toFixed(1)}%`;
      for (const record of records) {
        // eslint-disable-next-line no-console
        console.log(
          `${record.algo}/${record.lang}: lines ${record.lines_before} -> ${record.lines_after.toFixed(1)} (${percent(record.reduction_rate_lines)}), ` +
            `bytes ${record.bytes_before} -> ${record.bytes_after.toFixed(1)} (${percent(record.reduction_rate_bytes)})`,
        );
      }
      // eslint-disable-next-line no-console
      console.log(
        chalk.bold(
          `\n${summary.files} files: lines -${percent(summary.reduction_rate_lines)}, bytes -${percent(summary.reduction_rate_bytes)}`,
        ),
      );
      for (const group of summary.by_algorithm) {
        // eslint-disable-next-line no-console
        console.log(`  ${group.algo.padEnd(15)} ${percent(group.reduction_rate_lines).padStart(7)} ${percent(group.reduction_rate_bytes).padStart(7)}`);
      }
      if (options.out) {
        // eslint-disable-next-line no-console
        console.log(chalk.green(`Wrote ${path.resolve(options.out)}`));
      }
    }),
  );

program.parse(process.argv);
