export * from './core/types';
export { logger, setLogLevel, getLogLevel, parseLogLevel } from './core/logger';
export type { LogLevel } from './core/logger';
export { defaultConfig, loadConfig, saveConfig, REFERENCE_TARGETS } from './core/config';
export { StudyConfigSchema, SimilarityMatrixSchema, TrimLogRecordSchema, safeParseStudyConfig } from './core/schema';
export { tokenizeInstructions, isInstructionToken, splitLines, DECLARATION_TOKENS, BARE_OPCODES } from './core/tokenize/instructions';
export { buildNGramTable, buildNGramTables, DEFAULT_NGRAM_RANGE, NGRAM_DELIMITER } from './core/ngram/table';
export {
  formatNGramTable,
  parseNGramTable,
  loadNGramTable,
  extractNGramFiles,
  ngramFileName,
  DEFAULT_NGRAM_FILE_PATTERN,
} from './core/ngram/io';
export {
  cosineSimilarity,
  jaccardSimilarity,
  overlapCoefficient,
  manhattanSimilarity,
  klSimilarity,
  klDivergence,
  KL_EPSILON,
} from './core/similarity/vectorize';
export { lcsLength, lcsSimilarity, limitSequence, parseLcsMethod, LCS_METHODS } from './core/similarity/lcs';
export { TokenRepresentation, LoadedRepresentation } from './core/similarity/representation';
export type { Representation } from './core/similarity/representation';
export { createMetric, parseMetricName, averageOverRange, METRIC_NAMES } from './core/similarity/metrics';
export type { PairwiseMetric, MetricOptions } from './core/similarity/metrics';
export { CorpusRepresentations, corpusLabel, toCorpusItems, watPath, ngramPath } from './core/corpus/corpus';
export { buildSimilarityMatrix, buildCorpusMatrix, pairCount } from './core/matrix/build';
export { averageMatrices, matrixCorrelation, upperTriangle, pearson, assertSameShape } from './core/matrix/aggregate';
export { formatMatrixCsv, parseMatrixCsv, readMatrixCsv, writeMatrixCsv, readMatrixJson, writeMatrixJson, matrixFileName } from './core/matrix/io';
export { trimHead, trimMiddle, trimTail, trimRandom, trimSequence, parseTrimStrategy, TRIM_STRATEGIES } from './core/trim/strategies';
export { mulberry32, deriveTrialSeeds } from './core/trim/random';
export { measureCompression, summarizeCompression, formatCompressionCsv, measureFile } from './core/trim/compression';
export type { CompressionRecord, CompressionSummary, CompressionOptions } from './core/trim/compression';
export { trimCorpus, trimWatText, formatTrimLog, parseTrimLog, TRIM_LOG_FILENAME } from './core/trim/run';
export { buildStudyMatrices, writeStudyMatrices, averageTrialMatrices, compareMatrixDirs } from './core/study';
