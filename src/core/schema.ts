/**
 * Zod schemas for validating StudyConfig, SimilarityMatrix, and TrimLogRecord.
 */

import { z } from 'zod';

const positiveInt = z.number().int().min(1);

export const CorpusTargetSchema = z.object({
  algorithm: z.string().min(1),
  language: z.string().min(1),
});

export const StudyConfigSchema = z
  .object({
    version: z.number(),
    corpus_root: z.string().min(1),
    algorithms: z.array(z.string().min(1)),
    languages: z.array(z.string().min(1)),
    targets: z.array(CorpusTargetSchema).min(1),
    ngram: z.object({
      min_n: positiveInt,
      max_n: positiveInt,
      source: z.enum(['wat', 'grams']),
      file_pattern: z.string().includes('{n}'),
    }),
    metrics: z.array(z.enum(['cosine', 'jaccard', 'overlap', 'manhattan', 'kl', 'lcs'])),
    lcs: z.object({
      method: z.enum(['min', 'avg', 'max']),
      limit: positiveInt.optional(),
    }),
    matrix: z.object({
      output_dir: z.string().min(1),
    }),
    trim: z.object({
      strategy: z.enum(['head', 'middle', 'tail', 'random']),
      target: positiveInt,
      unit: z.enum(['lines', 'instructions']),
      trials: positiveInt,
      seed: z.number().int().min(0).optional(),
      output_root: z.string().min(1),
      extract_ngrams: z.boolean(),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.ngram.max_n < config.ngram.min_n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ngram', 'max_n'],
        message: `max_n (${config.ngram.max_n}) must be >= min_n (${config.ngram.min_n})`,
      });
    }
    const seen = new Set<string>();
    config.targets.forEach((target, i) => {
      const label = `${target.algorithm}_${target.language}`;
      if (seen.has(label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['targets', i],
          message: `duplicate target '${label}'`,
        });
      }
      seen.add(label);
    });
  });

export const SimilarityMatrixSchema = z
  .object({
    metric: z.string(),
    labels: z.array(z.string()),
    values: z.array(z.array(z.number())),
  })
  .refine((m) => m.values.length === m.labels.length && m.values.every((row) => row.length === m.labels.length), {
    message: 'matrix values must be square and match labels',
  });

export const TrimLogRecordSchema = z.object({
  trial: z.number().int(),
  algo: z.string(),
  lang: z.string(),
  relpath_after_lang: z.string(),
  total_lines: z.number().int().min(0),
  kept_lines: z.number().int().min(0),
  start_index: z.number().int().min(0),
  strategy: z.enum(['head', 'middle', 'tail', 'random']),
  target: positiveInt,
  trial_seed: z.number().int().nullable(),
});

export type ValidatedStudyConfig = z.infer<typeof StudyConfigSchema>;

/**
 * Validate a StudyConfig, returning the parsed config or the list of issues.
 */
export function safeParseStudyConfig(raw: unknown): { success: true; data: ValidatedStudyConfig } | { success: false; errors: string[] } {
  const result = StudyConfigSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return { success: false, errors };
}
