/**
 * Zod schemas for metric snapshots and classifier configuration files.
 *
 * Field names in files are snake_case for configuration and camelCase for
 * metric state, which mirrors `Metric.state()` one to one.
 */

import { z } from 'zod';
import { findAucStateProblem } from '../metrics/auc.js';
import { isLabel, type Label } from '../types.js';

const labelSchema = z.custom<Label>(isLabel, {
  message: 'Expected a string or finite number label',
});
const countSchema = z.number().finite().nonnegative();

const countsShape = {
  truePositives: countSchema,
  trueNegatives: countSchema,
  falsePositives: countSchema,
  falseNegatives: countSchema,
};

export const confusionMatrixStateSchema = z
  .object({
    kind: z.enum(['precision', 'recall', 'f1']),
    ...countsShape,
  })
  .strict();

export const weightedF1StateSchema = z
  .object({
    kind: z.literal('weighted_f1'),
    classes: z
      .array(z.object({ label: labelSchema, ...countsShape }).strict())
      .refine((classes) => new Set(classes.map((c) => c.label)).size === classes.length, {
        message: 'Class labels must be unique',
      }),
  })
  .strict();

export const aucStateSchema = z
  .object({
    kind: z.literal('auc'),
    classLabel: labelSchema,
    thresholds: z.array(z.number().finite()),
    buckets: z.array(z.tuple([countSchema, countSchema])),
    positiveCount: countSchema,
    negativeCount: countSchema,
  })
  .strict()
  .superRefine((s, ctx) => {
    const problem = findAucStateProblem(s);
    if (problem !== null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });

export const averageStateSchema = z
  .object({
    kind: z.literal('average'),
    numer: z.number().finite(),
    denom: z.number().finite(),
  })
  .strict();

export const metricStateSchema = z.union([
  confusionMatrixStateSchema,
  weightedF1StateSchema,
  aucStateSchema,
  averageStateSchema,
]);

/**
 * A registry snapshot: metric state keyed by metric name.
 */
export const registryStateSchema = z
  .object({
    $schema: z.string().optional(),
    metrics: z.record(z.string(), metricStateSchema),
  })
  .strict();

/**
 * Classifier configuration as written in a YAML/JSON file.
 */
export const classifierConfigSchema = z
  .object({
    classes: z.array(z.string().min(1)).min(1).optional(),
    classes_from_file: z.string().optional(),
    ref_class: z.string().optional().nullable(),
    threshold: z.number().min(0).max(1).optional().default(0.5),
    area_under_curve: z.boolean().optional().default(false),
    auc_decimal_places: z.number().int().min(0).max(12).optional().default(3),
  })
  .strict();

export type ClassifierConfigFile = z.infer<typeof classifierConfigSchema>;
