/**
 * Zod schemas for session config files and external curve documents.
 *
 * Files use snake_case keys; the loaders map them onto camelCase options.
 */

import { z } from 'zod';
import { parameterSchemas } from '../session/parameters.js';

/**
 * Schema for a session config file. Every key is optional and falls back to the
 * defaults of the interactive explorer.
 */
export const sessionConfigSchema = z
  .object({
    title: parameterSchemas.title.default('ROC Curve'),
    auc_target: parameterSchemas.aucTarget.default(0.7),
    spread: parameterSchemas.spread.default(0.2),
    sample_size: parameterSchemas.sampleSize.default(400),
    threshold_fraction: parameterSchemas.thresholdFraction.default(0.5),
    cache_size: z.number().int().nonnegative().default(32),
    fetch_timeout_ms: z.number().int().positive().default(10_000),
    seed: z.number().int().optional().nullable(),
    data_url: z.string().url().optional().nullable(),
  })
  .strict();

export type SessionConfigRaw = z.input<typeof sessionConfigSchema>;

/**
 * Schema for an external curve: parallel `x` (false positive rate) and `y`
 * (true positive rate) columns, with optional class sizes. Missing sizes default
 * to half the number of points, so both classes must end up non-empty. Extra
 * columns are ignored.
 */
export const externalCurveSchema = z
  .object({
    x: z.array(z.number().min(0).max(1)).min(1),
    y: z.array(z.number().min(0).max(1)).min(1),
    positives: z.number().int().positive().optional(),
    negatives: z.number().int().positive().optional(),
  })
  .refine((data) => data.x.length === data.y.length, {
    message: "'x' and 'y' must have the same length",
  })
  .refine(
    (data) => (data.positives !== undefined && data.negatives !== undefined) || data.x.length >= 2,
    { message: "a single-point curve needs 'positives' and 'negatives'" },
  );

export type ExternalCurveRaw = z.infer<typeof externalCurveSchema>;
