/**
 * Zod schema for evaluation config files.
 *
 * Keys use camelCase in YAML and JSON alike. Unknown keys are rejected so that
 * a misspelled option fails loudly instead of silently falling back.
 */

import { z } from 'zod';

const ratioSchema = z.number().min(0).max(1);

export const splitConfigSchema = z
  .object({
    train: ratioSchema.optional(),
    val: ratioSchema.optional(),
  })
  .strict()
  .refine((s) => (s.train ?? 0.6) + (s.val ?? 0.2) <= 1, {
    message: 'train + val ratios must not exceed 1',
  });

export const evalConfigSchema = z
  .object({
    $schema: z.string().optional(),
    title: z.string().min(1).optional(),
    sampleCount: z.number().int().min(0).default(3),
    seed: z.number().int().optional(),
    maxConcurrency: z.number().int().min(1).default(1),
    extensions: z.array(z.string().min(1)).nonempty().optional(),
    split: splitConfigSchema.optional(),
  })
  .strict();

export type EvalConfig = z.infer<typeof evalConfigSchema>;
export type EvalConfigInput = z.input<typeof evalConfigSchema>;

export const defaultEvalConfig: EvalConfig = evalConfigSchema.parse({});
