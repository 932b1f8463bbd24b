/**
 * Zod schemas for the sweep configuration file format.
 *
 * Costs are only type-checked here; their range is validated per evaluation,
 * so a bad scenario fails its own pairs rather than the whole file.
 */

import { z } from 'zod';

export const scenarioSchema = z
  .object({
    name: z.string().min(1),
    cost_fp: z.number(),
    cost_fn: z.number(),
  })
  .strict();

export type ScenarioRaw = z.infer<typeof scenarioSchema>;

export const sweepConfigSchema = z
  .object({
    $schema: z.string().optional(),
    name: z.string().optional().nullable(),
    compare_calibrated: z.boolean().optional().default(true),
    max_concurrency: z.number().int().min(1).optional().nullable(),
    reference_threshold: z.number().optional().nullable(),
    scenarios: z.array(scenarioSchema).min(1),
  })
  .strict();

export type SweepConfigRaw = z.infer<typeof sweepConfigSchema>;
