/**
 * Zod schemas for feed deviation inputs (weights, selections, options, config file).
 * Structure-only validation; numeric semantics live in the pipeline stages.
 */

import { z } from 'zod';

export const ALL_SENTINEL = 'ALL';

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const relativeWeightMapSchema = z.record(
  z.string(),
  z.number().min(0).max(1),
);

export const recordSelectionSchema = z
  .object({
    operators: z.array(z.string()).optional(),
    foods: z.array(z.string()).optional(),
    diets: z.array(z.string()).optional(),
    startDate: isoDateSchema.optional(),
    endDate: isoDateSchema.optional(),
  })
  .refine(
    (s) => !s.startDate || !s.endDate || s.startDate <= s.endDate,
    { message: 'startDate must not be after endDate', path: ['endDate'] },
  );

export const columnMapSchema = z.object({
  plannedKg: z.string().min(1),
  realizedKg: z.string().min(1),
  pctDifference: z.string().min(1),
  foodType: z.string().min(1),
  batchCode: z.string().min(1),
  operator: z.string().min(1),
  dietName: z.string().min(1),
  date: z.string().min(1),
  food: z.string().min(1).optional(),
});

export const sheetLayoutSchema = z.object({
  skipRows: z.number().int().min(0),
  removeFirstColumn: z.boolean(),
  columnsToRemove: z.array(z.string()),
});

export const outlierModeSchema = z.enum(['upper', 'both']);

export const analysisOptionsSchema = z.object({
  toleranceThreshold: z.number().finite(),
  defaultWeight: z.number().min(0).max(1),
  applyWeightToQuantity: z.boolean(),
  outlierMode: outlierModeSchema,
  removeOutliersFromHistogram: z.boolean(),
  bucketWidth: z.number().positive(),
  bucketCount: z.number().int().min(0),
  maxBins: z.number().int().min(1),
  degenerateMargin: z.number().positive(),
});

export const feedDeviationConfigSchema = z.object({
  columns: columnMapSchema,
  layout: sheetLayoutSchema,
  analysis: analysisOptionsSchema,
  /** Initial weights offered per food type; food types not listed use analysis.defaultWeight. */
  weights: relativeWeightMapSchema,
});

export type SheetLayout = z.infer<typeof sheetLayoutSchema>;
export type AnalysisOptions = z.infer<typeof analysisOptionsSchema>;
export type FeedDeviationConfig = z.infer<typeof feedDeviationConfigSchema>;
