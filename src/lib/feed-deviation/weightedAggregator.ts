/**
 * Weighted aggregator: ingredient rows -> one weighted deviation per batch.
 *
 *   adjustedQty  = plannedKg * weight(foodType)
 *   contribution = adjustedQty * |pctDifference|
 *   weightedAvg  = Σ contribution / Σ adjustedQty
 *
 * A food type missing from the weight map uses `defaultWeight` (DEFAULT_WEIGHT unless given).
 * Batches with Σ adjustedQty = 0 are excluded and reported, never emitted as NaN/Infinity.
 */

import { DivisionUndefinedError } from '@/src/lib/errors/app-error';
import type {
  AnalysisDiagnostic,
  BatchAggregate,
  IngredientRecord,
  RelativeWeightMap,
} from './feedDeviation.types';

/** Weight for a food type that has no entry in the map (equal weighting). */
export const DEFAULT_WEIGHT = 1.0;

export type AggregateOptions = {
  defaultWeight?: number;
  /** false: adjustedQty = plannedKg (weights ignored for the quantity). Default true. */
  applyWeightToQuantity?: boolean;
  /** Called per emitted batch (debug logging). */
  onBatch?: (aggregate: BatchAggregate) => void;
};

export type AggregateResult = {
  aggregates: BatchAggregate[];
  diagnostics: AnalysisDiagnostic[];
};

export function resolveWeight(
  weights: RelativeWeightMap,
  foodType: string,
  defaultWeight: number = DEFAULT_WEIGHT,
): number {
  return Object.prototype.hasOwnProperty.call(weights, foodType)
    ? weights[foodType]
    : defaultWeight;
}

/**
 * Aggregate one batch. Throws DivisionUndefinedError when the total adjusted quantity is 0
 * (or the group is empty).
 */
export function computeBatchAggregate(
  batchCode: string,
  records: readonly IngredientRecord[],
  weights: RelativeWeightMap,
  options: AggregateOptions = {},
): BatchAggregate {
  const defaultWeight = options.defaultWeight ?? DEFAULT_WEIGHT;
  const applyWeight = options.applyWeightToQuantity ?? true;

  let totalAdjustedQty = 0;
  let totalContribution = 0;
  for (const r of records) {
    const adjustedQty = applyWeight
      ? r.plannedKg * resolveWeight(weights, r.foodType, defaultWeight)
      : r.plannedKg;
    totalAdjustedQty += adjustedQty;
    totalContribution += adjustedQty * Math.abs(r.pctDifference);
  }

  if (records.length === 0 || totalAdjustedQty === 0) {
    throw new DivisionUndefinedError(batchCode);
  }
  const weightedAvgPct = totalContribution / totalAdjustedQty;
  if (!Number.isFinite(weightedAvgPct)) {
    throw new DivisionUndefinedError(batchCode);
  }

  let date = records[0].date;
  for (const r of records) {
    if (r.date < date) date = r.date;
  }

  return Object.freeze({
    batchCode,
    weightedAvgPct,
    totalAdjustedQty,
    totalContribution,
    date,
    operator: records[0].operator,
    dietName: records[0].dietName,
    ingredientCount: records.length,
  });
}

/** Group by batch code and aggregate; output sorted by batch code ascending. */
export function aggregateBatches(
  records: readonly IngredientRecord[],
  weights: RelativeWeightMap,
  options: AggregateOptions = {},
): AggregateResult {
  const byBatch = new Map<string, IngredientRecord[]>();
  for (const r of records) {
    const list = byBatch.get(r.batchCode) ?? [];
    list.push(r);
    byBatch.set(r.batchCode, list);
  }

  const codes = [...byBatch.keys()].sort();
  const aggregates: BatchAggregate[] = [];
  const diagnostics: AnalysisDiagnostic[] = [];

  for (const code of codes) {
    try {
      const aggregate = computeBatchAggregate(
        code,
        byBatch.get(code) ?? [],
        weights,
        options,
      );
      aggregates.push(aggregate);
      options.onBatch?.(aggregate);
    } catch (err) {
      if (!(err instanceof DivisionUndefinedError)) throw err;
      diagnostics.push({
        code: 'DIVISION_UNDEFINED',
        severity: 'warn',
        message: err.safeMessage,
        batchCode: err.batchCode,
      });
    }
  }

  return { aggregates, diagnostics };
}
