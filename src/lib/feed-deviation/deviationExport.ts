/**
 * Export shaping for the presentation side: flat statistics table, processed batch rows
 * with a severity class (drives sheet colouring) and the weight table.
 */

import { DEFAULT_WEIGHT, resolveWeight } from './weightedAggregator';
import type {
  BatchAggregate,
  DeviationSeverity,
  ProcessedBatchRow,
  RelativeWeightMap,
  StatisticsSummary,
  StatisticsTableRow,
} from './feedDeviation.types';

export function roundTo1(v: number | null): number | null {
  return v == null ? null : Math.round(v * 10) / 10;
}

/** Row-per-metric table; means/medians/percentages rounded to one decimal. */
export function toStatisticsTable(
  summary: StatisticsSummary,
): StatisticsTableRow[] {
  const rows: StatisticsTableRow[] = [
    {
      metric: 'Batch count',
      withOutliers: summary.countWith,
      withoutOutliers: summary.countWithout,
    },
    {
      metric: 'Mean (%)',
      withOutliers: roundTo1(summary.meanWith),
      withoutOutliers: roundTo1(summary.meanWithout),
    },
    {
      metric: 'Median (%)',
      withOutliers: roundTo1(summary.medianWith),
      withoutOutliers: roundTo1(summary.medianWithout),
    },
  ];

  const { withOutliers, withoutOutliers } = summary.rangeBuckets;
  const labels = (
    withOutliers.length > 0 ? withOutliers : withoutOutliers
  ).map((b) => b.label);
  for (const label of labels) {
    const w = withOutliers.find((b) => b.label === label);
    const wo = withoutOutliers.find((b) => b.label === label);
    rows.push({
      metric: label,
      withOutliers: w?.count ?? null,
      withoutOutliers: wo?.count ?? null,
    });
    rows.push({
      metric: `${label} (% of batches)`,
      withOutliers: roundTo1(w?.percent ?? null),
      withoutOutliers: roundTo1(wo?.percent ?? null),
    });
  }
  return rows;
}

/** Upper bounds inclusive: ≤ t within, ≤ t+w light, ≤ t+2w intense, above that critical. */
export function classifyDeviation(
  value: number,
  toleranceThreshold: number,
  bucketWidth = 2,
): DeviationSeverity {
  if (value <= toleranceThreshold) return 'within';
  if (value <= toleranceThreshold + bucketWidth) return 'light';
  if (value <= toleranceThreshold + 2 * bucketWidth) return 'intense';
  return 'critical';
}

export function toProcessedRows(
  aggregates: readonly BatchAggregate[],
  toleranceThreshold: number,
  bucketWidth = 2,
): ProcessedBatchRow[] {
  return aggregates.map((a) => ({
    batchCode: a.batchCode,
    weightedAvgPct: a.weightedAvgPct,
    date: a.date,
    operator: a.operator,
    dietName: a.dietName,
    severity: classifyDeviation(
      a.weightedAvgPct,
      toleranceThreshold,
      bucketWidth,
    ),
  }));
}

/** Effective weight per food type, including types that fall back to the default. */
export function toWeightTable(
  foodTypes: readonly string[],
  weights: RelativeWeightMap,
  defaultWeight: number = DEFAULT_WEIGHT,
): Array<{ foodType: string; weight: number; isDefault: boolean }> {
  return foodTypes.map((foodType) => ({
    foodType,
    weight: resolveWeight(weights, foodType, defaultWeight),
    isDefault: !Object.prototype.hasOwnProperty.call(weights, foodType),
  }));
}
