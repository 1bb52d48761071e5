/**
 * Statistics summarizer: count / mean / median / range buckets, computed twice –
 * over all batches and over the outlier-excluded batches. Each basis uses its own
 * count as the percentage denominator.
 */

import { mean, median } from 'simple-statistics';
import { removeOutlierBatches } from './outlierFilter';
import type {
  BatchAggregate,
  OutlierMode,
  RangeBucket,
  StatisticsSummary,
} from './feedDeviation.types';

export type SummaryOptions = {
  toleranceThreshold: number;
  /** Width of each finite bucket (default 2). */
  bucketWidth?: number;
  /** Finite buckets before the open-ended one (default 2). */
  bucketCount?: number;
  outlierMode?: OutlierMode;
};

type BucketSpec = { label: string; lower: number; upper: number | null };

export function buildBucketSpecs(
  toleranceThreshold: number,
  bucketWidth = 2,
  bucketCount = 2,
): BucketSpec[] {
  const specs: BucketSpec[] = [];
  for (let k = 0; k < bucketCount; k++) {
    const lower = toleranceThreshold + k * bucketWidth;
    const upper = lower + bucketWidth;
    specs.push({
      label: `Deviation between ${lower}% and ${upper}%`,
      lower,
      upper,
    });
  }
  const openLower = toleranceThreshold + bucketCount * bucketWidth;
  specs.push({
    label: `Deviation above ${openLower}%`,
    lower: openLower,
    upper: null,
  });
  return specs;
}

/** [lower, upper) buckets; empty sample -> empty table. */
export function computeRangeBuckets(
  values: readonly number[],
  specs: readonly BucketSpec[],
): RangeBucket[] {
  if (values.length === 0) return [];
  return specs.map((spec) => {
    const count = values.filter(
      (v) => v >= spec.lower && (spec.upper === null || v < spec.upper),
    ).length;
    return { ...spec, count, percent: (count / values.length) * 100 };
  });
}

export function summarizeStatistics(
  aggregates: readonly BatchAggregate[],
  options: SummaryOptions,
): StatisticsSummary {
  const specs = buildBucketSpecs(
    options.toleranceThreshold,
    options.bucketWidth,
    options.bucketCount,
  );
  const withValues = aggregates.map((a) => a.weightedAvgPct);
  const withoutValues = removeOutlierBatches(
    aggregates,
    options.outlierMode ?? 'upper',
  ).kept.map((a) => a.weightedAvgPct);

  return {
    countWith: withValues.length,
    countWithout: withoutValues.length,
    meanWith: withValues.length > 0 ? mean(withValues) : null,
    meanWithout: withoutValues.length > 0 ? mean(withoutValues) : null,
    medianWith: withValues.length > 0 ? median(withValues) : null,
    medianWithout: withoutValues.length > 0 ? median(withoutValues) : null,
    rangeBuckets: {
      withOutliers: computeRangeBuckets(withValues, specs),
      withoutOutliers: computeRangeBuckets(withoutValues, specs),
    },
  };
}
