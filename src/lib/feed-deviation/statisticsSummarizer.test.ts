/**
 * Statistics summarizer – unit tests.
 * With/without-outlier bases, range buckets anchored at the tolerance threshold.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  buildBucketSpecs,
  computeRangeBuckets,
  summarizeStatistics,
} from './statisticsSummarizer';
import type { BatchAggregate } from './feedDeviation.types';

function batches(values: number[]): BatchAggregate[] {
  return values.map((weightedAvgPct, i) => ({
    batchCode: `B${i}`,
    weightedAvgPct,
    totalAdjustedQty: 1,
    totalContribution: weightedAvgPct,
    date: '2024-03-01',
    operator: 'Operator A',
    dietName: 'Finishing',
    ingredientCount: 1,
  }));
}

function approx(actual: number | null, expected: number): void {
  assert(actual != null, 'expected a number');
  assert(
    Math.abs(actual - expected) <= 1e-9,
    `expected ${actual} ≈ ${expected}`,
  );
}

describe('buildBucketSpecs', () => {
  it('anchors buckets at the threshold with an open last bucket', () => {
    assert.deepStrictEqual(buildBucketSpecs(3), [
      { label: 'Deviation between 3% and 5%', lower: 3, upper: 5 },
      { label: 'Deviation between 5% and 7%', lower: 5, upper: 7 },
      { label: 'Deviation above 7%', lower: 7, upper: null },
    ]);
  });

  it('supports a custom width and count', () => {
    const specs = buildBucketSpecs(2, 1, 1);
    assert.deepStrictEqual(
      specs.map((s) => s.label),
      ['Deviation between 2% and 3%', 'Deviation above 3%'],
    );
  });
});

describe('computeRangeBuckets', () => {
  it('uses [lower, upper) intervals', () => {
    const buckets = computeRangeBuckets([3, 4.99, 5, 7, 2.99], buildBucketSpecs(3));
    assert.deepStrictEqual(
      buckets.map((b) => b.count),
      [2, 1, 1],
    );
    assert.deepStrictEqual(
      buckets.map((b) => b.percent),
      [40, 20, 20],
    );
  });
});

describe('summarizeStatistics', () => {
  it('reports both bases with their own denominators', () => {
    const s = summarizeStatistics(batches([1, 2, 2, 3, 3, 3, 4, 4, 5, 20]), {
      toleranceThreshold: 3,
    });
    assert.strictEqual(s.countWith, 10);
    assert.strictEqual(s.countWithout, 9);
    approx(s.meanWith, 4.7);
    approx(s.meanWithout, 3);
    assert.strictEqual(s.medianWith, 3);
    assert.strictEqual(s.medianWithout, 3);

    assert.deepStrictEqual(
      s.rangeBuckets.withOutliers.map((b) => [b.count, b.percent]),
      [
        [5, 50],
        [1, 10],
        [1, 10],
      ],
    );
    const without = s.rangeBuckets.withoutOutliers;
    assert.deepStrictEqual(
      without.map((b) => b.count),
      [5, 1, 0],
    );
    approx(without[0].percent, (5 / 9) * 100);
    approx(without[1].percent, (1 / 9) * 100);
    assert.strictEqual(without[2].percent, 0);
  });

  it('returns zero counts and empty bucket tables for an empty set', () => {
    const s = summarizeStatistics([], { toleranceThreshold: 3 });
    assert.deepStrictEqual(s, {
      countWith: 0,
      countWithout: 0,
      meanWith: null,
      meanWithout: null,
      medianWith: null,
      medianWithout: null,
      rangeBuckets: { withOutliers: [], withoutOutliers: [] },
    });
  });

  it('applies two-sided exclusion when requested', () => {
    const values = [-20, 1, 2, 2, 3, 3, 3, 4, 4, 5, 20];
    const upper = summarizeStatistics(batches(values), {
      toleranceThreshold: 3,
    });
    const both = summarizeStatistics(batches(values), {
      toleranceThreshold: 3,
      outlierMode: 'both',
    });
    assert.strictEqual(upper.countWithout, 10);
    assert.strictEqual(both.countWithout, 9);
  });
});
