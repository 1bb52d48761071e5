/**
 * Deviation export – unit tests.
 * Flat statistics table, severity classification, weight table.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  classifyDeviation,
  roundTo1,
  toProcessedRows,
  toStatisticsTable,
  toWeightTable,
} from './deviationExport';
import type { BatchAggregate, StatisticsSummary } from './feedDeviation.types';

describe('classifyDeviation', () => {
  it('uses inclusive upper bounds per band', () => {
    assert.strictEqual(classifyDeviation(0, 3), 'within');
    assert.strictEqual(classifyDeviation(3, 3), 'within');
    assert.strictEqual(classifyDeviation(3.01, 3), 'light');
    assert.strictEqual(classifyDeviation(5, 3), 'light');
    assert.strictEqual(classifyDeviation(5.5, 3), 'intense');
    assert.strictEqual(classifyDeviation(7, 3), 'intense');
    assert.strictEqual(classifyDeviation(7.1, 3), 'critical');
  });

  it('follows a custom band width', () => {
    assert.strictEqual(classifyDeviation(4.5, 3, 1), 'intense');
    assert.strictEqual(classifyDeviation(5.5, 3, 1), 'critical');
  });
});

describe('roundTo1', () => {
  it('rounds to one decimal and passes null through', () => {
    assert.strictEqual(roundTo1(3.64), 3.6);
    assert.strictEqual(roundTo1(3.66), 3.7);
    assert.strictEqual(roundTo1(null), null);
  });
});

describe('toStatisticsTable', () => {
  it('flattens both bases into one row per metric', () => {
    const summary: StatisticsSummary = {
      countWith: 4,
      countWithout: 3,
      meanWith: 5.125,
      meanWithout: 3.5,
      medianWith: 4.25,
      medianWithout: 3.5,
      rangeBuckets: {
        withOutliers: [
          { label: 'Deviation between 3% and 5%', lower: 3, upper: 5, count: 2, percent: 50 },
          { label: 'Deviation above 5%', lower: 5, upper: null, count: 1, percent: 25 },
        ],
        withoutOutliers: [
          { label: 'Deviation between 3% and 5%', lower: 3, upper: 5, count: 2, percent: (2 / 3) * 100 },
          { label: 'Deviation above 5%', lower: 5, upper: null, count: 0, percent: 0 },
        ],
      },
    };
    assert.deepStrictEqual(toStatisticsTable(summary), [
      { metric: 'Batch count', withOutliers: 4, withoutOutliers: 3 },
      { metric: 'Mean (%)', withOutliers: 5.1, withoutOutliers: 3.5 },
      { metric: 'Median (%)', withOutliers: 4.3, withoutOutliers: 3.5 },
      { metric: 'Deviation between 3% and 5%', withOutliers: 2, withoutOutliers: 2 },
      {
        metric: 'Deviation between 3% and 5% (% of batches)',
        withOutliers: 50,
        withoutOutliers: 66.7,
      },
      { metric: 'Deviation above 5%', withOutliers: 1, withoutOutliers: 0 },
      {
        metric: 'Deviation above 5% (% of batches)',
        withOutliers: 25,
        withoutOutliers: 0,
      },
    ]);
  });

  it('has only the count/mean/median rows for an empty summary', () => {
    const rows = toStatisticsTable({
      countWith: 0,
      countWithout: 0,
      meanWith: null,
      meanWithout: null,
      medianWith: null,
      medianWithout: null,
      rangeBuckets: { withOutliers: [], withoutOutliers: [] },
    });
    assert.deepStrictEqual(rows, [
      { metric: 'Batch count', withOutliers: 0, withoutOutliers: 0 },
      { metric: 'Mean (%)', withOutliers: null, withoutOutliers: null },
      { metric: 'Median (%)', withOutliers: null, withoutOutliers: null },
    ]);
  });
});

describe('toProcessedRows', () => {
  it('adds a severity per batch', () => {
    const aggregate: BatchAggregate = {
      batchCode: 'B1',
      weightedAvgPct: 6,
      totalAdjustedQty: 100,
      totalContribution: 600,
      date: '2024-03-01',
      operator: 'Operator A',
      dietName: 'Finishing',
      ingredientCount: 3,
    };
    assert.deepStrictEqual(toProcessedRows([aggregate], 3), [
      {
        batchCode: 'B1',
        weightedAvgPct: 6,
        date: '2024-03-01',
        operator: 'Operator A',
        dietName: 'Finishing',
        severity: 'intense',
      },
    ]);
  });
});

describe('toWeightTable', () => {
  it('lists the effective weight and marks defaults', () => {
    assert.deepStrictEqual(toWeightTable(['grain', 'hay'], { hay: 0.5 }), [
      { foodType: 'grain', weight: 1, isDefault: true },
      { foodType: 'hay', weight: 0.5, isDefault: false },
    ]);
  });
});
