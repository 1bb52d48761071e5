/**
 * Feed deviation config – unit tests.
 * File merge over defaults, env overrides, invalid input, cache reset.
 */

import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_FEED_DEVIATION_CONFIG,
  getFeedDeviationConfig,
  resetFeedDeviationConfigCache,
} from './feedDeviation.config';
import { AppError } from '@/src/lib/errors/app-error';

const ENV_KEYS = [
  'FEED_DEVIATION_CONFIG_PATH',
  'FEED_DEVIATION_TOLERANCE_THRESHOLD',
  'FEED_DEVIATION_OUTLIER_MODE',
] as const;

describe('getFeedDeviationConfig', () => {
  let dir = '';
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  function useConfigFile(contents: string): void {
    const file = join(dir, 'feed-deviation.json');
    writeFileSync(file, contents, 'utf-8');
    process.env.FEED_DEVIATION_CONFIG_PATH = file;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'feed-deviation-config-'));
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetFeedDeviationConfigCache();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetFeedDeviationConfigCache();
    rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when the file does not exist', () => {
    process.env.FEED_DEVIATION_CONFIG_PATH = join(dir, 'absent.json');
    assert.deepStrictEqual(getFeedDeviationConfig(), DEFAULT_FEED_DEVIATION_CONFIG);
  });

  it('merges file sections over the defaults', () => {
    useConfigFile(
      JSON.stringify({
        columns: { date: 'MIX DATE' },
        layout: { skipRows: 3, removeFirstColumn: true },
        analysis: { toleranceThreshold: 2.5 },
        weights: { Roughage: 0.5 },
      }),
    );
    const cfg = getFeedDeviationConfig();
    assert.strictEqual(cfg.columns.date, 'MIX DATE');
    assert.strictEqual(cfg.columns.batchCode, 'BATCH CODE');
    assert.deepStrictEqual(cfg.layout, {
      skipRows: 3,
      removeFirstColumn: true,
      columnsToRemove: [],
    });
    assert.strictEqual(cfg.analysis.toleranceThreshold, 2.5);
    assert.strictEqual(cfg.analysis.maxBins, 100);
    assert.deepStrictEqual(cfg.weights, { Roughage: 0.5 });
  });

  it('caches until reset', () => {
    useConfigFile(JSON.stringify({ analysis: { toleranceThreshold: 4 } }));
    assert.strictEqual(getFeedDeviationConfig().analysis.toleranceThreshold, 4);
    useConfigFile(JSON.stringify({ analysis: { toleranceThreshold: 5 } }));
    assert.strictEqual(getFeedDeviationConfig().analysis.toleranceThreshold, 4);
    resetFeedDeviationConfigCache();
    assert.strictEqual(getFeedDeviationConfig().analysis.toleranceThreshold, 5);
  });

  it('applies env overrides on top of the file', () => {
    useConfigFile(JSON.stringify({ analysis: { toleranceThreshold: 4 } }));
    process.env.FEED_DEVIATION_TOLERANCE_THRESHOLD = '1.5';
    process.env.FEED_DEVIATION_OUTLIER_MODE = 'both';
    const cfg = getFeedDeviationConfig();
    assert.strictEqual(cfg.analysis.toleranceThreshold, 1.5);
    assert.strictEqual(cfg.analysis.outlierMode, 'both');
  });

  it('fails with CONFIG_INVALID for bad files and bad env values', () => {
    const isConfigInvalid = (err: unknown) =>
      err instanceof AppError && err.code === 'CONFIG_INVALID';

    useConfigFile('{ not json');
    assert.throws(() => getFeedDeviationConfig(), isConfigInvalid);

    resetFeedDeviationConfigCache();
    useConfigFile(JSON.stringify({ weights: { Roughage: 2 } }));
    assert.throws(() => getFeedDeviationConfig(), isConfigInvalid);

    resetFeedDeviationConfigCache();
    useConfigFile('{}');
    process.env.FEED_DEVIATION_TOLERANCE_THRESHOLD = 'three';
    assert.throws(() => getFeedDeviationConfig(), isConfigInvalid);

    resetFeedDeviationConfigCache();
    delete process.env.FEED_DEVIATION_TOLERANCE_THRESHOLD;
    process.env.FEED_DEVIATION_OUTLIER_MODE = 'lower';
    assert.throws(() => getFeedDeviationConfig(), isConfigInvalid);
  });
});
