/**
 * Feed deviation config – loaded from config file and env.
 * Edit config/feed-deviation.json or set env vars; the pipeline itself never reads this,
 * callers pass the values in.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { AppError } from '@/src/lib/errors/app-error';
import {
  feedDeviationConfigSchema,
  outlierModeSchema,
  type FeedDeviationConfig,
} from './feedDeviation.schemas';

export const DEFAULT_FEED_DEVIATION_CONFIG: FeedDeviationConfig = {
  columns: {
    plannedKg: 'PLANNED (KG)',
    realizedKg: 'REALIZED (KG)',
    pctDifference: 'DIFFERENCE (%)',
    foodType: 'TYPE',
    batchCode: 'BATCH CODE',
    operator: 'OPERATOR',
    dietName: 'DIET',
    date: 'DATE',
    food: 'FOOD',
  },
  layout: {
    skipRows: 0,
    removeFirstColumn: false,
    columnsToRemove: [],
  },
  analysis: {
    toleranceThreshold: 3,
    defaultWeight: 1,
    applyWeightToQuantity: true,
    outlierMode: 'upper',
    removeOutliersFromHistogram: false,
    bucketWidth: 2,
    bucketCount: 2,
    maxBins: 100,
    degenerateMargin: 0.5,
  },
  weights: {},
};

let cached: FeedDeviationConfig | null = null;

function readConfigFile(configPath: string): FeedDeviationConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new AppError(
      'CONFIG_INVALID',
      `Could not read config file ${configPath}.`,
      err,
    );
  }
  const partial = asObject(parsed);
  const d = DEFAULT_FEED_DEVIATION_CONFIG;
  const merged = {
    columns: { ...d.columns, ...asObject(partial.columns) },
    layout: { ...d.layout, ...asObject(partial.layout) },
    analysis: { ...d.analysis, ...asObject(partial.analysis) },
    weights: { ...d.weights, ...asObject(partial.weights) },
  };
  const result = feedDeviationConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new AppError(
      'CONFIG_INVALID',
      `Invalid config file ${configPath}: ${result.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ')}`,
    );
  }
  return result.data;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function asObject(v: unknown): Record<string, unknown> {
  return isRecord(v) ? v : {};
}

function applyEnvOverrides(config: FeedDeviationConfig): FeedDeviationConfig {
  const analysis = { ...config.analysis };
  const threshold = process.env.FEED_DEVIATION_TOLERANCE_THRESHOLD;
  if (threshold != null && threshold.trim() !== '') {
    const n = Number(threshold);
    if (!Number.isFinite(n)) {
      throw new AppError(
        'CONFIG_INVALID',
        `FEED_DEVIATION_TOLERANCE_THRESHOLD is not a number: "${threshold}"`,
      );
    }
    analysis.toleranceThreshold = n;
  }
  const mode = process.env.FEED_DEVIATION_OUTLIER_MODE;
  if (mode != null && mode.trim() !== '') {
    const parsedMode = outlierModeSchema.safeParse(mode.trim());
    if (!parsedMode.success) {
      throw new AppError(
        'CONFIG_INVALID',
        `FEED_DEVIATION_OUTLIER_MODE must be "upper" or "both", got "${mode}"`,
      );
    }
    analysis.outlierMode = parsedMode.data;
  }
  return { ...config, analysis };
}

function loadConfig(): FeedDeviationConfig {
  if (cached) return cached;
  const configPath =
    process.env.FEED_DEVIATION_CONFIG_PATH ??
    join(process.cwd(), 'config', 'feed-deviation.json');
  const base = existsSync(configPath)
    ? readConfigFile(configPath)
    : DEFAULT_FEED_DEVIATION_CONFIG;
  cached = applyEnvOverrides(base);
  return cached;
}

/** Get feed deviation config (file + env). Reset cache for tests with resetFeedDeviationConfigCache(). */
export function getFeedDeviationConfig(): FeedDeviationConfig {
  return loadConfig();
}

/** Only for tests – reset in-memory cache so config is re-read. */
export function resetFeedDeviationConfigCache(): void {
  cached = null;
}
