#!/usr/bin/env tsx
/**
 * Feed deviation report from a mixing export (.xlsx or .csv).
 *
 * Reads the sheet with the layout and column mapping from config/feed-deviation.json,
 * runs the analysis and writes:
 *   - statistics.csv   flat statistics table (with / without outliers)
 *   - processed.xlsx   one row per batch with its weighted deviation and severity
 *   - histogram.json   bins + colour classes for the chart
 *
 * Usage:
 *   npm run report -- data/mixing.xlsx
 *   npx tsx scripts/deviation-report.ts data/mixing.xlsx --out temp/report \
 *     --operator "Operator A" --from 2024-01-01 --to 2024-01-31 --remove-outliers
 *
 * Weights: --weight "Concentrate=0.5" (repeatable); food types without a weight use
 * analysis.defaultWeight.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'node:util';
import { config } from 'dotenv';
import * as XLSX from 'xlsx';
import { AppError } from '@/src/lib/errors/app-error';
import {
  getFeedDeviationConfig,
  readWorkbookRows,
  runDeviationAnalysis,
  type RelativeWeightMap,
} from '@/src/lib/feed-deviation';

config({ path: path.join(process.cwd(), '.env.local') });

function parseWeights(entries: string[]): RelativeWeightMap {
  const out: RelativeWeightMap = {};
  for (const entry of entries) {
    const idx = entry.lastIndexOf('=');
    const key = idx > 0 ? entry.slice(0, idx).trim() : '';
    const value = idx > 0 ? Number(entry.slice(idx + 1)) : NaN;
    if (!key || !Number.isFinite(value)) {
      throw new AppError(
        'VALIDATION_ERROR',
        `Invalid --weight "${entry}" (expected TYPE=0.5)`,
      );
    }
    out[key] = value;
  }
  return out;
}

function main(): void {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: 'string', default: path.join('temp', 'deviation-report') },
      sheet: { type: 'string' },
      operator: { type: 'string', multiple: true },
      food: { type: 'string', multiple: true },
      diet: { type: 'string', multiple: true },
      from: { type: 'string' },
      to: { type: 'string' },
      weight: { type: 'string', multiple: true },
      'remove-outliers': { type: 'boolean', default: false },
    },
  });

  const input = positionals[0];
  if (!input) {
    console.error('❌ Pass the export file: deviation-report.ts <file.xlsx>');
    process.exit(1);
  }
  const resolved = path.resolve(process.cwd(), input);
  if (!fs.existsSync(resolved)) {
    console.error(`❌ File not found: ${resolved}`);
    process.exit(1);
  }

  const cfg = getFeedDeviationConfig();
  const sheet = readWorkbookRows(
    fs.readFileSync(resolved),
    cfg.layout,
    values.sheet,
  );
  console.log(`📄 ${resolved}`);
  console.log(`   Rows: ${sheet.rows.length}`);

  const result = runDeviationAnalysis(sheet.rows, {
    columns: cfg.columns,
    headers: sheet.headers,
    selection: {
      operators: values.operator,
      foods: values.food,
      diets: values.diet,
      startDate: values.from,
      endDate: values.to,
    },
    weights: { ...cfg.weights, ...parseWeights(values.weight ?? []) },
    options: {
      ...cfg.analysis,
      removeOutliersFromHistogram:
        values['remove-outliers'] || cfg.analysis.removeOutliersFromHistogram,
    },
  });

  for (const d of result.diagnostics) {
    console.log(`   ⚠️  [${d.code}] ${d.message}`);
  }
  console.log(
    `   Batches: ${result.counts.batches} (outliers: ${result.counts.outliers})`,
  );

  const outDir = path.resolve(process.cwd(), values.out ?? 'temp');
  fs.mkdirSync(outDir, { recursive: true });

  const statsSheet = XLSX.utils.json_to_sheet(result.statisticsTable);
  fs.writeFileSync(
    path.join(outDir, 'statistics.csv'),
    XLSX.utils.sheet_to_csv(statsSheet),
    'utf-8',
  );

  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    book,
    XLSX.utils.json_to_sheet(result.processedRows),
    'Processed data',
  );
  XLSX.utils.book_append_sheet(
    book,
    XLSX.utils.json_to_sheet(result.weightTable),
    'Weights',
  );
  XLSX.writeFile(book, path.join(outDir, 'processed.xlsx'));

  fs.writeFileSync(
    path.join(outDir, 'histogram.json'),
    JSON.stringify(result.histogram, null, 2),
    'utf-8',
  );

  console.log(`\n✅ Done. Report written to ${outDir}`);
}

try {
  main();
} catch (err) {
  if (err instanceof AppError) {
    console.error(`❌ ${err.safeMessage}`);
    process.exit(1);
  }
  throw err;
}
