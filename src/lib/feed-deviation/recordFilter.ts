/**
 * Filter stage: inclusive date range + operator/food/diet selection.
 * AND across dimensions, OR within a dimension. Never mutates its input.
 */

import { ALL_SENTINEL } from './feedDeviation.schemas';
import type { IngredientRecord, RecordSelection } from './feedDeviation.types';

type CategoricalKey = 'operator' | 'food' | 'dietName' | 'foodType';

/** null = no restriction ('ALL' selected or nothing selected). */
function toAllowedSet(values: string[] | undefined): Set<string> | null {
  if (!values || values.length === 0) return null;
  if (values.includes(ALL_SENTINEL)) return null;
  return new Set(values);
}

export function filterRecords(
  records: readonly IngredientRecord[],
  selection: RecordSelection,
): IngredientRecord[] {
  const operators = toAllowedSet(selection.operators);
  const foods = toAllowedSet(selection.foods);
  const diets = toAllowedSet(selection.diets);
  const { startDate, endDate } = selection;

  return records.filter((r) => {
    if (startDate && r.date < startDate) return false;
    if (endDate && r.date > endDate) return false;
    if (operators && !operators.has(r.operator)) return false;
    if (foods && !foods.has(r.food)) return false;
    if (diets && !diets.has(r.dietName)) return false;
    return true;
  });
}

/** Sorted distinct values for a selection widget (without the 'ALL' sentinel). */
export function distinctValues(
  records: readonly IngredientRecord[],
  key: CategoricalKey,
): string[] {
  const seen = new Set<string>();
  for (const r of records) {
    if (r[key]) seen.add(r[key]);
  }
  return [...seen].sort();
}

/** First and last calendar date present, or null for an empty set. */
export function dateRange(
  records: readonly IngredientRecord[],
): { min: string; max: string } | null {
  if (records.length === 0) return null;
  let min = records[0].date;
  let max = records[0].date;
  for (const r of records) {
    if (r.date < min) min = r.date;
    if (r.date > max) max = r.date;
  }
  return { min, max };
}
