import { CategorySet, FALLBACK_CATEGORY } from './categories.js';

/**
 * Category distribution over a full run
 */
export interface SummaryStatistics {
  totalInputs: number;
  countsByCategory: Record<string, number>;
  percentByCategory: Record<string, number>;
}

/**
 * Wire shape of the `summary` block consumed by reporting/plotting
 */
export interface SummaryBlock {
  total_inputs: number;
  category_counts: Record<string, number>;
  category_percents: Record<string, number>;
}

/**
 * Round a non-negative value to 2 decimals, half to even.
 *
 * Only odd multiples of 1/8 sit exactly halfway between two hundredths
 * (3.125, 96.875...); every other double is rounded to the nearest
 * hundredth of its exact value.
 */
export function roundPercent(value: number): number {
  if (Number.isInteger(value * 8) && !Number.isInteger(value * 4)) {
    const lower = Math.floor(value * 100);
    return (lower % 2 === 0 ? lower : lower + 1) / 100;
  }
  return Number(value.toFixed(2));
}

/**
 * Tally labels over the whole allowed set.
 *
 * Every allowed label appears, including zero counts. Percent is
 * round(count * 100 / total, 2), or 0 for every label when total is 0.
 * Labels outside the set are counted as "Other".
 */
export function buildSummary(categories: readonly string[], categorySet: CategorySet): SummaryStatistics {
  const total = categories.length;
  const countsByCategory: Record<string, number> = {};
  const percentByCategory: Record<string, number> = {};

  for (const label of categorySet.labels) {
    countsByCategory[label] = 0;
  }

  for (const category of categories) {
    const label = categorySet.has(category) ? category : FALLBACK_CATEGORY;
    countsByCategory[label] += 1;
  }

  for (const label of categorySet.labels) {
    percentByCategory[label] = total === 0 ? 0 : roundPercent((countsByCategory[label] * 100) / total);
  }

  return {
    totalInputs: total,
    countsByCategory,
    percentByCategory,
  };
}

export function toSummaryBlock(summary: SummaryStatistics): SummaryBlock {
  return {
    total_inputs: summary.totalInputs,
    category_counts: summary.countsByCategory,
    category_percents: summary.percentByCategory,
  };
}
