// packages/core/src/extract/statistics.ts — Descriptive statistics for numeric columns

import { type CellValue, renderTable } from './table.js';

export const STATISTIC_LABELS = ['count', 'mean', 'std', 'min', '25%', '50%', '75%', 'max'] as const;

export type StatisticLabel = (typeof STATISTIC_LABELS)[number];

export type ColumnSummary = Record<StatisticLabel, number>;

/** Linear interpolation between closest ranks on sorted values. */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return Number.NaN;
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/** count, mean, sample std, min, quartiles, max. */
export function describe(values: readonly number[]): ColumnSummary {
  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const mean = count > 0 ? sorted.reduce((sum, v) => sum + v, 0) / count : Number.NaN;
  const variance =
    count > 1 ? sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (count - 1) : Number.NaN;

  return {
    count,
    mean,
    std: Math.sqrt(variance),
    min: count > 0 ? sorted[0] : Number.NaN,
    '25%': quantile(sorted, 0.25),
    '50%': quantile(sorted, 0.5),
    '75%': quantile(sorted, 0.75),
    max: count > 0 ? sorted[count - 1] : Number.NaN,
  };
}

/**
 * Indexes of columns whose non-empty cells are all numbers (at least one).
 */
export function numericColumns(rows: readonly CellValue[][], width: number): number[] {
  const result: number[] = [];
  for (let col = 0; col < width; col++) {
    let seen = 0;
    let numeric = true;
    for (const row of rows) {
      const value = row[col] ?? null;
      if (value === null) continue;
      if (typeof value !== 'number') {
        numeric = false;
        break;
      }
      seen++;
    }
    if (numeric && seen > 0) result.push(col);
  }
  return result;
}

function formatStatistic(value: CellValue): string {
  if (typeof value !== 'number' || Number.isNaN(value)) return 'NaN';
  return value.toFixed(6);
}

/** Statistics table: one row per statistic, one column per numeric column. */
export function renderSummary(columns: string[], summaries: ColumnSummary[]): string {
  return renderTable({
    columns,
    index: [...STATISTIC_LABELS],
    rows: STATISTIC_LABELS.map((label) => summaries.map((summary) => summary[label])),
    indexAlign: 'left',
    format: formatStatistic,
  });
}
