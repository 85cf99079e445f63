// packages/core/src/extract/table.ts — Fixed-width text tables

export type CellValue = string | number | boolean | null;

export interface TextTable {
  columns: string[];
  index: string[];
  rows: CellValue[][];
  /** Row labels are right-aligned unless set to 'left'. */
  indexAlign?: 'left' | 'right';
  /** Formatter for non-string cells. Defaults to formatCell. */
  format?: (value: CellValue) => string;
}

const GAP = '  ';

export function formatCell(value: CellValue): string {
  if (value === null) return 'NaN';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  return String(value);
}

/**
 * Render a table with a label column and right-aligned value columns,
 * two spaces between columns.
 */
export function renderTable(table: TextTable): string {
  const format = table.format ?? formatCell;
  const cells = table.rows.map((row) => table.columns.map((_, i) => format(row[i] ?? null)));

  const indexWidth = table.index.reduce((max, label) => Math.max(max, label.length), 0);
  const widths = table.columns.map((column, i) =>
    cells.reduce((max, row) => Math.max(max, row[i].length), column.length),
  );

  const alignIndex = (label: string) =>
    table.indexAlign === 'left' ? label.padEnd(indexWidth) : label.padStart(indexWidth);

  const header = [' '.repeat(indexWidth), ...table.columns.map((c, i) => c.padStart(widths[i]))];
  const body = cells.map((row, r) => [
    alignIndex(table.index[r] ?? ''),
    ...row.map((cell, i) => cell.padStart(widths[i])),
  ]);

  return [header, ...body].map((parts) => parts.join(GAP)).join('\n');
}
