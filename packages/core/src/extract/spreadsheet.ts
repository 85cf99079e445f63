import type { FormatExtractor } from '../types/extraction.js';
import { importOptional } from './optional.js';
import { describe, numericColumns, renderSummary } from './statistics.js';
import { type CellValue, formatCell, renderTable } from './table.js';

/**
 * Workbooks via xlsx. Per sheet: a delimiter line, the rows as a table
 * (first row is the header), then summary statistics when the sheet has
 * numeric columns.
 */
export class SpreadsheetExtractor implements FormatExtractor {
  readonly format = 'spreadsheet' as const;

  async extract(buffer: Buffer): Promise<string> {
    const XLSX = await importOptional('spreadsheet', 'xlsx', () => import('xlsx'));
    const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
    const parts: string[] = [];

    for (const sheetName of workbook.SheetNames) {
      const sheet = workbook.Sheets[sheetName];
      if (!sheet) continue;
      const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        blankrows: false,
        defval: null,
        raw: true,
      });
      parts.push(...renderSheet(sheetName, rows.map((row) => row.map(toCell))));
    }

    return parts.join('\n');
  }
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function isNumber(value: CellValue): value is number {
  return typeof value === 'number';
}

export function renderSheet(name: string, rows: CellValue[][]): string[] {
  const parts = [`\n=== SHEET: ${name} ===\n`];
  if (rows.length === 0) {
    parts.push('Empty DataFrame');
    return parts;
  }

  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const header = rows[0];
  const columns = Array.from({ length: width }, (_, i) => {
    const label = header[i] ?? null;
    return label === null || label === '' ? `Unnamed: ${i}` : formatCell(label);
  });
  const data = rows
    .slice(1)
    .map((row) => Array.from({ length: width }, (_, i) => row[i] ?? null));

  if (data.length === 0) {
    parts.push(`Empty DataFrame\nColumns: [${columns.join(', ')}]\nIndex: []`);
    return parts;
  }

  parts.push(renderTable({ columns, index: data.map((_, i) => String(i)), rows: data }));

  const numeric = numericColumns(data, width);
  if (numeric.length > 0) {
    parts.push(`\n--- Summary Statistics for ${name} ---`);
    parts.push(
      renderSummary(
        numeric.map((col) => columns[col]),
        numeric.map((col) => describe(data.map((row) => row[col]).filter(isNumber))),
      ),
    );
  }

  return parts;
}
