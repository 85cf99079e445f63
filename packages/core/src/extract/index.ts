// packages/core/src/extract -- Format-specific text extraction

export { ExtractorRegistry, createDefaultRegistry } from './registry.js';
export { formatFromPath, describeFormat, SUPPORTED_EXTENSIONS } from './format.js';
export { PlainTextExtractor, decodeText } from './plain-text.js';
export { DocxExtractor, joinNonEmptyLines } from './docx.js';
export { SpreadsheetExtractor, renderSheet } from './spreadsheet.js';
export { describe as describeColumn, quantile, numericColumns, renderSummary, STATISTIC_LABELS } from './statistics.js';
export type { ColumnSummary, StatisticLabel } from './statistics.js';
export { renderTable, formatCell } from './table.js';
export type { CellValue, TextTable } from './table.js';
