// packages/core/src/extract/format.ts

import { extname } from 'node:path';
import type { FormatTag } from '../types/analysis.js';

const EXTENSION_FORMATS: Record<string, FormatTag> = {
  '.txt': 'plain-text',
  '.docx': 'word-document',
  '.xlsx': 'spreadsheet',
  '.xls': 'spreadsheet',
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(EXTENSION_FORMATS);

/** Map a file path to its format tag by extension, case-insensitively. */
export function formatFromPath(path: string): FormatTag | null {
  return EXTENSION_FORMATS[extname(path).toLowerCase()] ?? null;
}

export function describeFormat(format: FormatTag): string {
  switch (format) {
    case 'plain-text':
      return 'text';
    case 'word-document':
      return 'Word document';
    case 'spreadsheet':
      return 'spreadsheet';
  }
}
