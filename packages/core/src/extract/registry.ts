// packages/core/src/extract/registry.ts

import { readFile } from 'node:fs/promises';
import type { FormatTag } from '../types/analysis.js';
import type { DocumentExtractor, ExtractionResult, FormatExtractor } from '../types/extraction.js';
import { ExtractionError, errorMessage } from '../utils/errors.js';
import { DocxExtractor } from './docx.js';
import { PlainTextExtractor } from './plain-text.js';
import { SpreadsheetExtractor } from './spreadsheet.js';

const READ_FAILURE_LABEL: Record<FormatTag, string> = {
  'plain-text': 'text file',
  'word-document': '.docx file',
  spreadsheet: 'spreadsheet',
};

/**
 * Routes a file to the extractor registered for its format and converts
 * every failure into an ExtractionError value.
 */
export class ExtractorRegistry implements DocumentExtractor {
  private extractors = new Map<FormatTag, FormatExtractor>();

  register(extractor: FormatExtractor): void {
    this.extractors.set(extractor.format, extractor);
  }

  supports(format: FormatTag): boolean {
    return this.extractors.has(format);
  }

  async extract(path: string, format: FormatTag): Promise<ExtractionResult> {
    const extractor = this.extractors.get(format);
    if (!extractor) {
      return {
        ok: false,
        error: new ExtractionError(`No extractor registered for ${format}`, format, 'read-failed'),
      };
    }

    try {
      const buffer = await readFile(path);
      return { ok: true, text: await extractor.extract(buffer) };
    } catch (error) {
      if (error instanceof ExtractionError) return { ok: false, error };
      return {
        ok: false,
        error: new ExtractionError(
          `Error reading ${READ_FAILURE_LABEL[format]}: ${errorMessage(error)}`,
          format,
          'read-failed',
        ),
      };
    }
  }
}

export function createDefaultRegistry(): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  registry.register(new PlainTextExtractor());
  registry.register(new DocxExtractor());
  registry.register(new SpreadsheetExtractor());
  return registry;
}
