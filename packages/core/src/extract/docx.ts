import type { FormatExtractor } from '../types/extraction.js';
import { importOptional } from './optional.js';

/**
 * Word documents via mammoth. mammoth emits every paragraph, including the
 * paragraphs inside table cells, in document order separated by blank lines;
 * blank ones are dropped and the rest joined one per line.
 */
export class DocxExtractor implements FormatExtractor {
  readonly format = 'word-document' as const;

  async extract(buffer: Buffer): Promise<string> {
    const mammoth = await importOptional('word-document', 'mammoth', () => import('mammoth'));
    const result = await mammoth.default.extractRawText({ buffer });
    return joinNonEmptyLines(result.value);
  }
}

export function joinNonEmptyLines(raw: string): string {
  return raw
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .join('\n');
}
