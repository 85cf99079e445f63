// packages/core/src/types/extraction.ts

import type { ExtractionError } from '../utils/errors.js';
import type { FormatTag } from './analysis.js';

export type ExtractionResult = { ok: true; text: string } | { ok: false; error: ExtractionError };

/** Pulls text out of a file. Failures come back as values, never thrown. */
export interface DocumentExtractor {
  extract(path: string, format: FormatTag): Promise<ExtractionResult>;
}

/** Converts the raw bytes of one format to text. May throw. */
export interface FormatExtractor {
  readonly format: FormatTag;
  extract(buffer: Buffer): Promise<string>;
}
