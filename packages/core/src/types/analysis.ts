// packages/core/src/types/analysis.ts

import type { ExtractionError, ValidationError } from '../utils/errors.js';

/** Document formats the extractors understand. */
export type FormatTag = 'plain-text' | 'word-document' | 'spreadsheet';

// -- Remote outcomes (exactly one variant per analysis) --

export interface SuccessOutcome {
  kind: 'success';
  text: string;
  tokenCount: number;
  estimatedCost: number;
  attempts: number;
}

/** The model returned no candidate (content policy). */
export interface BlockedOutcome {
  kind: 'blocked';
  attempts: number;
}

export interface RateLimitedOutcome {
  kind: 'rate-limited';
  attemptsExhausted: boolean;
  attempts: number;
  suggestions: readonly string[];
}

export interface TransientErrorOutcome {
  kind: 'transient-error';
  message: string;
  attempts: number;
}

export type AnalysisOutcome =
  | SuccessOutcome
  | BlockedOutcome
  | RateLimitedOutcome
  | TransientErrorOutcome;

// -- Whole-file runs --

export interface DocumentInfo {
  sourcePath: string;
  format: FormatTag;
  /** Characters produced by the extractor. */
  extractedChars: number;
  /** Characters of document content sent, marker excluded. */
  sentChars: number;
  truncated: boolean;
}

export interface InvalidInput {
  kind: 'invalid';
  error: ValidationError;
}

export interface ExtractionFailed {
  kind: 'extraction-failed';
  error: ExtractionError;
}

export type DocumentAnalysis =
  | (AnalysisOutcome & { document: DocumentInfo })
  | InvalidInput
  | ExtractionFailed;
