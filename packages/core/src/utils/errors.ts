// packages/core/src/utils/errors.ts

import type { FormatTag } from '../types/analysis.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ValidationCode = 'FILE_NOT_FOUND' | 'EMPTY_DOCUMENT' | 'UNSUPPORTED_FORMAT';

/** Input rejected before any remote call. Never retried. */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly code: ValidationCode,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type ExtractionFailureReason = 'missing-dependency' | 'read-failed';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly format: FormatTag,
    public readonly reason: ExtractionFailureReason,
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class ReportError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'ReportError';
  }
}

/** Best-effort message text for anything thrown. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
