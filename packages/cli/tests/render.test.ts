// tests/render.test.ts — Event lines, failure summaries and exit codes

import { ExtractionError, RATE_LIMIT_SUGGESTIONS, ValidationError } from '@docsift/core';
import { describe, expect, it } from 'vitest';

import { describeFailure, exitCodeFor, formatEvent } from '../src/render.js';

const timestamp = '2026-01-01T00:00:00.000Z';

describe('formatEvent', () => {
  it('describes extraction progress', () => {
    expect(
      formatEvent({ type: 'analysis.started', sourcePath: '/docs/plan.docx', format: 'word-document', timestamp }),
    ).toBe('Extracting text from plan.docx (Word document)...');
    expect(formatEvent({ type: 'extraction.completed', characters: 1234, timestamp })).toBe(
      'Extracted 1234 characters',
    );
    expect(
      formatEvent({ type: 'document.truncated', originalLength: 80000, maxChars: 50000, timestamp }),
    ).toBe('Document is large (80000 chars). Truncating to the first 50000 characters');
  });

  it('describes attempts and retries', () => {
    expect(
      formatEvent({ type: 'attempt.started', attempt: 2, maxAttempts: 3, model: 'gemini-2.0-flash', timestamp }),
    ).toBe('Analyzing with gemini-2.0-flash (attempt 2/3)...');
    expect(
      formatEvent({ type: 'attempt.succeeded', attempt: 1, tokenCount: 2000, estimatedCost: 0.0003, timestamp }),
    ).toBe('Analysis complete: 2000 tokens, $0.000300');
    expect(formatEvent({ type: 'attempt.blocked', attempt: 1, timestamp })).toBe(
      'Analysis blocked for safety reasons',
    );
    expect(formatEvent({ type: 'attempt.failed', attempt: 1, message: 'boom', timestamp })).toBe(
      'Error during analysis: boom',
    );
    expect(formatEvent({ type: 'retry.scheduled', attempt: 1, waitSeconds: 120, timestamp })).toBe(
      'Rate limit hit on attempt 1. Waiting 120 seconds...',
    );
    expect(formatEvent({ type: 'retry.tick', attempt: 1, remainingSeconds: 7, timestamp })).toBe(
      'Retrying in 7 seconds...',
    );
    expect(
      formatEvent({ type: 'retry.exhausted', attempts: 3, suggestions: RATE_LIMIT_SUGGESTIONS, timestamp }),
    ).toBe('Still hitting rate limits after 3 attempts');
  });
});

describe('describeFailure', () => {
  it('shows validation and extraction messages as they are', () => {
    expect(
      describeFailure({
        kind: 'invalid',
        error: new ValidationError('File not found: a.txt', 'FILE_NOT_FOUND', 'a.txt'),
      }),
    ).toEqual(['File not found: a.txt']);
    expect(
      describeFailure({
        kind: 'extraction-failed',
        error: new ExtractionError('xlsx is not installed. Run: npm install xlsx', 'spreadsheet', 'missing-dependency'),
      }),
    ).toEqual(['xlsx is not installed. Run: npm install xlsx']);
  });

  it('numbers the rate-limit suggestions', () => {
    const document = {
      sourcePath: 'a.txt',
      format: 'plain-text' as const,
      extractedChars: 5,
      sentChars: 5,
      truncated: false,
    };
    expect(
      describeFailure({
        kind: 'rate-limited',
        attemptsExhausted: true,
        attempts: 3,
        suggestions: ['Wait a bit', 'Try again'],
        document,
      }),
    ).toEqual(['Still hitting rate limits after 3 attempts.', 'Suggestions:', '  1. Wait a bit', '  2. Try again']);
    expect(describeFailure({ kind: 'transient-error', message: 'socket hang up', attempts: 1, document })).toEqual([
      'Analysis failed: socket hang up',
    ]);
  });
});

describe('exitCodeFor', () => {
  const document = {
    sourcePath: 'a.txt',
    format: 'plain-text' as const,
    extractedChars: 5,
    sentChars: 5,
    truncated: false,
  };

  it('maps results to exit codes', () => {
    expect(
      exitCodeFor({ kind: 'success', text: 'ok', tokenCount: 1, estimatedCost: 0, attempts: 1, document }),
    ).toBe(0);
    expect(
      exitCodeFor({ kind: 'invalid', error: new ValidationError('empty', 'EMPTY_DOCUMENT') }),
    ).toBe(1);
    expect(exitCodeFor({ kind: 'blocked', attempts: 1, document })).toBe(2);
    expect(exitCodeFor({ kind: 'transient-error', message: 'x', attempts: 1, document })).toBe(2);
  });
});
