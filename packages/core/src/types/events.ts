// packages/core/src/types/events.ts

/**
 * Progress events emitted by the analysis controller.
 * One event per state transition; consumers render them, the controller
 * never reads them back.
 */

import type { FormatTag } from './analysis.js';

export interface AnalysisStartedEvent {
  type: 'analysis.started';
  sourcePath: string;
  format: FormatTag;
  timestamp: string;
}

export interface ExtractionCompletedEvent {
  type: 'extraction.completed';
  characters: number;
  timestamp: string;
}

export interface DocumentTruncatedEvent {
  type: 'document.truncated';
  originalLength: number;
  maxChars: number;
  timestamp: string;
}

export interface AttemptStartedEvent {
  type: 'attempt.started';
  attempt: number;
  maxAttempts: number;
  model: string;
  timestamp: string;
}

export interface AttemptSucceededEvent {
  type: 'attempt.succeeded';
  attempt: number;
  tokenCount: number;
  estimatedCost: number;
  timestamp: string;
}

export interface AttemptBlockedEvent {
  type: 'attempt.blocked';
  attempt: number;
  timestamp: string;
}

export interface AttemptFailedEvent {
  type: 'attempt.failed';
  attempt: number;
  message: string;
  timestamp: string;
}

export interface RetryScheduledEvent {
  type: 'retry.scheduled';
  attempt: number;
  waitSeconds: number;
  timestamp: string;
}

export interface RetryTickEvent {
  type: 'retry.tick';
  attempt: number;
  remainingSeconds: number;
  timestamp: string;
}

export interface RetryExhaustedEvent {
  type: 'retry.exhausted';
  attempts: number;
  suggestions: readonly string[];
  timestamp: string;
}

export type AnalysisEvent =
  | AnalysisStartedEvent
  | ExtractionCompletedEvent
  | DocumentTruncatedEvent
  | AttemptStartedEvent
  | AttemptSucceededEvent
  | AttemptBlockedEvent
  | AttemptFailedEvent
  | RetryScheduledEvent
  | RetryTickEvent
  | RetryExhaustedEvent;
