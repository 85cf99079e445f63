// packages/core/src/engine/backoff.ts — Retry state machine for rate-limited model calls

import { estimateCost } from '../models/pricing.js';
import type { AnalysisOutcome } from '../types/analysis.js';
import type { GenerateResponse } from '../types/models.js';
import type { ErrorKind } from './classify.js';

export interface BackoffPolicy {
  maxAttempts: number;
  backoffBaseSeconds: number;
  pricePerMillion: number;
}

/** What one remote call produced, already classified. */
export type CallSignal =
  | { kind: 'response'; response: GenerateResponse }
  | { kind: 'error'; errorKind: ErrorKind; message: string };

export interface IdleState {
  kind: 'idle';
}

export interface AttemptingState {
  kind: 'attempting';
  attempt: number;
}

export interface RetryWaitState {
  kind: 'retry-wait';
  attempt: number;
  waitSeconds: number;
}

export interface SucceededState {
  kind: 'succeeded';
  attempt: number;
  text: string;
  tokenCount: number;
  estimatedCost: number;
}

export interface BlockedState {
  kind: 'blocked';
  attempt: number;
}

export interface ExhaustedState {
  kind: 'exhausted';
  attempt: number;
}

export interface FailedState {
  kind: 'failed';
  attempt: number;
  message: string;
}

export type TerminalState = SucceededState | BlockedState | ExhaustedState | FailedState;

export type RetryState = IdleState | AttemptingState | RetryWaitState | TerminalState;

/** Seconds to wait after rate-limited attempt `attempt` (1-based). */
export function waitSecondsFor(attempt: number, baseSeconds: number): number {
  return baseSeconds * (attempt + 1);
}

export function begin(): AttemptingState {
  return { kind: 'attempting', attempt: 1 };
}

/**
 * Next state after a remote call. Only a rate-limit error with attempts left
 * leads back towards another call; everything else is terminal.
 */
export function afterCall(
  state: AttemptingState,
  signal: CallSignal,
  policy: BackoffPolicy,
): RetryWaitState | TerminalState {
  const { attempt } = state;

  if (signal.kind === 'response') {
    const candidate = signal.response.candidates.at(0);
    if (!candidate) return { kind: 'blocked', attempt };
    const tokenCount = signal.response.usage.totalTokens;
    return {
      kind: 'succeeded',
      attempt,
      text: candidate.text,
      tokenCount,
      estimatedCost: estimateCost(tokenCount, policy.pricePerMillion),
    };
  }

  if (signal.errorKind !== 'rate-limit') {
    return { kind: 'failed', attempt, message: signal.message };
  }

  if (attempt < policy.maxAttempts) {
    return {
      kind: 'retry-wait',
      attempt,
      waitSeconds: waitSecondsFor(attempt, policy.backoffBaseSeconds),
    };
  }
  return { kind: 'exhausted', attempt };
}

export function afterWait(state: RetryWaitState): AttemptingState {
  return { kind: 'attempting', attempt: state.attempt + 1 };
}

export function isTerminal(state: RetryState): state is TerminalState {
  return (
    state.kind === 'succeeded' ||
    state.kind === 'blocked' ||
    state.kind === 'exhausted' ||
    state.kind === 'failed'
  );
}

export function toOutcome(state: TerminalState, suggestions: readonly string[]): AnalysisOutcome {
  switch (state.kind) {
    case 'succeeded':
      return {
        kind: 'success',
        text: state.text,
        tokenCount: state.tokenCount,
        estimatedCost: state.estimatedCost,
        attempts: state.attempt,
      };
    case 'blocked':
      return { kind: 'blocked', attempts: state.attempt };
    case 'exhausted':
      return { kind: 'rate-limited', attemptsExhausted: true, attempts: state.attempt, suggestions };
    case 'failed':
      return { kind: 'transient-error', message: state.message, attempts: state.attempt };
  }
}
