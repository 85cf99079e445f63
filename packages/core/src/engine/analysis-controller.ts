// packages/core/src/engine/analysis-controller.ts

import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import { createDefaultRegistry } from '../extract/registry.js';
import { SUPPORTED_EXTENSIONS, formatFromPath } from '../extract/format.js';
import { buildAnalysisPrompt, truncateDocument } from '../prompts/analysis.js';
import type { AnalysisOutcome, DocumentAnalysis, InvalidInput } from '../types/analysis.js';
import type { ProjectConfig } from '../types/config.js';
import type { DocumentExtractor } from '../types/extraction.js';
import type { RemoteModel } from '../types/models.js';
import {
  DEFAULT_BACKOFF_BASE_SEC,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_CHARS,
  DEFAULT_PRICE_PER_MILLION,
  RATE_LIMIT_SUGGESTIONS,
  TRUNCATION_MARKER,
} from '../utils/constants.js';
import { type ValidationCode, ValidationError, errorMessage } from '../utils/errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import {
  type AttemptingState,
  type BackoffPolicy,
  type CallSignal,
  type RetryState,
  type TerminalState,
  afterCall,
  afterWait,
  begin,
  isTerminal,
  toOutcome,
} from './backoff.js';
import { type ErrorKind, classifyError } from './classify.js';
import { EventBus } from './event-bus.js';
import { type Waiter, createCountdownWaiter } from './waiter.js';

export interface ControllerSettings extends BackoffPolicy {
  maxChars: number;
  truncationMarker: string;
}

export interface AnalysisControllerOptions {
  model: RemoteModel;
  settings?: Partial<ControllerSettings>;
  extractor?: DocumentExtractor;
  waiter?: Waiter;
  eventBus?: EventBus;
  logger?: Logger;
  classify?: (error: unknown) => ErrorKind;
}

export interface AnalysisRequest {
  prompt: string;
  truncated: boolean;
  originalLength: number;
  /** Document characters in the prompt, marker excluded. */
  sentChars: number;
}

const DEFAULT_SETTINGS: ControllerSettings = {
  maxChars: DEFAULT_MAX_CHARS,
  truncationMarker: TRUNCATION_MARKER,
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  backoffBaseSeconds: DEFAULT_BACKOFF_BASE_SEC,
  pricePerMillion: DEFAULT_PRICE_PER_MILLION,
};

function invalid(code: ValidationCode, message: string, path: string): InvalidInput {
  return { kind: 'invalid', error: new ValidationError(message, code, path) };
}

/**
 * Runs one document through extraction, truncation, prompt construction and
 * the rate-limit retry loop. Every path ends in a terminal result; nothing
 * but programming errors is thrown.
 */
export class AnalysisController {
  readonly settings: ControllerSettings;
  private readonly model: RemoteModel;
  private readonly extractor: DocumentExtractor;
  private readonly waiter: Waiter;
  private readonly events: EventBus;
  private readonly logger: Logger;
  private readonly classify: (error: unknown) => ErrorKind;

  constructor(options: AnalysisControllerOptions) {
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.model = options.model;
    this.extractor = options.extractor ?? createDefaultRegistry();
    this.waiter = options.waiter ?? createCountdownWaiter();
    this.events = options.eventBus ?? new EventBus();
    this.logger = options.logger ?? silentLogger;
    this.classify = options.classify ?? classifyError;
  }

  static fromConfig(
    config: ProjectConfig,
    options: Omit<AnalysisControllerOptions, 'settings'>,
  ): AnalysisController {
    return new AnalysisController({
      ...options,
      settings: {
        maxChars: config.analysis.maxChars,
        truncationMarker: config.analysis.truncationMarker,
        maxAttempts: config.retry.maxAttempts,
        backoffBaseSeconds: config.retry.backoffBaseSeconds,
        pricePerMillion: config.model.pricePerMillion,
      },
    });
  }

  async analyzeFile(sourcePath: string): Promise<DocumentAnalysis> {
    if (!existsSync(sourcePath)) {
      return invalid('FILE_NOT_FOUND', `File not found: ${sourcePath}`, sourcePath);
    }

    const format = formatFromPath(sourcePath);
    if (!format) {
      const extension = extname(sourcePath) || '(none)';
      return invalid(
        'UNSUPPORTED_FORMAT',
        `Unsupported file type: ${extension}. Supported types: ${SUPPORTED_EXTENSIONS.join(', ')}`,
        sourcePath,
      );
    }

    this.events.emitEvent({ type: 'analysis.started', sourcePath, format, timestamp: '' });

    const extraction = await this.extractor.extract(sourcePath, format);
    if (!extraction.ok) {
      this.logger.debug(`Extraction failed (${extraction.error.reason}): ${extraction.error.message}`);
      return { kind: 'extraction-failed', error: extraction.error };
    }
    if (!extraction.text.trim()) {
      return invalid('EMPTY_DOCUMENT', `File appears to be empty: ${sourcePath}`, sourcePath);
    }

    this.events.emitEvent({
      type: 'extraction.completed',
      characters: extraction.text.length,
      timestamp: '',
    });

    const request = this.prepareRequest(extraction.text);
    const outcome = await this.run(request.prompt);

    return {
      ...outcome,
      document: {
        sourcePath,
        format,
        extractedChars: extraction.text.length,
        sentChars: request.sentChars,
        truncated: request.truncated,
      },
    };
  }

  /** Truncate to the character cap and wrap the text in the analysis template. */
  prepareRequest(text: string): AnalysisRequest {
    const { maxChars, truncationMarker } = this.settings;
    const document = truncateDocument(text, maxChars, truncationMarker);
    if (document.truncated) {
      this.events.emitEvent({
        type: 'document.truncated',
        originalLength: document.originalLength,
        maxChars,
        timestamp: '',
      });
    }
    return {
      prompt: buildAnalysisPrompt(document.text),
      truncated: document.truncated,
      originalLength: document.originalLength,
      sentChars: Math.min(text.length, maxChars),
    };
  }

  /** Drive the retry state machine for one prompt until it reaches a terminal state. */
  async run(prompt: string): Promise<AnalysisOutcome> {
    let state: RetryState = { kind: 'idle' };
    for (;;) {
      if (isTerminal(state)) {
        return toOutcome(state, RATE_LIMIT_SUGGESTIONS);
      }
      state = await this.step(state, prompt);
      this.report(state);
    }
  }

  private async step(
    state: Exclude<RetryState, TerminalState>,
    prompt: string,
  ): Promise<RetryState> {
    switch (state.kind) {
      case 'idle':
        return begin();
      case 'attempting':
        return afterCall(state, await this.call(state, prompt), this.settings);
      case 'retry-wait': {
        const { attempt } = state;
        await this.waiter(state.waitSeconds, (remainingSeconds) =>
          this.events.emitEvent({ type: 'retry.tick', attempt, remainingSeconds, timestamp: '' }),
        );
        return afterWait(state);
      }
    }
  }

  private async call(state: AttemptingState, prompt: string): Promise<CallSignal> {
    try {
      const response = await this.model.generate(prompt);
      return { kind: 'response', response };
    } catch (error) {
      const errorKind = this.classify(error);
      const message = errorMessage(error);
      this.logger.debug(`Attempt ${state.attempt} failed (${errorKind}): ${message}`);
      return { kind: 'error', errorKind, message };
    }
  }

  private report(state: RetryState): void {
    const timestamp = '';
    switch (state.kind) {
      case 'idle':
        return;
      case 'attempting':
        this.events.emitEvent({
          type: 'attempt.started',
          attempt: state.attempt,
          maxAttempts: this.settings.maxAttempts,
          model: this.model.name,
          timestamp,
        });
        return;
      case 'retry-wait':
        this.events.emitEvent({
          type: 'retry.scheduled',
          attempt: state.attempt,
          waitSeconds: state.waitSeconds,
          timestamp,
        });
        return;
      case 'succeeded':
        this.events.emitEvent({
          type: 'attempt.succeeded',
          attempt: state.attempt,
          tokenCount: state.tokenCount,
          estimatedCost: state.estimatedCost,
          timestamp,
        });
        return;
      case 'blocked':
        this.events.emitEvent({ type: 'attempt.blocked', attempt: state.attempt, timestamp });
        return;
      case 'failed':
        this.events.emitEvent({
          type: 'attempt.failed',
          attempt: state.attempt,
          message: state.message,
          timestamp,
        });
        return;
      case 'exhausted':
        this.events.emitEvent({
          type: 'retry.exhausted',
          attempts: state.attempt,
          suggestions: RATE_LIMIT_SUGGESTIONS,
          timestamp,
        });
        return;
    }
  }
}
