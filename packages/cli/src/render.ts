// packages/cli/src/render.ts — Terminal rendering for analysis events

import { basename } from 'node:path';

import {
  type AnalysisEvent,
  type DocumentAnalysis,
  RULE_WIDTH,
  SUPPORTED_EXTENSIONS,
  describeFormat,
  formatCost,
} from '@docsift/core';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

/**
 * Plain-text line for an event. Colour and spinners are applied by the
 * renderer so this stays easy to assert on.
 */
export function formatEvent(event: AnalysisEvent): string {
  switch (event.type) {
    case 'analysis.started':
      return `Extracting text from ${basename(event.sourcePath)} (${describeFormat(event.format)})...`;
    case 'extraction.completed':
      return `Extracted ${event.characters} characters`;
    case 'document.truncated':
      return `Document is large (${event.originalLength} chars). Truncating to the first ${event.maxChars} characters`;
    case 'attempt.started':
      return `Analyzing with ${event.model} (attempt ${event.attempt}/${event.maxAttempts})...`;
    case 'attempt.succeeded':
      return `Analysis complete: ${event.tokenCount} tokens, ${formatCost(event.estimatedCost)}`;
    case 'attempt.blocked':
      return 'Analysis blocked for safety reasons';
    case 'attempt.failed':
      return `Error during analysis: ${event.message}`;
    case 'retry.scheduled':
      return `Rate limit hit on attempt ${event.attempt}. Waiting ${event.waitSeconds} seconds...`;
    case 'retry.tick':
      return `Retrying in ${event.remainingSeconds} seconds...`;
    case 'retry.exhausted':
      return `Still hitting rate limits after ${event.attempts} attempts`;
  }
}

export interface EventRenderer {
  render(event: AnalysisEvent): void;
  stop(): void;
}

/**
 * Spinner while a call is in flight or a backoff is counting down,
 * one line per event otherwise. Everything goes to stderr.
 */
export function createEventRenderer(): EventRenderer {
  let spinner: Ora | null = null;

  function spin(text: string): void {
    if (spinner) {
      spinner.text = text;
      return;
    }
    spinner = ora({ text, stream: process.stderr }).start();
  }

  function settle(status: 'succeed' | 'fail' | 'warn', text: string): void {
    if (!spinner) spinner = ora({ stream: process.stderr });
    spinner[status](text);
    spinner = null;
  }

  return {
    render(event) {
      const text = formatEvent(event);
      switch (event.type) {
        case 'attempt.started':
          spinner?.stop();
          spinner = null;
          spin(chalk.cyan(text));
          return;
        case 'retry.tick':
          spin(chalk.yellow(text));
          return;
        case 'attempt.succeeded':
          settle('succeed', chalk.green(text));
          return;
        case 'retry.scheduled':
          settle('warn', chalk.yellow(text));
          console.error(chalk.dim('  (This is a speed limit, not a billing issue)'));
          return;
        case 'attempt.blocked':
        case 'attempt.failed':
        case 'retry.exhausted':
          settle('fail', chalk.red(text));
          return;
        case 'document.truncated':
          console.error(chalk.yellow(`  ${text}`));
          return;
        case 'analysis.started':
        case 'extraction.completed':
          console.error(chalk.gray(`  ${text}`));
          return;
      }
    },

    stop() {
      spinner?.stop();
      spinner = null;
    },
  };
}

/** Lines explaining why a run ended without an analysis. */
export function describeFailure(result: Exclude<DocumentAnalysis, { kind: 'success' }>): string[] {
  switch (result.kind) {
    case 'invalid':
    case 'extraction-failed':
      return [result.error.message];
    case 'blocked':
      return ['The model declined to analyze this document (content policy). Nothing was retried.'];
    case 'rate-limited':
      return [
        `Still hitting rate limits after ${result.attempts} attempts.`,
        'Suggestions:',
        ...result.suggestions.map((s, i) => `  ${i + 1}. ${s}`),
      ];
    case 'transient-error':
      return [`Analysis failed: ${result.message}`];
  }
}

/** 0 success, 1 input or setup problems, 2 the remote call failed. */
export function exitCodeFor(result: DocumentAnalysis): number {
  switch (result.kind) {
    case 'success':
      return 0;
    case 'invalid':
    case 'extraction-failed':
      return 1;
    case 'blocked':
    case 'rate-limited':
    case 'transient-error':
      return 2;
  }
}

export function printBanner(version: string): void {
  console.error(chalk.bold('='.repeat(RULE_WIDTH)));
  console.error(chalk.bold(`DOCSIFT v${version}`));
  console.error(chalk.gray('Document analysis with automatic rate-limit retry'));
  console.error(chalk.bold('='.repeat(RULE_WIDTH)));
  console.error(chalk.gray(`Supported formats: ${SUPPORTED_EXTENSIONS.join(', ')}`));
}

export function printAnalysis(text: string): void {
  console.log(`\n${'='.repeat(RULE_WIDTH)}`);
  console.log('ANALYSIS RESULTS');
  console.log(`${'='.repeat(RULE_WIDTH)}\n`);
  console.log(text);
}
