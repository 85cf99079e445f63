// packages/core/src/report/writer.ts — Timestamped analysis reports

import { linkSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { RULE_WIDTH } from '../utils/constants.js';
import { ReportError, errorMessage } from '../utils/errors.js';

export interface ReportOptions {
  /** Directory for the report. Default: current working directory. */
  outputDir?: string;
  /** Clock override. */
  now?: Date;
}

const pad = (value: number) => String(value).padStart(2, '0');

/** `20260418_093005`, local time. */
export function compactTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** `2026-04-18 09:30:05`, local time. */
export function displayTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function reportFileName(sourcePath: string, now: Date): string {
  const stem = basename(sourcePath, extname(sourcePath));
  return `analysis_${stem}_${compactTimestamp(now)}.txt`;
}

export function formatReport(analysis: string, sourcePath: string, now: Date): string {
  return [
    `ANALYSIS OF: ${sourcePath}`,
    `GENERATED: ${displayTimestamp(now)}`,
    '='.repeat(RULE_WIDTH),
    '',
    analysis,
  ].join('\n');
}

/**
 * Write the report and return its path.
 *
 * The content is staged in a temporary file and hard-linked to its final
 * name, which fails if that name exists; an existing report is never touched
 * and a partial report is never visible.
 */
export function writeReport(analysis: string, sourcePath: string, options?: ReportOptions): string {
  if (!analysis.trim()) {
    throw new ReportError('Nothing to save: the analysis is empty');
  }

  const now = options?.now ?? new Date();
  const dir = options?.outputDir ?? process.cwd();
  const target = join(dir, reportFileName(sourcePath, now));
  const staging = join(dir, `.${basename(target)}.${process.pid}.tmp`);

  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(staging, formatReport(analysis, sourcePath, now), 'utf-8');
    linkSync(staging, target);
  } catch (error) {
    const reason =
      error instanceof Error && 'code' in error && error.code === 'EEXIST'
        ? 'report already exists'
        : errorMessage(error);
    throw new ReportError(`Could not save analysis to ${target}: ${reason}`, target);
  } finally {
    rmSync(staging, { force: true });
  }

  return target;
}
