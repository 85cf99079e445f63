import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  compactTimestamp,
  displayTimestamp,
  formatReport,
  reportFileName,
  writeReport,
} from '../../../src/report/writer.js';
import { ReportError } from '../../../src/utils/errors.js';

const TEST_DIR = join(tmpdir(), `docsift-report-${Date.now()}`);
const NOW = new Date(2026, 3, 18, 9, 30, 5);

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('timestamps', () => {
  it('formats compact and display timestamps in local time', () => {
    expect(compactTimestamp(NOW)).toBe('20260418_093005');
    expect(displayTimestamp(NOW)).toBe('2026-04-18 09:30:05');
  });
});

describe('reportFileName', () => {
  it('uses the source stem and timestamp', () => {
    expect(reportFileName('/docs/Q3 budget.xlsx', NOW)).toBe('analysis_Q3 budget_20260418_093005.txt');
    expect(reportFileName('notes', NOW)).toBe('analysis_notes_20260418_093005.txt');
  });
});

describe('formatReport', () => {
  it('writes the three-line header before the analysis', () => {
    expect(formatReport('Body', 'memo.txt', NOW)).toBe(
      `ANALYSIS OF: memo.txt\nGENERATED: 2026-04-18 09:30:05\n${'='.repeat(60)}\n\nBody`,
    );
  });
});

describe('writeReport', () => {
  it('writes the report into the output directory', () => {
    const path = writeReport('SUMMARY: fine', 'memo.txt', { outputDir: TEST_DIR, now: NOW });

    expect(path).toBe(join(TEST_DIR, 'analysis_memo_20260418_093005.txt'));
    expect(readFileSync(path, 'utf-8')).toBe(formatReport('SUMMARY: fine', 'memo.txt', NOW));
    expect(readdirSync(TEST_DIR)).toEqual(['analysis_memo_20260418_093005.txt']);
  });

  it('creates a missing output directory', () => {
    const dir = join(TEST_DIR, 'nested', 'out');
    const path = writeReport('text', 'a.txt', { outputDir: dir, now: NOW });
    expect(existsSync(path)).toBe(true);
  });

  it('never overwrites an existing report', () => {
    const target = join(TEST_DIR, 'analysis_memo_20260418_093005.txt');
    writeFileSync(target, 'earlier', 'utf-8');

    expect(() => writeReport('new', 'memo.txt', { outputDir: TEST_DIR, now: NOW })).toThrow(
      `Could not save analysis to ${target}: report already exists`,
    );
    expect(readFileSync(target, 'utf-8')).toBe('earlier');
    expect(readdirSync(TEST_DIR)).toEqual(['analysis_memo_20260418_093005.txt']);
  });

  it('rejects an empty analysis without writing', () => {
    expect(() => writeReport('  \n', 'memo.txt', { outputDir: TEST_DIR, now: NOW })).toThrow(
      ReportError,
    );
    expect(readdirSync(TEST_DIR)).toEqual([]);
  });
});
