// tests/program.test.ts — Command registration and option parsing

import type { Command } from 'commander';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { analyzeCommand, buildOverrides } from '../src/commands/analyze.js';
import { createProgram } from '../src/program.js';

vi.mock('../src/commands/analyze.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/commands/analyze.js')>();
  return { ...actual, analyzeCommand: vi.fn(async () => {}) };
});

const analyze = vi.mocked(analyzeCommand);

function quietProgram(): Command {
  const program = createProgram();
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
  }
  return program;
}

beforeEach(() => {
  analyze.mockClear();
});

describe('createProgram', () => {
  it('registers analyze, init and doctor', () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(['analyze', 'init', 'doctor']);
  });

  it('runs analyze when no command is named', async () => {
    await quietProgram().parseAsync(['node', 'docsift', 'memo.txt']);

    expect(analyze).toHaveBeenCalledTimes(1);
    const [file, options] = analyze.mock.calls[0];
    expect(file).toBe('memo.txt');
    expect(options).toEqual({ save: true });
  });

  it('parses analyze options', async () => {
    await quietProgram().parseAsync([
      'node',
      'docsift',
      'analyze',
      'budget.xlsx',
      '--max-chars',
      '1000',
      '--max-attempts',
      '5',
      '--backoff',
      '0',
      '--model',
      'gemini-test',
      '--output-dir',
      'reports',
      '--no-save',
      '--json',
    ]);

    const [file, options] = analyze.mock.calls[0];
    expect(file).toBe('budget.xlsx');
    expect(options).toEqual({
      maxChars: 1000,
      maxAttempts: 5,
      backoff: 0,
      model: 'gemini-test',
      outputDir: 'reports',
      save: false,
      json: true,
    });
  });

  it('leaves the file out when none is given', async () => {
    await quietProgram().parseAsync(['node', 'docsift', 'analyze']);
    expect(analyze.mock.calls[0][0]).toBeUndefined();
  });

  it('rejects a non-numeric --max-chars', async () => {
    await expect(
      quietProgram().parseAsync(['node', 'docsift', 'analyze', 'a.txt', '--max-chars', 'lots']),
    ).rejects.toThrow('Must be a positive integer');
    expect(analyze).not.toHaveBeenCalled();
  });
});

describe('buildOverrides', () => {
  it('only overrides save when it was switched off', () => {
    expect(buildOverrides({ save: true }).output).toEqual({ dir: undefined, save: undefined });
    expect(buildOverrides({ save: false }).output).toEqual({ dir: undefined, save: false });
  });

  it('maps flags onto config sections', () => {
    expect(buildOverrides({ maxChars: 10, maxAttempts: 2, backoff: 5, model: 'm', outputDir: 'out' })).toEqual({
      model: { name: 'm' },
      analysis: { maxChars: 10 },
      retry: { maxAttempts: 2, backoffBaseSeconds: 5 },
      output: { dir: 'out', save: undefined },
    });
  });
});
