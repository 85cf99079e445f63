import { describe, expect, it } from 'vitest';
import { importOptional } from '../../../src/extract/optional.js';
import { ExtractionError } from '../../../src/utils/errors.js';

describe('importOptional', () => {
  it('returns the loaded module', async () => {
    const mod = { read: () => 'ok' };
    await expect(importOptional('spreadsheet', 'xlsx', async () => mod)).resolves.toBe(mod);
  });

  it('turns a missing package into a missing-dependency error', async () => {
    const missing = Object.assign(new Error("Cannot find package 'xlsx'"), {
      code: 'ERR_MODULE_NOT_FOUND',
    });

    const error = await importOptional('spreadsheet', 'xlsx', () => Promise.reject(missing)).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({
      message: 'xlsx is not installed. Run: npm install xlsx',
      format: 'spreadsheet',
      reason: 'missing-dependency',
    });
  });

  it('rethrows other load failures', async () => {
    await expect(
      importOptional('word-document', 'mammoth', () => Promise.reject(new Error('syntax error'))),
    ).rejects.toThrow('syntax error');
  });
});
