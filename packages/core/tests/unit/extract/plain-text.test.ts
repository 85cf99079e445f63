import { describe, expect, it } from 'vitest';
import { PlainTextExtractor, decodeText } from '../../../src/extract/plain-text.js';

describe('decodeText', () => {
  it('decodes valid UTF-8', () => {
    expect(decodeText(Buffer.from('naïve café ✓', 'utf-8'))).toBe('naïve café ✓');
  });

  it('falls back to latin-1 on malformed UTF-8', () => {
    expect(decodeText(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe('café');
  });
});

describe('PlainTextExtractor', () => {
  it('extracts text from a buffer', async () => {
    const extractor = new PlainTextExtractor();
    expect(extractor.format).toBe('plain-text');
    await expect(extractor.extract(Buffer.from('line one\nline two'))).resolves.toBe(
      'line one\nline two',
    );
  });
});
