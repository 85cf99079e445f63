import type { FormatExtractor } from '../types/extraction.js';

/**
 * Decodes UTF-8 strictly and falls back to latin-1 on malformed input.
 * Latin-1 maps every byte, so the fallback cannot fail.
 */
export class PlainTextExtractor implements FormatExtractor {
  readonly format = 'plain-text' as const;

  async extract(buffer: Buffer): Promise<string> {
    return decodeText(buffer);
  }
}

export function decodeText(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    return buffer.toString('latin1');
  }
}
