// packages/core/src/models/gemini.ts — Gemini adapter behind RemoteModel

import { GoogleGenAI } from '@google/genai';
import type { Candidate, GenerateResponse, RemoteModel } from '../types/models.js';

/** The slice of a generateContent response this adapter reads. */
export interface GeminiResponseLike {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string; thought?: boolean }> };
    finishReason?: string;
  }>;
  usageMetadata?: { totalTokenCount?: number };
}

export type GenerateContentFn = (params: {
  model: string;
  contents: string;
}) => Promise<GeminiResponseLike>;

export interface GeminiModelOptions {
  apiKey: string;
  model: string;
  /** Replaces the SDK call, for tests. */
  generateContent?: GenerateContentFn;
}

/**
 * Single-shot, non-streaming Gemini calls. No request timeout is set, so a
 * slow answer is waited for; errors from the SDK propagate unchanged for the
 * controller to classify.
 */
export class GeminiModel implements RemoteModel {
  readonly name: string;
  private readonly generateContent: GenerateContentFn;

  constructor(options: GeminiModelOptions) {
    this.name = options.model;
    if (options.generateContent) {
      this.generateContent = options.generateContent;
    } else {
      const ai = new GoogleGenAI({ apiKey: options.apiKey });
      this.generateContent = (params) => ai.models.generateContent(params);
    }
  }

  async generate(prompt: string): Promise<GenerateResponse> {
    const response = await this.generateContent({ model: this.name, contents: prompt });
    return {
      // A candidate stopped by safety filters carries no text; treat it as absent.
      candidates: (response.candidates ?? [])
        .map(toCandidate)
        .filter((candidate) => candidate.text.trim().length > 0),
      usage: { totalTokens: response.usageMetadata?.totalTokenCount ?? 0 },
    };
  }
}

function toCandidate(candidate: NonNullable<GeminiResponseLike['candidates']>[number]): Candidate {
  const text = (candidate.content?.parts ?? [])
    .filter((part) => !part.thought && typeof part.text === 'string')
    .map((part) => part.text ?? '')
    .join('');
  return { text, finishReason: candidate.finishReason };
}
