import { describe, expect, it, vi } from 'vitest';
import { AnalysisController } from '../../../src/engine/analysis-controller.js';
import { type GenerateContentFn, GeminiModel } from '../../../src/models/gemini.js';

function modelWith(generateContent: GenerateContentFn): GeminiModel {
  return new GeminiModel({ apiKey: 'test-secret', model: 'gemini-test', generateContent });
}

describe('GeminiModel', () => {
  it('sends the prompt to the configured model', async () => {
    const generateContent = vi.fn<GenerateContentFn>(async () => ({
      candidates: [{ content: { parts: [{ text: 'Summary' }, { text: ' here' }] }, finishReason: 'STOP' }],
      usageMetadata: { totalTokenCount: 321 },
    }));
    const model = modelWith(generateContent);

    const response = await model.generate('Analyze this');

    expect(model.name).toBe('gemini-test');
    expect(generateContent).toHaveBeenCalledWith({ model: 'gemini-test', contents: 'Analyze this' });
    expect(response).toEqual({
      candidates: [{ text: 'Summary here', finishReason: 'STOP' }],
      usage: { totalTokens: 321 },
    });
  });

  it('skips thought parts', async () => {
    const model = modelWith(async () => ({
      candidates: [{ content: { parts: [{ text: 'thinking', thought: true }, { text: 'answer' }] } }],
    }));

    const response = await model.generate('p');

    expect(response.candidates[0].text).toBe('answer');
    expect(response.usage.totalTokens).toBe(0);
  });

  it('reports no candidates when the response is blocked', async () => {
    const model = modelWith(async () => ({ usageMetadata: { totalTokenCount: 12 } }));
    await expect(model.generate('p')).resolves.toEqual({ candidates: [], usage: { totalTokens: 12 } });
  });

  it('drops candidates stopped without content', async () => {
    const model = modelWith(async () => ({ candidates: [{ finishReason: 'SAFETY' }] }));
    const response = await model.generate('p');
    expect(response.candidates).toEqual([]);
  });

  it('drops candidates without any answer text', async () => {
    const model = modelWith(async () => ({
      candidates: [
        { content: { parts: [] }, finishReason: 'STOP' },
        { content: { parts: [{ text: 'only thinking', thought: true }] } },
        { content: { parts: [{ text: '  \n' }] } },
      ],
      usageMetadata: { totalTokenCount: 40 },
    }));

    await expect(model.generate('p')).resolves.toEqual({ candidates: [], usage: { totalTokens: 40 } });
  });

  it('ends the analysis as blocked when the answer has no text', async () => {
    const model = modelWith(async () => ({ candidates: [{ content: { parts: [] } }] }));

    const outcome = await new AnalysisController({ model }).run('p');

    expect(outcome).toEqual({ kind: 'blocked', attempts: 1 });
  });

  it('lets SDK errors propagate', async () => {
    const error = Object.assign(new Error('quota exceeded'), { status: 429 });
    const model = modelWith(async () => {
      throw error;
    });
    await expect(model.generate('p')).rejects.toBe(error);
  });
});
