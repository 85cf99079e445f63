// packages/core/src/models -- Remote model adapter and pricing

export { GeminiModel } from './gemini.js';
export type { GeminiModelOptions, GeminiResponseLike, GenerateContentFn } from './gemini.js';
export { estimateCost, formatCost } from './pricing.js';
