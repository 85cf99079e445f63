// packages/core/src/models/pricing.ts

/**
 * Estimated USD cost of a call billed at a flat rate per 1M tokens.
 */
export function estimateCost(tokenCount: number, pricePerMillion: number): number {
  return (tokenCount / 1_000_000) * pricePerMillion;
}

/** `$0.000150` style, six decimals. */
export function formatCost(costUsd: number): string {
  return `$${costUsd.toFixed(6)}`;
}
