// packages/core/src/models/pricing.ts

export interface ModelPricing {
  inputPer1M: number;
  outputPer1M: number;
}

/**
 * Static pricing table for known model families (USD per 1M tokens).
 * Keys are matched as prefixes of the model id, longest first, so dated
 * releases such as `claude-sonnet-4-20250514` resolve to their family.
 */
const PRICING: Record<string, ModelPricing> = {
  'claude-opus-4': { inputPer1M: 15, outputPer1M: 75 },
  'claude-sonnet-4': { inputPer1M: 3, outputPer1M: 15 },
  'claude-3-7-sonnet': { inputPer1M: 3, outputPer1M: 15 },
  'claude-3-5-sonnet': { inputPer1M: 3, outputPer1M: 15 },
  'claude-3-5-haiku': { inputPer1M: 0.8, outputPer1M: 4 },
  'claude-3-opus': { inputPer1M: 15, outputPer1M: 75 },
  'claude-3-sonnet': { inputPer1M: 3, outputPer1M: 15 },
  'claude-3-haiku': { inputPer1M: 0.25, outputPer1M: 1.25 },
  // Aliases accepted by the CLI
  opus: { inputPer1M: 15, outputPer1M: 75 },
  sonnet: { inputPer1M: 3, outputPer1M: 15 },
  haiku: { inputPer1M: 0.8, outputPer1M: 4 },
};

const PREFIXES = Object.keys(PRICING).sort((a, b) => b.length - a.length);

export function getModelPricing(modelId: string): ModelPricing | null {
  const exact = PRICING[modelId];
  if (exact) return exact;
  const prefix = PREFIXES.find((p) => modelId.startsWith(p));
  return prefix ? (PRICING[prefix] ?? null) : null;
}

/**
 * Calculate cost in USD for a model call.
 * Returns 0 if the model is not in the pricing table.
 */
export function calculateCost(modelId: string, inputTokens: number, outputTokens: number): number {
  const pricing = getModelPricing(modelId);
  if (!pricing) return 0;
  return (inputTokens * pricing.inputPer1M + outputTokens * pricing.outputPer1M) / 1_000_000;
}
