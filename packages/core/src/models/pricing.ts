// packages/core/src/models/pricing.ts

export interface ModelPricing {
  inputPer1M: number;
  outputPer1M: number;
}

/**
 * Static pricing table for known models (USD per 1M tokens).
 * Local (ollama) models are free and need no entry.
 */
const PRICING: Record<string, ModelPricing> = {
  // OpenAI
  'gpt-4o': { inputPer1M: 2.5, outputPer1M: 10 },
  'gpt-4o-mini': { inputPer1M: 0.15, outputPer1M: 0.6 },
  'gpt-4.1': { inputPer1M: 2, outputPer1M: 8 },
  'gpt-4.1-mini': { inputPer1M: 0.4, outputPer1M: 1.6 },
  o3: { inputPer1M: 2, outputPer1M: 8 },
  // Anthropic
  'claude-3-5-sonnet': { inputPer1M: 3, outputPer1M: 15 },
  'claude-3-5-haiku': { inputPer1M: 0.8, outputPer1M: 4 },
  // Google
  'gemini-1.5-pro': { inputPer1M: 1.25, outputPer1M: 5 },
  'gemini-1.5-flash': { inputPer1M: 0.075, outputPer1M: 0.3 },
};

/** Exact match first, then the longest known prefix (dated model ids). */
export function getModelPricing(modelId: string): ModelPricing | null {
  const exact = PRICING[modelId];
  if (exact) return exact;
  const prefix = Object.keys(PRICING)
    .filter((known) => modelId.startsWith(`${known}-`))
    .sort((a, b) => b.length - a.length)[0];
  return prefix ? PRICING[prefix] : null;
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
