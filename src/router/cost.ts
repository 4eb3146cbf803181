/**
 * Call cost calculation.
 *
 * @packageDocumentation
 */

import type { ModelPricing, ModelUsage } from './types.js';

/**
 * Deterministic USD cost of a call from its token usage.
 *
 * @param usage - Prompt and completion token counts.
 * @param pricing - Backend pricing; a call to an unpriced backend costs 0.
 */
export function calculateCost(usage: ModelUsage, pricing: ModelPricing | undefined): number {
  if (pricing === undefined) {
    return 0;
  }
  const inputCost = (usage.promptTokens * pricing.inputPer1M) / 1_000_000;
  const outputCost = (usage.completionTokens * pricing.outputPer1M) / 1_000_000;
  return inputCost + outputCost;
}

/**
 * Cost estimate for a call before it is made, counting the input only.
 *
 * @param estimatedTokens - Estimated input tokens.
 * @param pricing - Backend pricing.
 */
export function estimateCost(estimatedTokens: number, pricing: ModelPricing | undefined): number {
  return calculateCost({ promptTokens: estimatedTokens, completionTokens: 0 }, pricing);
}
