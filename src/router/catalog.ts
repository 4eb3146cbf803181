/**
 * Published limits and pricing of well-known models.
 *
 * Values are per provider tier; the first tier listed for a model is its
 * default. `Infinity` marks a dimension the tier does not limit.
 *
 * @packageDocumentation
 */

import type { ModelLimits, ModelPricing } from './types.js';

/**
 * Rate limits of one provider tier.
 */
export interface TierLimits {
  readonly requestsPerMinute: number;
  readonly tokensPerMinute: number;
  readonly requestsPerDay: number;
}

/**
 * Catalog record of one model.
 */
export interface CatalogEntry {
  readonly provider: string;
  readonly modelName: string;
  readonly maxContextTokens: number;
  readonly maxOutputTokens: number;
  readonly pricing: ModelPricing;
  /** Tier name to limits, default tier first. */
  readonly tiers: Readonly<Record<string, TierLimits>>;
}

/**
 * Limits and pricing resolved for one model and tier.
 */
export interface KnownModel {
  readonly limits: ModelLimits;
  readonly pricing: ModelPricing;
  /** Largest completion the model returns in one call. */
  readonly maxOutputTokens: number;
}

const tier = (
  requestsPerMinute: number,
  tokensPerMinute: number,
  requestsPerDay: number
): TierLimits => ({ requestsPerMinute, tokensPerMinute, requestsPerDay });

/**
 * Built-in model catalog, keyed by `provider/modelName`.
 */
export const MODEL_CATALOG: ReadonlyMap<string, CatalogEntry> = new Map(
  (
    [
      {
        provider: 'openai',
        modelName: 'gpt-4o',
        maxContextTokens: 128_000,
        maxOutputTokens: 4096,
        pricing: { inputPer1M: 2.5, outputPer1M: 10 },
        tiers: { tier1: tier(500, 30_000, 10_000), tier2: tier(5000, 450_000, 10_000) },
      },
      {
        provider: 'openai',
        modelName: 'gpt-4o-mini',
        maxContextTokens: 128_000,
        maxOutputTokens: 16_384,
        pricing: { inputPer1M: 0.15, outputPer1M: 0.6 },
        tiers: { tier1: tier(500, 200_000, 10_000), tier2: tier(5000, 2_000_000, 10_000) },
      },
      {
        provider: 'openai',
        modelName: 'gpt-3.5-turbo',
        maxContextTokens: 16_385,
        maxOutputTokens: 4096,
        pricing: { inputPer1M: 0.5, outputPer1M: 1.5 },
        tiers: { tier1: tier(500, 60_000, 10_000) },
      },
      {
        provider: 'openai',
        modelName: 'gpt-4.1',
        maxContextTokens: 1_000_000,
        maxOutputTokens: 64_000,
        pricing: { inputPer1M: 10, outputPer1M: 30 },
        tiers: { tier1: tier(100, 100_000, 1000) },
      },
      {
        provider: 'openai',
        modelName: 'o1',
        maxContextTokens: 200_000,
        maxOutputTokens: 100_000,
        pricing: { inputPer1M: 15, outputPer1M: 60 },
        tiers: { tier1: tier(20, 100_000, 500), tier2: tier(40, 200_000, 1000) },
      },
      {
        provider: 'openai',
        modelName: 'o1-mini',
        maxContextTokens: 128_000,
        maxOutputTokens: 65_536,
        pricing: { inputPer1M: 3, outputPer1M: 12 },
        tiers: { tier1: tier(30, 150_000, 1000), tier2: tier(60, 300_000, 2000) },
      },
      {
        provider: 'gemini',
        modelName: 'gemini-2.5-pro',
        maxContextTokens: 2_097_152,
        maxOutputTokens: 8192,
        pricing: { inputPer1M: 1.25, outputPer1M: 10 },
        tiers: { free: tier(5, 250_000, 100), paid: tier(1000, Infinity, Infinity) },
      },
      {
        provider: 'gemini',
        modelName: 'gemini-2.5-flash-lite',
        maxContextTokens: 1_048_576,
        maxOutputTokens: 8192,
        pricing: { inputPer1M: 0.1, outputPer1M: 0.4 },
        tiers: { free: tier(15, 250_000, 1000), paid: tier(2000, Infinity, Infinity) },
      },
      {
        provider: 'gemini',
        modelName: 'gemini-1.5-flash',
        maxContextTokens: 1_048_576,
        maxOutputTokens: 8192,
        pricing: { inputPer1M: 0.35, outputPer1M: 1.05 },
        tiers: { free: tier(15, 1_000_000, 1500), paid: tier(2000, 8_192_000, Infinity) },
      },
    ] satisfies CatalogEntry[]
  ).map((entry): [string, CatalogEntry] => [`${entry.provider}/${entry.modelName}`, entry])
);

/**
 * Resolves the limits and pricing of a catalog model.
 *
 * @param modelKey - `provider/modelName`.
 * @param tierName - Provider tier; the model's default tier when omitted.
 * @returns The model, or `undefined` if the key or tier is unknown.
 *
 * @example
 * ```typescript
 * const known = getKnownModel('gemini/gemini-2.5-pro', 'paid');
 * known?.limits.maxContextTokens; // 2097152
 * ```
 */
export function getKnownModel(modelKey: string, tierName?: string): KnownModel | undefined {
  const entry = MODEL_CATALOG.get(modelKey);
  if (entry === undefined) {
    return undefined;
  }
  const tiers = Object.entries(entry.tiers);
  const selected =
    tierName === undefined ? tiers[0] : tiers.find(([name]) => name === tierName);
  if (selected === undefined) {
    return undefined;
  }
  const [, limits] = selected;
  return {
    limits: {
      provider: entry.provider,
      modelName: entry.modelName,
      requestsPerMinute: limits.requestsPerMinute,
      tokensPerMinute: limits.tokensPerMinute,
      maxContextTokens: entry.maxContextTokens,
      requestsPerDay: limits.requestsPerDay,
    },
    pricing: entry.pricing,
    maxOutputTokens: entry.maxOutputTokens,
  };
}
