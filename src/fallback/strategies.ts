/**
 * Ordering strategies for fallback candidates.
 *
 * A strategy only orders; the router decides what to skip. Every strategy is
 * deterministic for the same candidates and history.
 *
 * @packageDocumentation
 */

import { modelKeyOf, type ModelPricing } from '../router/types.js';
import { CallHistory } from './history.js';

/**
 * Name of a built-in strategy.
 */
export type FallbackStrategyKind = 'sequential' | 'cost-optimized' | 'smart';

/**
 * Array of all built-in strategy names.
 */
export const FALLBACK_STRATEGY_KINDS: readonly FallbackStrategyKind[] = [
  'sequential',
  'cost-optimized',
  'smart',
] as const;

/**
 * Checks whether a string names a built-in strategy.
 *
 * @param value - Value to check.
 */
export function isFallbackStrategyKind(value: string): value is FallbackStrategyKind {
  return FALLBACK_STRATEGY_KINDS.some((kind) => kind === value);
}

/**
 * What a strategy knows about a candidate.
 */
export interface StrategyCandidate {
  readonly provider: string;
  readonly modelName: string;
  readonly pricing?: ModelPricing | undefined;
}

/**
 * Facts about the call being routed.
 */
export interface FallbackContext {
  readonly estimatedTokens: number;
  /** Model key of the configured primary. */
  readonly primaryKey: string;
  /** Model keys already attempted for this call. */
  readonly attempted: ReadonlySet<string>;
}

/**
 * Orders candidate backends for one call.
 */
export interface FallbackStrategy {
  readonly name: string;
  /**
   * Returns the candidates in the order they should be tried. Never adds or
   * drops a candidate.
   */
  order<T extends StrategyCandidate>(candidates: readonly T[], context: FallbackContext): T[];
}

/**
 * Blended USD cost per token, `(input + output) / 2` per million.
 *
 * @param pricing - Pricing of a backend.
 * @returns The cost, or `undefined` when pricing is unknown.
 */
export function costPerToken(pricing: ModelPricing | undefined): number | undefined {
  if (pricing === undefined) {
    return undefined;
  }
  return (pricing.inputPer1M + pricing.outputPer1M) / 2 / 1_000_000;
}

/**
 * Tries the primary first and the fallbacks in configured order.
 */
export class SequentialStrategy implements FallbackStrategy {
  readonly name = 'sequential';

  order<T extends StrategyCandidate>(candidates: readonly T[]): T[] {
    return [...candidates];
  }
}

/**
 * Tries the cheapest untried candidate first. Candidates without pricing go
 * last, and already attempted candidates after those.
 */
export class CostOptimizedStrategy implements FallbackStrategy {
  readonly name = 'cost-optimized';

  order<T extends StrategyCandidate>(candidates: readonly T[], context: FallbackContext): T[] {
    const untried = candidates.filter((c) => !context.attempted.has(modelKeyOf(c)));
    const tried = candidates.filter((c) => context.attempted.has(modelKeyOf(c)));
    const sorted = [...untried].sort((a, b) =>
      compareCost(costPerToken(a.pricing), costPerToken(b.pricing))
    );
    return [...sorted, ...tried];
  }
}

function compareCost(a: number | undefined, b: number | undefined): number {
  if (a === b) {
    return 0;
  }
  if (a === undefined) {
    return 1;
  }
  if (b === undefined) {
    return -1;
  }
  return a - b;
}

/** Weight of the recent success rate in the smart score. */
export const SUCCESS_WEIGHT = 0.5;
/** Weight of the recent latency in the smart score. */
export const LATENCY_WEIGHT = 0.3;
/** Weight of the price in the smart score. */
export const COST_WEIGHT = 0.2;

/**
 * Ranks candidates by recent success rate, recent latency and price.
 *
 * @remarks
 * `score = 0.5 * successRate + 0.3 * 1000 / (1000 + avgLatencyMs)
 *   + 0.2 * (1 - cost / maxCost)`, highest first. A candidate with unknown
 * pricing scores as the most expensive one.
 */
export class SmartStrategy implements FallbackStrategy {
  readonly name = 'smart';
  private readonly history: CallHistory;

  constructor(history: CallHistory) {
    this.history = history;
  }

  /**
   * Score of each candidate, in input order.
   *
   * @param candidates - Candidates to score.
   */
  scores(candidates: readonly StrategyCandidate[]): number[] {
    const costs = candidates.map((c) => costPerToken(c.pricing));
    const maxCost = costs.reduce<number>((max, cost) => Math.max(max, cost ?? 0), 0);

    return candidates.map((candidate, i) => {
      const stats = this.history.stats(modelKeyOf(candidate));
      const latencyScore = 1000 / (1000 + stats.avgLatencyMs);
      const cost = costs[i] ?? maxCost;
      const costScore = maxCost > 0 ? 1 - cost / maxCost : 1;
      return SUCCESS_WEIGHT * stats.successRate + LATENCY_WEIGHT * latencyScore + COST_WEIGHT * costScore;
    });
  }

  order<T extends StrategyCandidate>(candidates: readonly T[]): T[] {
    const scores = this.scores(candidates);
    return candidates
      .map((candidate, i) => ({ candidate, score: scores[i] ?? 0 }))
      .sort((a, b) => b.score - a.score)
      .map((entry) => entry.candidate);
  }
}

/**
 * Collaborators a strategy may need.
 */
export interface FallbackStrategyDeps {
  /** History consulted by the smart strategy. */
  readonly history?: CallHistory;
}

/**
 * Creates a built-in strategy.
 *
 * @param kind - Strategy name.
 * @param deps - Shared collaborators.
 */
export function createFallbackStrategy(
  kind: FallbackStrategyKind,
  deps: FallbackStrategyDeps = {}
): FallbackStrategy {
  switch (kind) {
    case 'sequential':
      return new SequentialStrategy();
    case 'cost-optimized':
      return new CostOptimizedStrategy();
    case 'smart':
      return new SmartStrategy(deps.history ?? new CallHistory());
  }
}
