/**
 * Configuration types for governor.toml parsing.
 *
 * @packageDocumentation
 */

import type { FallbackStrategyKind } from '../fallback/index.js';

/**
 * How calls are routed across backends.
 */
export interface RoutingConfig {
  /** Fallback ordering: sequential, cost-optimized or smart. */
  strategy: FallbackStrategyKind;
  /** Longest a call waits for one backend's rate limit, in milliseconds. */
  max_wait_ms: number;
  /** Headroom kept below every request and token limit. */
  safety_margin: number;
  /** Whether oversized inputs escalate to larger-context backends. */
  context_fallback: boolean;
  /** Provider tier used to resolve catalog limits (e.g. 'tier1', 'paid'). */
  tier?: string;
}

/**
 * Spending limits in USD. A period without an amount is not enforced.
 */
export interface BudgetSection {
  hourly?: number;
  daily?: number;
  monthly?: number;
  total?: number;
  /** Whether exceeding a limit blocks further calls. */
  hard_limit: boolean;
  /** Fraction of a limit at which a warning is logged. */
  warning_threshold: number;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug-level entries (rate-limit waits). */
  debug: boolean;
}

/**
 * Limits and pricing of one backend, keyed by `provider/modelName`.
 *
 * Fields left out are taken from the built-in model catalog.
 */
export interface ModelConfig {
  requests_per_minute?: number;
  tokens_per_minute?: number;
  max_context_tokens?: number;
  requests_per_day?: number;
  /** USD per million prompt tokens. */
  input_per_1m?: number;
  /** USD per million completion tokens. */
  output_per_1m?: number;
}

/**
 * Complete governor configuration.
 */
export interface GovernorConfig {
  routing: RoutingConfig;
  budget: BudgetSection;
  logging: LoggingConfig;
  models: Record<string, ModelConfig>;
}

/**
 * Partial configuration, as produced by environment overrides.
 */
export interface PartialGovernorConfig {
  routing?: Partial<RoutingConfig>;
  budget?: Partial<BudgetSection>;
  logging?: Partial<LoggingConfig>;
  models?: Record<string, ModelConfig>;
}
