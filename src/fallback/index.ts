/**
 * Fallback ordering module.
 *
 * @packageDocumentation
 */

export {
  FALLBACK_STRATEGY_KINDS,
  SUCCESS_WEIGHT,
  LATENCY_WEIGHT,
  COST_WEIGHT,
  SequentialStrategy,
  CostOptimizedStrategy,
  SmartStrategy,
  costPerToken,
  createFallbackStrategy,
  isFallbackStrategyKind,
  type FallbackStrategy,
  type FallbackStrategyKind,
  type FallbackStrategyDeps,
  type FallbackContext,
  type StrategyCandidate,
} from './strategies.js';
export {
  CallHistory,
  HISTORY_WINDOW_MS,
  type BackendHistoryStats,
  type CallHistoryOptions,
} from './history.js';
