/**
 * model-governor
 *
 * Rate-limit, budget and context-aware routing across model backends with
 * ordered fallback.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

// Routing
export {
  Router,
  RouterBuilder,
  validateBackend,
  AllBackendsExhaustedError,
  BackendInvocationError,
  RouterConfigError,
  calculateCost,
  estimateCost,
  MODEL_CATALOG,
  getKnownModel,
  createFallbackLogger,
  FAILURE_REASONS,
  modelKeyOf,
  toModelKey,
  type RouterComponents,
  type RouterStats,
  type RouterStatus,
  type FailureRecord,
  type CatalogEntry,
  type KnownModel,
  type TierLimits,
  type BackendInvoker,
  type CallOutcome,
  type FailureReason,
  type FallbackChain,
  type FallbackEvent,
  type FallbackHandler,
  type FallbackReason,
  type InvocationResponse,
  type ModelLimits,
  type ModelPricing,
  type ModelUsage,
} from './router/index.js';

// Usage accounting and rate limits
export {
  UsageLedger,
  WINDOW_MS,
  DAY_MS,
  type UsageEvent,
  type WindowUsage,
  type UsageLedgerOptions,
} from './ledger/index.js';
export {
  RateLimitScheduler,
  RateLimitWaitTimeout,
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_SAFETY_MARGIN,
  defaultSleep,
  safeLimit,
  type LimitsLookup,
  type ReadinessCheck,
  type RateLimitStatus,
  type RateLimitSchedulerOptions,
} from './scheduler/index.js';

// Budgets
export {
  BudgetEnforcer,
  BudgetExceededError,
  createBudgetEnforcer,
  validateBudgetConfig,
  BUDGET_PERIODS,
  PERIOD_DURATION_MS,
  DEFAULT_WARNING_THRESHOLD,
  type BudgetPeriod,
  type BudgetConfig,
  type BudgetPeriodStatus,
  type BudgetWarning,
  type BudgetSettings,
  type BudgetEnforcerOptions,
} from './budget/index.js';

// Context windows
export {
  ContextFitPolicy,
  ContextTooLargeError,
  estimateTokensSimple,
  estimateTokensWordBased,
  extractText,
  simpleTokenCounter,
  wordTokenCounter,
  type TokenCounter,
  type ContextCandidate,
  type FitResult,
  type ContextFitPolicyOptions,
} from './context/index.js';

// Fallback ordering
export {
  FALLBACK_STRATEGY_KINDS,
  SequentialStrategy,
  CostOptimizedStrategy,
  SmartStrategy,
  CallHistory,
  HISTORY_WINDOW_MS,
  createFallbackStrategy,
  isFallbackStrategyKind,
  costPerToken,
  type FallbackStrategy,
  type FallbackStrategyKind,
  type FallbackContext,
  type StrategyCandidate,
  type BackendHistoryStats,
} from './fallback/index.js';

// Configuration
export {
  ConfigParseError,
  ConfigValidationError,
  EnvCoercionError,
  parseConfig,
  loadConfig,
  getDefaultConfig,
  validateConfig,
  assertConfigValid,
  applyEnvOverrides,
  readEnvOverrides,
  getEnvVarDocumentation,
  createBackend,
  resolveModel,
  DEFAULT_CONFIG,
  type GovernorConfig,
  type PartialGovernorConfig,
  type RoutingConfig,
  type BudgetSection,
  type LoggingConfig,
  type ModelConfig,
  type EnvRecord,
} from './config/index.js';

// Logging and test support
export {
  Logger,
  createSilentLogger,
  serializeEntry,
  stderrSink,
  silentSink,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './utils/logger.js';
export { VirtualClock } from './utils/virtual-clock.js';
