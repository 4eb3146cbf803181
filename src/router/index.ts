/**
 * Governed routing module.
 *
 * Routes each call to the first backend whose context window, budget and rate
 * limit allow it, falling back across a configured chain.
 *
 * @packageDocumentation
 */

export { Router, type RouterComponents, type RouterStats, type RouterStatus } from './router.js';
export { RouterBuilder, validateBackend } from './builder.js';
export {
  AllBackendsExhaustedError,
  BackendInvocationError,
  RouterConfigError,
  type FailureRecord,
} from './errors.js';
export { calculateCost, estimateCost } from './cost.js';
export {
  MODEL_CATALOG,
  getKnownModel,
  type CatalogEntry,
  type KnownModel,
  type TierLimits,
} from './catalog.js';
export { createFallbackLogger } from './events.js';
export {
  FAILURE_REASONS,
  modelKeyOf,
  toModelKey,
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
} from './types.js';
