/**
 * Rate-limit scheduler module.
 *
 * @packageDocumentation
 */

export { RateLimitScheduler, defaultSleep, safeLimit } from './scheduler.js';
export {
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_SAFETY_MARGIN,
  RateLimitWaitTimeout,
  type LimitsLookup,
  type ReadinessCheck,
  type RateLimitStatus,
  type RateLimitSchedulerOptions,
} from './types.js';
