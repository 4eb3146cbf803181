/**
 * Types for the rate-limit scheduler.
 *
 * @packageDocumentation
 */

import type { UsageLedger } from '../ledger/index.js';
import type { ModelLimits } from '../router/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Default number of requests (and tokens) kept in reserve below each
 * published limit.
 */
export const DEFAULT_SAFETY_MARGIN = 2;

/**
 * Default longest wait for one backend's rate limit: five minutes.
 */
export const DEFAULT_MAX_WAIT_MS = 300_000;

/**
 * Resolves the limits of a model key, or `undefined` for keys the scheduler
 * does not govern.
 */
export type LimitsLookup = (modelKey: string) => ModelLimits | undefined;

/**
 * Answer of a readiness check.
 */
export interface ReadinessCheck {
  /** Whether a request of the given size may be sent now. */
  readonly ready: boolean;
  /**
   * Milliseconds to wait before checking again. 0 when ready; `Infinity`
   * when the request can never fit under the configured limits.
   */
  readonly waitMs: number;
}

/**
 * Point-in-time view of one model's rate-limit headroom.
 */
export interface RateLimitStatus {
  readonly modelKey: string;
  readonly currentRequests: number;
  readonly currentTokens: number;
  readonly safeRequestLimit: number;
  readonly safeTokenLimit: number;
  readonly totalRequestLimit: number;
  readonly totalTokenLimit: number;
  readonly dailyRequests: number;
  readonly dailyRequestLimit: number;
  /** True when one more minimal request would not be allowed right now. */
  readonly atCapacity: boolean;
}

/**
 * Options for creating a RateLimitScheduler.
 */
export interface RateLimitSchedulerOptions {
  /** Ledger shared with every other component that records usage. */
  readonly ledger: UsageLedger;
  /** Limits of each governed model. */
  readonly limits: LimitsLookup;
  /**
   * Headroom subtracted from every request and token limit.
   * @defaultValue {@link DEFAULT_SAFETY_MARGIN}
   */
  readonly safetyMargin?: number;
  /** Clock returning epoch milliseconds (injectable for testing). */
  readonly now?: () => number;
  /** Sleep function for waits (injectable for testing). */
  readonly sleep?: (ms: number) => Promise<void>;
  /** Logger for wait decisions. */
  readonly logger?: Logger;
}

/**
 * Error describing a request that could not get a rate-limit slot within its
 * wait allowance.
 */
export class RateLimitWaitTimeout extends Error {
  readonly code = 'RATE_LIMIT_WAIT_TIMEOUT';
  /** Model key that stayed throttled. */
  readonly modelKey: string;
  /** Wait allowance that was exhausted, in milliseconds. */
  readonly maxWaitMs: number;

  constructor(modelKey: string, maxWaitMs: number) {
    super(`Rate limit for ${modelKey} did not clear within ${String(maxWaitMs)}ms`);
    this.name = 'RateLimitWaitTimeout';
    this.modelKey = modelKey;
    this.maxWaitMs = maxWaitMs;
  }
}
