/**
 * Proactive rate-limit scheduler.
 *
 * Decides from the shared usage ledger whether a request may be sent to a
 * backend now, and how long to wait when it may not. Requests are kept under
 * `limit - safetyMargin` in both the request and token dimensions and spaced at
 * least `60000 / RPM` milliseconds apart.
 *
 * @packageDocumentation
 */

import type { UsageLedger, UsageEvent } from '../ledger/index.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import {
  DEFAULT_SAFETY_MARGIN,
  type LimitsLookup,
  type RateLimitSchedulerOptions,
  type RateLimitStatus,
  type ReadinessCheck,
} from './types.js';

const READY: ReadinessCheck = { ready: true, waitMs: 0 };
const NEVER: ReadinessCheck = { ready: false, waitMs: Infinity };

/**
 * Default sleep implementation using setTimeout.
 *
 * @param ms - Milliseconds to sleep.
 */
export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function normalizeTokens(tokens: number): number {
  return Number.isFinite(tokens) && tokens > 0 ? tokens : 0;
}

/**
 * Computes `max(0, limit - margin)`. Infinite limits stay infinite.
 *
 * @param limit - Published limit.
 * @param margin - Headroom to keep.
 */
export function safeLimit(limit: number, margin: number): number {
  return Math.max(0, limit - margin);
}

/**
 * Time until enough of the oldest events expire to free `excess` units.
 */
function waitToFree(
  events: readonly UsageEvent[],
  excess: number,
  weight: (event: UsageEvent) => number,
  windowMs: number,
  now: number
): number {
  let freed = 0;
  for (const event of events) {
    freed += weight(event);
    if (freed >= excess) {
      return Math.max(0, event.timestamp + windowMs - now);
    }
  }
  return Infinity;
}

/**
 * Gates requests to each backend against its published limits.
 *
 * @remarks
 * `canProceed` and `recordRequest` are synchronous, and `acquire` performs its
 * final check and the record in the same synchronous step, so concurrent
 * callers sharing a scheduler cannot both claim the last free slot.
 *
 * @example
 * ```typescript
 * const scheduler = new RateLimitScheduler({ ledger, limits: (key) => table.get(key) });
 * if (await scheduler.acquire('openai/gpt-4o-mini', 1500, 30_000)) {
 *   await backend.invoke(payload);
 * }
 * ```
 */
export class RateLimitScheduler {
  private readonly ledger: UsageLedger;
  private readonly limitsFor: LimitsLookup;
  private readonly margin: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly lastCall = new Map<string, number>();

  constructor(options: RateLimitSchedulerOptions) {
    this.ledger = options.ledger;
    this.limitsFor = options.limits;
    this.margin = options.safetyMargin ?? DEFAULT_SAFETY_MARGIN;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createSilentLogger('RateLimitScheduler');
  }

  /** Headroom kept below every limit. */
  get safetyMargin(): number {
    return this.margin;
  }

  /**
   * Checks whether a request of `tokens` tokens may be sent now.
   *
   * Keys without configured limits are always ready.
   *
   * @param modelKey - Backend to check.
   * @param tokens - Tokens the request will consume.
   */
  canProceed(modelKey: string, tokens: number): ReadinessCheck {
    const limits = this.limitsFor(modelKey);
    if (limits === undefined) {
      return READY;
    }

    const requested = normalizeTokens(tokens);
    const safeRequests = safeLimit(limits.requestsPerMinute, this.margin);
    const safeTokens = safeLimit(limits.tokensPerMinute, this.margin);
    const dailyLimit = limits.requestsPerDay ?? Infinity;
    if (safeRequests < 1 || requested > safeTokens || dailyLimit < 1) {
      return NEVER;
    }

    const now = this.now();
    const windowMs = this.ledger.windowLengthMs;
    const events = this.ledger.window(modelKey);
    const windowTokens = events.reduce((sum, event) => sum + event.tokens, 0);
    const waits: number[] = [];

    const last = this.lastCall.get(modelKey);
    if (last !== undefined) {
      const spacing = 60_000 / limits.requestsPerMinute;
      const elapsed = now - last;
      if (elapsed < spacing) {
        waits.push(spacing - elapsed);
      }
    }

    if (events.length + 1 > safeRequests) {
      waits.push(waitToFree(events, events.length + 1 - safeRequests, () => 1, windowMs, now));
    }

    if (windowTokens + requested > safeTokens) {
      waits.push(
        waitToFree(events, windowTokens + requested - safeTokens, (e) => e.tokens, windowMs, now)
      );
    }

    if (this.ledger.dailyRequests(modelKey) + 1 > dailyLimit) {
      waits.push(this.ledger.msUntilDailyReset(modelKey));
    }

    if (waits.length === 0) {
      return READY;
    }
    return { ready: false, waitMs: Math.max(...waits) };
  }

  /**
   * Records a request that is about to be sent.
   *
   * @param modelKey - Backend the request goes to.
   * @param tokens - Tokens the request will consume.
   */
  recordRequest(modelKey: string, tokens: number): void {
    this.ledger.record(modelKey, normalizeTokens(tokens));
    this.lastCall.set(modelKey, this.now());
  }

  /**
   * Waits until a request of `tokens` tokens may be sent.
   *
   * Gives up without sleeping as soon as the next wait would carry the total
   * past `maxWaitMs`.
   *
   * @param modelKey - Backend to wait for.
   * @param tokens - Tokens the request will consume.
   * @param maxWaitMs - Longest total wait allowed.
   * @returns True when the request may proceed, false on timeout.
   */
  waitUntilReady(modelKey: string, tokens: number, maxWaitMs: number): Promise<boolean> {
    return this.poll(modelKey, tokens, maxWaitMs, false);
  }

  /**
   * Waits for a slot and claims it.
   *
   * Like {@link waitUntilReady}, except that the successful check and
   * {@link recordRequest} happen together.
   *
   * @param modelKey - Backend to wait for.
   * @param tokens - Tokens the request will consume.
   * @param maxWaitMs - Longest total wait allowed.
   * @returns True when the slot was claimed, false on timeout.
   */
  acquire(modelKey: string, tokens: number, maxWaitMs: number): Promise<boolean> {
    return this.poll(modelKey, tokens, maxWaitMs, true);
  }

  /**
   * Reports current usage against the limits of `modelKey`.
   *
   * @param modelKey - Backend to inspect.
   * @returns The status, or `undefined` for keys without limits.
   */
  status(modelKey: string): RateLimitStatus | undefined {
    const limits = this.limitsFor(modelKey);
    if (limits === undefined) {
      return undefined;
    }
    const usage = this.ledger.usage(modelKey);
    return {
      modelKey,
      currentRequests: usage.requests,
      currentTokens: usage.tokens,
      safeRequestLimit: safeLimit(limits.requestsPerMinute, this.margin),
      safeTokenLimit: safeLimit(limits.tokensPerMinute, this.margin),
      totalRequestLimit: limits.requestsPerMinute,
      totalTokenLimit: limits.tokensPerMinute,
      dailyRequests: this.ledger.dailyRequests(modelKey),
      dailyRequestLimit: limits.requestsPerDay ?? Infinity,
      atCapacity: !this.canProceed(modelKey, 0).ready,
    };
  }

  /**
   * Forgets recorded usage and request spacing.
   *
   * @param modelKey - Backend to reset; all backends when omitted.
   */
  reset(modelKey?: string): void {
    this.ledger.clear(modelKey);
    if (modelKey === undefined) {
      this.lastCall.clear();
      return;
    }
    this.lastCall.delete(modelKey);
  }

  private async poll(
    modelKey: string,
    tokens: number,
    maxWaitMs: number,
    claim: boolean
  ): Promise<boolean> {
    const start = this.now();
    for (;;) {
      const check = this.canProceed(modelKey, tokens);
      if (check.ready) {
        if (claim) {
          this.recordRequest(modelKey, tokens);
        }
        return true;
      }

      const elapsed = this.now() - start;
      if (!Number.isFinite(check.waitMs) || elapsed + check.waitMs > maxWaitMs) {
        this.logger.debug('rate_limit_wait', {
          modelKey,
          tokens,
          waitMs: check.waitMs,
          elapsedMs: elapsed,
          maxWaitMs,
          outcome: 'timeout',
        });
        return false;
      }

      this.logger.debug('rate_limit_wait', {
        modelKey,
        tokens,
        waitMs: check.waitMs,
        elapsedMs: elapsed,
        maxWaitMs,
        outcome: 'sleeping',
      });
      await this.sleep(check.waitMs);
    }
  }
}
