/**
 * Sliding-window usage ledger.
 *
 * Keeps, per model key, the requests and tokens recorded during the trailing
 * window. Expired events are evicted lazily whenever a key is read or written,
 * never on a timer.
 *
 * @packageDocumentation
 */

import { DAY_MS, WINDOW_MS, type UsageEvent, type UsageLedgerOptions, type WindowUsage } from './types.js';

/**
 * Mutable per-key state. Each key owns one of these, so work on one backend
 * never touches another backend's window.
 */
interface KeyWindow {
  events: UsageEvent[];
  tokens: number;
  dailyRequests: number;
  dailyCycleStart: number | undefined;
}

/**
 * Per-backend sliding-window counters of requests and tokens.
 *
 * @remarks
 * Every public method runs to completion without yielding, so the
 * evict-then-count and append sequences are atomic with respect to other
 * callers sharing the ledger.
 *
 * @example
 * ```typescript
 * const ledger = new UsageLedger();
 * ledger.record('openai/gpt-4o-mini', 1200);
 * ledger.usage('openai/gpt-4o-mini'); // { requests: 1, tokens: 1200 }
 * ```
 */
export class UsageLedger {
  private readonly windows = new Map<string, KeyWindow>();
  private readonly now: () => number;
  private readonly windowMs: number;

  constructor(options: UsageLedgerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.windowMs = options.windowMs ?? WINDOW_MS;
  }

  /**
   * Appends a usage event at the current time.
   *
   * @param modelKey - Backend the request went to.
   * @param tokens - Tokens attributed to the request. Negative or non-finite
   * values are recorded as 0.
   */
  record(modelKey: string, tokens: number): void {
    const now = this.now();
    const window = this.getOrCreate(modelKey);
    this.evict(window, now);
    this.rollDailyCycle(window, now);

    const counted = Number.isFinite(tokens) && tokens > 0 ? tokens : 0;
    window.events.push({ timestamp: now, tokens: counted });
    window.tokens += counted;
    window.dailyRequests += 1;
    if (window.dailyCycleStart === undefined) {
      window.dailyCycleStart = now;
    }
  }

  /**
   * Counts requests and tokens recorded within the trailing window.
   *
   * @param modelKey - Backend to query.
   */
  usage(modelKey: string): WindowUsage {
    const window = this.windows.get(modelKey);
    if (window === undefined) {
      return { requests: 0, tokens: 0 };
    }
    this.evict(window, this.now());
    return { requests: window.events.length, tokens: window.tokens };
  }

  /**
   * Returns the events currently inside the window, oldest first.
   *
   * @param modelKey - Backend to query.
   */
  window(modelKey: string): readonly UsageEvent[] {
    const window = this.windows.get(modelKey);
    if (window === undefined) {
      return [];
    }
    this.evict(window, this.now());
    return [...window.events];
  }

  /**
   * Requests recorded since the start of the current daily cycle.
   *
   * @param modelKey - Backend to query.
   */
  dailyRequests(modelKey: string): number {
    const window = this.windows.get(modelKey);
    if (window === undefined) {
      return 0;
    }
    this.rollDailyCycle(window, this.now());
    return window.dailyRequests;
  }

  /**
   * Milliseconds until the daily counter of `modelKey` resets, or 0 when no
   * cycle is running.
   *
   * @param modelKey - Backend to query.
   */
  msUntilDailyReset(modelKey: string): number {
    const window = this.windows.get(modelKey);
    if (window === undefined) {
      return 0;
    }
    const now = this.now();
    this.rollDailyCycle(window, now);
    if (window.dailyCycleStart === undefined) {
      return 0;
    }
    return Math.max(0, window.dailyCycleStart + DAY_MS - now);
  }

  /** Length of the accounting window in milliseconds. */
  get windowLengthMs(): number {
    return this.windowMs;
  }

  /** Model keys that have ever been recorded. */
  keys(): string[] {
    return [...this.windows.keys()];
  }

  /**
   * Forgets recorded usage.
   *
   * @param modelKey - Backend to clear; all backends when omitted.
   */
  clear(modelKey?: string): void {
    if (modelKey === undefined) {
      this.windows.clear();
      return;
    }
    this.windows.delete(modelKey);
  }

  private getOrCreate(modelKey: string): KeyWindow {
    let window = this.windows.get(modelKey);
    if (window === undefined) {
      window = { events: [], tokens: 0, dailyRequests: 0, dailyCycleStart: undefined };
      this.windows.set(modelKey, window);
    }
    return window;
  }

  private evict(window: KeyWindow, now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    for (const event of window.events) {
      if (event.timestamp > cutoff) {
        break;
      }
      window.tokens -= event.tokens;
      expired++;
    }
    if (expired > 0) {
      window.events.splice(0, expired);
    }
    if (window.events.length === 0) {
      window.tokens = 0;
    }
  }

  private rollDailyCycle(window: KeyWindow, now: number): void {
    if (window.dailyCycleStart !== undefined && now - window.dailyCycleStart >= DAY_MS) {
      window.dailyRequests = 0;
      window.dailyCycleStart = undefined;
    }
  }
}
