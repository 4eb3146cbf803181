/**
 * Recent call outcomes per backend, used to score candidates.
 *
 * @packageDocumentation
 */

import type { CallOutcome } from '../router/types.js';

/** How long an outcome counts toward a backend's recent record. */
export const HISTORY_WINDOW_MS = 300_000;

/**
 * Aggregate of a backend's recent outcomes.
 */
export interface BackendHistoryStats {
  readonly calls: number;
  readonly successes: number;
  /** Share of successful calls; 1 when there is no history. */
  readonly successRate: number;
  /** Mean latency of recent calls; 0 when there is no history. */
  readonly avgLatencyMs: number;
}

/**
 * Options for creating a CallHistory.
 */
export interface CallHistoryOptions {
  /** Clock returning epoch milliseconds (injectable for testing). */
  readonly now?: () => number;
  /**
   * Recency window in milliseconds.
   * @defaultValue {@link HISTORY_WINDOW_MS}
   */
  readonly windowMs?: number;
}

const NO_HISTORY: BackendHistoryStats = {
  calls: 0,
  successes: 0,
  successRate: 1,
  avgLatencyMs: 0,
};

/**
 * In-memory record of recent outcomes, keyed by model key.
 */
export class CallHistory {
  private readonly outcomes = new Map<string, CallOutcome[]>();
  private readonly now: () => number;
  private readonly windowMs: number;

  constructor(options: CallHistoryOptions = {}) {
    this.now = options.now ?? Date.now;
    this.windowMs = options.windowMs ?? HISTORY_WINDOW_MS;
  }

  /**
   * Adds an outcome. Outcomes are expected in timestamp order.
   *
   * @param outcome - Finished attempt.
   */
  record(outcome: CallOutcome): void {
    const list = this.outcomes.get(outcome.modelKey);
    if (list === undefined) {
      this.outcomes.set(outcome.modelKey, [outcome]);
      return;
    }
    list.push(outcome);
    this.evict(list);
  }

  /**
   * Summarizes the recent outcomes of `modelKey`.
   *
   * @param modelKey - Backend to summarize.
   */
  stats(modelKey: string): BackendHistoryStats {
    const list = this.outcomes.get(modelKey);
    if (list === undefined) {
      return NO_HISTORY;
    }
    this.evict(list);
    if (list.length === 0) {
      return NO_HISTORY;
    }
    const successes = list.filter((o) => o.success).length;
    const totalLatency = list.reduce((sum, o) => sum + o.latencyMs, 0);
    return {
      calls: list.length,
      successes,
      successRate: successes / list.length,
      avgLatencyMs: totalLatency / list.length,
    };
  }

  /** Forgets every outcome. */
  clear(): void {
    this.outcomes.clear();
  }

  private evict(list: CallOutcome[]): void {
    const cutoff = this.now() - this.windowMs;
    const firstLive = list.findIndex((o) => o.timestamp > cutoff);
    list.splice(0, firstLive === -1 ? list.length : firstLive);
  }
}
