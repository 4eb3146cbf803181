/**
 * Types for the sliding-window usage ledger.
 *
 * @packageDocumentation
 */

/**
 * Length of the rate-limit accounting window in milliseconds.
 */
export const WINDOW_MS = 60_000;

/**
 * Length of the daily request-count cycle in milliseconds.
 */
export const DAY_MS = 86_400_000;

/**
 * One recorded request against a backend.
 */
export interface UsageEvent {
  /** When the request was recorded (epoch ms). */
  readonly timestamp: number;
  /** Tokens attributed to the request. */
  readonly tokens: number;
}

/**
 * Request and token counts inside the current window.
 */
export interface WindowUsage {
  readonly requests: number;
  readonly tokens: number;
}

/**
 * Options for creating a UsageLedger.
 */
export interface UsageLedgerOptions {
  /** Clock returning epoch milliseconds (injectable for testing). */
  readonly now?: () => number;
  /**
   * Window length in milliseconds.
   * @defaultValue {@link WINDOW_MS}
   */
  readonly windowMs?: number;
}
