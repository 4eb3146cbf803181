/**
 * Deterministic clock for driving time-based components without real waits.
 *
 * @packageDocumentation
 */

/**
 * A manually advanced clock whose `sleep` moves time forward instead of
 * waiting.
 *
 * @example
 * ```typescript
 * const clock = new VirtualClock(0);
 * const ledger = new UsageLedger({ now: clock.now });
 * clock.advance(61_000);
 * ```
 */
export class VirtualClock {
  private current: number;
  private readonly sleeps: number[] = [];

  /**
   * @param start - Initial time in epoch milliseconds.
   */
  constructor(start = 0) {
    this.current = start;
  }

  /** Current time in epoch milliseconds. Safe to pass unbound. */
  readonly now = (): number => this.current;

  /**
   * Advances time by `ms` and resolves immediately. Safe to pass unbound.
   */
  readonly sleep = (ms: number): Promise<void> => {
    const step = Number.isFinite(ms) && ms > 0 ? ms : 0;
    this.sleeps.push(step);
    this.current += step;
    return Promise.resolve();
  };

  /**
   * Moves time forward.
   *
   * @param ms - Milliseconds to advance.
   */
  advance(ms: number): void {
    this.current += ms;
  }

  /**
   * Jumps to an absolute time.
   *
   * @param ms - Epoch milliseconds.
   */
  set(ms: number): void {
    this.current = ms;
  }

  /** Durations passed to `sleep`, in call order. */
  get sleepCalls(): readonly number[] {
    return this.sleeps;
  }
}
