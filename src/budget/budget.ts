/**
 * Multi-period cost budget enforcement.
 *
 * Tracks spend per period (and per model within each period), resets
 * time-bound periods when their duration has elapsed, warns once per cycle at
 * the warning threshold and refuses spend past hard limits.
 *
 * @packageDocumentation
 */

import { createSilentLogger, type Logger } from '../utils/logger.js';
import {
  BUDGET_PERIODS,
  BudgetExceededError,
  DEFAULT_WARNING_THRESHOLD,
  PERIOD_DURATION_MS,
  type BudgetConfig,
  type BudgetEnforcerOptions,
  type BudgetPeriod,
  type BudgetPeriodStatus,
  type BudgetSettings,
  type BudgetWarning,
} from './types.js';

interface PeriodState {
  readonly config: BudgetConfig;
  spent: number;
  readonly perModel: Map<string, number>;
  lastReset: number;
  warned: boolean;
}

/**
 * Validates a budget configuration.
 *
 * @param config - Configuration to check.
 * @throws RangeError if the amount is negative or not finite, or the warning
 * threshold is outside [0, 1].
 */
export function validateBudgetConfig(config: BudgetConfig): void {
  if (!Number.isFinite(config.amount) || config.amount < 0) {
    throw new RangeError(
      `${config.period} budget must be a non-negative number, got: ${String(config.amount)}`
    );
  }
  if (
    !Number.isFinite(config.warningThreshold) ||
    config.warningThreshold < 0 ||
    config.warningThreshold > 1
  ) {
    throw new RangeError(
      `${config.period} warningThreshold must be between 0 and 1, got: ${String(config.warningThreshold)}`
    );
  }
}

/**
 * Enforces spending limits across hourly, daily, monthly and total periods.
 *
 * @remarks
 * Every method runs without yielding, so concurrent calls sharing one
 * enforcer see a consistent running total.
 *
 * @example
 * ```typescript
 * const budget = createBudgetEnforcer({ daily: 10 });
 * if (budget.canAfford(0.02)) {
 *   // ... make the call ...
 *   budget.recordCost(0.018, 'openai/gpt-4o');
 * }
 * ```
 */
export class BudgetEnforcer {
  private readonly periods = new Map<BudgetPeriod, PeriodState>();
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly onWarning: ((warning: BudgetWarning) => void) | undefined;

  /**
   * @param budgets - One configuration per governed period.
   * @param options - Clock, logger and warning callback.
   * @throws RangeError if a configuration is invalid or a period is configured twice.
   */
  constructor(budgets: readonly BudgetConfig[], options: BudgetEnforcerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createSilentLogger('BudgetEnforcer');
    this.onWarning = options.onWarning;

    const start = this.now();
    for (const config of budgets) {
      validateBudgetConfig(config);
      if (this.periods.has(config.period)) {
        throw new RangeError(`${config.period} budget is configured more than once`);
      }
      this.periods.set(config.period, {
        config,
        spent: 0,
        perModel: new Map(),
        lastReset: start,
        warned: false,
      });
    }
  }

  /** Configured budgets, shortest period first. */
  get budgets(): BudgetConfig[] {
    return BUDGET_PERIODS.flatMap((period) => {
      const state = this.periods.get(period);
      return state === undefined ? [] : [state.config];
    });
  }

  /**
   * Returns the configuration of `period`, if configured.
   *
   * @param period - Period to look up.
   */
  config(period: BudgetPeriod): BudgetConfig | undefined {
    return this.periods.get(period)?.config;
  }

  /**
   * Adds spend to every configured period.
   *
   * The amount stays recorded even when the call throws.
   *
   * @param amount - Cost in USD.
   * @param modelKey - Model the spend is attributed to.
   * @throws BudgetExceededError if a hard-limited period is now over budget.
   * @throws RangeError if `amount` is negative or not finite.
   */
  recordCost(amount: number, modelKey?: string): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new RangeError(`Cost must be a non-negative number, got: ${String(amount)}`);
    }
    this.refresh();

    let exceeded: BudgetExceededError | undefined;
    for (const period of BUDGET_PERIODS) {
      const state = this.periods.get(period);
      if (state === undefined) {
        continue;
      }
      state.spent += amount;
      if (modelKey !== undefined) {
        state.perModel.set(modelKey, (state.perModel.get(modelKey) ?? 0) + amount);
      }
      this.maybeWarn(state);
      if (exceeded === undefined && state.config.hardLimit && state.spent > state.config.amount) {
        exceeded = new BudgetExceededError(state.config.amount, state.spent, period);
      }
    }

    if (exceeded !== undefined) {
      throw exceeded;
    }
  }

  /**
   * Checks whether `amount` can be spent without breaking a hard limit.
   *
   * @param amount - Cost in USD.
   * @param period - Period to check; every configured period when omitted.
   */
  canAfford(amount: number, period?: BudgetPeriod): boolean {
    if (period !== undefined) {
      const state = this.periods.get(period);
      return state === undefined || this.affords(state, amount);
    }
    return this.blockingError(amount) === undefined;
  }

  /**
   * Returns the error describing the first hard-limited period that cannot
   * absorb `amount`, or `undefined` when every period can.
   *
   * @param amount - Cost in USD.
   */
  blockingError(amount: number): BudgetExceededError | undefined {
    for (const period of BUDGET_PERIODS) {
      const state = this.periods.get(period);
      if (state !== undefined && !this.affords(state, amount)) {
        return new BudgetExceededError(state.config.amount, state.spent + amount, period);
      }
    }
    return undefined;
  }

  /**
   * Budget left in `period`. 0 once exceeded, `Infinity` when unconfigured.
   *
   * @param period - Period to query.
   */
  remaining(period: BudgetPeriod): number {
    const state = this.periods.get(period);
    if (state === undefined) {
      return Infinity;
    }
    this.refreshState(state, this.now());
    return Math.max(0, state.config.amount - state.spent);
  }

  /**
   * Spend recorded in the current cycle of `period`.
   *
   * @param period - Period to query.
   * @param modelKey - Restricts the total to one model.
   * @returns The spend, or 0 when the period is unconfigured.
   */
  getSpent(period: BudgetPeriod, modelKey?: string): number {
    const state = this.periods.get(period);
    if (state === undefined) {
      return 0;
    }
    this.refreshState(state, this.now());
    if (modelKey === undefined) {
      return state.spent;
    }
    return state.perModel.get(modelKey) ?? 0;
  }

  /**
   * Reports every configured period.
   */
  status(): Partial<Record<BudgetPeriod, BudgetPeriodStatus>> {
    this.refresh();
    const result: Partial<Record<BudgetPeriod, BudgetPeriodStatus>> = {};
    for (const [period, state] of this.periods) {
      const { amount } = state.config;
      result[period] = {
        budget: amount,
        spent: state.spent,
        remaining: Math.max(0, amount - state.spent),
        percentage: amount > 0 ? (state.spent / amount) * 100 : state.spent > 0 ? Infinity : 0,
      };
    }
    return result;
  }

  /**
   * Zeroes running totals.
   *
   * @param period - Period to reset; every period when omitted.
   */
  reset(period?: BudgetPeriod): void {
    const now = this.now();
    for (const [key, state] of this.periods) {
      if (period === undefined || key === period) {
        this.zero(state, now);
      }
    }
  }

  private affords(state: PeriodState, amount: number): boolean {
    if (!state.config.hardLimit) {
      return true;
    }
    this.refreshState(state, this.now());
    return state.spent + amount <= state.config.amount;
  }

  private refresh(): void {
    const now = this.now();
    for (const state of this.periods.values()) {
      this.refreshState(state, now);
    }
  }

  private refreshState(state: PeriodState, now: number): void {
    if (now - state.lastReset >= PERIOD_DURATION_MS[state.config.period]) {
      this.zero(state, now);
    }
  }

  private zero(state: PeriodState, now: number): void {
    state.spent = 0;
    state.perModel.clear();
    state.lastReset = now;
    state.warned = false;
  }

  private maybeWarn(state: PeriodState): void {
    const { amount, warningThreshold, period } = state.config;
    if (state.warned || state.spent < amount * warningThreshold) {
      return;
    }
    state.warned = true;
    const warning: BudgetWarning = { period, budget: amount, spent: state.spent, warningThreshold };
    this.logger.warn('budget_warning', {
      period,
      budget: amount,
      spent: state.spent,
      warningThreshold,
    });
    this.onWarning?.(warning);
  }
}

/**
 * Creates an enforcer from one amount per period.
 *
 * @param settings - Amounts per period and the shared limit settings.
 * @param options - Clock, logger and warning callback.
 *
 * @example
 * ```typescript
 * const budget = createBudgetEnforcer({ daily: 5, monthly: 100, hardLimit: true });
 * ```
 */
export function createBudgetEnforcer(
  settings: BudgetSettings,
  options: BudgetEnforcerOptions = {}
): BudgetEnforcer {
  const hardLimit = settings.hardLimit ?? true;
  const warningThreshold = settings.warningThreshold ?? DEFAULT_WARNING_THRESHOLD;
  const configs: BudgetConfig[] = [];
  for (const period of BUDGET_PERIODS) {
    const amount = settings[period];
    if (amount !== undefined) {
      configs.push({ amount, period, hardLimit, warningThreshold });
    }
  }
  return new BudgetEnforcer(configs, options);
}
