/**
 * Types for cost budget enforcement.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';

/**
 * Accounting period of a budget.
 */
export type BudgetPeriod = 'hourly' | 'daily' | 'monthly' | 'total';

/**
 * Array of all budget periods, shortest first.
 */
export const BUDGET_PERIODS: readonly BudgetPeriod[] = [
  'hourly',
  'daily',
  'monthly',
  'total',
] as const;

/**
 * Time after which each period's running total starts over. `total` never
 * resets on its own.
 */
export const PERIOD_DURATION_MS: Readonly<Record<BudgetPeriod, number>> = {
  hourly: 3_600_000,
  daily: 86_400_000,
  monthly: 30 * 86_400_000,
  total: Infinity,
};

/** Share of a budget at which a warning is emitted, unless configured. */
export const DEFAULT_WARNING_THRESHOLD = 0.8;

/**
 * Spending limit for one period.
 */
export interface BudgetConfig {
  /** Budget in USD. */
  readonly amount: number;
  readonly period: BudgetPeriod;
  /**
   * When true, spend past `amount` raises BudgetExceededError and blocks
   * further calls. When false, the budget only reports.
   */
  readonly hardLimit: boolean;
  /** Fraction of `amount` (0 to 1) at which a warning is emitted. */
  readonly warningThreshold: number;
}

/**
 * Introspection view of one period.
 */
export interface BudgetPeriodStatus {
  readonly budget: number;
  readonly spent: number;
  readonly remaining: number;
  /** `spent` as a percentage of `budget`. */
  readonly percentage: number;
}

/**
 * Payload of a budget warning.
 */
export interface BudgetWarning {
  readonly period: BudgetPeriod;
  readonly budget: number;
  readonly spent: number;
  readonly warningThreshold: number;
}

/**
 * Options for creating a BudgetEnforcer.
 */
export interface BudgetEnforcerOptions {
  /** Clock returning epoch milliseconds (injectable for testing). */
  readonly now?: () => number;
  /** Logger receiving `budget_warning` entries. */
  readonly logger?: Logger;
  /** Called once per period cycle when spend crosses the warning threshold. */
  readonly onWarning?: (warning: BudgetWarning) => void;
}

/**
 * Shorthand budget settings, one amount per period.
 */
export interface BudgetSettings {
  readonly hourly?: number | undefined;
  readonly daily?: number | undefined;
  readonly monthly?: number | undefined;
  readonly total?: number | undefined;
  /** @defaultValue true */
  readonly hardLimit?: boolean;
  /** @defaultValue 0.8 */
  readonly warningThreshold?: number;
}

/**
 * Error thrown when a hard-limited budget is exceeded.
 */
export class BudgetExceededError extends Error {
  readonly code = 'BUDGET_EXCEEDED';
  /** Configured budget in USD. */
  readonly budget: number;
  /** Total the period reached (or would reach) in USD. */
  readonly currentTotal: number;
  /** Period whose budget was exceeded. */
  readonly period: BudgetPeriod;

  constructor(budget: number, currentTotal: number, period: BudgetPeriod) {
    super(
      `${period} budget exceeded: $${currentTotal.toFixed(4)} of $${budget.toFixed(4)}`
    );
    this.name = 'BudgetExceededError';
    this.budget = budget;
    this.currentTotal = currentTotal;
    this.period = period;
  }
}
