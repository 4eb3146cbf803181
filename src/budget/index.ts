/**
 * Cost budget module.
 *
 * @packageDocumentation
 */

export { BudgetEnforcer, createBudgetEnforcer, validateBudgetConfig } from './budget.js';
export {
  BUDGET_PERIODS,
  PERIOD_DURATION_MS,
  DEFAULT_WARNING_THRESHOLD,
  BudgetExceededError,
  type BudgetPeriod,
  type BudgetConfig,
  type BudgetPeriodStatus,
  type BudgetWarning,
  type BudgetSettings,
  type BudgetEnforcerOptions,
} from './types.js';
