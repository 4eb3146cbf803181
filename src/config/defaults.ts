/**
 * Default configuration values for governor.toml.
 *
 * @packageDocumentation
 */

import { DEFAULT_WARNING_THRESHOLD } from '../budget/index.js';
import { DEFAULT_MAX_WAIT_MS, DEFAULT_SAFETY_MARGIN } from '../scheduler/index.js';
import type { BudgetSection, GovernorConfig, LoggingConfig, RoutingConfig } from './types.js';

/**
 * Default routing: sequential fallback, five-minute waits, escalation on.
 */
export const DEFAULT_ROUTING: RoutingConfig = {
  strategy: 'sequential',
  max_wait_ms: DEFAULT_MAX_WAIT_MS,
  safety_margin: DEFAULT_SAFETY_MARGIN,
  context_fallback: true,
};

/**
 * No amounts; hard limits once an amount is set.
 */
export const DEFAULT_BUDGET: BudgetSection = {
  hard_limit: true,
  warning_threshold: DEFAULT_WARNING_THRESHOLD,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: GovernorConfig = {
  routing: DEFAULT_ROUTING,
  budget: DEFAULT_BUDGET,
  logging: DEFAULT_LOGGING,
  models: {},
};
