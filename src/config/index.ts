/**
 * Configuration module for governor.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * environment variable overrides and backends built from configured models.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  ConfigParseError,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  type LoadConfigOptions,
} from './parser.js';
export type {
  BudgetSection,
  GovernorConfig,
  LoggingConfig,
  ModelConfig,
  PartialGovernorConfig,
  RoutingConfig,
} from './types.js';
export {
  DEFAULT_BUDGET,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_ROUTING,
} from './defaults.js';
export {
  ConfigValidationError,
  assertConfigValid,
  isValidModelKey,
  validateConfig,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { createBackend, resolveModel } from './backends.js';
