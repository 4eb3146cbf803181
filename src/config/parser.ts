/**
 * TOML configuration parser for governor.toml.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import * as TOML from '@iarna/toml';
import { isFallbackStrategyKind } from '../fallback/index.js';
import { isRecord } from '../utils/guards.js';
import { DEFAULT_BUDGET, DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_ROUTING } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import type {
  BudgetSection,
  GovernorConfig,
  LoggingConfig,
  ModelConfig,
  RoutingConfig,
} from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  readonly code = 'CONFIG_PARSE_ERROR';

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number. TOML `inf` is accepted.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Returns a section table, or undefined when the section is absent.
 *
 * @throws ConfigParseError if the section is present but not a table.
 */
function sectionOf(parsed: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  const raw = parsed[name];
  if (raw === undefined) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof raw}`);
  }
  return raw;
}

/**
 * Parses the routing section from raw TOML data.
 *
 * @param raw - Raw TOML object for the routing section.
 * @returns Routing configuration merged with defaults.
 */
function parseRouting(raw: Record<string, unknown> | undefined): RoutingConfig {
  const result: RoutingConfig = { ...DEFAULT_ROUTING };
  if (raw === undefined) {
    return result;
  }

  if ('strategy' in raw) {
    const strategy = validateString(raw.strategy, 'routing.strategy');
    if (!isFallbackStrategyKind(strategy)) {
      throw new ConfigParseError(
        `Invalid value for 'routing.strategy': expected one of sequential, cost-optimized, smart, got '${strategy}'`
      );
    }
    result.strategy = strategy;
  }
  if ('max_wait_ms' in raw) {
    result.max_wait_ms = validateNumber(raw.max_wait_ms, 'routing.max_wait_ms');
  }
  if ('safety_margin' in raw) {
    result.safety_margin = validateNumber(raw.safety_margin, 'routing.safety_margin');
  }
  if ('context_fallback' in raw) {
    result.context_fallback = validateBoolean(raw.context_fallback, 'routing.context_fallback');
  }
  if ('tier' in raw) {
    result.tier = validateString(raw.tier, 'routing.tier');
  }

  return result;
}

/**
 * Parses the budget section from raw TOML data.
 *
 * @param raw - Raw TOML object for the budget section.
 * @returns Budget configuration merged with defaults.
 */
function parseBudget(raw: Record<string, unknown> | undefined): BudgetSection {
  const result: BudgetSection = { ...DEFAULT_BUDGET };
  if (raw === undefined) {
    return result;
  }

  if ('hourly' in raw) {
    result.hourly = validateNumber(raw.hourly, 'budget.hourly');
  }
  if ('daily' in raw) {
    result.daily = validateNumber(raw.daily, 'budget.daily');
  }
  if ('monthly' in raw) {
    result.monthly = validateNumber(raw.monthly, 'budget.monthly');
  }
  if ('total' in raw) {
    result.total = validateNumber(raw.total, 'budget.total');
  }
  if ('hard_limit' in raw) {
    result.hard_limit = validateBoolean(raw.hard_limit, 'budget.hard_limit');
  }
  if ('warning_threshold' in raw) {
    result.warning_threshold = validateNumber(raw.warning_threshold, 'budget.warning_threshold');
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses one `[models."provider/model"]` table.
 *
 * @param raw - Raw TOML value of the table.
 * @param key - Model key, used in error paths.
 */
function parseModel(raw: unknown, key: string): ModelConfig {
  const path = `models."${key}"`;
  if (!isRecord(raw)) {
    throw new ConfigParseError(`Invalid type for '${path}': expected table, got ${typeof raw}`);
  }

  const result: ModelConfig = {};
  if ('requests_per_minute' in raw) {
    result.requests_per_minute = validateNumber(
      raw.requests_per_minute,
      `${path}.requests_per_minute`
    );
  }
  if ('tokens_per_minute' in raw) {
    result.tokens_per_minute = validateNumber(raw.tokens_per_minute, `${path}.tokens_per_minute`);
  }
  if ('max_context_tokens' in raw) {
    result.max_context_tokens = validateNumber(
      raw.max_context_tokens,
      `${path}.max_context_tokens`
    );
  }
  if ('requests_per_day' in raw) {
    result.requests_per_day = validateNumber(raw.requests_per_day, `${path}.requests_per_day`);
  }
  if ('input_per_1m' in raw) {
    result.input_per_1m = validateNumber(raw.input_per_1m, `${path}.input_per_1m`);
  }
  if ('output_per_1m' in raw) {
    result.output_per_1m = validateNumber(raw.output_per_1m, `${path}.output_per_1m`);
  }
  return result;
}

function parseModels(raw: Record<string, unknown> | undefined): Record<string, ModelConfig> {
  const result: Record<string, ModelConfig> = {};
  if (raw === undefined) {
    return result;
  }
  for (const [key, value] of Object.entries(raw)) {
    result[key] = parseModel(value, key);
  }
  return result;
}

/**
 * Parses a TOML string into a GovernorConfig.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or mistyped fields.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [routing]
 * strategy = "cost-optimized"
 *
 * [budget]
 * daily = 10.0
 *
 * [models."openai/gpt-4o-mini"]
 * requests_per_minute = 500
 * `);
 * config.budget.daily; // 10
 * ```
 */
export function parseConfig(tomlContent: string): GovernorConfig {
  let parsed: unknown;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  if (!isRecord(parsed)) {
    throw new ConfigParseError('Invalid TOML document: expected a table at the root');
  }

  return {
    routing: parseRouting(sectionOf(parsed, 'routing')),
    budget: parseBudget(sectionOf(parsed, 'budget')),
    logging: parseLogging(sectionOf(parsed, 'logging')),
    models: parseModels(sectionOf(parsed, 'models')),
  };
}

/**
 * Returns a copy of the default configuration.
 */
export function getDefaultConfig(): GovernorConfig {
  return {
    routing: { ...DEFAULT_CONFIG.routing },
    budget: { ...DEFAULT_CONFIG.budget },
    logging: { ...DEFAULT_CONFIG.logging },
    models: {},
  };
}

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Environment consulted for overrides; process.env when omitted. */
  readonly env?: EnvRecord;
}

/**
 * Reads, parses and validates a configuration file, then applies
 * MODEL_GOVERNOR_* environment overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @param path - Path to governor.toml.
 * @param options - Environment to read overrides from.
 * @throws ConfigParseError if the file cannot be read or parsed.
 * @throws EnvCoercionError if an override cannot be coerced.
 * @throws ConfigValidationError if the merged configuration is invalid.
 */
export async function loadConfig(
  path: string,
  options: LoadConfigOptions = {}
): Promise<GovernorConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Cannot read configuration file '${path}': ${cause.message}`, cause);
  }

  const config = applyEnvOverrides(parseConfig(content), options.env);
  assertConfigValid(config);
  return config;
}
