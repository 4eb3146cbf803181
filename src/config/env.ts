/**
 * Environment variable overrides for configuration.
 *
 * Provides support for MODEL_GOVERNOR_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { FALLBACK_STRATEGY_KINDS, isFallbackStrategyKind } from '../fallback/index.js';
import type { FallbackStrategyKind } from '../fallback/index.js';
import type { GovernorConfig, PartialGovernorConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Gets the default environment from Node.js process.env.
 */
function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  readonly code = 'ENV_COERCION_ERROR';
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * How one environment variable maps onto the configuration.
 */
type EnvVarMapping =
  | {
      readonly type: 'string';
      readonly description: string;
      readonly apply: (target: PartialGovernorConfig, value: string) => void;
    }
  | {
      readonly type: 'number';
      readonly description: string;
      readonly apply: (target: PartialGovernorConfig, value: number) => void;
    }
  | {
      readonly type: 'boolean';
      readonly description: string;
      readonly apply: (target: PartialGovernorConfig, value: boolean) => void;
    }
  | {
      readonly type: 'strategy';
      readonly description: string;
      readonly apply: (target: PartialGovernorConfig, value: FallbackStrategyKind) => void;
    };

/**
 * Mapping from environment variable names to config fields.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  MODEL_GOVERNOR_STRATEGY: {
    type: 'strategy',
    description: 'Override the fallback strategy (sequential, cost-optimized, smart)',
    apply: (target, value) => {
      target.routing = { ...target.routing, strategy: value };
    },
  },
  MODEL_GOVERNOR_MAX_WAIT_MS: {
    type: 'number',
    description: 'Override the longest rate-limit wait per backend, in milliseconds',
    apply: (target, value) => {
      target.routing = { ...target.routing, max_wait_ms: value };
    },
  },
  MODEL_GOVERNOR_SAFETY_MARGIN: {
    type: 'number',
    description: 'Override the headroom kept below rate limits',
    apply: (target, value) => {
      target.routing = { ...target.routing, safety_margin: value };
    },
  },
  MODEL_GOVERNOR_CONTEXT_FALLBACK: {
    type: 'boolean',
    description: 'Enable or disable context-window escalation (true/false)',
    apply: (target, value) => {
      target.routing = { ...target.routing, context_fallback: value };
    },
  },
  MODEL_GOVERNOR_TIER: {
    type: 'string',
    description: 'Override the provider tier used for catalog limits',
    apply: (target, value) => {
      target.routing = { ...target.routing, tier: value };
    },
  },
  MODEL_GOVERNOR_BUDGET_HOURLY: {
    type: 'number',
    description: 'Override the hourly budget in USD',
    apply: (target, value) => {
      target.budget = { ...target.budget, hourly: value };
    },
  },
  MODEL_GOVERNOR_BUDGET_DAILY: {
    type: 'number',
    description: 'Override the daily budget in USD',
    apply: (target, value) => {
      target.budget = { ...target.budget, daily: value };
    },
  },
  MODEL_GOVERNOR_BUDGET_MONTHLY: {
    type: 'number',
    description: 'Override the monthly budget in USD',
    apply: (target, value) => {
      target.budget = { ...target.budget, monthly: value };
    },
  },
  MODEL_GOVERNOR_BUDGET_TOTAL: {
    type: 'number',
    description: 'Override the lifetime budget in USD',
    apply: (target, value) => {
      target.budget = { ...target.budget, total: value };
    },
  },
  MODEL_GOVERNOR_BUDGET_HARD_LIMIT: {
    type: 'boolean',
    description: 'Whether exceeding a budget blocks calls (true/false)',
    apply: (target, value) => {
      target.budget = { ...target.budget, hard_limit: value };
    },
  },
  MODEL_GOVERNOR_BUDGET_WARNING_THRESHOLD: {
    type: 'number',
    description: 'Override the fraction of a budget at which a warning is logged',
    apply: (target, value) => {
      target.budget = { ...target.budget, warning_threshold: value };
    },
  },
  MODEL_GOVERNOR_DEBUG: {
    type: 'boolean',
    description: 'Emit debug-level log entries (true/false)',
    apply: (target, value) => {
      target.logging = { ...target.logging, debug: value };
    },
  },
};

/**
 * Coerces a string value to a number.
 *
 * Accepts 'inf' and 'infinity' for unlimited values.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const lowered = trimmed.toLowerCase();
  if (lowered === 'inf' || lowered === 'infinity') {
    return Infinity;
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceToStrategy(value: string, envVar: string): FallbackStrategyKind {
  const trimmed = value.trim();
  if (isFallbackStrategyKind(trimmed)) {
    return trimmed;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    'strategy',
    `Cannot coerce '${envVar}' value '${value}' to strategy. Expected one of: ${FALLBACK_STRATEGY_KINDS.join(', ')}`
  );
}

/**
 * Coerces a raw value and applies it to the overrides.
 *
 * @throws EnvCoercionError if coercion fails.
 */
function applyMapping(
  target: PartialGovernorConfig,
  mapping: EnvVarMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(target, value);
      return;
    case 'number':
      mapping.apply(target, coerceToNumber(value, envVar));
      return;
    case 'boolean':
      mapping.apply(target, coerceToBoolean(value, envVar));
      return;
    case 'strategy':
      mapping.apply(target, coerceToStrategy(value, envVar));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialGovernorConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of
 * throwing the first one.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ MODEL_GOVERNOR_BUDGET_DAILY: '25' });
 * result.overrides.budget?.daily; // 25
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialGovernorConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(overrides, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: GovernorConfig, partial: PartialGovernorConfig): GovernorConfig {
  return {
    routing: {
      ...base.routing,
      ...partial.routing,
    },
    budget: {
      ...base.budget,
      ...partial.budget,
    },
    logging: {
      ...base.logging,
      ...partial.logging,
    },
    models: {
      ...base.models,
      ...partial.models,
    },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(
  config: GovernorConfig,
  env: EnvRecord = getDefaultEnv()
): GovernorConfig {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = {
      description: mapping.description,
      type: mapping.type === 'strategy' ? 'string' : mapping.type,
    };
  }
  return docs;
}
