/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond just type checking:
 * - Wait times and margins are non-negative
 * - Budget amounts are finite and non-negative, the warning threshold a fraction
 * - Model keys name a provider and a model, and their limits are positive
 *
 * @packageDocumentation
 */

import type { BudgetSection, GovernorConfig, ModelConfig, RoutingConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  readonly code = 'CONFIG_VALIDATION_ERROR';
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Validates that a value is zero or more. `Infinity` is allowed when
 * `allowInfinite` is set.
 */
function validateNonNegative(
  value: number,
  fieldPath: string,
  errors: ValidationError[],
  allowInfinite = false
): void {
  const finiteOk = Number.isFinite(value) || (allowInfinite && value === Infinity);
  if (!finiteOk || value < 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a non-negative number, got ${String(value)}`,
    });
  }
}

/**
 * Validates that a limit is above zero. `Infinity` means unlimited.
 */
function validatePositiveLimit(value: number, fieldPath: string, errors: ValidationError[]): void {
  if (Number.isNaN(value) || value <= 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be greater than 0, got ${String(value)}`,
    });
  }
}

function validateRouting(routing: RoutingConfig, errors: ValidationError[]): void {
  validateNonNegative(routing.max_wait_ms, 'routing.max_wait_ms', errors, true);

  if (!Number.isInteger(routing.safety_margin) || routing.safety_margin < 0) {
    errors.push({
      field: 'routing.safety_margin',
      value: routing.safety_margin,
      message: `'routing.safety_margin' must be a non-negative integer, got ${String(routing.safety_margin)}`,
    });
  }

  if (routing.tier?.trim() === '') {
    errors.push({
      field: 'routing.tier',
      value: routing.tier,
      message: `'routing.tier' must not be empty`,
    });
  }
}

function validateBudget(budget: BudgetSection, errors: ValidationError[]): void {
  const amounts: [string, number | undefined][] = [
    ['budget.hourly', budget.hourly],
    ['budget.daily', budget.daily],
    ['budget.monthly', budget.monthly],
    ['budget.total', budget.total],
  ];
  for (const [field, amount] of amounts) {
    if (amount !== undefined) {
      validateNonNegative(amount, field, errors);
    }
  }

  const threshold = budget.warning_threshold;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    errors.push({
      field: 'budget.warning_threshold',
      value: threshold,
      message: `'budget.warning_threshold' must be between 0 and 1, got ${String(threshold)}`,
    });
  }
}

/**
 * Checks that a key has the `provider/modelName` form.
 *
 * @param key - Model key to check.
 */
export function isValidModelKey(key: string): boolean {
  const slash = key.indexOf('/');
  return slash > 0 && slash < key.length - 1;
}

function validateModel(key: string, model: ModelConfig, errors: ValidationError[]): void {
  const path = `models."${key}"`;

  if (!isValidModelKey(key)) {
    errors.push({
      field: path,
      value: key,
      message: `Model key '${key}' must have the form 'provider/modelName'`,
    });
  }

  if (model.requests_per_minute !== undefined) {
    validatePositiveLimit(model.requests_per_minute, `${path}.requests_per_minute`, errors);
  }
  if (model.tokens_per_minute !== undefined) {
    validatePositiveLimit(model.tokens_per_minute, `${path}.tokens_per_minute`, errors);
  }
  if (model.max_context_tokens !== undefined) {
    validatePositiveLimit(model.max_context_tokens, `${path}.max_context_tokens`, errors);
  }
  if (model.requests_per_day !== undefined) {
    validatePositiveLimit(model.requests_per_day, `${path}.requests_per_day`, errors);
  }
  if (model.input_per_1m !== undefined) {
    validateNonNegative(model.input_per_1m, `${path}.input_per_1m`, errors);
  }
  if (model.output_per_1m !== undefined) {
    validateNonNegative(model.output_per_1m, `${path}.output_per_1m`, errors);
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: GovernorConfig): ValidationResult {
  const errors: ValidationError[] = [];

  validateRouting(config.routing, errors);
  validateBudget(config.budget, errors);
  for (const [key, model] of Object.entries(config.models)) {
    validateModel(key, model, errors);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: GovernorConfig): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
