import { describe, expect, it } from 'vitest';
import {
  ConfigValidationError,
  DEFAULT_CONFIG,
  assertConfigValid,
  isValidModelKey,
  validateConfig,
  type GovernorConfig,
} from './index.js';

function withConfig(overrides: Partial<GovernorConfig>): GovernorConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

describe('Config Validator', () => {
  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
    });

    it('should accept an unlimited wait', () => {
      const config = withConfig({
        routing: { ...DEFAULT_CONFIG.routing, max_wait_ms: Infinity },
      });

      expect(validateConfig(config).valid).toBe(true);
    });

    it('should reject a negative wait', () => {
      const config = withConfig({
        routing: { ...DEFAULT_CONFIG.routing, max_wait_ms: -1 },
      });

      expect(validateConfig(config).errors).toEqual([
        {
          field: 'routing.max_wait_ms',
          value: -1,
          message: "'routing.max_wait_ms' must be a non-negative number, got -1",
        },
      ]);
    });

    it('should reject a fractional safety margin', () => {
      const config = withConfig({
        routing: { ...DEFAULT_CONFIG.routing, safety_margin: 1.5 },
      });

      expect(validateConfig(config).errors.map((e) => e.field)).toEqual(['routing.safety_margin']);
    });

    it('should reject an empty tier', () => {
      const config = withConfig({
        routing: { ...DEFAULT_CONFIG.routing, tier: '  ' },
      });

      expect(validateConfig(config).errors.map((e) => e.field)).toEqual(['routing.tier']);
    });

    it('should reject negative and infinite budget amounts', () => {
      const config = withConfig({
        budget: { ...DEFAULT_CONFIG.budget, daily: -5, total: Infinity },
      });

      expect(validateConfig(config).errors.map((e) => e.field)).toEqual([
        'budget.daily',
        'budget.total',
      ]);
    });

    it('should reject a warning threshold outside [0, 1]', () => {
      const config = withConfig({
        budget: { ...DEFAULT_CONFIG.budget, warning_threshold: 1.2 },
      });

      expect(validateConfig(config).errors).toEqual([
        {
          field: 'budget.warning_threshold',
          value: 1.2,
          message: "'budget.warning_threshold' must be between 0 and 1, got 1.2",
        },
      ]);
    });

    it('should accept unlimited model limits', () => {
      const config = withConfig({
        models: {
          'gemini/gemini-2.5-pro': {
            requests_per_minute: 1000,
            tokens_per_minute: Infinity,
            requests_per_day: Infinity,
          },
        },
      });

      expect(validateConfig(config).valid).toBe(true);
    });

    it('should reject malformed keys and non-positive limits', () => {
      const config = withConfig({
        models: {
          'gpt-4o': { requests_per_minute: 10 },
          'openai/o1': { requests_per_minute: 0, max_context_tokens: -1, input_per_1m: -0.5 },
        },
      });

      expect(validateConfig(config).errors.map((e) => e.field)).toEqual([
        'models."gpt-4o"',
        'models."openai/o1".requests_per_minute',
        'models."openai/o1".max_context_tokens',
        'models."openai/o1".input_per_1m',
      ]);
    });
  });

  describe('assertConfigValid', () => {
    it('should not throw for a valid configuration', () => {
      expect(() => {
        assertConfigValid(DEFAULT_CONFIG);
      }).not.toThrow();
    });

    it('should throw with every error listed', () => {
      const config = withConfig({
        routing: { ...DEFAULT_CONFIG.routing, max_wait_ms: -1 },
        budget: { ...DEFAULT_CONFIG.budget, warning_threshold: 2 },
      });

      try {
        assertConfigValid(config);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toHaveLength(2);
          expect(error.message).toBe(
            "Configuration validation failed with 2 error(s):\n" +
              "  - routing.max_wait_ms: 'routing.max_wait_ms' must be a non-negative number, got -1\n" +
              "  - budget.warning_threshold: 'budget.warning_threshold' must be between 0 and 1, got 2"
          );
        }
      }
    });
  });

  describe('isValidModelKey', () => {
    it('should require a provider and a model name', () => {
      expect(isValidModelKey('openai/gpt-4o')).toBe(true);
      expect(isValidModelKey('openrouter/meta/llama-3')).toBe(true);
      expect(isValidModelKey('gpt-4o')).toBe(false);
      expect(isValidModelKey('/gpt-4o')).toBe(false);
      expect(isValidModelKey('openai/')).toBe(false);
    });
  });
});
