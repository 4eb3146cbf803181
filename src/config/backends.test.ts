import { describe, expect, it, vi } from 'vitest';
import { RouterConfigError } from '../router/errors.js';
import { createBackend, parseConfig, resolveModel } from './index.js';

describe('Configured backends', () => {
  describe('resolveModel', () => {
    it('should take catalog limits for a known model', () => {
      const { limits, pricing } = resolveModel(parseConfig(''), 'openai/gpt-4o-mini');

      expect(limits).toEqual({
        provider: 'openai',
        modelName: 'gpt-4o-mini',
        requestsPerMinute: 500,
        tokensPerMinute: 200_000,
        maxContextTokens: 128_000,
        requestsPerDay: 10_000,
      });
      expect(pricing).toEqual({ inputPer1M: 0.15, outputPer1M: 0.6 });
    });

    it('should use the configured tier', () => {
      const config = parseConfig('[routing]\ntier = "paid"');
      const { limits } = resolveModel(config, 'gemini/gemini-2.5-pro');

      expect(limits.requestsPerMinute).toBe(1000);
      expect(limits.tokensPerMinute).toBe(Infinity);
    });

    it('should let file values win over the catalog', () => {
      const config = parseConfig(`
[models."openai/gpt-4o"]
requests_per_minute = 50
input_per_1m = 2.0
`);
      const { limits, pricing } = resolveModel(config, 'openai/gpt-4o');

      expect(limits.requestsPerMinute).toBe(50);
      expect(limits.tokensPerMinute).toBe(30_000);
      expect(pricing).toEqual({ inputPer1M: 2, outputPer1M: 10 });
    });

    it('should resolve a model known only from the file', () => {
      const config = parseConfig(`
[models."local/llama-3"]
requests_per_minute = 60
tokens_per_minute = 100000
max_context_tokens = 8192
`);
      const { limits, pricing } = resolveModel(config, 'local/llama-3');

      expect(limits).toEqual({
        provider: 'local',
        modelName: 'llama-3',
        requestsPerMinute: 60,
        tokensPerMinute: 100_000,
        maxContextTokens: 8192,
      });
      expect(pricing).toBeUndefined();
    });

    it('should split on the first slash only', () => {
      const config = parseConfig(`
[models."openrouter/meta/llama-3"]
requests_per_minute = 20
tokens_per_minute = 40000
max_context_tokens = 8192
output_per_1m = 0.4
`);
      const { limits, pricing } = resolveModel(config, 'openrouter/meta/llama-3');

      expect(limits.provider).toBe('openrouter');
      expect(limits.modelName).toBe('meta/llama-3');
      expect(pricing).toEqual({ inputPer1M: 0, outputPer1M: 0.4 });
    });

    it('should throw RouterConfigError when limits are unknown', () => {
      expect(() => resolveModel(parseConfig(''), 'local/mystery')).toThrow(RouterConfigError);
    });

    it('should throw RouterConfigError for a malformed key', () => {
      expect(() => resolveModel(parseConfig(''), 'gpt-4o')).toThrow(
        "Model key 'gpt-4o' must have the form 'provider/modelName'"
      );
    });
  });

  describe('createBackend', () => {
    it('should wire the invoke function to the resolved limits', async () => {
      const usage = { promptTokens: 1, completionTokens: 1 };
      const invoke = vi.fn(async (prompt: string) => ({ text: prompt.toUpperCase(), usage }));
      const backend = createBackend(parseConfig(''), 'openai/o1-mini', invoke);

      expect(backend.provider).toBe('openai');
      expect(backend.modelName).toBe('o1-mini');
      expect(backend.limits.maxContextTokens).toBe(128_000);
      await expect(backend.invoke('hi')).resolves.toEqual({ text: 'HI', usage });
      expect(invoke).toHaveBeenCalledWith('hi');
    });
  });
});
