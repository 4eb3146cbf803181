import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  AllBackendsExhaustedError,
  RouterBuilder,
  VERSION,
  VirtualClock,
  createBackend,
  createSilentLogger,
  parseConfig,
  type InvocationResponse,
} from './index.js';

interface ChatResponse extends InvocationResponse {
  readonly reply: string;
}

describe('model-governor', () => {
  describe('VERSION', () => {
    it('should be defined and follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public API', () => {
    it('routes through backends built from a configuration file', async () => {
      const config = parseConfig(`
[routing]
max_wait_ms = 0
safety_margin = 0

[models."local/small"]
requests_per_minute = 1
tokens_per_minute = 10000
max_context_tokens = 4096
`);
      const clock = new VirtualClock(0);
      const small = createBackend(config, 'local/small', (prompt: string) =>
        Promise.resolve<ChatResponse>({ reply: `small:${prompt}` })
      );
      const mini = createBackend(config, 'openai/gpt-4o-mini', (prompt: string) =>
        Promise.resolve<ChatResponse>({ reply: `mini:${prompt}` })
      );

      const router = new RouterBuilder<string, ChatResponse>()
        .withConfig(config)
        .withClock(clock.now, clock.sleep)
        .withLogger(createSilentLogger())
        .withPrimary(small)
        .withFallback(mini)
        .build();

      const first = await router.invoke('hi');
      const second = await router.invoke('again');

      expect(first.reply).toBe('small:hi');
      expect(second.reply).toBe('mini:again');
    });

    it('surfaces exhaustion as a typed error', async () => {
      const router = new RouterBuilder<string, ChatResponse>()
        .withLogger(createSilentLogger())
        .withPrimary({
          provider: 'local',
          modelName: 'flaky',
          limits: {
            provider: 'local',
            modelName: 'flaky',
            requestsPerMinute: 100,
            tokensPerMinute: 100_000,
            maxContextTokens: 4096,
          },
          invoke: () => Promise.reject(new Error('connection refused')),
        })
        .build();

      await expect(router.invoke('hi')).rejects.toThrow(AllBackendsExhaustedError);
    });
  });

  describe('property-based tests', () => {
    it('serves every call from a single healthy backend', async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(fc.string({ maxLength: 40 }), { maxLength: 10 }), async (prompts) => {
          const clock = new VirtualClock(0);
          const router = new RouterBuilder<string, ChatResponse>()
            .withClock(clock.now, clock.sleep)
            .withLogger(createSilentLogger())
            .withPrimary({
              provider: 'local',
              modelName: 'echo',
              limits: {
                provider: 'local',
                modelName: 'echo',
                requestsPerMinute: 1000,
                tokensPerMinute: 1_000_000,
                maxContextTokens: 4096,
              },
              invoke: (prompt) => Promise.resolve({ reply: prompt }),
            })
            .build();

          for (const prompt of prompts) {
            const response = await router.invoke(prompt);
            expect(response.reply).toBe(prompt);
          }
          expect(router.stats().primaryRequests).toBe(prompts.length);
        }),
        { numRuns: 25 }
      );
    });
  });
});
