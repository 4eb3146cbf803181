/**
 * Tests for governed routing across a fallback chain.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BudgetExceededError } from '../budget/index.js';
import { ContextTooLargeError, type TokenCounter } from '../context/index.js';
import { Logger, type LogEntry } from '../utils/logger.js';
import { VirtualClock } from '../utils/virtual-clock.js';
import { RouterBuilder } from './builder.js';
import { AllBackendsExhaustedError, BackendInvocationError } from './errors.js';
import type {
  BackendInvoker,
  FallbackEvent,
  ModelLimits,
  ModelPricing,
  ModelUsage,
} from './types.js';

interface TestResponse {
  readonly text: string;
  readonly usage?: ModelUsage | undefined;
}

interface FakeOptions {
  readonly limits?: Partial<
    Pick<ModelLimits, 'requestsPerMinute' | 'tokensPerMinute' | 'maxContextTokens' | 'requestsPerDay'>
  >;
  readonly pricing?: ModelPricing;
  readonly respond?: (payload: string) => Promise<TestResponse>;
}

/** Reads the payload text as its token count. */
const numericCounter: TokenCounter = {
  countTokens: (text) => Number(text),
};

function fakeBackend(modelName: string, options: FakeOptions = {}) {
  const respond: (payload: string) => Promise<TestResponse> =
    options.respond ?? ((payload) => Promise.resolve({ text: `${modelName}:${payload}` }));
  const invoke = vi.fn(respond);
  const backend: BackendInvoker<string, TestResponse> = {
    provider: 'test',
    modelName,
    limits: {
      provider: 'test',
      modelName,
      requestsPerMinute: 1000,
      tokensPerMinute: 10_000_000,
      maxContextTokens: 128_000,
      ...options.limits,
    },
    pricing: options.pricing,
    invoke,
  };
  return { backend, invoke };
}

const failing = (message: string) => (): Promise<TestResponse> =>
  Promise.reject(new Error(message));

/** $1 per token in both directions. */
const DOLLAR_PER_TOKEN: ModelPricing = { inputPer1M: 1_000_000, outputPer1M: 1_000_000 };

describe('Router', () => {
  let clock: VirtualClock;
  let entries: LogEntry[];
  let logger: Logger;

  beforeEach(() => {
    clock = new VirtualClock(1_700_000_000_000);
    entries = [];
    logger = new Logger({
      component: 'Router',
      sink: (entry) => {
        entries.push(entry);
      },
    });
  });

  function builder(): RouterBuilder<string, TestResponse> {
    return new RouterBuilder<string, TestResponse>()
      .withClock(clock.now, clock.sleep)
      .withLogger(logger)
      .withTokenCounter(numericCounter);
  }

  describe('sequential fallback', () => {
    it('serves the call from the primary when it is available', async () => {
      const alpha = fakeBackend('alpha');
      const beta = fakeBackend('beta');
      const router = builder().withPrimary(alpha.backend).withFallback(beta.backend).build();

      const response = await router.invoke('100');

      expect(response.text).toBe('alpha:100');
      expect(alpha.invoke).toHaveBeenCalledTimes(1);
      expect(beta.invoke).not.toHaveBeenCalled();
      expect(router.stats()).toEqual({
        totalRequests: 1,
        primaryRequests: 1,
        fallbackRequests: 0,
        rateLimitFallbacks: 0,
        contextFallbacks: 0,
        budgetFallbacks: 0,
        failedRequests: 0,
        primaryUsagePercent: 100,
        fallbackUsagePercent: 0,
      });
    });

    it('falls back when the primary throws', async () => {
      const alpha = fakeBackend('alpha', { respond: failing('boom') });
      const beta = fakeBackend('beta');
      const router = builder().withPrimary(alpha.backend).withFallback(beta.backend).build();

      const response = await router.invoke('100');

      expect(response.text).toBe('beta:100');
      expect(alpha.invoke).toHaveBeenCalledTimes(1);
      expect(beta.invoke).toHaveBeenCalledTimes(1);
      expect(router.stats().fallbackRequests).toBe(1);
      expect(router.stats().primaryRequests).toBe(0);
    });

    it('logs the failure, the fallback and the success in order', async () => {
      const alpha = fakeBackend('alpha', { respond: failing('boom') });
      const beta = fakeBackend('beta');
      const router = builder().withPrimary(alpha.backend).withFallback(beta.backend).build();

      await router.invoke('100');

      expect(entries.map((e) => `${e.level}:${e.event}`)).toEqual([
        'warn:invocation_failed',
        'info:fallback_selected',
        'info:invocation_succeeded',
      ]);
      expect(entries[1]?.data).toEqual({
        from: 'test/alpha',
        to: 'test/beta',
        reason: 'invocation_error',
        estimatedTokens: 100,
        maxContextTokens: 128_000,
        requestsPerMinute: 1000,
      });
    });

    it('throws AllBackendsExhaustedError when every backend fails', async () => {
      const alpha = fakeBackend('alpha', { respond: failing('boom') });
      const beta = fakeBackend('beta', { respond: failing('down') });
      const router = builder().withPrimary(alpha.backend).withFallback(beta.backend).build();

      const error = await router.invoke('100').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AllBackendsExhaustedError);
      if (error instanceof AllBackendsExhaustedError) {
        expect(error.reasons).toEqual(['invocation_error', 'invocation_error']);
        expect(error.failures.map((f) => f.modelKey)).toEqual(['test/alpha', 'test/beta']);
        const first = error.failures[0]?.error;
        expect(first).toBeInstanceOf(BackendInvocationError);
        expect(first?.message).toBe('Backend test/alpha failed: boom');
      }
      expect(router.stats().failedRequests).toBe(1);
      expect(entries.at(-1)?.event).toBe('backends_exhausted');
    });

    it('tries each backend at most once per call', async () => {
      const alpha = fakeBackend('alpha', { respond: failing('boom') });
      const router = builder().withPrimary(alpha.backend).build();

      await expect(router.invoke('1')).rejects.toThrow(AllBackendsExhaustedError);
      expect(alpha.invoke).toHaveBeenCalledTimes(1);
    });
  });

  describe('rate limits', () => {
    it('skips a throttled primary when the wait allowance is zero', async () => {
      const alpha = fakeBackend('alpha', { limits: { requestsPerMinute: 1 } });
      const router = builder()
        .withPrimary(alpha.backend)
        .withSafetyMargin(0)
        .withMaxWait(0)
        .build();

      await router.invoke('10');
      const error = await router.invoke('10').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AllBackendsExhaustedError);
      if (error instanceof AllBackendsExhaustedError) {
        expect(error.reasons).toEqual(['rate_limit_timeout']);
      }
      expect(alpha.invoke).toHaveBeenCalledTimes(1);
      expect(router.stats().rateLimitFallbacks).toBe(1);
    });

    it('moves to the next backend when the primary is throttled', async () => {
      const alpha = fakeBackend('alpha', { limits: { requestsPerMinute: 1 } });
      const beta = fakeBackend('beta');
      const events: FallbackEvent[] = [];
      const router = builder()
        .withPrimary(alpha.backend)
        .withFallback(beta.backend)
        .withSafetyMargin(0)
        .withMaxWait(0)
        .onFallback((event) => events.push(event))
        .build();

      const first = await router.invoke('10');
      const second = await router.invoke('20');

      expect(first.text).toBe('alpha:10');
      expect(second.text).toBe('beta:20');
      expect(events.map((e) => e.reason)).toEqual(['rate_limit_timeout']);
      expect(router.stats()).toMatchObject({
        totalRequests: 2,
        primaryRequests: 1,
        fallbackRequests: 1,
        rateLimitFallbacks: 1,
        primaryUsagePercent: 50,
        fallbackUsagePercent: 50,
      });
    });

    it('waits for the primary when the wait fits the allowance', async () => {
      const alpha = fakeBackend('alpha', { limits: { requestsPerMinute: 60 } });
      const beta = fakeBackend('beta');
      const router = builder()
        .withPrimary(alpha.backend)
        .withFallback(beta.backend)
        .withSafetyMargin(0)
        .withMaxWait(5000)
        .build();

      await router.invoke('1');
      const second = await router.invoke('2');

      expect(second.text).toBe('alpha:2');
      expect(clock.sleepCalls).toEqual([1000]);
      expect(beta.invoke).not.toHaveBeenCalled();
    });

    it('gives the last slot to exactly one of two concurrent calls', async () => {
      const alpha = fakeBackend('alpha', { limits: { requestsPerMinute: 1 } });
      const beta = fakeBackend('beta');
      const router = builder()
        .withPrimary(alpha.backend)
        .withFallback(beta.backend)
        .withSafetyMargin(0)
        .withMaxWait(0)
        .build();

      const responses = await Promise.all([router.invoke('1'), router.invoke('2')]);

      expect(responses.map((r) => r.text)).toEqual(['alpha:1', 'beta:2']);
      expect(alpha.invoke).toHaveBeenCalledTimes(1);
      expect(beta.invoke).toHaveBeenCalledTimes(1);
    });
  });

  describe('budget', () => {
    it('throws BudgetExceededError when every backend is blocked by budget', async () => {
      const alpha = fakeBackend('alpha', { pricing: DOLLAR_PER_TOKEN });
      const router = builder().withPrimary(alpha.backend).withBudget({ daily: 10 }).build();

      await router.invoke('5');
      const error = await router.invoke('8').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BudgetExceededError);
      if (error instanceof BudgetExceededError) {
        expect(error.budget).toBe(10);
        expect(error.currentTotal).toBe(13);
        expect(error.period).toBe('daily');
      }
      expect(alpha.invoke).toHaveBeenCalledTimes(1);
    });

    it('falls back to a cheaper backend the budget can absorb', async () => {
      const alpha = fakeBackend('alpha', { pricing: DOLLAR_PER_TOKEN });
      const beta = fakeBackend('beta');
      const events: FallbackEvent[] = [];
      const router = builder()
        .withPrimary(alpha.backend)
        .withFallback(beta.backend)
        .withBudget({ daily: 10 })
        .onFallback((event) => events.push(event))
        .build();

      const response = await router.invoke('20');

      expect(response.text).toBe('beta:20');
      expect(alpha.invoke).not.toHaveBeenCalled();
      expect(events.map((e) => e.reason)).toEqual(['budget_exceeded']);
      expect(router.stats().budgetFallbacks).toBe(1);
    });

    it('reports mixed failures as exhaustion rather than a budget error', async () => {
      const alpha = fakeBackend('alpha', { pricing: DOLLAR_PER_TOKEN });
      const beta = fakeBackend('beta', { respond: failing('down') });
      const router = builder()
        .withPrimary(alpha.backend)
        .withFallback(beta.backend)
        .withBudget({ daily: 10 })
        .build();

      const error = await router.invoke('20').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AllBackendsExhaustedError);
      if (error instanceof AllBackendsExhaustedError) {
        expect(error.reasons).toEqual(['budget_exceeded', 'invocation_error']);
      }
    });

    it('charges the cost reported by the response', async () => {
      const alpha = fakeBackend('alpha', {
        pricing: { inputPer1M: 2, outputPer1M: 4 },
        respond: (payload) =>
          Promise.resolve({
            text: payload,
            usage: { promptTokens: 1_000_000, completionTokens: 500_000 },
          }),
      });
      const router = builder().withPrimary(alpha.backend).withBudget({ daily: 100 }).build();

      await router.invoke('10');

      expect(router.status().budget.daily).toMatchObject({ budget: 100, spent: 4, remaining: 96 });
      expect(entries.at(-1)?.data).toEqual({
        modelKey: 'test/alpha',
        latencyMs: 0,
        tokensUsed: 1_500_000,
        cost: 4,
        attempts: 1,
      });
    });

    it('returns a response that pushed the budget over and blocks the next call', async () => {
      const alpha = fakeBackend('alpha', {
        pricing: DOLLAR_PER_TOKEN,
        respond: (payload) =>
          Promise.resolve({ text: payload, usage: { promptTokens: 8, completionTokens: 4 } }),
      });
      const router = builder().withPrimary(alpha.backend).withBudget({ daily: 10 }).build();

      const response = await router.invoke('8');

      expect(response.text).toBe('8');
      const overrun = entries.find((e) => e.event === 'budget_exceeded_after_call');
      expect(overrun?.level).toBe('warn');
      expect(overrun?.data).toEqual({
        modelKey: 'test/alpha',
        period: 'daily',
        budget: 10,
        currentTotal: 12,
      });

      const error = await router.invoke('1').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(BudgetExceededError);
      if (error instanceof BudgetExceededError) {
        expect(error.currentTotal).toBe(13);
      }
    });

    it('falls back to the estimate when the reported cost is not finite', async () => {
      const alpha = fakeBackend('alpha', {
        pricing: { inputPer1M: 1_000_000, outputPer1M: 0 },
        respond: (payload) =>
          Promise.resolve({ text: payload, usage: { promptTokens: NaN, completionTokens: 0 } }),
      });
      const router = builder().withPrimary(alpha.backend).withBudget({ daily: 100 }).build();

      await router.invoke('3');

      expect(router.status().budget.daily?.spent).toBe(3);
    });
  });

  describe('context windows', () => {
    it('escalates an oversized input to a larger-context backend', async () => {
      const mini = fakeBackend('mini');
      const pro = fakeBackend('pro', { limits: { maxContextTokens: 2_097_152 } });
      const events: FallbackEvent[] = [];
      const router = builder()
        .withPrimary(mini.backend)
        .withLargeContextBackend(pro.backend)
        .onFallback((event) => events.push(event))
        .build();

      const response = await router.invoke('150000');

      expect(response.text).toBe('pro:150000');
      expect(mini.invoke).not.toHaveBeenCalled();
      expect(events).toEqual([
        {
          attemptedModel: 'test/mini',
          fallbackModel: 'test/pro',
          reason: 'context_too_large',
          estimatedTokens: 150_000,
          limits: pro.backend.limits,
        },
      ]);
      expect(router.stats().contextFallbacks).toBe(1);
      expect(router.stats().fallbackRequests).toBe(1);
    });

    it('skips small chain backends before escalating', async () => {
      const mini = fakeBackend('mini');
      const small = fakeBackend('small', { limits: { maxContextTokens: 16_385 } });
      const pro = fakeBackend('pro', { limits: { maxContextTokens: 2_097_152 } });
      const router = builder()
        .withPrimary(mini.backend)
        .withFallback(small.backend)
        .withLargeContextBackend(pro.backend)
        .build();

      const response = await router.invoke('150000');

      expect(response.text).toBe('pro:150000');
      const skipped = entries.filter((e) => e.event === 'backend_skipped');
      expect(skipped.map((e) => e.data?.modelKey)).toEqual(['test/mini', 'test/small']);
    });

    it('tries the next larger-context backend when the first one fails', async () => {
      const small = fakeBackend('small');
      const wide = fakeBackend('wide', {
        limits: { maxContextTokens: 200_000 },
        respond: failing('overloaded'),
      });
      const pro = fakeBackend('pro', { limits: { maxContextTokens: 2_097_152 } });
      const events: FallbackEvent[] = [];
      const router = builder()
        .withPrimary(small.backend)
        .withLargeContextBackend(pro.backend)
        .withLargeContextBackend(wide.backend)
        .onFallback((event) => events.push(event))
        .build();

      const response = await router.invoke('150000');

      expect(response.text).toBe('pro:150000');
      expect(small.invoke).not.toHaveBeenCalled();
      expect(wide.invoke).toHaveBeenCalledTimes(1);
      expect(events.map((e) => [e.fallbackModel, e.reason])).toEqual([
        ['test/wide', 'context_too_large'],
        ['test/pro', 'invocation_error'],
      ]);
      expect(Object.isFrozen(events[0]?.limits)).toBe(true);
      expect(router.stats().contextFallbacks).toBe(1);
    });

    it('serves a fitting fallback without escalation', async () => {
      const mini = fakeBackend('mini');
      const wide = fakeBackend('wide', { limits: { maxContextTokens: 1_000_000 } });
      const pro = fakeBackend('pro', { limits: { maxContextTokens: 2_097_152 } });
      const router = builder()
        .withPrimary(mini.backend)
        .withFallback(wide.backend)
        .withLargeContextBackend(pro.backend)
        .build();

      const response = await router.invoke('150000');

      expect(response.text).toBe('wide:150000');
      expect(router.stats().contextFallbacks).toBe(0);
    });

    it('throws ContextTooLargeError when no backend can hold the input', async () => {
      const mini = fakeBackend('mini');
      const pro = fakeBackend('pro', { limits: { maxContextTokens: 2_097_152 } });
      const router = builder()
        .withPrimary(mini.backend)
        .withLargeContextBackend(pro.backend)
        .build();

      const error = await router.invoke('3000000').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ContextTooLargeError);
      if (error instanceof ContextTooLargeError) {
        expect(error.estimatedTokens).toBe(3_000_000);
        expect(error.maxContext).toBe(2_097_152);
      }
      expect(mini.invoke).not.toHaveBeenCalled();
      expect(pro.invoke).not.toHaveBeenCalled();
      expect(router.stats().failedRequests).toBe(1);
    });

    it('sends any input to the primary when context checks are off', async () => {
      const mini = fakeBackend('mini');
      const router = builder().withPrimary(mini.backend).withContextFallback(false).build();

      const response = await router.invoke('3000000');

      expect(response.text).toBe('mini:3000000');
    });
  });

  describe('fallback hooks', () => {
    it('reports a strategy ordering ahead of the primary', async () => {
      const pricey = fakeBackend('pricey', { pricing: { inputPer1M: 10, outputPer1M: 30 } });
      const cheap = fakeBackend('cheap', { pricing: { inputPer1M: 0.1, outputPer1M: 0.4 } });
      const events: FallbackEvent[] = [];
      const router = builder()
        .withPrimary(pricey.backend)
        .withFallback(cheap.backend)
        .withFallbackStrategy('cost-optimized')
        .onFallback((event) => events.push(event))
        .build();

      const response = await router.invoke('10');

      expect(response.text).toBe('cheap:10');
      expect(pricey.invoke).not.toHaveBeenCalled();
      expect(events.map((e) => e.reason)).toEqual(['strategy_order']);
    });

    it('keeps serving the call when a hook throws', async () => {
      const alpha = fakeBackend('alpha', { respond: failing('boom') });
      const beta = fakeBackend('beta');
      const later = vi.fn();
      const router = builder()
        .withPrimary(alpha.backend)
        .withFallback(beta.backend)
        .onFallback(() => {
          throw new Error('telemetry offline');
        })
        .onFallback(later)
        .build();

      const response = await router.invoke('5');

      expect(response.text).toBe('beta:5');
      expect(later).toHaveBeenCalledTimes(1);
      const hookFailure = entries.find((e) => e.event === 'fallback_hook_failed');
      expect(hookFailure?.data).toEqual({
        fallbackModel: 'test/beta',
        error: 'telemetry offline',
      });
    });

    it('does not fire for calls served by the primary', async () => {
      const alpha = fakeBackend('alpha');
      const handler = vi.fn();
      const router = builder().withPrimary(alpha.backend).onFallback(handler).build();

      await router.invoke('5');

      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('introspection', () => {
    it('lists the primary and every configured backend', () => {
      const router = builder()
        .withPrimary(fakeBackend('alpha').backend)
        .withFallbacks([fakeBackend('beta').backend, fakeBackend('gamma').backend])
        .withLargeContextBackend(fakeBackend('pro').backend)
        .build();

      expect(router.primaryKey).toBe('test/alpha');
      expect(router.modelKeys).toEqual(['test/alpha', 'test/beta', 'test/gamma', 'test/pro']);
    });

    it('reports rate-limit headroom per backend', async () => {
      const alpha = fakeBackend('alpha');
      const beta = fakeBackend('beta');
      const router = builder().withPrimary(alpha.backend).withFallback(beta.backend).build();

      await router.invoke('10');
      clock.advance(100);
      const status = router.status();

      expect(status.backends['test/alpha']).toEqual({
        modelKey: 'test/alpha',
        currentRequests: 1,
        currentTokens: 10,
        safeRequestLimit: 998,
        safeTokenLimit: 9_999_998,
        totalRequestLimit: 1000,
        totalTokenLimit: 10_000_000,
        dailyRequests: 1,
        dailyRequestLimit: Infinity,
        atCapacity: false,
      });
      expect(status.backends['test/beta']?.currentRequests).toBe(0);
      expect(status.budget).toEqual({});
      expect(status.stats.totalRequests).toBe(1);
    });

    it('reports percentages of zero before any call', () => {
      const router = builder().withPrimary(fakeBackend('alpha').backend).build();

      expect(router.stats().primaryUsagePercent).toBe(0);
      expect(router.stats().fallbackUsagePercent).toBe(0);
    });
  });
});
