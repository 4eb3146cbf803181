/**
 * Fluent assembly of a governed Router.
 *
 * @packageDocumentation
 */

import { createBudgetEnforcer, type BudgetEnforcer, type BudgetSettings } from '../budget/index.js';
import type { GovernorConfig } from '../config/types.js';
import { ContextFitPolicy, simpleTokenCounter, type TokenCounter } from '../context/index.js';
import {
  CallHistory,
  createFallbackStrategy,
  type FallbackStrategy,
  type FallbackStrategyKind,
} from '../fallback/index.js';
import { UsageLedger } from '../ledger/index.js';
import {
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_SAFETY_MARGIN,
  RateLimitScheduler,
  defaultSleep,
} from '../scheduler/index.js';
import { Logger } from '../utils/logger.js';
import { RouterConfigError } from './errors.js';
import { createFallbackLogger } from './events.js';
import { Router } from './router.js';
import {
  modelKeyOf,
  type BackendInvoker,
  type FallbackHandler,
  type InvocationResponse,
  type ModelLimits,
} from './types.js';

function isPositiveLimit(value: number): boolean {
  return !Number.isNaN(value) && value > 0;
}

function isPrice(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Copies a backend with frozen limits and pricing, so later changes to the
 * caller's objects do not reach the router.
 */
function snapshotBackend<TPayload, TResponse extends InvocationResponse>(
  backend: BackendInvoker<TPayload, TResponse>
): BackendInvoker<TPayload, TResponse> {
  const { pricing } = backend;
  return {
    provider: backend.provider,
    modelName: backend.modelName,
    limits: Object.freeze({ ...backend.limits }),
    pricing: pricing === undefined ? undefined : Object.freeze({ ...pricing }),
    invoke: (payload) => backend.invoke(payload),
  };
}

/**
 * Checks a backend's identity, limits and pricing.
 *
 * @param backend - Backend to check.
 * @throws RouterConfigError naming the first invalid field.
 */
export function validateBackend<TPayload, TResponse extends InvocationResponse>(
  backend: BackendInvoker<TPayload, TResponse>
): void {
  if (backend.provider.trim() === '' || backend.modelName.trim() === '') {
    throw new RouterConfigError(
      `Backend provider and model name must be non-empty, got '${backend.provider}/${backend.modelName}'`
    );
  }
  const key = modelKeyOf(backend);
  const { limits, pricing } = backend;
  const checks: [keyof ModelLimits, number | undefined][] = [
    ['requestsPerMinute', limits.requestsPerMinute],
    ['tokensPerMinute', limits.tokensPerMinute],
    ['maxContextTokens', limits.maxContextTokens],
    ['requestsPerDay', limits.requestsPerDay],
  ];
  for (const [field, value] of checks) {
    if (value !== undefined && !isPositiveLimit(value)) {
      throw new RouterConfigError(`${key}: ${field} must be greater than 0, got ${String(value)}`);
    }
  }
  if (pricing !== undefined && (!isPrice(pricing.inputPer1M) || !isPrice(pricing.outputPer1M))) {
    throw new RouterConfigError(
      `${key}: pricing must be non-negative, got input ${String(pricing.inputPer1M)} and output ${String(pricing.outputPer1M)}`
    );
  }
}

/**
 * Builds a {@link Router}. Every `with*` method returns the builder.
 *
 * @typeParam TPayload - Input accepted by every backend.
 * @typeParam TResponse - Response produced by every backend.
 *
 * @example
 * ```typescript
 * const router = new RouterBuilder<string, ChatResponse>()
 *   .withPrimary(gpt4oMini)
 *   .withFallbacks([gpt4o, geminiFlash])
 *   .withLargeContextBackend(geminiPro)
 *   .withBudget({ daily: 10, monthly: 200 })
 *   .withFallbackStrategy('cost-optimized')
 *   .withMaxWait(30_000)
 *   .build();
 * ```
 */
export class RouterBuilder<TPayload, TResponse extends InvocationResponse = InvocationResponse> {
  private primary: BackendInvoker<TPayload, TResponse> | undefined;
  private readonly fallbacks: BackendInvoker<TPayload, TResponse>[] = [];
  private readonly largeContextBackends: BackendInvoker<TPayload, TResponse>[] = [];
  private budget: BudgetSettings | undefined;
  private strategy: FallbackStrategyKind | FallbackStrategy = 'sequential';
  private contextFallback = true;
  private maxWaitMs = DEFAULT_MAX_WAIT_MS;
  private safetyMargin = DEFAULT_SAFETY_MARGIN;
  private counter: TokenCounter = simpleTokenCounter;
  private logger: Logger | undefined;
  private debugMode = false;
  private now: () => number = Date.now;
  private sleep: (ms: number) => Promise<void> = defaultSleep;
  private readonly fallbackHandlers: FallbackHandler[] = [];

  /**
   * Sets the backend every call tries first. Required, exactly once.
   *
   * @throws RouterConfigError if a primary is already set or the backend is invalid.
   */
  withPrimary(backend: BackendInvoker<TPayload, TResponse>): this {
    if (this.primary !== undefined) {
      throw new RouterConfigError(
        `Primary backend already set to ${modelKeyOf(this.primary)}; cannot also set ${modelKeyOf(backend)}`
      );
    }
    validateBackend(backend);
    this.primary = backend;
    return this;
  }

  /**
   * Appends a fallback, tried after the primary in declaration order.
   *
   * @throws RouterConfigError if the backend is invalid.
   */
  withFallback(backend: BackendInvoker<TPayload, TResponse>): this {
    validateBackend(backend);
    this.fallbacks.push(backend);
    return this;
  }

  withFallbacks(backends: readonly BackendInvoker<TPayload, TResponse>[]): this {
    for (const backend of backends) {
      this.withFallback(backend);
    }
    return this;
  }

  /**
   * Adds a backend used only when no chain backend can hold the input.
   *
   * @throws RouterConfigError if the backend is invalid.
   */
  withLargeContextBackend(backend: BackendInvoker<TPayload, TResponse>): this {
    validateBackend(backend);
    this.largeContextBackends.push(backend);
    return this;
  }

  /**
   * Enforces spending limits. Amounts are USD per period; hard limits and a
   * 0.8 warning threshold unless set.
   */
  withBudget(settings: BudgetSettings): this {
    this.budget = settings;
    return this;
  }

  /**
   * Sets the fallback ordering: a built-in kind or a custom strategy.
   */
  withFallbackStrategy(strategy: FallbackStrategyKind | FallbackStrategy): this {
    this.strategy = strategy;
    return this;
  }

  /**
   * Turns context-window checks and escalation on or off.
   */
  withContextFallback(enabled: boolean): this {
    this.contextFallback = enabled;
    return this;
  }

  /**
   * Sets how long a call waits for one backend's rate limit.
   *
   * @param ms - Milliseconds; 0 skips a throttled backend at once.
   * @throws RouterConfigError if `ms` is negative or NaN.
   */
  withMaxWait(ms: number): this {
    if (Number.isNaN(ms) || ms < 0) {
      throw new RouterConfigError(`Max wait must be a non-negative number, got ${String(ms)}`);
    }
    this.maxWaitMs = ms;
    return this;
  }

  /**
   * Sets the headroom kept below every request and token limit.
   *
   * @throws RouterConfigError if `margin` is not a non-negative integer.
   */
  withSafetyMargin(margin: number): this {
    if (!Number.isInteger(margin) || margin < 0) {
      throw new RouterConfigError(
        `Safety margin must be a non-negative integer, got ${String(margin)}`
      );
    }
    this.safetyMargin = margin;
    return this;
  }

  withTokenCounter(counter: TokenCounter): this {
    this.counter = counter;
    return this;
  }

  withLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  /**
   * Replaces wall-clock time, e.g. with a virtual clock in tests.
   *
   * @param now - Clock returning epoch milliseconds.
   * @param sleep - Waits the given milliseconds; real timers when omitted.
   */
  withClock(now: () => number, sleep?: (ms: number) => Promise<void>): this {
    this.now = now;
    if (sleep !== undefined) {
      this.sleep = sleep;
    }
    return this;
  }

  /**
   * Registers a handler called before a non-primary backend is invoked.
   * Errors thrown by the handler are logged and do not fail the call.
   */
  onFallback(handler: FallbackHandler): this {
    this.fallbackHandlers.push(handler);
    return this;
  }

  /**
   * Applies routing, budget and logging settings from a parsed configuration.
   * Backends are added separately, e.g. with `createBackend`.
   */
  withConfig(config: GovernorConfig): this {
    const { routing, budget, logging } = config;
    this.withFallbackStrategy(routing.strategy);
    this.withMaxWait(routing.max_wait_ms);
    this.withSafetyMargin(routing.safety_margin);
    this.withContextFallback(routing.context_fallback);
    this.debugMode = logging.debug;

    const amounts = [budget.hourly, budget.daily, budget.monthly, budget.total];
    if (amounts.some((amount) => amount !== undefined)) {
      this.withBudget({
        hourly: budget.hourly,
        daily: budget.daily,
        monthly: budget.monthly,
        total: budget.total,
        hardLimit: budget.hard_limit,
        warningThreshold: budget.warning_threshold,
      });
    }
    return this;
  }

  /**
   * Assembles the router.
   *
   * Backends are copied with frozen limits and pricing.
   *
   * @throws RouterConfigError if no primary is set, a backend is invalid, two
   * backends share a model key, or the budget is invalid.
   */
  build(): Router<TPayload, TResponse> {
    const primary = this.primary;
    if (primary === undefined) {
      throw new RouterConfigError('A primary backend is required; call withPrimary() before build()');
    }

    const chainPrimary = snapshotBackend(primary);
    const fallbacks = this.fallbacks.map((backend) => snapshotBackend(backend));
    const largeContextBackends = this.largeContextBackends.map((backend) =>
      snapshotBackend(backend)
    );

    const limitsByKey = new Map<string, ModelLimits>();
    for (const backend of [chainPrimary, ...fallbacks, ...largeContextBackends]) {
      validateBackend(backend);
      const key = modelKeyOf(backend);
      if (limitsByKey.has(key)) {
        throw new RouterConfigError(`Backend ${key} is configured more than once`);
      }
      limitsByKey.set(key, backend.limits);
    }

    const now = this.now;
    const logger = this.logger ?? new Logger({ component: 'Router', debugMode: this.debugMode });

    const ledger = new UsageLedger({ now });
    const scheduler = new RateLimitScheduler({
      ledger,
      limits: (key) => limitsByKey.get(key),
      safetyMargin: this.safetyMargin,
      now,
      sleep: this.sleep,
      logger: logger.child('RateLimitScheduler'),
    });

    let budget: BudgetEnforcer | undefined;
    if (this.budget !== undefined) {
      try {
        budget = createBudgetEnforcer(this.budget, {
          now,
          logger: logger.child('BudgetEnforcer'),
        });
      } catch (error) {
        if (error instanceof RangeError) {
          throw new RouterConfigError(`Invalid budget: ${error.message}`, error);
        }
        throw error;
      }
    }

    const history = new CallHistory({ now });
    const strategy =
      typeof this.strategy === 'string'
        ? createFallbackStrategy(this.strategy, { history })
        : this.strategy;

    return new Router<TPayload, TResponse>({
      chain: { primary: chainPrimary, fallbacks },
      largeContextBackends,
      scheduler,
      budget,
      context: new ContextFitPolicy({ counter: this.counter, enabled: this.contextFallback }),
      strategy,
      history,
      maxWaitMs: this.maxWaitMs,
      now,
      logger,
      fallbackHandlers: [createFallbackLogger(logger), ...this.fallbackHandlers],
    });
  }
}
