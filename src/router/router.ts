/**
 * Governed router over a primary backend and its fallbacks.
 *
 * Each call walks the candidates in strategy order and, per candidate, checks
 * the context window, the budget and the rate limit before invoking it. The
 * first success is returned; when every candidate is skipped or fails, the
 * call ends with one terminal error.
 *
 * @packageDocumentation
 */

import {
  BudgetExceededError,
  type BudgetEnforcer,
  type BudgetPeriod,
  type BudgetPeriodStatus,
} from '../budget/index.js';
import { ContextTooLargeError, type ContextFitPolicy } from '../context/index.js';
import type { CallHistory, FallbackStrategy } from '../fallback/index.js';
import {
  RateLimitWaitTimeout,
  type RateLimitScheduler,
  type RateLimitStatus,
} from '../scheduler/index.js';
import type { Logger } from '../utils/logger.js';
import { calculateCost, estimateCost } from './cost.js';
import { AllBackendsExhaustedError, BackendInvocationError, type FailureRecord } from './errors.js';
import {
  modelKeyOf,
  type BackendInvoker,
  type FailureReason,
  type FallbackChain,
  type FallbackEvent,
  type FallbackHandler,
  type InvocationResponse,
} from './types.js';

/**
 * Counters accumulated over the router's lifetime.
 */
export interface RouterStats {
  /** Calls to `invoke`. */
  readonly totalRequests: number;
  /** Calls served by the primary. */
  readonly primaryRequests: number;
  /** Calls served by any other backend. */
  readonly fallbackRequests: number;
  /** Candidates skipped because their rate limit did not clear in time. */
  readonly rateLimitFallbacks: number;
  /** Calls served by a larger-context backend after every candidate overflowed. */
  readonly contextFallbacks: number;
  /** Candidates skipped because a hard budget could not absorb the call. */
  readonly budgetFallbacks: number;
  /** Calls that ended with an error. */
  readonly failedRequests: number;
  readonly primaryUsagePercent: number;
  readonly fallbackUsagePercent: number;
}

/**
 * Introspection snapshot of a router.
 */
export interface RouterStatus {
  /** Rate-limit status per model key. */
  readonly backends: Readonly<Record<string, RateLimitStatus>>;
  readonly budget: Partial<Record<BudgetPeriod, BudgetPeriodStatus>>;
  readonly stats: RouterStats;
}

/**
 * Collaborators a router is assembled from. Built by RouterBuilder.
 */
export interface RouterComponents<TPayload, TResponse extends InvocationResponse> {
  readonly chain: FallbackChain<TPayload, TResponse>;
  /** Backends used only when no chain candidate can hold the input. */
  readonly largeContextBackends: readonly BackendInvoker<TPayload, TResponse>[];
  readonly scheduler: RateLimitScheduler;
  readonly budget: BudgetEnforcer | undefined;
  readonly context: ContextFitPolicy;
  readonly strategy: FallbackStrategy;
  readonly history: CallHistory;
  readonly maxWaitMs: number;
  readonly now: () => number;
  readonly logger: Logger;
  readonly fallbackHandlers: readonly FallbackHandler[];
}

interface MutableStats {
  totalRequests: number;
  primaryRequests: number;
  fallbackRequests: number;
  rateLimitFallbacks: number;
  contextFallbacks: number;
  budgetFallbacks: number;
  failedRequests: number;
}

function percentOf(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

/**
 * Routes calls across rate-limited, budgeted, context-bounded backends.
 *
 * @typeParam TPayload - Input accepted by every backend.
 * @typeParam TResponse - Response produced by every backend.
 *
 * @example
 * ```typescript
 * const router = new RouterBuilder<string, ChatResponse>()
 *   .withPrimary(gpt4o)
 *   .withFallback(geminiPro)
 *   .withBudget({ daily: 10 })
 *   .build();
 * const response = await router.invoke('Summarize the attached report');
 * ```
 */
export class Router<TPayload, TResponse extends InvocationResponse = InvocationResponse> {
  private readonly chain: FallbackChain<TPayload, TResponse>;
  private readonly candidates: readonly BackendInvoker<TPayload, TResponse>[];
  private readonly pool: readonly BackendInvoker<TPayload, TResponse>[];
  private readonly largestContext: number;
  private readonly scheduler: RateLimitScheduler;
  private readonly budget: BudgetEnforcer | undefined;
  private readonly context: ContextFitPolicy;
  private readonly strategy: FallbackStrategy;
  private readonly history: CallHistory;
  private readonly maxWaitMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly fallbackHandlers: readonly FallbackHandler[];
  private readonly counters: MutableStats = {
    totalRequests: 0,
    primaryRequests: 0,
    fallbackRequests: 0,
    rateLimitFallbacks: 0,
    contextFallbacks: 0,
    budgetFallbacks: 0,
    failedRequests: 0,
  };

  constructor(components: RouterComponents<TPayload, TResponse>) {
    this.chain = components.chain;
    this.candidates = [components.chain.primary, ...components.chain.fallbacks];
    this.pool = [...this.candidates, ...components.largeContextBackends];
    this.largestContext = this.pool.reduce(
      (max, backend) => Math.max(max, backend.limits.maxContextTokens),
      0
    );
    this.scheduler = components.scheduler;
    this.budget = components.budget;
    this.context = components.context;
    this.strategy = components.strategy;
    this.history = components.history;
    this.maxWaitMs = components.maxWaitMs;
    this.now = components.now;
    this.logger = components.logger;
    this.fallbackHandlers = components.fallbackHandlers;
  }

  /** Model key of the primary backend. */
  get primaryKey(): string {
    return modelKeyOf(this.chain.primary);
  }

  /** Model keys of every configured backend, chain first. */
  get modelKeys(): string[] {
    return this.pool.map(modelKeyOf);
  }

  /**
   * Sends `payload` to the first candidate that can take it.
   *
   * @param payload - Input for the backend.
   * @returns The response of the backend that served the call.
   * @throws ContextTooLargeError if no configured backend can hold the input.
   * @throws BudgetExceededError if every candidate was blocked by a hard budget.
   * @throws AllBackendsExhaustedError if every candidate was skipped or failed.
   */
  async invoke(payload: TPayload): Promise<TResponse> {
    this.counters.totalRequests += 1;
    const estimatedTokens = this.context.estimateTokens(payload);
    const primaryKey = this.primaryKey;

    if (
      this.context.enabled &&
      this.context.largerContextCandidates(estimatedTokens, this.pool).length === 0
    ) {
      this.counters.failedRequests += 1;
      this.logger.error('backends_exhausted', {
        estimatedTokens,
        maxContext: this.largestContext,
        reasons: ['context_too_large'],
      });
      throw new ContextTooLargeError(estimatedTokens, this.largestContext);
    }

    const attempted = new Set<string>();
    const queue = this.strategy.order(this.candidates, { estimatedTokens, primaryKey, attempted });
    const failures: FailureRecord[] = [];
    let escalated = false;

    for (let i = 0; i < queue.length; i++) {
      const backend = queue[i];
      if (backend === undefined) {
        continue;
      }
      const modelKey = modelKeyOf(backend);
      if (attempted.has(modelKey)) {
        continue;
      }
      attempted.add(modelKey);

      const fit = this.context.fitsTokens(estimatedTokens, backend);
      if (!fit.fits) {
        this.skip(
          failures,
          modelKey,
          'context_too_large',
          new ContextTooLargeError(estimatedTokens, fit.maxContext)
        );
        const lastCandidate = i === queue.length - 1;
        if (lastCandidate && failures.every((f) => f.reason === 'context_too_large')) {
          for (const target of this.context.largerContextCandidates(estimatedTokens, this.pool)) {
            if (!attempted.has(modelKeyOf(target))) {
              queue.push(target);
              escalated = true;
            }
          }
        }
        continue;
      }

      const estimatedCost = estimateCost(estimatedTokens, backend.pricing);
      const blocked = this.budget?.blockingError(estimatedCost);
      if (blocked !== undefined) {
        this.counters.budgetFallbacks += 1;
        this.skip(failures, modelKey, 'budget_exceeded', blocked);
        continue;
      }

      const acquired = await this.scheduler.acquire(modelKey, estimatedTokens, this.maxWaitMs);
      if (!acquired) {
        this.counters.rateLimitFallbacks += 1;
        this.skip(
          failures,
          modelKey,
          'rate_limit_timeout',
          new RateLimitWaitTimeout(modelKey, this.maxWaitMs)
        );
        continue;
      }

      if (modelKey !== primaryKey) {
        this.emitFallback({
          attemptedModel: primaryKey,
          fallbackModel: modelKey,
          reason: failures.at(-1)?.reason ?? 'strategy_order',
          estimatedTokens,
          limits: backend.limits,
        });
      }

      const started = this.now();
      let response: TResponse;
      try {
        response = await backend.invoke(payload);
      } catch (error) {
        const latencyMs = this.now() - started;
        const wrapped = new BackendInvocationError(modelKey, error);
        this.history.record({
          modelKey,
          tokensUsed: estimatedTokens,
          cost: 0,
          success: false,
          errorKind: 'invocation_error',
          latencyMs,
          timestamp: this.now(),
        });
        this.logger.warn('invocation_failed', { modelKey, latencyMs, error: wrapped.message });
        failures.push({ modelKey, reason: 'invocation_error', error: wrapped });
        continue;
      }

      const latencyMs = this.now() - started;
      const usage = response.usage;
      const tokensUsed =
        usage === undefined ? estimatedTokens : usage.promptTokens + usage.completionTokens;
      const reported = usage === undefined ? estimatedCost : calculateCost(usage, backend.pricing);
      const cost = Number.isFinite(reported) && reported >= 0 ? reported : estimatedCost;

      this.history.record({
        modelKey,
        tokensUsed,
        cost,
        success: true,
        latencyMs,
        timestamp: this.now(),
      });
      this.chargeBudget(cost, modelKey);

      if (modelKey === primaryKey) {
        this.counters.primaryRequests += 1;
      } else {
        this.counters.fallbackRequests += 1;
      }
      if (escalated) {
        this.counters.contextFallbacks += 1;
      }
      this.logger.info('invocation_succeeded', {
        modelKey,
        latencyMs,
        tokensUsed,
        cost,
        attempts: failures.length + 1,
      });
      return response;
    }

    this.counters.failedRequests += 1;
    this.logger.error('backends_exhausted', {
      estimatedTokens,
      failures: failures.map((f) => ({ modelKey: f.modelKey, reason: f.reason })),
    });

    const [first] = failures;
    if (
      first !== undefined &&
      first.error instanceof BudgetExceededError &&
      failures.every((f) => f.reason === 'budget_exceeded')
    ) {
      throw first.error;
    }
    throw new AllBackendsExhaustedError(failures);
  }

  /**
   * Lifetime counters, with each served share as a percentage of all calls.
   */
  stats(): RouterStats {
    const { totalRequests, primaryRequests, fallbackRequests } = this.counters;
    return {
      ...this.counters,
      primaryUsagePercent: percentOf(primaryRequests, totalRequests),
      fallbackUsagePercent: percentOf(fallbackRequests, totalRequests),
    };
  }

  /**
   * Rate-limit headroom of every backend, budget state and counters.
   */
  status(): RouterStatus {
    const backends: Record<string, RateLimitStatus> = {};
    for (const modelKey of this.modelKeys) {
      const status = this.scheduler.status(modelKey);
      if (status !== undefined) {
        backends[modelKey] = status;
      }
    }
    return {
      backends,
      budget: this.budget?.status() ?? {},
      stats: this.stats(),
    };
  }

  private skip(
    failures: FailureRecord[],
    modelKey: string,
    reason: FailureReason,
    error: Error
  ): void {
    failures.push({ modelKey, reason, error });
    this.logger.warn('backend_skipped', { modelKey, reason, detail: error.message });
  }

  private chargeBudget(cost: number, modelKey: string): void {
    if (this.budget === undefined) {
      return;
    }
    try {
      this.budget.recordCost(cost, modelKey);
    } catch (error) {
      if (!(error instanceof BudgetExceededError)) {
        throw error;
      }
      this.logger.warn('budget_exceeded_after_call', {
        modelKey,
        period: error.period,
        budget: error.budget,
        currentTotal: error.currentTotal,
      });
    }
  }

  private emitFallback(event: FallbackEvent): void {
    for (const handler of this.fallbackHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn('fallback_hook_failed', {
          fallbackModel: event.fallbackModel,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
