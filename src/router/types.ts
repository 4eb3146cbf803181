/**
 * Core types for governed model routing.
 *
 * Defines the backend capability the router consumes, the static limits and
 * pricing of each backend, and the shapes that flow through a routed call.
 *
 * @packageDocumentation
 */

/**
 * Published rate and capacity limits of one backend model.
 *
 * @remarks
 * `tokensPerMinute` and `requestsPerDay` accept `Infinity` for tiers without
 * that limit.
 */
export interface ModelLimits {
  /** Provider identifier (e.g., 'openai'). */
  readonly provider: string;
  /** Model name within the provider (e.g., 'gpt-4o-mini'). */
  readonly modelName: string;
  /** Requests allowed per minute. */
  readonly requestsPerMinute: number;
  /** Tokens allowed per minute. */
  readonly tokensPerMinute: number;
  /** Largest input (in tokens) the model accepts in one call. */
  readonly maxContextTokens: number;
  /** Requests allowed per day, if the provider enforces one. */
  readonly requestsPerDay?: number;
}

/**
 * Price of a backend in USD per million tokens.
 */
export interface ModelPricing {
  /** USD per million prompt tokens. */
  readonly inputPer1M: number;
  /** USD per million completion tokens. */
  readonly outputPer1M: number;
}

/**
 * Token usage reported by a backend for one call.
 */
export interface ModelUsage {
  /** Number of tokens in the prompt. */
  readonly promptTokens: number;
  /** Number of tokens in the completion. */
  readonly completionTokens: number;
}

/**
 * Minimal shape every backend response satisfies. Backends that report usage
 * let the router charge the budget with the real cost instead of an estimate.
 */
export interface InvocationResponse {
  readonly usage?: ModelUsage | undefined;
}

/**
 * A callable backend model.
 *
 * @typeParam TPayload - Input accepted by the backend.
 * @typeParam TResponse - Response produced by the backend.
 *
 * @example
 * ```typescript
 * const backend: BackendInvoker<string, ChatResponse> = {
 *   provider: 'openai',
 *   modelName: 'gpt-4o-mini',
 *   limits: { provider: 'openai', modelName: 'gpt-4o-mini', requestsPerMinute: 500,
 *             tokensPerMinute: 200_000, maxContextTokens: 128_000 },
 *   pricing: { inputPer1M: 0.15, outputPer1M: 0.6 },
 *   invoke: (prompt) => client.chat(prompt),
 * };
 * ```
 */
export interface BackendInvoker<TPayload, TResponse extends InvocationResponse = InvocationResponse> {
  readonly provider: string;
  readonly modelName: string;
  readonly limits: ModelLimits;
  readonly pricing?: ModelPricing | undefined;
  /**
   * Sends the payload to the backend.
   *
   * @throws Any backend-specific error; the router wraps it in a
   * BackendInvocationError and moves on to the next candidate.
   */
  invoke(payload: TPayload): Promise<TResponse>;
}

/**
 * Ordered set of backends tried for a call.
 */
export interface FallbackChain<TPayload, TResponse extends InvocationResponse = InvocationResponse> {
  readonly primary: BackendInvoker<TPayload, TResponse>;
  readonly fallbacks: readonly BackendInvoker<TPayload, TResponse>[];
}

/**
 * Why a candidate was passed over during a call.
 */
export type FailureReason =
  | 'context_too_large'
  | 'budget_exceeded'
  | 'rate_limit_timeout'
  | 'invocation_error';

/**
 * Array of all failure reasons, in the order a candidate is checked.
 */
export const FAILURE_REASONS: readonly FailureReason[] = [
  'context_too_large',
  'budget_exceeded',
  'rate_limit_timeout',
  'invocation_error',
] as const;

/**
 * Why a call went to a backend other than the primary: the failure that
 * passed over the previous candidate, or `strategy_order` when the fallback
 * strategy ranked this backend ahead of the primary.
 */
export type FallbackReason = FailureReason | 'strategy_order';

/**
 * Result of one attempt against one backend. Feeds the usage ledger, the
 * budget and the call history; never persisted.
 */
export interface CallOutcome {
  /** Model key of the backend (`provider/modelName`). */
  readonly modelKey: string;
  /** Tokens consumed (reported or estimated). */
  readonly tokensUsed: number;
  /** Cost in USD charged for the attempt. */
  readonly cost: number;
  /** Whether the backend returned a response. */
  readonly success: boolean;
  /** Failure reason when `success` is false. */
  readonly errorKind?: FailureReason | undefined;
  /** Wall time of the invocation in milliseconds. */
  readonly latencyMs: number;
  /** When the attempt finished (epoch ms). */
  readonly timestamp: number;
}

/**
 * Event emitted whenever a call is served by a backend other than the
 * configured primary.
 */
export interface FallbackEvent {
  /** The primary backend the call departed from. */
  readonly attemptedModel: string;
  /** The backend about to be invoked. */
  readonly fallbackModel: string;
  /** Why the primary (or an earlier candidate) was not used. */
  readonly reason: FallbackReason;
  /** Estimated input tokens of the payload. */
  readonly estimatedTokens: number;
  /** Limits of the backend about to be invoked. */
  readonly limits: ModelLimits;
}

/**
 * Receiver for {@link FallbackEvent}s.
 */
export type FallbackHandler = (event: FallbackEvent) => void;

/**
 * Builds the key a backend is tracked under.
 *
 * @param provider - Provider identifier.
 * @param modelName - Model name within the provider.
 * @returns `provider/modelName`.
 */
export function toModelKey(provider: string, modelName: string): string {
  return `${provider}/${modelName}`;
}

/**
 * Returns the key of a backend.
 *
 * @param backend - Anything carrying a provider and model name.
 */
export function modelKeyOf(backend: { readonly provider: string; readonly modelName: string }): string {
  return toModelKey(backend.provider, backend.modelName);
}
