/**
 * Context-window fit checks and escalation.
 *
 * Estimates the token size of a payload and decides whether a backend's
 * context window can hold it, or which larger backend can.
 *
 * @packageDocumentation
 */

import type { ModelLimits } from '../router/types.js';
import { isRecord } from '../utils/guards.js';

/**
 * Token counter interface for dependency injection.
 * Allows swapping in different tokenization strategies.
 */
export interface TokenCounter {
  /**
   * Count tokens in text.
   *
   * @param text - Text to count tokens for.
   * @returns Estimated token count.
   */
  countTokens(text: string): number;
}

/**
 * Anything with a context window, typically a backend.
 */
export interface ContextCandidate {
  readonly limits: Pick<ModelLimits, 'maxContextTokens'>;
}

/**
 * Result of a fit check.
 */
export interface FitResult {
  readonly fits: boolean;
  readonly estimatedTokens: number;
  readonly maxContext: number;
}

/**
 * Options for creating a ContextFitPolicy.
 */
export interface ContextFitPolicyOptions {
  /**
   * Tokenization strategy.
   * @defaultValue {@link simpleTokenCounter}
   */
  readonly counter?: TokenCounter;
  /**
   * When false, every payload fits every backend.
   * @defaultValue true
   */
  readonly enabled?: boolean;
}

/**
 * Error thrown when no configured backend can hold a payload.
 */
export class ContextTooLargeError extends Error {
  readonly code = 'CONTEXT_TOO_LARGE';
  /** Estimated input size in tokens. */
  readonly estimatedTokens: number;
  /** Largest context window among the candidates. */
  readonly maxContext: number;

  constructor(estimatedTokens: number, maxContext: number) {
    super(
      `Input of ~${String(estimatedTokens)} tokens exceeds the largest available context window (${String(maxContext)} tokens)`
    );
    this.name = 'ContextTooLargeError';
    this.estimatedTokens = estimatedTokens;
    this.maxContext = maxContext;
  }
}

/**
 * Simple character-based token estimation.
 * Uses ~4 characters per token as a conservative estimate.
 *
 * @param text - Text to estimate tokens for.
 * @returns Estimated token count.
 */
export function estimateTokensSimple(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  const CHARS_PER_TOKEN = 4;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Word-based token estimation.
 *
 * @remarks
 * Assumes ~1.3 tokens per word, plus half a token for each punctuation or
 * operator character.
 *
 * @param text - Text to estimate tokens for.
 * @returns Estimated token count.
 */
export function estimateTokensWordBased(text: string): number {
  if (text.length === 0) {
    return 0;
  }

  const words = text.split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) {
    return Math.max(1, Math.ceil(text.length / 10));
  }

  const specialChars = (text.match(/[{}[\]().,;:!?<>=/\\@#$%^&*|`~"']/g) ?? []).length;
  const TOKENS_PER_WORD = 1.3;
  return Math.ceil(words.length * TOKENS_PER_WORD) + Math.ceil(specialChars * 0.5);
}

/**
 * Character-based counter (`ceil(chars / 4)`).
 */
export const simpleTokenCounter: TokenCounter = {
  countTokens: estimateTokensSimple,
};

/**
 * Word-based counter.
 */
export const wordTokenCounter: TokenCounter = {
  countTokens: estimateTokensWordBased,
};

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Extracts the text of a payload for token counting.
 *
 * Strings are used as-is. Arrays are joined line by line. Objects contribute
 * their `input`, `prompt`, `text`, `content` or `messages` field, first match
 * wins. Anything else is JSON-serialized.
 *
 * @param payload - Payload sent to a backend.
 */
export function extractText(payload: unknown): string {
  if (typeof payload === 'string') {
    return payload;
  }
  if (payload === null || payload === undefined) {
    return '';
  }
  if (Array.isArray(payload)) {
    return payload.map((item: unknown) => extractText(item)).join('\n');
  }
  if (isRecord(payload)) {
    for (const field of ['input', 'prompt', 'text', 'content', 'messages']) {
      const value = payload[field];
      if (value !== undefined && value !== null) {
        return extractText(value);
      }
    }
  }
  return stringify(payload);
}

/**
 * Decides which backends can hold a payload.
 *
 * @example
 * ```typescript
 * const policy = new ContextFitPolicy();
 * const target = policy.selectContextCapable(longDocument, [miniBackend, proBackend]);
 * ```
 */
export class ContextFitPolicy {
  private readonly counter: TokenCounter;
  private readonly isEnabled: boolean;

  constructor(options: ContextFitPolicyOptions = {}) {
    this.counter = options.counter ?? simpleTokenCounter;
    this.isEnabled = options.enabled ?? true;
  }

  /** Whether fit checks can reject a backend. */
  get enabled(): boolean {
    return this.isEnabled;
  }

  /**
   * Estimates the token size of a payload. Deterministic for equal input.
   *
   * @param payload - Payload sent to a backend.
   */
  estimateTokens(payload: unknown): number {
    return this.counter.countTokens(extractText(payload));
  }

  /**
   * Checks whether `backend` can hold `payload`.
   *
   * @param payload - Payload sent to a backend.
   * @param backend - Backend to check.
   */
  fits(payload: unknown, backend: ContextCandidate): FitResult {
    return this.fitsTokens(this.estimateTokens(payload), backend);
  }

  /**
   * Checks whether `backend` can hold an input of `estimatedTokens` tokens.
   *
   * @param estimatedTokens - Input size.
   * @param backend - Backend to check.
   */
  fitsTokens(estimatedTokens: number, backend: ContextCandidate): FitResult {
    const maxContext = backend.limits.maxContextTokens;
    return {
      fits: !this.isEnabled || estimatedTokens <= maxContext,
      estimatedTokens,
      maxContext,
    };
  }

  /**
   * Returns the smallest-window candidate that holds `payload`.
   *
   * Candidates are sorted by ascending context window; ties keep their order.
   *
   * @param payload - Payload sent to a backend.
   * @param candidates - Backends to choose from.
   * @throws ContextTooLargeError if none of them can hold the payload.
   */
  selectContextCapable<T extends ContextCandidate>(payload: unknown, candidates: readonly T[]): T {
    return this.selectForTokens(this.estimateTokens(payload), candidates);
  }

  /**
   * Same as {@link selectContextCapable} for an already estimated size.
   *
   * @param estimatedTokens - Input size.
   * @param candidates - Backends to choose from.
   * @throws ContextTooLargeError if none of them can hold the input.
   */
  selectForTokens<T extends ContextCandidate>(estimatedTokens: number, candidates: readonly T[]): T {
    const [selected] = this.largerContextCandidates(estimatedTokens, candidates);
    if (selected === undefined) {
      const maxContext = candidates.reduce(
        (max, candidate) => Math.max(max, candidate.limits.maxContextTokens),
        0
      );
      throw new ContextTooLargeError(estimatedTokens, maxContext);
    }
    return selected;
  }

  /**
   * Every candidate whose window holds `estimatedTokens`, smallest window
   * first.
   *
   * @param estimatedTokens - Input size.
   * @param candidates - Backends to filter.
   */
  largerContextCandidates<T extends ContextCandidate>(
    estimatedTokens: number,
    candidates: readonly T[]
  ): T[] {
    return [...candidates]
      .sort((a, b) => a.limits.maxContextTokens - b.limits.maxContextTokens)
      .filter((candidate) => estimatedTokens <= candidate.limits.maxContextTokens);
  }
}
