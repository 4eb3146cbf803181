/**
 * Errors raised at the router boundary.
 *
 * @packageDocumentation
 */

import type { FailureReason } from './types.js';

/**
 * Error wrapping a failure thrown by a backend's `invoke`.
 */
export class BackendInvocationError extends Error {
  readonly code = 'BACKEND_INVOCATION_FAILED';
  /** Model key of the failing backend. */
  readonly modelKey: string;

  constructor(modelKey: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Backend ${modelKey} failed: ${detail}`);
    this.name = 'BackendInvocationError';
    this.modelKey = modelKey;
    this.cause = cause;
  }
}

/**
 * Why one candidate did not serve a call.
 */
export interface FailureRecord {
  readonly modelKey: string;
  readonly reason: FailureReason;
  /** Error describing the failure. */
  readonly error: Error;
}

/**
 * Error thrown when every candidate was skipped or failed.
 */
export class AllBackendsExhaustedError extends Error {
  readonly code = 'ALL_BACKENDS_EXHAUSTED';
  /** One record per candidate, in attempt order. */
  readonly failures: readonly FailureRecord[];

  constructor(failures: readonly FailureRecord[]) {
    const summary = failures.map((f) => `${f.modelKey}: ${f.reason}`).join(', ');
    super(`All backends exhausted (${summary})`);
    this.name = 'AllBackendsExhaustedError';
    this.failures = failures;
  }

  /** Failure reasons in attempt order. */
  get reasons(): FailureReason[] {
    return this.failures.map((f) => f.reason);
  }
}

/**
 * Error thrown when a router is assembled with an invalid configuration.
 */
export class RouterConfigError extends Error {
  readonly code = 'ROUTER_CONFIG_INVALID';

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'RouterConfigError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
