/**
 * Fallback event adapters.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import type { FallbackEvent, FallbackHandler } from './types.js';

/**
 * Creates a fallback handler that writes each event as a `fallback_selected`
 * log entry.
 *
 * @param logger - Destination logger.
 *
 * @example
 * ```typescript
 * builder.onFallback(createFallbackLogger(new Logger({ component: 'Telemetry' })));
 * ```
 */
export function createFallbackLogger(logger: Logger): FallbackHandler {
  return (event: FallbackEvent): void => {
    logger.info('fallback_selected', {
      from: event.attemptedModel,
      to: event.fallbackModel,
      reason: event.reason,
      estimatedTokens: event.estimatedTokens,
      maxContextTokens: event.limits.maxContextTokens,
      requestsPerMinute: event.limits.requestsPerMinute,
    });
  };
}
