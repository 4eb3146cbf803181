/**
 * Context-fit module.
 *
 * @packageDocumentation
 */

export {
  ContextFitPolicy,
  ContextTooLargeError,
  estimateTokensSimple,
  estimateTokensWordBased,
  extractText,
  simpleTokenCounter,
  wordTokenCounter,
  type TokenCounter,
  type ContextCandidate,
  type FitResult,
  type ContextFitPolicyOptions,
} from './context-fit.js';
