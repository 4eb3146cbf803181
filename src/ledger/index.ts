/**
 * Usage ledger module.
 *
 * Sliding-window request and token accounting per backend.
 *
 * @packageDocumentation
 */

export { UsageLedger } from './ledger.js';
export {
  WINDOW_MS,
  DAY_MS,
  type UsageEvent,
  type WindowUsage,
  type UsageLedgerOptions,
} from './types.js';
