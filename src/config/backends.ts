/**
 * Backends assembled from configured model entries.
 *
 * @packageDocumentation
 */

import { getKnownModel } from '../router/catalog.js';
import { RouterConfigError } from '../router/errors.js';
import type {
  BackendInvoker,
  InvocationResponse,
  ModelLimits,
  ModelPricing,
} from '../router/types.js';
import type { GovernorConfig, ModelConfig } from './types.js';
import { isValidModelKey } from './validator.js';

/**
 * Resolves the limits and pricing of `modelKey`: fields set under
 * `[models."provider/model"]` win, the rest come from the built-in catalog at
 * the configured tier.
 *
 * @param config - Parsed configuration.
 * @param modelKey - `provider/modelName`.
 * @throws RouterConfigError if the key is malformed or a limit is known
 * neither from the file nor from the catalog.
 */
export function resolveModel(
  config: GovernorConfig,
  modelKey: string
): { limits: ModelLimits; pricing: ModelPricing | undefined } {
  if (!isValidModelKey(modelKey)) {
    throw new RouterConfigError(`Model key '${modelKey}' must have the form 'provider/modelName'`);
  }
  const slash = modelKey.indexOf('/');
  const provider = modelKey.slice(0, slash);
  const modelName = modelKey.slice(slash + 1);

  const entry: ModelConfig = config.models[modelKey] ?? {};
  const known = getKnownModel(modelKey, config.routing.tier);

  const requestsPerMinute = entry.requests_per_minute ?? known?.limits.requestsPerMinute;
  const tokensPerMinute = entry.tokens_per_minute ?? known?.limits.tokensPerMinute;
  const maxContextTokens = entry.max_context_tokens ?? known?.limits.maxContextTokens;
  if (
    requestsPerMinute === undefined ||
    tokensPerMinute === undefined ||
    maxContextTokens === undefined
  ) {
    throw new RouterConfigError(
      `No limits for '${modelKey}': set requests_per_minute, tokens_per_minute and max_context_tokens under [models."${modelKey}"]`
    );
  }

  const requestsPerDay = entry.requests_per_day ?? known?.limits.requestsPerDay;
  const limits: ModelLimits =
    requestsPerDay === undefined
      ? { provider, modelName, requestsPerMinute, tokensPerMinute, maxContextTokens }
      : { provider, modelName, requestsPerMinute, tokensPerMinute, maxContextTokens, requestsPerDay };

  let pricing = known?.pricing;
  if (entry.input_per_1m !== undefined || entry.output_per_1m !== undefined) {
    pricing = {
      inputPer1M: entry.input_per_1m ?? known?.pricing.inputPer1M ?? 0,
      outputPer1M: entry.output_per_1m ?? known?.pricing.outputPer1M ?? 0,
    };
  }

  return { limits, pricing };
}

/**
 * Creates a backend for `modelKey` from the configuration.
 *
 * @param config - Parsed configuration.
 * @param modelKey - `provider/modelName`.
 * @param invoke - Sends a payload to the model.
 * @throws RouterConfigError if the model's limits cannot be resolved.
 *
 * @example
 * ```typescript
 * const config = await loadConfig('governor.toml');
 * const mini = createBackend(config, 'openai/gpt-4o-mini', (prompt: string) => client.chat(prompt));
 * ```
 */
export function createBackend<TPayload, TResponse extends InvocationResponse>(
  config: GovernorConfig,
  modelKey: string,
  invoke: (payload: TPayload) => Promise<TResponse>
): BackendInvoker<TPayload, TResponse> {
  const { limits, pricing } = resolveModel(config, modelKey);
  return {
    provider: limits.provider,
    modelName: limits.modelName,
    limits,
    pricing,
    invoke,
  };
}
