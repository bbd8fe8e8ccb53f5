/**
 * Provider factory – one client per provider id, chosen explicitly.
 *
 * There is no auto-detection and no fallback: an unimplemented provider
 * resolves to UnsupportedLLM, which fails on send.
 *
 * Usage:
 *   import { createLLMProvider } from "../providers/index.js";
 *   const llm = createLLMProvider("openai");
 */
export { MockLLM } from "./mock-llm.js";
export { OpenAILLM } from "./openai-llm.js";
export { GoogleLLM } from "./google-llm.js";
export { UnsupportedLLM } from "./unsupported-llm.js";
export { classifyProviderError } from "./provider-errors.js";
export { withRateLimitRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry.js";
export {
  ProviderIdSchema,
  type ProviderId,
  type ProviderCatalogEntry,
  DEFAULT_PROVIDER,
  getProviderEntry,
  listProviders,
  resolveModel,
} from "./catalog.js";
export type { LLMProvider, ProviderRequest } from "./llm-provider.js";

import type { LLMProvider } from "./llm-provider.js";
import type { ProviderId } from "./catalog.js";
import { getProviderEntry } from "./catalog.js";
import { GoogleLLM } from "./google-llm.js";
import { OpenAILLM } from "./openai-llm.js";
import { UnsupportedLLM } from "./unsupported-llm.js";

export function createLLMProvider(id: ProviderId, options?: { timeoutMs?: number }): LLMProvider {
  switch (id) {
    case "gemini":
      return new GoogleLLM(options);
    case "openai":
      return new OpenAILLM(options);
    case "anthropic":
      return new UnsupportedLLM(id, getProviderEntry(id).displayName);
    default: {
      const unreachable: never = id;
      throw new Error(`Unknown provider: ${String(unreachable)}`);
    }
  }
}
