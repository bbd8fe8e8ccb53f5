import type { LLMProvider, ProviderRequest } from "./llm-provider.js";
import type { ProviderId } from "./catalog.js";
import { UnsupportedProviderError } from "../core/errors.js";

/**
 * A provider that is listed in the catalog but has no client.
 * `send` throws before returning a promise, so no request is ever built.
 */
export class UnsupportedLLM implements LLMProvider {
  readonly supported = false;

  constructor(
    readonly id: ProviderId,
    readonly name: string,
  ) {}

  send(_request: ProviderRequest): Promise<string> {
    throw new UnsupportedProviderError(this.id);
  }
}
