import type { ComposedPrompt } from "../core/prompt/index.js";
import type { ProviderId } from "./catalog.js";

export interface ProviderRequest {
  prompt: ComposedPrompt;
  model: string;
  /** Caller-supplied key; never logged */
  apiKey: string;
  temperature: number;
  maxOutputTokens: number;
}

/**
 * LLMProvider interface – one implementation per provider.
 * `send` makes at most one network call and returns the raw completion text.
 * Failures surface as GenerationError subclasses (see core/errors.ts).
 */
export interface LLMProvider {
  readonly id: ProviderId;
  readonly name: string;
  /** false for declared-but-unimplemented providers, which fail without a call */
  readonly supported: boolean;

  send(request: ProviderRequest): Promise<string>;
}
