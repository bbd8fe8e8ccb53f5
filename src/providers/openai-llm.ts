import OpenAI from "openai";
import type { LLMProvider, ProviderRequest } from "./llm-provider.js";
import { classifyProviderError } from "./provider-errors.js";
import { AuthenticationError, ProviderError } from "../core/errors.js";

/**
 * OpenAI LLM provider – chat completions with a system and a user message.
 *
 * The key arrives with each request, so a client is built per call.
 * SDK-level retries are off: rate-limit retry is the pipeline's job.
 */
export class OpenAILLM implements LLMProvider {
  readonly id = "openai" as const;
  readonly name = "OpenAI";
  readonly supported = true;

  constructor(private readonly options: { timeoutMs?: number; baseURL?: string } = {}) {}

  async send(request: ProviderRequest): Promise<string> {
    if (!request.apiKey.trim()) {
      throw new AuthenticationError(this.name);
    }

    const client = new OpenAI({
      apiKey: request.apiKey,
      maxRetries: 0,
      timeout: this.options.timeoutMs ?? 60_000,
      ...(this.options.baseURL ? { baseURL: this.options.baseURL } : {}),
    });

    let content: string | null | undefined;
    try {
      const response = await client.chat.completions.create({
        model: request.model,
        messages: [
          { role: "system", content: request.prompt.system },
          { role: "user", content: request.prompt.user },
        ],
        temperature: request.temperature,
        max_tokens: request.maxOutputTokens,
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw classifyProviderError(this.name, error);
    }

    if (!content) {
      throw new ProviderError(this.name, "returned an empty response");
    }

    return content;
  }
}
