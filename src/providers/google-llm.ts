import { GoogleGenAI } from "@google/genai";
import type { LLMProvider, ProviderRequest } from "./llm-provider.js";
import { classifyProviderError } from "./provider-errors.js";
import { AuthenticationError, ProviderError } from "../core/errors.js";

/**
 * Google Gemini provider.
 * Gemini gets the system and user prompt as one instruction string.
 */
export class GoogleLLM implements LLMProvider {
  readonly id = "gemini" as const;
  readonly name = "Google Gemini";
  readonly supported = true;

  constructor(private readonly options: { timeoutMs?: number } = {}) {}

  async send(request: ProviderRequest): Promise<string> {
    const apiKey = request.apiKey.trim();
    if (!apiKey) {
      throw new AuthenticationError(this.name);
    }

    const client = new GoogleGenAI({
      apiKey,
      httpOptions: { timeout: this.options.timeoutMs ?? 60_000 },
    });

    let text: string | undefined;
    try {
      const response = await client.models.generateContent({
        model: request.model,
        contents: request.prompt.instruction,
        config: {
          temperature: request.temperature,
          maxOutputTokens: request.maxOutputTokens,
        },
      });
      text = response.text;
    } catch (error) {
      throw classifyProviderError(this.name, error);
    }

    if (!text || !text.trim()) {
      throw new ProviderError(this.name, "returned an empty response");
    }

    return text;
  }
}
