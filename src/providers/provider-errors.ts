import {
  AuthenticationError,
  GenerationError,
  NetworkError,
  ProviderError,
  RateLimitError,
} from "../core/errors.js";

/** HTTP status carried by SDK errors (openai APIError, @google/genai ApiError). */
function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    if (typeof status === "number") return status;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map an SDK or transport error to the generation error taxonomy.
 *
 *   401 / 403             → AuthenticationError
 *   400 "API key not valid" (Gemini) → AuthenticationError
 *   429                   → RateLimitError
 *   no HTTP status        → NetworkError
 *   any other status      → ProviderError
 */
export function classifyProviderError(provider: string, error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;

  const status = statusOf(error);
  const message = messageOf(error);

  if (status === 401 || status === 403) return new AuthenticationError(provider, message);
  if (status === 400 && /api key not valid/i.test(message)) {
    return new AuthenticationError(provider, message);
  }
  if (status === 429) return new RateLimitError(provider, message);
  if (status === undefined) return new NetworkError(provider, message);

  return new ProviderError(provider, message, status);
}
