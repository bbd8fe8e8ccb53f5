import { ZodError } from "zod";

// ── Error taxonomy ────────────────────────────────────────────────────
// Every error that aborts a generation attempt carries a `kind`.
// SyntaxCheckFailure is advisory and is never thrown: it is recorded
// on the LLMResponse instead (see validation/responseValidator.ts).

export const ERROR_KINDS = [
  "InvalidInputError",
  "AuthenticationError",
  "RateLimitError",
  "NetworkError",
  "UnsupportedProviderError",
  "ProviderError",
] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = kind;
  }
}

export class InvalidInputError extends GenerationError {
  constructor(message: string, suggestion?: string) {
    super(message, "InvalidInputError", suggestion);
  }
}

export class AuthenticationError extends GenerationError {
  constructor(provider: string, detail?: string) {
    super(
      detail ? `${provider} rejected the API key: ${detail}` : `${provider} requires an API key`,
      "AuthenticationError",
      `Check the ${provider} API key and try again.`,
    );
  }
}

export class RateLimitError extends GenerationError {
  constructor(provider: string, detail?: string) {
    super(
      `${provider} is throttling requests${detail ? `: ${detail}` : ""}`,
      "RateLimitError",
      "Wait a moment before generating again, or pick another model.",
    );
  }
}

export class NetworkError extends GenerationError {
  constructor(provider: string, detail: string) {
    super(`Could not reach ${provider}: ${detail}`, "NetworkError");
  }
}

export class UnsupportedProviderError extends GenerationError {
  constructor(provider: string) {
    super(
      `Provider "${provider}" is not implemented yet`,
      "UnsupportedProviderError",
      "Choose gemini or openai.",
    );
  }
}

/** Any other provider-side failure: a non-auth HTTP error or an empty completion. */
export class ProviderError extends GenerationError {
  constructor(
    provider: string,
    detail: string,
    public readonly status?: number,
  ) {
    super(
      status === undefined
        ? `${provider} failed: ${detail}`
        : `${provider} failed with HTTP ${status}: ${detail}`,
      "ProviderError",
      "Try again, or lower the temperature / pick a different model.",
    );
  }
}

/** Type guard for GenerationError */
export function isGenerationError(err: unknown): err is GenerationError {
  return err instanceof GenerationError;
}

/** Turn a zod failure on caller input into an InvalidInputError. */
export function fromZodError(error: ZodError): InvalidInputError {
  const detail = error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
    .join(", ");
  return new InvalidInputError(`Invalid generation request: ${detail}`);
}
