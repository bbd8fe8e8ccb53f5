import { z } from "zod";
import { InvalidInputError } from "../core/errors.js";

export const ProviderIdSchema = z.enum(["gemini", "openai", "anthropic"]);
export type ProviderId = z.infer<typeof ProviderIdSchema>;

export interface ProviderCatalogEntry {
  id: ProviderId;
  displayName: string;
  models: readonly string[];
  defaultModel: string;
  /** false for providers that are declared but have no client yet */
  supported: boolean;
}

export const DEFAULT_PROVIDER: ProviderId = "gemini";

const CATALOG: Readonly<Record<ProviderId, ProviderCatalogEntry>> = Object.freeze({
  gemini: {
    id: "gemini",
    displayName: "Google Gemini",
    models: ["gemini-1.5-pro", "gemini-1.0-pro"],
    defaultModel: "gemini-1.5-pro",
    supported: true,
  },
  openai: {
    id: "openai",
    displayName: "OpenAI",
    models: ["gpt-4-turbo", "gpt-3.5-turbo"],
    defaultModel: "gpt-4-turbo",
    supported: true,
  },
  anthropic: {
    id: "anthropic",
    displayName: "Anthropic",
    models: ["claude-3-opus-20240229", "claude-3-sonnet-20240229"],
    defaultModel: "claude-3-opus-20240229",
    supported: false,
  },
});

export function getProviderEntry(id: ProviderId): ProviderCatalogEntry {
  return CATALOG[id];
}

export function listProviders(): ProviderCatalogEntry[] {
  return ProviderIdSchema.options.map((id) => CATALOG[id]);
}

/**
 * Pick the model for a provider. No model → the provider's default;
 * a model the provider does not list is rejected.
 */
export function resolveModel(provider: ProviderId, model?: string): string {
  const entry = CATALOG[provider];
  if (model === undefined || model.trim() === "") return entry.defaultModel;

  if (!entry.models.includes(model)) {
    throw new InvalidInputError(
      `Model "${model}" is not available for provider "${provider}"`,
      `Valid models: ${entry.models.join(", ")}`,
    );
  }
  return model;
}
