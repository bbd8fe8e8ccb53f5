import { z } from "zod";
import { ProviderIdSchema } from "./providers/catalog.js";

// ── Environment Schema ────────────────────────────────────────────────
// API keys are deliberately absent: they come from the caller per request.
const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3100),
  HOST: z.string().min(1).default("0.0.0.0"),
  DEFAULT_PROVIDER: ProviderIdSchema.default("gemini"),
  DEFAULT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.5),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(1200),
  RATE_LIMIT_RETRIES: z.coerce.number().int().min(0).max(3).default(1),
  RATE_LIMIT_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  SYNTAX_CHECKER: z.enum(["builtin", "python"]).default("builtin"),
  PYTHON_BIN: z.string().min(1).default("python3"),
});

export interface AppConfig {
  server: { port: number; host: string };
  generation: {
    defaultProvider: z.infer<typeof ProviderIdSchema>;
    defaultTemperature: number;
    maxOutputTokens: number;
  };
  rateLimit: { retries: number; backoffMs: number };
  syntax: { checker: "builtin" | "python"; pythonBin: string };
}

/**
 * Build the app configuration from environment variables.
 * Throws on values that are present but malformed (e.g. PORT=abc).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = EnvSchema.parse(present);

  return {
    server: { port: parsed.PORT, host: parsed.HOST },
    generation: {
      defaultProvider: parsed.DEFAULT_PROVIDER,
      defaultTemperature: parsed.DEFAULT_TEMPERATURE,
      maxOutputTokens: parsed.MAX_OUTPUT_TOKENS,
    },
    rateLimit: {
      retries: parsed.RATE_LIMIT_RETRIES,
      backoffMs: parsed.RATE_LIMIT_BACKOFF_MS,
    },
    syntax: { checker: parsed.SYNTAX_CHECKER, pythonBin: parsed.PYTHON_BIN },
  };
}
