import { z } from "zod";
import { FrameworkTagSchema } from "../catalog/catalog.schema.js";
import { ProviderIdSchema } from "../../providers/catalog.js";
import { ERROR_KINDS } from "../errors.js";

// ── Generation Input (caller-facing) ─────────────────────────────────
// Exactly one of templateId / prompt supplies the source text; that rule
// is enforced in resolveGenerationRequest so it can raise InvalidInputError.
export const GenerationInputSchema = z.object({
  framework: FrameworkTagSchema.optional(),
  provider: ProviderIdSchema.optional(),
  model: z.string().optional(),
  apiKey: z.string(),
  templateId: z.string().optional(),
  prompt: z.string().optional(),
  temperature: z.number().min(0).max(1).optional(),
});
export type GenerationInput = z.infer<typeof GenerationInputSchema>;

// ── Generation Request (resolved) ─────────────────────────────────────
export const GenerationRequestSchema = z.object({
  framework: FrameworkTagSchema,
  provider: ProviderIdSchema,
  model: z.string().min(1),
  apiKey: z.string(),
  sourceText: z.string(),
  templateId: z.string().optional(),
  temperature: z.number().min(0).max(1),
});
export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;

// ── Syntax Check ──────────────────────────────────────────────────────
export const SyntaxCheckFailureSchema = z.object({
  kind: z.literal("SyntaxCheckFailure"),
  message: z.string().min(1),
  line: z.number().int().positive().optional(),
  column: z.number().int().positive().optional(),
});
export type SyntaxCheckFailure = z.infer<typeof SyntaxCheckFailureSchema>;

export const FrameworkMarkersSchema = z.object({
  matched: z.boolean(),
  missing: z.array(z.string()),
});
export type FrameworkMarkers = z.infer<typeof FrameworkMarkersSchema>;

export const CodeSourceSchema = z.enum(["fenced", "unterminated-fence", "whole-text"]);
export type CodeSource = z.infer<typeof CodeSourceSchema>;

// ── LLM Response ──────────────────────────────────────────────────────
export const ErrorKindSchema = z.enum(ERROR_KINDS);

export const LLMResponseSchema = z.object({
  rawText: z.string(),
  extractedCode: z.string().optional(),
  isValidSyntax: z.boolean(),
  syntaxError: SyntaxCheckFailureSchema.optional(),
  error: ErrorKindSchema.optional(),
  codeSource: CodeSourceSchema.optional(),
  /** Info string of the fence the code came from, e.g. "python" */
  language: z.string().optional(),
  frameworkMarkers: FrameworkMarkersSchema.optional(),
});
export type LLMResponse = z.infer<typeof LLMResponseSchema>;

// ── Generation Run ────────────────────────────────────────────────────
export const GenerationStateSchema = z.enum([
  "Idle",
  "Composing",
  "Requesting",
  "Validating",
  "Done",
  "Failed",
]);
export type GenerationState = z.infer<typeof GenerationStateSchema>;

/** A request with the API key removed, safe to log and return. */
export const RequestSummarySchema = z.object({
  framework: FrameworkTagSchema.optional(),
  provider: ProviderIdSchema.optional(),
  model: z.string().optional(),
  templateId: z.string().optional(),
  temperature: z.number().optional(),
});
export type RequestSummary = z.infer<typeof RequestSummarySchema>;

const RunBaseSchema = z.object({
  runId: z.string().uuid(),
  request: RequestSummarySchema,
  attempts: z.number().int().min(0),
  transitions: z.array(GenerationStateSchema).min(1),
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime(),
});

export const GenerationRunSchema = z.discriminatedUnion("state", [
  RunBaseSchema.extend({
    state: z.literal("Done"),
    response: LLMResponseSchema,
  }),
  RunBaseSchema.extend({
    state: z.literal("Failed"),
    failedDuring: GenerationStateSchema,
    error: z.object({
      kind: ErrorKindSchema,
      message: z.string(),
      suggestion: z.string().optional(),
    }),
  }),
]);
export type GenerationRun = z.infer<typeof GenerationRunSchema>;
export type CompletedRun = Extract<GenerationRun, { state: "Done" }>;
export type FailedRun = Extract<GenerationRun, { state: "Failed" }>;
