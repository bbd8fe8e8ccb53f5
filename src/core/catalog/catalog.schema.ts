import { z } from "zod";

// ── Framework Tags ────────────────────────────────────────────────────
export const FrameworkTagSchema = z.enum(["LangGraph", "CrewAI", "AutoGen"]);
export type FrameworkTag = z.infer<typeof FrameworkTagSchema>;

// ── Template ──────────────────────────────────────────────────────────
export const TemplateSchema = z.object({
  /** Stable identifier, e.g. "crewai-research-team" */
  id: z.string().min(1).regex(/^[a-z0-9-]+$/, "Template id must be kebab-case"),
  displayName: z.string().min(1),
  framework: FrameworkTagSchema,
  /** Use-case description that becomes the prompt's source text */
  description: z.string().min(1),
});
export type Template = z.infer<typeof TemplateSchema>;

// ── Framework Profile ─────────────────────────────────────────────────
export const FrameworkProfileSchema = z.object({
  framework: FrameworkTagSchema,
  /** One-line pitch shown next to the framework picker */
  summary: z.string().min(1),
  /** Structural hint appended to the user prompt */
  structuralHint: z.string().min(1),
  /** Imports and class usage the generated code must contain */
  requiredUsage: z.string().min(1),
  systemPrompt: z.string().min(1),
  /** pip package the generated code depends on */
  pipPackage: z.string().min(1),
});
export type FrameworkProfile = z.infer<typeof FrameworkProfileSchema>;
