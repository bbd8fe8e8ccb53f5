import { describe, it, expect } from "vitest";
import {
  GenerationInputSchema,
  GenerationRunSchema,
  LLMResponseSchema,
  SyntaxCheckFailureSchema,
} from "../core/schemas/index.js";

const RUN_ID = "2f1c0a3e-8b4d-4c7e-9a61-5d2b7e0f4c19";
const NOW = "2026-01-15T10:00:00.000Z";

describe("Schema Validation", () => {
  it("should accept a template-based input", () => {
    expect(() =>
      GenerationInputSchema.parse({ templateId: "crewai-research-team", apiKey: "test-key" }),
    ).not.toThrow();
  });

  it("should reject an input without an API key field", () => {
    expect(() => GenerationInputSchema.parse({ templateId: "crewai-research-team" })).toThrow();
  });

  it("should reject an unknown framework", () => {
    expect(() =>
      GenerationInputSchema.parse({ framework: "Haystack", prompt: "x", apiKey: "test-key" }),
    ).toThrow();
  });

  it("should reject a temperature above 1", () => {
    expect(() =>
      GenerationInputSchema.parse({ framework: "AutoGen", prompt: "x", apiKey: "k", temperature: 1.5 }),
    ).toThrow();
  });

  it("should reject a syntax failure without a message", () => {
    expect(() => SyntaxCheckFailureSchema.parse({ kind: "SyntaxCheckFailure", message: "" })).toThrow();
  });

  it("should reject a response with an unknown error kind", () => {
    expect(() =>
      LLMResponseSchema.parse({ rawText: "", isValidSyntax: false, error: "TimeoutError" }),
    ).toThrow();
  });

  it("should validate a completed run", () => {
    const run = GenerationRunSchema.parse({
      runId: RUN_ID,
      state: "Done",
      request: { framework: "CrewAI", provider: "gemini", model: "gemini-1.5-pro" },
      attempts: 1,
      transitions: ["Idle", "Composing", "Requesting", "Validating", "Done"],
      startedAt: NOW,
      completedAt: NOW,
      response: { rawText: "x = 1", extractedCode: "x = 1", isValidSyntax: true, codeSource: "whole-text" },
    });
    expect(run.state).toBe("Done");
  });

  it("should require failedDuring on a failed run", () => {
    const failed = {
      runId: RUN_ID,
      state: "Failed",
      request: {},
      attempts: 0,
      transitions: ["Idle", "Composing", "Failed"],
      startedAt: NOW,
      completedAt: NOW,
      error: { kind: "InvalidInputError", message: "Prompt is empty" },
    };
    expect(() => GenerationRunSchema.parse(failed)).toThrow();
    expect(() => GenerationRunSchema.parse({ ...failed, failedDuring: "Composing" })).not.toThrow();
  });

  it("should reject a run id that is not a UUID", () => {
    expect(() =>
      GenerationRunSchema.parse({
        runId: "run-1",
        state: "Failed",
        request: {},
        attempts: 0,
        transitions: ["Idle"],
        startedAt: NOW,
        completedAt: NOW,
        failedDuring: "Idle",
        error: { kind: "NetworkError", message: "down" },
      }),
    ).toThrow();
  });
});
