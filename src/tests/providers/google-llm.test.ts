import { describe, it, expect, vi, beforeEach } from "vitest";

// ── Mock the Google GenAI SDK ──────────────────────────────────────
const mockGenerateContent = vi.fn();
vi.mock("@google/genai", () => {
  return {
    GoogleGenAI: class MockGoogleGenAI {
      models = {
        generateContent: mockGenerateContent,
      };
    },
  };
});

import { GoogleLLM } from "../../providers/google-llm.js";
import type { ProviderRequest } from "../../providers/llm-provider.js";
import { composePrompt } from "../../core/prompt/index.js";
import { AuthenticationError, RateLimitError, ProviderError } from "../../core/errors.js";

function makeRequest(overrides: Partial<ProviderRequest> = {}): ProviderRequest {
  return {
    prompt: composePrompt({ framework: "LangGraph", sourceText: "Support triage" }),
    model: "gemini-1.5-pro",
    apiKey: "test-key",
    temperature: 0.3,
    maxOutputTokens: 1200,
    ...overrides,
  };
}

describe("GoogleLLM", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should send the combined instruction as one prompt", async () => {
    mockGenerateContent.mockResolvedValueOnce({ text: "workflow = StateGraph(AgentState)" });

    const request = makeRequest();
    const result = await new GoogleLLM().send(request);

    expect(result).toBe("workflow = StateGraph(AgentState)");
    expect(mockGenerateContent).toHaveBeenCalledWith({
      model: "gemini-1.5-pro",
      contents: request.prompt.instruction,
      config: { temperature: 0.3, maxOutputTokens: 1200 },
    });
  });

  it("should reject a missing key before calling the API", async () => {
    await expect(new GoogleLLM().send(makeRequest({ apiKey: "" }))).rejects.toThrow(
      "Google Gemini requires an API key",
    );
    expect(mockGenerateContent).not.toHaveBeenCalled();
  });

  it("should treat Gemini's invalid-key 400 as an authentication failure", async () => {
    mockGenerateContent.mockRejectedValueOnce(
      Object.assign(new Error("API key not valid. Please pass a valid API key."), { status: 400 }),
    );
    await expect(new GoogleLLM().send(makeRequest())).rejects.toBeInstanceOf(AuthenticationError);
  });

  it("should map a 429 to RateLimitError", async () => {
    mockGenerateContent.mockRejectedValueOnce(
      Object.assign(new Error("Resource has been exhausted"), { status: 429 }),
    );
    await expect(new GoogleLLM().send(makeRequest())).rejects.toBeInstanceOf(RateLimitError);
  });

  it("should treat other 400s as provider errors", async () => {
    mockGenerateContent.mockRejectedValueOnce(
      Object.assign(new Error("Invalid argument"), { status: 400 }),
    );
    await expect(new GoogleLLM().send(makeRequest())).rejects.toBeInstanceOf(ProviderError);
  });

  it("should reject an empty completion", async () => {
    mockGenerateContent.mockResolvedValueOnce({ text: undefined });
    await expect(new GoogleLLM().send(makeRequest())).rejects.toThrow(
      "Google Gemini failed: returned an empty response",
    );
  });
});
