import { describe, it, expect, afterEach } from "vitest";
import { buildServer } from "../server/app.js";
import { CodeGenerator } from "../core/pipeline/generator.js";
import { MockLLM } from "../providers/mock-llm.js";
import type { LLMProvider } from "../providers/llm-provider.js";
import { AuthenticationError } from "../core/errors.js";
import { loadConfig } from "../config.js";

const rejectingProvider: LLMProvider = {
  id: "openai",
  name: "Rejecting",
  supported: true,
  send: async () => {
    throw new AuthenticationError("OpenAI", "Incorrect API key provided");
  },
};

const emptyFenceProvider: LLMProvider = {
  id: "gemini",
  name: "Empty",
  supported: true,
  send: async () => "I could not write this one.\n\n```python\n```\n",
};

function makeServer() {
  const generator = new CodeGenerator({
    providers: { gemini: new MockLLM("gemini"), openai: rejectingProvider },
    retry: { retries: 1, backoffMs: 0 },
  });
  return buildServer({ config: loadConfig({}), generator, logger: false });
}

describe("HTTP API", () => {
  let server: ReturnType<typeof buildServer> | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("GET /health reports the defaults", async () => {
    server = makeServer();
    const res = await server.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", defaultProvider: "gemini", syntaxChecker: "builtin" });
  });

  it("GET /frameworks lists the frameworks with install commands", async () => {
    server = makeServer();
    const res = await server.inject({ method: "GET", url: "/frameworks" });
    const body = res.json<{ frameworks: Array<{ framework: string; install: string }>; count: number }>();
    expect(body.count).toBe(3);
    expect(body.frameworks[0]).toEqual({
      framework: "LangGraph",
      summary: "Best for stateful workflows and complex decision trees",
      install: "pip install langgraph python-dotenv google-generativeai",
    });
  });

  it("GET /templates filters by framework", async () => {
    server = makeServer();
    const res = await server.inject({ method: "GET", url: "/templates?framework=AutoGen" });
    const body = res.json<{ templates: Array<{ id: string }>; count: number }>();
    expect(body.templates.map((t) => t.id)).toEqual(["autogen-code-review", "autogen-data-analysis"]);
  });

  it("GET /templates rejects an unknown framework", async () => {
    server = makeServer();
    const res = await server.inject({ method: "GET", url: "/templates?framework=Haystack" });
    expect(res.statusCode).toBe(400);
  });

  it("GET /providers lists the catalog", async () => {
    server = makeServer();
    const res = await server.inject({ method: "GET", url: "/providers" });
    expect(res.json<{ count: number }>().count).toBe(3);
  });

  it("POST /generate returns the run and download artifacts", async () => {
    server = makeServer();
    const res = await server.inject({
      method: "POST",
      url: "/generate",
      payload: { templateId: "crewai-research-team", apiKey: "test-key" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json<{
      state: string;
      response: { isValidSyntax: boolean; extractedCode: string };
      artifacts: Array<{ fileName: string; content: string }>;
    }>();
    expect(body.state).toBe("Done");
    expect(body.response.isValidSyntax).toBe(true);
    expect(body.artifacts.map((a) => a.fileName)).toEqual(["crewai_system.py", "requirements.txt"]);
    expect(body.artifacts[1]?.content).toBe("crewai python-dotenv google-generativeai\n");
    expect(res.body).not.toContain("test-key");
  });

  it("POST /generate maps InvalidInputError to 400", async () => {
    server = makeServer();
    const res = await server.inject({
      method: "POST",
      url: "/generate",
      payload: { framework: "CrewAI", prompt: "  ", apiKey: "test-key" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ kind: "InvalidInputError", failedDuring: "Composing" });
  });

  it("POST /generate rejects an unknown framework with 400", async () => {
    server = makeServer();
    const res = await server.inject({
      method: "POST",
      url: "/generate",
      payload: { framework: "Haystack", prompt: "Search agents", apiKey: "test-key" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ kind: "InvalidInputError" });
  });

  it("POST /generate maps AuthenticationError to 401", async () => {
    server = makeServer();
    const res = await server.inject({
      method: "POST",
      url: "/generate",
      payload: { provider: "openai", templateId: "crewai-research-team", apiKey: "test-secret" },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({
      kind: "AuthenticationError",
      error: "OpenAI rejected the API key: Incorrect API key provided",
    });
    expect(res.body).not.toContain("test-secret");
  });

  it("POST /generate maps the unsupported provider to 501", async () => {
    server = makeServer();
    const res = await server.inject({
      method: "POST",
      url: "/generate",
      payload: { provider: "anthropic", templateId: "crewai-research-team", apiKey: "k" },
    });
    expect(res.statusCode).toBe(501);
    expect(res.json()).toMatchObject({ kind: "UnsupportedProviderError" });
  });

  it("POST /generate requires an apiKey field", async () => {
    server = makeServer();
    const res = await server.inject({
      method: "POST",
      url: "/generate",
      payload: { templateId: "crewai-research-team" },
    });
    expect(res.statusCode).toBe(400);
  });

  it("POST /download returns the code file as an attachment", async () => {
    server = makeServer();
    const res = await server.inject({
      method: "POST",
      url: "/download",
      payload: { templateId: "langgraph-customer-support", apiKey: "test-key" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-disposition"]).toBe('attachment; filename="langgraph_system.py"');
    expect(res.headers["x-syntax-valid"]).toBe("true");
    expect(res.body.startsWith("from langgraph.graph import StateGraph, END\n")).toBe(true);
    expect(res.body.endsWith("app = workflow.compile()\n")).toBe(true);
  });

  it("POST /download answers 502 when the reply holds no code", async () => {
    server = buildServer({
      config: loadConfig({}),
      generator: new CodeGenerator({ providers: { gemini: emptyFenceProvider } }),
      logger: false,
    });
    const res = await server.inject({
      method: "POST",
      url: "/download",
      payload: { templateId: "crewai-research-team", apiKey: "test-key" },
    });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toMatchObject({ error: "The provider returned no code", kind: "ProviderError" });
  });
});
