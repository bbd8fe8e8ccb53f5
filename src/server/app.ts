import Fastify, { type FastifyReply } from "fastify";
import { CodeGenerator } from "../core/pipeline/generator.js";
import {
  FrameworkTagSchema,
  listFrameworks,
  listTemplates,
} from "../core/catalog/index.js";
import { ResponseValidator, createSyntaxChecker } from "../core/validation/index.js";
import { buildDownloadArtifacts, installCommand } from "../core/artifacts/index.js";
import type { ErrorKind } from "../core/errors.js";
import type { FailedRun, GenerationInput } from "../core/schemas/index.js";
import { listProviders } from "../providers/index.js";
import { loadConfig, type AppConfig } from "../config.js";

const HTTP_STATUS: Record<ErrorKind, number> = {
  InvalidInputError: 400,
  AuthenticationError: 401,
  RateLimitError: 429,
  UnsupportedProviderError: 501,
  NetworkError: 502,
  ProviderError: 502,
};

const generateBodySchema = {
  type: "object",
  required: ["apiKey"],
  properties: {
    framework: { type: "string" },
    provider: { type: "string" },
    model: { type: "string" },
    apiKey: { type: "string" },
    templateId: { type: "string" },
    prompt: { type: "string" },
    temperature: { type: "number" },
  },
} as const;

export interface ServerOptions {
  config?: AppConfig;
  /** Supply a pre-built generator (tests inject one with fake providers). */
  generator?: CodeGenerator;
  logger?: boolean;
}

export function buildServer(options: ServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const fastify = Fastify({ logger: options.logger ?? true });

  const generator =
    options.generator ??
    new CodeGenerator({
      validator: new ResponseValidator(createSyntaxChecker(config.syntax)),
      retry: config.rateLimit,
      defaults: {
        provider: config.generation.defaultProvider,
        temperature: config.generation.defaultTemperature,
      },
      maxOutputTokens: config.generation.maxOutputTokens,
    });

  function sendFailure(reply: FastifyReply, run: FailedRun) {
    return reply.code(HTTP_STATUS[run.error.kind]).send({
      error: run.error.message,
      kind: run.error.kind,
      suggestion: run.error.suggestion,
      runId: run.runId,
      failedDuring: run.failedDuring,
    });
  }

  // ── GET /frameworks ───────────────────────────────────────────────
  fastify.get("/frameworks", async (_req, reply) => {
    const frameworks = listFrameworks().map((p) => ({
      framework: p.framework,
      summary: p.summary,
      install: installCommand(p.framework),
    }));
    return reply.code(200).send({ frameworks, count: frameworks.length });
  });

  // ── GET /templates ────────────────────────────────────────────────
  fastify.get<{ Querystring: { framework?: string } }>("/templates", async (req, reply) => {
    const { framework } = req.query;
    if (framework === undefined) {
      const templates = listTemplates();
      return reply.code(200).send({ templates, count: templates.length });
    }

    const parsed = FrameworkTagSchema.safeParse(framework);
    if (!parsed.success) {
      return reply.code(400).send({ error: `Unknown framework: ${framework}`, kind: "InvalidInputError" });
    }
    const templates = listTemplates(parsed.data);
    return reply.code(200).send({ templates, count: templates.length });
  });

  // ── GET /providers ────────────────────────────────────────────────
  fastify.get("/providers", async (_req, reply) => {
    const providers = listProviders();
    return reply.code(200).send({ providers, count: providers.length });
  });

  // ── POST /generate ────────────────────────────────────────────────
  fastify.post<{ Body: GenerationInput }>("/generate", {
    schema: { body: generateBodySchema },
    handler: async (req, reply) => {
      const run = await generator.run(req.body);
      if (run.state === "Failed") return sendFailure(reply, run);

      const framework = run.request.framework;
      const artifacts =
        framework && run.response.extractedCode !== undefined
          ? buildDownloadArtifacts(framework, run.response.extractedCode)
          : [];
      return reply.code(200).send({ ...run, artifacts });
    },
  });

  // ── POST /download ────────────────────────────────────────────────
  fastify.post<{ Body: GenerationInput }>("/download", {
    schema: { body: generateBodySchema },
    handler: async (req, reply) => {
      const run = await generator.run(req.body);
      if (run.state === "Failed") return sendFailure(reply, run);

      // A Done run always names its framework; the code can still be blank.
      const framework = run.request.framework;
      const code = run.response.extractedCode ?? "";
      const [codeFile] = framework && code.trim() ? buildDownloadArtifacts(framework, code) : [];
      if (!codeFile) {
        return reply
          .code(502)
          .send({ error: "The provider returned no code", kind: "ProviderError", runId: run.runId });
      }

      return reply
        .code(200)
        .header("content-type", `${codeFile.mimeType}; charset=utf-8`)
        .header("content-disposition", `attachment; filename="${codeFile.fileName}"`)
        .header("x-syntax-valid", String(run.response.isValidSyntax))
        .send(codeFile.content);
    },
  });

  // ── Health check ──────────────────────────────────────────────────
  fastify.get("/health", async () => {
    return {
      status: "ok",
      defaultProvider: config.generation.defaultProvider,
      syntaxChecker: config.syntax.checker,
      timestamp: new Date().toISOString(),
    };
  });

  return fastify;
}
