import { v4 as uuidv4 } from "uuid";
import pino from "pino";
import {
  GenerationRunSchema,
  type GenerationInput,
  type GenerationRun,
  type GenerationState,
  type RequestSummary,
} from "../schemas/index.js";
import {
  resolveGenerationRequest,
  summarizeInput,
  type RequestDefaults,
} from "../schemas/resolveRequest.js";
import { composePrompt } from "../prompt/index.js";
import { ResponseValidator } from "../validation/index.js";
import { UnsupportedProviderError, isGenerationError } from "../errors.js";
import {
  createLLMProvider,
  DEFAULT_PROVIDER,
  DEFAULT_RETRY_POLICY,
  withRateLimitRetry,
  type LLMProvider,
  type ProviderId,
  type RetryPolicy,
} from "../../providers/index.js";

const logger = pino({ name: "code-generator" });

export interface CodeGeneratorConfig {
  /** Override the client for a provider id (tests, offline runs). */
  providers?: Partial<Record<ProviderId, LLMProvider>>;
  validator?: ResponseValidator;
  retry?: RetryPolicy;
  defaults?: Partial<RequestDefaults>;
  maxOutputTokens?: number;
  /** Provider client timeout */
  timeoutMs?: number;
}

/**
 * Code Generator
 * Runs one generation attempt:
 *   Idle → Composing → Requesting → Validating → Done
 * Any step can end in Failed. Only a rate-limited request is retried.
 *
 * Taxonomy errors become a Failed run with the error reported verbatim;
 * anything else is a bug and is re-thrown.
 */
export class CodeGenerator {
  /** One client per provider id, fixed at construction and shared read-only by every run. */
  readonly providers: Readonly<Record<ProviderId, LLMProvider>>;
  private readonly validator: ResponseValidator;
  private readonly retry: RetryPolicy;
  private readonly defaults: RequestDefaults;
  private readonly maxOutputTokens: number;

  constructor(config: CodeGeneratorConfig = {}) {
    const clientOptions = { timeoutMs: config.timeoutMs };
    this.providers = Object.freeze({
      gemini: config.providers?.gemini ?? createLLMProvider("gemini", clientOptions),
      openai: config.providers?.openai ?? createLLMProvider("openai", clientOptions),
      anthropic: config.providers?.anthropic ?? createLLMProvider("anthropic", clientOptions),
    });
    this.validator = config.validator ?? new ResponseValidator();
    this.retry = config.retry ?? DEFAULT_RETRY_POLICY;
    this.defaults = {
      provider: config.defaults?.provider ?? DEFAULT_PROVIDER,
      temperature: config.defaults?.temperature ?? 0.5,
    };
    this.maxOutputTokens = config.maxOutputTokens ?? 1200;
  }

  async run(input: GenerationInput): Promise<GenerationRun> {
    const runId = uuidv4();
    const startedAt = new Date().toISOString();
    const transitions: GenerationState[] = ["Idle"];
    let state: GenerationState = "Idle";
    let attempts = 0;
    let summary: RequestSummary = summarizeInput(input);

    const enter = (next: GenerationState): void => {
      state = next;
      transitions.push(next);
      logger.debug({ runId, state: next }, "State changed");
    };

    logger.info({ runId, ...summary }, "Generation started");

    try {
      // 1. Composing
      enter("Composing");
      const request = resolveGenerationRequest(input, this.defaults);
      summary = {
        framework: request.framework,
        provider: request.provider,
        model: request.model,
        templateId: request.templateId,
        temperature: request.temperature,
      };
      logger.info({ runId, ...summary, source: request.sourceText.slice(0, 100) }, "Request resolved");
      const prompt = composePrompt(request);

      // 2. Requesting
      enter("Requesting");
      const provider = this.providers[request.provider];
      if (!provider.supported) {
        throw new UnsupportedProviderError(request.provider);
      }

      const rawText = await withRateLimitRetry(
        () =>
          provider.send({
            prompt,
            model: request.model,
            apiKey: request.apiKey,
            temperature: request.temperature,
            maxOutputTokens: this.maxOutputTokens,
          }),
        this.retry,
        (attempt) => {
          attempts = attempt;
        },
      );

      // 3. Validating
      enter("Validating");
      const outcome = this.validator.validate(rawText, request.framework);

      enter("Done");
      const run = GenerationRunSchema.parse({
        runId,
        state: "Done",
        request: summary,
        attempts,
        transitions,
        startedAt,
        completedAt: new Date().toISOString(),
        response: { rawText, ...outcome },
      });

      logger.info(
        { runId, attempts, isValidSyntax: outcome.isValidSyntax, codeSource: outcome.codeSource },
        "Generation completed",
      );
      return run;
    } catch (error) {
      if (!isGenerationError(error)) {
        logger.error(
          { runId, state, error: error instanceof Error ? error.message : String(error) },
          "Generation crashed",
        );
        throw error;
      }

      const failedDuring = state;
      transitions.push("Failed");
      logger.warn({ runId, failedDuring, kind: error.kind, error: error.message }, "Generation failed");

      return GenerationRunSchema.parse({
        runId,
        state: "Failed",
        request: summary,
        attempts,
        transitions,
        startedAt,
        completedAt: new Date().toISOString(),
        failedDuring,
        error: { kind: error.kind, message: error.message, suggestion: error.suggestion },
      });
    }
  }
}
