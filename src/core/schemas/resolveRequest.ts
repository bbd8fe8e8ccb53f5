import {
  GenerationInputSchema,
  RequestSummarySchema,
  type GenerationInput,
  type GenerationRequest,
  type RequestSummary,
} from "./index.js";
import { getTemplate } from "../catalog/index.js";
import { resolveModel, type ProviderId } from "../../providers/catalog.js";
import { InvalidInputError, fromZodError } from "../errors.js";

export interface RequestDefaults {
  provider: ProviderId;
  temperature: number;
}

/**
 * Turn caller input into a GenerationRequest.
 *
 * Source text comes from exactly one of `templateId` or `prompt`. A template
 * fixes the framework; free text needs an explicit framework. Whether the
 * text is blank is left to the prompt composer.
 */
export function resolveGenerationRequest(
  input: GenerationInput,
  defaults: RequestDefaults,
): GenerationRequest {
  const parsed = GenerationInputSchema.safeParse(input);
  if (!parsed.success) throw fromZodError(parsed.error);
  const data = parsed.data;

  const hasTemplate = data.templateId !== undefined;
  const hasPrompt = data.prompt !== undefined;
  if (hasTemplate === hasPrompt) {
    throw new InvalidInputError(
      "Provide either a template or a free-text prompt, not both and not neither",
    );
  }

  let framework = data.framework;
  let sourceText: string;

  if (data.templateId !== undefined) {
    const template = getTemplate(data.templateId);
    if (!template) {
      throw new InvalidInputError(`Unknown template: ${data.templateId}`);
    }
    if (framework && framework !== template.framework) {
      throw new InvalidInputError(
        `Template "${template.id}" targets ${template.framework}, not ${framework}`,
      );
    }
    framework = template.framework;
    sourceText = template.description;
  } else {
    sourceText = data.prompt ?? "";
  }

  if (!framework) {
    throw new InvalidInputError("A framework is required when using a free-text prompt");
  }

  const provider = data.provider ?? defaults.provider;

  return {
    framework,
    provider,
    model: resolveModel(provider, data.model),
    apiKey: data.apiKey,
    sourceText,
    templateId: data.templateId,
    temperature: data.temperature ?? defaults.temperature,
  };
}

/**
 * Everything about the input except the key. Input that fails validation
 * (e.g. an unknown framework from an HTTP body) summarizes as empty.
 */
export function summarizeInput(input: Partial<GenerationInput>): RequestSummary {
  const parsed = RequestSummarySchema.safeParse({
    framework: input.framework,
    provider: input.provider,
    model: input.model,
    templateId: input.templateId,
    temperature: input.temperature,
  });
  return parsed.success ? parsed.data : {};
}
