import { getFrameworkProfile, type FrameworkTag } from "../catalog/index.js";
import { InvalidInputError } from "../errors.js";

export interface ComposeInput {
  framework: FrameworkTag;
  sourceText: string;
}

export interface ComposedPrompt {
  framework: FrameworkTag;
  /** Framework system prompt, sent as the system message where supported */
  system: string;
  /** Use-case request with the structural hint */
  user: string;
  /** system + user as one string, for providers that take a single prompt */
  instruction: string;
}

/**
 * Build the instruction for one generation.
 *
 * The source text is embedded verbatim; it is only trimmed to decide
 * whether it is empty.
 */
export function composePrompt(input: ComposeInput): ComposedPrompt {
  if (input.sourceText.trim().length === 0) {
    throw new InvalidInputError(
      "Describe the agent system to generate: the prompt is empty",
      "Pick a template or type a description.",
    );
  }

  const profile = getFrameworkProfile(input.framework);

  const user = [
    `Create a ${input.framework} agent for: ${input.sourceText}`,
    "",
    profile.structuralHint,
    `Make sure to include: ${profile.requiredUsage}`,
  ].join("\n");

  return {
    framework: input.framework,
    system: profile.systemPrompt,
    user,
    instruction: `${profile.systemPrompt}\n\n${user}`,
  };
}
