#!/usr/bin/env node
import "dotenv/config";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parseArgs } from "node:util";
import { CodeGenerator } from "../core/pipeline/generator.js";
import { FrameworkTagSchema, listFrameworks, listTemplates } from "../core/catalog/index.js";
import { ResponseValidator, createSyntaxChecker } from "../core/validation/index.js";
import { buildDownloadArtifacts, installCommand } from "../core/artifacts/index.js";
import { ProviderIdSchema } from "../providers/index.js";
import { loadConfig } from "../config.js";

const USAGE = `Usage:
  agent-forge --framework <LangGraph|CrewAI|AutoGen> --api-key <key> --prompt "description"
  agent-forge --template <id> --api-key <key>
  agent-forge --list

Options:
  --provider <gemini|openai|anthropic>   LLM provider (default from DEFAULT_PROVIDER)
  --model <id>                           Model (default: the provider's default)
  --temperature <0..1>                   Sampling temperature
  --out <dir>                            Write the code file and requirements.txt here`;

function printCatalog(): void {
  console.log("── Frameworks ─────────────────────────────────────");
  for (const profile of listFrameworks()) {
    console.log(`  ${profile.framework.padEnd(10)} ${profile.summary}`);
  }
  console.log("\n── Templates ──────────────────────────────────────");
  for (const t of listTemplates()) {
    console.log(`  ${t.id.padEnd(32)} ${t.description}`);
  }
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      framework: { type: "string" },
      provider: { type: "string" },
      model: { type: "string" },
      "api-key": { type: "string" },
      template: { type: "string" },
      prompt: { type: "string" },
      temperature: { type: "string" },
      out: { type: "string" },
      list: { type: "boolean" },
      help: { type: "boolean" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }
  if (values.list) {
    printCatalog();
    return;
  }

  const framework = FrameworkTagSchema.optional().safeParse(values.framework);
  const provider = ProviderIdSchema.optional().safeParse(values.provider);
  if (!framework.success || !provider.success) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const generator = new CodeGenerator({
    validator: new ResponseValidator(createSyntaxChecker(config.syntax)),
    retry: config.rateLimit,
    defaults: {
      provider: config.generation.defaultProvider,
      temperature: config.generation.defaultTemperature,
    },
    maxOutputTokens: config.generation.maxOutputTokens,
  });

  const run = await generator.run({
    framework: framework.data,
    provider: provider.data,
    model: values.model,
    apiKey: values["api-key"] ?? "",
    templateId: values.template,
    prompt: values.prompt,
    temperature: values.temperature === undefined ? undefined : Number(values.temperature),
  });

  if (run.state === "Failed") {
    console.error(`\n❌ ${run.error.kind}: ${run.error.message}`);
    if (run.error.suggestion) console.error(`   → ${run.error.suggestion}`);
    process.exitCode = 1;
    return;
  }

  const { response, request } = run;
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  ${request.framework} system via ${request.provider}/${request.model}`);
  console.log("═══════════════════════════════════════════════════════\n");
  console.log(response.extractedCode ?? response.rawText);
  console.log("\n───────────────────────────────────────────────────────");
  if (response.isValidSyntax) {
    console.log("✅ Syntax check passed");
  } else {
    const where = response.syntaxError?.line ? ` (line ${response.syntaxError.line})` : "";
    console.log(`⚠️  Syntax check failed${where}: ${response.syntaxError?.message ?? "unknown error"}`);
  }
  if (response.frameworkMarkers && !response.frameworkMarkers.matched) {
    console.log(`⚠️  Missing ${request.framework} markers: ${response.frameworkMarkers.missing.join(", ")}`);
  }

  if (request.framework) {
    console.log(`\nInstall: ${installCommand(request.framework)}`);

    if (values.out && response.extractedCode !== undefined) {
      await fs.mkdir(values.out, { recursive: true });
      for (const artifact of buildDownloadArtifacts(request.framework, response.extractedCode)) {
        const target = path.join(values.out, artifact.fileName);
        await fs.writeFile(target, artifact.content, "utf-8");
        console.log(`Wrote ${target}`);
      }
    }
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`\n❌ ${message}`);
  process.exit(1);
});
