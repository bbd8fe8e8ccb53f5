import { CodeGenerator } from "../core/pipeline/generator.js";
import { MockLLM } from "../providers/mock-llm.js";

async function exampleRun(): Promise<void> {
  console.log("🔄 Running example generation (offline)...\n");

  const generator = new CodeGenerator({
    providers: { gemini: new MockLLM("gemini") },
  });

  const run = await generator.run({
    templateId: "crewai-research-team",
    provider: "gemini",
    apiKey: "offline",
  });

  if (run.state === "Failed") {
    console.error(`❌ ${run.error.kind}: ${run.error.message}`);
    process.exitCode = 1;
    return;
  }

  console.log("✅ Generation complete!");
  console.log(`   Run ID:      ${run.runId}`);
  console.log(`   Framework:   ${run.request.framework}`);
  console.log(`   States:      ${run.transitions.join(" → ")}`);
  console.log(`   Code source: ${run.response.codeSource}`);
  console.log(`   Syntax OK:   ${run.response.isValidSyntax}`);
  console.log(`   Markers:     ${run.response.frameworkMarkers?.matched ? "all present" : "missing"}`);
  console.log("\n" + (run.response.extractedCode ?? ""));
  console.log("\nDone.");
}

void exampleRun();
