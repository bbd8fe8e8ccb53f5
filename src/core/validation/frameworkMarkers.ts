import type { FrameworkTag } from "../catalog/index.js";
import type { FrameworkMarkers } from "../schemas/index.js";

interface MarkerRule {
  label: string;
  /** Any one of these, matched against the code with spaces removed and lower-cased */
  anyOf: string[];
}

const RULES: Record<FrameworkTag, MarkerRule[]> = {
  LangGraph: [
    { label: "langgraph import", anyOf: ["fromlanggraph.graphimport", "importlanggraph"] },
    { label: "StateGraph usage", anyOf: ["stategraph(", "=stategraph"] },
  ],
  CrewAI: [
    { label: "crewai import", anyOf: ["crewai"] },
    { label: "Agent", anyOf: ["agent"] },
    { label: "Task", anyOf: ["task"] },
    { label: "Crew", anyOf: ["crew"] },
  ],
  AutoGen: [
    { label: "autogen import", anyOf: ["importautogen", "fromautogenimport"] },
    {
      label: "agent or group chat manager",
      anyOf: ["userproxyagent", "assistantagent", "groupchatmanager", "agent="],
    },
  ],
};

/**
 * Advisory check that the code at least mentions the framework's imports
 * and core classes. Says nothing about whether the code is correct.
 */
export function checkFrameworkMarkers(framework: FrameworkTag, code: string): FrameworkMarkers {
  const normalized = code.replace(/[ \t]/g, "").toLowerCase();
  const missing = RULES[framework]
    .filter((rule) => !rule.anyOf.some((marker) => normalized.includes(marker)))
    .map((rule) => rule.label);

  return { matched: missing.length === 0, missing };
}
