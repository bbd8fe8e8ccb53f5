import type { LLMProvider, ProviderRequest } from "./llm-provider.js";
import type { FrameworkTag } from "../core/catalog/index.js";
import type { ProviderId } from "./catalog.js";

const SAMPLES: Record<FrameworkTag, string> = {
  LangGraph: [
    "from langgraph.graph import StateGraph, END",
    "",
    "class AgentState(dict):",
    "    def __init__(self, input=None, outputs=None):",
    "        self.input = input",
    "        self.outputs = outputs or []",
    "",
    "def triage(state):",
    "    state.outputs.append(\"triaged\")",
    "    return state",
    "",
    "workflow = StateGraph(AgentState)",
    "workflow.add_node(\"triage\", triage)",
    "workflow.set_entry_point(\"triage\")",
    "workflow.add_edge(\"triage\", END)",
    "app = workflow.compile()",
  ].join("\n"),
  CrewAI: [
    "from crewai import Agent, Task, Crew",
    "",
    "analyst = Agent(role=\"Analyst\", goal=\"Research the topic\", backstory=\"Careful researcher\")",
    "writer = Agent(role=\"Writer\", goal=\"Summarise the findings\", backstory=\"Clear writer\")",
    "",
    "research = Task(description=\"Collect sources\", agent=analyst, expected_output=\"Notes\")",
    "report = Task(description=\"Write the report\", agent=writer, expected_output=\"Report\")",
    "",
    "crew = Crew(agents=[analyst, writer], tasks=[research, report])",
    "result = crew.kickoff()",
  ].join("\n"),
  AutoGen: [
    "import autogen",
    "",
    "config_list = [{\"model\": \"gpt-4\"}]",
    "assistant = autogen.AssistantAgent(name=\"assistant\", llm_config={\"config_list\": config_list})",
    "user_proxy = autogen.UserProxyAgent(",
    "    name=\"user_proxy\",",
    "    human_input_mode=\"NEVER\",",
    "    is_termination_msg=lambda m: \"TERMINATE\" in m.get(\"content\", \"\"),",
    ")",
    "user_proxy.initiate_chat(assistant, message=\"Start the task\")",
  ].join("\n"),
};

/**
 * MockLLM – a deterministic provider for tests and offline development.
 * Replies with a short narration and one fenced Python block for the
 * framework named in the prompt. Makes no network calls.
 */
export class MockLLM implements LLMProvider {
  readonly name = "MockLLM";
  readonly supported = true;

  constructor(readonly id: ProviderId = "gemini") {}

  async send(request: ProviderRequest): Promise<string> {
    const framework = request.prompt.framework;
    return `Here is a ${framework} system for your request.\n\n\`\`\`python\n${SAMPLES[framework]}\n\`\`\`\n`;
  }
}
