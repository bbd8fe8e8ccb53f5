import {
  FrameworkProfileSchema,
  FrameworkTagSchema,
  type FrameworkProfile,
  type FrameworkTag,
} from "./catalog.schema.js";

const LANGGRAPH_SYSTEM_PROMPT = `Generate a LangGraph agent system that:
1. Defines a clear state machine with nodes and edges
2. Handles errors and manages state explicitly
3. Uses the appropriate LangGraph primitives
4. Has well-defined entry points and transitions

Your code MUST use these imports and classes:
- from langgraph.graph import StateGraph
- workflow = StateGraph(AgentState), where AgentState is a proper state class, not a dict literal

Define the state class like this:
\`\`\`python
class AgentState(dict):
    def __init__(self, input=None, outputs=None):
        self.input = input
        self.outputs = outputs or []
\`\`\`

Return ONLY executable Python code with no explanations.`;

const CREWAI_SYSTEM_PROMPT = `Create a CrewAI agent setup that:
1. Defines clear roles and goals
2. Sets up task delegation
3. Includes collaboration between agents
4. Follows CrewAI conventions

Your code MUST use these imports and classes:
- from crewai import Agent, Task, Crew
- agent = Agent(...)
- task = Task(...)

Return ONLY valid Python code with crewai imports.`;

const AUTOGEN_SYSTEM_PROMPT = `Develop an AutoGen conversational agent system that:
1. Configures multiple agents with distinct roles
2. Sets up the chat workflow between them
3. Includes termination conditions
4. Follows AutoGen conventions

Your code MUST use these imports and classes:
- import autogen
- autogen.UserProxyAgent(...)
- autogen.AssistantAgent(...) or autogen.GroupChatManager(...)

Return ONLY the Python code with the required configs.`;

const PROFILES: Readonly<Record<FrameworkTag, FrameworkProfile>> = Object.freeze({
  LangGraph: FrameworkProfileSchema.parse({
    framework: "LangGraph",
    summary: "Best for stateful workflows and complex decision trees",
    structuralHint: "Use a state graph with typed state: nodes for each step, edges for the transitions.",
    requiredUsage: "from langgraph.graph import StateGraph and define a workflow = StateGraph(...)",
    systemPrompt: LANGGRAPH_SYSTEM_PROMPT,
    pipPackage: "langgraph",
  }),
  CrewAI: FrameworkProfileSchema.parse({
    framework: "CrewAI",
    summary: "Ideal for collaborative agent teams with specialized roles",
    structuralHint: "Define roles and tasks: one Agent per role, one Task per deliverable, and a Crew that runs them.",
    requiredUsage: "from crewai import Agent, Task, Crew and create instances of each",
    systemPrompt: CREWAI_SYSTEM_PROMPT,
    pipPackage: "crewai",
  }),
  AutoGen: FrameworkProfileSchema.parse({
    framework: "AutoGen",
    summary: "Perfect for conversational agents and chat-based systems",
    structuralHint: "Define conversational agents that talk to each other until a termination condition is met.",
    requiredUsage: "import autogen and create instances of autogen.UserProxyAgent and autogen.AssistantAgent",
    systemPrompt: AUTOGEN_SYSTEM_PROMPT,
    pipPackage: "pyautogen",
  }),
});

export const FRAMEWORKS: readonly FrameworkTag[] = FrameworkTagSchema.options;

export function getFrameworkProfile(framework: FrameworkTag): FrameworkProfile {
  return PROFILES[framework];
}

export function listFrameworks(): FrameworkProfile[] {
  return FRAMEWORKS.map((f) => PROFILES[f]);
}
