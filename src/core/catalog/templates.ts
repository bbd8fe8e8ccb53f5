import { TemplateSchema, type FrameworkTag, type Template } from "./catalog.schema.js";

const TEMPLATES: readonly Template[] = Object.freeze(
  [
    {
      id: "langgraph-customer-support",
      displayName: "Customer Support",
      framework: "LangGraph",
      description: "Create a customer support workflow with initial triage and escalation",
    },
    {
      id: "langgraph-document-processing",
      displayName: "Document Processing",
      framework: "LangGraph",
      description: "Build a document processing pipeline with validation and approval stages",
    },
    {
      id: "crewai-research-team",
      displayName: "Research Team",
      framework: "CrewAI",
      description: "Set up a research team with analyst and writer roles",
    },
    {
      id: "crewai-marketing-crew",
      displayName: "Marketing Crew",
      framework: "CrewAI",
      description: "Create a marketing team for content creation and social media",
    },
    {
      id: "autogen-code-review",
      displayName: "Code Review",
      framework: "AutoGen",
      description: "Build a code review system with reviewer and QA agents",
    },
    {
      id: "autogen-data-analysis",
      displayName: "Data Analysis",
      framework: "AutoGen",
      description: "Create a data analysis system with analyst and visualization agents",
    },
  ].map((t) => Object.freeze(TemplateSchema.parse(t))),
);

/** All built-in templates, optionally narrowed to one framework. */
export function listTemplates(framework?: FrameworkTag): readonly Template[] {
  if (!framework) return TEMPLATES;
  return TEMPLATES.filter((t) => t.framework === framework);
}

export function getTemplate(id: string): Template | undefined {
  return TEMPLATES.find((t) => t.id === id);
}
