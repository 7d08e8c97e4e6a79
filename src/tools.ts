import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { log } from "./logging.js";
import { LLMClient, type TextGenerator } from "./agents/llm-client.js";
import { MockTextGenerator } from "./mock/llm-mock-service.js";
import { ResearchPipeline, SessionRegistry } from "./agents/research-pipeline.js";
import { SourceProviders } from "./agents/source-providers.js";
import { extractCompanyName } from "./agents/chat-agent.js";
import { PlanStore } from "./storage/plan-store.js";
import { loadConfig, type AccountPlanConfig } from "./utils/config-loader.js";
import { exportPlanJson, exportPlanToFile, planToMarkdown } from "./utils/plan-export.js";
import { parseWithSchema } from "./utils/validation.js";
import { PipelineError } from "./types/errors.js";
import type { ResearchSources } from "./types/research.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

type ToolArgs = Record<string, unknown>;

/**
 * Everything the tool handlers need, built once per server
 */
export interface ToolContext {
  config: AccountPlanConfig;
  store: PlanStore;
  pipeline: ResearchPipeline;
  sessions: SessionRegistry;
  providers: SourceProviders;
}

export function createToolContext(config: AccountPlanConfig = loadConfig(), generator?: TextGenerator): ToolContext {
  const llm: TextGenerator = generator
    ?? (config.llm.mock
      ? new MockTextGenerator({ sections: config.plan.sections, delayMs: config.llm.mockDelayMs })
      : LLMClient.fromConfig(config.llm));
  const store = new PlanStore({ filePath: config.storage.planFile, formatVersion: config.storage.formatVersion });

  log("Tool context created", "info", {
    planFile: config.storage.planFile,
    mockLLM: config.llm.mock,
    provider: config.llm.provider,
  });

  return {
    config,
    store,
    pipeline: new ResearchPipeline({ generator: llm, store, config }),
    sessions: new SessionRegistry(),
    providers: new SourceProviders(config.sources),
  };
}

let toolContext: ToolContext | null = null;

/**
 * Install the context the handlers use; created from config on first call
 * otherwise
 */
export function setToolContext(context: ToolContext | null): void {
  toolContext = context;
}

function getToolContext(): ToolContext {
  if (!toolContext) {
    toolContext = createToolContext();
  }
  return toolContext;
}

const sourceItemSchema = {
  type: "object",
  properties: {
    title: { type: "string" },
    body: { type: "string" },
    url: { type: "string" },
  },
};

// Tool definitions
export const TOOLS: Tool[] = [
  {
    name: "test_connection",
    description: "Test the connection to the account plan research server",
    inputSchema: {
      type: "object",
      properties: {},
      additionalProperties: false,
    },
  },
  {
    name: "research_company",
    description: "Research a company, synthesize the findings, generate an account plan and save it",
    inputSchema: {
      type: "object",
      properties: {
        company: { type: "string", description: "Exact company name, used as the plan key" },
        query: { type: "string", description: "Free-form request such as 'tell me about Acme'; used when company is omitted" },
        web: { type: "array", items: sourceItemSchema, description: "Pre-fetched web results" },
        news: { type: "array", items: sourceItemSchema, description: "Pre-fetched news items" },
        wiki: { type: "string", description: "Pre-fetched encyclopedia summary" },
        fetch_sources: {
          type: "boolean",
          description: "Fetch web, news and wiki material online (default: true when no sources are given)",
        },
      },
      additionalProperties: false,
    },
  },
  {
    name: "list_account_plans",
    description: "List the companies that have a saved account plan",
    inputSchema: {
      type: "object",
      properties: {},
      additionalProperties: false,
    },
  },
  {
    name: "get_account_plan",
    description: "Show the saved account plan for a company",
    inputSchema: {
      type: "object",
      properties: {
        company: { type: "string", description: "Exact company name" },
        format: { type: "string", enum: ["markdown", "json"], description: "Output format (default: markdown)" },
      },
      required: ["company"],
      additionalProperties: false,
    },
  },
  {
    name: "update_plan_section",
    description: "Replace the text of an existing section in a saved account plan",
    inputSchema: {
      type: "object",
      properties: {
        company: { type: "string", description: "Exact company name" },
        section: { type: "string", description: "Exact section key, e.g. pain_points" },
        content: { type: "string", description: "New section text" },
      },
      required: ["company", "section", "content"],
      additionalProperties: false,
    },
  },
  {
    name: "regenerate_plan_section",
    description: "Rewrite one section of a saved account plan following an instruction",
    inputSchema: {
      type: "object",
      properties: {
        company: { type: "string", description: "Exact company name" },
        section: { type: "string", description: "Exact section key" },
        instruction: { type: "string", description: "How the section should change" },
        apply: { type: "boolean", description: "Save the rewritten section (default: true)" },
      },
      required: ["company", "section", "instruction"],
      additionalProperties: false,
    },
  },
  {
    name: "export_account_plan",
    description: "Export a saved account plan as a JSON file with an export timestamp",
    inputSchema: {
      type: "object",
      properties: {
        company: { type: "string", description: "Exact company name" },
        output_dir: { type: "string", description: "Directory for the export file (default: configured export dir)" },
      },
      required: ["company"],
      additionalProperties: false,
    },
  },
  {
    name: "research_chat",
    description: "Talk to the research assistant",
    inputSchema: {
      type: "object",
      properties: {
        message: { type: "string", description: "Your message" },
        company: { type: "string", description: "Company whose session the conversation belongs to" },
      },
      required: ["message"],
      additionalProperties: false,
    },
  },
];

// ============================================================================
// Argument schemas
// ============================================================================

function requiredText(name: string) {
  return z
    .string({ required_error: `"${name}" is required`, invalid_type_error: `"${name}" must be a string` })
    .refine(value => value.trim() !== "", `"${name}" is required`);
}

function optionalText(name: string) {
  return z
    .string({ invalid_type_error: `"${name}" must be a string` })
    .nullish()
    .transform(value => value ?? undefined);
}

function optionalFlag(name: string) {
  return z
    .boolean({ invalid_type_error: `"${name}" must be true or false` })
    .nullish()
    .transform(value => value ?? undefined);
}

// Fields of the wrong type are dropped rather than rejected
const sourceText = z.unknown().transform(value => (typeof value === "string" ? value : null));

const sourceItemArgs = z.object(
  {
    title: sourceText,
    body: sourceText,
    description: sourceText,
    snippet: sourceText,
    url: sourceText,
    href: sourceText,
  },
  { invalid_type_error: "must be an object" }
);

function sourceList(name: string) {
  return z
    .array(sourceItemArgs, { invalid_type_error: `"${name}" must be a list of source items` })
    .nullish()
    .transform(value => value ?? undefined);
}

const researchCompanyArgs = z.object({
  company: optionalText("company"),
  query: optionalText("query"),
  web: sourceList("web"),
  news: sourceList("news"),
  wiki: optionalText("wiki"),
  fetch_sources: optionalFlag("fetch_sources"),
});

const getAccountPlanArgs = z.object({
  company: requiredText("company"),
  format: z
    .enum(["markdown", "json"], { errorMap: () => ({ message: `"format" must be markdown or json` }) })
    .nullish()
    .transform(value => value ?? "markdown"),
});

const updatePlanSectionArgs = z.object({
  company: requiredText("company"),
  section: requiredText("section"),
  content: requiredText("content"),
});

const regeneratePlanSectionArgs = z.object({
  company: requiredText("company"),
  section: requiredText("section"),
  instruction: requiredText("instruction"),
  apply: optionalFlag("apply"),
});

const exportAccountPlanArgs = z.object({
  company: requiredText("company"),
  output_dir: optionalText("output_dir"),
});

const researchChatArgs = z.object({
  message: requiredText("message"),
  company: optionalText("company"),
});

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: ToolArgs): z.output<S> {
  return parseWithSchema(schema, args, "INVALID_ARGUMENTS");
}

function textResult(text: string, isError: boolean = false): ToolResult {
  return isError
    ? { content: [{ type: "text", text }], isError: true }
    : { content: [{ type: "text", text }] };
}

export async function handleToolCall(name: string, args: ToolArgs): Promise<ToolResult> {
  log(`Handling tool call: ${name}`, "info", args);

  try {
    switch (name) {
      case "test_connection":
        return handleTestConnection();

      case "research_company":
        return await handleResearchCompany(args);

      case "list_account_plans":
        return handleListAccountPlans();

      case "get_account_plan":
        return handleGetAccountPlan(args);

      case "update_plan_section":
        return handleUpdatePlanSection(args);

      case "regenerate_plan_section":
        return await handleRegeneratePlanSection(args);

      case "export_account_plan":
        return await handleExportAccountPlan(args);

      case "research_chat":
        return await handleResearchChat(args);

      default:
        throw new PipelineError("UNKNOWN_TOOL", `Unknown tool: ${name}`);
    }
  } catch (error) {
    log(`Error in tool ${name}:`, "error", {
      message: error instanceof Error ? error.message : String(error),
    });
    return textResult(`Error: ${error instanceof Error ? error.message : String(error)}`, true);
  }
}

// Tool implementations

function handleTestConnection(): ToolResult {
  log("Test connection called", "info");
  const { config } = getToolContext();

  return textResult(
    `✅ Account Plan Research Server Connection Test\n\n` +
      `Server Status: CONNECTED\n` +
      `Timestamp: ${new Date().toISOString()}\n` +
      `Node.js Version: ${process.version}\n` +
      `Plan store: ${config.storage.planFile}\n` +
      `LLM: ${config.llm.mock ? "mock" : config.llm.provider}`
  );
}

async function handleResearchCompany(args: ToolArgs): Promise<ToolResult> {
  const { company: explicit, query, web, news, wiki, fetch_sources: fetchRequested } = parseArgs(researchCompanyArgs, args);
  // The given name is the plan key as it is; blank means "not given"
  const company = explicit?.trim() ? explicit : query ? extractCompanyName(query) : "";
  if (!company.trim()) {
    throw new PipelineError("INVALID_ARGUMENTS", "Please provide a company name");
  }

  const context = getToolContext();
  const provided: ResearchSources = { web, news, wiki };
  const anyProvided = Boolean(web?.length || news?.length || wiki?.trim());
  const fetchSources = fetchRequested ?? !anyProvided;

  let sources = provided;
  if (fetchSources) {
    const fetched = await context.providers.fetchAll(company);
    sources = {
      web: [...(provided.web ?? []), ...(fetched.web ?? [])],
      news: [...(provided.news ?? []), ...(fetched.news ?? [])],
      wiki: wiki?.trim() ? wiki : fetched.wiki,
    };
  }

  const session = context.sessions.get(company);
  const result = await context.pipeline.run(session, sources);

  const lines: string[] = [`# Account research: ${company}`, "", "## Synthesized Summary"];
  lines.push(result.synthesis.summary || "_No summary available._");
  if (result.synthesis.diagnostic) {
    lines.push("", `⚠️ ${result.synthesis.diagnostic}`);
  }
  if (result.synthesis.conflicts.length > 0) {
    lines.push("", "## Conflicts detected in the sources");
    lines.push(...result.synthesis.conflicts.map(conflict => `- ${conflict}`));
  }

  lines.push("", "## Account Plan");
  if (result.plan.ok) {
    lines.push(planToMarkdown(result.plan.plan));
    lines.push(result.saved ? "Plan saved." : "⚠️ Plan generated but could not be saved.");
  } else {
    lines.push(`Plan generation failed: ${result.plan.diagnostic}`);
  }

  return textResult(lines.join("\n"), !result.plan.ok);
}

function handleListAccountPlans(): ToolResult {
  const companies = getToolContext().store.listCompanies();
  if (companies.length === 0) {
    return textResult("No saved account plans.");
  }
  return textResult(`Saved account plans (${companies.length}):\n${companies.map(c => `- ${c}`).join("\n")}`);
}

function handleGetAccountPlan(args: ToolArgs): ToolResult {
  const { company, format } = parseArgs(getAccountPlanArgs, args);
  const plan = getToolContext().store.load(company);
  if (!plan) {
    return textResult(`No account plan found for ${company}`, true);
  }
  return textResult(format === "json" ? JSON.stringify(plan, null, 2) : planToMarkdown(plan));
}

function handleUpdatePlanSection(args: ToolArgs): ToolResult {
  const { company, section, content } = parseArgs(updatePlanSectionArgs, args);

  const context = getToolContext();
  const updated = context.pipeline.updateSection(context.sessions.get(company), section, content);
  return updated
    ? textResult(`Section ${section} updated and saved for ${company}.`)
    : textResult("Update failed: check the company name and section key.", true);
}

async function handleRegeneratePlanSection(args: ToolArgs): Promise<ToolResult> {
  const { company, section, instruction, apply: applyArg } = parseArgs(regeneratePlanSectionArgs, args);
  const apply = applyArg ?? true;

  const context = getToolContext();
  const result = await context.pipeline.regenerateSection(context.sessions.get(company), section, instruction, apply);

  if (result.error) {
    return textResult(result.error, true);
  }
  if (!result.regeneration.ok) {
    return textResult(result.regeneration.text, true);
  }

  const status = result.applied ? "Section updated and saved." : apply ? "⚠️ Section could not be saved." : "Preview only, not saved.";
  return textResult(`### ${section}\n${result.regeneration.text}\n\n${status}`);
}

async function handleExportAccountPlan(args: ToolArgs): Promise<ToolResult> {
  const { company, output_dir: outputDir } = parseArgs(exportAccountPlanArgs, args);
  const context = getToolContext();
  const plan = context.store.load(company);
  if (!plan) {
    return textResult(`No account plan found for ${company}`, true);
  }

  const now = new Date();
  const directory = outputDir ?? context.config.storage.exportDir;
  const target = await exportPlanToFile(directory, company, plan, now);
  return textResult(`Exported to ${target}\n\n${exportPlanJson(plan, now)}`);
}

async function handleResearchChat(args: ToolArgs): Promise<ToolResult> {
  const { message, company = "" } = parseArgs(researchChatArgs, args);

  const context = getToolContext();
  const reply = await context.pipeline.chat(context.sessions.get(company), message);
  return textResult(reply);
}
