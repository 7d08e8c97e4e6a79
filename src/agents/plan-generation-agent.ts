import { log, errorMessage } from "../logging.js";
import type { AccountPlan, PlanGenerationResult, PlanSectionSpec } from "../types/research.js";
import { extractJsonObject } from "../utils/structured-text-extractor.js";
import type { TextGenerator } from "./llm-client.js";

export interface PlanGenerationAgentOptions {
  sections: readonly PlanSectionSpec[];
  maxOutputTokens: number;
}

export function buildPlanPrompt(company: string, summary: string, sections: readonly PlanSectionSpec[]): string {
  const template: Record<string, string> = {};
  for (const section of sections) {
    template[section.key] = section.description || `Content for ${section.key}`;
  }

  return `Based on the following research data, generate a comprehensive account plan in JSON format.

Company: ${company}

Research Data:
${summary.trim() || "No research summary is available. Work from general knowledge of the company and say where details need verification."}

Generate ONLY valid JSON with these exact keys (no additional text, explanation, or markdown):

${JSON.stringify(template, null, 2)}

CRITICAL: Respond with ONLY the JSON object. No markdown code blocks, no explanations, just pure JSON.`;
}

/**
 * Flatten whatever the model put under a key into section text.
 */
export function sectionText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);

  if (Array.isArray(value)) {
    return value
      .map(item => sectionText(item))
      .filter(item => item.length > 0)
      .map(item => `- ${item}`)
      .join("\n");
  }

  if (typeof value === "object") {
    return Object.entries(value)
      .map(([key, nested]) => {
        const text = sectionText(nested);
        return text ? `${key}: ${text}` : "";
      })
      .filter(line => line.length > 0)
      .join("\n");
  }

  return "";
}

/**
 * Plan generation stage: one collaborator call, JSON extraction, then the
 * required-field check. A plan either carries every required section with
 * text or is not returned at all.
 */
export class PlanGenerationAgent {
  private readonly generator: TextGenerator;
  private readonly sections: readonly PlanSectionSpec[];
  private readonly maxOutputTokens: number;

  constructor(generator: TextGenerator, options: PlanGenerationAgentOptions) {
    this.generator = generator;
    this.sections = options.sections;
    this.maxOutputTokens = options.maxOutputTokens;
  }

  get requiredSections(): string[] {
    return this.sections.map(section => section.key);
  }

  async generate(company: string, summary: string): Promise<PlanGenerationResult> {
    log(`Generating account plan for ${company}`, "info", {
      summaryLength: summary.length,
      requiredSections: this.requiredSections,
    });

    let raw: string;
    try {
      raw = await this.generator.generate(buildPlanPrompt(company, summary, this.sections), this.maxOutputTokens);
    } catch (error) {
      const diagnostic = `Error generating account plan: ${errorMessage(error)}`;
      log(diagnostic, "error");
      return { ok: false, reason: "collaborator_error", diagnostic };
    }

    const extracted = extractJsonObject(raw);
    if (extracted.kind === "not_found") {
      log("Plan response contained no JSON object", "warning", { responseLength: raw.length });
      return { ok: false, reason: "no_json", diagnostic: "The model did not return a JSON account plan.", raw };
    }
    if (extracted.kind === "malformed") {
      log("Plan response JSON could not be parsed", "warning", { reason: extracted.reason });
      return {
        ok: false,
        reason: "malformed_json",
        diagnostic: `The model returned malformed JSON: ${extracted.reason}`,
        raw,
      };
    }

    return this.validate(extracted.value, raw);
  }

  /**
   * Required sections first in contract order, then any extra keys the
   * model added.
   */
  validate(parsed: Record<string, unknown>, raw: string): PlanGenerationResult {
    const plan: AccountPlan = {};
    const missing: string[] = [];

    for (const key of this.requiredSections) {
      const text = sectionText(parsed[key]);
      if (text) {
        plan[key] = text;
      } else {
        missing.push(key);
      }
    }

    if (missing.length > 0) {
      log("Generated plan missing required sections", "warning", { missing });
      return {
        ok: false,
        reason: "missing_sections",
        diagnostic: `Generated plan is missing required sections: ${missing.join(", ")}`,
        missingSections: missing,
        raw,
      };
    }

    for (const [key, value] of Object.entries(parsed)) {
      if (key in plan) continue;
      const text = sectionText(value);
      if (text) plan[key] = text;
    }

    log("Account plan validated", "info", { sections: Object.keys(plan).length });
    return { ok: true, plan, raw };
  }
}
