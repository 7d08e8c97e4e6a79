import { log, errorMessage } from "../logging.js";
import type { SectionRegenerationRequest, SectionRegenerationResult } from "../types/research.js";
import type { TextGenerator } from "./llm-client.js";

export interface SectionRegenerationAgentOptions {
  maxOutputTokens: number;
  /** How much of the research corpus goes into the prompt */
  researchContextChars: number;
}

export function truncateContext(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export function buildSectionPrompt(request: SectionRegenerationRequest, researchContextChars: number): string {
  return `Update this section of an account plan.

Section Name: ${request.section}
Current Content: ${request.currentContent}

User's Instruction: ${request.instruction}

Research Context: ${truncateContext(request.researchContext, researchContextChars)}

Provide ONLY the updated section content, no formatting or explanation.`;
}

/**
 * Section regeneration stage. Returns the model's text untouched apart from
 * trimming; the caller decides whether it goes into the plan.
 */
export class SectionRegenerationAgent {
  private readonly generator: TextGenerator;
  private readonly options: SectionRegenerationAgentOptions;

  constructor(generator: TextGenerator, options: SectionRegenerationAgentOptions) {
    this.generator = generator;
    this.options = options;
  }

  async regenerate(request: SectionRegenerationRequest): Promise<SectionRegenerationResult> {
    log(`Regenerating section ${request.section}`, "info", {
      instructionLength: request.instruction.length,
      contextLength: request.researchContext.length,
    });

    try {
      const prompt = buildSectionPrompt(request, this.options.researchContextChars);
      const text = await this.generator.generate(prompt, this.options.maxOutputTokens);
      return { ok: true, text: text.trim() };
    } catch (error) {
      const text = `Error regenerating section: ${errorMessage(error)}`;
      log(text, "error");
      return { ok: false, text };
    }
  }
}
