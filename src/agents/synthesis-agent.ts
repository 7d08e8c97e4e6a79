import { log, errorMessage } from "../logging.js";
import type { ResearchCorpus, SynthesisOutcome } from "../types/research.js";
import { extractMarkedSections, normalizeConflicts } from "../utils/structured-text-extractor.js";
import { runConflictDetectors, type ConflictDetector } from "./conflict-detection.js";
import type { TextGenerator } from "./llm-client.js";

export const SUMMARY_HEADING = "Summary";
export const CONFLICTS_HEADING = "Conflicts";

export interface SynthesisAgentOptions {
  maxOutputTokens: number;
  detectors?: readonly ConflictDetector[];
}

export function buildSynthesisPrompt(corpus: ResearchCorpus): string {
  return `You are a professional company research analyst. Synthesize the research below about ${corpus.company} into a concise briefing.

Research Data:
${corpus.compositeText}

Respond using exactly these two sections and nothing else:

### ${SUMMARY_HEADING}:
A factual summary covering business model, recent developments, financial performance, leadership, challenges and strategic priorities. State clearly where information is missing or may be outdated.

### ${CONFLICTS_HEADING}:
One line per contradiction between the sources, each starting with "- ". Write "None" if the sources agree.`;
}

function mergeConflicts(...lists: string[][]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const item of lists.flat()) {
    if (seen.has(item)) continue;
    seen.add(item);
    merged.push(item);
  }
  return merged;
}

/**
 * Synthesis stage: one collaborator call turns the corpus into a summary and
 * a list of cross-source conflicts. Never throws; a failed call yields an
 * empty summary plus a diagnostic.
 */
export class SynthesisAgent {
  private readonly generator: TextGenerator;
  private readonly maxOutputTokens: number;
  private readonly detectors: readonly ConflictDetector[];

  constructor(generator: TextGenerator, options: SynthesisAgentOptions) {
    this.generator = generator;
    this.maxOutputTokens = options.maxOutputTokens;
    this.detectors = options.detectors ?? [];
  }

  async synthesize(corpus: ResearchCorpus): Promise<SynthesisOutcome> {
    log(`Synthesizing research for ${corpus.company}`, "info", {
      records: corpus.records.length,
      detectors: this.detectors.map(d => d.name),
    });

    const detected = runConflictDetectors(this.detectors, corpus);

    let response: string;
    try {
      response = await this.generator.generate(buildSynthesisPrompt(corpus), this.maxOutputTokens);
    } catch (error) {
      const diagnostic = `Error during research synthesis: ${errorMessage(error)}`;
      log(diagnostic, "error");
      return { summary: "", conflicts: detected, diagnostic };
    }

    const sections = extractMarkedSections(response, [SUMMARY_HEADING, CONFLICTS_HEADING]);
    const summary = sections[SUMMARY_HEADING];
    const conflicts = mergeConflicts(normalizeConflicts(sections[CONFLICTS_HEADING]), detected);

    if (!summary) {
      log("Synthesis response had no Summary section", "warning", { responseLength: response.length });
    }

    log(`Synthesis complete for ${corpus.company}`, "info", {
      summaryLength: summary.length,
      conflicts: conflicts.length,
    });

    return { summary, conflicts };
  }
}
