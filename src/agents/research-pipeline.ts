/**
 * Research Pipeline - Stage Coordinator
 *
 * Runs the account-plan flow for one company:
 *   sources → corpus → synthesis → plan generation → plan store
 * and routes section edits back into the store.
 *
 * All per-company state lives in a ResearchSession that callers own and pass
 * in explicitly; the plan store is the only durable state.
 *
 * @module agents/research-pipeline
 */

import { log } from "../logging.js";
import type {
  AccountPlan,
  ChatMessage,
  PlanGenerationResult,
  ResearchCorpus,
  ResearchSources,
  SectionRegenerationResult,
  SynthesisOutcome,
} from "../types/research.js";
import type { AccountPlanConfig } from "../utils/config-loader.js";
import type { PlanStore } from "../storage/plan-store.js";
import { buildResearchCorpus } from "./source-aggregator.js";
import { SynthesisAgent } from "./synthesis-agent.js";
import { PlanGenerationAgent } from "./plan-generation-agent.js";
import { SectionRegenerationAgent } from "./section-regeneration-agent.js";
import { ChatAgent } from "./chat-agent.js";
import { EmployeeCountConflictDetector, type ConflictDetector } from "./conflict-detection.js";
import type { TextGenerator } from "./llm-client.js";

/**
 * Session-scoped research state for one company
 */
export interface ResearchSession {
  readonly company: string;
  corpus?: ResearchCorpus;
  synthesis?: SynthesisOutcome;
  plan?: AccountPlan;
  history: ChatMessage[];
}

export function createSession(company: string): ResearchSession {
  return { company, history: [] };
}

/**
 * The corpus when sources were found, otherwise the synthesized summary
 */
export function researchContextFor(session: ResearchSession): string {
  if (session.corpus && session.corpus.records.length > 0) {
    return session.corpus.compositeText;
  }
  return session.synthesis?.summary ?? "";
}

export interface ResearchRunResult {
  company: string;
  synthesis: SynthesisOutcome;
  plan: PlanGenerationResult;
  /** True only when a valid plan was written to the store */
  saved: boolean;
}

export interface SectionEditResult {
  regeneration: SectionRegenerationResult;
  /** Whether the new text was written through to the store */
  applied: boolean;
  /** Why nothing was applied, when it was not */
  error?: string;
}

export interface ResearchPipelineDeps {
  generator: TextGenerator;
  store: PlanStore;
  config: AccountPlanConfig;
  detectors?: readonly ConflictDetector[];
}

export class ResearchPipeline {
  readonly synthesisAgent: SynthesisAgent;
  readonly planAgent: PlanGenerationAgent;
  readonly sectionAgent: SectionRegenerationAgent;
  readonly chatAgent: ChatAgent;
  private readonly store: PlanStore;

  constructor(deps: ResearchPipelineDeps) {
    const { generator, store, config } = deps;
    this.store = store;
    this.synthesisAgent = new SynthesisAgent(generator, {
      maxOutputTokens: config.generation.synthesisMaxTokens,
      detectors: deps.detectors ?? [new EmployeeCountConflictDetector()],
    });
    this.planAgent = new PlanGenerationAgent(generator, {
      sections: config.plan.sections,
      maxOutputTokens: config.generation.planMaxTokens,
    });
    this.sectionAgent = new SectionRegenerationAgent(generator, {
      maxOutputTokens: config.generation.regenerationMaxTokens,
      researchContextChars: config.generation.researchContextChars,
    });
    this.chatAgent = new ChatAgent(generator, config.generation.chatMaxTokens);
  }

  /**
   * Full research run. The plan is saved only when it passed validation;
   * a failed generation leaves any previously stored plan untouched.
   */
  async run(session: ResearchSession, sources: ResearchSources = {}): Promise<ResearchRunResult> {
    const { company } = session;
    log(`Research run started for ${company}`, "info");

    const corpus = buildResearchCorpus(company, sources);
    session.corpus = corpus;

    const synthesis = await this.synthesisAgent.synthesize(corpus);
    session.synthesis = synthesis;

    const plan = await this.planAgent.generate(company, synthesis.summary);
    let saved = false;
    if (plan.ok) {
      session.plan = plan.plan;
      saved = this.store.save(company, plan.plan);
    }

    log(`Research run finished for ${company}`, "info", {
      planOk: plan.ok,
      saved,
      conflicts: synthesis.conflicts.length,
    });

    return { company, synthesis, plan, saved };
  }

  /**
   * Current plan for the session: the session copy, else the stored one
   */
  currentPlan(session: ResearchSession): AccountPlan | null {
    if (session.plan) return session.plan;
    const stored = this.store.load(session.company);
    if (stored) session.plan = stored;
    return stored;
  }

  /**
   * Regenerate one section from an instruction. With `apply`, successful
   * output replaces the section in the store.
   */
  async regenerateSection(
    session: ResearchSession,
    section: string,
    instruction: string,
    apply: boolean = true
  ): Promise<SectionEditResult> {
    const plan = this.currentPlan(session);
    if (!plan || !Object.prototype.hasOwnProperty.call(plan, section)) {
      const error = plan
        ? `Section "${section}" does not exist in the plan for ${session.company}`
        : `No account plan found for ${session.company}`;
      return { regeneration: { ok: false, text: error }, applied: false, error };
    }

    const regeneration = await this.sectionAgent.regenerate({
      section,
      currentContent: plan[section],
      instruction,
      researchContext: researchContextFor(session),
    });

    if (!apply || !regeneration.ok) {
      return { regeneration, applied: false };
    }
    if (!regeneration.text) {
      return { regeneration, applied: false, error: "The model returned an empty section" };
    }

    return { regeneration, applied: this.updateSection(session, section, regeneration.text) };
  }

  /**
   * Replace an existing section in the store and keep the session in step
   */
  updateSection(session: ResearchSession, section: string, content: string): boolean {
    const updated = this.store.updateSection(session.company, section, content);
    if (updated) {
      session.plan = this.store.load(session.company) ?? undefined;
    }
    return updated;
  }

  async chat(session: ResearchSession, message: string): Promise<string> {
    return this.chatAgent.reply(session.history, message);
  }
}

/**
 * Sessions by exact company name, for long-running hosts such as the MCP
 * server
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, ResearchSession>();

  get(company: string): ResearchSession {
    let session = this.sessions.get(company);
    if (!session) {
      session = createSession(company);
      this.sessions.set(company, session);
    }
    return session;
  }
}
