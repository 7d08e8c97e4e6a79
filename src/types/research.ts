/**
 * Research Types - Data Model for the Account Plan Pipeline
 *
 * Shapes that flow between the pipeline stages:
 * - Source records fetched for a company, and the merged research corpus
 * - Synthesis output (summary + cross-source conflicts)
 * - Account plans and the records the plan store persists
 *
 * @module types/research
 * @version 1.0.0
 */

/**
 * Where a source record came from
 */
export type SourceOrigin = 'web' | 'news' | 'wiki' | 'financial';

/**
 * One retrieved item. Immutable once built.
 */
export interface SourceRecord {
  readonly origin: SourceOrigin;
  readonly title?: string;
  readonly body: string;
  readonly url?: string;
}

/**
 * Loose shape handed over by source providers. Search engines use
 * `snippet`/`href`, news APIs `description`/`url`.
 */
export interface RawSourceItem {
  title?: string | null;
  body?: string | null;
  description?: string | null;
  snippet?: string | null;
  url?: string | null;
  href?: string | null;
  /** Publisher name, news only */
  source?: string | null;
}

/**
 * Pre-fetched financial facts for a listed company
 */
export interface FinancialSnapshot {
  marketCap?: number | null;
  employees?: number | null;
  sector?: string | null;
  industry?: string | null;
  businessSummary?: string | null;
}

/**
 * Everything gathered for one company. Absent, `null` and empty lists are
 * all treated as "nothing from this origin".
 */
export interface ResearchSources {
  web?: readonly RawSourceItem[] | null;
  news?: readonly RawSourceItem[] | null;
  /** A plain summary string or a list of items */
  wiki?: string | readonly RawSourceItem[] | null;
  financial?: FinancialSnapshot | null;
}

/**
 * Ordered source records for one company plus their composite text.
 * Built per request, never persisted.
 */
export interface ResearchCorpus {
  readonly company: string;
  readonly records: readonly SourceRecord[];
  readonly financials?: FinancialSnapshot;
  readonly compositeText: string;
}

export interface SynthesisResult {
  summary: string;
  /** Empty when nothing contradicts or the conflict text was unusable */
  conflicts: string[];
}

export interface SynthesisOutcome extends SynthesisResult {
  /** Set when the collaborator failed; summary is empty in that case */
  diagnostic?: string;
}

/**
 * Section name to section text, e.g. `company_overview` to a paragraph.
 */
export type AccountPlan = Record<string, string>;

/**
 * One entry of the required-field contract
 */
export interface PlanSectionSpec {
  key: string;
  description: string;
}

export type PlanFailureReason =
  | 'collaborator_error'
  | 'no_json'
  | 'malformed_json'
  | 'missing_sections';

export type PlanGenerationResult =
  | { ok: true; plan: AccountPlan; raw: string }
  | {
      ok: false;
      reason: PlanFailureReason;
      diagnostic: string;
      missingSections?: string[];
      raw?: string;
    };

export interface SectionRegenerationRequest {
  section: string;
  currentContent: string;
  instruction: string;
  /** Composite research text; only a bounded prefix reaches the prompt */
  researchContext: string;
}

export interface SectionRegenerationResult {
  ok: boolean;
  /** Replacement text, or a diagnostic when `ok` is false */
  text: string;
}

/**
 * Wrapped shape written to the plan file
 */
export interface PersistedPlanEnvelope {
  plan: AccountPlan;
  created_at: string;
  updated_at?: string;
  version: string;
}

/**
 * A plan read back from the store, with whatever metadata the file had
 */
export interface StoredPlanRecord {
  company: string;
  plan: AccountPlan;
  createdAt?: string;
  updatedAt?: string;
  version?: string;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}
