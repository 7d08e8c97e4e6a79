import { log } from "../logging.js";
import type {
  FinancialSnapshot,
  RawSourceItem,
  ResearchCorpus,
  ResearchSources,
  SourceOrigin,
  SourceRecord,
} from "../types/research.js";

const BLOCK_LABELS: Record<SourceOrigin, string> = {
  wiki: "=== WIKIPEDIA ===",
  news: "=== NEWS ===",
  web: "=== WEB ===",
  financial: "=== FINANCIAL ===",
};

// Order of the labeled blocks in the composite text
const BLOCK_ORDER: readonly SourceOrigin[] = ["wiki", "news", "web", "financial"];

function clean(value: string | null | undefined): string {
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Normalize one provider item. Body falls back to description then snippet,
 * url to href. Items with neither a title nor a body are dropped.
 */
export function toSourceRecord(origin: SourceOrigin, raw: RawSourceItem): SourceRecord | null {
  const title = clean(raw.title);
  const body = clean(raw.body) || clean(raw.description) || clean(raw.snippet);
  const url = clean(raw.url) || clean(raw.href);

  if (!title && !body) {
    return null;
  }

  return Object.freeze({
    origin,
    body,
    ...(title ? { title } : {}),
    ...(url ? { url } : {}),
  });
}

function toRecords(origin: SourceOrigin, items: readonly RawSourceItem[] | null | undefined): SourceRecord[] {
  if (!items || items.length === 0) return [];
  const records: SourceRecord[] = [];
  for (const item of items) {
    const record = toSourceRecord(origin, item);
    if (record) records.push(record);
  }
  return records;
}

function wikiRecords(wiki: ResearchSources["wiki"]): SourceRecord[] {
  if (typeof wiki === "string") {
    const body = wiki.trim();
    return body ? [Object.freeze({ origin: "wiki" as const, body })] : [];
  }
  return toRecords("wiki", wiki);
}

function hasFinancialFacts(snapshot: FinancialSnapshot | null | undefined): snapshot is FinancialSnapshot {
  if (!snapshot) return false;
  return Object.values(snapshot).some(value => value !== null && value !== undefined && value !== "");
}

function financialRecord(snapshot: FinancialSnapshot): SourceRecord {
  const facts: string[] = [];
  if (typeof snapshot.marketCap === "number") facts.push(`Market cap: ${snapshot.marketCap}`);
  if (typeof snapshot.employees === "number") facts.push(`Employees: ${snapshot.employees}`);
  if (snapshot.sector) facts.push(`Sector: ${snapshot.sector}`);
  if (snapshot.industry) facts.push(`Industry: ${snapshot.industry}`);
  if (snapshot.businessSummary) facts.push(`Business summary: ${snapshot.businessSummary.trim()}`);
  return Object.freeze({ origin: "financial" as const, title: "Financial snapshot", body: facts.join("; ") });
}

function formatRecord(record: SourceRecord): string {
  if (record.origin === "wiki") {
    return record.title ? `${record.title}\n${record.body}` : record.body;
  }

  let line = "- ";
  if (record.title && record.body) {
    line += `${record.title}: ${record.body}`;
  } else {
    line += record.title ?? record.body;
  }
  if (record.url) {
    line += ` (${record.url})`;
  }
  return line;
}

/**
 * Composite research text: a company header, then one labeled block per
 * origin that has records, in the fixed order wiki, news, web, financial.
 */
export function composeCorpusText(company: string, records: readonly SourceRecord[]): string {
  const blocks: string[] = [`Company: ${company}`];

  for (const origin of BLOCK_ORDER) {
    const ofOrigin = records.filter(record => record.origin === origin);
    if (ofOrigin.length === 0) continue;

    const separator = origin === "wiki" ? "\n\n" : "\n";
    blocks.push(`${BLOCK_LABELS[origin]}\n${ofOrigin.map(formatRecord).join(separator)}`);
  }

  return blocks.join("\n\n");
}

/**
 * Merge whatever sources were fetched for a company into one corpus.
 * Every source is optional; with none at all the composite is just the header.
 */
export function buildResearchCorpus(company: string, sources: ResearchSources = {}): ResearchCorpus {
  const records: SourceRecord[] = [
    ...wikiRecords(sources.wiki),
    ...toRecords("news", sources.news),
    ...toRecords("web", sources.web),
  ];

  const snapshot = sources.financial;
  const financials = hasFinancialFacts(snapshot) ? { ...snapshot } : undefined;
  if (financials) {
    records.push(financialRecord(financials));
  }

  const compositeText = composeCorpusText(company, records);

  log(`Research corpus built for ${company}`, "debug", {
    wiki: records.filter(r => r.origin === "wiki").length,
    news: records.filter(r => r.origin === "news").length,
    web: records.filter(r => r.origin === "web").length,
    financial: financials !== undefined,
    compositeLength: compositeText.length,
  });

  return Object.freeze({
    company,
    records: Object.freeze(records),
    ...(financials ? { financials } : {}),
    compositeText,
  });
}
