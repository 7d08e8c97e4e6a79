/**
 * Structured-Text Extractor
 *
 * Pulls structure out of model output whose format cannot be fully
 * constrained. Two modes:
 * - Marker sections: `### Heading: body` blocks, captured up to the next
 *   heading line of any name
 * - JSON object: fenced, bare, or buried in prose
 *
 * Nothing here throws. Absence and malformed input come back as tagged
 * results so each caller decides how hard to fail.
 */

export type ExtractionResult<T> =
  | { kind: 'found'; value: T }
  | { kind: 'not_found' }
  | { kind: 'malformed'; reason: string };

export type JsonObject = Record<string, unknown>;

interface MarkerHit {
  heading: string;
  start: number;
  end: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Marker lines for the given headings, in text order. A marker is one to six
 * `#`, optional `**` emphasis, the heading, then a colon or the end of the
 * line, so `### Summary of risks` is not a Summary marker.
 */
function findMarkers(text: string, headings: readonly string[]): MarkerHit[] {
  const usable = headings.filter(h => h.trim().length > 0);
  if (usable.length === 0) return [];

  const alternatives = usable.map(h => escapeRegExp(h.trim())).join('|');
  const pattern = new RegExp(
    `^[ \\t]*#{1,6}[ \\t]*(?:\\*\\*)?[ \\t]*(${alternatives})[ \\t]*(?:\\*\\*)?[ \\t]*(?::(?:\\*\\*)?|(?=\\r?$))`,
    'gim'
  );

  const byLowerCase = new Map(usable.map(h => [h.trim().toLowerCase(), h] as const));
  const hits: MarkerHit[] = [];
  for (const match of text.matchAll(pattern)) {
    const heading = byLowerCase.get(match[1].toLowerCase());
    if (heading === undefined || match.index === undefined) continue;
    hits.push({ heading, start: match.index, end: match.index + match[0].length });
  }
  return hits;
}

// Any markdown heading line, expected or not
const HEADING_LINE = /^[ \t]*#{1,6}[ \t]*(?:\*\*)?[ \t]*\S[^\r\n]*$/gm;

function headingLineStarts(text: string): number[] {
  const starts: number[] = [];
  for (const match of text.matchAll(HEADING_LINE)) {
    if (match.index !== undefined) starts.push(match.index);
  }
  return starts;
}

/**
 * Extract every expected heading. A body ends at the next heading line,
 * whether or not that heading was asked for. Missing headings map to an
 * empty string. When a heading occurs more than once, the first occurrence
 * wins.
 */
export function extractMarkedSections(text: string, headings: readonly string[]): Record<string, string> {
  const sections: Record<string, string> = {};
  for (const heading of headings) {
    sections[heading] = '';
  }

  const hits = findMarkers(text, headings);
  const boundaries = headingLineStarts(text);
  const filled = new Set<string>();
  for (const hit of hits) {
    if (filled.has(hit.heading)) continue;
    const next = boundaries.find(start => start >= hit.end);
    sections[hit.heading] = text.slice(hit.end, next ?? text.length).trim();
    filled.add(hit.heading);
  }

  return sections;
}

export function extractMarkedSection(text: string, heading: string): ExtractionResult<string> {
  const hits = findMarkers(text, [heading]);
  if (hits.length === 0) return { kind: 'not_found' };
  return { kind: 'found', value: extractMarkedSections(text, [heading])[heading] };
}

/**
 * Remove ```json / ``` fence markers wherever they appear
 */
export function stripCodeFences(text: string): string {
  return text.replace(/```[ \t]*(?:json|JSON)?[ \t]*\r?\n?|\s*```/g, '').trim();
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; reason: string };

function tryParse(candidate: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Find a JSON object in model output:
 * 1. strip markdown code fences
 * 2. parse the trimmed text
 * 3. parse the span from the first `{` to the last `}`
 */
export function extractJsonObject(text: string): ExtractionResult<JsonObject> {
  const cleaned = stripCodeFences(text);
  if (!cleaned) return { kind: 'not_found' };

  const direct = tryParse(cleaned);
  if (direct.ok && isJsonObject(direct.value)) {
    return { kind: 'found', value: direct.value };
  }

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end <= start) {
    if (direct.ok) {
      return { kind: 'malformed', reason: `expected a JSON object, got ${Array.isArray(direct.value) ? 'an array' : typeof direct.value}` };
    }
    return { kind: 'not_found' };
  }

  const embedded = tryParse(cleaned.slice(start, end + 1));
  if (embedded.ok && isJsonObject(embedded.value)) {
    return { kind: 'found', value: embedded.value };
  }

  return {
    kind: 'malformed',
    reason: embedded.ok ? 'embedded JSON is not an object' : embedded.reason,
  };
}

const LEADING_BULLET = /^[\s\-•]+/;

/**
 * Turn a "Conflicts" section into a list. Blank text or "none" means no
 * conflicts.
 */
export function normalizeConflicts(text: string): string[] {
  const trimmed = text.trim();
  if (!trimmed || trimmed.toLowerCase() === 'none') return [];

  return trimmed
    .split(/\r?\n/)
    .map(line => line.replace(LEADING_BULLET, '').trim())
    .filter(line => line.length > 0);
}
