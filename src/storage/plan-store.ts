/**
 * Plan Store
 *
 * Persists account plans in a single JSON document keyed by exact company
 * name. Every call reads the whole document and every mutation rewrites it:
 * last writer wins, there is no locking between processes.
 *
 * Two entry shapes are accepted on read:
 * - a raw section map: { "company_overview": "...", ... }
 * - a wrapped plan: { "plan": {...}, "created_at": "...", "version": "1.0" }
 * Writes always use the wrapped shape.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from '../logging.js';
import type { AccountPlan, PersistedPlanEnvelope, StoredPlanRecord } from '../types/research.js';

export interface PlanStoreOptions {
  filePath: string;
  /** Written into the `version` field of every saved entry */
  formatVersion: string;
  now?: () => Date;
}

type PlanDocument = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Define an own enumerable property. Plain assignment would treat a key
 * named `__proto__` as the prototype setter.
 */
function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function toSectionMap(value: Record<string, unknown>): AccountPlan {
  const plan: AccountPlan = {};
  for (const [key, content] of Object.entries(value)) {
    if (typeof content === 'string') {
      setEntry(plan, key, content);
    } else if (content !== null && content !== undefined) {
      setEntry(plan, key, typeof content === 'object' ? JSON.stringify(content) : String(content));
    }
  }
  return plan;
}

function isEnvelope(value: Record<string, unknown>): boolean {
  return isRecord(value.plan) && ('created_at' in value || 'version' in value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read one stored entry in either shape
 */
export function decodeEntry(company: string, value: unknown): StoredPlanRecord | null {
  if (!isRecord(value)) return null;

  if (isEnvelope(value) && isRecord(value.plan)) {
    return {
      company,
      plan: toSectionMap(value.plan),
      createdAt: optionalString(value.created_at),
      updatedAt: optionalString(value.updated_at),
      version: optionalString(value.version),
    };
  }

  return { company, plan: toSectionMap(value) };
}

export class PlanStore {
  private readonly filePath: string;
  private readonly formatVersion: string;
  private readonly now: () => Date;

  constructor(options: PlanStoreOptions) {
    this.filePath = options.filePath;
    this.formatVersion = options.formatVersion;
    this.now = options.now ?? (() => new Date());
    this.ensureFile();
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Create the document as `{}` if it does not exist yet
   */
  private ensureFile(): void {
    try {
      if (!fs.existsSync(this.filePath)) {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        fs.writeFileSync(this.filePath, '{}');
        log('Plan store initialized', 'info', { path: this.filePath });
      }
    } catch (error) {
      log('Could not initialize plan store', 'error', { error: String(error), path: this.filePath });
    }
  }

  /**
   * Read the whole document. Empty, unparsable or non-object content is
   * reset to `{}`. Returns null when the file cannot be read at all.
   */
  private readDocument(): PlanDocument | null {
    let text: string;
    try {
      text = fs.existsSync(this.filePath) ? fs.readFileSync(this.filePath, 'utf8').trim() : '';
    } catch (error) {
      log('Could not read plan store', 'error', { error: String(error), path: this.filePath });
      return null;
    }

    if (!text) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      log('Plan store is corrupted, resetting to empty', 'warning', { error: String(error), path: this.filePath });
      this.writeDocument({});
      return {};
    }

    if (!isRecord(parsed)) {
      log('Plan store does not hold an object, resetting to empty', 'warning', { path: this.filePath });
      this.writeDocument({});
      return {};
    }

    return parsed;
  }

  /**
   * Replace the document through a temporary sibling file and a rename
   */
  private writeDocument(document: PlanDocument): boolean {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(document, null, 2), 'utf8');
      fs.renameSync(tempPath, this.filePath);
      log('Plan store saved', 'debug', { path: this.filePath, companies: Object.keys(document).length });
      return true;
    } catch (error) {
      log('Could not write plan store', 'error', { error: String(error), path: this.filePath });
      try {
        if (fs.existsSync(tempPath)) fs.unlinkSync(tempPath);
      } catch (cleanupError) {
        log('Could not remove temporary plan store file', 'warning', { error: String(cleanupError), path: tempPath });
      }
      return false;
    }
  }

  /**
   * Insert or overwrite the plan stored under this exact company name
   */
  save(company: string, plan: AccountPlan): boolean {
    const document = this.readDocument();
    if (!document) return false;

    const envelope: PersistedPlanEnvelope = {
      plan: { ...plan },
      created_at: this.now().toISOString(),
      version: this.formatVersion,
    };
    setEntry<unknown>(document, company, envelope);

    const saved = this.writeDocument(document);
    if (saved) {
      log(`Account plan saved for ${company}`, 'info', { sections: Object.keys(plan).length });
    }
    return saved;
  }

  load(company: string): AccountPlan | null {
    return this.loadRecord(company)?.plan ?? null;
  }

  loadRecord(company: string): StoredPlanRecord | null {
    const document = this.readDocument();
    if (!document || !Object.prototype.hasOwnProperty.call(document, company)) {
      return null;
    }

    const record = decodeEntry(company, document[company]);
    if (!record) {
      log(`Ignoring unreadable plan entry for ${company}`, 'warning');
    }
    return record;
  }

  /**
   * Every key in the document, in the order it holds them. Entries that do
   * not decode to a plan are listed too; `load` returns null for them.
   */
  listCompanies(): string[] {
    const document = this.readDocument();
    if (!document) return [];
    return Object.keys(document);
  }

  /**
   * Replace one existing section. Unknown companies and sections are refused;
   * sections are never created here.
   */
  updateSection(company: string, sectionKey: string, content: string): boolean {
    const document = this.readDocument();
    if (!document || !Object.prototype.hasOwnProperty.call(document, company)) {
      log(`Cannot update section: no plan for ${company}`, 'warning', { sectionKey });
      return false;
    }

    const entry = document[company];
    const record = decodeEntry(company, entry);
    if (!record || !Object.prototype.hasOwnProperty.call(record.plan, sectionKey)) {
      log(`Cannot update section: ${sectionKey} not in plan for ${company}`, 'warning');
      return false;
    }

    const plan: AccountPlan = { ...record.plan, [sectionKey]: content };
    const envelope: PersistedPlanEnvelope = {
      plan,
      created_at: record.createdAt ?? this.now().toISOString(),
      updated_at: this.now().toISOString(),
      version: record.version ?? this.formatVersion,
    };
    setEntry<unknown>(document, company, envelope);

    const saved = this.writeDocument(document);
    if (saved) {
      log(`Section ${sectionKey} updated for ${company}`, 'info');
    }
    return saved;
  }
}
