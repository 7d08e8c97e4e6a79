import { log } from "../logging.js";
import type { ResearchCorpus } from "../types/research.js";

/**
 * A rule that compares sources inside one corpus and reports contradictions
 * as human-readable lines, appended after the collaborator's own conflict
 * report.
 */
export interface ConflictDetector {
  readonly name: string;
  detect(corpus: ResearchCorpus): string[];
}

function numberVariants(value: number): string[] {
  const plain = String(value);
  return [plain, value.toLocaleString("en-US")];
}

/**
 * Flags web snippets that talk about employees without quoting the headcount
 * from the financial snapshot. Crude: any snippet that mentions staff and a
 * different figure is reported.
 */
export class EmployeeCountConflictDetector implements ConflictDetector {
  readonly name = "employee-count";

  detect(corpus: ResearchCorpus): string[] {
    const employees = corpus.financials?.employees;
    if (typeof employees !== "number") return [];

    const variants = numberVariants(employees);
    const conflicts: string[] = [];

    for (const record of corpus.records) {
      if (record.origin !== "web") continue;
      const body = record.body.toLowerCase();
      if (!body.includes("employee")) continue;
      if (variants.some(variant => body.includes(variant))) continue;

      const where = record.title ?? record.url ?? "a web result";
      conflicts.push(`Employees: financial data shows ${employees}, but ${where} mentions a different number`);
    }

    return conflicts;
  }
}

/**
 * Run every detector in order. A detector that throws is logged and skipped.
 */
export function runConflictDetectors(detectors: readonly ConflictDetector[], corpus: ResearchCorpus): string[] {
  const found: string[] = [];
  for (const detector of detectors) {
    try {
      found.push(...detector.detect(corpus));
    } catch (error) {
      log(`Conflict detector ${detector.name} failed`, "warning", {
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return found;
}
