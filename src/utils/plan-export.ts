/**
 * Plan export and rendering
 *
 * Single source of truth for export file names: nothing else builds them.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { AccountPlan } from '../types/research.js';

export const EXPORTED_AT_KEY = 'exported_at';

/**
 * JSON export: the plan plus an `exported_at` timestamp, two-space indented
 */
export function exportPlanJson(plan: AccountPlan, now: Date = new Date()): string {
  return JSON.stringify({ ...plan, [EXPORTED_AT_KEY]: now.toISOString() }, null, 2);
}

/**
 * Markdown view, one `### section` block per entry in plan order
 */
export function planToMarkdown(plan: AccountPlan): string {
  return Object.entries(plan)
    .map(([section, content]) => `### ${section}\n${content}\n`)
    .join('\n');
}

/**
 * Turn a company name into a file-system safe slug
 */
export function planFileName(company: string): string {
  const slug = company
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `${slug || 'company'}-account-plan.json`;
}

/**
 * Write the JSON export as UTF-8 and return its path
 */
export async function exportPlanToFile(
  directory: string,
  company: string,
  plan: AccountPlan,
  now: Date = new Date()
): Promise<string> {
  await fs.mkdir(directory, { recursive: true });
  const target = path.join(directory, planFileName(company));
  await fs.writeFile(target, exportPlanJson(plan, now), 'utf8');
  return target;
}
