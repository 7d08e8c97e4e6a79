/**
 * LLM Mock Service
 *
 * Offline stand-in for the text-generation collaborator. Produces plausible,
 * well-formed responses for each pipeline stage so the server can be driven
 * end to end without API keys (ACCOUNT_PLAN_MOCK_LLM=true).
 */

import { log } from '../logging.js';
import type { TextGenerator } from '../agents/llm-client.js';
import type { PlanSectionSpec } from '../types/research.js';

export type MockPromptKind = 'synthesis' | 'plan' | 'section' | 'chat';

export interface MockTextGeneratorOptions {
  /** Required-field contract the mock plan must satisfy */
  sections: readonly PlanSectionSpec[];
  /** Simulated latency in ms (default: 250) */
  delayMs?: number;
}

/**
 * Simulate async delay for realistic testing
 */
async function simulateDelay(ms: number): Promise<void> {
  if (ms <= 0) return;
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Work out which stage a prompt came from
 */
export function classifyPrompt(prompt: string): MockPromptKind {
  if (prompt.includes('### Conflicts:') && prompt.includes('### Summary:')) return 'synthesis';
  if (prompt.includes('Generate ONLY valid JSON')) return 'plan';
  if (prompt.includes('Update this section of an account plan')) return 'section';
  return 'chat';
}

function capture(prompt: string, pattern: RegExp, fallback: string): string {
  const match = prompt.match(pattern);
  return match ? match[1].trim() : fallback;
}

function companyFrom(prompt: string): string {
  return capture(prompt, /^Company: (.+)$/m, 'the company');
}

// ============================================================================
// MOCK RESPONSE GENERATORS
// ============================================================================

export function mockSynthesis(prompt: string): string {
  const company = companyFrom(prompt);
  return [
    '### Summary:',
    `Mock: ${company} operates in its core market with a stable product line. ` +
      'Recent developments and financial figures were not verified in offline mode.',
    '',
    '### Conflicts:',
    'None',
  ].join('\n');
}

export function mockPlan(prompt: string, sections: readonly PlanSectionSpec[]): string {
  const company = companyFrom(prompt);
  const plan: Record<string, string> = {};
  for (const section of sections) {
    plan[section.key] = `Mock: ${section.key.replace(/_/g, ' ')} for ${company}.`;
  }
  // Fenced on purpose: real models often ignore "JSON only"
  return '```json\n' + JSON.stringify(plan, null, 2) + '\n```';
}

export function mockSectionRewrite(prompt: string): string {
  const section = capture(prompt, /^Section Name: (.+)$/m, 'section');
  const instruction = capture(prompt, /^User's Instruction: (.+)$/m, 'no instruction');
  return `Mock: ${section} rewritten to "${instruction}".`;
}

export function mockChat(prompt: string): string {
  // Latest user turn; earlier ones are history
  const latest = [...prompt.matchAll(/^User: (.+)$/gm)].pop();
  const message = latest ? latest[1].trim() : '';
  return message
    ? `Mock: I can research companies and draft account plans. You asked: "${message}".`
    : 'Mock: I can research companies and draft account plans.';
}

export class MockTextGenerator implements TextGenerator {
  private readonly sections: readonly PlanSectionSpec[];
  private readonly delayMs: number;
  readonly calls: Array<{ kind: MockPromptKind; maxOutputTokens: number }> = [];

  constructor(options: MockTextGeneratorOptions) {
    this.sections = options.sections;
    this.delayMs = options.delayMs ?? 250;
  }

  async generate(prompt: string, maxOutputTokens: number): Promise<string> {
    await simulateDelay(this.delayMs);

    const kind = classifyPrompt(prompt);
    this.calls.push({ kind, maxOutputTokens });
    log(`Mock LLM responding to ${kind} prompt`, 'debug', { promptLength: prompt.length });

    switch (kind) {
      case 'synthesis':
        return mockSynthesis(prompt);
      case 'plan':
        return mockPlan(prompt, this.sections);
      case 'section':
        return mockSectionRewrite(prompt);
      case 'chat':
        return mockChat(prompt);
    }
  }
}
