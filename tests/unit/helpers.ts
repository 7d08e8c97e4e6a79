import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { TextGenerator } from '../../src/agents/llm-client.js';
import { defaultConfig, type AccountPlanConfig } from '../../src/utils/config-loader.js';

// Keep test output readable; errors still show
process.env.ACCOUNT_PLAN_LOG_LEVEL = process.env.ACCOUNT_PLAN_LOG_LEVEL ?? 'error';

/**
 * Collaborator stand-in that replays canned responses in order and records
 * every prompt it receives
 */
export class ScriptedGenerator implements TextGenerator {
  readonly calls: Array<{ prompt: string; maxOutputTokens: number }> = [];
  private readonly responses: Array<string | Error>;

  constructor(responses: Array<string | Error>) {
    this.responses = [...responses];
  }

  async generate(prompt: string, maxOutputTokens: number): Promise<string> {
    this.calls.push({ prompt, maxOutputTokens });
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('no scripted response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function makeTempDir(prefix: string = 'account-plan-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(dir: string): AccountPlanConfig {
  const config = defaultConfig();
  return {
    ...config,
    storage: {
      ...config.storage,
      planFile: path.join(dir, 'plans.json'),
      exportDir: path.join(dir, 'exports'),
    },
    llm: { ...config.llm, mock: true, mockDelayMs: 0 },
  };
}

export const FULL_PLAN: Record<string, string> = {
  company_overview: 'Acme builds industrial widgets.',
  key_stakeholders: 'Jane Roe, CTO',
  pain_points: 'Supply chain delays',
  value_proposition: 'Faster procurement',
  engagement_strategy: 'Start with the CTO office',
  success_metrics: 'Lead time down 20%',
  next_steps: 'Book discovery call within 30 days',
};
