import test from 'node:test';
import assert from 'node:assert/strict';
import { FULL_PLAN, ScriptedGenerator } from './helpers.js';
import { PlanGenerationAgent, buildPlanPrompt, sectionText } from '../../src/agents/plan-generation-agent.js';
import { DEFAULT_PLAN_SECTIONS } from '../../src/utils/config-loader.js';

function agentWith(responses: Array<string | Error>): { agent: PlanGenerationAgent; generator: ScriptedGenerator } {
  const generator = new ScriptedGenerator(responses);
  const agent = new PlanGenerationAgent(generator, { sections: DEFAULT_PLAN_SECTIONS, maxOutputTokens: 4096 });
  return { agent, generator };
}

test('buildPlanPrompt names the company and every required key', () => {
  const prompt = buildPlanPrompt('Acme', 'Acme builds widgets.', DEFAULT_PLAN_SECTIONS);
  assert.ok(prompt.includes('Company: Acme'));
  assert.ok(prompt.includes('Acme builds widgets.'));
  for (const section of DEFAULT_PLAN_SECTIONS) {
    assert.ok(prompt.includes(`"${section.key}"`), section.key);
  }
});

test('generate accepts a fenced plan with every required section', async () => {
  const raw = '```json\n' + JSON.stringify(FULL_PLAN) + '\n```';
  const { agent, generator } = agentWith([raw]);

  const result = await agent.generate('Acme', 'summary');

  assert.deepEqual(result, { ok: true, plan: FULL_PLAN, raw });
  assert.equal(generator.calls[0].maxOutputTokens, 4096);
});

test('generate finds a plan wrapped in prose', async () => {
  const { agent } = agentWith([`Here is your plan:\n${JSON.stringify(FULL_PLAN)}\nGood luck!`]);
  const result = await agent.generate('Acme', 'summary');
  assert.equal(result.ok, true);
});

test('generate fails when a required section is missing', async () => {
  const { next_steps: _dropped, ...partial } = FULL_PLAN;
  const { agent } = agentWith([JSON.stringify(partial)]);

  const result = await agent.generate('Acme', 'summary');

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.reason, 'missing_sections');
    assert.deepEqual(result.missingSections, ['next_steps']);
    assert.equal(result.diagnostic, 'Generated plan is missing required sections: next_steps');
  }
});

test('generate treats an empty required section as missing', async () => {
  const { agent } = agentWith([JSON.stringify({ ...FULL_PLAN, pain_points: '  ', success_metrics: [] })]);

  const result = await agent.generate('Acme', 'summary');

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.deepEqual(result.missingSections, ['pain_points', 'success_metrics']);
  }
});

test('generate reports output without JSON', async () => {
  const { agent } = agentWith(['I could not build a plan.']);
  const result = await agent.generate('Acme', 'summary');
  assert.deepEqual(result, {
    ok: false,
    reason: 'no_json',
    diagnostic: 'The model did not return a JSON account plan.',
    raw: 'I could not build a plan.',
  });
});

test('generate reports malformed JSON', async () => {
  const { agent } = agentWith(['{"company_overview": "Acme",}']);
  const result = await agent.generate('Acme', 'summary');
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.reason, 'malformed_json');
    assert.ok(result.diagnostic.startsWith('The model returned malformed JSON: '));
  }
});

test('generate reports a collaborator failure', async () => {
  const { agent } = agentWith([new Error('rate limited')]);
  assert.deepEqual(await agent.generate('Acme', 'summary'), {
    ok: false,
    reason: 'collaborator_error',
    diagnostic: 'Error generating account plan: rate limited',
  });
});

test('generate orders required sections first and keeps extra keys', async () => {
  const shuffled = { extra_notes: 'Keep an eye on Q3', ...FULL_PLAN, empty_extra: '' };
  const { agent } = agentWith([JSON.stringify(shuffled)]);

  const result = await agent.generate('Acme', 'summary');

  assert.equal(result.ok, true);
  if (result.ok) {
    assert.deepEqual(Object.keys(result.plan), [...DEFAULT_PLAN_SECTIONS.map(s => s.key), 'extra_notes']);
  }
});

test('generate honours a custom section contract', async () => {
  const generator = new ScriptedGenerator([JSON.stringify({ goals: 'Grow', risks: 'Churn' })]);
  const agent = new PlanGenerationAgent(generator, {
    sections: [
      { key: 'goals', description: 'Account goals' },
      { key: 'risks', description: '' },
    ],
    maxOutputTokens: 100,
  });

  assert.deepEqual(agent.requiredSections, ['goals', 'risks']);
  const result = await agent.generate('Acme', 'summary');
  assert.deepEqual(result.ok && result.plan, { goals: 'Grow', risks: 'Churn' });
  assert.ok(generator.calls[0].prompt.includes('"risks": "Content for risks"'));
});

test('sectionText flattens structured values', () => {
  assert.equal(sectionText('  text  '), 'text');
  assert.equal(sectionText(42), '42');
  assert.equal(sectionText(null), '');
  assert.equal(sectionText(['Jane Roe', 'John Doe', '']), '- Jane Roe\n- John Doe');
  assert.equal(sectionText({ owner: 'Jane', budget: 5000 }), 'owner: Jane\nbudget: 5000');
});
