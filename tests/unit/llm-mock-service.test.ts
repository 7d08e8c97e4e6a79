import test from 'node:test';
import assert from 'node:assert/strict';
import './helpers.js';
import { MockTextGenerator, classifyPrompt, mockChat } from '../../src/mock/llm-mock-service.js';
import { SynthesisAgent, buildSynthesisPrompt } from '../../src/agents/synthesis-agent.js';
import { PlanGenerationAgent, buildPlanPrompt } from '../../src/agents/plan-generation-agent.js';
import { SectionRegenerationAgent, buildSectionPrompt } from '../../src/agents/section-regeneration-agent.js';
import { buildChatPrompt } from '../../src/agents/chat-agent.js';
import { buildResearchCorpus } from '../../src/agents/source-aggregator.js';
import { DEFAULT_PLAN_SECTIONS } from '../../src/utils/config-loader.js';

const corpus = buildResearchCorpus('Acme', { wiki: 'Acme makes widgets.' });

test('classifyPrompt recognises each stage prompt', () => {
  assert.equal(classifyPrompt(buildSynthesisPrompt(corpus)), 'synthesis');
  assert.equal(classifyPrompt(buildPlanPrompt('Acme', 'summary', DEFAULT_PLAN_SECTIONS)), 'plan');
  assert.equal(
    classifyPrompt(
      buildSectionPrompt({ section: 'a', currentContent: 'b', instruction: 'c', researchContext: 'd' }, 1000)
    ),
    'section'
  );
  assert.equal(classifyPrompt(buildChatPrompt([], 'Hello')), 'chat');
});

test('mock synthesis passes through the synthesis stage', async () => {
  const generator = new MockTextGenerator({ sections: DEFAULT_PLAN_SECTIONS, delayMs: 0 });
  const outcome = await new SynthesisAgent(generator, { maxOutputTokens: 2048 }).synthesize(corpus);

  assert.ok(outcome.summary.startsWith('Mock: Acme operates in its core market'));
  assert.deepEqual(outcome.conflicts, []);
  assert.deepEqual(generator.calls, [{ kind: 'synthesis', maxOutputTokens: 2048 }]);
});

test('mock plan satisfies the configured section contract', async () => {
  const generator = new MockTextGenerator({ sections: DEFAULT_PLAN_SECTIONS, delayMs: 0 });
  const result = await new PlanGenerationAgent(generator, {
    sections: DEFAULT_PLAN_SECTIONS,
    maxOutputTokens: 4096,
  }).generate('Acme', 'summary');

  assert.equal(result.ok, true);
  if (result.ok) {
    assert.equal(result.plan.company_overview, 'Mock: company overview for Acme.');
    assert.deepEqual(Object.keys(result.plan), DEFAULT_PLAN_SECTIONS.map(s => s.key));
  }
});

test('mock section rewrite echoes the section and instruction', async () => {
  const generator = new MockTextGenerator({ sections: DEFAULT_PLAN_SECTIONS, delayMs: 0 });
  const result = await new SectionRegenerationAgent(generator, {
    maxOutputTokens: 1024,
    researchContextChars: 1000,
  }).regenerate({ section: 'next_steps', currentContent: 'Call', instruction: 'Add a demo', researchContext: '' });

  assert.deepEqual(result, { ok: true, text: 'Mock: next_steps rewritten to "Add a demo".' });
});

test('mock chat answers the latest user message', () => {
  const prompt = buildChatPrompt(
    [
      { role: 'user', content: 'First question' },
      { role: 'assistant', content: 'First answer' },
    ],
    'Second question'
  );
  assert.equal(
    mockChat(prompt),
    'Mock: I can research companies and draft account plans. You asked: "Second question".'
  );
});
