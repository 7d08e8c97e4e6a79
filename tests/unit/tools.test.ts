import { afterEach, beforeEach, describe, test } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { makeTempDir, removeDir, testConfig } from './helpers.js';
import { DEFAULT_PLAN_SECTIONS } from '../../src/utils/config-loader.js';
import { TOOLS, createToolContext, handleToolCall, setToolContext, type ToolResult } from '../../src/tools.js';

function textOf(result: ToolResult): string {
  return result.content.map(part => part.text).join('');
}

describe('tool handlers', () => {
  let dir: string;

  async function researchAcme(): Promise<ToolResult> {
    return handleToolCall('research_company', {
      company: 'Acme',
      wiki: 'Acme makes widgets.',
      fetch_sources: false,
    });
  }

  beforeEach(() => {
    dir = makeTempDir();
    setToolContext(createToolContext(testConfig(dir)));
  });

  afterEach(() => {
    setToolContext(null);
    removeDir(dir);
  });

  test('every tool is listed with an object schema', () => {
    assert.deepEqual(TOOLS.map(tool => tool.name), [
      'test_connection',
      'research_company',
      'list_account_plans',
      'get_account_plan',
      'update_plan_section',
      'regenerate_plan_section',
      'export_account_plan',
      'research_chat',
    ]);
    for (const tool of TOOLS) {
      assert.equal(tool.inputSchema.type, 'object');
    }
  });

  test('test_connection reports the store and the mock LLM', async () => {
    const text = textOf(await handleToolCall('test_connection', {}));
    assert.ok(text.includes(`Plan store: ${path.join(dir, 'plans.json')}\n`));
    assert.ok(text.endsWith('LLM: mock'));
  });

  test('research_company builds and saves a plan', async () => {
    const result = await researchAcme();
    const text = textOf(result);

    assert.equal(result.isError, undefined);
    assert.ok(text.startsWith('# Account research: Acme\n\n## Synthesized Summary\nMock: Acme operates in its core market'));
    assert.ok(text.includes('## Account Plan\n### company_overview\nMock: company overview for Acme.\n'));
    assert.ok(text.endsWith('Plan saved.'));
    assert.equal(text.includes('## Conflicts detected in the sources'), false);
  });

  test('research_company takes the company from a free-form query', async () => {
    const text = textOf(
      await handleToolCall('research_company', { query: 'Tell me about Globex?', fetch_sources: false })
    );
    assert.ok(text.startsWith('# Account research: Globex\n'));
  });

  test('research_company needs a company', async () => {
    const result = await handleToolCall('research_company', { fetch_sources: false });
    assert.deepEqual(result, {
      content: [{ type: 'text', text: 'Error: Please provide a company name' }],
      isError: true,
    });
  });

  test('research_company keeps the company name exactly as given', async () => {
    const researched = await handleToolCall('research_company', {
      company: ' Acme ',
      wiki: 'Acme makes widgets.',
      fetch_sources: false,
    });
    assert.equal(researched.isError, undefined);

    assert.equal(textOf(await handleToolCall('list_account_plans', {})), 'Saved account plans (1):\n-  Acme ');
    const plan = await handleToolCall('get_account_plan', { company: ' Acme ' });
    assert.equal(plan.isError, undefined);
    const trimmed = await handleToolCall('get_account_plan', { company: 'Acme' });
    assert.equal(textOf(trimmed), 'No account plan found for Acme');
  });

  test('research_company treats a blank company as missing', async () => {
    const result = await handleToolCall('research_company', { company: '   ', fetch_sources: false });
    assert.equal(textOf(result), 'Error: Please provide a company name');
  });

  test('research_company validates source lists', async () => {
    assert.equal(
      textOf(await handleToolCall('research_company', { company: 'Acme', web: 'not a list' })),
      'Error: "web" must be a list of source items'
    );
    assert.equal(
      textOf(await handleToolCall('research_company', { company: 'Acme', news: ['headline'] })),
      'Error: news.0: must be an object'
    );
  });

  test('list_account_plans lists saved companies', async () => {
    assert.equal(textOf(await handleToolCall('list_account_plans', {})), 'No saved account plans.');
    await researchAcme();
    assert.equal(textOf(await handleToolCall('list_account_plans', {})), 'Saved account plans (1):\n- Acme');
  });

  test('get_account_plan returns JSON or markdown', async () => {
    await researchAcme();

    const expected = Object.fromEntries(
      DEFAULT_PLAN_SECTIONS.map(s => [s.key, `Mock: ${s.key.replace(/_/g, ' ')} for Acme.`])
    );
    const json = textOf(await handleToolCall('get_account_plan', { company: 'Acme', format: 'json' }));
    assert.equal(json, JSON.stringify(expected, null, 2));

    const markdown = textOf(await handleToolCall('get_account_plan', { company: 'Acme' }));
    assert.ok(markdown.startsWith('### company_overview\nMock: company overview for Acme.\n'));

    const missing = await handleToolCall('get_account_plan', { company: 'Globex' });
    assert.equal(missing.isError, true);
    assert.equal(textOf(missing), 'No account plan found for Globex');
  });

  test('get_account_plan validates its arguments', async () => {
    assert.equal(textOf(await handleToolCall('get_account_plan', {})), 'Error: "company" is required');
    assert.equal(
      textOf(await handleToolCall('get_account_plan', { company: 'Acme', format: 'xml' })),
      'Error: "format" must be markdown or json'
    );
  });

  test('regenerate_plan_section rejects a non-boolean apply', async () => {
    const result = await handleToolCall('regenerate_plan_section', {
      company: 'Acme',
      section: 'next_steps',
      instruction: 'x',
      apply: 'yes',
    });
    assert.deepEqual(result, {
      content: [{ type: 'text', text: 'Error: "apply" must be true or false' }],
      isError: true,
    });
  });

  test('update_plan_section replaces existing sections only', async () => {
    await researchAcme();

    const updated = await handleToolCall('update_plan_section', {
      company: 'Acme',
      section: 'pain_points',
      content: 'Rising logistics costs',
    });
    assert.equal(textOf(updated), 'Section pain_points updated and saved for Acme.');

    const plan = textOf(await handleToolCall('get_account_plan', { company: 'Acme' }));
    assert.ok(plan.includes('### pain_points\nRising logistics costs\n'));

    const refused = await handleToolCall('update_plan_section', { company: 'Acme', section: 'budget', content: 'x' });
    assert.equal(refused.isError, true);
    assert.equal(textOf(refused), 'Update failed: check the company name and section key.');
  });

  test('regenerate_plan_section saves or previews the rewrite', async () => {
    await researchAcme();

    const preview = await handleToolCall('regenerate_plan_section', {
      company: 'Acme',
      section: 'next_steps',
      instruction: 'Add a demo',
      apply: false,
    });
    assert.equal(textOf(preview), '### next_steps\nMock: next_steps rewritten to "Add a demo".\n\nPreview only, not saved.');

    const saved = await handleToolCall('regenerate_plan_section', {
      company: 'Acme',
      section: 'next_steps',
      instruction: 'Add a demo',
    });
    assert.equal(textOf(saved), '### next_steps\nMock: next_steps rewritten to "Add a demo".\n\nSection updated and saved.');

    const plan = textOf(await handleToolCall('get_account_plan', { company: 'Acme' }));
    assert.ok(plan.includes('### next_steps\nMock: next_steps rewritten to "Add a demo".\n'));
  });

  test('regenerate_plan_section reports a missing plan', async () => {
    const result = await handleToolCall('regenerate_plan_section', {
      company: 'Globex',
      section: 'next_steps',
      instruction: 'x',
    });
    assert.deepEqual(result, {
      content: [{ type: 'text', text: 'No account plan found for Globex' }],
      isError: true,
    });
  });

  test('export_account_plan writes a timestamped JSON file', async () => {
    await researchAcme();
    const outputDir = path.join(dir, 'out');

    const text = textOf(await handleToolCall('export_account_plan', { company: 'Acme', output_dir: outputDir }));

    const target = path.join(outputDir, 'acme-account-plan.json');
    assert.ok(text.startsWith(`Exported to ${target}\n\n{`));
    const exported: unknown = JSON.parse(fs.readFileSync(target, 'utf8'));
    assert.ok(exported instanceof Object && 'exported_at' in exported && 'company_overview' in exported);
  });

  test('research_chat answers through the session', async () => {
    const text = textOf(await handleToolCall('research_chat', { message: 'Hello' }));
    assert.equal(text, 'Mock: I can research companies and draft account plans. You asked: "Hello".');
  });

  test('unknown tools are reported as errors', async () => {
    assert.deepEqual(await handleToolCall('nope', {}), {
      content: [{ type: 'text', text: 'Error: Unknown tool: nope' }],
      isError: true,
    });
  });
});
