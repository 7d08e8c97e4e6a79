import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { makeTempDir, removeDir } from './helpers.js';
import {
  EXPORTED_AT_KEY,
  exportPlanJson,
  exportPlanToFile,
  planFileName,
  planToMarkdown,
} from '../../src/utils/plan-export.js';

const EXPORT_TIME = new Date('2026-01-02T03:04:05.000Z');

test('exportPlanJson adds exported_at and indents two spaces', () => {
  assert.equal(
    exportPlanJson({ company_overview: 'Widgets' }, EXPORT_TIME),
    '{\n  "company_overview": "Widgets",\n  "exported_at": "2026-01-02T03:04:05.000Z"\n}'
  );
});

test('exportPlanJson keeps every section and leaves the plan untouched', () => {
  const plan = { a: 'x', b: 'y' };
  const parsed: unknown = JSON.parse(exportPlanJson(plan, EXPORT_TIME));
  assert.deepEqual(parsed, { a: 'x', b: 'y', [EXPORTED_AT_KEY]: '2026-01-02T03:04:05.000Z' });
  assert.deepEqual(plan, { a: 'x', b: 'y' });
});

test('planToMarkdown renders one block per section', () => {
  assert.equal(planToMarkdown({ a: 'x', b: 'y' }), '### a\nx\n\n### b\ny\n');
  assert.equal(planToMarkdown({}), '');
});

test('planFileName slugs the company name', () => {
  assert.equal(planFileName('Acme, Inc.'), 'acme-inc-account-plan.json');
  assert.equal(planFileName('Café Ñu'), 'cafe-nu-account-plan.json');
  assert.equal(planFileName('../etc/passwd'), 'etc-passwd-account-plan.json');
  assert.equal(planFileName('!!!'), 'company-account-plan.json');
});

test('exportPlanToFile writes the JSON export into the directory', async () => {
  const dir = makeTempDir();
  try {
    const target = await exportPlanToFile(path.join(dir, 'exports'), 'Acme', { a: 'x' }, EXPORT_TIME);
    assert.equal(target, path.join(dir, 'exports', 'acme-account-plan.json'));
    assert.equal(fs.readFileSync(target, 'utf8'), exportPlanJson({ a: 'x' }, EXPORT_TIME));
  } finally {
    removeDir(dir);
  }
});
