import test from 'node:test';
import assert from 'node:assert/strict';
import './helpers.js';
import {
  EmployeeCountConflictDetector,
  runConflictDetectors,
  type ConflictDetector,
} from '../../src/agents/conflict-detection.js';
import { buildResearchCorpus } from '../../src/agents/source-aggregator.js';

const corpus = buildResearchCorpus('Acme', {
  web: [
    { title: 'Acme careers', snippet: 'Acme has 5,000 employees worldwide.' },
    { title: 'Acme about', snippet: 'Acme has 1,200 employees.' },
    { title: 'Acme blog', snippet: 'Our employee of the month is 1200 days in.' },
    { title: 'Acme products', snippet: 'Widgets and gears.' },
    { url: 'https://acme.test/team', snippet: 'Around 900 employees.' },
  ],
  financial: { employees: 1200 },
});

test('EmployeeCountConflictDetector flags web results quoting another headcount', () => {
  const detector = new EmployeeCountConflictDetector();
  assert.deepEqual(detector.detect(corpus), [
    'Employees: financial data shows 1200, but Acme careers mentions a different number',
    'Employees: financial data shows 1200, but https://acme.test/team mentions a different number',
  ]);
});

test('EmployeeCountConflictDetector needs a financial headcount', () => {
  const withoutFinancials = buildResearchCorpus('Acme', {
    web: [{ title: 'Acme careers', snippet: 'Acme has 5,000 employees.' }],
  });
  assert.deepEqual(new EmployeeCountConflictDetector().detect(withoutFinancials), []);
});

test('runConflictDetectors skips a detector that throws', () => {
  const broken: ConflictDetector = {
    name: 'broken',
    detect() {
      throw new Error('boom');
    },
  };
  const fixed: ConflictDetector = {
    name: 'fixed',
    detect: () => ['Revenue: two figures'],
  };

  assert.deepEqual(runConflictDetectors([broken, fixed], corpus), ['Revenue: two figures']);
});
