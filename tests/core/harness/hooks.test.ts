import { ConfigurationError } from '@core/errors.ts';
import { LifecycleHooks, classifyTests, isTestCategory, selectTests } from '@core/harness/hooks.ts';
import type { TestCategory, TestOutcome, TestTag } from '@/types/index.ts';
import { describe, expect, it } from 'vitest';
import { captureLogs } from '../../helpers/logCapture.ts';

interface Listed {
  id: string;
  category: TestCategory;
  tags: TestTag[];
}

const tests: Listed[] = [
  { id: 'calculator > add', category: 'unit', tags: ['smoke'] },
  { id: 'calculator > power', category: 'unit', tags: [] },
  { id: 'placeholder api > get all users', category: 'api', tags: ['smoke'] },
  { id: 'data processing > full pipeline', category: 'integration', tags: ['slow'] },
];

describe('isTestCategory', () => {
  it('accepts exactly the four categories', () => {
    expect(['unit', 'integration', 'api', 'ui'].every(isTestCategory)).toBe(true);
    expect(isTestCategory('e2e')).toBe(false);
    expect(isTestCategory(undefined)).toBe(false);
  });
});

describe('classifyTests', () => {
  it('groups tests by category in collection order', () => {
    const groups = classifyTests(tests);

    expect(groups.get('unit')?.map((test) => test.id)).toEqual([
      'calculator > add',
      'calculator > power',
    ]);
    expect(groups.get('api')).toHaveLength(1);
    expect(groups.get('integration')).toHaveLength(1);
    expect(groups.get('ui')).toEqual([]);
  });

  it('rejects a test without a valid category', () => {
    const stray = [{ id: 'stray > test', category: 'e2e' }];

    expect(() => classifyTests(stray)).toThrow(ConfigurationError);
    expect(() => classifyTests(stray)).toThrow(
      'Test stray > test must declare exactly one of: unit, integration, api, ui'
    );
  });
});

describe('selectTests', () => {
  const ids = (selected: Listed[]) => selected.map((test) => test.id);

  it('keeps everything without a selection', () => {
    expect(selectTests(tests, {})).toEqual(tests);
  });

  it('filters by category', () => {
    expect(ids(selectTests(tests, { categories: ['api', 'integration'] }))).toEqual([
      'placeholder api > get all users',
      'data processing > full pipeline',
    ]);
  });

  it('keeps tests carrying any requested tag', () => {
    expect(ids(selectTests(tests, { tags: ['smoke'] }))).toEqual([
      'calculator > add',
      'placeholder api > get all users',
    ]);
  });

  it('matches the id case-insensitively', () => {
    expect(ids(selectTests(tests, { grep: 'CALCULATOR' }))).toEqual([
      'calculator > add',
      'calculator > power',
    ]);
  });

  it('combines filters', () => {
    expect(ids(selectTests(tests, { categories: ['unit'], tags: ['smoke'], grep: 'add' }))).toEqual(
      ['calculator > add']
    );
    expect(selectTests(tests, { categories: ['ui'] })).toEqual([]);
  });
});

describe('LifecycleHooks', () => {
  it('logs the collected counts', () => {
    const { logger, lines } = captureLogs();

    new LifecycleHooks(logger).collected(tests);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      msg: 'Collected 4 tests',
      total: 4,
      unit: 2,
      integration: 1,
      api: 1,
      ui: 0,
    });
  });

  it('logs failures at error level with the error summary', () => {
    const { logger, lines } = captureLogs();
    const outcome: TestOutcome = {
      testId: 'calculator > add',
      suite: 'calculator',
      category: 'unit',
      phase: 'call',
      result: 'failed',
      durationMs: 3,
      error: { name: 'AssertionError', message: 'expected 3 to equal 4' },
    };

    new LifecycleHooks(logger).outcome(outcome);

    expect(lines[0]).toMatchObject({
      level: 'error',
      msg: 'Test failed: calculator > add',
      type: 'test',
      phase: 'call',
      error: 'AssertionError: expected 3 to equal 4',
    });
  });

  it('logs skips with their reason', () => {
    const { logger, lines } = captureLogs();

    new LifecycleHooks(logger).outcome({
      testId: 'ip echo > rate limiting',
      suite: 'ip echo',
      category: 'api',
      phase: 'setup',
      result: 'skipped',
      durationMs: 0,
      reason: 'may trigger rate limiting',
    });

    expect(lines[0]).toMatchObject({
      level: 'info',
      msg: 'Test skipped: ip echo > rate limiting',
      reason: 'may trigger rate limiting',
    });
  });

  it('logs session start and finish', () => {
    const { logger, messages } = captureLogs();
    const hooks = new LifecycleHooks(logger);

    hooks.sessionStarted({ selected: 0 });
    hooks.sessionFinished({
      startedAt: new Date(),
      durationMs: 1,
      total: 0,
      passed: 0,
      failed: 0,
      skipped: 0,
      outcomes: [],
      sessionErrors: [],
      exitCode: 0,
    });

    expect(messages()).toEqual(['Starting test session', 'Test session finished']);
  });
});
