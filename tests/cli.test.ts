import { createProgram, formatSummary } from '@/cli.ts';
import type { SessionReport } from '@/types/index.ts';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeTempRoot, removeTempRoot } from './helpers/tempRoot.ts';

function report(overrides: Partial<SessionReport> = {}): SessionReport {
  return {
    startedAt: new Date(2024, 0, 2),
    durationMs: 1234,
    total: 0,
    passed: 0,
    failed: 0,
    skipped: 0,
    outcomes: [],
    sessionErrors: [],
    exitCode: 0,
    ...overrides,
  };
}

describe('formatSummary', () => {
  it('prints only the totals for a clean run', () => {
    expect(formatSummary(report({ total: 3, passed: 3 }))).toBe(
      '3 passed, 0 failed, 0 skipped in 1.23s'
    );
  });

  it('lists failures, skips and session errors before the totals', () => {
    const summary = formatSummary(
      report({
        total: 4,
        passed: 1,
        failed: 2,
        skipped: 1,
        exitCode: 1,
        outcomes: [
          {
            testId: 'calculator > add',
            suite: 'calculator',
            category: 'unit',
            phase: 'call',
            result: 'passed',
            durationMs: 1,
          },
          {
            testId: 'web form > submit',
            suite: 'web form',
            category: 'ui',
            phase: 'call',
            result: 'failed',
            durationMs: 900,
            error: { name: 'TimeoutError', message: 'Timed out after 10000ms' },
            screenshot: '/reports/failure_submit_20240102_030405.png',
          },
          {
            testId: 'calculator > exact',
            suite: 'calculator',
            category: 'unit',
            phase: 'call',
            result: 'failed',
            durationMs: 1,
            reason: 'unexpectedly passed: rounding',
          },
          {
            testId: 'ip echo > rate limiting',
            suite: 'ip echo',
            category: 'api',
            phase: 'setup',
            result: 'skipped',
            durationMs: 0,
          },
        ],
        sessionErrors: [{ name: 'FixtureTeardownError', message: 'browser would not close' }],
      })
    );

    expect(summary.split('\n')).toEqual([
      'FAILED  [ui] web form > submit (call) TimeoutError: Timed out after 10000ms',
      '        screenshot: /reports/failure_submit_20240102_030405.png',
      'FAILED  [unit] calculator > exact (call) (unexpectedly passed: rounding)',
      'SKIPPED [api] ip echo > rate limiting (no reason)',
      'ERROR   session teardown FixtureTeardownError: browser would not close',
      '1 passed, 2 failed, 1 skipped in 1.23s',
    ]);
  });
});

describe('run command', () => {
  let root: string;
  const output: string[] = [];

  beforeEach(async () => {
    root = await makeTempRoot();
    output.length = 0;
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      output.push(String(line));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await removeTempRoot(root);
  });

  it('runs the selected category and prints the summary', async () => {
    await createProgram().parseAsync(['run', '--root', root, '--category', 'unit'], {
      from: 'user',
    });

    expect(output).toHaveLength(1);
    expect(output[0]).toMatch(
      /^SKIPPED \[unit\] calculator > square root \(sqrt is not implemented\)$/m
    );
    expect(output[0]).toMatch(/^21 passed, 0 failed, 2 skipped in \d+\.\d{2}s$/m);
    expect(process.exitCode).toBe(0);
  });

  it('narrows the run by tag and id', async () => {
    await createProgram().parseAsync(
      ['run', '--root', root, '--tag', 'smoke', '--grep', 'calculator'],
      { from: 'user' }
    );

    expect(output[0]?.split('\n')).toHaveLength(1);
    expect(output[0]).toMatch(/^1 passed, 0 failed, 0 skipped in /);
  });
});
