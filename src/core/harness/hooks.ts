import type { SessionReport, TestCategory, TestOutcome, TestSelection } from '@/types/index.ts';
import { testCategories } from '@/types/index.ts';
import { type LogHelpers, type Logger, createLogHelpers } from '@services/logger/index.ts';
import { z } from 'zod';
import { ConfigurationError } from '../errors.ts';
import type { CollectedTest } from './suite.ts';

const categorySchema = z.enum(testCategories);

export function isTestCategory(value: unknown): value is TestCategory {
  return categorySchema.safeParse(value).success;
}

/**
 * Group collected tests by their declared category
 * Pure; a test without exactly one valid category is a configuration error.
 */
export function classifyTests<T extends { id: string; category: string }>(
  tests: readonly T[]
): Map<TestCategory, T[]> {
  const groups = new Map<TestCategory, T[]>(testCategories.map((category) => [category, []]));

  for (const test of tests) {
    const parsed = categorySchema.safeParse(test.category);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Test ${test.id} must declare exactly one of: ${testCategories.join(', ')}`
      );
    }
    groups.get(parsed.data)?.push(test);
  }

  return groups;
}

/**
 * Filter tests by category, tag and id substring, keeping collection order
 */
export function selectTests<T extends Pick<CollectedTest<unknown>, 'id' | 'category' | 'tags'>>(
  tests: readonly T[],
  selection: TestSelection
): T[] {
  const grep = selection.grep?.toLowerCase();

  return tests.filter((test) => {
    if (selection.categories?.length && !selection.categories.includes(test.category)) {
      return false;
    }
    if (selection.tags?.length && !selection.tags.some((tag) => test.tags.includes(tag))) {
      return false;
    }
    return grep === undefined || test.id.toLowerCase().includes(grep);
  });
}

/**
 * Session-wide observation points
 * Observers only: they log and never change what they are given.
 */
export class LifecycleHooks {
  private readonly log: LogHelpers;

  constructor(private readonly logger: Logger) {
    this.log = createLogHelpers(logger);
  }

  /**
   * Collection-time classification, run once before execution
   */
  collected<T extends { id: string; category: string }>(
    tests: readonly T[]
  ): Map<TestCategory, T[]> {
    const groups = classifyTests(tests);
    const counts = Object.fromEntries(
      [...groups].map(([category, members]) => [category, members.length])
    );

    this.logger.info({ total: tests.length, ...counts }, `Collected ${tests.length} tests`);
    return groups;
  }

  sessionStarted(details: Record<string, unknown>): void {
    this.log.session({ event: 'started', details });
  }

  /**
   * One log line per finished test
   */
  outcome(outcome: Readonly<TestOutcome>): void {
    this.log.test({
      testId: outcome.testId,
      category: outcome.category,
      phase: outcome.phase,
      result: outcome.result,
      durationMs: outcome.durationMs,
      reason: outcome.reason,
      error: outcome.error,
      screenshot: outcome.screenshot,
    });
  }

  sessionFinished(report: Readonly<SessionReport>): void {
    this.log.session({
      event: 'finished',
      details: {
        total: report.total,
        passed: report.passed,
        failed: report.failed,
        skipped: report.skipped,
        durationMs: report.durationMs,
        exitCode: report.exitCode,
      },
    });
  }
}
