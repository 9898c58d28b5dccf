import type { Logger } from '@services/logger/index.ts';
import type {
  OutcomeError,
  SessionReport,
  TestOutcome,
  TestPhase,
  TestSelection,
} from '@/types/index.ts';
import { toError } from '../errors.ts';
import type { FixtureRegistry } from '../fixtures/FixtureRegistry.ts';
import type { ScopeInstance } from '../fixtures/ScopeInstance.ts';
import type { FixtureName } from '../fixtures/types.ts';
import { type LifecycleHooks, selectTests } from './hooks.ts';
import type { CollectedTest, Suite } from './suite.ts';

/**
 * Passed to the failure hook while the test's fixtures are still alive
 */
export interface FailureContext<F> {
  test: CollectedTest<F>;
  error: unknown;
  /** Value of an already constructed fixture, if any */
  peek: <K extends FixtureName<F>>(name: K) => F[K] | undefined;
}

export interface TestRunnerOptions<F> {
  /**
   * Runs after a failed setup or call, before teardown
   * May return the path of an artifact (a screenshot) to attach to the outcome.
   */
  onFailure?: (context: FailureContext<F>) => Promise<string | undefined>;
}

interface Failure {
  error: unknown;
}

/**
 * TestRunner
 * Runs collected tests one at a time: setup, call, teardown
 */
export class TestRunner<F> {
  private readonly logger: Logger;

  constructor(
    private readonly registry: FixtureRegistry<F>,
    private readonly hooks: LifecycleHooks,
    logger: Logger,
    private readonly options: TestRunnerOptions<F> = {}
  ) {
    this.logger = logger.child({ component: 'TestRunner' });
  }

  /**
   * Run every selected test of the given suites
   * Configuration problems (bad fixture graph, bad category) throw before anything runs.
   */
  async run(suites: readonly Suite<F>[], selection: TestSelection = {}): Promise<SessionReport> {
    const startedAt = new Date();
    const collected = suites.flatMap((suite) => suite.tests);

    this.registry.validate();
    this.hooks.collected(collected);

    const selected = selectTests(collected, selection);
    this.hooks.sessionStarted({
      collected: collected.length,
      selected: selected.length,
      ...selection,
    });

    const outcomes: TestOutcome[] = [];
    const sessionErrors: OutcomeError[] = [];
    const session = this.registry.openSession();

    try {
      for (const test of selected) {
        const outcome = await this.runTest(test);
        outcomes.push(outcome);
        this.report(outcome);
      }
    } finally {
      try {
        await this.registry.closeScope(session);
      } catch (error) {
        this.logger.error({ err: error }, 'Session teardown failed');
        sessionErrors.push(summarize(error));
      }
    }

    const count = (result: TestOutcome['result']) =>
      outcomes.filter((outcome) => outcome.result === result).length;
    const failed = count('failed');

    const report: SessionReport = {
      startedAt,
      durationMs: Date.now() - startedAt.getTime(),
      total: outcomes.length,
      passed: count('passed'),
      failed,
      skipped: count('skipped'),
      outcomes,
      sessionErrors,
      exitCode: failed > 0 || sessionErrors.length > 0 ? 1 : 0,
    };

    this.hooks.sessionFinished(report);
    return report;
  }

  private async runTest(test: CollectedTest<F>): Promise<TestOutcome> {
    const base = { testId: test.id, suite: test.suite, category: test.category };

    if (test.skip !== undefined) {
      return { ...base, phase: 'setup', result: 'skipped', durationMs: 0, reason: test.skip };
    }

    const started = Date.now();
    const scope = this.registry.openTestScope(test.id);
    let phase: TestPhase = 'setup';
    let failure: Failure | undefined;
    let screenshot: string | undefined;

    try {
      const call = await test.prepare(this.registry.resolverFor(scope));
      phase = 'call';
      await call();
    } catch (error) {
      failure = { error };
    }

    if (failure) {
      screenshot = await this.captureFailure(test, scope, failure.error);
    }

    try {
      await this.registry.closeScope(scope);
    } catch (error) {
      if (failure) {
        this.logger.error({ testId: test.id, err: error }, 'Teardown failed after test failure');
      } else {
        failure = { error };
        phase = 'teardown';
      }
    }

    const durationMs = Date.now() - started;

    if (test.failing !== undefined) {
      return failure
        ? {
            ...base,
            phase,
            result: 'skipped',
            durationMs,
            reason: `expected failure: ${test.failing}`,
            error: summarize(failure.error),
          }
        : {
            ...base,
            phase,
            result: 'failed',
            durationMs,
            reason: `unexpectedly passed: ${test.failing}`,
          };
    }

    if (failure) {
      return {
        ...base,
        phase,
        result: 'failed',
        durationMs,
        error: summarize(failure.error),
        ...(screenshot ? { screenshot } : {}),
      };
    }

    return { ...base, phase, result: 'passed', durationMs };
  }

  private async captureFailure(
    test: CollectedTest<F>,
    scope: ScopeInstance,
    error: unknown
  ): Promise<string | undefined> {
    if (!this.options.onFailure || test.failing !== undefined) {
      return undefined;
    }

    try {
      return await this.options.onFailure({
        test,
        error,
        peek: <K extends FixtureName<F>>(name: K) => this.registry.peek(name, scope),
      });
    } catch (hookError) {
      this.logger.warn({ testId: test.id, err: hookError }, 'Failure hook failed');
      return undefined;
    }
  }

  /**
   * Hand a frozen copy to the outcome hook; a broken hook never fails the run
   */
  private report(outcome: TestOutcome): void {
    try {
      this.hooks.outcome(Object.freeze({ ...outcome }));
    } catch (error) {
      this.logger.error({ testId: outcome.testId, err: error }, 'Outcome hook failed');
    }
  }
}

function summarize(error: unknown): OutcomeError {
  const normalized = toError(error);
  return {
    name: normalized.name,
    message: normalized.message,
    ...(normalized.stack ? { stack: normalized.stack } : {}),
  };
}
