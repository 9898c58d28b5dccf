import type { Logger } from '@services/logger/index.ts';
import { FixtureError } from '../errors.ts';
import type { FixtureContext, FixtureScope } from './types.ts';

interface Teardown {
  name: string;
  run: () => Promise<void>;
}

/**
 * One live scope: the session, or a single test
 * Owns the teardowns of every fixture constructed in it.
 */
export class ScopeInstance {
  private readonly teardowns: Teardown[] = [];
  private closed = false;
  readonly context: FixtureContext;

  constructor(
    readonly id: string,
    readonly scope: FixtureScope,
    logger: Logger,
    readonly testId?: string
  ) {
    this.context = { scope, scopeId: id, testId, logger };
  }

  assertOpen(): void {
    if (this.closed) {
      throw new FixtureError(`Scope ${this.id} is already closed`);
    }
  }

  /**
   * Register the release of a freshly constructed fixture
   */
  defer(name: string, run: () => Promise<void>): void {
    this.assertOpen();
    this.teardowns.push({ name, run });
  }

  /**
   * Run every teardown once, newest first
   * Returns the errors instead of stopping at the first one.
   */
  async close(): Promise<unknown[]> {
    if (this.closed) {
      return [];
    }
    this.closed = true;

    const errors: unknown[] = [];
    let teardown = this.teardowns.pop();
    while (teardown) {
      try {
        await teardown.run();
      } catch (error) {
        this.context.logger.error(
          { scopeId: this.id, fixture: teardown.name, err: error },
          `Teardown failed: ${teardown.name}`
        );
        errors.push(error);
      }
      teardown = this.teardowns.pop();
    }

    return errors;
  }
}
