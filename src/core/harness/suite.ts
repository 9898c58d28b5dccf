import type { TestCategory, TestTag } from '@/types/index.ts';
import { ConfigurationError } from '../errors.ts';
import { resolveFixtures } from '../fixtures/FixtureRegistry.ts';
import type { FixtureName, Resolver } from '../fixtures/types.ts';
import { isTestCategory } from './hooks.ts';

/**
 * Per-test options
 */
export interface TestOptions {
  tags?: readonly TestTag[];
  /** Skip with this reason */
  skip?: string;
  /** Known failure with this reason: failing is reported as skipped, passing as failed */
  failing?: string;
}

export type TestBody<F, D extends FixtureName<F>> = (fixtures: Pick<F, D>) => void | Promise<void>;

/**
 * A test ready to be run
 */
export interface CollectedTest<F> {
  id: string;
  name: string;
  suite: string;
  category: TestCategory;
  file?: string;
  fixtures: readonly FixtureName<F>[];
  tags: readonly TestTag[];
  skip?: string;
  failing?: string;
  /**
   * Resolve the declared fixtures and return the body bound to them
   * Splits the setup phase from the call phase.
   */
  prepare(resolve: Resolver<F>): Promise<() => Promise<void>>;
}

/**
 * Suite declaration
 */
export interface SuiteMeta {
  name: string;
  category: TestCategory;
  file?: string;
  /** Tags applied to every test of the suite */
  tags?: readonly TestTag[];
}

export interface Suite<F> {
  name: string;
  category: TestCategory;
  file?: string;
  tests: readonly CollectedTest<F>[];
}

/**
 * Collects the tests of one suite
 */
export class SuiteBuilder<F> {
  private readonly collected: CollectedTest<F>[] = [];

  constructor(private readonly meta: SuiteMeta) {}

  get tests(): readonly CollectedTest<F>[] {
    return this.collected;
  }

  /**
   * Declare a test and the fixtures its body receives
   *
   * @example
   * suite.test('get user by id', ['http'], async ({ http }) => {
   *   const response = await http.get('/users/1');
   *   expect(response.status).to.equal(200);
   * });
   */
  test<D extends FixtureName<F> = never>(
    name: string,
    fixtures: readonly D[],
    body: TestBody<F, D>,
    options: TestOptions = {}
  ): this {
    const id = `${this.meta.name} > ${name}`;
    if (this.collected.some((test) => test.id === id)) {
      throw new ConfigurationError(`Duplicate test: ${id}`);
    }

    this.collected.push({
      id,
      name,
      suite: this.meta.name,
      category: this.meta.category,
      file: this.meta.file,
      fixtures,
      tags: [...(this.meta.tags ?? []), ...(options.tags ?? [])],
      skip: options.skip,
      failing: options.failing,
      prepare: async (resolve) => {
        const resolved = await resolveFixtures<F, D>(fixtures, resolve);
        return async () => {
          await body(resolved);
        };
      },
    });

    return this;
  }

  /**
   * Declare one test per case
   */
  each<C, D extends FixtureName<F> = never>(
    cases: readonly C[],
    name: (testCase: C) => string,
    fixtures: readonly D[],
    body: (fixtures: Pick<F, D>, testCase: C) => void | Promise<void>,
    options: TestOptions = {}
  ): this {
    for (const testCase of cases) {
      this.test(name(testCase), fixtures, (resolved) => body(resolved, testCase), options);
    }
    return this;
  }
}

/**
 * Define a suite with exactly one category
 */
export function defineSuite<F>(meta: SuiteMeta, build: (suite: SuiteBuilder<F>) => void): Suite<F> {
  if (!isTestCategory(meta.category)) {
    throw new ConfigurationError(
      `Suite ${meta.name} has an invalid category: ${String(meta.category)}`
    );
  }

  const builder = new SuiteBuilder<F>(meta);
  build(builder);

  return {
    name: meta.name,
    category: meta.category,
    file: meta.file,
    tests: builder.tests,
  };
}
