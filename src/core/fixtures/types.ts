import type { Logger } from '@services/logger/index.ts';

/**
 * Fixture lifetime
 * session: created once, shared by every test of the run
 * test: created fresh for each test that asks for it
 */
export type FixtureScope = 'session' | 'test';

/**
 * Name of a fixture in a fixture map
 */
export type FixtureName<F> = keyof F & string;

/**
 * Resolves a fixture by name within the caller's scope
 */
export type Resolver<F> = <K extends FixtureName<F>>(name: K) => Promise<F[K]>;

/**
 * Passed to setup and teardown
 */
export interface FixtureContext {
  scope: FixtureScope;
  scopeId: string;
  /** Set for test-scoped fixtures */
  testId?: string;
  logger: Logger;
}

/**
 * Declaration of one fixture
 *
 * @example
 * registry.register('http', {
 *   scope: 'session',
 *   deps: ['config'],
 *   setup: ({ config }) => new HttpSession({ baseUrl: config.base_url }),
 *   teardown: (session) => session.close(),
 * });
 */
export interface FixtureDefinition<F, K extends FixtureName<F>, D extends FixtureName<F> = never> {
  scope: FixtureScope;
  deps?: readonly D[];
  setup: (deps: Pick<F, D>, context: FixtureContext) => F[K] | Promise<F[K]>;
  /** Receives the same dependency values setup got */
  teardown?: (value: F[K], context: FixtureContext, deps: Pick<F, D>) => void | Promise<void>;
}
