import type { Logger } from '@services/logger/index.ts';
import { FixtureError, FixtureTeardownError } from '../errors.ts';
import { ScopeInstance } from './ScopeInstance.ts';
import type {
  FixtureContext,
  FixtureDefinition,
  FixtureName,
  FixtureScope,
  Resolver,
} from './types.ts';

interface Constructed<T> {
  value: T;
  dispose?: () => void | Promise<void>;
}

/**
 * Registered fixture with its per-scope memo
 */
class RegisteredFixture<F, K extends FixtureName<F>> {
  /** Constructed values keyed by scope instance id */
  readonly instances = new Map<string, { value: F[K] }>();

  constructor(
    readonly name: K,
    readonly scope: FixtureScope,
    readonly deps: readonly FixtureName<F>[],
    readonly create: (resolve: Resolver<F>, context: FixtureContext) => Promise<Constructed<F[K]>>
  ) {}
}

type FixtureTable<F> = { [K in FixtureName<F>]?: RegisteredFixture<F, K> };

/**
 * Narrow a built fixture object once every requested name is present
 */
function hasAll<F, D extends FixtureName<F>>(
  value: Record<string, unknown>,
  names: readonly D[]
): value is Record<string, unknown> & Pick<F, D> {
  return names.every((name) => name in value);
}

/**
 * Resolve a list of fixtures, in order, into one object
 */
export async function resolveFixtures<F, D extends FixtureName<F>>(
  names: readonly D[],
  resolve: Resolver<F>
): Promise<Pick<F, D>> {
  const resolved: Record<string, unknown> = {};
  for (const name of names) {
    resolved[name] = await resolve(name);
  }

  if (!hasAll<F, D>(resolved, names)) {
    throw new FixtureError(`Fixtures could not be resolved: ${names.join(', ')}`);
  }
  return resolved;
}

/**
 * FixtureRegistry
 * Typed registry of scoped, lazily created fixtures
 *
 * Dependencies are resolved depth-first and memoized per (fixture, scope instance).
 * Closing a scope releases its fixtures in reverse construction order.
 */
export class FixtureRegistry<F> {
  private readonly fixtures: FixtureTable<F> = {};
  private readonly names: FixtureName<F>[] = [];
  private session: ScopeInstance | null = null;
  private testScopes = 0;
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'FixtureRegistry' });
  }

  /**
   * Register a fixture
   */
  register<K extends FixtureName<F>, D extends FixtureName<F> = never>(
    name: K,
    definition: FixtureDefinition<F, K, D>
  ): this {
    if (this.fixtures[name]) {
      this.logger.warn(`Fixture ${name} is already registered, overwriting`);
    } else {
      this.names.push(name);
    }

    const deps: readonly D[] = definition.deps ?? [];
    const create = async (
      resolve: Resolver<F>,
      context: FixtureContext
    ): Promise<Constructed<F[K]>> => {
      const resolved = await resolveFixtures<F, D>(deps, resolve);
      const value = await definition.setup(resolved, context);
      const { teardown } = definition;

      return {
        value,
        ...(teardown ? { dispose: () => teardown(value, context, resolved) } : {}),
      };
    };

    this.fixtures[name] = new RegisteredFixture<F, K>(name, definition.scope, deps, create);

    this.logger.debug({ scope: definition.scope, deps }, `Registered fixture: ${name}`);
    return this;
  }

  /**
   * Check if a fixture is registered
   */
  has(name: string): boolean {
    return this.names.some((registered) => registered === name);
  }

  /**
   * Scope of a registered fixture
   */
  scopeOf(name: FixtureName<F>): FixtureScope | undefined {
    return this.fixtures[name]?.scope;
  }

  /**
   * Check the whole graph: unknown dependencies, cycles and
   * session fixtures depending on test fixtures
   */
  validate(): void {
    const state = new Map<string, 'visiting' | 'done'>();

    const visit = (name: FixtureName<F>, path: readonly string[]): void => {
      const fixture = this.fixtures[name];
      if (!fixture) {
        throw new FixtureError(`Fixture not registered: ${name}${requiredBy(path)}`);
      }

      const mark = state.get(name);
      if (mark === 'done') return;
      if (mark === 'visiting') {
        throw new FixtureError(`Circular fixture dependency: ${[...path, name].join(' -> ')}`);
      }

      state.set(name, 'visiting');
      for (const dep of fixture.deps) {
        if (fixture.scope === 'session' && this.fixtures[dep]?.scope === 'test') {
          throw new FixtureError(
            `Session fixture ${name} cannot depend on test fixture ${dep}`
          );
        }
        visit(dep, [...path, name]);
      }
      state.set(name, 'done');
    };

    for (const name of this.names) {
      visit(name, []);
    }

    this.logger.debug({ fixtures: this.names.length }, 'Fixture graph validated');
  }

  /**
   * Open the session scope
   */
  openSession(): ScopeInstance {
    if (this.session) {
      throw new FixtureError('Session scope is already open');
    }

    this.session = new ScopeInstance('session', 'session', this.logger);
    return this.session;
  }

  /**
   * Open a fresh scope for one test
   */
  openTestScope(testId: string): ScopeInstance {
    this.testScopes++;
    return new ScopeInstance(`test:${this.testScopes}:${testId}`, 'test', this.logger, testId);
  }

  /**
   * Get a fixture value, constructing it and its dependencies on first use
   */
  resolve<K extends FixtureName<F>>(name: K, scope: ScopeInstance): Promise<F[K]> {
    return this.resolveWithin(name, scope, []);
  }

  /**
   * Resolver bound to a scope
   */
  resolverFor(scope: ScopeInstance): Resolver<F> {
    return <K extends FixtureName<F>>(name: K) => this.resolveWithin(name, scope, []);
  }

  /**
   * Get an already constructed value without constructing anything
   */
  peek<K extends FixtureName<F>>(name: K, scope: ScopeInstance): F[K] | undefined {
    const fixture = this.fixtures[name];
    if (!fixture) return undefined;

    const ownerId = fixture.scope === 'session' ? this.session?.id : scope.id;
    if (ownerId === undefined) return undefined;

    return fixture.instances.get(ownerId)?.value;
  }

  /**
   * Release every fixture of a scope, newest first
   * All teardowns run; failures are raised together afterwards.
   */
  async closeScope(scope: ScopeInstance): Promise<void> {
    const errors = await scope.close();

    if (scope === this.session) {
      this.session = null;
    }

    if (errors.length > 0) {
      throw new FixtureTeardownError(scope.id, errors);
    }
  }

  /**
   * Get registry statistics
   */
  getStats(): { total: number; session: number; test: number; sessionOpen: boolean } {
    const scopes = this.names.map((name) => this.fixtures[name]?.scope);

    return {
      total: this.names.length,
      session: scopes.filter((scope) => scope === 'session').length,
      test: scopes.filter((scope) => scope === 'test').length,
      sessionOpen: this.session !== null,
    };
  }

  private async resolveWithin<K extends FixtureName<F>>(
    name: K,
    requester: ScopeInstance,
    path: readonly string[]
  ): Promise<F[K]> {
    const fixture = this.fixtures[name];
    if (!fixture) {
      throw new FixtureError(`Fixture not registered: ${name}${requiredBy(path)}`);
    }
    if (path.includes(name)) {
      throw new FixtureError(`Circular fixture dependency: ${[...path, name].join(' -> ')}`);
    }

    const owner = this.ownerOf(fixture.scope, name, requester, path);
    const memo = fixture.instances.get(owner.id);
    if (memo) {
      return memo.value;
    }

    owner.assertOpen();
    const next = [...path, name];
    const resolveDep: Resolver<F> = <D extends FixtureName<F>>(dep: D) =>
      this.resolveWithin(dep, owner, next);

    this.logger.debug({ scopeId: owner.id }, `Setting up fixture: ${name}`);
    const { value, dispose } = await fixture.create(resolveDep, owner.context);

    fixture.instances.set(owner.id, { value });
    owner.defer(name, async () => {
      try {
        this.logger.debug({ scopeId: owner.id }, `Tearing down fixture: ${name}`);
        await dispose?.();
      } finally {
        fixture.instances.delete(owner.id);
      }
    });

    return value;
  }

  private ownerOf(
    scope: FixtureScope,
    name: string,
    requester: ScopeInstance,
    path: readonly string[]
  ): ScopeInstance {
    if (scope === 'session') {
      if (!this.session) {
        throw new FixtureError(`Session scope is not open; cannot set up ${name}`);
      }
      return this.session;
    }

    if (requester.scope === 'session') {
      const dependent = path[path.length - 1];
      throw new FixtureError(
        dependent
          ? `Session fixture ${dependent} cannot depend on test fixture ${name}`
          : `Test fixture ${name} requested outside a test`
      );
    }

    return requester;
  }
}

function requiredBy(path: readonly string[]): string {
  const dependent = path[path.length - 1];
  return dependent ? ` (required by ${dependent})` : '';
}
