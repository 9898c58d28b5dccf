import { FixtureError, FixtureTeardownError } from '@core/errors.ts';
import { FixtureRegistry } from '@core/fixtures/FixtureRegistry.ts';
import pino from 'pino';
import { describe, expect, it } from 'vitest';

interface Fixtures {
  config: { name: string };
  client: { config: string; id: number };
  record: { client: number; id: number };
  ghost: string;
}

const logger = pino({ level: 'silent' });

function createRegistry(events: string[] = []) {
  let clients = 0;
  let records = 0;

  const registry = new FixtureRegistry<Fixtures>(logger)
    .register('config', {
      scope: 'session',
      setup: () => {
        events.push('setup config');
        return { name: 'test-config' };
      },
      teardown: () => {
        events.push('teardown config');
      },
    })
    .register('client', {
      scope: 'session',
      deps: ['config'],
      setup: ({ config }) => {
        events.push('setup client');
        return { config: config.name, id: ++clients };
      },
      teardown: () => {
        events.push('teardown client');
      },
    })
    .register('record', {
      scope: 'test',
      deps: ['client'],
      setup: ({ client }) => {
        events.push('setup record');
        return { client: client.id, id: ++records };
      },
      teardown: (record) => {
        events.push(`teardown record ${record.id}`);
      },
    });

  return registry;
}

describe('FixtureRegistry', () => {
  it('shares session fixtures and builds test fixtures per test', async () => {
    const registry = createRegistry();
    const session = registry.openSession();

    const first = registry.openTestScope('a');
    const second = registry.openTestScope('b');

    const recordA = await registry.resolve('record', first);
    const recordA2 = await registry.resolve('record', first);
    const recordB = await registry.resolve('record', second);

    expect(recordA).toBe(recordA2);
    expect(recordA).toEqual({ client: 1, id: 1 });
    expect(recordB).toEqual({ client: 1, id: 2 });
    expect(await registry.resolve('client', session)).toEqual({ config: 'test-config', id: 1 });
  });

  it('tears down in reverse construction order', async () => {
    const events: string[] = [];
    const registry = createRegistry(events);
    const session = registry.openSession();
    const test = registry.openTestScope('a');

    await registry.resolve('record', test);
    await registry.closeScope(test);
    await registry.closeScope(session);

    expect(events).toEqual([
      'setup config',
      'setup client',
      'setup record',
      'teardown record 1',
      'teardown client',
      'teardown config',
    ]);
  });

  it('runs every teardown and collects the failures', async () => {
    const events: string[] = [];
    const registry = createRegistry(events).register('client', {
      scope: 'session',
      deps: ['config'],
      setup: () => ({ config: 'broken', id: 0 }),
      teardown: () => {
        throw new Error('client refused to close');
      },
    });
    const session = registry.openSession();
    await registry.resolve('client', session);

    const error = await registry.closeScope(session).then(
      () => undefined,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(FixtureTeardownError);
    expect(error).toMatchObject({
      scopeId: 'session',
      errors: [new Error('client refused to close')],
    });
    expect(events).toContain('teardown config');
  });

  it('does not memoize a failed setup', async () => {
    let attempts = 0;
    const registry = new FixtureRegistry<Fixtures>(logger).register('config', {
      scope: 'session',
      setup: () => {
        attempts++;
        if (attempts === 1) throw new Error('first attempt fails');
        return { name: 'second' };
      },
    });
    const session = registry.openSession();

    await expect(registry.resolve('config', session)).rejects.toThrow('first attempt fails');
    await expect(registry.resolve('config', session)).resolves.toEqual({ name: 'second' });
    expect(attempts).toBe(2);
  });

  it('peeks without constructing', async () => {
    const registry = createRegistry();
    registry.openSession();
    const test = registry.openTestScope('a');

    expect(registry.peek('record', test)).toBeUndefined();
    expect(registry.peek('config', test)).toBeUndefined();

    await registry.resolve('record', test);

    expect(registry.peek('record', test)).toEqual({ client: 1, id: 1 });
    expect(registry.peek('config', test)).toEqual({ name: 'test-config' });
  });

  it('refuses test fixtures outside a test', async () => {
    const registry = createRegistry();
    const session = registry.openSession();

    await expect(registry.resolve('record', session)).rejects.toThrow(
      'Test fixture record requested outside a test'
    );
  });

  it('refuses to resolve in a closed scope', async () => {
    const registry = createRegistry();
    registry.openSession();
    const test = registry.openTestScope('a');
    await registry.closeScope(test);

    await expect(registry.resolve('record', test)).rejects.toThrow(FixtureError);
  });

  it('releases the memo on teardown so a new session rebuilds', async () => {
    const registry = createRegistry();
    const first = registry.openSession();
    expect(await registry.resolve('client', first)).toEqual({ config: 'test-config', id: 1 });
    await registry.closeScope(first);

    const second = registry.openSession();
    expect(await registry.resolve('client', second)).toEqual({ config: 'test-config', id: 2 });
  });

  it('passes the setup dependencies to teardown', async () => {
    const seen: string[] = [];
    const registry = createRegistry().register('record', {
      scope: 'test',
      deps: ['client'],
      setup: ({ client }) => ({ client: client.id, id: 7 }),
      teardown: (record, context, { client }) => {
        seen.push(`${context.testId ?? ''}:${record.id}:${client.config}`);
      },
    });
    registry.openSession();
    const test = registry.openTestScope('t1');

    await registry.resolve('record', test);
    await registry.closeScope(test);

    expect(seen).toEqual(['t1:7:test-config']);
  });

  it('detects a cycle while resolving', async () => {
    const registry = new FixtureRegistry<Fixtures>(logger)
      .register('config', {
        scope: 'session',
        deps: ['ghost'],
        setup: () => ({ name: 'x' }),
      })
      .register('ghost', {
        scope: 'session',
        deps: ['config'],
        setup: () => 'boo',
      });
    const session = registry.openSession();

    const error = await registry.resolve('config', session).then(
      () => undefined,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(FixtureError);
    expect(error).toMatchObject({
      message: 'Circular fixture dependency: config -> ghost -> config',
    });
  });

  it('refuses a session fixture that depends on a test fixture while resolving', async () => {
    const registry = createRegistry().register('ghost', {
      scope: 'session',
      deps: ['record'],
      setup: () => 'boo',
    });
    registry.openSession();
    const test = registry.openTestScope('t1');

    const error = await registry.resolve('ghost', test).then(
      () => undefined,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(FixtureError);
    expect(error).toMatchObject({
      message: 'Session fixture ghost cannot depend on test fixture record',
    });
  });

  describe('validate', () => {
    it('accepts a sound graph', () => {
      expect(() => createRegistry().validate()).not.toThrow();
    });

    it('reports unknown dependencies', () => {
      const registry = createRegistry().register('config', {
        scope: 'session',
        deps: ['ghost'],
        setup: () => ({ name: 'x' }),
      });

      expect(() => registry.validate()).toThrow(
        'Fixture not registered: ghost (required by config)'
      );
    });

    it('reports cycles', () => {
      const registry = new FixtureRegistry<Fixtures>(logger)
        .register('config', {
          scope: 'session',
          deps: ['ghost'],
          setup: () => ({ name: 'x' }),
        })
        .register('ghost', {
          scope: 'session',
          deps: ['config'],
          setup: () => 'boo',
        });

      expect(() => registry.validate()).toThrow(
        'Circular fixture dependency: config -> ghost -> config'
      );
    });

    it('reports session fixtures depending on test fixtures', () => {
      const registry = createRegistry().register('ghost', {
        scope: 'session',
        deps: ['record'],
        setup: () => 'boo',
      });

      expect(() => registry.validate()).toThrow(
        'Session fixture ghost cannot depend on test fixture record'
      );
    });
  });

  it('counts fixtures by scope', () => {
    const registry = createRegistry();

    expect(registry.has('config')).toBe(true);
    expect(registry.has('ghost')).toBe(false);
    expect(registry.scopeOf('record')).toBe('test');
    expect(registry.scopeOf('ghost')).toBeUndefined();

    expect(registry.getStats()).toEqual({ total: 3, session: 2, test: 1, sessionOpen: false });
    registry.openSession();
    expect(registry.getStats().sessionOpen).toBe(true);
  });
});
