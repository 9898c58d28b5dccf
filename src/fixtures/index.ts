import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { HarnessPaths } from '@config/app.ts';
import { browserConfigFrom } from '@config/browser.ts';
import type { RunConfig } from '@config/run.ts';
import { BrowserManager } from '@core/browser/BrowserManager.ts';
import { PageWrapper } from '@core/browser/PageWrapper.ts';
import type { BrowserSession } from '@core/browser/types.ts';
import { DataFormatError } from '@core/errors.ts';
import type { FixtureRegistry } from '@core/fixtures/FixtureRegistry.ts';
import { type FetchLike, HttpSession } from '@core/http/HttpSession.ts';
import { Calculator } from '@/examples/Calculator.ts';
import { DataProcessor } from '@/examples/DataProcessor.ts';
import { FakeDataGenerator } from '@services/fake-data/FakeDataGenerator.ts';
import type { SampleProduct, SampleUser } from '@/types/index.ts';
import { z } from 'zod';

/**
 * Every fixture a suite can ask for
 */
export interface HarnessFixtures {
  config: RunConfig;
  paths: HarnessPaths;
  fakeData: FakeDataGenerator;
  http: HttpSession;
  browserManager: BrowserManager;
  browser: BrowserSession;
  page: PageWrapper;
  testData: Record<string, unknown>;
  tmpDir: string;
  sampleUser: SampleUser;
  sampleProduct: SampleProduct;
  calculator: Calculator;
  dataProcessor: DataProcessor;
}

export interface FixtureSources {
  config: RunConfig;
  paths: HarnessPaths;
  /** Transport for the HTTP session */
  fetch?: FetchLike;
  fakerSeed?: number;
}

const testDataSchema = z.record(z.unknown());

/**
 * Load data/test_data.json; an absent file means no data
 */
export async function loadTestData(file: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new DataFormatError(`Malformed test data in ${file}`, file, { cause: error });
  }

  const result = testDataSchema.safeParse(parsed);
  if (!result.success) {
    throw new DataFormatError(`Test data in ${file} must be a JSON object`, file, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Register the harness fixtures
 */
export function registerHarnessFixtures(
  registry: FixtureRegistry<HarnessFixtures>,
  sources: FixtureSources
): FixtureRegistry<HarnessFixtures> {
  return registry
    .register('config', {
      scope: 'session',
      setup: () => sources.config,
    })
    .register('paths', {
      scope: 'session',
      setup: () => sources.paths,
    })
    .register('fakeData', {
      scope: 'session',
      setup: () => new FakeDataGenerator({ seed: sources.fakerSeed }),
    })
    .register('http', {
      scope: 'session',
      deps: ['config'],
      setup: ({ config }, { logger }) =>
        new HttpSession({
          baseUrl: config.base_url,
          timeoutMs: config.timeout * 1000,
          fetch: sources.fetch,
          logger,
        }),
      teardown: (session) => session.close(),
    })
    .register('browserManager', {
      scope: 'session',
      deps: ['config'],
      setup: ({ config }, { logger }) => new BrowserManager(browserConfigFrom(config), logger),
      teardown: (manager) => manager.closeAll(),
    })
    .register('browser', {
      scope: 'test',
      deps: ['browserManager'],
      setup: ({ browserManager }, { scopeId }) => browserManager.createSession(scopeId),
      teardown: (session, _context, { browserManager }) =>
        browserManager.closeSession(session.sessionId),
    })
    .register('page', {
      scope: 'test',
      deps: ['browser', 'paths', 'config'],
      setup: ({ browser, paths, config }, { logger }) =>
        new PageWrapper(browser.page, paths.reportsDir, logger, config.timeout * 1000),
    })
    .register('testData', {
      scope: 'test',
      deps: ['paths'],
      setup: ({ paths }) => loadTestData(join(paths.dataDir, 'test_data.json')),
    })
    .register('tmpDir', {
      scope: 'test',
      setup: () => mkdtemp(join(tmpdir(), 'harness-')),
      teardown: (dir) => rm(dir, { recursive: true, force: true }),
    })
    .register('sampleUser', {
      scope: 'test',
      deps: ['fakeData'],
      setup: ({ fakeData }) => fakeData.user(),
    })
    .register('sampleProduct', {
      scope: 'test',
      deps: ['fakeData'],
      setup: ({ fakeData }) => fakeData.product(),
    })
    .register('calculator', {
      scope: 'test',
      setup: () => new Calculator(),
    })
    .register('dataProcessor', {
      scope: 'test',
      deps: ['tmpDir'],
      setup: ({ tmpDir }) => DataProcessor.create(join(tmpDir, 'data')),
    });
}
