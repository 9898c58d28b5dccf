import { type HarnessPaths, appConfig, resolvePaths } from '@config/app.ts';
import { type RunConfig, loadRunConfig } from '@config/run.ts';
import { ensureDirectories } from '@core/bootstrap.ts';
import { HarnessError } from '@core/errors.ts';
import { FixtureRegistry } from '@core/fixtures/FixtureRegistry.ts';
import { LifecycleHooks } from '@core/harness/hooks.ts';
import type { Suite } from '@core/harness/suite.ts';
import { type FailureContext, TestRunner } from '@core/harness/TestRunner.ts';
import type { FetchLike } from '@core/http/HttpSession.ts';
import { type Logger, createLogger } from '@services/logger/index.ts';
import type { SessionReport, TestSelection } from '@/types/index.ts';
import { type HarnessFixtures, registerHarnessFixtures } from './index.ts';

export interface HarnessOptions {
  /** Project root holding config/, data/ and reports/ */
  rootDir?: string;
  /** Run configuration file, relative to the root */
  configFile?: string;
  /** Transport for the HTTP session; global fetch when omitted */
  fetch?: FetchLike;
  logger?: Logger;
  fakerSeed?: number;
}

interface HarnessState {
  config: RunConfig;
  paths: HarnessPaths;
  logger: Logger;
  registry: FixtureRegistry<HarnessFixtures>;
  runner: TestRunner<HarnessFixtures>;
}

/**
 * Screenshot a failed UI test while its page is still open
 */
export async function captureFailureScreenshot({
  test,
  peek,
}: FailureContext<HarnessFixtures>): Promise<string | undefined> {
  if (test.category !== 'ui') return undefined;

  const page = peek('page');
  return page ? page.screenshot(`failure_${test.name}`) : undefined;
}

/**
 * Harness
 * Session context: directories, run configuration, logger, fixtures and runner
 *
 * @example
 * const harness = await new Harness().init();
 * const report = await harness.run(allSuites, { categories: ['api'] });
 * await harness.close();
 */
export class Harness {
  private state: HarnessState | null = null;
  private closed = false;

  constructor(private readonly options: HarnessOptions = {}) {}

  get isInitialized(): boolean {
    return this.state !== null;
  }

  get config(): RunConfig {
    return this.current().config;
  }

  get paths(): HarnessPaths {
    return this.current().paths;
  }

  get logger(): Logger {
    return this.current().logger;
  }

  get registry(): FixtureRegistry<HarnessFixtures> {
    return this.current().registry;
  }

  /**
   * Create the directories, load the configuration and wire the fixtures
   * Bootstrap and configuration errors are fatal and propagate.
   */
  async init(): Promise<this> {
    if (this.closed) {
      throw new HarnessError('Harness is closed');
    }
    if (this.state) {
      return this;
    }

    const paths = this.options.rootDir
      ? resolvePaths(this.options.rootDir, this.options.configFile)
      : this.options.configFile
        ? resolvePaths(appConfig.paths.root, this.options.configFile)
        : appConfig.paths;

    await ensureDirectories([paths.configDir, paths.dataDir, paths.reportsDir]);

    const logger = this.options.logger ?? createLogger({ reportsDir: paths.reportsDir });
    const config = await loadRunConfig(paths.configFile);
    logger.info({ config, root: paths.root }, 'Harness initialized');

    const registry = new FixtureRegistry<HarnessFixtures>(logger);
    registerHarnessFixtures(registry, {
      config,
      paths,
      fetch: this.options.fetch,
      fakerSeed: this.options.fakerSeed ?? appConfig.fakerSeed,
    });
    registry.validate();

    const runner = new TestRunner(registry, new LifecycleHooks(logger), logger, {
      onFailure: captureFailureScreenshot,
    });

    this.state = { config, paths, logger, registry, runner };
    return this;
  }

  /**
   * Run one session over the given suites
   */
  run(
    suites: readonly Suite<HarnessFixtures>[],
    selection: TestSelection = {}
  ): Promise<SessionReport> {
    return this.current().runner.run(suites, selection);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const state = this.state;
    this.state = null;
    if (state) {
      state.logger.info('Harness closed');
      state.logger.flush();
    }
  }

  private current(): HarnessState {
    if (!this.state) {
      throw new HarnessError(this.closed ? 'Harness is closed' : 'Harness is not initialized');
    }
    return this.state;
  }
}
