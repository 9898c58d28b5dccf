/**
 * Core module exports
 * Provides access to all core abstractions and utilities
 */

// Errors
export {
  BootstrapError,
  ConfigurationError,
  DataFormatError,
  FixtureError,
  FixtureTeardownError,
  HarnessError,
  ProvisioningError,
  TimeoutError,
} from './errors.ts';

// Bootstrap
export { ensureDirectories } from './bootstrap.ts';

// Fixtures
export { FixtureRegistry, resolveFixtures } from './fixtures/FixtureRegistry.ts';
export { ScopeInstance } from './fixtures/ScopeInstance.ts';
export type {
  FixtureContext,
  FixtureDefinition,
  FixtureName,
  FixtureScope,
  Resolver,
} from './fixtures/types.ts';

// Harness
export { defineSuite, SuiteBuilder } from './harness/suite.ts';
export type { CollectedTest, Suite, SuiteMeta, TestOptions } from './harness/suite.ts';
export { LifecycleHooks, classifyTests, selectTests } from './harness/hooks.ts';
export { TestRunner } from './harness/TestRunner.ts';
export type { FailureContext, TestRunnerOptions } from './harness/TestRunner.ts';

// HTTP
export { HttpResponse, HttpSession } from './http/HttpSession.ts';
export type { FetchLike, HttpMethod, RequestOptions } from './http/HttpSession.ts';

// Browser
export { BrowserManager } from './browser/BrowserManager.ts';
export { PageWrapper } from './browser/PageWrapper.ts';
export type { BrowserConfig, BrowserSession, PageDriver } from './browser/types.ts';
