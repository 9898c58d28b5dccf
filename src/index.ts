export * from './core/index.ts';
export { Harness, captureFailureScreenshot } from './fixtures/Harness.ts';
export type { HarnessOptions } from './fixtures/Harness.ts';
export { registerHarnessFixtures } from './fixtures/index.ts';
export type { HarnessFixtures } from './fixtures/index.ts';
export { allSuites } from './suites/index.ts';
export type {
  SessionReport,
  TestCategory,
  TestOutcome,
  TestSelection,
  TestTag,
} from './types/index.ts';
