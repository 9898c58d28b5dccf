/**
 * Core type definitions used throughout the harness
 */

/**
 * Test category, declared once per suite
 */
export const testCategories = ['unit', 'integration', 'api', 'ui'] as const;

export type TestCategory = (typeof testCategories)[number];

/**
 * Selection markers
 */
export const testTags = ['smoke', 'slow'] as const;

export type TestTag = (typeof testTags)[number];

/**
 * Phase of a test in which its outcome was decided
 */
export type TestPhase = 'setup' | 'call' | 'teardown';

/**
 * Result of a single test
 */
export type TestResult = 'passed' | 'failed' | 'skipped';

/**
 * Error summary attached to an outcome
 */
export interface OutcomeError {
  name: string;
  message: string;
  stack?: string;
}

/**
 * Outcome record of one test
 */
export interface TestOutcome {
  testId: string;
  suite: string;
  category: TestCategory;
  phase: TestPhase;
  result: TestResult;
  durationMs: number;
  /** Skip reason or expected-failure reason */
  reason?: string;
  error?: OutcomeError;
  /** Screenshot captured on failure */
  screenshot?: string;
}

/**
 * Which tests to run
 */
export interface TestSelection {
  categories?: readonly TestCategory[];
  tags?: readonly TestTag[];
  /** Case-insensitive substring of the test id */
  grep?: string;
}

/**
 * Summary of a finished session
 */
export interface SessionReport {
  startedAt: Date;
  durationMs: number;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  outcomes: TestOutcome[];
  /** Session-scope teardown failures */
  sessionErrors: OutcomeError[];
  /** Process exit status: 1 if any test or session teardown failed */
  exitCode: 0 | 1;
}

/**
 * Generated user record
 */
export interface SampleUser {
  name: string;
  email: string;
  username: string;
  password: string;
  phone: string;
  address: {
    street: string;
    city: string;
    zipcode: string;
  };
}

/**
 * Generated product record
 */
export interface SampleProduct {
  title: string;
  description: string;
  price: number;
  category: ProductCategory;
  stock: number;
}

export const productCategories = ['electronics', 'clothing', 'books', 'food'] as const;

export type ProductCategory = (typeof productCategories)[number];
