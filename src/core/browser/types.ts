import type { Browser, BrowserContext, Page } from 'playwright';

/**
 * Playwright engine used to launch a browser
 */
export type BrowserEngine = 'chromium' | 'firefox';

/**
 * Browser configuration options
 */
export interface BrowserConfig {
  engine: BrowserEngine;
  /** Branded build of the engine, e.g. msedge */
  channel?: string;
  headless: boolean;
  slowMo: number;
  /** Launch and default action timeout (ms) */
  timeout: number;
  args?: string[];
  viewport?: {
    width: number;
    height: number;
  };
}

/**
 * Browser session that manages a browser context and page
 */
export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  sessionId: string;
}

/**
 * The slice of a Playwright page the page wrapper drives
 */
export type PageDriver = Pick<Page, 'goto' | 'screenshot' | 'title' | 'url'>;
