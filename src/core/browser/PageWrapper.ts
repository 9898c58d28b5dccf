import { join } from 'node:path';
import type { Logger } from '@services/logger/index.ts';
import { formatTimestamp } from '@utils/date.ts';
import { type WaitOptions, waitUntil } from '@utils/wait.ts';
import type { Page } from 'playwright';
import type { PageDriver } from './types.ts';

/**
 * Thin page helper handed to UI tests
 */
export class PageWrapper<P extends PageDriver = Page> {
  private logger: Logger;

  constructor(
    private readonly driver: P,
    private readonly reportsDir: string,
    logger: Logger,
    private readonly defaultTimeoutMs = 10_000
  ) {
    this.logger = logger.child({ component: 'PageWrapper' });
  }

  /**
   * The underlying Playwright page
   */
  get page(): P {
    return this.driver;
  }

  async open(url: string): Promise<this> {
    this.logger.info(`Opening URL: ${url}`);
    await this.driver.goto(url);
    return this;
  }

  title(): Promise<string> {
    return this.driver.title();
  }

  /**
   * Explicit wait on a condition evaluated from the test side
   */
  waitFor<T>(
    predicate: () => T | false | null | undefined | Promise<T | false | null | undefined>,
    options: Partial<WaitOptions> = {}
  ): Promise<T> {
    return waitUntil(predicate, { timeoutMs: this.defaultTimeoutMs, intervalMs: 500, ...options });
  }

  /**
   * Save a screenshot to reports/{label}_{yyyyMMdd_HHmmss}.png
   */
  async screenshot(label: string, options: { fullPage?: boolean } = {}): Promise<string> {
    const safeLabel = label.replace(/[^\w.-]+/g, '_');
    const path = join(this.reportsDir, `${safeLabel}_${formatTimestamp()}.png`);

    await this.driver.screenshot({ path, fullPage: options.fullPage ?? false });
    this.logger.info({ url: this.driver.url() }, `Screenshot saved: ${path}`);

    return path;
  }
}
