import { ProvisioningError, toError } from '@core/errors.ts';
import type { Logger } from '@services/logger/index.ts';
import { type Browser, type BrowserType, chromium, firefox } from 'playwright';
import type { BrowserConfig, BrowserEngine, BrowserSession } from './types.ts';

const engines: Record<BrowserEngine, BrowserType> = { chromium, firefox };

/**
 * BrowserManager
 * Launches Playwright browsers and owns the sessions built on them
 */
export class BrowserManager {
  private sessions = new Map<string, BrowserSession>();
  private config: BrowserConfig;
  private logger: Logger;

  constructor(config: BrowserConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: 'BrowserManager' });
  }

  /**
   * Launch a new browser instance
   */
  async launchBrowser(sessionId: string): Promise<Browser> {
    this.logger.info(
      { engine: this.config.engine, channel: this.config.channel, headless: this.config.headless },
      `Launching browser for session: ${sessionId}`
    );

    try {
      return await engines[this.config.engine].launch({
        headless: this.config.headless,
        slowMo: this.config.slowMo,
        timeout: this.config.timeout,
        ...(this.config.channel ? { channel: this.config.channel } : {}),
        ...(this.config.args ? { args: this.config.args } : {}),
      });
    } catch (error) {
      const target = this.config.channel ?? this.config.engine;
      throw new ProvisioningError(
        `Could not launch ${target} for session ${sessionId}: ${toError(error).message}`,
        { cause: error }
      );
    }
  }

  /**
   * Create a new browser session (browser + context + page)
   */
  async createSession(sessionId: string): Promise<BrowserSession> {
    if (this.sessions.has(sessionId)) {
      throw new ProvisioningError(`Browser session already exists: ${sessionId}`);
    }

    const browser = await this.launchBrowser(sessionId);

    try {
      this.logger.debug(`Creating browser context for session: ${sessionId}`);
      const context = await browser.newContext({
        ...(this.config.viewport ? { viewport: this.config.viewport } : {}),
      });

      const page = await context.newPage();
      page.setDefaultTimeout(this.config.timeout);

      const session: BrowserSession = { browser, context, page, sessionId };
      this.sessions.set(sessionId, session);
      this.logger.info(`Browser session created: ${sessionId}`);

      return session;
    } catch (error) {
      try {
        await browser.close();
      } catch (closeError) {
        this.logger.error(
          { err: toError(closeError) },
          `Error closing browser after failed setup: ${sessionId}`
        );
      }
      throw new ProvisioningError(`Could not open a page for session ${sessionId}`, {
        cause: error,
      });
    }
  }

  /**
   * Get an existing session
   */
  getSession(sessionId: string): BrowserSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Close a specific session
   * The browser is closed even when its context fails to close. The session is
   * forgotten either way; the first failure is rethrown.
   */
  async closeSession(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      this.logger.warn(`Session not found: ${sessionId}`);
      return;
    }

    this.logger.info(`Closing session: ${sessionId}`);
    this.sessions.delete(sessionId);

    const failures: unknown[] = [];
    for (const target of [session.context, session.browser]) {
      try {
        await target.close();
      } catch (error) {
        failures.push(error);
      }
    }

    if (failures.length > 0) {
      const [first] = failures;
      this.logger.error({ err: toError(first) }, `Error closing session: ${sessionId}`);
      throw first;
    }

    this.logger.info(`Session closed: ${sessionId}`);
  }

  /**
   * Close all sessions
   */
  async closeAll(): Promise<void> {
    this.logger.info(`Closing all ${this.sessions.size} sessions`);

    const results = await Promise.allSettled(
      Array.from(this.sessions.keys()).map((sessionId) => this.closeSession(sessionId))
    );
    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );

    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((failure) => failure.reason),
        `${failures.length} browser session(s) failed to close`
      );
    }

    this.logger.info('All sessions closed');
  }

  /**
   * Get number of active sessions
   */
  getActiveSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Get all session IDs
   */
  getSessionIds(): string[] {
    return Array.from(this.sessions.keys());
  }
}
