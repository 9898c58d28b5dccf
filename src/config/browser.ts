import type { BrowserConfig } from '@core/browser/types.ts';
import type { RunConfig } from './run.ts';

/**
 * Fixed window size for every UI test
 */
export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 } as const;

/**
 * Chromium flags for containerized execution
 */
const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  `--window-size=${DEFAULT_VIEWPORT.width},${DEFAULT_VIEWPORT.height}`,
];

/**
 * Derive browser launch settings from the run configuration
 */
export function browserConfigFrom(config: RunConfig): BrowserConfig {
  const timeout = config.timeout * 1000;

  switch (config.browser) {
    case 'firefox':
      return {
        engine: 'firefox',
        headless: config.headless,
        slowMo: 0,
        timeout,
        viewport: DEFAULT_VIEWPORT,
      };
    case 'edge':
      return {
        engine: 'chromium',
        channel: 'msedge',
        headless: config.headless,
        slowMo: 0,
        timeout,
        args: CHROMIUM_ARGS,
        viewport: DEFAULT_VIEWPORT,
      };
    case 'chrome':
      return {
        engine: 'chromium',
        headless: config.headless,
        slowMo: 0,
        timeout,
        args: CHROMIUM_ARGS,
        viewport: DEFAULT_VIEWPORT,
      };
  }
}
