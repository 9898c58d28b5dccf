import type { PageWrapper } from '@core/browser/PageWrapper.ts';
import { defineSuite } from '@core/harness/suite.ts';
import type { HarnessFixtures } from '@/fixtures/index.ts';
import { expect } from 'chai';
import { errors } from 'playwright';

export const WEB_FORM_URL = 'https://www.selenium.dev/selenium/web/web-form.html';
export const DYNAMIC_URL = 'https://www.selenium.dev/selenium/web/dynamic.html';

const RESOLUTIONS = [
  { width: 1920, height: 1080 },
  { width: 1366, height: 768 },
  { width: 375, height: 667 },
] as const;

/**
 * Page object for the practice form
 */
class WebFormPage {
  constructor(private readonly wrapper: PageWrapper) {}

  async open(): Promise<this> {
    await this.wrapper.open(WEB_FORM_URL);
    return this;
  }

  async enterText(text: string): Promise<this> {
    await this.wrapper.page.locator('#my-text-id').fill(text);
    return this;
  }

  async submit(): Promise<this> {
    await this.wrapper.page.locator('button[type="submit"]').click();
    return this;
  }

  async confirmation(): Promise<string> {
    const message = this.wrapper.page.locator('#message');
    await message.waitFor();
    return message.innerText();
  }
}

/**
 * Practice form and dynamic-content pages
 */
export const webFormSuite = defineSuite<HarnessFixtures>(
  { name: 'web form', category: 'ui', file: 'src/suites/ui/webForm.ts' },
  (s) => {
    s.test('submit practice form', ['page', 'sampleUser'], async ({ page, sampleUser }) => {
      await page.open(WEB_FORM_URL);
      const form = page.page;

      await form.locator('#my-text-id').fill(sampleUser.username);
      await form.locator('[name="my-password"]').fill('test-secret');
      await form.locator('[name="my-textarea"]').fill('This is a test message in textarea');
      await form.locator('[name="my-select"]').selectOption({ label: 'Two' });
      await form.locator('button[type="submit"]').click();

      const message = form.locator('#message');
      await message.waitFor();
      expect((await message.innerText()).toLowerCase()).to.include('received');
    });

    s.test('explicit wait for dynamic content', ['page'], async ({ page }) => {
      await page.open(DYNAMIC_URL);
      await page.page.locator('#adder').click();

      const visible = await page.waitFor(() => page.page.locator('#box0').isVisible(), {
        timeoutMs: 10_000,
        description: '#box0 to appear',
      });
      expect(visible).to.equal(true);
    });

    s.test('fluent wait ignoring a missing element', ['page'], async ({ page }) => {
      await page.open(DYNAMIC_URL);
      await page.page.locator('#adder').click();

      const box = page.page.locator('#box0');
      const enabled = await page.waitFor(() => box.isEnabled({ timeout: 100 }), {
        timeoutMs: 10_000,
        intervalMs: 500,
        description: '#box0 to be enabled',
        ignore: (error) => error instanceof errors.TimeoutError,
      });
      expect(enabled).to.equal(true);
    });

    s.test(
      'submit through the page object',
      ['page', 'sampleUser'],
      async ({ page, sampleUser }) => {
        const form = await new WebFormPage(page).open();
        await form.enterText(sampleUser.username);
        await form.submit();

        expect((await form.confirmation()).toLowerCase()).to.include('received');
      }
    );

    s.each(
      RESOLUTIONS,
      ({ width, height }) => `form renders at ${width}x${height}`,
      ['page'],
      async ({ page }, resolution) => {
        await page.page.setViewportSize(resolution);
        await page.open(WEB_FORM_URL);

        expect(page.page.viewportSize()).to.deep.equal(resolution);
        expect(await page.page.locator('#my-text-id').isVisible()).to.equal(true);
      }
    );

    s.test('page title', ['page'], async ({ page }) => {
      await page.open(WEB_FORM_URL);
      expect(await page.title()).to.equal('Web form');
    });

    s.test(
      'screenshot on failure',
      ['page'],
      async ({ page }) => {
        await page.open(WEB_FORM_URL);
        try {
          await page.page.locator('#non-existent-id').click({ timeout: 2000 });
        } catch (error) {
          const path = await page.screenshot('test_failure');
          expect(path).to.match(/test_failure_\d{8}_\d{6}\.png$/);
          throw error;
        }
      },
      { failing: 'element does not exist' }
    );
  }
);
