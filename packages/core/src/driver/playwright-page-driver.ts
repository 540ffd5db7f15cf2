import { setTimeout as delay } from 'node:timers/promises';
import { chromium, errors, type Browser, type Locator, type Page } from 'playwright-core';
import { createChildLogger } from '@docket/shared/src/logger.js';
import { ConfigurationError, DriverError } from '@docket/shared/src/utils/errors.js';
import type { PageDriver, PageDriverFactory, PageElement, WaitOptions } from './page-driver.js';

const log = createChildLogger('driver:playwright');

const POLL_INTERVAL_MS = 250;

export interface PlaywrightDriverConfig {
  /** Remote browser endpoint, e.g. a Playwright browser server. */
  readonly wsEndpoint: string;
  readonly defaultTimeoutMs: number;
  readonly viewport?: { readonly width: number; readonly height: number };
}

class PlaywrightElement implements PageElement {
  constructor(
    readonly locator: Locator,
    readonly description: string,
  ) {}
}

function unwrap(element: PageElement): Locator {
  if (element instanceof PlaywrightElement) {
    return element.locator;
  }
  throw new DriverError(`Element was not produced by this driver: ${element.description}`);
}

async function isClickable(locator: Locator): Promise<boolean> {
  return (await locator.isVisible()) && (await locator.isEnabled());
}

function createPlaywrightDriver(browser: Browser, page: Page): PageDriver {
  return {
    async navigate(url: string): Promise<void> {
      log.debug({ url }, 'Navigating');
      await page.goto(url, { waitUntil: 'load' });
    },

    async waitForElement(locator: string, options: WaitOptions): Promise<PageElement | null> {
      const target = page.locator(locator).first();
      const state = options.state ?? 'present';
      try {
        await target.waitFor({
          state: state === 'present' ? 'attached' : 'visible',
          timeout: options.timeoutMs,
        });
        if (state === 'clickable') {
          const deadline = Date.now() + options.timeoutMs;
          while (!(await isClickable(target))) {
            if (Date.now() >= deadline) {
              return null;
            }
            await delay(POLL_INTERVAL_MS);
          }
        }
        return new PlaywrightElement(target, locator);
      } catch (error) {
        if (error instanceof errors.TimeoutError) {
          return null;
        }
        throw error;
      }
    },

    async findAll(locator: string, scope?: PageElement): Promise<readonly PageElement[]> {
      const base = scope ? unwrap(scope).locator(locator) : page.locator(locator);
      const matches = await base.all();
      return matches.map((match, index) => new PlaywrightElement(match, `${locator}[${String(index)}]`));
    },

    async click(element: PageElement): Promise<void> {
      await unwrap(element).click();
    },

    async fill(element: PageElement, text: string): Promise<void> {
      await unwrap(element).fill(text);
    },

    async readText(element: PageElement): Promise<string> {
      return unwrap(element).innerText();
    },

    async getAttribute(element: PageElement, name: string): Promise<string | null> {
      return unwrap(element).getAttribute(name);
    },

    async executeScript(script: string, args: readonly unknown[] = []): Promise<unknown> {
      const payload: [string, unknown[]] = [script, [...args]];
      const result: unknown = await page.evaluate(
        ([body, scriptArgs]) => Reflect.apply(new Function('...args', body), undefined, scriptArgs),
        payload,
      );
      return result;
    },

    async activateRow(row: PageElement): Promise<void> {
      const locator = unwrap(row);
      await locator.scrollIntoViewIfNeeded();
      await locator.click();
    },

    async readUpdatedDetail(locator: string, previousText: string, timeoutMs: number): Promise<string> {
      const previous = previousText.trim();
      const pane = page.locator(locator).first();
      const deadline = Date.now() + timeoutMs;
      let candidate: string | undefined;

      // The pane counts as updated once a new text is seen on two polls in a row.
      while (Date.now() < deadline) {
        if (await pane.isVisible()) {
          const text = (await pane.innerText()).trim();
          if (text.length > 0 && text !== previous) {
            if (text === candidate) {
              return text;
            }
            candidate = text;
          }
        }
        await delay(POLL_INTERVAL_MS);
      }

      throw new DriverError(`Detail pane ${locator} did not update within ${String(timeoutMs)} ms`);
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}

export function createPlaywrightDriverFactory(config: PlaywrightDriverConfig): PageDriverFactory {
  if (!config.wsEndpoint) {
    throw new ConfigurationError('A remote browser endpoint is required for the Playwright driver');
  }

  log.info({ wsEndpoint: config.wsEndpoint }, 'Creating Playwright driver factory');

  return {
    async create(): Promise<PageDriver> {
      const browser = await chromium.connect(config.wsEndpoint, {
        timeout: config.defaultTimeoutMs,
      });
      try {
        const context = await browser.newContext({
          viewport: config.viewport ?? { width: 1920, height: 1080 },
        });
        const page = await context.newPage();
        page.setDefaultTimeout(config.defaultTimeoutMs);
        return createPlaywrightDriver(browser, page);
      } catch (error) {
        await browser.close();
        throw new DriverError(
          `Failed to open a browser page: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined,
        );
      }
    },
  };
}
