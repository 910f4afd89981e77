import { chromium, firefox, webkit } from 'playwright';
import type { Browser, BrowserContext, BrowserType, Page } from 'playwright';

import type { BrowserEngine } from '../schema/index.js';
import type {
  BrowserDriver,
  DriverBrowser,
  DriverContext,
  DriverPage,
} from './driver.js';

const ENGINES: Record<BrowserEngine, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

// ── Factory ──────────────────────────────────────────────────

export function createPlaywrightDriver(): BrowserDriver {
  return {
    async launch(engine, options): Promise<DriverBrowser> {
      const browser = await ENGINES[engine].launch({
        headless: options.headless,
        args: [...options.args],
        timeout: options.timeout,
      });
      return wrapBrowser(browser);
    },
  };
}

// ── Adapters ─────────────────────────────────────────────────

function wrapBrowser(browser: Browser): DriverBrowser {
  return {
    async newContext(options): Promise<DriverContext> {
      const context = await browser.newContext({
        viewport: { ...options.viewport },
        ignoreHTTPSErrors: options.ignoreHTTPSErrors,
        javaScriptEnabled: options.javaScriptEnabled,
      });
      return wrapContext(context);
    },
    isConnected: () => browser.isConnected(),
    onDisconnected(listener) {
      browser.on('disconnected', () => listener());
    },
    close: () => browser.close(),
  };
}

function wrapContext(context: BrowserContext): DriverContext {
  return {
    async newPage(): Promise<DriverPage> {
      return wrapPage(await context.newPage());
    },
    close: () => context.close(),
  };
}

function wrapPage(page: Page): DriverPage {
  return {
    async goto(url, options) {
      const response = await page.goto(url, {
        waitUntil: options.waitUntil,
        ...(options.timeout !== undefined ? { timeout: options.timeout } : {}),
      });
      return response ? { status: response.status() } : null;
    },
    fill: (locator, text) => page.fill(locator, text),
    click: (locator) => page.click(locator),
    isVisible: (locator) => page.isVisible(locator),
    count: (locator) => page.locator(locator).count(),
    textContent: (locator) => page.locator(locator).textContent(),
    url: () => page.url(),
    isClosed: () => page.isClosed(),
    setDefaultTimeout: (timeout) => page.setDefaultTimeout(timeout),
    onCrash(listener) {
      page.on('crash', () => listener());
    },
    onClose(listener) {
      page.on('close', () => listener());
    },
    close: () => page.close(),
  };
}
