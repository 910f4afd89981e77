import type { Capabilities } from '../config/capabilities.js';
import { CHROMIUM_ARGS, LIMITS, TIMEOUTS, VIEWPORT } from '../config/defaults.js';
import {
  BrowserDisconnectedError,
  BrowserLaunchError,
  OrchestratorError,
  TimeoutError,
  messageOf,
} from '../core/errors.js';
import type { HealthProblem } from '../core/errors.js';
import type { BrowserEngine, RunConfiguration } from '../schema/index.js';
import { delay, withTimeout } from '../utils/async.js';
import type { Sleep } from '../utils/async.js';
import * as log from '../utils/logger.js';
import type {
  BrowserDriver,
  ContextOptions,
  DriverBrowser,
  DriverContext,
  DriverPage,
  NavigateOptions,
  NavigationResponse,
} from './driver.js';

// ── Public types ─────────────────────────────────────────────

export type SessionState =
  | { name: 'unstarted' }
  | { name: 'launching' }
  | { name: 'ready' }
  | { name: 'degraded'; reason: string }
  | { name: 'closed' };

export type HealthState = 'ok' | HealthProblem;

export interface SessionOptions {
  driver: BrowserDriver;
  capabilities: Capabilities;
  sleep?: Sleep | undefined;
  launchTimeoutMs?: number | undefined;
}

const CONTEXT_OPTIONS: ContextOptions = {
  viewport: VIEWPORT,
  ignoreHTTPSErrors: true,
  javaScriptEnabled: true,
};

// Playwright reports a dead target only through its message text.
const CONNECTION_LOSS_PATTERNS = [
  /target closed/i,
  /has been closed/i,
  /browser has disconnected/i,
];

export function isConnectionLoss(err: unknown): boolean {
  const message = messageOf(err);
  return CONNECTION_LOSS_PATTERNS.some((pattern) => pattern.test(message));
}

export function launchArgsFor(
  engine: BrowserEngine,
  platform: NodeJS.Platform,
): string[] {
  if (engine !== 'chromium') return [];
  return platform === 'linux'
    ? [...CHROMIUM_ARGS.LINUX, ...CHROMIUM_ARGS.ALL]
    : [...CHROMIUM_ARGS.ALL];
}

// ── Session ──────────────────────────────────────────────────

/**
 * One browser, one context, one page, released together.
 *
 * Every page operation goes through `withPage`, which refuses to run on an
 * unhealthy session and re-tags driver failures: a dead target becomes
 * `BrowserDisconnectedError`, a driver timeout becomes `TimeoutError`.
 */
export class BrowserSession {
  private readonly driver: BrowserDriver;
  private readonly capabilities: Capabilities;
  private readonly sleep: Sleep;
  private readonly launchTimeoutMs: number;

  private state: SessionState = { name: 'unstarted' };
  private browser: DriverBrowser | null = null;
  private context: DriverContext | null = null;
  private page: DriverPage | null = null;
  private crashed = false;
  private engine: BrowserEngine = 'chromium';
  private headless = true;

  constructor(options: SessionOptions) {
    this.driver = options.driver;
    this.capabilities = options.capabilities;
    this.sleep = options.sleep ?? delay;
    this.launchTimeoutMs = options.launchTimeoutMs ?? TIMEOUTS.LAUNCH_TIMEOUT;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get isHeadless(): boolean {
    return this.headless;
  }

  // ── Lifecycle ──────────────────────────────────────────────

  async launch(config: RunConfiguration): Promise<void> {
    if (this.state.name !== 'unstarted') {
      throw new BrowserLaunchError(
        `Cannot launch a session that is ${this.state.name}`,
      );
    }
    this.transition({ name: 'launching' });

    this.engine = config.browser;
    this.headless = config.headless;
    if (!this.headless && !this.capabilities.displayAvailable) {
      log.warn('No display available - forcing headless mode');
      this.headless = true;
    }

    try {
      await this.startBrowser();
      await this.createContext();
      await this.createPage(config.timeoutMs);
    } catch (err) {
      log.error(`Browser initialization failed: ${messageOf(err)}`);
      log.detail(
        `State at failure: browser=${String(this.browser !== null)}, context=${String(this.context !== null)}, page=${String(this.page !== null)}`,
      );
      await this.close();
      throw err instanceof BrowserLaunchError
        ? err
        : new BrowserLaunchError(
            `Failed to initialize browser: ${messageOf(err)}`,
            err,
          );
    }

    if (this.stateName() === 'launching') {
      this.transition({ name: 'ready' });
    }
    log.browser(
      `Browser initialized: ${this.engine}, headless=${String(this.headless)}`,
    );
  }

  checkHealth(): HealthState {
    if (this.crashed) return 'crashed';
    if (this.state.name === 'closed') return 'disconnected';
    if (!this.browser) return 'not_initialized';
    if (!this.browser.isConnected()) return 'disconnected';
    if (!this.page) return 'not_initialized';
    if (this.page.isClosed()) return 'page_closed';
    return 'ok';
  }

  /**
   * Release page, context and browser. Each layer is guarded on its own so
   * one failure does not keep the others alive. Never throws; a second
   * call finds nothing left to release.
   */
  async close(): Promise<void> {
    const { page, context, browser } = this;
    this.page = null;
    this.context = null;
    this.browser = null;
    if (this.state.name !== 'closed') {
      this.transition({ name: 'closed' });
    }

    if (!page && !context && !browser) return;

    if (page) {
      await release('page', async () => {
        if (!page.isClosed()) await page.close();
      });
    }
    if (context) {
      await release('context', () => context.close());
    }
    if (browser) {
      await release('browser', async () => {
        if (browser.isConnected()) await browser.close();
      });
    }
    log.browser('Browser closed');
  }

  // ── Page operations ────────────────────────────────────────

  navigate(
    url: string,
    options: NavigateOptions,
  ): Promise<NavigationResponse | null> {
    return this.withPage((page) => page.goto(url, options));
  }

  fill(locator: string, text: string): Promise<void> {
    return this.withPage((page) => page.fill(locator, text));
  }

  click(locator: string): Promise<void> {
    return this.withPage((page) => page.click(locator));
  }

  isVisible(locator: string): Promise<boolean> {
    return this.withPage((page) => page.isVisible(locator));
  }

  count(locator: string): Promise<number> {
    return this.withPage((page) => page.count(locator));
  }

  textContent(locator: string): Promise<string | null> {
    return this.withPage((page) => page.textContent(locator));
  }

  currentUrl(): string {
    return this.requirePage().url();
  }

  // ── Internals ──────────────────────────────────────────────

  // Read through a call so earlier checks on `state` do not narrow it.
  private stateName(): SessionState['name'] {
    return this.state.name;
  }

  private transition(next: SessionState): void {
    const detailText = next.name === 'degraded' ? ` (${next.reason})` : '';
    log.detail(`Session: ${this.state.name} → ${next.name}${detailText}`);
    this.state = next;
  }

  private requirePage(): DriverPage {
    const health = this.checkHealth();
    if (health !== 'ok' || !this.page) {
      throw new BrowserDisconnectedError(
        health === 'ok' ? 'not_initialized' : health,
        this.crashed,
      );
    }
    return this.page;
  }

  private async withPage<T>(
    operation: (page: DriverPage) => Promise<T>,
  ): Promise<T> {
    const page = this.requirePage();
    try {
      return await operation(page);
    } catch (err) {
      throw this.classify(err);
    }
  }

  private classify(err: unknown): unknown {
    if (err instanceof OrchestratorError) return err;
    if (isConnectionLoss(err)) {
      log.error(`Browser closed during operation: ${messageOf(err)}`);
      return new BrowserDisconnectedError('connection_lost', this.crashed, err);
    }
    if (err instanceof Error && err.name === 'TimeoutError') {
      return new TimeoutError(err.message, err);
    }
    return err;
  }

  private ensureNotClosed(): void {
    if (this.state.name === 'closed') {
      throw new BrowserLaunchError('Session was closed during launch');
    }
  }

  private async startBrowser(): Promise<void> {
    const args = launchArgsFor(this.engine, this.capabilities.platform);
    log.browser(
      `Launching ${this.engine} browser (headless=${String(this.headless)})...`,
    );

    const launching = this.driver.launch(this.engine, {
      headless: this.headless,
      args,
      timeout: this.launchTimeoutMs,
    });
    const timeoutSeconds = this.launchTimeoutMs / 1000;

    this.browser = await withTimeout(launching, this.launchTimeoutMs, () => {
      void launching
        .then((late) => late.close())
        .catch((err: unknown) => {
          log.detail(`Abandoned launch did not settle cleanly: ${messageOf(err)}`);
        });
      return new BrowserLaunchError(
        `Browser initialization timed out after ${String(timeoutSeconds)} seconds`,
      );
    });
    this.ensureNotClosed();

    if (!this.browser.isConnected()) {
      throw new BrowserLaunchError('Browser launched but is not connected');
    }
    this.browser.onDisconnected(() => {
      if (this.state.name !== 'closed') log.warn('Browser disconnected');
    });
  }

  private async createContext(): Promise<void> {
    if (!this.browser) {
      throw new BrowserLaunchError('Browser not initialized');
    }
    try {
      this.context = await this.browser.newContext(CONTEXT_OPTIONS);
    } catch (err) {
      throw new BrowserLaunchError(
        `Failed to create browser context: ${messageOf(err)}`,
        err,
      );
    }
    this.ensureNotClosed();
  }

  private async createPage(defaultTimeout: number): Promise<void> {
    const maxAttempts = LIMITS.PAGE_CREATION_ATTEMPTS;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.openPage(defaultTimeout);
        log.browser(`Page created (attempt ${String(attempt)})`);
        return;
      } catch (err) {
        if (err instanceof BrowserLaunchError) throw err;

        lastError = err;
        log.warn(
          `Page creation attempt ${String(attempt)}/${String(maxAttempts)} failed: ${messageOf(err)}`,
        );
        await this.discardPage();

        if (attempt < maxAttempts) {
          const waitMs = attempt * TIMEOUTS.PAGE_RETRY_BACKOFF;
          log.retry(`Waiting ${String(waitMs / 1000)}s before retry...`);
          await this.sleep(waitMs);

          if (
            !this.headless &&
            attempt === LIMITS.HEADLESS_FALLBACK_AFTER_ATTEMPT
          ) {
            await this.fallBackToHeadless(attempt);
          }
        }
      }
    }

    throw new BrowserLaunchError(
      `Failed to create page after ${String(maxAttempts)} attempts: ${messageOf(lastError)}`,
      lastError,
    );
  }

  private async openPage(defaultTimeout: number): Promise<void> {
    if (!this.context) {
      throw new BrowserLaunchError('Browser context not initialized');
    }
    const page = await this.context.newPage();
    this.page = page;
    this.ensureNotClosed();

    await this.sleep(TIMEOUTS.PAGE_SETTLE);
    if (page.isClosed()) {
      throw new Error('Page closed immediately after creation');
    }

    page.onCrash(() => {
      this.crashed = true;
      log.error('Page crashed!');
    });
    page.onClose(() => {
      if (!this.crashed && this.state.name !== 'closed') {
        log.warn('Page closed unexpectedly');
      }
    });
    page.setDefaultTimeout(defaultTimeout);
  }

  private async discardPage(): Promise<void> {
    const page = this.page;
    this.page = null;
    if (page) {
      await release('page', async () => {
        if (!page.isClosed()) await page.close();
      });
    }
  }

  private async fallBackToHeadless(failedAttempts: number): Promise<void> {
    log.warn('Switching to headless mode due to repeated failures...');

    const { context, browser } = this;
    this.context = null;
    this.browser = null;
    if (context) await release('context', () => context.close());
    if (browser) await release('browser', () => browser.close());

    this.headless = true;
    await this.startBrowser();
    await this.createContext();
    this.transition({
      name: 'degraded',
      reason: `headed page creation failed ${String(failedAttempts)} times`,
    });
    log.browser('Browser relaunched in headless mode');
  }
}

// ── Helpers ──────────────────────────────────────────────────

async function release(
  layer: string,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    log.detail(`Error closing ${layer} (already closed?): ${messageOf(err)}`);
  }
}
