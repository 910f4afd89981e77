import type { BrowserEngine, WaitUntil } from '../schema/index.js';

// ── Driver seam ──────────────────────────────────────────────
// The narrow slice of a browser automation library the session needs.
// `createPlaywrightDriver()` is the production implementation; tests
// supply an in-process fake.

export interface LaunchOptions {
  headless: boolean;
  args: readonly string[];
  timeout: number;
}

export interface ContextOptions {
  viewport: { width: number; height: number };
  ignoreHTTPSErrors: boolean;
  javaScriptEnabled: boolean;
}

export interface NavigateOptions {
  waitUntil: WaitUntil;
  /** Falls back to the page default timeout when absent. */
  timeout?: number;
}

export interface NavigationResponse {
  status: number;
}

export interface DriverPage {
  goto(url: string, options: NavigateOptions): Promise<NavigationResponse | null>;
  fill(locator: string, text: string): Promise<void>;
  click(locator: string): Promise<void>;
  isVisible(locator: string): Promise<boolean>;
  count(locator: string): Promise<number>;
  textContent(locator: string): Promise<string | null>;
  url(): string;
  isClosed(): boolean;
  setDefaultTimeout(timeout: number): void;
  onCrash(listener: () => void): void;
  onClose(listener: () => void): void;
  close(): Promise<void>;
}

export interface DriverContext {
  newPage(): Promise<DriverPage>;
  close(): Promise<void>;
}

export interface DriverBrowser {
  newContext(options: ContextOptions): Promise<DriverContext>;
  isConnected(): boolean;
  onDisconnected(listener: () => void): void;
  close(): Promise<void>;
}

export interface BrowserDriver {
  launch(engine: BrowserEngine, options: LaunchOptions): Promise<DriverBrowser>;
}
