/**
 * Browser execution module.
 * One owned browser/context/page per run, behind a narrow driver seam.
 * Playwright is the production driver.
 */

export { BrowserSession, isConnectionLoss, launchArgsFor } from './session.js';
export type { SessionOptions, SessionState, HealthState } from './session.js';
export { createPlaywrightDriver } from './playwright.js';
export type {
  BrowserDriver,
  DriverBrowser,
  DriverContext,
  DriverPage,
  LaunchOptions,
  ContextOptions,
  NavigateOptions,
  NavigationResponse,
} from './driver.js';
