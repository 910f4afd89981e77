/**
 * Default configuration values.
 * Run-level values are overridable via config file, env, or CLI flags;
 * step-level ones via the specification itself.
 */

export const TIMEOUTS = {
  LAUNCH_TIMEOUT: 30_000,
  NAVIGATION_TIMEOUT: 60_000,
  ACTION_TIMEOUT: 30_000,
  TOTAL_RUN_TIMEOUT: 300_000,
  NAVIGATION_RETRY_WAIT: 2_000,
  PAGE_SETTLE: 1_000,
  PAGE_RETRY_BACKOFF: 1_000,
} as const;

export const LIMITS = {
  PAGE_CREATION_ATTEMPTS: 3,
  // Attempt number after which a headed session relaunches headless.
  HEADLESS_FALLBACK_AFTER_ATTEMPT: 2,
  NAVIGATION_ATTEMPTS: 2,
  TASK_HISTORY: 50,
} as const;

export const VIEWPORT = { width: 1280, height: 720 } as const;

export const CART_COUNT_LOCATOR = '#nav-cart-count';

// Container-friendly chromium flags; sandboxing is unavailable in most
// Linux containers and /dev/shm is often tiny.
export const CHROMIUM_ARGS = {
  LINUX: [
    '--no-sandbox',
    '--disable-dev-shm-usage',
    '--disable-gpu',
    '--disable-setuid-sandbox',
    '--no-zygote',
  ],
  ALL: ['--disable-blink-features=AutomationControlled'],
} as const;

export const DEFAULT_RESULTS_DIR = 'results';
