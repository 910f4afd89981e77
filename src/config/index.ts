/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated. Capabilities are detected once and passed down.
 */

export {
  TIMEOUTS,
  LIMITS,
  VIEWPORT,
  CHROMIUM_ARGS,
  CART_COUNT_LOCATOR,
  DEFAULT_RESULTS_DIR,
} from './defaults.js';
export { loadConfigFile, loadSpecificationFile } from './loader.js';
export { loadEnvConfig } from './env.js';
export { detectCapabilities } from './capabilities.js';
export type { Capabilities } from './capabilities.js';
