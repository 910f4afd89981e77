import { envConfigSchema } from '../schema/config.js';
import type { EnvConfig } from '../schema/config.js';

// ── Env loader ───────────────────────────────────────────────

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return envConfigSchema.parse({
    SPECRUN_BROWSER: env['SPECRUN_BROWSER'],
    SPECRUN_HEADLESS: env['SPECRUN_HEADLESS'],
    SPECRUN_RESULTS_DIR: env['SPECRUN_RESULTS_DIR'],
    SPECRUN_RUN_TIMEOUT: env['SPECRUN_RUN_TIMEOUT'],
  });
}
