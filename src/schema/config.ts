import { z } from 'zod';

import { browserEngineSchema } from './specification.js';

// ── `.specrun.yaml` ─────────────────────────────────────────
// Every field is optional: CLI flags override the file, the file
// overrides the environment.

export const fileConfigSchema = z.object({
  browser: browserEngineSchema.optional(),
  headless: z.boolean().optional(),
  runTimeout: z.number().positive().optional(),
  resultsDir: z.string().min(1).optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Environment ─────────────────────────────────────────────

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const envConfigSchema = z.object({
  SPECRUN_BROWSER: browserEngineSchema.optional(),
  SPECRUN_HEADLESS: booleanFlagSchema.optional(),
  SPECRUN_RESULTS_DIR: z.string().min(1).optional(),
  SPECRUN_RUN_TIMEOUT: z.coerce.number().positive().optional(),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;
