import { z } from 'zod';

import { specificationResultSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  exitCode: z.number().int().nonnegative(),
  durationMs: z.number().int().nonnegative(),
  result: specificationResultSchema,
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
