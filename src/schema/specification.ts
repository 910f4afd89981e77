import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';

import { givenStepSchema, thenStepSchema, whenStepSchema } from './step.js';

// ── Feature ───────────────────────────────────────────────────

export const featureSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

export type Feature = z.infer<typeof featureSchema>;

// ── Run configuration ─────────────────────────────────────────

export const browserEngineSchema = z.enum(['chromium', 'firefox', 'webkit']);

export type BrowserEngine = z.infer<typeof browserEngineSchema>;

export const runConfigurationSchema = z.object({
  browser: browserEngineSchema.default('chromium'),
  headless: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(TIMEOUTS.ACTION_TIMEOUT),
});

export type RunConfiguration = z.infer<typeof runConfigurationSchema>;

// ── Scenario ──────────────────────────────────────────────────

export const scenarioSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  tags: z.array(z.string()).default([]),
  given: z.array(givenStepSchema).default([]),
  when: z.array(whenStepSchema).default([]),
  then: z.array(thenStepSchema).default([]),
});

export type Scenario = z.infer<typeof scenarioSchema>;

// ── Specification ─────────────────────────────────────────────

export const specificationSchema = z.object({
  feature: featureSchema,
  configuration: runConfigurationSchema.default({}),
  scenarios: z.array(scenarioSchema),
});

/** Shape accepted from producers, before defaults are applied. */
export type SpecificationInput = z.input<typeof specificationSchema>;

export type Specification = z.infer<typeof specificationSchema>;

// ── Parser ────────────────────────────────────────────────────

export class InvalidSpecificationError extends Error {
  readonly issues: readonly z.ZodIssue[];

  constructor(issues: readonly z.ZodIssue[]) {
    super(
      `Invalid specification: ${issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'InvalidSpecificationError';
    this.issues = issues;
  }
}

/**
 * Validate a producer's specification and apply defaults.
 * Unknown step types are rejected here, before any browser exists.
 */
export function parseSpecification(data: unknown): Specification {
  const parsed = specificationSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidSpecificationError(parsed.error.issues);
  }
  return parsed.data;
}
