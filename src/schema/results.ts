import { z } from 'zod';

import { phaseSchema } from './step.js';
import { featureSchema, runConfigurationSchema } from './specification.js';

// ── ErrorInfo ─────────────────────────────────────────────────

export const errorKindSchema = z.enum([
  'browser_launch',
  'browser_disconnected',
  'navigation',
  'interaction',
  'assertion',
  'timeout',
  'cancelled',
  'scenario_failed',
  'unexpected',
]);

export type ErrorKind = z.infer<typeof errorKindSchema>;

export const errorLocationSchema = z.object({
  scenarioId: z.string().optional(),
  phase: phaseSchema.optional(),
  stepIndex: z.number().int().nonnegative().optional(),
});

export type ErrorLocation = z.infer<typeof errorLocationSchema>;

export const errorInfoSchema = z.object({
  kind: errorKindSchema,
  message: z.string(),
  location: errorLocationSchema.optional(),
});

export type ErrorInfo = z.infer<typeof errorInfoSchema>;

// ── StepResult ────────────────────────────────────────────────

export const stepStatusSchema = z.enum(['pending', 'passed', 'failed']);

export type StepStatus = z.infer<typeof stepStatusSchema>;

export const responseStatusSchema = z.enum(['OK', 'ERROR']);

export type ResponseStatus = z.infer<typeof responseStatusSchema>;

export const stepResultSchema = z.object({
  description: z.string(),
  phase: phaseSchema,
  status: stepStatusSchema,
  message: z.string(),
  error: errorInfoSchema.optional(),
  timestamp: z.string().datetime(),
  responseCode: z.number().int().optional(),
  responseStatus: responseStatusSchema.optional(),
});

export type StepResult = z.infer<typeof stepResultSchema>;

// ── ScenarioResult ────────────────────────────────────────────

export const aggregateStatusSchema = z.enum(['passed', 'failed', 'partial']);

export type AggregateStatus = z.infer<typeof aggregateStatusSchema>;

export const scenarioStatusSchema = z.enum(['pending', 'passed', 'failed', 'partial']);

export type ScenarioStatus = z.infer<typeof scenarioStatusSchema>;

export const scenarioResultSchema = z.object({
  id: z.string(),
  name: z.string(),
  tags: z.array(z.string()),
  status: scenarioStatusSchema,
  steps: z.array(stepResultSchema),
  startTime: z.string().datetime(),
  endTime: z.string().datetime(),
  error: errorInfoSchema.optional(),
});

export type ScenarioResult = z.infer<typeof scenarioResultSchema>;

// ── SpecificationResult ───────────────────────────────────────

export const runSummarySchema = z.object({
  total: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  passRate: z.string(),
});

export type RunSummary = z.infer<typeof runSummarySchema>;

export const specificationResultSchema = z.object({
  feature: featureSchema,
  configuration: runConfigurationSchema,
  scenarios: z.array(scenarioResultSchema),
  summary: runSummarySchema,
  status: aggregateStatusSchema,
  startTime: z.string().datetime(),
  endTime: z.string().datetime(),
  error: errorInfoSchema.optional(),
});

export type SpecificationResult = z.infer<typeof specificationResultSchema>;

// ── Deterministic status decisions ────────────────────────────

/** failed == 0 → passed; passed == 0 → failed; anything else is partial. */
export function deriveAggregateStatus(
  passed: number,
  failed: number,
): AggregateStatus {
  if (failed === 0) return 'passed';
  if (passed === 0) return 'failed';
  return 'partial';
}

export function computeRunSummary(
  scenarios: readonly ScenarioResult[],
): RunSummary {
  const total = scenarios.length;
  const passed = scenarios.filter((s) => s.status === 'passed').length;
  const failed = scenarios.filter((s) => s.status === 'failed').length;

  return {
    total,
    passed,
    failed,
    passRate: total > 0 ? `${((passed / total) * 100).toFixed(2)}%` : '0%',
  };
}

// ── Validators ────────────────────────────────────────────────

export function parseSpecificationResult(data: unknown): SpecificationResult {
  return specificationResultSchema.parse(data);
}
