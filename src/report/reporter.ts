import type {
  AggregateStatus,
  ScenarioResult,
  ScenarioStatus,
  SpecificationResult,
  StepResult,
  TaskRecord,
} from '../schema/index.js';
import { specificationResultSchema } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput } from '../schema/jsonOutput.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  PASSED: 0,
  FAILED: 1,
  PARTIAL: 2,
  RUN_ERROR: 3,
  CLI_ERROR: 4,
} as const;

/** A run-level error outranks the aggregate status. */
export function exitCodeFor(result: SpecificationResult): number {
  if (result.error) return EXIT_CODES.RUN_ERROR;
  switch (result.status) {
    case 'passed':
      return EXIT_CODES.PASSED;
    case 'failed':
      return EXIT_CODES.FAILED;
    case 'partial':
      return EXIT_CODES.PARTIAL;
  }
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  result: SpecificationResult,
  runId: string,
  exitCode: number,
): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId,
    exitCode,
    durationMs: durationOf(result.startTime, result.endTime),
    result,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainRecord(value)) return value;
  return Object.fromEntries(
    Object.keys(value)
      .sort()
      .map((k) => [k, value[k]]),
  );
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(
  result: SpecificationResult,
  runId?: string,
): string {
  const lines: string[] = [];
  const { feature, configuration, summary } = result;

  // Header + metadata
  lines.push(`# ${feature.name}`);
  lines.push('');
  if (feature.description) {
    lines.push(feature.description);
    lines.push('');
  }
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  if (runId !== undefined) {
    lines.push(`| **Run ID** | \`${runId}\` |`);
  }
  if (feature.tags.length > 0) {
    lines.push(`| **Tags** | ${feature.tags.join(', ')} |`);
  }
  lines.push(
    `| **Browser** | ${configuration.browser} (headless=${String(configuration.headless)}) |`,
  );
  lines.push(`| **Started** | ${result.startTime} |`);
  lines.push(`| **Finished** | ${result.endTime} |`);
  lines.push(
    `| **Duration** | ${formatDuration(durationOf(result.startTime, result.endTime))} |`,
  );
  lines.push(`| **Result** | **${result.status}** ${statusIcon(result.status)} |`);
  lines.push('');

  if (result.error) {
    lines.push(`> **Run error (${result.error.kind}):** ${result.error.message}`);
    lines.push('');
  }

  // Summary
  lines.push(`## Summary`);
  lines.push('');
  lines.push(`| Total | Passed | Failed | Pass rate |`);
  lines.push(`|-------|--------|--------|-----------|`);
  lines.push(
    `| ${String(summary.total)} | ${String(summary.passed)} | ${String(summary.failed)} | ${summary.passRate} |`,
  );
  lines.push('');

  // Per-scenario details
  lines.push(`## Scenarios`);
  lines.push('');

  for (const scenario of result.scenarios) {
    lines.push(...scenarioSection(scenario));
  }

  return lines.join('\n');
}

function scenarioSection(scenario: ScenarioResult): string[] {
  const lines: string[] = [];
  lines.push(
    `### ${scenario.name} ${statusIcon(scenario.status)}`,
  );
  lines.push('');
  if (scenario.tags.length > 0) {
    lines.push(`Tags: ${scenario.tags.join(', ')}`);
    lines.push('');
  }
  if (scenario.error) {
    lines.push(`**Error:** ${scenario.error.message}`);
    lines.push('');
  }

  if (scenario.steps.length === 0) {
    lines.push('_No steps executed._');
    lines.push('');
    return lines;
  }

  lines.push(`| # | Phase | Description | Result | Message |`);
  lines.push(`|---|-------|-------------|--------|---------|`);
  for (const [index, step] of scenario.steps.entries()) {
    lines.push(
      `| ${String(index + 1)} | ${step.phase} | ${escapeMarkdownCell(step.description)} | ${stepIcon(step)} | ${escapeMarkdownCell(step.message)} |`,
    );
  }
  lines.push('');
  return lines;
}

// ── Helpers ──────────────────────────────────────────────────

function statusIcon(status: AggregateStatus | ScenarioStatus): string {
  switch (status) {
    case 'passed':
      return '[PASS]';
    case 'failed':
      return '[FAIL]';
    case 'partial':
      return '[PARTIAL]';
    case 'pending':
      return '[PENDING]';
  }
}

function stepIcon(step: StepResult): string {
  switch (step.status) {
    case 'passed':
      return '[PASS]';
    case 'failed':
      return '[FAIL]';
    case 'pending':
      return '[PENDING]';
  }
}

// ── Task history ─────────────────────────────────────────────

/**
 * One line per task: id, task status, creation time, feature, and the
 * run outcome once a result is stored.
 */
export function formatTaskLine(record: TaskRecord): string {
  const feature = record.payload['feature'];
  const scenarios = record.payload['scenarios'];
  const parsed = specificationResultSchema.safeParse(record.result);

  let outcome: string;
  if (parsed.success) {
    const { summary, status } = parsed.data;
    outcome = `${status} ${String(summary.passed)}/${String(summary.total)} passed (${summary.passRate})`;
  } else if (typeof scenarios === 'number') {
    outcome = `${String(scenarios)} scenario${scenarios === 1 ? '' : 's'}`;
  } else {
    outcome = '-';
  }

  return [
    record.id,
    record.status.padEnd(9),
    record.createdAt,
    typeof feature === 'string' ? feature : '-',
    outcome,
  ].join('  ');
}

function durationOf(startTime: string, endTime: string): number {
  return Math.max(0, Date.parse(endTime) - Date.parse(startTime));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
