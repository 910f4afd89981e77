import path from 'node:path';

import type { Command } from 'commander';
import { z } from 'zod';

import { createPlaywrightDriver } from '../browser/playwright.js';
import { detectCapabilities } from '../config/capabilities.js';
import { DEFAULT_RESULTS_DIR, LIMITS, TIMEOUTS } from '../config/defaults.js';
import { loadEnvConfig } from '../config/env.js';
import { loadConfigFile, loadSpecificationFile } from '../config/loader.js';
import { createSpecificationRunner } from '../core/specificationRunner.js';
import { messageOf } from '../core/errors.js';
import {
  EXIT_CODES,
  exitCodeFor,
  formatDuration,
  formatTaskLine,
  generateJSON,
  serializeJSON,
} from '../report/reporter.js';
import { createFileResultStore } from '../report/store.js';
import { browserEngineSchema } from '../schema/index.js';
import type {
  EnvConfig,
  FileConfig,
  RunConfiguration,
  Specification,
  SpecificationResult,
} from '../schema/index.js';
import { dispatchRun } from '../tasks/dispatcher.js';
import { createFileTaskStore } from '../tasks/fileStore.js';
import { TaskRegistry } from '../tasks/registry.js';

// ── Option shapes ────────────────────────────────────────────

export interface RunCommandOptions {
  json?: true;
  resultsDir?: string;
  config: string;
  browser?: string;
  headless?: true;
  headed?: true;
  runTimeout?: string;
}

interface TaskCommandOptions {
  resultsDir?: string;
  config: string;
}

interface TasksCommandOptions extends TaskCommandOptions {
  limit: string;
}

const DEFAULT_CONFIG_PATH = '.specrun.yaml';

const runTimeoutSchema = z.coerce.number().positive();
const limitSchema = z.coerce.number().int().positive();

// ── Config merge ─────────────────────────────────────────────
// CLI flags > config file > environment > the specification itself.

interface ResolvedRun {
  configuration: RunConfiguration;
  resultsDir: string;
  runTimeoutMs: number;
}

export function resolveRunSettings(
  spec: Specification,
  opts: RunCommandOptions,
  file: FileConfig,
  env: EnvConfig,
): ResolvedRun {
  const flagHeadless =
    opts.headed !== undefined ? false : opts.headless !== undefined ? true : undefined;
  const flagBrowser =
    opts.browser !== undefined ? browserEngineSchema.parse(opts.browser) : undefined;
  const flagTimeout =
    opts.runTimeout !== undefined ? runTimeoutSchema.parse(opts.runTimeout) : undefined;

  const timeoutSeconds = flagTimeout ?? file.runTimeout ?? env.SPECRUN_RUN_TIMEOUT;

  return {
    configuration: {
      ...spec.configuration,
      browser:
        flagBrowser ?? file.browser ?? env.SPECRUN_BROWSER ?? spec.configuration.browser,
      headless:
        flagHeadless ?? file.headless ?? env.SPECRUN_HEADLESS ?? spec.configuration.headless,
    },
    resultsDir: path.resolve(
      opts.resultsDir ?? file.resultsDir ?? env.SPECRUN_RESULTS_DIR ?? DEFAULT_RESULTS_DIR,
    ),
    runTimeoutMs:
      timeoutSeconds !== undefined ? timeoutSeconds * 1000 : TIMEOUTS.TOTAL_RUN_TIMEOUT,
  };
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(result: SpecificationResult, runId: string): void {
  const { summary } = result;
  const duration = Date.parse(result.endTime) - Date.parse(result.startTime);

  process.stderr.write(`\n--- specrun Result ---\n`);
  process.stderr.write(`Feature: ${result.feature.name}\n`);
  process.stderr.write(`Result:  ${result.status}\n`);
  process.stderr.write(
    `Scenarios: ${String(summary.passed)} passed, ${String(summary.failed)} failed, ${String(summary.total)} total (${summary.passRate})\n`,
  );
  if (result.error) {
    process.stderr.write(`Error:   [${result.error.kind}] ${result.error.message}\n`);
  }
  process.stderr.write(`Time:    ${formatDuration(Math.max(0, duration))}\n`);
  process.stderr.write(`Run ID:  ${runId}\n\n`);
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Execute a structured Given/When/Then specification in a browser')
    .argument('<spec-file>', 'Specification file (YAML or JSON)')
    .option('--json', 'Output JSON to stdout')
    .option('--results-dir <dir>', 'Directory for task records and reports')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--browser <engine>', 'Browser engine: chromium, firefox or webkit')
    .option('--headless', 'Run browser headless')
    .option('--headed', 'Run browser with a visible window')
    .option('--run-timeout <seconds>', 'Total run timeout in seconds')
    .action(async (specFile: string, opts: RunCommandOptions) => {
      let resolved: ResolvedRun;
      let spec: Specification;
      try {
        const fileConfig = await loadConfigFile(opts.config);
        spec = await loadSpecificationFile(specFile);
        resolved = resolveRunSettings(spec, opts, fileConfig, loadEnvConfig());
      } catch (err) {
        process.stderr.write(`Error: ${messageOf(err)}\n`);
        process.exitCode = EXIT_CODES.CLI_ERROR;
        return;
      }

      const registry = new TaskRegistry(createFileTaskStore(resolved.resultsDir));
      const runner = createSpecificationRunner({
        driver: createPlaywrightDriver(),
        capabilities: detectCapabilities(),
      });

      let cancelRun: ((reason: string) => void) | undefined;
      const onInterrupt = (): void => {
        process.stderr.write('\nInterrupted, closing browser...\n');
        cancelRun?.('interrupted');
      };
      process.once('SIGINT', onInterrupt);

      try {
        const run = await dispatchRun(
          {
            registry,
            runner,
            resultStore: createFileResultStore(resolved.resultsDir),
            runTimeoutMs: resolved.runTimeoutMs,
          },
          { ...spec, configuration: resolved.configuration },
        );
        cancelRun = (reason) => {
          run.cancel(reason);
        };

        const result = await run.done;
        const exitCode = exitCodeFor(result);

        if (opts.json) {
          const json = generateJSON(result, run.taskId, exitCode);
          process.stdout.write(serializeJSON(json) + '\n');
        }
        printSummary(result, run.taskId);
        process.exitCode = exitCode;
      } catch (err) {
        process.stderr.write(`Error: ${messageOf(err)}\n`);
        process.exitCode = EXIT_CODES.CLI_ERROR;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}

export function registerTaskCommand(program: Command): void {
  program
    .command('task')
    .description('Show the stored record of a dispatched run')
    .argument('<id>', 'Task id printed by `specrun run`')
    .option('--results-dir <dir>', 'Directory for task records and reports')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (id: string, opts: TaskCommandOptions) => {
      try {
        const resultsDir = await resolveResultsDir(opts);
        const registry = new TaskRegistry(createFileTaskStore(resultsDir));
        const record = await registry.get(id);

        if (!record) {
          process.stderr.write(`No task with id ${id} in ${resultsDir}\n`);
          process.exitCode = EXIT_CODES.CLI_ERROR;
          return;
        }
        process.stdout.write(JSON.stringify(record, null, 2) + '\n');
      } catch (err) {
        process.stderr.write(`Error: ${messageOf(err)}\n`);
        process.exitCode = EXIT_CODES.CLI_ERROR;
      }
    });
}

export function registerTasksCommand(program: Command): void {
  program
    .command('tasks')
    .description('List past runs, newest first')
    .option('--limit <n>', 'Maximum number of runs to list', String(LIMITS.TASK_HISTORY))
    .option('--results-dir <dir>', 'Directory for task records and reports')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (opts: TasksCommandOptions) => {
      try {
        const limit = limitSchema.parse(opts.limit);
        const resultsDir = await resolveResultsDir(opts);
        const registry = new TaskRegistry(createFileTaskStore(resultsDir));
        const records = await registry.recent(limit);

        if (records.length === 0) {
          process.stderr.write(`No runs recorded in ${resultsDir}\n`);
          return;
        }
        for (const record of records) {
          process.stdout.write(formatTaskLine(record) + '\n');
        }
      } catch (err) {
        process.stderr.write(`Error: ${messageOf(err)}\n`);
        process.exitCode = EXIT_CODES.CLI_ERROR;
      }
    });
}

async function resolveResultsDir(opts: TaskCommandOptions): Promise<string> {
  const fileConfig = await loadConfigFile(opts.config);
  const env = loadEnvConfig();
  return path.resolve(
    opts.resultsDir ?? fileConfig.resultsDir ?? env.SPECRUN_RESULTS_DIR ?? DEFAULT_RESULTS_DIR,
  );
}
