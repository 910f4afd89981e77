import type { BrowserDriver } from '../browser/driver.js';
import { BrowserSession } from '../browser/session.js';
import type { Capabilities } from '../config/capabilities.js';
import { TIMEOUTS } from '../config/defaults.js';
import type {
  ErrorInfo,
  ErrorLocation,
  ScenarioResult,
  SpecificationInput,
  SpecificationResult,
} from '../schema/index.js';
import {
  computeRunSummary,
  deriveAggregateStatus,
  parseSpecification,
} from '../schema/index.js';
import type { Sleep } from '../utils/async.js';
import * as log from '../utils/logger.js';
import { RunCancelledError, TimeoutError, messageOf, toErrorInfo } from './errors.js';
import { runScenario } from './scenarioRunner.js';

// ── Public types ─────────────────────────────────────────────

export type RunState =
  | 'created'
  | 'browser_launching'
  | 'running'
  | 'finalizing'
  | 'done';

export interface RunnerDeps {
  driver: BrowserDriver;
  capabilities: Capabilities;
  sleep?: Sleep | undefined;
  launchTimeoutMs?: number | undefined;
  runTimeoutMs?: number | undefined;
  onStateChange?: ((state: RunState) => void) | undefined;
}

export interface RunOptions {
  signal?: AbortSignal | undefined;
  runTimeoutMs?: number | undefined;
}

export interface SpecificationRunner {
  run(spec: SpecificationInput, options?: RunOptions): Promise<SpecificationResult>;
}

// ── Factory ──────────────────────────────────────────────────

export function createSpecificationRunner(deps: RunnerDeps): SpecificationRunner {
  return {
    run: (spec, options = {}) => runSpecification(deps, spec, options),
  };
}

// ── Run ──────────────────────────────────────────────────────

/**
 * Created → BrowserLaunching → Running → Finalizing → Done.
 *
 * The session is always closed in Finalizing, whichever way the run ends.
 * Only a malformed specification rejects; every other failure comes back
 * as a `failed` result.
 */
async function runSpecification(
  deps: RunnerDeps,
  input: SpecificationInput,
  options: RunOptions,
): Promise<SpecificationResult> {
  const spec = parseSpecification(input);
  const startTime = new Date().toISOString();
  const runTimeoutMs =
    options.runTimeoutMs ?? deps.runTimeoutMs ?? TIMEOUTS.TOTAL_RUN_TIMEOUT;
  const enter = createStateTracker(deps.onStateChange);

  const session = new BrowserSession({
    driver: deps.driver,
    capabilities: deps.capabilities,
    sleep: deps.sleep,
    launchTimeoutMs: deps.launchTimeoutMs,
  });

  const scenarios: ScenarioResult[] = [];
  const progress: { inFlight: { location: ErrorLocation; description: string } | null } = {
    inFlight: null,
  };
  let halted = false;

  log.section(`Feature: ${spec.feature.name}`);

  const execute = async (): Promise<void> => {
    enter('browser_launching');
    await session.launch(spec.configuration);
    enter('running');

    const total = spec.scenarios.length;
    for (const [index, scenario] of spec.scenarios.entries()) {
      if (halted) return;
      log.scenario(index, total, scenario.name);
      const result = await runScenario(session, scenario, {
        sleep: deps.sleep,
        onStepStart: (location, description) => {
          progress.inFlight = { location, description };
        },
      });
      if (halted) return;
      scenarios.push(result);
    }
  };

  const interrupt = createInterrupt(options.signal, runTimeoutMs, () =>
    progress.inFlight ? ` during "${progress.inFlight.description}"` : '',
  );

  let error: ErrorInfo | undefined;
  try {
    await Promise.race([execute(), interrupt.promise]);
  } catch (err) {
    const location =
      err instanceof TimeoutError && progress.inFlight
        ? { ...progress.inFlight.location }
        : undefined;
    error = toErrorInfo(err, 'unexpected', location);
    log.error(`Test execution error: ${error.message}`);
  } finally {
    halted = true;
    interrupt.dispose();
    enter('finalizing');
    await session.close();
  }

  const collected = [...scenarios];
  const summary = computeRunSummary(collected);
  const status =
    error !== undefined
      ? 'failed'
      : deriveAggregateStatus(summary.passed, summary.failed);

  enter('done');
  log.info(
    `Result: ${status} (${String(summary.passed)}/${String(summary.total)} passed, ${summary.passRate})`,
  );

  return {
    feature: spec.feature,
    configuration: spec.configuration,
    scenarios: collected,
    summary,
    status,
    startTime,
    endTime: new Date().toISOString(),
    ...(error !== undefined ? { error } : {}),
  };
}

// ── State tracking ───────────────────────────────────────────

function createStateTracker(
  onStateChange: ((state: RunState) => void) | undefined,
): (next: RunState) => void {
  let current: RunState = 'created';
  onStateChange?.(current);

  return (next) => {
    log.detail(`Run: ${current} → ${next}`);
    current = next;
    onStateChange?.(next);
  };
}

// ── Run ceiling and cancellation ─────────────────────────────

interface Interrupt {
  promise: Promise<never>;
  dispose(): void;
}

/** Rejects on timeout or abort, whichever happens first. */
function createInterrupt(
  signal: AbortSignal | undefined,
  timeoutMs: number,
  describeInFlight: () => string,
): Interrupt {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const promise = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(
        new TimeoutError(
          `Run exceeded ${String(timeoutMs / 1000)}s ceiling${describeInFlight()}`,
        ),
      );
    }, timeoutMs);

    if (signal) {
      const abort = (): void => {
        const reason =
          signal.reason === undefined ? 'aborted' : messageOf(signal.reason);
        reject(new RunCancelledError(reason));
      };
      if (signal.aborted) {
        abort();
      } else {
        onAbort = abort;
        signal.addEventListener('abort', abort, { once: true });
      }
    }
  });

  return {
    promise,
    dispose() {
      clearTimeout(timer);
      if (signal && onAbort) signal.removeEventListener('abort', onAbort);
    },
  };
}
