import type { SpecificationRunner } from '../core/specificationRunner.js';
import { messageOf } from '../core/errors.js';
import type { ResultStore } from '../report/store.js';
import { parseSpecification } from '../schema/index.js';
import type { SpecificationInput, SpecificationResult } from '../schema/index.js';
import * as log from '../utils/logger.js';
import type { TaskRegistry } from './registry.js';

export const RUN_TASK_KIND = 'specification_run';

// ── Public types ─────────────────────────────────────────────

export interface DispatchDeps {
  registry: TaskRegistry;
  runner: SpecificationRunner;
  resultStore?: ResultStore | undefined;
  runTimeoutMs?: number | undefined;
}

export interface DispatchedRun {
  taskId: string;
  /** Settles once the task record carries its final status. */
  done: Promise<SpecificationResult>;
  cancel(reason?: string): void;
}

// ── Dispatch ─────────────────────────────────────────────────

/**
 * Validate, register a task, and start the run in the background.
 * A malformed specification rejects here, before any task exists.
 */
export async function dispatchRun(
  deps: DispatchDeps,
  input: SpecificationInput,
): Promise<DispatchedRun> {
  const spec = parseSpecification(input);
  const taskId = await deps.registry.create(RUN_TASK_KIND, {
    feature: spec.feature.name,
    scenarios: spec.scenarios.length,
  });
  const controller = new AbortController();

  const execute = async (): Promise<SpecificationResult> => {
    await deps.registry.update(taskId, 'running');

    let result: SpecificationResult;
    try {
      result = await deps.runner.run(spec, {
        signal: controller.signal,
        runTimeoutMs: deps.runTimeoutMs,
      });
    } catch (err) {
      await deps.registry.update(taskId, 'failed', { error: messageOf(err) });
      throw err;
    }

    if (deps.resultStore) {
      try {
        await deps.resultStore.save(taskId, result);
      } catch (err) {
        log.warn(`Could not store result for run ${taskId}: ${messageOf(err)}`);
      }
    }

    if (result.error) {
      await deps.registry.update(taskId, 'failed', {
        result,
        error: result.error.message,
      });
    } else {
      await deps.registry.update(taskId, 'completed', { result });
    }
    return result;
  };

  return {
    taskId,
    done: execute(),
    cancel(reason = 'cancelled by caller') {
      controller.abort(reason);
    },
  };
}
