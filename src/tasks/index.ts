/**
 * Task tracking module.
 * Background runs are registered as tasks whose status callers can poll.
 */

export { TaskRegistry, TaskNotFoundError } from './registry.js';
export type { TaskStore, TaskUpdate } from './registry.js';
export { createFileTaskStore } from './fileStore.js';
export { dispatchRun, RUN_TASK_KIND } from './dispatcher.js';
export type { DispatchDeps, DispatchedRun } from './dispatcher.js';
