/**
 * Report generation module.
 * Deterministic: transforms a SpecificationResult into markdown + JSON
 * artifacts and maps it to a process exit code.
 */

export {
  generateMarkdown,
  generateJSON,
  serializeJSON,
  exitCodeFor,
  formatDuration,
  formatTaskLine,
  EXIT_CODES,
} from './reporter.js';
export { createFileResultStore } from './store.js';
export type { ResultStore } from './store.js';
