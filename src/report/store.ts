import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { SpecificationResult } from '../schema/index.js';
import { generateMarkdown } from './reporter.js';

// ── Result persistence ───────────────────────────────────────

export interface ResultStore {
  save(runId: string, result: SpecificationResult): Promise<void>;
}

/** Writes `<dir>/<runId>/result.json` and `<dir>/<runId>/report.md`. */
export function createFileResultStore(dir: string): ResultStore {
  return {
    async save(runId, result) {
      const runDir = path.join(dir, runId);
      await mkdir(runDir, { recursive: true });
      await writeFile(
        path.join(runDir, 'result.json'),
        JSON.stringify(result, null, 2) + '\n',
        'utf-8',
      );
      await writeFile(
        path.join(runDir, 'report.md'),
        generateMarkdown(result, runId),
        'utf-8',
      );
    },
  };
}
