import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { messageOf } from '../core/errors.js';
import { parseTaskRecord } from '../schema/index.js';
import type { TaskRecord } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { newestFirst } from './registry.js';
import type { TaskStore } from './registry.js';

const TASK_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

// ── File-backed task store ───────────────────────────────────
// One `<id>.json` per task in the results directory.

export function createFileTaskStore(dir: string): TaskStore {
  return {
    async save(record: TaskRecord): Promise<void> {
      await mkdir(dir, { recursive: true });
      await writeFile(
        path.join(dir, `${record.id}.json`),
        JSON.stringify(record, null, 2) + '\n',
        'utf-8',
      );
    },

    async load(id: string): Promise<TaskRecord | undefined> {
      if (!TASK_ID_PATTERN.test(id)) return undefined;

      let raw: string;
      try {
        raw = await readFile(path.join(dir, `${id}.json`), 'utf-8');
      } catch (err) {
        if (isMissing(err)) return undefined;
        throw err;
      }
      return parseTaskRecord(JSON.parse(raw));
    },

    /** Files that are not task records are skipped with a warning. */
    async list(limit?: number): Promise<TaskRecord[]> {
      let names: string[];
      try {
        const entries = await readdir(dir, { withFileTypes: true });
        names = entries
          .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
          .map((entry) => entry.name);
      } catch (err) {
        if (isMissing(err)) return [];
        throw err;
      }

      const records: TaskRecord[] = [];
      for (const name of names) {
        try {
          const raw = await readFile(path.join(dir, name), 'utf-8');
          records.push(parseTaskRecord(JSON.parse(raw)));
        } catch (err) {
          log.warn(`Skipping ${name}: ${messageOf(err)}`);
        }
      }

      const sorted = newestFirst(records);
      return limit === undefined ? sorted : sorted.slice(0, limit);
    },
  };
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
