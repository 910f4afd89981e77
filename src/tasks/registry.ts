import { randomUUID } from 'node:crypto';

import type { TaskRecord, TaskStatus } from '../schema/index.js';
import { messageOf } from '../core/errors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface TaskStore {
  save(record: TaskRecord): Promise<void>;
  load(id: string): Promise<TaskRecord | undefined>;
  /** Newest first. */
  list(limit?: number): Promise<TaskRecord[]>;
}

export interface TaskUpdate {
  result?: unknown;
  error?: string;
}

export class TaskNotFoundError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

// ── Registry ─────────────────────────────────────────────────

/**
 * Tracks dispatched runs. Each update swaps in a whole new record, so a
 * reader never sees a half-applied change, and writes to the store are
 * chained per task so they land in the order they were made.
 *
 * The in-memory record is authoritative: a failed store write is logged
 * and never fails the update.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly writes = new Map<string, Promise<void>>();
  private readonly store: TaskStore | undefined;

  constructor(store?: TaskStore) {
    this.store = store;
  }

  async create(
    kind: string,
    payload: Record<string, unknown> = {},
  ): Promise<string> {
    const id = randomUUID();
    const now = new Date().toISOString();
    const record: TaskRecord = {
      id,
      kind,
      status: 'pending',
      createdAt: now,
      updatedAt: now,
      payload: structuredClone(payload),
      result: null,
      error: null,
    };

    this.tasks.set(id, record);
    await this.persist(record);
    return id;
  }

  async update(
    id: string,
    status: TaskStatus,
    update: TaskUpdate = {},
  ): Promise<TaskRecord> {
    const current = this.tasks.get(id);
    if (!current) throw new TaskNotFoundError(id);

    const next: TaskRecord = {
      ...current,
      status,
      updatedAt: new Date().toISOString(),
      ...(update.result !== undefined ? { result: structuredClone(update.result) } : {}),
      ...(update.error !== undefined ? { error: update.error } : {}),
    };

    this.tasks.set(id, next);
    await this.persist(next);
    return structuredClone(next);
  }

  /** Falls back to the store for tasks created by another process. */
  async get(id: string): Promise<TaskRecord | undefined> {
    const record = this.tasks.get(id) ?? (await this.store?.load(id));
    return record ? structuredClone(record) : undefined;
  }

  list(): TaskRecord[] {
    return [...this.tasks.values()].map((record) => structuredClone(record));
  }

  /** Tasks from this process and the store, newest first. */
  async recent(limit?: number): Promise<TaskRecord[]> {
    const byId = new Map<string, TaskRecord>();
    for (const record of (await this.store?.list()) ?? []) {
      byId.set(record.id, record);
    }
    for (const record of this.tasks.values()) {
      byId.set(record.id, record);
    }

    const sorted = newestFirst([...byId.values()]);
    const limited = limit === undefined ? sorted : sorted.slice(0, limit);
    return limited.map((record) => structuredClone(record));
  }

  private persist(record: TaskRecord): Promise<void> {
    const store = this.store;
    if (!store) return Promise.resolve();

    const previous = this.writes.get(record.id) ?? Promise.resolve();
    const write = previous
      .then(() => store.save(record))
      .catch((err: unknown) => {
        log.warn(`Could not persist task ${record.id}: ${messageOf(err)}`);
      });
    this.writes.set(record.id, write);
    return write;
  }
}

export function newestFirst(records: TaskRecord[]): TaskRecord[] {
  return [...records].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}
