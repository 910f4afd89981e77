import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { TaskRecord } from '../src/schema/index.js';
import { createFileTaskStore } from '../src/tasks/fileStore.js';
import { TaskNotFoundError, TaskRegistry } from '../src/tasks/registry.js';
import type { TaskStore } from '../src/tasks/registry.js';

function memoryStore() {
  const saved: TaskRecord[] = [];
  const store: TaskStore = {
    save: (record) => {
      saved.push(structuredClone(record));
      return Promise.resolve();
    },
    load: (id) => Promise.resolve(saved.filter((r) => r.id === id).at(-1)),
    list: () => Promise.resolve([]),
  };
  return { store, saved };
}

describe('TaskRegistry', () => {
  it('creates pending tasks', async () => {
    const registry = new TaskRegistry();

    const id = await registry.create('specification_run', { feature: 'Search' });
    const record = await registry.get(id);

    expect(record).toMatchObject({
      id,
      kind: 'specification_run',
      status: 'pending',
      payload: { feature: 'Search' },
      result: null,
      error: null,
    });
    expect(record?.createdAt).toBe(record?.updatedAt);
  });

  it('applies status, result and error updates', async () => {
    const registry = new TaskRegistry();
    const id = await registry.create('specification_run');

    await registry.update(id, 'running');
    const record = await registry.update(id, 'failed', {
      result: { status: 'failed' },
      error: 'Run exceeded 300s ceiling',
    });

    expect(record.status).toBe('failed');
    expect(record.result).toEqual({ status: 'failed' });
    expect(record.error).toBe('Run exceeded 300s ceiling');
  });

  it('rejects updates to unknown tasks', async () => {
    const registry = new TaskRegistry();

    await expect(registry.update('missing', 'running')).rejects.toBeInstanceOf(TaskNotFoundError);
    await expect(registry.update('missing', 'running')).rejects.toThrow('Task missing not found');
  });

  it('hands out copies', async () => {
    const registry = new TaskRegistry();
    const id = await registry.create('specification_run', { scenarios: 1 });

    const first = await registry.get(id);
    if (!first) throw new Error('task not found');
    first.payload['scenarios'] = 99;
    first.status = 'completed';

    const second = await registry.get(id);
    expect(second?.payload).toEqual({ scenarios: 1 });
    expect(second?.status).toBe('pending');
    expect(registry.list()).toHaveLength(1);
  });

  it('persists every change in order', async () => {
    const { store, saved } = memoryStore();
    const registry = new TaskRegistry(store);
    const id = await registry.create('specification_run');

    await Promise.all([
      registry.update(id, 'running'),
      registry.update(id, 'completed', { result: { ok: true } }),
    ]);

    expect(saved.map((r) => r.status)).toEqual(['pending', 'running', 'completed']);
  });

  it('keeps the in-memory record when a store write fails', async () => {
    const store: TaskStore = {
      save: () => Promise.reject(new Error('EIO')),
      load: () => Promise.resolve(undefined),
      list: () => Promise.resolve([]),
    };
    const registry = new TaskRegistry(store);
    const id = await registry.create('specification_run');

    const record = await registry.update(id, 'running');

    expect(record.status).toBe('running');
    expect((await registry.get(id))?.status).toBe('running');
  });

  it('lists stored and in-process tasks newest first', async () => {
    const stored = (id: string, createdAt: string): TaskRecord => ({
      id,
      kind: 'specification_run',
      status: 'completed',
      createdAt,
      updatedAt: createdAt,
      payload: {},
      result: null,
      error: null,
    });
    const store: TaskStore = {
      save: () => Promise.resolve(),
      load: () => Promise.resolve(undefined),
      list: () =>
        Promise.resolve([
          stored('older', '2026-01-01T09:00:00.000Z'),
          stored('old', '2026-01-02T09:00:00.000Z'),
        ]),
    };
    const registry = new TaskRegistry(store);
    const id = await registry.create('specification_run');

    const all = await registry.recent();
    const limited = await registry.recent(2);

    expect(all.map((r) => r.id)).toEqual([id, 'old', 'older']);
    expect(limited.map((r) => r.id)).toEqual([id, 'old']);
  });

  it('falls back to the store for unknown ids', async () => {
    const { store } = memoryStore();
    const writer = new TaskRegistry(store);
    const id = await writer.create('specification_run');
    await writer.update(id, 'completed');

    const reader = new TaskRegistry(store);

    expect((await reader.get(id))?.status).toBe('completed');
    expect(await reader.get('nope')).toBeUndefined();
  });
});

describe('createFileTaskStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'specrun-tasks-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one JSON file per task and reads it back', async () => {
    const registry = new TaskRegistry(createFileTaskStore(dir));
    const id = await registry.create('specification_run', { feature: 'Search' });
    await registry.update(id, 'completed', { result: { status: 'passed' } });

    const raw = await readFile(path.join(dir, `${id}.json`), 'utf-8');
    const loaded = await new TaskRegistry(createFileTaskStore(dir)).get(id);

    expect(raw.endsWith('}\n')).toBe(true);
    expect(loaded).toMatchObject({
      id,
      status: 'completed',
      payload: { feature: 'Search' },
      result: { status: 'passed' },
    });
  });

  it('returns nothing for missing or unsafe ids', async () => {
    const store = createFileTaskStore(dir);

    expect(await store.load('0b6f0c1e-missing')).toBeUndefined();
    expect(await store.load('../etc/passwd')).toBeUndefined();
  });
  it('lists stored records newest first and skips foreign files', async () => {
    const store = createFileTaskStore(dir);
    const record = (id: string, createdAt: string): TaskRecord => ({
      id,
      kind: 'specification_run',
      status: 'completed',
      createdAt,
      updatedAt: createdAt,
      payload: { feature: 'Search' },
      result: null,
      error: null,
    });
    await store.save(record('first', '2026-03-01T08:00:00.000Z'));
    await store.save(record('second', '2026-03-02T08:00:00.000Z'));
    await store.save(record('third', '2026-03-03T08:00:00.000Z'));
    await writeFile(path.join(dir, 'notes.json'), '{"hello": "world"}\n', 'utf-8');
    await mkdir(path.join(dir, 'archive.json'));
    const warn = vi.spyOn(process.stderr, 'write');

    const all = await store.list();
    const limited = await store.list(2);

    expect(all.map((r) => r.id)).toEqual(['third', 'second', 'first']);
    expect(limited.map((r) => r.id)).toEqual(['third', 'second']);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('Skipping notes.json: '));
    expect(warn).not.toHaveBeenCalledWith(expect.stringContaining('archive.json'));
  });

  it('lists nothing for a results directory that does not exist', async () => {
    const store = createFileTaskStore(path.join(dir, 'absent'));

    expect(await store.list()).toEqual([]);
  });
});
