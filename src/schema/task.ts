import { z } from 'zod';

// ── Task status ───────────────────────────────────────────────

export const taskStatusSchema = z.enum([
  'pending',
  'running',
  'completed',
  'failed',
]);

export type TaskStatus = z.infer<typeof taskStatusSchema>;

// ── Task record ───────────────────────────────────────────────

export const taskRecordSchema = z.object({
  id: z.string().min(1),
  kind: z.string().min(1),
  status: taskStatusSchema,
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  payload: z.record(z.unknown()),
  result: z.unknown().nullable(),
  error: z.string().nullable(),
});

export type TaskRecord = z.infer<typeof taskRecordSchema>;

export function parseTaskRecord(data: unknown): TaskRecord {
  return taskRecordSchema.parse(data);
}
