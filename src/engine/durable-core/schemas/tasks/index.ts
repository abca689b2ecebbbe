import { z } from 'zod';

export const TaskStatusSchema = z.enum(['pending', 'in_progress', 'completed']);

/**
 * One task file in the sink (`<tasksRoot>/<taskListId>/<position>.json`).
 *
 * Passthrough: fields written by the hosting agent (owner, metadata, ...) are
 * preserved when a stale task is rewritten as obsolete.
 */
export const TaskFileSchema = z
  .object({
    id: z.string(),
    subject: z.string(),
    description: z.string().default(''),
    activeForm: z.string().default(''),
    status: TaskStatusSchema,
    blocks: z.array(z.string()).default([]),
    blockedBy: z.array(z.string()).default([]),
  })
  .passthrough();

export type TaskFile = z.infer<typeof TaskFileSchema>;
