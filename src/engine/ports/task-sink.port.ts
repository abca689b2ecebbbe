import type { ResultAsync } from 'neverthrow';
import type { PlannedTask } from '../durable-core/domain/task-plan.js';

export type TaskSinkError =
  | { readonly code: 'TASK_SINK_NO_LIST_ID'; readonly message: string }
  | { readonly code: 'TASK_SINK_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'TASK_SINK_IO_ERROR'; readonly message: string };

export interface TaskWriteSummary {
  readonly taskListId: string;
  readonly tasksWritten: number;
  readonly tasksDir: string;
  /** Positions rewritten as obsolete because the list shrank. */
  readonly obsoleted: readonly number[];
}

/**
 * Port: external task list addressed by a task list id (normally the session id).
 *
 * Optional collaborator: callers treat failures as warnings and fall back to
 * filesystem-only resumption.
 */
export interface TaskSinkPort {
  writeTasks(taskListId: string, tasks: readonly PlannedTask[]): ResultAsync<TaskWriteSummary, TaskSinkError>;
}
