/**
 * Where the task list id came from.
 * - context: passed explicitly by the caller (`--session-id`)
 * - user_env: SPLITWRIGHT_TASK_LIST_ID, set by the user to share a list across sessions
 * - session: SPLITWRIGHT_SESSION_ID, captured from the hosting agent
 * - none: nothing available; tasks are not published
 */
export type TaskListIdSource = 'context' | 'user_env' | 'session' | 'none';

export interface TaskListContext {
  readonly taskListId: string | null;
  readonly source: TaskListIdSource;
  /** Set only when both an explicit id and an env session id exist. */
  readonly sessionIdMatched: boolean | null;
}

export interface TaskListEnv {
  readonly taskListId?: string;
  readonly sessionId?: string;
}

function present(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function resolveTaskListContext(explicitId: string | undefined, env: TaskListEnv): TaskListContext {
  const explicit = present(explicitId);
  const userList = present(env.taskListId);
  const envSession = present(env.sessionId);

  const sessionIdMatched = explicit !== null && envSession !== null ? explicit === envSession : null;

  if (explicit !== null) return { taskListId: explicit, source: 'context', sessionIdMatched };
  if (userList !== null) return { taskListId: userList, source: 'user_env', sessionIdMatched };
  if (envSession !== null) return { taskListId: envSession, source: 'session', sessionIdMatched };
  return { taskListId: null, source: 'none', sessionIdMatched };
}
