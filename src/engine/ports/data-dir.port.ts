/**
 * Port: engine-private data directory layout.
 *
 * - <root>/sessions/<sessionId>/<inputKey>.json
 * - <tasksRoot>/<taskListId>/<position>.json
 *
 * All returned paths are absolute; nothing else in the engine concatenates
 * storage paths.
 */
export interface DataDirPort {
  /** Root directory for all session records. */
  sessionsDir(): string;
  /** Directory holding every record of one session id. */
  sessionDir(sessionId: string): string;
  /** Record for one input document within a session. */
  sessionRecordPath(sessionId: string, inputKey: string): string;

  /** Root of the external task sink. */
  tasksDir(): string;
  /** Directory of one task list. */
  taskListDir(taskListId: string): string;
}
