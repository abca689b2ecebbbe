import * as path from 'path';
import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import type { DataDirPort } from '../../../ports/data-dir.port.js';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';
import type { TaskSinkError, TaskSinkPort, TaskWriteSummary } from '../../../ports/task-sink.port.js';
import type { PlannedTask } from '../../../durable-core/domain/task-plan.js';
import { OBSOLETE_TASK_SUBJECT } from '../../../durable-core/constants.js';
import { TaskFileSchema, type TaskFile } from '../../../durable-core/schemas/tasks/index.js';
import { utf8Bytes, writeFileAtomic } from '../fs/atomic-write.js';

function mapFsToSinkError(e: FsError): TaskSinkError {
  return e.code === 'FS_PERMISSION_DENIED'
    ? { code: 'TASK_SINK_PERMISSION_DENIED', message: `Permission denied: ${e.message}` }
    : { code: 'TASK_SINK_IO_ERROR', message: `File system error: ${e.message}` };
}

function toTaskFile(task: PlannedTask): TaskFile {
  return {
    id: String(task.position),
    subject: task.subject,
    description: task.description,
    activeForm: task.activeForm,
    status: task.status,
    blocks: [...task.blocks],
    blockedBy: [...task.blockedBy],
  };
}

function serialize(file: TaskFile): Uint8Array {
  return utf8Bytes(JSON.stringify(file, null, 2));
}

/**
 * Writes the task plan as `<position>.json` files into the task list directory
 * the hosting agent reads, so progress survives context resets.
 *
 * When the list shrinks, task files above the highest written position are
 * rewritten as completed `[obsolete]` entries rather than deleted.
 */
export class LocalTaskSink implements TaskSinkPort {
  constructor(
    private readonly dataDir: DataDirPort,
    private readonly fs: FileSystemPort,
    private readonly clock: TimeClockPort
  ) {}

  writeTasks(taskListId: string, tasks: readonly PlannedTask[]): ResultAsync<TaskWriteSummary, TaskSinkError> {
    if (taskListId.trim().length === 0) {
      return errAsync({ code: 'TASK_SINK_NO_LIST_ID' as const, message: 'No task list id provided' });
    }

    const tasksDir = this.dataDir.taskListDir(taskListId);
    const maxPosition = tasks.reduce((acc, t) => Math.max(acc, t.position), 0);
    const tmpTag = `${process.pid}-${this.clock.nowMs()}`;

    return this.fs
      .mkdirp(tasksDir)
      .andThen(() =>
        ResultAsync.combine(
          tasks.map((t) => writeFileAtomic(this.fs, path.join(tasksDir, `${t.position}.json`), serialize(toTaskFile(t)), tmpTag))
        )
      )
      .andThen(() => this.markObsoleteAbove(tasksDir, maxPosition, tmpTag))
      .map((obsoleted) => ({ taskListId, tasksWritten: tasks.length, tasksDir, obsoleted }))
      .mapErr(mapFsToSinkError);
  }

  private markObsoleteAbove(tasksDir: string, maxPosition: number, tmpTag: string): ResultAsync<readonly number[], FsError> {
    return this.fs.readdirEntries(tasksDir).andThen((entries) => {
      const stale = entries
        .filter((e) => e.kind === 'file' && /^\d+\.json$/.test(e.name))
        .map((e) => Number.parseInt(e.name, 10))
        .filter((position) => position > maxPosition)
        .sort((a, b) => a - b);

      return ResultAsync.combine(stale.map((position) => this.markObsolete(tasksDir, position, tmpTag))).map((marked) =>
        marked.filter((p): p is number => p !== null)
      );
    });
  }

  /** Null when the file was already obsolete or is not a task file we understand. */
  private markObsolete(tasksDir: string, position: number, tmpTag: string): ResultAsync<number | null, FsError> {
    const filePath = path.join(tasksDir, `${position}.json`);

    return this.fs.readFileUtf8(filePath).andThen((raw) => {
      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch {
        return okAsync(null);
      }

      const parsed = TaskFileSchema.safeParse(json);
      if (!parsed.success) return okAsync(null);

      const current = parsed.data;
      if (current.subject === OBSOLETE_TASK_SUBJECT && current.status === 'completed') return okAsync(null);

      const obsolete: TaskFile = { ...current, subject: OBSOLETE_TASK_SUBJECT, status: 'completed' };
      return writeFileAtomic(this.fs, filePath, serialize(obsolete), tmpTag).map(() => position);
    });
  }
}
