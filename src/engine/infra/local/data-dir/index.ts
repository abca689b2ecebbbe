import * as os from 'os';
import * as path from 'path';
import type { DataDirPort } from '../../../ports/data-dir.port.js';

export interface LocalDataDirOptions {
  /** Overrides `~/.splitwright/data`. */
  readonly dataDir?: string;
  /** Overrides `<dataDir>/../tasks`. */
  readonly tasksDir?: string;
}

export class LocalDataDir implements DataDirPort {
  constructor(private readonly options: LocalDataDirOptions = {}) {}

  private root(): string {
    return path.resolve(this.options.dataDir ?? path.join(os.homedir(), '.splitwright', 'data'));
  }

  sessionsDir(): string {
    return path.join(this.root(), 'sessions');
  }

  sessionDir(sessionId: string): string {
    return path.join(this.sessionsDir(), encodeSegment(sessionId));
  }

  sessionRecordPath(sessionId: string, inputKey: string): string {
    return path.join(this.sessionDir(sessionId), `${inputKey}.json`);
  }

  tasksDir(): string {
    return path.resolve(this.options.tasksDir ?? path.join(this.root(), '..', 'tasks'));
  }

  taskListDir(taskListId: string): string {
    return path.join(this.tasksDir(), encodeSegment(taskListId));
  }
}

/**
 * Ids come from the hosting environment; keep them to a single path segment.
 */
function encodeSegment(id: string): string {
  const segment = id.replace(/[^A-Za-z0-9._-]/g, '_');
  return /^\.+$/.test(segment) ? segment.replace(/\./g, '_') : segment;
}
