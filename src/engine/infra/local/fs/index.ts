import * as fs from 'fs/promises';
import * as fsCb from 'fs';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import { errAsync, okAsync, ResultAsync as RA, type ResultAsync } from 'neverthrow';
import type { FileSystemPort, FsDirEntry, FsEntryKind, FsError, FsStat } from '../../../ports/fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  const code = e.code;
  return typeof code === 'string' ? code : undefined;
}

function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') {
    return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  }
  if (code === 'ENOTDIR') return { code: 'FS_NOT_A_DIRECTORY', message: `Not a directory: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

function kindOf(entry: { isFile(): boolean; isDirectory(): boolean }): FsEntryKind {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

export class NodeFileSystem implements FileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  mkdir(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapFsError(e, filePath));
  }

  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    return RA.fromPromise(fs.readFile(filePath), (e) => mapFsError(e, filePath)).map((b) => new Uint8Array(b));
  }

  stat(filePath: string): ResultAsync<FsStat, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map((s) => ({
      kind: kindOf(s),
      sizeBytes: s.size,
    }));
  }

  readdirEntries(dirPath: string): ResultAsync<readonly FsDirEntry[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath, { withFileTypes: true }), (e) => mapFsError(e, dirPath)).andThen((entries) =>
      RA.combine(entries.map((d) => this.entryOf(dirPath, d)))
    );
  }

  /** Symlinks are classified by their target; a dangling link is 'other'. */
  private entryOf(dirPath: string, d: fsCb.Dirent): ResultAsync<FsDirEntry, FsError> {
    if (!d.isSymbolicLink()) return okAsync({ name: d.name, kind: kindOf(d) });

    const target = path.join(dirPath, d.name);
    return RA.fromPromise(fs.stat(target), (e) => mapFsError(e, target))
      .map((s): FsDirEntry => ({ name: d.name, kind: kindOf(s) }))
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync<FsDirEntry>({ name: d.name, kind: 'other' }) : errAsync(e)));
  }

  openWriteTruncate(filePath: string): ResultAsync<{ readonly fd: number }, FsError> {
    return RA.fromPromise(
      new Promise<{ fd: number }>((resolve, reject) => {
        fsCb.open(filePath, fsConstants.O_CREAT | fsConstants.O_TRUNC | fsConstants.O_WRONLY, 0o600, (err, fd) => {
          if (err) reject(err);
          else resolve({ fd });
        });
      }),
      (e) => mapFsError(e, filePath)
    );
  }

  writeAll(fd: number, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.write(fd, Buffer.from(bytes), 0, bytes.length, null, (err) => {
          if (err) reject(err);
          else resolve();
        });
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  fsyncFile(fd: number): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.fsync(fd, (err) => (err ? reject(err) : resolve()));
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  fsyncDir(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(
      (async () => {
        // fsync a directory by opening it read-only and syncing the handle.
        const dirHandle = await fs.open(dirPath, 'r');
        try {
          await dirHandle.sync();
        } finally {
          await dirHandle.close();
        }
      })(),
      (e): FsError => {
        const code = nodeErrorCode(e);
        if (code === 'EINVAL' || code === 'ENOTSUP' || code === 'EISDIR') {
          return { code: 'FS_UNSUPPORTED', message: `Directory fsync unsupported for: ${dirPath}` };
        }
        return mapFsError(e, dirPath);
      }
    );
  }

  closeFile(fd: number): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.close(fd, (err) => (err ? reject(err) : resolve()));
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rename(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.unlink(filePath), (e) => mapFsError(e, filePath));
  }
}
