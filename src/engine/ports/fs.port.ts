import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_NOT_A_DIRECTORY'; readonly message: string }
  | { readonly code: 'FS_UNSUPPORTED'; readonly message: string };

export type FsEntryKind = 'file' | 'directory' | 'other';

export interface FsStat {
  readonly kind: FsEntryKind;
  readonly sizeBytes: number;
}

export interface FsDirEntry {
  readonly name: string;
  readonly kind: FsEntryKind;
}

/**
 * Port: directory creation and syncing.
 * Used by: session-store, task-sink, materializer.
 */
export interface DirectoryOpsPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;

  /**
   * Create a single directory; its parent must exist.
   * Fails with FS_ALREADY_EXISTS when anything already occupies the path.
   */
  mkdir(dirPath: string): ResultAsync<void, FsError>;

  fsyncDir(dirPath: string): ResultAsync<void, FsError>;
}

/**
 * Port: file reading and metadata.
 * Used by: fingerprinting, artifact probe, session-store, manifest reader.
 */
export interface FileReadPort {
  readFileUtf8(filePath: string): ResultAsync<string, FsError>;
  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError>;
  stat(filePath: string): ResultAsync<FsStat, FsError>;
}

/**
 * Port: file descriptor operations for crash-safe writes (write, fsync, rename).
 */
export interface FileDescriptorPort {
  /** Open a file for writing (create or truncate). */
  openWriteTruncate(filePath: string): ResultAsync<{ readonly fd: number }, FsError>;
  writeAll(fd: number, bytes: Uint8Array): ResultAsync<void, FsError>;
  fsyncFile(fd: number): ResultAsync<void, FsError>;
  closeFile(fd: number): ResultAsync<void, FsError>;
}

export interface FileManipulationPort {
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;
  unlink(filePath: string): ResultAsync<void, FsError>;
}

export interface DirectoryListingOpsPort {
  /**
   * Entries of a directory with their kind (names only, not full paths).
   * A missing directory yields FS_NOT_FOUND; callers decide whether that is empty.
   */
  readdirEntries(dirPath: string): ResultAsync<readonly FsDirEntry[], FsError>;
}

/**
 * Composite port; the stores and the materializer need the full set.
 */
export interface FileSystemPort
  extends DirectoryOpsPort,
    FileReadPort,
    FileDescriptorPort,
    FileManipulationPort,
    DirectoryListingOpsPort {}
