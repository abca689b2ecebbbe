/**
 * Engine error taxonomy (errors as data).
 *
 * Fatal kinds end the current invocation with a non-zero exit; warning kinds
 * travel alongside a successful result. Nothing here is thrown across a port.
 */

export type InputUnavailableReason =
  | 'not_found'
  | 'permission_denied'
  | 'not_a_file'
  | 'empty'
  | 'unsupported_extension'
  | 'unreadable';

export type InputUnavailableError = {
  readonly kind: 'InputUnavailable';
  readonly reason: InputUnavailableReason;
  readonly path: string;
  readonly message: string;
};

export type ManifestMalformedReason =
  | 'missing_file'
  | 'missing_block'
  | 'marker_not_first'
  | 'unterminated_block'
  | 'empty_block'
  | 'invalid_line'
  | 'duplicate_index'
  | 'duplicate_name';

export type ManifestMalformedError = {
  readonly kind: 'ManifestMalformed';
  readonly reason: ManifestMalformedReason;
  readonly message: string;
  /** 1-based line number in the manifest document, when a line is at fault. */
  readonly line?: number;
  readonly text?: string;
};

export type NamingInvalidError = {
  readonly kind: 'NamingInvalid';
  readonly name: string;
  readonly message: string;
};

export type DirectoryCollisionError = {
  readonly kind: 'DirectoryCollision';
  readonly name: string;
  readonly message: string;
};

export type StorageUnwritableError = {
  readonly kind: 'StorageUnwritable';
  readonly path: string;
  readonly message: string;
};

export type SessionCorruptError = {
  readonly kind: 'SessionCorrupt';
  readonly path: string;
  readonly message: string;
};

export type EngineError =
  | InputUnavailableError
  | ManifestMalformedError
  | NamingInvalidError
  | DirectoryCollisionError
  | StorageUnwritableError
  | SessionCorruptError;

export type InputDriftedWarning = {
  readonly kind: 'InputDrifted';
  readonly path: string;
  readonly storedFingerprint: string;
  readonly currentFingerprint: string;
  readonly message: string;
};

export type SessionNamespaceUnavailableWarning = {
  readonly kind: 'SessionNamespaceUnavailable';
  readonly message: string;
};

export type SplitRenamedWarning = {
  readonly kind: 'DirectoryCollision';
  readonly from: string;
  readonly to: string;
  readonly message: string;
};

export type ManifestIgnoredWarning = {
  readonly kind: 'ManifestMalformed';
  readonly reason: ManifestMalformedReason;
  readonly message: string;
};

export type TaskPublishSkippedWarning = {
  readonly kind: 'TaskPublishSkipped';
  readonly message: string;
};

export type EngineWarning =
  | InputDriftedWarning
  | SessionNamespaceUnavailableWarning
  | SplitRenamedWarning
  | ManifestIgnoredWarning
  | TaskPublishSkippedWarning;

export const EngineErr = {
  inputUnavailable: (reason: InputUnavailableReason, path: string, message: string): InputUnavailableError => ({
    kind: 'InputUnavailable',
    reason,
    path,
    message,
  }),

  manifestMalformed: (
    reason: ManifestMalformedReason,
    message: string,
    at?: { readonly line: number; readonly text: string }
  ): ManifestMalformedError =>
    at ? { kind: 'ManifestMalformed', reason, message, line: at.line, text: at.text } : { kind: 'ManifestMalformed', reason, message },

  namingInvalid: (name: string, message: string): NamingInvalidError => ({
    kind: 'NamingInvalid',
    name,
    message,
  }),

  directoryCollision: (name: string, message: string): DirectoryCollisionError => ({
    kind: 'DirectoryCollision',
    name,
    message,
  }),

  storageUnwritable: (path: string, message: string): StorageUnwritableError => ({
    kind: 'StorageUnwritable',
    path,
    message,
  }),

  sessionCorrupt: (path: string, message: string): SessionCorruptError => ({
    kind: 'SessionCorrupt',
    path,
    message,
  }),
} as const satisfies Record<string, (...args: never[]) => EngineError>;
