/**
 * Fixed artifact layout of a planning directory.
 *
 * {planningDir}/
 *   decomposition-interview.md
 *   project-manifest.md
 *   splits/NN-name/spec.md
 */
export const INTERVIEW_FILENAME = 'decomposition-interview.md';
export const MANIFEST_FILENAME = 'project-manifest.md';
export const SPLITS_DIRNAME = 'splits';
export const SPLIT_SPEC_FILENAME = 'spec.md';

export const INPUT_FILE_EXTENSION = '.md';

export const MANIFEST_START_MARKER = '<!-- SPLIT_MANIFEST';
export const MANIFEST_END_MARKER = 'END_MANIFEST -->';

export const MIN_SPLIT_INDEX = 1;
export const MAX_SPLIT_INDEX = 99;
export const MAX_SPLIT_NAME_LENGTH = 50;

/** Highest numeric suffix tried when disambiguating a colliding directory name. */
export const MAX_DISAMBIGUATION_SUFFIX = 99;

export const SESSION_RECORD_SCHEMA_VERSION = 1;

/** Prefix of the session namespace derived from the input path when no session id is available. */
export const LOCAL_SESSION_PREFIX = 'local-';

/** Hex characters of sha256(inputPath) used in derived keys. */
export const INPUT_KEY_HEX_LENGTH = 16;

export const OBSOLETE_TASK_SUBJECT = '[obsolete]';
