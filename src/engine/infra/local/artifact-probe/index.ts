import * as path from 'path';
import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import type { ArtifactProbePort } from '../../../ports/artifact-probe.port.js';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';
import {
  INTERVIEW_FILENAME,
  MANIFEST_FILENAME,
  SPLITS_DIRNAME,
  SPLIT_SPEC_FILENAME,
} from '../../../durable-core/constants.js';
import { EngineErr, type StorageUnwritableError } from '../../../durable-core/errors.js';
import { asSplitDirName, type SplitDirName } from '../../../durable-core/ids/index.js';
import { decodeManifest } from '../../../durable-core/domain/manifest-codec.js';
import { parseSplitDirName } from '../../../durable-core/domain/naming.js';
import type { ManifestMarker, StepMarkers } from '../../../durable-core/domain/resume-resolver.js';

function isAbsence(e: FsError): boolean {
  return e.code === 'FS_NOT_FOUND' || e.code === 'FS_NOT_A_DIRECTORY';
}

export class LocalArtifactProbe implements ArtifactProbePort {
  constructor(private readonly fs: FileSystemPort) {}

  probe(planningDir: string): ResultAsync<StepMarkers, StorageUnwritableError> {
    const toStorageError = (e: FsError) =>
      EngineErr.storageUnwritable(planningDir, `Cannot read planning directory artifacts: ${e.message}`);

    const splitsDir = path.join(planningDir, SPLITS_DIRNAME);

    return ResultAsync.combine([
      this.isNonEmptyFile(path.join(planningDir, INTERVIEW_FILENAME)),
      this.manifestMarker(path.join(planningDir, MANIFEST_FILENAME)),
      this.splitDirs(splitsDir),
    ])
      .andThen(([interviewComplete, manifest, splitDirs]) =>
        ResultAsync.combine(
          splitDirs.map((d) =>
            this.isNonEmptyFile(path.join(splitsDir, d, SPLIT_SPEC_FILENAME)).map((has) => (has ? d : null))
          )
        ).map((withSpec): StepMarkers => ({
          interviewComplete,
          manifest,
          splitDirs,
          splitsWithSpecs: withSpec.filter((d): d is SplitDirName => d !== null),
        }))
      )
      .mapErr(toStorageError);
  }

  private isNonEmptyFile(filePath: string): ResultAsync<boolean, FsError> {
    return this.fs
      .stat(filePath)
      .map((s) => s.kind === 'file' && s.sizeBytes > 0)
      .orElse((e) => (isAbsence(e) ? okAsync(false) : errAsync(e)));
  }

  private manifestMarker(manifestPath: string): ResultAsync<ManifestMarker, FsError> {
    return this.fs
      .readFileUtf8(manifestPath)
      .map((text): ManifestMarker => {
        const decoded = decodeManifest(text);
        return decoded.isOk()
          ? { kind: 'present', manifest: decoded.value }
          : { kind: 'malformed', error: decoded.error };
      })
      .orElse((e) => (isAbsence(e) ? okAsync<ManifestMarker>({ kind: 'absent' }) : errAsync(e)));
  }

  private splitDirs(splitsDir: string): ResultAsync<readonly SplitDirName[], FsError> {
    return this.fs
      .readdirEntries(splitsDir)
      .map((entries) =>
        entries
          .filter((e) => e.kind === 'directory')
          .flatMap((e) => {
            const parsed = parseSplitDirName(e.name);
            return parsed ? [{ dirName: asSplitDirName(e.name), order: Number.parseInt(parsed.index, 10) }] : [];
          })
          .sort((a, b) => a.order - b.order || a.dirName.localeCompare(b.dirName))
          .map((e) => e.dirName)
      )
      .orElse((e) => (isAbsence(e) ? okAsync<readonly SplitDirName[]>([]) : errAsync(e)));
  }
}
