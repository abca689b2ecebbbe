// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export { loadConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';

// Errors
export * from './errors/index.js';

// Engine: pure core
export * from './engine/durable-core/errors.js';
export * from './engine/durable-core/ids/index.js';
export {
  decodeManifest,
  encodeManifest,
  appendSplit,
  entryDirName,
  type ManifestEntry,
  type SplitManifest,
} from './engine/durable-core/domain/manifest-codec.js';
export {
  validateSplitName,
  sanitizeSplitName,
  nextIndex,
  disambiguate,
  parseSplitDirName,
} from './engine/durable-core/domain/naming.js';
export {
  resolveResumeStep,
  splitProgress,
  PIPELINE_STEPS,
  type PipelineStep,
  type StepMarkers,
} from './engine/durable-core/domain/resume-resolver.js';
export { buildTaskPlan, type PlannedTask } from './engine/durable-core/domain/task-plan.js';
export { fingerprint, fingerprintFile } from './engine/durable-core/domain/fingerprint.js';

// Engine: use cases
export { setupSession, type SetupSessionOutcome } from './engine/usecases/setup-session.js';
export { resolveStep } from './engine/usecases/resolve-step.js';
export { materializeSplits, materializeFromPlanningDir } from './engine/usecases/materialize-splits.js';
export { checkManifest } from './engine/usecases/check-manifest.js';
export { proposeSplit } from './engine/usecases/propose-split.js';
export { resolveTaskListContext } from './engine/usecases/resolve-task-list-context.js';
export { captureSessionId } from './engine/usecases/capture-session-id.js';

// Ports
export type { FileSystemPort } from './engine/ports/fs.port.js';
export type { SessionStorePort } from './engine/ports/session-store.port.js';
export type { TaskSinkPort } from './engine/ports/task-sink.port.js';
export type { ArtifactProbePort } from './engine/ports/artifact-probe.port.js';
