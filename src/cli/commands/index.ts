/**
 * CLI Commands - Public API
 */

export { executeSetupSessionCommand, type SetupSessionCommandDeps, type SetupSessionCommandOptions } from './setup-session.js';
export { executeResolveStepCommand, type ResolveStepCommandDeps } from './resolve-step.js';
export { executeCreateSplitDirsCommand, type CreateSplitDirsCommandDeps } from './create-split-dirs.js';
export { executeValidateManifestCommand, type ValidateManifestCommandDeps } from './validate-manifest.js';
export { executeNextIndexCommand, type NextIndexCommandDeps } from './next-index.js';
export { executeCaptureSessionIdCommand, type CaptureSessionIdCommandDeps } from './capture-session-id.js';
export { engineFailure } from './engine-failure.js';
