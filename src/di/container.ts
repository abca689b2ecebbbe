import 'reflect-metadata';
import { container, type DependencyContainer, instanceCachingFactory } from 'tsyringe';
import { err, ok, type Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import { loadConfig, type ValidatedConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import { PinoLoggerFactory, type ILoggerFactory } from '../core/logging/index.js';
import type { DataDirPort } from '../engine/ports/data-dir.port.js';
import type { FileSystemPort } from '../engine/ports/fs.port.js';
import type { Sha256Port } from '../engine/ports/sha256.port.js';
import type { TimeClockPort } from '../engine/ports/time-clock.port.js';
import type { ArtifactProbePort } from '../engine/ports/artifact-probe.port.js';
import type { SessionStorePort } from '../engine/ports/session-store.port.js';
import type { TaskSinkPort } from '../engine/ports/task-sink.port.js';
import { LocalDataDir } from '../engine/infra/local/data-dir/index.js';
import { NodeFileSystem } from '../engine/infra/local/fs/index.js';
import { NodeSha256 } from '../engine/infra/local/sha256/index.js';
import { NodeTimeClock } from '../engine/infra/local/time-clock/index.js';
import { LocalArtifactProbe } from '../engine/infra/local/artifact-probe/index.js';
import { LocalSessionStore } from '../engine/infra/local/session-store/index.js';
import { LocalTaskSink } from '../engine/infra/local/task-sink/index.js';

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
  readonly cwd?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  // Tests may inject config before initialization; never overwrite it.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  return loadConfig({ env: options.env ?? process.env, cwd: options.cwd ?? process.cwd() }).map((config) => {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root) and nowhere else.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Dependency levels:
 * - Level 1: primitives (DataDir, FS, Sha256, TimeClock), no deps
 * - Level 2: ArtifactProbe, TaskSink, depend on level 1
 * - Level 3: SessionStore, depends on the probe
 */
function registerEngine(): void {
  const config = (c: DependencyContainer) => c.resolve<ValidatedConfig>(DI.Config.App);

  // Level 1
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => new PinoLoggerFactory(config(c).logging.level)),
    });
  }
  container.register<DataDirPort>(DI.Engine.DataDir, {
    useFactory: instanceCachingFactory((c) => {
      const { dataDir, tasksDir } = config(c).paths;
      return new LocalDataDir({ dataDir: dataDir ?? undefined, tasksDir: tasksDir ?? undefined });
    }),
  });
  container.register<FileSystemPort>(DI.Engine.FileSystem, {
    useFactory: instanceCachingFactory(() => new NodeFileSystem()),
  });
  container.register<Sha256Port>(DI.Engine.Sha256, {
    useFactory: instanceCachingFactory(() => new NodeSha256()),
  });
  container.register<TimeClockPort>(DI.Engine.TimeClock, {
    useFactory: instanceCachingFactory(() => new NodeTimeClock()),
  });

  // Level 2
  container.register<ArtifactProbePort>(DI.Engine.ArtifactProbe, {
    useFactory: instanceCachingFactory((c) => new LocalArtifactProbe(c.resolve<FileSystemPort>(DI.Engine.FileSystem))),
  });
  container.register<TaskSinkPort>(DI.Engine.TaskSink, {
    useFactory: instanceCachingFactory(
      (c) =>
        new LocalTaskSink(
          c.resolve<DataDirPort>(DI.Engine.DataDir),
          c.resolve<FileSystemPort>(DI.Engine.FileSystem),
          c.resolve<TimeClockPort>(DI.Engine.TimeClock)
        )
    ),
  });

  // Level 3
  container.register<SessionStorePort>(DI.Engine.SessionStore, {
    useFactory: instanceCachingFactory(
      (c) =>
        new LocalSessionStore({
          dataDir: c.resolve<DataDirPort>(DI.Engine.DataDir),
          fs: c.resolve<FileSystemPort>(DI.Engine.FileSystem),
          sha256: c.resolve<Sha256Port>(DI.Engine.Sha256),
          probe: c.resolve<ArtifactProbePort>(DI.Engine.ArtifactProbe),
          clock: c.resolve<TimeClockPort>(DI.Engine.TimeClock),
        })
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container. Idempotent.
 * Invalid configuration is returned, not thrown; the caller decides how to report it.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  registerRuntime(options);
  const configured = registerConfig(options);
  if (configured.isErr()) return err(configured.error);

  registerEngine();
  initialized = true;
  return ok(undefined);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
