/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 *
 * ADDING A NEW SERVICE:
 * 1. Add a token here under the right namespace
 * 2. Register it in container.ts with instanceCachingFactory
 * 3. Resolve it with container.resolve<Port>(DI.X.Y) at the composition root
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // ENGINE (ports and their local adapters)
  // ═══════════════════════════════════════════════════════════════════
  Engine: {
    DataDir: Symbol('Engine.DataDir'),
    FileSystem: Symbol('Engine.FileSystem'),
    Sha256: Symbol('Engine.Sha256'),
    TimeClock: Symbol('Engine.TimeClock'),
    /** Planning directory observer */
    ArtifactProbe: Symbol('Engine.ArtifactProbe'),
    SessionStore: Symbol('Engine.SessionStore'),
    /** External task list directory */
    TaskSink: Symbol('Engine.TaskSink'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },
} as const;

/** Type helper for token values */
export type DIToken = (typeof DI)[keyof typeof DI][keyof (typeof DI)[keyof typeof DI]];
