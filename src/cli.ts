#!/usr/bin/env node
/**
 * splitwright CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts and src/engine/usecases/*.ts
 */

import { Command, CommanderError } from 'commander';
import * as fsp from 'fs/promises';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { ILoggerFactory } from './core/logging/index.js';
import { createBootstrapLogger } from './core/logging/index.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import type { FileSystemPort } from './engine/ports/fs.port.js';
import type { Sha256Port } from './engine/ports/sha256.port.js';
import type { TimeClockPort } from './engine/ports/time-clock.port.js';
import type { ArtifactProbePort } from './engine/ports/artifact-probe.port.js';
import type { SessionStorePort } from './engine/ports/session-store.port.js';
import type { TaskSinkPort } from './engine/ports/task-sink.port.js';
import { setupSession } from './engine/usecases/setup-session.js';
import { resolveStep } from './engine/usecases/resolve-step.js';
import { materializeFromPlanningDir } from './engine/usecases/materialize-splits.js';
import { checkManifest } from './engine/usecases/check-manifest.js';
import { proposeSplit } from './engine/usecases/propose-split.js';
import { captureSessionId, nodeEnvFileIo } from './engine/usecases/capture-session-id.js';
import { Err, formatAppError } from './errors/index.js';

import { interpretCliResult } from './cli/interpret-result.js';
import type { OutputFormat } from './cli/output-formatter.js';
import { failure, type CliResult } from './cli/types/cli-result.js';
import {
  executeSetupSessionCommand,
  executeResolveStepCommand,
  executeCreateSplitDirsCommand,
  executeValidateManifestCommand,
  executeNextIndexCommand,
  executeCaptureSessionIdCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('splitwright')
  .description('Resumable decomposition of a requirements document into numbered split specs')
  .version('0.3.0')
  .option('--pretty', 'Render results for humans instead of JSON')
  .exitOverride();

function outputFormat(): OutputFormat {
  return program.opts<{ pretty?: boolean }>().pretty ? { kind: 'pretty' } : { kind: 'json' };
}

interface Engine {
  readonly config: ValidatedConfig;
  readonly loggers: ILoggerFactory;
  readonly fs: FileSystemPort;
  readonly sha256: Sha256Port;
  readonly clock: TimeClockPort;
  readonly probe: ArtifactProbePort;
  readonly store: SessionStorePort;
  readonly taskSink: TaskSinkPort;
}

/**
 * Initialize the container, run the command against it and terminate accordingly.
 * Invalid configuration is reported like any other failure.
 */
async function runWithEngine(run: (engine: Engine) => Promise<CliResult>): Promise<void> {
  const format = outputFormat();
  const initialized = initializeContainer({ runtimeMode: { kind: 'cli' } });

  if (initialized.isErr()) {
    const error = initialized.error;
    interpretCliResult(
      failure(error, { details: [formatAppError(error)] }),
      format,
      new NodeProcessTerminator()
    );
    return;
  }

  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  const result = await run({
    config: container.resolve<ValidatedConfig>(DI.Config.App),
    loggers: container.resolve<ILoggerFactory>(DI.Logging.Factory),
    fs: container.resolve<FileSystemPort>(DI.Engine.FileSystem),
    sha256: container.resolve<Sha256Port>(DI.Engine.Sha256),
    clock: container.resolve<TimeClockPort>(DI.Engine.TimeClock),
    probe: container.resolve<ArtifactProbePort>(DI.Engine.ArtifactProbe),
    store: container.resolve<SessionStorePort>(DI.Engine.SessionStore),
    taskSink: container.resolve<TaskSinkPort>(DI.Engine.TaskSink),
  });

  interpretCliResult(result, format, terminator);
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITH DI
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('setup-session <input-file>')
  .description('Load or create the session for an input document and report the next step')
  .option('--session-id <id>', 'Session id (defaults to SPLITWRIGHT_SESSION_ID)')
  .option('--accept-input-change', 'Adopt the current input file content after it changed')
  .action(async (inputFile: string, options: { sessionId?: string; acceptInputChange?: boolean }) => {
    await runWithEngine((engine) =>
      executeSetupSessionCommand(inputFile, options, {
        setupSession: (input) =>
          setupSession(
            input,
            {
              sessionId: engine.config.session.sessionId,
              taskListId: engine.config.session.taskListId,
              disableTasks: engine.config.tasks.publishing.kind === 'disabled',
            },
            { ...engine, logger: engine.loggers.create('setup-session') }
          ),
      })
    );
  });

program
  .command('resolve-step <planning-dir>')
  .description('Report the step a planning directory resumes at, without writing anything')
  .action(async (planningDir: string) => {
    await runWithEngine((engine) =>
      executeResolveStepCommand(planningDir, { resolveStep: (dir) => resolveStep(dir, engine.probe) })
    );
  });

program
  .command('create-split-dirs <planning-dir>')
  .description('Create splits/NN-name/ directories for every manifest entry')
  .action(async (planningDir: string) => {
    await runWithEngine((engine) =>
      executeCreateSplitDirsCommand(planningDir, {
        materialize: (dir) =>
          materializeFromPlanningDir(dir, { fs: engine.fs, logger: engine.loggers.create('materialize') }),
      })
    );
  });

program
  .command('validate-manifest <planning-dir>')
  .description('Check the SPLIT_MANIFEST block in project-manifest.md')
  .action(async (planningDir: string) => {
    await runWithEngine((engine) =>
      executeValidateManifestCommand(planningDir, { checkManifest: (dir) => checkManifest(dir, engine.fs) })
    );
  });

program
  .command('next-index <planning-dir>')
  .description('Propose the NN-name for a new split title')
  .option('--title <title>', 'Free-form split title')
  .action(async (planningDir: string, options: { title?: string }) => {
    await runWithEngine((engine) =>
      executeNextIndexCommand(planningDir, options.title, {
        proposeSplit: (dir, title) => proposeSplit(dir, title, engine.fs),
      })
    );
  });

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITHOUT DI (hooks: must work even when configuration is broken)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('capture-session-id')
  .description('SessionStart hook: read the hook payload on stdin and publish the session id')
  .action(async () => {
    const result = await executeCaptureSessionIdCommand({
      readStdin,
      captureSessionId: (input) =>
        captureSessionId(input, { io: nodeEnvFileIo(fsp), logger: createBootstrapLogger('capture-session-id') }),
      currentSessionId: process.env['SPLITWRIGHT_SESSION_ID'],
      envFile: process.env['SPLITWRIGHT_ENV_FILE'],
    });

    interpretCliResult(result, outputFormat(), new NodeProcessTerminator());
  });

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return '';
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  const terminator = new NodeProcessTerminator();

  if (error instanceof CommanderError) {
    // Commander already printed usage; help and version are not failures.
    if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version' || error.exitCode === 0) {
      terminator.terminate({ kind: 'success' });
    }
    terminator.terminate({ kind: 'misuse' });
  }

  const unexpected = Err.unexpected('Unexpected failure', error);
  interpretCliResult(failure(unexpected, { details: [formatAppError(unexpected)] }), outputFormat(), terminator);
});
