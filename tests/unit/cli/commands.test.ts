import { describe, it, expect, beforeEach } from 'vitest';
import { okAsync } from 'neverthrow';
import {
  executeCaptureSessionIdCommand,
  executeCreateSplitDirsCommand,
  executeNextIndexCommand,
  executeResolveStepCommand,
  executeSetupSessionCommand,
  executeValidateManifestCommand,
} from '../../../src/cli/commands/index.js';
import type { CliResult } from '../../../src/cli/types/index.js';
import { checkManifest } from '../../../src/engine/usecases/check-manifest.js';
import { materializeFromPlanningDir } from '../../../src/engine/usecases/materialize-splits.js';
import { proposeSplit } from '../../../src/engine/usecases/propose-split.js';
import { resolveStep } from '../../../src/engine/usecases/resolve-step.js';
import { setupSession } from '../../../src/engine/usecases/setup-session.js';
import { LocalArtifactProbe } from '../../../src/engine/infra/local/artifact-probe/index.js';
import { LocalDataDir } from '../../../src/engine/infra/local/data-dir/index.js';
import { LocalSessionStore } from '../../../src/engine/infra/local/session-store/index.js';
import { NodeSha256 } from '../../../src/engine/infra/local/sha256/index.js';
import { FakeTimeClock, InMemoryFileSystem, InMemoryTaskSink } from '../../fakes/engine/index.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';

const MANIFEST = '<!-- SPLIT_MANIFEST\n01-backend\n02-frontend\nEND_MANIFEST -->\n';

function payloadOf(result: CliResult): unknown {
  return result.payload;
}

describe('CLI commands', () => {
  let fs: InMemoryFileSystem;
  let logger: FakeLogger;

  beforeEach(() => {
    fs = new InMemoryFileSystem();
    logger = new FakeLogger();
  });

  describe('validate-manifest', () => {
    it('reports the declared splits', async () => {
      fs.seedFile('/plan/project-manifest.md', MANIFEST);

      const result = await executeValidateManifestCommand('/plan', { checkManifest: (d) => checkManifest(d, fs) });

      expect(result.kind).toBe('success');
      expect(payloadOf(result)).toEqual({
        success: true,
        valid: true,
        manifestPath: '/plan/project-manifest.md',
        splits: ['01-backend', '02-frontend'],
      });
    });

    it('fails with the structured error', async () => {
      fs.seedDir('/plan');

      const result = await executeValidateManifestCommand('/plan', { checkManifest: (d) => checkManifest(d, fs) });

      expect(result).toEqual({
        kind: 'failure',
        exitCode: { kind: 'general_error' },
        payload: {
          success: false,
          error: { kind: 'ManifestMalformed', reason: 'missing_file', message: 'Manifest not found: /plan/project-manifest.md' },
        },
        output: {
          message: 'Manifest not found: /plan/project-manifest.md',
          details: ['Malformed manifest (missing_file): Manifest not found: /plan/project-manifest.md'],
          suggestions: ['Start project-manifest.md with a <!-- SPLIT_MANIFEST ... END_MANIFEST --> block of NN-kebab-case lines'],
        },
      });
    });
  });

  describe('create-split-dirs', () => {
    it('returns created and skipped directories', async () => {
      fs.seedFile('/plan/project-manifest.md', MANIFEST);
      fs.seedDir('/plan/splits/01-backend');

      const result = await executeCreateSplitDirsCommand('/plan', {
        materialize: (d) => materializeFromPlanningDir(d, { fs, logger: logger.asLogger() }),
      });

      expect(payloadOf(result)).toEqual({ success: true, created: ['02-frontend'], skipped: ['01-backend'], renamed: [] });
      expect(result.output?.message).toBe('Created 1 split directory, 1 already present');
    });
  });

  describe('next-index', () => {
    it('is misuse without a title', async () => {
      const result = await executeNextIndexCommand('/plan', '  ', { proposeSplit: (d, t) => proposeSplit(d, t, fs) });

      expect(result.kind === 'failure' && result.exitCode).toEqual({ kind: 'misuse' });
      expect(payloadOf(result)).toEqual({ success: false, error: { kind: 'Misuse', message: 'A split title is required' } });
    });

    it('proposes the next directory name', async () => {
      fs.seedFile('/plan/project-manifest.md', MANIFEST);

      const result = await executeNextIndexCommand('/plan', 'Admin Console', {
        proposeSplit: (d, t) => proposeSplit(d, t, fs),
      });

      expect(payloadOf(result)).toEqual({
        success: true,
        index: '03',
        name: 'admin-console',
        dirName: '03-admin-console',
        sanitized: true,
        manifestBlock: '<!-- SPLIT_MANIFEST\n01-backend\n02-frontend\n03-admin-console\nEND_MANIFEST -->',
      });
      expect(result.output?.warnings).toEqual(["Title 'Admin Console' was normalized to 'admin-console'"]);
    });
  });

  describe('resolve-step', () => {
    it('reports the step and per-split progress', async () => {
      fs.seedFile('/plan/decomposition-interview.md', '# Interview');
      fs.seedFile('/plan/project-manifest.md', MANIFEST);
      fs.seedFile('/plan/splits/01-backend/spec.md', '# Backend');

      const result = await executeResolveStepCommand('/plan', {
        resolveStep: (d) => resolveStep(d, new LocalArtifactProbe(fs)),
      });

      expect(payloadOf(result)).toEqual({
        success: true,
        planningDir: '/plan',
        resumeStep: 'directory-creation',
        artifacts: { interviewComplete: true, manifest: 'present', splitDirs: ['01-backend'], splitsWithSpecs: ['01-backend'] },
        manifestError: null,
        splits: [
          { split: '01-backend', directory: '01-backend', hasSpec: true },
          { split: '02-frontend', directory: null, hasSpec: false },
        ],
      });
    });
  });

  describe('setup-session', () => {
    it('returns the session, step and task publication', async () => {
      fs.seedFile('/plan/requirements.md', '# Requirements');
      const sha256 = new NodeSha256();
      const clock = new FakeTimeClock();
      const probe = new LocalArtifactProbe(fs);
      const store = new LocalSessionStore({
        dataDir: new LocalDataDir({ dataDir: '/data', tasksDir: '/tasks' }),
        fs,
        sha256,
        probe,
        clock,
      });
      const sink = new InMemoryTaskSink();

      const result = await executeSetupSessionCommand(
        '/plan/requirements.md',
        { sessionId: 'sess-1' },
        {
          setupSession: (input) =>
            setupSession(input, { disableTasks: false }, { fs, sha256, clock, store, probe, taskSink: sink, logger: logger.asLogger() }),
        }
      );

      expect(result.kind).toBe('success');
      expect(payloadOf(result)).toMatchObject({
        success: true,
        mode: 'new',
        sessionId: 'sess-1',
        localNamespace: false,
        inputPath: '/plan/requirements.md',
        planningDir: '/plan',
        resumeStep: 'interview',
        previousStep: null,
        artifacts: { interviewComplete: false, manifest: 'absent', splitDirs: [], splitsWithSpecs: [] },
        splits: [],
        tasks: { published: true, taskListId: 'sess-1', source: 'context', tasksWritten: 11, tasksDir: '/tasks/sess-1', obsoleted: [] },
        warnings: [],
      });
      expect(result.output?.message).toBe('New session sess-1: next step is interview');
    });
  });

  describe('capture-session-id', () => {
    it('prints the hook output as its payload', async () => {
      const result = await executeCaptureSessionIdCommand({
        readStdin: () => Promise.resolve('{"session_id":"sess-1"}'),
        captureSessionId: () =>
          Promise.resolve({
            hookOutput: {
              hookSpecificOutput: { hookEventName: 'SessionStart', additionalContext: 'SPLITWRIGHT_SESSION_ID=sess-1' },
            },
            sessionId: 'sess-1',
            appendedLines: ["export SPLITWRIGHT_SESSION_ID='sess-1'"],
          }),
      });

      expect(result).toEqual({
        kind: 'success',
        payload: {
          hookSpecificOutput: { hookEventName: 'SessionStart', additionalContext: 'SPLITWRIGHT_SESSION_ID=sess-1' },
        },
        output: {
          message: 'Session id captured: sess-1',
          details: ["appended: export SPLITWRIGHT_SESSION_ID='sess-1'"],
        },
      });
    });

    it('succeeds silently without a session id', async () => {
      const result = await executeCaptureSessionIdCommand({
        readStdin: () => Promise.resolve(''),
        captureSessionId: () => Promise.resolve({ hookOutput: null, sessionId: null, appendedLines: [] }),
      });

      expect(result.kind).toBe('success');
      expect(result.payload).toBeNull();
    });
  });
});

describe('validate-manifest message', () => {
  it('pluralizes the split count', async () => {
    const result = await executeValidateManifestCommand('/plan', {
      checkManifest: () => okAsync({ manifestPath: '/plan/project-manifest.md', splits: [] }),
    });
    expect(result.output?.message).toBe('Manifest is valid: 0 splits');
  });
});
