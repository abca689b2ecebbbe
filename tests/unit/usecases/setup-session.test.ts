import { describe, it, expect, beforeEach } from 'vitest';
import { setupSession, type SetupSessionEnv, type SetupSessionInput } from '../../../src/engine/usecases/setup-session.js';
import { LocalArtifactProbe } from '../../../src/engine/infra/local/artifact-probe/index.js';
import { LocalDataDir } from '../../../src/engine/infra/local/data-dir/index.js';
import { LocalSessionStore } from '../../../src/engine/infra/local/session-store/index.js';
import { NodeSha256 } from '../../../src/engine/infra/local/sha256/index.js';
import { asSessionId } from '../../../src/engine/durable-core/ids/index.js';
import { localSessionIdFor } from '../../../src/engine/durable-core/domain/session-keys.js';
import { FakeTimeClock, InMemoryFileSystem, InMemoryTaskSink } from '../../fakes/engine/index.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const INPUT = '/work/plan/requirements.md';

describe('setupSession', () => {
  let fs: InMemoryFileSystem;
  let clock: FakeTimeClock;
  let sink: InMemoryTaskSink;
  let store: LocalSessionStore;
  let logger: FakeLogger;
  const sha256 = new NodeSha256();

  beforeEach(() => {
    fs = new InMemoryFileSystem();
    fs.seedFile(INPUT, '# Requirements\n\nBuild a thing.\n');
    clock = new FakeTimeClock();
    sink = new InMemoryTaskSink();
    logger = new FakeLogger();
    const probe = new LocalArtifactProbe(fs);
    store = new LocalSessionStore({
      dataDir: new LocalDataDir({ dataDir: '/data', tasksDir: '/tasks' }),
      fs,
      sha256,
      probe,
      clock,
    });
  });

  const run = (input: Partial<SetupSessionInput> = {}, env: Partial<SetupSessionEnv> = {}) => {
    const probe = new LocalArtifactProbe(fs);
    return setupSession(
      { inputFile: INPUT, acceptInputChange: false, ...input },
      { sessionId: 'sess-1', disableTasks: false, ...env },
      { fs, sha256, clock, store, probe, taskSink: sink, logger: logger.asLogger() }
    );
  };

  const storedRecord = (sessionId: string): unknown => {
    const text = fs.readText(store.recordPath(asSessionId(sessionId), INPUT));
    return text === null ? null : JSON.parse(text);
  };

  it('starts a new session at the interview and publishes the plan', async () => {
    const outcome = expectOk(await run(), 'new session');

    expect(outcome.mode).toBe('new');
    expect(outcome.sessionId).toBe('sess-1');
    expect(outcome.localNamespace).toBe(false);
    expect(outcome.planningDir).toBe('/work/plan');
    expect(outcome.resumeStep).toBe('interview');
    expect(outcome.previousStep).toBeNull();
    expect(outcome.warnings).toEqual([]);
    expect(outcome.tasks).toEqual({
      kind: 'published',
      summary: { taskListId: 'sess-1', tasksWritten: sink.writes[0]?.tasks.length, tasksDir: '/tasks/sess-1', obsoleted: [] },
      context: { taskListId: 'sess-1', source: 'session', sessionIdMatched: null },
    });

    expect(storedRecord('sess-1')).toMatchObject({
      v: 1,
      sessionId: 'sess-1',
      inputPath: INPUT,
      planningDir: '/work/plan',
      createdAt: '2024-01-15T09:30:00.000Z',
      updatedAt: '2024-01-15T09:30:00.000Z',
      lastResolvedStep: 'interview',
    });
  });

  it('resumes from the artifacts on disk and keeps the creation time', async () => {
    expectOk(await run(), 'first run');
    fs.seedFile('/work/plan/decomposition-interview.md', '# Interview\n');
    clock.advance(60_000);

    const outcome = expectOk(await run(), 'second run');

    expect(outcome.mode).toBe('resume');
    expect(outcome.previousStep).toBe('interview');
    expect(outcome.resumeStep).toBe('split-analysis');
    expect(storedRecord('sess-1')).toMatchObject({
      createdAt: '2024-01-15T09:30:00.000Z',
      updatedAt: '2024-01-15T09:31:00.000Z',
      lastResolvedStep: 'split-analysis',
    });
  });

  it('warns about a changed input and keeps the stored fingerprint until accepted', async () => {
    const first = expectOk(await run(), 'first run');
    fs.seedFile(INPUT, '# Requirements\n\nBuild a different thing.\n');

    const drifted = expectOk(await run(), 'drifted');
    expect(drifted.inputFingerprint).toBe(first.inputFingerprint);
    expect(drifted.warnings).toHaveLength(1);
    expect(drifted.warnings[0]).toMatchObject({
      kind: 'InputDrifted',
      path: INPUT,
      storedFingerprint: first.inputFingerprint,
      message: `Input file has changed since session started: ${INPUT}`,
    });

    const accepted = expectOk(await run({ acceptInputChange: true }), 'accepted');
    expect(accepted.warnings).toEqual([]);
    expect(accepted.inputFingerprint).not.toBe(first.inputFingerprint);

    const settled = expectOk(await run(), 'after accepting');
    expect(settled.warnings).toEqual([]);
    expect(settled.inputFingerprint).toBe(accepted.inputFingerprint);
  });

  it('derives a local namespace when no session id is available', async () => {
    const outcome = expectOk(await run({}, { sessionId: undefined }), 'local');
    const localId = localSessionIdFor(INPUT, sha256);

    expect(outcome.sessionId).toBe(localId);
    expect(outcome.localNamespace).toBe(true);
    expect(outcome.warnings).toEqual([
      { kind: 'SessionNamespaceUnavailable', message: `No session id available; using local namespace ${localId}` },
      { kind: 'TaskPublishSkipped', message: 'No task list id available; task list not published' },
    ]);
    expect(outcome.tasks).toEqual({
      kind: 'skipped',
      reason: 'no_task_list_id',
      context: { taskListId: null, source: 'none', sessionIdMatched: null },
    });
    expect(storedRecord(localId)).toMatchObject({ sessionId: localId });
  });

  it('publishes to a user-provided task list without a session id', async () => {
    const outcome = expectOk(await run({}, { sessionId: undefined, taskListId: 'shared' }), 'shared list');

    expect(outcome.tasks.kind).toBe('published');
    expect(sink.writes.map((w) => w.taskListId)).toEqual(['shared']);
  });

  it('lets an explicit session id win over the environment', async () => {
    const outcome = expectOk(await run({ sessionId: 'explicit' }, { sessionId: 'from-env' }), 'explicit');

    expect(outcome.sessionId).toBe('explicit');
    expect(outcome.tasks.context).toEqual({ taskListId: 'explicit', source: 'context', sessionIdMatched: false });
  });

  it('skips task publication when disabled', async () => {
    const outcome = expectOk(await run({}, { disableTasks: true }), 'disabled');

    expect(outcome.tasks.kind).toBe('skipped');
    expect(outcome.tasks.kind === 'skipped' && outcome.tasks.reason).toBe('disabled');
    expect(outcome.warnings).toEqual([]);
    expect(sink.writes).toEqual([]);
  });

  it('still succeeds when the task sink fails', async () => {
    sink.failWith = { code: 'TASK_SINK_IO_ERROR', message: 'File system error: boom' };

    const outcome = expectOk(await run(), 'sink failure');

    expect(outcome.tasks.kind === 'skipped' && outcome.tasks.reason).toBe('sink_failed');
    expect(outcome.warnings).toEqual([{ kind: 'TaskPublishSkipped', message: 'Task list not published: File system error: boom' }]);
    expect(storedRecord('sess-1')).not.toBeNull();
  });

  it('surfaces a malformed manifest as a warning and re-runs split analysis', async () => {
    fs.seedFile('/work/plan/decomposition-interview.md', '# Interview\n');
    fs.seedFile('/work/plan/project-manifest.md', '# Manifest without a block\n');

    const outcome = expectOk(await run(), 'malformed manifest');

    expect(outcome.resumeStep).toBe('split-analysis');
    expect(outcome.warnings).toHaveLength(1);
    expect(outcome.warnings[0]).toMatchObject({ kind: 'ManifestMalformed', reason: 'missing_block' });
  });

  it('fails on an invalid input without writing a session', async () => {
    const error = expectErr(await run({ inputFile: '/work/plan/missing.md' }), 'missing input');

    expect(error.kind).toBe('InputUnavailable');
    expect(fs.list('/data')).toEqual([]);
    expect(sink.writes).toEqual([]);
  });

  it('refuses to resume from a corrupt record', async () => {
    expectOk(await run(), 'first run');
    fs.seedFile(store.recordPath(asSessionId('sess-1'), INPUT), '{ not json');

    const error = expectErr(await run(), 'corrupt');
    expect(error.kind).toBe('SessionCorrupt');
  });
});
