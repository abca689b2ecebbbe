import { describe, it, expect } from 'vitest';
import { LocalArtifactProbe } from '../../../src/engine/infra/local/artifact-probe/index.js';
import { InMemoryFileSystem } from '../../fakes/engine/index.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const MANIFEST = '<!-- SPLIT_MANIFEST\n01-backend\n02-frontend\nEND_MANIFEST -->\n';

describe('LocalArtifactProbe', () => {
  it('reports nothing for an empty planning directory', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedDir('/plan');

    const markers = expectOk(await new LocalArtifactProbe(fs).probe('/plan'), 'probe');
    expect(markers).toEqual({ interviewComplete: false, manifest: { kind: 'absent' }, splitDirs: [], splitsWithSpecs: [] });
  });

  it('treats an empty transcript as missing', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedFile('/plan/decomposition-interview.md', '');

    const markers = expectOk(await new LocalArtifactProbe(fs).probe('/plan'), 'probe');
    expect(markers.interviewComplete).toBe(false);
  });

  it('decodes the manifest and lists split directories in index order', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedFile('/plan/decomposition-interview.md', '# Interview');
    fs.seedFile('/plan/project-manifest.md', MANIFEST);
    fs.seedDir('/plan/splits/02-frontend');
    fs.seedDir('/plan/splits/01-backend');
    fs.seedDir('/plan/splits/notes');
    fs.seedFile('/plan/splits/03-stray', 'a file, not a split');
    fs.seedFile('/plan/splits/01-backend/spec.md', '# Backend');
    fs.seedFile('/plan/splits/02-frontend/spec.md', '');

    const markers = expectOk(await new LocalArtifactProbe(fs).probe('/plan'), 'probe');
    expect(markers.interviewComplete).toBe(true);
    expect(markers.manifest.kind).toBe('present');
    expect(markers.splitDirs).toEqual(['01-backend', '02-frontend']);
    expect(markers.splitsWithSpecs).toEqual(['01-backend']);
  });

  it('carries a malformed manifest as data', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedFile('/plan/project-manifest.md', '# Manifest\n');

    const markers = expectOk(await new LocalArtifactProbe(fs).probe('/plan'), 'probe');
    expect(markers.manifest.kind).toBe('malformed');
  });

  it('fails only when the planning directory cannot be read', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedDir('/plan');
    fs.failNext('readdirEntries', '/plan/splits', { code: 'FS_PERMISSION_DENIED', message: 'denied' });

    const error = expectErr(await new LocalArtifactProbe(fs).probe('/plan'), 'denied');
    expect(error).toEqual({
      kind: 'StorageUnwritable',
      path: '/plan',
      message: 'Cannot read planning directory artifacts: denied',
    });
  });
});
