import { describe, it, expect } from 'vitest';
import { validateInput } from '../../../src/engine/usecases/validate-input.js';
import { NodeSha256 } from '../../../src/engine/infra/local/sha256/index.js';
import { InMemoryFileSystem } from '../../fakes/engine/index.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const sha256 = new NodeSha256();

describe('validateInput', () => {
  it('accepts a non-empty markdown file and derives the planning directory', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedFile('/work/plan/requirements.md', 'hello');

    const input = expectOk(await validateInput('/work/plan/requirements.md', { fs, sha256 }), 'valid');
    expect(input).toEqual({
      inputPath: '/work/plan/requirements.md',
      planningDir: '/work/plan',
      fingerprint: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
    });
  });

  it('accepts an upper-case extension', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedFile('/work/README.MD', '# Readme');

    expect((await validateInput('/work/README.MD', { fs, sha256 })).isOk()).toBe(true);
  });

  it('rejects other extensions without touching the disk', async () => {
    const fs = new InMemoryFileSystem();

    const error = expectErr(await validateInput('/work/notes.txt', { fs, sha256 }), 'txt');
    expect(error).toEqual({
      kind: 'InputUnavailable',
      reason: 'unsupported_extension',
      path: '/work/notes.txt',
      message: 'Input must be a markdown (.md) file: /work/notes.txt',
    });
    expect(fs.calls).toEqual([]);
  });

  it('rejects a missing file', async () => {
    const error = expectErr(await validateInput('/work/missing.md', { fs: new InMemoryFileSystem(), sha256 }), 'missing');
    expect(error.reason).toBe('not_found');
    expect(error.message).toBe('File not found: /work/missing.md');
  });

  it('rejects a directory named like a markdown file', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedDir('/work/odd.md');

    const error = expectErr(await validateInput('/work/odd.md', { fs, sha256 }), 'directory');
    expect(error.reason).toBe('not_a_file');
  });

  it('rejects a whitespace-only file', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedFile('/work/blank.md', '  \n\t\n');

    const error = expectErr(await validateInput('/work/blank.md', { fs, sha256 }), 'blank');
    expect(error).toEqual({
      kind: 'InputUnavailable',
      reason: 'empty',
      path: '/work/blank.md',
      message: 'Input file is empty: /work/blank.md',
    });
  });

  it('reports an unreadable file', async () => {
    const fs = new InMemoryFileSystem();
    fs.seedFile('/work/locked.md', '# Locked');
    fs.failNext('readFileBytes', '/work/locked.md', { code: 'FS_PERMISSION_DENIED', message: 'denied' });

    const error = expectErr(await validateInput('/work/locked.md', { fs, sha256 }), 'locked');
    expect(error.message).toBe('Cannot read file (permission denied): /work/locked.md');
  });
});
