import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  appendSplit,
  decodeManifest,
  encodeManifest,
  entriesInIndexOrder,
  type SplitManifest,
} from '../../../src/engine/durable-core/domain/manifest-codec.js';
import { asSplitIndex, asSplitName } from '../../../src/engine/durable-core/ids/index.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

function manifestOf(...dirNames: string[]): SplitManifest {
  return {
    entries: dirNames.map((d) => ({ index: asSplitIndex(d.slice(0, 2)), name: asSplitName(d.slice(3)) })),
  };
}

describe('decodeManifest', () => {
  it('reads entries in document order and ignores prose after the block', () => {
    const doc = [
      '<!-- SPLIT_MANIFEST',
      '01-backend',
      '',
      '02-api-gateway',
      'END_MANIFEST -->',
      '',
      '# Project manifest',
      '03-not-an-entry',
    ].join('\n');

    const manifest = expectOk(decodeManifest(doc), 'decode');
    expect(manifest).toEqual(manifestOf('01-backend', '02-api-gateway'));
  });

  it('accepts an entry whose name is longer than 50 characters', () => {
    const dirName = `01-${'a'.repeat(51)}`;
    const doc = `<!-- SPLIT_MANIFEST\n${dirName}\nEND_MANIFEST -->`;
    expect(expectOk(decodeManifest(doc), 'long name')).toEqual(manifestOf(dirName));
  });

  it('tolerates leading blank lines, CRLF, and index gaps', () => {
    const doc = '\r\n<!-- SPLIT_MANIFEST\r\n01-a\r\n05-e\r\nEND_MANIFEST -->\r\n';
    expect(expectOk(decodeManifest(doc), 'crlf')).toEqual(manifestOf('01-a', '05-e'));
  });

  it('rejects a block that is not at the start of the document', () => {
    const doc = '# Title\n\n<!-- SPLIT_MANIFEST\n01-a\nEND_MANIFEST -->\n';
    const error = expectErr(decodeManifest(doc), 'buried');
    expect(error.reason).toBe('marker_not_first');
    expect(error.line).toBe(3);
    expect(error.message).toBe('SPLIT_MANIFEST block must be the first content of the document (found at line 3)');
  });

  it('reports a missing block', () => {
    expect(expectErr(decodeManifest('# Just prose\n'), 'no block').reason).toBe('missing_block');
    expect(expectErr(decodeManifest(''), 'empty doc').reason).toBe('missing_block');
  });

  it('reports an unterminated block', () => {
    const error = expectErr(decodeManifest('<!-- SPLIT_MANIFEST\n01-a\n'), 'open');
    expect(error.reason).toBe('unterminated_block');
    expect(error.message).toBe("SPLIT_MANIFEST block opened at line 1 has no 'END_MANIFEST -->'");
  });

  it('reports an empty block', () => {
    expect(expectErr(decodeManifest('<!-- SPLIT_MANIFEST\n\nEND_MANIFEST -->'), 'empty').reason).toBe('empty_block');
  });

  it('reports the offending line of an invalid entry', () => {
    const error = expectErr(decodeManifest('<!-- SPLIT_MANIFEST\n01-ok\n2-bad\nEND_MANIFEST -->'), 'invalid');
    expect(error.reason).toBe('invalid_line');
    expect(error.line).toBe(3);
    expect(error.text).toBe('2-bad');
    expect(error.message).toBe(
      "Line 3: invalid split '2-bad': must match NN-kebab-case (e.g. 01-backend, 02-api-gateway). " +
        'Expected a two-digit index from 01 followed by a kebab-case name.'
    );
  });

  it('rejects uppercase names inside the block', () => {
    const error = expectErr(decodeManifest('<!-- SPLIT_MANIFEST\n01-Auth_System\nEND_MANIFEST -->'), 'upper');
    expect(error.reason).toBe('invalid_line');
    expect(error.line).toBe(2);
  });

  it('rejects duplicate indices', () => {
    const error = expectErr(decodeManifest('<!-- SPLIT_MANIFEST\n01-a\n01-b\nEND_MANIFEST -->'), 'dup index');
    expect(error.reason).toBe('duplicate_index');
    expect(error.message).toBe("Line 3: duplicate index 01 in '01-b' (already used on line 2)");
  });

  it('rejects duplicate names', () => {
    const error = expectErr(decodeManifest('<!-- SPLIT_MANIFEST\n01-a\n02-a\nEND_MANIFEST -->'), 'dup name');
    expect(error.reason).toBe('duplicate_name');
    expect(error.line).toBe(3);
  });
});

describe('encodeManifest', () => {
  it('writes the canonical block', () => {
    expect(encodeManifest(manifestOf('01-backend', '02-frontend'))).toBe(
      '<!-- SPLIT_MANIFEST\n01-backend\n02-frontend\nEND_MANIFEST -->'
    );
  });

  it('round-trips every valid manifest', () => {
    const segment = fc.stringMatching(/^[a-z0-9]{1,6}$/);
    const name = fc.array(segment, { minLength: 1, maxLength: 3 }).map((parts) => parts.join('-'));
    const manifest = fc
      .uniqueArray(fc.tuple(fc.integer({ min: 1, max: 99 }), name), {
        minLength: 1,
        maxLength: 12,
        selector: ([index]) => index,
      })
      .filter((pairs) => new Set(pairs.map(([, n]) => n)).size === pairs.length)
      .filter((pairs) => pairs.every(([, n]) => !/^\d{2}-/.test(n)))
      .map((pairs) => manifestOf(...pairs.map(([i, n]) => `${String(i).padStart(2, '0')}-${n}`)));

    fc.assert(
      fc.property(manifest, (m) => {
        expect(expectOk(decodeManifest(encodeManifest(m)), 'round trip')).toEqual(m);
      })
    );
  });
});

describe('entriesInIndexOrder', () => {
  it('sorts by numeric index regardless of document order', () => {
    const sorted = entriesInIndexOrder(manifestOf('03-c', '01-a', '02-b'));
    expect(sorted.map((e) => e.name)).toEqual(['a', 'b', 'c']);
  });
});

describe('appendSplit', () => {
  it('sanitizes the title and appends at max + 1', () => {
    const { manifest, entry } = expectOk(appendSplit(manifestOf('01-a', '04-d'), 'Search Index'), 'append');
    expect(entry).toEqual({ index: '05', name: 'search-index' });
    expect(encodeManifest(manifest)).toBe('<!-- SPLIT_MANIFEST\n01-a\n04-d\n05-search-index\nEND_MANIFEST -->');
  });

  it('refuses a name already in the manifest', () => {
    const error = expectErr(appendSplit(manifestOf('01-auth'), 'Auth'), 'dup');
    expect(error.message).toBe("Split name 'auth' is already in the manifest");
  });

  it('refuses a title that sanitizes to nothing', () => {
    expect(expectErr(appendSplit({ entries: [] }, '???'), 'empty').message).toBe('Split name is empty');
  });
});
