import { describe, it, expect } from 'vitest';
import {
  PIPELINE_STEPS,
  resolveResumeStep,
  splitProgress,
  stepOrdinal,
  type StepMarkers,
} from '../../../src/engine/durable-core/domain/resume-resolver.js';
import { asSplitDirName, asSplitIndex, asSplitName } from '../../../src/engine/durable-core/ids/index.js';
import { EngineErr } from '../../../src/engine/durable-core/errors.js';

const manifest = {
  kind: 'present' as const,
  manifest: {
    entries: [
      { index: asSplitIndex('01'), name: asSplitName('backend') },
      { index: asSplitIndex('02'), name: asSplitName('frontend') },
    ],
  },
};

function markers(overrides: Partial<StepMarkers>): StepMarkers {
  return { interviewComplete: true, manifest, splitDirs: [], splitsWithSpecs: [], ...overrides };
}

const dirs = (...names: string[]) => names.map(asSplitDirName);

describe('resolveResumeStep', () => {
  it('starts with the interview when there is no transcript', () => {
    expect(resolveResumeStep(markers({ interviewComplete: false, manifest: { kind: 'absent' } }))).toBe('interview');
  });

  it('checks the earliest stage first even when later artifacts exist', () => {
    expect(resolveResumeStep(markers({ interviewComplete: false, splitDirs: dirs('01-backend') }))).toBe('interview');
  });

  it('moves to split analysis with a transcript only', () => {
    expect(resolveResumeStep(markers({ manifest: { kind: 'absent' } }))).toBe('split-analysis');
  });

  it('treats a malformed manifest as no manifest', () => {
    const malformed = { kind: 'malformed' as const, error: EngineErr.manifestMalformed('empty_block', 'empty') };
    expect(resolveResumeStep(markers({ manifest: malformed }))).toBe('split-analysis');
  });

  it('asks for confirmation when the manifest exists but no split directory does', () => {
    expect(resolveResumeStep(markers({}))).toBe('confirmation');
  });

  it('ignores directories the manifest does not name', () => {
    expect(resolveResumeStep(markers({ splitDirs: dirs('07-stray') }))).toBe('confirmation');
  });

  it('resumes directory creation when only some splits exist', () => {
    expect(resolveResumeStep(markers({ splitDirs: dirs('01-backend') }))).toBe('directory-creation');
  });

  it('generates specs when every split exists and one spec is missing', () => {
    const all = dirs('01-backend', '02-frontend');
    expect(resolveResumeStep(markers({ splitDirs: all, splitsWithSpecs: dirs('01-backend') }))).toBe('spec-generation');
  });

  it('counts disambiguated directories as materialized', () => {
    const all = dirs('01-backend', '02-frontend-2');
    expect(resolveResumeStep(markers({ splitDirs: all, splitsWithSpecs: all }))).toBe('complete');
  });

  it('is complete when every split has a spec', () => {
    const all = dirs('01-backend', '02-frontend');
    expect(resolveResumeStep(markers({ splitDirs: all, splitsWithSpecs: all }))).toBe('complete');
  });
});

describe('splitProgress', () => {
  it('matches each entry to its directory and spec state', () => {
    const progress = splitProgress(
      markers({ splitDirs: dirs('01-backend', '02-frontend-2'), splitsWithSpecs: dirs('02-frontend-2') })
    );
    expect(progress.map((p) => [p.entry.name, p.dirName, p.hasSpec])).toEqual([
      ['backend', '01-backend', false],
      ['frontend', '02-frontend-2', true],
    ]);
  });

  it('is empty without a valid manifest', () => {
    expect(splitProgress(markers({ manifest: { kind: 'absent' } }))).toEqual([]);
  });
});

describe('stepOrdinal', () => {
  it('follows pipeline order', () => {
    expect(PIPELINE_STEPS.map(stepOrdinal)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(stepOrdinal('confirmation')).toBeLessThan(stepOrdinal('spec-generation'));
  });
});
